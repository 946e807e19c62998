/**
 * Service Bus tools.
 */

import { Type } from "@sinclair/typebox";
import { JsonObject, defineTool, parseScalarMap, type ToolDefinition } from "../../../../src/index.js";
import { Name, OptionalResourceGroup, ResourceGroup, SubscriptionId, optional } from "../params.js";
import type { AzureServerState } from "../state.js";
import { MAX_MESSAGES, receiveSource } from "./messaging.js";

const SERVICE = "servicebus";

const NamespaceParams = { resourceGroup: ResourceGroup, namespaceName: Name("Service Bus namespace"), subscriptionId: SubscriptionId };
const QueueParams = { ...NamespaceParams, queueName: Name("Queue name") };
const TopicParams = { ...NamespaceParams, topicName: Name("Topic name") };
const LockDuration = Type.Optional(Type.String({ description: "ISO 8601 duration, e.g. PT1M" }));
const MaxDeliveryCount = Type.Optional(Type.Integer({ minimum: 1, maximum: 2000 }));

const Source = {
  namespace: Name("Namespace name or host"),
  queueName: Type.Optional(Type.String({ description: "Queue to read from" })),
  topicName: Type.Optional(Type.String({ description: "Topic to read from (with subscriptionName)" })),
  subscriptionName: Type.Optional(Type.String({ description: "Topic subscription" })),
  maxMessages: Type.Integer({ minimum: 1, maximum: MAX_MESSAGES, default: 10 }),
};


export function createServiceBusTools(state: AzureServerState): ToolDefinition[] {
  return [
    defineTool({
      name: "azure_list_servicebus_namespaces",
      label: "List Service Bus Namespaces",
      description: "Service Bus namespaces with SKU and endpoint.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: OptionalResourceGroup, subscriptionId: SubscriptionId }),
      async run(params) {
        const namespaces = await (await state.serviceBus(params.subscriptionId)).listNamespaces(optional(params.resourceGroup));
        return { namespaces, count: namespaces.length };
      },
    }),

    defineTool({
      name: "azure_get_servicebus_namespace",
      label: "Get Service Bus Namespace",
      description: "Details of one namespace.",
      service: SERVICE,
      parameters: Type.Object(NamespaceParams),
      async run(params) {
        const manager = await state.serviceBus(params.subscriptionId);
        return { namespace: await manager.getNamespace(params.resourceGroup, params.namespaceName) };
      },
    }),

    defineTool({
      name: "azure_list_servicebus_queues",
      label: "List Service Bus Queues",
      description: "Queues in a namespace with message counts.",
      service: SERVICE,
      parameters: Type.Object(NamespaceParams),
      async run(params) {
        const manager = await state.serviceBus(params.subscriptionId);
        const queues = await manager.listQueues(params.resourceGroup, params.namespaceName);
        return { queues, count: queues.length };
      },
    }),

    defineTool({
      name: "azure_get_servicebus_queue",
      label: "Get Service Bus Queue",
      description: "Queue settings and active, dead-letter and scheduled message counts.",
      service: SERVICE,
      parameters: Type.Object(QueueParams),
      async run(params) {
        const manager = await state.serviceBus(params.subscriptionId);
        return { queue: await manager.getQueue(params.resourceGroup, params.namespaceName, params.queueName) };
      },
    }),

    defineTool({
      name: "azure_create_servicebus_queue",
      label: "Create Service Bus Queue",
      description: "Create or update a queue.",
      service: SERVICE,
      parameters: Type.Object({
        ...QueueParams,
        maxSizeInMegabytes: Type.Optional(Type.Integer({ minimum: 1024, maximum: 81_920 })),
        lockDuration: LockDuration,
        maxDeliveryCount: MaxDeliveryCount,
      }),
      async run(params) {
        const manager = await state.serviceBus(params.subscriptionId);
        const queue = await manager.createQueue(params.resourceGroup, params.namespaceName, params.queueName, {
          maxSizeInMegabytes: params.maxSizeInMegabytes,
          lockDuration: optional(params.lockDuration),
          maxDeliveryCount: params.maxDeliveryCount,
        });
        return { queue, message: `Queue ${params.queueName} saved` };
      },
    }),

    defineTool({
      name: "azure_delete_servicebus_queue",
      label: "Delete Service Bus Queue",
      description: "Delete a queue and its messages.",
      service: SERVICE,
      parameters: Type.Object(QueueParams),
      async run(params) {
        await (await state.serviceBus(params.subscriptionId)).deleteQueue(params.resourceGroup, params.namespaceName, params.queueName);
        return { queueName: params.queueName, message: `Queue ${params.queueName} deleted` };
      },
    }),

    defineTool({
      name: "azure_list_servicebus_topics",
      label: "List Service Bus Topics",
      description: "Topics in a namespace.",
      service: SERVICE,
      parameters: Type.Object(NamespaceParams),
      async run(params) {
        const manager = await state.serviceBus(params.subscriptionId);
        const topics = await manager.listTopics(params.resourceGroup, params.namespaceName);
        return { topics, count: topics.length };
      },
    }),

    defineTool({
      name: "azure_create_servicebus_topic",
      label: "Create Service Bus Topic",
      description: "Create or update a topic.",
      service: SERVICE,
      parameters: Type.Object({ ...TopicParams, maxSizeInMegabytes: Type.Optional(Type.Integer({ minimum: 1024, maximum: 81_920 })) }),
      async run(params) {
        const manager = await state.serviceBus(params.subscriptionId);
        const topic = await manager.createTopic(params.resourceGroup, params.namespaceName, params.topicName, {
          maxSizeInMegabytes: params.maxSizeInMegabytes,
        });
        return { topic, message: `Topic ${params.topicName} saved` };
      },
    }),

    defineTool({
      name: "azure_delete_servicebus_topic",
      label: "Delete Service Bus Topic",
      description: "Delete a topic and its subscriptions.",
      service: SERVICE,
      parameters: Type.Object(TopicParams),
      async run(params) {
        await (await state.serviceBus(params.subscriptionId)).deleteTopic(params.resourceGroup, params.namespaceName, params.topicName);
        return { topicName: params.topicName, message: `Topic ${params.topicName} deleted` };
      },
    }),

    defineTool({
      name: "azure_list_servicebus_subscriptions",
      label: "List Topic Subscriptions",
      description: "Subscriptions of a topic with message counts.",
      service: SERVICE,
      parameters: Type.Object(TopicParams),
      async run(params) {
        const manager = await state.serviceBus(params.subscriptionId);
        const subscriptions = await manager.listSubscriptions(params.resourceGroup, params.namespaceName, params.topicName);
        return { subscriptions, count: subscriptions.length };
      },
    }),

    defineTool({
      name: "azure_create_servicebus_subscription",
      label: "Create Topic Subscription",
      description: "Create or update a topic subscription.",
      service: SERVICE,
      parameters: Type.Object({
        ...TopicParams,
        subscriptionName: Name("Subscription name"),
        lockDuration: LockDuration,
        maxDeliveryCount: MaxDeliveryCount,
      }),
      async run(params) {
        const manager = await state.serviceBus(params.subscriptionId);
        const subscription = await manager.createSubscription(
          params.resourceGroup,
          params.namespaceName,
          params.topicName,
          params.subscriptionName,
          { lockDuration: optional(params.lockDuration), maxDeliveryCount: params.maxDeliveryCount },
        );
        return { subscription, message: `Subscription ${params.subscriptionName} saved` };
      },
    }),

    defineTool({
      name: "azure_send_servicebus_message",
      label: "Send Service Bus Message",
      description: "Send one message to a queue or topic.",
      service: SERVICE,
      parameters: Type.Object({
        namespace: Name("Namespace name or host"),
        entity: Name("Queue or topic name"),
        body: Type.String({ description: "Message body" }),
        subject: Type.Optional(Type.String()),
        contentType: Type.Optional(Type.String()),
        correlationId: Type.Optional(Type.String()),
        applicationProperties: Type.Optional(JsonObject("Custom properties as a JSON object")),
      }),
      async run(params) {
        const messageId = await state.serviceBusMessaging().sendMessage(params.namespace, params.entity, {
          body: params.body,
          subject: optional(params.subject),
          contentType: optional(params.contentType),
          correlationId: optional(params.correlationId),
          applicationProperties: parseScalarMap(params.applicationProperties, "applicationProperties"),
        });
        return { messageId, entity: params.entity, message: `Message sent to ${params.entity}` };
      },
    }),

    defineTool({
      name: "azure_peek_servicebus_messages",
      label: "Peek Service Bus Messages",
      description: "Look at messages without removing them.",
      service: SERVICE,
      parameters: Type.Object(Source),
      async run(params) {
        const messages = await state
          .serviceBusMessaging()
          .peekMessages(params.namespace, receiveSource(params), params.maxMessages);
        return { messages, count: messages.length };
      },
    }),

    defineTool({
      name: "azure_receive_servicebus_messages",
      label: "Receive Service Bus Messages",
      description: "Receive and complete messages. They are removed from the entity.",
      service: SERVICE,
      parameters: Type.Object({ ...Source, maxWaitSeconds: Type.Integer({ minimum: 1, maximum: 60, default: 5 }) }),
      async run(params) {
        const messages = await state
          .serviceBusMessaging()
          .receiveMessages(params.namespace, receiveSource(params), params.maxMessages, params.maxWaitSeconds);
        return { messages, count: messages.length };
      },
    }),
  ];
}
