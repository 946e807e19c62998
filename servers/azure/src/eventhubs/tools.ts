/**
 * Event Hubs tools.
 */

import { Type } from "@sinclair/typebox";
import {
  JsonObject,
  ToolInputError,
  defineTool,
  parseJsonArray,
  parseScalarMap,
  type ToolDefinition,
} from "../../../../src/index.js";
import { Name, OptionalResourceGroup, ResourceGroup, SubscriptionId, optional } from "../params.js";
import type { AzureServerState } from "../state.js";

const SERVICE = "eventhubs";

const NamespaceParams = { resourceGroup: ResourceGroup, namespaceName: Name("Event Hubs namespace"), subscriptionId: SubscriptionId };
const HubParams = { ...NamespaceParams, eventHubName: Name("Event hub name") };
const GroupParams = { ...HubParams, consumerGroupName: Name("Consumer group name") };
const DataPlane = { namespace: Name("Namespace name or host"), eventHub: Name("Event hub name") };


export function createEventHubsTools(state: AzureServerState): ToolDefinition[] {
  return [
    defineTool({
      name: "azure_list_eventhub_namespaces",
      label: "List Event Hubs Namespaces",
      description: "Event Hubs namespaces with SKU, throughput and Kafka support.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: OptionalResourceGroup, subscriptionId: SubscriptionId }),
      async run(params) {
        const namespaces = await (await state.eventHubs(params.subscriptionId)).listNamespaces(optional(params.resourceGroup));
        return { namespaces, count: namespaces.length };
      },
    }),

    defineTool({
      name: "azure_get_eventhub_namespace",
      label: "Get Event Hubs Namespace",
      description: "Details of one namespace.",
      service: SERVICE,
      parameters: Type.Object(NamespaceParams),
      async run(params) {
        const manager = await state.eventHubs(params.subscriptionId);
        return { namespace: await manager.getNamespace(params.resourceGroup, params.namespaceName) };
      },
    }),

    defineTool({
      name: "azure_list_event_hubs",
      label: "List Event Hubs",
      description: "Event hubs in a namespace with partition counts.",
      service: SERVICE,
      parameters: Type.Object(NamespaceParams),
      async run(params) {
        const manager = await state.eventHubs(params.subscriptionId);
        const eventHubs = await manager.listEventHubs(params.resourceGroup, params.namespaceName);
        return { eventHubs, count: eventHubs.length };
      },
    }),

    defineTool({
      name: "azure_get_event_hub",
      label: "Get Event Hub",
      description: "Partitions, retention and status of an event hub.",
      service: SERVICE,
      parameters: Type.Object(HubParams),
      async run(params) {
        const manager = await state.eventHubs(params.subscriptionId);
        return { eventHub: await manager.getEventHub(params.resourceGroup, params.namespaceName, params.eventHubName) };
      },
    }),

    defineTool({
      name: "azure_create_event_hub",
      label: "Create Event Hub",
      description: "Create or update an event hub. Partition count cannot be lowered later.",
      service: SERVICE,
      parameters: Type.Object({
        ...HubParams,
        partitionCount: Type.Integer({ minimum: 1, maximum: 32, default: 4 }),
        retentionDays: Type.Integer({ minimum: 1, maximum: 90, default: 1 }),
      }),
      async run(params) {
        const manager = await state.eventHubs(params.subscriptionId);
        const eventHub = await manager.createEventHub(params.resourceGroup, params.namespaceName, params.eventHubName, {
          partitionCount: params.partitionCount,
          retentionDays: params.retentionDays,
        });
        return { eventHub, message: `Event hub ${params.eventHubName} saved` };
      },
    }),

    defineTool({
      name: "azure_delete_event_hub",
      label: "Delete Event Hub",
      description: "Delete an event hub and its data.",
      service: SERVICE,
      parameters: Type.Object(HubParams),
      async run(params) {
        const manager = await state.eventHubs(params.subscriptionId);
        await manager.deleteEventHub(params.resourceGroup, params.namespaceName, params.eventHubName);
        return { eventHubName: params.eventHubName, message: `Event hub ${params.eventHubName} deleted` };
      },
    }),

    defineTool({
      name: "azure_list_consumer_groups",
      label: "List Consumer Groups",
      description: "Consumer groups of an event hub.",
      service: SERVICE,
      parameters: Type.Object(HubParams),
      async run(params) {
        const manager = await state.eventHubs(params.subscriptionId);
        const consumerGroups = await manager.listConsumerGroups(params.resourceGroup, params.namespaceName, params.eventHubName);
        return { consumerGroups, count: consumerGroups.length };
      },
    }),

    defineTool({
      name: "azure_create_consumer_group",
      label: "Create Consumer Group",
      description: "Create or update a consumer group.",
      service: SERVICE,
      parameters: Type.Object({ ...GroupParams, userMetadata: Type.Optional(Type.String()) }),
      async run(params) {
        const manager = await state.eventHubs(params.subscriptionId);
        const consumerGroup = await manager.createConsumerGroup(
          params.resourceGroup,
          params.namespaceName,
          params.eventHubName,
          params.consumerGroupName,
          optional(params.userMetadata),
        );
        return { consumerGroup, message: `Consumer group ${params.consumerGroupName} saved` };
      },
    }),

    defineTool({
      name: "azure_delete_consumer_group",
      label: "Delete Consumer Group",
      description: "Delete a consumer group and its checkpoints.",
      service: SERVICE,
      parameters: Type.Object(GroupParams),
      async run(params) {
        const manager = await state.eventHubs(params.subscriptionId);
        await manager.deleteConsumerGroup(params.resourceGroup, params.namespaceName, params.eventHubName, params.consumerGroupName);
        return { consumerGroupName: params.consumerGroupName, message: `Consumer group ${params.consumerGroupName} deleted` };
      },
    }),

    defineTool({
      name: "azure_send_events",
      label: "Send Events",
      description: "Send events in batches. Pass events as a JSON array, or a single body.",
      service: SERVICE,
      parameters: Type.Object({
        ...DataPlane,
        events: Type.Optional(Type.Union([Type.String(), Type.Array(Type.Unknown())], { description: "JSON array of event bodies" })),
        body: Type.Optional(Type.String({ description: "Body of a single event" })),
        partitionKey: Type.Optional(Type.String()),
        partitionId: Type.Optional(Type.String()),
        properties: Type.Optional(JsonObject("Properties added to every event")),
      }),
      async run(params) {
        let bodies: unknown[];
        if (params.events !== undefined) bodies = parseJsonArray(params.events, "events");
        else if (params.body !== undefined) bodies = [params.body];
        else throw new ToolInputError("events or body is required", { field: "events" });

        const result = await state.eventHubsProducer().sendEvents(params.namespace, params.eventHub, bodies, {
          partitionKey: optional(params.partitionKey),
          partitionId: optional(params.partitionId),
          properties: parseScalarMap(params.properties, "properties"),
        });
        return { ...result, eventHub: params.eventHub };
      },
    }),

    defineTool({
      name: "azure_get_event_hub_properties",
      label: "Get Event Hub Properties",
      description: "Runtime properties of an event hub, including its partition ids.",
      service: SERVICE,
      parameters: Type.Object(DataPlane),
      async run(params) {
        return { properties: await state.eventHubsProducer().getEventHubProperties(params.namespace, params.eventHub) };
      },
    }),

    defineTool({
      name: "azure_get_partition_properties",
      label: "Get Partition Properties",
      description: "Sequence numbers and last enqueued time of one partition.",
      service: SERVICE,
      parameters: Type.Object({ ...DataPlane, partitionId: Name("Partition id") }),
      async run(params) {
        return {
          partition: await state.eventHubsProducer().getPartitionProperties(params.namespace, params.eventHub, params.partitionId),
        };
      },
    }),
  ];
}
