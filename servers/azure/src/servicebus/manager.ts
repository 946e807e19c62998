/**
 * Azure Service Bus Manager
 *
 * Namespaces, queues, topics and subscriptions via @azure/arm-servicebus.
 */

import type { SBNamespace, SBQueue, SBSubscription, SBTopic } from "@azure/arm-servicebus";
import { NotFoundError, ToolInputError } from "../../../../src/index.js";
import { collectAll } from "../pagination.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { iso, resourceGroupFromId, type AzureCredentialProvider, type AzureRetryOptions } from "../types.js";
import type {
  MessageCounts,
  QueueOptions,
  ServiceBusNamespaceInfo,
  ServiceBusQueueInfo,
  ServiceBusSubscriptionInfo,
  ServiceBusTopicInfo,
} from "./types.js";

const ISO_DURATION = /^P(?:\d+D)?(?:T(?:\d+H)?(?:\d+M)?(?:\d+(?:\.\d+)?S)?)?$/;

function validateQueueOptions(options: QueueOptions): void {
  if (options.lockDuration !== undefined && (!ISO_DURATION.test(options.lockDuration) || options.lockDuration === "P")) {
    throw new ToolInputError(`lockDuration must be an ISO 8601 duration such as PT1M: ${options.lockDuration}`, {
      field: "lockDuration",
    });
  }
}

function counts(entity: SBQueue | SBSubscription): MessageCounts {
  return {
    messageCount: entity.messageCount,
    activeMessageCount: entity.countDetails?.activeMessageCount,
    deadLetterMessageCount: entity.countDetails?.deadLetterMessageCount,
    scheduledMessageCount: entity.countDetails?.scheduledMessageCount,
  };
}

function mapNamespace(ns: SBNamespace): ServiceBusNamespaceInfo {
  return {
    id: ns.id ?? "",
    name: ns.name ?? "",
    resourceGroup: resourceGroupFromId(ns.id),
    location: ns.location,
    sku: ns.sku?.name,
    tier: ns.sku?.tier,
    endpoint: ns.serviceBusEndpoint,
    status: ns.status,
    provisioningState: ns.provisioningState,
    createdAt: iso(ns.createdAt),
  };
}

function mapQueue(namespaceName: string, q: SBQueue): ServiceBusQueueInfo {
  return {
    id: q.id ?? "",
    name: q.name ?? "",
    namespaceName,
    ...counts(q),
    status: q.status,
    sizeInBytes: q.sizeInBytes,
    maxSizeInMegabytes: q.maxSizeInMegabytes,
    lockDuration: q.lockDuration,
    maxDeliveryCount: q.maxDeliveryCount,
    requiresSession: q.requiresSession,
    requiresDuplicateDetection: q.requiresDuplicateDetection,
    deadLetteringOnMessageExpiration: q.deadLetteringOnMessageExpiration,
  };
}

function mapTopic(namespaceName: string, t: SBTopic): ServiceBusTopicInfo {
  return {
    id: t.id ?? "",
    name: t.name ?? "",
    namespaceName,
    status: t.status,
    subscriptionCount: t.subscriptionCount,
    sizeInBytes: t.sizeInBytes,
    maxSizeInMegabytes: t.maxSizeInMegabytes,
    enablePartitioning: t.enablePartitioning,
  };
}

function mapSubscription(topicName: string, s: SBSubscription): ServiceBusSubscriptionInfo {
  return {
    id: s.id ?? "",
    name: s.name ?? "",
    topicName,
    ...counts(s),
    status: s.status,
    lockDuration: s.lockDuration,
    maxDeliveryCount: s.maxDeliveryCount,
    requiresSession: s.requiresSession,
  };
}

export class AzureServiceBusManager {
  private credentials: AzureCredentialProvider;
  private subscriptionId: string;
  private retryOptions?: AzureRetryOptions;

  constructor(credentials: AzureCredentialProvider, subscriptionId: string, retryOptions?: AzureRetryOptions) {
    this.credentials = credentials;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions;
  }

  private async getClient() {
    const { ServiceBusManagementClient } = await import("@azure/arm-servicebus");
    const { credential } = await this.credentials.getCredential();
    return new ServiceBusManagementClient(credential, this.subscriptionId);
  }

  // ---------------------------------------------------------------------------
  // Namespaces
  // ---------------------------------------------------------------------------

  async listNamespaces(resourceGroup?: string): Promise<ServiceBusNamespaceInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () => collectAll(resourceGroup ? client.namespaces.listByResourceGroup(resourceGroup) : client.namespaces.list(), mapNamespace),
      this.retryOptions,
    );
  }

  async getNamespace(resourceGroup: string, namespaceName: string): Promise<ServiceBusNamespaceInfo> {
    const client = await this.getClient();
    const ns = await getOrNull(() => client.namespaces.get(resourceGroup, namespaceName), this.retryOptions);
    if (!ns) throw new NotFoundError("Service Bus namespace", namespaceName);
    return mapNamespace(ns);
  }

  // ---------------------------------------------------------------------------
  // Queues
  // ---------------------------------------------------------------------------

  async listQueues(resourceGroup: string, namespaceName: string): Promise<ServiceBusQueueInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () => collectAll(client.queues.listByNamespace(resourceGroup, namespaceName), (q) => mapQueue(namespaceName, q)),
      this.retryOptions,
    );
  }

  async getQueue(resourceGroup: string, namespaceName: string, queueName: string): Promise<ServiceBusQueueInfo> {
    const client = await this.getClient();
    const queue = await getOrNull(() => client.queues.get(resourceGroup, namespaceName, queueName), this.retryOptions);
    if (!queue) throw new NotFoundError("Queue", queueName);
    return mapQueue(namespaceName, queue);
  }

  async createQueue(
    resourceGroup: string,
    namespaceName: string,
    queueName: string,
    options: QueueOptions = {},
  ): Promise<ServiceBusQueueInfo> {
    validateQueueOptions(options);
    const client = await this.getClient();
    const queue = await withAzureRetry(
      () => client.queues.createOrUpdate(resourceGroup, namespaceName, queueName, options),
      this.retryOptions,
    );
    return mapQueue(namespaceName, queue);
  }

  async deleteQueue(resourceGroup: string, namespaceName: string, queueName: string): Promise<void> {
    const client = await this.getClient();
    await withAzureRetry(() => client.queues.delete(resourceGroup, namespaceName, queueName), this.retryOptions);
  }

  // ---------------------------------------------------------------------------
  // Topics and subscriptions
  // ---------------------------------------------------------------------------

  async listTopics(resourceGroup: string, namespaceName: string): Promise<ServiceBusTopicInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () => collectAll(client.topics.listByNamespace(resourceGroup, namespaceName), (t) => mapTopic(namespaceName, t)),
      this.retryOptions,
    );
  }

  async createTopic(
    resourceGroup: string,
    namespaceName: string,
    topicName: string,
    options: { maxSizeInMegabytes?: number } = {},
  ): Promise<ServiceBusTopicInfo> {
    const client = await this.getClient();
    const topic = await withAzureRetry(
      () => client.topics.createOrUpdate(resourceGroup, namespaceName, topicName, options),
      this.retryOptions,
    );
    return mapTopic(namespaceName, topic);
  }

  async deleteTopic(resourceGroup: string, namespaceName: string, topicName: string): Promise<void> {
    const client = await this.getClient();
    await withAzureRetry(() => client.topics.delete(resourceGroup, namespaceName, topicName), this.retryOptions);
  }

  async listSubscriptions(resourceGroup: string, namespaceName: string, topicName: string): Promise<ServiceBusSubscriptionInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () =>
        collectAll(client.subscriptions.listByTopic(resourceGroup, namespaceName, topicName), (s) =>
          mapSubscription(topicName, s),
        ),
      this.retryOptions,
    );
  }

  async createSubscription(
    resourceGroup: string,
    namespaceName: string,
    topicName: string,
    subscriptionName: string,
    options: Omit<QueueOptions, "maxSizeInMegabytes"> = {},
  ): Promise<ServiceBusSubscriptionInfo> {
    validateQueueOptions(options);
    const client = await this.getClient();
    const subscription = await withAzureRetry(
      () => client.subscriptions.createOrUpdate(resourceGroup, namespaceName, topicName, subscriptionName, options),
      this.retryOptions,
    );
    return mapSubscription(topicName, subscription);
  }
}
