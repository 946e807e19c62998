/**
 * Azure Event Hubs Manager
 *
 * Namespaces, event hubs and consumer groups via @azure/arm-eventhub.
 */

import type { ConsumerGroup, EHNamespace, Eventhub } from "@azure/arm-eventhub";
import { NotFoundError } from "../../../../src/index.js";
import { collectAll } from "../pagination.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { iso, resourceGroupFromId, type AzureCredentialProvider, type AzureRetryOptions } from "../types.js";
import type { ConsumerGroupInfo, EventHubInfo, EventHubsNamespaceInfo } from "./types.js";

function mapNamespace(ns: EHNamespace): EventHubsNamespaceInfo {
  return {
    id: ns.id ?? "",
    name: ns.name ?? "",
    resourceGroup: resourceGroupFromId(ns.id),
    location: ns.location,
    sku: ns.sku?.name,
    tier: ns.sku?.tier,
    capacity: ns.sku?.capacity,
    endpoint: ns.serviceBusEndpoint,
    status: ns.status,
    kafkaEnabled: ns.kafkaEnabled,
    autoInflate: ns.isAutoInflateEnabled,
    maximumThroughputUnits: ns.maximumThroughputUnits,
    createdAt: iso(ns.createdAt),
  };
}

function mapEventHub(namespaceName: string, eh: Eventhub): EventHubInfo {
  return {
    id: eh.id ?? "",
    name: eh.name ?? "",
    namespaceName,
    partitionCount: eh.partitionCount,
    partitionIds: eh.partitionIds ?? [],
    retentionDays: eh.messageRetentionInDays,
    status: eh.status,
    createdAt: iso(eh.createdAt),
    updatedAt: iso(eh.updatedAt),
  };
}

function mapConsumerGroup(eventHubName: string, cg: ConsumerGroup): ConsumerGroupInfo {
  return {
    id: cg.id ?? "",
    name: cg.name ?? "",
    eventHubName,
    userMetadata: cg.userMetadata,
    createdAt: iso(cg.createdAt),
    updatedAt: iso(cg.updatedAt),
  };
}

export class AzureEventHubsManager {
  private credentials: AzureCredentialProvider;
  private subscriptionId: string;
  private retryOptions?: AzureRetryOptions;

  constructor(credentials: AzureCredentialProvider, subscriptionId: string, retryOptions?: AzureRetryOptions) {
    this.credentials = credentials;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions;
  }

  private async getClient() {
    const { EventHubManagementClient } = await import("@azure/arm-eventhub");
    const { credential } = await this.credentials.getCredential();
    return new EventHubManagementClient(credential, this.subscriptionId);
  }

  async listNamespaces(resourceGroup?: string): Promise<EventHubsNamespaceInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () => collectAll(resourceGroup ? client.namespaces.listByResourceGroup(resourceGroup) : client.namespaces.list(), mapNamespace),
      this.retryOptions,
    );
  }

  async getNamespace(resourceGroup: string, namespaceName: string): Promise<EventHubsNamespaceInfo> {
    const client = await this.getClient();
    const ns = await getOrNull(() => client.namespaces.get(resourceGroup, namespaceName), this.retryOptions);
    if (!ns) throw new NotFoundError("Event Hubs namespace", namespaceName);
    return mapNamespace(ns);
  }

  async listEventHubs(resourceGroup: string, namespaceName: string): Promise<EventHubInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () => collectAll(client.eventHubs.listByNamespace(resourceGroup, namespaceName), (eh) => mapEventHub(namespaceName, eh)),
      this.retryOptions,
    );
  }

  async getEventHub(resourceGroup: string, namespaceName: string, eventHubName: string): Promise<EventHubInfo> {
    const client = await this.getClient();
    const eh = await getOrNull(() => client.eventHubs.get(resourceGroup, namespaceName, eventHubName), this.retryOptions);
    if (!eh) throw new NotFoundError("Event hub", eventHubName);
    return mapEventHub(namespaceName, eh);
  }

  async createEventHub(
    resourceGroup: string,
    namespaceName: string,
    eventHubName: string,
    options: { partitionCount?: number; retentionDays?: number } = {},
  ): Promise<EventHubInfo> {
    const client = await this.getClient();
    const eh = await withAzureRetry(
      () =>
        client.eventHubs.createOrUpdate(resourceGroup, namespaceName, eventHubName, {
          partitionCount: options.partitionCount,
          messageRetentionInDays: options.retentionDays,
        }),
      this.retryOptions,
    );
    return mapEventHub(namespaceName, eh);
  }

  async deleteEventHub(resourceGroup: string, namespaceName: string, eventHubName: string): Promise<void> {
    const client = await this.getClient();
    await withAzureRetry(() => client.eventHubs.delete(resourceGroup, namespaceName, eventHubName), this.retryOptions);
  }

  async listConsumerGroups(resourceGroup: string, namespaceName: string, eventHubName: string): Promise<ConsumerGroupInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () =>
        collectAll(client.consumerGroups.listByEventHub(resourceGroup, namespaceName, eventHubName), (cg) =>
          mapConsumerGroup(eventHubName, cg),
        ),
      this.retryOptions,
    );
  }

  async createConsumerGroup(
    resourceGroup: string,
    namespaceName: string,
    eventHubName: string,
    consumerGroupName: string,
    userMetadata?: string,
  ): Promise<ConsumerGroupInfo> {
    const client = await this.getClient();
    const cg = await withAzureRetry(
      () => client.consumerGroups.createOrUpdate(resourceGroup, namespaceName, eventHubName, consumerGroupName, { userMetadata }),
      this.retryOptions,
    );
    return mapConsumerGroup(eventHubName, cg);
  }

  async deleteConsumerGroup(
    resourceGroup: string,
    namespaceName: string,
    eventHubName: string,
    consumerGroupName: string,
  ): Promise<void> {
    const client = await this.getClient();
    await withAzureRetry(
      () => client.consumerGroups.delete(resourceGroup, namespaceName, eventHubName, consumerGroupName),
      this.retryOptions,
    );
  }
}
