/**
 * Azure Resource Manager
 *
 * Subscriptions, locations, resource groups and generic resources via
 * @azure/arm-subscriptions and @azure/arm-resources.
 */

import type { GenericResourceExpanded, ResourceGroup as SdkResourceGroup } from "@azure/arm-resources";
import { NotFoundError } from "../../../../src/index.js";
import { collectAll, collectPaged } from "../pagination.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { iso, resourceGroupFromId, type AzureCredentialProvider, type AzurePagedResult, type AzureRetryOptions } from "../types.js";
import type { AzureLocation, AzureSubscription, GenericResource, ResourceGroup, ResourceTypeCount } from "./types.js";

function mapResourceGroup(rg: SdkResourceGroup): ResourceGroup {
  return {
    id: rg.id ?? "",
    name: rg.name ?? "",
    location: rg.location,
    tags: rg.tags,
    provisioningState: rg.properties?.provisioningState,
    managedBy: rg.managedBy,
  };
}

function mapResource(r: GenericResourceExpanded): GenericResource {
  return {
    id: r.id ?? "",
    name: r.name ?? "",
    type: r.type ?? "",
    resourceGroup: resourceGroupFromId(r.id),
    location: r.location,
    kind: r.kind,
    sku: r.sku ? { name: r.sku.name, tier: r.sku.tier, capacity: r.sku.capacity } : undefined,
    tags: r.tags,
    provisioningState: r.provisioningState,
    createdTime: iso(r.createdTime),
    changedTime: iso(r.changedTime),
  };
}

export class AzureResourceManager {
  private credentials: AzureCredentialProvider;
  private subscriptionId: string;
  private retryOptions?: AzureRetryOptions;

  constructor(credentials: AzureCredentialProvider, subscriptionId: string, retryOptions?: AzureRetryOptions) {
    this.credentials = credentials;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions;
  }

  private async getClient() {
    const { ResourceManagementClient } = await import("@azure/arm-resources");
    const { credential } = await this.credentials.getCredential();
    return new ResourceManagementClient(credential, this.subscriptionId);
  }

  private async getSubscriptionClient() {
    const { SubscriptionClient } = await import("@azure/arm-subscriptions");
    const { credential } = await this.credentials.getCredential();
    return new SubscriptionClient(credential);
  }

  // ===========================================================================
  // Subscriptions
  // ===========================================================================

  async listSubscriptions(): Promise<AzureSubscription[]> {
    const client = await this.getSubscriptionClient();
    return withAzureRetry(
      () =>
        collectAll(client.subscriptions.list(), (s) => ({
          subscriptionId: s.subscriptionId ?? "",
          displayName: s.displayName,
          state: s.state,
          tenantId: s.tenantId,
        })),
      this.retryOptions,
    );
  }

  async getSubscription(subscriptionId = this.subscriptionId): Promise<AzureSubscription> {
    const client = await this.getSubscriptionClient();
    const s = await getOrNull(() => client.subscriptions.get(subscriptionId), this.retryOptions);
    if (!s) throw new NotFoundError("Subscription", subscriptionId);
    return { subscriptionId: s.subscriptionId ?? subscriptionId, displayName: s.displayName, state: s.state, tenantId: s.tenantId };
  }

  async listLocations(): Promise<AzureLocation[]> {
    const client = await this.getSubscriptionClient();
    const locations = await withAzureRetry(
      () =>
        collectAll(client.subscriptions.listLocations(this.subscriptionId), (l) => ({
          name: l.name ?? "",
          displayName: l.displayName,
          regionalDisplayName: l.regionalDisplayName,
          regionType: l.metadata?.regionType,
        })),
      this.retryOptions,
    );
    return locations.sort((a, b) => a.name.localeCompare(b.name));
  }

  // ===========================================================================
  // Resource groups
  // ===========================================================================

  async listResourceGroups(limit?: number): Promise<AzurePagedResult<ResourceGroup>> {
    const client = await this.getClient();
    return withAzureRetry(
      () => collectPaged(client.resourceGroups.list(), mapResourceGroup, undefined, { limit }),
      this.retryOptions,
    );
  }

  async getResourceGroup(name: string): Promise<ResourceGroup> {
    const client = await this.getClient();
    const rg = await getOrNull(() => client.resourceGroups.get(name), this.retryOptions);
    if (!rg) throw new NotFoundError("Resource group", name);
    return mapResourceGroup(rg);
  }

  async createResourceGroup(name: string, location: string, tags?: Record<string, string>): Promise<ResourceGroup> {
    const client = await this.getClient();
    const rg = await withAzureRetry(() => client.resourceGroups.createOrUpdate(name, { location, tags }), this.retryOptions);
    return mapResourceGroup(rg);
  }

  async deleteResourceGroup(name: string): Promise<void> {
    const client = await this.getClient();
    await withAzureRetry(() => client.resourceGroups.beginDeleteAndWait(name), this.retryOptions);
  }

  // ===========================================================================
  // Resources
  // ===========================================================================

  async listResources(
    options: { resourceGroup?: string; resourceType?: string; limit?: number } = {},
  ): Promise<AzurePagedResult<GenericResource>> {
    const client = await this.getClient();
    const filter = options.resourceType ? `resourceType eq '${options.resourceType.replace(/'/g, "''")}'` : undefined;
    return withAzureRetry(() => {
      const iter = options.resourceGroup
        ? client.resources.listByResourceGroup(options.resourceGroup, { filter })
        : client.resources.list({ filter });
      return collectPaged(iter, mapResource, undefined, { limit: options.limit });
    }, this.retryOptions);
  }

  /**
   * Resource counts per type, most common first.
   */
  async countResourcesByType(resourceGroup?: string): Promise<{ total: number; types: ResourceTypeCount[] }> {
    const { items } = await this.listResources({ resourceGroup });
    const counts = new Map<string, number>();
    for (const resource of items) {
      counts.set(resource.type, (counts.get(resource.type) ?? 0) + 1);
    }
    const types = [...counts.entries()]
      .map(([type, count]) => ({ type, count }))
      .sort((a, b) => b.count - a.count || a.type.localeCompare(b.type));
    return { total: items.length, types };
  }
}
