/**
 * Azure Containers Manager
 *
 * Container Instances (@azure/arm-containerinstance), Container Registry
 * (@azure/arm-containerregistry) and AKS (@azure/arm-containerservice).
 */

import type { ContainerGroup as SdkContainerGroup } from "@azure/arm-containerinstance";
import type { Registry } from "@azure/arm-containerregistry";
import type { AgentPool, ManagedCluster, ManagedClusterAgentPoolProfile } from "@azure/arm-containerservice";
import { NotFoundError, ToolInputError, maskSecret } from "../../../../src/index.js";
import { collectAll } from "../pagination.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { iso, resourceGroupFromId, type AzureCredentialProvider, type AzureRetryOptions } from "../types.js";
import type {
  AksCluster,
  AksNodePool,
  ContainerGroup,
  ContainerRegistry,
  KubeConfig,
  NodePoolSettings,
  RegistryCredentials,
} from "./types.js";

const NODE_POOL_NAME = /^[a-z][a-z0-9]{0,11}$/;

function validateNodePoolSettings(
  settings: Pick<NodePoolSettings, "count" | "enableAutoScaling" | "minCount" | "maxCount">,
): void {
  const { count, minCount, maxCount } = settings;
  if (count !== undefined && (!Number.isInteger(count) || count < 0 || count > 1000)) {
    throw new ToolInputError("count must be an integer between 0 and 1000", { field: "count" });
  }
  if (settings.enableAutoScaling) {
    if (minCount === undefined || maxCount === undefined) {
      throw new ToolInputError("Autoscaling needs minCount and maxCount", { field: minCount === undefined ? "minCount" : "maxCount" });
    }
    if (minCount > maxCount) {
      throw new ToolInputError(`minCount (${minCount}) is greater than maxCount (${maxCount})`, { field: "minCount" });
    }
  }
}

function mapContainerGroup(group: SdkContainerGroup): ContainerGroup {
  return {
    id: group.id ?? "",
    name: group.name ?? "",
    resourceGroup: resourceGroupFromId(group.id),
    location: group.location,
    osType: group.osType,
    state: group.instanceView?.state,
    provisioningState: group.provisioningState,
    restartPolicy: group.restartPolicy,
    ipAddress: group.ipAddress?.ip,
    fqdn: group.ipAddress?.fqdn,
    ports: group.ipAddress?.ports.map((p) => p.port),
    containers: group.containers.map((c) => ({
      name: c.name,
      image: c.image,
      cpu: c.resources.requests.cpu,
      memoryInGB: c.resources.requests.memoryInGB,
      state: c.instanceView?.currentState?.state,
      restartCount: c.instanceView?.restartCount,
    })),
  };
}

function mapRegistry(registry: Registry): ContainerRegistry {
  return {
    id: registry.id ?? "",
    name: registry.name ?? "",
    resourceGroup: resourceGroupFromId(registry.id),
    location: registry.location,
    loginServer: registry.loginServer,
    sku: registry.sku.name,
    adminUserEnabled: registry.adminUserEnabled,
    provisioningState: registry.provisioningState,
    createdAt: iso(registry.creationDate),
  };
}

function mapPool(pool: AgentPool | ManagedClusterAgentPoolProfile): AksNodePool {
  return {
    name: pool.name ?? "",
    count: pool.count,
    vmSize: pool.vmSize,
    mode: pool.mode,
    osType: pool.osType,
    orchestratorVersion: pool.orchestratorVersion,
    provisioningState: pool.provisioningState,
    powerState: pool.powerState?.code,
    enableAutoScaling: pool.enableAutoScaling,
    minCount: pool.minCount,
    maxCount: pool.maxCount,
  };
}

function mapCluster(cluster: ManagedCluster): AksCluster {
  return {
    id: cluster.id ?? "",
    name: cluster.name ?? "",
    resourceGroup: resourceGroupFromId(cluster.id),
    location: cluster.location,
    kubernetesVersion: cluster.kubernetesVersion,
    dnsPrefix: cluster.dnsPrefix,
    fqdn: cluster.fqdn,
    provisioningState: cluster.provisioningState,
    powerState: cluster.powerState?.code,
    nodeResourceGroup: cluster.nodeResourceGroup,
    nodePools: (cluster.agentPoolProfiles ?? []).map(mapPool),
  };
}

export class AzureContainerManager {
  private credentials: AzureCredentialProvider;
  private subscriptionId: string;
  private retryOptions?: AzureRetryOptions;

  constructor(credentials: AzureCredentialProvider, subscriptionId: string, retryOptions?: AzureRetryOptions) {
    this.credentials = credentials;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions;
  }

  private async getInstanceClient() {
    const { ContainerInstanceManagementClient } = await import("@azure/arm-containerinstance");
    const { credential } = await this.credentials.getCredential();
    return new ContainerInstanceManagementClient(credential, this.subscriptionId);
  }

  private async getRegistryClient() {
    const { ContainerRegistryManagementClient } = await import("@azure/arm-containerregistry");
    const { credential } = await this.credentials.getCredential();
    return new ContainerRegistryManagementClient(credential, this.subscriptionId);
  }

  private async getAksClient() {
    const { ContainerServiceClient } = await import("@azure/arm-containerservice");
    const { credential } = await this.credentials.getCredential();
    return new ContainerServiceClient(credential, this.subscriptionId);
  }

  // ===========================================================================
  // Container Instances
  // ===========================================================================

  async listContainerGroups(resourceGroup?: string): Promise<ContainerGroup[]> {
    const client = await this.getInstanceClient();
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup ? client.containerGroups.listByResourceGroup(resourceGroup) : client.containerGroups.list(),
          mapContainerGroup,
        ),
      this.retryOptions,
    );
  }

  async getContainerGroup(resourceGroup: string, name: string): Promise<ContainerGroup> {
    const client = await this.getInstanceClient();
    const group = await getOrNull(() => client.containerGroups.get(resourceGroup, name), this.retryOptions);
    if (!group) throw new NotFoundError("Container group", name);
    return mapContainerGroup(group);
  }

  async startContainerGroup(resourceGroup: string, name: string): Promise<void> {
    const client = await this.getInstanceClient();
    await withAzureRetry(() => client.containerGroups.beginStartAndWait(resourceGroup, name), this.retryOptions);
  }

  async stopContainerGroup(resourceGroup: string, name: string): Promise<void> {
    const client = await this.getInstanceClient();
    await withAzureRetry(() => client.containerGroups.stop(resourceGroup, name), this.retryOptions);
  }

  async restartContainerGroup(resourceGroup: string, name: string): Promise<void> {
    const client = await this.getInstanceClient();
    await withAzureRetry(() => client.containerGroups.beginRestartAndWait(resourceGroup, name), this.retryOptions);
  }

  async deleteContainerGroup(resourceGroup: string, name: string): Promise<void> {
    const client = await this.getInstanceClient();
    await withAzureRetry(() => client.containerGroups.beginDeleteAndWait(resourceGroup, name), this.retryOptions);
  }

  /**
   * Last `tail` log lines of a container; the first container when none is named.
   */
  async getContainerLogs(
    resourceGroup: string,
    groupName: string,
    containerName?: string,
    tail = 100,
  ): Promise<{ containerName: string; lines: string[]; content: string }> {
    const name = containerName ?? (await this.getContainerGroup(resourceGroup, groupName)).containers[0]?.name;
    if (!name) throw new NotFoundError("Container", `${groupName}/<first>`, `Container group '${groupName}' has no containers`);
    const client = await this.getInstanceClient();
    const logs = await withAzureRetry(
      () => client.containers.listLogs(resourceGroup, groupName, name, { tail }),
      this.retryOptions,
    );
    const content = logs.content ?? "";
    return { containerName: name, lines: content.split(/\r?\n/).filter((line) => line.length > 0), content };
  }

  // ===========================================================================
  // Container Registry
  // ===========================================================================

  async listRegistries(resourceGroup?: string): Promise<ContainerRegistry[]> {
    const client = await this.getRegistryClient();
    return withAzureRetry(
      () =>
        collectAll(resourceGroup ? client.registries.listByResourceGroup(resourceGroup) : client.registries.list(), mapRegistry),
      this.retryOptions,
    );
  }

  async getRegistry(resourceGroup: string, name: string): Promise<ContainerRegistry> {
    const client = await this.getRegistryClient();
    const registry = await getOrNull(() => client.registries.get(resourceGroup, name), this.retryOptions);
    if (!registry) throw new NotFoundError("Container registry", name);
    return mapRegistry(registry);
  }

  /**
   * Admin credentials; passwords are masked unless `reveal` is set.
   */
  async getRegistryCredentials(resourceGroup: string, name: string, reveal = false): Promise<RegistryCredentials> {
    const client = await this.getRegistryClient();
    const result = await withAzureRetry(() => client.registries.listCredentials(resourceGroup, name), this.retryOptions);
    return {
      username: result.username,
      passwords: (result.passwords ?? []).map((p) => ({ name: p.name, value: reveal ? p.value : maskSecret(p.value) })),
      masked: !reveal,
    };
  }

  // ===========================================================================
  // AKS
  // ===========================================================================

  async listClusters(resourceGroup?: string): Promise<AksCluster[]> {
    const client = await this.getAksClient();
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup ? client.managedClusters.listByResourceGroup(resourceGroup) : client.managedClusters.list(),
          mapCluster,
        ),
      this.retryOptions,
    );
  }

  async getCluster(resourceGroup: string, name: string): Promise<AksCluster> {
    const client = await this.getAksClient();
    const cluster = await getOrNull(() => client.managedClusters.get(resourceGroup, name), this.retryOptions);
    if (!cluster) throw new NotFoundError("AKS cluster", name);
    return mapCluster(cluster);
  }

  async listNodePools(resourceGroup: string, clusterName: string): Promise<AksNodePool[]> {
    const client = await this.getAksClient();
    return withAzureRetry(() => collectAll(client.agentPools.list(resourceGroup, clusterName), mapPool), this.retryOptions);
  }

  async getNodePool(resourceGroup: string, clusterName: string, poolName: string): Promise<AksNodePool> {
    const client = await this.getAksClient();
    const pool = await getOrNull(() => client.agentPools.get(resourceGroup, clusterName, poolName), this.retryOptions);
    if (!pool) throw new NotFoundError("Node pool", poolName);
    return mapPool(pool);
  }

  async createNodePool(
    resourceGroup: string,
    clusterName: string,
    poolName: string,
    settings: NodePoolSettings,
  ): Promise<AksNodePool> {
    if (!NODE_POOL_NAME.test(poolName)) {
      throw new ToolInputError("Node pool names are 1-12 lowercase letters and digits, starting with a letter", {
        field: "nodePool",
      });
    }
    validateNodePoolSettings(settings);
    const client = await this.getAksClient();
    const created = await withAzureRetry(
      () =>
        client.agentPools.beginCreateOrUpdateAndWait(resourceGroup, clusterName, poolName, {
          vmSize: settings.vmSize,
          count: settings.count ?? 1,
          mode: settings.mode ?? "User",
          osType: settings.osType ?? "Linux",
          enableAutoScaling: settings.enableAutoScaling,
          minCount: settings.minCount,
          maxCount: settings.maxCount,
          orchestratorVersion: settings.orchestratorVersion,
        }),
      this.retryOptions,
    );
    return mapPool(created);
  }

  /** Change autoscaling, mode or version of an existing pool; unset fields keep their value. */
  async updateNodePool(
    resourceGroup: string,
    clusterName: string,
    poolName: string,
    changes: Omit<NodePoolSettings, "vmSize" | "osType">,
  ): Promise<AksNodePool> {
    const client = await this.getAksClient();
    const pool = await getOrNull(() => client.agentPools.get(resourceGroup, clusterName, poolName), this.retryOptions);
    if (!pool) throw new NotFoundError("Node pool", poolName);

    const enableAutoScaling = changes.enableAutoScaling ?? pool.enableAutoScaling ?? false;
    const merged = {
      ...pool,
      mode: changes.mode ?? pool.mode,
      orchestratorVersion: changes.orchestratorVersion ?? pool.orchestratorVersion,
      enableAutoScaling,
      minCount: enableAutoScaling ? (changes.minCount ?? pool.minCount) : undefined,
      maxCount: enableAutoScaling ? (changes.maxCount ?? pool.maxCount) : undefined,
      count: changes.count ?? pool.count,
    };
    validateNodePoolSettings(merged);
    const updated = await withAzureRetry(
      () => client.agentPools.beginCreateOrUpdateAndWait(resourceGroup, clusterName, poolName, merged),
      this.retryOptions,
    );
    return mapPool(updated);
  }

  async deleteNodePool(resourceGroup: string, clusterName: string, poolName: string): Promise<void> {
    const client = await this.getAksClient();
    await withAzureRetry(() => client.agentPools.beginDeleteAndWait(resourceGroup, clusterName, poolName), this.retryOptions);
  }

  /**
   * User kubeconfig files of a cluster. The YAML is returned only when
   * `reveal` is set, since it can embed tokens.
   */
  async getKubeConfigs(resourceGroup: string, clusterName: string, reveal = false): Promise<KubeConfig[]> {
    const client = await this.getAksClient();
    const result = await withAzureRetry(
      () => client.managedClusters.listClusterUserCredentials(resourceGroup, clusterName),
      this.retryOptions,
    );
    return (result.kubeconfigs ?? []).map((k) => {
      const value = k.value ? Buffer.from(k.value).toString("utf8") : "";
      return { name: k.name, value: reveal ? value : undefined, sizeInBytes: k.value?.byteLength ?? 0 };
    });
  }

  async scaleNodePool(resourceGroup: string, clusterName: string, poolName: string, count: number): Promise<AksNodePool> {
    if (!Number.isInteger(count) || count < 0 || count > 1000) {
      throw new ToolInputError("count must be an integer between 0 and 1000", { field: "count" });
    }
    const client = await this.getAksClient();
    const pool = await getOrNull(() => client.agentPools.get(resourceGroup, clusterName, poolName), this.retryOptions);
    if (!pool) throw new NotFoundError("Node pool", poolName);
    if (pool.enableAutoScaling) {
      throw new ToolInputError(`Node pool '${poolName}' uses the cluster autoscaler; change minCount/maxCount instead`, {
        field: "count",
      });
    }
    if (count === 0 && pool.mode === "System") {
      throw new ToolInputError("System node pools need at least one node", { field: "count" });
    }
    const updated = await withAzureRetry(
      () => client.agentPools.beginCreateOrUpdateAndWait(resourceGroup, clusterName, poolName, { ...pool, count }),
      this.retryOptions,
    );
    return mapPool(updated);
  }

  async startCluster(resourceGroup: string, name: string): Promise<void> {
    const client = await this.getAksClient();
    await withAzureRetry(() => client.managedClusters.beginStartAndWait(resourceGroup, name), this.retryOptions);
  }

  async stopCluster(resourceGroup: string, name: string): Promise<void> {
    const client = await this.getAksClient();
    await withAzureRetry(() => client.managedClusters.beginStopAndWait(resourceGroup, name), this.retryOptions);
  }
}
