/**
 * Container Instances, Container Registry and AKS tools.
 */

import { Type } from "@sinclair/typebox";
import { ToolInputError, defineTool, type ToolDefinition } from "../../../../src/index.js";
import { Name, OptionalResourceGroup, ResourceGroup, SubscriptionId, optional } from "../params.js";
import type { AzureServerState } from "../state.js";

const SERVICE = "containers";

const GroupParams = { resourceGroup: ResourceGroup, name: Name("Container group name"), subscriptionId: SubscriptionId };
const RegistryParams = { resourceGroup: ResourceGroup, name: Name("Registry name"), subscriptionId: SubscriptionId };
const ClusterParams = { resourceGroup: ResourceGroup, name: Name("AKS cluster name"), subscriptionId: SubscriptionId };
const ListParams = { resourceGroup: OptionalResourceGroup, subscriptionId: SubscriptionId };
const RepositoryParams = {
  registry: Name("Registry name or login server, e.g. myregistry or myregistry.azurecr.io"),
  repository: Name("Repository name, e.g. web/api"),
};
const ImageParams = { ...RepositoryParams, reference: Name("Tag or sha256 digest") };
const NodePoolParams = { ...ClusterParams, nodePool: Name("Node pool name") };
const PoolMode = Type.Union([Type.Literal("System"), Type.Literal("User")]);
const AutoscaleParams = {
  enableAutoScaling: Type.Optional(Type.Boolean()),
  minCount: Type.Optional(Type.Integer({ minimum: 0, maximum: 1000 })),
  maxCount: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000 })),
};

function requireConfirm(confirm: boolean, what: string): void {
  if (!confirm) {
    throw new ToolInputError(`Deleting ${what} cannot be undone; pass confirm: true`, {
      field: "confirm",
      code: "CONFIRMATION_REQUIRED",
    });
  }
}

type GroupAction = "start" | "stop" | "restart" | "delete";

export function createContainerTools(state: AzureServerState): ToolDefinition[] {
  const groupAction = (action: GroupAction, label: string, description: string) =>
    defineTool({
      name: `azure_${action}_container_group`,
      label,
      description,
      service: SERVICE,
      parameters: Type.Object(GroupParams),
      async run(params) {
        const manager = await state.containers(params.subscriptionId);
        const { resourceGroup, name } = params;
        if (action === "start") await manager.startContainerGroup(resourceGroup, name);
        else if (action === "stop") await manager.stopContainerGroup(resourceGroup, name);
        else if (action === "restart") await manager.restartContainerGroup(resourceGroup, name);
        else await manager.deleteContainerGroup(resourceGroup, name);
        return { name, action, message: `Container group ${name}: ${action} completed` };
      },
    });

  return [
    defineTool({
      name: "azure_list_container_groups",
      label: "List Container Groups",
      description: "Azure Container Instances groups with their containers.",
      service: SERVICE,
      parameters: Type.Object(ListParams),
      async run(params) {
        const containerGroups = await (await state.containers(params.subscriptionId)).listContainerGroups(
          optional(params.resourceGroup),
        );
        return { containerGroups, count: containerGroups.length };
      },
    }),

    defineTool({
      name: "azure_get_container_group",
      label: "Get Container Group",
      description: "State, IP address and containers of a container group.",
      service: SERVICE,
      parameters: Type.Object(GroupParams),
      async run(params) {
        return {
          containerGroup: await (await state.containers(params.subscriptionId)).getContainerGroup(params.resourceGroup, params.name),
        };
      },
    }),

    groupAction("start", "Start Container Group", "Start all containers of a group."),
    groupAction("stop", "Stop Container Group", "Stop all containers of a group."),
    groupAction("restart", "Restart Container Group", "Restart all containers of a group in place."),
    groupAction("delete", "Delete Container Group", "Delete a container group."),

    defineTool({
      name: "azure_get_container_logs",
      label: "Get Container Logs",
      description: "Last log lines of a container (the group's first container when none is named).",
      service: SERVICE,
      parameters: Type.Object({
        ...GroupParams,
        containerName: Type.Optional(Type.String()),
        tail: Type.Integer({ minimum: 1, maximum: 10_000, default: 100 }),
      }),
      async run(params) {
        const logs = await (await state.containers(params.subscriptionId)).getContainerLogs(
          params.resourceGroup,
          params.name,
          optional(params.containerName),
          params.tail,
        );
        return { containerGroup: params.name, containerName: logs.containerName, lines: logs.lines, lineCount: logs.lines.length };
      },
    }),

    defineTool({
      name: "azure_list_container_registries",
      label: "List Container Registries",
      description: "Azure Container Registry instances.",
      service: SERVICE,
      parameters: Type.Object(ListParams),
      async run(params) {
        const registries = await (await state.containers(params.subscriptionId)).listRegistries(optional(params.resourceGroup));
        return { registries, count: registries.length };
      },
    }),

    defineTool({
      name: "azure_get_container_registry",
      label: "Get Container Registry",
      description: "Login server, SKU and admin user setting of a registry.",
      service: SERVICE,
      parameters: Type.Object(RegistryParams),
      async run(params) {
        return { registry: await (await state.containers(params.subscriptionId)).getRegistry(params.resourceGroup, params.name) };
      },
    }),

    defineTool({
      name: "azure_get_registry_credentials",
      label: "Get Registry Credentials",
      description: "Admin user name and passwords of a registry. Passwords are masked unless reveal is true.",
      service: SERVICE,
      parameters: Type.Object({ ...RegistryParams, reveal: Type.Boolean({ default: false }) }),
      async run(params) {
        const credentials = await (await state.containers(params.subscriptionId)).getRegistryCredentials(
          params.resourceGroup,
          params.name,
          params.reveal,
        );
        return { registry: params.name, ...credentials };
      },
    }),

    defineTool({
      name: "azure_list_registry_repositories",
      label: "List Registry Repositories",
      description: "Repository names in a container registry.",
      service: SERVICE,
      parameters: Type.Object({ registry: RepositoryParams.registry }),
      async run(params) {
        const repositories = await state.registryContent().listRepositories(params.registry);
        return { registry: params.registry, repositories, count: repositories.length };
      },
    }),

    defineTool({
      name: "azure_get_registry_repository",
      label: "Get Registry Repository",
      description: "Manifest and tag counts of a repository.",
      service: SERVICE,
      parameters: Type.Object(RepositoryParams),
      async run(params) {
        return { repository: await state.registryContent().getRepository(params.registry, params.repository) };
      },
    }),

    defineTool({
      name: "azure_list_registry_images",
      label: "List Registry Images",
      description: "Image manifests of a repository with their tags, newest first.",
      service: SERVICE,
      parameters: Type.Object({ ...RepositoryParams, limit: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }) }),
      async run(params) {
        const result = await state.registryContent().listImages(params.registry, params.repository, params.limit);
        return { repository: params.repository, images: result.items, count: result.items.length, hasMore: result.hasMore };
      },
    }),

    defineTool({
      name: "azure_get_registry_image",
      label: "Get Registry Image",
      description: "Digest, tags, size and platform of an image.",
      service: SERVICE,
      parameters: Type.Object(ImageParams),
      async run(params) {
        return { image: await state.registryContent().getImage(params.registry, params.repository, params.reference) };
      },
    }),

    defineTool({
      name: "azure_delete_registry_image",
      label: "Delete Registry Image",
      description: "Delete an image manifest and all of its tags. Requires confirm: true.",
      service: SERVICE,
      parameters: Type.Object({ ...ImageParams, confirm: Type.Boolean({ default: false }) }),
      async run(params) {
        requireConfirm(params.confirm, `${params.repository}:${params.reference}`);
        await state.registryContent().deleteImage(params.registry, params.repository, params.reference);
        return { repository: params.repository, reference: params.reference, message: `Image ${params.repository}:${params.reference} deleted` };
      },
    }),

    defineTool({
      name: "azure_delete_registry_repository",
      label: "Delete Registry Repository",
      description: "Delete a repository with every image in it. Requires confirm: true.",
      service: SERVICE,
      parameters: Type.Object({ ...RepositoryParams, confirm: Type.Boolean({ default: false }) }),
      async run(params) {
        requireConfirm(params.confirm, `repository ${params.repository}`);
        await state.registryContent().deleteRepository(params.registry, params.repository);
        return { repository: params.repository, message: `Repository ${params.repository} deleted` };
      },
    }),

    defineTool({
      name: "azure_list_aks_clusters",
      label: "List AKS Clusters",
      description: "AKS clusters with version, power state and node pools.",
      service: SERVICE,
      parameters: Type.Object(ListParams),
      async run(params) {
        const clusters = await (await state.containers(params.subscriptionId)).listClusters(optional(params.resourceGroup));
        return { clusters, count: clusters.length };
      },
    }),

    defineTool({
      name: "azure_get_aks_cluster",
      label: "Get AKS Cluster",
      description: "Details of an AKS cluster.",
      service: SERVICE,
      parameters: Type.Object(ClusterParams),
      async run(params) {
        return { cluster: await (await state.containers(params.subscriptionId)).getCluster(params.resourceGroup, params.name) };
      },
    }),

    defineTool({
      name: "azure_list_node_pools",
      label: "List AKS Node Pools",
      description: "Node pools of an AKS cluster.",
      service: SERVICE,
      parameters: Type.Object(ClusterParams),
      async run(params) {
        const nodePools = await (await state.containers(params.subscriptionId)).listNodePools(params.resourceGroup, params.name);
        return { cluster: params.name, nodePools, count: nodePools.length };
      },
    }),

    defineTool({
      name: "azure_get_node_pool",
      label: "Get AKS Node Pool",
      description: "Size, mode, version and autoscaler settings of a node pool.",
      service: SERVICE,
      parameters: Type.Object(NodePoolParams),
      async run(params) {
        const manager = await state.containers(params.subscriptionId);
        return { cluster: params.name, nodePool: await manager.getNodePool(params.resourceGroup, params.name, params.nodePool) };
      },
    }),

    defineTool({
      name: "azure_create_node_pool",
      label: "Create AKS Node Pool",
      description: "Add a node pool to a cluster. Waits for completion.",
      service: SERVICE,
      parameters: Type.Object({
        ...NodePoolParams,
        vmSize: Type.String({ minLength: 1, default: "Standard_D2s_v5" }),
        count: Type.Integer({ minimum: 0, maximum: 1000, default: 1 }),
        mode: Type.Optional(PoolMode),
        osType: Type.Optional(Type.Union([Type.Literal("Linux"), Type.Literal("Windows")])),
        orchestratorVersion: Type.Optional(Type.String()),
        ...AutoscaleParams,
      }),
      async run(params) {
        const nodePool = await (await state.containers(params.subscriptionId)).createNodePool(
          params.resourceGroup,
          params.name,
          params.nodePool,
          {
            vmSize: params.vmSize,
            count: params.count,
            mode: params.mode,
            osType: params.osType,
            orchestratorVersion: optional(params.orchestratorVersion),
            enableAutoScaling: params.enableAutoScaling,
            minCount: params.minCount,
            maxCount: params.maxCount,
          },
        );
        return { cluster: params.name, nodePool, message: `Node pool ${params.nodePool} created` };
      },
    }),

    defineTool({
      name: "azure_update_node_pool",
      label: "Update AKS Node Pool",
      description: "Change autoscaler limits, mode, count or Kubernetes version of a node pool.",
      service: SERVICE,
      parameters: Type.Object({
        ...NodePoolParams,
        count: Type.Optional(Type.Integer({ minimum: 0, maximum: 1000 })),
        mode: Type.Optional(PoolMode),
        orchestratorVersion: Type.Optional(Type.String()),
        ...AutoscaleParams,
      }),
      async run(params) {
        const nodePool = await (await state.containers(params.subscriptionId)).updateNodePool(
          params.resourceGroup,
          params.name,
          params.nodePool,
          {
            count: params.count,
            mode: params.mode,
            orchestratorVersion: optional(params.orchestratorVersion),
            enableAutoScaling: params.enableAutoScaling,
            minCount: params.minCount,
            maxCount: params.maxCount,
          },
        );
        return { cluster: params.name, nodePool, message: `Node pool ${params.nodePool} updated` };
      },
    }),

    defineTool({
      name: "azure_delete_node_pool",
      label: "Delete AKS Node Pool",
      description: "Remove a node pool from a cluster. Requires confirm: true.",
      service: SERVICE,
      parameters: Type.Object({ ...NodePoolParams, confirm: Type.Boolean({ default: false }) }),
      async run(params) {
        requireConfirm(params.confirm, `node pool ${params.nodePool}`);
        await (await state.containers(params.subscriptionId)).deleteNodePool(params.resourceGroup, params.name, params.nodePool);
        return { cluster: params.name, nodePool: params.nodePool, message: `Node pool ${params.nodePool} deleted` };
      },
    }),

    defineTool({
      name: "azure_get_aks_credentials",
      label: "Get AKS Credentials",
      description: "User kubeconfig of a cluster. The YAML is returned only when reveal is true.",
      service: SERVICE,
      parameters: Type.Object({ ...ClusterParams, reveal: Type.Boolean({ default: false }) }),
      async run(params) {
        const kubeconfigs = await (await state.containers(params.subscriptionId)).getKubeConfigs(
          params.resourceGroup,
          params.name,
          params.reveal,
        );
        return { cluster: params.name, kubeconfigs, masked: !params.reveal };
      },
    }),

    defineTool({
      name: "azure_scale_node_pool",
      label: "Scale AKS Node Pool",
      description: "Set the node count of a manually scaled node pool.",
      service: SERVICE,
      parameters: Type.Object({
        ...ClusterParams,
        nodePool: Name("Node pool name"),
        count: Type.Integer({ minimum: 0, maximum: 1000 }),
      }),
      async run(params) {
        const nodePool = await (await state.containers(params.subscriptionId)).scaleNodePool(
          params.resourceGroup,
          params.name,
          params.nodePool,
          params.count,
        );
        return { cluster: params.name, nodePool, message: `Node pool ${params.nodePool} scaled to ${params.count}` };
      },
    }),

    defineTool({
      name: "azure_start_aks_cluster",
      label: "Start AKS Cluster",
      description: "Start a stopped AKS cluster. Waits for completion.",
      service: SERVICE,
      parameters: Type.Object(ClusterParams),
      async run(params) {
        await (await state.containers(params.subscriptionId)).startCluster(params.resourceGroup, params.name);
        return { cluster: params.name, message: `AKS cluster ${params.name} started` };
      },
    }),

    defineTool({
      name: "azure_stop_aks_cluster",
      label: "Stop AKS Cluster",
      description: "Stop an AKS cluster. Waits for completion.",
      service: SERVICE,
      parameters: Type.Object(ClusterParams),
      async run(params) {
        await (await state.containers(params.subscriptionId)).stopCluster(params.resourceGroup, params.name);
        return { cluster: params.name, message: `AKS cluster ${params.name} stopped` };
      },
    }),
  ];
}
