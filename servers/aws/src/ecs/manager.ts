/**
 * ECS Manager
 *
 * Clusters, services, tasks, task definitions and container instances.
 */

import {
  DescribeClustersCommand,
  DescribeContainerInstancesCommand,
  DescribeServicesCommand,
  DescribeTaskDefinitionCommand,
  DescribeTasksCommand,
  ECSClient,
  ListClustersCommand,
  ListContainerInstancesCommand,
  ListServicesCommand,
  ListTaskDefinitionsCommand,
  ListTasksCommand,
  RunTaskCommand,
  StopTaskCommand,
  UpdateServiceCommand,
  type Cluster,
  type ContainerDefinition,
  type ContainerInstance,
  type Service,
  type Task,
  type TaskDefinition,
} from "@aws-sdk/client-ecs";
import { NotFoundError, ToolInputError } from "../../../../src/index.js";
import { withAwsRetry } from "../retry.js";
import type { AwsManagerOptions } from "../types.js";
import type {
  ContainerInstanceSummary,
  DesiredStatus,
  EcsClusterSummary,
  EcsServiceSummary,
  EcsTaskDefinitionSummary,
  EcsTaskSummary,
  RunTaskOptions,
  UpdateServiceOptions,
} from "./types.js";

const MAX_PAGES = 20;
const RECENT_EVENTS = 5;

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) chunks.push(items.slice(i, i + size));
  return chunks;
}

export class EcsManager {
  private readonly client: ECSClient;
  private readonly options: AwsManagerOptions;

  constructor(options: AwsManagerOptions) {
    this.options = options;
    this.client = new ECSClient({ region: options.region, credentials: options.credentials });
  }

  private send<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withAwsRetry(fn, { label, retry: this.options.retry });
  }

  destroy(): void {
    this.client.destroy();
  }

  /**
   * Follow nextToken through a List* call, collecting ARNs.
   */
  private async listArns(
    label: string,
    call: (nextToken: string | undefined) => Promise<{ arns?: string[]; nextToken?: string }>,
    limit: number,
  ): Promise<string[]> {
    const arns: string[] = [];
    let nextToken: string | undefined;
    for (let page = 0; page < MAX_PAGES && arns.length < limit; page += 1) {
      const response = await this.send(label, () => call(nextToken));
      arns.push(...(response.arns ?? []));
      nextToken = response.nextToken;
      if (!nextToken) break;
    }
    return arns.slice(0, limit);
  }

  // ===========================================================================
  // Clusters
  // ===========================================================================

  async listClusters(limit = 100): Promise<EcsClusterSummary[]> {
    const arns = await this.listArns(
      "ListClusters",
      async (nextToken) => {
        const r = await this.client.send(new ListClustersCommand({ nextToken }));
        return { arns: r.clusterArns, nextToken: r.nextToken };
      },
      limit,
    );
    return this.describeClusters(arns);
  }

  async describeClusters(clusters: string[]): Promise<EcsClusterSummary[]> {
    const results: EcsClusterSummary[] = [];
    for (const batch of chunk(clusters, 100)) {
      const response = await this.send("DescribeClusters", () =>
        this.client.send(new DescribeClustersCommand({ clusters: batch })),
      );
      results.push(...(response.clusters ?? []).map(mapCluster));
    }
    return results;
  }

  async describeCluster(cluster: string): Promise<EcsClusterSummary> {
    const [found] = await this.describeClusters([cluster]);
    if (!found) throw new NotFoundError("ECS cluster", cluster);
    return found;
  }

  async listContainerInstances(cluster: string, limit = 100): Promise<ContainerInstanceSummary[]> {
    const arns = await this.listArns(
      "ListContainerInstances",
      async (nextToken) => {
        const r = await this.client.send(new ListContainerInstancesCommand({ cluster, nextToken }));
        return { arns: r.containerInstanceArns, nextToken: r.nextToken };
      },
      limit,
    );
    const results: ContainerInstanceSummary[] = [];
    for (const batch of chunk(arns, 100)) {
      const response = await this.send("DescribeContainerInstances", () =>
        this.client.send(new DescribeContainerInstancesCommand({ cluster, containerInstances: batch })),
      );
      results.push(...(response.containerInstances ?? []).map(mapContainerInstance));
    }
    return results;
  }

  // ===========================================================================
  // Services
  // ===========================================================================

  async listServices(cluster: string, limit = 100): Promise<string[]> {
    return this.listArns(
      "ListServices",
      async (nextToken) => {
        const r = await this.client.send(new ListServicesCommand({ cluster, nextToken }));
        return { arns: r.serviceArns, nextToken: r.nextToken };
      },
      limit,
    );
  }

  async describeServices(cluster: string, services: string[]): Promise<EcsServiceSummary[]> {
    if (services.length === 0) throw new ToolInputError("At least one service is required", { field: "services" });
    const results: EcsServiceSummary[] = [];
    for (const batch of chunk(services, 10)) {
      const response = await this.send("DescribeServices", () =>
        this.client.send(new DescribeServicesCommand({ cluster, services: batch })),
      );
      results.push(...(response.services ?? []).map(mapService));
    }
    return results;
  }

  async updateService(options: UpdateServiceOptions): Promise<EcsServiceSummary> {
    if (options.desiredCount === undefined && !options.taskDefinition && !options.forceNewDeployment) {
      throw new ToolInputError("Specify desiredCount, taskDefinition or forceNewDeployment", {
        field: "desiredCount",
      });
    }
    const response = await this.send("UpdateService", () =>
      this.client.send(
        new UpdateServiceCommand({
          cluster: options.cluster,
          service: options.service,
          desiredCount: options.desiredCount,
          taskDefinition: options.taskDefinition,
          forceNewDeployment: options.forceNewDeployment ?? false,
        }),
      ),
    );
    if (!response.service) throw new Error("UpdateService returned no service");
    return mapService(response.service);
  }

  // ===========================================================================
  // Tasks
  // ===========================================================================

  async listTasks(
    cluster: string,
    options: { serviceName?: string; desiredStatus?: DesiredStatus; limit?: number } = {},
  ): Promise<string[]> {
    return this.listArns(
      "ListTasks",
      async (nextToken) => {
        const r = await this.client.send(
          new ListTasksCommand({
            cluster,
            serviceName: options.serviceName,
            desiredStatus: options.desiredStatus ?? "RUNNING",
            nextToken,
          }),
        );
        return { arns: r.taskArns, nextToken: r.nextToken };
      },
      options.limit ?? 100,
    );
  }

  async describeTasks(cluster: string, tasks: string[]): Promise<EcsTaskSummary[]> {
    if (tasks.length === 0) return [];
    const results: EcsTaskSummary[] = [];
    for (const batch of chunk(tasks, 100)) {
      const response = await this.send("DescribeTasks", () =>
        this.client.send(new DescribeTasksCommand({ cluster, tasks: batch })),
      );
      results.push(...(response.tasks ?? []).map(mapTask));
    }
    return results;
  }

  /**
   * Run tasks. Subnets imply awsvpc networking.
   */
  async runTask(options: RunTaskOptions): Promise<{ tasks: EcsTaskSummary[]; failures: Array<{ arn?: string; reason?: string }> }> {
    const count = options.count ?? 1;
    if (count < 1 || count > 10) throw new ToolInputError("count must be between 1 and 10", { field: "count" });
    const launchType = options.launchType ?? "FARGATE";
    if (launchType === "FARGATE" && !options.subnets?.length) {
      throw new ToolInputError("FARGATE tasks need at least one subnet", { field: "subnets" });
    }

    const response = await this.send("RunTask", () =>
      this.client.send(
        new RunTaskCommand({
          cluster: options.cluster,
          taskDefinition: options.taskDefinition,
          count,
          launchType,
          startedBy: options.startedBy,
          networkConfiguration: options.subnets?.length
            ? {
                awsvpcConfiguration: {
                  subnets: options.subnets,
                  securityGroups: options.securityGroups?.length ? options.securityGroups : undefined,
                  assignPublicIp: options.assignPublicIp ? "ENABLED" : "DISABLED",
                },
              }
            : undefined,
        }),
      ),
    );
    return {
      tasks: (response.tasks ?? []).map(mapTask),
      failures: (response.failures ?? []).map((f) => ({ arn: f.arn, reason: f.reason })),
    };
  }

  async stopTask(cluster: string, task: string, reason?: string): Promise<EcsTaskSummary> {
    const response = await this.send("StopTask", () =>
      this.client.send(new StopTaskCommand({ cluster, task, reason: reason ?? "Stopped via MCP tool" })),
    );
    if (!response.task) throw new NotFoundError("ECS task", task);
    return mapTask(response.task);
  }

  // ===========================================================================
  // Task definitions
  // ===========================================================================

  async listTaskDefinitions(
    options: { familyPrefix?: string; status?: "ACTIVE" | "INACTIVE"; limit?: number } = {},
  ): Promise<string[]> {
    return this.listArns(
      "ListTaskDefinitions",
      async (nextToken) => {
        const r = await this.client.send(
          new ListTaskDefinitionsCommand({
            familyPrefix: options.familyPrefix,
            status: options.status ?? "ACTIVE",
            sort: "DESC",
            nextToken,
          }),
        );
        return { arns: r.taskDefinitionArns, nextToken: r.nextToken };
      },
      options.limit ?? 100,
    );
  }

  async describeTaskDefinition(taskDefinition: string): Promise<EcsTaskDefinitionSummary> {
    const response = await this.send("DescribeTaskDefinition", () =>
      this.client.send(new DescribeTaskDefinitionCommand({ taskDefinition })),
    );
    if (!response.taskDefinition) throw new NotFoundError("Task definition", taskDefinition);
    return mapTaskDefinition(response.taskDefinition);
  }
}

// =============================================================================
// Mappers
// =============================================================================

function mapCluster(cluster: Cluster): EcsClusterSummary {
  return {
    name: cluster.clusterName ?? "",
    arn: cluster.clusterArn,
    status: cluster.status,
    activeServices: cluster.activeServicesCount,
    runningTasks: cluster.runningTasksCount,
    pendingTasks: cluster.pendingTasksCount,
    registeredContainerInstances: cluster.registeredContainerInstancesCount,
    capacityProviders: cluster.capacityProviders ?? [],
  };
}

function mapService(service: Service): EcsServiceSummary {
  return {
    name: service.serviceName ?? "",
    arn: service.serviceArn,
    status: service.status,
    taskDefinition: service.taskDefinition,
    desiredCount: service.desiredCount,
    runningCount: service.runningCount,
    pendingCount: service.pendingCount,
    launchType: service.launchType,
    createdAt: service.createdAt?.toISOString(),
    deployments: (service.deployments ?? []).map((d) => ({
      id: d.id,
      status: d.status,
      taskDefinition: d.taskDefinition,
      desiredCount: d.desiredCount,
      runningCount: d.runningCount,
      rolloutState: d.rolloutState,
    })),
    recentEvents: (service.events ?? [])
      .slice(0, RECENT_EVENTS)
      .map((e) => ({ createdAt: e.createdAt?.toISOString(), message: e.message })),
  };
}

function mapTask(task: Task): EcsTaskSummary {
  return {
    arn: task.taskArn ?? "",
    taskDefinition: task.taskDefinitionArn,
    lastStatus: task.lastStatus,
    desiredStatus: task.desiredStatus,
    launchType: task.launchType,
    cpu: task.cpu,
    memory: task.memory,
    startedAt: task.startedAt?.toISOString(),
    stoppedAt: task.stoppedAt?.toISOString(),
    stoppedReason: task.stoppedReason,
    group: task.group,
    containers: (task.containers ?? []).map((c) => ({
      name: c.name,
      lastStatus: c.lastStatus,
      exitCode: c.exitCode,
      reason: c.reason,
      image: c.image,
    })),
  };
}

function mapContainerDefinition(container: ContainerDefinition): EcsTaskDefinitionSummary["containers"][number] {
  const environment: Record<string, string> = {};
  for (const entry of container.environment ?? []) {
    if (entry.name) environment[entry.name] = entry.value ?? "";
  }
  return {
    name: container.name,
    image: container.image,
    cpu: container.cpu,
    memory: container.memory,
    essential: container.essential,
    portMappings: (container.portMappings ?? []).map((p) => ({
      containerPort: p.containerPort,
      hostPort: p.hostPort,
      protocol: p.protocol,
    })),
    environment,
  };
}

function mapTaskDefinition(definition: TaskDefinition): EcsTaskDefinitionSummary {
  return {
    arn: definition.taskDefinitionArn,
    family: definition.family,
    revision: definition.revision,
    status: definition.status,
    cpu: definition.cpu,
    memory: definition.memory,
    networkMode: definition.networkMode,
    requiresCompatibilities: definition.requiresCompatibilities ?? [],
    executionRoleArn: definition.executionRoleArn,
    taskRoleArn: definition.taskRoleArn,
    containers: (definition.containerDefinitions ?? []).map(mapContainerDefinition),
  };
}

function mapContainerInstance(instance: ContainerInstance): ContainerInstanceSummary {
  return {
    arn: instance.containerInstanceArn,
    ec2InstanceId: instance.ec2InstanceId,
    status: instance.status,
    agentConnected: instance.agentConnected,
    runningTasks: instance.runningTasksCount,
    pendingTasks: instance.pendingTasksCount,
  };
}
