/**
 * ECS tools.
 */

import { Type } from "@sinclair/typebox";
import { StringList, defineTool, parseStringList, stringEnum, type ToolDefinition } from "../../../../src/index.js";
import type { AwsServerState } from "../state.js";

const SERVICE = "ecs";

const Cluster = Type.String({ minLength: 1, description: "Cluster name or ARN" });

export function createEcsTools(state: AwsServerState): ToolDefinition[] {
  return [
    defineTool({
      name: "aws_list_ecs_clusters",
      label: "List ECS Clusters",
      description: "ECS clusters with service and task counts.",
      service: SERVICE,
      parameters: Type.Object({ limit: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }) }),
      async run(params) {
        const clusters = await state.ecs.listClusters(params.limit);
        return { clusters, count: clusters.length };
      },
    }),

    defineTool({
      name: "aws_describe_ecs_cluster",
      label: "Describe ECS Cluster",
      description: "Details of one cluster.",
      service: SERVICE,
      parameters: Type.Object({ cluster: Cluster }),
      async run(params) {
        return { cluster: await state.ecs.describeCluster(params.cluster) };
      },
    }),

    defineTool({
      name: "aws_list_ecs_services",
      label: "List ECS Services",
      description: "Service ARNs of a cluster.",
      service: SERVICE,
      parameters: Type.Object({ cluster: Cluster, limit: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }) }),
      async run(params) {
        const serviceArns = await state.ecs.listServices(params.cluster, params.limit);
        return { cluster: params.cluster, serviceArns, count: serviceArns.length };
      },
    }),

    defineTool({
      name: "aws_describe_ecs_services",
      label: "Describe ECS Services",
      description: "Status, deployments and recent events of services.",
      service: SERVICE,
      parameters: Type.Object({ cluster: Cluster, services: StringList("Service names or ARNs") }),
      async run(params) {
        const services = await state.ecs.describeServices(params.cluster, parseStringList(params.services, "services"));
        return { cluster: params.cluster, services, count: services.length };
      },
    }),

    defineTool({
      name: "aws_list_ecs_tasks",
      label: "List ECS Tasks",
      description: "Tasks of a cluster, optionally of one service.",
      service: SERVICE,
      parameters: Type.Object({
        cluster: Cluster,
        serviceName: Type.Optional(Type.String()),
        desiredStatus: stringEnum(["RUNNING", "PENDING", "STOPPED"], { default: "RUNNING" }),
        describe: Type.Boolean({ default: true, description: "Return task details instead of ARNs only" }),
        limit: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }),
      }),
      async run(params) {
        const taskArns = await state.ecs.listTasks(params.cluster, params);
        if (!params.describe) return { cluster: params.cluster, taskArns, count: taskArns.length };
        const tasks = await state.ecs.describeTasks(params.cluster, taskArns);
        return { cluster: params.cluster, tasks, count: tasks.length };
      },
    }),

    defineTool({
      name: "aws_describe_ecs_tasks",
      label: "Describe ECS Tasks",
      description: "Details of tasks, including container exit codes and stop reasons.",
      service: SERVICE,
      parameters: Type.Object({ cluster: Cluster, tasks: StringList("Task ARNs or ids") }),
      async run(params) {
        const tasks = await state.ecs.describeTasks(params.cluster, parseStringList(params.tasks, "tasks"));
        return { cluster: params.cluster, tasks, count: tasks.length };
      },
    }),

    defineTool({
      name: "aws_run_ecs_task",
      label: "Run ECS Task",
      description: "Start tasks from a task definition.",
      service: SERVICE,
      parameters: Type.Object({
        cluster: Cluster,
        taskDefinition: Type.String({ minLength: 1, description: "family, family:revision or ARN" }),
        count: Type.Integer({ minimum: 1, maximum: 10, default: 1 }),
        launchType: stringEnum(["FARGATE", "EC2", "EXTERNAL"], { default: "FARGATE" }),
        subnets: Type.Optional(StringList("Subnet ids (required for FARGATE)")),
        securityGroups: Type.Optional(StringList("Security group ids")),
        assignPublicIp: Type.Boolean({ default: false }),
      }),
      async run(params) {
        const result = await state.ecs.runTask({
          cluster: params.cluster,
          taskDefinition: params.taskDefinition,
          count: params.count,
          launchType: params.launchType,
          subnets: parseStringList(params.subnets, "subnets"),
          securityGroups: parseStringList(params.securityGroups, "securityGroups"),
          assignPublicIp: params.assignPublicIp,
        });
        return { cluster: params.cluster, ...result };
      },
    }),

    defineTool({
      name: "aws_stop_ecs_task",
      label: "Stop ECS Task",
      description: "Stop a running task.",
      service: SERVICE,
      parameters: Type.Object({
        cluster: Cluster,
        task: Type.String({ minLength: 1 }),
        reason: Type.Optional(Type.String()),
      }),
      async run(params) {
        return { task: await state.ecs.stopTask(params.cluster, params.task, params.reason) };
      },
    }),

    defineTool({
      name: "aws_list_task_definitions",
      label: "List Task Definitions",
      description: "Task definition ARNs, newest revision first.",
      service: SERVICE,
      parameters: Type.Object({
        familyPrefix: Type.Optional(Type.String()),
        status: stringEnum(["ACTIVE", "INACTIVE"], { default: "ACTIVE" }),
        limit: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }),
      }),
      async run(params) {
        const taskDefinitionArns = await state.ecs.listTaskDefinitions(params);
        return { taskDefinitionArns, count: taskDefinitionArns.length };
      },
    }),

    defineTool({
      name: "aws_describe_task_definition",
      label: "Describe Task Definition",
      description: "Containers, resources and roles of a task definition.",
      service: SERVICE,
      parameters: Type.Object({ taskDefinition: Type.String({ minLength: 1 }) }),
      async run(params) {
        return { taskDefinition: await state.ecs.describeTaskDefinition(params.taskDefinition) };
      },
    }),

    defineTool({
      name: "aws_update_ecs_service",
      label: "Update ECS Service",
      description: "Scale a service, change its task definition or force a new deployment.",
      service: SERVICE,
      parameters: Type.Object({
        cluster: Cluster,
        service: Type.String({ minLength: 1 }),
        desiredCount: Type.Optional(Type.Integer({ minimum: 0 })),
        taskDefinition: Type.Optional(Type.String()),
        forceNewDeployment: Type.Boolean({ default: false }),
      }),
      async run(params) {
        return { service: await state.ecs.updateService(params) };
      },
    }),

    defineTool({
      name: "aws_list_container_instances",
      label: "List Container Instances",
      description: "EC2 container instances registered with a cluster.",
      service: SERVICE,
      parameters: Type.Object({ cluster: Cluster, limit: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }) }),
      async run(params) {
        const containerInstances = await state.ecs.listContainerInstances(params.cluster, params.limit);
        return { cluster: params.cluster, containerInstances, count: containerInstances.length };
      },
    }),
  ];
}
