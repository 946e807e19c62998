/**
 * ECS types.
 */

export type EcsClusterSummary = {
  name: string;
  arn?: string;
  status?: string;
  activeServices?: number;
  runningTasks?: number;
  pendingTasks?: number;
  registeredContainerInstances?: number;
  capacityProviders: string[];
};

export type EcsDeployment = {
  id?: string;
  status?: string;
  taskDefinition?: string;
  desiredCount?: number;
  runningCount?: number;
  rolloutState?: string;
};

export type EcsServiceSummary = {
  name: string;
  arn?: string;
  status?: string;
  taskDefinition?: string;
  desiredCount?: number;
  runningCount?: number;
  pendingCount?: number;
  launchType?: string;
  createdAt?: string;
  deployments: EcsDeployment[];
  recentEvents: Array<{ createdAt?: string; message?: string }>;
};

export type EcsTaskSummary = {
  arn: string;
  taskDefinition?: string;
  lastStatus?: string;
  desiredStatus?: string;
  launchType?: string;
  cpu?: string;
  memory?: string;
  startedAt?: string;
  stoppedAt?: string;
  stoppedReason?: string;
  group?: string;
  containers: Array<{ name?: string; lastStatus?: string; exitCode?: number; reason?: string; image?: string }>;
};

export type EcsTaskDefinitionSummary = {
  arn?: string;
  family?: string;
  revision?: number;
  status?: string;
  cpu?: string;
  memory?: string;
  networkMode?: string;
  requiresCompatibilities: string[];
  executionRoleArn?: string;
  taskRoleArn?: string;
  containers: Array<{
    name?: string;
    image?: string;
    cpu?: number;
    memory?: number;
    essential?: boolean;
    portMappings: Array<{ containerPort?: number; hostPort?: number; protocol?: string }>;
    environment: Record<string, string>;
  }>;
};

export type RunTaskOptions = {
  cluster: string;
  taskDefinition: string;
  count?: number;
  launchType?: "FARGATE" | "EC2" | "EXTERNAL";
  subnets?: string[];
  securityGroups?: string[];
  assignPublicIp?: boolean;
  startedBy?: string;
};

export type UpdateServiceOptions = {
  cluster: string;
  service: string;
  desiredCount?: number;
  taskDefinition?: string;
  forceNewDeployment?: boolean;
};

export type ContainerInstanceSummary = {
  arn?: string;
  ec2InstanceId?: string;
  status?: string;
  agentConnected?: boolean;
  runningTasks?: number;
  pendingTasks?: number;
};

export type DesiredStatus = "RUNNING" | "PENDING" | "STOPPED";
