/**
 * Container Instances, Container Registry and AKS types.
 */

export type ContainerSummary = {
  name: string;
  image: string;
  cpu?: number;
  memoryInGB?: number;
  state?: string;
  restartCount?: number;
};

export type ContainerGroup = {
  id: string;
  name: string;
  resourceGroup: string;
  location?: string;
  osType?: string;
  state?: string;
  provisioningState?: string;
  restartPolicy?: string;
  ipAddress?: string;
  fqdn?: string;
  ports?: number[];
  containers: ContainerSummary[];
};

export type ContainerRegistry = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  loginServer?: string;
  sku?: string;
  adminUserEnabled?: boolean;
  provisioningState?: string;
  createdAt?: string;
};

export type RegistryCredentials = {
  username?: string;
  passwords: Array<{ name?: string; value?: string }>;
  masked: boolean;
};

export type AksNodePool = {
  name: string;
  count?: number;
  vmSize?: string;
  mode?: string;
  osType?: string;
  orchestratorVersion?: string;
  provisioningState?: string;
  powerState?: string;
  enableAutoScaling?: boolean;
  minCount?: number;
  maxCount?: number;
};

export type AksCluster = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  kubernetesVersion?: string;
  dnsPrefix?: string;
  fqdn?: string;
  provisioningState?: string;
  powerState?: string;
  nodeResourceGroup?: string;
  nodePools: AksNodePool[];
};

export type RegistryRepository = {
  name: string;
  manifestCount?: number;
  tagCount?: number;
  createdOn?: string;
  lastUpdatedOn?: string;
};

export type RegistryImage = {
  repository: string;
  digest: string;
  tags: string[];
  sizeInBytes?: number;
  architecture?: string;
  operatingSystem?: string;
  createdOn?: string;
  lastUpdatedOn?: string;
};

export type NodePoolSettings = {
  vmSize?: string;
  count?: number;
  mode?: "System" | "User";
  osType?: "Linux" | "Windows";
  enableAutoScaling?: boolean;
  minCount?: number;
  maxCount?: number;
  orchestratorVersion?: string;
};

export type KubeConfig = {
  name?: string;
  /** kubeconfig YAML; only returned when revealed. */
  value?: string;
  sizeInBytes: number;
};
