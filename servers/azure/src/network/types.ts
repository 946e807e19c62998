/**
 * Networking types.
 */

export type VirtualNetworkInfo = {
  id: string;
  name: string;
  resourceGroup: string;
  location?: string;
  addressPrefixes: string[];
  dnsServers: string[];
  subnets: SubnetInfo[];
  peerings: number;
  provisioningState?: string;
};

export type SubnetInfo = {
  id: string;
  name: string;
  addressPrefix?: string;
  networkSecurityGroupId?: string;
  routeTableId?: string;
  delegations: string[];
  privateEndpointNetworkPolicies?: string;
};

export type SecurityRuleInfo = {
  id: string;
  name: string;
  priority?: number;
  direction?: string;
  access?: string;
  protocol?: string;
  sourcePorts: string[];
  destinationPorts: string[];
  sourcePrefixes: string[];
  destinationPrefixes: string[];
  description?: string;
};

export type NetworkSecurityGroupInfo = {
  id: string;
  name: string;
  resourceGroup: string;
  location?: string;
  rules: SecurityRuleInfo[];
  defaultRules: SecurityRuleInfo[];
  subnetIds: string[];
  networkInterfaceIds: string[];
};

export type SecurityRuleInput = {
  priority: number;
  direction: "Inbound" | "Outbound";
  access: "Allow" | "Deny";
  protocol: "Tcp" | "Udp" | "Icmp" | "*";
  sourcePorts: string[];
  destinationPorts: string[];
  sourcePrefixes: string[];
  destinationPrefixes: string[];
  description?: string;
};

export type LoadBalancerInfo = {
  id: string;
  name: string;
  resourceGroup: string;
  location?: string;
  sku?: string;
  frontendIps: string[];
  backendPools: string[];
  rules: number;
  probes: number;
};

export type ApplicationGatewayInfo = {
  id: string;
  name: string;
  resourceGroup: string;
  location?: string;
  sku?: string;
  tier?: string;
  capacity?: number;
  operationalState?: string;
  backendPools: string[];
  listeners: number;
  firewallEnabled?: boolean;
};

export type BackendServerHealth = {
  pool?: string;
  httpSettings?: string;
  address?: string;
  health?: string;
  probeLog?: string;
};

export type PublicIpInfo = {
  id: string;
  name: string;
  resourceGroup: string;
  location?: string;
  ipAddress?: string;
  allocationMethod?: string;
  sku?: string;
  fqdn?: string;
  attachedTo?: string;
};

export type NetworkInterfaceInfo = {
  id: string;
  name: string;
  resourceGroup: string;
  location?: string;
  privateIps: string[];
  virtualMachineId?: string;
  networkSecurityGroupId?: string;
  macAddress?: string;
  acceleratedNetworking?: boolean;
};

export type PrivateEndpointInfo = {
  id: string;
  name: string;
  resourceGroup: string;
  location?: string;
  subnetId?: string;
  connections: Array<{ name?: string; targetId?: string; groupIds: string[]; status?: string }>;
};

export type NetworkWatcherInfo = {
  id: string;
  name: string;
  resourceGroup: string;
  location?: string;
  provisioningState?: string;
};

export type NextHopInfo = {
  nextHopType?: string;
  nextHopIpAddress?: string;
  routeTableId?: string;
};
