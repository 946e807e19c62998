/**
 * Azure Networking Manager
 *
 * Virtual networks, NSGs, load balancers, application gateways, public IPs,
 * NICs, private endpoints and Network Watcher via @azure/arm-network.
 */

import type {
  ApplicationGateway,
  ApplicationGatewayBackendHealth,
  LoadBalancer,
  NetworkInterface,
  NetworkSecurityGroup,
  NetworkWatcher,
  PrivateEndpoint,
  PublicIPAddress,
  SecurityRule,
  Subnet,
  VirtualNetwork,
} from "@azure/arm-network";
import { NotFoundError, ToolInputError } from "../../../../src/index.js";
import { collectAll } from "../pagination.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { resourceGroupFromId, type AzureCredentialProvider, type AzureRetryOptions } from "../types.js";
import type {
  ApplicationGatewayInfo,
  BackendServerHealth,
  LoadBalancerInfo,
  NetworkInterfaceInfo,
  NetworkSecurityGroupInfo,
  NetworkWatcherInfo,
  NextHopInfo,
  PrivateEndpointInfo,
  PublicIpInfo,
  SecurityRuleInfo,
  SecurityRuleInput,
  SubnetInfo,
  VirtualNetworkInfo,
} from "./types.js";

export const MIN_RULE_PRIORITY = 100;
export const MAX_RULE_PRIORITY = 4096;

/** Rules store one value in the singular field or several in the plural one. */
function merged(single: string | undefined, many: string[] | undefined): string[] {
  return [...(single ? [single] : []), ...(many ?? [])];
}

function ids(items: Array<{ id?: string }> | undefined): string[] {
  return (items ?? []).flatMap((i) => (i.id ? [i.id] : []));
}

function names(items: Array<{ name?: string }> | undefined): string[] {
  return (items ?? []).flatMap((i) => (i.name ? [i.name] : []));
}

function base(r: { id?: string; name?: string; location?: string }) {
  return { id: r.id ?? "", name: r.name ?? "", resourceGroup: resourceGroupFromId(r.id), location: r.location };
}

function mapSubnet(s: Subnet): SubnetInfo {
  return {
    id: s.id ?? "",
    name: s.name ?? "",
    addressPrefix: s.addressPrefix ?? s.addressPrefixes?.[0],
    networkSecurityGroupId: s.networkSecurityGroup?.id,
    routeTableId: s.routeTable?.id,
    delegations: (s.delegations ?? []).flatMap((d) => (d.serviceName ? [d.serviceName] : [])),
    privateEndpointNetworkPolicies: s.privateEndpointNetworkPolicies,
  };
}

function mapVirtualNetwork(v: VirtualNetwork): VirtualNetworkInfo {
  return {
    ...base(v),
    addressPrefixes: v.addressSpace?.addressPrefixes ?? [],
    dnsServers: v.dhcpOptions?.dnsServers ?? [],
    subnets: (v.subnets ?? []).map(mapSubnet),
    peerings: v.virtualNetworkPeerings?.length ?? 0,
    provisioningState: v.provisioningState,
  };
}

function mapRule(r: SecurityRule): SecurityRuleInfo {
  return {
    id: r.id ?? "",
    name: r.name ?? "",
    priority: r.priority,
    direction: r.direction,
    access: r.access,
    protocol: r.protocol,
    sourcePorts: merged(r.sourcePortRange, r.sourcePortRanges),
    destinationPorts: merged(r.destinationPortRange, r.destinationPortRanges),
    sourcePrefixes: merged(r.sourceAddressPrefix, r.sourceAddressPrefixes),
    destinationPrefixes: merged(r.destinationAddressPrefix, r.destinationAddressPrefixes),
    description: r.description,
  };
}

function byPriority(a: SecurityRuleInfo, b: SecurityRuleInfo): number {
  return (a.priority ?? 0) - (b.priority ?? 0);
}

function mapNsg(n: NetworkSecurityGroup): NetworkSecurityGroupInfo {
  return {
    ...base(n),
    rules: (n.securityRules ?? []).map(mapRule).sort(byPriority),
    defaultRules: (n.defaultSecurityRules ?? []).map(mapRule).sort(byPriority),
    subnetIds: ids(n.subnets),
    networkInterfaceIds: ids(n.networkInterfaces),
  };
}

function mapLoadBalancer(lb: LoadBalancer): LoadBalancerInfo {
  return {
    ...base(lb),
    sku: lb.sku?.name,
    frontendIps: (lb.frontendIPConfigurations ?? []).flatMap((f) => {
      const address = f.privateIPAddress ?? f.publicIPAddress?.id;
      return address ? [address] : [];
    }),
    backendPools: names(lb.backendAddressPools),
    rules: lb.loadBalancingRules?.length ?? 0,
    probes: lb.probes?.length ?? 0,
  };
}

function mapGateway(g: ApplicationGateway): ApplicationGatewayInfo {
  return {
    ...base(g),
    sku: g.sku?.name,
    tier: g.sku?.tier,
    capacity: g.sku?.capacity,
    operationalState: g.operationalState,
    backendPools: names(g.backendAddressPools),
    listeners: g.httpListeners?.length ?? 0,
    firewallEnabled: g.webApplicationFirewallConfiguration?.enabled,
  };
}

export function flattenBackendHealth(health: ApplicationGatewayBackendHealth): BackendServerHealth[] {
  return (health.backendAddressPools ?? []).flatMap((pool) =>
    (pool.backendHttpSettingsCollection ?? []).flatMap((settings) =>
      (settings.servers ?? []).map((server) => ({
        pool: pool.backendAddressPool?.name,
        httpSettings: settings.backendHttpSettings?.name,
        address: server.address,
        health: server.health,
        probeLog: server.healthProbeLog,
      })),
    ),
  );
}

function mapPublicIp(p: PublicIPAddress): PublicIpInfo {
  return {
    ...base(p),
    ipAddress: p.ipAddress,
    allocationMethod: p.publicIPAllocationMethod,
    sku: p.sku?.name,
    fqdn: p.dnsSettings?.fqdn,
    attachedTo: p.ipConfiguration?.id,
  };
}

function mapNic(n: NetworkInterface): NetworkInterfaceInfo {
  return {
    ...base(n),
    privateIps: (n.ipConfigurations ?? []).flatMap((c) => (c.privateIPAddress ? [c.privateIPAddress] : [])),
    virtualMachineId: n.virtualMachine?.id,
    networkSecurityGroupId: n.networkSecurityGroup?.id,
    macAddress: n.macAddress,
    acceleratedNetworking: n.enableAcceleratedNetworking,
  };
}

function mapPrivateEndpoint(p: PrivateEndpoint): PrivateEndpointInfo {
  const connections = [...(p.privateLinkServiceConnections ?? []), ...(p.manualPrivateLinkServiceConnections ?? [])];
  return {
    ...base(p),
    subnetId: p.subnet?.id,
    connections: connections.map((c) => ({
      name: c.name,
      targetId: c.privateLinkServiceId,
      groupIds: c.groupIds ?? [],
      status: c.privateLinkServiceConnectionState?.status,
    })),
  };
}

function mapWatcher(w: NetworkWatcher): NetworkWatcherInfo {
  return { ...base(w), provisioningState: w.provisioningState };
}

/** Reject rule input Azure would refuse. */
export function validateRuleInput(rule: SecurityRuleInput): void {
  if (!Number.isInteger(rule.priority) || rule.priority < MIN_RULE_PRIORITY || rule.priority > MAX_RULE_PRIORITY) {
    throw new ToolInputError(`priority must be between ${MIN_RULE_PRIORITY} and ${MAX_RULE_PRIORITY}`, { field: "priority" });
  }
  const lists = [
    ["sourcePorts", rule.sourcePorts],
    ["destinationPorts", rule.destinationPorts],
    ["sourcePrefixes", rule.sourcePrefixes],
    ["destinationPrefixes", rule.destinationPrefixes],
  ] as const;
  for (const [field, values] of lists) {
    if (values.length === 0) throw new ToolInputError(`${field} needs at least one value ("*" for any)`, { field });
  }
  for (const port of [...rule.sourcePorts, ...rule.destinationPorts]) {
    if (port !== "*" && !/^\d{1,5}(-\d{1,5})?$/.test(port)) {
      throw new ToolInputError(`Invalid port or range: ${port}`, { field: "destinationPorts" });
    }
  }
}

function toSecurityRule(rule: SecurityRuleInput): SecurityRule {
  const one = (values: string[]) => (values.length === 1 ? values[0] : undefined);
  const many = (values: string[]) => (values.length > 1 ? values : undefined);
  return {
    priority: rule.priority,
    direction: rule.direction,
    access: rule.access,
    protocol: rule.protocol,
    sourcePortRange: one(rule.sourcePorts),
    sourcePortRanges: many(rule.sourcePorts),
    destinationPortRange: one(rule.destinationPorts),
    destinationPortRanges: many(rule.destinationPorts),
    sourceAddressPrefix: one(rule.sourcePrefixes),
    sourceAddressPrefixes: many(rule.sourcePrefixes),
    destinationAddressPrefix: one(rule.destinationPrefixes),
    destinationAddressPrefixes: many(rule.destinationPrefixes),
    description: rule.description,
  };
}

export class AzureNetworkManager {
  private credentials: AzureCredentialProvider;
  private subscriptionId: string;
  private retryOptions?: AzureRetryOptions;

  constructor(credentials: AzureCredentialProvider, subscriptionId: string, retryOptions?: AzureRetryOptions) {
    this.credentials = credentials;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions;
  }

  private async getClient() {
    const { NetworkManagementClient } = await import("@azure/arm-network");
    const { credential } = await this.credentials.getCredential();
    return new NetworkManagementClient(credential, this.subscriptionId);
  }

  // ---------------------------------------------------------------------------
  // Virtual networks
  // ---------------------------------------------------------------------------

  async listVirtualNetworks(resourceGroup?: string): Promise<VirtualNetworkInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup ? client.virtualNetworks.list(resourceGroup) : client.virtualNetworks.listAll(),
          mapVirtualNetwork,
        ),
      this.retryOptions,
    );
  }

  async getVirtualNetwork(resourceGroup: string, name: string): Promise<VirtualNetworkInfo> {
    const client = await this.getClient();
    const vnet = await getOrNull(() => client.virtualNetworks.get(resourceGroup, name), this.retryOptions);
    if (!vnet) throw new NotFoundError("Virtual network", name);
    return mapVirtualNetwork(vnet);
  }

  async listSubnets(resourceGroup: string, vnetName: string): Promise<SubnetInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(() => collectAll(client.subnets.list(resourceGroup, vnetName), mapSubnet), this.retryOptions);
  }

  // ---------------------------------------------------------------------------
  // Network security groups
  // ---------------------------------------------------------------------------

  async listNetworkSecurityGroups(resourceGroup?: string): Promise<NetworkSecurityGroupInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup ? client.networkSecurityGroups.list(resourceGroup) : client.networkSecurityGroups.listAll(),
          mapNsg,
        ),
      this.retryOptions,
    );
  }

  async getNetworkSecurityGroup(resourceGroup: string, name: string): Promise<NetworkSecurityGroupInfo> {
    const client = await this.getClient();
    const nsg = await getOrNull(() => client.networkSecurityGroups.get(resourceGroup, name), this.retryOptions);
    if (!nsg) throw new NotFoundError("Network security group", name);
    return mapNsg(nsg);
  }

  async listSecurityRules(resourceGroup: string, nsgName: string): Promise<SecurityRuleInfo[]> {
    const client = await this.getClient();
    const rules = await withAzureRetry(
      () => collectAll(client.securityRules.list(resourceGroup, nsgName), mapRule),
      this.retryOptions,
    );
    return rules.sort(byPriority);
  }

  async createSecurityRule(
    resourceGroup: string,
    nsgName: string,
    ruleName: string,
    rule: SecurityRuleInput,
  ): Promise<SecurityRuleInfo> {
    validateRuleInput(rule);
    const client = await this.getClient();
    const created = await withAzureRetry(
      () => client.securityRules.beginCreateOrUpdateAndWait(resourceGroup, nsgName, ruleName, toSecurityRule(rule)),
      this.retryOptions,
    );
    return mapRule(created);
  }

  async deleteSecurityRule(resourceGroup: string, nsgName: string, ruleName: string): Promise<void> {
    const client = await this.getClient();
    await withAzureRetry(() => client.securityRules.beginDeleteAndWait(resourceGroup, nsgName, ruleName), this.retryOptions);
  }

  // ---------------------------------------------------------------------------
  // Load balancing
  // ---------------------------------------------------------------------------

  async listLoadBalancers(resourceGroup?: string): Promise<LoadBalancerInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () =>
        collectAll(resourceGroup ? client.loadBalancers.list(resourceGroup) : client.loadBalancers.listAll(), mapLoadBalancer),
      this.retryOptions,
    );
  }

  async listApplicationGateways(resourceGroup?: string): Promise<ApplicationGatewayInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup ? client.applicationGateways.list(resourceGroup) : client.applicationGateways.listAll(),
          mapGateway,
        ),
      this.retryOptions,
    );
  }

  /** Probes every backend server; Azure can take a minute to answer. */
  async getApplicationGatewayBackendHealth(resourceGroup: string, gatewayName: string): Promise<BackendServerHealth[]> {
    const client = await this.getClient();
    const health = await withAzureRetry(
      () => client.applicationGateways.beginBackendHealthAndWait(resourceGroup, gatewayName),
      this.retryOptions,
    );
    return flattenBackendHealth(health);
  }

  // ---------------------------------------------------------------------------
  // Addresses and interfaces
  // ---------------------------------------------------------------------------

  async listPublicIpAddresses(resourceGroup?: string): Promise<PublicIpInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup ? client.publicIPAddresses.list(resourceGroup) : client.publicIPAddresses.listAll(),
          mapPublicIp,
        ),
      this.retryOptions,
    );
  }

  async listNetworkInterfaces(resourceGroup?: string): Promise<NetworkInterfaceInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () =>
        collectAll(resourceGroup ? client.networkInterfaces.list(resourceGroup) : client.networkInterfaces.listAll(), mapNic),
      this.retryOptions,
    );
  }

  async listPrivateEndpoints(resourceGroup?: string): Promise<PrivateEndpointInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup ? client.privateEndpoints.list(resourceGroup) : client.privateEndpoints.listBySubscription(),
          mapPrivateEndpoint,
        ),
      this.retryOptions,
    );
  }

  // ---------------------------------------------------------------------------
  // Network Watcher
  // ---------------------------------------------------------------------------

  async listNetworkWatchers(resourceGroup?: string): Promise<NetworkWatcherInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () => collectAll(resourceGroup ? client.networkWatchers.list(resourceGroup) : client.networkWatchers.listAll(), mapWatcher),
      this.retryOptions,
    );
  }

  async getNextHop(
    resourceGroup: string,
    watcherName: string,
    params: { targetResourceId: string; sourceIp: string; destinationIp: string; targetNicId?: string },
  ): Promise<NextHopInfo> {
    const client = await this.getClient();
    const result = await withAzureRetry(
      () =>
        client.networkWatchers.beginGetNextHopAndWait(resourceGroup, watcherName, {
          targetResourceId: params.targetResourceId,
          sourceIPAddress: params.sourceIp,
          destinationIPAddress: params.destinationIp,
          targetNicResourceId: params.targetNicId,
        }),
      this.retryOptions,
    );
    return { nextHopType: result.nextHopType, nextHopIpAddress: result.nextHopIpAddress, routeTableId: result.routeTableId };
  }
}
