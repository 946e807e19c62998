/**
 * Networking tools.
 */

import { Type } from "@sinclair/typebox";
import { StringList, defineTool, parseStringList, stringEnum, type ToolDefinition } from "../../../../src/index.js";
import { Name, OptionalResourceGroup, ResourceGroup, SubscriptionId, optional } from "../params.js";
import type { AzureServerState } from "../state.js";
import { MAX_RULE_PRIORITY, MIN_RULE_PRIORITY, type AzureNetworkManager } from "./manager.js";

const SERVICE = "network";

const ListParams = Type.Object({ resourceGroup: OptionalResourceGroup, subscriptionId: SubscriptionId });
const NsgParams = { resourceGroup: ResourceGroup, nsgName: Name("Network security group name"), subscriptionId: SubscriptionId };

export function createNetworkTools(state: AzureServerState): ToolDefinition[] {
  /** Subscription-wide listing that a resource group narrows. */
  const listTool = <T>(
    name: string,
    label: string,
    description: string,
    key: string,
    list: (manager: AzureNetworkManager, resourceGroup?: string) => Promise<T[]>,
  ) =>
    defineTool({
      name,
      label,
      description,
      service: SERVICE,
      parameters: ListParams,
      async run(params) {
        const items = await list(await state.network(params.subscriptionId), optional(params.resourceGroup));
        return { [key]: items, count: items.length };
      },
    });

  return [
    listTool("azure_list_virtual_networks", "List Virtual Networks", "Virtual networks with address space and subnets.", "virtualNetworks", (m, rg) =>
      m.listVirtualNetworks(rg),
    ),

    defineTool({
      name: "azure_get_virtual_network",
      label: "Get Virtual Network",
      description: "Address space, DNS servers, subnets and peering count of a virtual network.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: ResourceGroup, name: Name("Virtual network name"), subscriptionId: SubscriptionId }),
      async run(params) {
        return { virtualNetwork: await (await state.network(params.subscriptionId)).getVirtualNetwork(params.resourceGroup, params.name) };
      },
    }),

    defineTool({
      name: "azure_list_subnets",
      label: "List Subnets",
      description: "Subnets of a virtual network with their NSG, route table and delegations.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: ResourceGroup, vnetName: Name("Virtual network name"), subscriptionId: SubscriptionId }),
      async run(params) {
        const subnets = await (await state.network(params.subscriptionId)).listSubnets(params.resourceGroup, params.vnetName);
        return { subnets, count: subnets.length };
      },
    }),

    listTool(
      "azure_list_network_security_groups",
      "List Network Security Groups",
      "NSGs with their rules and attachments.",
      "networkSecurityGroups",
      (m, rg) => m.listNetworkSecurityGroups(rg),
    ),

    defineTool({
      name: "azure_get_network_security_group",
      label: "Get Network Security Group",
      description: "Custom and default rules of an NSG, ordered by priority.",
      service: SERVICE,
      parameters: Type.Object(NsgParams),
      async run(params) {
        const manager = await state.network(params.subscriptionId);
        return { networkSecurityGroup: await manager.getNetworkSecurityGroup(params.resourceGroup, params.nsgName) };
      },
    }),

    defineTool({
      name: "azure_list_security_rules",
      label: "List Security Rules",
      description: "Custom rules of an NSG, ordered by priority.",
      service: SERVICE,
      parameters: Type.Object(NsgParams),
      async run(params) {
        const rules = await (await state.network(params.subscriptionId)).listSecurityRules(params.resourceGroup, params.nsgName);
        return { rules, count: rules.length };
      },
    }),

    defineTool({
      name: "azure_create_security_rule",
      label: "Create Security Rule",
      description: "Create or replace an NSG rule. Lower priority numbers are evaluated first.",
      service: SERVICE,
      parameters: Type.Object({
        ...NsgParams,
        ruleName: Name("Rule name"),
        priority: Type.Integer({ minimum: MIN_RULE_PRIORITY, maximum: MAX_RULE_PRIORITY }),
        direction: stringEnum(["Inbound", "Outbound"], { default: "Inbound" }),
        access: stringEnum(["Allow", "Deny"], { default: "Allow" }),
        protocol: stringEnum(["Tcp", "Udp", "Icmp", "*"], { default: "Tcp" }),
        sourcePorts: Type.Optional(StringList("Source ports or ranges (default *)")),
        destinationPorts: StringList("Destination ports or ranges, e.g. 443 or 8000-8080"),
        sourcePrefixes: Type.Optional(StringList("Source CIDRs or service tags (default *)")),
        destinationPrefixes: Type.Optional(StringList("Destination CIDRs or service tags (default *)")),
        description: Type.Optional(Type.String()),
      }),
      async run(params) {
        const withDefault = (value: string | string[] | undefined, field: string) => {
          const list = parseStringList(value, field);
          return list.length > 0 ? list : ["*"];
        };
        const rule = await (await state.network(params.subscriptionId)).createSecurityRule(
          params.resourceGroup,
          params.nsgName,
          params.ruleName,
          {
            priority: params.priority,
            direction: params.direction,
            access: params.access,
            protocol: params.protocol,
            sourcePorts: withDefault(params.sourcePorts, "sourcePorts"),
            destinationPorts: parseStringList(params.destinationPorts, "destinationPorts"),
            sourcePrefixes: withDefault(params.sourcePrefixes, "sourcePrefixes"),
            destinationPrefixes: withDefault(params.destinationPrefixes, "destinationPrefixes"),
            description: optional(params.description),
          },
        );
        return { rule, message: `Security rule ${params.ruleName} saved` };
      },
    }),

    defineTool({
      name: "azure_delete_security_rule",
      label: "Delete Security Rule",
      description: "Remove a custom NSG rule.",
      service: SERVICE,
      parameters: Type.Object({ ...NsgParams, ruleName: Name("Rule name") }),
      async run(params) {
        await (await state.network(params.subscriptionId)).deleteSecurityRule(params.resourceGroup, params.nsgName, params.ruleName);
        return { ruleName: params.ruleName, message: `Security rule ${params.ruleName} deleted` };
      },
    }),

    listTool("azure_list_load_balancers", "List Load Balancers", "Load balancers with frontends and backend pools.", "loadBalancers", (m, rg) =>
      m.listLoadBalancers(rg),
    ),

    listTool(
      "azure_list_application_gateways",
      "List Application Gateways",
      "Application gateways with SKU, state and WAF setting.",
      "applicationGateways",
      (m, rg) => m.listApplicationGateways(rg),
    ),

    defineTool({
      name: "azure_get_application_gateway_backend_health",
      label: "Get Backend Health",
      description: "Health of each backend server behind an application gateway.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: ResourceGroup, gatewayName: Name("Application gateway name"), subscriptionId: SubscriptionId }),
      async run(params) {
        const servers = await (await state.network(params.subscriptionId)).getApplicationGatewayBackendHealth(
          params.resourceGroup,
          params.gatewayName,
        );
        const unhealthy = servers.filter((s) => s.health !== "Healthy").length;
        return { servers, count: servers.length, unhealthy };
      },
    }),

    listTool("azure_list_public_ip_addresses", "List Public IPs", "Public IP addresses and what they are attached to.", "publicIpAddresses", (m, rg) =>
      m.listPublicIpAddresses(rg),
    ),

    listTool("azure_list_network_interfaces", "List Network Interfaces", "NICs with private IPs and attached VM.", "networkInterfaces", (m, rg) =>
      m.listNetworkInterfaces(rg),
    ),

    listTool("azure_list_private_endpoints", "List Private Endpoints", "Private endpoints and their connection state.", "privateEndpoints", (m, rg) =>
      m.listPrivateEndpoints(rg),
    ),

    listTool("azure_list_network_watchers", "List Network Watchers", "Network Watcher instances per region.", "networkWatchers", (m, rg) =>
      m.listNetworkWatchers(rg),
    ),

    defineTool({
      name: "azure_get_next_hop",
      label: "Get Next Hop",
      description: "Where traffic from a VM to a destination IP is routed.",
      service: SERVICE,
      parameters: Type.Object({
        resourceGroup: ResourceGroup,
        watcherName: Name("Network watcher name (usually NetworkWatcher_<region>)"),
        vmId: Name("Resource id of the source VM"),
        sourceIp: Name("Source IP on the VM"),
        destinationIp: Name("Destination IP"),
        nicId: Type.Optional(Type.String({ description: "NIC resource id when the VM has several" })),
        subscriptionId: SubscriptionId,
      }),
      async run(params) {
        const nextHop = await (await state.network(params.subscriptionId)).getNextHop(params.resourceGroup, params.watcherName, {
          targetResourceId: params.vmId,
          sourceIp: params.sourceIp,
          destinationIp: params.destinationIp,
          targetNicId: optional(params.nicId),
        });
        return { nextHop };
      },
    }),
  ];
}
