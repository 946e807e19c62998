import { beforeEach, describe, expect, it, vi } from "vitest";
import { NO_RETRY, asyncIter, fakeCredentials } from "../testing.js";
import type { SecurityRuleInput } from "./types.js";

const { mockRules, mockGateways, mockWatchers } = vi.hoisted(() => ({
  mockRules: { list: vi.fn(), beginCreateOrUpdateAndWait: vi.fn(), beginDeleteAndWait: vi.fn() },
  mockGateways: { list: vi.fn(), listAll: vi.fn(), beginBackendHealthAndWait: vi.fn() },
  mockWatchers: { list: vi.fn(), listAll: vi.fn(), beginGetNextHopAndWait: vi.fn() },
}));

vi.mock("@azure/arm-network", () => ({
  NetworkManagementClient: vi.fn().mockImplementation(() => ({
    securityRules: mockRules,
    applicationGateways: mockGateways,
    networkWatchers: mockWatchers,
  })),
}));

import { AzureNetworkManager, validateRuleInput } from "./manager.js";

const httpsRule: SecurityRuleInput = {
  priority: 200,
  direction: "Inbound",
  access: "Allow",
  protocol: "Tcp",
  sourcePorts: ["*"],
  destinationPorts: ["443", "8443"],
  sourcePrefixes: ["10.0.0.0/16"],
  destinationPrefixes: ["*"],
};

describe("validateRuleInput", () => {
  it("accepts priorities from 100 to 4096", () => {
    expect(() => validateRuleInput({ ...httpsRule, priority: 100 })).not.toThrow();
    expect(() => validateRuleInput({ ...httpsRule, priority: 4096 })).not.toThrow();
    expect(() => validateRuleInput({ ...httpsRule, priority: 99 })).toThrow("priority must be between 100 and 4096");
    expect(() => validateRuleInput({ ...httpsRule, priority: 4097 })).toThrow("priority must be between 100 and 4096");
  });

  it("rejects malformed ports", () => {
    expect(() => validateRuleInput({ ...httpsRule, destinationPorts: ["https"] })).toThrow("Invalid port or range: https");
  });

  it("needs at least one destination port", () => {
    expect(() => validateRuleInput({ ...httpsRule, destinationPorts: [] })).toThrow('destinationPorts needs at least one value ("*" for any)');
  });
});

describe("AzureNetworkManager", () => {
  let manager: AzureNetworkManager;

  beforeEach(() => {
    vi.clearAllMocks();
    manager = new AzureNetworkManager(fakeCredentials, "sub-1", NO_RETRY);
  });

  it("uses singular fields for single values and plural fields for lists", async () => {
    mockRules.beginCreateOrUpdateAndWait.mockResolvedValue({ id: "rule-id", name: "allow-https", priority: 200, destinationPortRanges: ["443", "8443"] });

    const rule = await manager.createSecurityRule("rg-net", "nsg-web", "allow-https", httpsRule);

    expect(mockRules.beginCreateOrUpdateAndWait).toHaveBeenCalledWith("rg-net", "nsg-web", "allow-https", {
      priority: 200,
      direction: "Inbound",
      access: "Allow",
      protocol: "Tcp",
      sourcePortRange: "*",
      sourcePortRanges: undefined,
      destinationPortRange: undefined,
      destinationPortRanges: ["443", "8443"],
      sourceAddressPrefix: "10.0.0.0/16",
      sourceAddressPrefixes: undefined,
      destinationAddressPrefix: "*",
      destinationAddressPrefixes: undefined,
      description: undefined,
    });
    expect(rule.destinationPorts).toEqual(["443", "8443"]);
  });

  it("orders rules by priority", async () => {
    mockRules.list.mockReturnValue(
      asyncIter([
        { name: "deny-all", priority: 4000, sourceAddressPrefix: "*" },
        { name: "allow-ssh", priority: 110, destinationPortRange: "22" },
      ]),
    );
    const rules = await manager.listSecurityRules("rg-net", "nsg-web");
    expect(rules.map((r) => r.name)).toEqual(["allow-ssh", "deny-all"]);
  });

  it("flattens backend health per server", async () => {
    mockGateways.beginBackendHealthAndWait.mockResolvedValue({
      backendAddressPools: [
        {
          backendAddressPool: { name: "web" },
          backendHttpSettingsCollection: [
            {
              backendHttpSettings: { name: "https" },
              servers: [
                { address: "10.0.1.4", health: "Healthy" },
                { address: "10.0.1.5", health: "Unhealthy", healthProbeLog: "Timeout" },
              ],
            },
          ],
        },
      ],
    });

    const servers = await manager.getApplicationGatewayBackendHealth("rg-net", "agw-web");

    expect(servers).toEqual([
      { pool: "web", httpSettings: "https", address: "10.0.1.4", health: "Healthy", probeLog: undefined },
      { pool: "web", httpSettings: "https", address: "10.0.1.5", health: "Unhealthy", probeLog: "Timeout" },
    ]);
  });

  it("asks Network Watcher for the next hop", async () => {
    mockWatchers.beginGetNextHopAndWait.mockResolvedValue({ nextHopType: "VirtualAppliance", nextHopIpAddress: "10.0.2.4" });

    const hop = await manager.getNextHop("NetworkWatcherRG", "NetworkWatcher_eastus", {
      targetResourceId: "vm-id",
      sourceIp: "10.0.1.4",
      destinationIp: "8.8.8.8",
    });

    expect(mockWatchers.beginGetNextHopAndWait).toHaveBeenCalledWith("NetworkWatcherRG", "NetworkWatcher_eastus", {
      targetResourceId: "vm-id",
      sourceIPAddress: "10.0.1.4",
      destinationIPAddress: "8.8.8.8",
      targetNicResourceId: undefined,
    });
    expect(hop).toEqual({ nextHopType: "VirtualAppliance", nextHopIpAddress: "10.0.2.4", routeTableId: undefined });
  });
});
