/**
 * Azure SQL Manager
 *
 * Servers, databases, elastic pools and firewall rules via @azure/arm-sql.
 */

import type { Database, ElasticPool, FirewallRule, Server } from "@azure/arm-sql";
import { NotFoundError, ToolInputError } from "../../../../src/index.js";
import { collectAll } from "../pagination.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { iso, resourceGroupFromId, type AzureCredentialProvider, type AzureRetryOptions } from "../types.js";
import type { SqlDatabase, SqlElasticPool, SqlFirewallRule, SqlServer } from "./types.js";

const IPV4 = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)(\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)){3}$/;

function ipToNumber(ip: string): number {
  return ip.split(".").reduce((n, octet) => n * 256 + Number(octet), 0);
}

function mapServer(s: Server): SqlServer {
  return {
    id: s.id ?? "",
    name: s.name ?? "",
    resourceGroup: resourceGroupFromId(s.id),
    location: s.location,
    fullyQualifiedDomainName: s.fullyQualifiedDomainName,
    administratorLogin: s.administratorLogin,
    version: s.version,
    state: s.state,
    publicNetworkAccess: s.publicNetworkAccess,
    tags: s.tags ?? {},
  };
}

function mapDatabase(server: string, d: Database): SqlDatabase {
  return {
    id: d.id ?? "",
    name: d.name ?? "",
    server,
    resourceGroup: resourceGroupFromId(d.id),
    location: d.location,
    status: d.status,
    sku: d.sku?.name,
    tier: d.sku?.tier,
    capacity: d.sku?.capacity,
    maxSizeBytes: d.maxSizeBytes,
    collation: d.collation,
    elasticPoolId: d.elasticPoolId,
    createdAt: iso(d.creationDate),
  };
}

function mapPool(p: ElasticPool): SqlElasticPool {
  return {
    id: p.id ?? "",
    name: p.name ?? "",
    location: p.location,
    state: p.state,
    sku: p.sku?.name,
    tier: p.sku?.tier,
    capacity: p.sku?.capacity,
    maxSizeBytes: p.maxSizeBytes,
  };
}

function mapRule(r: FirewallRule): SqlFirewallRule {
  return { id: r.id ?? "", name: r.name ?? "", startIpAddress: r.startIpAddress, endIpAddress: r.endIpAddress };
}

export class AzureSqlManager {
  private credentials: AzureCredentialProvider;
  private subscriptionId: string;
  private retryOptions?: AzureRetryOptions;

  constructor(credentials: AzureCredentialProvider, subscriptionId: string, retryOptions?: AzureRetryOptions) {
    this.credentials = credentials;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions;
  }

  private async getClient() {
    const { SqlManagementClient } = await import("@azure/arm-sql");
    const { credential } = await this.credentials.getCredential();
    return new SqlManagementClient(credential, this.subscriptionId);
  }

  async listServers(resourceGroup?: string): Promise<SqlServer[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () => collectAll(resourceGroup ? client.servers.listByResourceGroup(resourceGroup) : client.servers.list(), mapServer),
      this.retryOptions,
    );
  }

  async getServer(resourceGroup: string, serverName: string): Promise<SqlServer> {
    const client = await this.getClient();
    const server = await getOrNull(() => client.servers.get(resourceGroup, serverName), this.retryOptions);
    if (!server) throw new NotFoundError("SQL server", serverName);
    return mapServer(server);
  }

  async listDatabases(resourceGroup: string, serverName: string): Promise<SqlDatabase[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () => collectAll(client.databases.listByServer(resourceGroup, serverName), (d) => mapDatabase(serverName, d)),
      this.retryOptions,
    );
  }

  async getDatabase(resourceGroup: string, serverName: string, databaseName: string): Promise<SqlDatabase> {
    const client = await this.getClient();
    const database = await getOrNull(() => client.databases.get(resourceGroup, serverName, databaseName), this.retryOptions);
    if (!database) throw new NotFoundError("Database", databaseName);
    return mapDatabase(serverName, database);
  }

  async listElasticPools(resourceGroup: string, serverName: string): Promise<SqlElasticPool[]> {
    const client = await this.getClient();
    return withAzureRetry(() => collectAll(client.elasticPools.listByServer(resourceGroup, serverName), mapPool), this.retryOptions);
  }

  async listFirewallRules(resourceGroup: string, serverName: string): Promise<SqlFirewallRule[]> {
    const client = await this.getClient();
    return withAzureRetry(() => collectAll(client.firewallRules.listByServer(resourceGroup, serverName), mapRule), this.retryOptions);
  }

  async createFirewallRule(
    resourceGroup: string,
    serverName: string,
    ruleName: string,
    startIpAddress: string,
    endIpAddress: string = startIpAddress,
  ): Promise<SqlFirewallRule> {
    for (const [field, ip] of [
      ["startIpAddress", startIpAddress],
      ["endIpAddress", endIpAddress],
    ] as const) {
      if (!IPV4.test(ip)) throw new ToolInputError(`${field} is not an IPv4 address: ${ip}`, { field });
    }
    if (ipToNumber(startIpAddress) > ipToNumber(endIpAddress)) {
      throw new ToolInputError("startIpAddress must not be after endIpAddress", { field: "startIpAddress" });
    }
    const client = await this.getClient();
    const rule = await withAzureRetry(
      () => client.firewallRules.createOrUpdate(resourceGroup, serverName, ruleName, { startIpAddress, endIpAddress }),
      this.retryOptions,
    );
    return mapRule(rule);
  }

  async deleteFirewallRule(resourceGroup: string, serverName: string, ruleName: string): Promise<void> {
    const client = await this.getClient();
    await withAzureRetry(() => client.firewallRules.delete(resourceGroup, serverName, ruleName), this.retryOptions);
  }
}
