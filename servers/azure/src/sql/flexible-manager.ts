/**
 * Azure Database for PostgreSQL and MySQL flexible servers
 * (@azure/arm-postgresql-flexible, @azure/arm-mysql-flexible).
 */

import type { Server as MySqlServer } from "@azure/arm-mysql-flexible";
import type { Server as PgServer } from "@azure/arm-postgresql-flexible";
import { NotFoundError } from "../../../../src/index.js";
import { collectAll } from "../pagination.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { resourceGroupFromId, type AzureCredentialProvider, type AzureRetryOptions } from "../types.js";
import type { FlexibleDatabase, FlexibleEngine, FlexibleServer } from "./types.js";

function mapServer(engine: FlexibleEngine, s: PgServer | MySqlServer): FlexibleServer {
  return {
    id: s.id ?? "",
    name: s.name ?? "",
    engine,
    resourceGroup: resourceGroupFromId(s.id),
    location: s.location,
    state: s.state,
    version: s.version,
    skuName: s.sku?.name,
    skuTier: s.sku?.tier,
    administratorLogin: s.administratorLogin,
    fullyQualifiedDomainName: s.fullyQualifiedDomainName,
    storageGB: s.storage?.storageSizeGB,
    backupRetentionDays: s.backup?.backupRetentionDays,
    highAvailability: s.highAvailability?.mode,
    tags: s.tags ?? {},
  };
}

function mapDatabase(db: { id?: string; name?: string; charset?: string; collation?: string }): FlexibleDatabase {
  return { id: db.id ?? "", name: db.name ?? "", charset: db.charset, collation: db.collation };
}

export class AzureFlexibleServerManager {
  private credentials: AzureCredentialProvider;
  private subscriptionId: string;
  private retryOptions?: AzureRetryOptions;

  constructor(credentials: AzureCredentialProvider, subscriptionId: string, retryOptions?: AzureRetryOptions) {
    this.credentials = credentials;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions;
  }

  private async getPgClient() {
    const { PostgreSQLManagementFlexibleServerClient } = await import("@azure/arm-postgresql-flexible");
    const { credential } = await this.credentials.getCredential();
    return new PostgreSQLManagementFlexibleServerClient(credential, this.subscriptionId);
  }

  private async getMySqlClient() {
    const { MySQLManagementFlexibleServerClient } = await import("@azure/arm-mysql-flexible");
    const { credential } = await this.credentials.getCredential();
    return new MySQLManagementFlexibleServerClient(credential, this.subscriptionId);
  }

  async listServers(engine: FlexibleEngine, resourceGroup?: string): Promise<FlexibleServer[]> {
    const map = (s: PgServer | MySqlServer) => mapServer(engine, s);
    if (engine === "postgresql") {
      const client = await this.getPgClient();
      return withAzureRetry(
        () => collectAll(resourceGroup ? client.servers.listByResourceGroup(resourceGroup) : client.servers.list(), map),
        this.retryOptions,
      );
    }
    const client = await this.getMySqlClient();
    return withAzureRetry(
      () => collectAll(resourceGroup ? client.servers.listByResourceGroup(resourceGroup) : client.servers.list(), map),
      this.retryOptions,
    );
  }

  async getServer(engine: FlexibleEngine, resourceGroup: string, serverName: string): Promise<FlexibleServer> {
    const server =
      engine === "postgresql"
        ? await getOrNull(async () => (await this.getPgClient()).servers.get(resourceGroup, serverName), this.retryOptions)
        : await getOrNull(async () => (await this.getMySqlClient()).servers.get(resourceGroup, serverName), this.retryOptions);
    if (!server) throw new NotFoundError(engine === "postgresql" ? "PostgreSQL server" : "MySQL server", serverName);
    return mapServer(engine, server);
  }

  async listDatabases(engine: FlexibleEngine, resourceGroup: string, serverName: string): Promise<FlexibleDatabase[]> {
    if (engine === "postgresql") {
      const client = await this.getPgClient();
      return withAzureRetry(() => collectAll(client.databases.listByServer(resourceGroup, serverName), mapDatabase), this.retryOptions);
    }
    const client = await this.getMySqlClient();
    return withAzureRetry(() => collectAll(client.databases.listByServer(resourceGroup, serverName), mapDatabase), this.retryOptions);
  }
}
