/**
 * Azure SQL tools: ARM management and queries over mssql.
 */

import { Type } from "@sinclair/typebox";
import { defineTool, type ToolDefinition } from "../../../../src/index.js";
import { Name, OptionalResourceGroup, ResourceGroup, SubscriptionId, optional } from "../params.js";
import type { AzureServerState } from "../state.js";
import { DEFAULT_MAX_ROWS } from "./query.js";
import type { FlexibleEngine } from "./types.js";

const SERVICE = "sql";

const ServerParams = { resourceGroup: ResourceGroup, serverName: Name("SQL server name"), subscriptionId: SubscriptionId };
const Connection = {
  server: Name("Server name or fully qualified host (name.database.windows.net)"),
  database: Name("Database name"),
};

/** List, get and list-databases tools for one flexible server engine. */
function flexibleServerTools(state: AzureServerState, engine: FlexibleEngine, product: string): ToolDefinition[] {
  const params = { resourceGroup: ResourceGroup, serverName: Name(`${product} server name`), subscriptionId: SubscriptionId };
  return [
    defineTool({
      name: `azure_list_${engine}_servers`,
      label: `List ${product} Servers`,
      description: `Azure Database for ${product} flexible servers.`,
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: OptionalResourceGroup, subscriptionId: SubscriptionId }),
      async run(args) {
        const servers = await (await state.flexibleServers(args.subscriptionId)).listServers(engine, optional(args.resourceGroup));
        return { engine, servers, count: servers.length };
      },
    }),

    defineTool({
      name: `azure_get_${engine}_server`,
      label: `Get ${product} Server`,
      description: `Version, SKU, storage and high availability of a ${product} flexible server.`,
      service: SERVICE,
      parameters: Type.Object(params),
      async run(args) {
        const manager = await state.flexibleServers(args.subscriptionId);
        return { server: await manager.getServer(engine, args.resourceGroup, args.serverName) };
      },
    }),

    defineTool({
      name: `azure_list_${engine}_databases`,
      label: `List ${product} Databases`,
      description: `Databases on a ${product} flexible server.`,
      service: SERVICE,
      parameters: Type.Object(params),
      async run(args) {
        const manager = await state.flexibleServers(args.subscriptionId);
        const databases = await manager.listDatabases(engine, args.resourceGroup, args.serverName);
        return { server: args.serverName, databases, count: databases.length };
      },
    }),
  ];
}

export function createSqlTools(state: AzureServerState): ToolDefinition[] {
  return [
    defineTool({
      name: "azure_list_sql_servers",
      label: "List SQL Servers",
      description: "Azure SQL logical servers.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: OptionalResourceGroup, subscriptionId: SubscriptionId }),
      async run(params) {
        const servers = await (await state.sql(params.subscriptionId)).listServers(optional(params.resourceGroup));
        return { servers, count: servers.length };
      },
    }),

    defineTool({
      name: "azure_get_sql_server",
      label: "Get SQL Server",
      description: "Details of one SQL server.",
      service: SERVICE,
      parameters: Type.Object(ServerParams),
      async run(params) {
        return { server: await (await state.sql(params.subscriptionId)).getServer(params.resourceGroup, params.serverName) };
      },
    }),

    defineTool({
      name: "azure_list_sql_databases",
      label: "List SQL Databases",
      description: "Databases on a SQL server, including master.",
      service: SERVICE,
      parameters: Type.Object(ServerParams),
      async run(params) {
        const databases = await (await state.sql(params.subscriptionId)).listDatabases(params.resourceGroup, params.serverName);
        return { databases, count: databases.length };
      },
    }),

    defineTool({
      name: "azure_get_sql_database",
      label: "Get SQL Database",
      description: "SKU, status and size of a database.",
      service: SERVICE,
      parameters: Type.Object({ ...ServerParams, databaseName: Name("Database name") }),
      async run(params) {
        const manager = await state.sql(params.subscriptionId);
        return { database: await manager.getDatabase(params.resourceGroup, params.serverName, params.databaseName) };
      },
    }),

    defineTool({
      name: "azure_list_elastic_pools",
      label: "List Elastic Pools",
      description: "Elastic pools on a SQL server.",
      service: SERVICE,
      parameters: Type.Object(ServerParams),
      async run(params) {
        const pools = await (await state.sql(params.subscriptionId)).listElasticPools(params.resourceGroup, params.serverName);
        return { pools, count: pools.length };
      },
    }),

    defineTool({
      name: "azure_list_sql_firewall_rules",
      label: "List SQL Firewall Rules",
      description: "Server-level firewall rules.",
      service: SERVICE,
      parameters: Type.Object(ServerParams),
      async run(params) {
        const rules = await (await state.sql(params.subscriptionId)).listFirewallRules(params.resourceGroup, params.serverName);
        return { rules, count: rules.length };
      },
    }),

    defineTool({
      name: "azure_create_sql_firewall_rule",
      label: "Create SQL Firewall Rule",
      description: "Allow an IPv4 address or range. 0.0.0.0 to 0.0.0.0 allows Azure services.",
      service: SERVICE,
      parameters: Type.Object({
        ...ServerParams,
        ruleName: Name("Firewall rule name"),
        startIpAddress: Type.String({ description: "First IPv4 address" }),
        endIpAddress: Type.Optional(Type.String({ description: "Last IPv4 address (defaults to startIpAddress)" })),
      }),
      async run(params) {
        const rule = await (await state.sql(params.subscriptionId)).createFirewallRule(
          params.resourceGroup,
          params.serverName,
          params.ruleName,
          params.startIpAddress,
          optional(params.endIpAddress),
        );
        return { rule, message: `Firewall rule ${params.ruleName} saved` };
      },
    }),

    defineTool({
      name: "azure_delete_sql_firewall_rule",
      label: "Delete SQL Firewall Rule",
      description: "Remove a server-level firewall rule.",
      service: SERVICE,
      parameters: Type.Object({ ...ServerParams, ruleName: Name("Firewall rule name") }),
      async run(params) {
        await (await state.sql(params.subscriptionId)).deleteFirewallRule(params.resourceGroup, params.serverName, params.ruleName);
        return { ruleName: params.ruleName, message: `Firewall rule ${params.ruleName} deleted` };
      },
    }),

    ...flexibleServerTools(state, "postgresql", "PostgreSQL"),
    ...flexibleServerTools(state, "mysql", "MySQL"),

    defineTool({
      name: "azure_sql_test_connection",
      label: "Test SQL Connection",
      description: "Connect with the current Entra ID identity and report the server version.",
      service: SERVICE,
      parameters: Type.Object(Connection),
      async run(params) {
        return { server: params.server, database: params.database, ...(await state.sqlQuery().testConnection(params.server, params.database)) };
      },
    }),

    defineTool({
      name: "azure_sql_execute_query",
      label: "Execute SQL Query",
      description: "Run a SELECT query. Other statements are rejected unless allowWrite is set.",
      service: SERVICE,
      parameters: Type.Object({
        ...Connection,
        query: Type.String({ minLength: 1, description: "T-SQL query" }),
        maxRows: Type.Integer({ minimum: 1, maximum: 100_000, default: DEFAULT_MAX_ROWS }),
        allowWrite: Type.Boolean({ default: false, description: "Permit statements that modify data" }),
      }),
      async run(params) {
        const result = await state.sqlQuery().executeQuery(params.server, params.database, params.query, {
          maxRows: params.maxRows,
          allowWrite: params.allowWrite,
        });
        return { ...result };
      },
    }),

    defineTool({
      name: "azure_sql_execute_non_query",
      label: "Execute SQL Statement",
      description: "Run INSERT, UPDATE, DELETE or DDL and report the affected row count.",
      service: SERVICE,
      parameters: Type.Object({ ...Connection, statement: Type.String({ minLength: 1, description: "T-SQL statement" }) }),
      async run(params) {
        return { ...(await state.sqlQuery().executeNonQuery(params.server, params.database, params.statement)) };
      },
    }),

    defineTool({
      name: "azure_sql_get_schema",
      label: "Get SQL Schema",
      description: "List tables, or the columns of one table (schema.table is accepted).",
      service: SERVICE,
      parameters: Type.Object({ ...Connection, table: Type.Optional(Type.String({ description: "Table name" })) }),
      async run(params) {
        return state.sqlQuery().getSchema(params.server, params.database, optional(params.table));
      },
    }),
  ];
}
