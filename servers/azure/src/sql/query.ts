/**
 * Azure SQL data plane.
 *
 * Connects with an Entra ID access token through mssql. Queries are
 * read-only unless the caller opts into writes.
 */

import sql from "mssql";
import { ToolInputError, errorMessage } from "../../../../src/index.js";
import type { AzureCredentialProvider } from "../types.js";
import type { SqlQueryResult } from "./types.js";

export const SQL_SCOPE = "https://database.windows.net/.default";
export const DEFAULT_MAX_ROWS = 1000;
const DEFAULT_TIMEOUT_MS = 30_000;

// Statements need no `;` between them, so a SELECT can be followed by any of these.
const WRITE_KEYWORDS = new RegExp(
  "\\b(" +
    [
      "INSERT|UPDATE|DELETE|MERGE|DROP|ALTER|CREATE|TRUNCATE|EXEC|EXECUTE|GRANT|REVOKE|DENY|INTO|BACKUP|RESTORE|DBCC",
      "KILL|SHUTDOWN|RECONFIGURE|CHECKPOINT|WAITFOR|DECLARE|SET|SETUSER|ENABLE|DISABLE|OPEN|CLOSE|DEALLOCATE|USE|BULK",
    ].join("|") +
    ")\\b",
  "i",
);

/** Blank out comments and quoted text so keywords inside them are ignored. */
export function stripSqlNoise(query: string): string {
  return query
    .replace(/\/\*[\s\S]*?\*\//g, " ")
    .replace(/--[^\n]*/g, " ")
    .replace(/N?'(?:[^']|'')*'/g, "''")
    .replace(/\[(?:[^\]]|\]\])*\]/g, "[x]");
}

export function assertReadOnly(query: string): void {
  const statements = stripSqlNoise(query)
    .split(";")
    .map((s) => s.trim())
    .filter(Boolean);
  if (statements.length === 0) {
    throw new ToolInputError("query is empty", { field: "query" });
  }
  for (const statement of statements) {
    const first = statement.split(/\s+/, 1)[0]?.toUpperCase();
    if (first !== "SELECT" && first !== "WITH") {
      throw new ToolInputError("Only SELECT queries run without allowWrite", { field: "query", code: "WRITE_NOT_ALLOWED" });
    }
    const write = WRITE_KEYWORDS.exec(statement);
    if (write) {
      throw new ToolInputError(`Query contains ${write[1]?.toUpperCase()}; pass allowWrite to run it`, {
        field: "query",
        code: "WRITE_NOT_ALLOWED",
      });
    }
  }
}

export function serverHost(server: string): string {
  return server.includes(".") ? server : `${server}.database.windows.net`;
}

function splitTableName(table: string): { schema?: string; name: string } {
  const parts = table.split(".").map((p) => p.replace(/^\[|\]$/g, ""));
  if (parts.length === 2 && parts[0] && parts[1]) return { schema: parts[0], name: parts[1] };
  return { name: table };
}

export type SqlQueryRunnerOptions = {
  maxRows?: number;
  timeoutMs?: number;
};

export class AzureSqlQueryRunner {
  private credentials: AzureCredentialProvider;
  private maxRows: number;
  private timeoutMs: number;

  constructor(credentials: AzureCredentialProvider, options: SqlQueryRunnerOptions = {}) {
    this.credentials = credentials;
    this.maxRows = options.maxRows ?? DEFAULT_MAX_ROWS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  private async withPool<T>(server: string, database: string, fn: (pool: sql.ConnectionPool) => Promise<T>): Promise<T> {
    const { credential } = await this.credentials.getCredential();
    const token = await credential.getToken(SQL_SCOPE);
    if (!token) throw new ToolInputError("Could not acquire a token for Azure SQL", { code: "TOKEN_UNAVAILABLE" });

    const pool = new sql.ConnectionPool({
      server: serverHost(server),
      database,
      authentication: { type: "azure-active-directory-access-token", options: { token: token.token } },
      options: { encrypt: true, trustServerCertificate: false },
      requestTimeout: this.timeoutMs,
      connectionTimeout: this.timeoutMs,
    });
    await pool.connect();
    try {
      return await fn(pool);
    } finally {
      await pool.close();
    }
  }

  async testConnection(server: string, database: string): Promise<{ connected: boolean; version?: string; error?: string }> {
    try {
      return await this.withPool(server, database, async (pool) => {
        const result = await pool.request().query<{ version: string }>("SELECT @@VERSION AS version");
        return { connected: true, version: result.recordset[0]?.version };
      });
    } catch (error) {
      if (error instanceof ToolInputError) throw error;
      return { connected: false, error: errorMessage(error) };
    }
  }

  async executeQuery(
    server: string,
    database: string,
    query: string,
    options: { maxRows?: number; allowWrite?: boolean } = {},
  ): Promise<SqlQueryResult> {
    if (!options.allowWrite) assertReadOnly(query);
    const maxRows = options.maxRows ?? this.maxRows;
    const started = Date.now();
    return this.withPool(server, database, async (pool) => {
      const result = await pool.request().query<Record<string, unknown>>(query);
      // Statements that return no result set leave recordset undefined.
      const columns = result.recordset?.columns;
      const recordset: Array<Record<string, unknown>> = result.recordset ?? [];
      return {
        columns: columns ? Object.keys(columns) : Object.keys(recordset[0] ?? {}),
        rows: recordset.slice(0, maxRows),
        rowCount: recordset.length,
        truncated: recordset.length > maxRows,
        rowsAffected: result.rowsAffected,
        durationMs: Date.now() - started,
      };
    });
  }

  async executeNonQuery(server: string, database: string, statement: string): Promise<{ rowsAffected: number; durationMs: number }> {
    const started = Date.now();
    return this.withPool(server, database, async (pool) => {
      const result = await pool.request().query(statement);
      return {
        rowsAffected: result.rowsAffected.reduce((sum, n) => sum + n, 0),
        durationMs: Date.now() - started,
      };
    });
  }

  /** Tables in the database, or the columns of one table. */
  async getSchema(server: string, database: string, table?: string): Promise<Record<string, unknown>> {
    return this.withPool(server, database, async (pool) => {
      if (!table) {
        const result = await pool
          .request()
          .query<Record<string, unknown>>(
            "SELECT TABLE_SCHEMA AS [schema], TABLE_NAME AS [name], TABLE_TYPE AS [type] FROM INFORMATION_SCHEMA.TABLES ORDER BY TABLE_SCHEMA, TABLE_NAME",
          );
        return { tables: result.recordset, count: result.recordset.length };
      }

      const { schema, name } = splitTableName(table);
      const request = pool.request().input("table", sql.NVarChar, name);
      let filter = "TABLE_NAME = @table";
      if (schema) {
        request.input("schema", sql.NVarChar, schema);
        filter += " AND TABLE_SCHEMA = @schema";
      }
      const result = await request.query<Record<string, unknown>>(
        `SELECT TABLE_SCHEMA AS [schema], COLUMN_NAME AS [column], DATA_TYPE AS [dataType], IS_NULLABLE AS [nullable], ` +
          `CHARACTER_MAXIMUM_LENGTH AS [maxLength], COLUMN_DEFAULT AS [defaultValue] ` +
          `FROM INFORMATION_SCHEMA.COLUMNS WHERE ${filter} ORDER BY ORDINAL_POSITION`,
      );
      return { table, columns: result.recordset, count: result.recordset.length };
    });
  }
}
