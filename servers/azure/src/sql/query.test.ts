import { beforeEach, describe, expect, it, vi } from "vitest";
import { ToolInputError } from "../../../../src/index.js";
import { fakeCredentials } from "../testing.js";

const { mockPool, mockRequest, ConnectionPool } = vi.hoisted(() => {
  const mockRequest = { input: vi.fn(), query: vi.fn() };
  const mockPool = { connect: vi.fn(), close: vi.fn(), request: vi.fn() };
  return { mockPool, mockRequest, ConnectionPool: vi.fn().mockImplementation(() => mockPool) };
});

vi.mock("mssql", () => ({ default: { ConnectionPool, NVarChar: "nvarchar" } }));

import { AzureSqlQueryRunner, assertReadOnly, serverHost, stripSqlNoise } from "./query.js";

function recordset(rows: Array<Record<string, unknown>>, columns: string[]) {
  return Object.assign(rows, { columns: Object.fromEntries(columns.map((c) => [c, { name: c }])) });
}

describe("assertReadOnly", () => {
  it("accepts SELECT and WITH statements", () => {
    expect(() => assertReadOnly("SELECT 1; WITH x AS (SELECT 1 AS n) SELECT n FROM x;")).not.toThrow();
  });

  it("rejects data changes", () => {
    expect(() => assertReadOnly("DELETE FROM users")).toThrow("Only SELECT queries run without allowWrite");
  });

  it("rejects SELECT INTO", () => {
    expect(() => assertReadOnly("SELECT * INTO backup FROM users")).toThrow("Query contains INTO; pass allowWrite to run it");
  });

  it.each([
    ["SELECT 1 KILL 55", "KILL"],
    ["SELECT 1 WAITFOR DELAY '00:10:00'", "WAITFOR"],
    ["SELECT 1 DECLARE @x int SET @x = 1", "DECLARE"],
    ["SELECT 1 RECONFIGURE", "RECONFIGURE"],
    ["SELECT 1 CHECKPOINT", "CHECKPOINT"],
    ["SELECT 1 DISABLE TRIGGER ALL ON t", "DISABLE"],
    ["SELECT 1 USE master", "USE"],
  ])("rejects a second statement without a separator: %s", (query, keyword) => {
    expect(() => assertReadOnly(query)).toThrow(`Query contains ${keyword}; pass allowWrite to run it`);
  });

  it("does not treat OPENJSON as OPEN", () => {
    expect(() => assertReadOnly("SELECT value FROM OPENJSON(@doc)")).not.toThrow();
  });

  it("ignores keywords inside strings and comments", () => {
    expect(() => assertReadOnly("SELECT 'DROP TABLE x' AS s -- delete later\n FROM t /* update */")).not.toThrow();
  });

  it("rejects an empty query", () => {
    expect(() => assertReadOnly("  ;  ")).toThrow("query is empty");
  });
});

describe("stripSqlNoise", () => {
  it("blanks string literals and bracketed names", () => {
    expect(stripSqlNoise("SELECT [drop] FROM t WHERE a = N'it''s'")).toBe("SELECT [x] FROM t WHERE a = ''");
  });
});

describe("serverHost", () => {
  it("appends the Azure SQL domain to bare names", () => {
    expect(serverHost("orders")).toBe("orders.database.windows.net");
    expect(serverHost("orders.example.net")).toBe("orders.example.net");
  });
});

describe("AzureSqlQueryRunner", () => {
  let runner: AzureSqlQueryRunner;

  beforeEach(() => {
    vi.clearAllMocks();
    mockPool.connect.mockResolvedValue(mockPool);
    mockPool.close.mockResolvedValue(undefined);
    mockPool.request.mockReturnValue(mockRequest);
    mockRequest.input.mockReturnValue(mockRequest);
    runner = new AzureSqlQueryRunner(fakeCredentials);
  });

  it("connects with an access token and truncates rows", async () => {
    mockRequest.query.mockResolvedValue({ recordset: recordset([{ id: 1 }, { id: 2 }, { id: 3 }], ["id"]), rowsAffected: [3] });

    const result = await runner.executeQuery("orders", "app", "SELECT id FROM t", { maxRows: 2 });

    expect(ConnectionPool).toHaveBeenCalledWith(
      expect.objectContaining({
        server: "orders.database.windows.net",
        database: "app",
        authentication: { type: "azure-active-directory-access-token", options: { token: "test-token" } },
      }),
    );
    expect(result).toMatchObject({ columns: ["id"], rows: [{ id: 1 }, { id: 2 }], rowCount: 3, truncated: true });
    expect(mockPool.close).toHaveBeenCalledTimes(1);
  });

  it("refuses writes before connecting", async () => {
    await expect(runner.executeQuery("orders", "app", "UPDATE t SET a = 1")).rejects.toBeInstanceOf(ToolInputError);
    expect(ConnectionPool).not.toHaveBeenCalled();
  });

  it("closes the pool when the query fails", async () => {
    mockRequest.query.mockRejectedValue(new Error("Invalid object name 't'"));
    await expect(runner.executeQuery("orders", "app", "SELECT * FROM t")).rejects.toThrow("Invalid object name 't'");
    expect(mockPool.close).toHaveBeenCalledTimes(1);
  });

  it("sums affected rows for statements", async () => {
    mockRequest.query.mockResolvedValue({ recordset: undefined, rowsAffected: [2, 3] });
    const result = await runner.executeNonQuery("orders", "app", "UPDATE t SET a = 1; DELETE FROM u");
    expect(result.rowsAffected).toBe(5);
  });

  it("binds schema and table names as parameters", async () => {
    mockRequest.query.mockResolvedValue({ recordset: [{ column: "id" }], rowsAffected: [1] });

    const schema = await runner.getSchema("orders", "app", "dbo.users");

    expect(mockRequest.input).toHaveBeenCalledWith("table", "nvarchar", "users");
    expect(mockRequest.input).toHaveBeenCalledWith("schema", "nvarchar", "dbo");
    expect(schema).toEqual({ table: "dbo.users", columns: [{ column: "id" }], count: 1 });
  });

  it("reports failed connections", async () => {
    mockPool.connect.mockRejectedValue(new Error("Login failed for user"));
    expect(await runner.testConnection("orders", "app")).toEqual({ connected: false, error: "Login failed for user" });
  });
});
