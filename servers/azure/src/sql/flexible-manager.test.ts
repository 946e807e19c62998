import { beforeEach, describe, expect, it, vi } from "vitest";
import { NotFoundError } from "../../../../src/index.js";
import { NO_RETRY, asyncIter, fakeCredentials, restError } from "../testing.js";

const { pgServers, pgDatabases, mySqlServers, mySqlDatabases } = vi.hoisted(() => ({
  pgServers: { list: vi.fn(), listByResourceGroup: vi.fn(), get: vi.fn() },
  pgDatabases: { listByServer: vi.fn() },
  mySqlServers: { list: vi.fn(), listByResourceGroup: vi.fn(), get: vi.fn() },
  mySqlDatabases: { listByServer: vi.fn() },
}));

vi.mock("@azure/arm-postgresql-flexible", () => ({
  PostgreSQLManagementFlexibleServerClient: vi.fn().mockImplementation(() => ({ servers: pgServers, databases: pgDatabases })),
}));
vi.mock("@azure/arm-mysql-flexible", () => ({
  MySQLManagementFlexibleServerClient: vi.fn().mockImplementation(() => ({ servers: mySqlServers, databases: mySqlDatabases })),
}));

import { AzureFlexibleServerManager } from "./flexible-manager.js";

const pgServer = {
  id: "/subscriptions/sub-1/resourceGroups/rg-data/providers/Microsoft.DBforPostgreSQL/flexibleServers/orders-pg",
  name: "orders-pg",
  location: "westeurope",
  state: "Ready",
  version: "16",
  sku: { name: "Standard_D2ds_v5", tier: "GeneralPurpose" },
  administratorLogin: "pgadmin",
  fullyQualifiedDomainName: "orders-pg.postgres.database.azure.com",
  storage: { storageSizeGB: 128 },
  backup: { backupRetentionDays: 7 },
  highAvailability: { mode: "ZoneRedundant" },
};

describe("AzureFlexibleServerManager", () => {
  let manager: AzureFlexibleServerManager;

  beforeEach(() => {
    vi.clearAllMocks();
    manager = new AzureFlexibleServerManager(fakeCredentials, "sub-1", NO_RETRY);
  });

  it("maps PostgreSQL servers across the subscription", async () => {
    pgServers.list.mockReturnValue(asyncIter([pgServer]));
    expect(await manager.listServers("postgresql")).toEqual([
      {
        id: pgServer.id,
        name: "orders-pg",
        engine: "postgresql",
        resourceGroup: "rg-data",
        location: "westeurope",
        state: "Ready",
        version: "16",
        skuName: "Standard_D2ds_v5",
        skuTier: "GeneralPurpose",
        administratorLogin: "pgadmin",
        fullyQualifiedDomainName: "orders-pg.postgres.database.azure.com",
        storageGB: 128,
        backupRetentionDays: 7,
        highAvailability: "ZoneRedundant",
        tags: {},
      },
    ]);
    expect(mySqlServers.list).not.toHaveBeenCalled();
  });

  it("lists MySQL servers of one resource group", async () => {
    mySqlServers.listByResourceGroup.mockReturnValue(asyncIter([{ name: "shop-mysql", location: "eastus", version: "8.0.21" }]));
    const servers = await manager.listServers("mysql", "rg-shop");
    expect(mySqlServers.listByResourceGroup).toHaveBeenCalledWith("rg-shop");
    expect(servers).toMatchObject([{ name: "shop-mysql", engine: "mysql", version: "8.0.21" }]);
  });

  it("lists databases with charset and collation", async () => {
    mySqlDatabases.listByServer.mockReturnValue(
      asyncIter([{ id: "db-1", name: "shop", charset: "utf8mb4", collation: "utf8mb4_0900_ai_ci" }]),
    );
    expect(await manager.listDatabases("mysql", "rg-shop", "shop-mysql")).toEqual([
      { id: "db-1", name: "shop", charset: "utf8mb4", collation: "utf8mb4_0900_ai_ci" },
    ]);
  });

  it("names the engine when a server is missing", async () => {
    pgServers.get.mockRejectedValue(restError(404, "ResourceNotFound"));
    const error = await manager.getServer("postgresql", "rg-data", "gone").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ message: "PostgreSQL server 'gone' not found" });
  });
});
