import { beforeEach, describe, expect, it, vi } from "vitest";
import { NotFoundError, ToolInputError } from "../../../../src/index.js";
import { NO_RETRY, asyncIter, fakeCredentials, restError } from "../testing.js";

const { mockSecrets, mockKeys, SecretClient } = vi.hoisted(() => {
  const mockSecrets = {
    listPropertiesOfSecrets: vi.fn(),
    listPropertiesOfSecretVersions: vi.fn(),
    listDeletedSecrets: vi.fn(),
    getDeletedSecret: vi.fn(),
    getSecret: vi.fn(),
    setSecret: vi.fn(),
    beginDeleteSecret: vi.fn(),
    beginRecoverDeletedSecret: vi.fn(),
    purgeDeletedSecret: vi.fn(),
    updateSecretProperties: vi.fn(),
  };
  return { mockSecrets, mockKeys: { listPropertiesOfKeys: vi.fn(), getKey: vi.fn() }, SecretClient: vi.fn().mockImplementation(() => mockSecrets) };
});

vi.mock("@azure/keyvault-secrets", () => ({ SecretClient }));
vi.mock("@azure/keyvault-keys", () => ({ KeyClient: vi.fn().mockImplementation(() => mockKeys) }));

import { AzureKeyVaultDataManager, vaultUrl } from "./data-manager.js";

const created = new Date("2024-03-01T10:00:00Z");

describe("vaultUrl", () => {
  it("builds the vault URL from a name", () => {
    expect(vaultUrl("kv-prod")).toBe("https://kv-prod.vault.azure.net");
    expect(vaultUrl("https://kv-prod.vault.azure.net/")).toBe("https://kv-prod.vault.azure.net");
  });

  it("rejects invalid names", () => {
    expect(() => vaultUrl("kv_prod")).toThrow(ToolInputError);
  });
});

describe("AzureKeyVaultDataManager", () => {
  let manager: AzureKeyVaultDataManager;

  beforeEach(() => {
    vi.clearAllMocks();
    manager = new AzureKeyVaultDataManager(fakeCredentials, NO_RETRY);
  });

  it("reuses one client per vault", async () => {
    mockSecrets.listPropertiesOfSecrets.mockReturnValue(asyncIter([]));
    await manager.listSecrets("kv-prod");
    mockSecrets.listPropertiesOfSecrets.mockReturnValue(asyncIter([]));
    await manager.listSecrets("kv-prod");
    expect(SecretClient).toHaveBeenCalledTimes(1);
  });

  it("returns the secret value with its attributes", async () => {
    mockSecrets.getSecret.mockResolvedValue({
      name: "db-password",
      value: "test-secret",
      properties: { name: "db-password", version: "v2", enabled: true, createdOn: created },
    });

    const secret = await manager.getSecret("kv-prod", "db-password");

    expect(mockSecrets.getSecret).toHaveBeenCalledWith("db-password", { version: undefined });
    expect(secret).toMatchObject({ name: "db-password", value: "test-secret", version: "v2", createdOn: "2024-03-01T10:00:00.000Z" });
  });

  it("names the vault when a secret is missing", async () => {
    mockSecrets.getSecret.mockRejectedValue(restError(404, "SecretNotFound"));
    const error = await manager.getSecret("kv-prod", "gone").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toHaveProperty("message", "Secret gone not found in vault kv-prod");
  });

  it("waits for soft delete to finish", async () => {
    const purgeDate = new Date("2024-06-01T00:00:00Z");
    mockSecrets.beginDeleteSecret.mockResolvedValue({
      pollUntilDone: vi.fn().mockResolvedValue({
        name: "old",
        properties: { name: "old", recoveryId: "https://kv-prod.vault.azure.net/deletedsecrets/old", scheduledPurgeDate: purgeDate },
      }),
    });
    const deleted = await manager.deleteSecret("kv-prod", "old");
    expect(deleted).toMatchObject({ name: "old", scheduledPurgeDate: "2024-06-01T00:00:00.000Z" });
  });

  it("reads a deleted secret without its value", async () => {
    mockSecrets.getDeletedSecret.mockResolvedValue({
      name: "old",
      value: "test-secret",
      properties: {
        name: "old",
        vaultUrl: "https://kv-prod.vault.azure.net",
        recoveryId: "https://kv-prod.vault.azure.net/deletedsecrets/old",
        deletedOn: new Date("2024-05-01T00:00:00Z"),
        scheduledPurgeDate: new Date("2024-08-01T00:00:00Z"),
      },
    });
    const deleted = await manager.getDeletedSecret("kv-prod", "old");
    expect(mockSecrets.getDeletedSecret).toHaveBeenCalledWith("old");
    expect(deleted).toMatchObject({
      name: "old",
      recoveryId: "https://kv-prod.vault.azure.net/deletedsecrets/old",
      deletedOn: "2024-05-01T00:00:00.000Z",
      scheduledPurgeDate: "2024-08-01T00:00:00.000Z",
    });
    expect(Object.values(deleted)).not.toContain("test-secret");
  });

  it("reports a secret that is not soft-deleted", async () => {
    mockSecrets.getDeletedSecret.mockRejectedValue(restError(404, "SecretNotFound"));
    await expect(manager.getDeletedSecret("kv-prod", "live")).rejects.toThrow("Deleted secret 'live' not found");
  });

  it("updates the current version when none is given", async () => {
    mockSecrets.getSecret.mockResolvedValue({ name: "api", value: "test-secret", properties: { name: "api", version: "v7" } });
    mockSecrets.updateSecretProperties.mockResolvedValue({ name: "api", version: "v7", enabled: false });

    const updated = await manager.updateSecretProperties("kv-prod", "api", { enabled: false });

    expect(mockSecrets.updateSecretProperties).toHaveBeenCalledWith("api", "v7", { enabled: false });
    expect(updated.enabled).toBe(false);
  });

  it("sorts versions newest first", async () => {
    mockSecrets.listPropertiesOfSecretVersions.mockReturnValue(
      asyncIter([
        { name: "api", version: "v1", createdOn: new Date("2024-01-01T00:00:00Z") },
        { name: "api", version: "v2", createdOn: new Date("2024-02-01T00:00:00Z") },
      ]),
    );
    const versions = await manager.listSecretVersions("kv-prod", "api");
    expect(versions.map((v) => v.version)).toEqual(["v2", "v1"]);
  });

  it("returns key metadata without key material", async () => {
    mockKeys.getKey.mockResolvedValue({
      name: "signing",
      keyType: "EC",
      keyOperations: ["sign", "verify"],
      key: { kty: "EC", crv: "P-256", x: new Uint8Array([1]) },
      properties: { name: "signing", version: "k1", enabled: true },
    });
    const key = await manager.getKey("kv-prod", "signing");
    expect(key).toEqual({
      name: "signing",
      id: undefined,
      version: "k1",
      enabled: true,
      createdOn: undefined,
      updatedOn: undefined,
      expiresOn: undefined,
      tags: undefined,
      keyType: "EC",
      keyOperations: ["sign", "verify"],
      curve: "P-256",
    });
  });
});
