/**
 * Key Vault data plane: secrets via @azure/keyvault-secrets and key
 * metadata via @azure/keyvault-keys. Key material is never returned.
 */

import type { KeyClient, KeyProperties } from "@azure/keyvault-keys";
import type { SecretClient, SecretProperties } from "@azure/keyvault-secrets";
import { NotFoundError, ToolInputError } from "../../../../src/index.js";
import { collectAll } from "../pagination.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { iso, type AzureCredentialProvider, type AzureRetryOptions } from "../types.js";
import type { DeletedSecretInfo, KeyInfo, SecretInfo, SecretWithValue, SetSecretOptions } from "./types.js";

const VAULT_NAME = /^[a-zA-Z][a-zA-Z0-9-]{1,22}[a-zA-Z0-9]$/;

/** Accepts a vault name or its full URL. */
export function vaultUrl(vault: string): string {
  if (vault.startsWith("https://")) return vault.replace(/\/+$/, "");
  if (!VAULT_NAME.test(vault)) {
    throw new ToolInputError(`Invalid key vault name: ${vault}`, { field: "vaultName" });
  }
  return `https://${vault}.vault.azure.net`;
}

function mapSecret(p: SecretProperties): SecretInfo {
  return {
    name: p.name,
    id: p.id,
    version: p.version,
    enabled: p.enabled,
    contentType: p.contentType,
    notBefore: iso(p.notBefore),
    expiresOn: iso(p.expiresOn),
    createdOn: iso(p.createdOn),
    updatedOn: iso(p.updatedOn),
    tags: p.tags,
  };
}

function mapKeyProperties(p: KeyProperties): KeyInfo {
  return {
    name: p.name,
    id: p.id,
    version: p.version,
    enabled: p.enabled,
    createdOn: iso(p.createdOn),
    updatedOn: iso(p.updatedOn),
    expiresOn: iso(p.expiresOn),
    tags: p.tags,
  };
}

export class AzureKeyVaultDataManager {
  private credentials: AzureCredentialProvider;
  private retryOptions?: AzureRetryOptions;
  private secretClients = new Map<string, SecretClient>();
  private keyClients = new Map<string, KeyClient>();

  constructor(credentials: AzureCredentialProvider, retryOptions?: AzureRetryOptions) {
    this.credentials = credentials;
    this.retryOptions = retryOptions;
  }

  private async secrets(vault: string): Promise<SecretClient> {
    const url = vaultUrl(vault);
    const cached = this.secretClients.get(url);
    if (cached) return cached;
    const { SecretClient } = await import("@azure/keyvault-secrets");
    const { credential } = await this.credentials.getCredential();
    const client = new SecretClient(url, credential);
    this.secretClients.set(url, client);
    return client;
  }

  private async keys(vault: string): Promise<KeyClient> {
    const url = vaultUrl(vault);
    const cached = this.keyClients.get(url);
    if (cached) return cached;
    const { KeyClient } = await import("@azure/keyvault-keys");
    const { credential } = await this.credentials.getCredential();
    const client = new KeyClient(url, credential);
    this.keyClients.set(url, client);
    return client;
  }

  // ---------------------------------------------------------------------------
  // Secrets
  // ---------------------------------------------------------------------------

  async listSecrets(vault: string): Promise<SecretInfo[]> {
    const client = await this.secrets(vault);
    return withAzureRetry(() => collectAll(client.listPropertiesOfSecrets(), mapSecret), this.retryOptions);
  }

  async getSecret(vault: string, name: string, version?: string): Promise<SecretWithValue> {
    const client = await this.secrets(vault);
    const secret = await getOrNull(() => client.getSecret(name, { version }), this.retryOptions);
    if (!secret) throw new NotFoundError("Secret", name, `Secret ${name} not found in vault ${vault}`);
    return { ...mapSecret(secret.properties), value: secret.value };
  }

  async setSecret(vault: string, name: string, value: string, options: SetSecretOptions = {}): Promise<SecretInfo> {
    const client = await this.secrets(vault);
    const secret = await withAzureRetry(() => client.setSecret(name, value, options), this.retryOptions);
    return mapSecret(secret.properties);
  }

  /** Soft delete; the secret stays recoverable for the vault's retention period. */
  async deleteSecret(vault: string, name: string): Promise<DeletedSecretInfo> {
    const client = await this.secrets(vault);
    const deleted = await withAzureRetry(async () => {
      const poller = await client.beginDeleteSecret(name);
      return poller.pollUntilDone();
    }, this.retryOptions);
    return {
      ...mapSecret(deleted.properties),
      recoveryId: deleted.properties.recoveryId,
      deletedOn: iso(deleted.properties.deletedOn),
      scheduledPurgeDate: iso(deleted.properties.scheduledPurgeDate),
    };
  }

  async listSecretVersions(vault: string, name: string): Promise<SecretInfo[]> {
    const client = await this.secrets(vault);
    const versions = await withAzureRetry(
      () => collectAll(client.listPropertiesOfSecretVersions(name), mapSecret),
      this.retryOptions,
    );
    return versions.sort((a, b) => (b.createdOn ?? "").localeCompare(a.createdOn ?? ""));
  }

  async listDeletedSecrets(vault: string): Promise<DeletedSecretInfo[]> {
    const client = await this.secrets(vault);
    return withAzureRetry(
      () =>
        collectAll(client.listDeletedSecrets(), (d) => ({
          ...mapSecret(d.properties),
          recoveryId: d.properties.recoveryId,
          deletedOn: iso(d.properties.deletedOn),
          scheduledPurgeDate: iso(d.properties.scheduledPurgeDate),
        })),
      this.retryOptions,
    );
  }

  /** Metadata of one soft-deleted secret; the value is not returned. */
  async getDeletedSecret(vault: string, name: string): Promise<DeletedSecretInfo> {
    const client = await this.secrets(vault);
    const deleted = await getOrNull(() => client.getDeletedSecret(name), this.retryOptions);
    if (!deleted) throw new NotFoundError("Deleted secret", name);
    return {
      ...mapSecret(deleted.properties),
      recoveryId: deleted.properties.recoveryId,
      deletedOn: iso(deleted.properties.deletedOn),
      scheduledPurgeDate: iso(deleted.properties.scheduledPurgeDate),
    };
  }

  async recoverDeletedSecret(vault: string, name: string): Promise<SecretInfo> {
    const client = await this.secrets(vault);
    const recovered = await withAzureRetry(async () => {
      const poller = await client.beginRecoverDeletedSecret(name);
      return poller.pollUntilDone();
    }, this.retryOptions);
    return mapSecret(recovered);
  }

  /** Permanent. Fails on vaults with purge protection. */
  async purgeDeletedSecret(vault: string, name: string): Promise<void> {
    const client = await this.secrets(vault);
    await withAzureRetry(() => client.purgeDeletedSecret(name), this.retryOptions);
  }

  /** Updates the latest version unless one is named. */
  async updateSecretProperties(
    vault: string,
    name: string,
    changes: { enabled?: boolean; contentType?: string; tags?: Record<string, string>; expiresOn?: Date },
    version?: string,
  ): Promise<SecretInfo> {
    const client = await this.secrets(vault);
    const target = version ?? (await this.getSecret(vault, name)).version;
    if (!target) throw new NotFoundError("Secret", name, `Secret ${name} has no current version in vault ${vault}`);
    const updated = await withAzureRetry(() => client.updateSecretProperties(name, target, changes), this.retryOptions);
    return mapSecret(updated);
  }

  // ---------------------------------------------------------------------------
  // Keys
  // ---------------------------------------------------------------------------

  async listKeys(vault: string): Promise<KeyInfo[]> {
    const client = await this.keys(vault);
    return withAzureRetry(() => collectAll(client.listPropertiesOfKeys(), mapKeyProperties), this.retryOptions);
  }

  async getKey(vault: string, name: string, version?: string): Promise<KeyInfo> {
    const client = await this.keys(vault);
    const key = await getOrNull(() => client.getKey(name, { version }), this.retryOptions);
    if (!key) throw new NotFoundError("Key", name, `Key ${name} not found in vault ${vault}`);
    return {
      ...mapKeyProperties(key.properties),
      keyType: key.keyType,
      keyOperations: key.keyOperations,
      curve: key.key?.crv,
    };
  }
}
