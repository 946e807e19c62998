/**
 * Azure Key Vault Manager
 *
 * Vault inventory through @azure/arm-keyvault.
 */

import type { Vault } from "@azure/arm-keyvault";
import { NotFoundError } from "../../../../src/index.js";
import { collectAll } from "../pagination.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { resourceGroupFromId, type AzureCredentialProvider, type AzureRetryOptions } from "../types.js";
import type { KeyVaultInfo } from "./types.js";

function mapVault(v: Vault): KeyVaultInfo {
  return {
    id: v.id ?? "",
    name: v.name ?? "",
    resourceGroup: resourceGroupFromId(v.id),
    location: v.location ?? "",
    vaultUri: v.properties.vaultUri,
    tenantId: v.properties.tenantId,
    sku: v.properties.sku.name,
    enableSoftDelete: v.properties.enableSoftDelete,
    enablePurgeProtection: v.properties.enablePurgeProtection,
    enableRbacAuthorization: v.properties.enableRbacAuthorization,
    softDeleteRetentionInDays: v.properties.softDeleteRetentionInDays,
    tags: v.tags ?? {},
  };
}

export class AzureKeyVaultManager {
  private credentials: AzureCredentialProvider;
  private subscriptionId: string;
  private retryOptions?: AzureRetryOptions;

  constructor(credentials: AzureCredentialProvider, subscriptionId: string, retryOptions?: AzureRetryOptions) {
    this.credentials = credentials;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions;
  }

  private async getClient() {
    const { KeyVaultManagementClient } = await import("@azure/arm-keyvault");
    const { credential } = await this.credentials.getCredential();
    return new KeyVaultManagementClient(credential, this.subscriptionId);
  }

  async listVaults(resourceGroup?: string): Promise<KeyVaultInfo[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup ? client.vaults.listByResourceGroup(resourceGroup) : client.vaults.listBySubscription(),
          mapVault,
        ),
      this.retryOptions,
    );
  }

  async getVault(resourceGroup: string, vaultName: string): Promise<KeyVaultInfo> {
    const client = await this.getClient();
    const vault = await getOrNull(() => client.vaults.get(resourceGroup, vaultName), this.retryOptions);
    if (!vault) throw new NotFoundError("Key vault", vaultName);
    return mapVault(vault);
  }
}
