/**
 * Azure Storage account manager (@azure/arm-storage).
 */

import type { StorageAccount as SdkStorageAccount } from "@azure/arm-storage";
import { NotFoundError } from "../../../../src/index.js";
import { collectAll } from "../pagination.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { iso, resourceGroupFromId, type AzureCredentialProvider, type AzureRetryOptions } from "../types.js";
import type { StorageAccount } from "./types.js";

function mapAccount(a: SdkStorageAccount): StorageAccount {
  const endpoints = a.primaryEndpoints;
  return {
    id: a.id ?? "",
    name: a.name ?? "",
    resourceGroup: resourceGroupFromId(a.id),
    location: a.location,
    kind: a.kind,
    sku: a.sku?.name,
    accessTier: a.accessTier,
    provisioningState: a.provisioningState,
    httpsOnly: a.enableHttpsTrafficOnly,
    minimumTlsVersion: a.minimumTlsVersion,
    allowBlobPublicAccess: a.allowBlobPublicAccess,
    createdAt: iso(a.creationTime),
    primaryEndpoints: {
      blob: endpoints?.blob,
      file: endpoints?.file,
      queue: endpoints?.queue,
      table: endpoints?.table,
      dfs: endpoints?.dfs,
      web: endpoints?.web,
    },
    tags: a.tags ?? {},
  };
}

export class AzureStorageAccountManager {
  private credentials: AzureCredentialProvider;
  private subscriptionId: string;
  private retryOptions?: AzureRetryOptions;

  constructor(credentials: AzureCredentialProvider, subscriptionId: string, retryOptions?: AzureRetryOptions) {
    this.credentials = credentials;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions;
  }

  private async getStorageClient() {
    const { StorageManagementClient } = await import("@azure/arm-storage");
    const { credential } = await this.credentials.getCredential();
    return new StorageManagementClient(credential, this.subscriptionId);
  }

  async listStorageAccounts(resourceGroup?: string): Promise<StorageAccount[]> {
    const client = await this.getStorageClient();
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup ? client.storageAccounts.listByResourceGroup(resourceGroup) : client.storageAccounts.list(),
          mapAccount,
        ),
      this.retryOptions,
    );
  }

  async getStorageAccount(resourceGroup: string, name: string): Promise<StorageAccount> {
    const client = await this.getStorageClient();
    const account = await getOrNull(() => client.storageAccounts.getProperties(resourceGroup, name), this.retryOptions);
    if (!account) throw new NotFoundError("Storage account", name);
    return mapAccount(account);
  }

  /** Resource group of an account, found by listing the subscription. */
  async findResourceGroup(name: string): Promise<string> {
    const match = (await this.listStorageAccounts()).find((a) => a.name.toLowerCase() === name.toLowerCase());
    if (!match) throw new NotFoundError("Storage account", name);
    return match.resourceGroup;
  }

  /** First account key; file share data calls authenticate with it. */
  async getAccountKey(name: string, resourceGroup?: string): Promise<string> {
    const group = resourceGroup ?? (await this.findResourceGroup(name));
    const client = await this.getStorageClient();
    const result = await withAzureRetry(() => client.storageAccounts.listKeys(group, name), this.retryOptions);
    const key = result.keys?.find((k) => k.value)?.value;
    if (!key) throw new NotFoundError("Account key", name, `Storage account '${name}' returned no keys`);
    return key;
  }
}
