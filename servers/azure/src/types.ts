/**
 * Shared Azure server types.
 */

import type { TokenCredential } from "@azure/identity";
import type { AzureCredentialMethod, RetryPolicy } from "../../../src/index.js";

export type AzureRetryOptions = Partial<RetryPolicy>;

export type AzureCredentialResult = {
  credential: TokenCredential;
  method: AzureCredentialMethod;
  tenantId?: string;
};

/** What managers need from the credentials manager. */
export interface AzureCredentialProvider {
  getCredential(): Promise<AzureCredentialResult>;
}

export type AzurePaginationOptions = {
  limit?: number;
  offset?: number;
};

export type AzurePagedResult<T> = {
  items: T[];
  hasMore: boolean;
  /** Only known when the iterator was exhausted. */
  totalCount?: number;
};

export type AzureResourceRef = {
  id: string;
  name: string;
  resourceGroup: string;
  location?: string;
  tags?: Record<string, string>;
};

/**
 * Resource group segment of an ARM id, or "" when the id has none.
 */
export function resourceGroupFromId(id: string | undefined): string {
  return /\/resourceGroups\/([^/]+)/i.exec(id ?? "")?.[1] ?? "";
}

export function iso(date: Date | undefined): string | undefined {
  return date?.toISOString();
}
