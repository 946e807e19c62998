/**
 * Key Vault types.
 */

export type KeyVaultInfo = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  vaultUri?: string;
  tenantId?: string;
  sku?: string;
  enableSoftDelete?: boolean;
  enablePurgeProtection?: boolean;
  enableRbacAuthorization?: boolean;
  softDeleteRetentionInDays?: number;
  tags: Record<string, string>;
};

export type SecretInfo = {
  name: string;
  id?: string;
  version?: string;
  enabled?: boolean;
  contentType?: string;
  notBefore?: string;
  expiresOn?: string;
  createdOn?: string;
  updatedOn?: string;
  tags?: Record<string, string>;
};

export type SecretWithValue = SecretInfo & { value?: string };

export type DeletedSecretInfo = SecretInfo & {
  recoveryId?: string;
  deletedOn?: string;
  scheduledPurgeDate?: string;
};

export type SetSecretOptions = {
  contentType?: string;
  expiresOn?: Date;
  notBefore?: Date;
  enabled?: boolean;
  tags?: Record<string, string>;
};

export type KeyInfo = {
  name: string;
  id?: string;
  version?: string;
  keyType?: string;
  keyOperations?: string[];
  curve?: string;
  enabled?: boolean;
  createdOn?: string;
  updatedOn?: string;
  expiresOn?: string;
  tags?: Record<string, string>;
};
