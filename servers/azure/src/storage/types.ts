/**
 * Azure Storage types.
 */

export type StorageAccount = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  kind?: string;
  sku?: string;
  accessTier?: string;
  provisioningState?: string;
  httpsOnly?: boolean;
  minimumTlsVersion?: string;
  allowBlobPublicAccess?: boolean;
  createdAt?: string;
  primaryEndpoints: { blob?: string; file?: string; queue?: string; table?: string; dfs?: string; web?: string };
  tags: Record<string, string>;
};

export type BlobContainerInfo = {
  name: string;
  lastModified?: string;
  publicAccess?: string;
  leaseState?: string;
  hasImmutabilityPolicy?: boolean;
  hasLegalHold?: boolean;
};

export type BlobInfo = {
  name: string;
  size?: number;
  contentType?: string;
  lastModified?: string;
  accessTier?: string;
  blobType?: string;
};

export type BlobProperties = BlobInfo & {
  etag?: string;
  contentMd5?: string;
  createdOn?: string;
  metadata: Record<string, string>;
  leaseState?: string;
  copyStatus?: string;
};

export type TextDownload = {
  content: string;
  size: number;
  bytesRead: number;
  truncated: boolean;
  contentType?: string;
};

export type FileShareInfo = {
  name: string;
  quotaGb?: number;
  lastModified?: string;
  accessTier?: string;
};

export type ShareEntry = {
  kind: "file" | "directory";
  name: string;
  size?: number;
};

export type ShareFileProperties = {
  path: string;
  size?: number;
  contentType?: string;
  lastModified?: string;
  etag?: string;
  metadata: Record<string, string>;
};
