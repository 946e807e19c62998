/**
 * S3 types.
 */

export type S3BucketSummary = {
  name: string;
  createdAt?: string;
};

export type S3ObjectSummary = {
  key: string;
  size?: number;
  lastModified?: string;
  eTag?: string;
  storageClass?: string;
};

export type S3ListObjectsResult = {
  bucket: string;
  prefix?: string;
  objects: S3ObjectSummary[];
  commonPrefixes: string[];
  isTruncated: boolean;
  nextContinuationToken?: string;
};

export type S3ObjectContent = {
  bucket: string;
  key: string;
  content: string;
  contentType?: string;
  contentLength?: number;
  totalSize?: number;
  truncated: boolean;
  lastModified?: string;
  eTag?: string;
  metadata: Record<string, string>;
};

export type S3PutObjectOptions = {
  bucket: string;
  key: string;
  content: string;
  contentType?: string;
  metadata?: Record<string, string>;
};

export type S3PresignOperation = "GET" | "PUT";

export type S3PresignedUrl = {
  url: string;
  operation: S3PresignOperation;
  expiresInSeconds: number;
  expiresAt: string;
};

export type S3ObjectVersion = {
  key: string;
  versionId?: string;
  isLatest: boolean;
  isDeleteMarker: boolean;
  size?: number;
  lastModified?: string;
};

/** SigV4 presigned URLs are valid for at most seven days. */
export const MAX_PRESIGN_SECONDS = 604_800;
