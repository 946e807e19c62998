/**
 * S3 Manager
 *
 * Buckets, objects (text bodies), versions and presigned URLs.
 */

import {
  BucketLocationConstraint,
  CreateBucketCommand,
  DeleteBucketCommand,
  DeleteObjectCommand,
  GetBucketVersioningCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListBucketsCommand,
  ListObjectVersionsCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  type GetObjectCommandOutput,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { ToolInputError } from "../../../../src/index.js";
import { isAwsServiceError, withAwsRetry } from "../retry.js";
import type { AwsManagerOptions } from "../types.js";
import {
  MAX_PRESIGN_SECONDS,
  type S3BucketSummary,
  type S3ListObjectsResult,
  type S3ObjectContent,
  type S3ObjectVersion,
  type S3PresignOperation,
  type S3PresignedUrl,
  type S3PutObjectOptions,
} from "./types.js";

const NOT_FOUND_NAMES = new Set(["NotFound", "NoSuchBucket", "NoSuchKey"]);

export function isS3NotFound(error: unknown): boolean {
  return isAwsServiceError(error) && (NOT_FOUND_NAMES.has(error.name) || error.$metadata?.httpStatusCode === 404);
}

/** Total object size from a `Content-Range: bytes 0-99/1234` header. */
export function parseContentRangeTotal(contentRange: string | undefined): number | undefined {
  const match = contentRange ? /\/(\d+)$/.exec(contentRange) : null;
  return match ? Number(match[1]) : undefined;
}

export class S3Manager {
  private readonly client: S3Client;
  private readonly options: AwsManagerOptions;

  constructor(options: AwsManagerOptions) {
    this.options = options;
    this.client = new S3Client({ region: options.region, credentials: options.credentials });
  }

  private send<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withAwsRetry(fn, { label, retry: this.options.retry });
  }

  destroy(): void {
    this.client.destroy();
  }

  // ===========================================================================
  // Buckets
  // ===========================================================================

  async listBuckets(): Promise<S3BucketSummary[]> {
    const response = await this.send("ListBuckets", () => this.client.send(new ListBucketsCommand({})));
    return (response.Buckets ?? []).map((bucket) => ({
      name: bucket.Name ?? "",
      createdAt: bucket.CreationDate?.toISOString(),
    }));
  }

  async bucketExists(bucket: string): Promise<boolean> {
    try {
      await this.send("HeadBucket", () => this.client.send(new HeadBucketCommand({ Bucket: bucket })));
      return true;
    } catch (error) {
      if (isS3NotFound(error)) return false;
      throw error;
    }
  }

  /**
   * Create a bucket. us-east-1 takes no LocationConstraint.
   */
  async createBucket(bucket: string, region?: string): Promise<{ bucket: string; region: string }> {
    const target = region || this.options.region;
    let configuration: { LocationConstraint: BucketLocationConstraint } | undefined;
    if (target !== "us-east-1") {
      const constraint = Object.values(BucketLocationConstraint).find((value) => value === target);
      if (!constraint) throw new ToolInputError(`Unsupported bucket region '${target}'`, { field: "region" });
      configuration = { LocationConstraint: constraint };
    }
    await this.send("CreateBucket", () =>
      this.client.send(new CreateBucketCommand({ Bucket: bucket, CreateBucketConfiguration: configuration })),
    );
    return { bucket, region: target };
  }

  async deleteBucket(bucket: string): Promise<void> {
    await this.send("DeleteBucket", () => this.client.send(new DeleteBucketCommand({ Bucket: bucket })));
  }

  async getBucketVersioning(bucket: string): Promise<{ status: string; mfaDelete?: string }> {
    const response = await this.send("GetBucketVersioning", () =>
      this.client.send(new GetBucketVersioningCommand({ Bucket: bucket })),
    );
    return { status: response.Status ?? "Unversioned", mfaDelete: response.MFADelete };
  }

  // ===========================================================================
  // Objects
  // ===========================================================================

  async listObjects(
    bucket: string,
    options: { prefix?: string; delimiter?: string; maxKeys?: number; continuationToken?: string } = {},
  ): Promise<S3ListObjectsResult> {
    const response = await this.send("ListObjectsV2", () =>
      this.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: options.prefix,
          Delimiter: options.delimiter,
          MaxKeys: options.maxKeys ?? 1000,
          ContinuationToken: options.continuationToken,
        }),
      ),
    );
    return {
      bucket,
      prefix: options.prefix,
      objects: (response.Contents ?? []).map((object) => ({
        key: object.Key ?? "",
        size: object.Size,
        lastModified: object.LastModified?.toISOString(),
        eTag: object.ETag,
        storageClass: object.StorageClass,
      })),
      commonPrefixes: (response.CommonPrefixes ?? []).map((p) => p.Prefix ?? ""),
      isTruncated: response.IsTruncated ?? false,
      nextContinuationToken: response.NextContinuationToken,
    };
  }

  /**
   * Read an object as UTF-8 text, at most `maxBytes` of it.
   */
  async getObject(bucket: string, key: string, maxBytes = 1_048_576): Promise<S3ObjectContent> {
    const get = (range?: string) =>
      this.send("GetObject", () => this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key, Range: range })));
    let response: GetObjectCommandOutput;
    try {
      response = await get(`bytes=0-${maxBytes - 1}`);
    } catch (error) {
      // zero-byte objects reject any range
      if (!isAwsServiceError(error) || error.name !== "InvalidRange") throw error;
      response = await get();
    }
    const bytes = response.Body ? await response.Body.transformToByteArray() : new Uint8Array();
    const totalSize = parseContentRangeTotal(response.ContentRange) ?? response.ContentLength;
    return {
      bucket,
      key,
      content: Buffer.from(bytes).toString("utf8"),
      contentType: response.ContentType,
      contentLength: bytes.byteLength,
      totalSize,
      truncated: totalSize !== undefined && totalSize > bytes.byteLength,
      lastModified: response.LastModified?.toISOString(),
      eTag: response.ETag,
      metadata: response.Metadata ?? {},
    };
  }

  async putObject(options: S3PutObjectOptions): Promise<{ bucket: string; key: string; eTag?: string; versionId?: string }> {
    const response = await this.send("PutObject", () =>
      this.client.send(
        new PutObjectCommand({
          Bucket: options.bucket,
          Key: options.key,
          Body: options.content,
          ContentType: options.contentType ?? "text/plain; charset=utf-8",
          Metadata: options.metadata,
        }),
      ),
    );
    return { bucket: options.bucket, key: options.key, eTag: response.ETag, versionId: response.VersionId };
  }

  async deleteObject(bucket: string, key: string, versionId?: string): Promise<void> {
    await this.send("DeleteObject", () =>
      this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key, VersionId: versionId })),
    );
  }

  async objectExists(bucket: string, key: string): Promise<{ exists: boolean; size?: number; lastModified?: string }> {
    try {
      const response = await this.send("HeadObject", () =>
        this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key })),
      );
      return { exists: true, size: response.ContentLength, lastModified: response.LastModified?.toISOString() };
    } catch (error) {
      if (isS3NotFound(error)) return { exists: false };
      throw error;
    }
  }

  async listObjectVersions(
    bucket: string,
    options: { prefix?: string; maxKeys?: number } = {},
  ): Promise<{ versions: S3ObjectVersion[]; isTruncated: boolean }> {
    const response = await this.send("ListObjectVersions", () =>
      this.client.send(
        new ListObjectVersionsCommand({ Bucket: bucket, Prefix: options.prefix, MaxKeys: options.maxKeys ?? 1000 }),
      ),
    );
    const versions: S3ObjectVersion[] = [
      ...(response.Versions ?? []).map((v) => ({
        key: v.Key ?? "",
        versionId: v.VersionId,
        isLatest: v.IsLatest ?? false,
        isDeleteMarker: false,
        size: v.Size,
        lastModified: v.LastModified?.toISOString(),
      })),
      ...(response.DeleteMarkers ?? []).map((m) => ({
        key: m.Key ?? "",
        versionId: m.VersionId,
        isLatest: m.IsLatest ?? false,
        isDeleteMarker: true,
        lastModified: m.LastModified?.toISOString(),
      })),
    ];
    versions.sort((a, b) => a.key.localeCompare(b.key) || (b.lastModified ?? "").localeCompare(a.lastModified ?? ""));
    return { versions, isTruncated: response.IsTruncated ?? false };
  }

  // ===========================================================================
  // Presigned URLs
  // ===========================================================================

  async generatePresignedUrl(
    bucket: string,
    key: string,
    options: { operation?: S3PresignOperation; expiresInSeconds?: number; contentType?: string; now?: Date } = {},
  ): Promise<S3PresignedUrl> {
    const operation = options.operation ?? "GET";
    const expiresIn = options.expiresInSeconds ?? 3600;
    if (expiresIn < 1 || expiresIn > MAX_PRESIGN_SECONDS) {
      throw new ToolInputError(`expiresInSeconds must be between 1 and ${MAX_PRESIGN_SECONDS}`, {
        field: "expiresInSeconds",
      });
    }

    const url =
      operation === "GET"
        ? await getSignedUrl(this.client, new GetObjectCommand({ Bucket: bucket, Key: key }), { expiresIn })
        : await getSignedUrl(
            this.client,
            new PutObjectCommand({ Bucket: bucket, Key: key, ContentType: options.contentType }),
            { expiresIn },
          );
    const now = options.now ?? new Date();
    return {
      url,
      operation,
      expiresInSeconds: expiresIn,
      expiresAt: new Date(now.getTime() + expiresIn * 1000).toISOString(),
    };
  }
}
