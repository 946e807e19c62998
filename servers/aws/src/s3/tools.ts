/**
 * S3 tools.
 */

import { Type } from "@sinclair/typebox";
import { defineTool, parseStringMap, stringEnum, type ToolDefinition } from "../../../../src/index.js";
import type { AwsServerState } from "../state.js";
import { MAX_PRESIGN_SECONDS } from "./types.js";

const SERVICE = "s3";

const Bucket = Type.String({ minLength: 3, maxLength: 63, description: "Bucket name" });
const Key = Type.String({ minLength: 1, description: "Object key" });

export function createS3Tools(state: AwsServerState): ToolDefinition[] {
  return [
    defineTool({
      name: "aws_list_s3_buckets",
      label: "List S3 Buckets",
      description: "List all S3 buckets of the account.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        const buckets = await state.s3.listBuckets();
        return { buckets, count: buckets.length };
      },
    }),

    defineTool({
      name: "aws_list_s3_objects",
      label: "List S3 Objects",
      description: "List objects in a bucket, one page at a time.",
      service: SERVICE,
      parameters: Type.Object({
        bucket: Bucket,
        prefix: Type.Optional(Type.String()),
        delimiter: Type.Optional(Type.String({ description: 'Use "/" to list one folder level' })),
        maxKeys: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }),
        continuationToken: Type.Optional(Type.String()),
      }),
      async run(params) {
        const result = await state.s3.listObjects(params.bucket, params);
        return { ...result, count: result.objects.length };
      },
    }),

    defineTool({
      name: "aws_get_s3_object",
      label: "Get S3 Object",
      description: "Read an object as text; large objects are truncated to maxBytes.",
      service: SERVICE,
      parameters: Type.Object({
        bucket: Bucket,
        key: Key,
        maxBytes: Type.Integer({ minimum: 1, maximum: 10_485_760, default: 1_048_576 }),
      }),
      async run(params) {
        return { ...(await state.s3.getObject(params.bucket, params.key, params.maxBytes)) };
      },
    }),

    defineTool({
      name: "aws_put_s3_object",
      label: "Put S3 Object",
      description: "Write text content to an object.",
      service: SERVICE,
      parameters: Type.Object({
        bucket: Bucket,
        key: Key,
        content: Type.String(),
        contentType: Type.Optional(Type.String({ description: "Defaults to text/plain; charset=utf-8" })),
        metadata: Type.Optional(Type.String({ description: "User metadata as JSON" })),
      }),
      async run(params) {
        const result = await state.s3.putObject({
          bucket: params.bucket,
          key: params.key,
          content: params.content,
          contentType: params.contentType,
          metadata: params.metadata ? parseStringMap(params.metadata, "metadata") : undefined,
        });
        return { ...result, size: Buffer.byteLength(params.content, "utf8") };
      },
    }),

    defineTool({
      name: "aws_delete_s3_object",
      label: "Delete S3 Object",
      description: "Delete an object (or one version of it).",
      service: SERVICE,
      parameters: Type.Object({ bucket: Bucket, key: Key, versionId: Type.Optional(Type.String()) }),
      async run(params) {
        await state.s3.deleteObject(params.bucket, params.key, params.versionId);
        return { bucket: params.bucket, key: params.key, deleted: true };
      },
    }),

    defineTool({
      name: "aws_create_s3_bucket",
      label: "Create S3 Bucket",
      description: "Create a bucket in the given (or current) region.",
      service: SERVICE,
      parameters: Type.Object({ bucket: Bucket, region: Type.Optional(Type.String()) }),
      async run(params) {
        const result = await state.s3.createBucket(params.bucket, params.region);
        return { ...result, message: `Bucket ${result.bucket} created in ${result.region}` };
      },
    }),

    defineTool({
      name: "aws_delete_s3_bucket",
      label: "Delete S3 Bucket",
      description: "Delete an empty bucket.",
      service: SERVICE,
      parameters: Type.Object({ bucket: Bucket }),
      async run(params) {
        await state.s3.deleteBucket(params.bucket);
        return { bucket: params.bucket, deleted: true };
      },
    }),

    defineTool({
      name: "aws_s3_bucket_exists",
      label: "S3 Bucket Exists",
      description: "Check whether a bucket exists and is reachable.",
      service: SERVICE,
      parameters: Type.Object({ bucket: Bucket }),
      async run(params) {
        return { bucket: params.bucket, exists: await state.s3.bucketExists(params.bucket) };
      },
    }),

    defineTool({
      name: "aws_s3_object_exists",
      label: "S3 Object Exists",
      description: "Check whether an object exists.",
      service: SERVICE,
      parameters: Type.Object({ bucket: Bucket, key: Key }),
      async run(params) {
        return { bucket: params.bucket, key: params.key, ...(await state.s3.objectExists(params.bucket, params.key)) };
      },
    }),

    defineTool({
      name: "aws_generate_presigned_url",
      label: "Generate Presigned URL",
      description: "Create a time-limited URL to download (GET) or upload (PUT) an object.",
      service: SERVICE,
      parameters: Type.Object({
        bucket: Bucket,
        key: Key,
        operation: stringEnum(["GET", "PUT"], { default: "GET" }),
        expiresInSeconds: Type.Integer({ minimum: 1, maximum: MAX_PRESIGN_SECONDS, default: 3600 }),
        contentType: Type.Optional(Type.String()),
      }),
      async run(params) {
        return {
          bucket: params.bucket,
          key: params.key,
          ...(await state.s3.generatePresignedUrl(params.bucket, params.key, params)),
        };
      },
    }),

    defineTool({
      name: "aws_get_bucket_versioning",
      label: "Get Bucket Versioning",
      description: "Versioning status of a bucket.",
      service: SERVICE,
      parameters: Type.Object({ bucket: Bucket }),
      async run(params) {
        return { bucket: params.bucket, ...(await state.s3.getBucketVersioning(params.bucket)) };
      },
    }),

    defineTool({
      name: "aws_list_object_versions",
      label: "List Object Versions",
      description: "Versions and delete markers of objects in a bucket.",
      service: SERVICE,
      parameters: Type.Object({
        bucket: Bucket,
        prefix: Type.Optional(Type.String()),
        maxKeys: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }),
      }),
      async run(params) {
        const result = await state.s3.listObjectVersions(params.bucket, params);
        return { bucket: params.bucket, ...result, count: result.versions.length };
      },
    }),
  ];
}
