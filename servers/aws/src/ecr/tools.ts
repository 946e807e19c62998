/**
 * ECR tools.
 */

import { Type } from "@sinclair/typebox";
import {
  StringList,
  defineTool,
  parseStringList,
  parseStringMap,
  stringEnum,
  type ToolDefinition,
} from "../../../../src/index.js";
import type { AwsServerState } from "../state.js";

const SERVICE = "ecr";

const Repository = Type.String({ minLength: 2, maxLength: 256, description: "Repository name" });

export function createEcrTools(state: AwsServerState): ToolDefinition[] {
  return [
    defineTool({
      name: "aws_list_ecr_repositories",
      label: "List ECR Repositories",
      description: "List ECR repositories in the current region.",
      service: SERVICE,
      parameters: Type.Object({ limit: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }) }),
      async run(params) {
        const repositories = await state.ecr.listRepositories(params.limit);
        return { repositories, count: repositories.length };
      },
    }),

    defineTool({
      name: "aws_describe_ecr_repositories",
      label: "Describe ECR Repositories",
      description: "Details of the named repositories.",
      service: SERVICE,
      parameters: Type.Object({ repositoryNames: StringList("Repository names (comma-separated or JSON array)") }),
      async run(params) {
        const repositories = await state.ecr.describeRepositories(parseStringList(params.repositoryNames, "repositoryNames"));
        return { repositories, count: repositories.length };
      },
    }),

    defineTool({
      name: "aws_create_ecr_repository",
      label: "Create ECR Repository",
      description: "Create a repository, optionally scanning images on push.",
      service: SERVICE,
      parameters: Type.Object({
        repositoryName: Repository,
        scanOnPush: Type.Boolean({ default: true }),
        imageTagMutability: stringEnum(["MUTABLE", "IMMUTABLE"], { default: "MUTABLE" }),
        tags: Type.Optional(Type.String({ description: "Tags as JSON" })),
      }),
      async run(params) {
        const repository = await state.ecr.createRepository(params.repositoryName, {
          scanOnPush: params.scanOnPush,
          imageTagMutability: params.imageTagMutability,
          tags: params.tags ? parseStringMap(params.tags, "tags") : undefined,
        });
        return { repository };
      },
    }),

    defineTool({
      name: "aws_delete_ecr_repository",
      label: "Delete ECR Repository",
      description: "Delete a repository; force also deletes the images in it.",
      service: SERVICE,
      parameters: Type.Object({ repositoryName: Repository, force: Type.Boolean({ default: false }) }),
      async run(params) {
        await state.ecr.deleteRepository(params.repositoryName, params.force);
        return { repositoryName: params.repositoryName, deleted: true };
      },
    }),

    defineTool({
      name: "aws_list_ecr_images",
      label: "List ECR Images",
      description: "Image ids (tag and digest) of a repository.",
      service: SERVICE,
      parameters: Type.Object({
        repositoryName: Repository,
        tagStatus: stringEnum(["TAGGED", "UNTAGGED", "ANY"], { default: "ANY" }),
        limit: Type.Integer({ minimum: 1, maximum: 10000, default: 1000 }),
      }),
      async run(params) {
        const images = await state.ecr.listImages(params.repositoryName, params.tagStatus, params.limit);
        return { repositoryName: params.repositoryName, images, count: images.length };
      },
    }),

    defineTool({
      name: "aws_describe_ecr_images",
      label: "Describe ECR Images",
      description: "Size, push time and scan status of images, newest first.",
      service: SERVICE,
      parameters: Type.Object({
        repositoryName: Repository,
        imageTags: Type.Optional(StringList("Only these tags")),
      }),
      async run(params) {
        const images = await state.ecr.describeImages(
          params.repositoryName,
          parseStringList(params.imageTags, "imageTags"),
        );
        return { repositoryName: params.repositoryName, images, count: images.length };
      },
    }),

    defineTool({
      name: "aws_batch_delete_ecr_images",
      label: "Delete ECR Images",
      description: "Delete images by tag and/or digest.",
      service: SERVICE,
      parameters: Type.Object({
        repositoryName: Repository,
        imageTags: Type.Optional(StringList("Tags to delete")),
        imageDigests: Type.Optional(StringList("Digests to delete")),
      }),
      async run(params) {
        const ids = [
          ...parseStringList(params.imageTags, "imageTags").map((imageTag) => ({ imageTag })),
          ...parseStringList(params.imageDigests, "imageDigests").map((imageDigest) => ({ imageDigest })),
        ];
        const result = await state.ecr.batchDeleteImages(params.repositoryName, ids);
        return { repositoryName: params.repositoryName, ...result };
      },
    }),

    defineTool({
      name: "aws_get_ecr_authorization_token",
      label: "Get ECR Login",
      description: "Registry credentials for docker login. The password is valid for 12 hours.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        return { ...(await state.ecr.getAuthorizationToken()) };
      },
    }),

    defineTool({
      name: "aws_get_ecr_lifecycle_policy",
      label: "Get ECR Lifecycle Policy",
      description: "Lifecycle policy of a repository, if any.",
      service: SERVICE,
      parameters: Type.Object({ repositoryName: Repository }),
      async run(params) {
        return { repositoryName: params.repositoryName, ...(await state.ecr.getLifecyclePolicy(params.repositoryName)) };
      },
    }),

    defineTool({
      name: "aws_put_ecr_lifecycle_policy",
      label: "Put ECR Lifecycle Policy",
      description: "Set the lifecycle policy (JSON with a rules array) of a repository.",
      service: SERVICE,
      parameters: Type.Object({ repositoryName: Repository, policyText: Type.String({ minLength: 2 }) }),
      async run(params) {
        await state.ecr.putLifecyclePolicy(params.repositoryName, params.policyText);
        return { repositoryName: params.repositoryName, message: "Lifecycle policy updated" };
      },
    }),

    defineTool({
      name: "aws_get_ecr_image_scan_findings",
      label: "Get Image Scan Findings",
      description: "Vulnerability findings of an image, identified by tag or digest.",
      service: SERVICE,
      parameters: Type.Object({
        repositoryName: Repository,
        imageTag: Type.Optional(Type.String()),
        imageDigest: Type.Optional(Type.String()),
        limit: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }),
      }),
      async run(params) {
        const findings = await state.ecr.getImageScanFindings(
          params.repositoryName,
          { imageTag: params.imageTag, imageDigest: params.imageDigest },
          params.limit,
        );
        return { ...findings, count: findings.findings.length };
      },
    }),
  ];
}
