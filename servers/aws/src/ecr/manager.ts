/**
 * ECR Manager
 */

import {
  BatchDeleteImageCommand,
  CreateRepositoryCommand,
  DeleteRepositoryCommand,
  DescribeImageScanFindingsCommand,
  DescribeImagesCommand,
  DescribeRepositoriesCommand,
  ECRClient,
  GetAuthorizationTokenCommand,
  GetLifecyclePolicyCommand,
  ListImagesCommand,
  PutLifecyclePolicyCommand,
  type ImageDetail,
  type ImageIdentifier,
  type Repository,
} from "@aws-sdk/client-ecr";
import { ToolInputError, isRecord } from "../../../../src/index.js";
import { isAwsServiceError, withAwsRetry } from "../retry.js";
import type { AwsManagerOptions } from "../types.js";
import type {
  EcrAuthorization,
  EcrImageDetail,
  EcrImageId,
  EcrRepositorySummary,
  EcrScanFindings,
  TagMutability,
  TagStatus,
} from "./types.js";

const MAX_PAGES = 20;

/**
 * Decode an ECR authorization token (`base64("AWS:<password>")`).
 */
export function decodeAuthorizationToken(token: string): { username: string; password: string } {
  const decoded = Buffer.from(token, "base64").toString("utf8");
  const separator = decoded.indexOf(":");
  if (separator === -1) throw new Error("ECR authorization token has an unexpected format");
  return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

/**
 * Parse and check a lifecycle policy document; returns it re-serialized.
 */
export function validateLifecyclePolicy(policyText: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(policyText);
  } catch (error) {
    throw new ToolInputError(`policyText is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, {
      field: "policyText",
    });
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.rules) || parsed.rules.length === 0) {
    throw new ToolInputError("Lifecycle policy must be a JSON object with a non-empty 'rules' array", {
      field: "policyText",
    });
  }
  return JSON.stringify(parsed);
}

function toImageIds(ids: EcrImageId[]): ImageIdentifier[] {
  return ids.map((id) => ({ imageTag: id.imageTag, imageDigest: id.imageDigest }));
}

export class EcrManager {
  private readonly client: ECRClient;
  private readonly options: AwsManagerOptions;

  constructor(options: AwsManagerOptions) {
    this.options = options;
    this.client = new ECRClient({ region: options.region, credentials: options.credentials });
  }

  private send<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withAwsRetry(fn, { label, retry: this.options.retry });
  }

  destroy(): void {
    this.client.destroy();
  }

  // ===========================================================================
  // Repositories
  // ===========================================================================

  async listRepositories(limit = 100): Promise<EcrRepositorySummary[]> {
    return this.describeRepositories(undefined, limit);
  }

  async describeRepositories(names?: string[], limit = 1000): Promise<EcrRepositorySummary[]> {
    const repositories: EcrRepositorySummary[] = [];
    let nextToken: string | undefined;
    for (let page = 0; page < MAX_PAGES && repositories.length < limit; page += 1) {
      const response = await this.send("DescribeRepositories", () =>
        this.client.send(
          new DescribeRepositoriesCommand({
            repositoryNames: names?.length ? names : undefined,
            nextToken,
            maxResults: names?.length ? undefined : Math.min(1000, limit - repositories.length),
          }),
        ),
      );
      repositories.push(...(response.repositories ?? []).map(mapRepository));
      nextToken = response.nextToken;
      if (!nextToken) break;
    }
    return repositories.slice(0, limit);
  }

  async createRepository(
    name: string,
    options: { scanOnPush?: boolean; imageTagMutability?: TagMutability; tags?: Record<string, string> } = {},
  ): Promise<EcrRepositorySummary> {
    const response = await this.send("CreateRepository", () =>
      this.client.send(
        new CreateRepositoryCommand({
          repositoryName: name,
          imageScanningConfiguration: { scanOnPush: options.scanOnPush ?? false },
          imageTagMutability: options.imageTagMutability ?? "MUTABLE",
          tags: options.tags ? Object.entries(options.tags).map(([Key, Value]) => ({ Key, Value })) : undefined,
        }),
      ),
    );
    if (!response.repository) throw new Error("CreateRepository returned no repository");
    return mapRepository(response.repository);
  }

  async deleteRepository(name: string, force = false): Promise<void> {
    await this.send("DeleteRepository", () =>
      this.client.send(new DeleteRepositoryCommand({ repositoryName: name, force })),
    );
  }

  // ===========================================================================
  // Images
  // ===========================================================================

  async listImages(repository: string, tagStatus: TagStatus = "ANY", limit = 1000): Promise<EcrImageId[]> {
    const images: EcrImageId[] = [];
    let nextToken: string | undefined;
    for (let page = 0; page < MAX_PAGES && images.length < limit; page += 1) {
      const response = await this.send("ListImages", () =>
        this.client.send(
          new ListImagesCommand({
            repositoryName: repository,
            filter: tagStatus === "ANY" ? undefined : { tagStatus },
            nextToken,
          }),
        ),
      );
      images.push(...(response.imageIds ?? []).map((id) => ({ imageTag: id.imageTag, imageDigest: id.imageDigest })));
      nextToken = response.nextToken;
      if (!nextToken) break;
    }
    return images.slice(0, limit);
  }

  /**
   * Image details, newest push first.
   */
  async describeImages(repository: string, imageTags?: string[]): Promise<EcrImageDetail[]> {
    const images: EcrImageDetail[] = [];
    let nextToken: string | undefined;
    for (let page = 0; page < MAX_PAGES; page += 1) {
      const response = await this.send("DescribeImages", () =>
        this.client.send(
          new DescribeImagesCommand({
            repositoryName: repository,
            imageIds: imageTags?.length ? imageTags.map((imageTag) => ({ imageTag })) : undefined,
            nextToken,
          }),
        ),
      );
      images.push(...(response.imageDetails ?? []).map(mapImage));
      nextToken = response.nextToken;
      if (!nextToken) break;
    }
    return images.sort((a, b) => (b.pushedAt ?? "").localeCompare(a.pushedAt ?? ""));
  }

  async batchDeleteImages(
    repository: string,
    ids: EcrImageId[],
  ): Promise<{ deleted: EcrImageId[]; failures: Array<EcrImageId & { code?: string; reason?: string }> }> {
    if (ids.length === 0) {
      throw new ToolInputError("Provide imageTags or imageDigests to delete", { field: "imageTags" });
    }
    const response = await this.send("BatchDeleteImage", () =>
      this.client.send(new BatchDeleteImageCommand({ repositoryName: repository, imageIds: toImageIds(ids) })),
    );
    return {
      deleted: (response.imageIds ?? []).map((id) => ({ imageTag: id.imageTag, imageDigest: id.imageDigest })),
      failures: (response.failures ?? []).map((f) => ({
        imageTag: f.imageId?.imageTag,
        imageDigest: f.imageId?.imageDigest,
        code: f.failureCode,
        reason: f.failureReason,
      })),
    };
  }

  // ===========================================================================
  // Authorization, lifecycle and scanning
  // ===========================================================================

  async getAuthorizationToken(): Promise<EcrAuthorization> {
    const response = await this.send("GetAuthorizationToken", () =>
      this.client.send(new GetAuthorizationTokenCommand({})),
    );
    const data = response.authorizationData?.[0];
    if (!data?.authorizationToken) throw new Error("GetAuthorizationToken returned no token");
    const { username, password } = decodeAuthorizationToken(data.authorizationToken);
    const endpoint = data.proxyEndpoint ?? "";
    return {
      username,
      password,
      proxyEndpoint: data.proxyEndpoint,
      expiresAt: data.expiresAt?.toISOString(),
      loginCommand: `aws ecr get-login-password --region ${this.options.region} | docker login --username ${username} --password-stdin ${endpoint}`,
    };
  }

  async getLifecyclePolicy(repository: string): Promise<{ hasPolicy: boolean; policy?: unknown; lastEvaluatedAt?: string }> {
    try {
      const response = await this.send("GetLifecyclePolicy", () =>
        this.client.send(new GetLifecyclePolicyCommand({ repositoryName: repository })),
      );
      return {
        hasPolicy: true,
        policy: response.lifecyclePolicyText ? JSON.parse(response.lifecyclePolicyText) : undefined,
        lastEvaluatedAt: response.lastEvaluatedAt?.toISOString(),
      };
    } catch (error) {
      if (isAwsServiceError(error) && error.name === "LifecyclePolicyNotFoundException") return { hasPolicy: false };
      throw error;
    }
  }

  async putLifecyclePolicy(repository: string, policyText: string): Promise<void> {
    const lifecyclePolicyText = validateLifecyclePolicy(policyText);
    await this.send("PutLifecyclePolicy", () =>
      this.client.send(new PutLifecyclePolicyCommand({ repositoryName: repository, lifecyclePolicyText })),
    );
  }

  async getImageScanFindings(repository: string, imageId: EcrImageId, limit = 100): Promise<EcrScanFindings> {
    if (!imageId.imageTag && !imageId.imageDigest) {
      throw new ToolInputError("Provide imageTag or imageDigest", { field: "imageTag" });
    }
    const response = await this.send("DescribeImageScanFindings", () =>
      this.client.send(
        new DescribeImageScanFindingsCommand({
          repositoryName: repository,
          imageId: { imageTag: imageId.imageTag, imageDigest: imageId.imageDigest },
          maxResults: Math.min(limit, 1000),
        }),
      ),
    );
    const scan = response.imageScanFindings;
    const basic = (scan?.findings ?? []).map((f) => ({
      name: f.name,
      severity: f.severity,
      description: f.description,
      uri: f.uri,
    }));
    const enhanced = (scan?.enhancedFindings ?? []).map((f) => ({
      name: f.title,
      severity: f.severity,
      description: f.description,
      uri: f.packageVulnerabilityDetails?.sourceUrl,
    }));
    return {
      repository,
      imageId,
      status: response.imageScanStatus?.status,
      completedAt: scan?.imageScanCompletedAt?.toISOString(),
      severityCounts: scan?.findingSeverityCounts ?? {},
      findings: [...basic, ...enhanced].slice(0, limit),
    };
  }
}

function mapRepository(repo: Repository): EcrRepositorySummary {
  return {
    name: repo.repositoryName ?? "",
    arn: repo.repositoryArn,
    uri: repo.repositoryUri,
    registryId: repo.registryId,
    createdAt: repo.createdAt?.toISOString(),
    imageTagMutability: repo.imageTagMutability,
    scanOnPush: repo.imageScanningConfiguration?.scanOnPush ?? false,
    encryptionType: repo.encryptionConfiguration?.encryptionType,
  };
}

function mapImage(image: ImageDetail): EcrImageDetail {
  return {
    digest: image.imageDigest,
    tags: image.imageTags ?? [],
    sizeBytes: image.imageSizeInBytes,
    pushedAt: image.imagePushedAt?.toISOString(),
    lastPulledAt: image.lastRecordedPullTime?.toISOString(),
    scanStatus: image.imageScanStatus?.status,
    findingSeverityCounts: image.imageScanFindingsSummary?.findingSeverityCounts,
  };
}
