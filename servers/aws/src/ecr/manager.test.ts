/**
 * ECR Manager Tests
 */

import { describe, it, expect, beforeEach, vi } from "vitest";

const { mockSend } = vi.hoisted(() => ({ mockSend: vi.fn() }));

vi.mock("@aws-sdk/client-ecr", () => ({
  ECRClient: vi.fn().mockImplementation(() => ({ send: mockSend, destroy: vi.fn() })),
  BatchDeleteImageCommand: vi.fn(),
  CreateRepositoryCommand: vi.fn(),
  DeleteRepositoryCommand: vi.fn(),
  DescribeImageScanFindingsCommand: vi.fn(),
  DescribeImagesCommand: vi.fn(),
  DescribeRepositoriesCommand: vi.fn(),
  GetAuthorizationTokenCommand: vi.fn(),
  GetLifecyclePolicyCommand: vi.fn(),
  ListImagesCommand: vi.fn(),
  PutLifecyclePolicyCommand: vi.fn(),
}));

import { ListImagesCommand, PutLifecyclePolicyCommand } from "@aws-sdk/client-ecr";
import { awsError } from "../testing.js";
import { EcrManager, decodeAuthorizationToken, validateLifecyclePolicy } from "./manager.js";

describe("EcrManager", () => {
  let manager: EcrManager;

  beforeEach(() => {
    vi.clearAllMocks();
    mockSend.mockReset();
    manager = new EcrManager({ region: "eu-west-1", retry: { maxAttempts: 1 } });
  });

  it("maps repositories", async () => {
    mockSend.mockResolvedValue({
      repositories: [
        {
          repositoryName: "api",
          repositoryUri: "123456789012.dkr.ecr.eu-west-1.amazonaws.com/api",
          imageTagMutability: "IMMUTABLE",
          imageScanningConfiguration: { scanOnPush: true },
        },
      ],
    });

    const repositories = await manager.listRepositories();

    expect(repositories[0]).toMatchObject({
      name: "api",
      uri: "123456789012.dkr.ecr.eu-west-1.amazonaws.com/api",
      imageTagMutability: "IMMUTABLE",
      scanOnPush: true,
    });
  });

  it("filters images by tag status", async () => {
    mockSend.mockResolvedValue({ imageIds: [{ imageTag: "v1", imageDigest: "sha256:aaa" }] });
    const images = await manager.listImages("api", "TAGGED");
    expect(images).toEqual([{ imageTag: "v1", imageDigest: "sha256:aaa" }]);
    expect(vi.mocked(ListImagesCommand).mock.calls[0][0]).toMatchObject({ filter: { tagStatus: "TAGGED" } });
  });

  it("sorts described images by push time, newest first", async () => {
    mockSend.mockResolvedValue({
      imageDetails: [
        { imageDigest: "sha256:old", imagePushedAt: new Date("2024-01-01T00:00:00Z") },
        { imageDigest: "sha256:new", imagePushedAt: new Date("2024-03-01T00:00:00Z"), imageTags: ["latest"] },
      ],
    });

    const images = await manager.describeImages("api");

    expect(images.map((i) => i.digest)).toEqual(["sha256:new", "sha256:old"]);
    expect(images[0].tags).toEqual(["latest"]);
  });

  it("requires something to delete", async () => {
    await expect(manager.batchDeleteImages("api", [])).rejects.toThrow("Provide imageTags or imageDigests to delete");
  });

  it("decodes the authorization token and builds a login hint", async () => {
    mockSend.mockResolvedValue({
      authorizationData: [
        {
          authorizationToken: Buffer.from("AWS:test-secret").toString("base64"),
          proxyEndpoint: "https://123456789012.dkr.ecr.eu-west-1.amazonaws.com",
          expiresAt: new Date("2024-05-01T12:00:00Z"),
        },
      ],
    });

    const auth = await manager.getAuthorizationToken();

    expect(auth.username).toBe("AWS");
    expect(auth.password).toBe("test-secret");
    expect(auth.expiresAt).toBe("2024-05-01T12:00:00.000Z");
    expect(auth.loginCommand).toBe(
      "aws ecr get-login-password --region eu-west-1 | docker login --username AWS --password-stdin https://123456789012.dkr.ecr.eu-west-1.amazonaws.com",
    );
  });

  it("reports a missing lifecycle policy", async () => {
    mockSend.mockRejectedValue(awsError("LifecyclePolicyNotFoundException", 400));
    expect(await manager.getLifecyclePolicy("api")).toEqual({ hasPolicy: false });
  });

  it("normalizes the policy before storing it", async () => {
    mockSend.mockResolvedValue({});
    await manager.putLifecyclePolicy("api", '{ "rules": [ { "rulePriority": 1 } ] }');
    expect(PutLifecyclePolicyCommand).toHaveBeenCalledWith({
      repositoryName: "api",
      lifecyclePolicyText: '{"rules":[{"rulePriority":1}]}',
    });
  });

  it("merges basic and enhanced scan findings", async () => {
    mockSend.mockResolvedValue({
      imageScanStatus: { status: "COMPLETE" },
      imageScanFindings: {
        findingSeverityCounts: { HIGH: 1, LOW: 1 },
        findings: [{ name: "CVE-2024-0001", severity: "HIGH" }],
        enhancedFindings: [{ title: "CVE-2024-0002", severity: "LOW" }],
      },
    });

    const result = await manager.getImageScanFindings("api", { imageTag: "v1" });

    expect(result.status).toBe("COMPLETE");
    expect(result.severityCounts).toEqual({ HIGH: 1, LOW: 1 });
    expect(result.findings.map((f) => f.name)).toEqual(["CVE-2024-0001", "CVE-2024-0002"]);
  });

  it("validates lifecycle policy documents", () => {
    expect(() => validateLifecyclePolicy("not json")).toThrow(/policyText is not valid JSON/);
    expect(() => validateLifecyclePolicy('{"rules":[]}')).toThrow(/non-empty 'rules' array/);
  });

  it("rejects tokens without a separator", () => {
    expect(() => decodeAuthorizationToken(Buffer.from("nocolon").toString("base64"))).toThrow(/unexpected format/);
  });
});
