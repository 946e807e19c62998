/**
 * S3 Manager Tests
 */

import { describe, it, expect, beforeEach, vi } from "vitest";

const { mockSend } = vi.hoisted(() => ({ mockSend: vi.fn() }));

vi.mock("@aws-sdk/client-s3", () => ({
  S3Client: vi.fn().mockImplementation(() => ({ send: mockSend, destroy: vi.fn() })),
  BucketLocationConstraint: { "eu-west-1": "eu-west-1", "us-west-2": "us-west-2" },
  CreateBucketCommand: vi.fn(),
  DeleteBucketCommand: vi.fn(),
  DeleteObjectCommand: vi.fn(),
  GetBucketVersioningCommand: vi.fn(),
  GetObjectCommand: vi.fn(),
  HeadBucketCommand: vi.fn(),
  HeadObjectCommand: vi.fn(),
  ListBucketsCommand: vi.fn(),
  ListObjectVersionsCommand: vi.fn(),
  ListObjectsV2Command: vi.fn(),
  PutObjectCommand: vi.fn(),
}));

vi.mock("@aws-sdk/s3-request-presigner", () => ({
  getSignedUrl: vi.fn().mockResolvedValue("https://presigned-url.example.com"),
}));

import { CreateBucketCommand, GetObjectCommand, PutObjectCommand } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { awsError } from "../testing.js";
import { S3Manager, parseContentRangeTotal } from "./manager.js";

const body = (text: string) => ({ transformToByteArray: async () => new TextEncoder().encode(text) });

describe("S3Manager", () => {
  let manager: S3Manager;

  beforeEach(() => {
    vi.clearAllMocks();
    mockSend.mockReset();
    manager = new S3Manager({ region: "us-east-1", retry: { maxAttempts: 1 } });
  });

  describe("buckets", () => {
    it("lists buckets", async () => {
      mockSend.mockResolvedValue({
        Buckets: [{ Name: "bucket-1", CreationDate: new Date("2024-01-01T00:00:00Z") }, { Name: "bucket-2" }],
      });

      const buckets = await manager.listBuckets();

      expect(buckets).toEqual([
        { name: "bucket-1", createdAt: "2024-01-01T00:00:00.000Z" },
        { name: "bucket-2", createdAt: undefined },
      ]);
    });

    it("reports a missing bucket as not existing", async () => {
      mockSend.mockRejectedValue(awsError("NotFound", 404));
      expect(await manager.bucketExists("missing-bucket")).toBe(false);
    });

    it("rethrows errors other than not found", async () => {
      mockSend.mockRejectedValue(awsError("Forbidden", 403));
      await expect(manager.bucketExists("private-bucket")).rejects.toThrow("Forbidden");
    });

    it("omits the location constraint in us-east-1", async () => {
      mockSend.mockResolvedValue({});
      await manager.createBucket("new-bucket");
      expect(CreateBucketCommand).toHaveBeenCalledWith({ Bucket: "new-bucket", CreateBucketConfiguration: undefined });
    });

    it("sets the location constraint elsewhere", async () => {
      mockSend.mockResolvedValue({});
      const result = await manager.createBucket("new-bucket", "eu-west-1");
      expect(result).toEqual({ bucket: "new-bucket", region: "eu-west-1" });
      expect(CreateBucketCommand).toHaveBeenCalledWith({
        Bucket: "new-bucket",
        CreateBucketConfiguration: { LocationConstraint: "eu-west-1" },
      });
    });

    it("rejects an unknown region", async () => {
      await expect(manager.createBucket("new-bucket", "mars-north-1")).rejects.toThrow(
        "Unsupported bucket region 'mars-north-1'",
      );
    });
  });

  describe("objects", () => {
    it("reads a ranged object and flags truncation", async () => {
      mockSend.mockResolvedValue({
        Body: body("hello"),
        ContentRange: "bytes 0-4/12",
        ContentType: "text/plain",
      });

      const object = await manager.getObject("bucket-1", "notes.txt", 5);

      expect(object.content).toBe("hello");
      expect(object.totalSize).toBe(12);
      expect(object.truncated).toBe(true);
      expect(GetObjectCommand).toHaveBeenCalledWith({ Bucket: "bucket-1", Key: "notes.txt", Range: "bytes=0-4" });
    });

    it("falls back to a plain read for empty objects", async () => {
      mockSend.mockRejectedValueOnce(awsError("InvalidRange", 416)).mockResolvedValueOnce({ Body: body(""), ContentLength: 0 });

      const object = await manager.getObject("bucket-1", "empty.txt");

      expect(object.content).toBe("");
      expect(object.truncated).toBe(false);
      expect(vi.mocked(GetObjectCommand).mock.calls[1][0]).toEqual({ Bucket: "bucket-1", Key: "empty.txt", Range: undefined });
    });

    it("writes text with a default content type", async () => {
      mockSend.mockResolvedValue({ ETag: '"abc"' });
      const result = await manager.putObject({ bucket: "bucket-1", key: "a.txt", content: "hi" });
      expect(result.eTag).toBe('"abc"');
      expect(vi.mocked(PutObjectCommand).mock.calls[0][0]).toMatchObject({ ContentType: "text/plain; charset=utf-8" });
    });

    it("reports a missing object as not existing", async () => {
      mockSend.mockRejectedValue(awsError("NotFound", 404));
      expect(await manager.objectExists("bucket-1", "missing.txt")).toEqual({ exists: false });
    });

    it("merges versions and delete markers by key, newest first", async () => {
      mockSend.mockResolvedValue({
        Versions: [
          { Key: "a.txt", VersionId: "v1", IsLatest: false, LastModified: new Date("2024-01-01T00:00:00Z"), Size: 3 },
        ],
        DeleteMarkers: [{ Key: "a.txt", VersionId: "d1", IsLatest: true, LastModified: new Date("2024-02-01T00:00:00Z") }],
      });

      const { versions } = await manager.listObjectVersions("bucket-1");

      expect(versions.map((v) => [v.versionId, v.isDeleteMarker])).toEqual([
        ["d1", true],
        ["v1", false],
      ]);
    });
  });

  describe("presigned URLs", () => {
    it("signs a GET with the requested expiry", async () => {
      const now = new Date("2024-05-01T00:00:00Z");
      const result = await manager.generatePresignedUrl("bucket-1", "a.txt", { expiresInSeconds: 600, now });

      expect(result).toEqual({
        url: "https://presigned-url.example.com",
        operation: "GET",
        expiresInSeconds: 600,
        expiresAt: "2024-05-01T00:10:00.000Z",
      });
      expect(vi.mocked(getSignedUrl).mock.calls[0][2]).toEqual({ expiresIn: 600 });
    });

    it("caps the expiry at seven days", async () => {
      await expect(manager.generatePresignedUrl("bucket-1", "a.txt", { expiresInSeconds: 604_801 })).rejects.toThrow(
        "expiresInSeconds must be between 1 and 604800",
      );
    });
  });

  it("reads the total size from Content-Range", () => {
    expect(parseContentRangeTotal("bytes 0-99/1234")).toBe(1234);
    expect(parseContentRangeTotal(undefined)).toBeUndefined();
  });
});
