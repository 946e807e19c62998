import { beforeEach, describe, expect, it, vi } from "vitest";
import { NotFoundError, ToolInputError } from "../../../../src/index.js";
import { NO_RETRY, asyncIter, fakeCredentials, restError } from "../testing.js";

const { mockService, mockContainer, mockBlob, mockGenerateSas } = vi.hoisted(() => {
  const mockBlob = {
    url: "https://acct1.blob.core.windows.net/docs/report.txt",
    getProperties: vi.fn(),
    downloadToBuffer: vi.fn(),
    uploadData: vi.fn(),
    delete: vi.fn(),
    exists: vi.fn(),
    setMetadata: vi.fn(),
    beginCopyFromURL: vi.fn(),
  };
  const mockContainer = {
    url: "https://acct1.blob.core.windows.net/docs",
    create: vi.fn(),
    delete: vi.fn(),
    exists: vi.fn(),
    listBlobsFlat: vi.fn(),
    getBlockBlobClient: vi.fn(() => mockBlob),
  };
  const mockService = {
    listContainers: vi.fn(),
    getContainerClient: vi.fn(() => mockContainer),
    getUserDelegationKey: vi.fn(),
  };
  return { mockService, mockContainer, mockBlob, mockGenerateSas: vi.fn() };
});

vi.mock("@azure/storage-blob", () => ({
  BlobServiceClient: vi.fn().mockImplementation(() => mockService),
  BlobSASPermissions: { parse: (value: string) => value },
  ContainerSASPermissions: { parse: (value: string) => `container:${value}` },
  SASProtocol: { Https: "https" },
  generateBlobSASQueryParameters: mockGenerateSas,
}));

import { AzureBlobManager } from "./blob-manager.js";

describe("AzureBlobManager", () => {
  let manager: AzureBlobManager;

  beforeEach(() => {
    vi.clearAllMocks();
    manager = new AzureBlobManager(fakeCredentials, NO_RETRY);
  });

  it("lists blobs with a limit", async () => {
    mockContainer.listBlobsFlat.mockReturnValue(
      asyncIter([
        { name: "a.txt", properties: { contentLength: 3, lastModified: new Date("2024-05-01T00:00:00Z") } },
        { name: "b.txt", properties: { contentLength: 4, lastModified: new Date("2024-05-02T00:00:00Z") } },
      ]),
    );
    const result = await manager.listBlobs("acct1", "docs", { prefix: "a", limit: 1 });
    expect(mockContainer.listBlobsFlat).toHaveBeenCalledWith({ prefix: "a" });
    expect(result.items).toEqual([
      { name: "a.txt", size: 3, lastModified: "2024-05-01T00:00:00.000Z", contentType: undefined, accessTier: undefined, blobType: undefined },
    ]);
    expect(result.hasMore).toBe(true);
  });

  it("downloads at most maxBytes", async () => {
    mockBlob.getProperties.mockResolvedValue({ contentLength: 10, contentType: "text/plain" });
    mockBlob.downloadToBuffer.mockResolvedValue(Buffer.from("hello"));
    const download = await manager.downloadText("acct1", "docs", "report.txt", 5);
    expect(mockBlob.downloadToBuffer).toHaveBeenCalledWith(0, 5);
    expect(download).toEqual({ content: "hello", size: 10, bytesRead: 5, truncated: true, contentType: "text/plain" });
  });

  it("skips the download for empty blobs", async () => {
    mockBlob.getProperties.mockResolvedValue({ contentLength: 0 });
    const download = await manager.downloadText("acct1", "docs", "empty.txt");
    expect(mockBlob.downloadToBuffer).not.toHaveBeenCalled();
    expect(download.content).toBe("");
  });

  it("reports a missing blob as not found", async () => {
    mockBlob.getProperties.mockRejectedValue(restError(404, "BlobNotFound"));
    await expect(manager.getBlobProperties("acct1", "docs", "missing.txt")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("uploads conditionally unless overwriting", async () => {
    mockBlob.uploadData.mockResolvedValue({ etag: '"0x1"' });
    await manager.uploadText("acct1", "docs", "report.txt", "héllo");
    expect(mockBlob.uploadData).toHaveBeenCalledWith(
      Buffer.from("héllo", "utf8"),
      expect.objectContaining({ conditions: { ifNoneMatch: "*" } }),
    );

    const result = await manager.uploadText("acct1", "docs", "report.txt", "hi", { overwrite: true });
    expect(mockBlob.uploadData.mock.calls[1][1].conditions).toBeUndefined();
    expect(result).toEqual({ etag: '"0x1"', size: 2 });
  });

  it("signs SAS URLs with a user delegation key", async () => {
    const now = new Date("2024-05-01T12:00:00.000Z");
    mockService.getUserDelegationKey.mockResolvedValue({ signedObjectId: "oid", value: "key" });
    mockGenerateSas.mockReturnValue({ toString: () => "sv=2024&sig=test-signature" });

    const sas = await manager.generateSasUrl("acct1", "docs", "report.txt", { permissions: "r", expiresInHours: 2, now });

    expect(mockService.getUserDelegationKey).toHaveBeenCalledWith(
      new Date("2024-05-01T11:55:00.000Z"),
      new Date("2024-05-01T14:00:00.000Z"),
    );
    expect(mockGenerateSas.mock.calls[0][0]).toMatchObject({ containerName: "docs", blobName: "report.txt", protocol: "https" });
    expect(mockGenerateSas.mock.calls[0][2]).toBe("acct1");
    expect(sas).toEqual({
      url: "https://acct1.blob.core.windows.net/docs/report.txt?sv=2024&sig=test-signature",
      expiresOn: "2024-05-01T14:00:00.000Z",
      permissions: "r",
    });
  });

  it("signs container SAS URLs that read and list by default", async () => {
    const now = new Date("2024-05-01T12:00:00.000Z");
    mockService.getUserDelegationKey.mockResolvedValue({ signedObjectId: "oid", value: "key" });
    mockGenerateSas.mockReturnValue({ toString: () => "sv=2024&sr=c&sig=test-signature" });

    const sas = await manager.generateContainerSasUrl("acct1", "docs", { now });

    expect(mockService.getUserDelegationKey).toHaveBeenCalledWith(
      new Date("2024-05-01T11:55:00.000Z"),
      new Date("2024-05-01T13:00:00.000Z"),
    );
    const [values] = mockGenerateSas.mock.calls[0];
    expect(values).toMatchObject({ containerName: "docs", permissions: "container:rl", protocol: "https" });
    expect(values.blobName).toBeUndefined();
    expect(sas).toEqual({
      url: "https://acct1.blob.core.windows.net/docs?sv=2024&sr=c&sig=test-signature",
      expiresOn: "2024-05-01T13:00:00.000Z",
      permissions: "rl",
    });
  });

  it("rejects container SAS requests outside the allowed window", async () => {
    await expect(manager.generateContainerSasUrl("acct1", "docs", { expiresInHours: 200 })).rejects.toMatchObject({
      field: "expiresInHours",
    });
    await expect(manager.generateContainerSasUrl("acct1", "docs", { permissions: "ry" })).rejects.toMatchObject({
      field: "permissions",
    });
    expect(mockService.getUserDelegationKey).not.toHaveBeenCalled();
  });

  it("rejects unknown SAS permissions", async () => {
    await expect(manager.generateSasUrl("acct1", "docs", "report.txt", { permissions: "rz" })).rejects.toBeInstanceOf(
      ToolInputError,
    );
  });
});
