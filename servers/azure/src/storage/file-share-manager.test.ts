import { beforeEach, describe, expect, it, vi } from "vitest";
import { NotFoundError, ToolInputError } from "../../../../src/index.js";
import { NO_RETRY, asyncIter, restError } from "../testing.js";

const { mockShareService, mockShare, mockDirectory, mockFile, mockSharedKey } = vi.hoisted(() => {
  const mockFile = { getProperties: vi.fn(), downloadToBuffer: vi.fn(), uploadData: vi.fn(), delete: vi.fn() };
  const mockDirectory = { listFilesAndDirectories: vi.fn(), create: vi.fn(), delete: vi.fn(), getFileClient: vi.fn(() => mockFile) };
  const mockShare = { create: vi.fn(), delete: vi.fn(), getProperties: vi.fn(), exists: vi.fn(), getDirectoryClient: vi.fn(() => mockDirectory) };
  const mockShareService = { listShares: vi.fn(), getShareClient: vi.fn(() => mockShare) };
  return { mockShareService, mockShare, mockDirectory, mockFile, mockSharedKey: vi.fn() };
});

vi.mock("@azure/storage-file-share", () => ({
  ShareServiceClient: vi.fn().mockImplementation(() => mockShareService),
  StorageSharedKeyCredential: mockSharedKey,
}));

import { AzureFileShareManager, splitSharePath } from "./file-share-manager.js";

describe("splitSharePath", () => {
  it("separates directory and file name", () => {
    expect(splitSharePath("/logs/2024/app.log")).toEqual({ directory: "logs/2024", name: "app.log" });
    expect(splitSharePath("readme.md")).toEqual({ directory: "", name: "readme.md" });
  });

  it("requires a file name", () => {
    expect(() => splitSharePath("/")).toThrow(ToolInputError);
  });
});

describe("AzureFileShareManager", () => {
  const keys = { getAccountKey: vi.fn() };
  let manager: AzureFileShareManager;

  beforeEach(() => {
    vi.clearAllMocks();
    keys.getAccountKey.mockResolvedValue("test-account-key");
    manager = new AzureFileShareManager(keys, NO_RETRY);
  });

  it("reads the account key once per account", async () => {
    mockShareService.listShares.mockImplementation(() =>
      asyncIter([{ name: "data", properties: { quota: 100, lastModified: new Date("2024-05-01T00:00:00Z") } }]),
    );
    const shares = await manager.listShares("acct1", "rg-1");
    await manager.listShares("acct1");
    expect(keys.getAccountKey).toHaveBeenCalledTimes(1);
    expect(keys.getAccountKey).toHaveBeenCalledWith("acct1", "rg-1");
    expect(mockSharedKey).toHaveBeenCalledWith("acct1", "test-account-key");
    expect(shares).toEqual([{ name: "data", quotaGb: 100, lastModified: "2024-05-01T00:00:00.000Z", accessTier: undefined }]);
  });

  it("lists files and directories", async () => {
    mockDirectory.listFilesAndDirectories.mockReturnValue(
      asyncIter([
        { kind: "directory", name: "archive" },
        { kind: "file", name: "app.log", properties: { contentLength: 120 } },
      ]),
    );
    const entries = await manager.listFiles("acct1", "data", "/logs/");
    expect(mockShare.getDirectoryClient).toHaveBeenCalledWith("logs");
    expect(entries).toEqual([
      { kind: "directory", name: "archive" },
      { kind: "file", name: "app.log", size: 120 },
    ]);
  });

  it("uploads text with a content type", async () => {
    mockFile.uploadData.mockResolvedValue({});
    const result = await manager.uploadText("acct1", "data", "notes/todo.txt", "buy milk");
    expect(mockShare.getDirectoryClient).toHaveBeenCalledWith("notes");
    expect(mockDirectory.getFileClient).toHaveBeenCalledWith("todo.txt");
    expect(mockFile.uploadData).toHaveBeenCalledWith(Buffer.from("buy milk"), {
      fileHttpHeaders: { fileContentType: "text/plain; charset=utf-8" },
    });
    expect(result).toEqual({ size: 8 });
  });

  it("maps missing files to not found", async () => {
    mockFile.delete.mockRejectedValue(restError(404, "ResourceNotFound"));
    await expect(manager.deleteFile("acct1", "data", "gone.txt")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("reads one share's properties", async () => {
    mockShare.getProperties.mockResolvedValue({ quota: 50, lastModified: new Date("2024-06-01T08:00:00Z"), accessTier: "Hot" });
    expect(await manager.getShare("acct1", "data")).toEqual({
      name: "data",
      quotaGb: 50,
      lastModified: "2024-06-01T08:00:00.000Z",
      accessTier: "Hot",
    });
    expect(mockShareService.getShareClient).toHaveBeenCalledWith("data");
  });

  it("reports a missing share", async () => {
    mockShare.getProperties.mockRejectedValue(restError(404, "ShareNotFound"));
    await expect(manager.getShare("acct1", "gone")).rejects.toThrow("File share 'gone' not found");
  });

  it("checks whether a share exists", async () => {
    mockShare.exists.mockResolvedValue(false);
    expect(await manager.shareExists("acct1", "data")).toBe(false);
  });

  it("deletes a directory by its trimmed path", async () => {
    mockDirectory.delete.mockResolvedValue({});
    await manager.deleteDirectory("acct1", "data", "/logs/old/");
    expect(mockShare.getDirectoryClient).toHaveBeenCalledWith("logs/old");
    expect(mockDirectory.delete).toHaveBeenCalledTimes(1);
  });

  it("reports a missing directory and rejects the share root", async () => {
    mockDirectory.delete.mockRejectedValue(restError(404, "ResourceNotFound"));
    await expect(manager.deleteDirectory("acct1", "data", "logs/none")).rejects.toBeInstanceOf(NotFoundError);
    await expect(manager.deleteDirectory("acct1", "data", "/")).rejects.toBeInstanceOf(ToolInputError);
  });
});
