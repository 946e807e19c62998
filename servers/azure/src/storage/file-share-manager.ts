/**
 * Azure Files data plane (@azure/storage-file-share). Calls authenticate
 * with the account's shared key, read once through ARM listKeys.
 */

import type { ShareServiceClient } from "@azure/storage-file-share";
import { NotFoundError, ToolInputError } from "../../../../src/index.js";
import { collectAll } from "../pagination.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { iso, type AzureRetryOptions } from "../types.js";
import type { FileShareInfo, ShareEntry, ShareFileProperties, TextDownload } from "./types.js";

/** Source of account keys; the ARM account manager in production. */
export interface AccountKeyProvider {
  getAccountKey(accountName: string, resourceGroup?: string): Promise<string>;
}

export function fileEndpoint(accountName: string): string {
  return `https://${accountName}.file.core.windows.net`;
}

/** Split "dir/sub/file.txt" into its directory and file name. */
export function splitSharePath(path: string): { directory: string; name: string } {
  const parts = path.split("/").filter((p) => p.length > 0);
  const name = parts.pop();
  if (!name) throw new ToolInputError("path must name a file", { field: "path" });
  return { directory: parts.join("/"), name };
}

export class AzureFileShareManager {
  private keys: AccountKeyProvider;
  private retryOptions?: AzureRetryOptions;
  private clients = new Map<string, ShareServiceClient>();

  constructor(keys: AccountKeyProvider, retryOptions?: AzureRetryOptions) {
    this.keys = keys;
    this.retryOptions = retryOptions;
  }

  private async getServiceClient(accountName: string, resourceGroup?: string): Promise<ShareServiceClient> {
    const cached = this.clients.get(accountName);
    if (cached) return cached;
    const { ShareServiceClient, StorageSharedKeyCredential } = await import("@azure/storage-file-share");
    const key = await this.keys.getAccountKey(accountName, resourceGroup);
    const client = new ShareServiceClient(fileEndpoint(accountName), new StorageSharedKeyCredential(accountName, key));
    this.clients.set(accountName, client);
    return client;
  }

  private async share(accountName: string, shareName: string, resourceGroup?: string) {
    return (await this.getServiceClient(accountName, resourceGroup)).getShareClient(shareName);
  }

  private async file(accountName: string, shareName: string, path: string, resourceGroup?: string) {
    const { directory, name } = splitSharePath(path);
    return (await this.share(accountName, shareName, resourceGroup)).getDirectoryClient(directory).getFileClient(name);
  }

  async listShares(accountName: string, resourceGroup?: string): Promise<FileShareInfo[]> {
    const service = await this.getServiceClient(accountName, resourceGroup);
    return withAzureRetry(
      () =>
        collectAll(service.listShares(), (s) => ({
          name: s.name,
          quotaGb: s.properties.quota,
          lastModified: iso(s.properties.lastModified),
          accessTier: s.properties.accessTier,
        })),
      this.retryOptions,
    );
  }

  async createShare(accountName: string, shareName: string, quotaGb?: number, resourceGroup?: string): Promise<void> {
    const share = await this.share(accountName, shareName, resourceGroup);
    await withAzureRetry(() => share.create({ quota: quotaGb }), this.retryOptions);
  }

  async deleteShare(accountName: string, shareName: string, resourceGroup?: string): Promise<void> {
    const share = await this.share(accountName, shareName, resourceGroup);
    const deleted = await getOrNull(() => share.delete({ deleteSnapshots: "include" }), this.retryOptions);
    if (!deleted) throw new NotFoundError("File share", shareName);
  }

  async getShare(accountName: string, shareName: string, resourceGroup?: string): Promise<FileShareInfo> {
    const share = await this.share(accountName, shareName, resourceGroup);
    const props = await getOrNull(() => share.getProperties(), this.retryOptions);
    if (!props) throw new NotFoundError("File share", shareName);
    return { name: shareName, quotaGb: props.quota, lastModified: iso(props.lastModified), accessTier: props.accessTier };
  }

  async shareExists(accountName: string, shareName: string, resourceGroup?: string): Promise<boolean> {
    const share = await this.share(accountName, shareName, resourceGroup);
    return withAzureRetry(() => share.exists(), this.retryOptions);
  }

  async listFiles(accountName: string, shareName: string, directory = "", resourceGroup?: string): Promise<ShareEntry[]> {
    const dir = (await this.share(accountName, shareName, resourceGroup)).getDirectoryClient(directory.replace(/^\/+|\/+$/g, ""));
    return withAzureRetry(
      () =>
        collectAll(dir.listFilesAndDirectories(), (item): ShareEntry =>
          item.kind === "file"
            ? { kind: "file", name: item.name, size: item.properties.contentLength }
            : { kind: "directory", name: item.name },
        ),
      this.retryOptions,
    );
  }

  async createDirectory(accountName: string, shareName: string, directory: string, resourceGroup?: string): Promise<void> {
    const path = directory.replace(/^\/+|\/+$/g, "");
    if (!path) throw new ToolInputError("directory is required", { field: "directory" });
    const dir = (await this.share(accountName, shareName, resourceGroup)).getDirectoryClient(path);
    await withAzureRetry(() => dir.create(), this.retryOptions);
  }

  /** Delete an empty directory. */
  async deleteDirectory(accountName: string, shareName: string, directory: string, resourceGroup?: string): Promise<void> {
    const path = directory.replace(/^\/+|\/+$/g, "");
    if (!path) throw new ToolInputError("directory is required", { field: "directory" });
    const dir = (await this.share(accountName, shareName, resourceGroup)).getDirectoryClient(path);
    const deleted = await getOrNull(() => dir.delete(), this.retryOptions);
    if (!deleted) throw new NotFoundError("Directory", `${shareName}/${path}`);
  }

  async getFileProperties(accountName: string, shareName: string, path: string, resourceGroup?: string): Promise<ShareFileProperties> {
    const file = await this.file(accountName, shareName, path, resourceGroup);
    const props = await getOrNull(() => file.getProperties(), this.retryOptions);
    if (!props) throw new NotFoundError("File", `${shareName}/${path}`);
    return {
      path,
      size: props.contentLength,
      contentType: props.contentType,
      lastModified: iso(props.lastModified),
      etag: props.etag,
      metadata: props.metadata ?? {},
    };
  }

  async downloadText(
    accountName: string,
    shareName: string,
    path: string,
    maxBytes = 1_048_576,
    resourceGroup?: string,
  ): Promise<TextDownload> {
    const file = await this.file(accountName, shareName, path, resourceGroup);
    const props = await getOrNull(() => file.getProperties(), this.retryOptions);
    if (!props) throw new NotFoundError("File", `${shareName}/${path}`);
    const size = props.contentLength ?? 0;
    const bytesRead = Math.min(size, maxBytes);
    const buffer = bytesRead > 0 ? await withAzureRetry(() => file.downloadToBuffer(0, bytesRead), this.retryOptions) : Buffer.alloc(0);
    return { content: buffer.toString("utf8"), size, bytesRead, truncated: size > maxBytes, contentType: props.contentType };
  }

  /** Create or replace a file with the given text. */
  async uploadText(
    accountName: string,
    shareName: string,
    path: string,
    content: string,
    contentType = "text/plain; charset=utf-8",
    resourceGroup?: string,
  ): Promise<{ size: number }> {
    const file = await this.file(accountName, shareName, path, resourceGroup);
    const data = Buffer.from(content, "utf8");
    await withAzureRetry(() => file.uploadData(data, { fileHttpHeaders: { fileContentType: contentType } }), this.retryOptions);
    return { size: data.length };
  }

  async deleteFile(accountName: string, shareName: string, path: string, resourceGroup?: string): Promise<void> {
    const file = await this.file(accountName, shareName, path, resourceGroup);
    const deleted = await getOrNull(() => file.delete(), this.retryOptions);
    if (!deleted) throw new NotFoundError("File", `${shareName}/${path}`);
  }
}
