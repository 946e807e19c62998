/**
 * Blob data plane (@azure/storage-blob) authenticated with the Azure token
 * credential. SAS URLs are signed with a user delegation key, so no account
 * key is needed.
 */

import type { BlobItem, BlobServiceClient, ContainerItem } from "@azure/storage-blob";
import { NotFoundError, ToolInputError } from "../../../../src/index.js";
import { collectAll, collectPaged } from "../pagination.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { iso, type AzureCredentialProvider, type AzurePagedResult, type AzureRetryOptions } from "../types.js";
import type { BlobContainerInfo, BlobInfo, BlobProperties, TextDownload } from "./types.js";

const BLOB_SAS_PERMISSIONS = /^[racwdxytmei]+$/;
const CONTAINER_SAS_PERMISSIONS = /^[racwdxltfmei]+$/;
/** User delegation keys are valid for at most seven days. */
const MAX_SAS_HOURS = 168;

type SasOptions = { permissions?: string; expiresInHours?: number; now?: Date };
type SasUrl = { url: string; expiresOn: string; permissions: string };

export function blobEndpoint(accountName: string): string {
  return `https://${accountName}.blob.core.windows.net`;
}

function mapContainer(c: ContainerItem): BlobContainerInfo {
  return {
    name: c.name,
    lastModified: iso(c.properties.lastModified),
    publicAccess: c.properties.publicAccess,
    leaseState: c.properties.leaseState,
    hasImmutabilityPolicy: c.properties.hasImmutabilityPolicy,
    hasLegalHold: c.properties.hasLegalHold,
  };
}

function mapBlob(b: BlobItem): BlobInfo {
  return {
    name: b.name,
    size: b.properties.contentLength,
    contentType: b.properties.contentType,
    lastModified: iso(b.properties.lastModified),
    accessTier: b.properties.accessTier,
    blobType: b.properties.blobType,
  };
}

export class AzureBlobManager {
  private credentials: AzureCredentialProvider;
  private retryOptions?: AzureRetryOptions;
  private clients = new Map<string, BlobServiceClient>();

  constructor(credentials: AzureCredentialProvider, retryOptions?: AzureRetryOptions) {
    this.credentials = credentials;
    this.retryOptions = retryOptions;
  }

  private async getServiceClient(accountName: string): Promise<BlobServiceClient> {
    const cached = this.clients.get(accountName);
    if (cached) return cached;
    const { BlobServiceClient } = await import("@azure/storage-blob");
    const { credential } = await this.credentials.getCredential();
    const client = new BlobServiceClient(blobEndpoint(accountName), credential);
    this.clients.set(accountName, client);
    return client;
  }

  private async container(accountName: string, containerName: string) {
    return (await this.getServiceClient(accountName)).getContainerClient(containerName);
  }

  private async blob(accountName: string, containerName: string, blobName: string) {
    return (await this.container(accountName, containerName)).getBlockBlobClient(blobName);
  }

  // ===========================================================================
  // Containers
  // ===========================================================================

  async listContainers(accountName: string, prefix?: string): Promise<BlobContainerInfo[]> {
    const service = await this.getServiceClient(accountName);
    return withAzureRetry(() => collectAll(service.listContainers({ prefix }), mapContainer), this.retryOptions);
  }

  async createContainer(accountName: string, containerName: string, publicAccess?: "blob" | "container"): Promise<void> {
    const container = await this.container(accountName, containerName);
    await withAzureRetry(() => container.create({ access: publicAccess }), this.retryOptions);
  }

  async deleteContainer(accountName: string, containerName: string): Promise<void> {
    const container = await this.container(accountName, containerName);
    const deleted = await getOrNull(() => container.delete(), this.retryOptions);
    if (!deleted) throw new NotFoundError("Container", containerName);
  }

  async containerExists(accountName: string, containerName: string): Promise<boolean> {
    const container = await this.container(accountName, containerName);
    return withAzureRetry(() => container.exists(), this.retryOptions);
  }

  // ===========================================================================
  // Blobs
  // ===========================================================================

  async listBlobs(
    accountName: string,
    containerName: string,
    options: { prefix?: string; limit?: number } = {},
  ): Promise<AzurePagedResult<BlobInfo>> {
    const container = await this.container(accountName, containerName);
    return withAzureRetry(
      () => collectPaged(container.listBlobsFlat({ prefix: options.prefix }), mapBlob, undefined, { limit: options.limit }),
      this.retryOptions,
    );
  }

  async getBlobProperties(accountName: string, containerName: string, blobName: string): Promise<BlobProperties> {
    const blob = await this.blob(accountName, containerName, blobName);
    const props = await getOrNull(() => blob.getProperties(), this.retryOptions);
    if (!props) throw new NotFoundError("Blob", `${containerName}/${blobName}`);
    return {
      name: blobName,
      size: props.contentLength,
      contentType: props.contentType,
      lastModified: iso(props.lastModified),
      accessTier: props.accessTier,
      blobType: props.blobType,
      etag: props.etag,
      contentMd5: props.contentMD5 ? Buffer.from(props.contentMD5).toString("base64") : undefined,
      createdOn: iso(props.createdOn),
      metadata: props.metadata ?? {},
      leaseState: props.leaseState,
      copyStatus: props.copyStatus,
    };
  }

  /** Download at most `maxBytes` of a blob as UTF-8 text. */
  async downloadText(accountName: string, containerName: string, blobName: string, maxBytes = 1_048_576): Promise<TextDownload> {
    const blob = await this.blob(accountName, containerName, blobName);
    const props = await getOrNull(() => blob.getProperties(), this.retryOptions);
    if (!props) throw new NotFoundError("Blob", `${containerName}/${blobName}`);
    const size = props.contentLength ?? 0;
    const bytesRead = Math.min(size, maxBytes);
    const buffer = bytesRead > 0 ? await withAzureRetry(() => blob.downloadToBuffer(0, bytesRead), this.retryOptions) : Buffer.alloc(0);
    return {
      content: buffer.toString("utf8"),
      size,
      bytesRead,
      truncated: size > maxBytes,
      contentType: props.contentType,
    };
  }

  /**
   * Upload text as a block blob. Without `overwrite` the upload is
   * conditional and fails with BlobAlreadyExists if the blob is there.
   */
  async uploadText(
    accountName: string,
    containerName: string,
    blobName: string,
    content: string,
    options: { contentType?: string; overwrite?: boolean; metadata?: Record<string, string> } = {},
  ): Promise<{ etag?: string; size: number }> {
    const blob = await this.blob(accountName, containerName, blobName);
    const data = Buffer.from(content, "utf8");
    const result = await withAzureRetry(
      () =>
        blob.uploadData(data, {
          blobHTTPHeaders: { blobContentType: options.contentType ?? "text/plain; charset=utf-8" },
          metadata: options.metadata,
          conditions: options.overwrite ? undefined : { ifNoneMatch: "*" },
        }),
      this.retryOptions,
    );
    return { etag: result.etag, size: data.length };
  }

  async deleteBlob(accountName: string, containerName: string, blobName: string): Promise<void> {
    const blob = await this.blob(accountName, containerName, blobName);
    const deleted = await getOrNull(() => blob.delete({ deleteSnapshots: "include" }), this.retryOptions);
    if (!deleted) throw new NotFoundError("Blob", `${containerName}/${blobName}`);
  }

  async blobExists(accountName: string, containerName: string, blobName: string): Promise<boolean> {
    const blob = await this.blob(accountName, containerName, blobName);
    return withAzureRetry(() => blob.exists(), this.retryOptions);
  }

  /** Server-side copy within the account; waits for the copy to finish. */
  async copyBlob(
    accountName: string,
    source: { container: string; blob: string },
    target: { container: string; blob: string },
  ): Promise<{ copyStatus?: string; copyId?: string }> {
    const sourceBlob = await this.blob(accountName, source.container, source.blob);
    const targetBlob = await this.blob(accountName, target.container, target.blob);
    const poller = await withAzureRetry(() => targetBlob.beginCopyFromURL(sourceBlob.url), this.retryOptions);
    const result = await poller.pollUntilDone();
    return { copyStatus: result.copyStatus, copyId: result.copyId };
  }

  async setMetadata(accountName: string, containerName: string, blobName: string, metadata: Record<string, string>): Promise<void> {
    const blob = await this.blob(accountName, containerName, blobName);
    const updated = await getOrNull(() => blob.setMetadata(metadata), this.retryOptions);
    if (!updated) throw new NotFoundError("Blob", `${containerName}/${blobName}`);
  }

  /** User delegation key covering `hours` from `now`, validated first. */
  private async delegationKey(accountName: string, hours: number, now: Date) {
    if (!(hours > 0 && hours <= MAX_SAS_HOURS)) {
      throw new ToolInputError(`expiresInHours must be between 1 and ${MAX_SAS_HOURS}`, { field: "expiresInHours" });
    }
    const service = await this.getServiceClient(accountName);
    // Start slightly in the past to tolerate clock skew.
    const startsOn = new Date(now.getTime() - 5 * 60_000);
    const expiresOn = new Date(now.getTime() + hours * 3_600_000);
    const key = await withAzureRetry(() => service.getUserDelegationKey(startsOn, expiresOn), this.retryOptions);
    return { key, startsOn, expiresOn };
  }

  /**
   * Read-only (or other) SAS URL for one blob, signed with a user delegation
   * key obtained through the token credential.
   */
  async generateSasUrl(
    accountName: string,
    containerName: string,
    blobName: string,
    options: SasOptions = {},
  ): Promise<SasUrl> {
    const permissions = options.permissions ?? "r";
    if (!BLOB_SAS_PERMISSIONS.test(permissions)) {
      throw new ToolInputError(`Invalid SAS permissions '${permissions}'; use letters from racwdxytmei`, {
        field: "permissions",
      });
    }
    const { key, startsOn, expiresOn } = await this.delegationKey(accountName, options.expiresInHours ?? 1, options.now ?? new Date());
    const { BlobSASPermissions, SASProtocol, generateBlobSASQueryParameters } = await import("@azure/storage-blob");
    const sas = generateBlobSASQueryParameters(
      {
        containerName,
        blobName,
        permissions: BlobSASPermissions.parse(permissions),
        startsOn,
        expiresOn,
        protocol: SASProtocol.Https,
      },
      key,
      accountName,
    ).toString();
    const blob = await this.blob(accountName, containerName, blobName);
    return { url: `${blob.url}?${sas}`, expiresOn: expiresOn.toISOString(), permissions };
  }

  /** SAS URL for a whole container; "rl" reads and lists its blobs. */
  async generateContainerSasUrl(accountName: string, containerName: string, options: SasOptions = {}): Promise<SasUrl> {
    const permissions = options.permissions ?? "rl";
    if (!CONTAINER_SAS_PERMISSIONS.test(permissions)) {
      throw new ToolInputError(`Invalid SAS permissions '${permissions}'; use letters from racwdxltfmei`, {
        field: "permissions",
      });
    }
    const { key, startsOn, expiresOn } = await this.delegationKey(accountName, options.expiresInHours ?? 1, options.now ?? new Date());
    const { ContainerSASPermissions, SASProtocol, generateBlobSASQueryParameters } = await import("@azure/storage-blob");
    const sas = generateBlobSASQueryParameters(
      {
        containerName,
        permissions: ContainerSASPermissions.parse(permissions),
        startsOn,
        expiresOn,
        protocol: SASProtocol.Https,
      },
      key,
      accountName,
    ).toString();
    const container = await this.container(accountName, containerName);
    return { url: `${container.url}?${sas}`, expiresOn: expiresOn.toISOString(), permissions };
  }
}
