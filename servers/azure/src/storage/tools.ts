/**
 * Storage tools: accounts (ARM), blobs and file shares (data plane).
 */

import { Type } from "@sinclair/typebox";
import { JsonObject, defineTool, parseStringMap, stringEnum, type ToolDefinition } from "../../../../src/index.js";
import { Name, OptionalResourceGroup, ResourceGroup, SubscriptionId, optional } from "../params.js";
import type { AzureServerState } from "../state.js";

const SERVICE = "storage";

const Account = Type.String({ minLength: 3, maxLength: 24, pattern: "^[a-z0-9]+$", description: "Storage account name" });
const Container = Name("Blob container name");
const Blob = Name("Blob name, including any virtual directory prefix");
const Share = Name("File share name");
const SharePath = Name("File path inside the share, e.g. logs/app.txt");
const MaxBytes = Type.Integer({ minimum: 1, maximum: 10_485_760, default: 1_048_576 });

const BlobParams = { accountName: Account, containerName: Container, blobName: Blob };
const ShareParams = {
  accountName: Account,
  shareName: Share,
  resourceGroup: Type.Optional(Type.String({ description: "Account resource group; looked up when omitted" })),
  subscriptionId: SubscriptionId,
};

export function createStorageTools(state: AzureServerState): ToolDefinition[] {
  return [
    // =========================================================================
    // Accounts
    // =========================================================================

    defineTool({
      name: "azure_list_storage_accounts",
      label: "List Storage Accounts",
      description: "Storage accounts of the subscription or a resource group.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: OptionalResourceGroup, subscriptionId: SubscriptionId }),
      async run(params) {
        const accounts = await (await state.storageAccounts(params.subscriptionId)).listStorageAccounts(optional(params.resourceGroup));
        return { storageAccounts: accounts, count: accounts.length };
      },
    }),

    defineTool({
      name: "azure_get_storage_account",
      label: "Get Storage Account",
      description: "SKU, endpoints and security settings of a storage account.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: ResourceGroup, accountName: Account, subscriptionId: SubscriptionId }),
      async run(params) {
        return {
          storageAccount: await (await state.storageAccounts(params.subscriptionId)).getStorageAccount(
            params.resourceGroup,
            params.accountName,
          ),
        };
      },
    }),

    // =========================================================================
    // Blob containers
    // =========================================================================

    defineTool({
      name: "azure_list_blob_containers",
      label: "List Blob Containers",
      description: "Containers of a storage account.",
      service: SERVICE,
      parameters: Type.Object({ accountName: Account, prefix: Type.Optional(Type.String()) }),
      async run(params) {
        const containers = await state.blobs().listContainers(params.accountName, optional(params.prefix));
        return { accountName: params.accountName, containers, count: containers.length };
      },
    }),

    defineTool({
      name: "azure_create_blob_container",
      label: "Create Blob Container",
      description: "Create a private container, or one with blob/container public access.",
      service: SERVICE,
      parameters: Type.Object({
        accountName: Account,
        containerName: Type.String({ minLength: 3, maxLength: 63, pattern: "^[a-z0-9](?!.*--)[a-z0-9-]*[a-z0-9]$" }),
        publicAccess: stringEnum(["none", "blob", "container"], { default: "none" }),
      }),
      async run(params) {
        const access = params.publicAccess === "none" ? undefined : params.publicAccess;
        await state.blobs().createContainer(params.accountName, params.containerName, access);
        return { accountName: params.accountName, containerName: params.containerName, created: true };
      },
    }),

    defineTool({
      name: "azure_delete_blob_container",
      label: "Delete Blob Container",
      description: "Delete a container and every blob in it.",
      service: SERVICE,
      parameters: Type.Object({ accountName: Account, containerName: Container }),
      async run(params) {
        await state.blobs().deleteContainer(params.accountName, params.containerName);
        return { accountName: params.accountName, containerName: params.containerName, deleted: true };
      },
    }),

    defineTool({
      name: "azure_blob_container_exists",
      label: "Blob Container Exists",
      description: "Whether a container exists.",
      service: SERVICE,
      parameters: Type.Object({ accountName: Account, containerName: Container }),
      async run(params) {
        return {
          containerName: params.containerName,
          exists: await state.blobs().containerExists(params.accountName, params.containerName),
        };
      },
    }),

    // =========================================================================
    // Blobs
    // =========================================================================

    defineTool({
      name: "azure_list_blobs",
      label: "List Blobs",
      description: "Blobs of a container, optionally under a prefix.",
      service: SERVICE,
      parameters: Type.Object({
        accountName: Account,
        containerName: Container,
        prefix: Type.Optional(Type.String()),
        limit: Type.Integer({ minimum: 1, maximum: 5000, default: 500 }),
      }),
      async run(params) {
        const result = await state.blobs().listBlobs(params.accountName, params.containerName, {
          prefix: optional(params.prefix),
          limit: params.limit,
        });
        return { blobs: result.items, count: result.items.length, hasMore: result.hasMore };
      },
    }),

    defineTool({
      name: "azure_get_blob_properties",
      label: "Get Blob Properties",
      description: "Size, content type, tier and metadata of a blob.",
      service: SERVICE,
      parameters: Type.Object(BlobParams),
      async run(params) {
        return { blob: await state.blobs().getBlobProperties(params.accountName, params.containerName, params.blobName) };
      },
    }),

    defineTool({
      name: "azure_download_blob_text",
      label: "Download Blob Text",
      description: "Read a blob as UTF-8 text, up to maxBytes.",
      service: SERVICE,
      parameters: Type.Object({ ...BlobParams, maxBytes: MaxBytes }),
      async run(params) {
        const download = await state.blobs().downloadText(params.accountName, params.containerName, params.blobName, params.maxBytes);
        return { blobName: params.blobName, ...download };
      },
    }),

    defineTool({
      name: "azure_upload_blob_text",
      label: "Upload Blob Text",
      description: "Write text to a block blob. Fails if the blob exists unless overwrite is true.",
      service: SERVICE,
      parameters: Type.Object({
        ...BlobParams,
        content: Type.String(),
        contentType: Type.String({ default: "text/plain; charset=utf-8" }),
        overwrite: Type.Boolean({ default: false }),
      }),
      async run(params) {
        const result = await state.blobs().uploadText(params.accountName, params.containerName, params.blobName, params.content, {
          contentType: params.contentType,
          overwrite: params.overwrite,
        });
        return { blobName: params.blobName, ...result };
      },
    }),

    defineTool({
      name: "azure_delete_blob",
      label: "Delete Blob",
      description: "Delete a blob and its snapshots.",
      service: SERVICE,
      parameters: Type.Object(BlobParams),
      async run(params) {
        await state.blobs().deleteBlob(params.accountName, params.containerName, params.blobName);
        return { blobName: params.blobName, deleted: true };
      },
    }),

    defineTool({
      name: "azure_blob_exists",
      label: "Blob Exists",
      description: "Whether a blob exists.",
      service: SERVICE,
      parameters: Type.Object(BlobParams),
      async run(params) {
        return {
          blobName: params.blobName,
          exists: await state.blobs().blobExists(params.accountName, params.containerName, params.blobName),
        };
      },
    }),

    defineTool({
      name: "azure_copy_blob",
      label: "Copy Blob",
      description: "Server-side copy of a blob within the same account.",
      service: SERVICE,
      parameters: Type.Object({
        accountName: Account,
        sourceContainer: Container,
        sourceBlob: Blob,
        targetContainer: Container,
        targetBlob: Blob,
      }),
      async run(params) {
        const result = await state.blobs().copyBlob(
          params.accountName,
          { container: params.sourceContainer, blob: params.sourceBlob },
          { container: params.targetContainer, blob: params.targetBlob },
        );
        return { source: `${params.sourceContainer}/${params.sourceBlob}`, target: `${params.targetContainer}/${params.targetBlob}`, ...result };
      },
    }),

    defineTool({
      name: "azure_set_blob_metadata",
      label: "Set Blob Metadata",
      description: "Replace the metadata of a blob.",
      service: SERVICE,
      parameters: Type.Object({
        ...BlobParams,
        metadata: JsonObject('String values, e.g. {"owner":"ops"}'),
      }),
      async run(params) {
        const metadata = parseStringMap(params.metadata, "metadata");
        await state.blobs().setMetadata(params.accountName, params.containerName, params.blobName, metadata);
        return { blobName: params.blobName, metadata };
      },
    }),

    defineTool({
      name: "azure_generate_blob_sas_url",
      label: "Generate Blob SAS URL",
      description: "Time-limited URL for one blob, signed with a user delegation key.",
      service: SERVICE,
      parameters: Type.Object({
        ...BlobParams,
        permissions: Type.String({ default: "r", description: "SAS permission letters, e.g. r, rw" }),
        expiresInHours: Type.Integer({ minimum: 1, maximum: 168, default: 1 }),
      }),
      async run(params) {
        const sas = await state.blobs().generateSasUrl(params.accountName, params.containerName, params.blobName, {
          permissions: params.permissions,
          expiresInHours: params.expiresInHours,
        });
        return { blobName: params.blobName, ...sas };
      },
    }),

    defineTool({
      name: "azure_generate_container_sas_url",
      label: "Generate Container SAS URL",
      description: "Time-limited URL for a whole container, signed with a user delegation key. Defaults to read and list.",
      service: SERVICE,
      parameters: Type.Object({
        accountName: Account,
        containerName: Container,
        permissions: Type.String({ default: "rl", description: "SAS permission letters, e.g. rl, rwl" }),
        expiresInHours: Type.Integer({ minimum: 1, maximum: 168, default: 1 }),
      }),
      async run(params) {
        const sas = await state.blobs().generateContainerSasUrl(params.accountName, params.containerName, {
          permissions: params.permissions,
          expiresInHours: params.expiresInHours,
        });
        return { containerName: params.containerName, ...sas };
      },
    }),

    // =========================================================================
    // File shares
    // =========================================================================

    defineTool({
      name: "azure_list_file_shares",
      label: "List File Shares",
      description: "Azure Files shares of a storage account.",
      service: SERVICE,
      parameters: Type.Object({
        accountName: Account,
        resourceGroup: ShareParams.resourceGroup,
        subscriptionId: SubscriptionId,
      }),
      async run(params) {
        const shares = await (await state.fileShares(params.subscriptionId)).listShares(params.accountName, optional(params.resourceGroup));
        return { accountName: params.accountName, shares, count: shares.length };
      },
    }),

    defineTool({
      name: "azure_create_file_share",
      label: "Create File Share",
      description: "Create a file share with an optional quota in GiB.",
      service: SERVICE,
      parameters: Type.Object({ ...ShareParams, quotaGb: Type.Optional(Type.Integer({ minimum: 1, maximum: 102_400 })) }),
      async run(params) {
        await (await state.fileShares(params.subscriptionId)).createShare(params.accountName, params.shareName, params.quotaGb, optional(params.resourceGroup));
        return { shareName: params.shareName, created: true };
      },
    }),

    defineTool({
      name: "azure_get_file_share",
      label: "Get File Share",
      description: "Quota, access tier and last modified time of one file share.",
      service: SERVICE,
      parameters: Type.Object(ShareParams),
      async run(params) {
        return { share: await (await state.fileShares(params.subscriptionId)).getShare(params.accountName, params.shareName, optional(params.resourceGroup)) };
      },
    }),

    defineTool({
      name: "azure_file_share_exists",
      label: "File Share Exists",
      description: "Whether a file share exists.",
      service: SERVICE,
      parameters: Type.Object(ShareParams),
      async run(params) {
        const exists = await (await state.fileShares(params.subscriptionId)).shareExists(params.accountName, params.shareName, optional(params.resourceGroup));
        return { shareName: params.shareName, exists };
      },
    }),

    defineTool({
      name: "azure_delete_file_share",
      label: "Delete File Share",
      description: "Delete a file share and its snapshots.",
      service: SERVICE,
      parameters: Type.Object(ShareParams),
      async run(params) {
        await (await state.fileShares(params.subscriptionId)).deleteShare(params.accountName, params.shareName, optional(params.resourceGroup));
        return { shareName: params.shareName, deleted: true };
      },
    }),

    defineTool({
      name: "azure_list_files",
      label: "List Files",
      description: "Files and directories in a share directory (the root when omitted).",
      service: SERVICE,
      parameters: Type.Object({ ...ShareParams, directory: Type.String({ default: "" }) }),
      async run(params) {
        const entries = await (await state.fileShares(params.subscriptionId)).listFiles(
          params.accountName,
          params.shareName,
          params.directory,
          optional(params.resourceGroup),
        );
        return { shareName: params.shareName, directory: params.directory, entries, count: entries.length };
      },
    }),

    defineTool({
      name: "azure_create_share_directory",
      label: "Create Share Directory",
      description: "Create a directory in a file share. The parent must exist.",
      service: SERVICE,
      parameters: Type.Object({ ...ShareParams, directory: Name("Directory path") }),
      async run(params) {
        await (await state.fileShares(params.subscriptionId)).createDirectory(params.accountName, params.shareName, params.directory, optional(params.resourceGroup));
        return { shareName: params.shareName, directory: params.directory, created: true };
      },
    }),

    defineTool({
      name: "azure_delete_share_directory",
      label: "Delete Share Directory",
      description: "Delete an empty directory from a file share.",
      service: SERVICE,
      parameters: Type.Object({ ...ShareParams, directory: Name("Directory path") }),
      async run(params) {
        await (await state.fileShares(params.subscriptionId)).deleteDirectory(params.accountName, params.shareName, params.directory, optional(params.resourceGroup));
        return { shareName: params.shareName, directory: params.directory, deleted: true };
      },
    }),

    defineTool({
      name: "azure_download_file_text",
      label: "Download File Text",
      description: "Read a share file as UTF-8 text, up to maxBytes.",
      service: SERVICE,
      parameters: Type.Object({ ...ShareParams, path: SharePath, maxBytes: MaxBytes }),
      async run(params) {
        const download = await (await state.fileShares(params.subscriptionId)).downloadText(
          params.accountName,
          params.shareName,
          params.path,
          params.maxBytes,
          optional(params.resourceGroup),
        );
        return { path: params.path, ...download };
      },
    }),

    defineTool({
      name: "azure_upload_file_text",
      label: "Upload File Text",
      description: "Create or replace a share file with the given text.",
      service: SERVICE,
      parameters: Type.Object({
        ...ShareParams,
        path: SharePath,
        content: Type.String(),
        contentType: Type.String({ default: "text/plain; charset=utf-8" }),
      }),
      async run(params) {
        const result = await (await state.fileShares(params.subscriptionId)).uploadText(
          params.accountName,
          params.shareName,
          params.path,
          params.content,
          params.contentType,
          optional(params.resourceGroup),
        );
        return { path: params.path, ...result };
      },
    }),

    defineTool({
      name: "azure_delete_share_file",
      label: "Delete Share File",
      description: "Delete a file from a share.",
      service: SERVICE,
      parameters: Type.Object({ ...ShareParams, path: SharePath }),
      async run(params) {
        await (await state.fileShares(params.subscriptionId)).deleteFile(params.accountName, params.shareName, params.path, optional(params.resourceGroup));
        return { path: params.path, deleted: true };
      },
    }),

    defineTool({
      name: "azure_get_file_properties",
      label: "Get File Properties",
      description: "Size, content type and metadata of a share file.",
      service: SERVICE,
      parameters: Type.Object({ ...ShareParams, path: SharePath }),
      async run(params) {
        return {
          file: await (await state.fileShares(params.subscriptionId)).getFileProperties(
            params.accountName,
            params.shareName,
            params.path,
            optional(params.resourceGroup),
          ),
        };
      },
    }),
  ];
}
