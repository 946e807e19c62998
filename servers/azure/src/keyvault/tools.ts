/**
 * Key Vault tools.
 */

import { Type } from "@sinclair/typebox";
import {
  JsonObject,
  ToolInputError,
  defineTool,
  parseOptionalDate,
  parseStringMap,
  type ToolDefinition,
} from "../../../../src/index.js";
import { Name, OptionalResourceGroup, SubscriptionId, optional } from "../params.js";
import type { AzureServerState } from "../state.js";

const SERVICE = "keyvault";

const Vault = Name("Key vault name or URL");
const SecretParams = { vaultName: Vault, name: Name("Secret name") };

export function createKeyVaultTools(state: AzureServerState): ToolDefinition[] {
  return [
    defineTool({
      name: "azure_list_key_vaults",
      label: "List Key Vaults",
      description: "Key vaults with their URI and soft delete settings.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: OptionalResourceGroup, subscriptionId: SubscriptionId }),
      async run(params) {
        const vaults = await (await state.keyVault(params.subscriptionId)).listVaults(optional(params.resourceGroup));
        return { vaults, count: vaults.length };
      },
    }),

    defineTool({
      name: "azure_list_secrets",
      label: "List Secrets",
      description: "Secret names and attributes. Values are not included.",
      service: SERVICE,
      parameters: Type.Object({ vaultName: Vault }),
      async run(params) {
        const secrets = await state.keyVaultData().listSecrets(params.vaultName);
        return { vaultName: params.vaultName, secrets, count: secrets.length };
      },
    }),

    defineTool({
      name: "azure_get_secret",
      label: "Get Secret",
      description: "Read a secret value (latest version unless one is named).",
      service: SERVICE,
      parameters: Type.Object({ ...SecretParams, version: Type.Optional(Type.String()) }),
      async run(params) {
        return { secret: await state.keyVaultData().getSecret(params.vaultName, params.name, optional(params.version)) };
      },
    }),

    defineTool({
      name: "azure_set_secret",
      label: "Set Secret",
      description: "Create a secret or add a new version of it.",
      service: SERVICE,
      parameters: Type.Object({
        ...SecretParams,
        value: Type.String({ description: "Secret value" }),
        contentType: Type.Optional(Type.String()),
        expiresOn: Type.Optional(Type.String({ description: "Expiry as an ISO date" })),
        notBefore: Type.Optional(Type.String({ description: "Activation as an ISO date" })),
        tags: Type.Optional(JsonObject("Tags as a JSON object of strings")),
      }),
      async run(params) {
        const secret = await state.keyVaultData().setSecret(params.vaultName, params.name, params.value, {
          contentType: optional(params.contentType),
          expiresOn: parseOptionalDate(params.expiresOn, "expiresOn"),
          notBefore: parseOptionalDate(params.notBefore, "notBefore"),
          tags: params.tags === undefined ? undefined : parseStringMap(params.tags, "tags"),
        });
        return { secret, message: `Secret ${params.name} saved` };
      },
    }),

    defineTool({
      name: "azure_delete_secret",
      label: "Delete Secret",
      description: "Soft delete a secret. It can be recovered until the purge date.",
      service: SERVICE,
      parameters: Type.Object(SecretParams),
      async run(params) {
        return { deleted: await state.keyVaultData().deleteSecret(params.vaultName, params.name) };
      },
    }),

    defineTool({
      name: "azure_get_secret_versions",
      label: "Get Secret Versions",
      description: "All versions of a secret, newest first.",
      service: SERVICE,
      parameters: Type.Object(SecretParams),
      async run(params) {
        const versions = await state.keyVaultData().listSecretVersions(params.vaultName, params.name);
        return { name: params.name, versions, count: versions.length };
      },
    }),

    defineTool({
      name: "azure_list_deleted_secrets",
      label: "List Deleted Secrets",
      description: "Soft-deleted secrets and their purge dates.",
      service: SERVICE,
      parameters: Type.Object({ vaultName: Vault }),
      async run(params) {
        const secrets = await state.keyVaultData().listDeletedSecrets(params.vaultName);
        return { vaultName: params.vaultName, secrets, count: secrets.length };
      },
    }),

    defineTool({
      name: "azure_get_deleted_secret",
      label: "Get Deleted Secret",
      description: "Deletion and purge dates of one soft-deleted secret. The value is not returned.",
      service: SERVICE,
      parameters: Type.Object(SecretParams),
      async run(params) {
        return { secret: await state.keyVaultData().getDeletedSecret(params.vaultName, params.name) };
      },
    }),

    defineTool({
      name: "azure_recover_deleted_secret",
      label: "Recover Deleted Secret",
      description: "Restore a soft-deleted secret.",
      service: SERVICE,
      parameters: Type.Object(SecretParams),
      async run(params) {
        const secret = await state.keyVaultData().recoverDeletedSecret(params.vaultName, params.name);
        return { secret, message: `Secret ${params.name} recovered` };
      },
    }),

    defineTool({
      name: "azure_purge_deleted_secret",
      label: "Purge Deleted Secret",
      description: "Permanently remove a soft-deleted secret. Requires confirm: true.",
      service: SERVICE,
      parameters: Type.Object({ ...SecretParams, confirm: Type.Boolean({ default: false }) }),
      async run(params) {
        if (!params.confirm) {
          throw new ToolInputError(`Purging ${params.name} cannot be undone; pass confirm: true`, {
            field: "confirm",
            code: "CONFIRMATION_REQUIRED",
          });
        }
        await state.keyVaultData().purgeDeletedSecret(params.vaultName, params.name);
        return { name: params.name, message: `Secret ${params.name} purged` };
      },
    }),

    defineTool({
      name: "azure_update_secret_properties",
      label: "Update Secret Properties",
      description: "Enable or disable a secret, or change its content type, expiry or tags.",
      service: SERVICE,
      parameters: Type.Object({
        ...SecretParams,
        version: Type.Optional(Type.String()),
        enabled: Type.Optional(Type.Boolean()),
        contentType: Type.Optional(Type.String()),
        expiresOn: Type.Optional(Type.String({ description: "Expiry as an ISO date" })),
        tags: Type.Optional(JsonObject("Replacement tags as a JSON object of strings")),
      }),
      async run(params) {
        const secret = await state.keyVaultData().updateSecretProperties(
          params.vaultName,
          params.name,
          {
            enabled: params.enabled,
            contentType: optional(params.contentType),
            expiresOn: parseOptionalDate(params.expiresOn, "expiresOn"),
            tags: params.tags === undefined ? undefined : parseStringMap(params.tags, "tags"),
          },
          optional(params.version),
        );
        return { secret };
      },
    }),

    defineTool({
      name: "azure_list_keys",
      label: "List Keys",
      description: "Cryptographic keys in a vault (metadata only).",
      service: SERVICE,
      parameters: Type.Object({ vaultName: Vault }),
      async run(params) {
        const keys = await state.keyVaultData().listKeys(params.vaultName);
        return { vaultName: params.vaultName, keys, count: keys.length };
      },
    }),

    defineTool({
      name: "azure_get_key",
      label: "Get Key",
      description: "Key type, operations and attributes of a key.",
      service: SERVICE,
      parameters: Type.Object({ vaultName: Vault, name: Name("Key name"), version: Type.Optional(Type.String()) }),
      async run(params) {
        return { key: await state.keyVaultData().getKey(params.vaultName, params.name, optional(params.version)) };
      },
    }),
  ];
}
