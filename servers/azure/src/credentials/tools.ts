/**
 * Credential discovery, selection and health tools.
 */

import { Type } from "@sinclair/typebox";
import {
  CREDENTIAL_METHODS,
  ToolInputError,
  defineTool,
  errorMessage,
  stringEnum,
  type Logger,
  type ToolDefinition,
} from "../../../../src/index.js";
import type { AzureServerState } from "../state.js";

const SERVICE = "auth";

function requireField(value: string | undefined, field: string, code: string): string {
  const trimmed = value?.trim();
  if (!trimmed) throw new ToolInputError(`${field} is required`, { field, code });
  return trimmed;
}

export function createAuthTools(state: AzureServerState, logger: Logger): ToolDefinition[] {
  return [
    defineTool({
      name: "azure_discover_credentials",
      label: "Discover Azure Credentials",
      description: "Credential sources found in the environment, the az CLI profile and managed identity.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        const discovery = await state.credentials.discover();
        return {
          ...discovery,
          currentMethod: state.credentials.currentMethod,
          suggestedTools: ["azure_select_credential", "azure_test_connection"],
        };
      },
    }),

    defineTool({
      name: "azure_get_credential_status",
      label: "Get Credential Status",
      description: "Selected credential method, tenant and subscription.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        return { status: state.credentials.status() };
      },
    }),

    defineTool({
      name: "azure_select_credential",
      label: "Select Credential",
      description: "Switch the credential method. Cached clients are dropped.",
      service: SERVICE,
      parameters: Type.Object({
        method: stringEnum(CREDENTIAL_METHODS),
        subscriptionId: Type.Optional(Type.String({ description: "Also switch the default subscription" })),
      }),
      async run(params) {
        state.reset();
        state.credentials.selectMethod(params.method);
        const subscriptionId = params.subscriptionId?.trim();
        if (subscriptionId) state.credentials.setSubscriptionId(subscriptionId);
        logger.info(`Azure credential method set to ${params.method}`);
        return { method: params.method, status: state.credentials.status() };
      },
    }),

    defineTool({
      name: "azure_configure_service_principal",
      label: "Configure Service Principal",
      description: "Use a service principal (client secret or certificate) for this session. Requires confirm: true.",
      service: SERVICE,
      parameters: Type.Object({
        tenantId: Type.Optional(Type.String()),
        clientId: Type.Optional(Type.String()),
        authType: stringEnum(["secret", "certificate"], { default: "secret" }),
        clientSecret: Type.Optional(Type.String()),
        certificatePath: Type.Optional(Type.String({ description: "PEM file with certificate and private key" })),
        confirm: Type.Boolean({ default: false }),
      }),
      async run(params) {
        if (!params.confirm) {
          throw new ToolInputError("Switching credentials affects every Azure tool; pass confirm: true", {
            field: "confirm",
            code: "CONFIRMATION_REQUIRED",
          });
        }
        const tenantId = requireField(params.tenantId, "tenantId", "MISSING_TENANT_ID");
        const clientId = requireField(params.clientId, "clientId", "MISSING_CLIENT_ID");
        const secretAuth = params.authType === "secret";
        const clientSecret = secretAuth ? requireField(params.clientSecret, "clientSecret", "MISSING_CLIENT_SECRET") : undefined;
        const certificatePath = secretAuth
          ? undefined
          : requireField(params.certificatePath, "certificatePath", "MISSING_CERTIFICATE_PATH");

        state.reset();
        const method = await state.credentials.configureServicePrincipal({ tenantId, clientId, clientSecret, certificatePath });
        logger.info(`Azure service principal configured (method=${method})`, { tenantId, clientId });
        return { method, tenantId, clientId, message: "Service principal configured; run azure_test_connection to verify it" };
      },
    }),

    defineTool({
      name: "azure_test_connection",
      label: "Test Azure Connection",
      description: "Request an ARM token and resolve the subscription. Reports connected: false instead of failing.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        try {
          const token = await state.credentials.testConnection();
          const subscriptionId = await state.subscriptionId();
          return { connected: true, ...token, subscriptionId };
        } catch (error) {
          logger.warn(`Azure connection test failed: ${errorMessage(error)}`);
          return { connected: false, method: state.credentials.currentMethod, error: errorMessage(error) };
        }
      },
    }),

    defineTool({
      name: "azure_health",
      label: "Azure Health",
      description: "Credential method and which service clients have been created.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        return { ...state.health() };
      },
    }),
  ];
}
