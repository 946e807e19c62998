/**
 * Azure Credentials Manager
 *
 * Builds @azure/identity credentials for the selected method and caches
 * them for an hour. Also resolves the subscription the ARM managers use.
 */

import { access, readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import type { TokenCredential } from "@azure/identity";
import {
  ServiceNotInitializedError,
  ToolInputError,
  errorCode,
  isRecord,
  type AzureCredentialMethod,
} from "../../../../src/index.js";
import type { AzureCredentialProvider, AzureCredentialResult } from "../types.js";

export const ARM_SCOPE = "https://management.azure.com/.default";
const CREDENTIAL_TTL_MS = 3_600_000;

export type ServicePrincipalConfig = {
  tenantId: string;
  clientId: string;
  clientSecret?: string;
  certificatePath?: string;
};

export type AzureCredentialsManagerOptions = {
  subscriptionId?: string;
  tenantId?: string;
  method?: AzureCredentialMethod;
  env?: NodeJS.ProcessEnv;
  /** Directory holding azureProfile.json (defaults to ~/.azure). */
  azureConfigDir?: string;
  now?: () => number;
};

export type AzureCliSubscription = {
  id: string;
  name?: string;
  tenantId?: string;
  user?: string;
  isDefault: boolean;
};

export type AzureCredentialDiscovery = {
  environment: {
    servicePrincipal: boolean;
    certificate: boolean;
    tenantId?: string;
    clientId?: string;
  };
  azureCli: {
    profileFound: boolean;
    profilePath: string;
    subscriptionCount: number;
    defaultSubscription?: AzureCliSubscription;
  };
  managedIdentity: {
    available: boolean;
    clientId?: string;
  };
  availableMethods: AzureCredentialMethod[];
  recommendedMethod: AzureCredentialMethod;
};

export type AzureCredentialStatus = {
  method: AzureCredentialMethod;
  tenantId?: string;
  subscriptionId?: string;
  cached: boolean;
  servicePrincipal?: { tenantId: string; clientId: string; hasSecret: boolean; certificatePath?: string };
};

type CacheEntry = { credential: TokenCredential; expiresAt: number };

function readCliSubscriptions(data: unknown): AzureCliSubscription[] {
  if (!isRecord(data) || !Array.isArray(data.subscriptions)) return [];
  return data.subscriptions.filter(isRecord).map((s) => ({
    id: typeof s.id === "string" ? s.id : "",
    name: typeof s.name === "string" ? s.name : undefined,
    tenantId: typeof s.tenantId === "string" ? s.tenantId : undefined,
    user: isRecord(s.user) && typeof s.user.name === "string" ? s.user.name : undefined,
    isDefault: s.isDefault === true,
  }));
}

export class AzureCredentialsManager implements AzureCredentialProvider {
  private readonly env: NodeJS.ProcessEnv;
  private readonly azureConfigDir: string;
  private readonly now: () => number;
  private readonly cache = new Map<string, CacheEntry>();
  private method: AzureCredentialMethod;
  private subscriptionId?: string;
  private tenantId?: string;
  private servicePrincipal?: ServicePrincipalConfig;

  constructor(options: AzureCredentialsManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.azureConfigDir = options.azureConfigDir ?? this.env.AZURE_CONFIG_DIR ?? join(homedir(), ".azure");
    this.now = options.now ?? Date.now;
    this.method = options.method ?? "default";
    this.subscriptionId = options.subscriptionId ?? this.env.AZURE_SUBSCRIPTION_ID;
    this.tenantId = options.tenantId ?? this.env.AZURE_TENANT_ID;
  }

  get currentMethod(): AzureCredentialMethod {
    return this.method;
  }

  async getCredential(method?: AzureCredentialMethod): Promise<AzureCredentialResult> {
    const resolved = method ?? this.method;
    const key = `${resolved}:${this.tenantId ?? ""}:${this.servicePrincipal?.clientId ?? ""}`;
    const cached = this.cache.get(key);
    if (cached && cached.expiresAt > this.now()) {
      return { credential: cached.credential, method: resolved, tenantId: this.tenantId };
    }

    const credential = await this.createCredential(resolved);
    this.cache.set(key, { credential, expiresAt: this.now() + CREDENTIAL_TTL_MS });
    return { credential, method: resolved, tenantId: this.tenantId };
  }

  selectMethod(method: AzureCredentialMethod): void {
    this.method = method;
    this.clearCache();
  }

  /**
   * Store service principal details for this process and switch to them.
   */
  async configureServicePrincipal(config: ServicePrincipalConfig): Promise<AzureCredentialMethod> {
    if (config.certificatePath && !config.clientSecret) {
      try {
        await access(config.certificatePath);
      } catch {
        throw new ToolInputError(`Certificate file not found: ${config.certificatePath}`, {
          code: "CERTIFICATE_NOT_FOUND",
          field: "certificatePath",
        });
      }
    }
    this.servicePrincipal = config;
    this.tenantId = config.tenantId;
    this.selectMethod(config.clientSecret ? "service-principal" : "certificate");
    return this.method;
  }

  getSubscriptionId(): string | undefined {
    return this.subscriptionId;
  }

  setSubscriptionId(subscriptionId: string): void {
    this.subscriptionId = subscriptionId;
  }

  getTenantId(): string | undefined {
    return this.tenantId;
  }

  /**
   * Configured subscription, else the first one the identity can see.
   */
  async resolveSubscriptionId(): Promise<string> {
    if (this.subscriptionId) return this.subscriptionId;

    const { credential } = await this.getCredential();
    const { SubscriptionClient } = await import("@azure/arm-subscriptions");
    const client = new SubscriptionClient(credential);
    for await (const subscription of client.subscriptions.list()) {
      if (subscription.subscriptionId) {
        this.subscriptionId = subscription.subscriptionId;
        return subscription.subscriptionId;
      }
    }
    throw new ServiceNotInitializedError(
      "Azure",
      "No Azure subscription is configured or visible to this identity; set AZURE_SUBSCRIPTION_ID",
    );
  }

  status(): AzureCredentialStatus {
    const sp = this.servicePrincipal;
    return {
      method: this.method,
      tenantId: this.tenantId,
      subscriptionId: this.subscriptionId,
      cached: [...this.cache.values()].some((entry) => entry.expiresAt > this.now()),
      servicePrincipal: sp
        ? { tenantId: sp.tenantId, clientId: sp.clientId, hasSecret: Boolean(sp.clientSecret), certificatePath: sp.certificatePath }
        : undefined,
    };
  }

  /**
   * Request an ARM token with the current method.
   */
  async testConnection(): Promise<{ method: AzureCredentialMethod; expiresOn?: string }> {
    const { credential, method } = await this.getCredential();
    const token = await credential.getToken(ARM_SCOPE);
    if (!token) {
      throw new ServiceNotInitializedError("Azure", `The ${method} credential returned no token`);
    }
    return { method, expiresOn: new Date(token.expiresOnTimestamp).toISOString() };
  }

  async discover(): Promise<AzureCredentialDiscovery> {
    const env = this.env;
    const servicePrincipal = Boolean(env.AZURE_TENANT_ID && env.AZURE_CLIENT_ID && env.AZURE_CLIENT_SECRET);
    const certificate = Boolean(env.AZURE_TENANT_ID && env.AZURE_CLIENT_ID && env.AZURE_CLIENT_CERTIFICATE_PATH);
    const managedIdentity = Boolean(env.IDENTITY_ENDPOINT || env.MSI_ENDPOINT);

    const profilePath = join(this.azureConfigDir, "azureProfile.json");
    const subscriptions = await this.readCliProfile(profilePath);

    const availableMethods: AzureCredentialMethod[] = ["default"];
    if (servicePrincipal) availableMethods.push("service-principal", "environment");
    if (certificate) availableMethods.push("certificate");
    if (managedIdentity) availableMethods.push("managed-identity");
    if (subscriptions) availableMethods.push("cli");

    const recommendedMethod: AzureCredentialMethod = servicePrincipal
      ? "service-principal"
      : certificate
        ? "certificate"
        : managedIdentity
          ? "managed-identity"
          : subscriptions
            ? "cli"
            : "default";

    return {
      environment: { servicePrincipal, certificate, tenantId: env.AZURE_TENANT_ID, clientId: env.AZURE_CLIENT_ID },
      azureCli: {
        profileFound: subscriptions !== null,
        profilePath,
        subscriptionCount: subscriptions?.length ?? 0,
        defaultSubscription: subscriptions?.find((s) => s.isDefault),
      },
      managedIdentity: { available: managedIdentity, clientId: managedIdentity ? env.AZURE_CLIENT_ID : undefined },
      availableMethods,
      recommendedMethod,
    };
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async readCliProfile(path: string): Promise<AzureCliSubscription[] | null> {
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (error) {
      if (errorCode(error) === "ENOENT") return null;
      throw error;
    }
    // az writes the profile with a byte-order mark
    return readCliSubscriptions(JSON.parse(text.replace(/^\uFEFF/, "")));
  }

  private async createCredential(method: AzureCredentialMethod): Promise<TokenCredential> {
    const identity = await import("@azure/identity");
    const env = this.env;
    const tenantId = this.servicePrincipal?.tenantId ?? this.tenantId;
    const clientId = this.servicePrincipal?.clientId ?? env.AZURE_CLIENT_ID;

    switch (method) {
      case "cli":
        return new identity.AzureCliCredential({ tenantId });

      case "service-principal": {
        const secret = this.servicePrincipal?.clientSecret ?? env.AZURE_CLIENT_SECRET;
        if (!tenantId || !clientId || !secret) {
          throw new ServiceNotInitializedError(
            "Azure",
            "Service principal auth needs a tenant id, client id and client secret (AZURE_TENANT_ID, AZURE_CLIENT_ID, AZURE_CLIENT_SECRET)",
          );
        }
        return new identity.ClientSecretCredential(tenantId, clientId, secret);
      }

      case "certificate": {
        const certificatePath = this.servicePrincipal?.certificatePath ?? env.AZURE_CLIENT_CERTIFICATE_PATH;
        if (!tenantId || !clientId || !certificatePath) {
          throw new ServiceNotInitializedError(
            "Azure",
            "Certificate auth needs a tenant id, client id and certificate path (AZURE_CLIENT_CERTIFICATE_PATH)",
          );
        }
        return new identity.ClientCertificateCredential(tenantId, clientId, certificatePath);
      }

      case "managed-identity":
        return env.AZURE_CLIENT_ID
          ? new identity.ManagedIdentityCredential({ clientId: env.AZURE_CLIENT_ID })
          : new identity.ManagedIdentityCredential();

      case "environment":
        return new identity.EnvironmentCredential();

      case "default":
        return new identity.DefaultAzureCredential(tenantId ? { tenantId } : undefined);
    }
  }
}
