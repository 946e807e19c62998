/**
 * Azure DevOps REST client.
 *
 * Authenticates with a personal access token when one is configured,
 * otherwise with an Entra ID token for the DevOps resource.
 */

import { ServiceNotInitializedError, isRecord } from "../../../../src/index.js";
import { withAzureRetry } from "../retry.js";
import type { AzureCredentialProvider, AzureRetryOptions } from "../types.js";

export const DEVOPS_API_VERSION = "7.1";
export const DEVOPS_SCOPE = "499b84ac-1321-427f-aa17-267ca6975798/.default";

export class AzureDevOpsError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly typeKey?: string;

  constructor(statusCode: number, message: string, typeKey?: string) {
    super(message);
    this.name = "AzureDevOpsError";
    this.statusCode = statusCode;
    this.code = `HTTP${statusCode}`;
    this.typeKey = typeKey;
  }
}

export type DevOpsClientOptions = {
  organization: string;
  pat?: string;
  credentials: AzureCredentialProvider;
  retry?: AzureRetryOptions;
  fetch?: typeof fetch;
};

type RequestOptions = {
  method?: "GET" | "POST" | "PATCH";
  query?: Record<string, string | number | undefined>;
  body?: unknown;
  contentType?: string;
  accept?: string;
  /** Release management lives on its own host. */
  area?: "release";
};

export function organizationUrl(organization: string): string {
  const trimmed = organization.trim().replace(/\/+$/, "");
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://dev.azure.com/${encodeURIComponent(trimmed)}`;
}

/** Release management host of an organization URL. */
export function releaseUrl(baseUrl: string): string {
  return baseUrl
    .replace(/^(https?:\/\/)dev\.azure\.com\//i, "$1vsrm.dev.azure.com/")
    .replace(/^(https?:\/\/)([^./]+)\.visualstudio\.com/i, "$1$2.vsrm.visualstudio.com");
}

export class DevOpsRestClient {
  readonly baseUrl: string;
  readonly releaseBaseUrl: string;
  private readonly pat?: string;
  private readonly credentials: AzureCredentialProvider;
  private readonly retry?: AzureRetryOptions;
  private readonly fetchImpl: typeof fetch;

  constructor(options: DevOpsClientOptions) {
    this.baseUrl = organizationUrl(options.organization);
    this.releaseBaseUrl = releaseUrl(this.baseUrl);
    this.pat = options.pat;
    this.credentials = options.credentials;
    this.retry = options.retry;
    this.fetchImpl = options.fetch ?? fetch;
  }

  get authMethod(): "pat" | "entra-id" {
    return this.pat ? "pat" : "entra-id";
  }

  private async authorization(): Promise<string> {
    if (this.pat) return `Basic ${Buffer.from(`:${this.pat}`).toString("base64")}`;
    const { credential } = await this.credentials.getCredential();
    const token = await credential.getToken(DEVOPS_SCOPE);
    if (!token) {
      throw new ServiceNotInitializedError("devops", "No Azure DevOps token; set AZURE_DEVOPS_PAT or sign in with az login");
    }
    return `Bearer ${token.token}`;
  }

  url(path: string, query: RequestOptions["query"] = {}, area?: RequestOptions["area"]): string {
    const base = area === "release" ? this.releaseBaseUrl : this.baseUrl;
    const url = new URL(`${base}/${path.replace(/^\//, "")}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    url.searchParams.set("api-version", DEVOPS_API_VERSION);
    return url.toString();
  }

  private async send(path: string, options: RequestOptions): Promise<Response> {
    const headers: Record<string, string> = {
      Authorization: await this.authorization(),
      Accept: options.accept ?? "application/json",
    };
    if (options.body !== undefined) headers["Content-Type"] = options.contentType ?? "application/json";

    const response = await this.fetchImpl(this.url(path, options.query, options.area), {
      method: options.method ?? "GET",
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    if (!response.ok) throw await toDevOpsError(response);
    return response;
  }

  async json(path: string, options: RequestOptions = {}): Promise<unknown> {
    return withAzureRetry(async () => {
      const response = await this.send(path, options);
      const body: unknown = await response.json();
      return body;
    }, this.retry);
  }

  async text(path: string, options: RequestOptions = {}): Promise<string> {
    return withAzureRetry(async () => (await this.send(path, { ...options, accept: "text/plain" })).text(), this.retry);
  }
}

function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // HTML sign-in pages and empty bodies
    return undefined;
  }
}

async function toDevOpsError(response: Response): Promise<AzureDevOpsError> {
  const body = parseBody(await response.text());
  let message = `Azure DevOps API error: ${response.status} ${response.statusText}`.trim();
  let typeKey: string | undefined;
  if (isRecord(body)) {
    if (typeof body.message === "string") message = `${message}: ${body.message}`;
    if (typeof body.typeKey === "string") typeKey = body.typeKey;
  }
  return new AzureDevOpsError(response.status, message, typeKey);
}
