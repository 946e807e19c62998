/**
 * Configuration schema (TypeBox) and loader.
 *
 * Sources, later wins: schema defaults, JSON file, environment variables.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors/index.js";
import { stringEnum } from "./mcp/tool-registry.js";
import { isRecord } from "./mcp/params.js";

export const CREDENTIAL_METHODS = [
  "default",
  "cli",
  "service-principal",
  "certificate",
  "managed-identity",
  "environment",
] as const;

export type AzureCredentialMethod = (typeof CREDENTIAL_METHODS)[number];

export const configSchema = Type.Object({
  logging: Type.Object(
    {
      level: stringEnum(["trace", "debug", "info", "warn", "error", "fatal"], { default: "info" }),
      file: Type.Optional(Type.String({ description: "Append JSON-lines logs to this file" })),
    },
    { default: {} },
  ),
  retry: Type.Object(
    {
      maxAttempts: Type.Integer({ minimum: 1, default: 3 }),
      minDelayMs: Type.Integer({ minimum: 0, default: 100 }),
      maxDelayMs: Type.Integer({ minimum: 0, default: 30_000 }),
      jitterFactor: Type.Number({ minimum: 0, maximum: 1, default: 0.2 }),
    },
    { default: {} },
  ),
  aws: Type.Object(
    {
      region: Type.Optional(Type.String({ description: "Default AWS region (e.g. us-east-1)" })),
      profile: Type.Optional(Type.String({ description: "Named profile from ~/.aws/credentials" })),
      quickSightAccountId: Type.Optional(Type.String({ description: "AWS account id used for QuickSight" })),
    },
    { default: {} },
  ),
  azure: Type.Object(
    {
      subscriptionId: Type.Optional(Type.String({ description: "Default Azure subscription ID" })),
      tenantId: Type.Optional(Type.String({ description: "Default Azure AD tenant ID" })),
      credentialMethod: stringEnum(CREDENTIAL_METHODS, { default: "default" }),
      devOpsOrganization: Type.Optional(Type.String({ description: "Azure DevOps organization name" })),
      devOpsPat: Type.Optional(Type.String({ description: "Azure DevOps personal access token" })),
    },
    { default: {} },
  ),
  documents: Type.Object(
    {
      dataDirectory: Type.String({ default: join(homedir(), ".cloud-mcp", "documents") }),
      maxCachedDocuments: Type.Integer({ minimum: 1, default: 50 }),
      maxCacheMemoryMb: Type.Integer({ minimum: 1, default: 2048 }),
      tesseractPath: Type.String({ default: "tesseract" }),
      pdftoppmPath: Type.String({ default: "pdftoppm" }),
      ocrLanguage: Type.String({ default: "eng" }),
      ocrTimeoutMs: Type.Integer({ minimum: 1000, default: 120_000 }),
    },
    { default: {} },
  ),
});

export type AppConfig = Static<typeof configSchema>;

/** Environment variable -> dotted config path. */
const ENV_MAPPING: Array<[string, string]> = [
  ["CLOUD_MCP_LOG_LEVEL", "logging.level"],
  ["CLOUD_MCP_LOG_FILE", "logging.file"],
  ["AWS_DEFAULT_REGION", "aws.region"],
  ["AWS_REGION", "aws.region"],
  ["AWS_PROFILE", "aws.profile"],
  ["QUICKSIGHT_ACCOUNT_ID", "aws.quickSightAccountId"],
  ["AZURE_SUBSCRIPTION_ID", "azure.subscriptionId"],
  ["AZURE_TENANT_ID", "azure.tenantId"],
  ["AZURE_CREDENTIAL_METHOD", "azure.credentialMethod"],
  ["AZURE_DEVOPS_ORG", "azure.devOpsOrganization"],
  ["AZURE_DEVOPS_PAT", "azure.devOpsPat"],
  ["DOCUMENT_SERVER_DATA_DIR", "documents.dataDirectory"],
  ["TESSERACT_PATH", "documents.tesseractPath"],
  ["PDFTOPPM_PATH", "documents.pdftoppmPath"],
  ["OCR_LANGUAGE", "documents.ocrLanguage"],
];

function setPath(target: Record<string, unknown>, path: string, value: string): void {
  const keys = path.split(".");
  let node = target;
  for (const key of keys.slice(0, -1)) {
    const next = node[key];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    }
  }
  node[keys[keys.length - 1]] = value;
}

export function applyEnvironment(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result = structuredClone(raw);
  for (const [name, path] of ENV_MAPPING) {
    const value = env[name];
    if (value !== undefined && value !== "") setPath(result, path, value);
  }
  return result;
}

/**
 * Apply defaults, coerce and validate a raw config object.
 */
export function resolveConfig(raw: unknown): AppConfig {
  const converted = Value.Convert(configSchema, Value.Default(configSchema, raw ?? {}));
  if (Value.Check(configSchema, converted)) return converted;
  const first = Value.Errors(configSchema, converted).First();
  throw new ConfigError(`Invalid configuration: ${first?.message ?? "unknown error"}`, first?.path);
}

export async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(parsed)) throw new ConfigError(`Config file ${path} must contain a JSON object`);
  return parsed;
}

export async function loadConfig(options: { file?: string; env?: NodeJS.ProcessEnv } = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const file = options.file ?? env.CLOUD_MCP_CONFIG;
  const fromFile = file ? await readConfigFile(file) : {};
  return resolveConfig(applyEnvironment(fromFile, env));
}

/**
 * Copy of the config with secrets masked, for display.
 */
export function describeConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    azure: { ...config.azure, devOpsPat: config.azure.devOpsPat ? "***" : undefined },
  };
}
