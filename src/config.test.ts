import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { applyEnvironment, describeConfig, loadConfig, resolveConfig } from "./config.js";
import { ConfigError } from "./errors/index.js";

describe("resolveConfig", () => {
  it("fills every section with defaults", () => {
    const config = resolveConfig({});
    expect(config.logging.level).toBe("info");
    expect(config.retry).toEqual({ maxAttempts: 3, minDelayMs: 100, maxDelayMs: 30_000, jitterFactor: 0.2 });
    expect(config.azure.credentialMethod).toBe("default");
    expect(config.documents.maxCachedDocuments).toBe(50);
    expect(config.documents.tesseractPath).toBe("tesseract");
  });

  it("coerces numeric strings", () => {
    expect(resolveConfig({ retry: { maxAttempts: "5" } }).retry.maxAttempts).toBe(5);
  });

  it("rejects unknown credential methods", () => {
    expect(() => resolveConfig({ azure: { credentialMethod: "magic" } })).toThrow(ConfigError);
  });
});

describe("applyEnvironment", () => {
  it("maps environment variables onto config paths", () => {
    const raw = applyEnvironment(
      { aws: { profile: "from-file" } },
      { AWS_REGION: "eu-west-1", AZURE_SUBSCRIPTION_ID: "sub-1", AWS_PROFILE: "" },
    );
    expect(raw).toEqual({ aws: { profile: "from-file", region: "eu-west-1" }, azure: { subscriptionId: "sub-1" } });
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cloud-mcp-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("layers the environment over the file", async () => {
    const file = join(dir, "config.json");
    await writeFile(file, JSON.stringify({ logging: { level: "debug" }, aws: { region: "us-west-2" } }));
    const config = await loadConfig({ file, env: { AWS_REGION: "ap-south-1" } });
    expect(config.logging.level).toBe("debug");
    expect(config.aws.region).toBe("ap-south-1");
  });

  it("reports unreadable files", async () => {
    await expect(loadConfig({ file: join(dir, "missing.json"), env: {} })).rejects.toThrow(/Cannot read config file/);
  });

  it("reports invalid JSON", async () => {
    const file = join(dir, "bad.json");
    await writeFile(file, "{");
    await expect(loadConfig({ file, env: {} })).rejects.toThrow(/is not valid JSON/);
  });
});

describe("describeConfig", () => {
  it("masks the DevOps token", () => {
    const config = resolveConfig({ azure: { devOpsPat: "test-secret" } });
    expect(describeConfig(config).azure.devOpsPat).toBe("***");
  });
});
