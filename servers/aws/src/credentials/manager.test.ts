import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@aws-sdk/credential-providers", () => ({
  fromEnv: vi.fn(() => "env-provider"),
  fromIni: vi.fn(() => "ini-provider"),
  fromSSO: vi.fn(() => "sso-provider"),
  fromNodeProviderChain: vi.fn(() => "chain-provider"),
}));

import { fromIni, fromSSO } from "@aws-sdk/credential-providers";
import { AwsCredentialsManager } from "./manager.js";

const CREDENTIALS = `
[default]
aws_access_key_id = test-key
aws_secret_access_key = test-secret

[dev]
region = eu-west-1
`;

const CONFIG = `
[default]
region = us-east-2

[profile dev]
role_arn = arn:aws:iam::123456789012:role/dev
source_profile = default

[profile sso-user]
sso_start_url = https://example.awsapps.com/start
sso_account_id = 123456789012
sso_region = us-east-1

[sso-session corp]
sso_start_url = https://example.awsapps.com/start
`;

describe("AwsCredentialsManager", () => {
  let dir: string;
  let manager: AwsCredentialsManager;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), "aws-creds-"));
    await writeFile(join(dir, "credentials"), CREDENTIALS);
    await writeFile(join(dir, "config"), CONFIG);
    manager = new AwsCredentialsManager({
      credentialsFile: join(dir, "credentials"),
      configFile: join(dir, "config"),
      env: {},
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("merges profiles from both files", async () => {
    const profiles = await manager.listProfiles();
    expect(profiles.map((p) => p.name)).toEqual(["default", "dev", "sso-user"]);

    const dev = profiles.find((p) => p.name === "dev");
    expect(dev).toEqual({
      name: "dev",
      region: "eu-west-1",
      hasStaticKeys: false,
      roleArn: "arn:aws:iam::123456789012:role/dev",
      sourceProfile: "default",
      ssoStartUrl: undefined,
      ssoAccountId: undefined,
      definedIn: ["credentials", "config"],
    });
    expect(profiles.find((p) => p.name === "default")?.hasStaticKeys).toBe(true);
  });

  it("treats missing files as empty", async () => {
    const empty = new AwsCredentialsManager({
      credentialsFile: join(dir, "missing-credentials"),
      configFile: join(dir, "missing-config"),
      env: {},
    });
    expect(await empty.listProfiles()).toEqual([]);
  });

  it("uses the SSO provider for SSO profiles", async () => {
    const resolved = await manager.resolve("sso-user");
    expect(resolved.source).toBe("sso");
    expect(fromSSO).toHaveBeenCalledWith({ profile: "sso-user" });
  });

  it("uses the ini provider for other named profiles", async () => {
    const resolved = await manager.resolve("dev");
    expect(resolved).toMatchObject({ source: "profile", profile: "dev" });
    expect(fromIni).toHaveBeenCalledWith({ profile: "dev" });
  });

  it("prefers environment keys when no profile is given", async () => {
    const withEnv = new AwsCredentialsManager({
      credentialsFile: join(dir, "credentials"),
      configFile: join(dir, "config"),
      env: { AWS_ACCESS_KEY_ID: "test-key", AWS_SECRET_ACCESS_KEY: "test-secret" },
    });
    expect(withEnv.hasEnvironmentCredentials()).toBe(true);
    expect((await withEnv.resolve()).source).toBe("environment");
  });

  it("falls back to the default chain", async () => {
    expect(manager.hasEnvironmentCredentials()).toBe(false);
    expect((await manager.resolve()).source).toBe("default-chain");
  });
});
