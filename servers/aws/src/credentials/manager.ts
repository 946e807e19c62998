/**
 * AWS Credentials Manager
 *
 * Reads profiles from the shared config files and picks a credential
 * provider: explicit profile (SSO or static/assume-role), environment keys,
 * or the SDK default chain.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseIni } from "ini";
import { fromEnv, fromIni, fromNodeProviderChain, fromSSO } from "@aws-sdk/credential-providers";
import { GetCallerIdentityCommand, STSClient } from "@aws-sdk/client-sts";
import type { AwsCredentialIdentityProvider } from "@smithy/types";
import { errorCode, isRecord } from "../../../../src/index.js";
import type { AwsCallerIdentity, AwsCredentialSource, AwsProfileInfo } from "../types.js";

export type AwsCredentialsManagerOptions = {
  credentialsFile?: string;
  configFile?: string;
  env?: NodeJS.ProcessEnv;
};

export type ResolvedAwsCredentials = {
  source: AwsCredentialSource;
  profile?: string;
  provider: AwsCredentialIdentityProvider;
};

async function readIniFile(path: string): Promise<Record<string, unknown>> {
  try {
    return parseIni(await readFile(path, "utf8"));
  } catch (error) {
    if (errorCode(error) === "ENOENT") return {};
    throw error;
  }
}

function stringField(values: Record<string, unknown>, key: string): string | undefined {
  const value = values[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export class AwsCredentialsManager {
  private readonly credentialsFile: string;
  private readonly configFile: string;
  private readonly env: NodeJS.ProcessEnv;
  private profiles: Map<string, AwsProfileInfo> | null = null;

  constructor(options: AwsCredentialsManagerOptions = {}) {
    this.env = options.env ?? process.env;
    const awsDir = join(homedir(), ".aws");
    this.credentialsFile = options.credentialsFile ?? this.env.AWS_SHARED_CREDENTIALS_FILE ?? join(awsDir, "credentials");
    this.configFile = options.configFile ?? this.env.AWS_CONFIG_FILE ?? join(awsDir, "config");
  }

  get files(): { credentialsFile: string; configFile: string } {
    return { credentialsFile: this.credentialsFile, configFile: this.configFile };
  }

  /**
   * Profiles from both files, merged by name. `[profile x]` sections in the
   * config file map to `x`.
   */
  async listProfiles(refresh = false): Promise<AwsProfileInfo[]> {
    if (!this.profiles || refresh) {
      this.profiles = await this.loadProfiles();
    }
    return [...this.profiles.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  async getProfile(name: string): Promise<AwsProfileInfo | undefined> {
    await this.listProfiles();
    return this.profiles?.get(name);
  }

  private async loadProfiles(): Promise<Map<string, AwsProfileInfo>> {
    const profiles = new Map<string, AwsProfileInfo>();
    const upsert = (name: string, file: "credentials" | "config", values: Record<string, unknown>) => {
      const existing = profiles.get(name) ?? { name, hasStaticKeys: false, definedIn: [] };
      profiles.set(name, {
        ...existing,
        region: stringField(values, "region") ?? existing.region,
        hasStaticKeys: existing.hasStaticKeys || stringField(values, "aws_access_key_id") !== undefined,
        roleArn: stringField(values, "role_arn") ?? existing.roleArn,
        sourceProfile: stringField(values, "source_profile") ?? existing.sourceProfile,
        ssoStartUrl: stringField(values, "sso_start_url") ?? stringField(values, "sso_session") ?? existing.ssoStartUrl,
        ssoAccountId: stringField(values, "sso_account_id") ?? existing.ssoAccountId,
        definedIn: existing.definedIn.includes(file) ? existing.definedIn : [...existing.definedIn, file],
      });
    };

    for (const [name, values] of Object.entries(await readIniFile(this.credentialsFile))) {
      if (isRecord(values)) upsert(name, "credentials", values);
    }
    for (const [section, values] of Object.entries(await readIniFile(this.configFile))) {
      if (!isRecord(values) || section.startsWith("sso-session ") || section.startsWith("services ")) continue;
      const name = section.startsWith("profile ") ? section.slice("profile ".length).trim() : section;
      upsert(name, "config", values);
    }
    return profiles;
  }

  hasEnvironmentCredentials(): boolean {
    return Boolean(this.env.AWS_ACCESS_KEY_ID && this.env.AWS_SECRET_ACCESS_KEY);
  }

  /**
   * Pick the provider for a profile, or for the ambient environment.
   */
  async resolve(profile?: string): Promise<ResolvedAwsCredentials> {
    if (profile) {
      const info = await this.getProfile(profile);
      if (info?.ssoStartUrl || info?.ssoAccountId) {
        return { source: "sso", profile, provider: fromSSO({ profile }) };
      }
      return { source: "profile", profile, provider: fromIni({ profile }) };
    }
    if (this.hasEnvironmentCredentials()) {
      return { source: "environment", provider: fromEnv() };
    }
    return { source: "default-chain", provider: fromNodeProviderChain() };
  }

  async getCallerIdentity(region: string, credentials?: AwsCredentialIdentityProvider): Promise<AwsCallerIdentity> {
    const client = new STSClient({ region, credentials });
    try {
      const response = await client.send(new GetCallerIdentityCommand({}));
      return {
        accountId: response.Account ?? "",
        arn: response.Arn ?? "",
        userId: response.UserId ?? "",
      };
    } finally {
      client.destroy();
    }
  }
}
