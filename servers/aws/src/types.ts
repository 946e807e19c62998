/**
 * Shared AWS server types.
 */

import type { AwsCredentialIdentityProvider } from "@smithy/types";
import type { RetryPolicy } from "../../../src/retry.js";

export type AwsManagerOptions = {
  region: string;
  credentials?: AwsCredentialIdentityProvider;
  retry?: Partial<RetryPolicy>;
};

export type AwsCredentialSource = "environment" | "sso" | "profile" | "default-chain";

export type AwsProfileInfo = {
  name: string;
  region?: string;
  hasStaticKeys: boolean;
  roleArn?: string;
  sourceProfile?: string;
  ssoStartUrl?: string;
  ssoAccountId?: string;
  definedIn: Array<"credentials" | "config">;
};

export type AwsCallerIdentity = {
  accountId: string;
  arn: string;
  userId: string;
};

export const DEFAULT_AWS_REGION = "us-east-1";
