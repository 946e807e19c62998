/**
 * Region, credentials and lazily created managers shared by the AWS tools.
 */

import type { AwsCredentialIdentityProvider } from "@smithy/types";
import { ServiceNotInitializedError, type AppConfig, type Logger, type RetryPolicy } from "../../../src/index.js";
import { CloudWatchLogsManager } from "./cloudwatch/logs-manager.js";
import { CloudWatchMetricsManager } from "./cloudwatch/metrics-manager.js";
import { AwsCredentialsManager } from "./credentials/manager.js";
import { EcrManager } from "./ecr/manager.js";
import { EcsManager } from "./ecs/manager.js";
import { QuickSightManager } from "./quicksight/manager.js";
import { S3Manager } from "./s3/manager.js";
import { DEFAULT_AWS_REGION, type AwsCallerIdentity, type AwsCredentialSource, type AwsManagerOptions } from "./types.js";

type ManagerCache = Partial<{
  logs: CloudWatchLogsManager;
  metrics: CloudWatchMetricsManager;
  s3: S3Manager;
  ecr: EcrManager;
  ecs: EcsManager;
  quicksight: QuickSightManager;
}>;

export type AwsServerStateOptions = {
  config: AppConfig["aws"];
  retry?: Partial<RetryPolicy>;
  logger: Logger;
  credentialsManager?: AwsCredentialsManager;
};

export type AwsSession = {
  region: string;
  profile?: string;
  credentialSource: AwsCredentialSource;
};

export class AwsServerState {
  readonly credentialsManager: AwsCredentialsManager;
  private readonly logger: Logger;
  private readonly retry?: Partial<RetryPolicy>;
  private region: string;
  private profile?: string;
  private credentialSource: AwsCredentialSource = "default-chain";
  private credentials?: AwsCredentialIdentityProvider;
  private quickSightAccountId?: string;
  private cache: ManagerCache = {};

  constructor(options: AwsServerStateOptions) {
    this.logger = options.logger;
    this.retry = options.retry;
    this.credentialsManager = options.credentialsManager ?? new AwsCredentialsManager();
    this.region = options.config.region ?? DEFAULT_AWS_REGION;
    this.profile = options.config.profile;
    this.quickSightAccountId = options.config.quickSightAccountId;
  }

  get session(): AwsSession {
    return { region: this.region, profile: this.profile, credentialSource: this.credentialSource };
  }

  /**
   * Resolve credentials for the region/profile and drop cached clients.
   */
  async initialize(options: { region?: string; profile?: string } = {}): Promise<AwsSession> {
    if (options.region) this.region = options.region;
    if (options.profile !== undefined) this.profile = options.profile || undefined;

    const resolved = await this.credentialsManager.resolve(this.profile);
    this.credentials = resolved.provider;
    this.credentialSource = resolved.source;
    this.reset();
    this.logger.info(`AWS session initialized (region=${this.region}, source=${resolved.source})`, {
      profile: this.profile,
    });
    return this.session;
  }

  managerOptions(): AwsManagerOptions {
    return { region: this.region, credentials: this.credentials, retry: this.retry };
  }

  get logs(): CloudWatchLogsManager {
    return (this.cache.logs ??= new CloudWatchLogsManager(this.managerOptions()));
  }

  get metrics(): CloudWatchMetricsManager {
    return (this.cache.metrics ??= new CloudWatchMetricsManager(this.managerOptions()));
  }

  get s3(): S3Manager {
    return (this.cache.s3 ??= new S3Manager(this.managerOptions()));
  }

  get ecr(): EcrManager {
    return (this.cache.ecr ??= new EcrManager(this.managerOptions()));
  }

  get ecs(): EcsManager {
    return (this.cache.ecs ??= new EcsManager(this.managerOptions()));
  }

  async getCallerIdentity(): Promise<AwsCallerIdentity> {
    return this.credentialsManager.getCallerIdentity(this.region, this.credentials);
  }

  /**
   * QuickSight needs the account id: explicit, configured, or from STS.
   */
  async initializeQuickSight(accountId?: string): Promise<QuickSightManager> {
    const resolved = accountId || this.quickSightAccountId || (await this.getCallerIdentity()).accountId;
    if (!resolved) {
      throw new ServiceNotInitializedError("QuickSight", "QuickSight account id could not be determined");
    }
    this.quickSightAccountId = resolved;
    this.cache.quicksight?.destroy();
    this.cache.quicksight = undefined;
    return this.quickSight();
  }

  quickSight(): QuickSightManager {
    const accountId = this.quickSightAccountId;
    if (!accountId) {
      throw new ServiceNotInitializedError(
        "QuickSight",
        "QuickSight is not initialized; call aws_initialize_quicksight with an account id",
      );
    }
    return (this.cache.quicksight ??= new QuickSightManager({ ...this.managerOptions(), accountId }));
  }

  async quickSightReady(): Promise<QuickSightManager> {
    return this.quickSightAccountId ? this.quickSight() : this.initializeQuickSight();
  }

  dispose(): void {
    this.reset();
  }

  private reset(): void {
    for (const manager of Object.values(this.cache)) manager?.destroy();
    this.cache = {};
  }
}
