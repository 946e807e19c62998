/**
 * Credentials and lazily created managers shared by the Azure tools.
 *
 * ARM managers are bound to a subscription and cached per subscription id.
 * Data-plane managers address resources by name or URL and are cached once.
 */

import { ServiceNotInitializedError, type AppConfig, type Logger, type RetryPolicy } from "../../../src/index.js";
import { AzureAppServiceManager } from "./appservice/manager.js";
import { AzureContainerManager } from "./containers/manager.js";
import { AzureRegistryContentManager } from "./containers/registry-manager.js";
import { AzureCostManager } from "./cost/manager.js";
import { AzureCredentialsManager } from "./credentials/manager.js";
import { DevOpsRestClient } from "./devops/client.js";
import { AzureDevOpsManager } from "./devops/manager.js";
import { AzureEventHubsManager } from "./eventhubs/manager.js";
import { AzureEventHubsProducer } from "./eventhubs/producer.js";
import { AzureKeyVaultDataManager } from "./keyvault/data-manager.js";
import { AzureKeyVaultManager } from "./keyvault/manager.js";
import { AzureMonitorManager } from "./monitor/manager.js";
import { AzureNetworkManager } from "./network/manager.js";
import { AzureResourceManager } from "./resources/manager.js";
import { AzureServiceBusManager } from "./servicebus/manager.js";
import { AzureServiceBusMessaging } from "./servicebus/messaging.js";
import { AzureFlexibleServerManager } from "./sql/flexible-manager.js";
import { AzureSqlManager } from "./sql/manager.js";
import { AzureSqlQueryRunner } from "./sql/query.js";
import { AzureStorageAccountManager } from "./storage/account-manager.js";
import { AzureBlobManager } from "./storage/blob-manager.js";
import { AzureFileShareManager } from "./storage/file-share-manager.js";
import type { AzureRetryOptions } from "./types.js";

type ManagerFactory<T> = (subscriptionId: string) => T;

/** One manager per subscription id, created on first use. */
class PerSubscription<T> {
  private readonly items = new Map<string, T>();
  private readonly create: ManagerFactory<T>;

  constructor(create: ManagerFactory<T>) {
    this.create = create;
  }

  get(subscriptionId: string): T {
    let item = this.items.get(subscriptionId);
    if (!item) {
      item = this.create(subscriptionId);
      this.items.set(subscriptionId, item);
    }
    return item;
  }

  get subscriptions(): string[] {
    return [...this.items.keys()];
  }

  clear(): void {
    this.items.clear();
  }
}

function createArmManagers(credentials: AzureCredentialsManager, retry?: AzureRetryOptions) {
  const storageAccounts = new PerSubscription((sub) => new AzureStorageAccountManager(credentials, sub, retry));
  return {
    resources: new PerSubscription((sub) => new AzureResourceManager(credentials, sub, retry)),
    appService: new PerSubscription((sub) => new AzureAppServiceManager(credentials, sub, retry)),
    containers: new PerSubscription((sub) => new AzureContainerManager(credentials, sub, retry)),
    cost: new PerSubscription((sub) => new AzureCostManager(credentials, sub, retry)),
    monitor: new PerSubscription((sub) => new AzureMonitorManager(credentials, sub, retry)),
    storageAccounts,
    fileShares: new PerSubscription((sub) => new AzureFileShareManager(storageAccounts.get(sub), retry)),
    sql: new PerSubscription((sub) => new AzureSqlManager(credentials, sub, retry)),
    flexibleServers: new PerSubscription((sub) => new AzureFlexibleServerManager(credentials, sub, retry)),
    keyVault: new PerSubscription((sub) => new AzureKeyVaultManager(credentials, sub, retry)),
    serviceBus: new PerSubscription((sub) => new AzureServiceBusManager(credentials, sub, retry)),
    network: new PerSubscription((sub) => new AzureNetworkManager(credentials, sub, retry)),
    eventHubs: new PerSubscription((sub) => new AzureEventHubsManager(credentials, sub, retry)),
  };
}

type ArmManagers = ReturnType<typeof createArmManagers>;

type DataPlaneCache = Partial<{
  blobs: AzureBlobManager;
  registryContent: AzureRegistryContentManager;
  devOps: AzureDevOpsManager;
  keyVaultData: AzureKeyVaultDataManager;
  sqlQuery: AzureSqlQueryRunner;
  serviceBusMessaging: AzureServiceBusMessaging;
  eventHubsProducer: AzureEventHubsProducer;
}>;

const DATA_PLANE_SERVICES = [
  "blobs",
  "registryContent",
  "keyVaultData",
  "sqlQuery",
  "serviceBusMessaging",
  "eventHubsProducer",
  "devOps",
] as const;

export type AzureServerStateOptions = {
  config: AppConfig["azure"];
  retry?: Partial<RetryPolicy>;
  logger: Logger;
  credentials?: AzureCredentialsManager;
  /** HTTP client for the DevOps REST API. */
  fetch?: typeof fetch;
};

export type AzureHealth = {
  credentialMethod: string;
  subscriptionId?: string;
  tenantId?: string;
  devOpsConfigured: boolean;
  services: Record<string, { initialized: boolean; subscriptions?: string[] }>;
};

export class AzureServerState {
  readonly credentials: AzureCredentialsManager;
  private readonly config: AppConfig["azure"];
  private readonly logger: Logger;
  private readonly retry?: AzureRetryOptions;
  private readonly fetchImpl?: typeof fetch;
  private dataPlane: DataPlaneCache = {};
  private readonly arm: ArmManagers;

  constructor(options: AzureServerStateOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.retry = options.retry;
    this.fetchImpl = options.fetch;
    this.credentials =
      options.credentials ??
      new AzureCredentialsManager({
        subscriptionId: options.config.subscriptionId,
        tenantId: options.config.tenantId,
        method: options.config.credentialMethod,
      });

    this.arm = createArmManagers(this.credentials, this.retry);
  }

  /** The given subscription, else the configured or first visible one. */
  async subscriptionId(subscriptionId?: string): Promise<string> {
    const explicit = subscriptionId?.trim();
    return explicit ? explicit : this.credentials.resolveSubscriptionId();
  }

  async resources(subscriptionId?: string): Promise<AzureResourceManager> {
    return this.arm.resources.get(await this.subscriptionId(subscriptionId));
  }

  async appService(subscriptionId?: string): Promise<AzureAppServiceManager> {
    return this.arm.appService.get(await this.subscriptionId(subscriptionId));
  }

  async containers(subscriptionId?: string): Promise<AzureContainerManager> {
    return this.arm.containers.get(await this.subscriptionId(subscriptionId));
  }

  async cost(subscriptionId?: string): Promise<AzureCostManager> {
    return this.arm.cost.get(await this.subscriptionId(subscriptionId));
  }

  async monitor(subscriptionId?: string): Promise<AzureMonitorManager> {
    return this.arm.monitor.get(await this.subscriptionId(subscriptionId));
  }

  async storageAccounts(subscriptionId?: string): Promise<AzureStorageAccountManager> {
    return this.arm.storageAccounts.get(await this.subscriptionId(subscriptionId));
  }

  /** File shares authenticate with account keys read through ARM in this subscription. */
  async fileShares(subscriptionId?: string): Promise<AzureFileShareManager> {
    return this.arm.fileShares.get(await this.subscriptionId(subscriptionId));
  }

  async sql(subscriptionId?: string): Promise<AzureSqlManager> {
    return this.arm.sql.get(await this.subscriptionId(subscriptionId));
  }

  async flexibleServers(subscriptionId?: string): Promise<AzureFlexibleServerManager> {
    return this.arm.flexibleServers.get(await this.subscriptionId(subscriptionId));
  }

  async keyVault(subscriptionId?: string): Promise<AzureKeyVaultManager> {
    return this.arm.keyVault.get(await this.subscriptionId(subscriptionId));
  }

  async serviceBus(subscriptionId?: string): Promise<AzureServiceBusManager> {
    return this.arm.serviceBus.get(await this.subscriptionId(subscriptionId));
  }

  async network(subscriptionId?: string): Promise<AzureNetworkManager> {
    return this.arm.network.get(await this.subscriptionId(subscriptionId));
  }

  async eventHubs(subscriptionId?: string): Promise<AzureEventHubsManager> {
    return this.arm.eventHubs.get(await this.subscriptionId(subscriptionId));
  }

  blobs(): AzureBlobManager {
    return (this.dataPlane.blobs ??= new AzureBlobManager(this.credentials, this.retry));
  }

  registryContent(): AzureRegistryContentManager {
    return (this.dataPlane.registryContent ??= new AzureRegistryContentManager(this.credentials, this.retry));
  }

  keyVaultData(): AzureKeyVaultDataManager {
    return (this.dataPlane.keyVaultData ??= new AzureKeyVaultDataManager(this.credentials, this.retry));
  }

  sqlQuery(): AzureSqlQueryRunner {
    return (this.dataPlane.sqlQuery ??= new AzureSqlQueryRunner(this.credentials));
  }

  serviceBusMessaging(): AzureServiceBusMessaging {
    return (this.dataPlane.serviceBusMessaging ??= new AzureServiceBusMessaging(this.credentials));
  }

  eventHubsProducer(): AzureEventHubsProducer {
    return (this.dataPlane.eventHubsProducer ??= new AzureEventHubsProducer(this.credentials));
  }

  devOps(): AzureDevOpsManager {
    if (this.dataPlane.devOps) return this.dataPlane.devOps;
    const organization = this.config.devOpsOrganization;
    if (!organization) {
      throw new ServiceNotInitializedError(
        "devops",
        "Azure DevOps is not configured; set AZURE_DEVOPS_ORG (and AZURE_DEVOPS_PAT unless signing in with Entra ID)",
      );
    }
    const client = new DevOpsRestClient({
      organization,
      pat: this.config.devOpsPat,
      credentials: this.credentials,
      retry: this.retry,
      fetch: this.fetchImpl,
    });
    this.logger.debug(`Azure DevOps client created (auth=${client.authMethod})`, { organization });
    return (this.dataPlane.devOps = new AzureDevOpsManager(client));
  }

  health(): AzureHealth {
    const status = this.credentials.status();
    const services: AzureHealth["services"] = {};
    for (const [name, cache] of Object.entries(this.arm)) {
      const subscriptions = cache.subscriptions;
      services[name] = { initialized: subscriptions.length > 0, subscriptions };
    }
    for (const name of DATA_PLANE_SERVICES) {
      services[name] = { initialized: this.dataPlane[name] !== undefined };
    }
    return {
      credentialMethod: status.method,
      subscriptionId: status.subscriptionId,
      tenantId: status.tenantId,
      devOpsConfigured: Boolean(this.config.devOpsOrganization),
      services,
    };
  }

  /** Drop every cached manager, e.g. after the credential method changes. */
  reset(): void {
    for (const cache of Object.values(this.arm)) cache.clear();
    this.dataPlane = {};
    this.credentials.clearCache();
  }

  dispose(): void {
    this.reset();
  }
}
