/**
 * Azure App Service Manager
 *
 * Web apps, deployment slots, settings and App Service plans via
 * @azure/arm-appservice.
 */

import type { AppServicePlan as SdkPlan, Site } from "@azure/arm-appservice";
import { NotFoundError, ToolInputError, maskSecret } from "../../../../src/index.js";
import { collectAll } from "../pagination.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { resourceGroupFromId, type AzureCredentialProvider, type AzureRetryOptions } from "../types.js";
import { PRODUCTION_SLOT, type AppServicePlan, type ApplicationLogsInfo, type ConnectionStringEntry, type WebApp } from "./types.js";

function mapSite(site: Site): WebApp {
  const slashed = site.name?.split("/");
  return {
    id: site.id ?? "",
    name: site.name ?? "",
    resourceGroup: site.resourceGroup ?? resourceGroupFromId(site.id),
    location: site.location,
    kind: site.kind,
    state: site.state,
    enabled: site.enabled,
    defaultHostName: site.defaultHostName,
    hostNames: site.hostNames,
    httpsOnly: site.httpsOnly,
    appServicePlanId: site.serverFarmId,
    slotName: slashed && slashed.length > 1 ? slashed[slashed.length - 1] : undefined,
    tags: site.tags,
  };
}

function mapPlan(plan: SdkPlan): AppServicePlan {
  return {
    id: plan.id ?? "",
    name: plan.name ?? "",
    resourceGroup: plan.resourceGroup ?? resourceGroupFromId(plan.id),
    location: plan.location,
    kind: plan.kind,
    status: plan.status,
    sku: plan.sku
      ? { name: plan.sku.name, tier: plan.sku.tier, size: plan.sku.size, family: plan.sku.family, capacity: plan.sku.capacity }
      : undefined,
    numberOfSites: plan.numberOfSites,
    maximumNumberOfWorkers: plan.maximumNumberOfWorkers,
    reserved: plan.reserved,
  };
}

const isProduction = (slot: string) => slot.toLowerCase() === PRODUCTION_SLOT;

export class AzureAppServiceManager {
  private credentials: AzureCredentialProvider;
  private subscriptionId: string;
  private retryOptions?: AzureRetryOptions;

  constructor(credentials: AzureCredentialProvider, subscriptionId: string, retryOptions?: AzureRetryOptions) {
    this.credentials = credentials;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions;
  }

  private async getClient() {
    const { WebSiteManagementClient } = await import("@azure/arm-appservice");
    const { credential } = await this.credentials.getCredential();
    return new WebSiteManagementClient(credential, this.subscriptionId);
  }

  // ===========================================================================
  // Web apps
  // ===========================================================================

  async listWebApps(resourceGroup?: string): Promise<WebApp[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () => collectAll(resourceGroup ? client.webApps.listByResourceGroup(resourceGroup) : client.webApps.list(), mapSite),
      this.retryOptions,
    );
  }

  async getWebApp(resourceGroup: string, name: string): Promise<WebApp & { siteConfig?: Record<string, unknown> }> {
    const client = await this.getClient();
    const site = await getOrNull(() => client.webApps.get(resourceGroup, name), this.retryOptions);
    if (!site) throw new NotFoundError("Web app", name);
    const config = site.siteConfig;
    return {
      ...mapSite(site),
      siteConfig: config
        ? {
            linuxFxVersion: config.linuxFxVersion,
            netFrameworkVersion: config.netFrameworkVersion,
            alwaysOn: config.alwaysOn,
            http20Enabled: config.http20Enabled,
            minTlsVersion: config.minTlsVersion,
            ftpsState: config.ftpsState,
          }
        : undefined,
    };
  }

  async startWebApp(resourceGroup: string, name: string): Promise<void> {
    const client = await this.getClient();
    await withAzureRetry(() => client.webApps.start(resourceGroup, name), this.retryOptions);
  }

  async stopWebApp(resourceGroup: string, name: string): Promise<void> {
    const client = await this.getClient();
    await withAzureRetry(() => client.webApps.stop(resourceGroup, name), this.retryOptions);
  }

  async restartWebApp(resourceGroup: string, name: string): Promise<void> {
    const client = await this.getClient();
    await withAzureRetry(() => client.webApps.restart(resourceGroup, name), this.retryOptions);
  }

  /**
   * Diagnostic log settings of a web app and where to read its logs:
   * the Kudu log stream and a Log Analytics query over the last `hours`.
   */
  async getApplicationLogs(resourceGroup: string, name: string, hours = 24): Promise<ApplicationLogsInfo> {
    const client = await this.getClient();
    const site = await getOrNull(() => client.webApps.get(resourceGroup, name), this.retryOptions);
    if (!site) throw new NotFoundError("Web app", name);
    const config = await withAzureRetry(() => client.webApps.getDiagnosticLogsConfiguration(resourceGroup, name), this.retryOptions);
    const scmHost = site.enabledHostNames?.find((host) => host.includes(".scm."));
    return {
      name,
      applicationLogs: {
        fileSystemLevel: config.applicationLogs?.fileSystem?.level,
        blobStorageLevel: config.applicationLogs?.azureBlobStorage?.level,
        blobRetentionDays: config.applicationLogs?.azureBlobStorage?.retentionInDays,
      },
      httpLogs: {
        fileSystemEnabled: config.httpLogs?.fileSystem?.enabled,
        retentionDays: config.httpLogs?.fileSystem?.retentionInDays,
      },
      detailedErrorMessages: config.detailedErrorMessages?.enabled,
      failedRequestsTracing: config.failedRequestsTracing?.enabled,
      logStreamUrl: scmHost ? `https://${scmHost}/api/logstream/application` : undefined,
      query: `AppServiceConsoleLogs | where TimeGenerated > ago(${hours}h) | where _ResourceId =~ '${(site.id ?? "").toLowerCase()}' | order by TimeGenerated desc`,
    };
  }

  // ===========================================================================
  // Slots
  // ===========================================================================

  async listSlots(resourceGroup: string, name: string): Promise<WebApp[]> {
    const client = await this.getClient();
    return withAzureRetry(() => collectAll(client.webApps.listSlots(resourceGroup, name), mapSite), this.retryOptions);
  }

  /** Start one deployment slot; "production" starts the app itself. */
  async startSlot(resourceGroup: string, name: string, slot: string): Promise<void> {
    if (isProduction(slot)) return this.startWebApp(resourceGroup, name);
    const client = await this.getClient();
    await withAzureRetry(() => client.webApps.startSlot(resourceGroup, name, slot), this.retryOptions);
  }

  async stopSlot(resourceGroup: string, name: string, slot: string): Promise<void> {
    if (isProduction(slot)) return this.stopWebApp(resourceGroup, name);
    const client = await this.getClient();
    await withAzureRetry(() => client.webApps.stopSlot(resourceGroup, name, slot), this.retryOptions);
  }

  /**
   * Swap two slots. Either side may be "production".
   */
  async swapSlots(resourceGroup: string, name: string, source: string, target: string): Promise<void> {
    if (source.toLowerCase() === target.toLowerCase()) {
      throw new ToolInputError("Source and target slots must differ", { field: "targetSlot" });
    }
    const client = await this.getClient();
    await withAzureRetry(() => {
      if (isProduction(source)) {
        return client.webApps.beginSwapSlotWithProductionAndWait(resourceGroup, name, { targetSlot: target, preserveVnet: true });
      }
      if (isProduction(target)) {
        return client.webApps.beginSwapSlotWithProductionAndWait(resourceGroup, name, { targetSlot: source, preserveVnet: true });
      }
      return client.webApps.beginSwapSlotAndWait(resourceGroup, name, source, { targetSlot: target, preserveVnet: true });
    }, this.retryOptions);
  }

  // ===========================================================================
  // Settings
  // ===========================================================================

  async getAppSettings(resourceGroup: string, name: string): Promise<Record<string, string>> {
    const client = await this.getClient();
    const settings = await withAzureRetry(() => client.webApps.listApplicationSettings(resourceGroup, name), this.retryOptions);
    return settings.properties ?? {};
  }

  /**
   * Replace the settings, or merge them into the existing ones.
   */
  async updateAppSettings(
    resourceGroup: string,
    name: string,
    settings: Record<string, string>,
    merge = true,
  ): Promise<Record<string, string>> {
    const properties = merge ? { ...(await this.getAppSettings(resourceGroup, name)), ...settings } : settings;
    const client = await this.getClient();
    const updated = await withAzureRetry(
      () => client.webApps.updateApplicationSettings(resourceGroup, name, { properties }),
      this.retryOptions,
    );
    return updated.properties ?? properties;
  }

  async getConnectionStrings(resourceGroup: string, name: string, reveal = false): Promise<ConnectionStringEntry[]> {
    const client = await this.getClient();
    const result = await withAzureRetry(() => client.webApps.listConnectionStrings(resourceGroup, name), this.retryOptions);
    return Object.entries(result.properties ?? {})
      .map(([key, pair]) => ({ name: key, type: pair.type, value: reveal ? pair.value : maskSecret(pair.value) }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  // ===========================================================================
  // Plans
  // ===========================================================================

  async listAppServicePlans(resourceGroup?: string): Promise<AppServicePlan[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup ? client.appServicePlans.listByResourceGroup(resourceGroup) : client.appServicePlans.list(),
          mapPlan,
        ),
      this.retryOptions,
    );
  }

  async getAppServicePlan(resourceGroup: string, name: string): Promise<AppServicePlan> {
    const client = await this.getClient();
    const plan = await getOrNull(() => client.appServicePlans.get(resourceGroup, name), this.retryOptions);
    if (!plan) throw new NotFoundError("App Service plan", name);
    return mapPlan(plan);
  }

  async scaleAppServicePlan(resourceGroup: string, name: string, capacity: number): Promise<AppServicePlan> {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ToolInputError("capacity must be a positive integer", { field: "capacity" });
    }
    const client = await this.getClient();
    const plan = await getOrNull(() => client.appServicePlans.get(resourceGroup, name), this.retryOptions);
    if (!plan) throw new NotFoundError("App Service plan", name);
    const max = plan.maximumNumberOfWorkers;
    if (max !== undefined && capacity > max) {
      throw new ToolInputError(`capacity ${capacity} exceeds the plan maximum of ${max} workers`, { field: "capacity" });
    }
    const updated = await withAzureRetry(
      () =>
        client.appServicePlans.beginCreateOrUpdateAndWait(resourceGroup, name, {
          ...plan,
          sku: { ...plan.sku, capacity },
        }),
      this.retryOptions,
    );
    return mapPlan(updated);
  }
}
