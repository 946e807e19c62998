/**
 * App Service types.
 */

export type WebApp = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  kind?: string;
  state?: string;
  enabled?: boolean;
  defaultHostName?: string;
  hostNames?: string[];
  httpsOnly?: boolean;
  appServicePlanId?: string;
  slotName?: string;
  tags?: Record<string, string>;
};

export type AppServicePlan = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  kind?: string;
  status?: string;
  sku?: { name?: string; tier?: string; size?: string; family?: string; capacity?: number };
  numberOfSites?: number;
  maximumNumberOfWorkers?: number;
  reserved?: boolean;
};

export type ConnectionStringEntry = {
  name: string;
  type?: string;
  value: string | undefined;
};

export type ApplicationLogsInfo = {
  name: string;
  applicationLogs: {
    fileSystemLevel?: string;
    blobStorageLevel?: string;
    blobRetentionDays?: number;
  };
  httpLogs: { fileSystemEnabled?: boolean; retentionDays?: number };
  detailedErrorMessages?: boolean;
  failedRequestsTracing?: boolean;
  /** Kudu endpoint streaming live application log lines. */
  logStreamUrl?: string;
  /** Log Analytics query for the app's console logs, when diagnostics export there. */
  query: string;
};

export const PRODUCTION_SLOT = "production";
