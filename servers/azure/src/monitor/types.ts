/**
 * Azure Monitor types.
 */

export type LogTable = {
  name: string;
  columns: string[];
  rows: Array<Record<string, unknown>>;
};

export type LogQueryResult = {
  workspaceId: string;
  tables: LogTable[];
  rowCount: number;
  /** Set when the service returned only part of the data. */
  partial: boolean;
  partialError?: string;
};

export type LogRegexMatch = {
  table: string;
  timeGenerated?: string;
  matchedText: string;
  row: Record<string, unknown>;
};

export type MultiWorkspaceSearchResult = {
  matches: Array<LogRegexMatch & { workspaceId: string }>;
  workspacesSearched: string[];
  failures: Array<{ workspaceId: string; error: string }>;
  scanned: number;
  partial: boolean;
};

export type LogAnalyticsWorkspace = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  customerId?: string;
  sku?: string;
  retentionInDays?: number;
  provisioningState?: string;
};

export type MetricPoint = {
  timestamp: string;
  average?: number;
  minimum?: number;
  maximum?: number;
  total?: number;
  count?: number;
};

export type MetricSeries = {
  name: string;
  unit: string;
  timeseries: Array<{ dimensions: Record<string, string>; data: MetricPoint[] }>;
};

export type MetricDefinition = {
  name: string;
  displayName?: string;
  unit?: string;
  primaryAggregationType?: string;
  supportedAggregationTypes: string[];
  timeGrains: string[];
  dimensions: string[];
};

export type AlertRule = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  description?: string;
  severity: number;
  enabled: boolean;
  scopes: string[];
  evaluationFrequency?: string;
  windowSize?: string;
};

export type ActivityLogEntry = {
  timestamp?: string;
  operationName?: string;
  status?: string;
  level?: string;
  caller?: string;
  resourceGroup?: string;
  resourceId?: string;
  category?: string;
  correlationId?: string;
};

export type ApplicationInsightsComponent = {
  id: string;
  name: string;
  resourceGroup: string;
  location?: string;
  kind?: string;
};
