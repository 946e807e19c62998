/**
 * Azure Monitor Manager
 *
 * Log Analytics queries (@azure/monitor-query), workspaces
 * (@azure/arm-operationalinsights), metrics, alert rules and the activity
 * log (@azure/arm-monitor).
 */

import type { EventData, MetricAlertResource } from "@azure/arm-monitor";
import type { LogsTable } from "@azure/monitor-query";
import { ToolInputError, compileRegex, errorMessage } from "../../../../src/index.js";
import { collectAll } from "../pagination.js";
import { withAzureRetry } from "../retry.js";
import { iso, resourceGroupFromId, type AzureCredentialProvider, type AzureRetryOptions } from "../types.js";
import type {
  ActivityLogEntry,
  AlertRule,
  ApplicationInsightsComponent,
  LogAnalyticsWorkspace,
  LogQueryResult,
  LogRegexMatch,
  LogTable,
  MultiWorkspaceSearchResult,
  MetricDefinition,
  MetricSeries,
} from "./types.js";

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const DEFAULT_MAX_WORKSPACES = 5;
const SHORT_SPAN = /^(\d+)\s*([mhd])$/i;

/**
 * ISO 8601 duration from "PT1H", "P7D" or shorthand such as "30m", "24h", "7d".
 */
export function toIsoDuration(value: string): string {
  const trimmed = value.trim();
  if (/^P(?!$)(\d+D)?(T(?=\d)(\d+H)?(\d+M)?(\d+S)?)?$/i.test(trimmed)) return trimmed.toUpperCase();
  const match = SHORT_SPAN.exec(trimmed);
  if (!match) {
    throw new ToolInputError(`timespan must be an ISO 8601 duration (PT1H) or like 30m, 24h, 7d: ${value}`, {
      field: "timespan",
    });
  }
  const amount = Number(match[1]);
  const unit = match[2].toLowerCase();
  return unit === "d" ? `P${amount}D` : `PT${amount}${unit.toUpperCase()}`;
}

function cellValue(value: unknown): unknown {
  return value instanceof Date ? value.toISOString() : value;
}

export function mapLogsTable(table: LogsTable): LogTable {
  const columns = table.columns.map((c, i) => c.name ?? `column${i}`);
  return {
    name: table.name,
    columns,
    rows: table.rows.map((row) => Object.fromEntries(columns.map((name, i) => [name, cellValue(row[i])]))),
  };
}

function mapAlertRule(rule: MetricAlertResource): AlertRule {
  return {
    id: rule.id ?? "",
    name: rule.name ?? "",
    resourceGroup: resourceGroupFromId(rule.id),
    location: rule.location,
    description: rule.description,
    severity: rule.severity,
    enabled: rule.enabled,
    scopes: rule.scopes,
    evaluationFrequency: rule.evaluationFrequency,
    windowSize: rule.windowSize,
  };
}

function mapEvent(event: EventData): ActivityLogEntry {
  return {
    timestamp: iso(event.eventTimestamp),
    operationName: event.operationName?.localizedValue ?? event.operationName?.value,
    status: event.status?.localizedValue ?? event.status?.value,
    level: event.level,
    caller: event.caller,
    resourceGroup: event.resourceGroupName,
    resourceId: event.resourceId,
    category: event.category?.value,
    correlationId: event.correlationId,
  };
}

export class AzureMonitorManager {
  private credentials: AzureCredentialProvider;
  private subscriptionId: string;
  private retryOptions?: AzureRetryOptions;

  constructor(credentials: AzureCredentialProvider, subscriptionId: string, retryOptions?: AzureRetryOptions) {
    this.credentials = credentials;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions;
  }

  private async getLogsClient() {
    const { LogsQueryClient } = await import("@azure/monitor-query");
    const { credential } = await this.credentials.getCredential();
    return new LogsQueryClient(credential);
  }

  private async getMonitorClient() {
    const { MonitorClient } = await import("@azure/arm-monitor");
    const { credential } = await this.credentials.getCredential();
    return new MonitorClient(credential, this.subscriptionId);
  }

  // ===========================================================================
  // Log Analytics
  // ===========================================================================

  async queryLogs(workspaceId: string, query: string, timespan = "PT24H"): Promise<LogQueryResult> {
    const duration = toIsoDuration(timespan);
    const client = await this.getLogsClient();
    const result = await withAzureRetry(
      () => client.queryWorkspace(workspaceId, query, { duration }),
      this.retryOptions,
    );

    if ("partialTables" in result) {
      const tables = result.partialTables.map(mapLogsTable);
      return {
        workspaceId,
        tables,
        rowCount: tables.reduce((n, t) => n + t.rows.length, 0),
        partial: true,
        partialError: result.partialError.message,
      };
    }
    const tables = result.tables.map(mapLogsTable);
    return { workspaceId, tables, rowCount: tables.reduce((n, t) => n + t.rows.length, 0), partial: false };
  }

  /**
   * Pull recent rows from a table (every table when none is named) and keep
   * those whose serialized form matches the pattern.
   */
  async searchLogsWithRegex(
    workspaceId: string,
    pattern: string,
    options: { table?: string; hours?: number; limit?: number; caseSensitive?: boolean } = {},
  ): Promise<{ matches: LogRegexMatch[]; scanned: number; partial: boolean }> {
    const regex = compileRegex(pattern, { caseSensitive: options.caseSensitive, field: "regex" });
    const hours = options.hours ?? 24;
    const limit = options.limit ?? 100;
    if (options.table !== undefined && !TABLE_NAME.test(options.table)) {
      throw new ToolInputError(`Invalid table name: ${options.table}`, { field: "table" });
    }
    const source = options.table ?? "search *";
    const query = `${source} | where TimeGenerated > ago(${hours}h) | order by TimeGenerated desc | take ${limit * 10}`;
    const result = await this.queryLogs(workspaceId, query, `PT${hours}H`);

    const matches: LogRegexMatch[] = [];
    let scanned = 0;
    for (const table of result.tables) {
      for (const row of table.rows) {
        scanned++;
        const text = JSON.stringify(row);
        const found = regex.exec(text);
        if (!found) continue;
        const sourceTable = typeof row.$table === "string" ? row.$table : (options.table ?? table.name);
        const time = row.TimeGenerated;
        matches.push({
          table: sourceTable,
          timeGenerated: typeof time === "string" ? time : undefined,
          matchedText: found[0],
          row,
        });
        if (matches.length >= limit) return { matches, scanned, partial: result.partial };
      }
    }
    return { matches, scanned, partial: result.partial };
  }

  /**
   * Run the regex search over several workspaces until `limit` matches are
   * found. A workspace that fails is reported in `failures` and the search
   * goes on with the next one.
   */
  async searchWorkspacesWithRegex(
    workspaceIds: string[],
    pattern: string,
    options: { table?: string; hours?: number; limit?: number; caseSensitive?: boolean; maxWorkspaces?: number } = {},
  ): Promise<MultiWorkspaceSearchResult> {
    compileRegex(pattern, { caseSensitive: options.caseSensitive, field: "regex" });
    if (options.table !== undefined && !TABLE_NAME.test(options.table)) {
      throw new ToolInputError(`Invalid table name: ${options.table}`, { field: "table" });
    }
    const workspaces = [...new Set(workspaceIds.map((id) => id.trim()).filter(Boolean))].slice(
      0,
      options.maxWorkspaces ?? DEFAULT_MAX_WORKSPACES,
    );
    if (workspaces.length === 0) {
      throw new ToolInputError("workspaceIds needs at least one workspace id", { field: "workspaceIds" });
    }

    const limit = options.limit ?? 100;
    const result: MultiWorkspaceSearchResult = { matches: [], workspacesSearched: [], failures: [], scanned: 0, partial: false };
    for (const workspaceId of workspaces) {
      const remaining = limit - result.matches.length;
      if (remaining <= 0) break;
      try {
        const found = await this.searchLogsWithRegex(workspaceId, pattern, { ...options, limit: remaining });
        result.matches.push(...found.matches.map((m) => ({ ...m, workspaceId })));
        result.scanned += found.scanned;
        result.partial ||= found.partial;
        result.workspacesSearched.push(workspaceId);
      } catch (error) {
        result.failures.push({ workspaceId, error: errorMessage(error) });
      }
    }
    result.matches.sort((a, b) => (b.timeGenerated ?? "").localeCompare(a.timeGenerated ?? ""));
    return result;
  }

  async listWorkspaces(resourceGroup?: string): Promise<LogAnalyticsWorkspace[]> {
    const { OperationalInsightsManagementClient } = await import("@azure/arm-operationalinsights");
    const { credential } = await this.credentials.getCredential();
    const client = new OperationalInsightsManagementClient(credential, this.subscriptionId);
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup ? client.workspaces.listByResourceGroup(resourceGroup) : client.workspaces.list(),
          (ws) => ({
            id: ws.id ?? "",
            name: ws.name ?? "",
            resourceGroup: resourceGroupFromId(ws.id),
            location: ws.location,
            customerId: ws.customerId,
            sku: ws.sku?.name,
            retentionInDays: ws.retentionInDays,
            provisioningState: ws.provisioningState,
          }),
        ),
      this.retryOptions,
    );
  }

  // ===========================================================================
  // Metrics
  // ===========================================================================

  async queryMetrics(
    resourceUri: string,
    metricNames: string[],
    options: { timespan?: string; interval?: string; aggregation?: string } = {},
  ): Promise<MetricSeries[]> {
    if (metricNames.length === 0) {
      throw new ToolInputError("At least one metric name is required", { field: "metricNames" });
    }
    const client = await this.getMonitorClient();
    const response = await withAzureRetry(
      () =>
        client.metrics.list(resourceUri, {
          metricnames: metricNames.join(","),
          timespan: options.timespan,
          interval: options.interval,
          aggregation: options.aggregation,
        }),
      this.retryOptions,
    );
    return response.value.map((metric) => ({
      name: metric.name.value,
      unit: metric.unit,
      timeseries: metric.timeseries.map((series) => ({
        dimensions: Object.fromEntries(
          (series.metadatavalues ?? []).map((m) => [m.name?.value ?? "", m.value ?? ""]),
        ),
        data: (series.data ?? []).map((d) => ({
          timestamp: d.timeStamp.toISOString(),
          average: d.average,
          minimum: d.minimum,
          maximum: d.maximum,
          total: d.total,
          count: d.count,
        })),
      })),
    }));
  }

  async listMetricDefinitions(resourceUri: string): Promise<MetricDefinition[]> {
    const client = await this.getMonitorClient();
    return withAzureRetry(
      () =>
        collectAll(client.metricDefinitions.list(resourceUri), (d) => ({
          name: d.name?.value ?? "",
          displayName: d.displayDescription ?? d.name?.localizedValue,
          unit: d.unit,
          primaryAggregationType: d.primaryAggregationType,
          supportedAggregationTypes: d.supportedAggregationTypes ?? [],
          timeGrains: (d.metricAvailabilities ?? []).flatMap((a) => (a.timeGrain ? [a.timeGrain] : [])),
          dimensions: (d.dimensions ?? []).map((dim) => dim.value),
        })),
      this.retryOptions,
    );
  }

  // ===========================================================================
  // Alerts and activity log
  // ===========================================================================

  async listAlertRules(resourceGroup?: string): Promise<AlertRule[]> {
    const client = await this.getMonitorClient();
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup ? client.metricAlerts.listByResourceGroup(resourceGroup) : client.metricAlerts.listBySubscription(),
          mapAlertRule,
        ),
      this.retryOptions,
    );
  }

  async listActivityLogs(options: { hours?: number; resourceGroup?: string; limit?: number } = {}): Promise<ActivityLogEntry[]> {
    const hours = options.hours ?? 24;
    const end = new Date();
    const start = new Date(end.getTime() - hours * 3_600_000);
    let filter = `eventTimestamp ge '${start.toISOString()}' and eventTimestamp le '${end.toISOString()}'`;
    if (options.resourceGroup) filter += ` and resourceGroupName eq '${options.resourceGroup.replace(/'/g, "''")}'`;

    const client = await this.getMonitorClient();
    const limit = options.limit ?? 100;
    return withAzureRetry(async () => {
      const entries: ActivityLogEntry[] = [];
      for await (const event of client.activityLogs.list(filter)) {
        entries.push(mapEvent(event));
        if (entries.length >= limit) break;
      }
      return entries;
    }, this.retryOptions);
  }

  async listApplicationInsights(resourceGroup?: string): Promise<ApplicationInsightsComponent[]> {
    const { ResourceManagementClient } = await import("@azure/arm-resources");
    const { credential } = await this.credentials.getCredential();
    const client = new ResourceManagementClient(credential, this.subscriptionId);
    const filter = "resourceType eq 'microsoft.insights/components'";
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup
            ? client.resources.listByResourceGroup(resourceGroup, { filter })
            : client.resources.list({ filter }),
          (r) => ({
            id: r.id ?? "",
            name: r.name ?? "",
            resourceGroup: resourceGroupFromId(r.id),
            location: r.location,
            kind: r.kind,
          }),
        ),
      this.retryOptions,
    );
  }
}
