/**
 * Azure Monitor tools: Log Analytics, metrics, alerts, activity log.
 */

import { Type } from "@sinclair/typebox";
import { StringList, defineTool, parseStringList, type ToolDefinition } from "../../../../src/index.js";
import { OptionalResourceGroup, SubscriptionId, optional } from "../params.js";
import type { AzureServerState } from "../state.js";
import { toIsoDuration } from "./manager.js";

const SERVICE = "monitor";

const WorkspaceId = Type.String({ minLength: 1, description: "Log Analytics workspace (customer) id" });
const ResourceUri = Type.String({ minLength: 1, description: "Full resource id of the monitored resource" });

export function createMonitorTools(state: AzureServerState): ToolDefinition[] {
  return [
    defineTool({
      name: "azure_query_logs",
      label: "Query Logs",
      description: "Run a KQL query against a Log Analytics workspace.",
      service: SERVICE,
      parameters: Type.Object({
        workspaceId: WorkspaceId,
        query: Type.String({ minLength: 1 }),
        timespan: Type.String({ default: "PT24H", description: "ISO 8601 duration or shorthand such as 1h, 7d" }),
        subscriptionId: SubscriptionId,
      }),
      async run(params) {
        return { ...(await (await state.monitor(params.subscriptionId)).queryLogs(params.workspaceId, params.query, params.timespan)) };
      },
    }),

    defineTool({
      name: "azure_search_logs_with_regex",
      label: "Search Logs With Regex",
      description: "Fetch recent rows of a table (or every table) and return those matching a regular expression.",
      service: SERVICE,
      parameters: Type.Object({
        workspaceId: WorkspaceId,
        regex: Type.String({ minLength: 1, description: "e.g. ERROR|Exception|timeout" }),
        table: Type.Optional(Type.String({ description: "Table name such as AppTraces; all tables when omitted" })),
        hours: Type.Integer({ minimum: 1, maximum: 720, default: 24 }),
        limit: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }),
        caseSensitive: Type.Boolean({ default: false }),
        subscriptionId: SubscriptionId,
      }),
      async run(params) {
        const result = await (await state.monitor(params.subscriptionId)).searchLogsWithRegex(params.workspaceId, params.regex, {
          table: optional(params.table),
          hours: params.hours,
          limit: params.limit,
          caseSensitive: params.caseSensitive,
        });
        return { ...result, matchCount: result.matches.length };
      },
    }),

    defineTool({
      name: "azure_search_workspaces_with_regex",
      label: "Search Workspaces With Regex",
      description: "Regex search across several Log Analytics workspaces; matches are merged newest first.",
      service: SERVICE,
      parameters: Type.Object({
        workspaceIds: StringList("Workspace ids, comma separated or a JSON array"),
        regex: Type.String({ minLength: 1 }),
        table: Type.Optional(Type.String({ description: "Table name such as AppTraces; all tables when omitted" })),
        hours: Type.Integer({ minimum: 1, maximum: 720, default: 24 }),
        limit: Type.Integer({ minimum: 1, maximum: 1000, default: 100, description: "Matches across all workspaces" }),
        maxWorkspaces: Type.Integer({ minimum: 1, maximum: 20, default: 5 }),
        caseSensitive: Type.Boolean({ default: false }),
        subscriptionId: SubscriptionId,
      }),
      async run(params) {
        const monitor = await state.monitor(params.subscriptionId);
        const result = await monitor.searchWorkspacesWithRegex(parseStringList(params.workspaceIds, "workspaceIds"), params.regex, {
          table: optional(params.table),
          hours: params.hours,
          limit: params.limit,
          maxWorkspaces: params.maxWorkspaces,
          caseSensitive: params.caseSensitive,
        });
        return { ...result, matchCount: result.matches.length };
      },
    }),

    defineTool({
      name: "azure_list_log_analytics_workspaces",
      label: "List Log Analytics Workspaces",
      description: "Log Analytics workspaces with their customer ids.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: OptionalResourceGroup, subscriptionId: SubscriptionId }),
      async run(params) {
        const workspaces = await (await state.monitor(params.subscriptionId)).listWorkspaces(optional(params.resourceGroup));
        return { workspaces, count: workspaces.length };
      },
    }),

    defineTool({
      name: "azure_query_metrics",
      label: "Query Metrics",
      description: "Metric values of a resource.",
      service: SERVICE,
      parameters: Type.Object({
        resourceUri: ResourceUri,
        metricNames: StringList("Metric names, e.g. Percentage CPU"),
        timespan: Type.String({ default: "PT1H", description: "ISO 8601 duration or shorthand such as 1h, 7d" }),
        interval: Type.String({ default: "PT5M" }),
        aggregation: Type.String({ default: "Average", description: "Average, Minimum, Maximum, Total or Count (comma separated)" }),
        subscriptionId: SubscriptionId,
      }),
      async run(params) {
        const metrics = await (await state.monitor(params.subscriptionId)).queryMetrics(
          params.resourceUri,
          parseStringList(params.metricNames, "metricNames"),
          { timespan: toIsoDuration(params.timespan), interval: toIsoDuration(params.interval), aggregation: params.aggregation },
        );
        return { resourceUri: params.resourceUri, metrics, count: metrics.length };
      },
    }),

    defineTool({
      name: "azure_list_metric_definitions",
      label: "List Metric Definitions",
      description: "Metrics a resource emits, with units, aggregations and dimensions.",
      service: SERVICE,
      parameters: Type.Object({ resourceUri: ResourceUri, subscriptionId: SubscriptionId }),
      async run(params) {
        const definitions = await (await state.monitor(params.subscriptionId)).listMetricDefinitions(params.resourceUri);
        return { resourceUri: params.resourceUri, definitions, count: definitions.length };
      },
    }),

    defineTool({
      name: "azure_list_alert_rules",
      label: "List Alert Rules",
      description: "Metric alert rules of the subscription or a resource group.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: OptionalResourceGroup, subscriptionId: SubscriptionId }),
      async run(params) {
        const alertRules = await (await state.monitor(params.subscriptionId)).listAlertRules(optional(params.resourceGroup));
        return { alertRules, count: alertRules.length };
      },
    }),

    defineTool({
      name: "azure_list_activity_logs",
      label: "List Activity Logs",
      description: "Control-plane events of the last N hours.",
      service: SERVICE,
      parameters: Type.Object({
        hours: Type.Integer({ minimum: 1, maximum: 2160, default: 24 }),
        resourceGroup: OptionalResourceGroup,
        limit: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }),
        subscriptionId: SubscriptionId,
      }),
      async run(params) {
        const events = await (await state.monitor(params.subscriptionId)).listActivityLogs({
          hours: params.hours,
          resourceGroup: optional(params.resourceGroup),
          limit: params.limit,
        });
        return { events, count: events.length };
      },
    }),

    defineTool({
      name: "azure_list_application_insights",
      label: "List Application Insights",
      description: "Application Insights components.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: OptionalResourceGroup, subscriptionId: SubscriptionId }),
      async run(params) {
        const components = await (await state.monitor(params.subscriptionId)).listApplicationInsights(
          optional(params.resourceGroup),
        );
        return { components, count: components.length };
      },
    }),
  ];
}
