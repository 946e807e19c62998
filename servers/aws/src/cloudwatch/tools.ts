/**
 * CloudWatch tools: logs, Logs Insights, metrics and alarms.
 */

import { Type } from "@sinclair/typebox";
import {
  StringList,
  ToolInputError,
  defineTool,
  parseDate,
  parseJsonArray,
  parseOptionalDate,
  parseStringList,
  parseStringMap,
  isRecord,
  stringEnum,
  type ToolDefinition,
} from "../../../../src/index.js";
import type { AwsServerState } from "../state.js";
import type { MetricDimension } from "./types.js";

const SERVICE = "cloudwatch";

const STATISTICS = ["Average", "Sum", "Minimum", "Maximum", "SampleCount"] as const;
const COMPARISON_OPERATORS = [
  "GreaterThanThreshold",
  "GreaterThanOrEqualToThreshold",
  "LessThanThreshold",
  "LessThanOrEqualToThreshold",
] as const;

const TimeParam = (description: string) =>
  Type.Optional(Type.String({ description: `${description} (ISO 8601, epoch ms, "now" or relative like -15m, -2h, -1d)` }));

/**
 * Dimensions as `[{"name":"InstanceId","value":"i-123"}]` or `{"InstanceId":"i-123"}`.
 */
export function parseDimensions(value: string | undefined): MetricDimension[] | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const trimmed = value.trim();
  if (!trimmed.startsWith("[")) {
    return Object.entries(parseStringMap(trimmed, "dimensions")).map(([name, v]) => ({ name, value: v }));
  }
  return parseJsonArray(trimmed, "dimensions").map((item) => {
    if (!isRecord(item)) throw new ToolInputError("dimensions entries must be objects", { field: "dimensions" });
    const name = item.name ?? item.Name;
    const dimValue = item.value ?? item.Value;
    if (typeof name !== "string" || typeof dimValue !== "string") {
      throw new ToolInputError("dimensions entries need string name and value", { field: "dimensions" });
    }
    return { name, value: dimValue };
  });
}

function requireGroups(value: string | string[] | undefined): string[] {
  const groups = parseStringList(value, "logGroupNames");
  if (groups.length === 0) throw new ToolInputError("logGroupNames is required", { field: "logGroupNames" });
  return groups;
}

export function createCloudWatchTools(state: AwsServerState): ToolDefinition[] {
  return [
    // =========================================================================
    // Log groups
    // =========================================================================
    defineTool({
      name: "aws_list_log_groups",
      label: "List Log Groups",
      description: "List CloudWatch log groups, optionally filtered by name prefix.",
      service: SERVICE,
      parameters: Type.Object({
        prefix: Type.Optional(Type.String({ description: "Log group name prefix" })),
        limit: Type.Integer({ minimum: 1, maximum: 1000, default: 50 }),
      }),
      async run(params) {
        const logGroups = await state.logs.listLogGroups({ prefix: params.prefix, limit: params.limit });
        return { logGroups, count: logGroups.length };
      },
    }),

    defineTool({
      name: "aws_create_log_group",
      label: "Create Log Group",
      description: "Create a CloudWatch log group.",
      service: SERVICE,
      parameters: Type.Object({
        logGroupName: Type.String({ minLength: 1 }),
        tags: Type.Optional(Type.String({ description: 'Tags as JSON, e.g. {"env":"dev"}' })),
      }),
      async run(params) {
        const tags = params.tags ? parseStringMap(params.tags, "tags") : undefined;
        await state.logs.createLogGroup(params.logGroupName, tags);
        return { logGroupName: params.logGroupName, message: `Log group ${params.logGroupName} created` };
      },
    }),

    defineTool({
      name: "aws_delete_log_group",
      label: "Delete Log Group",
      description: "Delete a CloudWatch log group and all of its streams.",
      service: SERVICE,
      parameters: Type.Object({ logGroupName: Type.String({ minLength: 1 }) }),
      async run(params) {
        await state.logs.deleteLogGroup(params.logGroupName);
        return { logGroupName: params.logGroupName, message: `Log group ${params.logGroupName} deleted` };
      },
    }),

    defineTool({
      name: "aws_set_retention_policy",
      label: "Set Log Retention",
      description: "Set the retention period of a log group in days (0 = never expire).",
      service: SERVICE,
      parameters: Type.Object({
        logGroupName: Type.String({ minLength: 1 }),
        retentionDays: Type.Integer({ minimum: 0 }),
      }),
      async run(params) {
        await state.logs.setRetentionPolicy(params.logGroupName, params.retentionDays);
        return { logGroupName: params.logGroupName, retentionDays: params.retentionDays };
      },
    }),

    // =========================================================================
    // Streams and events
    // =========================================================================
    defineTool({
      name: "aws_list_log_streams",
      label: "List Log Streams",
      description: "List log streams of a log group, most recent activity first by default.",
      service: SERVICE,
      parameters: Type.Object({
        logGroupName: Type.String({ minLength: 1 }),
        prefix: Type.Optional(Type.String()),
        orderBy: stringEnum(["LastEventTime", "LogStreamName"], { default: "LastEventTime" }),
        descending: Type.Boolean({ default: true }),
        limit: Type.Integer({ minimum: 1, maximum: 50, default: 50 }),
      }),
      async run(params) {
        const logStreams = await state.logs.listLogStreams(params.logGroupName, {
          prefix: params.prefix,
          orderBy: params.orderBy,
          descending: params.descending,
          limit: params.limit,
        });
        return { logGroupName: params.logGroupName, logStreams, count: logStreams.length };
      },
    }),

    defineTool({
      name: "aws_get_log_events",
      label: "Get Log Events",
      description: "Read events from a single log stream.",
      service: SERVICE,
      parameters: Type.Object({
        logGroupName: Type.String({ minLength: 1 }),
        logStreamName: Type.String({ minLength: 1 }),
        startTime: TimeParam("Start time"),
        endTime: TimeParam("End time"),
        limit: Type.Integer({ minimum: 1, maximum: 10000, default: 100 }),
        startFromHead: Type.Boolean({ default: false }),
      }),
      async run(params) {
        const events = await state.logs.getLogEvents(params.logGroupName, params.logStreamName, {
          startTime: parseOptionalDate(params.startTime, "startTime"),
          endTime: parseOptionalDate(params.endTime, "endTime"),
          limit: params.limit,
          startFromHead: params.startFromHead,
        });
        return { events, count: events.length };
      },
    }),

    defineTool({
      name: "aws_filter_logs",
      label: "Filter Logs",
      description: "Search a log group with a CloudWatch filter pattern.",
      service: SERVICE,
      parameters: Type.Object({
        logGroupName: Type.String({ minLength: 1 }),
        filterPattern: Type.Optional(Type.String({ description: "CloudWatch filter pattern, e.g. ERROR or { $.level = \"error\" }" })),
        startTime: TimeParam("Start time"),
        endTime: TimeParam("End time"),
        limit: Type.Integer({ minimum: 1, maximum: 10000, default: 100 }),
      }),
      async run(params) {
        const events = await state.logs.filterLogEvents(params.logGroupName, {
          filterPattern: params.filterPattern,
          startTime: parseOptionalDate(params.startTime, "startTime"),
          endTime: parseOptionalDate(params.endTime, "endTime"),
          limit: params.limit,
        });
        return { logGroupName: params.logGroupName, events, count: events.length };
      },
    }),

    defineTool({
      name: "aws_filter_logs_multi",
      label: "Filter Logs (Multiple Groups)",
      description: "Filter several log groups in parallel and merge the events newest first.",
      service: SERVICE,
      parameters: Type.Object({
        logGroupNames: StringList("Log group names (comma-separated or JSON array)"),
        filterPattern: Type.Optional(Type.String()),
        startTime: TimeParam("Start time"),
        endTime: TimeParam("End time"),
        limit: Type.Integer({ minimum: 1, maximum: 10000, default: 100 }),
      }),
      async run(params) {
        const result = await state.logs.filterLogEventsMulti(requireGroups(params.logGroupNames), {
          filterPattern: params.filterPattern,
          startTime: parseOptionalDate(params.startTime, "startTime"),
          endTime: parseOptionalDate(params.endTime, "endTime"),
          limit: params.limit,
        });
        return { ...result, count: result.events.length };
      },
    }),

    defineTool({
      name: "aws_get_recent_logs",
      label: "Get Recent Logs",
      description: "Events from the last N minutes across one or more log groups.",
      service: SERVICE,
      parameters: Type.Object({
        logGroupNames: StringList("Log group names (comma-separated or JSON array)"),
        minutes: Type.Integer({ minimum: 1, maximum: 10080, default: 15 }),
        limit: Type.Integer({ minimum: 1, maximum: 10000, default: 100 }),
      }),
      async run(params) {
        const result = await state.logs.getRecentLogs(requireGroups(params.logGroupNames), params.minutes, params.limit);
        return { ...result, minutes: params.minutes, count: result.events.length };
      },
    }),

    defineTool({
      name: "aws_get_error_logs",
      label: "Get Error Logs",
      description: "Error, exception and fatal events from the last N minutes.",
      service: SERVICE,
      parameters: Type.Object({
        logGroupNames: StringList("Log group names (comma-separated or JSON array)"),
        minutes: Type.Integer({ minimum: 1, maximum: 10080, default: 60 }),
        limit: Type.Integer({ minimum: 1, maximum: 10000, default: 100 }),
      }),
      async run(params) {
        const result = await state.logs.getErrorLogs(requireGroups(params.logGroupNames), params.minutes, params.limit);
        return { ...result, minutes: params.minutes, count: result.events.length };
      },
    }),

    defineTool({
      name: "aws_search_log_pattern",
      label: "Search Log Pattern",
      description: "Regular-expression search over recent events of one or more log groups.",
      service: SERVICE,
      parameters: Type.Object({
        logGroupNames: StringList("Log group names (comma-separated or JSON array)"),
        pattern: Type.String({ minLength: 1, description: "JavaScript regular expression" }),
        minutes: Type.Integer({ minimum: 1, maximum: 10080, default: 60 }),
        limit: Type.Integer({ minimum: 1, maximum: 10000, default: 100 }),
        caseSensitive: Type.Boolean({ default: false }),
      }),
      async run(params) {
        const result = await state.logs.searchLogPattern(requireGroups(params.logGroupNames), params.pattern, {
          minutes: params.minutes,
          limit: params.limit,
          caseSensitive: params.caseSensitive,
        });
        return { ...result, count: result.events.length };
      },
    }),

    defineTool({
      name: "aws_get_log_context",
      label: "Get Log Context",
      description: "Events of a stream before and after a given timestamp.",
      service: SERVICE,
      parameters: Type.Object({
        logGroupName: Type.String({ minLength: 1 }),
        logStreamName: Type.String({ minLength: 1 }),
        timestamp: Type.String({ description: "Event timestamp (epoch ms or ISO 8601)" }),
        beforeSeconds: Type.Integer({ minimum: 0, maximum: 3600, default: 60 }),
        afterSeconds: Type.Integer({ minimum: 0, maximum: 3600, default: 60 }),
        limit: Type.Integer({ minimum: 1, maximum: 10000, default: 200 }),
      }),
      async run(params) {
        const timestamp = parseDate(params.timestamp, "timestamp").getTime();
        const context = await state.logs.getLogContext(params.logGroupName, params.logStreamName, timestamp, {
          beforeSeconds: params.beforeSeconds,
          afterSeconds: params.afterSeconds,
          limit: params.limit,
        });
        return { ...context, timestamp: new Date(timestamp).toISOString() };
      },
    }),

    // =========================================================================
    // Logs Insights
    // =========================================================================
    defineTool({
      name: "aws_run_insights_query",
      label: "Run Insights Query",
      description: "Run a Logs Insights query and wait for the results.",
      service: SERVICE,
      parameters: Type.Object({
        logGroupNames: StringList("Log group names (comma-separated or JSON array)"),
        query: Type.String({ minLength: 1, description: "Logs Insights query, e.g. fields @timestamp, @message | limit 20" }),
        startTime: Type.String({ default: "-1h" }),
        endTime: Type.String({ default: "now" }),
        timeoutSeconds: Type.Integer({ minimum: 1, maximum: 900, default: 60 }),
        limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 10000 })),
      }),
      async run(params) {
        const result = await state.logs.runQuery(
          requireGroups(params.logGroupNames),
          params.query,
          parseDate(params.startTime, "startTime"),
          parseDate(params.endTime, "endTime"),
          { timeoutMs: params.timeoutSeconds * 1000, limit: params.limit },
        );
        return { ...result, count: result.results.length };
      },
    }),

    defineTool({
      name: "aws_start_insights_query",
      label: "Start Insights Query",
      description: "Start a Logs Insights query and return its id without waiting.",
      service: SERVICE,
      parameters: Type.Object({
        logGroupNames: StringList("Log group names (comma-separated or JSON array)"),
        query: Type.String({ minLength: 1 }),
        startTime: Type.String({ default: "-1h" }),
        endTime: Type.String({ default: "now" }),
        limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 10000 })),
      }),
      async run(params) {
        const queryId = await state.logs.startQuery(
          requireGroups(params.logGroupNames),
          params.query,
          parseDate(params.startTime, "startTime"),
          parseDate(params.endTime, "endTime"),
          params.limit,
        );
        return { queryId, message: "Query started; call aws_get_insights_results to read the results" };
      },
    }),

    defineTool({
      name: "aws_get_insights_results",
      label: "Get Insights Results",
      description: "Status and results of a Logs Insights query.",
      service: SERVICE,
      parameters: Type.Object({ queryId: Type.String({ minLength: 1 }) }),
      async run(params) {
        const result = await state.logs.getQueryResults(params.queryId);
        return { ...result, count: result.results.length };
      },
    }),

    defineTool({
      name: "aws_stop_insights_query",
      label: "Stop Insights Query",
      description: "Stop a running Logs Insights query.",
      service: SERVICE,
      parameters: Type.Object({ queryId: Type.String({ minLength: 1 }) }),
      async run(params) {
        const stopped = await state.logs.stopQuery(params.queryId);
        return { queryId: params.queryId, stopped };
      },
    }),

    // =========================================================================
    // Metrics
    // =========================================================================
    defineTool({
      name: "aws_list_metrics",
      label: "List Metrics",
      description: "List CloudWatch metrics, optionally filtered by namespace and name.",
      service: SERVICE,
      parameters: Type.Object({
        namespace: Type.Optional(Type.String({ description: "e.g. AWS/EC2" })),
        metricName: Type.Optional(Type.String()),
        limit: Type.Integer({ minimum: 1, maximum: 5000, default: 500 }),
      }),
      async run(params) {
        const metrics = await state.metrics.listMetrics(params);
        return { metrics, count: metrics.length };
      },
    }),

    defineTool({
      name: "aws_list_metric_namespaces",
      label: "List Metric Namespaces",
      description: "Distinct namespaces that currently have metrics.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        const namespaces = await state.metrics.listNamespaces();
        return { namespaces, count: namespaces.length };
      },
    }),

    defineTool({
      name: "aws_get_metric_statistics",
      label: "Get Metric Statistics",
      description: "Datapoints of a metric over a time range.",
      service: SERVICE,
      parameters: Type.Object({
        namespace: Type.String({ minLength: 1 }),
        metricName: Type.String({ minLength: 1 }),
        dimensions: Type.Optional(Type.String({ description: 'JSON, e.g. {"InstanceId":"i-123"}' })),
        startTime: Type.String({ default: "-1h" }),
        endTime: Type.String({ default: "now" }),
        period: Type.Integer({ minimum: 1, default: 300, description: "Seconds" }),
        statistics: StringList("Statistics: Average, Sum, Minimum, Maximum, SampleCount"),
      }),
      async run(params) {
        const requested = parseStringList(params.statistics, "statistics");
        const statistics = (requested.length > 0 ? requested : ["Average"]).map((value) => {
          const match = STATISTICS.find((s) => s.toLowerCase() === value.toLowerCase());
          if (!match) throw new ToolInputError(`Unknown statistic '${value}'`, { field: "statistics" });
          return match;
        });
        const datapoints = await state.metrics.getMetricStatistics({
          namespace: params.namespace,
          metricName: params.metricName,
          dimensions: parseDimensions(params.dimensions),
          startTime: parseDate(params.startTime, "startTime"),
          endTime: parseDate(params.endTime, "endTime"),
          period: params.period,
          statistics,
        });
        return { namespace: params.namespace, metricName: params.metricName, datapoints, count: datapoints.length };
      },
    }),

    defineTool({
      name: "aws_put_metric_data",
      label: "Put Metric Data",
      description: "Publish a custom metric value.",
      service: SERVICE,
      parameters: Type.Object({
        namespace: Type.String({ minLength: 1 }),
        metricName: Type.String({ minLength: 1 }),
        value: Type.Number(),
        unit: Type.Optional(Type.String({ description: "e.g. Count, Seconds, Percent" })),
        dimensions: Type.Optional(Type.String()),
      }),
      async run(params) {
        await state.metrics.putMetricData({
          namespace: params.namespace,
          metricName: params.metricName,
          value: params.value,
          unit: params.unit,
          dimensions: parseDimensions(params.dimensions),
        });
        return { namespace: params.namespace, metricName: params.metricName, value: params.value };
      },
    }),

    // =========================================================================
    // Alarms
    // =========================================================================
    defineTool({
      name: "aws_list_alarms",
      label: "List Alarms",
      description: "List metric alarms, optionally by state or name prefix.",
      service: SERVICE,
      parameters: Type.Object({
        stateValue: Type.Optional(Type.String({ description: "OK, ALARM or INSUFFICIENT_DATA" })),
        prefix: Type.Optional(Type.String()),
        limit: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }),
      }),
      async run(params) {
        const alarms = await state.metrics.listAlarms(params);
        return { alarms, count: alarms.length };
      },
    }),

    defineTool({
      name: "aws_create_metric_alarm",
      label: "Create Metric Alarm",
      description: "Create or update a metric alarm.",
      service: SERVICE,
      parameters: Type.Object({
        alarmName: Type.String({ minLength: 1 }),
        description: Type.Optional(Type.String()),
        namespace: Type.String({ minLength: 1 }),
        metricName: Type.String({ minLength: 1 }),
        statistic: stringEnum(STATISTICS, { default: "Average" }),
        threshold: Type.Number(),
        comparisonOperator: stringEnum(COMPARISON_OPERATORS, { default: "GreaterThanThreshold" }),
        evaluationPeriods: Type.Integer({ minimum: 1, default: 1 }),
        period: Type.Integer({ minimum: 10, default: 300 }),
        dimensions: Type.Optional(Type.String()),
        alarmActions: Type.Optional(StringList("SNS topic ARNs to notify")),
        treatMissingData: stringEnum(["breaching", "notBreaching", "ignore", "missing"], { default: "missing" }),
      }),
      async run(params) {
        await state.metrics.createAlarm({
          ...params,
          dimensions: parseDimensions(params.dimensions),
          alarmActions: parseStringList(params.alarmActions, "alarmActions"),
        });
        return { alarmName: params.alarmName, message: `Alarm ${params.alarmName} created` };
      },
    }),

    defineTool({
      name: "aws_delete_metric_alarm",
      label: "Delete Metric Alarms",
      description: "Delete one or more alarms.",
      service: SERVICE,
      parameters: Type.Object({ alarmNames: StringList("Alarm names (comma-separated or JSON array)") }),
      async run(params) {
        const alarmNames = parseStringList(params.alarmNames, "alarmNames");
        await state.metrics.deleteAlarms(alarmNames);
        return { deleted: alarmNames };
      },
    }),

    defineTool({
      name: "aws_enable_alarm_actions",
      label: "Enable Alarm Actions",
      description: "Enable the actions of one or more alarms.",
      service: SERVICE,
      parameters: Type.Object({ alarmNames: StringList("Alarm names (comma-separated or JSON array)") }),
      async run(params) {
        const alarmNames = parseStringList(params.alarmNames, "alarmNames");
        await state.metrics.enableAlarmActions(alarmNames);
        return { alarmNames, actionsEnabled: true };
      },
    }),

    defineTool({
      name: "aws_disable_alarm_actions",
      label: "Disable Alarm Actions",
      description: "Disable the actions of one or more alarms.",
      service: SERVICE,
      parameters: Type.Object({ alarmNames: StringList("Alarm names (comma-separated or JSON array)") }),
      async run(params) {
        const alarmNames = parseStringList(params.alarmNames, "alarmNames");
        await state.metrics.disableAlarmActions(alarmNames);
        return { alarmNames, actionsEnabled: false };
      },
    }),

    defineTool({
      name: "aws_get_alarm_history",
      label: "Get Alarm History",
      description: "State changes, configuration updates and actions of alarms.",
      service: SERVICE,
      parameters: Type.Object({
        alarmName: Type.Optional(Type.String()),
        historyItemType: Type.Optional(stringEnum(["ConfigurationUpdate", "StateUpdate", "Action"])),
        startTime: TimeParam("Start time"),
        endTime: TimeParam("End time"),
        maxRecords: Type.Integer({ minimum: 1, maximum: 100, default: 50 }),
      }),
      async run(params) {
        const history = await state.metrics.getAlarmHistory({
          alarmName: params.alarmName,
          historyItemType: params.historyItemType,
          startTime: parseOptionalDate(params.startTime, "startTime"),
          endTime: parseOptionalDate(params.endTime, "endTime"),
          maxRecords: params.maxRecords,
        });
        return { history, count: history.length };
      },
    }),
  ];
}
