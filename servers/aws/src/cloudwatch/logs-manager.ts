/**
 * CloudWatch Logs Manager
 *
 * Log groups, streams, event filtering across groups and Logs Insights.
 */

import {
  CloudWatchLogsClient,
  CreateLogGroupCommand,
  DeleteLogGroupCommand,
  DeleteRetentionPolicyCommand,
  DescribeLogGroupsCommand,
  DescribeLogStreamsCommand,
  FilterLogEventsCommand,
  GetLogEventsCommand,
  GetQueryResultsCommand,
  PutRetentionPolicyCommand,
  StartQueryCommand,
  StopQueryCommand,
  type FilteredLogEvent,
  type LogGroup,
  type LogStream,
  type OutputLogEvent,
  type ResultField,
} from "@aws-sdk/client-cloudwatch-logs";
import { ToolInputError, compileRegex, errorMessage } from "../../../../src/index.js";
import { withAwsRetry } from "../retry.js";
import type { AwsManagerOptions } from "../types.js";
import {
  ERROR_FILTER_PATTERN,
  RETENTION_DAYS,
  type FilterLogsOptions,
  type InsightsQueryResult,
  type InsightsQueryStatus,
  type ListLogStreamsOptions,
  type LogContextResult,
  type LogEventRecord,
  type LogGroupSummary,
  type LogStreamSummary,
  type MultiGroupResult,
  type PatternSearchResult,
} from "./types.js";

const MAX_PAGES = 20;
const INSIGHTS_STATUSES: readonly InsightsQueryStatus[] = ["Scheduled", "Running", "Complete", "Failed", "Cancelled", "Timeout"];

const toIso = (ms: number | undefined) => (ms === undefined ? undefined : new Date(ms).toISOString());

export type LogsManagerOptions = AwsManagerOptions & {
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

export class CloudWatchLogsManager {
  private readonly client: CloudWatchLogsClient;
  private readonly options: LogsManagerOptions;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: LogsManagerOptions) {
    this.options = options;
    this.client = new CloudWatchLogsClient({ region: options.region, credentials: options.credentials });
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  private send<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withAwsRetry(fn, { label, retry: this.options.retry });
  }

  destroy(): void {
    this.client.destroy();
  }

  // ===========================================================================
  // Log groups
  // ===========================================================================

  async listLogGroups(options: { prefix?: string; limit?: number } = {}): Promise<LogGroupSummary[]> {
    const limit = options.limit ?? 50;
    const groups: LogGroupSummary[] = [];
    let nextToken: string | undefined;

    for (let page = 0; page < MAX_PAGES && groups.length < limit; page += 1) {
      const response = await this.send("DescribeLogGroups", () =>
        this.client.send(
          new DescribeLogGroupsCommand({
            logGroupNamePrefix: options.prefix,
            limit: Math.min(50, limit - groups.length),
            nextToken,
          }),
        ),
      );
      groups.push(...(response.logGroups ?? []).map(mapLogGroup));
      nextToken = response.nextToken;
      if (!nextToken) break;
    }
    return groups.slice(0, limit);
  }

  async createLogGroup(name: string, tags?: Record<string, string>): Promise<void> {
    await this.send("CreateLogGroup", () => this.client.send(new CreateLogGroupCommand({ logGroupName: name, tags })));
  }

  async deleteLogGroup(name: string): Promise<void> {
    await this.send("DeleteLogGroup", () => this.client.send(new DeleteLogGroupCommand({ logGroupName: name })));
  }

  /**
   * Set retention in days; 0 removes the policy (never expire).
   */
  async setRetentionPolicy(name: string, retentionInDays: number): Promise<void> {
    if (retentionInDays === 0) {
      await this.send("DeleteRetentionPolicy", () =>
        this.client.send(new DeleteRetentionPolicyCommand({ logGroupName: name })),
      );
      return;
    }
    if (!RETENTION_DAYS.some((days) => days === retentionInDays)) {
      throw new ToolInputError(`retentionInDays must be 0 or one of ${RETENTION_DAYS.join(", ")}`, {
        field: "retentionInDays",
      });
    }
    await this.send("PutRetentionPolicy", () =>
      this.client.send(new PutRetentionPolicyCommand({ logGroupName: name, retentionInDays })),
    );
  }

  // ===========================================================================
  // Streams and events
  // ===========================================================================

  async listLogStreams(logGroupName: string, options: ListLogStreamsOptions = {}): Promise<LogStreamSummary[]> {
    const orderBy = options.prefix ? "LogStreamName" : (options.orderBy ?? "LastEventTime");
    const response = await this.send("DescribeLogStreams", () =>
      this.client.send(
        new DescribeLogStreamsCommand({
          logGroupName,
          logStreamNamePrefix: options.prefix,
          orderBy,
          descending: options.descending ?? true,
          limit: Math.min(options.limit ?? 50, 50),
        }),
      ),
    );
    return (response.logStreams ?? []).map(mapLogStream);
  }

  async getLogEvents(
    logGroupName: string,
    logStreamName: string,
    options: { startTime?: Date; endTime?: Date; limit?: number; startFromHead?: boolean } = {},
  ): Promise<LogEventRecord[]> {
    const response = await this.send("GetLogEvents", () =>
      this.client.send(
        new GetLogEventsCommand({
          logGroupName,
          logStreamName,
          startTime: options.startTime?.getTime(),
          endTime: options.endTime?.getTime(),
          limit: options.limit ?? 100,
          startFromHead: options.startFromHead ?? false,
        }),
      ),
    );
    return (response.events ?? []).map((event) => mapOutputEvent(event, logGroupName, logStreamName));
  }

  async filterLogEvents(logGroupName: string, options: FilterLogsOptions = {}): Promise<LogEventRecord[]> {
    const limit = options.limit ?? 100;
    const events: LogEventRecord[] = [];
    let nextToken: string | undefined;

    for (let page = 0; page < MAX_PAGES && events.length < limit; page += 1) {
      const response = await this.send("FilterLogEvents", () =>
        this.client.send(
          new FilterLogEventsCommand({
            logGroupName,
            logStreamNames: options.logStreamNames?.length ? options.logStreamNames : undefined,
            filterPattern: options.filterPattern || undefined,
            startTime: options.startTime?.getTime(),
            endTime: options.endTime?.getTime(),
            limit: Math.min(10_000, limit - events.length),
            nextToken,
          }),
        ),
      );
      events.push(...(response.events ?? []).map((event) => mapFilteredEvent(event, logGroupName)));
      nextToken = response.nextToken;
      if (!nextToken) break;
    }
    return events.slice(0, limit);
  }

  /**
   * Filter several groups in parallel; events are merged newest first and
   * failing groups are reported instead of failing the whole call.
   */
  async filterLogEventsMulti(logGroupNames: string[], options: FilterLogsOptions = {}): Promise<MultiGroupResult> {
    if (logGroupNames.length === 0) {
      throw new ToolInputError("At least one log group name is required", { field: "logGroupNames" });
    }
    const limit = options.limit ?? 100;
    const settled = await Promise.allSettled(
      logGroupNames.map((name) => this.filterLogEvents(name, { ...options, limit })),
    );

    const events: LogEventRecord[] = [];
    const failedLogGroups: MultiGroupResult["failedLogGroups"] = [];
    settled.forEach((result, index) => {
      if (result.status === "fulfilled") events.push(...result.value);
      else failedLogGroups.push({ logGroupName: logGroupNames[index], error: errorMessage(result.reason) });
    });

    if (failedLogGroups.length === logGroupNames.length) {
      const first = settled.find((r): r is PromiseRejectedResult => r.status === "rejected");
      throw first?.reason;
    }

    events.sort((a, b) => b.timestamp - a.timestamp);
    return {
      events: events.slice(0, limit),
      searchedLogGroups: logGroupNames.filter((name) => !failedLogGroups.some((f) => f.logGroupName === name)),
      failedLogGroups,
    };
  }

  async getRecentLogs(logGroupNames: string[], minutes: number, limit = 100): Promise<MultiGroupResult> {
    return this.filterLogEventsMulti(logGroupNames, { startTime: this.minutesAgo(minutes), limit });
  }

  async getErrorLogs(logGroupNames: string[], minutes: number, limit = 100): Promise<MultiGroupResult> {
    return this.filterLogEventsMulti(logGroupNames, {
      startTime: this.minutesAgo(minutes),
      filterPattern: ERROR_FILTER_PATTERN,
      limit,
    });
  }

  /**
   * Regex search: events in the window are fetched (up to `scanLimit` per
   * group) and matched locally. A plain-text, case-sensitive pattern is also
   * sent as a CloudWatch filter so less data comes back.
   */
  async searchLogPattern(
    logGroupNames: string[],
    pattern: string,
    options: { minutes: number; limit?: number; scanLimit?: number; caseSensitive?: boolean },
  ): Promise<PatternSearchResult> {
    const regex = compileRegex(pattern, { caseSensitive: options.caseSensitive });

    const scanned = await this.filterLogEventsMulti(logGroupNames, {
      startTime: this.minutesAgo(options.minutes),
      filterPattern: literalFilterPattern(pattern, options.caseSensitive ?? false),
      limit: options.scanLimit ?? 5_000,
    });
    const limit = options.limit ?? 100;
    return {
      ...scanned,
      pattern,
      scannedEvents: scanned.events.length,
      events: scanned.events.filter((event) => regex.test(event.message)).slice(0, limit),
    };
  }

  /**
   * Events of one stream around a timestamp.
   */
  async getLogContext(
    logGroupName: string,
    logStreamName: string,
    timestamp: number,
    options: { beforeSeconds?: number; afterSeconds?: number; limit?: number } = {},
  ): Promise<LogContextResult> {
    const beforeMs = (options.beforeSeconds ?? 60) * 1000;
    const afterMs = (options.afterSeconds ?? 60) * 1000;
    const events = await this.getLogEvents(logGroupName, logStreamName, {
      startTime: new Date(timestamp - beforeMs),
      endTime: new Date(timestamp + afterMs + 1),
      limit: options.limit ?? 200,
      startFromHead: true,
    });

    const targetIndex = events.findIndex((event) => event.timestamp >= timestamp);
    if (targetIndex === -1) return { before: events, after: [] };
    return {
      target: events[targetIndex],
      before: events.slice(0, targetIndex),
      after: events.slice(targetIndex + 1),
    };
  }

  // ===========================================================================
  // Logs Insights
  // ===========================================================================

  async startQuery(logGroupNames: string[], query: string, startTime: Date, endTime: Date, limit?: number): Promise<string> {
    if (logGroupNames.length === 0) {
      throw new ToolInputError("At least one log group name is required", { field: "logGroupNames" });
    }
    if (startTime.getTime() >= endTime.getTime()) {
      throw new ToolInputError("startTime must be before endTime", { field: "startTime" });
    }
    const response = await this.send("StartQuery", () =>
      this.client.send(
        new StartQueryCommand({
          logGroupNames,
          queryString: query,
          startTime: Math.floor(startTime.getTime() / 1000),
          endTime: Math.floor(endTime.getTime() / 1000),
          limit,
        }),
      ),
    );
    if (!response.queryId) throw new Error("StartQuery returned no query id");
    return response.queryId;
  }

  async getQueryResults(queryId: string): Promise<InsightsQueryResult> {
    const response = await this.send("GetQueryResults", () =>
      this.client.send(new GetQueryResultsCommand({ queryId })),
    );
    const status = INSIGHTS_STATUSES.find((s) => s === response.status) ?? "Unknown";
    return {
      queryId,
      status,
      results: (response.results ?? []).map(mapResultRow),
      statistics: response.statistics
        ? {
            recordsMatched: response.statistics.recordsMatched,
            recordsScanned: response.statistics.recordsScanned,
            bytesScanned: response.statistics.bytesScanned,
          }
        : undefined,
    };
  }

  async stopQuery(queryId: string): Promise<boolean> {
    const response = await this.send("StopQuery", () => this.client.send(new StopQueryCommand({ queryId })));
    return response.success ?? false;
  }

  /**
   * Start a query and poll until it finishes. On timeout the query is
   * stopped and whatever results exist are returned with status Timeout.
   */
  async runQuery(
    logGroupNames: string[],
    query: string,
    startTime: Date,
    endTime: Date,
    options: { timeoutMs?: number; pollIntervalMs?: number; limit?: number } = {},
  ): Promise<InsightsQueryResult> {
    const timeoutMs = options.timeoutMs ?? 60_000;
    const pollIntervalMs = options.pollIntervalMs ?? 1_000;
    const queryId = await this.startQuery(logGroupNames, query, startTime, endTime, options.limit);
    const started = this.now().getTime();

    let result = await this.getQueryResults(queryId);
    while (result.status === "Scheduled" || result.status === "Running" || result.status === "Unknown") {
      if (this.now().getTime() - started >= timeoutMs) {
        await this.stopQuery(queryId);
        return { ...result, status: "Timeout" };
      }
      await this.sleep(pollIntervalMs);
      result = await this.getQueryResults(queryId);
    }
    return result;
  }

  private minutesAgo(minutes: number): Date {
    if (!(minutes > 0)) throw new ToolInputError("minutes must be positive", { field: "minutes" });
    return new Date(this.now().getTime() - minutes * 60_000);
  }
}

const REGEX_META = /[\\^$.|?*+()[\]{}]/;

export function literalFilterPattern(pattern: string, caseSensitive: boolean): string | undefined {
  if (!caseSensitive || REGEX_META.test(pattern) || pattern.includes('"')) return undefined;
  return `"${pattern}"`;
}

// =============================================================================
// Mappers
// =============================================================================

function mapLogGroup(group: LogGroup): LogGroupSummary {
  return {
    name: group.logGroupName ?? "",
    arn: group.arn,
    createdAt: toIso(group.creationTime),
    retentionInDays: group.retentionInDays,
    storedBytes: group.storedBytes,
    logGroupClass: group.logGroupClass,
  };
}

function mapLogStream(stream: LogStream): LogStreamSummary {
  return {
    name: stream.logStreamName ?? "",
    createdAt: toIso(stream.creationTime),
    firstEventAt: toIso(stream.firstEventTimestamp),
    lastEventAt: toIso(stream.lastEventTimestamp),
    lastIngestionAt: toIso(stream.lastIngestionTime),
  };
}

function mapOutputEvent(event: OutputLogEvent, logGroupName: string, logStreamName: string): LogEventRecord {
  const timestamp = event.timestamp ?? 0;
  return {
    timestamp,
    time: new Date(timestamp).toISOString(),
    message: (event.message ?? "").trimEnd(),
    logGroupName,
    logStreamName,
  };
}

function mapFilteredEvent(event: FilteredLogEvent, logGroupName: string): LogEventRecord {
  const timestamp = event.timestamp ?? 0;
  return {
    timestamp,
    time: new Date(timestamp).toISOString(),
    message: (event.message ?? "").trimEnd(),
    logGroupName,
    logStreamName: event.logStreamName,
    eventId: event.eventId,
  };
}

function mapResultRow(row: ResultField[]): Record<string, string> {
  const record: Record<string, string> = {};
  for (const field of row) {
    if (field.field && field.field !== "@ptr") record[field.field] = field.value ?? "";
  }
  return record;
}
