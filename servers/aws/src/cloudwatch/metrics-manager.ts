/**
 * CloudWatch Metrics & Alarms Manager
 */

import {
  CloudWatchClient,
  DeleteAlarmsCommand,
  DescribeAlarmHistoryCommand,
  DescribeAlarmsCommand,
  DisableAlarmActionsCommand,
  EnableAlarmActionsCommand,
  GetMetricStatisticsCommand,
  ListMetricsCommand,
  PutMetricAlarmCommand,
  PutMetricDataCommand,
  type AlarmHistoryItem,
  type Datapoint,
  type Dimension,
  type MetricAlarm,
  type StandardUnit,
  type StateValue,
} from "@aws-sdk/client-cloudwatch";
import { ToolInputError } from "../../../../src/index.js";
import { withAwsRetry } from "../retry.js";
import type { AwsManagerOptions } from "../types.js";
import type {
  AlarmHistoryEntry,
  AlarmSummary,
  CreateAlarmOptions,
  MetricDatapoint,
  MetricDimension,
  MetricStatisticsQuery,
  MetricSummary,
  PutMetricOptions,
} from "./types.js";

const STANDARD_UNITS: readonly StandardUnit[] = [
  "Seconds", "Microseconds", "Milliseconds", "Bytes", "Kilobytes", "Megabytes", "Gigabytes", "Terabytes",
  "Bits", "Kilobits", "Megabits", "Gigabits", "Terabits", "Percent", "Count", "Bytes/Second",
  "Kilobytes/Second", "Megabytes/Second", "Gigabytes/Second", "Terabytes/Second", "Bits/Second",
  "Kilobits/Second", "Megabits/Second", "Gigabits/Second", "Terabits/Second", "Count/Second", "None",
];

const ALARM_STATES: readonly StateValue[] = ["OK", "ALARM", "INSUFFICIENT_DATA"];

const MAX_DATAPOINTS = 1_440;

export function toUnit(unit: string | undefined): StandardUnit | undefined {
  if (unit === undefined || unit === "") return undefined;
  const match = STANDARD_UNITS.find((u) => u.toLowerCase() === unit.toLowerCase());
  if (!match) throw new ToolInputError(`Unknown metric unit '${unit}'`, { field: "unit" });
  return match;
}

export function toStateValue(state: string | undefined): StateValue | undefined {
  if (state === undefined || state === "") return undefined;
  const match = ALARM_STATES.find((s) => s === state.toUpperCase());
  if (!match) throw new ToolInputError(`stateValue must be one of ${ALARM_STATES.join(", ")}`, { field: "stateValue" });
  return match;
}

const toDimensions = (dimensions?: MetricDimension[]): Dimension[] | undefined =>
  dimensions?.map((d) => ({ Name: d.name, Value: d.value }));

const fromDimensions = (dimensions?: Dimension[]): MetricDimension[] =>
  (dimensions ?? []).map((d) => ({ name: d.Name ?? "", value: d.Value ?? "" }));

export class CloudWatchMetricsManager {
  private readonly client: CloudWatchClient;
  private readonly options: AwsManagerOptions;

  constructor(options: AwsManagerOptions) {
    this.options = options;
    this.client = new CloudWatchClient({ region: options.region, credentials: options.credentials });
  }

  private send<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withAwsRetry(fn, { label, retry: this.options.retry });
  }

  destroy(): void {
    this.client.destroy();
  }

  // ===========================================================================
  // Metrics
  // ===========================================================================

  async listMetrics(options: { namespace?: string; metricName?: string; limit?: number } = {}): Promise<MetricSummary[]> {
    const limit = options.limit ?? 500;
    const metrics: MetricSummary[] = [];
    let nextToken: string | undefined;
    do {
      const response = await this.send("ListMetrics", () =>
        this.client.send(new ListMetricsCommand({ Namespace: options.namespace, MetricName: options.metricName, NextToken: nextToken })),
      );
      for (const metric of response.Metrics ?? []) {
        metrics.push({
          namespace: metric.Namespace ?? "",
          metricName: metric.MetricName ?? "",
          dimensions: fromDimensions(metric.Dimensions),
        });
      }
      nextToken = response.NextToken;
    } while (nextToken && metrics.length < limit);
    return metrics.slice(0, limit);
  }

  /**
   * Distinct namespaces seen in ListMetrics, sorted.
   */
  async listNamespaces(): Promise<string[]> {
    const metrics = await this.listMetrics({ limit: 5_000 });
    return [...new Set(metrics.map((m) => m.namespace))].filter((n) => n.length > 0).sort();
  }

  async getMetricStatistics(query: MetricStatisticsQuery): Promise<MetricDatapoint[]> {
    if (query.period < 1 || (query.period >= 60 && query.period % 60 !== 0)) {
      throw new ToolInputError("period must be 1, 5, 10, 30 or a multiple of 60 seconds", { field: "period" });
    }
    const span = (query.endTime.getTime() - query.startTime.getTime()) / 1000;
    if (span <= 0) throw new ToolInputError("startTime must be before endTime", { field: "startTime" });
    if (span / query.period > MAX_DATAPOINTS) {
      throw new ToolInputError(
        `The time range would return more than ${MAX_DATAPOINTS} datapoints; increase the period or shorten the range`,
        { field: "period" },
      );
    }

    const response = await this.send("GetMetricStatistics", () =>
      this.client.send(
        new GetMetricStatisticsCommand({
          Namespace: query.namespace,
          MetricName: query.metricName,
          Dimensions: toDimensions(query.dimensions),
          StartTime: query.startTime,
          EndTime: query.endTime,
          Period: query.period,
          Statistics: query.statistics,
        }),
      ),
    );
    return (response.Datapoints ?? []).map(mapDatapoint).sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  }

  async putMetricData(options: PutMetricOptions): Promise<void> {
    if (options.namespace.startsWith("AWS/")) {
      throw new ToolInputError("Custom metrics cannot use a namespace starting with 'AWS/'", { field: "namespace" });
    }
    await this.send("PutMetricData", () =>
      this.client.send(
        new PutMetricDataCommand({
          Namespace: options.namespace,
          MetricData: [
            {
              MetricName: options.metricName,
              Value: options.value,
              Unit: toUnit(options.unit),
              Dimensions: toDimensions(options.dimensions),
              Timestamp: options.timestamp,
            },
          ],
        }),
      ),
    );
  }

  // ===========================================================================
  // Alarms
  // ===========================================================================

  async listAlarms(options: { stateValue?: string; prefix?: string; limit?: number } = {}): Promise<AlarmSummary[]> {
    const limit = options.limit ?? 100;
    const alarms: AlarmSummary[] = [];
    let nextToken: string | undefined;
    do {
      const response = await this.send("DescribeAlarms", () =>
        this.client.send(
          new DescribeAlarmsCommand({
            StateValue: toStateValue(options.stateValue),
            AlarmNamePrefix: options.prefix,
            MaxRecords: 100,
            NextToken: nextToken,
          }),
        ),
      );
      alarms.push(...(response.MetricAlarms ?? []).map(mapAlarm));
      nextToken = response.NextToken;
    } while (nextToken && alarms.length < limit);
    return alarms.slice(0, limit);
  }

  async createAlarm(options: CreateAlarmOptions): Promise<void> {
    await this.send("PutMetricAlarm", () =>
      this.client.send(
        new PutMetricAlarmCommand({
          AlarmName: options.alarmName,
          AlarmDescription: options.description,
          Namespace: options.namespace,
          MetricName: options.metricName,
          Statistic: options.statistic,
          Threshold: options.threshold,
          ComparisonOperator: options.comparisonOperator,
          EvaluationPeriods: options.evaluationPeriods,
          Period: options.period,
          Dimensions: toDimensions(options.dimensions),
          AlarmActions: options.alarmActions,
          TreatMissingData: options.treatMissingData,
        }),
      ),
    );
  }

  async deleteAlarms(alarmNames: string[]): Promise<void> {
    requireNames(alarmNames);
    await this.send("DeleteAlarms", () => this.client.send(new DeleteAlarmsCommand({ AlarmNames: alarmNames })));
  }

  async enableAlarmActions(alarmNames: string[]): Promise<void> {
    requireNames(alarmNames);
    await this.send("EnableAlarmActions", () =>
      this.client.send(new EnableAlarmActionsCommand({ AlarmNames: alarmNames })),
    );
  }

  async disableAlarmActions(alarmNames: string[]): Promise<void> {
    requireNames(alarmNames);
    await this.send("DisableAlarmActions", () =>
      this.client.send(new DisableAlarmActionsCommand({ AlarmNames: alarmNames })),
    );
  }

  async getAlarmHistory(
    options: {
      alarmName?: string;
      historyItemType?: "ConfigurationUpdate" | "StateUpdate" | "Action";
      startTime?: Date;
      endTime?: Date;
      maxRecords?: number;
    } = {},
  ): Promise<AlarmHistoryEntry[]> {
    const response = await this.send("DescribeAlarmHistory", () =>
      this.client.send(
        new DescribeAlarmHistoryCommand({
          AlarmName: options.alarmName,
          HistoryItemType: options.historyItemType,
          StartDate: options.startTime,
          EndDate: options.endTime,
          MaxRecords: options.maxRecords ?? 50,
          ScanBy: "TimestampDescending",
        }),
      ),
    );
    return (response.AlarmHistoryItems ?? []).map(mapHistoryItem);
  }
}

function requireNames(alarmNames: string[]): void {
  if (alarmNames.length === 0) throw new ToolInputError("At least one alarm name is required", { field: "alarmNames" });
  if (alarmNames.length > 100) throw new ToolInputError("At most 100 alarm names per call", { field: "alarmNames" });
}

function mapDatapoint(dp: Datapoint): MetricDatapoint {
  return {
    timestamp: dp.Timestamp?.toISOString() ?? "",
    average: dp.Average,
    sum: dp.Sum,
    minimum: dp.Minimum,
    maximum: dp.Maximum,
    sampleCount: dp.SampleCount,
    unit: dp.Unit,
  };
}

function mapAlarm(alarm: MetricAlarm): AlarmSummary {
  return {
    name: alarm.AlarmName ?? "",
    arn: alarm.AlarmArn,
    description: alarm.AlarmDescription,
    state: alarm.StateValue,
    stateReason: alarm.StateReason,
    stateUpdatedAt: alarm.StateUpdatedTimestamp?.toISOString(),
    metricName: alarm.MetricName,
    namespace: alarm.Namespace,
    statistic: alarm.Statistic,
    threshold: alarm.Threshold,
    comparisonOperator: alarm.ComparisonOperator,
    evaluationPeriods: alarm.EvaluationPeriods,
    period: alarm.Period,
    actionsEnabled: alarm.ActionsEnabled,
    alarmActions: alarm.AlarmActions ?? [],
    dimensions: fromDimensions(alarm.Dimensions),
  };
}

function mapHistoryItem(item: AlarmHistoryItem): AlarmHistoryEntry {
  return {
    alarmName: item.AlarmName,
    timestamp: item.Timestamp?.toISOString(),
    type: item.HistoryItemType,
    summary: item.HistorySummary,
  };
}
