/**
 * CloudWatch (Logs, Logs Insights, Metrics, Alarms) types.
 */

export type LogGroupSummary = {
  name: string;
  arn?: string;
  createdAt?: string;
  retentionInDays?: number;
  storedBytes?: number;
  logGroupClass?: string;
};

export type LogStreamSummary = {
  name: string;
  createdAt?: string;
  firstEventAt?: string;
  lastEventAt?: string;
  lastIngestionAt?: string;
};

export type LogEventRecord = {
  timestamp: number;
  time: string;
  message: string;
  logGroupName?: string;
  logStreamName?: string;
  eventId?: string;
};

export type ListLogStreamsOptions = {
  prefix?: string;
  orderBy?: "LogStreamName" | "LastEventTime";
  descending?: boolean;
  limit?: number;
};

export type FilterLogsOptions = {
  filterPattern?: string;
  startTime?: Date;
  endTime?: Date;
  limit?: number;
  logStreamNames?: string[];
};

export type MultiGroupResult = {
  events: LogEventRecord[];
  searchedLogGroups: string[];
  failedLogGroups: Array<{ logGroupName: string; error: string }>;
};

export type PatternSearchResult = MultiGroupResult & {
  pattern: string;
  scannedEvents: number;
};

export type LogContextResult = {
  target?: LogEventRecord;
  before: LogEventRecord[];
  after: LogEventRecord[];
};

export type InsightsQueryStatus = "Scheduled" | "Running" | "Complete" | "Failed" | "Cancelled" | "Timeout" | "Unknown";

export type InsightsQueryResult = {
  queryId: string;
  status: InsightsQueryStatus;
  results: Array<Record<string, string>>;
  statistics?: { recordsMatched?: number; recordsScanned?: number; bytesScanned?: number };
};

export type MetricDimension = { name: string; value: string };

export type MetricSummary = {
  namespace: string;
  metricName: string;
  dimensions: MetricDimension[];
};

export type MetricDatapoint = {
  timestamp: string;
  average?: number;
  sum?: number;
  minimum?: number;
  maximum?: number;
  sampleCount?: number;
  unit?: string;
};

export type MetricStatisticsQuery = {
  namespace: string;
  metricName: string;
  dimensions?: MetricDimension[];
  startTime: Date;
  endTime: Date;
  period: number;
  statistics: Array<"Average" | "Sum" | "Minimum" | "Maximum" | "SampleCount">;
};

export type PutMetricOptions = {
  namespace: string;
  metricName: string;
  value: number;
  unit?: string;
  dimensions?: MetricDimension[];
  timestamp?: Date;
};

export type AlarmSummary = {
  name: string;
  arn?: string;
  description?: string;
  state?: string;
  stateReason?: string;
  stateUpdatedAt?: string;
  metricName?: string;
  namespace?: string;
  statistic?: string;
  threshold?: number;
  comparisonOperator?: string;
  evaluationPeriods?: number;
  period?: number;
  actionsEnabled?: boolean;
  alarmActions: string[];
  dimensions: MetricDimension[];
};

export type CreateAlarmOptions = {
  alarmName: string;
  description?: string;
  namespace: string;
  metricName: string;
  statistic: "Average" | "Sum" | "Minimum" | "Maximum" | "SampleCount";
  threshold: number;
  comparisonOperator:
    | "GreaterThanThreshold"
    | "GreaterThanOrEqualToThreshold"
    | "LessThanThreshold"
    | "LessThanOrEqualToThreshold";
  evaluationPeriods: number;
  period: number;
  dimensions?: MetricDimension[];
  alarmActions?: string[];
  treatMissingData?: "breaching" | "notBreaching" | "ignore" | "missing";
};

export type AlarmHistoryEntry = {
  alarmName?: string;
  timestamp?: string;
  type?: string;
  summary?: string;
};

/** Values accepted by PutRetentionPolicy. */
export const RETENTION_DAYS = [
  1, 3, 5, 7, 14, 30, 60, 90, 120, 150, 180, 365, 400, 545, 731, 1096, 1827, 2192, 2557, 2922, 3288, 3653,
] as const;

export const ERROR_FILTER_PATTERN = "?ERROR ?Error ?error ?Exception ?exception ?FATAL ?Fatal";
