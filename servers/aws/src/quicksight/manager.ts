/**
 * QuickSight Manager
 *
 * Every QuickSight call is scoped to an AWS account id.
 */

import {
  DescribeAnalysisCommand,
  DescribeDashboardCommand,
  DescribeDataSetCommand,
  DescribeDataSourceCommand,
  DescribeUserCommand,
  GenerateEmbedUrlForRegisteredUserCommand,
  ListAnalysesCommand,
  ListDashboardsCommand,
  ListDataSetsCommand,
  ListDataSourcesCommand,
  ListUsersCommand,
  QuickSightClient,
  type User,
} from "@aws-sdk/client-quicksight";
import { NotFoundError, ToolInputError } from "../../../../src/index.js";
import { withAwsRetry } from "../retry.js";
import type { AwsManagerOptions } from "../types.js";

const MAX_PAGES = 20;

export type QuickSightManagerOptions = AwsManagerOptions & { accountId: string };

export type QuickSightAssetSummary = {
  id: string;
  name?: string;
  arn?: string;
  createdAt?: string;
  lastUpdatedAt?: string;
  status?: string;
  type?: string;
};

export type QuickSightUserSummary = {
  userName?: string;
  email?: string;
  role?: string;
  identityType?: string;
  active?: boolean;
  arn?: string;
};

export type QuickSightEmbedUrl = {
  embedUrl: string;
  dashboardId: string;
  sessionLifetimeMinutes: number;
  requestId?: string;
};

const iso = (date: Date | undefined) => date?.toISOString();

function mapUser(user: User): QuickSightUserSummary {
  return {
    userName: user.UserName,
    email: user.Email,
    role: user.Role,
    identityType: user.IdentityType,
    active: user.Active,
    arn: user.Arn,
  };
}

export class QuickSightManager {
  private readonly client: QuickSightClient;
  private readonly options: QuickSightManagerOptions;

  constructor(options: QuickSightManagerOptions) {
    this.options = options;
    this.client = new QuickSightClient({ region: options.region, credentials: options.credentials });
  }

  get accountId(): string {
    return this.options.accountId;
  }

  private send<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withAwsRetry(fn, { label, retry: this.options.retry });
  }

  destroy(): void {
    this.client.destroy();
  }

  private async paginate<T>(
    label: string,
    call: (nextToken: string | undefined) => Promise<{ items?: T[]; nextToken?: string }>,
    limit: number,
  ): Promise<T[]> {
    const items: T[] = [];
    let nextToken: string | undefined;
    for (let page = 0; page < MAX_PAGES && items.length < limit; page += 1) {
      const response = await this.send(label, () => call(nextToken));
      items.push(...(response.items ?? []));
      nextToken = response.nextToken;
      if (!nextToken) break;
    }
    return items.slice(0, limit);
  }

  // ===========================================================================
  // Dashboards and analyses
  // ===========================================================================

  async listDashboards(limit = 100): Promise<QuickSightAssetSummary[]> {
    const AwsAccountId = this.accountId;
    return this.paginate(
      "ListDashboards",
      async (NextToken) => {
        const r = await this.client.send(new ListDashboardsCommand({ AwsAccountId, NextToken }));
        return {
          nextToken: r.NextToken,
          items: (r.DashboardSummaryList ?? []).map((d) => ({
            id: d.DashboardId ?? "",
            name: d.Name,
            arn: d.Arn,
            createdAt: iso(d.CreatedTime),
            lastUpdatedAt: iso(d.LastUpdatedTime),
            status: d.PublishedVersionNumber === undefined ? undefined : `published v${d.PublishedVersionNumber}`,
          })),
        };
      },
      limit,
    );
  }

  async describeDashboard(dashboardId: string): Promise<Record<string, unknown>> {
    const response = await this.send("DescribeDashboard", () =>
      this.client.send(new DescribeDashboardCommand({ AwsAccountId: this.accountId, DashboardId: dashboardId })),
    );
    const dashboard = response.Dashboard;
    if (!dashboard) throw new NotFoundError("QuickSight dashboard", dashboardId);
    return {
      id: dashboard.DashboardId,
      name: dashboard.Name,
      arn: dashboard.Arn,
      createdAt: iso(dashboard.CreatedTime),
      lastPublishedAt: iso(dashboard.LastPublishedTime),
      lastUpdatedAt: iso(dashboard.LastUpdatedTime),
      version: dashboard.Version
        ? {
            number: dashboard.Version.VersionNumber,
            status: dashboard.Version.Status,
            description: dashboard.Version.Description,
            sourceEntityArn: dashboard.Version.SourceEntityArn,
            dataSetArns: dashboard.Version.DataSetArns ?? [],
            sheets: (dashboard.Version.Sheets ?? []).map((s) => ({ id: s.SheetId, name: s.Name })),
            errors: (dashboard.Version.Errors ?? []).map((e) => ({ type: e.Type, message: e.Message })),
          }
        : undefined,
    };
  }

  async listAnalyses(limit = 100): Promise<QuickSightAssetSummary[]> {
    const AwsAccountId = this.accountId;
    return this.paginate(
      "ListAnalyses",
      async (NextToken) => {
        const r = await this.client.send(new ListAnalysesCommand({ AwsAccountId, NextToken }));
        return {
          nextToken: r.NextToken,
          items: (r.AnalysisSummaryList ?? []).map((a) => ({
            id: a.AnalysisId ?? "",
            name: a.Name,
            arn: a.Arn,
            createdAt: iso(a.CreatedTime),
            lastUpdatedAt: iso(a.LastUpdatedTime),
            status: a.Status,
          })),
        };
      },
      limit,
    );
  }

  async describeAnalysis(analysisId: string): Promise<Record<string, unknown>> {
    const response = await this.send("DescribeAnalysis", () =>
      this.client.send(new DescribeAnalysisCommand({ AwsAccountId: this.accountId, AnalysisId: analysisId })),
    );
    const analysis = response.Analysis;
    if (!analysis) throw new NotFoundError("QuickSight analysis", analysisId);
    return {
      id: analysis.AnalysisId,
      name: analysis.Name,
      arn: analysis.Arn,
      status: analysis.Status,
      createdAt: iso(analysis.CreatedTime),
      lastUpdatedAt: iso(analysis.LastUpdatedTime),
      dataSetArns: analysis.DataSetArns ?? [],
      themeArn: analysis.ThemeArn,
      sheets: (analysis.Sheets ?? []).map((s) => ({ id: s.SheetId, name: s.Name })),
      errors: (analysis.Errors ?? []).map((e) => ({ type: e.Type, message: e.Message })),
    };
  }

  // ===========================================================================
  // Datasets and data sources
  // ===========================================================================

  async listDataSets(limit = 100): Promise<QuickSightAssetSummary[]> {
    const AwsAccountId = this.accountId;
    return this.paginate(
      "ListDataSets",
      async (NextToken) => {
        const r = await this.client.send(new ListDataSetsCommand({ AwsAccountId, NextToken }));
        return {
          nextToken: r.NextToken,
          items: (r.DataSetSummaries ?? []).map((d) => ({
            id: d.DataSetId ?? "",
            name: d.Name,
            arn: d.Arn,
            createdAt: iso(d.CreatedTime),
            lastUpdatedAt: iso(d.LastUpdatedTime),
            type: d.ImportMode,
          })),
        };
      },
      limit,
    );
  }

  async describeDataSet(dataSetId: string): Promise<Record<string, unknown>> {
    const response = await this.send("DescribeDataSet", () =>
      this.client.send(new DescribeDataSetCommand({ AwsAccountId: this.accountId, DataSetId: dataSetId })),
    );
    const dataSet = response.DataSet;
    if (!dataSet) throw new NotFoundError("QuickSight dataset", dataSetId);
    return {
      id: dataSet.DataSetId,
      name: dataSet.Name,
      arn: dataSet.Arn,
      importMode: dataSet.ImportMode,
      createdAt: iso(dataSet.CreatedTime),
      lastUpdatedAt: iso(dataSet.LastUpdatedTime),
      consumedSpiceCapacityInBytes: dataSet.ConsumedSpiceCapacityInBytes,
      columns: (dataSet.OutputColumns ?? []).map((c) => ({ name: c.Name, type: c.Type, description: c.Description })),
      physicalTables: Object.keys(dataSet.PhysicalTableMap ?? {}),
    };
  }

  async listDataSources(limit = 100): Promise<QuickSightAssetSummary[]> {
    const AwsAccountId = this.accountId;
    return this.paginate(
      "ListDataSources",
      async (NextToken) => {
        const r = await this.client.send(new ListDataSourcesCommand({ AwsAccountId, NextToken }));
        return {
          nextToken: r.NextToken,
          items: (r.DataSources ?? []).map((d) => ({
            id: d.DataSourceId ?? "",
            name: d.Name,
            arn: d.Arn,
            createdAt: iso(d.CreatedTime),
            lastUpdatedAt: iso(d.LastUpdatedTime),
            status: d.Status,
            type: d.Type,
          })),
        };
      },
      limit,
    );
  }

  async describeDataSource(dataSourceId: string): Promise<Record<string, unknown>> {
    const response = await this.send("DescribeDataSource", () =>
      this.client.send(new DescribeDataSourceCommand({ AwsAccountId: this.accountId, DataSourceId: dataSourceId })),
    );
    const source = response.DataSource;
    if (!source) throw new NotFoundError("QuickSight data source", dataSourceId);
    return {
      id: source.DataSourceId,
      name: source.Name,
      arn: source.Arn,
      type: source.Type,
      status: source.Status,
      createdAt: iso(source.CreatedTime),
      lastUpdatedAt: iso(source.LastUpdatedTime),
      parameterTypes: Object.keys(source.DataSourceParameters ?? {}),
      errorInfo: source.ErrorInfo ? { type: source.ErrorInfo.Type, message: source.ErrorInfo.Message } : undefined,
    };
  }

  // ===========================================================================
  // Users and embedding
  // ===========================================================================

  async listUsers(namespace = "default", limit = 100): Promise<QuickSightUserSummary[]> {
    const AwsAccountId = this.accountId;
    return this.paginate(
      "ListUsers",
      async (NextToken) => {
        const r = await this.client.send(new ListUsersCommand({ AwsAccountId, Namespace: namespace, NextToken }));
        return { nextToken: r.NextToken, items: (r.UserList ?? []).map(mapUser) };
      },
      limit,
    );
  }

  async describeUser(userName: string, namespace = "default"): Promise<QuickSightUserSummary> {
    const response = await this.send("DescribeUser", () =>
      this.client.send(new DescribeUserCommand({ AwsAccountId: this.accountId, Namespace: namespace, UserName: userName })),
    );
    if (!response.User) throw new NotFoundError("QuickSight user", userName);
    return mapUser(response.User);
  }

  async generateDashboardEmbedUrl(
    userArn: string,
    dashboardId: string,
    sessionLifetimeMinutes = 60,
  ): Promise<QuickSightEmbedUrl> {
    if (sessionLifetimeMinutes < 15 || sessionLifetimeMinutes > 600) {
      throw new ToolInputError("sessionLifetimeMinutes must be between 15 and 600", { field: "sessionLifetimeMinutes" });
    }
    const response = await this.send("GenerateEmbedUrlForRegisteredUser", () =>
      this.client.send(
        new GenerateEmbedUrlForRegisteredUserCommand({
          AwsAccountId: this.accountId,
          UserArn: userArn,
          SessionLifetimeInMinutes: sessionLifetimeMinutes,
          ExperienceConfiguration: { Dashboard: { InitialDashboardId: dashboardId } },
        }),
      ),
    );
    if (!response.EmbedUrl) throw new Error("GenerateEmbedUrlForRegisteredUser returned no URL");
    return { embedUrl: response.EmbedUrl, dashboardId, sessionLifetimeMinutes, requestId: response.RequestId };
  }
}
