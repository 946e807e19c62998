/**
 * QuickSight tools. The account id comes from aws_initialize_quicksight,
 * the configuration, or the caller identity.
 */

import { Type } from "@sinclair/typebox";
import { defineTool, type ToolDefinition } from "../../../../src/index.js";
import type { AwsServerState } from "../state.js";

const SERVICE = "quicksight";

const Limit = Type.Integer({ minimum: 1, maximum: 1000, default: 100 });
const Namespace = Type.String({ default: "default" });

export function createQuickSightTools(state: AwsServerState): ToolDefinition[] {
  return [
    defineTool({
      name: "aws_initialize_quicksight",
      label: "Initialize QuickSight",
      description: "Set the AWS account id used for QuickSight calls (defaults to the caller's account).",
      service: SERVICE,
      parameters: Type.Object({ accountId: Type.Optional(Type.String({ pattern: "^\\d{12}$" })) }),
      async run(params) {
        const manager = await state.initializeQuickSight(params.accountId);
        return { accountId: manager.accountId, region: state.session.region, message: "QuickSight initialized" };
      },
    }),

    defineTool({
      name: "aws_list_quicksight_dashboards",
      label: "List QuickSight Dashboards",
      description: "Dashboards of the account.",
      service: SERVICE,
      parameters: Type.Object({ limit: Limit }),
      async run(params) {
        const dashboards = await (await state.quickSightReady()).listDashboards(params.limit);
        return { dashboards, count: dashboards.length };
      },
    }),

    defineTool({
      name: "aws_describe_quicksight_dashboard",
      label: "Describe QuickSight Dashboard",
      description: "Version, sheets and datasets of a dashboard.",
      service: SERVICE,
      parameters: Type.Object({ dashboardId: Type.String({ minLength: 1 }) }),
      async run(params) {
        return { dashboard: await (await state.quickSightReady()).describeDashboard(params.dashboardId) };
      },
    }),

    defineTool({
      name: "aws_list_quicksight_analyses",
      label: "List QuickSight Analyses",
      description: "Analyses of the account.",
      service: SERVICE,
      parameters: Type.Object({ limit: Limit }),
      async run(params) {
        const analyses = await (await state.quickSightReady()).listAnalyses(params.limit);
        return { analyses, count: analyses.length };
      },
    }),

    defineTool({
      name: "aws_describe_quicksight_analysis",
      label: "Describe QuickSight Analysis",
      description: "Status, sheets and datasets of an analysis.",
      service: SERVICE,
      parameters: Type.Object({ analysisId: Type.String({ minLength: 1 }) }),
      async run(params) {
        return { analysis: await (await state.quickSightReady()).describeAnalysis(params.analysisId) };
      },
    }),

    defineTool({
      name: "aws_list_quicksight_datasets",
      label: "List QuickSight Datasets",
      description: "Datasets of the account.",
      service: SERVICE,
      parameters: Type.Object({ limit: Limit }),
      async run(params) {
        const dataSets = await (await state.quickSightReady()).listDataSets(params.limit);
        return { dataSets, count: dataSets.length };
      },
    }),

    defineTool({
      name: "aws_describe_quicksight_dataset",
      label: "Describe QuickSight Dataset",
      description: "Columns, import mode and SPICE usage of a dataset.",
      service: SERVICE,
      parameters: Type.Object({ dataSetId: Type.String({ minLength: 1 }) }),
      async run(params) {
        return { dataSet: await (await state.quickSightReady()).describeDataSet(params.dataSetId) };
      },
    }),

    defineTool({
      name: "aws_list_quicksight_data_sources",
      label: "List QuickSight Data Sources",
      description: "Data sources of the account.",
      service: SERVICE,
      parameters: Type.Object({ limit: Limit }),
      async run(params) {
        const dataSources = await (await state.quickSightReady()).listDataSources(params.limit);
        return { dataSources, count: dataSources.length };
      },
    }),

    defineTool({
      name: "aws_describe_quicksight_data_source",
      label: "Describe QuickSight Data Source",
      description: "Type, status and last error of a data source.",
      service: SERVICE,
      parameters: Type.Object({ dataSourceId: Type.String({ minLength: 1 }) }),
      async run(params) {
        return { dataSource: await (await state.quickSightReady()).describeDataSource(params.dataSourceId) };
      },
    }),

    defineTool({
      name: "aws_list_quicksight_users",
      label: "List QuickSight Users",
      description: "Users of a QuickSight namespace.",
      service: SERVICE,
      parameters: Type.Object({ namespace: Namespace, limit: Limit }),
      async run(params) {
        const users = await (await state.quickSightReady()).listUsers(params.namespace, params.limit);
        return { namespace: params.namespace, users, count: users.length };
      },
    }),

    defineTool({
      name: "aws_describe_quicksight_user",
      label: "Describe QuickSight User",
      description: "Role and identity type of a user.",
      service: SERVICE,
      parameters: Type.Object({ userName: Type.String({ minLength: 1 }), namespace: Namespace }),
      async run(params) {
        return { user: await (await state.quickSightReady()).describeUser(params.userName, params.namespace) };
      },
    }),

    defineTool({
      name: "aws_generate_quicksight_embed_url",
      label: "Generate Dashboard Embed URL",
      description: "One-time embed URL of a dashboard for a registered user.",
      service: SERVICE,
      parameters: Type.Object({
        userArn: Type.String({ minLength: 1 }),
        dashboardId: Type.String({ minLength: 1 }),
        sessionLifetimeMinutes: Type.Integer({ minimum: 15, maximum: 600, default: 60 }),
      }),
      async run(params) {
        const manager = await state.quickSightReady();
        return {
          ...(await manager.generateDashboardEmbedUrl(params.userArn, params.dashboardId, params.sessionLifetimeMinutes)),
        };
      },
    }),
  ];
}
