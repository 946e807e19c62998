/**
 * Environment discovery, identity and session tools.
 */

import { Type } from "@sinclair/typebox";
import { defineTool, errorMessage, type Logger, type ToolDefinition } from "../../../../src/index.js";
import type { AwsServerState } from "../state.js";

const SERVICE = "sts";

type PermissionCheck = {
  service: string;
  nextTools: string[];
  check: (state: AwsServerState) => Promise<unknown>;
};

const PERMISSION_CHECKS: PermissionCheck[] = [
  { service: "CloudWatchLogs", nextTools: ["aws_list_log_groups", "aws_get_error_logs"], check: (s) => s.logs.listLogGroups({ limit: 1 }) },
  { service: "CloudWatch", nextTools: ["aws_list_metrics", "aws_list_alarms"], check: (s) => s.metrics.listAlarms({ limit: 1 }) },
  { service: "S3", nextTools: ["aws_list_s3_buckets"], check: (s) => s.s3.listBuckets() },
  { service: "ECR", nextTools: ["aws_list_ecr_repositories"], check: (s) => s.ecr.listRepositories(1) },
  { service: "ECS", nextTools: ["aws_list_ecs_clusters"], check: (s) => s.ecs.listClusters(1) },
  {
    service: "QuickSight",
    nextTools: ["aws_list_quicksight_dashboards"],
    check: async (s) => (await s.quickSightReady()).listDashboards(1),
  },
];

export function createDiscoveryTools(state: AwsServerState, logger: Logger): ToolDefinition[] {
  return [
    defineTool({
      name: "aws_discover_environment",
      label: "Discover AWS Environment",
      description: "Credential sources, profiles and the region this server would use.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        const credentials = state.credentialsManager;
        const profiles = await credentials.listProfiles(true);
        const session = state.session;
        return {
          region: session.region,
          profile: session.profile,
          credentialSource: session.credentialSource,
          environmentCredentials: credentials.hasEnvironmentCredentials(),
          files: credentials.files,
          profiles,
          profileCount: profiles.length,
          suggestedTools: ["aws_test_connection", "aws_initialize", "aws_check_service_permissions"],
        };
      },
    }),

    defineTool({
      name: "aws_get_account_info",
      label: "Get Account Info",
      description: "Account id, ARN and user id of the current credentials.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        const identity = await state.getCallerIdentity();
        return { ...identity, region: state.session.region };
      },
    }),

    defineTool({
      name: "aws_test_connection",
      label: "Test AWS Connection",
      description: "Check that the credentials work. Never fails; reports connected: false instead.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        const { region, credentialSource } = state.session;
        try {
          const identity = await state.getCallerIdentity();
          return { connected: true, region, credentialSource, accountId: identity.accountId, arn: identity.arn };
        } catch (error) {
          logger.warn(`AWS connection test failed: ${errorMessage(error)}`);
          return { connected: false, region, credentialSource, error: errorMessage(error) };
        }
      },
    }),

    defineTool({
      name: "aws_check_service_permissions",
      label: "Check Service Permissions",
      description: "Try a cheap read call against each supported service and report which ones are usable.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        const results = await Promise.all(
          PERMISSION_CHECKS.map(async ({ service, nextTools, check }) => {
            try {
              await check(state);
              return { service, hasPermission: true, nextTools };
            } catch (error) {
              return { service, hasPermission: false, error: errorMessage(error) };
            }
          }),
        );
        const permitted = results.filter((r) => r.hasPermission);
        return {
          region: state.session.region,
          services: results,
          permittedCount: permitted.length,
          suggestedTools: results.flatMap((r) => ("nextTools" in r ? r.nextTools : [])),
        };
      },
    }),

    defineTool({
      name: "aws_initialize",
      label: "Initialize AWS Session",
      description: "Switch region and/or profile, rebuild the clients and report the caller identity.",
      service: SERVICE,
      parameters: Type.Object({
        region: Type.Optional(Type.String({ description: "e.g. us-east-1" })),
        profile: Type.Optional(Type.String({ description: "Profile name; empty string clears it" })),
      }),
      async run(params) {
        const session = await state.initialize(params);
        const identity = await state.getCallerIdentity();
        return { ...session, identity, message: `AWS session ready in ${session.region}` };
      },
    }),
  ];
}
