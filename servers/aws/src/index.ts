/**
 * AWS tool server: CloudWatch, S3, ECR, ECS and QuickSight.
 */

import { ToolRegistry, VERSION, errorMessage, type ToolServerFactory } from "../../../src/index.js";
import { createCloudWatchTools } from "./cloudwatch/tools.js";
import { createDiscoveryTools } from "./discovery/tools.js";
import { createEcrTools } from "./ecr/tools.js";
import { createEcsTools } from "./ecs/tools.js";
import { createAwsErrorReporter } from "./errors.js";
import { createQuickSightTools } from "./quicksight/tools.js";
import { createS3Tools } from "./s3/tools.js";
import { AwsServerState } from "./state.js";

export { AwsServerState } from "./state.js";
export { AwsCredentialsManager } from "./credentials/manager.js";
export { createAwsErrorReporter, classifyAwsError } from "./errors.js";

const INSTRUCTIONS = [
  "Tools for AWS CloudWatch (logs, metrics, alarms), S3, ECR, ECS and QuickSight.",
  "Start with aws_discover_environment or aws_test_connection; switch region or profile with aws_initialize.",
  "Relative times such as -1h, -30m or now are accepted wherever a time is asked for.",
].join("\n");

export const createAwsServer: ToolServerFactory = async (config, logger) => {
  const log = logger.child("aws");
  const state = new AwsServerState({ config: config.aws, retry: config.retry, logger: log });

  try {
    await state.initialize();
  } catch (error) {
    log.warn(`AWS credentials not resolved at startup: ${errorMessage(error)}`);
  }

  const registry = new ToolRegistry().add(
    ...createDiscoveryTools(state, log),
    ...createCloudWatchTools(state),
    ...createS3Tools(state),
    ...createEcrTools(state),
    ...createEcsTools(state),
    ...createQuickSightTools(state),
  );
  log.debug(`Registered ${registry.size} AWS tools`);

  return {
    info: { name: "aws", version: VERSION },
    tools: registry.list(),
    errors: createAwsErrorReporter(),
    instructions: INSTRUCTIONS,
    async dispose() {
      state.dispose();
    },
  };
};
