/**
 * Azure tool server: resources, App Service, containers, cost, DevOps,
 * monitoring, storage, SQL, Key Vault, Service Bus, networking and Event Hubs.
 */

import { ToolRegistry, VERSION, errorMessage, type ToolServerFactory } from "../../../src/index.js";
import { createAppServiceTools } from "./appservice/tools.js";
import { createContainerTools } from "./containers/tools.js";
import { createCostTools } from "./cost/tools.js";
import { createAuthTools } from "./credentials/tools.js";
import { createDevOpsTools } from "./devops/tools.js";
import { createAzureErrorReporter } from "./errors.js";
import { createEventHubsTools } from "./eventhubs/tools.js";
import { createKeyVaultTools } from "./keyvault/tools.js";
import { createMonitorTools } from "./monitor/tools.js";
import { createNetworkTools } from "./network/tools.js";
import { createResourceTools } from "./resources/tools.js";
import { createServiceBusTools } from "./servicebus/tools.js";
import { createSqlTools } from "./sql/tools.js";
import { AzureServerState } from "./state.js";
import { createStorageTools } from "./storage/tools.js";

export { AzureServerState } from "./state.js";
export { AzureCredentialsManager } from "./credentials/manager.js";
export { createAzureErrorReporter, classifyAzureError } from "./errors.js";

const INSTRUCTIONS = [
  "Tools for Azure resources, App Service, containers, cost, DevOps, Monitor, Storage, SQL, Key Vault, Service Bus, networking and Event Hubs.",
  "Start with azure_discover_credentials or azure_test_connection; switch identity with azure_select_credential.",
  "Most tools take an optional subscriptionId; without one the configured or first visible subscription is used.",
].join("\n");

export const createAzureServer: ToolServerFactory = async (config, logger) => {
  const log = logger.child("azure");
  const state = new AzureServerState({ config: config.azure, retry: config.retry, logger: log });

  try {
    const subscriptionId = await state.subscriptionId();
    log.debug(`Azure subscription resolved: ${subscriptionId}`);
  } catch (error) {
    log.warn(`Azure subscription not resolved at startup: ${errorMessage(error)}`);
  }

  const registry = new ToolRegistry().add(
    ...createAuthTools(state, log),
    ...createResourceTools(state),
    ...createAppServiceTools(state),
    ...createContainerTools(state),
    ...createCostTools(state),
    ...createDevOpsTools(state),
    ...createMonitorTools(state),
    ...createStorageTools(state),
    ...createSqlTools(state),
    ...createKeyVaultTools(state),
    ...createServiceBusTools(state),
    ...createNetworkTools(state),
    ...createEventHubsTools(state),
  );
  log.debug(`Registered ${registry.size} Azure tools`);

  return {
    info: { name: "azure", version: VERSION },
    tools: registry.list(),
    errors: createAzureErrorReporter(),
    instructions: INSTRUCTIONS,
    async dispose() {
      state.dispose();
    },
  };
};
