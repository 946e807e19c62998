/**
 * What each provider module hands to the CLI: its tools, its error
 * reporter and a hook to release clients on shutdown.
 */

import type { AppConfig } from "../config.js";
import type { ErrorReporter } from "../errors/index.js";
import type { Logger } from "../logging/index.js";
import { McpServer, type ServerInfo } from "./server.js";
import type { ToolDefinition } from "./tool-registry.js";

export type ToolServer = {
  info: ServerInfo;
  tools: ToolDefinition[];
  errors: ErrorReporter;
  instructions?: string;
  dispose(): Promise<void>;
};

export type ToolServerFactory = (config: AppConfig, logger: Logger) => Promise<ToolServer>;

export function createMcpServer(server: ToolServer, logger: Logger): McpServer {
  return new McpServer({
    info: server.info,
    tools: server.tools,
    errors: server.errors,
    logger,
    instructions: server.instructions,
  });
}
