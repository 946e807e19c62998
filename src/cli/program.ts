/**
 * `cloud-mcp` command line: serve a tool server on stdio, list its tools,
 * or print the resolved configuration.
 */

import { Argument, Command, Option } from "commander";
import { describeConfig, loadConfig, type AppConfig } from "../config.js";
import { LOG_LEVELS, createLogger, isLogLevel, setGlobalLogger, type Logger, type LogLevel } from "../logging/index.js";
import { serveStdio, type McpServer, type StdioOptions } from "../mcp/server.js";
import { createMcpServer, type ToolServer, type ToolServerFactory } from "../mcp/tool-server.js";
import { VERSION } from "../version.js";

// =============================================================================
// Types
// =============================================================================

export type CliDeps = {
  /** Tool servers by name, as accepted by `serve` and `tools`. */
  servers: Record<string, ToolServerFactory>;
  print?: (text: string) => void;
  env?: NodeJS.ProcessEnv;
  createLogger?: (level: LogLevel, file?: string) => Logger;
  serve?: (server: McpServer, logger: Logger, options: StdioOptions) => Promise<void>;
};

type ConfigOptions = { config?: string };

// =============================================================================
// Helpers
// =============================================================================

function defaultLogger(level: LogLevel, file?: string): Logger {
  const logger = createLogger("cloud-mcp", { level, file });
  setGlobalLogger(logger);
  return logger;
}

function formatToolTable(tools: ToolServer["tools"]): string {
  const width = Math.max(...tools.map((t) => t.name.length), 0);
  return tools.map((t) => `${t.name.padEnd(width)}  ${t.description}`).join("\n");
}

// =============================================================================
// Program
// =============================================================================

export function createProgram(deps: CliDeps): Command {
  const print = deps.print ?? ((text: string) => process.stdout.write(`${text}\n`));
  const makeLogger = deps.createLogger ?? defaultLogger;
  const serve = deps.serve ?? serveStdio;
  const names = Object.keys(deps.servers);

  const readConfig = (options: ConfigOptions): Promise<AppConfig> =>
    loadConfig({ file: options.config, env: deps.env ?? process.env });

  const factoryFor = (name: string): ToolServerFactory => {
    const factory = deps.servers[name];
    if (!factory) throw new Error(`Unknown server '${name}'; expected one of ${names.join(", ")}`);
    return factory;
  };

  const serverArgument = () => new Argument("<server>", "Tool server to run").choices(names);
  const configOption = () => new Option("-c, --config <path>", "JSON config file (default: $CLOUD_MCP_CONFIG)");

  const program = new Command("cloud-mcp").description("MCP tool servers for AWS, Azure and local documents").version(VERSION);

  program
    .command("serve")
    .description("Run a tool server over stdio")
    .addArgument(serverArgument())
    .addOption(configOption())
    .addOption(new Option("-l, --log-level <level>", "Log level (default: from config)").choices(LOG_LEVELS))
    .action(async (name: string, options: ConfigOptions & { logLevel?: string }) => {
      const config = await readConfig(options);
      const level = options.logLevel && isLogLevel(options.logLevel) ? options.logLevel : config.logging.level;
      const logger = makeLogger(level, config.logging.file);
      const server = await factoryFor(name)(config, logger);
      await serve(createMcpServer(server, logger), logger, { onShutdown: () => server.dispose() });
    });

  program
    .command("tools")
    .description("List the tools a server provides")
    .addArgument(serverArgument())
    .addOption(configOption())
    .option("--json", "Print JSON instead of a table")
    .action(async (name: string, options: ConfigOptions & { json?: boolean }) => {
      const config = await readConfig(options);
      const server = await factoryFor(name)(config, makeLogger("error", config.logging.file));
      try {
        if (options.json) {
          const tools = server.tools.map((t) => ({ name: t.name, label: t.label, description: t.description, service: t.service }));
          print(JSON.stringify(tools, null, 2));
        } else {
          print(formatToolTable(server.tools));
          print(`\n${server.tools.length} tools`);
        }
      } finally {
        await server.dispose();
      }
    });

  program
    .command("config")
    .description("Print the resolved configuration with secrets masked")
    .addOption(configOption())
    .action(async (options: ConfigOptions) => {
      print(JSON.stringify(describeConfig(await readConfig(options)), null, 2));
    });

  return program;
}
