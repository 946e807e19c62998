/**
 * MCP server over newline-delimited JSON-RPC on stdio.
 *
 * Only the tool surface is implemented; resources and prompts answer with
 * empty lists.
 */

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { ErrorReporter } from "../errors/index.js";
import type { Logger } from "../logging/index.js";
import type { ToolDefinition, ToolResult } from "./tool-registry.js";

// =============================================================================
// JSON-RPC Types
// =============================================================================

export type JsonRpcId = number | string;

export type JsonRpcRequest = {
  jsonrpc: "2.0";
  id?: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
};

export type JsonRpcResponse = {
  jsonrpc: "2.0";
  id: JsonRpcId | null;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
};

export const JSON_RPC_ERRORS = {
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603,
} as const;

export const PROTOCOL_VERSION = "2024-11-05";

export type ServerInfo = {
  name: string;
  version: string;
};

export type McpServerOptions = {
  info: ServerInfo;
  tools: ToolDefinition[];
  errors: ErrorReporter;
  logger: Logger;
  instructions?: string;
};

function isJsonRpcId(value: unknown): value is JsonRpcId {
  return typeof value === "string" || typeof value === "number";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a decoded frame. Returns a response when the frame is not a request.
 */
export function parseRequest(message: unknown): JsonRpcRequest | JsonRpcResponse {
  if (!isRecord(message) || typeof message.method !== "string") {
    const id = isRecord(message) && isJsonRpcId(message.id) ? message.id : null;
    return { jsonrpc: "2.0", id, error: { code: JSON_RPC_ERRORS.invalidRequest, message: "Invalid Request" } };
  }
  return {
    jsonrpc: "2.0",
    method: message.method,
    id: isJsonRpcId(message.id) ? message.id : undefined,
    params: isRecord(message.params) ? message.params : undefined,
  };
}

// =============================================================================
// Server
// =============================================================================

export class McpServer {
  private readonly tools: ToolDefinition[];
  private readonly toolMap: Map<string, ToolDefinition>;
  private readonly info: ServerInfo;
  private readonly errors: ErrorReporter;
  private readonly logger: Logger;
  private readonly instructions?: string;
  private initialized = false;

  constructor(options: McpServerOptions) {
    this.tools = options.tools;
    this.toolMap = new Map(options.tools.map((t) => [t.name, t]));
    this.info = options.info;
    this.errors = options.errors;
    this.logger = options.logger;
    this.instructions = options.instructions;
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  get toolCount(): number {
    return this.tools.length;
  }

  /**
   * Handle one request. Notifications yield null.
   */
  async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse | null> {
    const id = request.id ?? null;
    try {
      if (request.method.startsWith("notifications/")) {
        if (request.method === "notifications/initialized") this.initialized = true;
        return null;
      }

      switch (request.method) {
        case "initialize":
          return this.respond(id, {
            protocolVersion: PROTOCOL_VERSION,
            capabilities: { tools: { listChanged: false } },
            serverInfo: this.info,
            ...(this.instructions ? { instructions: this.instructions } : {}),
          });

        case "ping":
          return this.respond(id, {});

        case "tools/list":
          return this.respond(id, {
            tools: this.tools.map((t) => ({
              name: t.name,
              description: t.description,
              inputSchema: t.parameters,
            })),
          });

        case "tools/call":
          return this.respond(id, await this.callTool(request.params));

        case "resources/list":
          return this.respond(id, { resources: [] });

        case "prompts/list":
          return this.respond(id, { prompts: [] });

        default:
          return {
            jsonrpc: "2.0",
            id,
            error: { code: JSON_RPC_ERRORS.methodNotFound, message: `Method not found: ${request.method}` },
          };
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`request ${request.method} failed: ${message}`);
      return {
        jsonrpc: "2.0",
        id,
        error: { code: JSON_RPC_ERRORS.internalError, message: `Internal error: ${message}` },
      };
    }
  }

  /**
   * Decode and dispatch one line of input.
   */
  async handleLine(line: string): Promise<JsonRpcResponse | null> {
    let decoded: unknown;
    try {
      decoded = JSON.parse(line);
    } catch {
      return { jsonrpc: "2.0", id: null, error: { code: JSON_RPC_ERRORS.parseError, message: "Parse error" } };
    }
    const request = parseRequest(decoded);
    if (!("method" in request)) return request;
    return this.handleRequest(request);
  }

  private async callTool(params: Record<string, unknown> | undefined): Promise<ToolResult> {
    const name = typeof params?.name === "string" ? params.name : undefined;
    const tool = name ? this.toolMap.get(name) : undefined;
    if (!tool) {
      return {
        content: [{ type: "text", text: `Unknown tool: ${name ?? "(missing name)"}` }],
        isError: true,
      };
    }
    this.logger.debug("calling tool", { tool: tool.name });
    return tool.execute(params?.arguments, { logger: this.logger, errors: this.errors });
  }

  private respond(id: JsonRpcId | null, result: unknown): JsonRpcResponse {
    return { jsonrpc: "2.0", id, result };
  }
}

// =============================================================================
// Stdio Transport
// =============================================================================

export type StdioOptions = {
  input?: Readable;
  output?: Writable;
  /** Called once the input closes or a shutdown signal arrives. */
  onShutdown?: () => Promise<void>;
  handleSignals?: boolean;
};

/**
 * Serve requests from `input` until it closes. Requests are handled
 * sequentially in arrival order.
 */
export async function serveStdio(server: McpServer, logger: Logger, options: StdioOptions = {}): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const rl = createInterface({ input, terminal: false });

  const write = (msg: JsonRpcResponse) => {
    output.write(`${JSON.stringify(msg)}\n`);
  };

  let closing = false;
  const shutdown = async (reason: string) => {
    if (closing) return;
    closing = true;
    logger.info(`shutting down (${reason})`);
    rl.close();
    await options.onShutdown?.();
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error(`shutdown failed: ${String(error)}`);
    });
  };

  if (options.handleSignals ?? true) {
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  }

  logger.info(`MCP server ready on stdio (${server.toolCount} tools)`);

  try {
    for await (const line of rl) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      const response = await server.handleLine(trimmed);
      if (response) write(response);
    }
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }

  await shutdown("stdin closed");
}
