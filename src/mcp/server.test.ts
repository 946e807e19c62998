import { PassThrough } from "node:stream";
import { Type } from "@sinclair/typebox";
import { describe, expect, it } from "vitest";
import { EMPTY_CATALOG, ErrorReporter } from "../errors/index.js";
import { createToolRunner, silentLogger as logger } from "../testing/tool-harness.js";
import { McpServer, parseRequest, serveStdio, type JsonRpcRequest } from "./server.js";
import { defineTool } from "./tool-registry.js";

const runTool = createToolRunner();

const echo = defineTool({
  name: "echo",
  label: "Echo",
  description: "Echo a message",
  service: "test",
  parameters: Type.Object({ message: Type.String(), times: Type.Number({ default: 1 }) }),
  async run({ message, times }) {
    return { echoed: message.repeat(times) };
  },
});

function createServer() {
  return new McpServer({
    info: { name: "test-server", version: "1.2.3" },
    tools: [echo],
    errors: new ErrorReporter({ catalog: EMPTY_CATALOG }),
    logger,
  });
}

function req(method: string, params?: Record<string, unknown>, id: number | string = 1): JsonRpcRequest {
  return { jsonrpc: "2.0", id, method, params };
}

describe("McpServer", () => {
  it("answers initialize with protocol version and server info", async () => {
    const res = await createServer().handleRequest(req("initialize"));
    expect(res).toEqual({
      jsonrpc: "2.0",
      id: 1,
      result: {
        protocolVersion: "2024-11-05",
        capabilities: { tools: { listChanged: false } },
        serverInfo: { name: "test-server", version: "1.2.3" },
      },
    });
  });

  it("returns null for notifications and tracks initialization", async () => {
    const server = createServer();
    expect(await server.handleRequest({ jsonrpc: "2.0", method: "notifications/initialized" })).toBeNull();
    expect(await server.handleRequest({ jsonrpc: "2.0", method: "notifications/cancelled" })).toBeNull();
    expect(server.isInitialized).toBe(true);
  });

  it("lists tools with their input schema", async () => {
    const res = await createServer().handleRequest(req("tools/list"));
    expect(res?.result).toEqual({
      tools: [{ name: "echo", description: "Echo a message", inputSchema: echo.parameters }],
    });
  });

  it("calls a tool and coerces string arguments", async () => {
    const res = await createServer().handleRequest(
      req("tools/call", { name: "echo", arguments: { message: "ab", times: "2" } }),
    );
    expect(res?.result).toEqual({
      content: [{ type: "text", text: JSON.stringify({ success: true, echoed: "abab" }, null, 2) }],
      isError: false,
    });
  });

  it("reports invalid arguments as an error envelope", async () => {
    const res = await createServer().handleRequest(req("tools/call", { name: "echo", arguments: {} }));
    expect(res?.result).toMatchObject({ isError: true });
    const envelope = await runTool([echo], "echo", {});
    expect(envelope.success).toBe(false);
    expect(envelope.errorType).toBe("InvalidParameter");
    expect(envelope.field).toBe("message");
  });

  it("flags unknown tools", async () => {
    const res = await createServer().handleRequest(req("tools/call", { name: "nope" }));
    expect(res?.result).toEqual({ content: [{ type: "text", text: "Unknown tool: nope" }], isError: true });
  });

  it("returns empty resource and prompt lists", async () => {
    const server = createServer();
    expect((await server.handleRequest(req("resources/list")))?.result).toEqual({ resources: [] });
    expect((await server.handleRequest(req("prompts/list")))?.result).toEqual({ prompts: [] });
    expect((await server.handleRequest(req("ping")))?.result).toEqual({});
  });

  it("rejects unknown methods", async () => {
    const res = await createServer().handleRequest(req("sampling/createMessage", undefined, 9));
    expect(res?.error).toEqual({ code: -32601, message: "Method not found: sampling/createMessage" });
    expect(res?.id).toBe(9);
  });

  it("answers malformed lines with parse and request errors", async () => {
    const server = createServer();
    expect((await server.handleLine("{not json"))?.error?.code).toBe(-32700);
    expect((await server.handleLine('{"id":4}'))?.error).toEqual({ code: -32600, message: "Invalid Request" });
  });
});

describe("parseRequest", () => {
  it("drops non-object params", () => {
    expect(parseRequest({ jsonrpc: "2.0", id: "a", method: "ping", params: [1] })).toEqual({
      jsonrpc: "2.0",
      id: "a",
      method: "ping",
      params: undefined,
    });
  });
});

describe("serveStdio", () => {
  it("responds to each line and stops when input ends", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const chunks: string[] = [];
    output.on("data", (chunk: Buffer) => chunks.push(chunk.toString("utf8")));

    let shutdownCalls = 0;
    const done = serveStdio(createServer(), logger, {
      input,
      output,
      handleSignals: false,
      onShutdown: async () => {
        shutdownCalls += 1;
      },
    });

    input.write(`${JSON.stringify(req("ping", undefined, 1))}\n`);
    input.write(`${JSON.stringify({ jsonrpc: "2.0", method: "notifications/initialized" })}\n`);
    input.end(`${JSON.stringify(req("ping", undefined, 2))}\n`);
    await done;

    const lines = chunks.join("").trim().split("\n").map((l) => JSON.parse(l));
    expect(lines).toEqual([
      { jsonrpc: "2.0", id: 1, result: {} },
      { jsonrpc: "2.0", id: 2, result: {} },
    ]);
    expect(shutdownCalls).toBe(1);
  });
});
