export * from "./errors/index.js";
export * from "./logging/index.js";
export * from "./mcp/params.js";
export * from "./mcp/server.js";
export * from "./mcp/tool-registry.js";
export * from "./mcp/tool-server.js";
export * from "./retry.js";
export * from "./config.js";
export * from "./version.js";
