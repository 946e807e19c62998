import { createRequire } from "node:module";
import { isRecord } from "./mcp/params.js";

// Sources run from src/, builds from dist/src/.
const CANDIDATES = ["../package.json", "../../package.json"];

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  for (const candidate of CANDIDATES) {
    try {
      const pkg: unknown = require(candidate);
      if (isRecord(pkg) && typeof pkg.version === "string") return pkg.version;
    } catch {
      continue;
    }
  }
  return null;
}

export const VERSION = process.env.CLOUD_MCP_VERSION || readVersionFromPackageJson() || "0.0.0";
