/**
 * Password registration tools. Passwords are never returned.
 */

import { resolve } from "node:path";
import { Type } from "@sinclair/typebox";
import { JsonObject, defineTool, parseStringMap, type ToolDefinition } from "../../../../src/index.js";
import { assertDirectory } from "../search/indexer.js";
import { FilePath } from "../params.js";
import type { DocumentServerState } from "../state.js";

const SERVICE = "passwords";

const Secret = Type.String({ minLength: 1, description: "Document password" });

export function createPasswordTools(state: DocumentServerState): ToolDefinition[] {
  const { passwords } = state;
  return [
    defineTool({
      name: "doc_register_password",
      label: "Register Password",
      description: "Remember the password of one file for this session.",
      service: SERVICE,
      parameters: Type.Object({ filePath: FilePath(), password: Secret }),
      async run(params) {
        passwords.registerPassword(params.filePath, params.password);
        return { filePath: resolve(params.filePath), registered: true };
      },
    }),

    defineTool({
      name: "doc_register_password_pattern",
      label: "Register Password Pattern",
      description: "Use a password for every file matching a glob (** any depth, * within a folder, ? one character).",
      service: SERVICE,
      parameters: Type.Object({
        pattern: Type.String({ minLength: 1, description: "e.g. /data/finance/**/*.pdf" }),
        password: Secret,
      }),
      async run(params) {
        passwords.registerPattern(params.pattern, params.password);
        return { pattern: params.pattern, registered: true, patterns: passwords.stats().patterns };
      },
    }),

    defineTool({
      name: "doc_register_bulk_passwords",
      label: "Register Passwords in Bulk",
      description: "Register passwords from a JSON object mapping file path to password.",
      service: SERVICE,
      parameters: Type.Object({ passwords: JsonObject("{\"/path/file.pdf\": \"password\", ...}") }),
      async run(params) {
        const result = passwords.registerBulk(parseStringMap(params.passwords, "passwords"));
        return { ...result, stats: passwords.stats() };
      },
    }),

    defineTool({
      name: "doc_auto_detect_passwords",
      label: "Auto-detect Passwords",
      description: "Find *password*.txt, *pword*.txt and *.pwd files under a folder and apply each to the files beside and below it.",
      service: SERVICE,
      parameters: Type.Object({ rootPath: FilePath("Directory to scan") }),
      async run(params) {
        await assertDirectory(resolve(params.rootPath));
        return { ...(await passwords.autoDetect(params.rootPath)) };
      },
    }),

    defineTool({
      name: "doc_check_password",
      label: "Check Password",
      description: "Whether a password is registered for a file. The password itself is not shown.",
      service: SERVICE,
      parameters: Type.Object({ filePath: FilePath() }),
      async run(params) {
        return { filePath: resolve(params.filePath), hasPassword: passwords.hasPassword(params.filePath) };
      },
    }),

    defineTool({
      name: "doc_get_password_patterns",
      label: "List Password Patterns",
      description: "Registered patterns with masked passwords.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        const patterns = passwords.listPatterns();
        return { patterns, count: Object.keys(patterns).length };
      },
    }),

    defineTool({
      name: "doc_get_password_stats",
      label: "Password Stats",
      description: "How many file passwords and patterns are registered.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        return { ...passwords.stats() };
      },
    }),

    defineTool({
      name: "doc_clear_passwords",
      label: "Clear Passwords",
      description: "Forget every registered password and pattern.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        return { cleared: passwords.clear() };
      },
    }),
  ];
}
