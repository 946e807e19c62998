/**
 * Regex search over build log text with surrounding context lines.
 */

import { compileRegex } from "../../../../src/index.js";
import type { LogMatch } from "./types.js";

export type LogSearchOptions = {
  contextLines?: number;
  caseSensitive?: boolean;
  maxMatches?: number;
};

export function searchLogLines(
  logs: Array<{ logId: number; content: string }>,
  pattern: string,
  options: LogSearchOptions = {},
): { matches: LogMatch[]; truncated: boolean } {
  const regex = compileRegex(pattern, { caseSensitive: options.caseSensitive, field: "regex" });
  const context = Math.max(0, options.contextLines ?? 3);
  const maxMatches = options.maxMatches ?? 50;
  const matches: LogMatch[] = [];

  for (const log of logs) {
    const lines = log.content.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
      if (!regex.test(lines[i])) continue;
      if (matches.length >= maxMatches) return { matches, truncated: true };
      matches.push({
        logId: log.logId,
        lineNumber: i + 1,
        line: lines[i],
        before: lines.slice(Math.max(0, i - context), i),
        after: lines.slice(i + 1, i + 1 + context),
      });
    }
  }
  return { matches, truncated: false };
}
