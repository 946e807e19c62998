/**
 * Passwords for protected documents, registered per file or by glob pattern.
 */

import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { glob } from "glob";
import { ToolInputError, errorMessage, type Logger } from "../../../../src/index.js";

export const PASSWORD_FILE_PATTERNS = ["**/*password*.txt", "**/*pword*.txt", "**/*.pwd"];

const MIN_PASSWORD_LENGTH = 3;
const MAX_PASSWORD_LENGTH = 256;

export type PasswordStats = {
  specificPasswords: number;
  patterns: number;
};

export type AutoDetectResult = {
  rootPath: string;
  filesFound: number;
  registered: number;
  patterns: string[];
  skipped: Array<{ file: string; reason: string }>;
};

type PatternEntry = { pattern: string; regex: RegExp; password: string };

/**
 * A double star matches across directories, and a double star followed by a
 * slash also matches zero directories. A single star stays within one segment
 * and `?` matches one character.
 * Matching ignores case and is anchored at both ends.
 */
export function globToRegex(glob: string): RegExp {
  let source = "";
  for (let i = 0; i < glob.length; i++) {
    const ch = glob[i];
    if (ch === "*" && glob[i + 1] === "*" && glob[i + 2] === "/") {
      source += "(?:.*/)?";
      i += 2;
    } else if (ch === "*" && glob[i + 1] === "*") {
      source += ".*";
      i++;
    } else if (ch === "*") {
      source += "[^/\\\\]*";
    } else if (ch === "?") {
      source += ".";
    } else {
      source += ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
  }
  return new RegExp(`^${source}$`, "i");
}

/** Trimmed file content that can serve as a password, else undefined. */
export function readPasswordValue(content: string): string | undefined {
  const password = content.trim();
  if (password.length < MIN_PASSWORD_LENGTH || password.length > MAX_PASSWORD_LENGTH) return undefined;
  if (password.includes("\n") || password.includes("\r")) return undefined;
  return password;
}

function normalizePath(filePath: string): string {
  return resolve(filePath).toLowerCase();
}

function toForwardSlashes(filePath: string): string {
  return filePath.replace(/\\/g, "/");
}

export class PasswordManager {
  private readonly specific = new Map<string, string>();
  private readonly patterns = new Map<string, PatternEntry>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  registerPassword(filePath: string, password: string): void {
    if (!password) throw new ToolInputError("password must not be empty", { field: "password" });
    this.specific.set(normalizePath(filePath), password);
    this.logger.debug("Registered password for file", { filePath });
  }

  registerPattern(pattern: string, password: string): void {
    if (!pattern.trim()) throw new ToolInputError("pattern must not be empty", { field: "pattern" });
    if (!password) throw new ToolInputError("password must not be empty", { field: "password" });
    const normalized = toForwardSlashes(pattern.trim());
    this.patterns.set(normalized, { pattern: normalized, regex: globToRegex(normalized), password });
    this.logger.debug("Registered password pattern", { pattern: normalized });
  }

  /** Returns how many entries were registered. */
  registerBulk(passwords: Record<string, string>): { registered: number; failed: string[] } {
    let registered = 0;
    const failed: string[] = [];
    for (const [filePath, password] of Object.entries(passwords)) {
      if (!filePath.trim() || !password) {
        failed.push(filePath);
        continue;
      }
      this.registerPassword(filePath, password);
      registered++;
    }
    this.logger.info(`Bulk registered ${registered} passwords`, { failed: failed.length });
    return { registered, failed };
  }

  /**
   * Register the password in each password file under `rootPath` for every
   * file beside it and below it.
   */
  async autoDetect(rootPath: string): Promise<AutoDetectResult> {
    const root = resolve(rootPath);
    const files = await glob(PASSWORD_FILE_PATTERNS, { cwd: root, absolute: true, nodir: true, nocase: true });
    const unique = [...new Set(files)].sort();

    const result: AutoDetectResult = { rootPath: root, filesFound: unique.length, registered: 0, patterns: [], skipped: [] };
    for (const file of unique) {
      let content: string;
      try {
        content = await readFile(file, "utf8");
      } catch (error) {
        this.logger.warn(`Cannot read password file ${file}: ${errorMessage(error)}`);
        result.skipped.push({ file, reason: errorMessage(error) });
        continue;
      }
      const password = readPasswordValue(content);
      if (!password) {
        result.skipped.push({ file, reason: "content is not a single line of 3 to 256 characters" });
        continue;
      }
      const pattern = `${toForwardSlashes(dirname(file))}/**/*`;
      this.registerPattern(pattern, password);
      result.patterns.push(pattern);
      result.registered++;
    }
    this.logger.info(`Auto-detected ${result.registered} passwords under ${root}`);
    return result;
  }

  /** Specific registrations win over patterns; patterns apply in registration order. */
  getPassword(filePath: string): string | undefined {
    const specific = this.specific.get(normalizePath(filePath));
    if (specific !== undefined) return specific;

    const forward = toForwardSlashes(filePath);
    const absolute = toForwardSlashes(resolve(filePath));
    for (const entry of this.patterns.values()) {
      if (entry.regex.test(forward) || entry.regex.test(filePath) || entry.regex.test(absolute)) {
        return entry.password;
      }
    }
    return undefined;
  }

  hasPassword(filePath: string): boolean {
    return this.getPassword(filePath) !== undefined;
  }

  /** Registered patterns with their passwords masked. */
  listPatterns(): Record<string, string> {
    return Object.fromEntries([...this.patterns.keys()].map((pattern) => [pattern, "***"]));
  }

  stats(): PasswordStats {
    return { specificPasswords: this.specific.size, patterns: this.patterns.size };
  }

  clear(): PasswordStats {
    const cleared = this.stats();
    this.specific.clear();
    this.patterns.clear();
    this.logger.info("Cleared registered passwords", cleared);
    return cleared;
  }
}
