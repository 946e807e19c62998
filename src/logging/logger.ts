/**
 * Structured logging for the MCP servers.
 *
 * Every console line goes to stderr: stdout carries the protocol frames.
 */

import { appendFile } from "node:fs/promises";

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  server?: string;
  tool?: string;
  requestId?: string | number;
  durationMs?: number;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
  flush?(): Promise<void>;
}

export type LogContext = {
  server?: string;
  tool?: string;
  requestId?: string | number;
  durationMs?: number;
};

export interface Logger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): Logger;
  withContext(context: LogContext): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Formatters
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

/**
 * Human-readable single line per entry. Colors default to on when stderr is a TTY.
 */
export function createTextFormatter(options?: { colors?: boolean; timestamps?: boolean }): LogFormatter {
  const colors = options?.colors ?? process.stderr.isTTY ?? false;
  const timestamps = options?.timestamps ?? true;
  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry) => {
    const parts: string[] = [];
    if (timestamps) parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const context: string[] = [];
    if (entry.server) context.push(`server=${entry.server}`);
    if (entry.tool) context.push(`tool=${entry.tool}`);
    if (entry.requestId !== undefined) context.push(`request=${entry.requestId}`);
    if (entry.durationMs !== undefined) context.push(`duration=${entry.durationMs}ms`);
    if (context.length > 0) parts.push(paint(COLORS.dim, `(${context.join(" ")})`));

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }
    return parts.join(" ");
  };
}

/**
 * One JSON object per line, for log files.
 */
export const jsonLineFormatter: LogFormatter = (entry) =>
  JSON.stringify({ ...entry, timestamp: entry.timestamp.toISOString() });

// =============================================================================
// Transports
// =============================================================================

export class StderrTransport implements LogTransport {
  name = "stderr";
  private formatter: LogFormatter;
  private stream: { write(chunk: string): unknown };

  constructor(options?: { formatter?: LogFormatter; stream?: { write(chunk: string): unknown } }) {
    this.formatter = options?.formatter ?? createTextFormatter();
    this.stream = options?.stream ?? process.stderr;
  }

  write(entry: LogEntry): void {
    this.stream.write(`${this.formatter(entry)}\n`);
  }
}

/**
 * Buffered append-only file transport.
 */
export class FileTransport implements LogTransport {
  name = "file";
  private buffer: string[] = [];
  private pending: Promise<void> = Promise.resolve();
  private readonly filePath: string;
  private readonly formatter: LogFormatter;
  private readonly bufferSize: number;

  constructor(options: { filePath: string; formatter?: LogFormatter; bufferSize?: number }) {
    this.filePath = options.filePath;
    this.formatter = options.formatter ?? jsonLineFormatter;
    this.bufferSize = options.bufferSize ?? 50;
  }

  write(entry: LogEntry): void {
    this.buffer.push(this.formatter(entry));
    if (this.buffer.length >= this.bufferSize) {
      this.pending = this.pending.then(() => this.drain());
    }
  }

  async flush(): Promise<void> {
    this.pending = this.pending.then(() => this.drain());
    await this.pending;
  }

  private async drain(): Promise<void> {
    if (this.buffer.length === 0) return;
    const content = `${this.buffer.join("\n")}\n`;
    this.buffer = [];
    try {
      await appendFile(this.filePath, content, "utf8");
    } catch (error) {
      process.stderr.write(`log file write failed (${this.filePath}): ${String(error)}\n`);
    }
  }
}

// =============================================================================
// Redaction
// =============================================================================

// A name ending in "key" after another letter (primaryKey, sasKey) is a secret; a bare "key" is not.
const SECRET_KEY_PATTERN = /password|secret|token|apikey|api_key|credential|authorization|connectionstring|accountkey|[a-z]key$|pat$/i;

const DEFAULT_REDACT_PATTERNS = [
  /Bearer\s+[A-Za-z0-9\-._~+/]+=*/gi,
  /AccountKey=[^;]+/gi,
  /SharedAccessKey=[^;]+/gi,
];

export function redactValue(key: string, value: unknown, patterns: RegExp[]): unknown {
  if (SECRET_KEY_PATTERN.test(key) && value !== undefined && value !== null && value !== "") {
    return "[REDACTED]";
  }
  if (typeof value === "string") return redactText(value, patterns);
  if (Array.isArray(value)) return value.map((item) => redactValue("", item, patterns));
  if (isPlainRecord(value)) return redactRecord(value, patterns);
  return value;
}

function redactText(value: string, patterns: RegExp[]): string {
  let result = value;
  for (const pattern of patterns) {
    result = result.replace(pattern, "[REDACTED]");
  }
  return result;
}

function redactRecord(record: Record<string, unknown>, patterns: RegExp[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = redactValue(key, value, patterns);
  }
  return result;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class StructuredLogger implements Logger {
  readonly subsystem: string;
  private level: LogLevel;
  private readonly transports: LogTransport[];
  private readonly context: LogContext;
  private readonly redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactPatterns?: RegExp[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new StderrTransport()];
    this.context = options.context ?? {};
    this.redactPatterns = options.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): Logger {
    return new StructuredLogger({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
      redactPatterns: this.redactPatterns,
    });
  }

  withContext(context: LogContext): Logger {
    return new StructuredLogger({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
      redactPatterns: this.redactPatterns,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  async flush(): Promise<void> {
    await Promise.all(this.transports.map((t) => t.flush?.()));
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: redactText(message, this.redactPatterns),
      metadata: meta ? redactRecord(meta, this.redactPatterns) : undefined,
      ...this.context,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

// =============================================================================
// Factory & Global Logger
// =============================================================================

export type LoggerOptions = {
  level?: LogLevel;
  file?: string;
  colors?: boolean;
};

export function createLogger(subsystem: string, options?: LoggerOptions): StructuredLogger {
  const transports: LogTransport[] = [
    new StderrTransport({ formatter: createTextFormatter({ colors: options?.colors }) }),
  ];
  if (options?.file) {
    transports.push(new FileTransport({ filePath: options.file }));
  }
  return new StructuredLogger({ subsystem, level: options?.level ?? "info", transports });
}

let globalLogger: Logger | null = null;

export function getLogger(subsystem?: string): Logger {
  if (!globalLogger) {
    globalLogger = createLogger("cloud-mcp");
  }
  return subsystem ? globalLogger.child(subsystem) : globalLogger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
}
