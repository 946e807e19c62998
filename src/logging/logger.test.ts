import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  createTextFormatter,
  FileTransport,
  isLogLevel,
  redactValue,
  shouldLog,
  StderrTransport,
  StructuredLogger,
  type LogEntry,
  type LogTransport,
} from "./logger.js";

class MemoryTransport implements LogTransport {
  name = "memory";
  entries: LogEntry[] = [];
  write(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

describe("log levels", () => {
  it("compares against the minimum level", () => {
    expect(shouldLog("error", "info")).toBe(true);
    expect(shouldLog("debug", "info")).toBe(false);
    expect(shouldLog("trace", "trace")).toBe(true);
  });

  it("recognises level names", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});

describe("createTextFormatter", () => {
  const entry: LogEntry = {
    timestamp: new Date("2024-03-01T10:00:00.000Z"),
    level: "info",
    subsystem: "aws/s3",
    message: "listed buckets",
    tool: "aws_list_s3_buckets",
    durationMs: 12,
    metadata: { count: 3 },
  };

  it("renders a plain line without colors", () => {
    const format = createTextFormatter({ colors: false });
    expect(format(entry)).toBe(
      '2024-03-01T10:00:00.000Z INFO  [aws/s3] listed buckets (tool=aws_list_s3_buckets duration=12ms) {"count":3}',
    );
  });

  it("omits the timestamp when asked", () => {
    const format = createTextFormatter({ colors: false, timestamps: false });
    expect(format({ ...entry, metadata: undefined, tool: undefined, durationMs: undefined })).toBe(
      "INFO  [aws/s3] listed buckets",
    );
  });
});

describe("StructuredLogger", () => {
  let transport: MemoryTransport;
  let logger: StructuredLogger;

  beforeEach(() => {
    transport = new MemoryTransport();
    logger = new StructuredLogger({ subsystem: "core", level: "info", transports: [transport] });
  });

  it("drops entries below the level", () => {
    logger.debug("hidden");
    logger.info("shown");
    expect(transport.entries.map((e) => e.message)).toEqual(["shown"]);
  });

  it("builds child subsystems and keeps context", () => {
    logger.withContext({ server: "aws" }).child("s3").warn("slow");
    expect(transport.entries[0]?.subsystem).toBe("core/s3");
    expect(transport.entries[0]?.server).toBe("aws");
  });

  it("redacts secret-looking keys and bearer tokens", () => {
    logger.info("header Bearer abc.def", { clientSecret: "test-secret", region: "eu-west-1" });
    expect(transport.entries[0]?.message).toBe("header [REDACTED]");
    expect(transport.entries[0]?.metadata).toEqual({ clientSecret: "[REDACTED]", region: "eu-west-1" });
  });

  it("changes level at runtime", () => {
    logger.setLevel("error");
    logger.warn("ignored");
    expect(transport.entries).toHaveLength(0);
    expect(logger.isLevelEnabled("fatal")).toBe(true);
  });
});

describe("redactValue", () => {
  it("walks nested records and arrays", () => {
    expect(
      redactValue("outer", { nested: { password: "test-secret" }, list: ["AccountKey=abc;x=1"] }, [/AccountKey=[^;]+/gi]),
    ).toEqual({ nested: { password: "[REDACTED]" }, list: ["[REDACTED];x=1"] });
  });

  it("redacts names ending in key but keeps a bare key", () => {
    expect(
      redactValue("outer", { primaryKey: "test-secret", sasKey: "test-secret", sharedAccessKey: "test-secret", key: "orders/2024.csv" }, []),
    ).toEqual({ primaryKey: "[REDACTED]", sasKey: "[REDACTED]", sharedAccessKey: "[REDACTED]", key: "orders/2024.csv" });
  });

  it("keeps names that only contain key", () => {
    expect(redactValue("outer", { keyName: "key1", partitionKeys: 2 }, [])).toEqual({ keyName: "key1", partitionKeys: 2 });
  });
});

describe("StderrTransport", () => {
  it("writes one line per entry to the given stream", () => {
    const lines: string[] = [];
    const stream = { write: (chunk: string) => lines.push(chunk) };
    const t = new StderrTransport({ stream, formatter: (e) => e.message });
    t.write({ timestamp: new Date(), level: "info", subsystem: "x", message: "hello" });
    expect(lines).toEqual(["hello\n"]);
  });
});

describe("FileTransport", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cloud-mcp-log-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("appends JSON lines on flush", async () => {
    const filePath = join(dir, "server.log");
    const t = new FileTransport({ filePath });
    t.write({ timestamp: new Date("2024-01-01T00:00:00.000Z"), level: "warn", subsystem: "docs", message: "a" });
    await t.flush();
    const content = await readFile(filePath, "utf8");
    expect(JSON.parse(content.trim())).toEqual({
      timestamp: "2024-01-01T00:00:00.000Z",
      level: "warn",
      subsystem: "docs",
      message: "a",
    });
  });
});
