/**
 * CloudWatch Logs Manager Tests
 */

import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";

const { mockSend } = vi.hoisted(() => ({ mockSend: vi.fn() }));

vi.mock("@aws-sdk/client-cloudwatch-logs", () => ({
  CloudWatchLogsClient: vi.fn().mockImplementation(() => ({ send: mockSend, destroy: vi.fn() })),
  CreateLogGroupCommand: vi.fn(),
  DeleteLogGroupCommand: vi.fn(),
  DeleteRetentionPolicyCommand: vi.fn(),
  DescribeLogGroupsCommand: vi.fn(),
  DescribeLogStreamsCommand: vi.fn(),
  FilterLogEventsCommand: vi.fn(),
  GetLogEventsCommand: vi.fn(),
  GetQueryResultsCommand: vi.fn(),
  PutRetentionPolicyCommand: vi.fn(),
  StartQueryCommand: vi.fn(),
  StopQueryCommand: vi.fn(),
}));

import {
  DeleteRetentionPolicyCommand,
  DescribeLogGroupsCommand,
  DescribeLogStreamsCommand,
  FilterLogEventsCommand,
  PutRetentionPolicyCommand,
  StartQueryCommand,
  StopQueryCommand,
} from "@aws-sdk/client-cloudwatch-logs";
import { CloudWatchLogsManager, literalFilterPattern } from "./logs-manager.js";

const NOW = new Date("2024-05-01T12:00:00.000Z");

describe("CloudWatchLogsManager", () => {
  let manager: CloudWatchLogsManager;
  let sleep: Mock;

  beforeEach(() => {
    vi.clearAllMocks();
    mockSend.mockReset();
    sleep = vi.fn().mockResolvedValue(undefined);
    manager = new CloudWatchLogsManager({
      region: "us-east-1",
      retry: { maxAttempts: 1 },
      now: () => NOW,
      sleep,
    });
  });

  describe("log groups", () => {
    it("follows pagination tokens until the limit", async () => {
      mockSend
        .mockResolvedValueOnce({
          logGroups: [{ logGroupName: "/app/a", retentionInDays: 7, creationTime: 1_700_000_000_000 }],
          nextToken: "t1",
        })
        .mockResolvedValueOnce({ logGroups: [{ logGroupName: "/app/b" }] });

      const groups = await manager.listLogGroups({ prefix: "/app", limit: 10 });

      expect(groups.map((g) => g.name)).toEqual(["/app/a", "/app/b"]);
      expect(groups[0].retentionInDays).toBe(7);
      expect(groups[0].createdAt).toBe("2023-11-14T22:13:20.000Z");
      expect(vi.mocked(DescribeLogGroupsCommand).mock.calls[1][0]).toEqual({
        logGroupNamePrefix: "/app",
        limit: 9,
        nextToken: "t1",
      });
    });

    it("deletes the retention policy when days is 0", async () => {
      mockSend.mockResolvedValue({});
      await manager.setRetentionPolicy("/app/a", 0);
      expect(DeleteRetentionPolicyCommand).toHaveBeenCalledWith({ logGroupName: "/app/a" });
      expect(PutRetentionPolicyCommand).not.toHaveBeenCalled();
    });

    it("rejects retention values CloudWatch does not accept", async () => {
      await expect(manager.setRetentionPolicy("/app/a", 10)).rejects.toThrow(/retentionInDays must be 0 or one of/);
      expect(mockSend).not.toHaveBeenCalled();
    });
  });

  describe("streams and events", () => {
    it("orders by name when a prefix is given", async () => {
      mockSend.mockResolvedValue({ logStreams: [{ logStreamName: "web-1" }] });
      const streams = await manager.listLogStreams("/app/a", { prefix: "web" });
      expect(streams).toEqual([
        { name: "web-1", createdAt: undefined, firstEventAt: undefined, lastEventAt: undefined, lastIngestionAt: undefined },
      ]);
      expect(vi.mocked(DescribeLogStreamsCommand).mock.calls[0][0]).toMatchObject({ orderBy: "LogStreamName" });
    });

    it("merges groups newest first and reports failing groups", async () => {
      mockSend.mockImplementation(async () => {
        const input = vi.mocked(FilterLogEventsCommand).mock.calls.at(-1)?.[0];
        if (input?.logGroupName === "/broken") throw new Error("ResourceNotFoundException");
        if (input?.logGroupName === "/a") return { events: [{ timestamp: 1000, message: "a1\n" }] };
        return { events: [{ timestamp: 3000, message: "b1" }, { timestamp: 2000, message: "b2" }] };
      });

      const result = await manager.filterLogEventsMulti(["/a", "/b", "/broken"], { limit: 10 });

      expect(result.events.map((e) => e.message)).toEqual(["b1", "b2", "a1"]);
      expect(result.searchedLogGroups).toEqual(["/a", "/b"]);
      expect(result.failedLogGroups).toEqual([{ logGroupName: "/broken", error: "ResourceNotFoundException" }]);
    });

    it("throws when every group fails", async () => {
      mockSend.mockRejectedValue(new Error("AccessDenied"));
      await expect(manager.filterLogEventsMulti(["/a", "/b"])).rejects.toThrow("AccessDenied");
    });

    it("uses the error pattern and the minutes window for error logs", async () => {
      mockSend.mockResolvedValue({ events: [] });
      await manager.getErrorLogs(["/a"], 30);
      expect(vi.mocked(FilterLogEventsCommand).mock.calls[0][0]).toMatchObject({
        logGroupName: "/a",
        filterPattern: "?ERROR ?Error ?error ?Exception ?exception ?FATAL ?Fatal",
        startTime: NOW.getTime() - 30 * 60_000,
      });
    });

    it("applies the regex locally", async () => {
      mockSend.mockResolvedValue({
        events: [
          { timestamp: 3, message: "user=42 login failed" },
          { timestamp: 2, message: "user=7 login ok" },
          { timestamp: 1, message: "USER=9 LOGIN FAILED" },
        ],
      });

      const result = await manager.searchLogPattern(["/a"], "login failed", { minutes: 60 });

      expect(result.scannedEvents).toBe(3);
      expect(result.events.map((e) => e.timestamp)).toEqual([3, 1]);
      expect(vi.mocked(FilterLogEventsCommand).mock.calls[0][0].filterPattern).toBeUndefined();
    });

    it("rejects an invalid regular expression", async () => {
      await expect(manager.searchLogPattern(["/a"], "([", { minutes: 5 })).rejects.toThrow(/Invalid regular expression/);
    });

    it("splits stream events around the target timestamp", async () => {
      mockSend.mockResolvedValue({
        events: [
          { timestamp: 900, message: "before" },
          { timestamp: 1000, message: "target" },
          { timestamp: 1100, message: "after" },
        ],
      });

      const context = await manager.getLogContext("/a", "s1", 1000);

      expect(context.target?.message).toBe("target");
      expect(context.before.map((e) => e.message)).toEqual(["before"]);
      expect(context.after.map((e) => e.message)).toEqual(["after"]);
    });
  });

  describe("Logs Insights", () => {
    it("polls until the query completes", async () => {
      mockSend
        .mockResolvedValueOnce({ queryId: "q-1" })
        .mockResolvedValueOnce({ status: "Running", results: [] })
        .mockResolvedValueOnce({
          status: "Complete",
          results: [
            [
              { field: "@timestamp", value: "2024-05-01 11:59:00.000" },
              { field: "@message", value: "hello" },
              { field: "@ptr", value: "abc" },
            ],
          ],
          statistics: { recordsMatched: 1, recordsScanned: 10, bytesScanned: 100 },
        });

      const result = await manager.runQuery(["/a"], "fields @timestamp, @message", new Date(0), NOW);

      expect(result.status).toBe("Complete");
      expect(result.results).toEqual([{ "@timestamp": "2024-05-01 11:59:00.000", "@message": "hello" }]);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(vi.mocked(StartQueryCommand).mock.calls[0][0]).toMatchObject({ startTime: 0, endTime: NOW.getTime() / 1000 });
    });

    it("stops the query on timeout", async () => {
      let tick = 0;
      manager = new CloudWatchLogsManager({
        region: "us-east-1",
        retry: { maxAttempts: 1 },
        now: () => new Date(NOW.getTime() + 1000 * tick++),
        sleep,
      });
      mockSend.mockImplementation(async () =>
        vi.mocked(StopQueryCommand).mock.calls.length > 0 ? { success: true } : { status: "Running", results: [] },
      );
      mockSend.mockResolvedValueOnce({ queryId: "q-2" });

      const result = await manager.runQuery(["/a"], "fields @message", new Date(0), NOW, { timeoutMs: 2000 });

      expect(result.status).toBe("Timeout");
      expect(StopQueryCommand).toHaveBeenCalledWith({ queryId: "q-2" });
    });

    it("requires start before end", async () => {
      await expect(manager.startQuery(["/a"], "fields @message", NOW, NOW)).rejects.toThrow("startTime must be before endTime");
    });
  });

  it("builds a quoted filter only for case-sensitive plain text", () => {
    expect(literalFilterPattern("timeout", true)).toBe('"timeout"');
    expect(literalFilterPattern("timeout", false)).toBeUndefined();
    expect(literalFilterPattern("time.*out", true)).toBeUndefined();
  });
});
