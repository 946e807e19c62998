import { beforeEach, describe, expect, it, vi } from "vitest";
import { ToolInputError } from "../../../../src/index.js";
import { NO_RETRY, asyncIter, fakeCredentials } from "../testing.js";

const { mockQueryWorkspace, mockMetrics, mockAlerts, mockActivity, mockResources } = vi.hoisted(() => ({
  mockQueryWorkspace: vi.fn(),
  mockMetrics: { list: vi.fn() },
  mockAlerts: { listBySubscription: vi.fn(), listByResourceGroup: vi.fn() },
  mockActivity: { list: vi.fn() },
  mockResources: { list: vi.fn(), listByResourceGroup: vi.fn() },
}));

vi.mock("@azure/monitor-query", () => ({
  LogsQueryClient: vi.fn().mockImplementation(() => ({ queryWorkspace: mockQueryWorkspace })),
}));
vi.mock("@azure/arm-monitor", () => ({
  MonitorClient: vi.fn().mockImplementation(() => ({
    metrics: mockMetrics,
    metricAlerts: mockAlerts,
    activityLogs: mockActivity,
  })),
}));
vi.mock("@azure/arm-resources", () => ({
  ResourceManagementClient: vi.fn().mockImplementation(() => ({ resources: mockResources })),
}));

import { AzureMonitorManager, toIsoDuration } from "./manager.js";

const appTraces = {
  name: "PrimaryResult",
  columns: [{ name: "TimeGenerated" }, { name: "Message" }],
  rows: [
    [new Date("2024-05-01T10:00:00Z"), "request served"],
    [new Date("2024-05-01T09:59:00Z"), "Timeout calling payments"],
  ],
};

describe("toIsoDuration", () => {
  it("passes ISO durations through and expands shorthand", () => {
    expect(toIsoDuration("PT1H")).toBe("PT1H");
    expect(toIsoDuration("p7d")).toBe("P7D");
    expect(toIsoDuration("30m")).toBe("PT30M");
    expect(toIsoDuration("7d")).toBe("P7D");
  });

  it("rejects anything else", () => {
    expect(() => toIsoDuration("yesterday")).toThrow(ToolInputError);
  });
});

describe("AzureMonitorManager", () => {
  let manager: AzureMonitorManager;

  beforeEach(() => {
    vi.clearAllMocks();
    manager = new AzureMonitorManager(fakeCredentials, "sub-1", NO_RETRY);
  });

  it("maps log tables to row objects", async () => {
    mockQueryWorkspace.mockResolvedValue({ status: "Success", tables: [appTraces] });
    const result = await manager.queryLogs("ws-1", "AppTraces | take 2", "1h");
    expect(mockQueryWorkspace).toHaveBeenCalledWith("ws-1", "AppTraces | take 2", { duration: "PT1H" });
    expect(result.partial).toBe(false);
    expect(result.rowCount).toBe(2);
    expect(result.tables[0].rows[0]).toEqual({ TimeGenerated: "2024-05-01T10:00:00.000Z", Message: "request served" });
  });

  it("flags partial results", async () => {
    mockQueryWorkspace.mockResolvedValue({
      status: "PartialFailure",
      partialTables: [appTraces],
      partialError: { name: "PartialError", code: "PartialError", message: "Query exceeded the row limit" },
    });
    const result = await manager.queryLogs("ws-1", "AppTraces");
    expect(result).toMatchObject({ partial: true, partialError: "Query exceeded the row limit", rowCount: 2 });
  });

  it("filters rows by regex", async () => {
    mockQueryWorkspace.mockResolvedValue({ status: "Success", tables: [appTraces] });
    const result = await manager.searchLogsWithRegex("ws-1", "timeout", { table: "AppTraces", hours: 6, limit: 10 });
    expect(mockQueryWorkspace.mock.calls[0][1]).toBe(
      "AppTraces | where TimeGenerated > ago(6h) | order by TimeGenerated desc | take 100",
    );
    expect(result.scanned).toBe(2);
    expect(result.matches).toEqual([
      {
        table: "AppTraces",
        timeGenerated: "2024-05-01T09:59:00.000Z",
        matchedText: "Timeout",
        row: { TimeGenerated: "2024-05-01T09:59:00.000Z", Message: "Timeout calling payments" },
      },
    ]);
  });

  describe("searchWorkspacesWithRegex", () => {
    it("merges matches and reports failing workspaces", async () => {
      mockQueryWorkspace.mockImplementation(async (workspaceId: string) => {
        if (workspaceId === "ws-b") throw new Error("Forbidden");
        return { status: "Success", tables: [appTraces] };
      });
      const result = await manager.searchWorkspacesWithRegex(["ws-a", " ws-b ", "ws-a"], "timeout");
      expect(mockQueryWorkspace).toHaveBeenCalledTimes(2);
      expect(result).toEqual({
        matches: [
          {
            workspaceId: "ws-a",
            table: "PrimaryResult",
            timeGenerated: "2024-05-01T09:59:00.000Z",
            matchedText: "Timeout",
            row: { TimeGenerated: "2024-05-01T09:59:00.000Z", Message: "Timeout calling payments" },
          },
        ],
        workspacesSearched: ["ws-a"],
        failures: [{ workspaceId: "ws-b", error: "Forbidden" }],
        scanned: 2,
        partial: false,
      });
    });

    it("stops once the match limit is reached", async () => {
      mockQueryWorkspace.mockResolvedValue({ status: "Success", tables: [appTraces] });
      const result = await manager.searchWorkspacesWithRegex(["ws-a", "ws-b"], "served|payments", { limit: 1 });
      expect(result.matches).toHaveLength(1);
      expect(result.workspacesSearched).toEqual(["ws-a"]);
      expect(mockQueryWorkspace).toHaveBeenCalledTimes(1);
    });

    it("searches at most maxWorkspaces workspaces", async () => {
      mockQueryWorkspace.mockResolvedValue({ status: "Success", tables: [] });
      const result = await manager.searchWorkspacesWithRegex(["ws-1", "ws-2", "ws-3"], "x", { maxWorkspaces: 2 });
      expect(result.workspacesSearched).toEqual(["ws-1", "ws-2"]);
    });

    it("rejects a bad pattern before querying", async () => {
      await expect(manager.searchWorkspacesWithRegex(["ws-a"], "(")).rejects.toBeInstanceOf(ToolInputError);
      await expect(manager.searchWorkspacesWithRegex([" "], "x")).rejects.toThrow("workspaceIds needs at least one workspace id");
      expect(mockQueryWorkspace).not.toHaveBeenCalled();
    });
  });

  it("rejects table names that are not identifiers", async () => {
    await expect(manager.searchLogsWithRegex("ws-1", "x", { table: "AppTraces | delete" })).rejects.toThrow(
      "Invalid table name",
    );
    expect(mockQueryWorkspace).not.toHaveBeenCalled();
  });

  it("maps metric series with dimensions", async () => {
    mockMetrics.list.mockResolvedValue({
      value: [
        {
          name: { value: "Percentage CPU" },
          unit: "Percent",
          timeseries: [
            {
              metadatavalues: [{ name: { value: "instance" }, value: "vm-0" }],
              data: [{ timeStamp: new Date("2024-05-01T10:00:00Z"), average: 42.5 }],
            },
          ],
        },
      ],
    });
    const [series] = await manager.queryMetrics("/subscriptions/sub-1/vm", ["Percentage CPU"], { timespan: "PT1H" });
    expect(mockMetrics.list).toHaveBeenCalledWith(
      "/subscriptions/sub-1/vm",
      expect.objectContaining({ metricnames: "Percentage CPU", timespan: "PT1H" }),
    );
    expect(series).toEqual({
      name: "Percentage CPU",
      unit: "Percent",
      timeseries: [
        { dimensions: { instance: "vm-0" }, data: [{ timestamp: "2024-05-01T10:00:00.000Z", average: 42.5 }] },
      ],
    });
  });

  it("requires metric names", async () => {
    await expect(manager.queryMetrics("/r", [])).rejects.toThrow("At least one metric name is required");
  });

  it("stops reading the activity log at the limit", async () => {
    mockActivity.list.mockReturnValue(
      asyncIter([
        { eventTimestamp: new Date("2024-05-01T10:00:00Z"), operationName: { value: "Microsoft.Compute/virtualMachines/start/action" } },
        { eventTimestamp: new Date("2024-05-01T09:00:00Z"), operationName: { value: "Microsoft.Compute/virtualMachines/deallocate/action" } },
      ]),
    );
    const events = await manager.listActivityLogs({ resourceGroup: "rg-1", limit: 1 });
    expect(events).toHaveLength(1);
    expect(events[0].operationName).toBe("Microsoft.Compute/virtualMachines/start/action");
    expect(mockActivity.list.mock.calls[0][0]).toContain("resourceGroupName eq 'rg-1'");
  });

  it("finds Application Insights components by resource type", async () => {
    mockResources.list.mockReturnValue(
      asyncIter([{ id: "/subscriptions/sub-1/resourceGroups/rg-web/providers/microsoft.insights/components/web-ai", name: "web-ai", kind: "web" }]),
    );
    const [component] = await manager.listApplicationInsights();
    expect(mockResources.list).toHaveBeenCalledWith({ filter: "resourceType eq 'microsoft.insights/components'" });
    expect(component).toMatchObject({ name: "web-ai", resourceGroup: "rg-web", kind: "web" });
  });
});
