import { describe, it, expect, beforeEach, vi } from "vitest";

const { mockSend } = vi.hoisted(() => ({ mockSend: vi.fn() }));

vi.mock("@aws-sdk/client-quicksight", () => ({
  QuickSightClient: vi.fn().mockImplementation(() => ({ send: mockSend, destroy: vi.fn() })),
  DescribeAnalysisCommand: vi.fn(),
  DescribeDashboardCommand: vi.fn(),
  DescribeDataSetCommand: vi.fn(),
  DescribeDataSourceCommand: vi.fn(),
  DescribeUserCommand: vi.fn(),
  GenerateEmbedUrlForRegisteredUserCommand: vi.fn(),
  ListAnalysesCommand: vi.fn(),
  ListDashboardsCommand: vi.fn(),
  ListDataSetsCommand: vi.fn(),
  ListDataSourcesCommand: vi.fn(),
  ListUsersCommand: vi.fn(),
}));

import { GenerateEmbedUrlForRegisteredUserCommand, ListDashboardsCommand, ListUsersCommand } from "@aws-sdk/client-quicksight";
import { QuickSightManager } from "./manager.js";

describe("QuickSightManager", () => {
  let manager: QuickSightManager;

  beforeEach(() => {
    vi.clearAllMocks();
    mockSend.mockReset();
    manager = new QuickSightManager({ region: "us-east-1", accountId: "123456789012", retry: { maxAttempts: 1 } });
  });

  it("pages through dashboards with the account id", async () => {
    mockSend
      .mockResolvedValueOnce({ DashboardSummaryList: [{ DashboardId: "d-1", Name: "Sales" }], NextToken: "n1" })
      .mockResolvedValueOnce({ DashboardSummaryList: [{ DashboardId: "d-2", Name: "Ops", PublishedVersionNumber: 3 }] });

    const dashboards = await manager.listDashboards();

    expect(dashboards.map((d) => d.id)).toEqual(["d-1", "d-2"]);
    expect(dashboards[1].status).toBe("published v3");
    expect(vi.mocked(ListDashboardsCommand).mock.calls[1][0]).toEqual({ AwsAccountId: "123456789012", NextToken: "n1" });
  });

  it("throws NotFound when a dataset is missing from the response", async () => {
    mockSend.mockResolvedValue({});
    await expect(manager.describeDataSet("ds-1")).rejects.toThrow("QuickSight dataset 'ds-1' not found");
  });

  it("lists users of a namespace", async () => {
    mockSend.mockResolvedValue({ UserList: [{ UserName: "analyst", Role: "READER", Active: true }] });
    const users = await manager.listUsers("team-a");
    expect(users).toEqual([expect.objectContaining({ userName: "analyst", role: "READER", active: true })]);
    expect(vi.mocked(ListUsersCommand).mock.calls[0][0]).toMatchObject({ Namespace: "team-a" });
  });

  it("generates a dashboard embed URL", async () => {
    mockSend.mockResolvedValue({ EmbedUrl: "https://embed.example.com/d-1", RequestId: "r-1" });

    const result = await manager.generateDashboardEmbedUrl("arn:aws:quicksight:us-east-1:123456789012:user/default/analyst", "d-1", 30);

    expect(result).toEqual({
      embedUrl: "https://embed.example.com/d-1",
      dashboardId: "d-1",
      sessionLifetimeMinutes: 30,
      requestId: "r-1",
    });
    expect(vi.mocked(GenerateEmbedUrlForRegisteredUserCommand).mock.calls[0][0]).toMatchObject({
      SessionLifetimeInMinutes: 30,
      ExperienceConfiguration: { Dashboard: { InitialDashboardId: "d-1" } },
    });
  });

  it("bounds the embed session lifetime", async () => {
    await expect(manager.generateDashboardEmbedUrl("arn:user", "d-1", 5)).rejects.toThrow(
      "sessionLifetimeMinutes must be between 15 and 600",
    );
  });
});
