import { beforeEach, describe, expect, it, vi } from "vitest";
import { resolveConfig } from "../../../src/index.js";
import { parseToolResult, silentLogger } from "../../../src/testing/tool-harness.js";
import { awsError } from "./testing.js";

const { mockStsSend } = vi.hoisted(() => ({ mockStsSend: vi.fn() }));

vi.mock("@aws-sdk/credential-providers", () => ({
  fromEnv: vi.fn(() => "env-provider"),
  fromIni: vi.fn(() => "ini-provider"),
  fromSSO: vi.fn(() => "sso-provider"),
  fromNodeProviderChain: vi.fn(() => "chain-provider"),
}));

vi.mock("@aws-sdk/client-sts", () => ({
  STSClient: vi.fn().mockImplementation(() => ({ send: mockStsSend, destroy: vi.fn() })),
  GetCallerIdentityCommand: vi.fn(),
}));

import { createAwsServer } from "./index.js";

async function startServer() {
  const config = resolveConfig({ aws: { region: "eu-west-1" }, retry: { maxAttempts: 1 } });
  return createAwsServer(config, silentLogger);
}

async function call(name: string, args: Record<string, unknown> = {}) {
  const server = await startServer();
  const tool = server.tools.find((t) => t.name === name);
  if (!tool) throw new Error(`missing tool ${name}`);
  return parseToolResult(await tool.execute(args, { logger: silentLogger, errors: server.errors }));
}

describe("createAwsServer", () => {
  beforeEach(() => {
    mockStsSend.mockReset();
  });

  it("registers every AWS tool once", async () => {
    const server = await startServer();
    const names = server.tools.map((t) => t.name);
    expect(server.info.name).toBe("aws");
    expect(new Set(names).size).toBe(names.length);
    expect(names).toHaveLength(78);
    expect(names).toContain("aws_get_error_logs");
    expect(names).toContain("aws_generate_presigned_url");
    expect(names.every((n) => n.startsWith("aws_"))).toBe(true);
  });

  it("reports the caller identity", async () => {
    mockStsSend.mockResolvedValue({ Account: "123456789012", Arn: "arn:aws:iam::123456789012:user/dev", UserId: "AIDTEST" });
    const result = await call("aws_get_account_info");
    expect(result).toEqual({
      success: true,
      accountId: "123456789012",
      arn: "arn:aws:iam::123456789012:user/dev",
      userId: "AIDTEST",
      region: "eu-west-1",
    });
  });

  it("turns service errors into envelopes with service remediation", async () => {
    mockStsSend.mockRejectedValue(awsError("AccessDenied", 403, "not authorized"));
    const result = await call("aws_get_account_info");
    expect(result).toMatchObject({
      success: false,
      errorType: "AWSService",
      error: "AWS service error: AccessDenied",
      details: "not authorized",
      awsErrorCode: "AccessDenied",
      statusCode: 403,
      requestId: "req-test",
    });
    expect(result.suggestedActions).toEqual([
      "Ensure the identity has sts:GetCallerIdentity permission",
      "Try `aws sts get-caller-identity` from the CLI to verify the credentials",
    ]);
  });

  it("never fails the connection test", async () => {
    mockStsSend.mockRejectedValue(new Error("socket hang up"));
    const result = await call("aws_test_connection");
    expect(result).toMatchObject({ success: true, connected: false, region: "eu-west-1", error: "socket hang up" });
  });

  it("rejects malformed QuickSight account ids", async () => {
    const result = await call("aws_initialize_quicksight", { accountId: "abc" });
    expect(result.success).toBe(false);
    expect(result.errorType).toBe("InvalidParameter");
    expect(result.field).toBe("accountId");
  });
});
