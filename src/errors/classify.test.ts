import { describe, expect, it } from "vitest";
import { ErrorReporter, type ErrorClassifier } from "./classify.js";
import { ConfigError, NotFoundError, ServiceNotInitializedError, ToolInputError, isNetworkError } from "./errors.js";
import { parseRemediationCatalog, suggestActions, type RemediationCatalog } from "./remediation.js";

const catalog: RemediationCatalog = {
  defaults: {
    ServiceNotInitialized: ["Run the initialize tool first"],
    NetworkOrConfiguration: ["Check network connectivity"],
    Unexpected: ["Retry the operation"],
  },
  codes: { AccessDenied: ["Grant the missing permission"] },
  services: { s3: { AccessDenied: ["Check the bucket policy"] } },
};

const vendorClassifier: ErrorClassifier = (error) =>
  error instanceof Error && error.name === "VendorError"
    ? { errorType: "AWSService", message: error.message, code: "AccessDenied", statusCode: 403, requestId: "req-1" }
    : undefined;

describe("suggestActions", () => {
  it("prefers service-specific codes", () => {
    expect(suggestActions(catalog, "AWSService", "AccessDenied", "s3")).toEqual(["Check the bucket policy"]);
    expect(suggestActions(catalog, "AWSService", "AccessDenied", "ecs")).toEqual(["Grant the missing permission"]);
  });

  it("falls back to the error type default", () => {
    expect(suggestActions(catalog, "Unexpected", "Nope")).toEqual(["Retry the operation"]);
    expect(suggestActions(catalog, "NotFound")).toEqual([]);
  });
});

describe("parseRemediationCatalog", () => {
  it("rejects malformed catalogs", () => {
    expect(() => parseRemediationCatalog({ defaults: [] }, "test.json")).toThrow(ConfigError);
  });

  it("accepts a well-formed catalog", () => {
    expect(parseRemediationCatalog(catalog, "test.json")).toBe(catalog);
  });
});

describe("ErrorReporter", () => {
  const reporter = new ErrorReporter({ catalog, classifiers: [vendorClassifier], codeField: "awsErrorCode" });

  it("maps uninitialised services", () => {
    expect(reporter.toEnvelope(new ServiceNotInitializedError("QuickSight"))).toEqual({
      success: false,
      error: "QuickSight service is not initialized",
      errorType: "ServiceNotInitialized",
      details: "QuickSight",
      suggestedActions: ["Run the initialize tool first"],
    });
  });

  it("maps invalid parameters with the field name", () => {
    const envelope = reporter.toEnvelope(new ToolInputError("limit must be positive", { field: "limit" }));
    expect(envelope.errorType).toBe("InvalidParameter");
    expect(envelope.field).toBe("limit");
  });

  it("uses provider classifiers and the configured code field", () => {
    const error = new Error("denied");
    error.name = "VendorError";
    expect(reporter.toEnvelope(error, "s3")).toEqual({
      success: false,
      error: "denied",
      errorType: "AWSService",
      statusCode: 403,
      requestId: "req-1",
      awsErrorCode: "AccessDenied",
      suggestedActions: ["Check the bucket policy"],
    });
  });

  it("detects network failures through the cause chain", () => {
    const cause = Object.assign(new Error("connect failed"), { code: "ECONNREFUSED" });
    const error = new Error("request failed", { cause });
    expect(isNetworkError(error)).toBe(true);
    expect(reporter.toEnvelope(error).errorType).toBe("NetworkOrConfiguration");
  });

  it("reports unknown errors with their exception type", () => {
    const envelope = reporter.toEnvelope(new RangeError("bad range"));
    expect(envelope.errorType).toBe("Unexpected");
    expect(envelope.exceptionType).toBe("RangeError");
    expect(envelope.suggestedActions).toEqual(["Retry the operation"]);
  });

  it("maps not-found errors", () => {
    const envelope = reporter.toEnvelope(new NotFoundError("Secret", "db-password"));
    expect(envelope.error).toBe("Secret 'db-password' not found");
    expect(envelope.errorType).toBe("NotFound");
    expect(envelope.found).toBe(false);
  });
});
