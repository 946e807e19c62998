import { describe, expect, it } from "vitest";
import { ToolInputError } from "../errors/index.js";
import { compileRegex, maskSecret, parseDate, parseJsonObject, parseScalarMap, parseStringList, parseStringMap } from "./params.js";

describe("parseStringList", () => {
  it("splits comma-separated text", () => {
    expect(parseStringList(" /aws/lambda/a, /aws/lambda/b ,")).toEqual(["/aws/lambda/a", "/aws/lambda/b"]);
  });

  it("accepts JSON arrays and real arrays", () => {
    expect(parseStringList('["x", "y"]')).toEqual(["x", "y"]);
    expect(parseStringList(["x", " "])).toEqual(["x"]);
    expect(parseStringList(undefined)).toEqual([]);
  });

  it("rejects arrays of other values", () => {
    expect(() => parseStringList("[1, 2]", "names")).toThrow("names must be a JSON array of strings");
  });
});

describe("parseJsonObject", () => {
  it("parses JSON text", () => {
    expect(parseJsonObject('{"env":"dev"}', "tags")).toEqual({ env: "dev" });
    expect(parseJsonObject("", "tags")).toEqual({});
  });

  it("rejects non-objects", () => {
    expect(() => parseJsonObject("[1]", "tags")).toThrow(ToolInputError);
    expect(() => parseJsonObject("{oops", "tags")).toThrow(/tags is not valid JSON/);
  });
});

describe("parseStringMap", () => {
  it("stringifies non-string values and skips nulls", () => {
    expect(parseStringMap({ a: "1", b: 2, c: null, d: { x: true } }, "settings")).toEqual({
      a: "1",
      b: "2",
      d: '{"x":true}',
    });
  });
});

describe("parseDate", () => {
  const now = new Date("2024-05-01T12:00:00.000Z");

  it("parses relative offsets into the past", () => {
    expect(parseDate("-15m", "start", now).toISOString()).toBe("2024-05-01T11:45:00.000Z");
    expect(parseDate("2h", "start", now).toISOString()).toBe("2024-05-01T10:00:00.000Z");
    expect(parseDate("now", "end", now)).toBe(now);
  });

  it("parses ISO text and epoch milliseconds", () => {
    expect(parseDate("2024-01-02T03:04:05Z").toISOString()).toBe("2024-01-02T03:04:05.000Z");
    expect(parseDate("1704164645000").toISOString()).toBe("2024-01-02T03:04:05.000Z");
  });

  it("rejects garbage", () => {
    expect(() => parseDate("yesterday-ish", "start")).toThrow("start is not a valid date: yesterday-ish");
  });
});

describe("maskSecret", () => {
  it("hides every character of the value", () => {
    expect(maskSecret("test-secret")).toBe("***");
    expect(maskSecret("short")).toBe("***");
    expect(maskSecret(undefined)).toBeUndefined();
  });
});

describe("parseScalarMap", () => {
  it("keeps strings, numbers and booleans", () => {
    expect(parseScalarMap('{"tenant":"a","retries":2,"urgent":true}', "properties")).toEqual({ tenant: "a", retries: 2, urgent: true });
  });

  it("rejects nested values", () => {
    expect(() => parseScalarMap({ nested: { a: 1 } }, "properties")).toThrow("properties.nested must be a string, number or boolean");
  });

  it("passes undefined through", () => {
    expect(parseScalarMap(undefined, "properties")).toBeUndefined();
  });
});

describe("compileRegex", () => {
  it("is case-insensitive by default", () => {
    expect(compileRegex("error").test("ERROR: disk full")).toBe(true);
    expect(compileRegex("error", { caseSensitive: true }).test("ERROR: disk full")).toBe(false);
  });

  it("reports the field of an invalid pattern", () => {
    expect(() => compileRegex("(", { field: "regex" })).toThrow(ToolInputError);
  });
});
