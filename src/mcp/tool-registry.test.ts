import { Type } from "@sinclair/typebox";
import { describe, expect, it } from "vitest";
import { ToolInputError } from "../errors/index.js";
import { createToolRunner } from "../testing/tool-harness.js";
import { defineTool, stringEnum, ToolRegistry, validateArguments } from "./tool-registry.js";

describe("validateArguments", () => {
  const schema = Type.Object({
    name: Type.String(),
    limit: Type.Integer({ default: 50 }),
    recursive: Type.Boolean({ default: true }),
    sortBy: stringEnum(["relevance", "date"], { default: "relevance" }),
  });

  it("fills defaults", () => {
    expect(validateArguments(schema, { name: "docs" })).toEqual({
      name: "docs",
      limit: 50,
      recursive: true,
      sortBy: "relevance",
    });
  });

  it("coerces numeric and boolean strings", () => {
    expect(validateArguments(schema, { name: "docs", limit: "10", recursive: "false" })).toMatchObject({
      limit: 10,
      recursive: false,
    });
  });

  it("names the failing field", () => {
    try {
      validateArguments(schema, { name: "docs", sortBy: "size" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ToolInputError);
      expect(error instanceof ToolInputError ? error.field : undefined).toBe("sortBy");
    }
  });

  it("treats missing arguments as an empty object", () => {
    expect(() => validateArguments(schema, undefined)).toThrow(/name/);
  });
});

describe("defineTool", () => {
  const runTool = createToolRunner();

  it("wraps thrown errors into failure envelopes", async () => {
    const tool = defineTool({
      name: "boom",
      label: "Boom",
      description: "Always fails",
      service: "test",
      parameters: Type.Object({}),
      async run() {
        throw new TypeError("kaboom");
      },
    });
    expect(await runTool([tool], "boom")).toEqual({
      success: false,
      error: "kaboom",
      errorType: "Unexpected",
      exceptionType: "TypeError",
      suggestedActions: [],
    });
  });
});

describe("ToolRegistry", () => {
  const make = (name: string) =>
    defineTool({
      name,
      label: name,
      description: name,
      service: "test",
      parameters: Type.Object({}),
      async run() {
        return {};
      },
    });

  it("keeps tools in insertion order", () => {
    const registry = new ToolRegistry().add(make("b"), make("a"));
    expect(registry.list().map((t) => t.name)).toEqual(["b", "a"]);
    expect(registry.size).toBe(2);
    expect(registry.get("a")?.name).toBe("a");
  });

  it("rejects duplicate names", () => {
    expect(() => new ToolRegistry().add(make("x"), make("x"))).toThrow("Duplicate tool name: x");
  });
});
