/**
 * Tool definitions shared by every server.
 *
 * Tools receive loosely typed arguments from the model. Before `run` sees
 * them, defaults are applied, strings are coerced where the schema asks for
 * numbers or booleans, and the result is validated against the schema.
 */

import { Type, type Static, type TLiteral, type TSchema, type TUnion } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ErrorReporter, ToolInputError, type FailureEnvelope } from "../errors/index.js";
import type { Logger } from "../logging/index.js";

// =============================================================================
// Types
// =============================================================================

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError: boolean;
};

export type ToolContext = {
  logger: Logger;
  errors: ErrorReporter;
};

export type SuccessEnvelope = { success: true } & Record<string, unknown>;

export type ToolEnvelope = SuccessEnvelope | FailureEnvelope;

export interface ToolDefinition {
  name: string;
  label: string;
  description: string;
  /** Remediation lookup key (e.g. "s3", "keyvault"). */
  service: string;
  parameters: TSchema;
  execute(args: unknown, context: ToolContext): Promise<ToolResult>;
}

export type ToolSpec<T extends TSchema> = {
  name: string;
  label: string;
  description: string;
  service: string;
  parameters: T;
  run(params: Static<T>): Promise<Record<string, unknown>>;
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Union of string literals, validated like any other schema.
 */
export function stringEnum<const T extends readonly string[]>(
  values: T,
  options?: { description?: string; default?: T[number] },
): TUnion<TLiteral<T[number]>[]> {
  return Type.Union(
    values.map((value) => Type.Literal(value)),
    options,
  );
}

export function toToolResult(envelope: ToolEnvelope): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(envelope, null, 2) }],
    isError: !envelope.success,
  };
}

export function validateArguments<T extends TSchema>(schema: T, args: unknown): Static<T> {
  const input = args === undefined || args === null ? {} : structuredClone(args);
  const withDefaults = Value.Default(schema, input);
  const converted = Value.Convert(schema, withDefaults);
  if (Value.Check(schema, converted)) return converted;

  const first = Value.Errors(schema, converted).First();
  const field = first?.path.replace(/^\//, "").replace(/\//g, ".") || undefined;
  const message = first ? `${field ?? "arguments"}: ${first.message}` : "Invalid arguments";
  throw new ToolInputError(`Invalid parameter ${message}`, { field });
}

/**
 * Build a tool whose `run` gets validated, typed parameters and whose
 * failures become error envelopes.
 */
export function defineTool<T extends TSchema>(spec: ToolSpec<T>): ToolDefinition {
  return {
    name: spec.name,
    label: spec.label,
    description: spec.description,
    service: spec.service,
    parameters: spec.parameters,
    async execute(args, context) {
      const log = context.logger.withContext({ tool: spec.name });
      const started = Date.now();
      try {
        const params = validateArguments(spec.parameters, args);
        const data = await spec.run(params);
        log.debug("tool completed", { durationMs: Date.now() - started });
        return toToolResult(Object.assign({ success: true as const }, data));
      } catch (error) {
        const envelope = context.errors.toEnvelope(error, spec.service);
        log.warn(`tool failed: ${envelope.error}`, { errorType: envelope.errorType, durationMs: Date.now() - started });
        return toToolResult(envelope);
      }
    },
  };
}

/**
 * Collects tools and rejects duplicate names.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  add(...tools: ToolDefinition[]): this {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
    return this;
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  list(): ToolDefinition[] {
    return [...this.tools.values()];
  }

  get size(): number {
    return this.tools.size;
  }
}
