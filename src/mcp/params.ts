/**
 * Parsing helpers for the loosely typed values models send as tool arguments.
 */

import { Type } from "@sinclair/typebox";
import { ToolInputError, errorMessage } from "../errors/index.js";

/** Accepts a JSON array, a comma-separated string, or an array of strings. */
export const StringList = (description: string) =>
  Type.Union([Type.Array(Type.String()), Type.String()], { description });

/** Accepts a JSON object or its string form. */
export const JsonObject = (description: string) =>
  Type.Union([Type.String(), Type.Record(Type.String(), Type.Unknown())], { description });

export function parseStringList(value: string | string[] | undefined, field = "list"): string[] {
  if (value === undefined) return [];
  if (Array.isArray(value)) return value.map((v) => v.trim()).filter((v) => v.length > 0);

  const trimmed = value.trim();
  if (trimmed.startsWith("[")) {
    const parsed = parseJson(trimmed, field);
    if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === "string")) {
      throw new ToolInputError(`${field} must be a JSON array of strings`, { field });
    }
    return parsed.map((v) => v.trim()).filter((v) => v.length > 0);
  }
  return trimmed
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

function parseJson(text: string, field: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ToolInputError(`${field} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, {
      field,
    });
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON object given either as an object or as JSON text.
 */
export function parseJsonObject(value: string | Record<string, unknown> | undefined, field: string): Record<string, unknown> {
  if (value === undefined || value === "") return {};
  const parsed = typeof value === "string" ? parseJson(value, field) : value;
  if (!isRecord(parsed)) {
    throw new ToolInputError(`${field} must be a JSON object`, { field });
  }
  return parsed;
}

/**
 * Like parseJsonObject, but every value is rendered as a string (tags, app settings).
 */
export function parseStringMap(value: string | Record<string, unknown> | undefined, field: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, raw] of Object.entries(parseJsonObject(value, field))) {
    if (raw === null || raw === undefined) continue;
    result[key] = typeof raw === "string" ? raw : JSON.stringify(raw);
  }
  return result;
}

/** A JSON object whose values are strings, numbers or booleans (message properties). */
export function parseScalarMap(
  value: string | Record<string, unknown> | undefined,
  field: string,
): Record<string, string | number | boolean> | undefined {
  if (value === undefined) return undefined;
  const result: Record<string, string | number | boolean> = {};
  for (const [key, v] of Object.entries(parseJsonObject(value, field))) {
    if (typeof v !== "string" && typeof v !== "number" && typeof v !== "boolean") {
      throw new ToolInputError(`${field}.${key} must be a string, number or boolean`, { field });
    }
    result[key] = v;
  }
  return result;
}

export function parseJsonArray(value: string | unknown[], field: string): unknown[] {
  const parsed = typeof value === "string" ? parseJson(value, field) : value;
  if (!Array.isArray(parsed)) {
    throw new ToolInputError(`${field} must be a JSON array`, { field });
  }
  return parsed;
}

const RELATIVE_TIME = /^-?(\d+)\s*(s|m|h|d|w)$/i;
const UNIT_MS: Record<string, number> = {
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
};

/**
 * Parse an ISO timestamp, epoch milliseconds, "now", or a relative offset
 * into the past such as `-15m`, `2h`, `-7d`.
 */
export function parseDate(value: string, field = "date", now: Date = new Date()): Date {
  const trimmed = value.trim();
  if (trimmed.toLowerCase() === "now") return now;

  const relative = RELATIVE_TIME.exec(trimmed);
  if (relative) {
    const amount = Number(relative[1]);
    const unit = UNIT_MS[relative[2].toLowerCase()];
    return new Date(now.getTime() - amount * unit);
  }

  if (/^\d{10,}$/.test(trimmed)) return new Date(Number(trimmed));

  const parsed = new Date(trimmed);
  if (Number.isNaN(parsed.getTime())) {
    throw new ToolInputError(`${field} is not a valid date: ${value}`, { field });
  }
  return parsed;
}

export function parseOptionalDate(value: string | undefined, field: string, now?: Date): Date | undefined {
  return value === undefined || value === "" ? undefined : parseDate(value, field, now);
}

export function requireText(value: string | undefined, field: string): string {
  if (value === undefined || value.trim() === "") {
    throw new ToolInputError(`${field} is required`, { field });
  }
  return value.trim();
}

/** Mask a secret for display. No part of the value is kept. */
export function maskSecret(value: string | undefined): string | undefined {
  return value === undefined ? undefined : "***";
}

/** Compile a user-supplied pattern; case-insensitive unless asked otherwise. */
export function compileRegex(pattern: string, options: { caseSensitive?: boolean; field?: string } = {}): RegExp {
  try {
    return new RegExp(pattern, options.caseSensitive ? "" : "i");
  } catch (error) {
    throw new ToolInputError(errorMessage(error), { field: options.field ?? "pattern" });
  }
}
