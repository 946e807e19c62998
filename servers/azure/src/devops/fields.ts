/**
 * Readers for untyped REST payloads.
 */

import { isRecord } from "../../../../src/index.js";

export type Json = Record<string, unknown>;

export function str(obj: Json, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

export function num(obj: Json, key: string): number | undefined {
  const value = obj[key];
  return typeof value === "number" ? value : undefined;
}

export function rec(obj: Json, key: string): Json {
  const value = obj[key];
  return isRecord(value) ? value : {};
}

export function records(value: unknown): Json[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/** The `value` array of a DevOps list response. */
export function listValue(body: unknown): Json[] {
  return isRecord(body) ? records(body.value) : [];
}

/** DevOps identity fields come back as objects or "Name <mail>" strings. */
export function identity(value: unknown): string | undefined {
  if (typeof value === "string") return /^([^<]+)/.exec(value)?.[1]?.trim() ?? value;
  if (isRecord(value)) {
    const name = value.displayName ?? value.uniqueName;
    return typeof name === "string" ? name : undefined;
  }
  return undefined;
}
