/**
 * Suggested remediation catalog: errorType defaults plus per-code and
 * per-service overrides, kept as JSON beside each server.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError, type ErrorType } from "./errors.js";

const ActionList = Type.Array(Type.String());

export const RemediationCatalogSchema = Type.Object({
  defaults: Type.Record(Type.String(), ActionList),
  codes: Type.Record(Type.String(), ActionList),
  services: Type.Record(Type.String(), Type.Record(Type.String(), ActionList)),
});

export type RemediationCatalog = Static<typeof RemediationCatalogSchema>;

export const EMPTY_CATALOG: RemediationCatalog = { defaults: {}, codes: {}, services: {} };

export function parseRemediationCatalog(data: unknown, source: string): RemediationCatalog {
  if (Value.Check(RemediationCatalogSchema, data)) return data;
  const first = Value.Errors(RemediationCatalogSchema, data).First();
  throw new ConfigError(`Invalid remediation catalog ${source}: ${first?.message ?? "unknown error"}`, first?.path);
}

/**
 * Lookup order: service + code, provider-wide code, errorType default.
 */
export function suggestActions(
  catalog: RemediationCatalog,
  errorType: ErrorType,
  code?: string,
  service?: string,
): string[] {
  if (code) {
    const byService = service ? catalog.services[service]?.[code] : undefined;
    if (byService) return byService;
    const byCode = catalog.codes[code];
    if (byCode) return byCode;
  }
  return catalog.defaults[errorType] ?? [];
}
