/**
 * Error types raised by tool servers and their managers.
 */

export type ErrorType =
  | "ServiceNotInitialized"
  | "AWSService"
  | "AzureService"
  | "DocumentProcessing"
  | "Authentication"
  | "NetworkOrConfiguration"
  | "InvalidParameter"
  | "NotFound"
  | "Unexpected";

/**
 * A parameter was missing, malformed or out of range.
 */
export class ToolInputError extends Error {
  readonly code?: string;
  readonly field?: string;

  constructor(message: string, options?: { code?: string; field?: string }) {
    super(message);
    this.name = "ToolInputError";
    this.code = options?.code;
    this.field = options?.field;
  }
}

/**
 * The requested service has no client yet (missing credentials, account id, ...).
 */
export class ServiceNotInitializedError extends Error {
  readonly service: string;

  constructor(service: string, message?: string) {
    super(message ?? `${service} service is not initialized`);
    this.name = "ServiceNotInitializedError";
    this.service = service;
  }
}

export class NotFoundError extends Error {
  readonly resourceType: string;
  readonly resourceName: string;

  constructor(resourceType: string, resourceName: string, message?: string) {
    super(message ?? `${resourceType} '${resourceName}' not found`);
    this.name = "NotFoundError";
    this.resourceType = resourceType;
    this.resourceName = resourceName;
  }
}

export class ConfigError extends Error {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${message} (at ${path})` : message);
    this.name = "ConfigError";
    this.path = path;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}

export function errorName(error: unknown): string {
  if (error instanceof Error) return error.name;
  if (typeof error === "object" && error !== null && "name" in error && typeof error.name === "string") {
    return error.name;
  }
  return typeof error;
}

/**
 * Read `error.code` when it is a string (Node system errors, SDK errors).
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

const NETWORK_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
]);

export function isNetworkError(error: unknown): boolean {
  const code = errorCode(error);
  if (code && NETWORK_CODES.has(code)) return true;
  const name = errorName(error);
  if (name === "TimeoutError" || name === "AbortError") return true;
  if (error instanceof Error && error.cause !== undefined && error.cause !== error) {
    return isNetworkError(error.cause);
  }
  return false;
}
