/**
 * Test helpers for the Azure server.
 */

import type { AzureCredentialProvider } from "./types.js";

export function asyncIter<T>(items: T[]): AsyncIterable<T> {
  return {
    async *[Symbol.asyncIterator]() {
      yield* items;
    },
  };
}

export const fakeCredentials: AzureCredentialProvider = {
  async getCredential() {
    return {
      method: "default",
      credential: { getToken: async () => ({ token: "test-token", expiresOnTimestamp: Date.now() + 3_600_000 }) },
    };
  },
};

/** An error shaped like `RestError` from the Azure core pipeline. */
export function restError(statusCode: number, code: string, message = code): Error {
  const error = new Error(message);
  error.name = "RestError";
  return Object.assign(error, { statusCode, code });
}

export const NO_RETRY = { maxAttempts: 1 };
