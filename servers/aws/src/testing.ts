/**
 * Test helpers for the AWS server.
 */

/** An error shaped like an AWS SDK v3 service exception. */
export function awsError(name: string, httpStatusCode: number, message = name): Error {
  const error = new Error(message);
  error.name = name;
  return Object.assign(error, { $metadata: { httpStatusCode, requestId: "req-test" }, $fault: "client" });
}
