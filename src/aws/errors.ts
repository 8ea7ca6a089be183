/**
 * AWS error helpers
 *
 * Classify AWS SDK v3 errors by their name/code and turn any thrown value
 * into a printable message.
 */

/**
 * Error codes meaning "the resource does not exist" across the services we call.
 */
const NOT_FOUND_CODES = new Set([
  "ResourceNotFoundException",
  "NotFoundException",
  "NoSuchEntity",
  "NoSuchEntityException",
]);

/**
 * Extract the AWS error code from an error object.
 *
 * SDK v3 exceptions carry it as `name`; older shapes and Node system errors use `code`.
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  if ("code" in err) {
    if (typeof err.code === "string") return err.code;
    if (typeof err.code === "number") return String(err.code);
  }
  if (err instanceof Error && err.name && err.name !== "Error") return err.name;
  return undefined;
}

/**
 * HTTP status from SDK v3 response metadata, when present.
 */
export function extractHttpStatus(err: unknown): number | undefined {
  if (!err || typeof err !== "object" || !("$metadata" in err)) return undefined;
  const metadata = err.$metadata;
  if (!metadata || typeof metadata !== "object" || !("httpStatusCode" in metadata)) return undefined;
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

/**
 * Whether an AWS error means the requested resource does not exist.
 *
 * CloudFormation reports a missing stack as a ValidationError whose message
 * ends in "does not exist", so that case is matched on the message.
 */
export function isNotFoundError(err: unknown): boolean {
  const code = extractErrorCode(err);
  if (code && NOT_FOUND_CODES.has(code)) return true;
  if (code === "ValidationError" && /does not exist/i.test(formatErrorMessage(err))) return true;
  return extractHttpStatus(err) === 404;
}

/**
 * One-line description: `Code: message`, or just the message when there is no code.
 */
export function describeAwsError(err: unknown): string {
  const code = extractErrorCode(err);
  const message = formatErrorMessage(err);
  if (!code || message.startsWith(code)) return message;
  return `${code}: ${message}`;
}
