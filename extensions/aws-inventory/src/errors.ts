/**
 * AWS Inventory Errors
 *
 * Classifies AWS SDK failures into the scan's issue kinds and defines the
 * errors that are allowed to escape a scan.
 *
 * Throttling is retried by the SDK clients themselves (see clients/pool.ts);
 * anything that reaches this module has already exhausted those retries.
 */

import type { IssueKind, ScanIssue } from "./types.js";

// =============================================================================
// Error Types
// =============================================================================

/** Credentials could not be resolved or were rejected. Fatal for a scan. */
export class CredentialsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CredentialsError";
  }
}

/** Scan configuration failed validation. */
export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Raised by the fetcher when the caller's signal fires between pages. */
export class ScanAbortedError extends Error {
  constructor(operation?: string) {
    super(operation ? `Scan aborted before ${operation}` : "Scan aborted");
    this.name = "AbortError";
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Extract error code from an error object
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  const code = (err as { code?: unknown }).code ?? (err as { Code?: unknown }).Code;
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  if (err instanceof Error && err.name && err.name !== "Error") return err.name;
  return undefined;
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

function httpStatusOf(err: unknown): number | undefined {
  if (!err || typeof err !== "object") return undefined;
  const metadata = (err as { $metadata?: { httpStatusCode?: unknown } }).$metadata;
  return typeof metadata?.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}

// =============================================================================
// Classification
// =============================================================================

const THROTTLING_CODES = new Set([
  "ThrottlingException",
  "Throttling",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "ProvisionedThroughputExceededException",
  "SlowDown",
  "EC2ThrottledException",
  "RequestThrottled",
  "RequestThrottledException",
  "BandwidthLimitExceeded",
  "PriorRequestNotComplete",
]);

const THROTTLING_PATTERN = /throttl|rate exceeded|too many requests|slow down/i;

const ACCESS_DENIED_CODES = new Set([
  "AccessDenied",
  "AccessDeniedException",
  "UnauthorizedOperation",
  "AuthorizationError",
  "AuthorizationErrorException",
  "UnauthorizedAccess",
  "UnauthorizedException",
  "Forbidden",
]);

const NOT_ENABLED_CODES = new Set([
  "OptInRequired",
  "AuthFailure",
  "UnrecognizedClientException",
  "InvalidClientTokenId",
  "SubscriptionRequiredException",
  "UnsupportedOperation",
  "InvalidAction",
]);

const NOT_ENABLED_PATTERN = /not (?:enabled|subscribed|supported) (?:in|for) (?:this )?region|opt-?in/i;

export function isAbortError(err: unknown): boolean {
  if (err instanceof ScanAbortedError) return true;
  if (!err || typeof err !== "object") return false;
  const name = (err as { name?: unknown }).name;
  return name === "AbortError" || name === "RequestAbortedError";
}

/**
 * Determine if an AWS error is throttling that outlived the SDK's retries
 */
export function isThrottlingError(err: unknown): boolean {
  if (!err) return false;
  const code = extractErrorCode(err);
  if (code && THROTTLING_CODES.has(code)) return true;
  if (httpStatusOf(err) === 429) return true;
  return THROTTLING_PATTERN.test(formatErrorMessage(err));
}

/**
 * Map an SDK failure onto the scan's issue taxonomy.
 */
export function classifyAwsError(err: unknown): Exclude<IssueKind, "partial_pagination" | "metrics_unavailable"> {
  if (isAbortError(err)) return "aborted";

  const code = extractErrorCode(err);
  if (code && ACCESS_DENIED_CODES.has(code)) return "access_denied";
  if (code && NOT_ENABLED_CODES.has(code)) return "not_enabled";
  if (isThrottlingError(err)) return "throttled";

  const message = formatErrorMessage(err);
  if (NOT_ENABLED_PATTERN.test(message)) return "not_enabled";
  if (httpStatusOf(err) === 403 || /not authorized|access denied/i.test(message)) return "access_denied";

  return "error";
}

/**
 * True when the failure means the whole region is out of reach, not just one call.
 * An IAM denial only covers the call that was refused.
 */
export function isScopeInaccessible(err: unknown): boolean {
  return classifyAwsError(err) === "not_enabled";
}

/**
 * Build a ScanIssue from a caught error.
 */
export function toScanIssue(
  collector: string,
  err: unknown,
  options: { operation?: string; kind?: IssueKind } = {},
): ScanIssue {
  const issue: ScanIssue = {
    kind: options.kind ?? classifyAwsError(err),
    collector,
    message: formatErrorMessage(err),
  };
  if (options.operation) issue.operation = options.operation;
  const code = extractErrorCode(err);
  if (code) issue.code = code;
  return issue;
}
