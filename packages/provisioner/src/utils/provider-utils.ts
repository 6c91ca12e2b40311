/**
 * Shared error, naming and tagging helpers for the EC2 provisioner.
 */

import { LABEL_PREFIX } from "@scratchfleet/core";

/**
 * Standard error types surfaced by provider operations
 */
export enum ProviderErrorType {
  AUTHENTICATION = "AUTHENTICATION",
  AUTHORIZATION = "AUTHORIZATION",
  NOT_FOUND = "NOT_FOUND",
  ALREADY_EXISTS = "ALREADY_EXISTS",
  QUOTA_EXCEEDED = "QUOTA_EXCEEDED",
  NETWORK = "NETWORK",
  UNKNOWN = "UNKNOWN",
}

/**
 * Structured error for provider operations
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly type: ProviderErrorType,
    public readonly originalError?: Error,
    public readonly suggestions?: string[]
  ) {
    super(message);
    this.name = "ProviderError";
  }
}

/**
 * Provider error code of an SDK exception (SDK v3 puts the EC2 error code in `name`).
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof ProviderError) return errorCode(error.originalError);
  if (error instanceof Error) return error.name;
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Classify an SDK error into a ProviderError with actionable suggestions.
 */
export function parseCloudError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;

  const code = errorCode(error) ?? "";
  const message = errorMessage(error);
  const original = toError(error);

  if (code.includes("CredentialsProviderError") ||
      code.includes("AuthFailure") ||
      code.includes("ExpiredToken")) {
    return new ProviderError(
      `AWS credentials not configured or expired: ${message}`,
      ProviderErrorType.AUTHENTICATION,
      original,
      [
        "Run 'aws configure' or export AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY",
        "Check that your AWS access keys are valid",
      ],
    );
  }

  if (code.includes("UnauthorizedOperation") || code.includes("AccessDenied")) {
    return new ProviderError(
      `Insufficient permissions: ${message}`,
      ProviderErrorType.AUTHORIZATION,
      original,
      ["Check your IAM policies for the EC2 actions this operation needs"],
    );
  }

  if (code.includes("NotFound")) {
    return new ProviderError(`Resource not found: ${message}`, ProviderErrorType.NOT_FOUND, original);
  }

  if (code.includes("Duplicate") || code.includes("AlreadyExists")) {
    return new ProviderError(
      `Resource already exists: ${message}`,
      ProviderErrorType.ALREADY_EXISTS,
      original,
    );
  }

  if (code.includes("LimitExceeded") || code.includes("InsufficientInstanceCapacity")) {
    return new ProviderError(
      `Service limit exceeded: ${message}`,
      ProviderErrorType.QUOTA_EXCEEDED,
      original,
      [
        "Release unused elastic IPs (most accounts may hold 5 at a time)",
        "Run 'scratchfleet cleanup --all' to reclaim leaked resources",
      ],
    );
  }

  if (code.includes("Timeout") || code.includes("ECONN") || code.includes("NetworkingError")) {
    return new ProviderError(`Network error: ${message}`, ProviderErrorType.NETWORK, original);
  }

  return new ProviderError(message, ProviderErrorType.UNKNOWN, original);
}

/**
 * Unwrap a field the provider promises to return, failing loudly when it doesn't.
 */
export function requireField<T>(value: T | null | undefined, description: string): T {
  if (value === undefined || value === null) {
    throw new ProviderError(
      `Provider response is missing ${description}`,
      ProviderErrorType.UNKNOWN,
    );
  }
  return value;
}

/**
 * Name for a per-fleet resource: `scratchfleet-<principal>-<suffix>`.
 * Characters EC2 names reject are replaced with `-`.
 */
export function resourceName(principal: string, suffix: string): string {
  const owner = principal
    .replace(/[^A-Za-z0-9._-]/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");

  if (!owner) {
    throw new Error(`Invalid principal: "${principal}" produces empty sanitized value`);
  }
  return `${LABEL_PREFIX}-${owner}-${suffix}`;
}
