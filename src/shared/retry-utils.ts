import pRetry, { AbortError } from "p-retry";
import { formatErrorMessage, getErrorStatus } from "./errors.js";

export { AbortError };

/**
 * Error message patterns that indicate a temporary provider or network issue.
 */
export const DEFAULT_TRANSIENT_ERROR_PATTERNS: RegExp[] = [
  /ETIMEDOUT/i,
  /ECONNRESET/i,
  /ECONNREFUSED/i,
  /ENOTFOUND/i,
  /socket hang up/i,
  /rate limit/i,
  /secondary rate/i,
  /HTTP 5\d\d/,
  /HTTP 429/,
  /timed out/i,
];

/**
 * Error message patterns that must never be retried.
 */
export const DEFAULT_PERMANENT_ERROR_PATTERNS: RegExp[] = [
  /HTTP 401/,
  /Bad credentials/i,
  /HTTP 404/,
  /HTTP 422/,
  /permission denied/i,
];

export interface RetryOptions {
  /** Number of retries after the first attempt (0 disables retrying). */
  retries?: number;
  /** Base delay in milliseconds. */
  minTimeout?: number;
  /** Called before each retry. */
  onRetry?: (error: unknown, attempt: number) => void;
  /** Overrides the default transient-error classification. */
  isRetryable?: (error: unknown) => boolean;
}

export function isPermanentError(error: unknown): boolean {
  const status = getErrorStatus(error);
  if (status !== undefined && status >= 400 && status < 500 && status !== 429) {
    return true;
  }
  const message = formatErrorMessage(error);
  return DEFAULT_PERMANENT_ERROR_PATTERNS.some((p) => p.test(message));
}

export function isTransientError(error: unknown): boolean {
  if (isPermanentError(error)) return false;
  const status = getErrorStatus(error);
  if (status !== undefined && (status >= 500 || status === 429)) {
    return true;
  }
  const message = formatErrorMessage(error);
  return DEFAULT_TRANSIENT_ERROR_PATTERNS.some((p) => p.test(message));
}

/**
 * Runs an async operation, retrying transient failures with exponential
 * backoff. Non-retryable errors are rethrown unchanged on first occurrence.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const retries = options.retries ?? 3;
  const isRetryable = options.isRetryable ?? isTransientError;

  if (retries <= 0) {
    return fn();
  }

  return pRetry(
    async () => {
      try {
        return await fn();
      } catch (error) {
        if (!isRetryable(error)) {
          throw new AbortError(
            error instanceof Error ? error : new Error(String(error))
          );
        }
        throw error;
      }
    },
    {
      retries,
      minTimeout: options.minTimeout ?? 1000,
      onFailedAttempt: (error) => {
        options.onRetry?.(error, error.attemptNumber);
      },
    }
  );
}
