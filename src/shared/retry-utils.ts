import pRetry, { AbortError } from "p-retry";
import type { ILogger } from "./logger.js";

export { AbortError };

/**
 * Patterns that mark a failure as permanent: retrying cannot help.
 */
export const DEFAULT_PERMANENT_ERROR_PATTERNS: RegExp[] = [
  /authentication failed/i,
  /permission denied/i,
  /repository not found/i,
  /does not appear to be a git repository/i,
  /could not read (username|password)/i,
  /no such remote/i,
  /invalid refspec/i,
];

/**
 * Patterns that mark a failure as transient (network hiccups, server 5xx).
 */
export const DEFAULT_TRANSIENT_ERROR_PATTERNS: RegExp[] = [
  /could not resolve host/i,
  /connection (timed out|reset|refused)/i,
  /operation timed out/i,
  /\btimed out\b/i,
  /the remote end hung up unexpectedly/i,
  /early eof/i,
  /\b5\d\d\b/,
  /ECONNRESET|ETIMEDOUT|EAI_AGAIN/,
];

export interface RetryOptions {
  /** Number of retries after the first attempt (0 disables retrying) */
  retries?: number;
  /** Delay before the first retry, doubled on each subsequent one */
  minTimeout?: number;
  permanentErrorPatterns?: RegExp[];
  log?: ILogger;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isPermanentError(
  error: unknown,
  patterns: RegExp[] = DEFAULT_PERMANENT_ERROR_PATTERNS
): boolean {
  const message = messageOf(error);
  return patterns.some((pattern) => pattern.test(message));
}

export function isTransientError(
  error: unknown,
  patterns: RegExp[] = DEFAULT_TRANSIENT_ERROR_PATTERNS
): boolean {
  const message = messageOf(error);
  return patterns.some((pattern) => pattern.test(message));
}

/**
 * Run an operation with a bounded number of attempts and exponential backoff.
 * Permanent errors abort immediately; the last error is rethrown when
 * attempts run out.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const retries = options.retries ?? 3;
  const permanentPatterns =
    options.permanentErrorPatterns ?? DEFAULT_PERMANENT_ERROR_PATTERNS;

  return pRetry(
    async () => {
      try {
        return await fn();
      } catch (error) {
        if (error instanceof AbortError) {
          throw error;
        }
        if (isPermanentError(error, permanentPatterns)) {
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
        if (error.retriesLeft > 0) {
          options.log?.warn(
            `Attempt ${error.attemptNumber} failed, ${error.retriesLeft} retries left: ${error.message.split("\n")[0]}`
          );
        }
      },
    }
  );
}
