/**
 * Exponential backoff with a steeper curve for rate limits.
 */
import delay from "delay";
import pRetry, { AbortError } from "p-retry";
import { errorMessage, silentLogger, type Logger } from "./logger.js";

export interface RetryOptions {
  /** Total attempts including the first (default: 5) */
  attempts?: number;
  /** Wait after the first failure in ms (default: 1000) */
  baseDelayMs?: number;
  /** Extra multiplier applied to rate-limit waits (default: 2) */
  rateLimitFactor?: number;
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: unknown) => boolean;
  /** Injectable wait, replaced in tests */
  sleep?: (ms: number) => Promise<void>;
  /** Label used in log lines */
  label?: string;
  logger?: Logger;
}

const DEFAULT_ATTEMPTS = 5;
const DEFAULT_BASE_DELAY_MS = 1000;
const DEFAULT_RATE_LIMIT_FACTOR = 2;

const RATE_LIMIT_PATTERN = /\b429\b|RATE_LIMIT_429|rate limit|too many requests/i;

/**
 * Detects rate-limit failures by status, code or message.
 */
export function isRateLimitError(error: unknown): boolean {
  if (typeof error === "object" && error !== null) {
    if ("statusCode" in error && error.statusCode === 429) return true;
    if ("status" in error && error.status === 429) return true;
    if ("code" in error && error.code === "RATE_LIMITED") return true;
  }
  return RATE_LIMIT_PATTERN.test(errorMessage(error));
}

/**
 * Wait in ms after the given failed attempt (1-based).
 */
export function computeBackoff(
  attempt: number,
  error: unknown,
  options: Pick<RetryOptions, "baseDelayMs" | "rateLimitFactor"> = {}
): number {
  const base = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const wait = base * 2 ** (attempt - 1);
  return isRateLimitError(error)
    ? wait * (options.rateLimitFactor ?? DEFAULT_RATE_LIMIT_FACTOR)
    : wait;
}

/**
 * Runs fn until it succeeds or the attempt ceiling is reached.
 * The last error propagates unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? DEFAULT_ATTEMPTS);
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const logger = options.logger ?? silentLogger;
  const label = options.label ?? "Operation";

  return pRetry(
    async (attemptNumber) => {
      try {
        return await fn(attemptNumber);
      } catch (error) {
        if (options.shouldRetry && !options.shouldRetry(error)) {
          throw new AbortError(error instanceof Error ? error : new Error(String(error)));
        }
        throw error;
      }
    },
    {
      retries: attempts - 1,
      // Waits are driven by onFailedAttempt so rate limits can back off harder
      minTimeout: 0,
      maxTimeout: 0,
      onFailedAttempt: async (error) => {
        if (error.retriesLeft === 0) return;
        const wait = computeBackoff(error.attemptNumber, error, options);
        const kind = isRateLimitError(error) ? "rate limited" : "failed";
        logger.warn(
          `${label} ${kind} (attempt ${error.attemptNumber}/${attempts}): ${error.message}. Retrying in ${(wait / 1000).toFixed(1)}s`
        );
        await sleep(wait);
      },
    }
  );
}
