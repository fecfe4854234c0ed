/**
 * Page navigation with per-attempt timeouts and backoff.
 */
import type { Page } from "playwright";
import delay from "delay";
import { errorMessage, silentLogger, type Logger } from "../shared/logger.js";

export type NavigablePage = Pick<Page, "goto" | "url">;

export interface NavigationOptions {
  /** Default: 3 */
  attempts?: number;
  /** Timeout of the first attempt in ms (default: 30000) */
  baseTimeoutMs?: number;
  /** Added to the timeout for each further attempt (default: 15000) */
  timeoutStepMs?: number;
  /** Wait after the navigation commits (default: 5000) */
  settleMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === "TimeoutError";
}

/**
 * Navigates to url, retrying with longer timeouts. A timeout is accepted
 * when the page already shows the target URL.
 */
export async function gotoWithRetry(
  page: NavigablePage,
  url: string,
  options: NavigationOptions = {}
): Promise<void> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const baseTimeout = options.baseTimeoutMs ?? 30000;
  const step = options.timeoutStepMs ?? 15000;
  const settleMs = options.settleMs ?? 5000;
  const logger = options.logger ?? silentLogger;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));

  let lastError: unknown = new Error(`Navigation to ${url} was not attempted`);

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      await page.goto(url, { waitUntil: "commit", timeout: baseTimeout + attempt * step });
      await sleep(settleMs);
      return;
    } catch (error) {
      if (isTimeoutError(error) && page.url().includes(url)) {
        logger.debug(`Navigation timed out but ${url} is loaded, continuing`);
        await sleep(settleMs);
        return;
      }
      lastError = error;
      if (attempt === attempts - 1) break;

      const wait = (3 + 2 * attempt) * 1000;
      logger.warn(
        `Navigation failed (attempt ${attempt + 1}/${attempts}): ${errorMessage(error)}. Retrying in ${wait / 1000}s`
      );
      await sleep(wait);
    }
  }

  throw lastError;
}
