/**
 * Playwright implementations of the outline adapter's browser hooks.
 * Each call works in its own tab of the authenticated context.
 */
import type { BrowserContext, Page } from "playwright";
import { outputFile } from "../shared/fs.js";
import { errorMessage, silentLogger, type Logger } from "../shared/logger.js";
import type { OutlineSiteHooks } from "../site/outlineSite.js";
import { sniffManifests } from "./manifestSniffer.js";
import { gotoWithRetry } from "./navigation.js";
import { isLoginPage as defaultIsLoginPage, sessionCookies } from "./session.js";

export interface SiteHookOptions {
  /** Page that requires a login, used to check the session */
  siteUrl: string;
  isLoginPage?: (url: string) => boolean;
  logger?: Logger;
}

/* v8 ignore start */
export function createBrowserHooks(
  context: BrowserContext,
  options: SiteHookOptions
): OutlineSiteHooks {
  const logger = options.logger ?? silentLogger;
  const isLoginPage = options.isLoginPage ?? defaultIsLoginPage;

  const withPage = async <T>(fn: (page: Page) => Promise<T>): Promise<T> => {
    const page = await context.newPage();
    try {
      return await fn(page);
    } finally {
      await page.close();
    }
  };

  return {
    sniff: (pageUrl) =>
      withPage(async (page) => {
        const sniffer = await sniffManifests(page, pageUrl, { logger });
        return { primary: sniffer.primary, fallback: sniffer.fallback };
      }),

    validateSession: () =>
      withPage(async (page) => {
        await gotoWithRetry(page, options.siteUrl, { logger });
        return !isLoginPage(page.url());
      }),

    getCookieHeader: (url) => sessionCookies(context, url),

    savePage: (pageUrl, outputPath) =>
      withPage(async (page) => {
        await gotoWithRetry(page, pageUrl, { logger });
        try {
          await page.waitForLoadState("networkidle", { timeout: 5000 });
        } catch (error) {
          logger.debug(`Page still loading, saving what rendered: ${errorMessage(error)}`);
        }
        await outputFile(outputPath, await page.content());
      }),
  };
}
/* v8 ignore stop */
