import { chromium, firefox, webkit, type Browser, type BrowserContext, type BrowserType, type Page } from "playwright";
import type { BrowserEngine } from "../config/schema.js";
import { getSessionPath, SESSIONS_DIR } from "../config/paths.js";
import { ensureDir, outputJson, pathExists, removeFile } from "../shared/fs.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import { getDomain } from "../shared/url.js";

export interface BrowserSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
}

export interface SessionOptions {
  engine: BrowserEngine;
  headless: boolean;
}

export interface LoginOptions {
  engine: BrowserEngine;
  /** URL to navigate to for login */
  loginUrl: string;
  /** Function to check if current URL is a login page */
  isLoginPage?: (url: string) => boolean;
  /** Login timeout in ms (default: 5 minutes) */
  loginTimeout?: number;
  logger?: Logger;
}

/**
 * Default login page detection patterns.
 */
const DEFAULT_LOGIN_PATTERNS = [
  /\/login/,
  /\/signin/,
  /\/sign_in/,
  /\/auth/,
  /accounts\.google\.com/,
  /sso\./,
];

/**
 * Creates a login page checker from patterns.
 */
export function createLoginChecker(
  patterns: RegExp[] = DEFAULT_LOGIN_PATTERNS
): (url: string) => boolean {
  return (url: string) => patterns.some((p) => p.test(url));
}

export const isLoginPage = createLoginChecker();

/**
 * Formats browser cookies for a Cookie request header.
 */
export function formatCookieHeader(cookies: Array<{ name: string; value: string }>): string {
  return cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join("; ");
}

export function browserTypeFor(engine: BrowserEngine): BrowserType {
  switch (engine) {
    case "chromium":
      return chromium;
    case "firefox":
      return firefox;
    case "webkit":
      return webkit;
  }
}

// ============================================
// Browser automation - not unit testable
// ============================================
/* v8 ignore start */

/**
 * Checks if a saved session exists for the site of the given URL.
 */
export async function hasSavedSession(url: string): Promise<boolean> {
  return pathExists(getSessionPath(getDomain(url)));
}

/**
 * Launches the configured engine with the saved session for the URL's
 * site, or a fresh context when none was saved.
 */
export async function openSession(url: string, options: SessionOptions): Promise<BrowserSession> {
  const browser = await browserTypeFor(options.engine).launch({ headless: options.headless });
  try {
    const sessionPath = getSessionPath(getDomain(url));
    const context = await browser.newContext({
      viewport: { width: 1280, height: 800 },
      ...((await pathExists(sessionPath)) ? { storageState: sessionPath } : {}),
    });
    const page = await context.newPage();
    return { browser, context, page };
  } catch (error) {
    await browser.close();
    throw error;
  }
}

/**
 * Cookie header for requests to the given URL from this session.
 */
export async function sessionCookies(context: BrowserContext, url: string): Promise<string> {
  return formatCookieHeader(await context.cookies(url));
}

/**
 * Performs interactive login by opening a browser window.
 * The user logs in manually, and the session is saved for later runs.
 */
export async function performInteractiveLogin(options: LoginOptions): Promise<void> {
  const logger = options.logger ?? silentLogger;
  const checkLoginPage = options.isLoginPage ?? isLoginPage;
  await ensureDir(SESSIONS_DIR);

  const browser = await browserTypeFor(options.engine).launch({
    headless: false, // Must be visible for user interaction
  });

  try {
    const context = await browser.newContext({ viewport: { width: 1280, height: 800 } });
    const page = await context.newPage();
    await page.goto(options.loginUrl);

    logger.info("🔐 Browser opened. Please log in manually.");
    logger.info("The window will close automatically after successful login.");

    const timeout = options.loginTimeout ?? 300000;
    const startTime = Date.now();
    let loggedIn = false;

    while (!loggedIn && Date.now() - startTime < timeout) {
      await page.waitForTimeout(1000);
      loggedIn = !checkLoginPage(page.url());
    }

    if (!loggedIn) {
      throw new Error(`Login timed out after ${timeout / 1000} seconds`);
    }

    try {
      await page.waitForLoadState("networkidle", { timeout: 15000 });
    } catch {
      logger.debug("Page kept loading after login, saving the session anyway");
    }

    const storageState = await context.storageState();
    await outputJson(getSessionPath(getDomain(options.loginUrl)), storageState);
    logger.success("Login successful! Session saved.");
  } finally {
    await browser.close();
  }
}

/**
 * Clears the saved session for the site of the given URL.
 */
export async function clearSession(url: string): Promise<boolean> {
  return removeFile(getSessionPath(getDomain(url)));
}

/* v8 ignore stop */
