import chalk from "chalk";
import { clearSession, hasSavedSession, performInteractiveLogin } from "../../browser/session.js";
import { loadConfig } from "../../config/configManager.js";
import { createConsoleLogger } from "../../shared/logger.js";
import { getDomain } from "../../shared/url.js";
import { resolveSettings } from "../settings.js";

export interface LoginFlags {
  force?: boolean;
  browser?: string;
}

/**
 * Handles the login command.
 * Opens a browser for the user to log in manually.
 */
export async function loginCommand(url: string, options: LoginFlags): Promise<void> {
  const { engine } = resolveSettings(loadConfig(), { browser: options.browser });
  console.log(chalk.blue(`\n🔐 Login to ${getDomain(url)}\n`));

  if ((await hasSavedSession(url)) && !options.force) {
    console.log(chalk.yellow("⚠️  You already have a saved session."));
    console.log(chalk.gray("   Use --force to re-login anyway.\n"));
    return;
  }

  if (options.force && (await clearSession(url))) {
    console.log(chalk.gray("   Cleared existing session.\n"));
  }

  try {
    await performInteractiveLogin({ engine, loginUrl: url, logger: createConsoleLogger() });
    console.log(chalk.gray(`\n   You can now use: coursekeep download <outline>\n`));
  } catch (error) {
    if (error instanceof Error && error.message.includes("timed out")) {
      throw new Error("Login timed out. Complete the login within 5 minutes and try again.");
    }
    throw error;
  }
}

/**
 * Handles the logout command.
 */
export async function logoutCommand(url: string): Promise<void> {
  console.log(chalk.blue(`\n🔓 Logging out of ${getDomain(url)}...\n`));

  if (await clearSession(url)) {
    console.log(chalk.green("✅ Session cleared successfully.\n"));
  } else {
    console.log(chalk.yellow("⚠️  No saved session found.\n"));
  }
}
