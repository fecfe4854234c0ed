#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { errorMessage } from "../shared/logger.js";
import { configGetCommand, configSetCommand, configShowCommand } from "./commands/config.js";
import { downloadCommand } from "./commands/download.js";
import { loginCommand, logoutCommand } from "./commands/login.js";
import {
  pruneCommand,
  removeCourseCommand,
  resetCourseCommand,
  retryFailedCommand,
} from "./commands/maintenance.js";
import { listCommand, statusCommand } from "./commands/status.js";

// Global error handler to ensure clean exit
process.on("unhandledRejection", (reason) => {
  console.error(chalk.red("\n❌ Unhandled error"));
  console.error(chalk.gray(`   ${errorMessage(reason)}`));
  process.exit(1);
});

function printFailure(error: unknown): void {
  console.error(chalk.red("\n❌ Command failed"));
  console.error(chalk.gray(`   ${errorMessage(error)}`));
  if (error instanceof Error && "hint" in error && typeof error.hint === "string") {
    console.error(chalk.gray(`   Hint: ${error.hint}`));
  }
  console.error();
}

// Wraps actions so a failure prints one red message and exits with code 1
function wrapAction<T extends unknown[]>(
  fn: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      printFailure(error);
      process.exit(1);
    }
  };
}

const program = new Command();

program
  .name("coursekeep")
  .description("Archive online courses for offline access with resumable downloads")
  .version("0.1.0");

// Download command
program
  .command("download <outline> [url]")
  .description("Download every course in the outline, or only the given path or course")
  .option("-b, --browser <engine>", "Browser engine (chromium, firefox, webkit)")
  .option("--visible", "Show browser window (default: headless)")
  .option("-q, --quality <quality>", "Preferred video quality (e.g., 720p, 1080p)")
  .option("--overwrite", "Replace videos and files that already exist")
  .option("-c, --checkpoint <file>", "Progress ledger file")
  .option("-o, --output <dir>", "Archive folder")
  .option("-v, --verbose", "Show debug output")
  .action(wrapAction(downloadCommand));

// Status commands
program
  .command("status")
  .description("Show download progress")
  .option("--errors", "Show details for failed courses and units")
  .option("-c, --checkpoint <file>", "Progress ledger file")
  .action(wrapAction(statusCommand));

program
  .command("list")
  .description("List recorded courses")
  .option("-s, --status <status>", "Only courses with this status (e.g., failed)")
  .option("-c, --checkpoint <file>", "Progress ledger file")
  .action(wrapAction(listCommand));

// Maintenance commands
program
  .command("retry-failed")
  .description("Move failed units and courses back to pending")
  .option("--course <url>", "Only this course")
  .option("--dry-run", "Show what would change")
  .option("-c, --checkpoint <file>", "Progress ledger file")
  .action(wrapAction(retryFailedCommand));

program
  .command("reset-course <pattern>")
  .description("Mark matching courses for a full re-download")
  .option("--dry-run", "Show what would change")
  .option("-c, --checkpoint <file>", "Progress ledger file")
  .action(wrapAction(resetCourseCommand));

program
  .command("remove-course <pattern>")
  .description("Delete matching courses from the progress ledger")
  .option("--dry-run", "Show what would change")
  .option("-c, --checkpoint <file>", "Progress ledger file")
  .action(wrapAction(removeCourseCommand));

program
  .command("prune")
  .description("Forget completed courses whose folder was deleted")
  .option("--dry-run", "Show what would change")
  .option("-o, --output <dir>", "Archive folder")
  .option("-c, --checkpoint <file>", "Progress ledger file")
  .action(wrapAction(pruneCommand));

// Session commands
program
  .command("login <url>")
  .description("Log in to a course site (opens browser)")
  .option("-f, --force", "Force re-login even if a session exists")
  .option("-b, --browser <engine>", "Browser engine (chromium, firefox, webkit)")
  .action(wrapAction(loginCommand));

program
  .command("logout <url>")
  .description("Clear the saved session for a site")
  .action(wrapAction(logoutCommand));

// Config commands
const configCmd = program.command("config").description("Manage configuration");

configCmd
  .command("show")
  .description("Show all configuration values")
  .action(wrapAction(configShowCommand));

configCmd
  .command("get <key>")
  .description("Get a configuration value")
  .action(wrapAction(configGetCommand));

configCmd
  .command("set <key> <value>")
  .description("Set a configuration value")
  .action(wrapAction(configSetCommand));

// Parse and run
await program.parseAsync();
