import chalk from "chalk";
import ora from "ora";
import { createBrowserHooks } from "../../browser/siteHooks.js";
import { openSession, type BrowserSession } from "../../browser/session.js";
import { clearCaptureTemp } from "../../capture/interceptDownload.js";
import { createBrowserIntercept } from "../../capture/playwrightPlayer.js";
import { ensureAppDirectories, loadConfig } from "../../config/configManager.js";
import { expandPath } from "../../config/paths.js";
import { acquireVideo } from "../../downloader/pipeline.js";
import { Orchestrator, type RunSummary } from "../../orchestrator/orchestrator.js";
import { createConsoleLogger } from "../../shared/logger.js";
import { createShutdownManager } from "../../shared/shutdown.js";
import { OutlineSiteAdapter } from "../../site/outlineSite.js";
import { CheckpointStore } from "../../state/index.js";
import { createCaptureBar } from "../progress.js";
import { type CliFlags, resolveSettings } from "../settings.js";

export type DownloadOptions = CliFlags;

function printSummary(summary: RunSummary): void {
  const parts = [
    chalk.green(`${summary.completed} completed`),
    chalk.gray(`${summary.skipped} skipped`),
  ];
  if (summary.copied > 0) parts.push(chalk.blue(`${summary.copied} copied`));
  if (summary.failed > 0) parts.push(chalk.red(`${summary.failed} failed`));

  console.log(chalk.white(`\n   ${summary.title}: `) + parts.join(", "));
  for (const course of summary.courses) {
    if (course.outcome === "failed") {
      console.log(chalk.red(`   • ${course.id}: ${course.error ?? "unknown error"}`));
    } else if (course.failedUnits > 0) {
      console.log(chalk.yellow(`   • ${course.id}: ${course.failedUnits} units failed`));
    }
  }
  if (summary.interrupted) {
    console.log(chalk.yellow("   Interrupted. Run the same command again to resume."));
  }
}

/**
 * Downloads every entry of the outline, or only the given URL.
 */
export async function downloadCommand(
  outlinePath: string,
  url: string | undefined,
  options: DownloadOptions
): Promise<void> {
  const settings = resolveSettings(loadConfig(), options);
  const logger = createConsoleLogger({ verbose: settings.verbose });
  const shutdown = createShutdownManager({ logger });
  shutdown.setup();

  const outline = await OutlineSiteAdapter.fromFile(expandPath(outlinePath));
  const targets = url ? [url] : outline.entryUrls();

  console.log(chalk.blue(`\n📚 Downloading from ${outline.siteUrl}\n`));
  console.log(chalk.gray(`   Output: ${settings.outputDir}`));
  console.log(chalk.gray(`   Progress: ${settings.checkpointFile}\n`));

  if (targets.length === 0) {
    logger.warn("The outline lists no courses.");
    return;
  }

  await ensureAppDirectories();
  await clearCaptureTemp();
  const store = await CheckpointStore.open(settings.checkpointFile, { logger });
  await store.startSession();
  // Runs after the flush below, since cleanups run in reverse
  shutdown.registerCleanup(() => clearCaptureTemp());
  shutdown.registerCleanup(async () => {
    await store.flush();
  });

  const spinner = ora(`Starting ${settings.engine}...`).start();
  let session: BrowserSession;
  try {
    session = await openSession(outline.siteUrl, {
      engine: settings.engine,
      headless: settings.headless,
    });
    spinner.succeed(`Connected with ${settings.engine}`);
  } catch (error) {
    spinner.fail("Failed to start the browser");
    throw error;
  }
  shutdown.registerBrowser(session.browser);

  const retry = { attempts: settings.retryAttempts, baseDelayMs: settings.retryDelayMs };
  const captureBar = createCaptureBar();
  const intercept = createBrowserIntercept({
    context: session.context,
    logger,
    onProgress: captureBar.update,
    shouldContinue: shutdown.shouldContinue,
  });

  const orchestrator = new Orchestrator({
    adapter: new OutlineSiteAdapter(
      outline.outline,
      createBrowserHooks(session.context, { siteUrl: outline.siteUrl, logger }),
      logger
    ),
    store,
    outputDir: settings.outputDir,
    logger,
    overwrite: settings.overwrite,
    unitDelayMs: settings.unitDelayMs,
    retry,
    shouldContinue: shutdown.shouldContinue,
    acquire: async (request) => {
      try {
        return await acquireVideo(request, {
          engine: settings.engine,
          quality: settings.quality,
          retry,
          logger,
          intercept,
        });
      } finally {
        captureBar.stop();
      }
    },
  });

  try {
    for (const target of targets) {
      if (!shutdown.shouldContinue()) break;
      printSummary(await orchestrator.run(target));
    }
  } finally {
    await store.flush();
    if (!shutdown.isShuttingDown()) {
      await session.browser.close();
    }
  }

  console.log(`\n${store.generateReport()}\n`);
}
