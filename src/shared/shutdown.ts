/**
 * Graceful shutdown management for CLI commands.
 * The first signal stops work at the next checkpoint and runs cleanup;
 * a second signal forces exit.
 */
import type { Browser } from "playwright";
import { errorMessage, silentLogger, type Logger } from "./logger.js";

type Cleanup = () => void | Promise<void>;

/**
 * The parts of `process` the manager uses. Replaced in tests.
 */
export interface SignalTarget {
  on(signal: NodeJS.Signals, handler: () => void): unknown;
  exit(code: number): void;
}

export interface ShutdownOptions {
  logger?: Logger;
  target?: SignalTarget;
}

/**
 * Shutdown manager instance returned by createShutdownManager.
 */
export interface ShutdownManager {
  /** Set up SIGINT and SIGTERM handlers. Call once at command start. */
  setup: () => void;
  /** Returns false if shutdown has been requested. Use in loops. */
  shouldContinue: () => boolean;
  /** Register a browser; browsers close after every other cleanup. */
  registerBrowser: (browser: Pick<Browser, "close">) => void;
  /** Register a cleanup callback. Callbacks run in reverse order. */
  registerCleanup: (fn: Cleanup) => void;
  /** Check if shutdown is in progress. */
  isShuttingDown: () => boolean;
  /** What a signal triggers; exposed for tests and explicit aborts. */
  shutdown: (signal: string) => Promise<void>;
}

/**
 * Creates a shutdown manager for graceful CLI termination.
 *
 * @example
 * ```typescript
 * const shutdown = createShutdownManager({ logger });
 * shutdown.setup();
 * shutdown.registerBrowser(browser);
 * shutdown.registerCleanup(() => store.flush());
 *
 * while (shutdown.shouldContinue() && hasMoreWork) {
 *   // Process work...
 * }
 * ```
 */
export function createShutdownManager(options: ShutdownOptions = {}): ShutdownManager {
  const target = options.target ?? process;
  const logger = options.logger ?? silentLogger;
  const cleanups: Cleanup[] = [];
  const browsers: Array<Pick<Browser, "close">> = [];
  let shuttingDown = false;

  const runStep = async (step: Cleanup): Promise<void> => {
    try {
      await step();
    } catch (error) {
      logger.warn(`Cleanup step failed: ${errorMessage(error)}`);
    }
  };

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.error("Force exit");
      target.exit(1);
      return;
    }

    shuttingDown = true;
    logger.warn(`${signal} received, shutting down gracefully...`);

    for (const cleanup of [...cleanups].reverse()) {
      await runStep(cleanup);
    }
    for (const browser of browsers) {
      await runStep(() => browser.close());
    }
    logger.info("Cleanup complete. State saved.");
    target.exit(0);
  };

  return {
    setup: () => {
      target.on("SIGINT", () => void shutdown("SIGINT"));
      target.on("SIGTERM", () => void shutdown("SIGTERM"));
    },
    shouldContinue: () => !shuttingDown,
    registerBrowser: (browser) => {
      browsers.push(browser);
    },
    registerCleanup: (fn) => {
      cleanups.push(fn);
    },
    isShuttingDown: () => shuttingDown,
    shutdown,
  };
}
