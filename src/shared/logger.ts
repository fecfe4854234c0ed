import chalk from "chalk";

/**
 * Logger handed to every component that reports progress or failures.
 */
export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  success: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export interface ConsoleLoggerOptions {
  /** Show debug lines (default: false) */
  verbose?: boolean;
}

/**
 * Creates a logger that prints chalk-coloured, indented lines to the console.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    debug: (message) => {
      if (options.verbose) {
        console.log(chalk.gray(`   ${message}`));
      }
    },
    info: (message) => console.log(`   ${message}`),
    success: (message) => console.log(chalk.green(`   ✅ ${message}`)),
    warn: (message) => console.log(chalk.yellow(`   ⚠️  ${message}`)),
    error: (message) => console.error(chalk.red(`   ❌ ${message}`)),
  };
}

const noop = (): void => undefined;

/**
 * Logger that drops everything. Default for library calls.
 */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  success: noop,
  warn: noop,
  error: noop,
};

/**
 * Extracts a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
