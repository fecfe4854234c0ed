import { expandPath } from "../config/paths.js";
import {
  BROWSER_ENGINES,
  type BrowserEngine,
  type Config,
  configSchema,
  isConfigKey,
  VIDEO_QUALITIES,
  type VideoQuality,
} from "../config/schema.js";

/**
 * Flags shared by the commands that touch the archive or the ledger.
 */
export interface CliFlags {
  browser?: string;
  visible?: boolean;
  quality?: string;
  overwrite?: boolean;
  checkpoint?: string;
  output?: string;
  verbose?: boolean;
}

export interface RunSettings {
  outputDir: string;
  checkpointFile: string;
  engine: BrowserEngine;
  headless: boolean;
  quality: VideoQuality;
  overwrite: boolean;
  retryAttempts: number;
  retryDelayMs: number;
  unitDelayMs: number;
  verbose: boolean;
}

function pick<T extends string>(
  label: string,
  allowed: readonly T[],
  value: string | undefined,
  fallback: T
): T {
  if (value === undefined) return fallback;
  const match = allowed.find((option) => option === value);
  if (!match) {
    throw new Error(`Unknown ${label} "${value}". Use one of: ${allowed.join(", ")}`);
  }
  return match;
}

/**
 * Merges command line flags over the saved configuration.
 */
export function resolveSettings(config: Config, flags: CliFlags = {}): RunSettings {
  return {
    outputDir: expandPath(flags.output ?? config.outputDir),
    checkpointFile: expandPath(flags.checkpoint ?? config.checkpointFile),
    engine: pick("browser", BROWSER_ENGINES, flags.browser, config.browser),
    headless: flags.visible ? false : config.headless,
    quality: pick("quality", VIDEO_QUALITIES, flags.quality, config.videoQuality),
    overwrite: flags.overwrite ?? config.overwrite,
    retryAttempts: config.retryAttempts,
    retryDelayMs: config.retryDelayMs,
    unitDelayMs: config.unitDelayMs,
    verbose: flags.verbose ?? false,
  };
}

function coerce(current: string | number | boolean, raw: string): string | number | boolean {
  if (typeof current === "boolean") {
    if (raw === "true" || raw === "1") return true;
    if (raw === "false" || raw === "0") return false;
    throw new Error(`Invalid boolean: ${raw}`);
  }
  if (typeof current === "number") {
    const parsed = Number(raw);
    if (raw.trim() === "" || Number.isNaN(parsed)) {
      throw new Error(`Invalid number: ${raw}`);
    }
    return parsed;
  }
  return raw;
}

/**
 * Returns config with key set to the parsed form of raw. Throws for unknown
 * keys and for values the schema rejects.
 */
export function applyConfigValue(config: Config, key: string, raw: string): Config {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: ${key}. Valid keys: ${Object.keys(config).join(", ")}`);
  }

  const candidate = { ...config, [key]: coerce(config[key], raw) };
  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new Error(`Invalid value for ${key}: ${raw}`);
  }
  return parsed.data;
}
