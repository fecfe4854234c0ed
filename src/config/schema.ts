import { z } from "zod";

/**
 * Video quality preferences for HLS variant selection.
 */
export const VIDEO_QUALITIES = ["highest", "lowest", "1080p", "720p", "480p", "360p"] as const;

export type VideoQuality = (typeof VIDEO_QUALITIES)[number];

/**
 * Browser engines Playwright can drive.
 */
export const BROWSER_ENGINES = ["chromium", "firefox", "webkit"] as const;

export type BrowserEngine = (typeof BROWSER_ENGINES)[number];

/**
 * Global application configuration schema.
 */
export const configSchema = z.object({
  outputDir: z.string().default("~/Downloads/coursekeep"),
  videoQuality: z.enum(VIDEO_QUALITIES).default("highest"),
  // Firefox sends the referrer the content host expects for DASH manifests
  browser: z.enum(BROWSER_ENGINES).default("firefox"),
  headless: z.boolean().default(true),
  retryAttempts: z.number().int().min(1).max(10).default(5),
  retryDelayMs: z.number().int().min(0).max(60000).default(1000),
  unitDelayMs: z.number().int().min(0).max(60000).default(1500),
  overwrite: z.boolean().default(false),
  checkpointFile: z.string().default("~/.coursekeep/download_progress.json"),
});

export type Config = z.infer<typeof configSchema>;

export type ConfigKey = keyof Config;

/**
 * Narrows an arbitrary string to a known config key.
 */
export function isConfigKey(key: string): key is ConfigKey {
  return Object.keys(configSchema.shape).includes(key);
}
