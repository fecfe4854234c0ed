import { homedir } from "node:os";
import { join } from "node:path";
import untildify from "untildify";

/**
 * Application directory paths.
 * Everything lives under ~/.coursekeep/ so it is easy to find and wipe.
 */
export const APP_DIR = join(homedir(), ".coursekeep");
export const SESSIONS_DIR = join(APP_DIR, "sessions");
export const CACHE_DIR = join(APP_DIR, "cache");
export const CAPTURE_DIR = join(CACHE_DIR, "capture");
export const DEFAULT_CHECKPOINT_FILE = join(APP_DIR, "download_progress.json");

/**
 * Get the session file path for a specific domain.
 */
export function getSessionPath(domain: string): string {
  // Sanitize domain for filesystem
  const safeDomain = domain.replace(/[^a-zA-Z0-9.-]/g, "_");
  return join(SESSIONS_DIR, `${safeDomain}.json`);
}

/**
 * Path of the copy written before maintenance commands touch the ledger.
 */
export function getBackupPath(checkpointFile: string): string {
  return `${checkpointFile}.backup`;
}

/**
 * Expand ~ to home directory in paths.
 */
export function expandPath(path: string): string {
  return untildify(path);
}
