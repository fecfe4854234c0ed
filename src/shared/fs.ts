import { access, cp, mkdir, readFile, rename, rm, stat, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

/**
 * Check if a file or directory exists.
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true });
}

/**
 * Write a file, creating parent directories if needed.
 */
export async function outputFile(path: string, data: string): Promise<void> {
  await ensureDir(dirname(path));
  await writeFile(path, data, "utf-8");
}

/**
 * Write JSON to a file, creating parent directories if needed.
 */
export async function outputJson(path: string, data: unknown): Promise<void> {
  await outputFile(path, JSON.stringify(data, null, 2));
}

/**
 * Write JSON through a sibling temp file and rename it over the target,
 * so readers only ever see the previous or the new document.
 */
export async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
  const tempPath = `${path}.${process.pid}.tmp`;
  await outputJson(tempPath, data);
  try {
    await rename(tempPath, path);
  } catch (error) {
    await removeFile(tempPath);
    throw error;
  }
}

/**
 * Read and parse a JSON file.
 * Returns null if file doesn't exist or can't be parsed.
 */
export async function readJson(path: string): Promise<unknown> {
  try {
    const content = await readFile(path, "utf-8");
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch {
    return null;
  }
}

/**
 * Remove a file if it exists.
 */
export async function removeFile(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Remove a directory and everything below it.
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Copy a directory tree, creating the destination's parents.
 */
export async function copyDir(source: string, destination: string): Promise<void> {
  await ensureDir(dirname(destination));
  await cp(source, destination, { recursive: true });
}

/**
 * Get file size in bytes, or null if file doesn't exist.
 */
export async function getFileSize(path: string): Promise<number | null> {
  try {
    const stats = await stat(path);
    return stats.size;
  } catch {
    return null;
  }
}

// Re-export commonly used fs/promises functions
export { copyFile, mkdtemp, readFile, writeFile } from "node:fs/promises";
