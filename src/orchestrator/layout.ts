import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { pathExists } from "../shared/fs.js";
import { createFolderName, slugify } from "../shared/slug.js";
import { getPathname } from "../shared/url.js";

// ============================================
// Pure functions - testable without mocking
// ============================================

/**
 * Where a course sits inside a learning path (index is zero-based).
 */
export interface CoursePlacement {
  pathTitle: string;
  index: number;
}

export function getPathDir(outputDir: string, pathTitle: string): string {
  return join(outputDir, slugify(pathTitle));
}

/**
 * Courses inside a path get a numbered folder under the path folder;
 * standalone courses sit directly in the output directory.
 */
export function getCourseDir(
  outputDir: string,
  courseTitle: string,
  placement?: CoursePlacement
): string {
  if (!placement) {
    return join(outputDir, slugify(courseTitle));
  }
  return join(
    getPathDir(outputDir, placement.pathTitle),
    createFolderName(placement.index, courseTitle)
  );
}

export function getSectionDir(courseDir: string, sectionIndex: number, sectionTitle: string): string {
  return join(courseDir, createFolderName(sectionIndex, sectionTitle));
}

/**
 * Gets the base filename for a unit (without extension).
 * Format: "01-unit-name"
 */
export function getUnitBasename(unitIndex: number, unitTitle: string): string {
  return createFolderName(unitIndex, unitTitle);
}

export interface UnitPaths {
  video: string;
  summary: string;
  resourcesDir: string;
  readings: string;
  page: string;
  subtitle: (lang: string) => string;
}

/**
 * All artifact paths of one unit, relative to its section folder.
 */
export function getUnitPaths(sectionDir: string, unitIndex: number, unitTitle: string): UnitPaths {
  const base = join(sectionDir, getUnitBasename(unitIndex, unitTitle));
  return {
    video: `${base}.mp4`,
    summary: `${base}_summary.md`,
    resourcesDir: `${base}_resources`,
    readings: `${base}_readings.md`,
    page: `${base}.html`,
    subtitle: (lang) => `${base}.${sanitizeFilename(lang)}.vtt`,
  };
}

/**
 * Replaces characters that are invalid in filenames on common systems.
 */
export function sanitizeFilename(filename: string): string {
  return filename.replace(/[<>:"/\\|?*]/g, "_");
}

/**
 * Picks a local file name for a resource link: the last path segment of the
 * URL when it has an extension, otherwise the slugified title.
 */
export function getResourceFilename(title: string, url: string): string {
  const segment = getPathname(url).split("/").pop() ?? "";
  if (/\.[a-z0-9]{1,8}$/i.test(segment)) {
    return sanitizeFilename(safeDecode(segment));
  }
  return slugify(title);
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * True when a folder name is the numbered folder of the given course.
 */
export function isCourseFolder(folderName: string, courseTitle: string): boolean {
  return new RegExp(`^\\d+-${escapeRegExp(slugify(courseTitle))}$`).test(folderName);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// ============================================
// I/O functions - require filesystem access
// ============================================

/**
 * Locates an already archived course: first inside the folders of the
 * learning paths that own it, then as a standalone course.
 */
export async function findCourseDir(
  outputDir: string,
  courseTitle: string,
  pathTitles: string[]
): Promise<string | null> {
  for (const pathTitle of pathTitles) {
    const pathDir = getPathDir(outputDir, pathTitle);
    if (!(await pathExists(pathDir))) continue;

    const entries = await readdir(pathDir, { withFileTypes: true });
    const match = entries.find(
      (entry) => entry.isDirectory() && isCourseFolder(entry.name, courseTitle)
    );
    if (match) {
      return join(pathDir, match.name);
    }
  }

  const standalone = getCourseDir(outputDir, courseTitle);
  return (await pathExists(standalone)) ? standalone : null;
}
