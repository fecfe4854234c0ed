/**
 * Archive names. Titles become ASCII slugs via @sindresorhus/slugify.
 */
import slugifyLib from "@sindresorhus/slugify";

const MAX_SLUG_LENGTH = 100;
const FALLBACK_SLUG = "untitled";

/**
 * Filesystem-safe slug of a title, never empty and never ending in a hyphen.
 */
export function slugify(title: string): string {
  const slug = slugifyLib(title).slice(0, MAX_SLUG_LENGTH).replace(/-+$/, "");
  return slug === "" ? FALLBACK_SLUG : slug;
}

/**
 * One-based position plus slug, so folders sort in course order.
 * Example: createFolderName(0, "Introduction") → "01-introduction"
 */
export function createFolderName(index: number, title: string): string {
  return `${String(index + 1).padStart(2, "0")}-${slugify(title)}`;
}
