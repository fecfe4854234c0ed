/**
 * Generic URL utilities for parsing and manipulation.
 */

/**
 * Pathname of a URL, tolerating relative or malformed input.
 *
 * @example
 * getPathname("https://cdn.example.com/v/seg-1.ts?token=abc")
 * // => "/v/seg-1.ts"
 */
export function getPathname(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url.split(/[?#]/)[0] ?? url;
  }
}

/**
 * Stable id for a course, path or unit: its URL path without a trailing slash.
 *
 * @example
 * getUrlPath("https://school.example.com/courses/intro/?tab=units")
 * // => "/courses/intro"
 */
export function getUrlPath(url: string): string {
  const path = getPathname(url).replace(/\/+$/, "");
  return path === "" ? "/" : path;
}

/**
 * Host name used to key stored browser sessions.
 *
 * @example
 * getDomain("https://school.example.com/courses/intro")
 * // => "school.example.com"
 */
export function getDomain(url: string): string {
  return new URL(url).hostname;
}
