/**
 * Finds streaming manifests by watching a page's network responses.
 */
import type { Page, Response } from "playwright";
import type { ManifestFormat, ManifestSource } from "../downloader/shared/types.js";
import { getPathname } from "../shared/url.js";
import { gotoWithRetry, type NavigationOptions } from "./navigation.js";

export function classifyManifestUrl(url: string): ManifestFormat | null {
  const path = getPathname(url).toLowerCase();
  if (path.endsWith(".m3u8")) return "hls";
  if (path.endsWith(".mpd")) return "dash";
  return null;
}

/**
 * Keeps the first manifest of each format. Later HLS responses are the
 * variant playlists the player picks from the master.
 */
export class ManifestSniffer {
  private readonly found = new Map<ManifestFormat, string>();

  observe(url: string): boolean {
    const format = classifyManifestUrl(url);
    if (!format || this.found.has(format)) return false;
    this.found.set(format, url);
    return true;
  }

  /** HLS when seen, else DASH */
  get primary(): ManifestSource | null {
    return this.source("hls") ?? this.source("dash");
  }

  /** The other format, when both were seen */
  get fallback(): ManifestSource | null {
    return this.found.has("hls") ? this.source("dash") : null;
  }

  private source(format: ManifestFormat): ManifestSource | null {
    const url = this.found.get(format);
    return url ? { url, format } : null;
  }
}

export interface SniffOptions extends NavigationOptions {
  /** How long to listen after the page settles (default: 5000) */
  listenMs?: number;
}

/**
 * Opens the page and collects the manifests its player requests.
 */
/* v8 ignore start */
export async function sniffManifests(
  page: Page,
  url: string,
  options: SniffOptions = {}
): Promise<ManifestSniffer> {
  const sniffer = new ManifestSniffer();
  const listener = (response: Response): void => {
    if (response.ok()) sniffer.observe(response.url());
  };

  page.on("response", listener);
  try {
    await gotoWithRetry(page, url, options);
    await page.waitForTimeout(options.listenMs ?? 5000);
  } finally {
    page.off("response", listener);
  }
  return sniffer;
}
/* v8 ignore stop */
