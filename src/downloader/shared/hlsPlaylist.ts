/**
 * HLS master playlist parsing and variant selection.
 */
import * as HLS from "hls-parser";
import type { VideoQuality } from "../../config/schema.js";
import type { HLSQuality } from "./types.js";

/**
 * Parses an HLS master playlist to extract quality variants.
 * Returns variants sorted by bandwidth, highest first; a media playlist
 * or unparseable content yields an empty list.
 */
export function parseHLSPlaylist(content: string, baseUrl: string): HLSQuality[] {
  let playlist: ReturnType<typeof HLS.parse>;
  try {
    playlist = HLS.parse(content);
  } catch {
    return [];
  }

  if (!("variants" in playlist)) {
    return [];
  }

  const variants = playlist.variants.map((variant): HLSQuality => {
    const bandwidth = variant.bandwidth ?? 0;
    const width = variant.resolution?.width;
    const height = variant.resolution?.height;
    const label = height ? `${height}p` : `${Math.round(bandwidth / 1000)}k`;
    return { label, url: new URL(variant.uri, baseUrl).href, bandwidth, width, height };
  });

  variants.sort((a, b) => b.bandwidth - a.bandwidth);
  return variants;
}

/**
 * Extracts the target height from a quality setting like "720p".
 */
export function parseQualityHeight(quality: VideoQuality): number | null {
  const match = /^(\d+)p$/i.exec(quality);
  return match?.[1] ? parseInt(match[1], 10) : null;
}

/**
 * Picks a variant for the configured quality.
 *
 * - `highest` / `lowest` pick by bandwidth.
 * - `NNNp` picks that height, else the best variant below it, else the
 *   smallest variant above it.
 */
export function selectVariant(variants: HLSQuality[], quality: VideoQuality): HLSQuality | null {
  if (variants.length === 0) return null;
  const sorted = [...variants].sort((a, b) => b.bandwidth - a.bandwidth);

  if (quality === "lowest") {
    return sorted[sorted.length - 1] ?? null;
  }

  const height = parseQualityHeight(quality);
  if (height === null) {
    return sorted[0] ?? null;
  }

  const exact = sorted.find((variant) => variant.height === height);
  if (exact) return exact;

  const below = sorted.find((variant) => variant.height !== undefined && variant.height < height);
  if (below) return below;

  return sorted[sorted.length - 1] ?? null;
}
