/**
 * Direct HLS strategy: fetch the master playlist, pick a variant by the
 * configured quality and remux it with ffmpeg.
 */
import { HTTPError } from "ky";
import type { VideoQuality } from "../config/schema.js";
import { buildMediaHeaders, http } from "../shared/http.js";
import { MediaError } from "./shared/errors.js";
import { checkFfmpeg, remuxManifest } from "./shared/ffmpeg.js";
import { parseHLSPlaylist, selectVariant } from "./shared/hlsPlaylist.js";
import type { DownloadOptions, DownloadResultWithDuration, HLSQuality } from "./shared/types.js";

// ============================================================================
// Types
// ============================================================================

export type HLSDownloadResult = DownloadResultWithDuration;

export interface HLSDownloadOptions extends DownloadOptions {
  quality?: VideoQuality | undefined;
}

// ============================================================================
// HLS Quality Fetching
// ============================================================================

/**
 * MediaError for a non-2xx response, keeping 403 distinguishable.
 */
export function statusError(status: number, what: string): MediaError {
  return new MediaError(
    `${what} returned ${status}`,
    status === 403 ? "FORBIDDEN" : status === 429 ? "RATE_LIMITED" : "FETCH_FAILED",
    status
  );
}

/**
 * Converts a ky failure into a MediaError.
 */
export function toFetchError(error: unknown, what: string): MediaError {
  if (error instanceof HTTPError) {
    return statusError(error.response.status, what);
  }
  if (error instanceof MediaError) return error;
  return new MediaError(
    `Failed to fetch ${what}: ${error instanceof Error ? error.message : String(error)}`,
    "NETWORK_ERROR"
  );
}

/**
 * Fetches an HLS master playlist and parses quality variants.
 * A media playlist yields an empty list.
 */
/* v8 ignore start */
export async function fetchHLSQualities(
  masterUrl: string,
  options: Pick<DownloadOptions, "cookies" | "referer"> = {}
): Promise<HLSQuality[]> {
  try {
    const response = await http.get(masterUrl, { headers: buildMediaHeaders(masterUrl, options) });
    const content = await response.text();
    if (!content.startsWith("#EXTM3U")) {
      throw new MediaError(
        "HLS manifest is not a playlist",
        "PARSE_ERROR",
        undefined,
        content.substring(0, 80)
      );
    }
    return parseHLSPlaylist(content, response.url || masterUrl);
  } catch (error) {
    throw toFetchError(error, "HLS manifest");
  }
}

// ============================================================================
// HLS Download
// ============================================================================

/**
 * Downloads an HLS stream at the configured quality.
 */
export async function downloadHLSVideo(
  masterUrl: string,
  outputPath: string,
  options: HLSDownloadOptions = {}
): Promise<HLSDownloadResult> {
  const { quality = "highest", onProgress } = options;

  if (!(await checkFfmpeg())) {
    return {
      success: false,
      error: "ffmpeg is not installed. Please install ffmpeg to download HLS videos.",
      errorCode: "FFMPEG_NOT_FOUND",
    };
  }

  onProgress?.({ phase: "preparing", percent: 0 });

  try {
    const variants = await fetchHLSQualities(masterUrl, options);
    const variant = selectVariant(variants, quality);
    const { duration } = await remuxManifest(variant?.url ?? masterUrl, outputPath, "hls", options);
    return { success: true, outputPath, duration };
  } catch (error) {
    return toFetchError(error, "HLS manifest").toResult();
  }
}
/* v8 ignore stop */
