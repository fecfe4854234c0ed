/**
 * DASH strategy: remux an MPD manifest with ffmpeg.
 */
import { MediaError } from "./shared/errors.js";
import { checkFfmpeg, remuxManifest } from "./shared/ffmpeg.js";
import type { DownloadOptions, DownloadResultWithDuration } from "./shared/types.js";

/**
 * Downloads a DASH stream. The content host checks origin and referrer,
 * which Chromium does not send the way the host expects, so the pipeline
 * only calls this for other engines.
 */
/* v8 ignore start */
export async function downloadDashVideo(
  mpdUrl: string,
  outputPath: string,
  options: DownloadOptions = {}
): Promise<DownloadResultWithDuration> {
  if (!(await checkFfmpeg())) {
    return {
      success: false,
      error: "ffmpeg is not installed. Please install ffmpeg to download DASH videos.",
      errorCode: "FFMPEG_NOT_FOUND",
    };
  }

  options.onProgress?.({ phase: "preparing", percent: 0 });

  try {
    const { duration } = await remuxManifest(mpdUrl, outputPath, "dash", options);
    return { success: true, outputPath, duration };
  } catch (error) {
    if (error instanceof MediaError) return error.toResult();
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
      errorCode: "FFMPEG_ERROR",
    };
  }
}
/* v8 ignore stop */
