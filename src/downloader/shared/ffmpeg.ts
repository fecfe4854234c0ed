/**
 * FFmpeg utilities shared by the remuxing strategies.
 */
import { dirname } from "node:path";
import { execa } from "execa";
import { buildMediaHeaders } from "../../shared/http.js";
import { ensureDir, removeFile } from "../../shared/fs.js";
import { MediaError } from "./errors.js";
import type { DownloadOptions } from "./types.js";

// ============================================================================
// FFmpeg Availability
// ============================================================================

/**
 * Checks if ffmpeg is available on the system.
 */
/* v8 ignore next 8 */
export async function checkFfmpeg(): Promise<boolean> {
  try {
    await execa("ffmpeg", ["-version"]);
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// FFmpeg Progress Parsing
// ============================================================================

function parseTimestamp(pattern: RegExp, output: string): number {
  const match = pattern.exec(output);
  if (!match) return 0;

  const [, hours = "0", mins = "0", secs = "0", centis = "0"] = match;
  return (
    parseInt(hours, 10) * 3600 +
    parseInt(mins, 10) * 60 +
    parseInt(secs, 10) +
    parseInt(centis, 10) / 100
  );
}

/**
 * Parses the input duration from ffmpeg output.
 * @returns Duration in seconds, or 0 if not found.
 */
export function parseFfmpegDuration(output: string): number {
  return parseTimestamp(/Duration:\s*(\d{2}):(\d{2}):(\d{2})\.(\d{2})/, output);
}

/**
 * Parses the current position from ffmpeg progress output.
 * @returns Current time in seconds, or 0 if not found.
 */
export function parseFfmpegTime(output: string): number {
  return parseTimestamp(/time=(\d{2}):(\d{2}):(\d{2})\.(\d{2})/, output);
}

// ============================================================================
// Argument Builders
// ============================================================================

/**
 * Formats request headers the way ffmpeg's -headers option expects them.
 */
export function formatHeaderArg(headers: Record<string, string>): string {
  return (
    Object.entries(headers)
      .map(([name, value]) => `${name}: ${value}`)
      .join("\r\n") + "\r\n"
  );
}

/**
 * Arguments for a lossless remux of a remote manifest into MP4.
 */
export function buildManifestRemuxArgs(
  manifestUrl: string,
  outputPath: string,
  format: "hls" | "dash",
  options: Pick<DownloadOptions, "cookies" | "referer"> = {}
): string[] {
  const args = ["-y", "-hide_banner", "-loglevel", "warning", "-stats", "-nostdin"];
  args.push("-headers", formatHeaderArg(buildMediaHeaders(manifestUrl, options)));

  if (format === "dash") {
    args.push(
      "-protocol_whitelist",
      "file,http,https,tcp,tls,crypto",
      "-allowed_extensions",
      "ALL"
    );
  }

  args.push("-i", manifestUrl, "-c", "copy");
  if (format === "hls") {
    args.push("-bsf:a", "aac_adtstoasc");
  }
  args.push(outputPath);
  return args;
}

/**
 * Arguments for joining the fragments listed in a concat file.
 */
export function buildConcatArgs(listFile: string, outputPath: string): string[] {
  return ["-nostdin", "-f", "concat", "-safe", "0", "-i", listFile, "-c", "copy", "-y", outputPath];
}

// ============================================================================
// FFmpeg Operations
// ============================================================================

/**
 * Remuxes a remote HLS or DASH manifest into a local MP4.
 * Removes the partial output when ffmpeg fails.
 */
/* v8 ignore start */
export async function remuxManifest(
  manifestUrl: string,
  outputPath: string,
  format: "hls" | "dash",
  options: DownloadOptions = {}
): Promise<{ duration: number }> {
  const { onProgress } = options;
  await ensureDir(dirname(outputPath));

  let duration = 0;
  let lastProgressUpdate = 0;

  try {
    const subprocess = execa("ffmpeg", buildManifestRemuxArgs(manifestUrl, outputPath, format, options));

    subprocess.stderr?.on("data", (data: Buffer) => {
      const output = data.toString();
      if (duration === 0) {
        duration = parseFfmpegDuration(output);
      }

      const time = parseFfmpegTime(output);
      const now = Date.now();
      if (time > 0 && duration > 0 && onProgress && now - lastProgressUpdate > 200) {
        lastProgressUpdate = now;
        onProgress({
          phase: "downloading",
          percent: Math.round(Math.min((time / duration) * 100, 100)),
        });
      }
    });

    await subprocess;
    onProgress?.({ phase: "complete", percent: 100 });
    return { duration };
  } catch (error) {
    await removeFile(outputPath);
    const message = error instanceof Error ? error.message : String(error);
    throw new MediaError(
      `ffmpeg could not remux the ${format.toUpperCase()} stream`,
      /\b403\b|forbidden/i.test(message) ? "FORBIDDEN" : "FFMPEG_ERROR",
      /\b403\b/.test(message) ? 403 : undefined,
      message
    );
  }
}

/**
 * Joins captured fragments listed in `listFile` into one MP4.
 * Runs inside `workDir` so the list can use bare file names.
 */
export async function remuxConcatList(
  workDir: string,
  listFile: string,
  outputPath: string
): Promise<void> {
  try {
    await execa("ffmpeg", buildConcatArgs(listFile, outputPath), { cwd: workDir });
  } catch (error) {
    throw new MediaError(
      "ffmpeg could not join the captured fragments",
      "MERGE_FAILED",
      undefined,
      error instanceof Error ? error.message : String(error)
    );
  }
}
/* v8 ignore stop */

