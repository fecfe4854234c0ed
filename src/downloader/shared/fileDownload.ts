/**
 * Direct file downloads, streamed to disk through the shared ky client.
 * Used for attachments, subtitles and other non-video artifacts.
 */
import { createWriteStream } from "node:fs";
import { rename } from "node:fs/promises";
import { dirname } from "node:path";
import { finished } from "node:stream/promises";
import { HTTPError } from "ky";
import { buildMediaHeaders, http } from "../../shared/http.js";
import { ensureDir, pathExists, removeFile } from "../../shared/fs.js";
import type { DownloadOptions, DownloadResult } from "./types.js";

export interface FileDownloadOptions extends DownloadOptions {
  /** Replace an existing file (default: false) */
  overwrite?: boolean | undefined;
}

/**
 * Downloads a file via HTTP into a sibling temp file, then renames it.
 * Existing files are kept unless overwrite is set.
 */
/* v8 ignore start */
export async function downloadFile(
  url: string,
  outputPath: string,
  options: FileDownloadOptions = {}
): Promise<DownloadResult> {
  const { onProgress, overwrite = false } = options;

  if (!overwrite && (await pathExists(outputPath))) {
    return { success: true, outputPath };
  }

  await ensureDir(dirname(outputPath));
  const tempPath = `${outputPath}.tmp`;

  try {
    const response = await http.get(url, { headers: buildMediaHeaders(url, options) });
    if (!response.body) {
      return { success: false, error: "No response body", errorCode: "DOWNLOAD_FAILED" };
    }

    const contentLength = response.headers.get("content-length");
    const total = contentLength ? parseInt(contentLength, 10) : 0;
    const fileStream = createWriteStream(tempPath);
    const reader = response.body.getReader();
    let downloaded = 0;

    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      fileStream.write(value);
      downloaded += value.length;
      if (onProgress && total > 0) {
        onProgress({ percent: (downloaded / total) * 100, phase: "downloading" });
      }
    }

    fileStream.end();
    await finished(fileStream);
    await rename(tempPath, outputPath);
    onProgress?.({ percent: 100, phase: "complete" });

    return { success: true, outputPath };
  } catch (error) {
    await removeFile(tempPath);
    if (error instanceof HTTPError) {
      const status = error.response.status;
      return {
        success: false,
        error: `HTTP ${status}`,
        errorCode: status === 403 ? "FORBIDDEN" : "DOWNLOAD_FAILED",
      };
    }
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
      errorCode: "NETWORK_ERROR",
    };
  }
}
/* v8 ignore stop */
