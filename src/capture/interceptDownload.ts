/**
 * Interception strategy: capture fragments from the browser, then join
 * them into one MP4. The temp directory never outlives the call.
 */
import { dirname, join } from "node:path";
import { CAPTURE_DIR } from "../config/paths.js";
import { remuxConcatList } from "../downloader/shared/ffmpeg.js";
import { MediaError, toFailureResult } from "../downloader/shared/errors.js";
import type { DownloadResult } from "../downloader/shared/types.js";
import {
  ensureDir,
  getFileSize,
  mkdtemp,
  removeDir,
  removeFile,
  writeFile,
} from "../shared/fs.js";
import { errorMessage, silentLogger } from "../shared/logger.js";
import { type CaptureOutcome, type CaptureSessionOptions, runCapture } from "./captureSession.js";
import { FragmentStore } from "./fragmentStore.js";
import { DEFAULT_CAPTURE_POLICY } from "./policy.js";

export type RemuxFn = (workDir: string, listFile: string, outputPath: string) => Promise<void>;

export interface InterceptDownloadOptions extends Omit<CaptureSessionOptions, "store"> {
  /** Parent of the per-capture temp directory (default: the app cache) */
  tempRoot?: string;
  /** Joins the listed fragments (default: ffmpeg concat demuxer) */
  remux?: RemuxFn;
}

export interface InterceptDownloadResult extends DownloadResult {
  capture?: CaptureOutcome;
}

const CONCAT_LIST = "concat.txt";

/**
 * Removes every capture temp directory under root. Run at startup and on
 * shutdown, since an interrupted capture never reaches its own cleanup.
 */
export async function clearCaptureTemp(root: string = CAPTURE_DIR): Promise<void> {
  await removeDir(root);
}

export async function captureToFile(
  outputPath: string,
  options: InterceptDownloadOptions
): Promise<InterceptDownloadResult> {
  const policy = options.policy ?? DEFAULT_CAPTURE_POLICY;
  const logger = options.logger ?? silentLogger;
  const remux = options.remux ?? remuxConcatList;

  const root = options.tempRoot ?? CAPTURE_DIR;
  await ensureDir(root);
  const tempDir = await mkdtemp(join(root, "capture-"));
  const store = new FragmentStore(tempDir, { logger, segmentSeconds: policy.segmentSeconds });

  try {
    const capture = await runCapture({ ...options, store, policy, logger });
    const fragments = store.fragments();

    if (capture.reason === "interrupted") {
      return { ...new MediaError("Capture interrupted", "INTERRUPTED").toResult(), capture };
    }
    if (fragments.length === 0) {
      return {
        ...new MediaError(
          "No video fragments were captured",
          "NO_FRAGMENTS",
          undefined,
          `stopped: ${capture.reason}`
        ).toResult(),
        capture,
      };
    }
    if (capture.reason === "stuckAbandoned") {
      return {
        ...new MediaError(
          "Playback stayed stuck after every reload",
          "CAPTURE_STUCK",
          undefined,
          `${fragments.length} fragments captured`
        ).toResult(),
        capture,
      };
    }

    const ratio = capture.completionRatio;
    if (ratio !== null && ratio < policy.idleAcceptRatio) {
      logger.warn(`Capture incomplete: ${Math.round(ratio * 100)}% of expected fragments`);
    } else if (ratio !== null && ratio < policy.warnRatio) {
      logger.warn(`Capture slightly incomplete: ${Math.round(ratio * 100)}% of expected fragments`);
    }

    await writeFile(join(tempDir, CONCAT_LIST), store.buildConcatList());
    await ensureDir(dirname(outputPath));
    await remux(tempDir, CONCAT_LIST, outputPath);

    const size = await getFileSize(outputPath);
    if (size === null || size < policy.minOutputBytes) {
      await removeFile(outputPath);
      return {
        ...new MediaError(
          "Joined video is missing or too small",
          "OUTPUT_TOO_SMALL",
          undefined,
          `${size ?? 0} bytes from ${fragments.length} fragments`
        ).toResult(),
        capture,
      };
    }

    logger.debug(`Joined ${fragments.length} fragments (${size} bytes)`);
    return { success: true, outputPath, capture };
  } catch (error) {
    return toFailureResult(error, "CAPTURE_FAILED");
  } finally {
    try {
      await options.player.close();
    } catch (error) {
      logger.debug(`Could not close the capture page: ${errorMessage(error)}`);
    }
    await removeDir(tempDir);
  }
}
