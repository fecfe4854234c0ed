/**
 * Media acquisition cascade: direct manifest, fallback manifest, then
 * browser interception when the host answers 403.
 */
import type { BrowserEngine, VideoQuality } from "../config/schema.js";
import { getFileSize, removeFile } from "../shared/fs.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import { type RetryOptions, withRetry } from "../shared/retry.js";
import { downloadDashVideo } from "./dashDownloader.js";
import { downloadHLSVideo, type HLSDownloadOptions } from "./hlsDownloader.js";
import {
  isForbiddenError,
  isTerminalMediaError,
  MediaError,
  remediationHint,
  toFailureResult,
} from "./shared/errors.js";
import type {
  CommonErrorCode,
  DownloadResult,
  ManifestSource,
  ProgressCallback,
} from "./shared/types.js";

// ============================================================================
// Types
// ============================================================================

export type StrategyName = "hls" | "dash" | "intercept";

const STRATEGY_LABELS: Record<StrategyName, string> = {
  hls: "HLS download",
  dash: "DASH download",
  intercept: "Interception capture",
};

export interface AttemptRecord {
  strategy: StrategyName;
  url: string;
  success: boolean;
  error?: string | undefined;
  errorCode?: CommonErrorCode | undefined;
  hint?: string | undefined;
}

export interface AcquisitionResult extends DownloadResult {
  strategy?: StrategyName | undefined;
  attempts: AttemptRecord[];
}

export interface VideoRequest {
  /** Page that embeds the player, used for interception */
  pageUrl: string;
  primary: ManifestSource | null;
  fallback: ManifestSource | null;
  outputPath: string;
  cookies?: string | undefined;
}

export type ManifestStrategy = (
  manifestUrl: string,
  outputPath: string,
  options: HLSDownloadOptions
) => Promise<DownloadResult>;

export type InterceptStrategy = (pageUrl: string, outputPath: string) => Promise<DownloadResult>;

export interface PipelineOptions {
  engine: BrowserEngine;
  quality?: VideoQuality | undefined;
  retry?: Pick<RetryOptions, "attempts" | "baseDelayMs" | "sleep"> | undefined;
  /** Outputs below this size count as failures (default: 100 KiB) */
  minOutputBytes?: number | undefined;
  logger?: Logger | undefined;
  onProgress?: ProgressCallback | undefined;
  hls?: ManifestStrategy | undefined;
  dash?: ManifestStrategy | undefined;
  /** Browser capture; without it a 403 ends the cascade */
  intercept?: InterceptStrategy | undefined;
}

export const MIN_OUTPUT_BYTES = 100 * 1024;

// ============================================================================
// Cascade
// ============================================================================

/**
 * Produces a local MP4 for one unit. Never throws: every failure is logged
 * with its strategy and hint, and the last one is returned.
 */
export async function acquireVideo(
  request: VideoRequest,
  options: PipelineOptions
): Promise<AcquisitionResult> {
  const logger = options.logger ?? silentLogger;
  const attempts: AttemptRecord[] = [];
  const sources = uniqueSources(request);

  if (sources.length === 0) {
    const hint = remediationHint("NO_STREAM");
    logger.warn(`No video manifest for ${request.pageUrl} (${hint})`);
    return {
      success: false,
      error: "No video manifest found",
      errorCode: "NO_STREAM",
      hint,
      attempts,
    };
  }

  const context: AttemptContext = { request, options, logger, attempts };
  const chromium = options.engine === "chromium";

  // DASH-only units are refused on chromium; with another source DASH is still tried
  if (chromium && sources.every((source) => source.format === "dash")) {
    for (const source of sources) {
      record(
        context,
        "dash",
        source.url,
        new MediaError(
          "DASH manifests cannot be fetched with the chromium engine",
          "INCOMPATIBLE_ENGINE"
        )
      );
    }
    return {
      success: false,
      error: "Only DASH manifests are available and the chromium engine cannot fetch them",
      errorCode: "INCOMPATIBLE_ENGINE",
      hint: remediationHint("INCOMPATIBLE_ENGINE"),
      attempts,
    };
  }

  let lastFailure: DownloadResult | null = null;
  let forbidden = false;

  for (const source of sources) {
    if (source.format === "dash" && chromium) {
      logger.warn("Trying a DASH manifest with chromium, which may be refused");
    }

    const strategy =
      source.format === "hls"
        ? (options.hls ?? downloadHLSVideo)
        : (options.dash ?? downloadDashVideo);
    const outcome = await runAttempt(context, source.format, source.url, true, () =>
      strategy(source.url, request.outputPath, {
        quality: options.quality,
        cookies: request.cookies,
        referer: request.pageUrl,
        onProgress: options.onProgress,
      })
    );
    if (outcome.result.success) {
      return { ...outcome.result, strategy: source.format, attempts };
    }
    lastFailure = outcome.result;
    forbidden ||= outcome.forbidden;
  }

  if (forbidden) {
    const intercept = options.intercept;
    if (intercept) {
      logger.info("Manifest access was refused, capturing from the browser instead");
      const outcome = await runAttempt(context, "intercept", request.pageUrl, false, () =>
        intercept(request.pageUrl, request.outputPath)
      );
      if (outcome.result.success) {
        return { ...outcome.result, strategy: "intercept", attempts };
      }
      lastFailure = outcome.result;
    } else {
      logger.debug("Browser interception is not available for this run");
    }
  }

  return {
    success: false,
    error: lastFailure?.error ?? "Download failed",
    errorCode: lastFailure?.errorCode ?? "DOWNLOAD_FAILED",
    details: lastFailure?.details,
    hint: lastFailure?.hint,
    attempts,
  };
}

// ============================================================================
// Attempts
// ============================================================================

interface AttemptContext {
  request: VideoRequest;
  options: PipelineOptions;
  logger: Logger;
  attempts: AttemptRecord[];
}

interface AttemptOutcome {
  result: DownloadResult;
  forbidden: boolean;
}

async function runAttempt(
  context: AttemptContext,
  strategy: StrategyName,
  url: string,
  retried: boolean,
  fn: () => Promise<DownloadResult>
): Promise<AttemptOutcome> {
  const { options, request, logger } = context;
  const label = STRATEGY_LABELS[strategy];
  const minBytes = options.minOutputBytes ?? MIN_OUTPUT_BYTES;

  const run = async (): Promise<DownloadResult> => {
    const result = await fn();
    if (!result.success) {
      throw resultToError(result);
    }
    await verifyOutput(request.outputPath, minBytes);
    return { ...result, outputPath: request.outputPath };
  };

  try {
    const result = retried
      ? await withRetry(run, {
          ...options.retry,
          label,
          logger,
          shouldRetry: (error) => !isTerminalMediaError(error) && !isForbiddenError(error),
        })
      : await run();
    context.attempts.push({ strategy, url, success: true });
    logger.debug(`${label} succeeded`);
    return { result, forbidden: false };
  } catch (error) {
    return { result: record(context, strategy, url, error), forbidden: isForbiddenError(error) };
  }
}

/**
 * Logs a failed attempt and appends it to the attempt log.
 */
function record(
  context: AttemptContext,
  strategy: StrategyName,
  url: string,
  error: unknown
): DownloadResult {
  const failure = toFailureResult(error, "DOWNLOAD_FAILED");
  const hint = failure.hint ?? remediationHint(failure.errorCode);
  context.attempts.push({
    strategy,
    url,
    success: false,
    error: failure.error,
    errorCode: failure.errorCode,
    hint,
  });
  context.logger.warn(`${STRATEGY_LABELS[strategy]} failed: ${failure.error} (${hint})`);
  return { ...failure, hint };
}

function resultToError(result: DownloadResult): MediaError {
  const code = result.errorCode ?? "DOWNLOAD_FAILED";
  return new MediaError(
    result.error ?? "Download failed",
    code,
    code === "FORBIDDEN" ? 403 : undefined,
    result.details,
    result.hint
  );
}

/**
 * Rejects missing or trivially small outputs, removing the latter.
 */
export async function verifyOutput(outputPath: string, minBytes: number): Promise<void> {
  const size = await getFileSize(outputPath);
  if (size === null) {
    throw new MediaError("No output file was written", "DOWNLOAD_FAILED");
  }
  if (size < minBytes) {
    await removeFile(outputPath);
    throw new MediaError(
      `Output is only ${size} bytes`,
      "OUTPUT_TOO_SMALL",
      undefined,
      `expected at least ${minBytes} bytes`
    );
  }
}

function uniqueSources(request: VideoRequest): ManifestSource[] {
  const sources: ManifestSource[] = [];
  for (const source of [request.primary, request.fallback]) {
    if (source && !sources.some((known) => known.url === source.url)) {
      sources.push(source);
    }
  }
  return sources;
}
