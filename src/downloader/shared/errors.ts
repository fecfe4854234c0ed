import type { CommonErrorCode, DownloadResult } from "./types.js";

/**
 * Error thrown inside the pipeline's retry loops. Boundaries convert it to
 * a DownloadResult with toResult().
 */
export class MediaError extends Error {
  constructor(
    message: string,
    public readonly code: CommonErrorCode,
    public readonly statusCode?: number,
    public readonly details?: string,
    public readonly hint?: string
  ) {
    super(message);
    this.name = "MediaError";
  }

  toResult(): DownloadResult {
    return {
      success: false,
      error: this.message,
      errorCode: this.code,
      details: this.details,
      hint: this.hint,
    };
  }
}

/**
 * True for HTTP 403 failures, which escalate to browser interception.
 */
export function isForbiddenError(error: unknown): boolean {
  if (error instanceof MediaError && (error.code === "FORBIDDEN" || error.statusCode === 403)) {
    return true;
  }
  if (error instanceof Error) {
    return /\b403\b|forbidden/i.test(error.message);
  }
  return false;
}

/**
 * Errors that are not worth retrying with the same strategy.
 */
export function isTerminalMediaError(error: unknown): boolean {
  if (!(error instanceof MediaError)) return false;
  return (
    error.code === "FORBIDDEN" ||
    error.code === "INCOMPATIBLE_ENGINE" ||
    error.code === "FFMPEG_NOT_FOUND" ||
    error.code === "NO_STREAM" ||
    error.code === "INTERRUPTED"
  );
}

/**
 * Converts any thrown value into a failed DownloadResult.
 */
export function toFailureResult(error: unknown, fallbackCode: CommonErrorCode): DownloadResult {
  if (error instanceof MediaError) {
    return error.toResult();
  }
  return {
    success: false,
    error: error instanceof Error ? error.message : String(error),
    errorCode: fallbackCode,
  };
}

/**
 * Suggested next step for a failure code.
 */
export function remediationHint(code: CommonErrorCode | undefined): string {
  switch (code) {
    case "FORBIDDEN":
      return "the host refused the request; run `coursekeep login <url>` if the session expired";
    case "RATE_LIMITED":
      return "the host is rate limiting; wait a few minutes, then run `coursekeep retry-failed`";
    case "INCOMPATIBLE_ENGINE":
      return "use firefox (`--browser firefox`) for DASH manifests";
    case "FFMPEG_NOT_FOUND":
      return "install ffmpeg and make sure it is on PATH";
    case "NO_FRAGMENTS":
    case "CAPTURE_STUCK":
      return "run again with `--visible` to watch the player";
    case "OUTPUT_TOO_SMALL":
    case "MERGE_FAILED":
    case "FFMPEG_ERROR":
      return "the stream may be truncated; run `coursekeep retry-failed` later";
    case "NO_STREAM":
      return "the unit exposes no video manifest";
    default:
      return "run `coursekeep retry-failed` to try again";
  }
}
