/**
 * Shared types for the media acquisition pipeline.
 */

// ============================================================================
// Download Result Types
// ============================================================================

/**
 * Base result interface for all download operations.
 */
export interface DownloadResult {
  success: boolean;
  error?: string | undefined;
  errorCode?: CommonErrorCode | undefined;
  details?: string | undefined;
  /** Suggested next step for the operator */
  hint?: string | undefined;
  outputPath?: string | undefined;
}

/**
 * Extended result with duration info (used by ffmpeg downloads).
 */
export interface DownloadResultWithDuration extends DownloadResult {
  duration?: number | undefined;
}

// ============================================================================
// Progress Types
// ============================================================================

/**
 * Download phase indicators.
 */
export type DownloadPhase = "preparing" | "downloading" | "capturing" | "merging" | "complete";

/**
 * Unified progress callback interface.
 */
export interface DownloadProgress {
  /** Progress percentage (0-100) */
  percent: number;
  phase?: DownloadPhase | undefined;
  /** Fragments captured (interception only) */
  fragments?: number | undefined;
  /** Fragments expected (interception only) */
  expectedFragments?: number | undefined;
}

export type ProgressCallback = (progress: DownloadProgress) => void;

// ============================================================================
// Manifests
// ============================================================================

export type ManifestFormat = "hls" | "dash";

/**
 * A streaming manifest the site exposes for a video.
 */
export interface ManifestSource {
  url: string;
  format: ManifestFormat;
}

/**
 * HLS quality variant information.
 */
export interface HLSQuality {
  /** Human-readable label (e.g., "1080p") */
  label: string;
  url: string;
  /** Bandwidth in bits per second */
  bandwidth: number;
  width?: number | undefined;
  height?: number | undefined;
}

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Error codes used across the pipeline.
 */
export type CommonErrorCode =
  // Access errors
  | "FORBIDDEN"
  | "RATE_LIMITED"
  // Network errors
  | "NETWORK_ERROR"
  | "FETCH_FAILED"
  // Download errors
  | "DOWNLOAD_FAILED"
  | "NO_STREAM"
  | "NO_FRAGMENTS"
  | "OUTPUT_TOO_SMALL"
  | "CAPTURE_STUCK"
  | "CAPTURE_FAILED"
  | "INTERRUPTED"
  // Tool errors
  | "FFMPEG_NOT_FOUND"
  | "FFMPEG_ERROR"
  | "MERGE_FAILED"
  // Configuration errors
  | "INCOMPATIBLE_ENGINE"
  | "PARSE_ERROR"
  | "UNKNOWN_ERROR";

// ============================================================================
// Download Options
// ============================================================================

/**
 * Common options for authenticated media requests.
 */
export interface DownloadOptions {
  /** Cookie header value from the browser session */
  cookies?: string | undefined;
  /** Page the video is embedded in */
  referer?: string | undefined;
  onProgress?: ProgressCallback | undefined;
}
