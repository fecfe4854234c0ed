/**
 * Tuning for browser interception capture. Times are in seconds of media
 * or wall clock as named; the defaults suit HLS streams cut into 10 s
 * segments played at 4x.
 */
export interface CapturePolicy {
  /** Nominal media length of one fragment */
  segmentSeconds: number;
  /** Extra fragments allowed for in the estimate */
  fragmentBuffer: number;
  playbackRate: number;
  pollIntervalMs: number;
  /** Wall-clock interval between player nudges */
  nudgeIntervalSeconds: number;
  /** How far a nudge jumps ahead */
  forwardJumpSeconds: number;
  /** Nudges pause instead of jumping this close to the end */
  endGuardSeconds: number;
  /** Position this close to the end counts as ended */
  endReachedSeconds: number;
  /** Movement below this between nudges counts as stuck */
  stuckMovementSeconds: number;
  /** Stuck inside this window from the start means the player never started */
  startZoneSeconds: number;
  /** Size of the forced seek when stuck mid-video */
  forcedSeekSeconds: number;
  /** Forced seeks stop this far before the end */
  forcedSeekEndMarginSeconds: number;
  /** Stuck time before a forced seek */
  seekAfterStuckSeconds: number;
  /** Stuck time before a page reload */
  reloadAfterStuckSeconds: number;
  /** Stuck time before giving up once reloads are spent */
  abandonAfterStuckSeconds: number;
  maxReloads: number;
  /** Time without a new fragment before the idle rule applies */
  idleCutoffSeconds: number;
  completeRatio: number;
  idleAcceptRatio: number;
  partialAcceptRatio: number;
  /** Completion below this is reported as slightly incomplete */
  warnRatio: number;
  /** Duration change that means the page moved to another video */
  durationJumpSeconds: number;
  fragmentCeiling: number;
  minWaitSeconds: number;
  maxWaitSeconds: number;
  unknownDurationWaitSeconds: number;
  /** Remuxed output smaller than this is treated as a failure */
  minOutputBytes: number;
}

export const DEFAULT_CAPTURE_POLICY: CapturePolicy = {
  segmentSeconds: 10,
  fragmentBuffer: 10,
  playbackRate: 4,
  pollIntervalMs: 1000,
  nudgeIntervalSeconds: 15,
  forwardJumpSeconds: 60,
  endGuardSeconds: 15,
  endReachedSeconds: 10,
  stuckMovementSeconds: 2,
  startZoneSeconds: 5,
  forcedSeekSeconds: 120,
  forcedSeekEndMarginSeconds: 20,
  seekAfterStuckSeconds: 30,
  reloadAfterStuckSeconds: 60,
  abandonAfterStuckSeconds: 90,
  maxReloads: 2,
  idleCutoffSeconds: 60,
  completeRatio: 0.95,
  idleAcceptRatio: 0.7,
  partialAcceptRatio: 0.85,
  warnRatio: 0.9,
  durationJumpSeconds: 30,
  fragmentCeiling: 3000,
  minWaitSeconds: 600,
  maxWaitSeconds: 1800,
  unknownDurationWaitSeconds: 900,
  minOutputBytes: 100 * 1024,
};

/**
 * Fragments expected for a video of the given duration, or null if unknown.
 */
export function expectedFragmentCount(
  durationSeconds: number | null,
  policy: CapturePolicy = DEFAULT_CAPTURE_POLICY
): number | null {
  if (!durationSeconds || durationSeconds <= 0) return null;
  return Math.floor(durationSeconds / policy.segmentSeconds) + policy.fragmentBuffer;
}

/**
 * Wall-clock budget for one capture session.
 */
export function maxCaptureSeconds(
  durationSeconds: number | null,
  policy: CapturePolicy = DEFAULT_CAPTURE_POLICY
): number {
  if (!durationSeconds || durationSeconds <= 0) return policy.unknownDurationWaitSeconds;
  const estimate = Math.floor((durationSeconds / policy.playbackRate) * 3) + 120;
  return Math.min(policy.maxWaitSeconds, Math.max(policy.minWaitSeconds, estimate));
}
