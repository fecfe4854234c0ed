/**
 * Drives one interception capture: polls the player, nudges it forward,
 * and applies the monitor's decisions until it says stop.
 */
import { errorMessage, silentLogger, type Logger } from "../shared/logger.js";
import {
  type CaptureAction,
  CaptureMonitor,
  type PlayerSnapshot,
  type StopReason,
} from "./captureMonitor.js";
import { type CaptureClock, systemClock } from "./clock.js";
import type { BodyReader, FragmentStore } from "./fragmentStore.js";
import { type CapturePolicy, DEFAULT_CAPTURE_POLICY } from "./policy.js";

export type ResponseHandler = (url: string, readBody: BodyReader) => void;

/**
 * Browser-side video player the capture loop controls.
 */
export interface CapturePlayer {
  /** Attaches the response listener, then opens the page */
  open: (onResponse: ResponseHandler) => Promise<void>;
  /** Reads the media duration in seconds, or null if it never appears */
  readDuration: () => Promise<number | null>;
  /** Mutes and starts playback at the given rate */
  start: (playbackRate: number) => Promise<void>;
  /** Reads the player state without changing it */
  probe: () => Promise<PlayerSnapshot | null>;
  /**
   * Resumes playback if paused, restores the rate, then pauses near the
   * end or jumps ahead (see planNudge). Returns the state afterwards.
   */
  nudge: (policy: CapturePolicy) => Promise<PlayerSnapshot | null>;
  seek: (seconds: number) => Promise<void>;
  /** Reloads the page and resumes playback at the given position */
  reload: (resumeAt: number, playbackRate: number) => Promise<void>;
  /** Detaches listeners and releases the page */
  close: () => Promise<void>;
}

export interface CaptureProgress {
  elapsedSeconds: number;
  fragmentCount: number;
  expectedFragments: number | null;
  positionSeconds: number | null;
  durationSeconds: number | null;
}

export interface CaptureSessionOptions {
  player: CapturePlayer;
  store: FragmentStore;
  policy?: CapturePolicy;
  clock?: CaptureClock;
  logger?: Logger;
  onProgress?: (progress: CaptureProgress) => void;
  /** Returns false once shutdown was requested */
  shouldContinue?: () => boolean;
}

export interface CaptureOutcome {
  reason: StopReason;
  fragmentCount: number;
  expectedFragments: number | null;
  durationSeconds: number | null;
  completionRatio: number | null;
  reloads: number;
  elapsedSeconds: number;
}

export async function runCapture(options: CaptureSessionOptions): Promise<CaptureOutcome> {
  const { player, store } = options;
  const policy = options.policy ?? DEFAULT_CAPTURE_POLICY;
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? silentLogger;
  const shouldContinue = options.shouldContinue ?? (() => true);

  await player.open((url, readBody) => {
    store.observe(url, readBody);
  });

  const duration = await player.readDuration();
  if (duration) {
    logger.debug(`Video duration ${Math.round(duration)}s`);
  } else {
    logger.warn("Could not read the video duration, capturing without an estimate");
  }

  const monitor = new CaptureMonitor(duration, policy);
  await player.start(policy.playbackRate);

  // Fragments below this count arrived while the duration still matched
  let confirmedCount = store.count;

  const startedAt = clock.now();
  let lastNudgeAt = 0;
  let elapsedSeconds = 0;

  const poll = async (): Promise<StopReason> => {
    for (;;) {
      if (!shouldContinue()) {
        return "interrupted";
      }

      await clock.sleep(policy.pollIntervalMs);
      elapsedSeconds = (clock.now() - startedAt) / 1000;

      const nudged = elapsedSeconds - lastNudgeAt >= policy.nudgeIntervalSeconds;
      if (nudged) lastNudgeAt = elapsedSeconds;
      const snapshot = await readPlayer(player, nudged, policy, logger);

      const fragmentCount = store.count;
      const action = monitor.observe({
        elapsedSeconds,
        fragmentCount,
        resumeHintSeconds: store.capturedUntilSeconds,
        player: snapshot,
        nudged,
      });

      if (action.type !== "stop" || action.reason !== "durationChanged") {
        confirmedCount = fragmentCount;
      }

      options.onProgress?.({
        elapsedSeconds,
        fragmentCount: store.count,
        expectedFragments: monitor.expectedFragments,
        positionSeconds: snapshot?.currentTime ?? null,
        durationSeconds: monitor.durationSeconds,
      });

      const stop = await applyAction(action, player, policy, logger);
      if (stop) return stop;
    }
  };

  const reason = await poll();

  // After a duration jump, anything newer than the last matching poll may be the next video
  store.seal(reason === "durationChanged" ? confirmedCount : undefined);
  await store.settle();

  const outcome: CaptureOutcome = {
    reason,
    fragmentCount: store.count,
    expectedFragments: monitor.expectedFragments,
    durationSeconds: monitor.durationSeconds,
    completionRatio: monitor.completionRatio(store.count),
    reloads: monitor.reloads,
    elapsedSeconds,
  };
  logger.debug(
    `Capture stopped (${reason}) after ${Math.round(elapsedSeconds)}s with ${outcome.fragmentCount} fragments`
  );
  return outcome;
}

async function readPlayer(
  player: CapturePlayer,
  nudged: boolean,
  policy: CapturePolicy,
  logger: Logger
): Promise<PlayerSnapshot | null> {
  try {
    return nudged ? await player.nudge(policy) : await player.probe();
  } catch (error) {
    // The page may be mid-navigation; the next tick reads again
    logger.debug(`Player not readable: ${errorMessage(error)}`);
    return null;
  }
}

async function applyAction(
  action: CaptureAction,
  player: CapturePlayer,
  policy: CapturePolicy,
  logger: Logger
): Promise<StopReason | null> {
  switch (action.type) {
    case "continue":
      return null;
    case "stop":
      return action.reason;
    case "seek":
      logger.debug(`Seeking to ${Math.round(action.to)}s (${action.reason})`);
      await player.seek(action.to);
      return null;
    case "reload":
      logger.warn(`Playback ${action.reason}, reloading page at ${Math.round(action.resumeAt)}s`);
      await player.reload(action.resumeAt, policy.playbackRate);
      return null;
  }
}
