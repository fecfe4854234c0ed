/**
 * Decision logic for interception capture. Pure: it sees observations and
 * returns what the session should do next, so every rule is testable
 * without a browser.
 */
import {
  type CapturePolicy,
  DEFAULT_CAPTURE_POLICY,
  expectedFragmentCount,
  maxCaptureSeconds,
} from "./policy.js";

// ============================================
// Types
// ============================================

/**
 * What the page's video element reported.
 */
export interface PlayerSnapshot {
  currentTime: number;
  duration: number | null;
  paused: boolean;
  /** Text of the player's current-time display, if it has one */
  clockText: string | null;
}

export interface Observation {
  elapsedSeconds: number;
  fragmentCount: number;
  /** Media position covered by captured fragments */
  resumeHintSeconds: number;
  player: PlayerSnapshot | null;
  /** True when the player was nudged on this tick */
  nudged: boolean;
}

export type StopReason =
  | "complete"
  | "videoEnded"
  | "durationChanged"
  | "stuckPartial"
  | "stuckAbandoned"
  | "idle"
  | "fragmentCeiling"
  | "timeout"
  | "interrupted";

export type CaptureAction =
  | { type: "continue" }
  | { type: "seek"; to: number; reason: string }
  | { type: "reload"; resumeAt: number; reason: string }
  | { type: "stop"; reason: StopReason };

export type NudgeStep = { type: "pause" } | { type: "jump"; to: number };

const CONTINUE: CaptureAction = { type: "continue" };

/**
 * What a periodic nudge should do at the given position: jump ahead,
 * or pause once the end guard is reached.
 */
export function planNudge(
  snapshot: Pick<PlayerSnapshot, "currentTime" | "duration">,
  policy: CapturePolicy = DEFAULT_CAPTURE_POLICY
): NudgeStep {
  const { currentTime, duration } = snapshot;
  if (!duration) {
    return { type: "jump", to: currentTime + policy.forwardJumpSeconds };
  }
  const limit = duration - policy.endGuardSeconds;
  if (currentTime >= limit) {
    return { type: "pause" };
  }
  return { type: "jump", to: Math.min(currentTime + policy.forwardJumpSeconds, limit) };
}

// ============================================
// Monitor
// ============================================

export class CaptureMonitor {
  private duration: number | null;
  private expected: number | null;
  private maxWait: number;
  private lastFragmentCount = 0;
  private lastFragmentAt = 0;
  private lastPosition = 0;
  private lastClockText: string | null = null;
  private stuckSeconds = 0;
  private seekedThisEpisode = false;
  private reloadCount = 0;

  constructor(
    initialDuration: number | null,
    private readonly policy: CapturePolicy = DEFAULT_CAPTURE_POLICY
  ) {
    this.duration = initialDuration && initialDuration > 0 ? initialDuration : null;
    this.expected = expectedFragmentCount(this.duration, policy);
    this.maxWait = maxCaptureSeconds(this.duration, policy);
  }

  get durationSeconds(): number | null {
    return this.duration;
  }

  get expectedFragments(): number | null {
    return this.expected;
  }

  get reloads(): number {
    return this.reloadCount;
  }

  get maxWaitSeconds(): number {
    return this.maxWait;
  }

  completionRatio(fragmentCount: number): number | null {
    return this.expected ? fragmentCount / this.expected : null;
  }

  observe(observation: Observation): CaptureAction {
    const { elapsedSeconds, fragmentCount, player } = observation;
    const policy = this.policy;

    if (fragmentCount > this.lastFragmentCount) {
      this.lastFragmentCount = fragmentCount;
      this.lastFragmentAt = elapsedSeconds;
    }

    const reportedDuration = player?.duration && player.duration > 0 ? player.duration : null;
    if (reportedDuration !== null) {
      if (this.duration === null) {
        this.duration = reportedDuration;
        this.expected = expectedFragmentCount(reportedDuration, policy);
        this.maxWait = maxCaptureSeconds(reportedDuration, policy);
      } else if (Math.abs(reportedDuration - this.duration) > policy.durationJumpSeconds) {
        // Autoplay moved on to the next video
        return { type: "stop", reason: "durationChanged" };
      }
    }

    if (observation.nudged && player) {
      const recovery = this.checkStuck(player, observation);
      if (recovery) return recovery;
    }

    const duration = this.duration;
    if (player && duration) {
      const remaining = duration - player.currentTime;
      if (remaining <= policy.endReachedSeconds) {
        return { type: "stop", reason: "videoEnded" };
      }
      // Count alone never ends a capture; the position has to agree
      if (
        this.expected &&
        fragmentCount >= this.expected * policy.completeRatio &&
        remaining <= policy.endGuardSeconds
      ) {
        return { type: "stop", reason: "complete" };
      }
    }

    if (elapsedSeconds - this.lastFragmentAt >= policy.idleCutoffSeconds) {
      if (this.expected && fragmentCount < this.expected * policy.idleAcceptRatio) {
        this.lastFragmentAt = elapsedSeconds;
        if (player && duration) {
          return {
            type: "seek",
            to: Math.min(
              player.currentTime + policy.forwardJumpSeconds,
              duration - policy.endReachedSeconds
            ),
            reason: "no new fragments",
          };
        }
        return CONTINUE;
      }
      return { type: "stop", reason: "idle" };
    }

    if (fragmentCount >= policy.fragmentCeiling) {
      return { type: "stop", reason: "fragmentCeiling" };
    }

    if (elapsedSeconds >= this.maxWait) {
      return { type: "stop", reason: "timeout" };
    }

    return CONTINUE;
  }

  /**
   * Escalating recovery for playback that stopped moving:
   * restart, forced seek, reload, then accept or abandon.
   */
  private checkStuck(player: PlayerSnapshot, observation: Observation): CaptureAction | null {
    const policy = this.policy;
    const current = player.currentTime;
    const clockFrozen = player.clockText !== null && player.clockText === this.lastClockText;
    const stuck =
      Math.abs(current - this.lastPosition) < policy.stuckMovementSeconds || clockFrozen;

    this.lastClockText = player.clockText;
    this.lastPosition = current;

    if (!stuck) {
      this.stuckSeconds = 0;
      this.seekedThisEpisode = false;
      return null;
    }

    this.stuckSeconds += policy.nudgeIntervalSeconds;
    const canReload = this.reloadCount < policy.maxReloads;

    if (
      current <= policy.startZoneSeconds &&
      this.stuckSeconds >= policy.seekAfterStuckSeconds &&
      canReload
    ) {
      return this.reload(0, "playback never started");
    }

    if (this.stuckSeconds >= policy.abandonAfterStuckSeconds && !canReload) {
      const ratio = this.completionRatio(observation.fragmentCount) ?? 0;
      return {
        type: "stop",
        reason: ratio >= policy.partialAcceptRatio ? "stuckPartial" : "stuckAbandoned",
      };
    }

    if (this.stuckSeconds >= policy.reloadAfterStuckSeconds && canReload) {
      let resumeAt = Math.max(current, observation.resumeHintSeconds);
      if (resumeAt < policy.endReachedSeconds) resumeAt = current;
      return this.reload(resumeAt, `stuck for ${this.stuckSeconds}s`);
    }

    const duration = this.duration;
    if (
      this.stuckSeconds >= policy.seekAfterStuckSeconds &&
      this.stuckSeconds < policy.reloadAfterStuckSeconds &&
      current > policy.startZoneSeconds &&
      !this.seekedThisEpisode &&
      duration &&
      current < duration - policy.forwardJumpSeconds
    ) {
      this.seekedThisEpisode = true;
      return {
        type: "seek",
        to: Math.min(
          current + policy.forcedSeekSeconds,
          duration - policy.forcedSeekEndMarginSeconds
        ),
        reason: `stuck for ${this.stuckSeconds}s`,
      };
    }

    return null;
  }

  private reload(resumeAt: number, reason: string): CaptureAction {
    this.reloadCount += 1;
    this.stuckSeconds = 0;
    this.seekedThisEpisode = false;
    this.lastPosition = resumeAt;
    this.lastClockText = null;
    return { type: "reload", resumeAt, reason };
  }
}
