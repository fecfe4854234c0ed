/**
 * In-process stand-ins for the browser player and the wall clock, used by
 * the capture tests. Playback advances only when the fake clock sleeps.
 */
import { planNudge, type PlayerSnapshot } from "../capture/captureMonitor.js";
import type { CapturePlayer, ResponseHandler } from "../capture/captureSession.js";
import type { CaptureClock } from "../capture/clock.js";
import type { CapturePolicy } from "../capture/policy.js";

export interface SimulatedPlayerOptions {
  duration: number;
  segmentSeconds?: number;
  /** How far ahead of the position the player buffers */
  lookaheadSeconds?: number;
  /** One URL per rendition for every segment */
  renditions?: string[];
  /** Position at which autoplay moves on to another video, which keeps streaming */
  switchAtSeconds?: number;
  nextDuration?: number;
  /** Position where playback freezes until the page reloads */
  stallAtSeconds?: number;
  bytesPerFragment?: number;
}

export class SimulatedPlayer implements CapturePlayer {
  position = 0;
  duration: number;
  paused = false;
  closed = false;
  rate = 1;
  readonly seeks: number[] = [];
  readonly reloads: Array<{ resumeAt: number; rate: number }> = [];

  private handler: ResponseHandler | null = null;
  private nextSegment = 0;
  private switched = false;
  private stalled: boolean;
  private totalSegments: number;
  private urlPrefix = "";
  private readonly segmentSeconds: number;
  private readonly lookahead: number;
  private readonly renditions: string[];

  constructor(private readonly options: SimulatedPlayerOptions) {
    this.duration = options.duration;
    this.segmentSeconds = options.segmentSeconds ?? 10;
    this.lookahead = options.lookaheadSeconds ?? 30;
    this.renditions = options.renditions ?? ["video"];
    this.totalSegments = Math.ceil(options.duration / this.segmentSeconds);
    this.stalled = options.stallAtSeconds !== undefined;
  }

  async open(onResponse: ResponseHandler): Promise<void> {
    this.handler = onResponse;
  }

  async readDuration(): Promise<number | null> {
    return this.duration;
  }

  async start(playbackRate: number): Promise<void> {
    this.rate = playbackRate;
    this.paused = false;
    this.emit();
  }

  async probe(): Promise<PlayerSnapshot | null> {
    return this.snapshot();
  }

  async nudge(policy: CapturePolicy): Promise<PlayerSnapshot | null> {
    this.paused = false;
    const step = planNudge(this.snapshot(), policy);
    if (step.type === "pause") {
      this.paused = true;
    } else {
      this.moveTo(step.to);
    }
    return this.snapshot();
  }

  async seek(seconds: number): Promise<void> {
    this.seeks.push(seconds);
    this.moveTo(seconds);
  }

  async reload(resumeAt: number, playbackRate: number): Promise<void> {
    this.reloads.push({ resumeAt, rate: playbackRate });
    this.stalled = false;
    this.rate = playbackRate;
    this.paused = false;
    this.moveTo(resumeAt);
  }

  async close(): Promise<void> {
    this.closed = true;
    this.handler = null;
  }

  /** Plays for the given wall-clock seconds */
  advance(seconds: number): void {
    if (this.paused || this.closed) return;
    const target = this.position + seconds * this.rate;
    const switchAt = this.options.switchAtSeconds;
    if (switchAt !== undefined && !this.switched && target >= switchAt) {
      this.switched = true;
      this.duration = this.options.nextDuration ?? this.duration * 1.5;
      this.totalSegments = Math.ceil(this.duration / this.segmentSeconds);
      this.nextSegment = 0;
      this.urlPrefix = "next/";
      this.moveTo(target - switchAt);
      return;
    }
    this.moveTo(target);
  }

  private moveTo(target: number): void {
    const stallAt = this.options.stallAtSeconds;
    const limit = this.stalled && stallAt !== undefined ? stallAt : this.duration;
    this.position = Math.min(target, limit);
    this.emit();
  }

  private snapshot(): PlayerSnapshot {
    return { currentTime: this.position, duration: this.duration, paused: this.paused, clockText: null };
  }

  private emit(): void {
    const handler = this.handler;
    if (!handler) return;
    const bytes = this.options.bytesPerFragment ?? 16;
    while (
      this.nextSegment < this.totalSegments &&
      this.nextSegment * this.segmentSeconds < this.position + this.lookahead
    ) {
      for (const rendition of this.renditions) {
        handler(
          `https://cdn.example.com/${this.urlPrefix}${rendition}/seg-${this.nextSegment}.ts?token=test-token`,
          async () => new Uint8Array(bytes)
        );
      }
      this.nextSegment += 1;
    }
  }
}

/**
 * Clock whose sleep advances time instantly and plays the player along.
 */
export class SimulatedClock implements CaptureClock {
  private ms = 0;

  constructor(private readonly player: SimulatedPlayer) {}

  now(): number {
    return this.ms;
  }

  async sleep(ms: number): Promise<void> {
    this.ms += ms;
    this.player.advance(ms / 1000);
  }
}
