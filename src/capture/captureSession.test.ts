import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Logger } from "../shared/logger.js";
import { SimulatedClock, SimulatedPlayer, type SimulatedPlayerOptions } from "../testing/simulatedPlayer.js";
import { type CaptureProgress, type CaptureSessionOptions, runCapture } from "./captureSession.js";
import { FragmentStore } from "./fragmentStore.js";

describe("runCapture", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "coursekeep-session-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function setup(
    playerOptions: SimulatedPlayerOptions,
    overrides: Partial<CaptureSessionOptions> = {}
  ) {
    const player = new SimulatedPlayer(playerOptions);
    const store = new FragmentStore(dir);
    const progress: CaptureProgress[] = [];
    const run = () =>
      runCapture({
        player,
        store,
        clock: new SimulatedClock(player),
        onProgress: (update) => progress.push(update),
        ...overrides,
      });
    return { player, store, progress, run };
  }

  it("captures every segment of a normal playback", async () => {
    const { progress, run } = setup({ duration: 600 });

    const outcome = await run();

    expect(outcome).toEqual({
      reason: "videoEnded",
      fragmentCount: 60,
      expectedFragments: 70,
      durationSeconds: 600,
      completionRatio: 60 / 70,
      reloads: 0,
      elapsedSeconds: 77,
    });
    expect(progress.at(-1)?.positionSeconds).toBe(593);
  });

  it("waits for the end even when the fragment estimate is reached early", async () => {
    const { progress, run } = setup({ duration: 600, renditions: ["video", "audio"] });

    const outcome = await run();

    expect(outcome.reason).toBe("complete");
    expect(outcome.fragmentCount).toBe(120);
    expect(outcome.elapsedSeconds).toBe(75);
    // The estimate (70) was passed long before the position reached the end guard
    expect(progress.find((update) => update.fragmentCount >= 70)?.positionSeconds).toBe(360);
    expect(progress.at(-1)?.positionSeconds).toBe(585);
  });

  it("stops as soon as autoplay switches to another video", async () => {
    const { store, progress, run } = setup({ duration: 600, switchAtSeconds: 100, nextDuration: 900 });

    const outcome = await run();
    await store.settle();

    expect(outcome.reason).toBe("durationChanged");
    expect(outcome.fragmentCount).toBe(15);
    expect(outcome.elapsedSeconds).toBe(16);
    // Six segments of the next video arrived before the poll that saw the new duration
    expect(progress.at(-1)?.fragmentCount).toBe(21);
    expect(store.fragments()).toHaveLength(15);
    expect(store.fragments().filter((fragment) => fragment.url.includes("/next/"))).toEqual([]);
  });

  it("reloads a stalled page and resumes from the captured position", async () => {
    const warnings: string[] = [];
    const noop = (): void => undefined;
    const logger: Logger = {
      debug: noop,
      info: noop,
      success: noop,
      warn: (message) => warnings.push(message),
      error: noop,
    };
    const { player, run } = setup({ duration: 600, stallAtSeconds: 200 }, { logger });

    const outcome = await run();

    expect(player.seeks).toEqual([320]);
    expect(player.reloads).toEqual([{ resumeAt: 220, rate: 4 }]);
    expect(warnings).toEqual(["Playback stuck for 60s, reloading page at 220s"]);
    expect(outcome.reason).toBe("videoEnded");
    expect(outcome.reloads).toBe(1);
    expect(outcome.fragmentCount).toBe(60);
    expect(outcome.elapsedSeconds).toBe(138);
  });

  it("stops when shutdown is requested", async () => {
    let checks = 0;
    const { run } = setup({ duration: 600 }, { shouldContinue: () => checks++ < 3 });

    const outcome = await run();

    expect(outcome.reason).toBe("interrupted");
    expect(outcome.elapsedSeconds).toBe(3);
  });
});
