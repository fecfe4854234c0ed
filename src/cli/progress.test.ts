import { describe, expect, it } from "vitest";
import { describeCapture } from "./progress.js";

describe("describeCapture", () => {
  it("shows the playback position once it is known", () => {
    expect(
      describeCapture({
        elapsedSeconds: 40,
        fragmentCount: 12,
        expectedFragments: 63,
        positionSeconds: 119.6,
        durationSeconds: 600,
      })
    ).toBe("12 fragments | 120s of 600s");
  });

  it("shows only the fragment count before the player reports a position", () => {
    expect(
      describeCapture({
        elapsedSeconds: 2,
        fragmentCount: 1,
        expectedFragments: null,
        positionSeconds: null,
        durationSeconds: null,
      })
    ).toBe("1 fragments");
  });
});
