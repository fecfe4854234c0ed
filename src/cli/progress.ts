import cliProgress from "cli-progress";
import type { CaptureProgress } from "../capture/captureSession.js";

/**
 * Status text shown beside the capture bar.
 */
export function describeCapture(progress: CaptureProgress): string {
  const fragments = `${progress.fragmentCount} fragments`;
  if (progress.positionSeconds === null || progress.durationSeconds === null) {
    return fragments;
  }
  return `${fragments} | ${Math.round(progress.positionSeconds)}s of ${Math.round(progress.durationSeconds)}s`;
}

export interface CaptureBar {
  update: (progress: CaptureProgress) => void;
  stop: () => void;
}

/* v8 ignore start */
/**
 * Progress bar for interception captures. The bar starts with the first
 * progress report and is reused for the next capture after stop().
 */
export function createCaptureBar(): CaptureBar {
  let bar: cliProgress.SingleBar | undefined;

  return {
    update: (progress) => {
      const total = progress.expectedFragments ?? progress.fragmentCount;
      if (!bar) {
        bar = new cliProgress.SingleBar(
          {
            format: "   {bar} {percentage}% | {value}/{total} | {status}",
            barCompleteChar: "█",
            barIncompleteChar: "░",
            barsize: 30,
            hideCursor: true,
          },
          cliProgress.Presets.shades_grey
        );
        bar.start(total, 0, { status: "Capturing..." });
      }
      bar.setTotal(Math.max(total, progress.fragmentCount));
      bar.update(progress.fragmentCount, { status: describeCapture(progress) });
    },
    stop: () => {
      bar?.stop();
      bar = undefined;
    },
  };
}
/* v8 ignore stop */
