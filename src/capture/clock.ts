import delay from "delay";

/**
 * Time source for capture loops. Tests swap in a simulated clock.
 */
export interface CaptureClock {
  /** Milliseconds since an arbitrary origin */
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

export const systemClock: CaptureClock = {
  now: () => Date.now(),
  sleep: (ms) => delay(ms),
};

/**
 * Parses a player time display such as "10:35" or "1:02:03".
 * Returns null for empty, zero or malformed text.
 */
export function parseClockText(text: string | null | undefined): number | null {
  const trimmed = text?.trim().replace(/^-/, "");
  if (!trimmed || !/^\d{1,2}(:\d{2}){1,2}$/.test(trimmed)) {
    return null;
  }
  const seconds = trimmed
    .split(":")
    .reduce((total, part) => total * 60 + parseInt(part, 10), 0);
  return seconds > 0 ? seconds : null;
}
