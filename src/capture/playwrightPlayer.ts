/**
 * CapturePlayer backed by a Playwright page. Excluded from coverage via
 * vitest.config.ts; the capture loop is tested against SimulatedPlayer.
 */
import type { BrowserContext, Page, Response } from "playwright";
import { gotoWithRetry, type NavigationOptions } from "../browser/navigation.js";
import type { InterceptStrategy } from "../downloader/pipeline.js";
import { errorMessage, silentLogger, type Logger } from "../shared/logger.js";
import { getPathname } from "../shared/url.js";
import { planNudge, type PlayerSnapshot } from "./captureMonitor.js";
import type { CapturePlayer, CaptureProgress, ResponseHandler } from "./captureSession.js";
import { parseClockText } from "./clock.js";
import { captureToFile } from "./interceptDownload.js";
import type { CapturePolicy } from "./policy.js";

const DURATION_SELECTOR = ".vjs-duration-display";
const CURRENT_TIME_SELECTOR = ".vjs-current-time-display";
const DURATION_WAIT_MS = 15000;
const RELOAD_SETTLE_MS = 5000;

/* v8 ignore start */
export class PlaywrightPlayer implements CapturePlayer {
  private listener: ((response: Response) => void) | null = null;

  constructor(
    private readonly page: Page,
    private readonly url: string,
    private readonly options: { logger?: Logger; navigation?: NavigationOptions } = {}
  ) {}

  private get logger(): Logger {
    return this.options.logger ?? silentLogger;
  }

  async open(onResponse: ResponseHandler): Promise<void> {
    this.listener = (response) => {
      if (response.status() !== 200) return;
      const url = response.url();
      const path = getPathname(url);
      if (path.endsWith(".ts") || path.endsWith(".m3u8")) {
        onResponse(url, () => response.body());
      }
    };
    this.page.on("response", this.listener);
    await gotoWithRetry(this.page, this.url, { logger: this.logger, ...this.options.navigation });
  }

  async readDuration(): Promise<number | null> {
    const fromDisplay = await this.poll(async () => {
      const text = await this.page.locator(DURATION_SELECTOR).first().textContent({ timeout: 500 });
      return parseClockText(text);
    });
    if (fromDisplay) return fromDisplay;

    return this.poll(() =>
      this.page.evaluate(() => {
        const video = document.querySelector("video");
        return video && Number.isFinite(video.duration) && video.duration > 0
          ? video.duration
          : null;
      })
    );
  }

  async start(playbackRate: number): Promise<void> {
    await this.page.evaluate(async (rate) => {
      const video = document.querySelector("video");
      if (!video) return;
      video.muted = true;
      video.playbackRate = rate;
      await video.play();
    }, playbackRate);
  }

  async probe(): Promise<PlayerSnapshot | null> {
    return this.page.evaluate((clockSelector) => {
      const video = document.querySelector("video");
      if (!video) return null;
      return {
        currentTime: video.currentTime,
        duration: Number.isFinite(video.duration) && video.duration > 0 ? video.duration : null,
        paused: video.paused,
        clockText: document.querySelector(clockSelector)?.textContent?.trim() ?? null,
      };
    }, CURRENT_TIME_SELECTOR);
  }

  async nudge(policy: CapturePolicy): Promise<PlayerSnapshot | null> {
    const before = await this.probe();
    if (!before) return null;

    const step = planNudge(before, policy);
    await this.page.evaluate(
      async ({ rate, pause, to }) => {
        const video = document.querySelector("video");
        if (!video) return;
        if (video.paused && !pause) await video.play();
        video.playbackRate = rate;
        if (pause) {
          video.pause();
        } else if (to !== null) {
          video.currentTime = to;
        }
      },
      {
        rate: policy.playbackRate,
        pause: step.type === "pause",
        to: step.type === "jump" ? step.to : null,
      }
    );
    return this.probe();
  }

  async seek(seconds: number): Promise<void> {
    await this.page.evaluate((to) => {
      const video = document.querySelector("video");
      if (video) video.currentTime = to;
    }, seconds);
  }

  async reload(resumeAt: number, playbackRate: number): Promise<void> {
    await this.page.reload({ waitUntil: "commit", timeout: 60000 });
    await this.page.waitForTimeout(RELOAD_SETTLE_MS);
    await this.start(playbackRate);
    await this.seek(resumeAt);
  }

  async close(): Promise<void> {
    if (this.listener) {
      this.page.off("response", this.listener);
      this.listener = null;
    }
    await this.page.close();
  }

  /**
   * Retries read every 500 ms until it yields a value or the wait runs out.
   */
  private async poll(read: () => Promise<number | null>): Promise<number | null> {
    const deadline = Date.now() + DURATION_WAIT_MS;
    while (Date.now() < deadline) {
      try {
        const value = await read();
        if (value) return value;
      } catch (error) {
        this.logger.debug(`Duration not readable yet: ${errorMessage(error)}`);
      }
      await this.page.waitForTimeout(500);
    }
    return null;
  }
}

export interface BrowserInterceptOptions {
  context: BrowserContext;
  policy?: CapturePolicy;
  logger?: Logger;
  onProgress?: (progress: CaptureProgress) => void;
  shouldContinue?: () => boolean;
}

/**
 * Interception strategy that opens each unit page in a fresh tab of the
 * authenticated context.
 */
export function createBrowserIntercept(options: BrowserInterceptOptions): InterceptStrategy {
  return async (pageUrl, outputPath) => {
    const page = await options.context.newPage();
    const player = new PlaywrightPlayer(page, pageUrl, { logger: options.logger });
    return captureToFile(outputPath, {
      player,
      policy: options.policy,
      logger: options.logger,
      onProgress: options.onProgress,
      shouldContinue: options.shouldContinue,
    });
  };
}
/* v8 ignore stop */
