import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Logger } from "../shared/logger.js";
import {
  acquireVideo,
  type InterceptStrategy,
  type ManifestStrategy,
  type PipelineOptions,
  type VideoRequest,
} from "./pipeline.js";
import type { DownloadResult } from "./shared/types.js";

const HLS_URL = "https://cdn.example.com/v/master.m3u8";
const DASH_URL = "https://cdn.example.com/v/manifest.mpd";
const PAGE_URL = "https://school.example.com/courses/intro/units/welcome";

function recordingLogger(): { logger: Logger; warnings: string[] } {
  const warnings: string[] = [];
  const noop = (): void => undefined;
  return {
    warnings,
    logger: { debug: noop, info: noop, success: noop, warn: (m) => warnings.push(m), error: noop },
  };
}

/**
 * Strategy that writes `bytes` bytes on success.
 */
function writing(bytes: number): (outputPath: string) => Promise<DownloadResult> {
  return async (outputPath) => {
    await writeFile(outputPath, Buffer.alloc(bytes));
    return { success: true, outputPath };
  };
}

const forbidden: DownloadResult = {
  success: false,
  error: "HLS manifest returned 403",
  errorCode: "FORBIDDEN",
};

describe("acquireVideo", () => {
  let dir: string;
  let request: VideoRequest;
  let sleeps: number[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "coursekeep-pipeline-"));
    request = {
      pageUrl: PAGE_URL,
      primary: { url: HLS_URL, format: "hls" },
      fallback: null,
      outputPath: join(dir, "01-welcome.mp4"),
      cookies: "sid=test-secret",
    };
    sleeps = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function options(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
    return {
      engine: "firefox",
      quality: "720p",
      minOutputBytes: 10,
      retry: {
        attempts: 3,
        baseDelayMs: 100,
        sleep: async (ms) => {
          sleeps.push(ms);
        },
      },
      ...overrides,
    };
  }

  it("uses the primary HLS manifest when it works", async () => {
    const hls = vi.fn<ManifestStrategy>((_url, outputPath) => writing(20)(outputPath));
    const dash = vi.fn<ManifestStrategy>();

    const result = await acquireVideo(
      { ...request, fallback: { url: DASH_URL, format: "dash" } },
      options({ hls, dash })
    );

    expect(result.success).toBe(true);
    expect(result.strategy).toBe("hls");
    expect(result.outputPath).toBe(request.outputPath);
    expect(result.attempts).toEqual([{ strategy: "hls", url: HLS_URL, success: true }]);
    expect(dash).not.toHaveBeenCalled();
    expect(hls).toHaveBeenCalledWith(HLS_URL, request.outputPath, {
      quality: "720p",
      cookies: "sid=test-secret",
      referer: PAGE_URL,
      onProgress: undefined,
    });
  });

  it("retries transient failures with backoff", async () => {
    let calls = 0;
    const hls = vi.fn<ManifestStrategy>(async (_url, outputPath) => {
      calls += 1;
      if (calls === 1) {
        return { success: false, error: "socket hang up", errorCode: "NETWORK_ERROR" };
      }
      return writing(20)(outputPath);
    });

    const result = await acquireVideo(request, options({ hls }));

    expect(result.success).toBe(true);
    expect(hls).toHaveBeenCalledTimes(2);
    expect(sleeps).toEqual([100]);
  });

  it("escalates to interception after a 403 on every manifest", async () => {
    const hls = vi.fn<ManifestStrategy>(async () => forbidden);
    const dash = vi.fn<ManifestStrategy>(async () => ({
      success: false,
      error: "Server returned 403 Forbidden",
      errorCode: "FFMPEG_ERROR",
    }));
    const intercept = vi.fn<InterceptStrategy>((_page, outputPath) => writing(20)(outputPath));

    const result = await acquireVideo(
      { ...request, fallback: { url: DASH_URL, format: "dash" } },
      options({ hls, dash, intercept })
    );

    expect(result.success).toBe(true);
    expect(result.strategy).toBe("intercept");
    expect(hls).toHaveBeenCalledTimes(1);
    expect(dash).toHaveBeenCalledTimes(1);
    expect(intercept).toHaveBeenCalledWith(PAGE_URL, request.outputPath);
    expect(result.attempts.map((attempt) => [attempt.strategy, attempt.success])).toEqual([
      ["hls", false],
      ["dash", false],
      ["intercept", true],
    ]);
    expect(result.attempts[0]?.errorCode).toBe("FORBIDDEN");
    expect(sleeps).toEqual([]);
  });

  it("tries the fallback manifest before escalating", async () => {
    const hls = vi.fn<ManifestStrategy>(async () => forbidden);
    const dash = vi.fn<ManifestStrategy>((_url, outputPath) => writing(20)(outputPath));
    const intercept = vi.fn<InterceptStrategy>();

    const result = await acquireVideo(
      { ...request, fallback: { url: DASH_URL, format: "dash" } },
      options({ hls, dash, intercept })
    );

    expect(result.strategy).toBe("dash");
    expect(intercept).not.toHaveBeenCalled();
  });

  it("does not intercept for failures other than 403", async () => {
    const hls = vi.fn<ManifestStrategy>(async () => ({
      success: false,
      error: "HLS manifest returned 404",
      errorCode: "FETCH_FAILED",
    }));
    const intercept = vi.fn<InterceptStrategy>();
    const { logger, warnings } = recordingLogger();

    const result = await acquireVideo(request, options({ hls, intercept, logger }));

    expect(result).toEqual({
      success: false,
      error: "HLS manifest returned 404",
      errorCode: "FETCH_FAILED",
      details: undefined,
      hint: "run `coursekeep retry-failed` to try again",
      attempts: [
        {
          strategy: "hls",
          url: HLS_URL,
          success: false,
          error: "HLS manifest returned 404",
          errorCode: "FETCH_FAILED",
          hint: "run `coursekeep retry-failed` to try again",
        },
      ],
    });
    expect(hls).toHaveBeenCalledTimes(3);
    expect(intercept).not.toHaveBeenCalled();
    expect(warnings.at(-1)).toBe(
      "HLS download failed: HLS manifest returned 404 (run `coursekeep retry-failed` to try again)"
    );
  });

  it("fails DASH-only units on chromium without trying", async () => {
    const dash = vi.fn<ManifestStrategy>();
    const intercept = vi.fn<InterceptStrategy>();

    const result = await acquireVideo(
      { ...request, primary: { url: DASH_URL, format: "dash" } },
      options({ engine: "chromium", dash, intercept })
    );

    expect(result.success).toBe(false);
    expect(result.errorCode).toBe("INCOMPATIBLE_ENGINE");
    expect(result.hint).toBe("use firefox (`--browser firefox`) for DASH manifests");
    expect(dash).not.toHaveBeenCalled();
    expect(intercept).not.toHaveBeenCalled();
    expect(result.attempts).toHaveLength(1);
  });

  it("tries a DASH primary on chromium when an HLS fallback exists", async () => {
    const { logger, warnings } = recordingLogger();
    const dash = vi.fn<ManifestStrategy>(async () => ({
      success: false,
      error: "DASH manifest returned 403",
      errorCode: "FORBIDDEN",
    }));
    const hls = vi.fn<ManifestStrategy>((_url, outputPath) => writing(20)(outputPath));

    const result = await acquireVideo(
      {
        ...request,
        primary: { url: DASH_URL, format: "dash" },
        fallback: { url: HLS_URL, format: "hls" },
      },
      options({ engine: "chromium", dash, hls, logger })
    );

    expect(result.strategy).toBe("hls");
    expect(dash).toHaveBeenCalledTimes(1);
    expect(dash.mock.calls[0]?.[0]).toBe(DASH_URL);
    expect(warnings[0]).toBe("Trying a DASH manifest with chromium, which may be refused");
    expect(result.attempts.map((attempt) => [attempt.strategy, attempt.errorCode])).toEqual([
      ["dash", "FORBIDDEN"],
      ["hls", undefined],
    ]);
  });

  it("rejects trivially small outputs", async () => {
    const hls = vi.fn<ManifestStrategy>((_url, outputPath) => writing(5)(outputPath));

    const result = await acquireVideo(
      request,
      options({ hls, retry: { attempts: 1, sleep: async () => undefined } })
    );

    expect(result.success).toBe(false);
    expect(result.errorCode).toBe("OUTPUT_TOO_SMALL");
    expect(result.error).toBe("Output is only 5 bytes");
  });

  it("reports units without manifests", async () => {
    const result = await acquireVideo({ ...request, primary: null }, options());

    expect(result).toEqual({
      success: false,
      error: "No video manifest found",
      errorCode: "NO_STREAM",
      hint: "the unit exposes no video manifest",
      attempts: [],
    });
  });
});
