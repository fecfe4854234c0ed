import { describe, expect, it } from "vitest";
import {
  buildConcatArgs,
  buildManifestRemuxArgs,
  formatHeaderArg,
  parseFfmpegDuration,
  parseFfmpegTime,
} from "./ffmpeg.js";

describe("parseFfmpegDuration", () => {
  it("reads the input duration", () => {
    expect(parseFfmpegDuration("  Duration: 01:02:03.50, start: 0.000000")).toBe(3723.5);
  });

  it("returns 0 without a duration line", () => {
    expect(parseFfmpegDuration("Stream #0:0: Video: h264")).toBe(0);
  });
});

describe("parseFfmpegTime", () => {
  it("reads the progress position", () => {
    expect(parseFfmpegTime("frame= 120 fps=0.0 q=-1.0 size=1024kB time=00:00:42.25 bitrate=")).toBe(
      42.25
    );
  });
});

describe("formatHeaderArg", () => {
  it("joins headers with CRLF and a trailing CRLF", () => {
    expect(formatHeaderArg({ Origin: "https://a.example", Referer: "https://a.example/x" })).toBe(
      "Origin: https://a.example\r\nReferer: https://a.example/x\r\n"
    );
  });
});

describe("buildManifestRemuxArgs", () => {
  const manifest = "https://cdn.example.com/v/master.m3u8";

  it("copies HLS streams with the session headers", () => {
    const args = buildManifestRemuxArgs(manifest, "/out/01-intro.mp4", "hls", {
      cookies: "sid=test-secret",
      referer: "https://school.example.com/course/unit",
    });

    expect(args).toEqual([
      "-y",
      "-hide_banner",
      "-loglevel",
      "warning",
      "-stats",
      "-nostdin",
      "-headers",
      "Origin: https://school.example.com\r\n" +
        "Referer: https://school.example.com/course/unit\r\n" +
        "Cookie: sid=test-secret\r\n",
      "-i",
      manifest,
      "-c",
      "copy",
      "-bsf:a",
      "aac_adtstoasc",
      "/out/01-intro.mp4",
    ]);
  });

  it("whitelists protocols for DASH", () => {
    const args = buildManifestRemuxArgs("https://cdn.example.com/v/manifest.mpd", "/out/a.mp4", "dash");

    expect(args.slice(8)).toEqual([
      "-protocol_whitelist",
      "file,http,https,tcp,tls,crypto",
      "-allowed_extensions",
      "ALL",
      "-i",
      "https://cdn.example.com/v/manifest.mpd",
      "-c",
      "copy",
      "/out/a.mp4",
    ]);
    expect(args[7]).toBe("Origin: https://cdn.example.com\r\nReferer: https://cdn.example.com/\r\n");
  });
});

describe("buildConcatArgs", () => {
  it("remuxes the list without re-encoding", () => {
    expect(buildConcatArgs("concat.txt", "/out/a.mp4")).toEqual([
      "-nostdin",
      "-f",
      "concat",
      "-safe",
      "0",
      "-i",
      "concat.txt",
      "-c",
      "copy",
      "-y",
      "/out/a.mp4",
    ]);
  });
});
