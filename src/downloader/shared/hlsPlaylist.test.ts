import { describe, expect, it } from "vitest";
import { parseHLSPlaylist, parseQualityHeight, selectVariant } from "./hlsPlaylist.js";
import type { HLSQuality } from "./types.js";

describe("parseHLSPlaylist", () => {
  const baseUrl = "https://cdn.example.com/video/master.m3u8";

  it("parses master playlist with multiple qualities", () => {
    const content = `#EXTM3U
#EXT-X-VERSION:3
#EXT-X-STREAM-INF:BANDWIDTH=800000,RESOLUTION=640x360
360p.m3u8
#EXT-X-STREAM-INF:BANDWIDTH=5000000,RESOLUTION=1920x1080
1080p.m3u8
#EXT-X-STREAM-INF:BANDWIDTH=2800000,RESOLUTION=1280x720
720p.m3u8`;

    const result = parseHLSPlaylist(content, baseUrl);

    expect(result.map((variant) => variant.label)).toEqual(["1080p", "720p", "360p"]);
    expect(result[0]).toEqual({
      label: "1080p",
      url: "https://cdn.example.com/video/1080p.m3u8",
      bandwidth: 5000000,
      width: 1920,
      height: 1080,
    });
  });

  it("keeps absolute variant URLs", () => {
    const content = `#EXTM3U
#EXT-X-STREAM-INF:BANDWIDTH=2800000,RESOLUTION=1280x720
https://other-cdn.example.com/video/720p.m3u8`;

    const result = parseHLSPlaylist(content, baseUrl);
    expect(result.map((variant) => variant.url)).toEqual([
      "https://other-cdn.example.com/video/720p.m3u8",
    ]);
  });

  it("labels variants without resolution by bandwidth", () => {
    const content = `#EXTM3U
#EXT-X-STREAM-INF:BANDWIDTH=500000
audio.m3u8`;

    const result = parseHLSPlaylist(content, baseUrl);
    expect(result.map((variant) => variant.label)).toEqual(["500k"]);
  });

  it("returns nothing for a media playlist", () => {
    const content = `#EXTM3U
#EXT-X-VERSION:3
#EXT-X-TARGETDURATION:10
#EXTINF:10.0,
media_0.ts
#EXT-X-ENDLIST`;

    expect(parseHLSPlaylist(content, baseUrl)).toEqual([]);
  });

  it("returns nothing for content that is not a playlist", () => {
    expect(parseHLSPlaylist("<html>denied</html>", baseUrl)).toEqual([]);
  });
});

describe("parseQualityHeight", () => {
  it("reads NNNp settings", () => {
    expect(parseQualityHeight("720p")).toBe(720);
    expect(parseQualityHeight("highest")).toBeNull();
  });
});

describe("selectVariant", () => {
  const variant = (height: number, bandwidth: number): HLSQuality => ({
    label: `${height}p`,
    url: `https://cdn.example.com/${height}.m3u8`,
    bandwidth,
    height,
  });
  const variants = [variant(480, 1400000), variant(1080, 5000000), variant(720, 2800000)];

  it("picks by bandwidth for highest and lowest", () => {
    expect(selectVariant(variants, "highest")?.height).toBe(1080);
    expect(selectVariant(variants, "lowest")?.height).toBe(480);
  });

  it("picks the exact height when offered", () => {
    expect(selectVariant(variants, "720p")?.height).toBe(720);
  });

  it("falls back to the best variant below the target", () => {
    expect(selectVariant([variant(1080, 5000000), variant(480, 1400000)], "720p")?.height).toBe(480);
  });

  it("falls back to the smallest variant when all are above the target", () => {
    expect(selectVariant([variant(1080, 5000000), variant(720, 2800000)], "360p")?.height).toBe(720);
  });

  it("returns null without variants", () => {
    expect(selectVariant([], "highest")).toBeNull();
  });
});
