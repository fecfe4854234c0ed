import { describe, expect, it } from "vitest";
import { classifyManifestUrl, ManifestSniffer } from "./manifestSniffer.js";

describe("classifyManifestUrl", () => {
  it("recognises HLS and DASH manifests by path", () => {
    expect(classifyManifestUrl("https://cdn.example.com/v/master.m3u8?token=abc")).toBe("hls");
    expect(classifyManifestUrl("https://cdn.example.com/v/Manifest.MPD")).toBe("dash");
    expect(classifyManifestUrl("https://cdn.example.com/v/seg-1.ts")).toBeNull();
  });
});

describe("ManifestSniffer", () => {
  it("prefers HLS and keeps DASH as the fallback", () => {
    const sniffer = new ManifestSniffer();
    sniffer.observe("https://cdn.example.com/v/manifest.mpd");
    sniffer.observe("https://cdn.example.com/v/master.m3u8");
    sniffer.observe("https://cdn.example.com/v/720p.m3u8");

    expect(sniffer.primary).toEqual({ url: "https://cdn.example.com/v/master.m3u8", format: "hls" });
    expect(sniffer.fallback).toEqual({ url: "https://cdn.example.com/v/manifest.mpd", format: "dash" });
  });

  it("uses DASH as primary when it is the only format", () => {
    const sniffer = new ManifestSniffer();
    sniffer.observe("https://cdn.example.com/v/manifest.mpd");

    expect(sniffer.primary).toEqual({ url: "https://cdn.example.com/v/manifest.mpd", format: "dash" });
    expect(sniffer.fallback).toBeNull();
  });

  it("reports nothing before a manifest shows up", () => {
    const sniffer = new ManifestSniffer();
    expect(sniffer.observe("https://cdn.example.com/app.js")).toBe(false);
    expect(sniffer.primary).toBeNull();
  });
});
