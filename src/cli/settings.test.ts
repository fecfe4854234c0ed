import { homedir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { configSchema } from "../config/schema.js";
import { applyConfigValue, resolveSettings } from "./settings.js";

const defaults = configSchema.parse({});

describe("resolveSettings", () => {
  it("uses the saved configuration without flags", () => {
    expect(resolveSettings(defaults)).toEqual({
      outputDir: join(homedir(), "Downloads", "coursekeep"),
      checkpointFile: join(homedir(), ".coursekeep", "download_progress.json"),
      engine: "firefox",
      headless: true,
      quality: "highest",
      overwrite: false,
      retryAttempts: 5,
      retryDelayMs: 1000,
      unitDelayMs: 1500,
      verbose: false,
    });
  });

  it("lets flags override the configuration", () => {
    const settings = resolveSettings(defaults, {
      browser: "chromium",
      visible: true,
      quality: "720p",
      overwrite: true,
      checkpoint: "/tmp/progress.json",
      output: "/archive",
      verbose: true,
    });

    expect(settings).toMatchObject({
      outputDir: "/archive",
      checkpointFile: "/tmp/progress.json",
      engine: "chromium",
      headless: false,
      quality: "720p",
      overwrite: true,
      verbose: true,
    });
  });

  it("keeps a configured overwrite when the flag is absent", () => {
    expect(resolveSettings({ ...defaults, overwrite: true }).overwrite).toBe(true);
  });

  it("rejects unknown engines and qualities", () => {
    expect(() => resolveSettings(defaults, { browser: "edge" })).toThrow(
      'Unknown browser "edge". Use one of: chromium, firefox, webkit'
    );
    expect(() => resolveSettings(defaults, { quality: "4k" })).toThrow(/^Unknown quality "4k"/);
  });
});

describe("applyConfigValue", () => {
  it("parses values by the type of the current setting", () => {
    expect(applyConfigValue(defaults, "retryAttempts", "3").retryAttempts).toBe(3);
    expect(applyConfigValue(defaults, "headless", "false").headless).toBe(false);
    expect(applyConfigValue(defaults, "outputDir", "/archive").outputDir).toBe("/archive");
  });

  it("leaves other keys untouched", () => {
    const updated = applyConfigValue(defaults, "browser", "webkit");

    expect(updated).toEqual({ ...defaults, browser: "webkit" });
  });

  it("rejects unknown keys", () => {
    expect(() => applyConfigValue(defaults, "colour", "red")).toThrow(
      /^Unknown config key: colour\. Valid keys: outputDir, /
    );
  });

  it("rejects values that do not parse", () => {
    expect(() => applyConfigValue(defaults, "unitDelayMs", "soon")).toThrow("Invalid number: soon");
    expect(() => applyConfigValue(defaults, "overwrite", "maybe")).toThrow("Invalid boolean: maybe");
  });

  it("rejects values outside the schema", () => {
    expect(() => applyConfigValue(defaults, "videoQuality", "4k")).toThrow(
      "Invalid value for videoQuality: 4k"
    );
    expect(() => applyConfigValue(defaults, "retryAttempts", "0")).toThrow(
      "Invalid value for retryAttempts: 0"
    );
  });
});
