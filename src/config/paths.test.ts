import { describe, expect, it } from "vitest";
import { homedir } from "node:os";
import {
  APP_DIR,
  DEFAULT_CHECKPOINT_FILE,
  expandPath,
  getBackupPath,
  getSessionPath,
} from "./paths.js";

/** Normalize path to POSIX format for cross-platform test assertions */
const toPosix = (p: string) => p.replace(/\\/g, "/");

describe("expandPath", () => {
  it("expands ~ to home directory", () => {
    const result = toPosix(expandPath("~/Downloads/coursekeep"));
    expect(result).toBe(`${toPosix(homedir())}/Downloads/coursekeep`);
  });

  it("returns absolute paths unchanged", () => {
    expect(expandPath("/usr/local/bin")).toBe("/usr/local/bin");
  });

  it("returns relative paths unchanged", () => {
    expect(expandPath("relative/path")).toBe("relative/path");
  });
});

describe("getSessionPath", () => {
  it("stores sessions under the app directory", () => {
    const result = toPosix(getSessionPath("learn.example.com"));
    expect(result).toBe(`${toPosix(APP_DIR)}/sessions/learn.example.com.json`);
  });

  it("replaces invalid filesystem characters with underscores", () => {
    expect(getSessionPath("localhost:3000").endsWith("localhost_3000.json")).toBe(true);
  });
});

describe("getBackupPath", () => {
  it("appends .backup to the ledger file", () => {
    expect(getBackupPath("/tmp/progress.json")).toBe("/tmp/progress.json.backup");
  });
});

describe("DEFAULT_CHECKPOINT_FILE", () => {
  it("lives in the app directory", () => {
    expect(toPosix(DEFAULT_CHECKPOINT_FILE)).toBe(`${toPosix(APP_DIR)}/download_progress.json`);
  });
});
