import { describe, expect, it } from "vitest";
import {
  isForbiddenError,
  isTerminalMediaError,
  MediaError,
  remediationHint,
  toFailureResult,
} from "./errors.js";

describe("MediaError", () => {
  it("converts to a failed result", () => {
    const error = new MediaError("HLS URL returned 403", "FORBIDDEN", 403, undefined, "retry later");
    expect(error.toResult()).toEqual({
      success: false,
      error: "HLS URL returned 403",
      errorCode: "FORBIDDEN",
      details: undefined,
      hint: "retry later",
    });
  });
});

describe("isForbiddenError", () => {
  it("matches forbidden codes, statuses and messages", () => {
    expect(isForbiddenError(new MediaError("nope", "FETCH_FAILED", 403))).toBe(true);
    expect(isForbiddenError(new MediaError("nope", "FORBIDDEN"))).toBe(true);
    expect(isForbiddenError(new Error("Server returned 403 Forbidden"))).toBe(true);
    expect(isForbiddenError(new Error("HTTP 404"))).toBe(false);
    expect(isForbiddenError("403")).toBe(false);
  });
});

describe("isTerminalMediaError", () => {
  it("flags errors another attempt cannot fix", () => {
    expect(isTerminalMediaError(new MediaError("x", "INCOMPATIBLE_ENGINE"))).toBe(true);
    expect(isTerminalMediaError(new MediaError("x", "NETWORK_ERROR"))).toBe(false);
    expect(isTerminalMediaError(new Error("x"))).toBe(false);
  });
});

describe("toFailureResult", () => {
  it("uses the fallback code for plain errors", () => {
    expect(toFailureResult(new Error("boom"), "DOWNLOAD_FAILED")).toEqual({
      success: false,
      error: "boom",
      errorCode: "DOWNLOAD_FAILED",
    });
  });
});

describe("remediationHint", () => {
  it("points chromium users at firefox", () => {
    expect(remediationHint("INCOMPATIBLE_ENGINE")).toBe(
      "use firefox (`--browser firefox`) for DASH manifests"
    );
  });

  it("falls back to a batch retry", () => {
    expect(remediationHint(undefined)).toBe("run `coursekeep retry-failed` to try again");
  });
});
