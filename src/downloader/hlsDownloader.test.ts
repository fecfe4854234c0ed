import { describe, expect, it } from "vitest";
import { statusError, toFetchError } from "./hlsDownloader.js";
import { MediaError } from "./shared/errors.js";

describe("statusError", () => {
  it("marks 403 responses as forbidden", () => {
    const error = statusError(403, "HLS manifest");
    expect(error.code).toBe("FORBIDDEN");
    expect(error.statusCode).toBe(403);
    expect(error.message).toBe("HLS manifest returned 403");
  });

  it("marks 429 responses as rate limited", () => {
    expect(statusError(429, "HLS manifest").code).toBe("RATE_LIMITED");
  });

  it("keeps other statuses as fetch failures", () => {
    expect(statusError(404, "HLS manifest").code).toBe("FETCH_FAILED");
  });
});

describe("toFetchError", () => {
  it("passes MediaErrors through", () => {
    const original = new MediaError("not a playlist", "PARSE_ERROR");
    expect(toFetchError(original, "HLS manifest")).toBe(original);
  });

  it("wraps other failures as network errors", () => {
    const error = toFetchError(new Error("socket hang up"), "HLS manifest");
    expect(error.code).toBe("NETWORK_ERROR");
    expect(error.message).toBe("Failed to fetch HLS manifest: socket hang up");
  });
});
