import { describe, expect, it } from "vitest";
import { parseClockText } from "./clock.js";

describe("parseClockText", () => {
  it("parses minutes and seconds", () => {
    expect(parseClockText("10:35")).toBe(635);
  });

  it("parses hours", () => {
    expect(parseClockText("1:02:03")).toBe(3723);
  });

  it("ignores the remaining-time minus sign", () => {
    expect(parseClockText("-4:05")).toBe(245);
  });

  it("returns null for zero, empty and malformed text", () => {
    expect(parseClockText("0:00")).toBeNull();
    expect(parseClockText("")).toBeNull();
    expect(parseClockText(null)).toBeNull();
    expect(parseClockText("LIVE")).toBeNull();
  });
});
