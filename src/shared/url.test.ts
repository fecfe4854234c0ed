import { describe, expect, it } from "vitest";
import { getDomain, getPathname, getUrlPath } from "./url.js";

describe("getPathname", () => {
  it("drops query and hash", () => {
    expect(getPathname("https://cdn.example.com/v/seg-1.ts?token=abc#t=3")).toBe("/v/seg-1.ts");
  });

  it("handles relative input", () => {
    expect(getPathname("v/seg-1.ts?token=abc")).toBe("v/seg-1.ts");
  });
});

describe("getUrlPath", () => {
  it("strips the trailing slash", () => {
    expect(getUrlPath("https://school.example.com/courses/intro/?tab=units")).toBe(
      "/courses/intro"
    );
  });

  it("keeps the root path", () => {
    expect(getUrlPath("https://school.example.com")).toBe("/");
  });
});

describe("getDomain", () => {
  it("returns the host name", () => {
    expect(getDomain("https://school.example.com:8443/courses")).toBe("school.example.com");
  });
});
