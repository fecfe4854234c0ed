import { describe, expect, it } from "vitest";
import { createLoginChecker, formatCookieHeader, isLoginPage } from "./session.js";

describe("session", () => {
  describe("createLoginChecker", () => {
    it("creates checker that matches patterns", () => {
      const checker = createLoginChecker([/\/login/, /\/signin/]);

      expect(checker("https://example.com/login")).toBe(true);
      expect(checker("https://example.com/signin")).toBe(true);
      expect(checker("https://example.com/dashboard")).toBe(false);
    });
  });

  describe("isLoginPage", () => {
    it("detects login and SSO pages", () => {
      expect(isLoginPage("https://school.example.com/users/sign_in")).toBe(true);
      expect(isLoginPage("https://accounts.google.com/o/oauth2/auth")).toBe(true);
      expect(isLoginPage("https://sso.example.com/start")).toBe(true);
    });

    it("returns false for content pages", () => {
      expect(isLoginPage("https://school.example.com/courses/intro")).toBe(false);
    });
  });

  describe("formatCookieHeader", () => {
    it("joins name=value pairs", () => {
      expect(
        formatCookieHeader([
          { name: "sid", value: "test-secret" },
          { name: "theme", value: "dark" },
        ])
      ).toBe("sid=test-secret; theme=dark");
    });
  });
});
