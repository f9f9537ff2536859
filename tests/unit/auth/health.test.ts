import { describe, it, expect } from "vitest";
import { assessSessionHealth, formatTimeLeft } from "../../../stack/auth/health.js";
import type { SessionPayload } from "../../../stack/auth/payload.js";
import { cookie } from "../../fixtures/fake-driver.js";

const NOW = 1_700_000_000;
const OPTIONS = { tokenCookie: "token", warnSec: 86_400, graceSec: 60 };

function payload(expires: number): SessionPayload {
  return {
    cookies: [cookie("uid", "42"), cookie("token", "abc", expires)],
    userAgent: "TestAgent/1.0",
    savedAt: NOW,
    url: "https://example.test/login",
  };
}

describe("assessSessionHealth", () => {
  it("is bad without a stored session", () => {
    expect(assessSessionHealth(null, NOW, OPTIONS)).toEqual({
      level: "bad",
      expiresAt: null,
      secondsLeft: null,
      reason: "no stored session",
    });
  });

  it("is unknown for a session cookie", () => {
    expect(assessSessionHealth(payload(-1), NOW, OPTIONS)).toMatchObject({
      level: "unknown",
      reason: 'cookie "token" has no expiry',
    });
  });

  it("is unknown when the token cookie is absent", () => {
    expect(assessSessionHealth(payload(NOW + 10), NOW, { ...OPTIONS, tokenCookie: "sid" }).level).toBe("unknown");
  });

  it("is ok well before expiry", () => {
    expect(assessSessionHealth(payload(NOW + 2 * 86_400), NOW, OPTIONS)).toEqual({
      level: "ok",
      expiresAt: NOW + 2 * 86_400,
      secondsLeft: 2 * 86_400,
      reason: "ok",
    });
  });

  it("warns inside the warning window", () => {
    expect(assessSessionHealth(payload(NOW + 86_400), NOW, OPTIONS).level).toBe("warn");
  });

  it("is bad inside the grace period", () => {
    expect(assessSessionHealth(payload(NOW + 60), NOW, OPTIONS)).toMatchObject({
      level: "bad",
      secondsLeft: 60,
      reason: "token expired",
    });
  });

  it("truncates fractional expiry", () => {
    expect(assessSessionHealth(payload(NOW + 100.9), NOW, OPTIONS).expiresAt).toBe(NOW + 100);
  });
});

describe("formatTimeLeft", () => {
  it("shows hours and minutes", () => {
    expect(formatTimeLeft(3 * 3600 + 25 * 60 + 10)).toBe("3h 25m");
  });

  it("clamps past expiry to zero", () => {
    expect(formatTimeLeft(-500)).toBe("0h 0m");
  });

  it("reports unknown", () => {
    expect(formatTimeLeft(null)).toBe("unknown");
  });
});
