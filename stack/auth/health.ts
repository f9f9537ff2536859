import type { SessionPayload } from "./payload.js";

export type HealthLevel = "ok" | "warn" | "bad" | "unknown";

export interface SessionHealth {
  level: HealthLevel;
  /** Unix seconds. */
  expiresAt: number | null;
  secondsLeft: number | null;
  reason: string;
}

export interface HealthOptions {
  tokenCookie: string;
  warnSec: number;
  graceSec: number;
}

function tokenExpiry(payload: SessionPayload, name: string): number | null {
  const cookie = payload.cookies.find((candidate) => candidate.name === name);
  if (!cookie || cookie.expires <= 0) return null;
  return Math.trunc(cookie.expires);
}

/** Judges a stored session by the expiry of its token cookie, offline. */
export function assessSessionHealth(
  payload: SessionPayload | null,
  nowSec: number,
  options: HealthOptions,
): SessionHealth {
  if (!payload) {
    return { level: "bad", expiresAt: null, secondsLeft: null, reason: "no stored session" };
  }

  const expiresAt = tokenExpiry(payload, options.tokenCookie);
  if (expiresAt === null) {
    return {
      level: "unknown",
      expiresAt: null,
      secondsLeft: null,
      reason: `cookie "${options.tokenCookie}" has no expiry`,
    };
  }

  const secondsLeft = expiresAt - Math.trunc(nowSec);
  if (secondsLeft <= options.graceSec) {
    return { level: "bad", expiresAt, secondsLeft, reason: "token expired" };
  }
  if (secondsLeft <= options.warnSec) {
    return { level: "warn", expiresAt, secondsLeft, reason: "token expires soon" };
  }
  return { level: "ok", expiresAt, secondsLeft, reason: "ok" };
}

export function formatTimeLeft(secondsLeft: number | null): string {
  if (secondsLeft === null) return "unknown";
  const clamped = Math.max(0, secondsLeft);
  const hours = Math.floor(clamped / 3600);
  const minutes = Math.floor((clamped % 3600) / 60);
  return `${hours.toString()}h ${minutes.toString()}m`;
}
