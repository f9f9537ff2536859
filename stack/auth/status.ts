import { z } from "zod";
import { DriverError, StepError, toErrorMessage } from "../framework/errors.js";

export const AUTH_STATUSES = [
  "success",
  "invalid_credentials",
  "captcha_failed",
  "service_unavailable",
  "unknown_error",
] as const;

export const authStatusSchema = z.enum(AUTH_STATUSES);

export type AuthStatus = z.infer<typeof authStatusSchema>;

export const STATUS_LABELS: Record<AuthStatus, string> = {
  success: "Signed in",
  invalid_credentials: "Invalid credentials",
  captcha_failed: "Captcha not solved",
  service_unavailable: "Service unavailable",
  unknown_error: "Unknown error",
};

export function isAuthStatus(value: unknown): value is AuthStatus {
  return authStatusSchema.safeParse(value).success;
}

const UNAVAILABLE_KEYWORDS = ["timeout", "timed out", "network", "dns"];

/**
 * Maps any failure to one of the five status codes.
 * Typed errors decide first; message keywords are the fallback.
 */
export function classifyFailure(error: unknown): AuthStatus {
  if (error instanceof StepError && isAuthStatus(error.meta.status)) {
    return error.meta.status;
  }
  if (error instanceof DriverError && error.kind !== "closed") {
    return "service_unavailable";
  }
  const message = toErrorMessage(error).toLowerCase();
  if (UNAVAILABLE_KEYWORDS.some((keyword) => message.includes(keyword))) {
    return "service_unavailable";
  }
  return "unknown_error";
}
