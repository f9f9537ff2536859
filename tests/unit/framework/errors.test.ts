import { describe, it, expect } from "vitest";
import { DriverError, StepError, isTargetClosed, toErrorMessage } from "../../../stack/framework/errors.js";

describe("StepError", () => {
  it("formats message as task.step: reason", () => {
    const err = new StepError("auth:7", "handleCaptcha", "CAPTCHA_NOT_SOLVED");
    expect(err.message).toBe("auth:7.handleCaptcha: CAPTCHA_NOT_SOLVED");
    expect(err.name).toBe("StepError");
  });

  it("keeps the reason and meta", () => {
    const err = new StepError("t", "s", "r", { status: "captcha_failed", summary: "x" });
    expect(err.reason).toBe("r");
    expect(err.meta).toEqual({ status: "captcha_failed", summary: "x" });
  });

  it("defaults meta to an empty object", () => {
    expect(new StepError("t", "s", "r").meta).toEqual({});
  });
});

describe("DriverError", () => {
  it("carries its kind and cause", () => {
    const cause = new Error("net::ERR_NAME_NOT_RESOLVED");
    const err = new DriverError("network", "navigation failed", { cause });
    expect(err.kind).toBe("network");
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("DriverError");
  });
});

describe("isTargetClosed", () => {
  it("is true only for closed driver errors", () => {
    expect(isTargetClosed(new DriverError("closed", "page closed"))).toBe(true);
    expect(isTargetClosed(new DriverError("timeout", "slow"))).toBe(false);
    expect(isTargetClosed(new Error("Target page has been closed"))).toBe(false);
  });
});

describe("toErrorMessage", () => {
  it("returns message for Error instances", () => {
    expect(toErrorMessage(new Error("boom"))).toBe("boom");
  });

  it("stringifies anything else", () => {
    expect(toErrorMessage("plain")).toBe("plain");
    expect(toErrorMessage(42)).toBe("42");
    expect(toErrorMessage(null)).toBe("null");
  });
});
