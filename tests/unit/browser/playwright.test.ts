import { describe, it, expect } from "vitest";
import { errors } from "playwright-core";
import { pageDriver, translateError, type FrameSurface, type PageSurface } from "../../../stack/browser/playwright.js";
import { frameOffset } from "../../../stack/captcha/drag.js";
import { DriverError } from "../../../stack/framework/errors.js";

describe("translateError", () => {
  it("marks playwright timeouts", () => {
    const original = new errors.TimeoutError("locator.waitFor: Timeout 5000ms exceeded.");
    const translated = translateError(original);

    expect(translated).toBeInstanceOf(DriverError);
    expect(translated).toMatchObject({ kind: "timeout", message: original.message, cause: original });
  });

  it("marks network failures", () => {
    expect(translateError(new Error("page.goto: net::ERR_CONNECTION_REFUSED at https://example.test"))).toMatchObject({
      kind: "network",
    });
  });

  it("marks a closed page", () => {
    expect(translateError(new Error("page.title: Target page, context or browser has been closed"))).toMatchObject({
      kind: "closed",
    });
    expect(translateError(new Error("Browser has been closed."))).toMatchObject({ kind: "closed" });
  });

  it("passes other errors through untouched", () => {
    const original = new Error("Element is not an <input>");
    expect(translateError(original)).toBe(original);
  });

  it("keeps errors that are already classified", () => {
    const original = new DriverError("network", "offline");
    expect(translateError(original)).toBe(original);
  });
});

const unused = (): never => {
  throw new Error("not reached");
};

function stubFrame(url: string): FrameSurface {
  return { url: () => url, name: () => "", title: async () => "", locator: unused, evaluate: unused };
}

function stubPage(main: FrameSurface, child: FrameSurface): PageSurface {
  return {
    goto: unused,
    locator: unused,
    screenshot: unused,
    mouse: { move: unused, down: unused, up: unused },
    mainFrame: () => main,
    frames: () => [main, child],
  };
}

describe("pageDriver", () => {
  const main = stubFrame("https://example.test/login");
  const child = stubFrame("https://captcha.example.test/show");
  const context = { cookies: async () => [] };

  it("hands out the main frame driver from frames()", () => {
    const driver = pageDriver(stubPage(main, child), context);
    expect(driver.frames()[0]).toBe(driver.mainFrame());
  });

  it("keeps one driver per frame across calls", () => {
    const driver = pageDriver(stubPage(main, child), context);
    const [, first] = driver.frames();
    const [, second] = driver.frames();

    expect(first).toBe(second);
    expect(first?.url()).toBe("https://captcha.example.test/show");
  });

  it("puts the main document at the page origin", async () => {
    const driver = pageDriver(stubPage(main, child), context);
    const [top] = driver.frames();

    expect(await frameOffset(driver, top!)).toEqual({ x: 0, y: 0 });
  });
});
