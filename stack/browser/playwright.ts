import {
  chromium,
  errors,
  type BrowserContext,
  type Frame,
  type Locator,
  type Mouse,
  type Page,
} from "playwright-core";
import { DriverError, toErrorMessage } from "../framework/errors.js";
import { noopLogger, type PrefixLogger } from "../framework/logging.js";
import type {
  BrowserLauncher,
  BrowserSession,
  ElementDriver,
  FrameDriver,
  IframeElement,
  LaunchOptions,
  PageDriver,
} from "./driver.js";

const CHROMIUM_ARGS = [
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-dev-shm-usage",
  "--disable-gpu",
  "--disable-software-rasterizer",
];

/** The parts of playwright's Frame and Page the drivers call. */
export type FrameSurface = Pick<Frame, "url" | "name" | "title" | "locator" | "evaluate">;

export interface PageSurface extends Pick<Page, "goto" | "locator" | "screenshot"> {
  mouse: Pick<Mouse, "move" | "down" | "up">;
  mainFrame(): FrameSurface;
  frames(): FrameSurface[];
}

const CLOSED_PATTERN = /target (?:page, context or browser )?(?:has been )?closed|browser has been closed/iu;

/** Tags a playwright failure with the kind the auth flow classifies on; other errors pass through. */
export function translateError(error: unknown): unknown {
  if (error instanceof DriverError) return error;
  if (error instanceof errors.TimeoutError) {
    return new DriverError("timeout", error.message, { cause: error });
  }
  const message = toErrorMessage(error);
  if (message.includes("net::ERR_")) {
    return new DriverError("network", message, { cause: error });
  }
  if (CLOSED_PATTERN.test(message)) {
    return new DriverError("closed", message, { cause: error });
  }
  return error;
}

async function guard<T>(call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw translateError(error);
  }
}

function elementDriver(locator: Locator): ElementDriver {
  return {
    count: () => guard(() => locator.count()),
    waitFor: (state, timeoutMs) => guard(() => locator.waitFor({ state, timeout: timeoutMs })),
    isVisible: () => guard(() => locator.isVisible()),
    boundingBox: () => guard(() => locator.boundingBox()),
    screenshot: () => guard(() => locator.screenshot()),
    fill: (value) => guard(() => locator.fill(value)),
    click: () => guard(() => locator.click()),
  };
}

function frameDriver(frame: FrameSurface): FrameDriver {
  return {
    url: () => frame.url(),
    name: () => frame.name(),
    title: () => guard(() => frame.title()),
    locate: (selector) => elementDriver(frame.locator(selector).first()),
    evaluate: (expression) => guard(async (): Promise<unknown> => frame.evaluate(expression)),
  };
}

function iframeElement(locator: Locator): IframeElement {
  return {
    contentUrl: () =>
      guard(async () => {
        const handle = await locator.elementHandle();
        const frame = handle ? await handle.contentFrame() : null;
        return frame ? frame.url() : null;
      }),
    boundingBox: () => guard(() => locator.boundingBox()),
  };
}

/** One driver per playwright frame, so identity checks against mainFrame() hold. */
export function pageDriver(page: PageSurface, context: Pick<BrowserContext, "cookies">): PageDriver {
  const drivers = new WeakMap<FrameSurface, FrameDriver>();
  const wrap = (frame: FrameSurface): FrameDriver => {
    let driver = drivers.get(frame);
    if (!driver) {
      driver = frameDriver(frame);
      drivers.set(frame, driver);
    }
    return driver;
  };
  const main = wrap(page.mainFrame());
  return {
    ...main,
    goto: (url, options) =>
      guard(async () => {
        await page.goto(url, { waitUntil: options.waitUntil, timeout: options.timeoutMs });
      }),
    frames: () => page.frames().map(wrap),
    mainFrame: () => main,
    iframeElements: () =>
      guard(async () => (await page.locator("iframe").all()).map(iframeElement)),
    pointer: {
      move: (x, y) => guard(() => page.mouse.move(x, y)),
      down: () => guard(() => page.mouse.down()),
      up: () => guard(() => page.mouse.up()),
    },
    cookies: () =>
      guard(async () =>
        (await context.cookies()).map((cookie) => ({
          name: cookie.name,
          value: cookie.value,
          domain: cookie.domain,
          path: cookie.path,
          expires: cookie.expires,
          httpOnly: cookie.httpOnly,
          secure: cookie.secure,
          sameSite: cookie.sameSite,
        })),
      ),
    screenshot: () => guard(() => page.screenshot({ fullPage: true })),
  };
}

/** Chromium through playwright-core; the browser binary comes from the host or BROWSER_EXECUTABLE_PATH. */
export class PlaywrightLauncher implements BrowserLauncher {
  constructor(private readonly log: PrefixLogger = noopLogger) {}

  async launch(options: LaunchOptions): Promise<BrowserSession> {
    const browser = await guard(() =>
      chromium.launch({
        headless: options.headless,
        args: CHROMIUM_ARGS,
        chromiumSandbox: false,
        ...(options.slowMoMs > 0 ? { slowMo: options.slowMoMs } : {}),
        ...(options.proxy ? { proxy: { server: options.proxy } } : {}),
        ...(options.executablePath ? { executablePath: options.executablePath } : {}),
      }),
    );

    try {
      const context = await browser.newContext({
        locale: options.locale,
        timezoneId: options.timezone,
        ...(options.userAgent ? { userAgent: options.userAgent } : {}),
      });
      const page = await context.newPage();
      page.setDefaultTimeout(options.pageTimeoutMs);

      // Permission prompts and alerts would block every later call
      page.on("dialog", (dialog) => {
        this.log.log("Dismissing browser dialog", { type: dialog.type() });
        dialog.dismiss().catch((error: unknown) => {
          this.log.warn("Dialog dismiss failed", { error: toErrorMessage(error) });
        });
      });

      return {
        page: pageDriver(page, context),
        close: () => guard(() => browser.close()),
      };
    } catch (error) {
      await browser.close();
      throw translateError(error);
    }
  }
}
