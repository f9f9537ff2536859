// Browser capability the captcha solver and auth flow command.
// stack/browser/playwright.ts implements it; tests use tests/fixtures/fake-driver.ts.

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

export type ElementState = "attached" | "visible";

/** First element matching a selector, resolved lazily on every call. */
export interface ElementDriver {
  count: () => Promise<number>;
  waitFor: (state: ElementState, timeoutMs: number) => Promise<void>;
  isVisible: () => Promise<boolean>;
  boundingBox: () => Promise<Box | null>;
  screenshot: () => Promise<Buffer>;
  fill: (value: string) => Promise<void>;
  click: () => Promise<void>;
}

export interface FrameDriver {
  url: () => string;
  name: () => string;
  title: () => Promise<string>;
  locate: (selector: string) => ElementDriver;
  evaluate: (expression: string) => Promise<unknown>;
}

/** An `<iframe>` element in the page DOM. */
export interface IframeElement {
  contentUrl: () => Promise<string | null>;
  boundingBox: () => Promise<Box | null>;
}

/** Page-global pointer; coordinates are CSS pixels of the top-level page. */
export interface Pointer {
  move: (x: number, y: number) => Promise<void>;
  down: () => Promise<void>;
  up: () => Promise<void>;
}

export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  /** Unix seconds; -1 for a session cookie. */
  expires: number;
  httpOnly: boolean;
  secure: boolean;
  sameSite: "Strict" | "Lax" | "None";
}

export interface PageDriver extends FrameDriver {
  goto: (url: string, options: { waitUntil: "load" | "domcontentloaded"; timeoutMs: number }) => Promise<void>;
  frames: () => FrameDriver[];
  mainFrame: () => FrameDriver;
  iframeElements: () => Promise<IframeElement[]>;
  pointer: Pointer;
  cookies: () => Promise<SessionCookie[]>;
  screenshot: () => Promise<Buffer>;
}

export interface LaunchOptions {
  headless: boolean;
  proxy?: string | undefined;
  locale: string;
  timezone: string;
  userAgent?: string | undefined;
  pageTimeoutMs: number;
  slowMoMs: number;
  executablePath?: string | undefined;
}

/** One browser, one context, one page, owned by a single authorisation. */
export interface BrowserSession {
  page: PageDriver;
  close: () => Promise<void>;
}

export interface BrowserLauncher {
  launch: (options: LaunchOptions) => Promise<BrowserSession>;
}
