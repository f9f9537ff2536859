import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { PageDriver, SessionCookie } from "../browser/driver.js";
import type { CaptchaSolver, SolveOutcome } from "../captcha/solver.js";
import type { AppConfig } from "../framework/config.js";
import type { Dumper } from "../framework/dump.js";
import { isTargetClosed, toErrorMessage } from "../framework/errors.js";
import type { StepLogger } from "../framework/logging.js";
import { uniform, type Pacing } from "../utils/pacing.js";
import { pollUntil } from "../utils/poll.js";
import type { SessionStore } from "../vault/store.js";
import type { SessionPayload } from "./payload.js";
import { classifyFailure } from "./status.js";

const TIMINGS = {
  waitField: 15_000,
  waitSubmit: 5000,
  typingPause: { min: 200, max: 600 },
  loginPoll: 500,
} as const;

/** Mutable state shared by the stages of one authorisation. */
export interface LoginContext {
  page: PageDriver;
  config: AppConfig;
  pacing: Pacing;
  dumper: Dumper;
  solver: CaptchaSolver;
  user: { userId: number; username?: string | undefined };
  credentials: { login: string; password: string };
  /** Null when the record should not be written. */
  store: SessionStore | null;
  launchedUserAgent: string | undefined;
  captcha?: SolveOutcome;
  session?: SessionPayload;
  cookiesPath?: string;
}

export function cookiesPathFor(cookiesDir: string, userId: number): string {
  return join(cookiesDir, `session_${userId.toString()}.json`);
}

async function fillField(
  log: StepLogger,
  ctx: LoginContext,
  selector: string,
  value: string,
  reason: string,
): Promise<void> {
  const field = ctx.page.locate(selector);
  try {
    await field.waitFor("visible", TIMINGS.waitField);
    await field.fill(value);
  } catch (error) {
    log.fail(reason, { status: classifyFailure(error), summary: `${selector}: ${toErrorMessage(error)}` });
  }
}

export async function clickSubmit(ctx: LoginContext): Promise<void> {
  const button = ctx.page.locate(ctx.config.login.selectors.submit);
  await button.waitFor("visible", TIMINGS.waitSubmit);
  await button.click();
}

export async function navigate(log: StepLogger, ctx: LoginContext): Promise<void> {
  const { url } = ctx.config.login;
  await ctx.page.goto(url, { waitUntil: "domcontentloaded", timeoutMs: ctx.config.browser.pageTimeoutMs });
  await ctx.dumper.page(ctx.page, "after_goto");
  log.success("Navigated", { url: ctx.page.url() });
}

export async function fillCredentials(log: StepLogger, ctx: LoginContext): Promise<void> {
  const { selectors } = ctx.config.login;
  await fillField(log, ctx, selectors.username, ctx.credentials.login, "USERNAME_INPUT_NOT_FOUND");
  await fillField(log, ctx, selectors.password, ctx.credentials.password, "PASSWORD_INPUT_NOT_FOUND");
  await ctx.pacing.sleep(uniform(ctx.pacing, TIMINGS.typingPause.min, TIMINGS.typingPause.max));
  log.success("Entered credentials");
}

export async function submitLogin(log: StepLogger, ctx: LoginContext): Promise<void> {
  try {
    await clickSubmit(ctx);
  } catch (error) {
    log.fail("SUBMIT_NOT_FOUND", {
      status: classifyFailure(error),
      summary: `${ctx.config.login.selectors.submit}: ${toErrorMessage(error)}`,
    });
  }
  await ctx.dumper.page(ctx.page, "after_fill");
  log.success("Submitted", { url: ctx.page.url() });
}

export async function awaitCaptcha(log: StepLogger, ctx: LoginContext): Promise<void> {
  await ctx.pacing.sleep(ctx.config.captcha.renderWaitMs);
  await ctx.dumper.page(ctx.page, "before_captcha_check");
  const frames = ctx.page.frames();
  log.log("Frames after submit", { count: frames.length, url: ctx.page.url() });
  for (const [index, frame] of frames.entries()) {
    log.log("Frame", { index, name: frame.name() || "(unnamed)", url: frame.url() });
  }
}

export async function handleCaptcha(log: StepLogger, ctx: LoginContext): Promise<void> {
  const outcome = await ctx.solver.solveWithEscalation(() => clickSubmit(ctx));
  ctx.captcha = outcome;
  if (!outcome.solved) {
    await ctx.dumper.page(ctx.page, "captcha_failed");
    log.fail("CAPTCHA_NOT_SOLVED", {
      status: "captcha_failed",
      summary: `Could not solve the captcha (${outcome.reason})`,
    });
  }
  log.success(outcome.state === "no_captcha" ? "No captcha shown" : "Captcha cleared", {
    attempts: outcome.attempts,
    resubmits: outcome.resubmits,
  });
}

async function loginConfirmed(log: StepLogger, ctx: LoginContext): Promise<boolean> {
  const { selector, urlParts } = ctx.config.login.success;
  if (selector) {
    try {
      if (await ctx.page.locate(selector).isVisible()) return true;
    } catch (error) {
      if (isTargetClosed(error)) throw error;
      log.warn("Success selector check failed", { error: toErrorMessage(error) });
    }
  }
  const url = ctx.page.url();
  return urlParts.some((part) => url.includes(part));
}

export async function awaitLogin(log: StepLogger, ctx: LoginContext): Promise<void> {
  const result = await pollUntil(
    () => loginConfirmed(log, ctx),
    (confirmed) => confirmed,
    { timeoutMs: ctx.config.login.timeoutMs, intervalMs: TIMINGS.loginPoll },
    ctx.pacing,
  );
  if (!result.ok) {
    await ctx.dumper.page(ctx.page, "login_not_confirmed");
    log.fail("LOGIN_NOT_CONFIRMED", {
      status: "invalid_credentials",
      summary: "Login not confirmed. Check the login and password.",
      finalUrl: ctx.page.url(),
    });
  }
  log.success("Login confirmed", { url: ctx.page.url() });
}

function missingCookies(cookies: SessionCookie[], required: readonly string[]): string[] {
  const names = new Set(cookies.map((cookie) => cookie.name));
  return required.filter((name) => !names.has(name));
}

export async function harvestSession(log: StepLogger, ctx: LoginContext): Promise<void> {
  const cookies = await ctx.page.cookies();
  const reported = await ctx.page.evaluate("navigator.userAgent");
  const userAgent = typeof reported === "string" ? reported : (ctx.launchedUserAgent ?? "");

  const missing = missingCookies(cookies, ctx.config.requiredCookies);
  if (missing.length > 0) {
    await ctx.dumper.page(ctx.page, "cookies_missing");
    log.fail("REQUIRED_COOKIES_MISSING", {
      status: "unknown_error",
      summary: `Login not confirmed: required cookies missing (${missing.join(", ")})`,
    });
  }

  ctx.session = {
    cookies,
    userAgent,
    savedAt: Math.floor(ctx.pacing.now() / 1000),
    url: ctx.config.login.url,
  };
  log.success("Session harvested", { cookies: cookies.length });
}

export async function persistSession(log: StepLogger, ctx: LoginContext): Promise<void> {
  const { session } = ctx;
  if (!session) {
    log.fail("NO_SESSION_HARVESTED", { status: "unknown_error" });
  }

  const { cookiesDir } = ctx.config.paths;
  await mkdir(cookiesDir, { recursive: true });
  const path = cookiesPathFor(cookiesDir, ctx.user.userId);
  await writeFile(path, JSON.stringify(session, null, 2), "utf-8");
  ctx.cookiesPath = path;

  if (ctx.store) {
    ctx.store.saveSession({
      ...ctx.user,
      ...ctx.credentials,
      payload: session,
      userAgent: session.userAgent,
      status: "success",
    });
  }
  log.success("Session saved", { path, database: ctx.store !== null });
}
