import type { BrowserLauncher, BrowserSession, LaunchOptions } from "../browser/driver.js";
import { TENCENT_SIGNATURES, type CaptchaSignatures } from "../captcha/signatures.js";
import { CaptchaSolver } from "../captcha/solver.js";
import type { AppConfig } from "../framework/config.js";
import { createDumper, noopDumper, type Dumper } from "../framework/dump.js";
import { StepError, toErrorMessage } from "../framework/errors.js";
import {
  createPrefixLogger,
  createTaskLogger,
  type LogOutput,
  type PrefixLogger,
} from "../framework/logging.js";
import { StageRunner, type StageUpdate } from "../framework/stage-runner.js";
import { pick, realPacing, type Pacing } from "../utils/pacing.js";
import type { SessionCipher } from "../vault/crypto.js";
import type { AuthRecord, SessionStore } from "../vault/store.js";
import {
  awaitCaptcha,
  awaitLogin,
  fillCredentials,
  handleCaptcha,
  harvestSession,
  navigate,
  persistSession,
  submitLogin,
  type LoginContext,
} from "./flow.js";
import type { SessionHealth } from "./health.js";
import type { AdminNotifier } from "./notify.js";
import { SessionQueries } from "./queries.js";
import { classifyFailure, type AuthStatus } from "./status.js";

export interface AuthRequest {
  userId: number;
  username?: string | undefined;
  login: string;
  password: string;
  /** Defaults to true. */
  saveToDb?: boolean;
  /** Overrides the configured debug dump directory. */
  debugDumpDir?: string | undefined;
}

export interface AuthResult {
  success: boolean;
  message: string;
  status: AuthStatus;
  /** Last stage that started: "precondition" before launch, "launch" when the browser failed to start. */
  phase: string;
  cookiesPath?: string;
  userAgent?: string;
}

export interface AuthServiceDeps {
  config: AppConfig;
  launcher: BrowserLauncher;
  /** Opened lazily once the encryption key has been validated. */
  openStore: (cipher: SessionCipher) => Promise<SessionStore>;
  notifier: AdminNotifier;
  signatures?: CaptchaSignatures;
  pacing?: Pacing;
  output?: LogOutput;
  onUpdate?: (update: StageUpdate) => void;
}

const PRECONDITION = "precondition";

/** Fills credentials, clears the slider captcha, confirms login, then stores the session. */
export class AuthService {
  private readonly queries: SessionQueries;
  private readonly pacing: Pacing;
  private readonly log: PrefixLogger;
  private readonly signatures: CaptchaSignatures;

  constructor(private readonly deps: AuthServiceDeps) {
    this.pacing = deps.pacing ?? realPacing;
    this.log = createPrefixLogger("auth", deps.output);
    this.signatures = deps.signatures ?? TENCENT_SIGNATURES;
    this.queries = new SessionQueries({ config: deps.config, openStore: deps.openStore, pacing: this.pacing });
  }

  close(): void {
    this.queries.close();
  }

  private launchOptions(): LaunchOptions {
    const { browser } = this.deps.config;
    return {
      headless: browser.headless,
      proxy: browser.proxy,
      locale: browser.locale,
      timezone: browser.timezone,
      userAgent: pick(this.pacing, browser.userAgents),
      pageTimeoutMs: browser.pageTimeoutMs,
      slowMoMs: browser.slowMoMs,
      executablePath: browser.executablePath,
    };
  }

  private async report(
    request: AuthRequest,
    store: SessionStore | null,
    result: AuthResult,
    details: string,
  ): Promise<AuthResult> {
    if (store && !result.success) {
      try {
        store.updateStatus({ userId: request.userId, username: request.username, status: result.status });
      } catch (error) {
        this.log.error("Could not record status", { error: toErrorMessage(error) });
      }
    }
    await this.deps.notifier.notify({
      status: result.status,
      userId: request.userId,
      username: request.username,
      details,
    });
    return result;
  }

  async authorizeUser(request: AuthRequest): Promise<AuthResult> {
    const login = request.login.trim();
    const password = request.password.trim();
    if (!login || !password) {
      return {
        success: false,
        message: "Login and password are required.",
        status: "invalid_credentials",
        phase: PRECONDITION,
      };
    }

    let store: SessionStore;
    try {
      store = await this.queries.open();
    } catch (error) {
      this.log.error("Session store unavailable", { error: toErrorMessage(error) });
      return {
        success: false,
        message: `Encryption is not configured: ${toErrorMessage(error)}`,
        status: "unknown_error",
        phase: PRECONDITION,
      };
    }
    const saving = (request.saveToDb ?? true) ? store : null;

    const taskLogger = createTaskLogger(`auth:${request.userId.toString()}`, this.deps.output);
    const dumpDir = request.debugDumpDir ?? this.deps.config.paths.debugDir;
    const dumper: Dumper = dumpDir ? createDumper(dumpDir, this.log) : noopDumper;
    const runner = new StageRunner({
      taskLogger,
      frameworkLogger: this.log,
      ...(this.deps.onUpdate ? { onUpdate: this.deps.onUpdate } : {}),
    });

    let session: BrowserSession | null = null;
    try {
      const options = this.launchOptions();
      this.log.log("Launching browser", { headless: options.headless, userAgent: options.userAgent ?? "default" });
      session = await this.deps.launcher.launch(options);
      const { page } = session;
      const { captcha } = this.deps.config;

      const ctx: LoginContext = {
        page,
        config: this.deps.config,
        pacing: this.pacing,
        dumper,
        solver: new CaptchaSolver({
          page,
          options: {
            selectors: captcha.selectors,
            signatures: this.signatures,
            minConfidence: captcha.minConfidence,
            maxAttempts: captcha.maxAttempts,
            maxResubmits: captcha.maxResubmits,
            dragDeltas: captcha.dragDeltas,
          },
          pacing: this.pacing,
          log: createPrefixLogger("captcha", this.deps.output),
          dumper,
        }),
        user: { userId: request.userId, username: request.username },
        credentials: { login, password },
        store: saving,
        launchedUserAgent: options.userAgent,
      };

      runner
        .stage(navigate, ctx)
        .stage(fillCredentials, ctx)
        .stage(submitLogin, ctx)
        .stage(awaitCaptcha, ctx)
        .stage(handleCaptcha, ctx)
        .stage(awaitLogin, ctx)
        .stage(harvestSession, ctx)
        .stage(persistSession, ctx);
      const phase = await runner.execute();

      const result: AuthResult = {
        success: true,
        message: "Authorized. Cookies saved.",
        status: "success",
        phase,
        ...(ctx.cookiesPath ? { cookiesPath: ctx.cookiesPath } : {}),
        ...(ctx.session ? { userAgent: ctx.session.userAgent } : {}),
      };
      return await this.report(request, saving, result, "");
    } catch (error) {
      const status = classifyFailure(error);
      const details =
        error instanceof StepError ? (error.meta.summary ?? error.reason) : toErrorMessage(error);
      if (!(error instanceof StepError) && session) {
        await dumper.page(session.page, "exception");
      }
      this.log.error("Authorization failed", { status, phase: runner.reached, error: details });
      return await this.report(
        request,
        saving,
        {
          success: false,
          message: error instanceof StepError ? details : `Authorization error: ${details}`,
          status,
          phase: runner.reached || "launch",
        },
        details,
      );
    } finally {
      if (session && !this.deps.config.browser.keepOpen) {
        try {
          await session.close();
        } catch (error) {
          this.log.warn("Browser close failed", { error: toErrorMessage(error) });
        }
      }
    }
  }

  status(userId: number): Promise<AuthRecord | null> {
    return this.queries.status(userId);
  }

  sessionHealth(userId: number): Promise<SessionHealth> {
    return this.queries.sessionHealth(userId);
  }
}
