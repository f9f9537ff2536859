import { z } from "zod";
import { fromRoot } from "./paths.js";

const DEFAULT_SLIDER_ALTERNATES = ["#tcaptcha_drag_button", ".tc-drag-thumb", "[id*='drag']"];
const DEFAULT_DRAG_DELTAS = [0, -6, 6, -12, 12];

// Empty strings count as unset, matching how .env files are usually written
const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const text = (fallback: string): z.ZodType<string, z.ZodTypeDef, string | undefined> =>
  optionalText.transform((value) => value ?? fallback);

const list = (fallback: readonly string[]): z.ZodType<string[], z.ZodTypeDef, string | undefined> =>
  optionalText.transform((value) =>
    value === undefined
      ? [...fallback]
      : value
          .split(",")
          .map((item) => item.trim())
          .filter((item) => item.length > 0),
  );

const number = (fallback: number): z.ZodType<number, z.ZodTypeDef, string | undefined> =>
  optionalText.pipe(z.coerce.number().finite().optional()).transform((value) => value ?? fallback);

const flag = (fallback: boolean): z.ZodType<boolean, z.ZodTypeDef, string | undefined> =>
  optionalText
    .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]).optional())
    .transform((value) => (value === undefined ? fallback : ["true", "1", "yes"].includes(value)));

// Enough to open the session store; the read-only commands need nothing more
const storeShape = {
  SESSION_ENCRYPTION_KEY: optionalText,
  SESSION_DB_PATH: text("sessions.db"),
  TOKEN_COOKIE_NAME: text("token"),
  TOKEN_EXPIRY_WARN_SEC: number(86_400).pipe(z.number().nonnegative()),
  TOKEN_EXPIRE_GRACE_SEC: number(60).pipe(z.number().nonnegative()),
};

const storeSchema = z.object(storeShape);

const envSchema = z
  .object({
    ...storeShape,
    LOGIN_URL: optionalText.pipe(z.string().url()),
    LOGIN_USERNAME_SELECTOR: text("input[type='text']"),
    LOGIN_PASSWORD_SELECTOR: text("input[type='password']"),
    LOGIN_SUBMIT_SELECTOR: text("button[type='submit']"),
    LOGIN_SUCCESS_SELECTOR: optionalText,
    LOGIN_SUCCESS_URL_PARTS: list([]),
    LOGIN_TIMEOUT_SEC: number(120).pipe(z.number().positive()),
    CAPTCHA_CONTAINER_SELECTOR: text("#slideBgWrap"),
    CAPTCHA_BG_SELECTOR: text("#slideBg"),
    CAPTCHA_PIECE_SELECTOR: text("#slideBlock"),
    CAPTCHA_SLIDER_SELECTOR: text("#tcaptcha_drag_thumb"),
    CAPTCHA_SLIDER_ALT_SELECTORS: list(DEFAULT_SLIDER_ALTERNATES),
    CAPTCHA_MIN_CONFIDENCE: number(0.15).pipe(z.number().min(0).max(1)),
    CAPTCHA_MAX_ATTEMPTS: number(3).pipe(z.number().int().positive()),
    CAPTCHA_RESUBMIT_MAX: number(5).pipe(z.number().int().positive()),
    CAPTCHA_DRAG_DELTAS: list(DEFAULT_DRAG_DELTAS.map(String)).pipe(
      z.array(z.coerce.number().int()).min(1),
    ),
    CAPTCHA_RENDER_WAIT_MS: number(3000).pipe(z.number().nonnegative()),
    PAGE_TIMEOUT_MS: number(60_000).pipe(z.number().positive()),
    BROWSER_HEADLESS: flag(true),
    BROWSER_PROXY: optionalText,
    BROWSER_LOCALE: text("zh-CN"),
    BROWSER_TIMEZONE: text("Asia/Shanghai"),
    BROWSER_UA_POOL: optionalText.transform((value) =>
      value === undefined
        ? []
        : value
            .split("|")
            .map((item) => item.trim())
            .filter((item) => item.length > 0),
    ),
    BROWSER_KEEP_OPEN: flag(false),
    BROWSER_SLOWMO_MS: number(0).pipe(z.number().nonnegative()),
    BROWSER_EXECUTABLE_PATH: optionalText,
    DISPLAY: optionalText,
    REQUIRED_COOKIES: list([]),
    ADMIN_NOTIFY_MODE: text("errors").pipe(z.enum(["all", "errors", "none"])),
    TELEGRAM_BOT_TOKEN: optionalText,
    ADMIN_CHAT_ID: optionalText,
    COOKIES_DIR: text("cookies"),
    DEBUG_DUMP_DIR: optionalText,
  })
  .refine((env) => env.LOGIN_SUCCESS_SELECTOR !== undefined || env.LOGIN_SUCCESS_URL_PARTS.length > 0, {
    message: "Set LOGIN_SUCCESS_SELECTOR or LOGIN_SUCCESS_URL_PARTS",
    path: ["LOGIN_SUCCESS_SELECTOR"],
  });

export interface StoreConfig {
  /** Base64 of 32 bytes; authorisation fails fast when absent. */
  encryptionKey: string | undefined;
  paths: { database: string };
  health: {
    tokenCookie: string;
    warnSec: number;
    graceSec: number;
  };
}

export interface AppConfig extends StoreConfig {
  login: {
    url: string;
    selectors: { username: string; password: string; submit: string };
    success: { selector: string | undefined; urlParts: string[] };
    timeoutMs: number;
  };
  captcha: {
    selectors: {
      container: string;
      background: string;
      piece: string;
      slider: string;
      sliderAlternates: string[];
    };
    minConfidence: number;
    maxAttempts: number;
    maxResubmits: number;
    dragDeltas: number[];
    renderWaitMs: number;
  };
  browser: {
    /** Forced on when there is no display to draw on. */
    headless: boolean;
    proxy: string | undefined;
    locale: string;
    timezone: string;
    userAgents: string[];
    keepOpen: boolean;
    slowMoMs: number;
    pageTimeoutMs: number;
    executablePath: string | undefined;
  };
  requiredCookies: string[];
  notify: {
    mode: "all" | "errors" | "none";
    botToken: string | undefined;
    chatId: string | undefined;
  };
  paths: {
    database: string;
    cookiesDir: string;
    debugDir: string | undefined;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

function parseEnv<Output>(schema: z.ZodType<Output, z.ZodTypeDef, unknown>, env: NodeJS.ProcessEnv): Output {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
    );
  }
  return parsed.data;
}

function storeSection(vars: z.output<typeof storeSchema>): StoreConfig {
  return {
    encryptionKey: vars.SESSION_ENCRYPTION_KEY,
    paths: { database: fromRoot(vars.SESSION_DB_PATH) },
    health: {
      tokenCookie: vars.TOKEN_COOKIE_NAME,
      warnSec: vars.TOKEN_EXPIRY_WARN_SEC,
      graceSec: vars.TOKEN_EXPIRE_GRACE_SEC,
    },
  };
}

/** Only what reading the session store needs; login settings are not required. */
export function loadStoreConfig(env: NodeJS.ProcessEnv = process.env): StoreConfig {
  return storeSection(parseEnv(storeSchema, env));
}

/** Validates the environment into an explicit config; throws ConfigError listing every bad variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const vars = parseEnv(envSchema, env);
  const store = storeSection(vars);
  const onLinux = process.platform === "linux";

  return {
    ...store,
    login: {
      url: vars.LOGIN_URL,
      selectors: {
        username: vars.LOGIN_USERNAME_SELECTOR,
        password: vars.LOGIN_PASSWORD_SELECTOR,
        submit: vars.LOGIN_SUBMIT_SELECTOR,
      },
      success: { selector: vars.LOGIN_SUCCESS_SELECTOR, urlParts: vars.LOGIN_SUCCESS_URL_PARTS },
      timeoutMs: vars.LOGIN_TIMEOUT_SEC * 1000,
    },
    captcha: {
      selectors: {
        container: vars.CAPTCHA_CONTAINER_SELECTOR,
        background: vars.CAPTCHA_BG_SELECTOR,
        piece: vars.CAPTCHA_PIECE_SELECTOR,
        slider: vars.CAPTCHA_SLIDER_SELECTOR,
        sliderAlternates: vars.CAPTCHA_SLIDER_ALT_SELECTORS,
      },
      minConfidence: vars.CAPTCHA_MIN_CONFIDENCE,
      maxAttempts: vars.CAPTCHA_MAX_ATTEMPTS,
      maxResubmits: vars.CAPTCHA_RESUBMIT_MAX,
      dragDeltas: vars.CAPTCHA_DRAG_DELTAS,
      renderWaitMs: vars.CAPTCHA_RENDER_WAIT_MS,
    },
    browser: {
      headless: vars.BROWSER_HEADLESS || (onLinux && vars.DISPLAY === undefined),
      proxy: vars.BROWSER_PROXY,
      locale: vars.BROWSER_LOCALE,
      timezone: vars.BROWSER_TIMEZONE,
      userAgents: vars.BROWSER_UA_POOL,
      keepOpen: vars.BROWSER_KEEP_OPEN,
      slowMoMs: vars.BROWSER_SLOWMO_MS,
      pageTimeoutMs: vars.PAGE_TIMEOUT_MS,
      executablePath: vars.BROWSER_EXECUTABLE_PATH,
    },
    requiredCookies: vars.REQUIRED_COOKIES,
    notify: {
      mode: vars.ADMIN_NOTIFY_MODE,
      botToken: vars.TELEGRAM_BOT_TOKEN,
      chatId: vars.ADMIN_CHAT_ID,
    },
    paths: {
      ...store.paths,
      cookiesDir: fromRoot(vars.COOKIES_DIR),
      debugDir: vars.DEBUG_DUMP_DIR === undefined ? undefined : fromRoot(vars.DEBUG_DUMP_DIR),
    },
  };
}
