import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig, loadStoreConfig } from "../../../stack/framework/config.js";
import { fromRoot } from "../../../stack/framework/paths.js";
import { BASE_ENV } from "../../fixtures/test-helpers.js";

function configError(env: Record<string, string>): ConfigError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error("expected ConfigError");
}

describe("loadConfig", () => {
  it("applies documented defaults", () => {
    const config = loadConfig({ ...BASE_ENV });

    expect(config.encryptionKey).toBeUndefined();
    expect(config.login.selectors).toEqual({
      username: "input[type='text']",
      password: "input[type='password']",
      submit: "button[type='submit']",
    });
    expect(config.captcha).toMatchObject({
      minConfidence: 0.15,
      maxAttempts: 3,
      maxResubmits: 5,
      dragDeltas: [0, -6, 6, -12, 12],
    });
    expect(config.captcha.selectors.container).toBe("#slideBgWrap");
    expect(config.browser).toMatchObject({
      locale: "zh-CN",
      timezone: "Asia/Shanghai",
      userAgents: [],
      keepOpen: false,
      slowMoMs: 0,
      pageTimeoutMs: 60_000,
    });
    expect(config.notify).toEqual({ mode: "errors", botToken: undefined, chatId: undefined });
    expect(config.paths.database).toBe(fromRoot("sessions.db"));
    expect(config.health).toEqual({ tokenCookie: "token", warnSec: 86_400, graceSec: 60 });
  });

  it("converts the login timeout to milliseconds", () => {
    expect(loadConfig({ ...BASE_ENV, LOGIN_TIMEOUT_SEC: "45" }).login.timeoutMs).toBe(45_000);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ ...BASE_ENV, SESSION_ENCRYPTION_KEY: "  ", BROWSER_LOCALE: "" });
    expect(config.encryptionKey).toBeUndefined();
    expect(config.browser.locale).toBe("zh-CN");
  });

  it("splits lists", () => {
    const config = loadConfig({
      ...BASE_ENV,
      REQUIRED_COOKIES: "token, uid ,",
      CAPTCHA_DRAG_DELTAS: "0,4,-4",
      BROWSER_UA_POOL: "Agent/1.0 (X, Y) | Agent/2.0",
      LOGIN_SUCCESS_URL_PARTS: "#/home,album_home",
    });
    expect(config.requiredCookies).toEqual(["token", "uid"]);
    expect(config.captcha.dragDeltas).toEqual([0, 4, -4]);
    expect(config.browser.userAgents).toEqual(["Agent/1.0 (X, Y)", "Agent/2.0"]);
    expect(config.login.success.urlParts).toEqual(["#/home", "album_home"]);
  });

  it("keeps absolute paths", () => {
    expect(loadConfig({ ...BASE_ENV, COOKIES_DIR: "/var/lib/sessions" }).paths.cookiesDir).toBe(
      "/var/lib/sessions",
    );
  });

  it.runIf(process.platform === "linux")("forces headless on Linux without a display", () => {
    expect(loadConfig({ ...BASE_ENV, BROWSER_HEADLESS: "false" }).browser.headless).toBe(true);
    expect(loadConfig({ ...BASE_ENV, BROWSER_HEADLESS: "false", DISPLAY: ":99" }).browser.headless).toBe(false);
  });

  it("lists every invalid variable", () => {
    const error = configError({
      ...BASE_ENV,
      LOGIN_TIMEOUT_SEC: "soon",
      ADMIN_NOTIFY_MODE: "loud",
      CAPTCHA_MIN_CONFIDENCE: "1.5",
    });
    const fields = error.issues.map((issue) => issue.split(":")[0]);
    expect(fields).toEqual(
      expect.arrayContaining(["LOGIN_TIMEOUT_SEC", "ADMIN_NOTIFY_MODE", "CAPTCHA_MIN_CONFIDENCE"]),
    );
    expect(error.message.startsWith("Invalid configuration:")).toBe(true);
  });

  it("requires the login url", () => {
    const error = configError({ LOGIN_SUCCESS_URL_PARTS: "#/home" });
    expect(error.issues.some((issue) => issue.startsWith("LOGIN_URL:"))).toBe(true);
  });

  it("requires a way to confirm login", () => {
    const error = configError({ LOGIN_URL: "https://example.test/login" });
    expect(error.issues).toEqual(["LOGIN_SUCCESS_SELECTOR: Set LOGIN_SUCCESS_SELECTOR or LOGIN_SUCCESS_URL_PARTS"]);
  });
});

describe("loadStoreConfig", () => {
  it("needs no login settings", () => {
    expect(loadStoreConfig({ SESSION_ENCRYPTION_KEY: "test-secret", SESSION_DB_PATH: "data/auth.db" })).toEqual({
      encryptionKey: "test-secret",
      paths: { database: fromRoot("data/auth.db") },
      health: { tokenCookie: "token", warnSec: 86_400, graceSec: 60 },
    });
  });

  it("matches the store section of the full config", () => {
    const full = loadConfig({ ...BASE_ENV, TOKEN_COOKIE_NAME: "sid" });
    const store = loadStoreConfig({ TOKEN_COOKIE_NAME: "sid" });

    expect(store.health).toEqual(full.health);
    expect(store.paths.database).toBe(full.paths.database);
  });

  it("still validates the numbers it reads", () => {
    expect(() => loadStoreConfig({ TOKEN_EXPIRY_WARN_SEC: "-5" })).toThrow(ConfigError);
  });
});
