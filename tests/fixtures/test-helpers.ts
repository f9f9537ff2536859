import { loadConfig, type AppConfig } from "../../stack/framework/config.js";
import { createTaskLogger, stripAnsi, type LogOutput } from "../../stack/framework/logging.js";

export const noopTaskLogger = createTaskLogger("test", () => undefined);

/** Collects log lines with colour codes removed. */
export function captureOutput(): { output: LogOutput; lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    output: (message) => {
      lines.push(stripAnsi(message));
    },
  };
}

export const BASE_ENV = {
  LOGIN_URL: "https://example.test/login",
  LOGIN_SUCCESS_URL_PARTS: "#/home",
  LOGIN_TIMEOUT_SEC: "2",
  CAPTCHA_RENDER_WAIT_MS: "0",
} as const;

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({ ...BASE_ENV, ...env });
}
