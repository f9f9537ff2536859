import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { StepError, type StepErrorMeta } from "./errors.js";

export type LogOutput = (message: string) => void;
export type LogData = Record<string, unknown>;

const defaultOutput: LogOutput = (message) => {
  console.log(message);
};

const colors = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
};

type LogLevel = "info" | "success" | "warn" | "error";

const levelStyles: Record<LogLevel, { icon: string; color: string }> = {
  info: { icon: "→", color: colors.cyan },
  success: { icon: "✓", color: colors.green },
  warn: { icon: "⚠", color: colors.yellow },
  error: { icon: "✗", color: colors.red },
};

// eslint-disable-next-line no-control-regex, sonarjs/no-control-regex
export const ANSI_PATTERN = /\x1b\[[0-9;]*m/gu;

export function stripAnsi(line: string): string {
  return line.replace(ANSI_PATTERN, "");
}

export function formatElapsed(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes.toString()}:${Math.floor(seconds % 60)
    .toString()
    .padStart(2, "0")}`;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value !== null && typeof value === "object") {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

export function formatData(data?: LogData): string {
  if (!data) return "";
  const pairs = Object.entries(data)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  return pairs.length === 0 ? "" : ` → ${pairs.join(", ")}`;
}

/**
 * One coloured line per call: level icon, label, message, data suffix and the
 * time since the previous line, right-aligned to the terminal width.
 */
function createLineWriter(output: LogOutput): (level: LogLevel, label: string, msg: string, data?: LogData) => void {
  let lastTime = Date.now();
  return (level, label, msg, data) => {
    const now = Date.now();
    const elapsed = formatElapsed(now - lastTime);
    lastTime = now;

    const { icon, color } = levelStyles[level];
    const content = `${color}${icon}${colors.reset} ${label} ${msg}${formatData(data)}`;
    const width = process.stdout.columns || 120;
    const padding = Math.max(1, width - stripAnsi(content).length - elapsed.length);
    output(`${content}${" ".repeat(padding)}${colors.dim}${elapsed}${colors.reset}`);
  };
}

// Stage-scoped logger; the stage name is pre-filled by StageRunner
export interface StepLogger {
  log: (msg: string, data?: LogData) => void;
  success: (msg: string, data?: LogData) => void;
  warn: (msg: string, data?: LogData) => void;
  /** Logs, then throws a StepError carrying `meta`. */
  fail: (reason: string, meta?: StepErrorMeta) => never;
}

export interface TaskLogger {
  log: (step: string, msg: string, data?: LogData) => void;
  success: (step: string, msg: string, data?: LogData) => void;
  warn: (step: string, msg: string, data?: LogData) => void;
  fail: (step: string, reason: string, meta?: StepErrorMeta) => never;
  scoped: (step: string) => StepLogger;
}

/** Numbers each new step as it first logs: `[1 navigate]`, `[2 fillCredentials]`. */
export function createTaskLogger(task: string, output: LogOutput = defaultOutput): TaskLogger {
  const write = createLineWriter(output);
  let stepNum = 0;
  let lastStep = "";

  const emit = (level: LogLevel, step: string, msg: string, data?: LogData): void => {
    if (step !== lastStep) {
      stepNum++;
      lastStep = step;
    }
    write(level, `   [${stepNum.toString()} ${step}]`, msg, data);
  };

  const fail = (step: string, reason: string, meta: StepErrorMeta = {}): never => {
    emit("error", step, reason, meta);
    throw new StepError(task, step, reason, meta);
  };

  return {
    log: (step, msg, data) => {
      emit("info", step, msg, data);
    },
    success: (step, msg, data) => {
      emit("success", step, msg, data);
    },
    warn: (step, msg, data) => {
      emit("warn", step, msg, data);
    },
    fail,
    scoped: (step) => ({
      log: (msg, data) => {
        emit("info", step, msg, data);
      },
      success: (msg, data) => {
        emit("success", step, msg, data);
      },
      warn: (msg, data) => {
        emit("warn", step, msg, data);
      },
      fail: (reason, meta) => fail(step, reason, meta),
    }),
  };
}

// Component logger (solver, locator, store, notifier, CLI)
export interface PrefixLogger {
  log: (msg: string, data?: LogData) => void;
  success: (msg: string, data?: LogData) => void;
  warn: (msg: string, data?: LogData) => void;
  error: (msg: string, data?: LogData) => void;
}

export function createPrefixLogger(prefix: string, output: LogOutput = defaultOutput): PrefixLogger {
  const write = createLineWriter(output);
  const label = `[${prefix}]`;
  return {
    log: (msg, data) => {
      write("info", label, msg, data);
    },
    success: (msg, data) => {
      write("success", label, msg, data);
    },
    warn: (msg, data) => {
      write("warn", label, msg, data);
    },
    error: (msg, data) => {
      write("error", label, msg, data);
    },
  };
}

export const noopLogger: PrefixLogger = createPrefixLogger("noop", () => undefined);

/** Console output plus a plain, timestamped copy appended to `path`. */
export function teeOutput(
  path: string,
  output: LogOutput = defaultOutput,
  now: () => Date = () => new Date(),
): LogOutput {
  mkdirSync(dirname(path), { recursive: true });
  return (message) => {
    output(message);
    appendFileSync(path, `${now().toISOString()} ${stripAnsi(message).trimEnd()}\n`, "utf-8");
  };
}
