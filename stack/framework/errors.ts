export type StepErrorMeta = Record<string, unknown> & {
  finalUrl?: string;
  summary?: string;
  status?: string;
  diagnostics?: Record<string, unknown>;
};

export class StepError extends Error {
  public readonly meta: StepErrorMeta;

  constructor(
    public readonly task: string,
    public readonly step: string,
    public readonly reason: string,
    meta: StepErrorMeta = {},
  ) {
    // .message = "task.step: reason"
    super(`${task}.${step}: ${reason}`);
    this.name = "StepError";
    this.meta = meta;
  }
}

export type DriverErrorKind = "timeout" | "network" | "closed";

// Raised by the browser adapter at the call site, where the failure kind is known
export class DriverError extends Error {
  constructor(
    public readonly kind: DriverErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DriverError";
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// A closed page cannot recover; local retry loops let this one through
export function isTargetClosed(error: unknown): boolean {
  return error instanceof DriverError && error.kind === "closed";
}
