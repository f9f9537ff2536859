import { noopLogger, type PrefixLogger, type StepLogger, type TaskLogger } from "./logging.js";
import { toErrorMessage } from "./errors.js";

export interface StageUpdate {
  current: number;
  total: number;
  name: string;
  state: "running" | "failed" | "done";
  error?: string;
}

interface StageDefinition {
  name: string;
  fn: (log: StepLogger) => Promise<void>;
  skip?: (() => boolean) | undefined;
}

export interface StageRunnerDeps {
  taskLogger: TaskLogger;
  onUpdate?: (update: StageUpdate) => void;
  frameworkLogger?: PrefixLogger;
}

export type StageFn<Args extends unknown[]> = (log: StepLogger, ...args: Args) => Promise<void>;

const UNNAMED =
  "Stage function must be named (use a function declaration or const assignment, not an inline arrow)";

/**
 * Runs named stages in order. The first failure stops the run and propagates;
 * `reached` reports the last stage that started.
 */
export class StageRunner {
  private stages: StageDefinition[] = [];
  private executed = false;
  private reachedName = "";
  private readonly sendUpdate: (update: StageUpdate) => void;
  private readonly log: PrefixLogger;
  private readonly taskLogger: TaskLogger;

  constructor(deps: StageRunnerDeps) {
    this.sendUpdate = deps.onUpdate ?? (() => undefined);
    this.log = deps.frameworkLogger ?? noopLogger;
    this.taskLogger = deps.taskLogger;
  }

  get reached(): string {
    return this.reachedName;
  }

  stage<Args extends unknown[]>(fn: StageFn<Args>, ...args: Args): this {
    const name = fn.name;
    if (!name) {
      throw new Error(UNNAMED);
    }
    this.stages.push({ name, fn: (log) => fn(log, ...args) });
    return this;
  }

  skipIf(predicate: () => boolean): this {
    const last = this.stages[this.stages.length - 1];
    if (!last) {
      throw new Error("skipIf() must follow a stage() call");
    }
    last.skip = predicate;
    return this;
  }

  async execute(): Promise<string> {
    if (this.executed) {
      throw new Error("StageRunner.execute() called twice");
    }
    this.executed = true;

    if (this.stages.length === 0) {
      this.log.warn("execute() called with no stages registered");
      return "";
    }

    const total = this.stages.length;
    for (const [idx, stage] of this.stages.entries()) {
      if (stage.skip?.()) {
        this.log.log("Skipping stage", { stage: stage.name });
        continue;
      }

      this.reachedName = stage.name;
      this.sendUpdate({ current: idx + 1, total, name: stage.name, state: "running" });
      this.log.log("Running stage", {
        stage: stage.name,
        progress: `${String(idx + 1)}/${String(total)}`,
      });

      try {
        await stage.fn(this.taskLogger.scoped(stage.name));
      } catch (error) {
        const msg = toErrorMessage(error);
        this.log.error("Stage failed", { stage: stage.name, error: msg });
        this.sendUpdate({ current: idx + 1, total, name: stage.name, state: "failed", error: msg });
        throw error;
      }
    }

    this.sendUpdate({ current: total, total, name: this.reachedName, state: "done" });
    return this.reachedName;
  }
}
