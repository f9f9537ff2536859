import { describe, it, expect } from "vitest";
import type { StepLogger } from "../../../stack/framework/logging.js";
import { StageRunner, type StageUpdate } from "../../../stack/framework/stage-runner.js";
import { noopTaskLogger } from "../../fixtures/test-helpers.js";

function createRunner(): { runner: StageRunner; updates: StageUpdate[] } {
  const updates: StageUpdate[] = [];
  const runner = new StageRunner({
    taskLogger: noopTaskLogger,
    onUpdate: (update) => updates.push(update),
  });
  return { runner, updates };
}

describe("StageRunner", () => {
  it("runs stages in order with their arguments", async () => {
    const { runner } = createRunner();
    const order: string[] = [];
    async function first(_log: StepLogger, tag: string): Promise<void> {
      order.push(`first:${tag}`);
    }
    async function second(_log: StepLogger, count: number): Promise<void> {
      order.push(`second:${count.toString()}`);
    }

    const reached = await runner.stage(first, "a").stage(second, 2).execute();

    expect(order).toEqual(["first:a", "second:2"]);
    expect(reached).toBe("second");
    expect(runner.reached).toBe("second");
  });

  it("emits running and done updates", async () => {
    const { runner, updates } = createRunner();
    async function only(): Promise<void> {}

    await runner.stage(only).execute();

    expect(updates).toEqual([
      { current: 1, total: 1, name: "only", state: "running" },
      { current: 1, total: 1, name: "only", state: "done" },
    ]);
  });

  it("stops at the first failure and reports where", async () => {
    const { runner, updates } = createRunner();
    const order: string[] = [];
    async function ok(): Promise<void> {
      order.push("ok");
    }
    async function broken(): Promise<void> {
      throw new Error("boom");
    }
    async function never(): Promise<void> {
      order.push("never");
    }

    await expect(runner.stage(ok).stage(broken).stage(never).execute()).rejects.toThrow("boom");

    expect(order).toEqual(["ok"]);
    expect(runner.reached).toBe("broken");
    expect(updates.at(-1)).toEqual({ current: 2, total: 3, name: "broken", state: "failed", error: "boom" });
  });

  it("passes a logger scoped to the stage", async () => {
    const { runner } = createRunner();
    async function failing(log: StepLogger): Promise<void> {
      log.fail("NOPE", { status: "unknown_error" });
    }

    await expect(runner.stage(failing).execute()).rejects.toMatchObject({
      step: "failing",
      reason: "NOPE",
      meta: { status: "unknown_error" },
    });
  });

  it("skips stages whose predicate holds", async () => {
    const { runner } = createRunner();
    const order: string[] = [];
    async function a(): Promise<void> {
      order.push("a");
    }
    async function b(): Promise<void> {
      order.push("b");
    }

    const reached = await runner
      .stage(a)
      .stage(b)
      .skipIf(() => true)
      .execute();

    expect(order).toEqual(["a"]);
    expect(reached).toBe("a");
  });

  it("rejects anonymous stages", () => {
    const { runner } = createRunner();
    expect(() => runner.stage(async () => undefined)).toThrow("Stage function must be named");
  });

  it("rejects skipIf before any stage", () => {
    const { runner } = createRunner();
    expect(() => runner.skipIf(() => true)).toThrow("skipIf() must follow a stage() call");
  });

  it("refuses to run twice", async () => {
    const { runner } = createRunner();
    async function once(): Promise<void> {}
    runner.stage(once);
    await runner.execute();

    await expect(runner.execute()).rejects.toThrow("StageRunner.execute() called twice");
  });

  it("returns an empty name when nothing is registered", async () => {
    const { runner, updates } = createRunner();
    expect(await runner.execute()).toBe("");
    expect(updates).toEqual([]);
  });
});
