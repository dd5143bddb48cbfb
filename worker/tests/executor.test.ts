import { setTimeout as sleep } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { TaskExecutor } from "../src/executor.js";
import { HandlerRegistry, createDefaultRegistry } from "../src/handlers.js";

const context = { runId: "run-1", taskName: "a", attemptNo: 1, runParams: {}, upstream: {} };

describe("TaskExecutor", () => {
  it("returns the handler output as a success", async () => {
    const executor = new TaskExecutor({ concurrency: 1 });
    await expect(executor.execute({ name: "a", executable: "noop" }, context)).resolves.toEqual({
      status: "succeeded",
      output: null
    });
  });

  it("turns thrown errors into failed outcomes", async () => {
    const executor = new TaskExecutor({ concurrency: 1 });
    await expect(
      executor.execute({ name: "a", executable: "fail", params: { message: "boom" } }, context)
    ).resolves.toEqual({ status: "failed", error: "boom" });
  });

  it("fails unknown executables without throwing", async () => {
    const executor = new TaskExecutor({ concurrency: 1 });
    await expect(executor.execute({ name: "a", executable: "missing" }, context)).resolves.toEqual({
      status: "failed",
      error: "Unsupported executable: missing"
    });
  });

  it("enforces the task timeout and aborts the handler signal", async () => {
    let abortedSeen = false;
    const registry = new HandlerRegistry().register("hang", async ({ signal }) => {
      try {
        await sleep(1_000, undefined, { signal });
      } catch {
        abortedSeen = signal.aborted;
      }
      return "late";
    });
    const executor = new TaskExecutor({ concurrency: 1, handlers: registry });
    const outcome = await executor.execute({ name: "a", executable: "hang", timeoutMs: 20 }, context);
    expect(outcome).toEqual({ status: "timed_out", timeoutMs: 20 });
    await sleep(5);
    expect(abortedSeen).toBe(true);
  });

  it("runs a task whose timeout exceeds the timer range", async () => {
    const executor = new TaskExecutor({ concurrency: 1, handlers: createDefaultRegistry() });
    const outcome = await executor.execute(
      { name: "a", executable: "sleep", params: { durationMs: 30 }, timeoutMs: 2_147_483_648 },
      context
    );
    expect(outcome).toEqual({ status: "succeeded", output: { sleptMs: 30 } });
  });

  it("holds the pool slot until a timed out handler returns", async () => {
    const events: string[] = [];
    const registry = new HandlerRegistry()
      .register("stubborn", async () => {
        await sleep(80);
        events.push("stubborn:end");
        return null;
      })
      .register("next", async () => {
        events.push("next:start");
        return null;
      });
    const executor = new TaskExecutor({ concurrency: 1, handlers: registry });

    const first = executor.execute({ name: "a", executable: "stubborn", timeoutMs: 20 }, context);
    const second = executor.execute({ name: "b", executable: "next" }, context);

    expect(await first).toEqual({ status: "timed_out", timeoutMs: 20 });
    expect(events).toEqual([]);
    await second;
    expect(events).toEqual(["stubborn:end", "next:start"]);
  });

  it("stores outputs as plain JSON", async () => {
    const registry = new HandlerRegistry().register("dated", async () => ({
      at: new Date("2026-01-01T00:00:00.000Z"),
      skipped: undefined
    }));
    const executor = new TaskExecutor({ concurrency: 1, handlers: registry });
    await expect(executor.execute({ name: "a", executable: "dated" }, context)).resolves.toEqual({
      status: "succeeded",
      output: { at: "2026-01-01T00:00:00.000Z" }
    });
  });

  it("fails tasks whose output cannot be stored as JSON", async () => {
    const registry = new HandlerRegistry()
      .register("callback", async () => () => 1)
      .register("big", async () => 10n);
    const executor = new TaskExecutor({ concurrency: 1, handlers: registry });

    await expect(executor.execute({ name: "a", executable: "callback" }, context)).resolves.toEqual({
      status: "failed",
      error: "Task output of type function is not JSON-serialisable."
    });
    await expect(executor.execute({ name: "b", executable: "big" }, context)).resolves.toEqual({
      status: "failed",
      error: "Do not know how to serialize a BigInt"
    });
  });

  it("never runs more handlers than the pool allows", async () => {
    let active = 0;
    let peak = 0;
    const registry = new HandlerRegistry().register("busy", async () => {
      active += 1;
      peak = Math.max(peak, active);
      await sleep(15);
      active -= 1;
      return null;
    });
    const executor = new TaskExecutor({ concurrency: 2, handlers: registry });
    const outcomes = await Promise.all(
      ["a", "b", "c", "d"].map((name) => executor.execute({ name, executable: "busy" }, context))
    );
    expect(outcomes.every((outcome) => outcome.status === "succeeded")).toBe(true);
    expect(peak).toBe(2);
    await executor.onIdle();
    expect(executor.load).toBe(0);
  });

  it("calls onStart before the handler", async () => {
    const events: string[] = [];
    const registry = new HandlerRegistry().register("record", async () => {
      events.push("handler");
      return null;
    });
    const executor = new TaskExecutor({ concurrency: 1, handlers: registry });
    await executor.execute({ name: "a", executable: "record" }, context, {
      onStart: () => {
        events.push("start");
      }
    });
    expect(events).toEqual(["start", "handler"]);
  });

  it("rejects a non-positive pool size", () => {
    expect(() => new TaskExecutor({ concurrency: 0 })).toThrow(
      "Executor concurrency must be a positive integer."
    );
  });

  it("exposes the registered executables", () => {
    const executor = new TaskExecutor({ concurrency: 1, handlers: createDefaultRegistry() });
    expect(executor.supports("message")).toBe(true);
    expect(executor.supports("unknown")).toBe(false);
  });
});
