import { setTimeout as sleep } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { NotFoundError, ValidationError, type DefinitionId, type RunSnapshot } from "@taskgraph/shared";
import { TaskExecutor, createDefaultRegistry, type HandlerRegistry } from "@taskgraph/worker";
import { RunCoordinator } from "../src/engine/coordinator.js";
import { MemoryGraphStore } from "../src/store/memoryGraphStore.js";
import { MemoryRunStore } from "../src/store/memoryRunStore.js";

function setup(handlers: HandlerRegistry = createDefaultRegistry(), concurrency = 4) {
  const graphs = new MemoryGraphStore();
  const runs = new MemoryRunStore();
  const executor = new TaskExecutor({ concurrency, handlers });
  const coordinator = new RunCoordinator({ graphs, runs, executor });
  return { graphs, runs, coordinator };
}

class CountingRunStore extends MemoryRunStore {
  snapshotReads = 0;

  override async getSnapshot(runId: string): Promise<RunSnapshot> {
    this.snapshotReads += 1;
    return super.getSnapshot(runId);
  }
}

/** Handlers that log when each task starts and ends. */
function tracingRegistry(log: string[], durationMs = 20): HandlerRegistry {
  return createDefaultRegistry()
    .register("traced", async ({ taskName }) => {
      log.push(`start:${taskName}`);
      await sleep(durationMs);
      log.push(`end:${taskName}`);
      return { task: taskName };
    })
    .register("collect", async ({ upstream }) => upstream);
}

const diamondTasks = (b: string, c: string) => ({
  tasks: [
    { name: "a", executable: "noop" },
    { name: "b", executable: b },
    { name: "c", executable: c, params: { durationMs: 40 } },
    { name: "d", executable: "noop" }
  ],
  edges: [
    { from: "a", to: "b" },
    { from: "a", to: "c" },
    { from: "b", to: "d" },
    { from: "c", to: "d" }
  ]
});

describe("RunCoordinator", () => {
  it("runs a linear chain strictly in order", async () => {
    const log: string[] = [];
    const { graphs, coordinator } = setup(tracingRegistry(log));
    const id = await graphs.register({
      name: "chain",
      version: 1,
      tasks: ["a", "b", "c"].map((name) => ({ name, executable: "traced" })),
      edges: [
        { from: "a", to: "b" },
        { from: "b", to: "c" }
      ]
    });

    const runId = await coordinator.start(id);
    const run = await coordinator.waitForRun(runId);

    expect(run.status).toBe("succeeded");
    expect(run.startedAt).not.toBeNull();
    expect(run.finishedAt).not.toBeNull();
    expect(log).toEqual(["start:a", "end:a", "start:b", "end:b", "start:c", "end:c"]);
  });

  it("runs independent branches concurrently and joins after both", async () => {
    const log: string[] = [];
    const { graphs, runs, coordinator } = setup(tracingRegistry(log));
    const id = await graphs.register({
      name: "diamond",
      version: 1,
      tasks: [
        { name: "a", executable: "traced" },
        { name: "b", executable: "traced" },
        { name: "c", executable: "traced" },
        { name: "d", executable: "collect" }
      ],
      edges: [
        { from: "a", to: "b" },
        { from: "a", to: "c" },
        { from: "b", to: "d" },
        { from: "c", to: "d" }
      ]
    });

    const runId = await coordinator.start(id);
    await coordinator.waitForRun(runId);

    expect(log.slice(0, 2)).toEqual(["start:a", "end:a"]);
    const firstBranchEnd = Math.min(log.indexOf("end:b"), log.indexOf("end:c"));
    expect(log.indexOf("start:b")).toBeLessThan(firstBranchEnd);
    expect(log.indexOf("start:c")).toBeLessThan(firstBranchEnd);

    const { run, attempts } = await runs.getSnapshot(runId);
    expect(run.status).toBe("succeeded");
    const join = attempts.find((attempt) => attempt.taskName === "d");
    expect(join?.output).toEqual({ b: { task: "b" }, c: { task: "c" } });
  });

  it("retries a failing task with non-decreasing delays until it succeeds", async () => {
    const { graphs, runs, coordinator } = setup();
    const id = await graphs.register({
      name: "retry",
      version: 1,
      tasks: [
        {
          name: "flaky",
          executable: "flaky",
          params: { failUntilAttempt: 2 },
          retry: { maxRetries: 2, backoff: { baseMs: 5, capMs: 50, jitter: false } }
        }
      ],
      edges: []
    });

    const runId = await coordinator.start(id);
    const run = await coordinator.waitForRun(runId);
    const { attempts } = await runs.getSnapshot(runId);

    expect(run.status).toBe("succeeded");
    expect(attempts.map((attempt) => attempt.attemptNo)).toEqual([1, 2, 3]);
    expect(attempts.map((attempt) => attempt.status)).toEqual(["failed", "failed", "succeeded"]);
    expect(attempts.map((attempt) => attempt.retryDelayMs)).toEqual([5, 10, null]);
    expect(attempts[0].error).toBe("flaky task failed at attempt 1");
  });

  it("fails the run once a task exhausts its retries", async () => {
    const { graphs, runs, coordinator } = setup();
    const id = await graphs.register({
      name: "exhaust",
      version: 1,
      tasks: [
        {
          name: "x",
          executable: "fail",
          params: { message: "nope" },
          retry: { maxRetries: 1, backoff: { baseMs: 1, capMs: 1, jitter: false } }
        }
      ],
      edges: []
    });

    const runId = await coordinator.start(id);
    const run = await coordinator.waitForRun(runId);
    const { attempts } = await runs.getSnapshot(runId);

    expect(run.status).toBe("failed");
    expect(run.error).toBe("task 'x' failed after 2 attempts: nope");
    expect(attempts).toHaveLength(2);
  });

  it("lets the surviving branch finish under fail_slow", async () => {
    const { graphs, runs, coordinator } = setup();
    const id = await graphs.register({ name: "slow", version: 1, ...diamondTasks("fail", "sleep") });

    const runId = await coordinator.start(id, { failurePolicy: "fail_slow" });
    const run = await coordinator.waitForRun(runId);
    const { attempts } = await runs.getSnapshot(runId);

    expect(run.status).toBe("failed");
    expect(run.failurePolicy).toBe("fail_slow");
    expect(run.error).toBe("task 'b' failed after 1 attempt: task failed");
    const sibling = attempts.find((attempt) => attempt.taskName === "c");
    expect(sibling?.status).toBe("succeeded");
    expect(Date.parse(run.finishedAt ?? "")).toBeGreaterThanOrEqual(Date.parse(sibling?.finishedAt ?? ""));
    expect(attempts.some((attempt) => attempt.taskName === "d")).toBe(false);
  });

  it("fails the run immediately under fail_fast and still records in-flight work", async () => {
    const { graphs, runs, coordinator } = setup();
    const id = await graphs.register({ name: "fast", version: 1, ...diamondTasks("fail", "sleep") });

    const runId = await coordinator.start(id, { failurePolicy: "fail_fast" });
    const run = await coordinator.waitForRun(runId);
    const { attempts } = await runs.getSnapshot(runId);
    const sibling = attempts.find((attempt) => attempt.taskName === "c");

    expect(run.status).toBe("failed");
    expect(sibling?.status).toBe("succeeded");
    expect(Date.parse(run.finishedAt ?? "")).toBeLessThan(Date.parse(sibling?.finishedAt ?? ""));
    expect(attempts.some((attempt) => attempt.taskName === "d")).toBe(false);
  });

  it("records timed out attempts and retries them", async () => {
    const { graphs, runs, coordinator } = setup();
    const id = await graphs.register({
      name: "slowpoke",
      version: 1,
      tasks: [
        {
          name: "wait",
          executable: "sleep",
          params: { durationMs: 1000 },
          timeoutMs: 20,
          retry: { maxRetries: 1, backoff: { baseMs: 1, capMs: 1, jitter: false } }
        }
      ],
      edges: []
    });

    const runId = await coordinator.start(id);
    const run = await coordinator.waitForRun(runId);
    const { attempts } = await runs.getSnapshot(runId);

    expect(run.status).toBe("failed");
    expect(run.error).toBe("task 'wait' failed after 2 attempts: task timed out after 20ms");
    expect(attempts.map((attempt) => attempt.status)).toEqual(["timed_out", "timed_out"]);
    expect(attempts[0].error).toBe("task timed out after 20ms");
  });

  it("cancels a run, records the in-flight outcome and dispatches nothing after", async () => {
    let release: () => void = () => undefined;
    let markStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    const handlers = createDefaultRegistry().register(
      "gate",
      () =>
        new Promise((resolve) => {
          release = () => resolve({ released: true });
          markStarted();
        })
    );
    const { graphs, runs, coordinator } = setup(handlers);
    const id = await graphs.register({
      name: "gated",
      version: 1,
      tasks: [
        { name: "e", executable: "gate" },
        { name: "f", executable: "noop" }
      ],
      edges: [{ from: "e", to: "f" }]
    });

    const runId = await coordinator.start(id);
    await started;
    const cancelled = await coordinator.cancel(runId);
    expect(cancelled.status).toBe("cancelled");
    expect(cancelled.cancelRequested).toBe(true);

    release();
    const run = await coordinator.waitForRun(runId);
    const { attempts } = await runs.getSnapshot(runId);

    expect(run.status).toBe("cancelled");
    expect(attempts.map((attempt) => [attempt.taskName, attempt.status])).toEqual([["e", "succeeded"]]);
    expect(coordinator.activeRunIds().has(runId)).toBe(false);
  });

  it("renders message tasks from run parameters", async () => {
    const { graphs, runs, coordinator } = setup();
    const id = await graphs.register({
      name: "greet",
      version: 1,
      tasks: [{ name: "hello", executable: "message", params: { text: "Hello {{who}}" } }],
      edges: []
    });

    const runId = await coordinator.start(id, { params: { who: "sam" } });
    await coordinator.waitForRun(runId);
    const { attempts } = await runs.getSnapshot(runId);

    expect(attempts[0].output).toEqual({ text: "Hello sam" });
  });

  it("evaluates a condition over upstream output and passes the answer downstream", async () => {
    const { graphs, runs, coordinator } = setup();
    const id = await graphs.register({
      name: "branching",
      version: 1,
      tasks: [
        { name: "compose", executable: "message", params: { text: "Hello {{who}}" } },
        {
          name: "check",
          executable: "condition",
          params: { path: "$.upstream.compose.text", operator: "equals", value: "Hello sam" }
        },
        { name: "report", executable: "noop" }
      ],
      edges: [
        { from: "compose", to: "check" },
        { from: "check", to: "report" }
      ]
    });

    const runId = await coordinator.start(id, { params: { who: "sam" } });
    const run = await coordinator.waitForRun(runId);
    const { attempts } = await runs.getSnapshot(runId);

    expect(run.status).toBe("succeeded");
    expect(attempts.find((attempt) => attempt.taskName === "check")?.output).toEqual({ matched: true, result: "Yes" });
  });

  it("refuses to start a deprecated definition", async () => {
    const { graphs, coordinator } = setup();
    const id: DefinitionId = await graphs.register({
      name: "old",
      version: 1,
      tasks: [{ name: "a", executable: "noop" }],
      edges: []
    });
    await graphs.deprecate(id);

    await expect(coordinator.start(id)).rejects.toThrow(ValidationError);
    await expect(coordinator.start(id)).rejects.toThrow("Workflow old@1 is deprecated.");
  });

  it("waits out a retry delay at the edge of the timer range without replanning", async () => {
    const graphs = new MemoryGraphStore();
    const runs = new CountingRunStore();
    const coordinator = new RunCoordinator({
      graphs,
      runs,
      executor: new TaskExecutor({ concurrency: 1, handlers: createDefaultRegistry() })
    });
    const id = await graphs.register({
      name: "patient",
      version: 1,
      tasks: [
        {
          name: "x",
          executable: "fail",
          retry: { maxRetries: 1, backoff: { baseMs: 2_147_483_647, capMs: 2_147_483_647, jitter: false } }
        }
      ],
      edges: []
    });

    const runId = await coordinator.start(id);
    await sleep(50);
    // first plan, outcome resolution, then one plan that arms the wake timer
    expect(runs.snapshotReads).toBe(3);

    await coordinator.cancel(runId);
    const run = await coordinator.waitForRun(runId);
    expect(run.status).toBe("cancelled");
  });

  it("notifies the observer only for the cancel that ends the run", async () => {
    const statuses: string[] = [];
    const graphs = new MemoryGraphStore();
    const coordinator = new RunCoordinator({
      graphs,
      runs: new MemoryRunStore(),
      executor: new TaskExecutor({ concurrency: 1, handlers: createDefaultRegistry() }),
      observer: { runUpdated: (run) => statuses.push(run.status) }
    });
    const id = await graphs.register({
      name: "napping",
      version: 1,
      tasks: [{ name: "nap", executable: "sleep", params: { durationMs: 30 } }],
      edges: []
    });

    const runId = await coordinator.start(id);
    await coordinator.cancel(runId);
    await coordinator.cancel(runId);
    await coordinator.waitForRun(runId);
    await coordinator.cancel(runId);

    expect(statuses.filter((status) => status === "cancelled")).toHaveLength(1);
  });

  it("reports unknown definitions and runs as not found", async () => {
    const { coordinator } = setup();
    await expect(coordinator.start({ name: "missing", version: 1 })).rejects.toThrow(NotFoundError);
    await expect(coordinator.status("nope")).rejects.toThrow(NotFoundError);
    await expect(coordinator.cancel("nope")).rejects.toThrow(NotFoundError);
  });
});
