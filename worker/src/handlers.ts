import { setTimeout as sleep } from "node:timers/promises";
import { condition } from "./conditions.js";

export interface ExecutionContext {
  runId: string;
  taskName: string;
  attemptNo: number;
  runParams: Record<string, unknown>;
  /** Outputs of the task's direct dependencies, keyed by task name. */
  upstream: Record<string, unknown>;
}

export interface TaskContext extends ExecutionContext {
  params: Record<string, unknown>;
  signal: AbortSignal;
}

export type TaskHandler = (context: TaskContext) => Promise<unknown>;

export class HandlerRegistry {
  private readonly handlers = new Map<string, TaskHandler>();

  register(executable: string, handler: TaskHandler): this {
    this.handlers.set(executable, handler);
    return this;
  }

  resolve(executable: string): TaskHandler | undefined {
    return this.handlers.get(executable);
  }

  has(executable: string): boolean {
    return this.handlers.has(executable);
  }

  list(): string[] {
    return [...this.handlers.keys()].sort((a, b) => a.localeCompare(b));
  }
}

export function renderTemplate(text: string, values: Record<string, unknown>): string {
  return text.replace(/\{\{\s*([\w.-]+)\s*\}\}/g, (match, key: string) => {
    const value = values[key];
    return value === undefined ? match : String(value);
  });
}

const noop: TaskHandler = async () => null;

const sleepHandler: TaskHandler = async ({ params, signal }) => {
  const duration = Number(params.durationMs ?? 100);
  await sleep(Math.max(0, duration), undefined, { signal });
  return { sleptMs: duration };
};

const flaky: TaskHandler = async ({ params, attemptNo, signal }) => {
  const failUntilAttempt = Number(params.failUntilAttempt ?? 1);
  const duration = Number(params.durationMs ?? 0);
  if (duration > 0) {
    await sleep(duration, undefined, { signal });
  }
  if (attemptNo <= failUntilAttempt) {
    throw new Error(`flaky task failed at attempt ${attemptNo}`);
  }
  return { attemptNo };
};

const fail: TaskHandler = async ({ params }) => {
  throw new Error(typeof params.message === "string" ? params.message : "task failed");
};

const message: TaskHandler = async ({ params, runParams }) => {
  const text = typeof params.text === "string" ? params.text : "";
  return { text: renderTemplate(text, runParams) };
};

export function createDefaultRegistry(): HandlerRegistry {
  return new HandlerRegistry()
    .register("noop", noop)
    .register("sleep", sleepHandler)
    .register("flaky", flaky)
    .register("fail", fail)
    .register("message", message)
    .register("condition", condition);
}
