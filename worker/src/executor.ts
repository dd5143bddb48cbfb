import PQueue from "p-queue";
import { errorMessage, resolveTimeoutMs, type TaskOutcome, type TaskSpec } from "@taskgraph/shared";
import { createDefaultRegistry, type ExecutionContext, type HandlerRegistry, type TaskHandler } from "./handlers.js";
import { taskExecutionCounter, taskExecutionLatency, workerPoolGauge } from "./metrics.js";

export interface ExecuteHooks {
  /** Runs once a pool slot is held, right before the handler starts. */
  onStart?: () => Promise<void> | void;
}

export interface TaskExecutorOptions {
  concurrency: number;
  handlers?: HandlerRegistry;
}

/** One handler invocation under a deadline. */
interface Execution {
  /** Settles with the handler's result or at the deadline, whichever comes first. */
  outcome: Promise<TaskOutcome>;
  /** Settles once the handler itself has returned or thrown. */
  settled: Promise<void>;
}

/** Outputs are stored as JSON, so they are normalised here, before anything records them. */
function toJsonValue(output: unknown): unknown {
  if (output === undefined) return null;
  const text = JSON.stringify(output);
  if (text === undefined) throw new Error(`Task output of type ${typeof output} is not JSON-serialisable.`);
  return JSON.parse(text);
}

/**
 * At the deadline the handler's signal is aborted and the outcome is
 * `timed_out`; whatever the handler produces afterwards is discarded.
 */
function withTimeout(handler: TaskHandler, task: TaskSpec, context: ExecutionContext, timeoutMs: number): Execution {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<TaskOutcome>((resolve) => {
    timer = setTimeout(() => {
      controller.abort(new Error(`task timed out after ${timeoutMs}ms`));
      resolve({ status: "timed_out", timeoutMs });
    }, timeoutMs);
  });
  const result = Promise.resolve()
    .then(() => handler({ ...context, params: task.params ?? {}, signal: controller.signal }))
    .then((output): TaskOutcome => ({ status: "succeeded", output: toJsonValue(output) }))
    .catch((error: unknown): TaskOutcome => ({ status: "failed", error: errorMessage(error) }))
    .finally(() => clearTimeout(timer));
  return {
    outcome: Promise.race([deadline, result]),
    settled: result.then(() => undefined)
  };
}

export class TaskExecutor {
  private readonly pool: PQueue;
  private readonly handlers: HandlerRegistry;

  constructor(options: TaskExecutorOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new Error("Executor concurrency must be a positive integer.");
    }
    this.pool = new PQueue({ concurrency: options.concurrency });
    this.handlers = options.handlers ?? createDefaultRegistry();
  }

  get concurrency(): number {
    return this.pool.concurrency;
  }

  /** Executions waiting for a slot plus executions holding one. */
  get load(): number {
    return this.pool.size + this.pool.pending;
  }

  supports(executable: string): boolean {
    return this.handlers.has(executable);
  }

  /**
   * Always resolves; task errors and timeouts come back as outcomes. A timed
   * out handler keeps its pool slot until it actually returns.
   */
  execute(task: TaskSpec, context: ExecutionContext, hooks: ExecuteHooks = {}): Promise<TaskOutcome> {
    return new Promise<TaskOutcome>((resolve) => {
      this.pool
        .add(async () => {
          workerPoolGauge.inc();
          try {
            await hooks.onStart?.();
            const execution = this.run(task, context);
            resolve(await execution.outcome);
            await execution.settled;
          } finally {
            workerPoolGauge.dec();
          }
        })
        .catch((error: unknown) => {
          resolve({ status: "failed", error: errorMessage(error) });
        });
    });
  }

  async onIdle(): Promise<void> {
    await this.pool.onIdle();
  }

  private run(task: TaskSpec, context: ExecutionContext): Execution {
    const handler = this.handlers.resolve(task.executable);
    if (!handler) {
      taskExecutionCounter.inc({ status: "failed" });
      return {
        outcome: Promise.resolve<TaskOutcome>({ status: "failed", error: `Unsupported executable: ${task.executable}` }),
        settled: Promise.resolve()
      };
    }

    const startNs = process.hrtime.bigint();
    const execution = withTimeout(handler, task, context, resolveTimeoutMs(task));
    return {
      outcome: execution.outcome.then((outcome) => {
        const durationSec = Number(process.hrtime.bigint() - startNs) / 1_000_000_000;
        taskExecutionLatency.observe(durationSec);
        taskExecutionCounter.inc({ status: outcome.status });
        return outcome;
      }),
      settled: execution.settled
    };
  }
}
