import {
  ConflictError,
  MAX_TIMER_DELAY_MS,
  ValidationError,
  errorMessage,
  formatDefinitionId,
  type DefinitionId,
  type FailurePolicy,
  type RunSnapshot,
  type TaskAttemptRecord,
  type TaskOutcome,
  type TaskSpec,
  type TriggerSource,
  type WorkflowGraph,
  type WorkflowRun
} from "@taskgraph/shared";
import type { ExecuteHooks, ExecutionContext } from "@taskgraph/worker";
import type { GraphStore, RunStateStore } from "../store/types.js";
import { Channel } from "./channel.js";
import { Scheduler, type DispatchRequest, type TerminalDecision } from "./scheduler.js";

export interface TaskRunner {
  execute(task: TaskSpec, context: ExecutionContext, hooks?: ExecuteHooks): Promise<TaskOutcome>;
}

export interface RunObserver {
  runUpdated?(run: WorkflowRun): void;
  attemptUpdated?(attempt: TaskAttemptRecord): void;
}

export interface StartRunOptions {
  params?: Record<string, unknown>;
  failurePolicy?: FailurePolicy;
  triggerSource?: TriggerSource;
}

export interface RunCoordinatorOptions {
  graphs: GraphStore;
  runs: RunStateStore;
  executor: TaskRunner;
  defaultFailurePolicy?: FailurePolicy;
  observer?: RunObserver;
  clock?: () => Date;
  random?: () => number;
}

type RunEvent =
  | { type: "attempt.settled"; taskName: string }
  | { type: "wake" }
  | { type: "cancel" }
  | { type: "fault"; error: unknown };

interface ActiveRun {
  channel: Channel<RunEvent>;
  done: Promise<void>;
}

/**
 * Owns the lifecycle of runs. Each run gets its own loop and completion
 * channel; the loop is the only place that suspends.
 */
export class RunCoordinator {
  private readonly graphs: GraphStore;
  private readonly runs: RunStateStore;
  private readonly executor: TaskRunner;
  private readonly defaultFailurePolicy: FailurePolicy;
  private readonly observer: RunObserver;
  private readonly clock: () => Date;
  private readonly random: () => number;
  private readonly active = new Map<string, ActiveRun>();

  constructor(options: RunCoordinatorOptions) {
    this.graphs = options.graphs;
    this.runs = options.runs;
    this.executor = options.executor;
    this.defaultFailurePolicy = options.defaultFailurePolicy ?? "fail_slow";
    this.observer = options.observer ?? {};
    this.clock = options.clock ?? (() => new Date());
    this.random = options.random ?? Math.random;
  }

  async start(definitionId: DefinitionId, options: StartRunOptions = {}): Promise<string> {
    const record = await this.graphs.getRecord(definitionId);
    if (record.deprecatedAt) {
      throw new ValidationError(`Workflow ${formatDefinitionId(definitionId)} is deprecated.`, [
        { path: "definition", message: "Deprecated workflows cannot start new runs." }
      ]);
    }
    const graph = await this.graphs.getGraph(definitionId);
    const run = await this.runs.createRun({
      definition: graph.id,
      failurePolicy: options.failurePolicy ?? graph.definition.failurePolicy ?? this.defaultFailurePolicy,
      params: options.params ?? {},
      triggerSource: options.triggerSource ?? "manual"
    });
    this.observer.runUpdated?.(run);

    const channel = new Channel<RunEvent>();
    const done = this.supervise(run, graph, channel);
    this.active.set(run.id, { channel, done });
    return run.id;
  }

  /** Idempotent; in-flight attempts finish but nothing new is dispatched. */
  async cancel(runId: string): Promise<WorkflowRun> {
    const { run, transitioned } = await this.runs.requestCancel(runId);
    if (transitioned) this.observer.runUpdated?.(run);
    this.active.get(runId)?.channel.send({ type: "cancel" });
    return run;
  }

  async status(runId: string): Promise<RunSnapshot> {
    return this.runs.getSnapshot(runId);
  }

  /** Resolves once the run's loop has exited, with the run as stored then. */
  async waitForRun(runId: string): Promise<WorkflowRun> {
    await this.active.get(runId)?.done;
    return this.runs.getRun(runId);
  }

  activeRunIds(): Set<string> {
    return new Set(this.active.keys());
  }

  async shutdown(): Promise<void> {
    await Promise.all([...this.active.values()].map((entry) => entry.done));
  }

  private async supervise(run: WorkflowRun, graph: WorkflowGraph, channel: Channel<RunEvent>): Promise<void> {
    try {
      await this.drive(run.id, graph, channel, new Scheduler(graph, { failurePolicy: run.failurePolicy, random: this.random }));
    } catch (error) {
      console.error(`run ${run.id} loop failed`, error);
      await this.finish(run.id, { status: "failed", error: errorMessage(error) }).catch((finishError: unknown) => {
        console.error(`run ${run.id} could not be marked failed`, finishError);
      });
    } finally {
      this.active.delete(run.id);
    }
  }

  private async drive(
    runId: string,
    graph: WorkflowGraph,
    channel: Channel<RunEvent>,
    scheduler: Scheduler
  ): Promise<void> {
    await this.transition(runId, { status: "running", error: null });

    const inFlight = new Set<string>();
    let wakeTimer: NodeJS.Timeout | null = null;
    try {
      for (;;) {
        const snapshot = await this.runs.getSnapshot(runId);
        const plan = scheduler.plan(snapshot, this.clock());

        if (plan.terminal) {
          await this.finish(runId, plan.terminal);
          continue;
        }

        for (const request of plan.dispatch) {
          if (!inFlight.has(request.taskName) && (await this.dispatch(snapshot, graph, scheduler, request, channel))) {
            inFlight.add(request.taskName);
          }
        }

        if (wakeTimer) clearTimeout(wakeTimer);
        wakeTimer = plan.nextWakeAt ? this.armWakeTimer(plan.nextWakeAt, channel) : null;

        if (inFlight.size === 0 && !plan.nextWakeAt) {
          if (plan.dispatch.length === 0) return;
          // every dispatch lost a race; plan again from fresh state
          continue;
        }

        const event = await channel.receive();
        if (event.type === "attempt.settled") inFlight.delete(event.taskName);
        if (event.type === "fault") throw event.error;
      }
    } finally {
      if (wakeTimer) clearTimeout(wakeTimer);
    }
  }

  private async dispatch(
    snapshot: RunSnapshot,
    graph: WorkflowGraph,
    scheduler: Scheduler,
    request: DispatchRequest,
    channel: Channel<RunEvent>
  ): Promise<boolean> {
    const runId = snapshot.run.id;
    const { taskName, attemptNo } = request;
    let attempt: TaskAttemptRecord;
    try {
      attempt = await this.runs.beginAttempt(runId, taskName, attemptNo);
    } catch (error) {
      if (error instanceof ConflictError) return false;
      throw error;
    }
    this.observer.attemptUpdated?.(attempt);

    const context: ExecutionContext = {
      runId,
      taskName,
      attemptNo,
      runParams: snapshot.run.params,
      upstream: collectUpstream(graph, snapshot, taskName)
    };
    const hooks: ExecuteHooks = {
      onStart: async () => {
        this.observer.attemptUpdated?.(await this.runs.markAttemptRunning(runId, taskName, attemptNo));
      }
    };

    this.executor
      .execute(graph.task(taskName), context, hooks)
      .then(async (outcome) => {
        await this.settle(runId, scheduler, attempt, outcome);
        channel.send({ type: "attempt.settled", taskName });
      })
      .catch((error: unknown) => {
        channel.send({ type: "fault", error });
      });
    return true;
  }

  private async settle(
    runId: string,
    scheduler: Scheduler,
    attempt: TaskAttemptRecord,
    outcome: TaskOutcome
  ): Promise<void> {
    const { attempts } = await this.runs.getSnapshot(runId);
    const resolution = scheduler.resolveOutcome(attempt, outcome, attempts, this.clock());
    const recorded = await this.runs.completeAttempt(runId, attempt.taskName, attempt.attemptNo, resolution);
    this.observer.attemptUpdated?.(recorded);
  }

  private armWakeTimer(at: Date, channel: Channel<RunEvent>): NodeJS.Timeout {
    // a wake beyond the timer range fires early and the loop simply plans again
    const delay = Math.min(Math.max(0, at.getTime() - this.clock().getTime()), MAX_TIMER_DELAY_MS);
    return setTimeout(() => channel.send({ type: "wake" }), delay);
  }

  private async finish(runId: string, decision: TerminalDecision): Promise<void> {
    await this.transition(runId, decision);
  }

  /** A run cancelled concurrently wins over the loop's own transition. */
  private async transition(
    runId: string,
    target: { status: WorkflowRun["status"]; error: string | null }
  ): Promise<void> {
    try {
      this.observer.runUpdated?.(await this.runs.transitionRun(runId, target.status, target.error));
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error;
    }
  }
}

function collectUpstream(graph: WorkflowGraph, snapshot: RunSnapshot, taskName: string): Record<string, unknown> {
  const upstream: Record<string, unknown> = {};
  graph.dependenciesOf(taskName).forEach((dep) => {
    const succeeded = snapshot.attempts.find((attempt) => attempt.taskName === dep && attempt.status === "succeeded");
    if (succeeded) upstream[dep] = succeeded.output;
  });
  return upstream;
}
