import {
  calculateBackoffMs,
  isTerminalRunStatus,
  isUnresolvedAttempt,
  maxAttempts,
  resolveRetryPolicy,
  type FailurePolicy,
  type RunSnapshot,
  type TaskAttemptRecord,
  type TaskOutcome,
  type WorkflowGraph
} from "@taskgraph/shared";
import type { AttemptResolution } from "../store/types.js";

export type TaskState =
  | "waiting"
  | "in_flight"
  | "succeeded"
  | "retry_wait"
  | "exhausted";

export interface TaskProgress {
  name: string;
  state: TaskState;
  latest: TaskAttemptRecord | null;
  /** Set for `retry_wait`: when the next attempt may start. */
  retryDueAt: Date | null;
}

export interface DispatchRequest {
  taskName: string;
  attemptNo: number;
}

export interface TerminalDecision {
  status: "succeeded" | "failed";
  error: string | null;
}

export interface SchedulePlan {
  dispatch: DispatchRequest[];
  inFlight: string[];
  /** Earliest pending retry that is not due yet. */
  nextWakeAt: Date | null;
  terminal: TerminalDecision | null;
}

export interface SchedulerOptions {
  failurePolicy: FailurePolicy;
  random?: () => number;
}

/**
 * Decides what a run does next from its compiled graph and the attempt
 * records alone. Holds no run state of its own.
 */
export class Scheduler {
  private readonly random: () => number;

  constructor(
    private readonly graph: WorkflowGraph,
    private readonly options: SchedulerOptions
  ) {
    this.random = options.random ?? Math.random;
  }

  progress(attempts: TaskAttemptRecord[], now: Date): Map<string, TaskProgress> {
    const latestByTask = new Map<string, TaskAttemptRecord>();
    attempts.forEach((attempt) => {
      const current = latestByTask.get(attempt.taskName);
      if (!current || attempt.attemptNo > current.attemptNo) {
        latestByTask.set(attempt.taskName, attempt);
      }
    });

    const progress = new Map<string, TaskProgress>();
    this.graph.topologicalOrder.forEach((name) => {
      const latest = latestByTask.get(name) ?? null;
      progress.set(name, { name, latest, ...this.classify(name, latest, now) });
    });
    return progress;
  }

  plan(snapshot: RunSnapshot, now: Date): SchedulePlan {
    const idle: SchedulePlan = { dispatch: [], inFlight: [], nextWakeAt: null, terminal: null };
    const { run } = snapshot;
    if (run.cancelRequested || isTerminalRunStatus(run.status)) {
      return idle;
    }

    const progress = this.progress(snapshot.attempts, now);
    const all = [...progress.values()];
    const inFlight = all.filter((task) => task.state === "in_flight").map((task) => task.name);
    const exhausted = all.filter((task) => task.state === "exhausted");

    if (exhausted.length > 0 && this.options.failurePolicy === "fail_fast") {
      return { ...idle, inFlight, terminal: { status: "failed", error: describeFailures(exhausted) } };
    }

    const dispatch: DispatchRequest[] = [];
    let nextWakeAt: Date | null = null;
    for (const task of all) {
      if (task.state === "waiting" && this.dependenciesSucceeded(task.name, progress)) {
        dispatch.push({ taskName: task.name, attemptNo: 1 });
        continue;
      }
      if (task.state !== "retry_wait" || !task.latest || !task.retryDueAt) continue;
      if (task.retryDueAt.getTime() <= now.getTime()) {
        dispatch.push({ taskName: task.name, attemptNo: task.latest.attemptNo + 1 });
      } else if (!nextWakeAt || task.retryDueAt.getTime() < nextWakeAt.getTime()) {
        nextWakeAt = task.retryDueAt;
      }
    }

    if (dispatch.length > 0 || inFlight.length > 0 || nextWakeAt) {
      return { dispatch, inFlight, nextWakeAt, terminal: null };
    }

    if (all.every((task) => task.state === "succeeded")) {
      return { ...idle, terminal: { status: "succeeded", error: null } };
    }
    return { ...idle, terminal: { status: "failed", error: describeFailures(exhausted) } };
  }

  /**
   * Turns an executor outcome into what gets recorded on the attempt. A retry
   * delay never shrinks below the delay already used for the same task.
   */
  resolveOutcome(
    attempt: Pick<TaskAttemptRecord, "taskName" | "attemptNo">,
    outcome: TaskOutcome,
    history: TaskAttemptRecord[],
    now: Date
  ): AttemptResolution {
    if (outcome.status === "succeeded") {
      return { status: "succeeded", output: outcome.output };
    }

    const error = outcome.status === "failed" ? outcome.error : `task timed out after ${outcome.timeoutMs}ms`;
    const task = this.graph.task(attempt.taskName);
    if (attempt.attemptNo >= maxAttempts(task)) {
      return { status: outcome.status, error, retryDelayMs: null, retryAt: null };
    }

    const previousDelay = history
      .filter((record) => record.taskName === attempt.taskName && record.attemptNo < attempt.attemptNo)
      .reduce((max, record) => Math.max(max, record.retryDelayMs ?? 0), 0);
    const delay = Math.max(
      calculateBackoffMs(resolveRetryPolicy(task).backoff, attempt.attemptNo, this.random),
      previousDelay
    );
    return {
      status: outcome.status,
      error,
      retryDelayMs: delay,
      retryAt: new Date(now.getTime() + delay).toISOString()
    };
  }

  private classify(
    name: string,
    latest: TaskAttemptRecord | null,
    now: Date
  ): Pick<TaskProgress, "state" | "retryDueAt"> {
    if (!latest) return { state: "waiting", retryDueAt: null };
    if (isUnresolvedAttempt(latest.status)) return { state: "in_flight", retryDueAt: null };
    if (latest.status === "succeeded") return { state: "succeeded", retryDueAt: null };
    if (latest.attemptNo >= maxAttempts(this.graph.task(name))) {
      return { state: "exhausted", retryDueAt: null };
    }
    return { state: "retry_wait", retryDueAt: latest.retryAt ? new Date(latest.retryAt) : now };
  }

  private dependenciesSucceeded(name: string, progress: Map<string, TaskProgress>): boolean {
    return this.graph.dependenciesOf(name).every((dep) => progress.get(dep)?.state === "succeeded");
  }
}

function describeFailures(exhausted: TaskProgress[]): string {
  return exhausted
    .map((task) => {
      const attempts = task.latest?.attemptNo ?? 0;
      const suffix = attempts === 1 ? "attempt" : "attempts";
      return `task '${task.name}' failed after ${attempts} ${suffix}: ${task.latest?.error ?? "unknown error"}`;
    })
    .join("; ");
}
