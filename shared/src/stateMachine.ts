import type { AttemptStatus, RunStatus } from "./types.js";

const runTransitions: Record<RunStatus, Set<RunStatus>> = {
  pending: new Set(["running", "failed", "cancelled"]),
  running: new Set(["succeeded", "failed", "cancelled"]),
  succeeded: new Set(),
  failed: new Set(),
  cancelled: new Set()
};

const attemptTransitions: Record<AttemptStatus, Set<AttemptStatus>> = {
  // pending -> failed covers an attempt the worker pool rejected before it started
  pending: new Set(["running", "failed"]),
  running: new Set(["succeeded", "failed", "timed_out"]),
  succeeded: new Set(),
  failed: new Set(),
  timed_out: new Set()
};

export const TERMINAL_RUN_STATUSES: ReadonlySet<RunStatus> = new Set(["succeeded", "failed", "cancelled"]);

export function isTerminalRunStatus(status: RunStatus): boolean {
  return TERMINAL_RUN_STATUSES.has(status);
}

export function isUnresolvedAttempt(status: AttemptStatus): boolean {
  return status === "pending" || status === "running";
}

export function canTransitionRun(from: RunStatus, to: RunStatus): boolean {
  return runTransitions[from].has(to);
}

export function canTransitionAttempt(from: AttemptStatus, to: AttemptStatus): boolean {
  return attemptTransitions[from].has(to);
}

export function assertRunTransition(from: RunStatus, to: RunStatus): void {
  if (!canTransitionRun(from, to)) {
    throw new Error(`Invalid run transition: ${from} -> ${to}`);
  }
}

export function assertAttemptTransition(from: AttemptStatus, to: AttemptStatus): void {
  if (!canTransitionAttempt(from, to)) {
    throw new Error(`Invalid attempt transition: ${from} -> ${to}`);
  }
}
