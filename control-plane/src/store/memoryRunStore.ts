import { nanoid } from "nanoid";
import {
  ConflictError,
  NotFoundError,
  assertAttemptTransition,
  assertRunTransition,
  isTerminalRunStatus,
  isUnresolvedAttempt,
  type RunSnapshot,
  type RunStatus,
  type TaskAttemptRecord,
  type WorkflowRun
} from "@taskgraph/shared";
import { KeyedMutex } from "./keyedMutex.js";
import type { AttemptResolution, CancelResult, CreateRunInput, RunFilter, RunStateStore } from "./types.js";

interface RunCell {
  run: WorkflowRun;
  attempts: TaskAttemptRecord[];
  sequence: number;
}

/**
 * Run state held in process. Each run is its own cell; the mutex gives every
 * cell a single writer at a time.
 */
export class MemoryRunStore implements RunStateStore {
  private readonly cells = new Map<string, RunCell>();
  private readonly locks = new KeyedMutex();
  private sequence = 0;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async createRun(input: CreateRunInput): Promise<WorkflowRun> {
    const run: WorkflowRun = {
      id: nanoid(),
      definition: { ...input.definition },
      status: "pending",
      failurePolicy: input.failurePolicy,
      params: structuredClone(input.params),
      triggerSource: input.triggerSource,
      cancelRequested: false,
      error: null,
      createdAt: this.now(),
      startedAt: null,
      finishedAt: null
    };
    this.sequence += 1;
    this.cells.set(run.id, { run, attempts: [], sequence: this.sequence });
    return copyRun(run);
  }

  async getRun(runId: string): Promise<WorkflowRun> {
    return copyRun(this.cell(runId).run);
  }

  async getSnapshot(runId: string): Promise<RunSnapshot> {
    const cell = this.cell(runId);
    return { run: copyRun(cell.run), attempts: cell.attempts.map(copyAttempt) };
  }

  async listRuns(filter: RunFilter = {}): Promise<WorkflowRun[]> {
    return [...this.cells.values()]
      .filter((cell) => !filter.workflowName || cell.run.definition.name === filter.workflowName)
      .filter((cell) => !filter.status || cell.run.status === filter.status)
      .sort((a, b) => b.sequence - a.sequence)
      .slice(0, filter.limit ?? 200)
      .map((cell) => copyRun(cell.run));
  }

  async transitionRun(runId: string, status: RunStatus, error: string | null = null): Promise<WorkflowRun> {
    return this.locks.run(runId, () => {
      const { run } = this.cell(runId);
      if (isTerminalRunStatus(run.status)) {
        throw new ConflictError(`Run ${runId} is already ${run.status}.`);
      }
      assertRunTransition(run.status, status);
      run.status = status;
      if (error !== null) run.error = error;
      if (status === "running") run.startedAt ??= this.now();
      if (isTerminalRunStatus(status)) run.finishedAt ??= this.now();
      return copyRun(run);
    });
  }

  async requestCancel(runId: string): Promise<CancelResult> {
    return this.locks.run(runId, () => {
      const { run } = this.cell(runId);
      run.cancelRequested = true;
      const transitioned = !isTerminalRunStatus(run.status);
      if (transitioned) {
        run.status = "cancelled";
        run.finishedAt = this.now();
      }
      return { run: copyRun(run), transitioned };
    });
  }

  async beginAttempt(runId: string, taskName: string, attemptNo: number): Promise<TaskAttemptRecord> {
    return this.locks.run(runId, () => {
      const cell = this.cell(runId);
      if (cell.run.cancelRequested || isTerminalRunStatus(cell.run.status)) {
        throw new ConflictError(`Run ${runId} is ${cell.run.status}; attempt discarded.`);
      }
      const latest = latestAttempt(cell.attempts, taskName);
      if (latest && isUnresolvedAttempt(latest.status)) {
        throw new ConflictError(`Task '${taskName}' attempt ${latest.attemptNo} is still ${latest.status}.`);
      }
      const expected = (latest?.attemptNo ?? 0) + 1;
      if (attemptNo !== expected) {
        throw new ConflictError(`Task '${taskName}' expects attempt ${expected}, got ${attemptNo}.`);
      }
      const attempt: TaskAttemptRecord = {
        runId,
        taskName,
        attemptNo,
        status: "pending",
        createdAt: this.now(),
        startedAt: null,
        finishedAt: null,
        error: null,
        output: null,
        retryDelayMs: null,
        retryAt: null
      };
      cell.attempts.push(attempt);
      return copyAttempt(attempt);
    });
  }

  async markAttemptRunning(runId: string, taskName: string, attemptNo: number): Promise<TaskAttemptRecord> {
    return this.locks.run(runId, () => {
      const attempt = this.attempt(runId, taskName, attemptNo);
      assertAttemptTransition(attempt.status, "running");
      attempt.status = "running";
      attempt.startedAt = this.now();
      return copyAttempt(attempt);
    });
  }

  async completeAttempt(
    runId: string,
    taskName: string,
    attemptNo: number,
    resolution: AttemptResolution
  ): Promise<TaskAttemptRecord> {
    return this.locks.run(runId, () => {
      const attempt = this.attempt(runId, taskName, attemptNo);
      assertAttemptTransition(attempt.status, resolution.status);
      attempt.status = resolution.status;
      attempt.finishedAt = this.now();
      if (resolution.status === "succeeded") {
        attempt.output = structuredClone(resolution.output);
      } else {
        attempt.error = resolution.error;
        attempt.retryDelayMs = resolution.retryDelayMs;
        attempt.retryAt = resolution.retryAt;
      }
      return copyAttempt(attempt);
    });
  }

  async purgeTerminalRuns(finishedBefore: Date, exclude: ReadonlySet<string> = new Set()): Promise<number> {
    let purged = 0;
    for (const [runId, cell] of [...this.cells.entries()]) {
      const { run } = cell;
      if (exclude.has(runId) || !isTerminalRunStatus(run.status) || !run.finishedAt) continue;
      if (new Date(run.finishedAt).getTime() >= finishedBefore.getTime()) continue;
      await this.locks.run(runId, () => {
        this.cells.delete(runId);
      });
      purged += 1;
    }
    return purged;
  }

  private cell(runId: string): RunCell {
    const cell = this.cells.get(runId);
    if (!cell) {
      throw new NotFoundError(`Run ${runId} not found.`);
    }
    return cell;
  }

  private attempt(runId: string, taskName: string, attemptNo: number): TaskAttemptRecord {
    const attempt = this.cell(runId).attempts.find(
      (candidate) => candidate.taskName === taskName && candidate.attemptNo === attemptNo
    );
    if (!attempt) {
      throw new NotFoundError(`Attempt ${attemptNo} of task '${taskName}' in run ${runId} not found.`);
    }
    return attempt;
  }

  private now(): string {
    return this.clock().toISOString();
  }
}

function latestAttempt(attempts: TaskAttemptRecord[], taskName: string): TaskAttemptRecord | undefined {
  return attempts
    .filter((attempt) => attempt.taskName === taskName)
    .reduce<TaskAttemptRecord | undefined>(
      (latest, attempt) => (!latest || attempt.attemptNo > latest.attemptNo ? attempt : latest),
      undefined
    );
}

function copyRun(run: WorkflowRun): WorkflowRun {
  return { ...run, definition: { ...run.definition }, params: structuredClone(run.params) };
}

function copyAttempt(attempt: TaskAttemptRecord): TaskAttemptRecord {
  return { ...attempt, output: structuredClone(attempt.output) };
}
