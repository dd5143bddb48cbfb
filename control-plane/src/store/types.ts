import type {
  DefinitionId,
  FailurePolicy,
  RunSnapshot,
  RunStatus,
  TaskAttemptRecord,
  TriggerSource,
  WorkflowDefinition,
  WorkflowGraph,
  WorkflowRecord,
  WorkflowRun
} from "@taskgraph/shared";

export interface GraphStore {
  /** Validates, compiles and stores a definition; the compiled graph is what runs use. */
  register(definition: unknown): Promise<DefinitionId>;
  get(id: DefinitionId): Promise<WorkflowDefinition>;
  getRecord(id: DefinitionId): Promise<WorkflowRecord>;
  getGraph(id: DefinitionId): Promise<WorkflowGraph>;
  list(): Promise<WorkflowRecord[]>;
  deprecate(id: DefinitionId): Promise<WorkflowRecord>;
}

export interface CreateRunInput {
  definition: DefinitionId;
  failurePolicy: FailurePolicy;
  params: Record<string, unknown>;
  triggerSource: TriggerSource;
}

export interface RunFilter {
  workflowName?: string;
  status?: RunStatus;
  limit?: number;
}

export type AttemptResolution =
  | { status: "succeeded"; output: unknown }
  | {
      status: "failed" | "timed_out";
      error: string;
      retryDelayMs: number | null;
      retryAt: string | null;
    };

export interface CancelResult {
  run: WorkflowRun;
  /** True only for the call that moved the run to `cancelled`. */
  transitioned: boolean;
}

/**
 * Writes to one run are serialized; writes to different runs never wait on
 * each other. Every method fails with NotFoundError for an unknown run id.
 */
export interface RunStateStore {
  createRun(input: CreateRunInput): Promise<WorkflowRun>;
  getRun(runId: string): Promise<WorkflowRun>;
  getSnapshot(runId: string): Promise<RunSnapshot>;
  listRuns(filter?: RunFilter): Promise<WorkflowRun[]>;
  /** ConflictError when the run already reached a terminal status. */
  transitionRun(runId: string, status: RunStatus, error?: string | null): Promise<WorkflowRun>;
  /** Idempotent. Marks an active run cancelled and blocks further attempts. */
  requestCancel(runId: string): Promise<CancelResult>;
  /**
   * Creates the next attempt record in `pending`. ConflictError, with nothing
   * written, when the run is cancelled or finished, the previous attempt is
   * unresolved, or `attemptNo` is not the next number for the task.
   */
  beginAttempt(runId: string, taskName: string, attemptNo: number): Promise<TaskAttemptRecord>;
  markAttemptRunning(runId: string, taskName: string, attemptNo: number): Promise<TaskAttemptRecord>;
  completeAttempt(
    runId: string,
    taskName: string,
    attemptNo: number,
    resolution: AttemptResolution
  ): Promise<TaskAttemptRecord>;
  /** Deletes terminal runs finished before the cutoff, with their attempts. */
  purgeTerminalRuns(finishedBefore: Date, exclude?: ReadonlySet<string>): Promise<number>;
}
