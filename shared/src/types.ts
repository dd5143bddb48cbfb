export type RunStatus = "pending" | "running" | "succeeded" | "failed" | "cancelled";

export type AttemptStatus = "pending" | "running" | "succeeded" | "failed" | "timed_out";

export type TriggerSource = "manual" | "schedule";

export type FailurePolicy = "fail_fast" | "fail_slow";

export interface BackoffPolicy {
  baseMs: number;
  capMs: number;
  jitter: boolean;
}

export interface RetryPolicy {
  maxRetries: number;
  backoff?: Partial<BackoffPolicy>;
}

export interface TaskSpec {
  name: string;
  executable: string;
  params?: Record<string, unknown>;
  retry?: RetryPolicy;
  timeoutMs?: number;
}

export interface WorkflowEdge {
  from: string;
  to: string;
}

export interface DefinitionId {
  name: string;
  version: number;
}

export interface WorkflowDefinition {
  name: string;
  version: number;
  description?: string;
  tasks: TaskSpec[];
  edges: WorkflowEdge[];
  failurePolicy?: FailurePolicy;
  schedule?: string | null;
}

export interface WorkflowRecord {
  id: DefinitionId;
  definition: WorkflowDefinition;
  deprecatedAt: string | null;
  createdAt: string;
}

export interface WorkflowRun {
  id: string;
  definition: DefinitionId;
  status: RunStatus;
  failurePolicy: FailurePolicy;
  params: Record<string, unknown>;
  triggerSource: TriggerSource;
  cancelRequested: boolean;
  error: string | null;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
}

export interface TaskAttemptRecord {
  runId: string;
  taskName: string;
  attemptNo: number;
  status: AttemptStatus;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  error: string | null;
  output: unknown;
  retryDelayMs: number | null;
  retryAt: string | null;
}

export interface RunSnapshot {
  run: WorkflowRun;
  attempts: TaskAttemptRecord[];
}

export type TaskOutcome =
  | { status: "succeeded"; output: unknown }
  | { status: "failed"; error: string }
  | { status: "timed_out"; timeoutMs: number };

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
}
