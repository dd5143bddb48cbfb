import { nanoid } from "nanoid";
import type { PoolClient } from "pg";
import {
  ConflictError,
  NotFoundError,
  WorkflowGraph,
  assertAttemptTransition,
  assertRunTransition,
  formatDefinitionId,
  isTerminalRunStatus,
  isUnresolvedAttempt,
  type AttemptStatus,
  type DefinitionId,
  type FailurePolicy,
  type RunSnapshot,
  type RunStatus,
  type TaskAttemptRecord,
  type TriggerSource,
  type WorkflowDefinition,
  type WorkflowRecord,
  type WorkflowRun
} from "@taskgraph/shared";
import { query, withTransaction } from "../db.js";
import type {
  AttemptResolution,
  CancelResult,
  CreateRunInput,
  GraphStore,
  RunFilter,
  RunStateStore
} from "./types.js";

type DefinitionRow = {
  name: string;
  version: number;
  definition: WorkflowDefinition;
  deprecated_at: Date | null;
  created_at: Date;
};

type RunRow = {
  id: string;
  workflow_name: string;
  workflow_version: number;
  status: RunStatus;
  failure_policy: FailurePolicy;
  params: Record<string, unknown>;
  trigger_source: TriggerSource;
  cancel_requested: boolean;
  error: string | null;
  created_at: Date;
  started_at: Date | null;
  finished_at: Date | null;
};

type AttemptRow = {
  run_id: string;
  task_name: string;
  attempt_no: number;
  status: AttemptStatus;
  created_at: Date;
  started_at: Date | null;
  finished_at: Date | null;
  error: string | null;
  output: unknown;
  retry_delay_ms: number | null;
  retry_at: Date | null;
};

export class PostgresGraphStore implements GraphStore {
  // Definitions never change once stored, so compiled graphs can be kept.
  private readonly graphs = new Map<string, WorkflowGraph>();

  async register(definition: unknown): Promise<DefinitionId> {
    const graph = WorkflowGraph.compile(definition);
    const inserted = await query<DefinitionRow>(
      `INSERT INTO workflow_definitions (name, version, definition)
       VALUES ($1, $2, $3)
       ON CONFLICT (name, version) DO NOTHING
       RETURNING *`,
      [graph.id.name, graph.id.version, JSON.stringify(graph.definition)]
    );
    if (!inserted.rows[0]) {
      throw new ConflictError(`Workflow ${formatDefinitionId(graph.id)} is already registered.`);
    }
    this.graphs.set(formatDefinitionId(graph.id), graph);
    return graph.id;
  }

  async get(id: DefinitionId): Promise<WorkflowDefinition> {
    return (await this.row(id)).definition;
  }

  async getRecord(id: DefinitionId): Promise<WorkflowRecord> {
    return toWorkflowRecord(await this.row(id));
  }

  async getGraph(id: DefinitionId): Promise<WorkflowGraph> {
    const key = formatDefinitionId(id);
    const cached = this.graphs.get(key);
    if (cached) return cached;
    const graph = WorkflowGraph.compile((await this.row(id)).definition);
    this.graphs.set(key, graph);
    return graph;
  }

  async list(): Promise<WorkflowRecord[]> {
    const result = await query<DefinitionRow>(
      "SELECT * FROM workflow_definitions ORDER BY created_at DESC, name ASC, version DESC"
    );
    return result.rows.map(toWorkflowRecord);
  }

  async deprecate(id: DefinitionId): Promise<WorkflowRecord> {
    const result = await query<DefinitionRow>(
      `UPDATE workflow_definitions
       SET deprecated_at = COALESCE(deprecated_at, NOW())
       WHERE name = $1 AND version = $2
       RETURNING *`,
      [id.name, id.version]
    );
    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError(`Workflow ${formatDefinitionId(id)} not found.`);
    }
    return toWorkflowRecord(row);
  }

  private async row(id: DefinitionId): Promise<DefinitionRow> {
    const result = await query<DefinitionRow>(
      "SELECT * FROM workflow_definitions WHERE name = $1 AND version = $2",
      [id.name, id.version]
    );
    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError(`Workflow ${formatDefinitionId(id)} not found.`);
    }
    return row;
  }
}

/**
 * Every write locks the run row first, which gives each run a single writer
 * while different runs proceed independently.
 */
export class PostgresRunStore implements RunStateStore {
  async createRun(input: CreateRunInput): Promise<WorkflowRun> {
    const result = await query<RunRow>(
      `INSERT INTO runs (id, workflow_name, workflow_version, status, failure_policy, params, trigger_source)
       VALUES ($1, $2, $3, 'pending', $4, $5, $6)
       RETURNING *`,
      [
        nanoid(),
        input.definition.name,
        input.definition.version,
        input.failurePolicy,
        JSON.stringify(input.params),
        input.triggerSource
      ]
    );
    return toRunRecord(result.rows[0]);
  }

  async getRun(runId: string): Promise<WorkflowRun> {
    const result = await query<RunRow>("SELECT * FROM runs WHERE id = $1", [runId]);
    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError(`Run ${runId} not found.`);
    }
    return toRunRecord(row);
  }

  async getSnapshot(runId: string): Promise<RunSnapshot> {
    return withTransaction(async (client) => {
      const run = await client.query<RunRow>("SELECT * FROM runs WHERE id = $1", [runId]);
      const row = run.rows[0];
      if (!row) {
        throw new NotFoundError(`Run ${runId} not found.`);
      }
      const attempts = await client.query<AttemptRow>(
        `SELECT *
         FROM task_attempts
         WHERE run_id = $1
         ORDER BY created_at ASC, task_name ASC, attempt_no ASC`,
        [runId]
      );
      return { run: toRunRecord(row), attempts: attempts.rows.map(toAttemptRecord) };
    });
  }

  async listRuns(filter: RunFilter = {}): Promise<WorkflowRun[]> {
    const result = await query<RunRow>(
      `SELECT *
       FROM runs
       WHERE ($1::text IS NULL OR workflow_name = $1)
         AND ($2::text IS NULL OR status = $2)
       ORDER BY created_at DESC
       LIMIT $3`,
      [filter.workflowName ?? null, filter.status ?? null, filter.limit ?? 200]
    );
    return result.rows.map(toRunRecord);
  }

  async transitionRun(runId: string, status: RunStatus, error: string | null = null): Promise<WorkflowRun> {
    return withTransaction(async (client) => {
      const run = await lockRun(client, runId);
      if (isTerminalRunStatus(run.status)) {
        throw new ConflictError(`Run ${runId} is already ${run.status}.`);
      }
      assertRunTransition(run.status, status);
      const updated = await client.query<RunRow>(
        `UPDATE runs
         SET status = $2,
             error = COALESCE($3, error),
             started_at = CASE WHEN $2 = 'running' AND started_at IS NULL THEN NOW() ELSE started_at END,
             finished_at = CASE WHEN $2 IN ('succeeded', 'failed', 'cancelled') AND finished_at IS NULL THEN NOW() ELSE finished_at END
         WHERE id = $1
         RETURNING *`,
        [runId, status, error]
      );
      return toRunRecord(updated.rows[0]);
    });
  }

  async requestCancel(runId: string): Promise<CancelResult> {
    return withTransaction(async (client) => {
      const current = await lockRun(client, runId);
      const updated = await client.query<RunRow>(
        `UPDATE runs
         SET cancel_requested = TRUE,
             status = CASE WHEN status IN ('pending', 'running') THEN 'cancelled' ELSE status END,
             finished_at = CASE WHEN finished_at IS NULL THEN NOW() ELSE finished_at END
         WHERE id = $1
         RETURNING *`,
        [runId]
      );
      return { run: toRunRecord(updated.rows[0]), transitioned: !isTerminalRunStatus(current.status) };
    });
  }

  async beginAttempt(runId: string, taskName: string, attemptNo: number): Promise<TaskAttemptRecord> {
    return withTransaction(async (client) => {
      const run = await lockRun(client, runId);
      if (run.cancel_requested || isTerminalRunStatus(run.status)) {
        throw new ConflictError(`Run ${runId} is ${run.status}; attempt discarded.`);
      }
      const latest = await client.query<AttemptRow>(
        `SELECT *
         FROM task_attempts
         WHERE run_id = $1 AND task_name = $2
         ORDER BY attempt_no DESC
         LIMIT 1`,
        [runId, taskName]
      );
      const previous = latest.rows[0];
      if (previous && isUnresolvedAttempt(previous.status)) {
        throw new ConflictError(`Task '${taskName}' attempt ${previous.attempt_no} is still ${previous.status}.`);
      }
      const expected = (previous?.attempt_no ?? 0) + 1;
      if (attemptNo !== expected) {
        throw new ConflictError(`Task '${taskName}' expects attempt ${expected}, got ${attemptNo}.`);
      }
      const inserted = await client.query<AttemptRow>(
        `INSERT INTO task_attempts (run_id, task_name, attempt_no, status)
         VALUES ($1, $2, $3, 'pending')
         RETURNING *`,
        [runId, taskName, attemptNo]
      );
      return toAttemptRecord(inserted.rows[0]);
    });
  }

  async markAttemptRunning(runId: string, taskName: string, attemptNo: number): Promise<TaskAttemptRecord> {
    return withTransaction(async (client) => {
      await lockRun(client, runId);
      const attempt = await lockAttempt(client, runId, taskName, attemptNo);
      assertAttemptTransition(attempt.status, "running");
      const updated = await client.query<AttemptRow>(
        `UPDATE task_attempts
         SET status = 'running',
             started_at = NOW()
         WHERE run_id = $1 AND task_name = $2 AND attempt_no = $3
         RETURNING *`,
        [runId, taskName, attemptNo]
      );
      return toAttemptRecord(updated.rows[0]);
    });
  }

  async completeAttempt(
    runId: string,
    taskName: string,
    attemptNo: number,
    resolution: AttemptResolution
  ): Promise<TaskAttemptRecord> {
    return withTransaction(async (client) => {
      await lockRun(client, runId);
      const attempt = await lockAttempt(client, runId, taskName, attemptNo);
      assertAttemptTransition(attempt.status, resolution.status);
      const failure = resolution.status === "succeeded" ? null : resolution;
      const updated = await client.query<AttemptRow>(
        `UPDATE task_attempts
         SET status = $4,
             finished_at = NOW(),
             output = $5,
             error = $6,
             retry_delay_ms = $7,
             retry_at = $8
         WHERE run_id = $1 AND task_name = $2 AND attempt_no = $3
         RETURNING *`,
        [
          runId,
          taskName,
          attemptNo,
          resolution.status,
          resolution.status === "succeeded" ? JSON.stringify(resolution.output ?? null) : null,
          failure?.error ?? null,
          failure?.retryDelayMs ?? null,
          failure?.retryAt ?? null
        ]
      );
      return toAttemptRecord(updated.rows[0]);
    });
  }

  async purgeTerminalRuns(finishedBefore: Date, exclude: ReadonlySet<string> = new Set()): Promise<number> {
    const result = await query<{ id: string }>(
      `DELETE FROM runs
       WHERE status IN ('succeeded', 'failed', 'cancelled')
         AND finished_at < $1
         AND NOT (id = ANY($2::text[]))
       RETURNING id`,
      [finishedBefore, [...exclude]]
    );
    return result.rowCount ?? 0;
  }
}

async function lockRun(client: PoolClient, runId: string): Promise<RunRow> {
  const result = await client.query<RunRow>("SELECT * FROM runs WHERE id = $1 FOR UPDATE", [runId]);
  const row = result.rows[0];
  if (!row) {
    throw new NotFoundError(`Run ${runId} not found.`);
  }
  return row;
}

async function lockAttempt(
  client: PoolClient,
  runId: string,
  taskName: string,
  attemptNo: number
): Promise<AttemptRow> {
  const result = await client.query<AttemptRow>(
    `SELECT *
     FROM task_attempts
     WHERE run_id = $1 AND task_name = $2 AND attempt_no = $3
     FOR UPDATE`,
    [runId, taskName, attemptNo]
  );
  const row = result.rows[0];
  if (!row) {
    throw new NotFoundError(`Attempt ${attemptNo} of task '${taskName}' in run ${runId} not found.`);
  }
  return row;
}

export function toWorkflowRecord(row: DefinitionRow): WorkflowRecord {
  return {
    id: { name: row.name, version: row.version },
    definition: row.definition,
    deprecatedAt: row.deprecated_at ? row.deprecated_at.toISOString() : null,
    createdAt: row.created_at.toISOString()
  };
}

export function toRunRecord(row: RunRow): WorkflowRun {
  return {
    id: row.id,
    definition: { name: row.workflow_name, version: row.workflow_version },
    status: row.status,
    failurePolicy: row.failure_policy,
    params: row.params,
    triggerSource: row.trigger_source,
    cancelRequested: row.cancel_requested,
    error: row.error,
    createdAt: row.created_at.toISOString(),
    startedAt: row.started_at ? row.started_at.toISOString() : null,
    finishedAt: row.finished_at ? row.finished_at.toISOString() : null
  };
}

export function toAttemptRecord(row: AttemptRow): TaskAttemptRecord {
  return {
    runId: row.run_id,
    taskName: row.task_name,
    attemptNo: row.attempt_no,
    status: row.status,
    createdAt: row.created_at.toISOString(),
    startedAt: row.started_at ? row.started_at.toISOString() : null,
    finishedAt: row.finished_at ? row.finished_at.toISOString() : null,
    error: row.error,
    output: row.output ?? null,
    retryDelayMs: row.retry_delay_ms,
    retryAt: row.retry_at ? row.retry_at.toISOString() : null
  };
}
