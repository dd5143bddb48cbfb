import cron from "node-cron";
import {
  NotFoundError,
  ValidationError,
  WorkflowGraph,
  formatDefinitionId,
  isTerminalRunStatus,
  type DefinitionId,
  type RunSnapshot,
  type WorkflowRecord,
  type WorkflowRun
} from "@taskgraph/shared";
import type { RunCoordinator, RunObserver, StartRunOptions } from "./engine/coordinator.js";
import { appEvents } from "./events.js";
import {
  attemptStatusCounter,
  runCreatedCounter,
  runDurationHistogram,
  runFinishedCounter,
  workflowRegisteredCounter
} from "./metrics/metrics.js";
import type { GraphStore, RunFilter, RunStateStore } from "./store/types.js";

/** Publishes run and attempt changes as application events and metrics. */
export function createRunObserver(): RunObserver {
  return {
    runUpdated(run) {
      if (run.status === "pending") {
        runCreatedCounter.inc({ trigger_source: run.triggerSource });
        appEvents.emitEvent({ type: "run.created", runId: run.id, workflow: formatDefinitionId(run.definition) });
        return;
      }
      if (isTerminalRunStatus(run.status)) {
        runFinishedCounter.inc({ status: run.status });
        if (run.startedAt && run.finishedAt) {
          runDurationHistogram.observe((Date.parse(run.finishedAt) - Date.parse(run.startedAt)) / 1000);
        }
      }
      appEvents.emitEvent({ type: "run.updated", runId: run.id, status: run.status });
    },
    attemptUpdated(attempt) {
      attemptStatusCounter.inc({ status: attempt.status });
      appEvents.emitEvent({
        type: "attempt.updated",
        runId: attempt.runId,
        taskName: attempt.taskName,
        attemptNo: attempt.attemptNo,
        status: attempt.status
      });
    }
  };
}

/** The boundary an API layer talks to. */
export class OrchestratorService {
  constructor(
    private readonly graphs: GraphStore,
    private readonly runs: RunStateStore,
    private readonly coordinator: RunCoordinator
  ) {}

  async registerWorkflow(input: unknown): Promise<WorkflowRecord> {
    const graph = WorkflowGraph.compile(input);
    const schedule = graph.definition.schedule;
    if (schedule && !cron.validate(schedule)) {
      const issues = [{ path: "schedule", message: `Invalid cron expression '${schedule}'.` }];
      throw new ValidationError(`Invalid workflow definition: schedule: ${issues[0].message}`, issues, "definition");
    }
    const id = await this.graphs.register(graph.definition);
    workflowRegisteredCounter.inc();
    appEvents.emitEvent({ type: "workflow.registered", workflow: formatDefinitionId(id) });
    return this.graphs.getRecord(id);
  }

  async getWorkflow(id: DefinitionId): Promise<WorkflowRecord> {
    return this.graphs.getRecord(id);
  }

  async listWorkflows(): Promise<WorkflowRecord[]> {
    return this.graphs.list();
  }

  async deprecateWorkflow(id: DefinitionId): Promise<WorkflowRecord> {
    const record = await this.graphs.deprecate(id);
    appEvents.emitEvent({ type: "workflow.deprecated", workflow: formatDefinitionId(id) });
    return record;
  }

  async startRun(definition: DefinitionId, options: StartRunOptions = {}): Promise<WorkflowRun> {
    const runId = await this.coordinator.start(definition, options);
    return this.runs.getRun(runId);
  }

  async getRunDetails(runId: string): Promise<RunSnapshot> {
    return this.coordinator.status(runId);
  }

  async listRuns(filter: RunFilter = {}): Promise<WorkflowRun[]> {
    return this.runs.listRuns(filter);
  }

  /** Succeeds for active, finished and unknown runs alike. */
  async cancelRun(runId: string): Promise<void> {
    try {
      await this.coordinator.cancel(runId);
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
    }
  }

  async waitForRun(runId: string): Promise<WorkflowRun> {
    return this.coordinator.waitForRun(runId);
  }
}
