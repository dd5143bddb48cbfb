import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import { formatDefinitionId, type DefinitionId, type WorkflowRecord } from "@taskgraph/shared";
import type { GraphStore } from "../store/types.js";

type TriggerHandler = (definition: DefinitionId) => Promise<void>;

interface ScheduledJob {
  expression: string;
  task: ScheduledTask;
}

/** Starts runs for definitions that carry a cron `schedule`. */
export class CronTrigger {
  private readonly jobs = new Map<string, ScheduledJob>();
  private refreshTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly graphs: GraphStore,
    private readonly onTrigger: TriggerHandler,
    private readonly refreshMs: number
  ) {}

  async start(): Promise<void> {
    await this.refresh();
    this.refreshTimer = setInterval(() => {
      this.refresh().catch((error) => {
        console.error("trigger refresh failed", error);
      });
    }, this.refreshMs);
  }

  stop(): void {
    this.jobs.forEach((job) => job.task.stop());
    this.jobs.clear();
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = null;
    }
  }

  scheduledWorkflows(): string[] {
    return [...this.jobs.keys()].sort((a, b) => a.localeCompare(b));
  }

  async refresh(): Promise<void> {
    const workflows = await this.graphs.list();
    const seen = new Set<string>();
    workflows.forEach((workflow) => {
      const key = formatDefinitionId(workflow.id);
      seen.add(key);
      this.ensureJob(key, workflow);
    });

    for (const [key, job] of this.jobs.entries()) {
      if (!seen.has(key)) {
        job.task.stop();
        this.jobs.delete(key);
      }
    }
  }

  private ensureJob(key: string, workflow: WorkflowRecord): void {
    const expression = workflow.definition.schedule;
    const existing = this.jobs.get(key);
    if (!expression || workflow.deprecatedAt || !cron.validate(expression)) {
      if (existing) {
        existing.task.stop();
        this.jobs.delete(key);
      }
      return;
    }

    if (existing?.expression === expression) return;
    existing?.task.stop();

    const task = cron.schedule(expression, () => {
      this.onTrigger(workflow.id).catch((error) => {
        console.error(`scheduled trigger failed for workflow ${key}`, error);
      });
    });
    this.jobs.set(key, { expression, task });
  }
}
