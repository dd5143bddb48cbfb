import client from "prom-client";

client.collectDefaultMetrics();

export const workflowRegisteredCounter = new client.Counter({
  name: "workflow_registered_total",
  help: "Number of workflow definitions registered."
});

export const runCreatedCounter = new client.Counter({
  name: "run_created_total",
  help: "Number of runs created.",
  labelNames: ["trigger_source"] as const
});

export const runFinishedCounter = new client.Counter({
  name: "run_finished_total",
  help: "Number of runs that reached a terminal status.",
  labelNames: ["status"] as const
});

export const attemptStatusCounter = new client.Counter({
  name: "task_attempt_status_total",
  help: "Number of task attempt status transitions.",
  labelNames: ["status"] as const
});

export const runDurationHistogram = new client.Histogram({
  name: "run_duration_seconds",
  help: "Run duration in seconds.",
  buckets: [0.1, 1, 5, 10, 30, 60, 120, 300, 600]
});

export const purgedRunsCounter = new client.Counter({
  name: "run_purged_total",
  help: "Number of terminal runs removed by the retention reaper."
});

export async function metricsSnapshot(): Promise<string> {
  return client.register.metrics();
}
