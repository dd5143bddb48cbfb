import client from "prom-client";

// Registered on the default registry, so the control plane's /api/metrics serves them too.

export const taskExecutionCounter = new client.Counter({
  name: "executor_attempt_outcome_total",
  help: "Task attempt outcomes reported by the executor.",
  labelNames: ["status"] as const
});

export const taskExecutionLatency = new client.Histogram({
  name: "executor_attempt_duration_seconds",
  help: "Wall time from handler start to outcome, in seconds.",
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30]
});

export const workerPoolGauge = new client.Gauge({
  name: "executor_pool_slots_in_use",
  help: "Attempts currently holding an executor pool slot."
});
