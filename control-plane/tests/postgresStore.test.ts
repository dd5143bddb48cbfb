import { describe, expect, it } from "vitest";
import { toAttemptRecord, toRunRecord, toWorkflowRecord } from "../src/store/postgresStore.js";

const createdAt = new Date("2026-01-01T00:00:00.000Z");

describe("postgres row mapping", () => {
  it("maps definition rows onto workflow records", () => {
    const definition = { name: "etl", version: 2, tasks: [{ name: "a", executable: "noop" }], edges: [] };
    expect(
      toWorkflowRecord({ name: "etl", version: 2, definition, deprecated_at: null, created_at: createdAt })
    ).toEqual({
      id: { name: "etl", version: 2 },
      definition,
      deprecatedAt: null,
      createdAt: "2026-01-01T00:00:00.000Z"
    });
  });

  it("maps run rows onto runs", () => {
    const run = toRunRecord({
      id: "run-1",
      workflow_name: "etl",
      workflow_version: 2,
      status: "running",
      failure_policy: "fail_fast",
      params: { day: "monday" },
      trigger_source: "schedule",
      cancel_requested: false,
      error: null,
      created_at: createdAt,
      started_at: new Date("2026-01-01T00:00:01.000Z"),
      finished_at: null
    });
    expect(run).toEqual({
      id: "run-1",
      definition: { name: "etl", version: 2 },
      status: "running",
      failurePolicy: "fail_fast",
      params: { day: "monday" },
      triggerSource: "schedule",
      cancelRequested: false,
      error: null,
      createdAt: "2026-01-01T00:00:00.000Z",
      startedAt: "2026-01-01T00:00:01.000Z",
      finishedAt: null
    });
  });

  it("maps attempt rows and defaults a missing output to null", () => {
    const attempt = toAttemptRecord({
      run_id: "run-1",
      task_name: "a",
      attempt_no: 1,
      status: "failed",
      created_at: createdAt,
      started_at: createdAt,
      finished_at: createdAt,
      error: "boom",
      output: undefined,
      retry_delay_ms: 500,
      retry_at: new Date("2026-01-01T00:00:00.500Z")
    });
    expect(attempt.output).toBeNull();
    expect(attempt.retryDelayMs).toBe(500);
    expect(attempt.retryAt).toBe("2026-01-01T00:00:00.500Z");
    expect(attempt.finishedAt).toBe("2026-01-01T00:00:00.000Z");
  });
});
