import { describe, expect, it } from "vitest";
import {
  assertRunTransition,
  canTransitionAttempt,
  canTransitionRun,
  isTerminalRunStatus
} from "../src/stateMachine.js";

describe("run state machine", () => {
  it("allows pending -> running", () => {
    expect(canTransitionRun("pending", "running")).toBe(true);
  });

  it("blocks terminal transitions", () => {
    expect(canTransitionRun("succeeded", "running")).toBe(false);
    expect(() => assertRunTransition("cancelled", "failed")).toThrow(
      "Invalid run transition: cancelled -> failed"
    );
  });

  it("knows terminal statuses", () => {
    expect(isTerminalRunStatus("running")).toBe(false);
    expect(isTerminalRunStatus("cancelled")).toBe(true);
  });
});

describe("attempt state machine", () => {
  it("allows running -> timed_out", () => {
    expect(canTransitionAttempt("running", "timed_out")).toBe(true);
  });

  it("never reopens a finished attempt", () => {
    expect(canTransitionAttempt("failed", "running")).toBe(false);
    expect(canTransitionAttempt("succeeded", "failed")).toBe(false);
  });
});
