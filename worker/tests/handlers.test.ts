import { describe, expect, it } from "vitest";
import { createDefaultRegistry, renderTemplate, type TaskContext, type TaskHandler } from "../src/handlers.js";

function contextFor(overrides: Partial<TaskContext>): TaskContext {
  return {
    runId: "run-1",
    taskName: "a",
    attemptNo: 1,
    runParams: {},
    upstream: {},
    params: {},
    signal: new AbortController().signal,
    ...overrides
  };
}

function handler(name: string): TaskHandler {
  const resolved = createDefaultRegistry().resolve(name);
  if (!resolved) throw new Error(`missing built-in handler ${name}`);
  return resolved;
}

describe("built-in handlers", () => {
  it("fails flaky before threshold then succeeds", async () => {
    const flaky = handler("flaky");
    await expect(flaky(contextFor({ attemptNo: 2, params: { failUntilAttempt: 2 } }))).rejects.toThrow(
      "flaky task failed at attempt 2"
    );
    await expect(flaky(contextFor({ attemptNo: 3, params: { failUntilAttempt: 2 } }))).resolves.toEqual({
      attemptNo: 3
    });
  });

  it("renders message text from run parameters", async () => {
    const message = handler("message");
    await expect(
      message(contextFor({ params: { text: "Hello {{ user }}, order {{order}}" }, runParams: { user: "sam", order: 7 } }))
    ).resolves.toEqual({ text: "Hello sam, order 7" });
  });

  it("sleeps for the configured duration", async () => {
    await expect(handler("sleep")(contextFor({ params: { durationMs: 1 } }))).resolves.toEqual({ sleptMs: 1 });
  });

  it("lists the built-in executables", () => {
    expect(createDefaultRegistry().list()).toEqual(["condition", "fail", "flaky", "message", "noop", "sleep"]);
  });
});

describe("renderTemplate", () => {
  it("leaves unknown placeholders untouched", () => {
    expect(renderTemplate("{{known}} and {{unknown}}", { known: "yes" })).toBe("yes and {{unknown}}");
  });
});
