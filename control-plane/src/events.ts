import { EventEmitter } from "node:events";
import type { AttemptStatus, RunStatus } from "@taskgraph/shared";

export type EngineEvent =
  | { type: "workflow.registered"; workflow: string }
  | { type: "workflow.deprecated"; workflow: string }
  | { type: "run.created"; runId: string; workflow: string }
  | { type: "run.updated"; runId: string; status: RunStatus }
  | { type: "attempt.updated"; runId: string; taskName: string; attemptNo: number; status: AttemptStatus };

class AppEvents extends EventEmitter {
  emitEvent(event: EngineEvent): void {
    this.emit("event", event);
  }
}

export const appEvents = new AppEvents();
