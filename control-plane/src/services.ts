import { TaskExecutor, createDefaultRegistry, type HandlerRegistry } from "@taskgraph/worker";
import type { AppConfig } from "./config.js";
import { RunCoordinator } from "./engine/coordinator.js";
import { OrchestratorService, createRunObserver } from "./orchestrator.js";
import { MemoryGraphStore } from "./store/memoryGraphStore.js";
import { MemoryRunStore } from "./store/memoryRunStore.js";
import { PostgresGraphStore, PostgresRunStore } from "./store/postgresStore.js";
import type { GraphStore, RunStateStore } from "./store/types.js";

export interface Services {
  graphs: GraphStore;
  runs: RunStateStore;
  executor: TaskExecutor;
  coordinator: RunCoordinator;
  orchestrator: OrchestratorService;
}

export function createServices(
  config: Pick<AppConfig, "storeDriver" | "workerConcurrency" | "defaultFailurePolicy">,
  handlers: HandlerRegistry = createDefaultRegistry()
): Services {
  const graphs: GraphStore = config.storeDriver === "postgres" ? new PostgresGraphStore() : new MemoryGraphStore();
  const runs: RunStateStore = config.storeDriver === "postgres" ? new PostgresRunStore() : new MemoryRunStore();
  const executor = new TaskExecutor({ concurrency: config.workerConcurrency, handlers });
  const coordinator = new RunCoordinator({
    graphs,
    runs,
    executor,
    defaultFailurePolicy: config.defaultFailurePolicy,
    observer: createRunObserver()
  });
  const orchestrator = new OrchestratorService(graphs, runs, coordinator);
  return { graphs, runs, executor, coordinator, orchestrator };
}
