import {
  ConflictError,
  NotFoundError,
  WorkflowGraph,
  formatDefinitionId,
  type DefinitionId,
  type WorkflowDefinition,
  type WorkflowRecord
} from "@taskgraph/shared";
import type { GraphStore } from "./types.js";

interface Entry {
  graph: WorkflowGraph;
  deprecatedAt: string | null;
  createdAt: string;
  sequence: number;
}

export class MemoryGraphStore implements GraphStore {
  private readonly entries = new Map<string, Entry>();
  private sequence = 0;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async register(definition: unknown): Promise<DefinitionId> {
    const graph = WorkflowGraph.compile(definition);
    const key = formatDefinitionId(graph.id);
    if (this.entries.has(key)) {
      throw new ConflictError(`Workflow ${key} is already registered.`);
    }
    this.sequence += 1;
    this.entries.set(key, {
      graph,
      deprecatedAt: null,
      createdAt: this.clock().toISOString(),
      sequence: this.sequence
    });
    return graph.id;
  }

  async get(id: DefinitionId): Promise<WorkflowDefinition> {
    return structuredClone(this.entry(id).graph.definition);
  }

  async getRecord(id: DefinitionId): Promise<WorkflowRecord> {
    return toRecord(this.entry(id));
  }

  async getGraph(id: DefinitionId): Promise<WorkflowGraph> {
    return this.entry(id).graph;
  }

  async list(): Promise<WorkflowRecord[]> {
    return [...this.entries.values()].sort((a, b) => b.sequence - a.sequence).map(toRecord);
  }

  async deprecate(id: DefinitionId): Promise<WorkflowRecord> {
    const entry = this.entry(id);
    entry.deprecatedAt ??= this.clock().toISOString();
    return toRecord(entry);
  }

  private entry(id: DefinitionId): Entry {
    const entry = this.entries.get(formatDefinitionId(id));
    if (!entry) {
      throw new NotFoundError(`Workflow ${formatDefinitionId(id)} not found.`);
    }
    return entry;
  }
}

function toRecord(entry: Entry): WorkflowRecord {
  return {
    id: entry.graph.id,
    definition: structuredClone(entry.graph.definition),
    deprecatedAt: entry.deprecatedAt,
    createdAt: entry.createdAt
  };
}
