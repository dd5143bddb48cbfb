import { MAX_TIMER_DELAY_MS } from "./backoff.js";
import { NotFoundError, ValidationError } from "./errors.js";
import type {
  BackoffPolicy,
  DefinitionId,
  FailurePolicy,
  RetryPolicy,
  TaskSpec,
  ValidationIssue,
  ValidationResult,
  WorkflowDefinition,
  WorkflowEdge
} from "./types.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isTimerDelay(value: unknown): value is number {
  return isNonNegativeInteger(value) && value <= MAX_TIMER_DELAY_MS;
}

function readBackoff(
  input: unknown,
  path: string,
  errors: ValidationIssue[]
): Partial<BackoffPolicy> | undefined {
  if (input === undefined) return undefined;
  if (!isObject(input)) {
    errors.push({ path, message: "Backoff must be an object." });
    return undefined;
  }
  const backoff: Partial<BackoffPolicy> = {};
  if (input.baseMs !== undefined) {
    if (isTimerDelay(input.baseMs)) backoff.baseMs = input.baseMs;
    else errors.push({ path: `${path}.baseMs`, message: `baseMs must be an integer from 0 to ${MAX_TIMER_DELAY_MS}.` });
  }
  if (input.capMs !== undefined) {
    if (isTimerDelay(input.capMs)) backoff.capMs = input.capMs;
    else errors.push({ path: `${path}.capMs`, message: `capMs must be an integer from 0 to ${MAX_TIMER_DELAY_MS}.` });
  }
  if (input.jitter !== undefined) {
    if (typeof input.jitter === "boolean") backoff.jitter = input.jitter;
    else errors.push({ path: `${path}.jitter`, message: "jitter must be a boolean." });
  }
  if (
    backoff.baseMs !== undefined &&
    backoff.capMs !== undefined &&
    backoff.capMs < backoff.baseMs
  ) {
    errors.push({ path: `${path}.capMs`, message: "capMs must not be lower than baseMs." });
  }
  return backoff;
}

function readRetry(input: unknown, path: string, errors: ValidationIssue[]): RetryPolicy | undefined {
  if (input === undefined) return undefined;
  if (!isObject(input)) {
    errors.push({ path, message: "Retry policy must be an object." });
    return undefined;
  }
  if (!isNonNegativeInteger(input.maxRetries)) {
    errors.push({ path: `${path}.maxRetries`, message: "maxRetries must be a non-negative integer." });
    return undefined;
  }
  const retry: RetryPolicy = { maxRetries: input.maxRetries };
  const backoff = readBackoff(input.backoff, `${path}.backoff`, errors);
  if (backoff) retry.backoff = backoff;
  return retry;
}

function readTask(input: unknown, index: number, errors: ValidationIssue[]): TaskSpec | null {
  const path = `tasks[${index}]`;
  if (!isObject(input)) {
    errors.push({ path, message: "Task must be an object." });
    return null;
  }
  if (!isNonEmptyString(input.name)) {
    errors.push({ path: `${path}.name`, message: "Task name is required." });
    return null;
  }
  const task: TaskSpec = { name: input.name, executable: "" };

  if (isNonEmptyString(input.executable)) {
    task.executable = input.executable;
  } else {
    errors.push({ path: `${path}.executable`, message: "Task executable is required." });
  }

  if (input.params !== undefined) {
    if (isObject(input.params)) task.params = { ...input.params };
    else errors.push({ path: `${path}.params`, message: "params must be an object." });
  }

  if (input.timeoutMs !== undefined) {
    if (isPositiveInteger(input.timeoutMs) && input.timeoutMs <= MAX_TIMER_DELAY_MS) task.timeoutMs = input.timeoutMs;
    else errors.push({ path: `${path}.timeoutMs`, message: `timeoutMs must be an integer from 1 to ${MAX_TIMER_DELAY_MS}.` });
  }

  const retry = readRetry(input.retry, `${path}.retry`, errors);
  if (retry) task.retry = retry;
  return task;
}

function readEdge(input: unknown, index: number, errors: ValidationIssue[]): WorkflowEdge | null {
  const path = `edges[${index}]`;
  if (!isObject(input) || !isNonEmptyString(input.from) || !isNonEmptyString(input.to)) {
    errors.push({ path, message: "Edge must be an object with 'from' and 'to' task names." });
    return null;
  }
  return { from: input.from, to: input.to };
}

function readFailurePolicy(input: unknown, errors: ValidationIssue[]): FailurePolicy | undefined {
  if (input === undefined) return undefined;
  if (input === "fail_fast" || input === "fail_slow") return input;
  errors.push({
    path: "failurePolicy",
    message: "failurePolicy must be either 'fail_fast' or 'fail_slow'."
  });
  return undefined;
}

interface ParsedDefinition {
  definition: WorkflowDefinition | null;
  errors: ValidationIssue[];
}

function parseDefinition(input: unknown): ParsedDefinition {
  const errors: ValidationIssue[] = [];

  if (!isObject(input)) {
    return {
      definition: null,
      errors: [{ path: "root", message: "Workflow definition must be an object." }]
    };
  }

  if (!isNonEmptyString(input.name)) {
    errors.push({ path: "name", message: "Workflow name is required." });
  }
  if (!isPositiveInteger(input.version)) {
    errors.push({ path: "version", message: "Version must be a positive integer." });
  }
  if (input.description !== undefined && typeof input.description !== "string") {
    errors.push({ path: "description", message: "description must be a string." });
  }
  if (input.schedule !== undefined && input.schedule !== null && !isNonEmptyString(input.schedule)) {
    errors.push({ path: "schedule", message: "schedule must be a cron expression or null." });
  }
  const failurePolicy = readFailurePolicy(input.failurePolicy, errors);

  if (!Array.isArray(input.tasks) || input.tasks.length === 0) {
    errors.push({ path: "tasks", message: "Tasks must be a non-empty array." });
    return { definition: null, errors };
  }
  if (!Array.isArray(input.edges)) {
    errors.push({ path: "edges", message: "Edges must be an array." });
    return { definition: null, errors };
  }

  const tasks: TaskSpec[] = [];
  const names = new Set<string>();
  input.tasks.forEach((raw, index) => {
    const task = readTask(raw, index, errors);
    if (!task) return;
    if (names.has(task.name)) {
      errors.push({ path: `tasks[${index}].name`, message: `Duplicate task name '${task.name}'.` });
      return;
    }
    names.add(task.name);
    tasks.push(task);
  });

  const edges: WorkflowEdge[] = [];
  const seenEdges = new Set<string>();
  input.edges.forEach((raw, index) => {
    const edge = readEdge(raw, index, errors);
    if (!edge) return;
    const path = `edges[${index}]`;
    if (!names.has(edge.from)) {
      errors.push({ path: `${path}.from`, message: `Unknown task '${edge.from}'.` });
    }
    if (!names.has(edge.to)) {
      errors.push({ path: `${path}.to`, message: `Unknown task '${edge.to}'.` });
    }
    if (edge.from === edge.to) {
      errors.push({ path, message: "Task cannot depend on itself." });
    }
    const key = `${edge.from}\u0000${edge.to}`;
    if (seenEdges.has(key)) {
      errors.push({ path, message: `Duplicate edge '${edge.from}' -> '${edge.to}'.` });
    }
    seenEdges.add(key);
    edges.push(edge);
  });

  if (errors.length > 0 || !isNonEmptyString(input.name) || !isPositiveInteger(input.version)) {
    return { definition: null, errors };
  }

  const definition: WorkflowDefinition = {
    name: input.name,
    version: input.version,
    tasks,
    edges
  };
  if (typeof input.description === "string") definition.description = input.description;
  if (failurePolicy) definition.failurePolicy = failurePolicy;
  if (input.schedule !== undefined) {
    definition.schedule = isNonEmptyString(input.schedule) ? input.schedule : null;
  }
  return { definition, errors };
}

interface Ordering {
  order: string[];
  cycle: string[] | null;
}

/**
 * Kahn's algorithm over the task declaration order. When nodes are left over,
 * every one of them still has a predecessor among the leftovers, so walking
 * predecessors from any leftover node must revisit a node; that loop is the
 * reported cycle.
 */
function orderTasks(names: string[], upstream: Map<string, string[]>, downstream: Map<string, string[]>): Ordering {
  const inDegree = new Map<string, number>();
  names.forEach((name) => inDegree.set(name, upstream.get(name)?.length ?? 0));

  const queue = names.filter((name) => inDegree.get(name) === 0);
  const order: string[] = [];
  for (let index = 0; index < queue.length; index += 1) {
    const current = queue[index];
    order.push(current);
    (downstream.get(current) ?? []).forEach((dependent) => {
      const nextDegree = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, nextDegree);
      if (nextDegree === 0) queue.push(dependent);
    });
  }

  if (order.length === names.length) {
    return { order, cycle: null };
  }

  const placed = new Set(order);
  const remaining = names.filter((name) => !placed.has(name));
  const remainingSet = new Set(remaining);
  const walk: string[] = [];
  const seenAt = new Map<string, number>();
  let current: string | undefined = remaining[0];
  while (current !== undefined && !seenAt.has(current)) {
    seenAt.set(current, walk.length);
    walk.push(current);
    current = (upstream.get(current) ?? []).find((dep) => remainingSet.has(dep));
  }
  if (current === undefined) {
    return { order, cycle: remaining };
  }

  // The walk follows predecessors, so reverse it into edge direction.
  const loop = walk.slice(seenAt.get(current) ?? 0).reverse();
  const declared = new Map(names.map((name, index) => [name, index]));
  let start = 0;
  loop.forEach((name, index) => {
    if ((declared.get(name) ?? 0) < (declared.get(loop[start]) ?? 0)) start = index;
  });
  const rotated = [...loop.slice(start), ...loop.slice(0, start)];
  return { order, cycle: [...rotated, rotated[0]] };
}

function buildAdjacency(definition: WorkflowDefinition): {
  upstream: Map<string, string[]>;
  downstream: Map<string, string[]>;
} {
  const upstream = new Map<string, string[]>();
  const downstream = new Map<string, string[]>();
  definition.tasks.forEach((task) => {
    upstream.set(task.name, []);
    downstream.set(task.name, []);
  });
  definition.edges.forEach((edge) => {
    upstream.get(edge.to)?.push(edge.from);
    downstream.get(edge.from)?.push(edge.to);
  });
  return { upstream, downstream };
}

export function validateWorkflowDefinition(input: unknown): ValidationResult {
  const parsed = parseDefinition(input);
  if (!parsed.definition) {
    return { valid: false, errors: parsed.errors };
  }
  const { upstream, downstream } = buildAdjacency(parsed.definition);
  const { cycle } = orderTasks(
    parsed.definition.tasks.map((task) => task.name),
    upstream,
    downstream
  );
  if (cycle) {
    return {
      valid: false,
      errors: [{ path: "edges", message: `Task graph must be acyclic; cycle: ${cycle.join(" -> ")}.` }]
    };
  }
  return { valid: true, errors: [] };
}

/**
 * A workflow definition that passed validation, together with its adjacency
 * lists and a topological order. Instances only come out of
 * {@link WorkflowGraph.compile}.
 */
export class WorkflowGraph {
  private readonly tasksByName: Map<string, TaskSpec>;

  private constructor(
    readonly definition: WorkflowDefinition,
    readonly topologicalOrder: readonly string[],
    private readonly upstream: Map<string, string[]>,
    private readonly downstream: Map<string, string[]>
  ) {
    this.tasksByName = new Map(definition.tasks.map((task) => [task.name, task]));
  }

  static compile(input: unknown): WorkflowGraph {
    const parsed = parseDefinition(input);
    if (!parsed.definition) {
      throw new ValidationError(describeIssues(parsed.errors), parsed.errors, "definition");
    }
    const definition = parsed.definition;
    const { upstream, downstream } = buildAdjacency(definition);
    const { order, cycle } = orderTasks(
      definition.tasks.map((task) => task.name),
      upstream,
      downstream
    );
    if (cycle) {
      const issues = [{ path: "edges", message: `Task graph must be acyclic; cycle: ${cycle.join(" -> ")}.` }];
      throw new ValidationError(describeIssues(issues), issues, "definition");
    }
    return new WorkflowGraph(definition, order, upstream, downstream);
  }

  get id(): DefinitionId {
    return { name: this.definition.name, version: this.definition.version };
  }

  get taskNames(): string[] {
    return this.definition.tasks.map((task) => task.name);
  }

  task(name: string): TaskSpec {
    const task = this.tasksByName.get(name);
    if (!task) {
      throw new NotFoundError(`Task '${name}' is not part of workflow ${formatDefinitionId(this.id)}.`);
    }
    return task;
  }

  dependenciesOf(name: string): readonly string[] {
    return this.upstream.get(name) ?? [];
  }

  dependentsOf(name: string): readonly string[] {
    return this.downstream.get(name) ?? [];
  }

  roots(): string[] {
    return this.taskNames.filter((name) => this.dependenciesOf(name).length === 0);
  }
}

function describeIssues(issues: ValidationIssue[]): string {
  return `Invalid workflow definition: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ")}`;
}

export function formatDefinitionId(id: DefinitionId): string {
  return `${id.name}@${id.version}`;
}
