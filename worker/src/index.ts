export { TaskExecutor, type ExecuteHooks, type TaskExecutorOptions } from "./executor.js";
export {
  HandlerRegistry,
  createDefaultRegistry,
  renderTemplate,
  type ExecutionContext,
  type TaskContext,
  type TaskHandler
} from "./handlers.js";
export {
  evaluateCondition,
  readPredicate,
  type ConditionOperator,
  type ConditionPredicate
} from "./conditions.js";
