export * from "./types.js";
export * from "./errors.js";
export * from "./dag.js";
export * from "./stateMachine.js";
export * from "./backoff.js";
