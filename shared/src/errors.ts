import type { ValidationIssue } from "./types.js";

export type EngineErrorCode = "validation_error" | "not_found" | "conflict";

export class EngineError extends Error {
  constructor(
    readonly code: EngineErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Whether a validation failure is about a workflow definition or a request's own input. */
export type ValidationScope = "definition" | "input";

export class ValidationError extends EngineError {
  constructor(
    message: string,
    readonly issues: ValidationIssue[] = [],
    readonly scope: ValidationScope = "input"
  ) {
    super("validation_error", message);
  }
}

export class NotFoundError extends EngineError {
  constructor(message: string) {
    super("not_found", message);
  }
}

/** A concurrent mutation won the race; the caller should re-read and retry. */
export class ConflictError extends EngineError {
  constructor(message: string) {
    super("conflict", message);
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
