import { JSONPath } from "jsonpath-plus";
import type { TaskHandler } from "./handlers.js";

export type ConditionOperator =
  | "exists"
  | "equals"
  | "notEquals"
  | "in"
  | "notIn"
  | "gt"
  | "gte"
  | "lt"
  | "lte"
  | "contains";

const OPERATORS: readonly ConditionOperator[] = [
  "exists",
  "equals",
  "notEquals",
  "in",
  "notIn",
  "gt",
  "gte",
  "lt",
  "lte",
  "contains"
];

export interface ConditionPredicate {
  /** JSONPath evaluated against `{ params, upstream }`. */
  path: string;
  operator: ConditionOperator;
  value?: unknown;
  values?: unknown[];
  caseSensitive?: boolean;
}

function isOperator(value: unknown): value is ConditionOperator {
  return typeof value === "string" && OPERATORS.some((operator) => operator === value);
}

/** Reads a predicate from task params; throws on anything it cannot evaluate. */
export function readPredicate(params: Record<string, unknown>): ConditionPredicate {
  if (typeof params.path !== "string" || params.path.trim().length === 0) {
    throw new Error("Condition path must be a non-empty string.");
  }
  if (!isOperator(params.operator)) {
    throw new Error(`Unsupported condition operator '${String(params.operator)}'.`);
  }
  const predicate: ConditionPredicate = { path: params.path, operator: params.operator, value: params.value };
  if (params.values !== undefined) {
    if (!Array.isArray(params.values)) throw new Error("Condition values must be an array.");
    predicate.values = params.values;
  }
  if (params.caseSensitive !== undefined) {
    if (typeof params.caseSensitive !== "boolean") throw new Error("Condition caseSensitive must be a boolean.");
    predicate.caseSensitive = params.caseSensitive;
  }
  const numeric = ["gt", "gte", "lt", "lte"].includes(predicate.operator);
  if (numeric && (typeof predicate.value !== "number" || !Number.isFinite(predicate.value))) {
    throw new Error(`Condition operator '${predicate.operator}' needs a numeric value.`);
  }
  return predicate;
}

export function evaluateCondition(predicate: ConditionPredicate, json: object): boolean {
  const found: unknown = JSONPath({ path: predicate.path, json, wrap: true });
  const results: unknown[] = Array.isArray(found) ? found : [];
  const caseSensitive = predicate.caseSensitive ?? false;
  const { operator } = predicate;

  switch (operator) {
    case "exists":
      return results.length > 0;
    case "equals":
    case "notEquals": {
      if (results.length === 0) return operator === "notEquals";
      const isMatch = results.some((value) => sameValue(value, predicate.value, caseSensitive));
      return isMatch === (operator === "equals");
    }
    case "in":
    case "notIn": {
      if (results.length === 0) return operator === "notIn";
      const list = predicate.values ?? [];
      const isMatch = results.some((value) => list.some((entry) => sameValue(value, entry, caseSensitive)));
      return operator === "in" ? isMatch : !isMatch;
    }
    case "gt":
    case "gte":
    case "lt":
    case "lte": {
      const expected = Number(predicate.value);
      return results.flatMap(numericValues).some((candidate) => compareNumbers(candidate, expected, operator));
    }
    case "contains":
      return results.some((value) => contains(value, predicate.value, caseSensitive));
  }
}

function sameValue(left: unknown, right: unknown, caseSensitive: boolean): boolean {
  if (!caseSensitive && typeof left === "string" && typeof right === "string") {
    return left.toLowerCase() === right.toLowerCase();
  }
  return JSON.stringify(left) === JSON.stringify(right);
}

function numericValues(value: unknown): number[] {
  if (typeof value === "number") return Number.isFinite(value) ? [value] : [];
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? [parsed] : [];
  }
  if (Array.isArray(value)) return value.flatMap(numericValues);
  return [];
}

function compareNumbers(candidate: number, expected: number, operator: "gt" | "gte" | "lt" | "lte"): boolean {
  switch (operator) {
    case "gt":
      return candidate > expected;
    case "gte":
      return candidate >= expected;
    case "lt":
      return candidate < expected;
    case "lte":
      return candidate <= expected;
  }
}

function contains(value: unknown, expected: unknown, caseSensitive: boolean): boolean {
  if (typeof value === "string" && typeof expected === "string") {
    return caseSensitive ? value.includes(expected) : value.toLowerCase().includes(expected.toLowerCase());
  }
  if (Array.isArray(value)) {
    return value.some((entry) => sameValue(entry, expected, caseSensitive) || contains(entry, expected, caseSensitive));
  }
  return false;
}

/**
 * Evaluates a predicate over the run params and upstream outputs. The result
 * is data for downstream tasks; it does not skip any branch.
 */
export const condition: TaskHandler = async ({ params, runParams, upstream }) => {
  const matched = evaluateCondition(readPredicate(params), { params: runParams, upstream });
  return { matched, result: matched ? "Yes" : "No" };
};
