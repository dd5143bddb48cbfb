import { Router, type NextFunction, type Request, type Response } from "express";
import {
  ValidationError,
  errorMessage,
  isEngineError,
  type DefinitionId,
  type FailurePolicy,
  type RunStatus
} from "@taskgraph/shared";
import { appEvents, type EngineEvent } from "../events.js";
import type { OrchestratorService } from "../orchestrator.js";
import type { RunFilter } from "../store/types.js";

type AsyncHandler = (request: Request, response: Response) => Promise<void>;

const runStatuses: RunStatus[] = ["pending", "running", "succeeded", "failed", "cancelled"];

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function route(handler: AsyncHandler) {
  return (request: Request, response: Response, next: NextFunction): void => {
    handler(request, response).catch(next);
  };
}

function definitionIdFrom(request: Request): DefinitionId {
  const name = String(request.params.name ?? "");
  const raw = String(request.params.version ?? "");
  const version = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
  if (!Number.isSafeInteger(version) || version < 1) {
    throw new ValidationError(`Invalid workflow version '${raw}'.`, [
      { path: "version", message: "version must be a positive integer." }
    ]);
  }
  return { name, version };
}

function readFailurePolicy(value: unknown): FailurePolicy | undefined {
  if (value === undefined) return undefined;
  if (value === "fail_fast" || value === "fail_slow") return value;
  throw new ValidationError("failurePolicy must be 'fail_fast' or 'fail_slow'.", [
    { path: "failurePolicy", message: "must be 'fail_fast' or 'fail_slow'." }
  ]);
}

function readStartOptions(body: unknown): { params: Record<string, unknown>; failurePolicy?: FailurePolicy } {
  if (body === undefined || body === null) return { params: {} };
  if (!isObject(body)) {
    throw new ValidationError("Run request body must be an object.", [{ path: "", message: "must be an object." }]);
  }
  let params: Record<string, unknown> = {};
  if (body.params !== undefined) {
    if (!isObject(body.params)) {
      throw new ValidationError("params must be an object.", [{ path: "params", message: "must be an object." }]);
    }
    params = body.params;
  }
  const failurePolicy = readFailurePolicy(body.failurePolicy);
  return failurePolicy ? { params, failurePolicy } : { params };
}

function readRunFilter(query: Request["query"]): RunFilter {
  const filter: RunFilter = {};
  if (typeof query.workflow === "string" && query.workflow.length > 0) {
    filter.workflowName = query.workflow;
  }
  if (typeof query.status === "string") {
    const status = runStatuses.find((candidate) => candidate === query.status);
    if (!status) {
      throw new ValidationError(`Unknown run status '${query.status}'.`, [
        { path: "status", message: `must be one of ${runStatuses.join(", ")}.` }
      ]);
    }
    filter.status = status;
  }
  if (typeof query.limit === "string") {
    const limit = Number.parseInt(query.limit, 10);
    if (!Number.isSafeInteger(limit) || limit < 1) {
      throw new ValidationError("limit must be a positive integer.", [
        { path: "limit", message: "must be a positive integer." }
      ]);
    }
    filter.limit = limit;
  }
  return filter;
}

/** Maps engine errors onto HTTP statuses; anything unrecognised is a 500. */
export function errorHandler(error: unknown, _request: Request, response: Response, _next: NextFunction): void {
  if (isEngineError(error)) {
    if (error instanceof ValidationError) {
      response.status(400).json({
        error: error.scope === "definition" ? "workflow definition is invalid" : error.message,
        details: error.issues
      });
      return;
    }
    response.status(error.code === "not_found" ? 404 : 409).json({ error: error.message });
    return;
  }
  if (isObject(error) && error.type === "entity.parse.failed") {
    response.status(400).json({ error: "request body is not valid JSON" });
    return;
  }
  if (isObject(error) && error.type === "entity.too.large") {
    response.status(413).json({ error: "request body is too large" });
    return;
  }
  console.error("request failed", error);
  response.status(500).json({ error: errorMessage(error) });
}

export function createApiRouter(deps: { orchestrator: OrchestratorService }): Router {
  const { orchestrator } = deps;
  const router = Router();

  router.post(
    "/workflows",
    route(async (request, response) => {
      const workflow = await orchestrator.registerWorkflow(request.body);
      response.status(201).json({ workflow });
    })
  );

  router.get(
    "/workflows",
    route(async (_request, response) => {
      const workflows = await orchestrator.listWorkflows();
      response.status(200).json({ workflows });
    })
  );

  router.get(
    "/workflows/:name/versions/:version",
    route(async (request, response) => {
      const workflow = await orchestrator.getWorkflow(definitionIdFrom(request));
      response.status(200).json({ workflow });
    })
  );

  router.post(
    "/workflows/:name/versions/:version/deprecate",
    route(async (request, response) => {
      const workflow = await orchestrator.deprecateWorkflow(definitionIdFrom(request));
      response.status(200).json({ workflow });
    })
  );

  router.post(
    "/workflows/:name/versions/:version/runs",
    route(async (request, response) => {
      const id = definitionIdFrom(request);
      const options = readStartOptions(request.body);
      const run = await orchestrator.startRun(id, { ...options, triggerSource: "manual" });
      response.status(201).json({ run });
    })
  );

  router.get(
    "/runs",
    route(async (request, response) => {
      const runs = await orchestrator.listRuns(readRunFilter(request.query));
      response.status(200).json({ runs });
    })
  );

  router.get(
    "/runs/:runId",
    route(async (request, response) => {
      const { run, attempts } = await orchestrator.getRunDetails(String(request.params.runId ?? ""));
      response.status(200).json({ run, attempts });
    })
  );

  router.post(
    "/runs/:runId/cancel",
    route(async (request, response) => {
      await orchestrator.cancelRun(String(request.params.runId ?? ""));
      response.status(200).json({ ok: true });
    })
  );

  router.get("/events", (request, response) => {
    response.setHeader("Content-Type", "text/event-stream");
    response.setHeader("Cache-Control", "no-cache");
    response.setHeader("Connection", "keep-alive");
    response.flushHeaders();

    const listener = (event: EngineEvent) => {
      response.write(`data: ${JSON.stringify(event)}\n\n`);
    };
    appEvents.on("event", listener);
    const ping = setInterval(() => {
      response.write(":keepalive\n\n");
    }, 15_000);

    request.on("close", () => {
      clearInterval(ping);
      appEvents.off("event", listener);
      response.end();
    });
  });

  return router;
}
