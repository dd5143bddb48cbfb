import cors from "cors";
import express from "express";
import type { AppConfig } from "./config.js";
import { createApiRouter, errorHandler } from "./api/routes.js";
import { metricsSnapshot } from "./metrics/metrics.js";
import type { OrchestratorService } from "./orchestrator.js";

export function createApp(deps: { config: Pick<AppConfig, "maxBodyBytes">; orchestrator: OrchestratorService }) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: deps.config.maxBodyBytes }));
  app.get("/api/health", (_request, response) => {
    response.status(200).json({ ok: true });
  });
  app.get("/api/metrics", async (_request, response) => {
    response.setHeader("Content-Type", "text/plain");
    response.send(await metricsSnapshot());
  });
  app.use("/api", createApiRouter({ orchestrator: deps.orchestrator }));
  app.use(errorHandler);
  return app;
}
