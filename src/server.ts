/**
 * Thin HTTP layer over the orchestrator.
 * Keeps request logic out of here — server only parses request and formats response.
 *
 * Endpoints:
 *   POST /generate   → one prompt, one answer (model or offline fallback)
 *   GET  /status     → uptime, counters, memory, backend reachability
 *   GET  /health     → liveness, never touches the backend
 */

import express from "express";
import type { NextFunction, Request, Response } from "express";
import type { Orchestrator } from "./Orchestrator.js";
import type { StatsTracker } from "./metrics.js";
import type { BackendClient, StatusReport } from "./types.js";

export interface ServerDeps {
  orchestrator: Orchestrator;
  stats: StatsTracker;
  backend: BackendClient;
  logFile: string;
  /** express.json() size cap, e.g. "10mb" */
  bodyLimit: string;
}

export function createServer(deps: ServerDeps) {
  const app = express();
  app.use(express.json({ limit: deps.bodyLimit }));

  // POST /generate
  app.post("/generate", async (req, res) => {
    const outcome = await deps.orchestrator.generate(req.body);

    if (!outcome.ok) {
      res.status(outcome.status).json({ error: outcome.error });
      return;
    }
    res.json(outcome.result);
  });

  // GET /status
  app.get("/status", async (_req, res) => {
    const ollamaRunning = await deps.backend.isAvailable();
    const snap = deps.stats.snapshot();

    const report: StatusReport = {
      status: "running",
      uptime_seconds: snap.uptimeSeconds,
      requests_handled: snap.requestsHandled,
      memory_usage_percent: snap.memoryUsagePercent,
      memory_available_gb: snap.memoryAvailableGb,
      ollama_running: ollamaRunning,
      log_file: deps.logFile,
      timestamp: new Date().toISOString(),
    };
    res.json(report);
  });

  // GET /health
  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", timestamp: new Date().toISOString() });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: "This endpoint doesn't exist" });
  });

  // body-parser failures arrive with a 4xx status: 400 bad JSON, 413 too large, 415 charset
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(err);
    if (status !== null) {
      res.status(status).json({ error: CLIENT_ERRORS[status] ?? "Request body could not be read" });
      return;
    }
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`[Server] Unhandled error: ${msg}`);
    res.status(500).json({ error: "Something broke on our end" });
  });

  return app;
}

const CLIENT_ERRORS: Record<number, string> = {
  400: "Request body must be valid JSON",
  413: "Request body is too large",
};

function clientErrorStatus(err: unknown): number | null {
  if (typeof err === "object" && err !== null && "status" in err) {
    const { status } = err;
    if (typeof status === "number" && status >= 400 && status < 500) return status;
  }
  return err instanceof SyntaxError ? 400 : null;
}
