/**
 * index.ts
 * ────────
 * Entry point. Reads config once, wires the components, starts HTTP.
 *
 *   node dist/index.js
 *
 * Every setting comes from the environment (or a .env file next to the
 * process) and is fixed for the life of the process.
 */

import "dotenv/config";
import { loadConfig } from "./src/config.js";
import { createOllamaClient } from "./src/dispatcher.js";
import { InteractionLogger } from "./src/interactionLog.js";
import { StatsTracker } from "./src/metrics.js";
import { createOrchestrator } from "./src/Orchestrator.js";
import { createServer } from "./src/server.js";

async function main() {
  const config = loadConfig();

  const stats = new StatsTracker();
  const interactionLog = new InteractionLogger(config.logFile);
  const backend = createOllamaClient({
    baseUrl: config.ollamaBaseUrl,
    timeoutMs: config.backendTimeoutMs,
  });
  const orchestrator = createOrchestrator({
    backend,
    stats,
    interactionLog,
    defaultModel: config.defaultModel,
  });

  const app = createServer({
    orchestrator,
    stats,
    backend,
    logFile: config.logFile,
    bodyLimit: config.bodyLimit,
  });

  const server = app.listen(config.port, config.host, (err?: Error) => {
    if (err) {
      console.error("[Server] Failed to start:", err.message);
      process.exit(1);
    }
    console.log(`\n LocalAIHub running on http://${config.host}:${config.port}`);
    console.log(`   POST /generate    → send a prompt, get an answer`);
    console.log(`   GET  /status      → uptime, counters, memory, backend state`);
    console.log(`   GET  /health      → liveness check`);
    console.log(`   Backend: ${config.ollamaBaseUrl} (default model ${config.defaultModel})`);
    console.log(`   Logs:    ${config.logFile}\n`);
  });

  const shutdown = (signal: string) => {
    console.log(`\n[Server] ${signal} received, shutting down…`);
    server.close(() => {
      interactionLog
        .flush()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error("[Server] Flush failed:", err);
          process.exit(1);
        });
    });
    server.closeIdleConnections();
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("Fatal startup error:", err);
  process.exit(1);
});
