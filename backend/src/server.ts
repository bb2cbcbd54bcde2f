import "dotenv/config";
import http from "node:http";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { PlanCache } from "./lib/cache.js";
import { errorMessage } from "./lib/errors.js";
import { OllamaClient } from "./lib/llm.js";
import { initLogger } from "./lib/logger.js";
import { MetricsCollector } from "./lib/metrics.js";
import { PlanRepository } from "./lib/plan-repository.js";
import { TaskPlanner } from "./lib/planner.js";
import { ProgressHub } from "./lib/progress-hub.js";
import { RateLimiter } from "./lib/rate-limit.js";

const config = loadConfig();
const log = initLogger(config.logLevel).child({ subsystem: "server" });

const repo = await PlanRepository.open(config.databasePath);
const llm = new OllamaClient(config);
const hub = new ProgressHub();

const app = createApp({
  corsOrigin: config.corsOrigin,
  repo,
  llm,
  planner: new TaskPlanner({ llm, reporter: hub }),
  hub,
  cache: new PlanCache(config.cacheMaxEntries),
  metrics: new MetricsCollector(),
  rateLimiter: new RateLimiter(config.rateLimitPerMinute),
});

const server = http.createServer(app);
hub.attach(server);
server.listen(config.port, config.host, () => {
  log.info({ host: config.host, port: config.port, model: config.ollamaModel, database: config.databasePath }, "TaskFlow API listening");
});

async function shutdown(signal: string): Promise<void> {
  log.info({ signal }, "shutting down");
  hub.close();
  server.close();
  await repo.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch(err => {
      log.error({ err: errorMessage(err) }, "shutdown failed");
      process.exit(1);
    });
  });
}
