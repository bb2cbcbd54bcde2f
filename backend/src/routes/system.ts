import { Router } from "express";
import { SERVICE_NAME, SERVICE_VERSION } from "../config.js";
import type { AppContext } from "../context.js";
import { computeAnalytics } from "../lib/analytics.js";
import { HttpError, errorMessage } from "../lib/errors.js";
import { getLogger } from "../lib/logger.js";
import { asyncRoute } from "../middleware.js";

const log = getLogger("http");

export function systemRoutes(ctx: AppContext): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({ status: "online", service: SERVICE_NAME, version: SERVICE_VERSION, timestamp: new Date().toISOString() });
  });

  // Healthy only when both the database and the LLM answer.
  router.get("/api/health", asyncRoute(async (_req, res) => {
    let database: { status: "connected" | "disconnected"; error?: string } = { status: "connected" };
    try {
      await ctx.repo.ping();
    } catch (err) {
      log.error({ err: errorMessage(err) }, "database health check failed");
      database = { status: "disconnected", error: errorMessage(err) };
    }
    const ollama = await ctx.llm.status();
    const healthy = database.status === "connected" && ollama.status === "connected";

    res.json({
      status: healthy ? "healthy" : "degraded",
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      timestamp: new Date().toISOString(),
      database,
      ollama,
      metrics: ctx.metrics.snapshot(),
    });
  }));

  router.get("/api/metrics", (_req, res) => {
    res.json({ ...ctx.metrics.snapshot(), cache: ctx.cache.stats(), websocket: ctx.hub.stats() });
  });

  router.get("/api/analytics", asyncRoute(async (_req, res) => {
    res.json(computeAnalytics(await ctx.repo.listPlansWithTasks()));
  }));

  router.get("/api/generation/:sessionId", (req, res) => {
    const { sessionId } = req.params;
    const state = ctx.hub.generationState(sessionId);
    if (!state) throw new HttpError(404, "not_found", `No generation in progress for session ${sessionId}`);
    res.json({ session_id: sessionId, ...state });
  });

  return router;
}
