import express from "express";
import cors from "cors";
import type { AppContext } from "./context.js";
import { errorHandler, monitoring, mountedAt, notFound } from "./middleware.js";
import { planRoutes } from "./routes/plans.js";
import { systemRoutes } from "./routes/system.js";
import { taskRoutes } from "./routes/tasks.js";

export function createApp(ctx: AppContext): express.Express {
  const app = express();
  app.use(cors({ origin: ctx.corsOrigin === "*" ? "*" : ctx.corsOrigin.split(",").map(o => o.trim()) }));
  app.use(express.json({ limit: "1mb" }));
  app.use(...monitoring(ctx.metrics));

  app.use(systemRoutes(ctx));
  app.use("/api/plans/:planId/tasks", mountedAt("/api/plans/:planId/tasks"), taskRoutes(ctx));
  app.use("/api/plans", mountedAt("/api/plans"), planRoutes(ctx));

  app.use(notFound);
  app.use(errorHandler);
  return app;
}
