import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import responseTime from "response-time";
import { ZodError } from "zod";
import { HttpError } from "./lib/errors.js";
import { getLogger } from "./lib/logger.js";
import type { MetricsCollector } from "./lib/metrics.js";

const log = getLogger("http");

/** Request log lines, per-endpoint metrics and an `X-Process-Time` header (ms). */
export function monitoring(metrics: MetricsCollector): RequestHandler[] {
  const track: RequestHandler = (req, res, next) => {
    const started = performance.now();
    const path = req.originalUrl.split("?")[0];
    log.info({ method: req.method, path }, "request");
    res.on("finish", () => {
      const ms = performance.now() - started;
      metrics.recordRequest(routeKey(req, res), ms, res.statusCode);
      const level = res.statusCode >= 500 ? "error" : "info";
      log[level]({ method: req.method, path, status: res.statusCode, ms: Math.round(ms) }, "response");
    });
    next();
  };
  return [responseTime({ header: "X-Process-Time", suffix: false, digits: 2 }), track];
}

/** Remembers the pattern a router is mounted at so metrics can name its routes. */
export function mountedAt(pattern: string): RequestHandler {
  return (_req, res, next) => {
    res.locals.routeBase = pattern;
    next();
  };
}

/** `METHOD /route/:pattern` of the matched route, or "unmatched". */
export function routeKey(req: Request, res: Response): string {
  const route: unknown = req.route;
  if (typeof route !== "object" || route === null || !("path" in route) || typeof route.path !== "string") {
    return "unmatched";
  }
  const base: unknown = res.locals.routeBase;
  const full = `${typeof base === "string" ? base : ""}${route.path}`;
  return `${req.method} ${full.length > 1 && full.endsWith("/") ? full.slice(0, -1) : full}`;
}

/** Wrap an async handler so a rejection reaches the error middleware. */
export function asyncRoute(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export const notFound: RequestHandler = (req, res) => {
  res.status(404).json({ error: "not_found", detail: `No route for ${req.method} ${req.path}`, timestamp: new Date().toISOString() });
};

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const timestamp = new Date().toISOString();

  if (err instanceof HttpError) {
    if (err.status >= 500) log.error({ err, path: req.path }, err.message);
    else log.warn({ path: req.path, status: err.status }, err.message);
    res.status(err.status).json({ error: err.code, detail: err.message, ...err.extra, timestamp });
    return;
  }
  if (err instanceof ZodError) {
    res.status(422).json({ error: "validation_error", detail: "Request validation failed", details: err.format(), timestamp });
    return;
  }
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: "bad_request", detail: "Malformed JSON body", timestamp });
    return;
  }

  log.error({ err, path: req.path }, "unhandled error");
  res.status(500).json({ error: "internal_error", detail: "An unexpected error occurred", timestamp });
};
