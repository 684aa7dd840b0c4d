/**
 * Structured request logging middleware.
 *
 * One pino line per request, carrying method, path, status, duration
 * and the request id.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
    };

    const level = entry.status >= 500 ? "error" : entry.status >= 400 ? "warn" : "info";
    logger[level](entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
  };
}
