/**
 * Health check route.
 *
 * GET /health — Liveness check with the ledger round and audit size
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    const service = c.get("service");
    const integrity = service.verifyIntegrity();

    return c.json({
      status: integrity.valid ? "ok" : "degraded",
      ...service.health(),
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
