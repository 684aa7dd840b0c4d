/**
 * Audit routes.
 *
 * GET  /api/v1/audit/events             — Audit records (filter + page)
 * GET  /api/v1/audit/claims/:claimKey   — Audit history of one claim
 * POST /api/v1/audit/entries            — Log a compliance entry
 * POST /api/v1/audit/disputes           — Log a dispute
 * GET  /api/v1/audit/integrity          — Hash chain verification
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListAuditEventsQuerySchema, LogAuditEntrySchema, LogDisputeSchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { claimKeyParam, invalidParam } from "./params.js";

export function createAuditRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/events", validateQuery(ListAuditEventsQuerySchema), (c) => {
    const events = c.get("service").auditEvents(c.req.valid("query"));
    return c.json({ data: toWire(events), count: events.length });
  });

  routes.get("/claims/:claimKey", (c) => {
    const claimKey = claimKeyParam(c.req.param("claimKey"));
    if (claimKey === undefined) {
      return invalidParam(c, "claimKey", "must be 64 lowercase hex characters");
    }
    return c.json({ data: toWire(c.get("service").auditHistory(claimKey)) });
  });

  routes.post("/entries", validateBody(LogAuditEntrySchema), (c) => {
    const stored = c.get("service").logAuditEntry(c.req.valid("json"));
    return c.json({ data: toWire(stored) }, 201);
  });

  routes.post("/disputes", validateBody(LogDisputeSchema), (c) => {
    const stored = c.get("service").logDispute(c.req.valid("json"));
    return c.json({ data: toWire(stored) }, 201);
  });

  routes.get("/integrity", (c) => {
    return c.json({ data: toWire(c.get("service").verifyIntegrity()) });
  });

  return routes;
}
