/**
 * Rebate calculator routes.
 *
 * POST /api/v1/rebates/schedules               — Register a tier schedule
 * POST /api/v1/rebates/accruals                — Calculate a claim's accrual
 * GET  /api/v1/rebates/accruals/:claimKey      — Stored accrual
 * GET  /api/v1/rebates/manufacturers/:id       — Running total and schedule
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CalculateAccrualSchema, RegisterScheduleSchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { validateBody } from "../middleware/validate.js";
import { addressParam, claimKeyParam, invalidParam } from "./params.js";

export function createRebateRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/schedules", validateBody(RegisterScheduleSchema), (c) => {
    const registration = c.get("service").registerSchedule(c.req.valid("json"));
    return c.json({ data: toWire(registration) }, 201);
  });

  // A replayed calculation answers 200 with the stored accrual
  routes.post("/accruals", validateBody(CalculateAccrualSchema), (c) => {
    const result = c.get("service").calculateAccrual(c.req.valid("json"));
    return c.json({ data: toWire(result) }, result.replayed ? 200 : 201);
  });

  routes.get("/accruals/:claimKey", (c) => {
    const claimKey = claimKeyParam(c.req.param("claimKey"));
    if (claimKey === undefined) {
      return invalidParam(c, "claimKey", "must be 64 lowercase hex characters");
    }
    return c.json({ data: toWire(c.get("service").rebates.getAccrual(claimKey)) });
  });

  routes.get("/manufacturers/:id", (c) => {
    const manufacturer = addressParam(c.req.param("id"));
    if (manufacturer === undefined) {
      return invalidParam(c, "id", "must be a valid address");
    }
    const { rebates } = c.get("service");
    return c.json({
      data: toWire({
        manufacturer,
        totalAccrued: rebates.getManufacturerTotal(manufacturer),
        schedule: rebates.getSchedule(manufacturer) ?? null,
      }),
    });
  });

  return routes;
}
