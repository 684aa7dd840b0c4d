/**
 * Claim registry routes.
 *
 * POST /api/v1/claims            — Submit an oracle-attested claim
 * GET  /api/v1/claims/:claimKey  — Claim metadata
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SubmitClaimSchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { validateBody } from "../middleware/validate.js";
import { claimKeyParam, invalidParam } from "./params.js";

export function createClaimRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(SubmitClaimSchema), (c) => {
    const record = c.get("service").submitClaim(c.req.valid("json"));
    return c.json({ data: toWire(record) }, 201);
  });

  routes.get("/:claimKey", (c) => {
    const claimKey = claimKeyParam(c.req.param("claimKey"));
    if (claimKey === undefined) {
      return invalidParam(c, "claimKey", "must be 64 lowercase hex characters");
    }
    return c.json({ data: toWire(c.get("service").getClaim(claimKey)) });
  });

  return routes;
}
