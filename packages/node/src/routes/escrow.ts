/**
 * Escrow routes.
 *
 * POST /api/v1/escrow/deposits                — Deposit into escrow
 * GET  /api/v1/escrow                         — Escrow account
 * GET  /api/v1/escrow/settlements/:claimKey   — Settled flag
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { DepositSchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { validateBody } from "../middleware/validate.js";
import { receiptToWire } from "./groups.js";
import { claimKeyParam, invalidParam } from "./params.js";

export function createEscrowRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: toWire(c.get("service").escrowAccount()) });
  });

  routes.post("/deposits", validateBody(DepositSchema), (c) => {
    const { funder, amount } = c.req.valid("json");
    const service = c.get("service");
    const receipt = service.deposit(funder, amount);
    return c.json(
      { data: { account: toWire(service.escrowAccount()), group: receiptToWire(receipt) } },
      201,
    );
  });

  routes.get("/settlements/:claimKey", (c) => {
    const claimKey = claimKeyParam(c.req.param("claimKey"));
    if (claimKey === undefined) {
      return invalidParam(c, "claimKey", "must be 64 lowercase hex characters");
    }
    return c.json({ data: { claimKey, settled: c.get("service").isSettled(claimKey) } });
  });

  return routes;
}
