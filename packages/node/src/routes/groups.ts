/**
 * Host-ledger group route.
 *
 * POST /api/v1/groups — Execute an atomic group of operations
 *
 * A settlement is a group whose authorization payment sits next to the
 * settlement engine's `settle` call. The whole group commits or none of
 * it does.
 */

import { Hono } from "hono";
import type { GroupReceipt } from "@rxsettle/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { SubmitGroupSchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import type { WireValue } from "../types/wire.js";
import { validateBody } from "../middleware/validate.js";

export function receiptToWire(receipt: GroupReceipt): WireValue {
  return toWire({
    ...receipt,
    deliveryFailures: receipt.deliveryFailures.map((failure) => ({
      log: failure.log,
      error: { name: failure.error.name, message: failure.error.message },
    })),
  });
}

export function createGroupRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(SubmitGroupSchema), (c) => {
    const { operations } = c.req.valid("json");
    const receipt = c.get("service").submitGroup(operations);
    return c.json({ data: receiptToWire(receipt) }, 201);
  });

  return routes;
}
