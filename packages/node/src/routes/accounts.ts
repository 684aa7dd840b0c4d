/**
 * Account routes.
 *
 * GET  /api/v1/accounts/:address       — Balances per asset
 * POST /api/v1/accounts/:address/fund  — Faucet (mounted only when enabled)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { FundAccountSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { toWire } from "../types/wire.js";
import { validateBody } from "../middleware/validate.js";
import { addressParam, invalidParam } from "./params.js";

export interface AccountRouteOptions {
  readonly enableFaucet: boolean;
}

export function createAccountRoutes(options: AccountRouteOptions): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:address", (c) => {
    const address = addressParam(c.req.param("address"));
    if (address === undefined) {
      return invalidParam(c, "address", "must be a valid address");
    }
    const service = c.get("service");
    if (!service.ledger.hasAccount(address)) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Unknown account: "${address}"`), 404);
    }
    return c.json({
      data: toWire({ address, balances: service.accountBalances(address) }),
    });
  });

  if (options.enableFaucet) {
    routes.post("/:address/fund", validateBody(FundAccountSchema), (c) => {
      const address = addressParam(c.req.param("address"));
      if (address === undefined) {
        return invalidParam(c, "address", "must be a valid address");
      }
      const { amount, assetId } = c.req.valid("json");
      const service = c.get("service");
      service.fund(address, amount, assetId);
      return c.json(
        { data: toWire({ address, balances: service.accountBalances(address) }) },
        201,
      );
    });
  }

  return routes;
}
