/**
 * Path parameter checks shared by the route modules.
 */

import type { Context } from "hono";
import { isAddress, isClaimKey } from "@rxsettle/types";
import type { Address, ClaimKey } from "@rxsettle/types";
import { createErrorEnvelope } from "../types/error.js";

export function invalidParam(c: Context, name: string, rule: string): Response {
  return c.json(createErrorEnvelope("VALIDATION_ERROR", `${name} ${rule}`), 400);
}

export function claimKeyParam(value: string): ClaimKey | undefined {
  return isClaimKey(value) ? value : undefined;
}

export function addressParam(value: string): Address | undefined {
  return isAddress(value) ? value : undefined;
}
