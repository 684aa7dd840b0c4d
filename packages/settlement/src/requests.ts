/**
 * @rxsettle/settlement — Request schemas.
 *
 * Every call into the engine is one variant of a closed tagged union,
 * discriminated on `method` and validated before anything else runs.
 */

import { z } from "zod";
import { isAddress, isClaimKey } from "@rxsettle/types";
import { SettlementError } from "./types.js";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Non-negative integer, as a bigint or a decimal digit string. */
export const AmountSchema = z.union([
  z.bigint().nonnegative(),
  z
    .string()
    .regex(/^\d+$/, "must be a decimal integer")
    .transform((value) => BigInt(value)),
]);

export const ClaimKeySchema = z.string().refine(isClaimKey, "must be 64 lowercase hex characters");

export const AddressSchema = z.string().refine(isAddress, "must be a valid address");

// =============================================================================
// Requests
// =============================================================================

export const SettleRequestSchema = z.object({
  method: z.literal("settle"),
  claimKey: ClaimKeySchema,
  rebateAmount: AmountSchema,
  payee: AddressSchema,
  feeRecipient: AddressSchema,
  authOpIndex: z.number().int().nonnegative(),
});

export const DepositRequestSchema = z.object({
  method: z.literal("deposit"),
  amount: AmountSchema,
});

export const GetBalanceRequestSchema = z.object({
  method: z.literal("get_balance"),
});

export const IsSettledRequestSchema = z.object({
  method: z.literal("is_settled"),
  claimKey: ClaimKeySchema,
});

export const SettlementRequestSchema = z.discriminatedUnion("method", [
  SettleRequestSchema,
  DepositRequestSchema,
  GetBalanceRequestSchema,
  IsSettledRequestSchema,
]);

export type SettleRequest = z.infer<typeof SettleRequestSchema>;
export type DepositRequest = z.infer<typeof DepositRequestSchema>;
export type SettlementRequest = z.infer<typeof SettlementRequestSchema>;
export type SettlementMethod = SettlementRequest["method"];

/** Arguments as a caller writes them (before the method is attached). */
export type SettleArgs = z.input<typeof SettleRequestSchema>;

const METHODS: readonly string[] = SettlementRequestSchema.options.map(
  (option) => option.shape.method.value,
);

/**
 * Validate a call into the engine.
 *
 * @throws SettlementError UNKNOWN_METHOD or INVALID_REQUEST
 */
export function parseSettlementRequest(method: string, args: unknown): SettlementRequest {
  if (!METHODS.includes(method)) {
    throw new SettlementError("UNKNOWN_METHOD", `Unknown method: "${method}"`);
  }
  let fields: object = {};
  if (args !== undefined) {
    if (typeof args !== "object" || args === null || Array.isArray(args)) {
      throw new SettlementError("INVALID_REQUEST", `Arguments of "${method}" must be an object`);
    }
    fields = args;
  }

  const result = SettlementRequestSchema.safeParse({ ...fields, method });
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new SettlementError("INVALID_REQUEST", `Invalid "${method}" request: ${issues}`);
  }
  return result.data;
}
