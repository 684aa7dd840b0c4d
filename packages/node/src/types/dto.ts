/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation. Amounts travel
 * as decimal strings; range checks are left to the domain packages so
 * that their error codes reach the client.
 */

import { z } from "zod";
import { MAX_GROUP_SIZE } from "@rxsettle/ledger";
import { AddressSchema, ClaimKeySchema } from "@rxsettle/settlement";
import { isEventSource } from "@rxsettle/types";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Unsigned integer as a decimal string. */
export const UintStringSchema = z
  .string()
  .regex(/^\d+$/, "must be a decimal integer string")
  .transform((value) => BigInt(value));

export const HexBytesSchema = z
  .string()
  .regex(/^(?:[0-9a-fA-F]{2})*$/, "must be an even-length hex string")
  .transform((value) => new Uint8Array(Buffer.from(value, "hex")));

const AssetIdSchema = z.string().min(1).max(64);

// =============================================================================
// Claim DTOs
// =============================================================================

export const SubmitClaimSchema = z.object({
  claimId: z.string().max(128),
  ndcCode: z.string().max(32),
  pharmacyNpi: z.string().max(32),
  dispenseDate: UintStringSchema,
  /** Oracle attestation, hex-encoded */
  oracleSignature: HexBytesSchema,
});

export type SubmitClaimDto = z.infer<typeof SubmitClaimSchema>;

// =============================================================================
// Rebate DTOs
// =============================================================================

export const RegisterScheduleSchema = z.object({
  manufacturer: AddressSchema,
  baseBps: UintStringSchema,
  threshold: UintStringSchema,
  bonusBps: UintStringSchema,
  excludesBiosimilars: z.boolean().default(false),
  drugNdc: z.string().max(32).optional(),
});

export type RegisterScheduleDto = z.infer<typeof RegisterScheduleSchema>;

export const CalculateAccrualSchema = z.object({
  claimKey: ClaimKeySchema,
  manufacturer: AddressSchema,
  wacPrice: UintStringSchema,
  currentVolume: UintStringSchema,
});

export type CalculateAccrualDto = z.infer<typeof CalculateAccrualSchema>;

// =============================================================================
// Ledger DTOs
// =============================================================================

const AttachedSchema = z.object({
  assetId: AssetIdSchema,
  amount: UintStringSchema,
});

export const OperationSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("payment"),
    sender: AddressSchema,
    receiver: AddressSchema,
    amount: UintStringSchema,
    note: z.string().max(1024).optional(),
  }),
  z.object({
    kind: z.literal("asset-transfer"),
    sender: AddressSchema,
    receiver: AddressSchema,
    assetId: AssetIdSchema,
    amount: UintStringSchema,
  }),
  z.object({
    kind: z.literal("app-call"),
    sender: AddressSchema,
    applicationId: z.string().min(1),
    method: z.string().min(1),
    args: z.record(z.unknown()).default({}),
    attached: AttachedSchema.optional(),
  }),
]);

export const SubmitGroupSchema = z.object({
  operations: z.array(OperationSchema).min(1).max(MAX_GROUP_SIZE),
});

export type SubmitGroupDto = z.infer<typeof SubmitGroupSchema>;

export const DepositSchema = z.object({
  funder: AddressSchema,
  amount: UintStringSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const FundAccountSchema = z.object({
  amount: UintStringSchema,
  assetId: AssetIdSchema.optional(),
});

export type FundAccountDto = z.infer<typeof FundAccountSchema>;

// =============================================================================
// Audit DTOs
// =============================================================================

export const LogDisputeSchema = z.object({
  claimKey: ClaimKeySchema,
  disputingParty: AddressSchema,
  reason: z.string().min(1).max(1024),
  disputedAmount: UintStringSchema,
});

export type LogDisputeDto = z.infer<typeof LogDisputeSchema>;

function isJsonText(value: string): boolean {
  try {
    JSON.parse(value);
    return true;
  } catch {
    return false;
  }
}

export const LogAuditEntrySchema = z.object({
  claimKey: ClaimKeySchema,
  eventType: z.string().min(1).max(64),
  pharmacy: AddressSchema,
  pbm: AddressSchema,
  manufacturer: AddressSchema,
  rebateAmount: UintStringSchema,
  adminFee: UintStringSchema,
  metadata: z.string().max(4096).refine(isJsonText, "must be JSON text").default("{}"),
});

export type LogAuditEntryDto = z.infer<typeof LogAuditEntrySchema>;

export const ListAuditEventsQuerySchema = z.object({
  type: z.string().min(1).optional(),
  source: z.string().refine(isEventSource, "unknown event source").optional(),
  fromPosition: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export type ListAuditEventsQuery = z.infer<typeof ListAuditEventsQuerySchema>;
