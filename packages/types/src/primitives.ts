/**
 * Settlement Primitives
 *
 * Identifiers and amounts shared by every package.
 *
 * Rules:
 * - Amounts are unsigned 64-bit integers in the asset's smallest unit (bigint)
 * - Claim keys are SHA-256 digests rendered as 64 lowercase hex characters
 * - Addresses and asset ids are opaque strings
 */

/** An account address on the host ledger. */
export type Address = string;

/** Identifier of a transferable asset (e.g. "USDC"). */
export type AssetId = string;

/**
 * Content hash identifying a claim.
 * Immutable once created; the join key across registry, calculator and engine.
 */
export type ClaimKey = string;

/** An amount in micro-units. Always within [0, 2^64 - 1]. */
export type Amount = bigint;

/** Largest value a uint64 amount can hold. */
export const UINT64_MAX: Amount = 2n ** 64n - 1n;

/** Basis points in one whole (10000 bps = 100%). */
export const BPS_DENOMINATOR = 10_000n;
