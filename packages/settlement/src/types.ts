/**
 * @rxsettle/settlement — Types for the settlement engine and escrow.
 */

import type { Address, Amount, AssetId, ClaimKey } from "@rxsettle/types";

// =============================================================================
// Constants
// =============================================================================

/** Ceiling on the admin fee, in basis points. Not configurable by callers. */
export const FEE_CAP_BPS = 300n;

/** Default minimum authorization stake, in native units. */
export const DEFAULT_MINIMUM_STAKE = 1_000n;

/** Store key prefix under which settled claim keys are recorded. */
export const SETTLED_KEY_PREFIX = "settled:";

/** Names of the logs the engine emits. */
export const REBATE_SETTLED = "RebateSettled";
export const ESCROW_FUNDED = "EscrowFunded";

// =============================================================================
// Configuration
// =============================================================================

/**
 * What an authorization operation must look like.
 *
 * Whether the stake is returned, kept or burned is decided by whoever
 * receives it; the engine only checks that it landed.
 */
export interface AuthorizationPolicy {
  readonly minimumStake: Amount;
  /** When set, the stake must be sent by this address */
  readonly oracle?: Address | undefined;
  /** When set, the stake must be paid to this address */
  readonly stakeRecipient?: Address | undefined;
}

export interface SettlementEngineConfig {
  readonly applicationId: string;
  /** Escrow address; balances here are the escrow's funds */
  readonly address: Address;
  readonly assetId: AssetId;
  /** Deployment-time fee rate. Default and ceiling: FEE_CAP_BPS */
  readonly adminFeeBps?: bigint | undefined;
  readonly authorization?: Partial<AuthorizationPolicy> | undefined;
}

// =============================================================================
// Results
// =============================================================================

export interface EscrowAccount {
  readonly assetId: AssetId;
  readonly availableBalance: Amount;
}

/** Positional facts about the authorization operation that was accepted. */
export interface AuthorizationProof {
  readonly index: number;
  readonly sender: Address;
  readonly amount: Amount;
}

export interface FeeSplit {
  readonly payeeAmount: Amount;
  readonly feeAmount: Amount;
}

export interface SettlementReceipt extends FeeSplit {
  readonly claimKey: ClaimKey;
  readonly rebateAmount: Amount;
  readonly payee: Address;
  readonly feeRecipient: Address;
  readonly authorization: AuthorizationProof;
  /** ISO 8601, the group's timestamp */
  readonly timestamp: string;
}

// =============================================================================
// Errors
// =============================================================================

export type SettlementErrorCode =
  | "INVALID_CONFIGURATION"
  | "INVALID_REQUEST"
  | "UNKNOWN_METHOD"
  | "GROUP_STRUCTURE"
  | "UNAUTHORIZED"
  | "ARITHMETIC_OVERFLOW"
  | "DUPLICATE_SETTLEMENT"
  | "INSUFFICIENT_ESCROW"
  | "INVALID_DEPOSIT"
  | "FEE_CAP_EXCEEDED";

/**
 * Thrown by the engine. Inside a group, the host ledger wraps it in a
 * GroupRejectedError and discards everything the group did.
 */
export class SettlementError extends Error {
  public readonly code: SettlementErrorCode;

  constructor(code: SettlementErrorCode, message: string) {
    super(message);
    this.name = "SettlementError";
    this.code = code;
  }
}
