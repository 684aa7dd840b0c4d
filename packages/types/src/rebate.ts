/**
 * Rebate Types
 *
 * Records passed between the rebate calculator, the settlement engine
 * and the audit emitter.
 */

import type { Address, Amount, ClaimKey } from "./primitives.js";

/**
 * Liability accrued for one claim.
 * Created once per claim key and never mutated.
 */
export interface RebateAccrual {
  readonly claimKey: ClaimKey;

  /** Manufacturer the liability is owed by */
  readonly manufacturer: Address;

  /** Rebate owed, in micro-units */
  readonly amount: Amount;
}

/**
 * Facts about one successful settlement.
 * Emitted exactly once per settled claim and forwarded to the audit emitter;
 * the settlement engine keeps no copy.
 */
export interface SettlementRecord {
  readonly claimKey: ClaimKey;
  readonly payeeAmount: Amount;
  readonly feeAmount: Amount;
  readonly payee: Address;
  readonly feeRecipient: Address;

  /** ISO 8601 timestamp of the group that settled the claim */
  readonly timestamp: string;
}
