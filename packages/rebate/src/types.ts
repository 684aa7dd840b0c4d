/**
 * @rxsettle/rebate — Types for tiered rebate schedules and accruals.
 *
 * All rates are basis points (10000 = 100%), all amounts uint64 micro-units.
 */

import type { Address, Amount, ClaimKey, RebateAccrual } from "@rxsettle/types";

// =============================================================================
// Schedules
// =============================================================================

export interface TierScheduleInput {
  readonly baseBps: bigint;
  /** Volume above which the bonus tier applies (strictly greater) */
  readonly threshold: bigint;
  readonly bonusBps: bigint;
  readonly excludesBiosimilars: boolean;
}

export interface TierSchedule extends TierScheduleInput {
  readonly manufacturer: Address;
}

export interface ScheduleRegistration {
  readonly schedule: TierSchedule;
  /** Biosimilar exclusion detected; regulatory review required */
  readonly formularyLock: boolean;
}

// =============================================================================
// Accruals
// =============================================================================

export interface AccrualRequest {
  readonly claimKey: ClaimKey;
  readonly manufacturer: Address;
  /** Wholesale acquisition cost, micro-units */
  readonly wacPrice: Amount;
  /** Cumulative dispensed units for the manufacturer */
  readonly currentVolume: bigint;
}

export interface AccrualResult {
  readonly accrual: RebateAccrual;
  readonly effectiveBps: bigint;
  readonly bonusApplied: boolean;
  /** True when the accrual already existed and was returned unchanged */
  readonly replayed: boolean;
}

// =============================================================================
// Errors
// =============================================================================

export type RebateErrorCode =
  | "INVALID_SCHEDULE"
  | "SCHEDULE_NOT_FOUND"
  | "INVALID_ACCRUAL"
  | "ACCRUAL_CONFLICT"
  | "ACCRUAL_NOT_FOUND"
  | "AMOUNT_OVERFLOW";

export class RebateError extends Error {
  public readonly code: RebateErrorCode;

  constructor(code: RebateErrorCode, message: string) {
    super(message);
    this.name = "RebateError";
    this.code = code;
  }
}
