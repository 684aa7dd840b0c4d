/**
 * @rxsettle/rebate — Rebate engine.
 *
 * Holds one tiered schedule per manufacturer and computes the rebate
 * owed on each claim:
 *
 *   rate   = currentVolume > threshold ? baseBps + bonusBps : baseBps
 *   amount = floor(wacPrice * rate / 10000)
 *
 * Accruals are idempotent per claim key. Manufacturer totals only grow
 * when a new accrual is recorded.
 */

import type { Address, Amount, ClaimKey, RebateAccrual } from "@rxsettle/types";
import { BPS_DENOMINATOR, isUint64 } from "@rxsettle/types";
import { LedgerError, checkedAdd, mulDivFloor } from "@rxsettle/ledger";
import type {
  AccrualRequest,
  AccrualResult,
  ScheduleRegistration,
  TierSchedule,
  TierScheduleInput,
} from "./types.js";
import { RebateError } from "./types.js";

export class RebateEngine {
  private readonly _schedules: Map<Address, TierSchedule> = new Map();
  private readonly _accruals: Map<ClaimKey, RebateAccrual> = new Map();
  private readonly _totals: Map<Address, Amount> = new Map();

  // ─── Schedules ───────────────────────────────────────────────────────

  /**
   * Register or replace a manufacturer's schedule.
   * The manufacturer's running total survives replacement.
   */
  registerSchedule(manufacturer: Address, input: TierScheduleInput): ScheduleRegistration {
    if (!isUint64(input.baseBps) || !isUint64(input.bonusBps) || !isUint64(input.threshold)) {
      throw new RebateError("INVALID_SCHEDULE", "Schedule values must be unsigned integers");
    }
    if (input.baseBps + input.bonusBps > BPS_DENOMINATOR) {
      throw new RebateError(
        "INVALID_SCHEDULE",
        `baseBps + bonusBps must not exceed ${BPS_DENOMINATOR.toString()}`,
      );
    }

    const schedule: TierSchedule = {
      manufacturer,
      baseBps: input.baseBps,
      threshold: input.threshold,
      bonusBps: input.bonusBps,
      excludesBiosimilars: input.excludesBiosimilars,
    };
    this._schedules.set(manufacturer, schedule);
    if (!this._totals.has(manufacturer)) {
      this._totals.set(manufacturer, 0n);
    }

    return { schedule, formularyLock: input.excludesBiosimilars };
  }

  getSchedule(manufacturer: Address): TierSchedule | undefined {
    return this._schedules.get(manufacturer);
  }

  // ─── Accruals ────────────────────────────────────────────────────────

  /**
   * Compute and record the accrual for a claim.
   *
   * Repeating a request with the same outcome returns the stored accrual;
   * a different outcome for a recorded claim is ACCRUAL_CONFLICT.
   */
  calculateAccrual(request: AccrualRequest): AccrualResult {
    const schedule = this._schedules.get(request.manufacturer);
    if (schedule === undefined) {
      throw new RebateError(
        "SCHEDULE_NOT_FOUND",
        `Manufacturer not registered: "${request.manufacturer}"`,
      );
    }
    if (!isUint64(request.wacPrice) || !isUint64(request.currentVolume)) {
      throw new RebateError("INVALID_ACCRUAL", "wacPrice and currentVolume must be uint64");
    }

    const bonusApplied = request.currentVolume > schedule.threshold;
    const effectiveBps = bonusApplied
      ? schedule.baseBps + schedule.bonusBps
      : schedule.baseBps;
    const amount = mulDivFloor(request.wacPrice, effectiveBps, BPS_DENOMINATOR);

    const existing = this._accruals.get(request.claimKey);
    if (existing !== undefined) {
      if (existing.amount !== amount || existing.manufacturer !== request.manufacturer) {
        throw new RebateError(
          "ACCRUAL_CONFLICT",
          `Claim ${request.claimKey} already accrued ${existing.amount.toString()} to "${existing.manufacturer}"`,
        );
      }
      return { accrual: existing, effectiveBps, bonusApplied, replayed: true };
    }

    const total = this._addToTotal(request.manufacturer, amount);
    const accrual: RebateAccrual = {
      claimKey: request.claimKey,
      manufacturer: request.manufacturer,
      amount,
    };
    this._accruals.set(request.claimKey, accrual);
    this._totals.set(request.manufacturer, total);

    return { accrual, effectiveBps, bonusApplied, replayed: false };
  }

  /**
   * @throws RebateError ACCRUAL_NOT_FOUND
   */
  getAccrual(claimKey: ClaimKey): RebateAccrual {
    const accrual = this._accruals.get(claimKey);
    if (accrual === undefined) {
      throw new RebateError("ACCRUAL_NOT_FOUND", `Claim not calculated: ${claimKey}`);
    }
    return accrual;
  }

  /** Total accrued for a manufacturer; 0 when unknown. */
  getManufacturerTotal(manufacturer: Address): Amount {
    return this._totals.get(manufacturer) ?? 0n;
  }

  private _addToTotal(manufacturer: Address, amount: Amount): Amount {
    try {
      return checkedAdd(this._totals.get(manufacturer) ?? 0n, amount);
    } catch (err) {
      if (err instanceof LedgerError && err.code === "AMOUNT_OVERFLOW") {
        throw new RebateError(
          "AMOUNT_OVERFLOW",
          `Accrued total for "${manufacturer}" would exceed the uint64 range`,
        );
      }
      throw err;
    }
  }
}
