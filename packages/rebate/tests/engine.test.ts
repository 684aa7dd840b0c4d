import { describe, it, expect, beforeEach } from "vitest";
import { UINT64_MAX } from "@rxsettle/types";
import { RebateEngine } from "../src/engine.js";
import { RebateError } from "../src/types.js";
import type { TierScheduleInput } from "../src/types.js";

const MANUFACTURER = "manufacturer-a";
const CLAIM_1 = "01".repeat(32);
const CLAIM_2 = "02".repeat(32);

const SCHEDULE: TierScheduleInput = {
  baseBps: 1_500n,
  threshold: 100n,
  bonusBps: 500n,
  excludesBiosimilars: false,
};

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof RebateError ? err.code : undefined;
  }
  return undefined;
}

describe("RebateEngine", () => {
  let engine: RebateEngine;

  beforeEach(() => {
    engine = new RebateEngine();
  });

  // ─── Schedules ───────────────────────────────────────────────────────

  describe("registerSchedule", () => {
    it("stores the schedule and opens a zero total", () => {
      const { schedule, formularyLock } = engine.registerSchedule(MANUFACTURER, SCHEDULE);

      expect(schedule.manufacturer).toBe(MANUFACTURER);
      expect(formularyLock).toBe(false);
      expect(engine.getSchedule(MANUFACTURER)?.baseBps).toBe(1_500n);
      expect(engine.getManufacturerTotal(MANUFACTURER)).toBe(0n);
    });

    it("flags biosimilar exclusion as a formulary lock", () => {
      const result = engine.registerSchedule(MANUFACTURER, {
        ...SCHEDULE,
        excludesBiosimilars: true,
      });
      expect(result.formularyLock).toBe(true);
    });

    it("rejects combined rates above 100%", () => {
      expect(
        codeOf(() =>
          engine.registerSchedule(MANUFACTURER, { ...SCHEDULE, baseBps: 9_600n, bonusBps: 500n }),
        ),
      ).toBe("INVALID_SCHEDULE");
    });

    it("accepts combined rates of exactly 100%", () => {
      engine.registerSchedule(MANUFACTURER, { ...SCHEDULE, baseBps: 9_500n, bonusBps: 500n });
      expect(engine.getSchedule(MANUFACTURER)?.bonusBps).toBe(500n);
    });

    it("rejects negative values", () => {
      expect(
        codeOf(() => engine.registerSchedule(MANUFACTURER, { ...SCHEDULE, threshold: -1n })),
      ).toBe("INVALID_SCHEDULE");
    });

    it("keeps the running total when a schedule is replaced", () => {
      engine.registerSchedule(MANUFACTURER, SCHEDULE);
      engine.calculateAccrual({
        claimKey: CLAIM_1,
        manufacturer: MANUFACTURER,
        wacPrice: 10_000_000n,
        currentVolume: 1n,
      });
      engine.registerSchedule(MANUFACTURER, { ...SCHEDULE, baseBps: 1_000n });

      expect(engine.getManufacturerTotal(MANUFACTURER)).toBe(1_500_000n);
      expect(engine.getSchedule(MANUFACTURER)?.baseBps).toBe(1_000n);
    });
  });

  // ─── Accruals ────────────────────────────────────────────────────────

  describe("calculateAccrual", () => {
    beforeEach(() => {
      engine.registerSchedule(MANUFACTURER, SCHEDULE);
    });

    it("applies the base rate at or below the threshold", () => {
      const result = engine.calculateAccrual({
        claimKey: CLAIM_1,
        manufacturer: MANUFACTURER,
        wacPrice: 10_000_000n,
        currentVolume: 100n,
      });

      expect(result.accrual.amount).toBe(1_500_000n);
      expect(result.effectiveBps).toBe(1_500n);
      expect(result.bonusApplied).toBe(false);
      expect(result.replayed).toBe(false);
    });

    it("adds the bonus rate above the threshold", () => {
      const result = engine.calculateAccrual({
        claimKey: CLAIM_1,
        manufacturer: MANUFACTURER,
        wacPrice: 10_000_000n,
        currentVolume: 101n,
      });

      expect(result.accrual.amount).toBe(2_000_000n);
      expect(result.effectiveBps).toBe(2_000n);
      expect(result.bonusApplied).toBe(true);
    });

    it("rounds down", () => {
      const result = engine.calculateAccrual({
        claimKey: CLAIM_1,
        manufacturer: MANUFACTURER,
        wacPrice: 7n,
        currentVolume: 0n,
      });
      // 7 * 1500 / 10000 = 1.05
      expect(result.accrual.amount).toBe(1n);
    });

    it("accumulates the manufacturer total", () => {
      engine.calculateAccrual({
        claimKey: CLAIM_1,
        manufacturer: MANUFACTURER,
        wacPrice: 10_000_000n,
        currentVolume: 0n,
      });
      engine.calculateAccrual({
        claimKey: CLAIM_2,
        manufacturer: MANUFACTURER,
        wacPrice: 10_000_000n,
        currentVolume: 200n,
      });

      expect(engine.getManufacturerTotal(MANUFACTURER)).toBe(3_500_000n);
      expect(engine.getAccrual(CLAIM_2).amount).toBe(2_000_000n);
    });

    it("returns the stored accrual on an identical repeat", () => {
      const request = {
        claimKey: CLAIM_1,
        manufacturer: MANUFACTURER,
        wacPrice: 10_000_000n,
        currentVolume: 0n,
      };
      engine.calculateAccrual(request);
      const again = engine.calculateAccrual(request);

      expect(again.replayed).toBe(true);
      expect(again.accrual.amount).toBe(1_500_000n);
      expect(engine.getManufacturerTotal(MANUFACTURER)).toBe(1_500_000n);
    });

    it("rejects a repeat that computes a different amount", () => {
      engine.calculateAccrual({
        claimKey: CLAIM_1,
        manufacturer: MANUFACTURER,
        wacPrice: 10_000_000n,
        currentVolume: 0n,
      });

      expect(
        codeOf(() =>
          engine.calculateAccrual({
            claimKey: CLAIM_1,
            manufacturer: MANUFACTURER,
            wacPrice: 10_000_000n,
            currentVolume: 500n,
          }),
        ),
      ).toBe("ACCRUAL_CONFLICT");
      expect(engine.getManufacturerTotal(MANUFACTURER)).toBe(1_500_000n);
    });

    it("rejects an unknown manufacturer", () => {
      expect(
        codeOf(() =>
          engine.calculateAccrual({
            claimKey: CLAIM_1,
            manufacturer: "unknown",
            wacPrice: 1n,
            currentVolume: 0n,
          }),
        ),
      ).toBe("SCHEDULE_NOT_FOUND");
    });

    it("rejects a total that would overflow uint64", () => {
      engine.registerSchedule(MANUFACTURER, { ...SCHEDULE, baseBps: 10_000n, bonusBps: 0n });
      engine.calculateAccrual({
        claimKey: CLAIM_1,
        manufacturer: MANUFACTURER,
        wacPrice: UINT64_MAX,
        currentVolume: 0n,
      });

      expect(
        codeOf(() =>
          engine.calculateAccrual({
            claimKey: CLAIM_2,
            manufacturer: MANUFACTURER,
            wacPrice: 1n,
            currentVolume: 0n,
          }),
        ),
      ).toBe("AMOUNT_OVERFLOW");
      expect(() => engine.getAccrual(CLAIM_2)).toThrow(RebateError);
    });
  });

  describe("getAccrual", () => {
    it("throws ACCRUAL_NOT_FOUND for an unknown claim", () => {
      expect(codeOf(() => engine.getAccrual(CLAIM_1))).toBe("ACCRUAL_NOT_FOUND");
    });

    it("reports zero for an unknown manufacturer", () => {
      expect(engine.getManufacturerTotal("nobody")).toBe(0n);
    });
  });
});
