/**
 * Tests for the uint64 money math.
 *
 * Covers:
 * - Range checks at both ends of uint64
 * - Checked add/subtract
 * - Basis-point division (floor)
 * - Decimal display conversion
 */

import { describe, it, expect } from "vitest";
import { UINT64_MAX } from "@rxsettle/types";
import {
  assertUint64,
  checkedAdd,
  checkedSub,
  mulDivFloor,
  parseAmount,
  formatAmount,
} from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

// ─── assertUint64 ────────────────────────────────────────────────────────

describe("assertUint64", () => {
  it("returns values within range", () => {
    expect(assertUint64(0n)).toBe(0n);
    expect(assertUint64(UINT64_MAX)).toBe(UINT64_MAX);
  });

  it("rejects negative values", () => {
    expect(() => assertUint64(-1n)).toThrow(LedgerError);
  });

  it("rejects values above 2^64 - 1", () => {
    try {
      assertUint64(UINT64_MAX + 1n, "rebate");
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      expect((err as LedgerError).code).toBe("INVALID_AMOUNT");
      expect((err as LedgerError).message).toContain("rebate");
    }
  });
});

// ─── checkedAdd / checkedSub ─────────────────────────────────────────────

describe("checkedAdd", () => {
  it("adds within range", () => {
    expect(checkedAdd(100_000_000n, 15_000_000n)).toBe(115_000_000n);
  });

  it("throws AMOUNT_OVERFLOW past the maximum", () => {
    try {
      checkedAdd(UINT64_MAX, 1n);
      expect.unreachable("should have thrown");
    } catch (err) {
      expect((err as LedgerError).code).toBe("AMOUNT_OVERFLOW");
    }
  });
});

describe("checkedSub", () => {
  it("subtracts down to zero", () => {
    expect(checkedSub(15_000_000n, 15_000_000n)).toBe(0n);
  });

  it("throws INSUFFICIENT_FUNDS when the result would be negative", () => {
    try {
      checkedSub(85_000_000n, 90_000_000n);
      expect.unreachable("should have thrown");
    } catch (err) {
      expect((err as LedgerError).code).toBe("INSUFFICIENT_FUNDS");
    }
  });
});

// ─── mulDivFloor ─────────────────────────────────────────────────────────

describe("mulDivFloor", () => {
  it("computes a 3% fee", () => {
    expect(mulDivFloor(15_000_000n, 300n, 10_000n)).toBe(450_000n);
  });

  it("rounds toward zero", () => {
    expect(mulDivFloor(33n, 300n, 10_000n)).toBe(0n);
    expect(mulDivFloor(34n, 300n, 10_000n)).toBe(1n);
  });

  it("keeps the intermediate product exact at the top of the range", () => {
    expect(mulDivFloor(UINT64_MAX, 300n, 10_000n)).toBe((UINT64_MAX * 300n) / 10_000n);
  });

  it("rejects a quotient that leaves uint64", () => {
    expect(() => mulDivFloor(UINT64_MAX, 2n, 1n)).toThrow(LedgerError);
  });

  it("rejects a non-positive denominator", () => {
    expect(() => mulDivFloor(1n, 1n, 0n)).toThrow("Denominator must be positive");
  });
});

// ─── parseAmount / formatAmount ──────────────────────────────────────────

describe("parseAmount", () => {
  it("parses whole units", () => {
    expect(parseAmount("100", 6)).toBe(100_000_000n);
  });

  it("pads a short fraction", () => {
    expect(parseAmount("14.55", 6)).toBe(14_550_000n);
  });

  it("rejects more decimals than the asset allows", () => {
    expect(() => parseAmount("1.0000001", 6)).toThrow(LedgerError);
  });

  it("rejects signs and garbage", () => {
    expect(() => parseAmount("-1", 6)).toThrow("Invalid amount format");
    expect(() => parseAmount("abc", 6)).toThrow("Invalid amount format");
  });
});

describe("formatAmount", () => {
  it("formats micro-units", () => {
    expect(formatAmount(85_000_000n, 6)).toBe("85.000000");
  });

  it("pads values below one unit", () => {
    expect(formatAmount(450_000n, 6)).toBe("0.450000");
  });

  it("formats zero-decimal assets", () => {
    expect(formatAmount(1000n, 0)).toBe("1000");
  });
});
