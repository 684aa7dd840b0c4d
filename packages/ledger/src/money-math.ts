/**
 * @rxsettle/ledger — Deterministic uint64 arithmetic.
 *
 * All amounts are bigint micro-units bounded to [0, 2^64 - 1], the width
 * of the ledger's accounting type. Results that leave the range throw;
 * nothing wraps.
 *
 * Rules:
 * - No floating-point operations
 * - Every public result is a valid uint64
 * - Zero runtime dependencies
 */

import { UINT64_MAX } from "@rxsettle/types";
import { LedgerError } from "./types.js";

// ─── Range Checks ────────────────────────────────────────────────────────

/**
 * Assert a value is a uint64 amount.
 * Throws LedgerError("INVALID_AMOUNT") otherwise.
 */
export function assertUint64(value: bigint, label = "amount"): bigint {
  if (value < 0n || value > UINT64_MAX) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be within [0, 2^64 - 1], got ${value.toString()}`,
    );
  }
  return value;
}

/**
 * a + b, throwing AMOUNT_OVERFLOW when the sum exceeds uint64.
 */
export function checkedAdd(a: bigint, b: bigint): bigint {
  const sum = assertUint64(a) + assertUint64(b);
  if (sum > UINT64_MAX) {
    throw new LedgerError(
      "AMOUNT_OVERFLOW",
      `${a.toString()} + ${b.toString()} exceeds the uint64 range`,
    );
  }
  return sum;
}

/**
 * a - b, throwing INSUFFICIENT_FUNDS when b > a.
 */
export function checkedSub(a: bigint, b: bigint): bigint {
  assertUint64(a);
  assertUint64(b);
  if (b > a) {
    throw new LedgerError(
      "INSUFFICIENT_FUNDS",
      `Cannot subtract ${b.toString()} from ${a.toString()}`,
    );
  }
  return a - b;
}

/**
 * floor(value * numerator / denominator).
 *
 * The product is exact (bigint); only the quotient has to fit in uint64.
 * Used for basis-point rates: mulDivFloor(15_000_000n, 300n, 10_000n) → 450_000n.
 */
export function mulDivFloor(value: bigint, numerator: bigint, denominator: bigint): bigint {
  assertUint64(value);
  assertUint64(numerator, "numerator");
  if (denominator <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Denominator must be positive");
  }
  const quotient = (value * numerator) / denominator;
  if (quotient > UINT64_MAX) {
    throw new LedgerError(
      "AMOUNT_OVERFLOW",
      `${value.toString()} * ${numerator.toString()} / ${denominator.toString()} exceeds the uint64 range`,
    );
  }
  return quotient;
}

// ─── Display Conversion ──────────────────────────────────────────────────

/**
 * Parse a decimal string into micro-units.
 *
 * "14.55" with decimals=6 → 14550000n
 * "100" with decimals=6 → 100000000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the asset allows ${String(decimals)}`,
    );
  }

  return assertUint64(BigInt(intPart + fracPart.padEnd(decimals, "0")));
}

/**
 * Render micro-units as a decimal string.
 *
 * 85000000n with decimals=6 → "85.000000"
 * 450000n with decimals=6 → "0.450000"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const str = scaled.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}
