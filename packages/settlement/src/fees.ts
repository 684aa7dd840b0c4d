/**
 * @rxsettle/settlement — Fee split.
 *
 *   fee   = floor(rebate * feeBps / 10000)
 *   payee = rebate - fee
 *
 * The fee is re-derived on every settlement; a caller never supplies it.
 */

import { BPS_DENOMINATOR } from "@rxsettle/types";
import { mulDivFloor } from "@rxsettle/ledger";
import type { FeeSplit } from "./types.js";
import { FEE_CAP_BPS, SettlementError } from "./types.js";

export function splitRebate(rebateAmount: bigint, feeBps: bigint): FeeSplit {
  const feeAmount = mulDivFloor(rebateAmount, feeBps, BPS_DENOMINATOR);
  const maxFee = mulDivFloor(rebateAmount, FEE_CAP_BPS, BPS_DENOMINATOR);

  if (feeAmount > maxFee) {
    throw new SettlementError(
      "FEE_CAP_EXCEEDED",
      `Fee ${feeAmount.toString()} exceeds the ${FEE_CAP_BPS.toString()} bps cap on ${rebateAmount.toString()}`,
    );
  }

  return { feeAmount, payeeAmount: rebateAmount - feeAmount };
}
