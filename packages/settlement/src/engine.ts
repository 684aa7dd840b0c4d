/**
 * @rxsettle/settlement — SettlementEngine.
 *
 * A host-ledger application that pays rebates out of escrow. One call to
 * `settle` pays the payee and the fee recipient from escrow, marks the
 * claim settled and emits a RebateSettled log, all inside the caller's
 * atomic group. Any failed check throws, which rejects the whole group,
 * including the authorization payment next to the call.
 *
 * The engine keeps no state of its own. Settled claim keys live in the
 * per-application store handed in through the GroupContext; escrow funds
 * are the application address's balance of the settlement asset.
 *
 * Checks run in this order:
 * 1. group has at least two operations            GROUP_STRUCTURE
 * 2. authorization at authOpIndex                   UNAUTHORIZED
 * 3. rebate fits in uint64                          ARITHMETIC_OVERFLOW
 * 4. claim not yet settled                          DUPLICATE_SETTLEMENT
 * 5. escrow covers the rebate                       INSUFFICIENT_ESCROW
 */

import type { Address, Amount, AssetId, ClaimKey } from "@rxsettle/types";
import { UINT64_MAX, isAddress, isUint64 } from "@rxsettle/types";
import type { Application, GroupContext } from "@rxsettle/ledger";
import { verifyAuthorization } from "./authorization.js";
import { EscrowLedger } from "./escrow.js";
import { splitRebate } from "./fees.js";
import type { SettleRequest } from "./requests.js";
import { parseSettlementRequest } from "./requests.js";
import type {
  AuthorizationPolicy,
  SettlementEngineConfig,
  SettlementReceipt,
} from "./types.js";
import {
  DEFAULT_MINIMUM_STAKE,
  FEE_CAP_BPS,
  REBATE_SETTLED,
  SETTLED_KEY_PREFIX,
  SettlementError,
} from "./types.js";

export class SettlementEngine implements Application {
  readonly id: string;
  readonly address: Address;
  readonly assetId: AssetId;
  readonly adminFeeBps: bigint;
  readonly authorization: AuthorizationPolicy;

  constructor(config: SettlementEngineConfig) {
    if (config.applicationId.length === 0) {
      throw new SettlementError("INVALID_CONFIGURATION", "applicationId must not be empty");
    }
    if (!isAddress(config.address)) {
      throw new SettlementError("INVALID_CONFIGURATION", `Invalid escrow address: "${config.address}"`);
    }

    const adminFeeBps = config.adminFeeBps ?? FEE_CAP_BPS;
    if (adminFeeBps < 0n || adminFeeBps > FEE_CAP_BPS) {
      throw new SettlementError(
        "INVALID_CONFIGURATION",
        `adminFeeBps must be within [0, ${FEE_CAP_BPS.toString()}], got ${adminFeeBps.toString()}`,
      );
    }

    const minimumStake = config.authorization?.minimumStake ?? DEFAULT_MINIMUM_STAKE;
    if (!isUint64(minimumStake)) {
      throw new SettlementError("INVALID_CONFIGURATION", "minimumStake must be a uint64");
    }

    this.id = config.applicationId;
    this.address = config.address;
    this.assetId = config.assetId;
    this.adminFeeBps = adminFeeBps;
    this.authorization = {
      minimumStake,
      oracle: config.authorization?.oracle,
      stakeRecipient: config.authorization?.stakeRecipient,
    };
  }

  call(context: GroupContext, method: string, args: unknown): unknown {
    const request = parseSettlementRequest(method, args);
    const escrow = new EscrowLedger(context, this.assetId);

    switch (request.method) {
      case "settle":
        return this._settle(context, escrow, request);
      case "deposit":
        return escrow.deposit(request.amount);
      case "get_balance":
        return escrow.available();
      case "is_settled":
        return context.store.has(settledKey(request.claimKey));
    }
  }

  private _settle(
    context: GroupContext,
    escrow: EscrowLedger,
    request: SettleRequest,
  ): SettlementReceipt {
    if (context.groupSize < 2) {
      throw new SettlementError(
        "GROUP_STRUCTURE",
        "settle must run in a group together with its authorization",
      );
    }

    const authorization = verifyAuthorization(context, request.authOpIndex, this.authorization);

    const rebateAmount: Amount = request.rebateAmount;
    if (rebateAmount > UINT64_MAX) {
      throw new SettlementError(
        "ARITHMETIC_OVERFLOW",
        `Rebate amount exceeds the uint64 range: ${rebateAmount.toString()}`,
      );
    }

    const key = settledKey(request.claimKey);
    if (context.store.has(key)) {
      throw new SettlementError(
        "DUPLICATE_SETTLEMENT",
        `Claim already settled: ${request.claimKey}`,
      );
    }

    const { payeeAmount, feeAmount } = splitRebate(rebateAmount, this.adminFeeBps);
    escrow.debit([
      { receiver: request.payee, amount: payeeAmount },
      { receiver: request.feeRecipient, amount: feeAmount },
    ]);
    context.store.set(key, context.timestamp);

    const receipt: SettlementReceipt = {
      claimKey: request.claimKey,
      rebateAmount,
      payeeAmount,
      feeAmount,
      payee: request.payee,
      feeRecipient: request.feeRecipient,
      authorization,
      timestamp: context.timestamp,
    };

    context.emit(REBATE_SETTLED, {
      claimKey: receipt.claimKey,
      rebateAmount: rebateAmount.toString(),
      payeeAmount: payeeAmount.toString(),
      feeAmount: feeAmount.toString(),
      payee: receipt.payee,
      feeRecipient: receipt.feeRecipient,
      timestamp: receipt.timestamp,
    });

    return receipt;
  }
}

function settledKey(claimKey: ClaimKey): string {
  return `${SETTLED_KEY_PREFIX}${claimKey}`;
}
