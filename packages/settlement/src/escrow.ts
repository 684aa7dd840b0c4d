/**
 * @rxsettle/settlement — Escrow ledger.
 *
 * The escrow's funds are the settlement application's own balance of the
 * settlement asset. An EscrowLedger is bound to one executing call and
 * reads and moves that balance through the call's GroupContext, so every
 * change lands in the same atomic group as the checks that allowed it.
 *
 * The account is always solvent: a debit that would overdraw is rejected
 * before any transfer is issued.
 */

import type { Address, Amount, AssetId } from "@rxsettle/types";
import type { GroupContext } from "@rxsettle/ledger";
import { checkedAdd } from "@rxsettle/ledger";
import type { EscrowAccount } from "./types.js";
import { ESCROW_FUNDED, SettlementError } from "./types.js";

export interface Payout {
  readonly receiver: Address;
  readonly amount: Amount;
}

export class EscrowLedger {
  constructor(
    private readonly context: GroupContext,
    private readonly assetId: AssetId,
  ) {}

  available(): Amount {
    return this.context.balanceOf(this.context.applicationAddress, this.assetId);
  }

  account(): EscrowAccount {
    return { assetId: this.assetId, availableBalance: this.available() };
  }

  /**
   * Accept funds attached to the executing call.
   *
   * The host ledger has already moved the attached value; this confirms it
   * is the settlement asset in the stated amount and announces it.
   */
  deposit(amount: Amount): EscrowAccount {
    const { attached } = this.context;
    if (amount === 0n) {
      throw new SettlementError("INVALID_DEPOSIT", "Deposit amount must be positive");
    }
    if (attached === undefined || attached.assetId !== this.assetId) {
      throw new SettlementError(
        "INVALID_DEPOSIT",
        `Deposit must attach ${this.assetId} to the call`,
      );
    }
    if (attached.amount !== amount) {
      throw new SettlementError(
        "INVALID_DEPOSIT",
        `Attached ${attached.amount.toString()} but declared ${amount.toString()}`,
      );
    }

    const account = this.account();
    this.context.emit(ESCROW_FUNDED, {
      funder: this.context.sender,
      assetId: this.assetId,
      amount: amount.toString(),
      balance: account.availableBalance.toString(),
    });
    return account;
  }

  /**
   * Pay out of escrow. The total is checked against the balance before
   * the first transfer; zero payouts are skipped.
   */
  debit(payouts: readonly Payout[]): void {
    let total = 0n;
    for (const payout of payouts) {
      total = checkedAdd(total, payout.amount);
    }

    const available = this.available();
    if (total > available) {
      throw new SettlementError(
        "INSUFFICIENT_ESCROW",
        `Escrow holds ${available.toString()} ${this.assetId}, ${total.toString()} required`,
      );
    }

    for (const payout of payouts) {
      if (payout.amount === 0n) continue;
      this.context.transfer({
        receiver: payout.receiver,
        assetId: this.assetId,
        amount: payout.amount,
      });
    }
  }
}
