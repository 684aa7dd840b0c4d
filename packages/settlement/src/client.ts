/**
 * @rxsettle/settlement — Client for a deployed SettlementEngine.
 *
 * Builds the operation groups the engine expects and narrows what comes
 * back. Settlement groups have the shape:
 *
 *   [0] payment: oracle → stake recipient (authorization)
 *   [1] app-call: settle(..., authOpIndex = 0)
 */

import type { Address, Amount, ClaimKey } from "@rxsettle/types";
import type { GroupLedger, GroupReceipt, Operation } from "@rxsettle/ledger";
import type { EscrowAccount, SettlementReceipt } from "./types.js";

// =============================================================================
// Parameters
// =============================================================================

export interface AuthorizationPayment {
  /** Oracle account putting up the stake */
  readonly oracle: Address;
  readonly stakeRecipient: Address;
  readonly stake: Amount;
}

export interface SettleParams {
  /** Account submitting the settle call */
  readonly caller: Address;
  readonly authorization: AuthorizationPayment;
  readonly claimKey: ClaimKey;
  readonly rebateAmount: Amount;
  readonly payee: Address;
  readonly feeRecipient: Address;
}

export interface SettleResult {
  readonly receipt: SettlementReceipt;
  readonly group: GroupReceipt;
}

export interface DepositResult {
  readonly account: EscrowAccount;
  readonly group: GroupReceipt;
}

// =============================================================================
// Guards
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isSettlementReceipt(value: unknown): value is SettlementReceipt {
  if (!isRecord(value)) return false;
  const auth = value["authorization"];
  return (
    typeof value["claimKey"] === "string" &&
    typeof value["rebateAmount"] === "bigint" &&
    typeof value["payeeAmount"] === "bigint" &&
    typeof value["feeAmount"] === "bigint" &&
    typeof value["payee"] === "string" &&
    typeof value["feeRecipient"] === "string" &&
    typeof value["timestamp"] === "string" &&
    isRecord(auth) &&
    typeof auth["index"] === "number" &&
    typeof auth["sender"] === "string" &&
    typeof auth["amount"] === "bigint"
  );
}

export function isEscrowAccount(value: unknown): value is EscrowAccount {
  return (
    isRecord(value) &&
    typeof value["assetId"] === "string" &&
    typeof value["availableBalance"] === "bigint"
  );
}

// =============================================================================
// Builders
// =============================================================================

/**
 * The two-operation settlement group, authorization first.
 */
export function buildSettlementGroup(applicationId: string, params: SettleParams): Operation[] {
  return [
    {
      kind: "payment",
      sender: params.authorization.oracle,
      receiver: params.authorization.stakeRecipient,
      amount: params.authorization.stake,
      note: `authorize ${params.claimKey}`,
    },
    {
      kind: "app-call",
      sender: params.caller,
      applicationId,
      method: "settle",
      args: {
        claimKey: params.claimKey,
        rebateAmount: params.rebateAmount,
        payee: params.payee,
        feeRecipient: params.feeRecipient,
        authOpIndex: 0,
      },
    },
  ];
}

// =============================================================================
// Client
// =============================================================================

export class SettlementClient {
  constructor(
    private readonly ledger: GroupLedger,
    private readonly applicationId: string,
    private readonly assetId: string,
  ) {}

  /**
   * Submit a settlement group. Throws GroupRejectedError when the group
   * is rejected; nothing in it took effect.
   */
  settle(params: SettleParams): SettleResult {
    const group = this.ledger.submitGroup(buildSettlementGroup(this.applicationId, params));
    const returnValue = group.results[1]?.returnValue;
    if (!isSettlementReceipt(returnValue)) {
      throw new Error("Settlement call returned an unexpected value");
    }
    return { receipt: returnValue, group };
  }

  /** Single-operation deposit of the settlement asset. */
  deposit(funder: Address, amount: Amount): DepositResult {
    const group = this.ledger.submitGroup([
      {
        kind: "app-call",
        sender: funder,
        applicationId: this.applicationId,
        method: "deposit",
        args: { amount },
        attached: { assetId: this.assetId, amount },
      },
    ]);
    const returnValue = group.results[0]?.returnValue;
    if (!isEscrowAccount(returnValue)) {
      throw new Error("Deposit call returned an unexpected value");
    }
    return { account: returnValue, group };
  }

  getBalance(): Amount {
    const balance = this.ledger.query(this.applicationId, "get_balance");
    if (typeof balance !== "bigint") {
      throw new Error("get_balance returned an unexpected value");
    }
    return balance;
  }

  isSettled(claimKey: ClaimKey): boolean {
    return this.ledger.query(this.applicationId, "is_settled", { claimKey }) === true;
  }
}
