/**
 * @rxsettle/audit — Settlement audit sink.
 *
 * A host-ledger log handler. The ledger only delivers logs of committed
 * groups, so an audit record exists exactly when its settlement or
 * deposit took effect. A handler that throws is reported on the group
 * receipt and never undoes the commit.
 */

import type { EmittedLog, LogHandler } from "@rxsettle/ledger";
import { ESCROW_FUNDED, REBATE_SETTLED } from "@rxsettle/settlement";
import type { SettlementRecord } from "@rxsettle/types";
import { isAddress, isClaimKey } from "@rxsettle/types";
import type { AuditRail, EscrowFunding } from "./audit-rail.js";
import { AuditError } from "./types.js";

export interface SettlementAuditSinkOptions {
  /** Only logs from this application are recorded. Default: all */
  readonly applicationId?: string | undefined;
}

function invalid(log: EmittedLog, field: string): AuditError {
  return new AuditError(
    "INVALID_LOG",
    `${log.name} log from "${log.applicationId}" has an invalid ${field}`,
  );
}

function amountField(log: EmittedLog, field: string): bigint {
  const value = log.payload[field];
  if (typeof value !== "string" || !/^\d+$/.test(value)) {
    throw invalid(log, field);
  }
  return BigInt(value);
}

function addressField(log: EmittedLog, field: string): string {
  const value = log.payload[field];
  if (!isAddress(value)) {
    throw invalid(log, field);
  }
  return value;
}

export function parseSettlementLog(log: EmittedLog): SettlementRecord {
  const { claimKey, timestamp } = log.payload;
  if (!isClaimKey(claimKey)) throw invalid(log, "claimKey");
  if (typeof timestamp !== "string") throw invalid(log, "timestamp");

  return {
    claimKey,
    payeeAmount: amountField(log, "payeeAmount"),
    feeAmount: amountField(log, "feeAmount"),
    payee: addressField(log, "payee"),
    feeRecipient: addressField(log, "feeRecipient"),
    timestamp,
  };
}

export function parseEscrowFundedLog(log: EmittedLog): EscrowFunding {
  const { assetId } = log.payload;
  if (typeof assetId !== "string" || assetId === "") throw invalid(log, "assetId");

  return {
    funder: addressField(log, "funder"),
    assetId,
    amount: amountField(log, "amount"),
    balance: amountField(log, "balance"),
  };
}

/**
 * Build a log handler that records RebateSettled and EscrowFunded logs
 * on the rail. Other logs are ignored.
 */
export function createSettlementAuditSink(
  rail: AuditRail,
  options: SettlementAuditSinkOptions = {},
): LogHandler {
  return (log) => {
    if (options.applicationId !== undefined && log.applicationId !== options.applicationId) {
      return;
    }
    const context = { groupId: log.groupId };

    switch (log.name) {
      case REBATE_SETTLED:
        rail.recordSettlement(parseSettlementLog(log), context);
        return;
      case ESCROW_FUNDED:
        rail.recordEscrowFunded(parseEscrowFundedLog(log), context);
        return;
      default:
        return;
    }
  };
}
