/**
 * @rxsettle/audit — Audit event definitions.
 *
 * Naming convention: `audit.<entity>.<action>`
 *
 * Amounts travel as decimal strings so every payload is plain JSON and
 * hashes the same everywhere.
 */

import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Payloads
// =============================================================================

export interface SettlementRecordedPayload {
  readonly claimKey: string;
  readonly payee: string;
  readonly feeRecipient: string;
  readonly payeeAmount: string;
  readonly feeAmount: string;
  readonly totalAmount: string;
  readonly settledAt: string;
  /** Host-ledger group that carried the settlement, when known */
  readonly groupId: string | null;
}

export interface EscrowFundedPayload {
  readonly funder: string;
  readonly assetId: string;
  readonly amount: string;
  readonly balance: string;
  readonly groupId: string | null;
}

export interface ClaimSubmittedPayload {
  readonly claimKey: string;
  readonly claimId: string;
  readonly ndc: string;
  readonly npi: string;
  readonly dispenseDate: string;
}

export interface AccrualCalculatedPayload {
  readonly claimKey: string;
  readonly manufacturer: string;
  readonly amount: string;
  readonly effectiveBps: string;
  readonly bonusApplied: boolean;
}

/** General-purpose compliance entry. */
export interface AuditEntryPayload {
  readonly claimKey: string;
  readonly eventType: string;
  readonly pharmacy: string;
  readonly pbm: string;
  readonly manufacturer: string;
  readonly rebateAmount: string;
  readonly adminFee: string;
  readonly metadata: string;
}

export interface DisputeLoggedPayload {
  readonly claimKey: string;
  readonly disputingParty: string;
  readonly reason: string;
  readonly disputedAmount: string;
}

export interface FormularyLockedPayload {
  readonly manufacturer: string;
  readonly drugNdc: string;
  readonly exclusionType: string;
  readonly status: "REGULATORY_REVIEW_REQUIRED";
}

export interface VolumeMilestonePayload {
  readonly manufacturer: string;
  readonly totalVolume: string;
  readonly milestoneType: string;
}

// =============================================================================
// Event Type Registry
// =============================================================================

export const AUDIT_EVENTS = {
  SETTLEMENT_RECORDED: "audit.settlement.recorded",
  ESCROW_FUNDED: "audit.escrow.funded",
  CLAIM_SUBMITTED: "audit.claim.submitted",
  ACCRUAL_CALCULATED: "audit.accrual.calculated",
  ENTRY_LOGGED: "audit.entry.logged",
  DISPUTE_LOGGED: "audit.dispute.logged",
  FORMULARY_LOCKED: "audit.formulary.locked",
  VOLUME_MILESTONE: "audit.volume.milestone",
} as const;

export type AuditEventType = (typeof AUDIT_EVENTS)[keyof typeof AUDIT_EVENTS];

// =============================================================================
// Schema Definitions
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function hasString(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "string" && obj[key] !== "";
}

function hasDigits(obj: Record<string, unknown>, key: string): boolean {
  const value = obj[key];
  return typeof value === "string" && /^\d+$/.test(value);
}

const AUDIT_SCHEMAS: readonly EventSchema[] = [
  {
    type: AUDIT_EVENTS.SETTLEMENT_RECORDED,
    version: 1,
    description: "A rebate was paid out of escrow to a payee and fee recipient",
    source: "settlement",
    validate: (p): p is SettlementRecordedPayload =>
      isObject(p) &&
      hasString(p, "claimKey") &&
      hasString(p, "payee") &&
      hasString(p, "feeRecipient") &&
      hasDigits(p, "payeeAmount") &&
      hasDigits(p, "feeAmount") &&
      hasDigits(p, "totalAmount"),
  },
  {
    type: AUDIT_EVENTS.ESCROW_FUNDED,
    version: 1,
    description: "Funds were deposited into escrow",
    source: "settlement",
    validate: (p): p is EscrowFundedPayload =>
      isObject(p) && hasString(p, "funder") && hasDigits(p, "amount") && hasDigits(p, "balance"),
  },
  {
    type: AUDIT_EVENTS.CLAIM_SUBMITTED,
    version: 1,
    description: "An oracle-attested claim was registered",
    source: "claims",
    validate: (p): p is ClaimSubmittedPayload =>
      isObject(p) && hasString(p, "claimKey") && hasString(p, "claimId") && hasDigits(p, "dispenseDate"),
  },
  {
    type: AUDIT_EVENTS.ACCRUAL_CALCULATED,
    version: 1,
    description: "A rebate accrual was computed for a claim",
    source: "rebate",
    validate: (p): p is AccrualCalculatedPayload =>
      isObject(p) && hasString(p, "claimKey") && hasString(p, "manufacturer") && hasDigits(p, "amount"),
  },
  {
    type: AUDIT_EVENTS.ENTRY_LOGGED,
    version: 1,
    description: "A canonical compliance entry was logged",
    source: "audit",
    validate: (p): p is AuditEntryPayload =>
      isObject(p) &&
      hasString(p, "claimKey") &&
      hasString(p, "eventType") &&
      hasDigits(p, "rebateAmount") &&
      hasDigits(p, "adminFee"),
  },
  {
    type: AUDIT_EVENTS.DISPUTE_LOGGED,
    version: 1,
    description: "A party disputed a claim",
    source: "audit",
    validate: (p): p is DisputeLoggedPayload =>
      isObject(p) &&
      hasString(p, "claimKey") &&
      hasString(p, "disputingParty") &&
      hasString(p, "reason") &&
      hasDigits(p, "disputedAmount"),
  },
  {
    type: AUDIT_EVENTS.FORMULARY_LOCKED,
    version: 1,
    description: "A formulary exclusion was flagged for antitrust review",
    source: "rebate",
    validate: (p): p is FormularyLockedPayload =>
      isObject(p) && hasString(p, "manufacturer") && hasString(p, "exclusionType"),
  },
  {
    type: AUDIT_EVENTS.VOLUME_MILESTONE,
    version: 1,
    description: "A manufacturer reached a volume milestone",
    source: "rebate",
    validate: (p): p is VolumeMilestonePayload =>
      isObject(p) && hasString(p, "manufacturer") && hasDigits(p, "totalVolume") && hasString(p, "milestoneType"),
  },
];

/**
 * A catalog with every audit event type registered.
 */
export function createAuditCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of AUDIT_SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
