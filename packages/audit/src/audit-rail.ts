/**
 * @rxsettle/audit — AuditRail.
 *
 * Typed entry points that turn settlement-stack facts into audit events
 * on a hash-chained EventStore.
 *
 * Stream layout:
 * - claim-<claimKey>          everything about one claim
 * - manufacturer-<address>    formulary locks and volume milestones
 * - escrow-<assetId>          escrow funding
 */

import { randomUUID } from "node:crypto";
import type { Address, Amount, ClaimKey, DomainEvent, EventSource, RebateAccrual, SettlementRecord } from "@rxsettle/types";
import type {
  AccrualCalculatedPayload,
  AuditEntryPayload,
  AuditEventType,
  ClaimSubmittedPayload,
  DisputeLoggedPayload,
  EscrowFundedPayload,
  FormularyLockedPayload,
  SettlementRecordedPayload,
  VolumeMilestonePayload,
} from "./audit-events.js";
import { AUDIT_EVENTS, createAuditCatalog } from "./audit-events.js";
import type { EventCatalog } from "./catalog.js";
import type { EventStore, EventStoreIntegrityResult, ExpectedVersion, StoredEvent } from "./types.js";
import { AuditError } from "./types.js";

// =============================================================================
// Inputs
// =============================================================================

export interface AuditRailOptions {
  /** Recorded as `metadata.actor`. Default: "audit" */
  readonly actor?: string | undefined;
  readonly clock?: (() => Date) | undefined;
  readonly generateId?: (() => string) | undefined;
  readonly catalog?: EventCatalog | undefined;
}

export interface EscrowFunding {
  readonly funder: Address;
  readonly assetId: string;
  readonly amount: Amount;
  readonly balance: Amount;
}

export interface ClaimSubmission {
  readonly claimKey: ClaimKey;
  readonly claimId: string;
  readonly ndc: string;
  readonly npi: string;
  readonly dispenseDate: string;
}

export interface AccrualAudit {
  readonly accrual: RebateAccrual;
  readonly effectiveBps: bigint;
  readonly bonusApplied: boolean;
}

export interface AuditEntry {
  readonly claimKey: ClaimKey;
  readonly eventType: string;
  readonly pharmacy: Address;
  readonly pbm: Address;
  readonly manufacturer: Address;
  readonly rebateAmount: Amount;
  readonly adminFee: Amount;
  /** Free-form JSON text */
  readonly metadata: string;
}

export interface Dispute {
  readonly claimKey: ClaimKey;
  readonly disputingParty: Address;
  readonly reason: string;
  readonly disputedAmount: Amount;
}

export interface FormularyLock {
  readonly manufacturer: Address;
  readonly drugNdc: string;
  readonly exclusionType: string;
}

export interface VolumeMilestone {
  readonly manufacturer: Address;
  readonly totalVolume: bigint;
  readonly milestoneType: string;
}

export interface EventFilter {
  readonly type?: string | undefined;
  readonly source?: EventSource | undefined;
  readonly fromPosition?: number | undefined;
  readonly limit?: number | undefined;
}

/** Ledger context of a recorded fact. */
export interface RecordContext {
  readonly groupId?: string | undefined;
  readonly causationId?: string | undefined;
}

// =============================================================================
// Stream Ids
// =============================================================================

export function claimStream(claimKey: ClaimKey): string {
  return `claim-${claimKey}`;
}

export function manufacturerStream(manufacturer: Address): string {
  return `manufacturer-${manufacturer}`;
}

export function escrowStream(assetId: string): string {
  return `escrow-${assetId}`;
}

// =============================================================================
// Rail
// =============================================================================

export class AuditRail {
  private readonly _actor: string;
  private readonly _clock: () => Date;
  private readonly _generateId: () => string;
  private readonly _catalog: EventCatalog;

  constructor(
    private readonly store: EventStore,
    options?: AuditRailOptions,
  ) {
    this._actor = options?.actor ?? "audit";
    this._clock = options?.clock ?? (() => new Date());
    this._generateId = options?.generateId ?? randomUUID;
    this._catalog = options?.catalog ?? createAuditCatalog();
  }

  // ─── Settlement ──────────────────────────────────────────────────────

  /**
   * Record a completed settlement. A claim carries at most one settlement
   * record; a second one is DUPLICATE_RECORD.
   */
  recordSettlement(record: SettlementRecord, context: RecordContext = {}): StoredEvent {
    const streamId = claimStream(record.claimKey);
    const prior = this.store.read(streamId);
    if (prior.some((stored) => stored.event.type === AUDIT_EVENTS.SETTLEMENT_RECORDED)) {
      throw new AuditError(
        "DUPLICATE_RECORD",
        `Settlement of claim ${record.claimKey} is already recorded`,
        streamId,
      );
    }

    const payload: SettlementRecordedPayload = {
      claimKey: record.claimKey,
      payee: record.payee,
      feeRecipient: record.feeRecipient,
      payeeAmount: record.payeeAmount.toString(),
      feeAmount: record.feeAmount.toString(),
      totalAmount: (record.payeeAmount + record.feeAmount).toString(),
      settledAt: record.timestamp,
      groupId: context.groupId ?? null,
    };
    return this._append(
      streamId,
      AUDIT_EVENTS.SETTLEMENT_RECORDED,
      "settlement",
      record.claimKey,
      payload,
      context,
      prior.length,
    );
  }

  recordEscrowFunded(funding: EscrowFunding, context: RecordContext = {}): StoredEvent {
    const payload: EscrowFundedPayload = {
      funder: funding.funder,
      assetId: funding.assetId,
      amount: funding.amount.toString(),
      balance: funding.balance.toString(),
      groupId: context.groupId ?? null,
    };
    return this._append(
      escrowStream(funding.assetId),
      AUDIT_EVENTS.ESCROW_FUNDED,
      "settlement",
      funding.funder,
      payload,
      context,
    );
  }

  // ─── Claims & Rebates ────────────────────────────────────────────────

  recordClaimSubmitted(submission: ClaimSubmission): StoredEvent {
    const payload: ClaimSubmittedPayload = { ...submission };
    return this._append(
      claimStream(submission.claimKey),
      AUDIT_EVENTS.CLAIM_SUBMITTED,
      "claims",
      submission.claimKey,
      payload,
    );
  }

  recordAccrual(audit: AccrualAudit): StoredEvent {
    const payload: AccrualCalculatedPayload = {
      claimKey: audit.accrual.claimKey,
      manufacturer: audit.accrual.manufacturer,
      amount: audit.accrual.amount.toString(),
      effectiveBps: audit.effectiveBps.toString(),
      bonusApplied: audit.bonusApplied,
    };
    return this._append(
      claimStream(audit.accrual.claimKey),
      AUDIT_EVENTS.ACCRUAL_CALCULATED,
      "rebate",
      audit.accrual.claimKey,
      payload,
    );
  }

  // ─── Compliance Log ──────────────────────────────────────────────────

  logEvent(entry: AuditEntry): StoredEvent {
    const payload: AuditEntryPayload = {
      claimKey: entry.claimKey,
      eventType: entry.eventType,
      pharmacy: entry.pharmacy,
      pbm: entry.pbm,
      manufacturer: entry.manufacturer,
      rebateAmount: entry.rebateAmount.toString(),
      adminFee: entry.adminFee.toString(),
      metadata: entry.metadata,
    };
    return this._append(
      claimStream(entry.claimKey),
      AUDIT_EVENTS.ENTRY_LOGGED,
      "audit",
      entry.claimKey,
      payload,
    );
  }

  logDispute(dispute: Dispute): StoredEvent {
    const payload: DisputeLoggedPayload = {
      claimKey: dispute.claimKey,
      disputingParty: dispute.disputingParty,
      reason: dispute.reason,
      disputedAmount: dispute.disputedAmount.toString(),
    };
    return this._append(
      claimStream(dispute.claimKey),
      AUDIT_EVENTS.DISPUTE_LOGGED,
      "audit",
      dispute.claimKey,
      payload,
    );
  }

  /** Flag an anti-competitive formulary exclusion for regulatory review. */
  logFormularyLock(lock: FormularyLock): StoredEvent {
    const payload: FormularyLockedPayload = {
      manufacturer: lock.manufacturer,
      drugNdc: lock.drugNdc,
      exclusionType: lock.exclusionType,
      status: "REGULATORY_REVIEW_REQUIRED",
    };
    return this._append(
      manufacturerStream(lock.manufacturer),
      AUDIT_EVENTS.FORMULARY_LOCKED,
      "rebate",
      lock.manufacturer,
      payload,
    );
  }

  logVolumeMilestone(milestone: VolumeMilestone): StoredEvent {
    const payload: VolumeMilestonePayload = {
      manufacturer: milestone.manufacturer,
      totalVolume: milestone.totalVolume.toString(),
      milestoneType: milestone.milestoneType,
    };
    return this._append(
      manufacturerStream(milestone.manufacturer),
      AUDIT_EVENTS.VOLUME_MILESTONE,
      "rebate",
      milestone.manufacturer,
      payload,
    );
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /** Every audit event about one claim, oldest first. */
  history(claimKey: ClaimKey): readonly StoredEvent[] {
    return this.store.read(claimStream(claimKey));
  }

  events(filter: EventFilter = {}): readonly StoredEvent[] {
    const matching = this.store
      .readAll({ fromPosition: filter.fromPosition })
      .filter(
        (stored) =>
          (filter.type === undefined || stored.event.type === filter.type) &&
          (filter.source === undefined || stored.event.metadata.source === filter.source),
      );
    return filter.limit === undefined ? matching : matching.slice(0, filter.limit);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.store.verifyIntegrity();
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _append(
    streamId: string,
    type: AuditEventType,
    source: EventSource,
    correlationId: string,
    payload: object,
    context: RecordContext = {},
    expectedVersion: ExpectedVersion = "any",
  ): StoredEvent {
    if (!this._catalog.validate(type, payload)) {
      throw new AuditError("INVALID_EVENT", `Payload rejected by the ${type} schema`, streamId);
    }

    const event: DomainEvent = {
      type,
      metadata: {
        eventId: this._generateId(),
        timestamp: this._clock().toISOString(),
        actor: this._actor,
        causationId: context.causationId ?? context.groupId,
        correlationId,
        source,
      },
      payload: { ...payload },
    };

    const result = this.store.append(streamId, [event], { expectedVersion });
    const [stored] = this.store.read(streamId, { fromVersion: result.toVersion, maxCount: 1 });
    if (stored === undefined) {
      throw new AuditError("INVALID_EVENT", `Appended event missing from ${streamId}`, streamId);
    }
    return stored;
  }
}
