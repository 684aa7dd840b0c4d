/**
 * ClearinghouseService — Composition root for all domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One instance owns one host ledger with the
 * settlement engine deployed on it, the claim registry, the rebate
 * calculator and the audit rail fed from committed ledger logs.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Address, Amount, AssetId, ClaimKey } from "@rxsettle/types";
import { GroupLedger, GroupRejectedError, NATIVE_ASSET } from "@rxsettle/ledger";
import type { GroupReceipt, Operation } from "@rxsettle/ledger";
import { ClaimRegistry, ClaimRegistryError } from "@rxsettle/claims";
import type { ClaimRecord, ClaimSubmission } from "@rxsettle/claims";
import { RebateEngine } from "@rxsettle/rebate";
import type {
  AccrualRequest,
  AccrualResult,
  ScheduleRegistration,
  TierScheduleInput,
} from "@rxsettle/rebate";
import { SettlementClient, SettlementEngine } from "@rxsettle/settlement";
import type { AuthorizationPolicy, EscrowAccount } from "@rxsettle/settlement";
import {
  AuditRail,
  InMemoryEventStore,
  createSettlementAuditSink,
} from "@rxsettle/audit";
import type {
  AuditEntry,
  Dispute,
  EventFilter,
  EventStoreIntegrityResult,
  StoredEvent,
} from "@rxsettle/audit";

// =============================================================================
// Configuration
// =============================================================================

export interface ClearinghouseServiceConfig {
  readonly applicationId: string;
  readonly escrowAddress: Address;
  readonly assetId: AssetId;
  readonly adminFeeBps?: bigint | undefined;
  readonly authorization?: Partial<AuthorizationPolicy> | undefined;
  /** Accounts opened on the ledger at startup */
  readonly accounts?: readonly Address[] | undefined;
  readonly logger?: Logger | undefined;
  readonly clock?: (() => Date) | undefined;
  readonly generateId?: (() => string) | undefined;
}

export interface ScheduleRegistrationRequest extends TierScheduleInput {
  readonly manufacturer: Address;
  /** Drug named in the formulary-lock flag, when the schedule raises one */
  readonly drugNdc?: string | undefined;
}

export interface HealthStatus {
  readonly round: number;
  readonly claims: number;
  readonly auditEvents: number;
}

// =============================================================================
// Service
// =============================================================================

export class ClearinghouseService {
  readonly ledger: GroupLedger;
  readonly registry: ClaimRegistry;
  readonly rebates: RebateEngine;
  readonly engine: SettlementEngine;
  readonly settlement: SettlementClient;
  readonly eventStore: InMemoryEventStore;
  readonly audit: AuditRail;

  private readonly _logger: Logger;
  /** Manufacturers already past their volume threshold */
  private readonly _bonusReached = new Set<Address>();

  constructor(config: ClearinghouseServiceConfig) {
    this._logger = config.logger ?? pino({ level: "silent" });
    const clock = config.clock;

    this.ledger = new GroupLedger({ clock, generateId: config.generateId });
    this.registry = new ClaimRegistry({ clock });
    this.rebates = new RebateEngine();
    this.eventStore = new InMemoryEventStore({ clock });
    this.audit = new AuditRail(this.eventStore, { actor: "clearinghouse", clock });

    this.engine = new SettlementEngine({
      applicationId: config.applicationId,
      address: config.escrowAddress,
      assetId: config.assetId,
      adminFeeBps: config.adminFeeBps,
      authorization: config.authorization,
    });
    this.ledger.registerApplication(this.engine);
    this.ledger.onLog(
      createSettlementAuditSink(this.audit, { applicationId: config.applicationId }),
    );
    this.settlement = new SettlementClient(this.ledger, config.applicationId, config.assetId);

    for (const address of config.accounts ?? []) {
      this.openAccount(address);
    }

    this._logger.info(
      {
        applicationId: this.engine.id,
        escrow: this.engine.address,
        assetId: this.engine.assetId,
        adminFeeBps: this.engine.adminFeeBps.toString(),
        minimumStake: this.engine.authorization.minimumStake.toString(),
      },
      "Settlement engine deployed",
    );
  }

  // ─── Claims ────────────────────────────────────────────────────────

  submitClaim(submission: ClaimSubmission): ClaimRecord {
    const record = this.registry.submitClaim(submission);
    this.audit.recordClaimSubmitted({
      claimKey: record.claimKey,
      claimId: record.metadata.claim_id,
      ndc: record.metadata.ndc,
      npi: record.metadata.npi,
      dispenseDate: record.metadata.date,
    });
    return record;
  }

  /**
   * @throws ClaimRegistryError CLAIM_NOT_FOUND
   */
  getClaim(claimKey: ClaimKey): ClaimRecord {
    const record = this.registry.getClaim(claimKey);
    if (record === undefined) {
      throw new ClaimRegistryError("CLAIM_NOT_FOUND", `Claim not found: ${claimKey}`);
    }
    return record;
  }

  // ─── Rebates ───────────────────────────────────────────────────────

  /**
   * Register a schedule. A schedule that excludes biosimilars is flagged
   * on the audit rail for regulatory review.
   */
  registerSchedule(request: ScheduleRegistrationRequest): ScheduleRegistration {
    const registration = this.rebates.registerSchedule(request.manufacturer, request);
    if (registration.formularyLock) {
      this.audit.logFormularyLock({
        manufacturer: request.manufacturer,
        drugNdc: request.drugNdc ?? "",
        exclusionType: "BIOSIMILAR_EXCLUSION",
      });
      this._logger.warn(
        { manufacturer: request.manufacturer },
        "Biosimilar exclusion detected - regulatory review required",
      );
    }
    return registration;
  }

  /**
   * Accrue the rebate for a registered claim. Only the first calculation
   * for a claim is audited; replays return the stored accrual.
   *
   * @throws ClaimRegistryError CLAIM_NOT_FOUND
   */
  calculateAccrual(request: AccrualRequest): AccrualResult {
    if (!this.registry.isClaimValid(request.claimKey)) {
      throw new ClaimRegistryError("CLAIM_NOT_FOUND", `Claim not found: ${request.claimKey}`);
    }

    const result = this.rebates.calculateAccrual(request);
    if (result.replayed) {
      return result;
    }

    this.audit.recordAccrual({
      accrual: result.accrual,
      effectiveBps: result.effectiveBps,
      bonusApplied: result.bonusApplied,
    });
    if (result.bonusApplied && !this._bonusReached.has(request.manufacturer)) {
      this._bonusReached.add(request.manufacturer);
      this.audit.logVolumeMilestone({
        manufacturer: request.manufacturer,
        totalVolume: request.currentVolume,
        milestoneType: "TIER_THRESHOLD",
      });
    }
    return result;
  }

  // ─── Ledger ────────────────────────────────────────────────────────

  /**
   * Execute an atomic group. Rejections are logged and rethrown.
   */
  submitGroup(operations: readonly Operation[]): GroupReceipt {
    let receipt: GroupReceipt;
    try {
      receipt = this.ledger.submitGroup(operations);
    } catch (err) {
      if (err instanceof GroupRejectedError) {
        this._logger.warn(
          { failedIndex: err.failedIndex, code: err.reasonCode, size: operations.length },
          `Group rejected: ${err.reason.message}`,
        );
      }
      throw err;
    }

    this._logger.info(
      { groupId: receipt.groupId, round: receipt.round, size: operations.length, logs: receipt.logs.length },
      "Group committed",
    );
    for (const failure of receipt.deliveryFailures) {
      this._logger.error(
        { groupId: receipt.groupId, log: failure.log.name, err: failure.error },
        "Audit delivery failed",
      );
    }
    return receipt;
  }

  /** Deposit the settlement asset into escrow in its own group. */
  deposit(funder: Address, amount: Amount): GroupReceipt {
    return this.submitGroup([
      {
        kind: "app-call",
        sender: funder,
        applicationId: this.engine.id,
        method: "deposit",
        args: { amount },
        attached: { assetId: this.engine.assetId, amount },
      },
    ]);
  }

  escrowAccount(): EscrowAccount & { readonly address: Address } {
    return {
      address: this.engine.address,
      assetId: this.engine.assetId,
      availableBalance: this.settlement.getBalance(),
    };
  }

  isSettled(claimKey: ClaimKey): boolean {
    return this.settlement.isSettled(claimKey);
  }

  openAccount(address: Address): void {
    if (!this.ledger.hasAccount(address)) {
      this.ledger.createAccount(address);
    }
  }

  accountBalances(address: Address): ReadonlyMap<AssetId, Amount> {
    return this.ledger.balancesOf(address);
  }

  /** Credit an account outside any group, opening it first if needed. */
  fund(address: Address, amount: Amount, assetId: AssetId = NATIVE_ASSET): void {
    this.openAccount(address);
    this.ledger.mint(address, assetId, amount);
    this._logger.info({ address, assetId, amount: amount.toString() }, "Account funded");
  }

  // ─── Audit ─────────────────────────────────────────────────────────

  logDispute(dispute: Dispute): StoredEvent {
    this.getClaim(dispute.claimKey);
    return this.audit.logDispute(dispute);
  }

  /** Compliance entry on the claim's audit history; the claim need not be registered. */
  logAuditEntry(entry: AuditEntry): StoredEvent {
    return this.audit.logEvent(entry);
  }

  auditEvents(filter: EventFilter): readonly StoredEvent[] {
    return this.audit.events(filter);
  }

  auditHistory(claimKey: ClaimKey): readonly StoredEvent[] {
    return this.audit.history(claimKey);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.audit.verifyIntegrity();
  }

  health(): HealthStatus {
    return {
      round: this.ledger.round,
      claims: this.registry.size,
      auditEvents: this.eventStore.globalPosition(),
    };
  }
}
