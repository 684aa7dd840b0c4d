/**
 * @rxsettle/audit — Append-only audit trail.
 *
 * Provides:
 * - EventStore interface and a hash-chained InMemoryEventStore
 * - EventCatalog with the audit event definitions
 * - AuditRail for recording settlements, deposits, claims, accruals,
 *   disputes, formulary locks and volume milestones
 * - A host-ledger log sink that records committed settlements
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  AuditErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { AuditError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Store
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog } from "./catalog.js";
export { AUDIT_EVENTS, createAuditCatalog } from "./audit-events.js";
export type {
  AuditEventType,
  SettlementRecordedPayload,
  EscrowFundedPayload,
  ClaimSubmittedPayload,
  AccrualCalculatedPayload,
  AuditEntryPayload,
  DisputeLoggedPayload,
  FormularyLockedPayload,
  VolumeMilestonePayload,
} from "./audit-events.js";

// Rail
export { AuditRail, claimStream, manufacturerStream, escrowStream } from "./audit-rail.js";
export type {
  AuditRailOptions,
  EscrowFunding,
  ClaimSubmission,
  AccrualAudit,
  AuditEntry,
  Dispute,
  FormularyLock,
  VolumeMilestone,
  EventFilter,
  RecordContext,
} from "./audit-rail.js";

// Ledger sink
export {
  createSettlementAuditSink,
  parseSettlementLog,
  parseEscrowFundedLog,
} from "./settlement-sink.js";
export type { SettlementAuditSinkOptions } from "./settlement-sink.js";
