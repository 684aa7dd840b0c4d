/**
 * @rxsettle/audit — Core types.
 *
 * Append-only, hash-chained event persistence for the audit trail.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Appends can pin the stream version they were computed against
 * - Every event is linked to its predecessor by hash
 */

import type { DomainEvent } from "@rxsettle/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 *
 * Wraps a DomainEvent with store-level metadata:
 * - streamId: which stream this event belongs to
 * - version: monotonically increasing position within the stream
 * - globalPosition: monotonically increasing position across all streams
 * - hash / previousHash: links into the store-wide hash chain
 */
export interface StoredEvent {
  readonly event: DomainEvent;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;

  /** SHA-256 of this event's canonical content and `previousHash` */
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH */
  readonly previousHash: string;
}

/** A stored event before it is linked into the chain. */
export type UnhashedEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append / Read Options
// =============================================================================

/**
 * Version the stream must be at before an append; 0 for a stream with no
 * events yet. "any" skips the check.
 */
export type ExpectedVersion = number | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion | undefined;
}

export interface AppendResult {
  readonly streamId: string;
  /** Version of the first event appended */
  readonly fromVersion: number;
  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;
  readonly count: number;
}

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number | undefined;
  /** Default: unlimited */
  readonly maxCount?: number | undefined;
  readonly direction?: ReadDirection | undefined;
}

export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number | undefined;
  readonly maxCount?: number | undefined;
  readonly direction?: ReadDirection | undefined;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last event whose link was checked */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 * - An append with a stale expected version writes nothing
 */
export interface EventStore {
  /**
   * Append one or more events to a stream.
   *
   * @throws AuditError if the concurrency check fails
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Events of one stream; empty if the stream doesn't exist. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events across all streams in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  /** Current version of a stream, or 0 if it doesn't exist. */
  streamVersion(streamId: string): number;

  /** Position of the last event, or 0 if the store is empty. */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type AuditErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "DUPLICATE_RECORD"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION"
  | "INVALID_EVENT"
  | "INVALID_LOG";

export class AuditError extends Error {
  constructor(
    public readonly code: AuditErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "AuditError";
  }
}
