/**
 * @rxsettle/audit — In-memory EventStore implementation.
 *
 * Nothing survives the process. Appends are amortized O(1); reads copy
 * the selected window.
 */

import type { DomainEvent } from "@rxsettle/types";
import type {
  AppendOptions,
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  ExpectedVersion,
  ReadAllOptions,
  ReadDirection,
  ReadOptions,
  StoredEvent,
  UnhashedEvent,
} from "./types.js";
import { AuditError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Clock used for `appendedAt`. Default: wall clock. */
  readonly clock?: (() => Date) | undefined;
}

/**
 * Hash-chained event store held in memory.
 *
 * The chain runs over the global log; per-stream arrays share the same
 * StoredEvent objects.
 */
export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _log: StoredEvent[] = [];
  private readonly _clock: () => Date;

  constructor(options?: InMemoryEventStoreOptions) {
    this._clock = options?.clock ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    requireStreamId(streamId);
    if (events.length === 0) {
      throw new AuditError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const head = this.streamVersion(streamId);
    checkExpectedVersion(streamId, head, options?.expectedVersion ?? "any");

    const stream = this._streams.get(streamId) ?? [];
    this._streams.set(streamId, stream);

    const appendedAt = this._clock().toISOString();
    events.forEach((event, offset) => {
      const unhashed: UnhashedEvent = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: head + offset + 1,
        globalPosition: this._log.length + 1,
        appendedAt,
      };
      const stored = this._link(unhashed);
      stream.push(stored);
      this._log.push(stored);
    });

    return {
      streamId,
      fromVersion: head + 1,
      toVersion: head + events.length,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    requireStreamId(streamId);
    const from = options?.fromVersion;
    if (from !== undefined && from < 1) {
      throw new AuditError("INVALID_VERSION", `fromVersion must be >= 1, got ${String(from)}`, streamId);
    }
    return selectWindow(this._streams.get(streamId) ?? [], (e) => e.version, from, options);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    return selectWindow(this._log, (e) => e.globalPosition, options?.fromPosition, options);
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._log.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _link(unhashed: UnhashedEvent): StoredEvent {
    const previousHash = this._log.at(-1)?.hash ?? GENESIS_HASH;
    return { ...unhashed, hash: computeEventHash(unhashed, previousHash), previousHash };
  }
}

function requireStreamId(streamId: string): void {
  if (streamId.length === 0) {
    throw new AuditError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}

function checkExpectedVersion(streamId: string, head: number, expected: ExpectedVersion): void {
  if (expected !== "any" && expected !== head) {
    throw new AuditError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" is at version ${String(head)}, expected ${String(expected)}`,
      streamId,
    );
  }
}

/**
 * Events at or after `from` (forward) or at or before it (backward),
 * capped at `maxCount`. Positions in `events` are ascending.
 */
function selectWindow(
  events: readonly StoredEvent[],
  position: (event: StoredEvent) => number,
  from: number | undefined,
  options: { readonly direction?: ReadDirection | undefined; readonly maxCount?: number | undefined } | undefined,
): readonly StoredEvent[] {
  const forward = (options?.direction ?? "forward") === "forward";
  const selected = forward
    ? events.filter((e) => from === undefined || position(e) >= from)
    : events.filter((e) => from === undefined || position(e) <= from).reverse();

  const maxCount = options?.maxCount;
  return maxCount !== undefined && maxCount >= 0 ? selected.slice(0, maxCount) : selected;
}
