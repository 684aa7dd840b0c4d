/**
 * Audit events.
 *
 * Each fact the clearinghouse keeps is one DomainEvent appended to a
 * stream. Stored events never change; corrections are new events.
 * Payloads are plain JSON, so amounts travel as decimal strings.
 */

/** Subsystem that produced an event. */
export type EventSource = "claims" | "rebate" | "settlement" | "audit";

export interface EventMetadata {
  readonly eventId: string;

  /** ISO 8601 */
  readonly timestamp: string;

  /** Service or party on whose behalf the event was written */
  readonly actor: string;

  /** Event or ledger group that led to this one */
  readonly causationId?: string | undefined;

  /** Claim key, manufacturer or funder the event is about */
  readonly correlationId: string;

  readonly source: EventSource;
}

export interface DomainEvent {
  /** Dotted event name, `audit.<entity>.<action>` */
  readonly type: string;
  readonly metadata: EventMetadata;
  /** Validated against the catalog schema for `type` on append */
  readonly payload: Readonly<Record<string, unknown>>;
}
