/**
 * @rxsettle/audit — Event catalog.
 *
 * Registry of every audit event type: its payload validator, its schema
 * version and the subsystem it speaks for. The audit rail refuses to
 * append an event whose payload its schema rejects.
 */

import type { EventSource } from "@rxsettle/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "audit.settlement.recorded") */
  readonly type: string;

  /** Schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which subsystem the event speaks for */
  readonly source: EventSource;

  /** True if the payload is valid for this version. */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Centralized registry of audit event types.
 *
 * Usage:
 * ```ts
 * const catalog = new EventCatalog();
 *
 * catalog.register({
 *   type: "audit.dispute.logged",
 *   version: 1,
 *   description: "A party disputed a claim",
 *   source: "audit",
 *   validate: (p) => typeof p === "object" && p !== null && "claimKey" in p,
 * });
 *
 * catalog.validate("audit.dispute.logged", payload);
 * ```
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * Re-registering the same version is a no-op; a new version replaces
   * the old schema.
   */
  register(schema: EventSchema): void {
    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version === schema.version) {
      return;
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /** All registered event types, sorted. */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((schema) => schema.source === source);
  }

  /**
   * Validate a payload against its registered schema.
   * False for unregistered types.
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}
