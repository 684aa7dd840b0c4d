/**
 * Runtime Type Guards
 *
 * Narrowing functions used at system boundaries
 * (HTTP bodies, application-call arguments, ledger logs).
 */

import type { DomainEvent, EventMetadata, EventSource } from "./event.js";
import type { Address, ClaimKey } from "./primitives.js";
import { UINT64_MAX } from "./primitives.js";

// =============================================================================
// Primitive guards
// =============================================================================

const CLAIM_KEY_PATTERN = /^[0-9a-f]{64}$/;
const ADDRESS_PATTERN = /^[A-Za-z0-9_.:-]{1,128}$/;

export function isClaimKey(value: unknown): value is ClaimKey {
  return typeof value === "string" && CLAIM_KEY_PATTERN.test(value);
}

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isUint64(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= UINT64_MAX;
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["claims", "rebate", "settlement", "audit"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
