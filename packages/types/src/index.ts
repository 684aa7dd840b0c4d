/**
 * @rxsettle/types — Shared domain types for the settlement stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Primitives
export type { Address, AssetId, ClaimKey, Amount } from "./primitives.js";
export { UINT64_MAX, BPS_DENOMINATOR } from "./primitives.js";

// Rebate records
export type { RebateAccrual, SettlementRecord } from "./rebate.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Runtime type guards
export {
  isClaimKey,
  isAddress,
  isUint64,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
