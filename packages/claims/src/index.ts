/**
 * @rxsettle/claims
 *
 * Claim registry: oracle-attested claims keyed by content digest,
 * with duplicate rejection.
 */

export { ClaimRegistry, computeClaimKey } from "./registry.js";

export type {
  ClaimSubmission,
  ClaimMetadata,
  ClaimRecord,
  ClaimRegistryOptions,
  ClaimRegistryErrorCode,
} from "./types.js";

export { ClaimRegistryError } from "./types.js";
