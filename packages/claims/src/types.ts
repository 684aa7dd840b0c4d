/**
 * @rxsettle/claims — Types for the claim registry.
 *
 * A claim is a single dispensing event reported by a pharmacy and vouched
 * for by an oracle. Its key is the SHA-256 digest of everything submitted,
 * so the same submission can never be registered twice.
 */

import type { ClaimKey } from "@rxsettle/types";

// =============================================================================
// Submission
// =============================================================================

export interface ClaimSubmission {
  /** Claim identifier from the pharmacy system */
  readonly claimId: string;

  /** National Drug Code */
  readonly ndcCode: string;

  /** National Provider Identifier of the dispensing pharmacy */
  readonly pharmacyNpi: string;

  /** Unix timestamp (seconds) of dispensation, uint64 */
  readonly dispenseDate: bigint;

  /** Oracle attestation over the claim; must be non-empty */
  readonly oracleSignature: Uint8Array;
}

// =============================================================================
// Stored Records
// =============================================================================

/**
 * Metadata kept for every registered claim.
 * Field names are the stored wire names; `date` is a decimal string.
 */
export interface ClaimMetadata {
  readonly claim_id: string;
  readonly ndc: string;
  readonly npi: string;
  readonly date: string;
}

export interface ClaimRecord {
  readonly claimKey: ClaimKey;
  readonly metadata: ClaimMetadata;
  /** RFC 8785 canonical JSON of `metadata` */
  readonly canonicalMetadata: string;
  /** ISO 8601 */
  readonly submittedAt: string;
}

export interface ClaimRegistryOptions {
  /** Clock used for `submittedAt`. Default: wall clock. */
  readonly clock?: (() => Date) | undefined;
}

// =============================================================================
// Errors
// =============================================================================

export type ClaimRegistryErrorCode =
  | "MISSING_ORACLE_SIGNATURE"
  | "DUPLICATE_CLAIM"
  | "INVALID_CLAIM"
  | "CLAIM_NOT_FOUND";

export class ClaimRegistryError extends Error {
  public readonly code: ClaimRegistryErrorCode;

  constructor(code: ClaimRegistryErrorCode, message: string) {
    super(message);
    this.name = "ClaimRegistryError";
    this.code = code;
  }
}
