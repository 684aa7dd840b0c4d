/**
 * @rxsettle/claims — Claim registry.
 *
 * Registers oracle-attested claims under a content-derived key and
 * rejects resubmission of the same claim. Settlement consults it only
 * through the claim key; nothing here moves value.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { ClaimKey } from "@rxsettle/types";
import { UINT64_MAX } from "@rxsettle/types";
import type {
  ClaimMetadata,
  ClaimRecord,
  ClaimRegistryOptions,
  ClaimSubmission,
} from "./types.js";
import { ClaimRegistryError } from "./types.js";

/**
 * Derive the claim key of a submission.
 *
 * SHA-256 over the UTF-8 bytes of claimId, ndcCode and pharmacyNpi, the
 * dispense date as 8 big-endian bytes, then the raw oracle signature.
 */
export function computeClaimKey(submission: ClaimSubmission): ClaimKey {
  const date = Buffer.alloc(8);
  date.writeBigUInt64BE(submission.dispenseDate);

  return createHash("sha256")
    .update(submission.claimId, "utf8")
    .update(submission.ndcCode, "utf8")
    .update(submission.pharmacyNpi, "utf8")
    .update(date)
    .update(submission.oracleSignature)
    .digest("hex");
}

export class ClaimRegistry {
  private readonly _claims: Map<ClaimKey, ClaimRecord> = new Map();
  private readonly _clock: () => Date;

  constructor(options?: ClaimRegistryOptions) {
    this._clock = options?.clock ?? (() => new Date());
  }

  /**
   * Register a claim.
   *
   * @throws ClaimRegistryError MISSING_ORACLE_SIGNATURE, INVALID_CLAIM or DUPLICATE_CLAIM
   */
  submitClaim(submission: ClaimSubmission): ClaimRecord {
    if (submission.oracleSignature.length === 0) {
      throw new ClaimRegistryError("MISSING_ORACLE_SIGNATURE", "Oracle signature required");
    }
    if (submission.dispenseDate < 0n || submission.dispenseDate > UINT64_MAX) {
      throw new ClaimRegistryError(
        "INVALID_CLAIM",
        `Dispense date out of range: ${submission.dispenseDate.toString()}`,
      );
    }
    for (const [field, value] of [
      ["claimId", submission.claimId],
      ["ndcCode", submission.ndcCode],
      ["pharmacyNpi", submission.pharmacyNpi],
    ] as const) {
      if (value.length === 0) {
        throw new ClaimRegistryError("INVALID_CLAIM", `${field} must not be empty`);
      }
    }

    const claimKey = computeClaimKey(submission);
    if (this._claims.has(claimKey)) {
      throw new ClaimRegistryError(
        "DUPLICATE_CLAIM",
        `Claim already submitted: ${claimKey}`,
      );
    }

    const metadata: ClaimMetadata = {
      claim_id: submission.claimId,
      ndc: submission.ndcCode,
      npi: submission.pharmacyNpi,
      date: submission.dispenseDate.toString(),
    };
    const record: ClaimRecord = {
      claimKey,
      metadata,
      canonicalMetadata: canonicalize(metadata),
      submittedAt: this._clock().toISOString(),
    };

    this._claims.set(claimKey, record);
    return record;
  }

  isClaimValid(claimKey: ClaimKey): boolean {
    return this._claims.has(claimKey);
  }

  /**
   * @throws ClaimRegistryError CLAIM_NOT_FOUND
   */
  getClaimMetadata(claimKey: ClaimKey): ClaimMetadata {
    const record = this._claims.get(claimKey);
    if (record === undefined) {
      throw new ClaimRegistryError("CLAIM_NOT_FOUND", `Claim not found: ${claimKey}`);
    }
    return record.metadata;
  }

  getClaim(claimKey: ClaimKey): ClaimRecord | undefined {
    return this._claims.get(claimKey);
  }

  get size(): number {
    return this._claims.size;
  }
}
