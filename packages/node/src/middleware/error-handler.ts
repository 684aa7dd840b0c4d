/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Domain errors keep their own `code`. A rejected group answers with
 * the code of the operation that failed and `details.failedIndex`.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { GroupRejectedError } from "@rxsettle/ledger";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Settlement engine
  GROUP_STRUCTURE: 400,
  UNAUTHORIZED: 403,
  ARITHMETIC_OVERFLOW: 400,
  DUPLICATE_SETTLEMENT: 409,
  INSUFFICIENT_ESCROW: 422,
  INVALID_DEPOSIT: 400,
  INVALID_REQUEST: 400,
  UNKNOWN_METHOD: 400,
  FEE_CAP_EXCEEDED: 400,

  // Host ledger
  EMPTY_GROUP: 400,
  GROUP_TOO_LARGE: 400,
  INVALID_AMOUNT: 400,
  AMOUNT_OVERFLOW: 400,
  INSUFFICIENT_FUNDS: 422,
  UNKNOWN_ACCOUNT: 404,
  UNKNOWN_APPLICATION: 404,
  APPLICATION_SENDER: 403,

  // Claim registry
  MISSING_ORACLE_SIGNATURE: 400,
  INVALID_CLAIM: 400,
  DUPLICATE_CLAIM: 409,
  CLAIM_NOT_FOUND: 404,

  // Rebate calculator
  INVALID_SCHEDULE: 400,
  SCHEDULE_NOT_FOUND: 404,
  INVALID_ACCRUAL: 400,
  ACCRUAL_CONFLICT: 409,
  ACCRUAL_NOT_FOUND: 404,

  // Audit
  INVALID_EVENT: 400,
  CONCURRENCY_CONFLICT: 409,
  DUPLICATE_RECORD: 409,
};

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof HTTPException) {
    return c.json(createErrorEnvelope("VALIDATION_ERROR", err.message), 400);
  }

  if (err instanceof GroupRejectedError) {
    const code = err.reasonCode ?? "GROUP_REJECTED";
    const status = STATUS_MAP[code] ?? 400;
    return c.json(
      createErrorEnvelope(code, err.reason.message, { failedIndex: err.failedIndex }),
      status,
    );
  }

  const code = errorCode(err);
  const status = code === undefined ? undefined : STATUS_MAP[code];
  if (code === undefined || status === undefined) {
    // Don't leak internal details
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message), status);
}
