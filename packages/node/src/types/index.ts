/**
 * Type barrel — re-exports all public types from @rxsettle/node.
 */

// DTOs
export {
  UintStringSchema,
  HexBytesSchema,
  SubmitClaimSchema,
  RegisterScheduleSchema,
  CalculateAccrualSchema,
  OperationSchema,
  SubmitGroupSchema,
  DepositSchema,
  FundAccountSchema,
  LogDisputeSchema,
  LogAuditEntrySchema,
  ListAuditEventsQuerySchema,
} from "./dto.js";
export type {
  SubmitClaimDto,
  RegisterScheduleDto,
  CalculateAccrualDto,
  SubmitGroupDto,
  DepositDto,
  FundAccountDto,
  LogDisputeDto,
  LogAuditEntryDto,
  ListAuditEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorEnvelope } from "./error.js";

// Wire
export { toWire } from "./wire.js";
export type { WireValue } from "./wire.js";

// App env
export type { AppEnv } from "./api-contract.js";
