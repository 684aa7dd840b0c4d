/**
 * @rxsettle/settlement
 *
 * Atomic settlement core: pays a rebate out of escrow to the payee and a
 * capped fee to the fee recipient, only alongside a qualifying
 * authorization in the same operation group.
 */

// Engine
export { SettlementEngine } from "./engine.js";

// Escrow
export { EscrowLedger } from "./escrow.js";
export type { Payout } from "./escrow.js";

// Checks
export { verifyAuthorization } from "./authorization.js";
export { splitRebate } from "./fees.js";

// Requests
export {
  AmountSchema,
  ClaimKeySchema,
  AddressSchema,
  SettleRequestSchema,
  DepositRequestSchema,
  GetBalanceRequestSchema,
  IsSettledRequestSchema,
  SettlementRequestSchema,
  parseSettlementRequest,
} from "./requests.js";
export type {
  SettleRequest,
  DepositRequest,
  SettlementRequest,
  SettlementMethod,
  SettleArgs,
} from "./requests.js";

// Client
export {
  SettlementClient,
  buildSettlementGroup,
  isSettlementReceipt,
  isEscrowAccount,
} from "./client.js";
export type {
  AuthorizationPayment,
  SettleParams,
  SettleResult,
  DepositResult,
} from "./client.js";

// Types
export type {
  AuthorizationPolicy,
  SettlementEngineConfig,
  EscrowAccount,
  AuthorizationProof,
  FeeSplit,
  SettlementReceipt,
  SettlementErrorCode,
} from "./types.js";

export {
  SettlementError,
  FEE_CAP_BPS,
  DEFAULT_MINIMUM_STAKE,
  SETTLED_KEY_PREFIX,
  REBATE_SETTLED,
  ESCROW_FUNDED,
} from "./types.js";
