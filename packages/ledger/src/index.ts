/**
 * @rxsettle/ledger — Host ledger with atomic operation groups.
 *
 * A pure TypeScript stand-in for the ledger the settlement core runs on.
 * It provides exactly the primitive the core relies on:
 * - Deterministic, ordered execution of a group of operations
 * - All-or-nothing commit of the whole group
 * - Applications that trigger value transfers from their own address
 * - Logs that are published only when their group commits
 *
 * Design rules:
 * - All amounts are uint64 bigint (no floating point)
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Zero runtime dependencies
 */

// Core engine
export { GroupLedger } from "./ledger.js";

// Account book
export { AccountBook } from "./accounts.js";

// Money arithmetic
export {
  assertUint64,
  checkedAdd,
  checkedSub,
  mulDivFloor,
  parseAmount,
  formatAmount,
} from "./money-math.js";

// Types
export type {
  PaymentOperation,
  AssetTransferOperation,
  ApplicationCallOperation,
  AttachedValue,
  Operation,
  OperationKind,
  OperationView,
  ApplicationStore,
  InnerTransfer,
  GroupContext,
  Application,
  EmittedLog,
  LogHandler,
  Subscription,
  ExecutedTransfer,
  OperationResult,
  DeliveryFailure,
  GroupReceipt,
  GroupLedgerOptions,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError, GroupRejectedError, NATIVE_ASSET, MAX_GROUP_SIZE } from "./types.js";
