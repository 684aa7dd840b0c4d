/**
 * @rxsettle/ledger — Types for the host ledger.
 *
 * The host ledger executes atomic operation groups: an ordered list of
 * operations that either all take effect or none do. Applications run
 * inside a group and see it only through a GroupContext.
 *
 * Rules:
 * - All types are readonly
 * - Operations are a closed tagged union (discriminant: `kind`)
 * - Fail-closed: any invalid operation rejects the whole group
 */

import type { Address, Amount, AssetId } from "@rxsettle/types";

// ─── Constants ───────────────────────────────────────────────────────────

/** Asset id of the ledger's native currency (used for payments and stakes). */
export const NATIVE_ASSET: AssetId = "native";

/** Largest number of operations accepted in one group. */
export const MAX_GROUP_SIZE = 16;

// ─── Operations ──────────────────────────────────────────────────────────

/** Transfer of the native asset between two accounts. */
export interface PaymentOperation {
  readonly kind: "payment";
  readonly sender: Address;
  readonly receiver: Address;
  readonly amount: Amount;
  readonly note?: string | undefined;
}

/** Transfer of a named asset between two accounts. */
export interface AssetTransferOperation {
  readonly kind: "asset-transfer";
  readonly sender: Address;
  readonly receiver: Address;
  readonly assetId: AssetId;
  readonly amount: Amount;
}

/** Value moved from the caller to the application before the call runs. */
export interface AttachedValue {
  readonly assetId: AssetId;
  readonly amount: Amount;
}

/** Invocation of a registered application. */
export interface ApplicationCallOperation {
  readonly kind: "app-call";
  readonly sender: Address;
  readonly applicationId: string;
  readonly method: string;
  /** Raw arguments; the application validates them. */
  readonly args: unknown;
  readonly attached?: AttachedValue | undefined;
}

export type Operation =
  | PaymentOperation
  | AssetTransferOperation
  | ApplicationCallOperation;

export type OperationKind = Operation["kind"];

/** Read-only view of a sibling operation, as seen from inside a group. */
export type OperationView = Readonly<Operation> & { readonly index: number };

// ─── Application Interface ───────────────────────────────────────────────

/**
 * Per-application key/value store.
 * Writes land in the executing group's working copy and are discarded
 * with it if the group fails.
 */
export interface ApplicationStore {
  get(key: string): string | undefined;
  has(key: string): boolean;
  set(key: string, value: string): void;
}

/** A value movement triggered by an application, drawn from its own address. */
export interface InnerTransfer {
  readonly receiver: Address;
  readonly assetId: AssetId;
  readonly amount: Amount;
}

/**
 * Everything an application may observe or do while it runs.
 *
 * This is the only place group structure is visible to application code.
 */
export interface GroupContext {
  readonly groupId: string;
  readonly groupSize: number;
  /** Position of the executing call within its group */
  readonly currentIndex: number;
  readonly sender: Address;
  readonly applicationAddress: Address;
  /** ISO 8601 timestamp shared by every operation of the group */
  readonly timestamp: string;
  /** Value attached to this call, already credited to the application */
  readonly attached: AttachedValue | undefined;
  readonly store: ApplicationStore;

  /** Operation at `index` in the executing group, or undefined when out of range. */
  operationAt(index: number): OperationView | undefined;
  balanceOf(address: Address, assetId: AssetId): Amount;
  transfer(transfer: InnerTransfer): void;
  emit(name: string, payload: Readonly<Record<string, unknown>>): void;
}

/** A program hosted by the ledger. Holds no mutable state of its own. */
export interface Application {
  readonly id: string;
  readonly address: Address;
  call(context: GroupContext, method: string, args: unknown): unknown;
}

// ─── Receipts & Logs ─────────────────────────────────────────────────────

/** A log emitted by an application inside a group. */
export interface EmittedLog {
  readonly groupId: string;
  readonly round: number;
  readonly operationIndex: number;
  readonly applicationId: string;
  readonly name: string;
  readonly payload: Readonly<Record<string, unknown>>;
  readonly timestamp: string;
}

export type LogHandler = (log: EmittedLog) => void;

export interface Subscription {
  unsubscribe(): void;
}

/** An inner transfer as recorded on the receipt. */
export interface ExecutedTransfer extends InnerTransfer {
  readonly operationIndex: number;
  readonly sender: Address;
}

export interface OperationResult {
  readonly index: number;
  readonly kind: OperationKind;
  /** Application return value (app-call only) */
  readonly returnValue?: unknown;
}

export interface DeliveryFailure {
  readonly log: EmittedLog;
  readonly error: Error;
}

/** Result of a committed group. */
export interface GroupReceipt {
  readonly groupId: string;
  readonly round: number;
  readonly timestamp: string;
  readonly results: readonly OperationResult[];
  readonly innerTransfers: readonly ExecutedTransfer[];
  readonly logs: readonly EmittedLog[];
  /** Log subscribers that threw after commit; the group stays committed */
  readonly deliveryFailures: readonly DeliveryFailure[];
}

export interface GroupLedgerOptions {
  /** Clock used to timestamp groups. Default: wall clock. */
  readonly clock?: (() => Date) | undefined;
  /** Id generator for groups. Default: random UUID. */
  readonly generateId?: (() => string) | undefined;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type LedgerErrorCode =
  | "EMPTY_GROUP"
  | "GROUP_TOO_LARGE"
  | "INVALID_AMOUNT"
  | "AMOUNT_OVERFLOW"
  | "INSUFFICIENT_FUNDS"
  | "UNKNOWN_ACCOUNT"
  | "DUPLICATE_ACCOUNT"
  | "UNKNOWN_APPLICATION"
  | "DUPLICATE_APPLICATION"
  | "APPLICATION_SENDER";

/**
 * Structured error from the host ledger.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

/**
 * Thrown when a group is rejected. Nothing in the group took effect.
 *
 * `reason` is the error raised by the failing operation; `reasonCode`
 * is its `code` when it has one.
 */
export class GroupRejectedError extends Error {
  public readonly code = "GROUP_REJECTED";
  public readonly failedIndex: number;
  public readonly reason: Error;

  constructor(failedIndex: number, reason: Error) {
    super(`Group rejected at operation ${String(failedIndex)}: ${reason.message}`);
    this.name = "GroupRejectedError";
    this.failedIndex = failedIndex;
    this.reason = reason;
  }

  get reasonCode(): string | undefined {
    const { reason } = this;
    return "code" in reason && typeof reason.code === "string" ? reason.code : undefined;
  }
}
