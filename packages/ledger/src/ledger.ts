/**
 * @rxsettle/ledger — GroupLedger.
 *
 * In-process host ledger with atomic operation groups.
 *
 * API surface:
 * - createAccount() / mint() — Set up accounts and genesis balances
 * - registerApplication() — Host a program at its own address
 * - submitGroup() — Execute an ordered group, all-or-nothing
 * - query() — Run a read-only application call without committing
 * - onLog() — Receive logs of committed groups
 *
 * Groups are executed one at a time, in submission order. Each runs
 * against a private copy of the account book; the copy replaces the
 * committed book only when every operation succeeded. A group that fails
 * leaves no trace in balances or application stores, and emits no logs.
 */

import { randomUUID } from "node:crypto";
import type { Address, Amount, AssetId } from "@rxsettle/types";
import { AccountBook } from "./accounts.js";
import { assertUint64 } from "./money-math.js";
import type {
  Application,
  ApplicationCallOperation,
  DeliveryFailure,
  EmittedLog,
  ExecutedTransfer,
  GroupContext,
  GroupLedgerOptions,
  GroupReceipt,
  LogHandler,
  Operation,
  OperationResult,
  Subscription,
} from "./types.js";
import { GroupRejectedError, LedgerError, MAX_GROUP_SIZE, NATIVE_ASSET } from "./types.js";

/** Per-group facts shared by every operation in it. */
interface GroupFrame {
  readonly groupId: string;
  readonly round: number;
  readonly timestamp: string;
  readonly operations: readonly Operation[];
  readonly book: AccountBook;
  readonly transfers: ExecutedTransfer[];
  readonly logs: EmittedLog[];
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Frozen copy of plain objects and arrays; other values pass through. */
function snapshot(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map((item: unknown) => snapshot(item)));
  }
  if (typeof value === "object" && value !== null) {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === Object.prototype || proto === null) {
      const copy: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        copy[key] = snapshot(entry);
      }
      return Object.freeze(copy);
    }
  }
  return value;
}

/**
 * Copy an operation so that neither the submitter nor a sibling reading
 * it through operationAt can change it while the group runs.
 */
function freezeOperation(operation: Operation): Operation {
  if (operation.kind !== "app-call") {
    return Object.freeze({ ...operation });
  }
  return Object.freeze({
    ...operation,
    args: snapshot(operation.args),
    ...(operation.attached === undefined ? {} : { attached: Object.freeze({ ...operation.attached }) }),
  });
}

/**
 * Host ledger executing atomic operation groups.
 */
export class GroupLedger {
  private _book: AccountBook = new AccountBook();
  private _round = 0;
  private readonly _applications: Map<string, Application> = new Map();
  /** Application id by address */
  private readonly _applicationAddresses: Map<Address, string> = new Map();
  private readonly _handlers: Set<LogHandler> = new Set();
  private readonly _clock: () => Date;
  private readonly _generateId: () => string;

  constructor(options?: GroupLedgerOptions) {
    this._clock = options?.clock ?? (() => new Date());
    this._generateId = options?.generateId ?? randomUUID;
  }

  // ─── Accounts ────────────────────────────────────────────────────────

  createAccount(address: Address): void {
    this._book.open(address);
  }

  hasAccount(address: Address): boolean {
    return this._book.has(address);
  }

  /**
   * Credit an account outside of any group (genesis funding).
   */
  mint(address: Address, assetId: AssetId, amount: Amount): void {
    this._book.credit(address, assetId, assertUint64(amount));
  }

  balanceOf(address: Address, assetId: AssetId = NATIVE_ASSET): Amount {
    return this._book.balanceOf(address, assetId);
  }

  balancesOf(address: Address): ReadonlyMap<AssetId, Amount> {
    return this._book.balancesOf(address);
  }

  /** Number of groups committed so far. */
  get round(): number {
    return this._round;
  }

  // ─── Applications ────────────────────────────────────────────────────

  /**
   * Host an application. Its address is opened as an account if needed.
   */
  registerApplication(application: Application): void {
    if (this._applications.has(application.id)) {
      throw new LedgerError(
        "DUPLICATE_APPLICATION",
        `Application already registered: "${application.id}"`,
      );
    }
    const owner = this._applicationAddresses.get(application.address);
    if (owner !== undefined) {
      throw new LedgerError(
        "DUPLICATE_APPLICATION",
        `Address "${application.address}" already belongs to application "${owner}"`,
      );
    }
    if (!this._book.has(application.address)) {
      this._book.open(application.address);
    }
    this._applications.set(application.id, application);
    this._applicationAddresses.set(application.address, application.id);
  }

  getApplication(id: string): Application | undefined {
    return this._applications.get(id);
  }

  // ─── Group Execution ─────────────────────────────────────────────────

  /**
   * Execute a group of operations atomically.
   *
   * Throws LedgerError for a malformed group (empty, too large) and
   * GroupRejectedError when any operation fails. In both cases nothing
   * is committed.
   */
  submitGroup(operations: readonly Operation[]): GroupReceipt {
    if (operations.length === 0) {
      throw new LedgerError("EMPTY_GROUP", "Cannot submit an empty group");
    }
    if (operations.length > MAX_GROUP_SIZE) {
      throw new LedgerError(
        "GROUP_TOO_LARGE",
        `Group has ${String(operations.length)} operations, maximum is ${String(MAX_GROUP_SIZE)}`,
      );
    }

    const frame: GroupFrame = {
      groupId: this._generateId(),
      round: this._round + 1,
      timestamp: this._clock().toISOString(),
      operations: operations.map(freezeOperation),
      book: this._book.clone(),
      transfers: [],
      logs: [],
    };

    const results: OperationResult[] = [];
    for (const [index, operation] of frame.operations.entries()) {
      try {
        results.push(this._execute(frame, index, operation));
      } catch (err) {
        throw new GroupRejectedError(index, toError(err));
      }
    }

    // Every operation succeeded — commit
    this._book = frame.book;
    this._round = frame.round;

    return {
      groupId: frame.groupId,
      round: frame.round,
      timestamp: frame.timestamp,
      results,
      innerTransfers: [...frame.transfers],
      logs: [...frame.logs],
      deliveryFailures: this._deliver(frame.logs),
    };
  }

  /**
   * Run a single application call against a throwaway copy of the book.
   * Nothing the call writes, transfers or emits is kept.
   */
  query(applicationId: string, method: string, args: unknown = {}): unknown {
    const application = this._requireApplication(applicationId);
    const call: ApplicationCallOperation = {
      kind: "app-call",
      sender: application.address,
      applicationId,
      method,
      args,
    };
    const frame: GroupFrame = {
      groupId: this._generateId(),
      round: this._round,
      timestamp: this._clock().toISOString(),
      operations: [call],
      book: this._book.clone(),
      transfers: [],
      logs: [],
    };
    return application.call(this._contextFor(frame, 0, call, application), method, args);
  }

  // ─── Subscriptions ───────────────────────────────────────────────────

  /**
   * Receive every log of every committed group, in emission order.
   */
  onLog(handler: LogHandler): Subscription {
    this._handlers.add(handler);
    return {
      unsubscribe: () => {
        this._handlers.delete(handler);
      },
    };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _execute(frame: GroupFrame, index: number, operation: Operation): OperationResult {
    switch (operation.kind) {
      case "payment":
        this._assertExternalSender(operation.sender);
        frame.book.move(
          operation.sender,
          operation.receiver,
          NATIVE_ASSET,
          assertUint64(operation.amount),
        );
        return { index, kind: operation.kind };

      case "asset-transfer":
        this._assertExternalSender(operation.sender);
        frame.book.move(
          operation.sender,
          operation.receiver,
          operation.assetId,
          assertUint64(operation.amount),
        );
        return { index, kind: operation.kind };

      case "app-call": {
        const application = this._requireApplication(operation.applicationId);
        if (operation.attached !== undefined) {
          this._assertExternalSender(operation.sender);
          frame.book.move(
            operation.sender,
            application.address,
            operation.attached.assetId,
            assertUint64(operation.attached.amount),
          );
        }
        const context = this._contextFor(frame, index, operation, application);
        const returnValue = application.call(context, operation.method, operation.args);
        return { index, kind: operation.kind, returnValue };
      }
    }
  }

  private _contextFor(
    frame: GroupFrame,
    index: number,
    operation: ApplicationCallOperation,
    application: Application,
  ): GroupContext {
    const { book, operations } = frame;

    return {
      groupId: frame.groupId,
      groupSize: operations.length,
      currentIndex: index,
      sender: operation.sender,
      applicationAddress: application.address,
      timestamp: frame.timestamp,
      attached: operation.attached,
      store: book.storeFor(application.id),

      operationAt: (position) => {
        const sibling = operations[position];
        return sibling === undefined ? undefined : { ...sibling, index: position };
      },

      balanceOf: (address, assetId) => book.balanceOf(address, assetId),

      transfer: (transfer) => {
        book.move(
          application.address,
          transfer.receiver,
          transfer.assetId,
          assertUint64(transfer.amount),
        );
        frame.transfers.push({
          ...transfer,
          sender: application.address,
          operationIndex: index,
        });
      },

      emit: (name, payload) => {
        frame.logs.push({
          groupId: frame.groupId,
          round: frame.round,
          operationIndex: index,
          applicationId: application.id,
          name,
          payload,
          timestamp: frame.timestamp,
        });
      },
    };
  }

  /**
   * Application accounts pay out only through their own calls
   * (GroupContext.transfer), never as the sender of an operation.
   */
  private _assertExternalSender(sender: Address): void {
    const owner = this._applicationAddresses.get(sender);
    if (owner !== undefined) {
      throw new LedgerError(
        "APPLICATION_SENDER",
        `Account "${sender}" belongs to application "${owner}" and cannot send operations`,
      );
    }
  }

  private _requireApplication(id: string): Application {
    const application = this._applications.get(id);
    if (application === undefined) {
      throw new LedgerError("UNKNOWN_APPLICATION", `Unknown application: "${id}"`);
    }
    return application;
  }

  /**
   * Hand committed logs to subscribers. A failing subscriber is
   * reported back, never allowed to undo the commit.
   */
  private _deliver(logs: readonly EmittedLog[]): readonly DeliveryFailure[] {
    const failures: DeliveryFailure[] = [];
    for (const log of logs) {
      for (const handler of this._handlers) {
        try {
          handler(log);
        } catch (err) {
          failures.push({ log, error: toError(err) });
        }
      }
    }
    return failures;
  }
}
