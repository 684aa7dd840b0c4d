/**
 * @rxsettle/ledger — Account book.
 *
 * Holds per-account, per-asset balances and per-application stores.
 * A book is cheap to copy; the group executor works on a copy and
 * swaps it in only when every operation of the group succeeded.
 *
 * Rules:
 * - No duplicate account addresses
 * - Balances never go negative (debits are checked before mutating)
 * - Credits never exceed uint64
 */

import type { Address, Amount, AssetId } from "@rxsettle/types";
import { checkedAdd, checkedSub } from "./money-math.js";
import type { ApplicationStore } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Mutable balance sheet of the host ledger.
 */
export class AccountBook {
  private readonly _balances: Map<Address, Map<AssetId, Amount>>;
  private readonly _stores: Map<string, Map<string, string>>;

  constructor(
    balances: Map<Address, Map<AssetId, Amount>> = new Map(),
    stores: Map<string, Map<string, string>> = new Map(),
  ) {
    this._balances = balances;
    this._stores = stores;
  }

  // ─── Accounts ────────────────────────────────────────────────────────

  /**
   * Open an account with no balances.
   * Throws if the address already exists.
   */
  open(address: Address): void {
    if (this._balances.has(address)) {
      throw new LedgerError("DUPLICATE_ACCOUNT", `Account already exists: "${address}"`);
    }
    this._balances.set(address, new Map());
  }

  has(address: Address): boolean {
    return this._balances.has(address);
  }

  addresses(): readonly Address[] {
    return [...this._balances.keys()];
  }

  // ─── Balances ────────────────────────────────────────────────────────

  balanceOf(address: Address, assetId: AssetId): Amount {
    return this._balances.get(address)?.get(assetId) ?? 0n;
  }

  /**
   * All non-empty balances of an account, keyed by asset.
   */
  balancesOf(address: Address): ReadonlyMap<AssetId, Amount> {
    return new Map(this._balances.get(address) ?? []);
  }

  /**
   * Credit an account, opening it on first receipt.
   */
  credit(address: Address, assetId: AssetId, amount: Amount): void {
    let assets = this._balances.get(address);
    if (assets === undefined) {
      assets = new Map();
      this._balances.set(address, assets);
    }
    assets.set(assetId, checkedAdd(assets.get(assetId) ?? 0n, amount));
  }

  /**
   * Debit an account. The sender must exist and hold the amount.
   */
  debit(address: Address, assetId: AssetId, amount: Amount): void {
    const assets = this._balances.get(address);
    if (assets === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${address}"`);
    }
    const current = assets.get(assetId) ?? 0n;
    if (amount > current) {
      throw new LedgerError(
        "INSUFFICIENT_FUNDS",
        `Account "${address}" holds ${current.toString()} ${assetId}, needs ${amount.toString()}`,
      );
    }
    assets.set(assetId, checkedSub(current, amount));
  }

  /**
   * Move an amount between two accounts.
   */
  move(sender: Address, receiver: Address, assetId: AssetId, amount: Amount): void {
    this.debit(sender, assetId, amount);
    this.credit(receiver, assetId, amount);
  }

  // ─── Application Stores ──────────────────────────────────────────────

  /**
   * Store handle for one application, backed by this book.
   */
  storeFor(applicationId: string): ApplicationStore {
    let entries = this._stores.get(applicationId);
    if (entries === undefined) {
      entries = new Map();
      this._stores.set(applicationId, entries);
    }
    const backing = entries;
    return {
      get: (key) => backing.get(key),
      has: (key) => backing.has(key),
      set: (key, value) => {
        backing.set(key, value);
      },
    };
  }

  // ─── Copy ────────────────────────────────────────────────────────────

  /**
   * Deep copy. Mutations of the copy never reach this book.
   */
  clone(): AccountBook {
    const balances = new Map<Address, Map<AssetId, Amount>>();
    for (const [address, assets] of this._balances) {
      balances.set(address, new Map(assets));
    }
    const stores = new Map<string, Map<string, string>>();
    for (const [applicationId, entries] of this._stores) {
      stores.set(applicationId, new Map(entries));
    }
    return new AccountBook(balances, stores);
  }
}
