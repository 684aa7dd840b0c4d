/**
 * Shared fixtures for settlement tests.
 */

import { GroupLedger, GroupRejectedError, NATIVE_ASSET } from "@rxsettle/ledger";
import { SettlementEngine } from "../src/engine.js";
import { SettlementClient } from "../src/client.js";
import type { SettleParams } from "../src/client.js";
import type { SettlementEngineConfig } from "../src/types.js";

export const TS = "2024-01-15T10:00:00.000Z";
export const ASSET = "USDC";
export const APP_ID = "settlement";
export const ESCROW = "escrow";

export const ORACLE = "oracle";
export const STAKE_SINK = "stake-sink";
export const CALLER = "pbm-operator";
export const PHARMACY = "pharmacy";
export const PBM = "pbm";
export const MANUFACTURER = "manufacturer";

export const CLAIM_A = "a1".repeat(32);
export const CLAIM_B = "b2".repeat(32);

export interface Deployment {
  readonly ledger: GroupLedger;
  readonly engine: SettlementEngine;
  readonly client: SettlementClient;
}

/**
 * A ledger with funded oracle and manufacturer accounts and a deployed
 * engine, optionally pre-funded with `escrow` USDC.
 */
export function deploy(
  escrow = 0n,
  overrides: Partial<SettlementEngineConfig> = {},
): Deployment {
  let ids = 0;
  const ledger = new GroupLedger({
    clock: () => new Date(TS),
    generateId: () => `group-${String(++ids)}`,
  });

  for (const address of [ORACLE, STAKE_SINK, CALLER, PHARMACY, PBM, MANUFACTURER]) {
    ledger.createAccount(address);
  }
  ledger.mint(ORACLE, NATIVE_ASSET, 1_000_000n);
  ledger.mint(MANUFACTURER, ASSET, 1_000_000_000n);

  const engine = new SettlementEngine({
    applicationId: APP_ID,
    address: ESCROW,
    assetId: ASSET,
    ...overrides,
  });
  ledger.registerApplication(engine);

  const client = new SettlementClient(ledger, APP_ID, ASSET);
  if (escrow > 0n) {
    client.deposit(MANUFACTURER, escrow);
  }
  return { ledger, engine, client };
}

export function settleParams(
  claimKey: string,
  rebateAmount: bigint,
  stake = 1_000n,
): SettleParams {
  return {
    caller: CALLER,
    authorization: { oracle: ORACLE, stakeRecipient: STAKE_SINK, stake },
    claimKey,
    rebateAmount,
    payee: PHARMACY,
    feeRecipient: PBM,
  };
}

/** Run `fn` and return the rejection it raised, or throw if none. */
export function rejectionOf(fn: () => unknown): GroupRejectedError {
  try {
    fn();
  } catch (err) {
    if (err instanceof GroupRejectedError) return err;
    throw err;
  }
  throw new Error("Expected the group to be rejected");
}
