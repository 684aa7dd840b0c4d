/**
 * Tests for settlement over HTTP: escrow deposits, settlement groups,
 * rejections and balances.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AppInstance } from "../src/app.js";
import { CLAIM_A, PARTIES, TS, createTestApp, jsonRequest, settlementGroup } from "./setup.js";

const CLAIM_B = "b2".repeat(32);

interface ErrorBody {
  error: { code: string; message: string; details?: { failedIndex: number } };
}

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

async function deposit(amount: string): Promise<Response> {
  return instance.app.request(
    jsonRequest("/api/v1/escrow/deposits", "POST", { funder: PARTIES.manufacturer, amount }),
  );
}

async function escrowBalance(): Promise<string> {
  const res = await instance.app.request("/api/v1/escrow");
  const body = (await res.json()) as { data: { availableBalance: string } };
  return body.data.availableBalance;
}

// =============================================================================
// POST /api/v1/escrow/deposits
// =============================================================================

describe("POST /api/v1/escrow/deposits", () => {
  it("moves the asset into escrow and returns the account", async () => {
    const res = await deposit("100000000");

    expect(res.status).toBe(201);
    const body = (await res.json()) as {
      data: { account: unknown; group: { groupId: string; logs: { name: string }[] } };
    };
    expect(body.data.account).toEqual({
      address: "escrow",
      assetId: "USDC",
      availableBalance: "100000000",
    });
    expect(body.data.group.groupId).toBe("group-1");
    expect(body.data.group.logs.map((l) => l.name)).toEqual(["EscrowFunded"]);
  });

  it("rejects a zero deposit with INVALID_DEPOSIT", async () => {
    const res = await deposit("0");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_DEPOSIT");
    expect(body.error.details?.failedIndex).toBe(0);
  });

  it("rejects a deposit beyond the funder's balance", async () => {
    const res = await deposit("1000000001");

    expect(res.status).toBe(422);
    expect(((await res.json()) as ErrorBody).error.code).toBe("INSUFFICIENT_FUNDS");
    expect(await escrowBalance()).toBe("0");
  });

  it("returns 400 for a non-numeric amount", async () => {
    const res = await deposit("ten");

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.code).toBe("VALIDATION_ERROR");
  });
});

// =============================================================================
// POST /api/v1/groups — settlement
// =============================================================================

describe("POST /api/v1/groups", () => {
  it("settles a rebate, splits the fee and draws down escrow", async () => {
    await deposit("100000000");

    const res = await instance.app.request(
      jsonRequest("/api/v1/groups", "POST", settlementGroup(CLAIM_A, "15000000")),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as {
      data: { results: { index: number; returnValue?: unknown }[]; deliveryFailures: unknown[] };
    };
    expect(body.data.results[1]?.returnValue).toEqual({
      claimKey: CLAIM_A,
      rebateAmount: "15000000",
      payeeAmount: "14550000",
      feeAmount: "450000",
      payee: PARTIES.pharmacy,
      feeRecipient: PARTIES.pbm,
      authorization: { index: 0, sender: PARTIES.oracle, amount: "1000" },
      timestamp: TS,
    });
    expect(body.data.deliveryFailures).toEqual([]);
    expect(await escrowBalance()).toBe("85000000");
  });

  it("rejects a second settlement of the same claim with 409", async () => {
    await deposit("100000000");
    await instance.app.request(
      jsonRequest("/api/v1/groups", "POST", settlementGroup(CLAIM_A, "15000000")),
    );

    const res = await instance.app.request(
      jsonRequest("/api/v1/groups", "POST", settlementGroup(CLAIM_A, "15000000")),
    );

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "DUPLICATE_SETTLEMENT",
      message: `Claim already settled: ${CLAIM_A}`,
      details: { failedIndex: 1 },
    });
    expect(await escrowBalance()).toBe("85000000");
  });

  it("rejects a rebate above the escrow balance with 422", async () => {
    await deposit("100000000");
    await instance.app.request(
      jsonRequest("/api/v1/groups", "POST", settlementGroup(CLAIM_A, "15000000")),
    );

    const res = await instance.app.request(
      jsonRequest("/api/v1/groups", "POST", settlementGroup(CLAIM_B, "90000000")),
    );

    expect(res.status).toBe(422);
    expect(((await res.json()) as ErrorBody).error.code).toBe("INSUFFICIENT_ESCROW");
    expect(await escrowBalance()).toBe("85000000");
  });

  it("rejects a stake below the minimum and undoes the stake payment", async () => {
    await deposit("100000000");

    const res = await instance.app.request(
      jsonRequest("/api/v1/groups", "POST", settlementGroup(CLAIM_A, "15000000", "999")),
    );

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("UNAUTHORIZED");
    expect(body.error.details?.failedIndex).toBe(1);
    expect(await escrowBalance()).toBe("100000000");
    expect(instance.service.isSettled(CLAIM_A)).toBe(false);
    expect(instance.service.ledger.balanceOf(PARTIES.oracle)).toBe(1_000_000n);
  });

  it("refuses a raw transfer out of the escrow account", async () => {
    await deposit("100000000");
    const drain = {
      kind: "asset-transfer",
      sender: "escrow",
      receiver: PARTIES.pharmacy,
      assetId: "USDC",
      amount: "100000000",
    };

    const res = await instance.app.request(
      jsonRequest("/api/v1/groups", "POST", { operations: [drain] }),
    );

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("APPLICATION_SENDER");
    expect(body.error.details?.failedIndex).toBe(0);
    expect(await escrowBalance()).toBe("100000000");
    expect(instance.service.ledger.balanceOf(PARTIES.pharmacy, "USDC")).toBe(0n);
  });

  it("refuses a raw escrow transfer riding along with a valid settlement", async () => {
    await deposit("100000000");
    const group = settlementGroup(CLAIM_A, "15000000") as { operations: unknown[] };
    const drain = {
      kind: "asset-transfer",
      sender: "escrow",
      receiver: PARTIES.pharmacy,
      assetId: "USDC",
      amount: "85000000",
    };

    const res = await instance.app.request(
      jsonRequest("/api/v1/groups", "POST", { operations: [...group.operations, drain] }),
    );

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("APPLICATION_SENDER");
    expect(body.error.details?.failedIndex).toBe(2);
    expect(await escrowBalance()).toBe("100000000");
    expect(instance.service.isSettled(CLAIM_A)).toBe(false);
    expect(instance.service.ledger.balanceOf(PARTIES.pharmacy, "USDC")).toBe(0n);
  });

  it("rejects a settle call without a companion operation with 400", async () => {
    await deposit("100000000");
    const group = {
      operations: [
        {
          kind: "app-call",
          sender: PARTIES.operator,
          applicationId: "settlement",
          method: "settle",
          args: {
            claimKey: CLAIM_A,
            rebateAmount: "100",
            payee: PARTIES.pharmacy,
            feeRecipient: PARTIES.pbm,
            authOpIndex: 0,
          },
        },
      ],
    };

    const res = await instance.app.request(jsonRequest("/api/v1/groups", "POST", group));

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.code).toBe("GROUP_STRUCTURE");
  });

  it("returns 400 for an empty group", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/groups", "POST", { operations: [] }),
    );

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.code).toBe("VALIDATION_ERROR");
  });

  it("returns 400 for malformed JSON", async () => {
    const res = await instance.app.request(
      new Request("http://localhost/api/v1/groups", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.code).toBe("VALIDATION_ERROR");
  });
});

// =============================================================================
// Settled flag and balances
// =============================================================================

describe("GET /api/v1/escrow/settlements/:claimKey", () => {
  it("reports the settled flag", async () => {
    await deposit("100000000");
    const before = await instance.app.request(`/api/v1/escrow/settlements/${CLAIM_A}`);
    await instance.app.request(
      jsonRequest("/api/v1/groups", "POST", settlementGroup(CLAIM_A, "15000000")),
    );
    const after = await instance.app.request(`/api/v1/escrow/settlements/${CLAIM_A}`);

    expect(await before.json()).toEqual({ data: { claimKey: CLAIM_A, settled: false } });
    expect(await after.json()).toEqual({ data: { claimKey: CLAIM_A, settled: true } });
  });

  it("returns 400 for a malformed claim key", async () => {
    const res = await instance.app.request("/api/v1/escrow/settlements/not-a-key");

    expect(res.status).toBe(400);
  });
});

describe("GET /api/v1/accounts/:address", () => {
  it("returns balances per asset after a settlement", async () => {
    await deposit("100000000");
    await instance.app.request(
      jsonRequest("/api/v1/groups", "POST", settlementGroup(CLAIM_A, "15000000")),
    );

    const pharmacy = await instance.app.request(`/api/v1/accounts/${PARTIES.pharmacy}`);
    const pbm = await instance.app.request(`/api/v1/accounts/${PARTIES.pbm}`);

    expect(await pharmacy.json()).toEqual({
      data: { address: PARTIES.pharmacy, balances: { USDC: "14550000" } },
    });
    expect(await pbm.json()).toEqual({
      data: { address: PARTIES.pbm, balances: { USDC: "450000" } },
    });
  });

  it("returns 404 for an unknown account", async () => {
    const res = await instance.app.request("/api/v1/accounts/nobody");

    expect(res.status).toBe(404);
    expect(((await res.json()) as ErrorBody).error.code).toBe("NOT_FOUND");
  });
});

describe("POST /api/v1/accounts/:address/fund", () => {
  it("is not routed unless the faucet is enabled", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/accounts/newcomer/fund", "POST", { amount: "5" }),
    );

    expect(res.status).toBe(404);
  });

  it("opens and credits an account when enabled", async () => {
    const faucet = createTestApp({ enableFaucet: true });

    const res = await faucet.app.request(
      jsonRequest("/api/v1/accounts/newcomer/fund", "POST", { amount: "5", assetId: "USDC" }),
    );

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      data: { address: "newcomer", balances: { USDC: "5" } },
    });
  });
});
