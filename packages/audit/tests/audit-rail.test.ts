/**
 * Tests for AuditRail.
 */

import { describe, it, expect } from "vitest";
import { AuditRail, claimStream, escrowStream, manufacturerStream } from "../src/audit-rail.js";
import { AUDIT_EVENTS } from "../src/audit-events.js";
import { EventCatalog } from "../src/catalog.js";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { AuditError } from "../src/types.js";

const CLAIM_A = "a1".repeat(32);
const CLAIM_B = "b2".repeat(32);
const NOW = "2024-01-15T10:00:00.000Z";

function makeRail(catalog?: EventCatalog): { rail: AuditRail; store: InMemoryEventStore } {
  const clock = (): Date => new Date(NOW);
  const store = new InMemoryEventStore({ clock });
  let next = 0;
  const rail = new AuditRail(store, {
    actor: "settlement-core",
    clock,
    generateId: () => `evt-${String(++next)}`,
    catalog,
  });
  return { rail, store };
}

const settlement = {
  claimKey: CLAIM_A,
  payeeAmount: 485n,
  feeAmount: 15n,
  payee: "pharmacy",
  feeRecipient: "pbm",
  timestamp: "2024-01-15T09:59:00.000Z",
};

describe("stream ids", () => {
  it("prefixes streams by entity", () => {
    expect(claimStream(CLAIM_A)).toBe(`claim-${CLAIM_A}`);
    expect(manufacturerStream("acme")).toBe("manufacturer-acme");
    expect(escrowStream("USDC")).toBe("escrow-USDC");
  });
});

describe("recordSettlement", () => {
  it("appends a settlement event with string amounts and a total", () => {
    const { rail } = makeRail();

    const stored = rail.recordSettlement(settlement, { groupId: "group-7" });

    expect(stored.streamId).toBe(claimStream(CLAIM_A));
    expect(stored.version).toBe(1);
    expect(stored.event.type).toBe(AUDIT_EVENTS.SETTLEMENT_RECORDED);
    expect(stored.event.payload).toEqual({
      claimKey: CLAIM_A,
      payee: "pharmacy",
      feeRecipient: "pbm",
      payeeAmount: "485",
      feeAmount: "15",
      totalAmount: "500",
      settledAt: "2024-01-15T09:59:00.000Z",
      groupId: "group-7",
    });
    expect(stored.event.metadata).toEqual({
      eventId: "evt-1",
      timestamp: NOW,
      actor: "settlement-core",
      causationId: "group-7",
      correlationId: CLAIM_A,
      source: "settlement",
    });
  });

  it("prefers an explicit causation id over the group id", () => {
    const { rail } = makeRail();

    const stored = rail.recordSettlement(settlement, { groupId: "group-7", causationId: "evt-0" });

    expect(stored.event.metadata.causationId).toBe("evt-0");
  });

  it("records a null group id when none is given", () => {
    const { rail } = makeRail();

    const stored = rail.recordSettlement(settlement);

    expect(stored.event.payload["groupId"]).toBeNull();
    expect(stored.event.metadata.causationId).toBeUndefined();
  });

  it("records a claim's settlement only once", () => {
    const { rail, store } = makeRail();
    rail.recordSettlement(settlement, { groupId: "group-7" });

    let caught: unknown;
    try {
      rail.recordSettlement(settlement, { groupId: "group-8" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(AuditError);
    expect((caught as AuditError).code).toBe("DUPLICATE_RECORD");
    expect((caught as AuditError).message).toBe(`Settlement of claim ${CLAIM_A} is already recorded`);
    expect(store.globalPosition()).toBe(1);
  });
});

describe("recordEscrowFunded", () => {
  it("appends to the escrow stream of the asset", () => {
    const { rail } = makeRail();

    const stored = rail.recordEscrowFunded(
      { funder: "acme", assetId: "USDC", amount: 10_000n, balance: 12_500n },
      { groupId: "group-1" },
    );

    expect(stored.streamId).toBe("escrow-USDC");
    expect(stored.event.metadata.correlationId).toBe("acme");
    expect(stored.event.payload).toEqual({
      funder: "acme",
      assetId: "USDC",
      amount: "10000",
      balance: "12500",
      groupId: "group-1",
    });
  });
});

describe("claim history", () => {
  it("collects submission, accrual, settlement and dispute for one claim in order", () => {
    const { rail } = makeRail();

    rail.recordClaimSubmitted({
      claimKey: CLAIM_A,
      claimId: "C-1001",
      ndc: "00002143380",
      npi: "1234567893",
      dispenseDate: "1700000000",
    });
    rail.recordAccrual({
      accrual: { claimKey: CLAIM_A, manufacturer: "acme", amount: 500n },
      effectiveBps: 1_000n,
      bonusApplied: false,
    });
    rail.recordClaimSubmitted({
      claimKey: CLAIM_B,
      claimId: "C-1002",
      ndc: "00002143380",
      npi: "1234567893",
      dispenseDate: "1700000001",
    });
    rail.recordSettlement(settlement);
    rail.logDispute({
      claimKey: CLAIM_A,
      disputingParty: "acme",
      reason: "duplicate dispense",
      disputedAmount: 500n,
    });

    const history = rail.history(CLAIM_A);

    expect(history.map((e) => e.event.type)).toEqual([
      AUDIT_EVENTS.CLAIM_SUBMITTED,
      AUDIT_EVENTS.ACCRUAL_CALCULATED,
      AUDIT_EVENTS.SETTLEMENT_RECORDED,
      AUDIT_EVENTS.DISPUTE_LOGGED,
    ]);
    expect(history.map((e) => e.version)).toEqual([1, 2, 3, 4]);
    expect(history[1]?.event.payload).toEqual({
      claimKey: CLAIM_A,
      manufacturer: "acme",
      amount: "500",
      effectiveBps: "1000",
      bonusApplied: false,
    });
    expect(history[1]?.event.metadata.source).toBe("rebate");
    expect(rail.history(CLAIM_B)).toHaveLength(1);
  });

  it("is empty for an unknown claim", () => {
    expect(makeRail().rail.history(CLAIM_A)).toEqual([]);
  });
});

describe("compliance log", () => {
  it("logs a general entry", () => {
    const { rail } = makeRail();

    const stored = rail.logEvent({
      claimKey: CLAIM_A,
      eventType: "CLAIM_REVIEWED",
      pharmacy: "pharmacy",
      pbm: "pbm",
      manufacturer: "acme",
      rebateAmount: 500n,
      adminFee: 15n,
      metadata: '{"reviewer":"ops"}',
    });

    expect(stored.event.type).toBe(AUDIT_EVENTS.ENTRY_LOGGED);
    expect(stored.event.payload["rebateAmount"]).toBe("500");
    expect(stored.event.payload["adminFee"]).toBe("15");
    expect(stored.event.metadata.source).toBe("audit");
  });

  it("flags a formulary lock for regulatory review", () => {
    const { rail } = makeRail();

    const stored = rail.logFormularyLock({
      manufacturer: "acme",
      drugNdc: "00002143380",
      exclusionType: "BIOSIMILAR_EXCLUSION",
    });

    expect(stored.streamId).toBe("manufacturer-acme");
    expect(stored.event.payload).toEqual({
      manufacturer: "acme",
      drugNdc: "00002143380",
      exclusionType: "BIOSIMILAR_EXCLUSION",
      status: "REGULATORY_REVIEW_REQUIRED",
    });
  });

  it("logs a volume milestone on the manufacturer stream", () => {
    const { rail } = makeRail();

    const stored = rail.logVolumeMilestone({
      manufacturer: "acme",
      totalVolume: 1_000_000n,
      milestoneType: "BONUS_TIER_REACHED",
    });

    expect(stored.streamId).toBe("manufacturer-acme");
    expect(stored.event.payload["totalVolume"]).toBe("1000000");
  });

  it("rejects an entry its schema refuses and appends nothing", () => {
    const { rail, store } = makeRail();

    expect(() =>
      rail.logDispute({ claimKey: CLAIM_A, disputingParty: "acme", reason: "", disputedAmount: 1n }),
    ).toThrow(AuditError);
    expect(store.globalPosition()).toBe(0);
  });

  it("rejects every event when the catalog has no schemas", () => {
    const { rail } = makeRail(new EventCatalog());

    let code: string | undefined;
    try {
      rail.recordSettlement(settlement);
    } catch (err) {
      if (err instanceof AuditError) code = err.code;
    }

    expect(code).toBe("INVALID_EVENT");
  });
});

describe("events", () => {
  function populated(): AuditRail {
    const { rail } = makeRail();
    rail.recordSettlement(settlement);
    rail.recordEscrowFunded({ funder: "acme", assetId: "USDC", amount: 1n, balance: 1n });
    rail.recordSettlement({ ...settlement, claimKey: CLAIM_B });
    rail.logVolumeMilestone({ manufacturer: "acme", totalVolume: 5n, milestoneType: "M" });
    return rail;
  }

  it("filters by type", () => {
    const events = populated().events({ type: AUDIT_EVENTS.SETTLEMENT_RECORDED });

    expect(events.map((e) => e.event.metadata.correlationId)).toEqual([CLAIM_A, CLAIM_B]);
  });

  it("filters by source", () => {
    const events = populated().events({ source: "rebate" });

    expect(events.map((e) => e.event.type)).toEqual([AUDIT_EVENTS.VOLUME_MILESTONE]);
  });

  it("pages with fromPosition and limit", () => {
    const events = populated().events({ fromPosition: 2, limit: 2 });

    expect(events.map((e) => e.globalPosition)).toEqual([2, 3]);
  });

  it("verifies the chain behind the rail", () => {
    expect(populated().verifyIntegrity()).toEqual({
      valid: true,
      lastVerifiedPosition: 4,
      errors: [],
    });
  });
});
