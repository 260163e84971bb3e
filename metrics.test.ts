import { describe, expect, it } from "vitest";
import { LegBook, type LegSpec } from "./legs.ts";
import { buildMetrics, legPnl, roundTo, summarizePnl } from "./metrics.ts";

const at = new Date("2025-10-28T09:30:00Z");

function spec(role: LegSpec["role"], direction: LegSpec["direction"], quantity: number): LegSpec {
  return { instrument: `TEST-${role}`, kind: "PUT", strike: 45000, expiry: "2025-11-25", direction, quantity, role };
}

// future -110, call +60, outer put +40 (2 lots), core put closed for +50
function sampleBook(): LegBook {
  const book = new LegBook();
  const future = book.open({ ...spec("CORE_FUTURE", "SHORT", 1), kind: "FUTURE", strike: null }, 45090, at);
  const call = book.open(spec("CORE_CALL_LONG", "LONG", 1), 200, at);
  const outerPut = book.open(spec("OUTER_PUT_SHORT", "SHORT", 2), 100, at);
  const corePut = book.open(spec("CORE_PUT_SHORT", "SHORT", 1), 150, at);
  book.markPrice(future.id, 45200);
  book.markPrice(call.id, 260);
  book.markPrice(outerPut.id, 80);
  book.close(corePut.id, 100, at, "roll");
  return book;
}

describe("roundTo", () => {
  it("rounds and folds negative zero", () => {
    expect(roundTo(1.23456)).toBe(1.23);
    expect(roundTo(1.23456, 4)).toBe(1.2346);
    expect(Object.is(roundTo(-0.001), 0)).toBe(true);
  });
});

describe("summarizePnl", () => {
  it("splits open P&L by direction and keeps realized separate", () => {
    const pnl = summarizePnl(sampleBook().all(), 10_000);
    expect(pnl.totalPnl).toBe(-10);
    expect(pnl.longPnl).toBe(60);
    expect(pnl.shortPnl).toBe(-70);
    expect(pnl.realizedPnl).toBe(50);
    expect(pnl.netPnl).toBe(40);
    expect(pnl.pnlPctOfCapital).toBeCloseTo(-0.1, 10);
    expect(pnl.netPnlPct).toBeCloseTo(0.4, 10);
    expect(pnl.netPnlConsistency).toBe(0);
  });

  it("reports zero percentages without capital", () => {
    const pnl = summarizePnl(sampleBook().all(), 0);
    expect(pnl.pnlPctOfCapital).toBe(0);
    expect(pnl.netPnlPct).toBe(0);
  });

  it("ignores closed legs in open P&L", () => {
    const book = sampleBook();
    const closed = book.closedLegs()[0];
    expect(legPnl(closed)).toBe(0);
  });
});

describe("buildMetrics", () => {
  it("assembles the snapshot", () => {
    const metrics = buildMetrics({
      state: "DEFENSE_1",
      legs: sampleBook().all(),
      capital: 10_000,
      monthType: "SHORT",
      daysSinceEntry: 15,
      referenceSpot: 45000,
      referenceFuture: 45090,
      spot: 45500,
      lastAdjustmentDay: "2025-11-12",
      adjustmentCount: 1,
      exitReason: null,
    });

    expect(metrics).toEqual({
      state: "DEFENSE_1",
      monthType: "SHORT",
      openLegCount: 3,
      closedLegCount: 1,
      roleBreakdown: { CORE_FUTURE: 1, CORE_CALL_LONG: 1, OUTER_PUT_SHORT: 1 },
      closedRoleBreakdown: { CORE_PUT_SHORT: 1 },
      totalPnl: -10,
      pnlPctOfCapital: -0.1,
      longPnl: 60,
      shortPnl: -70,
      netPnlConsistency: 0,
      realizedPnl: 50,
      netPnl: 40,
      netPnlPct: 0.4,
      daysSinceEntry: 15,
      rallyPoints: 500,
      futureVsSpotDiff: 90,
      lastAdjustmentDay: "2025-11-12",
      adjustmentCount: 1,
      exitReason: null,
    });
  });

  it("zeroes reference diffs before entry", () => {
    const metrics = buildMetrics({
      state: "IDLE",
      legs: [],
      capital: 10_000,
      monthType: null,
      daysSinceEntry: 0,
      referenceSpot: null,
      referenceFuture: null,
      spot: 45000,
      lastAdjustmentDay: null,
      adjustmentCount: 0,
      exitReason: null,
    });
    expect(metrics.rallyPoints).toBe(0);
    expect(metrics.futureVsSpotDiff).toBe(0);
    expect(metrics.openLegCount).toBe(0);
  });
});
