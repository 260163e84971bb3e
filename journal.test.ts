import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { handleRequest, type HealthContext } from "./health-check.ts";
import { TradeJournal, type TradeRecord } from "./journal.ts";
import { buildMetrics } from "./metrics.ts";

const at = new Date("2025-10-28T09:30:00Z");

const trade: TradeRecord = {
  action: "OPEN",
  legId: 1,
  role: "CORE_FUTURE",
  instrument: "BANKNIFTY25NOVFUT",
  side: "SELL",
  lots: 1,
  units: 35,
  price: 45090,
  orderId: "MOCK000001",
  orderStatus: "SUCCESS",
  reason: "ENTRY",
};

const metrics = buildMetrics({
  state: "ACTIVE",
  legs: [],
  capital: 4_000,
  monthType: "SHORT",
  daysSinceEntry: 0,
  referenceSpot: 45000,
  referenceFuture: 45090,
  spot: 45000,
  lastAdjustmentDay: null,
  adjustmentCount: 0,
  exitReason: null,
});

function tempDir(): string {
  return mkdtempSync(join(tmpdir(), "sandwich-data-"));
}

describe("TradeJournal", () => {
  it("appends trades to the file of the day", async () => {
    const dir = tempDir();
    const journal = new TradeJournal(dir, true);

    await journal.recordTrade(trade, at);
    await journal.recordTrade({ ...trade, legId: 2, role: "CORE_CALL_LONG" }, at);

    expect(journal.tradeFile("2025-10-28")).toBe(join(dir, "trades_2025-10-28.json"));
    const trades = await journal.readTrades("2025-10-28");
    expect(trades).toHaveLength(2);
    expect(trades[0]).toEqual({ ...trade, timestamp: "2025-10-28T09:30:00.000Z" });
  });

  it("files an early-morning trade under the exchange day", async () => {
    const journal = new TradeJournal(tempDir(), true);
    // 01:30 IST on the 29th, still the 28th in UTC
    const lateUtc = new Date("2025-10-28T20:00:00Z");

    await journal.recordTrade(trade, lateUtc);

    expect(await journal.readTrades("2025-10-28")).toEqual([]);
    expect(await journal.readTrades("2025-10-29")).toEqual([{ ...trade, timestamp: "2025-10-28T20:00:00.000Z" }]);
  });

  it("records nothing when disabled", async () => {
    const journal = new TradeJournal(tempDir(), false);
    await journal.recordTrade(trade, at);
    expect(await journal.readTrades("2025-10-28")).toEqual([]);
  });

  it("round-trips the status snapshot", async () => {
    const journal = new TradeJournal(join(tempDir(), "nested"), true);
    expect(await journal.readStatus()).toBeNull();
    await journal.writeStatus(metrics, at);
    expect(await journal.readStatus()).toEqual({ updatedAt: "2025-10-28T09:30:00.000Z", metrics });
  });
});

describe("health endpoint", () => {
  function context(dir: string): HealthContext {
    return {
      journal: new TradeJournal(dir, true),
      dataDir: dir,
      logFile: join(dir, "trading.log"),
      timezone: "Asia/Kolkata",
    };
  }

  it("reports basic health", async () => {
    const dir = tempDir();
    expect(await handleRequest("/health", context(dir), at)).toEqual({
      status: 200,
      body: {
        timestamp: "2025-10-28T09:30:00.000Z",
        status: "healthy",
        checks: { data_dir: true, log_file: false },
      },
    });
  });

  it("serves the latest status", async () => {
    const ctx = context(tempDir());
    expect(await handleRequest("/status", ctx, at)).toEqual({
      status: 200,
      body: { status: null, message: "No strategy cycle yet" },
    });

    await ctx.journal.writeStatus(metrics, at);
    expect(await handleRequest("/status", ctx, at)).toEqual({
      status: 200,
      body: { updatedAt: "2025-10-28T09:30:00.000Z", metrics },
    });
  });

  it("serves today's trades", async () => {
    const ctx = context(tempDir());
    expect(await handleRequest("/trades", ctx, at)).toEqual({
      status: 200,
      body: { trades: [], message: "No trades on 2025-10-28" },
    });

    await ctx.journal.recordTrade(trade, at);
    const response = await handleRequest("/trades", ctx, at);
    expect(response.status).toBe(200);
    expect(response.body).toEqual([{ ...trade, timestamp: "2025-10-28T09:30:00.000Z" }]);
  });

  it("serves trades by the exchange day", async () => {
    const ctx = context(tempDir());
    const lateUtc = new Date("2025-10-28T20:00:00Z");
    await ctx.journal.recordTrade(trade, lateUtc);

    expect(await handleRequest("/trades", ctx, lateUtc)).toEqual({
      status: 200,
      body: [{ ...trade, timestamp: "2025-10-28T20:00:00.000Z" }],
    });
  });

  it("returns 500 on an unreadable file", async () => {
    const dir = tempDir();
    writeFileSync(join(dir, "status.json"), "{not json");
    const response = await handleRequest("/status", context(dir), at);
    expect(response.status).toBe(500);
  });

  it("returns 404 elsewhere", async () => {
    expect(await handleRequest("/nope", context(tempDir()), at)).toEqual({
      status: 404,
      body: { error: "Not Found" },
    });
  });
});
