import { beforeEach, describe, expect, it } from "vitest";
import { atExchangeTime } from "./calendar.ts";
import { createDefaultConfig, type StrategySettings } from "./config.ts";
import { SandwichStrategy } from "./sandwich.ts";
import { FakePriceSource, RecordingBroker, RecordingNotifier } from "./test-fixtures.ts";

const ENTRY = atExchangeTime("2025-10-28", "15:00");
const at = (day: string, hhmm = "15:00") => atExchangeTime(day, hhmm);

function openStrikes(strategy: SandwichStrategy): Record<string, number | null> {
  return Object.fromEntries(strategy.getOpenLegs().map((leg) => [leg.role, leg.strike]));
}

describe("SandwichStrategy", () => {
  let prices: FakePriceSource;
  let broker: RecordingBroker;
  let notifier: RecordingNotifier;

  function makeStrategy(settings: Partial<StrategySettings> = {}): SandwichStrategy {
    const config = createDefaultConfig();
    return new SandwichStrategy({
      // wide enough that the loss alert stays quiet unless a test narrows it
      settings: { ...config.strategy, capital: 200_000, ...settings },
      params: config.sandwich,
      prices,
      broker,
      notifier,
    });
  }

  beforeEach(() => {
    prices = new FakePriceSource();
    broker = new RecordingBroker();
    notifier = new RecordingNotifier();
  });

  describe("entry", () => {
    it("opens seven legs against the next expiry", async () => {
      const strategy = makeStrategy();
      expect(await strategy.enter({ force: true }, ENTRY)).toBe(true);

      expect(strategy.currentState).toBe("ACTIVE");
      expect(openStrikes(strategy)).toEqual({
        CORE_FUTURE: null,
        CORE_CALL_LONG: 45600,
        CORE_PUT_SHORT: 44600,
        OUTER_CALL_SHORT: 47000,
        OUTER_CALL_LONG: 47500,
        OUTER_PUT_SHORT: 43000,
        OUTER_PUT_LONG: 42500,
      });
      expect(strategy.getContext()).toMatchObject({
        referenceSpot: 45000,
        referenceFuture: 45090,
        monthType: "SHORT",
        currentExpiry: "2025-10-28",
        nextExpiry: "2025-11-25",
        entryDay: "2025-10-28",
      });
      expect(strategy.getOpenLegs().find((leg) => leg.role === "CORE_FUTURE")?.entryPrice).toBe(45090);
    });

    it("sends orders in units with the right sides", async () => {
      const strategy = makeStrategy();
      await strategy.enter({ force: true }, ENTRY);

      expect(broker.orders.map((o) => [o.symbol, o.side, o.quantity])).toEqual([
        ["BANKNIFTY25NOVFUT", "SELL", 35],
        ["BANKNIFTY25NOV45600CE", "BUY", 35],
        ["BANKNIFTY25NOV44600PE", "SELL", 35],
        ["BANKNIFTY25NOV47000CE", "SELL", 70],
        ["BANKNIFTY25NOV47500CE", "BUY", 70],
        ["BANKNIFTY25NOV43000PE", "SELL", 70],
        ["BANKNIFTY25NOV42500PE", "BUY", 70],
      ]);
      expect(notifier.events.map((e) => e.type)).toEqual(["ENTRY"]);
    });

    it("waits for the expiry day and the entry window", async () => {
      const strategy = makeStrategy();
      expect(await strategy.enter({}, at("2025-10-27"))).toBe(false);
      expect(await strategy.enter({}, at("2025-10-28", "12:00"))).toBe(false);
      expect(await strategy.enter({}, at("2025-10-28", "15:03"))).toBe(true);
    });

    it("refuses a future below spot", async () => {
      prices.future = 44990;
      const strategy = makeStrategy();
      expect(await strategy.enter({ force: true }, ENTRY)).toBe(false);
      expect(strategy.currentState).toBe("IDLE");
      expect(strategy.getLegs()).toHaveLength(0);
      expect(broker.orders).toHaveLength(0);
    });

    it("sends nothing when a leg has no quote", async () => {
      prices.setOption("2025-11-25", 47500, "CALL", undefined);
      const strategy = makeStrategy();
      expect(await strategy.enter({ force: true }, ENTRY)).toBe(false);
      expect(broker.orders).toHaveLength(0);
    });

    it("takes reference prices from the options when given", async () => {
      prices.spot = undefined;
      prices.future = undefined;
      const strategy = makeStrategy();
      expect(await strategy.enter({ force: true, spot: 46000, future: 46100 }, ENTRY)).toBe(true);
      expect(strategy.getContext()?.referenceFuture).toBe(46100);
      expect(openStrikes(strategy).CORE_CALL_LONG).toBe(46600);
    });

    it("keeps quoted prices when the broker throws", async () => {
      broker.throwOnOrder = true;
      const strategy = makeStrategy();
      expect(await strategy.enter({ force: true }, ENTRY)).toBe(true);
      expect(strategy.getOpenLegs().map((leg) => leg.entryPrice)).toEqual([45090, 100, 100, 100, 100, 100, 100]);
    });

    it("enters only once", async () => {
      const strategy = makeStrategy();
      await strategy.enter({ force: true }, ENTRY);
      expect(await strategy.enter({ force: true }, ENTRY)).toBe(false);
      expect(broker.orders).toHaveLength(7);
    });
  });

  describe("full cycle", () => {
    it("walks through every defense and closes on the next expiry", async () => {
      const strategy = makeStrategy();
      await strategy.enter({ force: true }, ENTRY);

      // passive window
      prices.spot = 45400;
      await strategy.monitor(at("2025-11-03"));
      expect(strategy.currentState).toBe("ACTIVE");

      // losing rally after two weeks
      prices.spot = 46600;
      prices.future = 50090;
      await strategy.monitor(at("2025-11-12"));
      expect(strategy.currentState).toBe("DEFENSE_1");
      expect(openStrikes(strategy)).toMatchObject({
        CORE_PUT_SHORT: 45100,
        OUTER_PUT_SHORT: 45000,
        OUTER_PUT_LONG: 44500,
      });
      expect(strategy.getLegs()).toHaveLength(10);
      expect(strategy.getOpenLegs()).toHaveLength(7);
      expect(broker.orders).toHaveLength(13);

      await strategy.monitor(at("2025-11-12", "15:02"));
      expect(broker.orders).toHaveLength(13);

      // too soon for the second defense
      await strategy.monitor(at("2025-11-14"));
      expect(strategy.currentState).toBe("DEFENSE_1");

      prices.spot = 45300;
      await strategy.monitor(at("2025-11-17"));
      expect(strategy.currentState).toBe("DEFENSE_2");
      expect(openStrikes(strategy)).toMatchObject({ OUTER_PUT_SHORT: 46000, OUTER_PUT_LONG: 45500 });

      // expiry-week Monday above the outer call
      prices.spot = 47100;
      await strategy.monitor(at("2025-11-24"));
      expect(strategy.currentState).toBe("STRADDLE");
      expect(openStrikes(strategy)).toMatchObject({ OUTER_PUT_SHORT: 47000, OUTER_PUT_LONG: 46500 });
      expect(broker.orders).toHaveLength(21);

      await strategy.monitor(at("2025-11-25"));
      expect(strategy.currentState).toBe("CLOSED");
      expect(broker.orders).toHaveLength(28);

      const metrics = strategy.getMetrics(at("2025-11-25"));
      expect(metrics).toMatchObject({
        state: "CLOSED",
        openLegCount: 0,
        closedLegCount: 14,
        realizedPnl: -5000,
        netPnl: -5000,
        adjustmentCount: 3,
        lastAdjustmentDay: "2025-11-24",
        exitReason: "FINAL_EXPIRY",
        daysSinceEntry: 28,
      });
      expect(notifier.events.map((e) => e.type)).toEqual(["ENTRY", "ADJUSTMENT", "ADJUSTMENT", "ADJUSTMENT", "EXIT"]);

      await strategy.monitor(at("2025-11-26"));
      expect(broker.orders).toHaveLength(28);
    });

    it("skips an adjustment whose new legs cannot be quoted", async () => {
      const strategy = makeStrategy();
      await strategy.enter({ force: true }, ENTRY);

      prices.setOption("2025-11-25", 45100, "PUT", undefined);
      prices.spot = 46600;
      prices.future = 50090;
      await strategy.monitor(at("2025-11-12"));

      expect(strategy.currentState).toBe("ACTIVE");
      expect(broker.orders).toHaveLength(7);
      expect(strategy.getContext()?.lastAdjustmentDay).toBeNull();
    });
  });

  describe("exits and alerts", () => {
    it("takes profit ahead of the calendar close", async () => {
      const strategy = makeStrategy({ capital: 10_000 });
      await strategy.enter({ force: true }, ENTRY);

      prices.future = 43890;
      await strategy.monitor(at("2025-11-25"));

      const metrics = strategy.getMetrics(at("2025-11-25"));
      expect(metrics.state).toBe("CLOSED");
      expect(metrics.exitReason).toBe("PROFIT_TARGET");
      expect(metrics.realizedPnl).toBe(1200);
      expect(metrics.netPnlPct).toBe(12);
    });

    it("takes profit after a defense as well", async () => {
      const strategy = makeStrategy({ capital: 10_000 });
      await strategy.enter({ force: true }, ENTRY);

      prices.spot = 46600;
      prices.future = 50090;
      await strategy.monitor(at("2025-11-12"));
      expect(strategy.currentState).toBe("DEFENSE_1");

      prices.future = 43890;
      await strategy.monitor(at("2025-11-17"));

      const metrics = strategy.getMetrics(at("2025-11-17"));
      expect(metrics.state).toBe("CLOSED");
      expect(metrics.exitReason).toBe("PROFIT_TARGET");
      expect(metrics.realizedPnl).toBe(1200);
      expect(metrics.openLegCount).toBe(0);
    });

    it("closes a cycle found past its expiry", async () => {
      const strategy = makeStrategy();
      await strategy.enter({ force: true }, ENTRY);
      await strategy.monitor(at("2025-11-26", "10:00"));
      expect(strategy.getMetrics(at("2025-11-26")).exitReason).toBe("EXPIRED");
    });

    it("raises a risk alert once per day", async () => {
      const strategy = makeStrategy({ capital: 100_000 });
      await strategy.enter({ force: true }, ENTRY);

      prices.future = 50590;
      await strategy.monitor(at("2025-11-03"));
      await strategy.monitor(at("2025-11-03", "15:04"));

      const alerts = notifier.events.filter((e) => e.type === "RISK_ALERT");
      expect(alerts).toHaveLength(1);
      const [alert] = alerts;
      if (alert.type !== "RISK_ALERT") throw new Error("expected a risk alert");
      expect(alert.message).toBe("Net loss -5500.00 pts in ACTIVE");
      expect(alert.netPnlPct).toBeCloseTo(-5.5, 10);
    });

    it("keeps the last spot when the feed drops out", async () => {
      const strategy = makeStrategy();
      await strategy.enter({ force: true }, ENTRY);
      prices.spot = 45500;
      await strategy.monitor(at("2025-11-03"));
      prices.spot = undefined;
      await strategy.monitor(at("2025-11-04"));
      expect(strategy.getMetrics(at("2025-11-04")).rallyPoints).toBe(500);
    });

    it("ignores monitor calls before entry", async () => {
      const strategy = makeStrategy();
      await strategy.monitor(at("2025-11-03"));
      expect(strategy.currentState).toBe("IDLE");
      expect(broker.orders).toHaveLength(0);
    });
  });
});
