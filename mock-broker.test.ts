import { describe, expect, it } from "vitest";
import { MockBroker } from "./mock-broker.ts";

function pricedBroker(prices: Record<string, number>, slippagePct = 0) {
  return new MockBroker({ priceInstrument: (symbol) => prices[symbol] }, { slippagePct, seed: 7 });
}

describe("MockBroker", () => {
  it("fills market orders at the current price", async () => {
    const broker = pricedBroker({ BANKNIFTY25NOV45600CE: 100 });
    await broker.connect();
    expect(broker.isConnected()).toBe(true);

    const result = await broker.placeOrder({ symbol: "NFO:BANKNIFTY25NOV45600CE", side: "BUY", quantity: 35 });
    expect(result).toMatchObject({ status: "SUCCESS", orderId: "MOCK000001", price: 100 });
    expect(broker.getOrderCount()).toBe(1);
    expect(await broker.getOrderStatus("MOCK000001")).toEqual({
      orderId: "MOCK000001",
      status: "SUCCESS",
      averagePrice: 100,
      filledQuantity: 35,
      message: "filled",
    });
  });

  it("uses the limit price for limit orders", async () => {
    const broker = pricedBroker({ BANKNIFTY25NOV45600CE: 100 });
    const result = await broker.placeOrder({
      symbol: "BANKNIFTY25NOV45600CE",
      side: "SELL",
      quantity: 35,
      orderType: "LIMIT",
      price: 104.5,
    });
    expect(result.price).toBe(104.5);
  });

  it("rejects bad quantities and unknown symbols", async () => {
    const broker = pricedBroker({});
    expect(await broker.placeOrder({ symbol: "X", side: "BUY", quantity: 0 })).toMatchObject({
      status: "FAILED",
      message: "Invalid quantity: 0",
    });
    expect(await broker.placeOrder({ symbol: "BANKNIFTY25NOV1CE", side: "BUY", quantity: 35 })).toMatchObject({
      status: "FAILED",
      message: "No price for BANKNIFTY25NOV1CE",
    });
    expect(broker.getOrderCount()).toBe(0);
  });

  it("slips buys up and sells down within the configured fraction", async () => {
    const broker = pricedBroker({ BANKNIFTY25NOVFUT: 45000 }, 0.001);
    const buy = await broker.placeOrder({ symbol: "BANKNIFTY25NOVFUT", side: "BUY", quantity: 35 });
    const sell = await broker.placeOrder({ symbol: "BANKNIFTY25NOVFUT", side: "SELL", quantity: 35 });
    expect(buy.price).toBeGreaterThanOrEqual(45000);
    expect(buy.price).toBeLessThanOrEqual(45045);
    expect(sell.price).toBeLessThanOrEqual(45000);
    expect(sell.price).toBeGreaterThanOrEqual(44955);
  });

  it("nets positions and averages entries", async () => {
    const prices: Record<string, number> = { BANKNIFTY25NOV45600CE: 100 };
    const broker = pricedBroker(prices);
    await broker.placeOrder({ symbol: "BANKNIFTY25NOV45600CE", side: "BUY", quantity: 35 });
    prices.BANKNIFTY25NOV45600CE = 120;
    await broker.placeOrder({ symbol: "BANKNIFTY25NOV45600CE", side: "BUY", quantity: 35 });

    expect(await broker.getPositions()).toEqual([
      { symbol: "BANKNIFTY25NOV45600CE", quantity: 70, averagePrice: 110, lastPrice: 120, pnl: 700 },
    ]);

    await broker.placeOrder({ symbol: "BANKNIFTY25NOV45600CE", side: "SELL", quantity: 70 });
    expect(await broker.getPositions()).toEqual([]);
  });

  it("quotes around the last price", async () => {
    const broker = pricedBroker({ "NSE:NIFTY BANK": 100 });
    expect(await broker.getLtp("NSE:NIFTY BANK")).toBe(100);
    expect(await broker.getQuote("NSE:NIFTY BANK")).toMatchObject({ lastPrice: 100, bid: 99.9, ask: 100.1 });
    expect(await broker.getQuote("MISSING")).toBeUndefined();
  });

  it("has nothing to cancel", async () => {
    const broker = pricedBroker({});
    expect(await broker.cancelOrder("MOCK000001")).toBe(false);
    expect(await broker.getOrderStatus("MOCK000099")).toBeUndefined();
  });
});
