import { describe, expect, it, vi } from "vitest";
import { LegBook } from "./legs.ts";
import { Logger } from "./logger.ts";
import { PricingAdapter } from "./pricing.ts";
import { FakePriceSource } from "./test-fixtures.ts";

const at = new Date("2025-10-28T09:30:00Z");

describe("PricingAdapter", () => {
  it("routes futures and options to the right lookup", async () => {
    const source = new FakePriceSource();
    source.setOption("2025-11-25", 44600, "PUT", 180);
    const pricing = new PricingAdapter(source, Logger.silent());

    expect(await pricing.quote({ kind: "FUTURE", strike: null, expiry: "2025-11-25" })).toBe(45090);
    expect(await pricing.quote({ kind: "PUT", strike: 44600, expiry: "2025-11-25" })).toBe(180);
    expect(await pricing.quote({ kind: "CALL", strike: null, expiry: "2025-11-25" })).toBeUndefined();
  });

  it("turns lookup errors into missing prices", async () => {
    const source = new FakePriceSource();
    vi.spyOn(source, "getSpot").mockRejectedValue(new Error("timeout"));
    const pricing = new PricingAdapter(source, Logger.silent());
    expect(await pricing.spot()).toBeUndefined();
  });

  it("keeps the last price of legs without a quote", async () => {
    const source = new FakePriceSource();
    const book = new LegBook();
    const call = book.open(
      {
        instrument: "BANKNIFTY25NOV45600CE",
        kind: "CALL",
        strike: 45600,
        expiry: "2025-11-25",
        direction: "LONG",
        quantity: 1,
        role: "CORE_CALL_LONG",
      },
      90,
      at,
    );
    const put = book.open(
      {
        instrument: "BANKNIFTY25NOV44600PE",
        kind: "PUT",
        strike: 44600,
        expiry: "2025-11-25",
        direction: "SHORT",
        quantity: 1,
        role: "CORE_PUT_SHORT",
      },
      150,
      at,
    );
    source.setOption("2025-11-25", 44600, "PUT", undefined);

    const result = await new PricingAdapter(source, Logger.silent()).refresh(book);

    expect(result).toEqual({ updated: 1, stale: ["BANKNIFTY25NOV44600PE"] });
    expect(book.get(call.id)?.currentPrice).toBe(100);
    expect(book.get(put.id)?.currentPrice).toBe(150);
  });
});
