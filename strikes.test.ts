import { describe, expect, it } from "vitest";
import { contractMonthCode, formatInstrument, parseInstrument, roundStrike } from "./strikes.ts";

describe("roundStrike", () => {
  it("snaps to the nearest grid point", () => {
    expect(roundStrike(45090)).toBe(45100);
    expect(roundStrike(44590)).toBe(44600);
    expect(roundStrike(47010)).toBe(47000);
  });

  it("sends exact midpoints to the even multiple", () => {
    expect(roundStrike(45050)).toBe(45000);
    expect(roundStrike(45150)).toBe(45200);
  });

  it("returns a rounded strike unchanged", () => {
    for (const value of [45090, 45050, 45150, 44949.99, 47000, -250, 0]) {
      const once = roundStrike(value);
      expect(roundStrike(once)).toBe(once);
    }
    expect(roundStrike(roundStrike(22025, 50), 50)).toBe(roundStrike(22025, 50));
  });

  it("honours a custom step", () => {
    expect(roundStrike(22030, 50)).toBe(22050);
  });
});

describe("instrument symbols", () => {
  it("builds the month code from the expiry", () => {
    expect(contractMonthCode("2025-11-25")).toBe("25NOV");
    expect(contractMonthCode("2024-01-25")).toBe("24JAN");
  });

  it("formats futures and options", () => {
    expect(formatInstrument({ underlying: "BANKNIFTY", kind: "FUTURE", expiry: "2025-11-25", strike: null })).toBe(
      "BANKNIFTY25NOVFUT",
    );
    expect(formatInstrument({ underlying: "BANKNIFTY", kind: "CALL", expiry: "2025-11-25", strike: 45600 })).toBe(
      "BANKNIFTY25NOV45600CE",
    );
    expect(formatInstrument({ underlying: "BANKNIFTY", kind: "PUT", expiry: "2025-11-25", strike: 43000 })).toBe(
      "BANKNIFTY25NOV43000PE",
    );
  });

  it("rejects an option without a strike", () => {
    expect(() => formatInstrument({ underlying: "BANKNIFTY", kind: "PUT", expiry: "2025-11-25", strike: null })).toThrow(
      "needs a strike",
    );
  });

  it("parses symbols with or without an exchange prefix", () => {
    expect(parseInstrument("NFO:BANKNIFTY25NOV45600PE")).toEqual({
      underlying: "BANKNIFTY",
      year: 2025,
      month: 11,
      kind: "PUT",
      strike: 45600,
    });
    expect(parseInstrument("BANKNIFTY25NOVFUT")).toEqual({
      underlying: "BANKNIFTY",
      year: 2025,
      month: 11,
      kind: "FUTURE",
      strike: null,
    });
  });

  it("returns undefined for anything else", () => {
    expect(parseInstrument("RELIANCE")).toBeUndefined();
    expect(parseInstrument("BANKNIFTY25XYZ45600CE")).toBeUndefined();
  });
});
