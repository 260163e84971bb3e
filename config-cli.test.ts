import minimist from "minimist";
import { describe, expect, it } from "vitest";
import { parseParameterUpdates } from "./config-cli.ts";

describe("parseParameterUpdates", () => {
  it("collects the flags that were given", () => {
    const args = minimist(["set-params", "--profitTarget", "15", "--breadShort", "2200", "--lotSize", "30"]);
    expect(parseParameterUpdates(args)).toEqual({
      sandwich: { profitTargetPct: 0.15, breadDistance: { SHORT: 2200, LONG: 2500 } },
      strategy: { lotSize: 30 },
    });
  });

  it("takes the profit target as a fraction too", () => {
    const args = minimist(["set-params", "--profitTarget", "0.1"]);
    expect(parseParameterUpdates(args).sandwich.profitTargetPct).toBe(0.1);
  });

  it("returns nothing for no flags", () => {
    expect(parseParameterUpdates(minimist(["set-params"]))).toEqual({ sandwich: {}, strategy: {} });
  });

  it("rejects non-numeric values", () => {
    expect(() => parseParameterUpdates(minimist(["set-params", "--capital", "lots"]))).toThrow(
      '--capital must be a number, got "lots"',
    );
  });
});
