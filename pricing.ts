/**
 * Turns price-source lookups into leg prices for the strategy.
 * A missing quote never fails a cycle: the leg keeps its last price.
 */

import type { Leg, LegBook, LegSpec } from "./legs.ts";
import { describeError, type Logger } from "./logger.ts";
import { isValidPrice, type PriceSource } from "./market-data.ts";

export interface RefreshResult {
  updated: number;
  stale: string[];
}

export class PricingAdapter {
  constructor(
    private readonly source: PriceSource,
    private readonly logger: Logger,
  ) {}

  spot(): Promise<number | undefined> {
    return this.safely("spot", () => this.source.getSpot());
  }

  future(expiry: string): Promise<number | undefined> {
    return this.safely(`future ${expiry}`, () => this.source.getFuture(expiry));
  }

  async quote(spec: Pick<LegSpec, "kind" | "strike" | "expiry">): Promise<number | undefined> {
    if (spec.kind === "FUTURE") return this.future(spec.expiry);
    const kind = spec.kind;
    const { strike, expiry } = spec;
    if (strike === null) return undefined;
    return this.safely(`${kind} ${strike} ${expiry}`, () => this.source.getOptionPrice(expiry, strike, kind));
  }

  async refresh(book: LegBook, legs: readonly Leg[] = book.openLegs()): Promise<RefreshResult> {
    const result: RefreshResult = { updated: 0, stale: [] };
    for (const leg of legs) {
      const price = await this.quote(leg);
      if (price === undefined) {
        result.stale.push(leg.instrument);
        continue;
      }
      book.markPrice(leg.id, price);
      result.updated += 1;
    }
    if (result.stale.length > 0) {
      this.logger.warn(`Keeping last price for ${result.stale.length} leg(s): ${result.stale.join(", ")}`);
    }
    return result;
  }

  private async safely(label: string, fetch: () => Promise<number | undefined>): Promise<number | undefined> {
    try {
      const value = await fetch();
      return isValidPrice(value) ? value : undefined;
    } catch (error) {
      this.logger.warn(`Price lookup failed for ${label}: ${describeError(error)}`);
      return undefined;
    }
  }
}
