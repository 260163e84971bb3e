/**
 * Price sources for spot, futures and option premiums.
 *
 * `MarketDataProvider` sits in front of a primary and an optional backup
 * source and caches answers for a short TTL. `SimulatedMarket` is the
 * offline source used by dry runs, the demo and the backtester.
 */

import type { Broker } from "./broker.ts";
import { DEFAULT_TIMEZONE, daysBetween, tradingDay, type ExpiryCalendar } from "./calendar.ts";
import type { SimulatedMarketConfig } from "./config.ts";
import { describeError, type Logger } from "./logger.ts";
import { roundTo } from "./metrics.ts";
import type { InstrumentPricer } from "./mock-broker.ts";
import { formatInstrument, parseInstrument, type ContractKind } from "./strikes.ts";

export type OptionKind = Exclude<ContractKind, "FUTURE">;

export interface PriceSource {
  getSpot(): Promise<number | undefined>;
  getFuture(expiry: string): Promise<number | undefined>;
  getOptionPrice(expiry: string, strike: number, kind: OptionKind): Promise<number | undefined>;
}

export function isValidPrice(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

// ---- Synthetic pricing -----------------------------------------------------
/**
 * Intrinsic value plus a time value that shrinks with the square root of the
 * days left and decays exponentially away from the money. Good enough to move
 * premiums in the right direction; not a valuation model.
 */
export function syntheticOptionPrice(
  underlying: number,
  strike: number,
  kind: OptionKind,
  daysToExpiry: number,
  model: Pick<SimulatedMarketConfig, "timeValue" | "moneynessScale">,
): number {
  const intrinsic = kind === "CALL" ? Math.max(underlying - strike, 0) : Math.max(strike - underlying, 0);
  const days = Math.max(daysToExpiry, 0);
  const timeValue =
    model.timeValue * Math.sqrt(days / 30) * Math.exp(-Math.abs(underlying - strike) / model.moneynessScale);
  return roundTo(Math.max(intrinsic + timeValue, 0.05));
}

export function syntheticFuturePrice(spot: number, daysToExpiry: number, carryPct: number): number {
  return roundTo(spot * (1 + (carryPct * Math.max(daysToExpiry, 0)) / 30));
}

// ---- Simulated market ------------------------------------------------------
export class SimulatedMarket implements PriceSource, InstrumentPricer {
  private spot: number;
  /** Pinned clock for replays; null follows the wall clock. */
  private asOf: Date | null;

  constructor(
    private readonly calendar: ExpiryCalendar,
    private readonly model: SimulatedMarketConfig,
    private readonly spotSymbol = "NSE:NIFTY BANK",
    private readonly tz = DEFAULT_TIMEZONE,
    asOf: Date | null = null,
  ) {
    this.spot = model.spot;
    this.asOf = asOf;
  }

  get currentSpot(): number {
    return this.spot;
  }

  setSpot(spot: number, asOf?: Date): void {
    this.spot = spot;
    if (asOf) this.asOf = asOf;
  }

  setClock(asOf: Date): void {
    this.asOf = asOf;
  }

  futurePrice(expiry: string): number {
    return syntheticFuturePrice(this.spot, this.daysLeft(expiry), this.model.futureCarryPct);
  }

  optionPrice(expiry: string, strike: number, kind: OptionKind): number {
    return syntheticOptionPrice(this.futurePrice(expiry), strike, kind, this.daysLeft(expiry), this.model);
  }

  async getSpot(): Promise<number | undefined> {
    return this.spot;
  }

  async getFuture(expiry: string): Promise<number | undefined> {
    return this.futurePrice(expiry);
  }

  async getOptionPrice(expiry: string, strike: number, kind: OptionKind): Promise<number | undefined> {
    return this.optionPrice(expiry, strike, kind);
  }

  priceInstrument(symbol: string): number | undefined {
    if (symbol === this.spotSymbol) return this.spot;
    const parsed = parseInstrument(symbol);
    if (!parsed) return undefined;

    const expiry = this.calendar.monthlyExpiry(parsed.year, parsed.month);
    if (parsed.kind === "FUTURE") return this.futurePrice(expiry);
    if (parsed.strike === null) return undefined;
    return this.optionPrice(expiry, parsed.strike, parsed.kind);
  }

  private daysLeft(expiry: string): number {
    return daysBetween(tradingDay(this.asOf ?? new Date(), this.tz), expiry);
  }
}

// ---- Broker-backed source --------------------------------------------------
export class BrokerPriceSource implements PriceSource {
  constructor(
    private readonly broker: Broker,
    private readonly underlying: string,
    private readonly spotSymbol: string,
  ) {}

  getSpot(): Promise<number | undefined> {
    return this.broker.getLtp(this.spotSymbol);
  }

  getFuture(expiry: string): Promise<number | undefined> {
    return this.broker.getLtp(formatInstrument({ underlying: this.underlying, kind: "FUTURE", expiry, strike: null }));
  }

  getOptionPrice(expiry: string, strike: number, kind: OptionKind): Promise<number | undefined> {
    return this.broker.getLtp(formatInstrument({ underlying: this.underlying, kind, expiry, strike }));
  }
}

// ---- Provider with fallback and cache --------------------------------------
export interface NamedSource {
  name: string;
  source: PriceSource;
}

interface CacheEntry {
  value: number;
  at: number;
}

export class MarketDataProvider implements PriceSource {
  private cache = new Map<string, CacheEntry>();

  constructor(
    private readonly primary: NamedSource,
    private readonly backup: NamedSource | null,
    private readonly ttlMs: number,
    private readonly logger: Logger,
    private readonly clock: () => number = Date.now,
  ) {}

  getSpot(): Promise<number | undefined> {
    return this.lookup("spot", (source) => source.getSpot());
  }

  getFuture(expiry: string): Promise<number | undefined> {
    return this.lookup(`future:${expiry}`, (source) => source.getFuture(expiry));
  }

  getOptionPrice(expiry: string, strike: number, kind: OptionKind): Promise<number | undefined> {
    return this.lookup(`option:${expiry}:${strike}:${kind}`, (source) => source.getOptionPrice(expiry, strike, kind));
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async lookup(
    key: string,
    fetch: (source: PriceSource) => Promise<number | undefined>,
  ): Promise<number | undefined> {
    const cached = this.cache.get(key);
    if (cached && this.clock() - cached.at < this.ttlMs) {
      return cached.value;
    }

    for (const named of [this.primary, this.backup]) {
      if (!named) continue;
      try {
        const value = await fetch(named.source);
        if (isValidPrice(value)) {
          this.cache.set(key, { value, at: this.clock() });
          return value;
        }
        this.logger.debug(`${named.name} returned no price for ${key}`);
      } catch (error) {
        this.logger.warn(`${named.name} failed for ${key}: ${describeError(error)}`);
      }
    }

    this.logger.warn(`No price available for ${key}`);
    return undefined;
  }
}
