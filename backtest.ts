/**
 * Backtesting engine for the sandwich strategy
 *
 * Replays monthly cycles over a synthetic spot path: enter on each monthly
 * expiry in the window, monitor once per trading day at the exit time, and
 * let the strategy's own exit rules close the cycle.
 */

import minimist from "minimist";
import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import type { ExitReason } from "./adjustments.ts";
import { ExpiryCalendar, addDays, atExchangeTime, type MonthType } from "./calendar.ts";
import { createDefaultConfig, type BotConfig } from "./config.ts";
import { Logger, runMain } from "./logger.ts";
import { SimulatedMarket } from "./market-data.ts";
import { roundTo, type LifecycleState } from "./metrics.ts";
import { MockBroker } from "./mock-broker.ts";
import { createRng, normal, type Rng } from "./random.ts";
import { SandwichStrategy } from "./sandwich.ts";

// ---- Backtesting Configuration --------------------------------------------
export interface BacktestConfig {
  startDate: string;
  endDate: string;
  capital: number;
  seed: number;
  startSpot: number;
  /** Daily log-return standard deviation. */
  dailyVolatility: number;
  /** Daily log-return drift. */
  drift: number;
  dataSource: "mock";
}

export interface SpotBar {
  date: string;
  spot: number;
}

export interface CycleResult {
  entryDate: string;
  nextExpiry: string;
  exitDate: string | null;
  monthType: MonthType | null;
  entered: boolean;
  entrySpot: number;
  entryFuture: number | null;
  /** Furthest state reached before closing. */
  peakState: LifecycleState;
  finalState: LifecycleState;
  exitReason: ExitReason | null;
  adjustments: number;
  legsTraded: number;
  realizedPnl: number;
  netPnlPct: number;
}

export interface BacktestMetrics {
  cycles: number;
  enteredCycles: number;
  winners: number;
  winRate: number;
  totalPnl: number;
  averagePnl: number;
  bestCycle: number;
  worstCycle: number;
  /** Largest peak-to-trough fall of cumulative P&L, in points. */
  maxDrawdown: number;
  exitReasons: Record<string, number>;
  peakStates: Record<string, number>;
}

export interface BacktestResult {
  config: BacktestConfig;
  cycles: CycleResult[];
  metrics: BacktestMetrics;
}

// ---- Mock Data Generator ---------------------------------------------------
export class MockDataGenerator {
  private rng: Rng;

  constructor(seed = 42) {
    this.rng = createRng(seed);
  }

  /** Weekday-only geometric random walk, inclusive of both ends. */
  generateSpotPath(startDate: string, endDate: string, startSpot: number, volatility: number, drift: number): SpotBar[] {
    const bars: SpotBar[] = [];
    let spot = startSpot;
    let day = startDate;

    while (day <= endDate) {
      const dow = new Date(`${day}T00:00:00Z`).getUTCDay();
      if (dow !== 0 && dow !== 6) {
        if (bars.length > 0) {
          spot *= Math.exp(drift + volatility * normal(this.rng));
        }
        bars.push({ date: day, spot: roundTo(spot) });
      }
      day = addDays(day, 1);
    }

    return bars;
  }
}

// ---- Engine ----------------------------------------------------------------
export class BacktestEngine {
  private readonly calendar = new ExpiryCalendar();
  private readonly botConfig: BotConfig;

  constructor(
    private readonly config: BacktestConfig,
    botConfig: BotConfig = createDefaultConfig(),
    private readonly logger: Logger = Logger.silent(),
  ) {
    this.botConfig = {
      ...botConfig,
      strategy: { ...botConfig.strategy, capital: config.capital },
    };
  }

  async runBacktest(): Promise<BacktestResult> {
    const entries = this.calendar.expiriesBetween(this.config.startDate, this.config.endDate);
    const lastDay = entries.length > 0 ? this.calendar.nextMonthlyExpiry(entries[entries.length - 1]) : this.config.endDate;

    const generator = new MockDataGenerator(this.config.seed);
    const bars = generator.generateSpotPath(
      this.config.startDate,
      lastDay,
      this.config.startSpot,
      this.config.dailyVolatility,
      this.config.drift,
    );
    const spotByDay = new Map(bars.map((bar) => [bar.date, bar.spot]));

    const cycles: CycleResult[] = [];
    for (const entryDate of entries) {
      const nextExpiry = this.calendar.nextMonthlyExpiry(entryDate);
      const cycleBars = bars.filter((bar) => bar.date > entryDate && bar.date <= nextExpiry);
      const entrySpot = spotByDay.get(entryDate);
      if (entrySpot === undefined) {
        this.logger.warn(`No spot for ${entryDate}; cycle skipped`);
        continue;
      }
      cycles.push(await this.runCycle(entryDate, nextExpiry, entrySpot, cycleBars));
    }

    return { config: this.config, cycles, metrics: this.calculateMetrics(cycles) };
  }

  private async runCycle(entryDate: string, nextExpiry: string, entrySpot: number, bars: SpotBar[]): Promise<CycleResult> {
    const { strategy: settings, sandwich, marketData, broker: brokerConfig } = this.botConfig;

    let now = atExchangeTime(entryDate, settings.entryTime, settings.timezone);
    const market = new SimulatedMarket(
      this.calendar,
      { ...marketData.simulated, spot: entrySpot },
      settings.spotSymbol,
      settings.timezone,
      now,
    );
    const broker = new MockBroker(market, { slippagePct: brokerConfig.slippagePct, seed: brokerConfig.seed });
    const strategy = new SandwichStrategy({
      settings,
      params: sandwich,
      prices: market,
      broker,
      calendar: this.calendar,
      logger: this.logger,
    });

    const entered = await strategy.enter({ currentExpiry: entryDate, nextExpiry }, now);
    let peakState: LifecycleState = strategy.currentState;

    if (entered) {
      for (const bar of bars) {
        now = atExchangeTime(bar.date, settings.exitTime, settings.timezone);
        market.setSpot(bar.spot, now);
        await strategy.monitor(now);
        if (strategy.currentState === "CLOSED") break;
        peakState = strategy.currentState;
      }
    }

    const metrics = strategy.getMetrics(now);
    const legs = strategy.getLegs();
    const closedAt = legs.map((leg) => leg.closedAt).filter((at): at is string => at !== null).sort();
    const context = strategy.getContext();

    return {
      entryDate,
      nextExpiry,
      exitDate: metrics.state === "CLOSED" && closedAt.length > 0 ? closedAt[closedAt.length - 1].split("T")[0] : null,
      monthType: metrics.monthType,
      entered,
      entrySpot,
      entryFuture: context?.referenceFuture ?? null,
      peakState,
      finalState: metrics.state,
      exitReason: context?.exitReason ?? null,
      adjustments: metrics.adjustmentCount,
      legsTraded: legs.length,
      realizedPnl: metrics.realizedPnl,
      netPnlPct: metrics.netPnlPct,
    };
  }

  calculateMetrics(cycles: CycleResult[]): BacktestMetrics {
    const traded = cycles.filter((cycle) => cycle.entered);
    const pnls = traded.map((cycle) => cycle.realizedPnl);
    const totalPnl = pnls.reduce((sum, pnl) => sum + pnl, 0);
    const winners = pnls.filter((pnl) => pnl > 0).length;

    let cumulative = 0;
    let peak = 0;
    let maxDrawdown = 0;
    for (const pnl of pnls) {
      cumulative += pnl;
      if (cumulative > peak) peak = cumulative;
      maxDrawdown = Math.max(maxDrawdown, peak - cumulative);
    }

    const exitReasons: Record<string, number> = {};
    const peakStates: Record<string, number> = {};
    for (const cycle of traded) {
      const reason = cycle.exitReason ?? "OPEN";
      exitReasons[reason] = (exitReasons[reason] ?? 0) + 1;
      peakStates[cycle.peakState] = (peakStates[cycle.peakState] ?? 0) + 1;
    }

    return {
      cycles: cycles.length,
      enteredCycles: traded.length,
      winners,
      winRate: traded.length > 0 ? winners / traded.length : 0,
      totalPnl: roundTo(totalPnl),
      averagePnl: traded.length > 0 ? roundTo(totalPnl / traded.length) : 0,
      bestCycle: pnls.length > 0 ? Math.max(...pnls) : 0,
      worstCycle: pnls.length > 0 ? Math.min(...pnls) : 0,
      maxDrawdown: roundTo(maxDrawdown),
      exitReasons,
      peakStates,
    };
  }

  async saveResults(results: BacktestResult, dataDir = this.botConfig.logging.dataDir): Promise<void> {
    if (!existsSync(dataDir)) {
      await mkdir(dataDir, { recursive: true });
    }

    const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
    const filename = `${dataDir}/backtest_${timestamp}.json`;

    await writeFile(filename, JSON.stringify(results, null, 2));
    console.log(`Results saved to: ${filename}`);

    const summaryFilename = `${dataDir}/backtest_summary_${timestamp}.txt`;
    await writeFile(summaryFilename, generateSummaryReport(results, this.botConfig.strategy.lotSize));
    console.log(`Summary saved to: ${summaryFilename}`);
  }
}

export function generateSummaryReport(results: BacktestResult, lotSize: number): string {
  const { metrics, config, cycles } = results;
  const counts = (record: Record<string, number>) =>
    Object.entries(record)
      .map(([key, count]) => `${key}: ${count}`)
      .join(", ") || "none";

  return `
BACKTEST SUMMARY REPORT
=======================

Configuration:
- Start Date: ${config.startDate}
- End Date: ${config.endDate}
- Capital: ${config.capital.toLocaleString()} pts
- Seed: ${config.seed}
- Start Spot: ${config.startSpot}
- Daily Volatility: ${(config.dailyVolatility * 100).toFixed(2)}%

Performance (index points x lots; x${lotSize} for rupees):
- Cycles: ${metrics.cycles} (${metrics.enteredCycles} entered)
- Total P&L: ${metrics.totalPnl.toFixed(2)}
- Average P&L: ${metrics.averagePnl.toFixed(2)}
- Win Rate: ${(metrics.winRate * 100).toFixed(1)}%
- Best / Worst Cycle: ${metrics.bestCycle.toFixed(2)} / ${metrics.worstCycle.toFixed(2)}
- Max Drawdown: ${metrics.maxDrawdown.toFixed(2)}
- Exit Reasons: ${counts(metrics.exitReasons)}
- Deepest Stage: ${counts(metrics.peakStates)}

Cycles:
${cycles
  .map(
    (c) =>
      `${c.entryDate} -> ${c.exitDate ?? "open"} ${c.monthType ?? "-"} ${c.peakState} ${c.exitReason ?? "-"} ` +
      `adj=${c.adjustments} pnl=${c.realizedPnl.toFixed(2)}`,
  )
  .join("\n")}
`;
}

// ---- CLI Interface ---------------------------------------------------------
async function main(): Promise<void> {
  const flags = minimist(process.argv.slice(2), {
    string: ["start-date", "end-date", "capital", "seed", "spot", "volatility"],
    boolean: ["help", "verbose"],
    default: {
      "start-date": "2024-01-01",
      "end-date": "2024-12-31",
      capital: "4000",
      seed: "42",
      spot: "45000",
      volatility: "0.012",
    },
  });

  if (flags.help) {
    console.log(`
Sandwich Strategy Backtester

Usage: tsx backtest.ts [options]

Options:
  --start-date       First entry date considered (YYYY-MM-DD)
  --end-date         Last entry date considered (YYYY-MM-DD)
  --capital          Capital in index points x lots, the base of P&L percentages
  --seed             Random seed for the spot path
  --spot             Starting spot level
  --volatility       Daily volatility of the spot path (e.g. 0.012)
  --verbose          Log every strategy action
  --help             Show this help message

Example:
  tsx backtest.ts --start-date 2024-01-01 --end-date 2024-06-30 --seed 7
`);
    return;
  }

  const config: BacktestConfig = {
    startDate: String(flags["start-date"]),
    endDate: String(flags["end-date"]),
    capital: Number(flags.capital),
    seed: Number(flags.seed),
    startSpot: Number(flags.spot),
    dailyVolatility: Number(flags.volatility),
    drift: 0,
    dataSource: "mock",
  };

  console.log("Starting backtest with configuration:");
  console.log(JSON.stringify(config, null, 2));

  const logger = flags.verbose ? new Logger("backtest", { level: "INFO" }) : Logger.silent();
  const engine = new BacktestEngine(config, createDefaultConfig(), logger);
  const results = await engine.runBacktest();

  console.log("\nBacktest completed!");
  console.log(`Cycles: ${results.metrics.cycles}`);
  console.log(`Total P&L: ${results.metrics.totalPnl.toFixed(2)} pts`);
  console.log(`Win Rate: ${(results.metrics.winRate * 100).toFixed(1)}%`);
  console.log(`Max Drawdown: ${results.metrics.maxDrawdown.toFixed(2)} pts`);

  await engine.saveResults(results);
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  await runMain(main);
}
