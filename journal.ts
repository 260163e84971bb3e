/**
 * On-disk trade journal and status snapshot under the data dir.
 * Trade files are named after the exchange-local trading day.
 */

import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { DEFAULT_TIMEZONE, tradingDay } from "./calendar.ts";
import { describeError, Logger } from "./logger.ts";
import type { StrategyMetrics } from "./metrics.ts";

export interface TradeRecord {
  action: "OPEN" | "CLOSE";
  legId: number;
  role: string;
  instrument: string;
  side: "BUY" | "SELL";
  lots: number;
  units: number;
  price: number;
  orderId: string | null;
  orderStatus: string;
  reason: string;
}

export interface StatusSnapshot {
  updatedAt: string;
  metrics: StrategyMetrics;
}

export class TradeJournal {
  constructor(
    private readonly dataDir: string,
    private readonly enabled: boolean,
    private readonly logger: Logger = Logger.silent(),
    private readonly timezone: string = DEFAULT_TIMEZONE,
  ) {}

  tradeFile(day: string): string {
    return join(this.dataDir, `trades_${day}.json`);
  }

  get statusFile(): string {
    return join(this.dataDir, "status.json");
  }

  async recordTrade(trade: TradeRecord, at: Date = new Date()): Promise<void> {
    if (!this.enabled) return;

    try {
      await this.ensureDir();
      const filename = this.tradeFile(tradingDay(at, this.timezone));
      const existing = await this.readTradeFile(filename);
      existing.push({ ...trade, timestamp: at.toISOString() });
      await writeFile(filename, JSON.stringify(existing, null, 2));
    } catch (e) {
      this.logger.error("Failed to save trade data:", describeError(e));
    }
  }

  async readTrades(day: string): Promise<unknown[]> {
    return this.readTradeFile(this.tradeFile(day));
  }

  async writeStatus(metrics: StrategyMetrics, at: Date = new Date()): Promise<void> {
    try {
      await this.ensureDir();
      const snapshot: StatusSnapshot = { updatedAt: at.toISOString(), metrics };
      await writeFile(this.statusFile, JSON.stringify(snapshot, null, 2));
    } catch (e) {
      this.logger.error("Failed to write status:", describeError(e));
    }
  }

  async readStatus(): Promise<unknown> {
    if (!existsSync(this.statusFile)) return null;
    const parsed: unknown = JSON.parse(await readFile(this.statusFile, "utf8"));
    return parsed;
  }

  private async readTradeFile(filename: string): Promise<unknown[]> {
    if (!existsSync(filename)) return [];
    const parsed: unknown = JSON.parse(await readFile(filename, "utf8"));
    return Array.isArray(parsed) ? parsed : [];
  }

  private async ensureDir(): Promise<void> {
    if (!existsSync(this.dataDir)) {
      await mkdir(this.dataDir, { recursive: true });
    }
  }
}
