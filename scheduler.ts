/**
 * Cron-driven driver for the strategy. Each monitor tick first advances the
 * running cycle, then, when no cycle is running, tries an entry (which only
 * succeeds on an expiry day inside the entry window). Doing both in one job
 * lets the 15:00 tick close the old cycle and open the next one in order.
 */

import cron, { type ScheduledTask } from "node-cron";
import { isMarketOpen, isNearTime, parseClock, tradingDay } from "./calendar.ts";
import { describeError } from "./logger.ts";
import type { StrategyRuntime } from "./runtime.ts";
import type { SandwichStrategy } from "./sandwich.ts";

export type SchedulerDependencies = Pick<
  StrategyRuntime,
  "config" | "calendar" | "journal" | "notifier" | "logger" | "createStrategy"
>;

function weekdayCron(hhmm: string): string {
  const minutes = parseClock(hhmm);
  return `${minutes % 60} ${Math.floor(minutes / 60)} * * 1-5`;
}

export class StrategyScheduler {
  private strategy: SandwichStrategy | null = null;
  private tasks: ScheduledTask[] = [];
  private busy = false;

  constructor(private readonly deps: SchedulerDependencies) {}

  get activeStrategy(): SandwichStrategy | null {
    return this.strategy;
  }

  start(): void {
    const { config, logger } = this.deps;
    const timezone = config.strategy.timezone;

    this.tasks = [
      cron.schedule(
        config.schedule.monitorCron,
        async () => {
          await this.runJob("monitor", (now) => this.monitorTick(now));
        },
        { timezone },
      ),
      cron.schedule(
        weekdayCron(config.schedule.summaryTime),
        async () => {
          await this.runJob("summary", (now) => this.dailySummary(now));
        },
        { timezone },
      ),
    ];

    logger.info(
      `Scheduler started: entry window ${config.strategy.entryTime}, monitor "${config.schedule.monitorCron}", summary ${config.schedule.summaryTime} (${timezone})`,
    );
  }

  stop(): void {
    for (const task of this.tasks) task.stop();
    this.tasks = [];
    this.deps.logger.info("Scheduler stopped");
  }

  /**
   * Runs one job unless another is still in flight, so calls into the
   * strategy never overlap.
   */
  async runJob(name: string, job: (now: Date) => Promise<void>, now: Date = new Date()): Promise<void> {
    if (this.busy) {
      this.deps.logger.warn(`Skipping ${name}: previous job still running`);
      return;
    }
    this.busy = true;
    try {
      await job(now);
    } catch (e) {
      this.deps.logger.error(`${name} job failed:`, describeError(e));
      await this.deps.notifier.notify({ type: "ERROR", message: `${name} job failed: ${describeError(e)}` });
    } finally {
      this.busy = false;
    }
  }

  async checkAndEnter(now: Date = new Date()): Promise<boolean> {
    const { calendar, config, logger } = this.deps;
    const state = this.strategy?.currentState;
    if (state !== undefined && state !== "IDLE" && state !== "CLOSED") {
      logger.info(`Cycle already running (${state}); entry skipped`);
      return false;
    }

    const { timezone, entryTime, timeToleranceMinutes } = config.strategy;
    const today = tradingDay(now, timezone);
    if (!calendar.isExpiryDay(today) || !isNearTime(now, entryTime, timeToleranceMinutes, timezone)) {
      logger.debug(`${today}: outside the entry window`);
      return false;
    }

    const strategy = this.deps.createStrategy();
    const entered = await strategy.enter({}, now);
    if (entered) {
      this.strategy = strategy;
      await this.deps.journal.writeStatus(strategy.getMetrics(now), now);
    }
    return entered;
  }

  async monitorTick(now: Date = new Date()): Promise<void> {
    const { config } = this.deps;
    if (!isMarketOpen(now, config.schedule.marketOpen, config.schedule.marketClose, config.strategy.timezone)) {
      return;
    }
    if (this.strategy) {
      await this.strategy.monitor(now);
      await this.deps.journal.writeStatus(this.strategy.getMetrics(now), now);
    }
    await this.checkAndEnter(now);
  }

  async dailySummary(now: Date = new Date()): Promise<void> {
    if (!this.strategy) {
      this.deps.logger.info("Daily summary: no strategy cycle yet");
      return;
    }
    this.strategy.logMetrics(now);
    const metrics = this.strategy.getMetrics(now);
    await this.deps.journal.writeStatus(metrics, now);
    await this.deps.notifier.notify({ type: "SUMMARY", metrics });
  }
}
