/**
 * Sandwich strategy controller.
 *
 * Owns the lifecycle state, the entry context and the leg book for one
 * monthly cycle. `enter()` and `monitor()` must be called by one driver at a
 * time (scheduler, backtest loop or test); the controller does no locking.
 *
 *   IDLE -> ACTIVE -> DEFENSE_1 -> DEFENSE_2 -> STRADDLE -> CLOSED
 *
 * CLOSED is reachable from every non-idle state and absorbs.
 */

import {
  evaluateCycle,
  type AdjustmentStage,
  type CycleContext,
  type CycleDecision,
  type ExitReason,
} from "./adjustments.ts";
import type { Broker, OrderResult } from "./broker.ts";
import {
  ExpiryCalendar,
  classifyMonth,
  daysBetween,
  isNearTime,
  tradingDay,
  weekday,
} from "./calendar.ts";
import type { SandwichParameters, StrategySettings } from "./config.ts";
import type { TradeJournal } from "./journal.ts";
import { LegBook, type Leg, type LegSpec } from "./legs.ts";
import { describeError, Logger } from "./logger.ts";
import type { PriceSource } from "./market-data.ts";
import {
  LIFECYCLE_ORDER,
  buildMetrics,
  summarizePnl,
  type LifecycleState,
  type PnlSummary,
  type StrategyMetrics,
} from "./metrics.ts";
import type { Notifier, StrategyEvent } from "./notifications.ts";
import { planEntry, type LegFactory } from "./position-builder.ts";
import { PricingAdapter } from "./pricing.ts";

// ---- Types -----------------------------------------------------------------
export interface StrategyContext extends CycleContext {
  entryAt: string;
  currentExpiry: string;
  adjustmentCount: number;
  exitReason: ExitReason | null;
  lossAlertDay: string | null;
}

export interface EntryOptions {
  /** Skip the expiry-day and entry-time gate. */
  force?: boolean;
  spot?: number;
  future?: number;
  currentExpiry?: string;
  nextExpiry?: string;
}

export interface SandwichDependencies {
  settings: StrategySettings;
  params: SandwichParameters;
  prices: PriceSource;
  broker: Broker;
  calendar?: ExpiryCalendar;
  logger?: Logger;
  notifier?: Notifier;
  journal?: TradeJournal;
}

// ---- Controller ------------------------------------------------------------
export class SandwichStrategy {
  private state: LifecycleState = "IDLE";
  private context: StrategyContext | null = null;
  private lastSpot: number | null = null;
  private readonly book = new LegBook();
  private readonly settings: StrategySettings;
  private readonly params: SandwichParameters;
  private readonly broker: Broker;
  private readonly calendar: ExpiryCalendar;
  private readonly logger: Logger;
  private readonly pricing: PricingAdapter;
  private readonly notifier: Notifier | undefined;
  private readonly journal: TradeJournal | undefined;
  private readonly factory: LegFactory;

  constructor(deps: SandwichDependencies) {
    this.settings = deps.settings;
    this.params = deps.params;
    this.broker = deps.broker;
    this.calendar = deps.calendar ?? new ExpiryCalendar();
    this.logger = deps.logger ?? Logger.silent();
    this.pricing = new PricingAdapter(deps.prices, this.logger);
    this.notifier = deps.notifier;
    this.journal = deps.journal;
    this.factory = { underlying: deps.settings.underlying, strikeStep: deps.settings.strikeStep };
  }

  get currentState(): LifecycleState {
    return this.state;
  }

  getContext(): Readonly<StrategyContext> | null {
    return this.context ? { ...this.context } : null;
  }

  getLegs(): Leg[] {
    return this.book.snapshot();
  }

  getOpenLegs(): Leg[] {
    return this.book.openLegs().map((leg) => ({ ...leg }));
  }

  // ---- Entry ----
  async enter(options: EntryOptions = {}, now: Date = new Date()): Promise<boolean> {
    if (this.state !== "IDLE") {
      this.logger.warn(`Entry ignored: strategy is ${this.state}`);
      return false;
    }

    const tz = this.settings.timezone;
    const today = tradingDay(now, tz);
    const currentExpiry = options.currentExpiry ?? this.calendar.currentExpiry(today);

    if (!options.force) {
      if (today !== currentExpiry) {
        this.logger.info(`Not an expiry day (${today}); next entry on ${this.calendar.upcomingExpiry(today)}`);
        return false;
      }
      if (!isNearTime(now, this.settings.entryTime, this.settings.timeToleranceMinutes, tz)) {
        this.logger.info(`Outside entry window around ${this.settings.entryTime}`);
        return false;
      }
    }

    const nextExpiry = options.nextExpiry ?? this.calendar.nextMonthlyExpiry(currentExpiry);
    const monthType = classifyMonth(currentExpiry, nextExpiry, this.params.longMonthGapDays);

    const spot = options.spot ?? (await this.pricing.spot());
    const future = options.future ?? (await this.pricing.future(nextExpiry));
    if (spot === undefined || future === undefined) {
      this.logger.warn("Entry aborted: spot or future price unavailable");
      return false;
    }

    const plan = planEntry({ spot, future, monthType, expiry: nextExpiry }, this.params, this.factory);
    if (!plan.ok) {
      this.logger.warn(`Entry aborted: ${plan.reason}`);
      return false;
    }

    // price every leg before sending anything
    const priced: Array<{ spec: LegSpec; price: number }> = [];
    for (const spec of plan.legs) {
      const price = spec.kind === "FUTURE" ? future : await this.pricing.quote(spec);
      if (price === undefined) {
        this.logger.warn(`Entry aborted: no quote for ${spec.instrument}`);
        return false;
      }
      priced.push({ spec, price });
    }

    this.logger.info(
      `Entering sandwich: spot=${spot} future=${future} month=${monthType} expiry ${currentExpiry} -> ${nextExpiry}`,
    );

    this.context = {
      referenceSpot: spot,
      referenceFuture: future,
      monthType,
      currentExpiry,
      nextExpiry,
      entryAt: now.toISOString(),
      entryDay: today,
      lastAdjustmentDay: null,
      adjustmentCount: 0,
      exitReason: null,
      lossAlertDay: null,
    };
    this.lastSpot = spot;

    const opened: Leg[] = [];
    for (const { spec, price } of priced) {
      opened.push(await this.openLeg(spec, price, now, "ENTRY"));
    }
    this.transition("ACTIVE");

    await this.emit({
      type: "ENTRY",
      underlying: this.settings.underlying,
      spot,
      future,
      monthType,
      expiry: nextExpiry,
      legs: opened.map((leg) => ({
        instrument: leg.instrument,
        direction: leg.direction,
        quantity: leg.quantity,
        price: leg.entryPrice,
      })),
    });
    this.logMetrics(now);
    return true;
  }

  // ---- Monitoring ----
  async monitor(now: Date = new Date()): Promise<void> {
    const context = this.context;
    if (this.state === "IDLE" || this.state === "CLOSED" || !context) return;

    const tz = this.settings.timezone;
    const today = tradingDay(now, tz);

    const spot = await this.pricing.spot();
    if (spot === undefined) {
      this.logger.warn(`Spot unavailable; using last known ${this.lastSpot}`);
    } else {
      this.lastSpot = spot;
    }
    await this.pricing.refresh(this.book);

    const pnl = summarizePnl(this.book.all(), this.settings.capital);
    const currentSpot = this.lastSpot ?? context.referenceSpot;
    this.logger.debug(
      `[${this.state}] spot=${currentSpot} open=${pnl.totalPnl.toFixed(2)} net=${pnl.netPnl.toFixed(2)} (${pnl.netPnlPct.toFixed(2)}%)`,
    );

    const decision = evaluateCycle(
      {
        state: this.state,
        context,
        openLegs: this.book.openLegs(),
        spot: currentSpot,
        pnl,
        today,
        weekday: weekday(now, tz),
        nearExitTime: isNearTime(now, this.settings.exitTime, this.settings.timeToleranceMinutes, tz),
        daysSinceEntry: daysBetween(context.entryDay, today),
        daysSinceAdjustment: context.lastAdjustmentDay ? daysBetween(context.lastAdjustmentDay, today) : null,
        daysToNextExpiry: daysBetween(today, context.nextExpiry),
      },
      this.params,
      this.factory,
    );

    await this.apply(decision, context, currentSpot, now);
    if (this.currentState !== "CLOSED") {
      await this.checkLossAlert(pnl, context, today);
    }
  }

  getMetrics(now: Date = new Date()): StrategyMetrics {
    const context = this.context;
    return buildMetrics({
      state: this.state,
      legs: this.book.all(),
      capital: this.settings.capital,
      monthType: context?.monthType ?? null,
      daysSinceEntry: context ? Math.max(daysBetween(context.entryDay, tradingDay(now, this.settings.timezone)), 0) : 0,
      referenceSpot: context?.referenceSpot ?? null,
      referenceFuture: context?.referenceFuture ?? null,
      spot: this.lastSpot,
      lastAdjustmentDay: context?.lastAdjustmentDay ?? null,
      adjustmentCount: context?.adjustmentCount ?? 0,
      exitReason: context?.exitReason ?? null,
    });
  }

  logMetrics(now: Date = new Date()): void {
    const m = this.getMetrics(now);
    this.logger.info(
      `State=${m.state} open=${m.openLegCount} closed=${m.closedLegCount} pnl=${m.totalPnl} (${m.pnlPctOfCapital}%) ` +
        `realized=${m.realizedPnl} net=${m.netPnl} days=${m.daysSinceEntry} consistency=${m.netPnlConsistency}`,
    );
  }

  // ---- Internals ----
  private async apply(decision: CycleDecision, context: StrategyContext, spot: number, now: Date): Promise<void> {
    switch (decision.action) {
      case "HOLD":
        this.logger.debug(`Hold: ${decision.note}`);
        return;
      case "EXIT":
        await this.closeAll(decision.reason, context, now);
        return;
      case "ADJUST":
        await this.adjust(decision.stage, decision.close, decision.open, decision.note, context, spot, now);
        return;
    }
  }

  private async adjust(
    stage: AdjustmentStage,
    close: Leg[],
    open: LegSpec[],
    note: string,
    context: StrategyContext,
    spot: number,
    now: Date,
  ): Promise<void> {
    const priced: Array<{ spec: LegSpec; price: number }> = [];
    for (const spec of open) {
      const price = await this.pricing.quote(spec);
      if (price === undefined) {
        this.logger.warn(`${stage} skipped this cycle: no quote for ${spec.instrument}`);
        return;
      }
      priced.push({ spec, price });
    }

    this.logger.info(`${stage}: ${note}`);

    // old generation closes before the new one is appended
    for (const leg of close) {
      await this.closeLeg(leg, stage, now);
    }
    for (const { spec, price } of priced) {
      await this.openLeg(spec, price, now, stage);
    }

    context.lastAdjustmentDay = tradingDay(now, this.settings.timezone);
    context.adjustmentCount += 1;
    this.transition(stage);
    await this.emit({ type: "ADJUSTMENT", stage, note, spot });
    this.logMetrics(now);
  }

  private async closeAll(reason: ExitReason, context: StrategyContext, now: Date): Promise<void> {
    this.logger.info(`Closing all legs: ${reason}`);
    for (const leg of this.book.openLegs()) {
      await this.closeLeg(leg, reason, now);
    }
    context.exitReason = reason;
    this.transition("CLOSED");

    const pnl = summarizePnl(this.book.all(), this.settings.capital);
    await this.emit({ type: "EXIT", reason, netPnl: pnl.netPnl, netPnlPct: pnl.netPnlPct });
    this.logMetrics(now);
  }

  private async checkLossAlert(pnl: PnlSummary, context: StrategyContext, today: string): Promise<void> {
    if (context.lossAlertDay === today) return;
    if (pnl.netPnlPct > -this.params.lossAlertPct * 100) return;
    context.lossAlertDay = today;
    await this.emit({
      type: "RISK_ALERT",
      message: `Net loss ${pnl.netPnl.toFixed(2)} pts in ${this.state}`,
      netPnlPct: pnl.netPnlPct,
    });
  }

  private async openLeg(spec: LegSpec, quotedPrice: number, now: Date, reason: string): Promise<Leg> {
    const side = spec.direction === "LONG" ? "BUY" : "SELL";
    const result = await this.sendOrder(spec.instrument, side, spec.quantity);
    const price = this.fillPrice(result, quotedPrice);
    const leg = this.book.open(spec, price, now);

    this.logger.info(`Opened #${leg.id} ${side} ${spec.quantity} lot(s) ${spec.instrument} @ ${price} [${spec.role}]`);
    await this.record("OPEN", leg, side, price, result, reason, now);
    return leg;
  }

  private async closeLeg(leg: Leg, reason: string, now: Date): Promise<void> {
    const side = leg.direction === "LONG" ? "SELL" : "BUY";
    const result = await this.sendOrder(leg.instrument, side, leg.quantity);
    const price = this.fillPrice(result, leg.currentPrice);
    this.book.close(leg.id, price, now, reason);

    this.logger.info(`Closed #${leg.id} ${leg.instrument} @ ${price} (${reason})`);
    await this.record("CLOSE", leg, side, price, result, reason, now);
  }

  private async sendOrder(instrument: string, side: "BUY" | "SELL", lots: number): Promise<OrderResult | null> {
    try {
      const result = await this.broker.placeOrder({
        symbol: instrument,
        side,
        quantity: lots * this.settings.lotSize,
        orderType: "MARKET",
        tag: "sandwich",
      });
      if (result.status === "FAILED" || result.status === "CANCELLED") {
        this.logger.error(`Order ${side} ${instrument} rejected: ${result.message}`);
      }
      return result;
    } catch (error) {
      this.logger.error(`Order ${side} ${instrument} failed: ${describeError(error)}`);
      return null;
    }
  }

  private fillPrice(result: OrderResult | null, fallback: number): number {
    if (result && result.status === "SUCCESS" && result.price !== null && result.price > 0) {
      return result.price;
    }
    return fallback;
  }

  private async record(
    action: "OPEN" | "CLOSE",
    leg: Leg,
    side: "BUY" | "SELL",
    price: number,
    result: OrderResult | null,
    reason: string,
    now: Date,
  ): Promise<void> {
    if (!this.journal) return;
    await this.journal.recordTrade(
      {
        action,
        legId: leg.id,
        role: leg.role,
        instrument: leg.instrument,
        side,
        lots: leg.quantity,
        units: leg.quantity * this.settings.lotSize,
        price,
        orderId: result?.orderId ?? null,
        orderStatus: result?.status ?? "ERROR",
        reason,
      },
      now,
    );
  }

  private transition(next: LifecycleState): void {
    const from = LIFECYCLE_ORDER.indexOf(this.state);
    const to = LIFECYCLE_ORDER.indexOf(next);
    if (to <= from) {
      throw new Error(`Illegal transition ${this.state} -> ${next}`);
    }
    this.logger.info(`State ${this.state} -> ${next}`);
    this.state = next;
  }

  private async emit(event: StrategyEvent): Promise<void> {
    if (!this.notifier) return;
    try {
      await this.notifier.notify(event);
    } catch (error) {
      this.logger.warn(`Notification failed: ${describeError(error)}`);
    }
  }
}
