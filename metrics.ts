/**
 * P&L and structure metrics over a leg book.
 *
 * P&L is measured in index points times lots:
 *   (current - entry) * sign * lots
 * Multiply by the lot size for rupees. Open legs make up the unrealized
 * total; closed legs only contribute through `realizedPnl`.
 */

import type { MonthType } from "./calendar.ts";
import { directionSign, type Leg, type LegRole } from "./legs.ts";

export type LifecycleState = "IDLE" | "ACTIVE" | "DEFENSE_1" | "DEFENSE_2" | "STRADDLE" | "CLOSED";

export const LIFECYCLE_ORDER: readonly LifecycleState[] = [
  "IDLE",
  "ACTIVE",
  "DEFENSE_1",
  "DEFENSE_2",
  "STRADDLE",
  "CLOSED",
];

export function roundTo(value: number, digits = 2): number {
  const factor = 10 ** digits;
  // `|| 0` folds -0 into 0
  return Math.round(value * factor) / factor || 0;
}

export function legPnl(leg: Leg): number {
  if (!leg.open) return 0;
  return (leg.currentPrice - leg.entryPrice) * directionSign(leg.direction) * leg.quantity;
}

export function realizedLegPnl(leg: Leg): number {
  if (leg.open || leg.exitPrice === null) return 0;
  return (leg.exitPrice - leg.entryPrice) * directionSign(leg.direction) * leg.quantity;
}

export interface PnlSummary {
  totalPnl: number;
  longPnl: number;
  shortPnl: number;
  realizedPnl: number;
  netPnl: number;
  pnlPctOfCapital: number;
  netPnlPct: number;
  /** long + short - total; zero for any leg set. */
  netPnlConsistency: number;
}

export function summarizePnl(legs: readonly Leg[], capital: number): PnlSummary {
  let totalPnl = 0;
  let longPnl = 0;
  let shortPnl = 0;
  let realizedPnl = 0;

  for (const leg of legs) {
    if (leg.open) {
      const pnl = legPnl(leg);
      totalPnl += pnl;
      if (leg.direction === "LONG") longPnl += pnl;
      else shortPnl += pnl;
    } else {
      realizedPnl += realizedLegPnl(leg);
    }
  }

  const netPnl = totalPnl + realizedPnl;
  return {
    totalPnl,
    longPnl,
    shortPnl,
    realizedPnl,
    netPnl,
    pnlPctOfCapital: capital > 0 ? (totalPnl / capital) * 100 : 0,
    netPnlPct: capital > 0 ? (netPnl / capital) * 100 : 0,
    netPnlConsistency: longPnl + shortPnl - totalPnl,
  };
}

export function roleBreakdown(legs: readonly Leg[], open: boolean): Partial<Record<LegRole, number>> {
  const counts: Partial<Record<LegRole, number>> = {};
  for (const leg of legs) {
    if (leg.open !== open) continue;
    counts[leg.role] = (counts[leg.role] ?? 0) + 1;
  }
  return counts;
}

// ---- Metrics snapshot ------------------------------------------------------
export interface StrategyMetrics {
  state: LifecycleState;
  monthType: MonthType | null;
  openLegCount: number;
  closedLegCount: number;
  roleBreakdown: Partial<Record<LegRole, number>>;
  closedRoleBreakdown: Partial<Record<LegRole, number>>;
  totalPnl: number;
  pnlPctOfCapital: number;
  longPnl: number;
  shortPnl: number;
  netPnlConsistency: number;
  realizedPnl: number;
  netPnl: number;
  netPnlPct: number;
  daysSinceEntry: number;
  rallyPoints: number;
  futureVsSpotDiff: number;
  lastAdjustmentDay: string | null;
  adjustmentCount: number;
  exitReason: string | null;
}

export interface MetricsInput {
  state: LifecycleState;
  legs: readonly Leg[];
  capital: number;
  monthType: MonthType | null;
  daysSinceEntry: number;
  referenceSpot: number | null;
  referenceFuture: number | null;
  spot: number | null;
  lastAdjustmentDay: string | null;
  adjustmentCount: number;
  exitReason: string | null;
}

export function buildMetrics(input: MetricsInput): StrategyMetrics {
  const pnl = summarizePnl(input.legs, input.capital);
  const openCount = input.legs.filter((leg) => leg.open).length;

  return {
    state: input.state,
    monthType: input.monthType,
    openLegCount: openCount,
    closedLegCount: input.legs.length - openCount,
    roleBreakdown: roleBreakdown(input.legs, true),
    closedRoleBreakdown: roleBreakdown(input.legs, false),
    totalPnl: roundTo(pnl.totalPnl),
    pnlPctOfCapital: roundTo(pnl.pnlPctOfCapital, 4),
    longPnl: roundTo(pnl.longPnl),
    shortPnl: roundTo(pnl.shortPnl),
    netPnlConsistency: roundTo(pnl.netPnlConsistency, 4),
    realizedPnl: roundTo(pnl.realizedPnl),
    netPnl: roundTo(pnl.netPnl),
    netPnlPct: roundTo(pnl.netPnlPct, 4),
    daysSinceEntry: input.daysSinceEntry,
    rallyPoints:
      input.spot !== null && input.referenceSpot !== null ? roundTo(input.spot - input.referenceSpot) : 0,
    futureVsSpotDiff:
      input.referenceFuture !== null && input.referenceSpot !== null
        ? roundTo(input.referenceFuture - input.referenceSpot)
        : 0,
    lastAdjustmentDay: input.lastAdjustmentDay,
    adjustmentCount: input.adjustmentCount,
    exitReason: input.exitReason,
  };
}
