/**
 * Exit and adjustment rules evaluated on every monitor cycle.
 *
 * Checks run in a fixed order and the first match wins:
 *   1. profit target (net P&L vs capital)
 *   2. calendar close on next-expiry day inside the exit window
 *   3. missed calendar close (trading day already past next expiry)
 *   4. at most one adjustment per trading day
 *   5. the rule for the current state
 *
 * Defensive put shifts are measured from the open outer short put, so
 * repeated adjustments walk the ladder upward from wherever it last stood.
 */

import type { MonthType } from "./calendar.ts";
import type { Leg, LegSpec } from "./legs.ts";
import type { LifecycleState, PnlSummary } from "./metrics.ts";
import { makeLegSpec, type LegFactory, type StructureParameters } from "./position-builder.ts";
import { roundStrike } from "./strikes.ts";

// ---- Types -----------------------------------------------------------------
export interface AdjustmentParameters extends StructureParameters {
  /** Fraction of capital, e.g. 0.12. */
  profitTargetPct: number;
  rallyThreshold: Record<MonthType, number>;
  passiveWeeks: Record<MonthType, number>;
  corePutRollCandidates: number[];
  secondaryPutShift: number;
  stage2WaitDays: number;
  stage2Buffer: number;
  straddleWindowDays: number;
}

export type ExitReason = "PROFIT_TARGET" | "FINAL_EXPIRY" | "EXPIRED";

export type AdjustmentStage = "DEFENSE_1" | "DEFENSE_2" | "STRADDLE";

export interface CycleContext {
  referenceSpot: number;
  referenceFuture: number;
  monthType: MonthType;
  nextExpiry: string;
  entryDay: string;
  lastAdjustmentDay: string | null;
}

export interface CycleInput {
  state: LifecycleState;
  context: CycleContext;
  openLegs: readonly Leg[];
  spot: number;
  pnl: PnlSummary;
  /** Exchange-local trading day, YYYY-MM-DD. */
  today: string;
  /** 0 = Sunday, exchange-local. */
  weekday: number;
  /** True when the exchange clock is inside the exit-time tolerance window. */
  nearExitTime: boolean;
  daysSinceEntry: number;
  daysSinceAdjustment: number | null;
  daysToNextExpiry: number;
}

export type CycleDecision =
  | { action: "HOLD"; note: string }
  | { action: "EXIT"; reason: ExitReason }
  | {
      action: "ADJUST";
      stage: AdjustmentStage;
      close: Leg[];
      open: LegSpec[];
      note: string;
    };

// float noise in percentage arithmetic (0.12 * 100 is 12.000000000000002)
const PCT_EPSILON = 1e-9;

// ---- Helpers ---------------------------------------------------------------
/**
 * Picks the shift that lands `strike + shift` closest to `target`.
 * Ties keep the earlier candidate.
 */
export function chooseRollShift(strike: number, target: number, candidates: readonly number[]): number {
  if (candidates.length === 0) throw new Error("No roll candidates configured");
  let best = candidates[0];
  let bestDistance = Math.abs(strike + best - target);
  for (const candidate of candidates.slice(1)) {
    const distance = Math.abs(strike + candidate - target);
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return best;
}

function findOpen(legs: readonly Leg[], role: Leg["role"]): Leg | undefined {
  return legs.find((leg) => leg.open && leg.role === role);
}

function strikeOf(leg: Leg): number {
  if (leg.strike === null) throw new Error(`Leg #${leg.id} (${leg.role}) has no strike`);
  return leg.strike;
}

export function isProfitTargetHit(pnl: PnlSummary, params: Pick<AdjustmentParameters, "profitTargetPct">): boolean {
  return pnl.netPnlPct + PCT_EPSILON >= params.profitTargetPct * 100;
}

// ---- Stage rules -----------------------------------------------------------
function outerPutShift(
  input: CycleInput,
  factory: LegFactory,
  params: AdjustmentParameters,
  shift: number,
): { close: Leg[]; open: LegSpec[]; newShortStrike: number } | undefined {
  const short = findOpen(input.openLegs, "OUTER_PUT_SHORT");
  const long = findOpen(input.openLegs, "OUTER_PUT_LONG");
  if (!short || !long) return undefined;

  const newShortStrike = roundStrike(strikeOf(short) + shift, factory.strikeStep);
  const newLongStrike = roundStrike(newShortStrike - params.hedgeOffset, factory.strikeStep);
  const expiry = input.context.nextExpiry;

  return {
    close: [short, long],
    open: [
      makeLegSpec(factory, expiry, "PUT", newShortStrike, "SHORT", short.quantity, "OUTER_PUT_SHORT"),
      makeLegSpec(factory, expiry, "PUT", newLongStrike, "LONG", long.quantity, "OUTER_PUT_LONG"),
    ],
    newShortStrike,
  };
}

function evaluateDefense1(input: CycleInput, params: AdjustmentParameters, factory: LegFactory): CycleDecision {
  const { monthType, referenceSpot, referenceFuture, nextExpiry } = input.context;
  const passiveDays = params.passiveWeeks[monthType] * 7;
  if (input.daysSinceEntry < passiveDays) {
    return { action: "HOLD", note: `passive window (${input.daysSinceEntry}/${passiveDays} days)` };
  }
  if (input.pnl.totalPnl >= 0) {
    return { action: "HOLD", note: "position not losing" };
  }
  const rally = input.spot - referenceSpot;
  if (rally < params.rallyThreshold[monthType]) {
    return { action: "HOLD", note: `rally ${rally} below ${params.rallyThreshold[monthType]}` };
  }

  const shifted = outerPutShift(input, factory, params, params.breadDistance[monthType]);
  if (!shifted) return { action: "HOLD", note: "outer put legs missing" };

  const close = [...shifted.close];
  const open = [...shifted.open];
  let note = `outer puts -> ${shifted.newShortStrike}`;

  const corePut = findOpen(input.openLegs, "CORE_PUT_SHORT");
  if (corePut) {
    const oldStrike = strikeOf(corePut);
    const target = roundStrike(referenceFuture, factory.strikeStep);
    const shift = chooseRollShift(oldStrike, target, params.corePutRollCandidates);
    const newStrike = roundStrike(oldStrike + shift, factory.strikeStep);
    close.unshift(corePut);
    open.unshift(makeLegSpec(factory, nextExpiry, "PUT", newStrike, "SHORT", corePut.quantity, "CORE_PUT_SHORT"));
    note = `core put ${oldStrike} -> ${newStrike} (+${shift}), ${note}`;
  }

  return { action: "ADJUST", stage: "DEFENSE_1", close, open, note };
}

function evaluateDefense2(input: CycleInput, params: AdjustmentParameters, factory: LegFactory): CycleDecision {
  if (input.daysSinceAdjustment === null || input.daysSinceAdjustment < params.stage2WaitDays) {
    return { action: "HOLD", note: "waiting after first defense" };
  }
  const short = findOpen(input.openLegs, "OUTER_PUT_SHORT");
  if (!short) return { action: "HOLD", note: "outer put legs missing" };
  if (input.spot - strikeOf(short) <= params.stage2Buffer) {
    return { action: "HOLD", note: `spot within ${params.stage2Buffer} of outer put ${strikeOf(short)}` };
  }

  const shifted = outerPutShift(input, factory, params, params.secondaryPutShift);
  if (!shifted) return { action: "HOLD", note: "outer put legs missing" };
  return {
    action: "ADJUST",
    stage: "DEFENSE_2",
    close: shifted.close,
    open: shifted.open,
    note: `outer puts ${strikeOf(short)} -> ${shifted.newShortStrike}`,
  };
}

function evaluateStraddle(input: CycleInput, params: AdjustmentParameters, factory: LegFactory): CycleDecision {
  if (input.weekday !== 1 || input.daysToNextExpiry < 0 || input.daysToNextExpiry > params.straddleWindowDays) {
    return { action: "HOLD", note: "outside expiry-week Monday" };
  }
  const callShort = findOpen(input.openLegs, "OUTER_CALL_SHORT");
  const putShort = findOpen(input.openLegs, "OUTER_PUT_SHORT");
  const putLong = findOpen(input.openLegs, "OUTER_PUT_LONG");
  if (!callShort || !putShort || !putLong) return { action: "HOLD", note: "outer legs missing" };

  const strike = strikeOf(callShort);
  if (input.spot <= strike) {
    return { action: "HOLD", note: `spot below outer call ${strike}` };
  }

  const expiry = input.context.nextExpiry;
  const longStrike = roundStrike(strike - params.hedgeOffset, factory.strikeStep);
  return {
    action: "ADJUST",
    stage: "STRADDLE",
    close: [putShort, putLong],
    open: [
      makeLegSpec(factory, expiry, "PUT", strike, "SHORT", putShort.quantity, "OUTER_PUT_SHORT"),
      makeLegSpec(factory, expiry, "PUT", longStrike, "LONG", putLong.quantity, "OUTER_PUT_LONG"),
    ],
    note: `short straddle at ${strike}`,
  };
}

// ---- Entry point -----------------------------------------------------------
export function evaluateCycle(input: CycleInput, params: AdjustmentParameters, factory: LegFactory): CycleDecision {
  if (input.state === "IDLE" || input.state === "CLOSED") {
    return { action: "HOLD", note: `nothing to manage in ${input.state}` };
  }

  if (isProfitTargetHit(input.pnl, params)) {
    return { action: "EXIT", reason: "PROFIT_TARGET" };
  }
  if (input.today === input.context.nextExpiry && input.nearExitTime) {
    return { action: "EXIT", reason: "FINAL_EXPIRY" };
  }
  if (input.today > input.context.nextExpiry) {
    return { action: "EXIT", reason: "EXPIRED" };
  }
  if (input.context.lastAdjustmentDay === input.today) {
    return { action: "HOLD", note: "already adjusted today" };
  }

  switch (input.state) {
    case "ACTIVE":
      return evaluateDefense1(input, params, factory);
    case "DEFENSE_1":
      return evaluateDefense2(input, params, factory);
    case "DEFENSE_2":
      return evaluateStraddle(input, params, factory);
    default:
      return { action: "HOLD", note: "no further adjustments" };
  }
}
