/**
 * Builds the initial seven-leg sandwich from the entry reference prices.
 * Every strike derives from F0 or S0 directly, never from another leg.
 */

import type { MonthType } from "./calendar.ts";
import type { LegRole, LegSpec, Direction } from "./legs.ts";
import { formatInstrument, roundStrike, type ContractKind } from "./strikes.ts";

export interface StructureParameters {
  callOffset: number;
  hedgeOffset: number;
  breadDistance: Record<MonthType, number>;
}

export interface EntryReference {
  spot: number;
  future: number;
  monthType: MonthType;
  /** Contracts trade against the next monthly expiry. */
  expiry: string;
}

export type EntryPlan =
  | { ok: true; legs: LegSpec[] }
  | { ok: false; reason: string };

export interface LegFactory {
  underlying: string;
  strikeStep: number;
}

export function makeLegSpec(
  factory: LegFactory,
  expiry: string,
  kind: ContractKind,
  strike: number | null,
  direction: Direction,
  quantity: number,
  role: LegRole,
): LegSpec {
  return {
    instrument: formatInstrument({ underlying: factory.underlying, kind, expiry, strike }),
    kind,
    strike,
    expiry,
    direction,
    quantity,
    role,
  };
}

export function planEntry(ref: EntryReference, params: StructureParameters, factory: LegFactory): EntryPlan {
  if (!Number.isFinite(ref.spot) || !Number.isFinite(ref.future)) {
    return { ok: false, reason: "reference prices unavailable" };
  }
  if (ref.future < ref.spot) {
    return { ok: false, reason: `future ${ref.future} below spot ${ref.spot}` };
  }

  const round = (value: number) => roundStrike(value, factory.strikeStep);
  const leg = (kind: ContractKind, strike: number | null, direction: Direction, quantity: number, role: LegRole) =>
    makeLegSpec(factory, ref.expiry, kind, strike, direction, quantity, role);

  const d = params.breadDistance[ref.monthType];
  const outerCallShort = round(ref.spot + d);
  const outerPutShort = round(ref.spot - d);

  return {
    ok: true,
    legs: [
      leg("FUTURE", null, "SHORT", 1, "CORE_FUTURE"),
      leg("CALL", round(ref.future + params.callOffset), "LONG", 1, "CORE_CALL_LONG"),
      leg("PUT", round(ref.future - params.callOffset), "SHORT", 1, "CORE_PUT_SHORT"),
      leg("CALL", outerCallShort, "SHORT", 2, "OUTER_CALL_SHORT"),
      leg("CALL", round(outerCallShort + params.hedgeOffset), "LONG", 2, "OUTER_CALL_LONG"),
      leg("PUT", outerPutShort, "SHORT", 2, "OUTER_PUT_SHORT"),
      leg("PUT", round(outerPutShort - params.hedgeOffset), "LONG", 2, "OUTER_PUT_LONG"),
    ],
  };
}
