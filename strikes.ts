/**
 * Strike rounding and NFO instrument naming.
 *
 * Strikes snap to a fixed grid (100 points for BANKNIFTY). Exact midpoints
 * go to the even multiple, so 45050 -> 45000 and 45150 -> 45200.
 */

import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";

dayjs.extend(utc);

export type ContractKind = "FUTURE" | "CALL" | "PUT";

export const DEFAULT_STRIKE_STEP = 100;

const MONTHS = ["JAN", "FEB", "MAR", "APR", "MAY", "JUN", "JUL", "AUG", "SEP", "OCT", "NOV", "DEC"];

// ---- Rounding --------------------------------------------------------------
function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  // floor may be negative; parity via modulo on the absolute value
  return Math.abs(floor) % 2 === 0 ? floor : floor + 1;
}

export function roundStrike(value: number, step = DEFAULT_STRIKE_STEP): number {
  return roundHalfEven(value / step) * step;
}

// ---- Symbols ---------------------------------------------------------------
export interface InstrumentSpec {
  underlying: string;
  kind: ContractKind;
  /** ISO date of the contract's expiry (YYYY-MM-DD). */
  expiry: string;
  strike: number | null;
}

export function contractMonthCode(expiry: string): string {
  const d = dayjs.utc(expiry);
  return `${d.format("YY")}${MONTHS[d.month()]}`;
}

export function formatInstrument(spec: InstrumentSpec): string {
  const prefix = `${spec.underlying}${contractMonthCode(spec.expiry)}`;
  if (spec.kind === "FUTURE") return `${prefix}FUT`;
  if (spec.strike === null) {
    throw new Error(`Option instrument needs a strike: ${prefix} ${spec.kind}`);
  }
  return `${prefix}${spec.strike}${spec.kind === "CALL" ? "CE" : "PE"}`;
}

export interface ParsedInstrument {
  underlying: string;
  year: number;
  /** 1-12 */
  month: number;
  kind: ContractKind;
  strike: number | null;
}

const SYMBOL_PATTERN = /^([A-Z&-]+?)(\d{2})([A-Z]{3})(?:(\d+)(CE|PE)|FUT)$/;

export function parseInstrument(symbol: string): ParsedInstrument | undefined {
  const bare = symbol.includes(":") ? symbol.slice(symbol.indexOf(":") + 1) : symbol;
  const match = SYMBOL_PATTERN.exec(bare);
  if (!match) return undefined;

  const [, underlying, yy, mon, strike, optionType] = match;
  const monthIndex = MONTHS.indexOf(mon);
  if (monthIndex < 0) return undefined;

  return {
    underlying,
    year: 2000 + Number(yy),
    month: monthIndex + 1,
    kind: optionType === undefined ? "FUTURE" : optionType === "CE" ? "CALL" : "PUT",
    strike: strike === undefined ? null : Number(strike),
  };
}
