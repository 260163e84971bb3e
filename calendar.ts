/**
 * Monthly expiry calendar for NSE index derivatives, plus the clock helpers
 * the strategy and scheduler use. All clock reads take an explicit `now`.
 *
 * Monthly contracts expire on the last Thursday of the month up to August
 * 2025 and on the last Tuesday from September 2025 onwards.
 */

import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import timezone from "dayjs/plugin/timezone.js";

dayjs.extend(utc);
dayjs.extend(timezone);

export type MonthType = "SHORT" | "LONG";

export const DEFAULT_TIMEZONE = "Asia/Kolkata";

const TUESDAY_RULE_FROM = "2025-09-01";
const THURSDAY = 4;
const TUESDAY = 2;
const DAY_FORMAT = "YYYY-MM-DD";

// ---- Day arithmetic (calendar days, no timezone) ---------------------------
export function daysBetween(from: string, to: string): number {
  return dayjs.utc(to).diff(dayjs.utc(from), "day");
}

export function addDays(day: string, days: number): string {
  return dayjs.utc(day).add(days, "day").format(DAY_FORMAT);
}

export function classifyMonth(currentExpiry: string, nextExpiry: string, gapDays = 28): MonthType {
  return daysBetween(currentExpiry, nextExpiry) > gapDays ? "LONG" : "SHORT";
}

// ---- Clock helpers ---------------------------------------------------------
export function tradingDay(now: Date, tz = DEFAULT_TIMEZONE): string {
  return dayjs(now).tz(tz).format(DAY_FORMAT);
}

/** 0 = Sunday ... 6 = Saturday, in the exchange timezone. */
export function weekday(now: Date, tz = DEFAULT_TIMEZONE): number {
  return dayjs(now).tz(tz).day();
}

export function parseClock(hhmm: string): number {
  const match = /^(\d{1,2}):(\d{2})$/.exec(hhmm);
  if (!match) throw new Error(`Invalid time of day: ${hhmm}`);
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) throw new Error(`Invalid time of day: ${hhmm}`);
  return hours * 60 + minutes;
}

export function minutesOfDay(now: Date, tz = DEFAULT_TIMEZONE): number {
  const local = dayjs(now).tz(tz);
  return local.hour() * 60 + local.minute();
}

export function isNearTime(now: Date, hhmm: string, toleranceMinutes: number, tz = DEFAULT_TIMEZONE): boolean {
  return Math.abs(minutesOfDay(now, tz) - parseClock(hhmm)) <= toleranceMinutes;
}

export function isMarketOpen(now: Date, open = "09:15", close = "15:30", tz = DEFAULT_TIMEZONE): boolean {
  const day = weekday(now, tz);
  if (day === 0 || day === 6) return false;
  const minutes = minutesOfDay(now, tz);
  return minutes >= parseClock(open) && minutes <= parseClock(close);
}

/** Builds the instant at which the exchange clock reads `hhmm` on `day`. */
export function atExchangeTime(day: string, hhmm: string, tz = DEFAULT_TIMEZONE): Date {
  const minutes = parseClock(hhmm);
  const clock = `${String(Math.floor(minutes / 60)).padStart(2, "0")}:${String(minutes % 60).padStart(2, "0")}`;
  return dayjs.tz(`${day} ${clock}`, tz).toDate();
}

// ---- Expiry calendar -------------------------------------------------------
export class ExpiryCalendar {
  private cache = new Map<string, string>();

  monthlyExpiry(year: number, month: number): string {
    const key = `${year}-${month}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const lastDay = dayjs.utc(`${year}-${String(month).padStart(2, "0")}-01`).endOf("month").startOf("day");
    const target = lastDay.format(DAY_FORMAT) >= TUESDAY_RULE_FROM ? TUESDAY : THURSDAY;
    const back = (lastDay.day() - target + 7) % 7;
    const expiry = lastDay.subtract(back, "day").format(DAY_FORMAT);

    this.cache.set(key, expiry);
    return expiry;
  }

  currentExpiry(day: string): string {
    const d = dayjs.utc(day);
    return this.monthlyExpiry(d.year(), d.month() + 1);
  }

  nextMonthlyExpiry(day: string): string {
    const d = dayjs.utc(day).startOf("month").add(1, "month");
    return this.monthlyExpiry(d.year(), d.month() + 1);
  }

  previousExpiry(day: string): string {
    const d = dayjs.utc(day).startOf("month").subtract(1, "month");
    return this.monthlyExpiry(d.year(), d.month() + 1);
  }

  /** First monthly expiry on or after `day`. */
  upcomingExpiry(day: string): string {
    const current = this.currentExpiry(day);
    return current >= day ? current : this.nextMonthlyExpiry(day);
  }

  isExpiryDay(day: string): boolean {
    return this.currentExpiry(day) === day;
  }

  expiriesForYear(year: number): string[] {
    return Array.from({ length: 12 }, (_, i) => this.monthlyExpiry(year, i + 1));
  }

  expiriesBetween(start: string, end: string): string[] {
    const out: string[] = [];
    let cursor = dayjs.utc(start).startOf("month");
    const last = dayjs.utc(end);
    while (!cursor.isAfter(last)) {
      const expiry = this.monthlyExpiry(cursor.year(), cursor.month() + 1);
      if (expiry >= start && expiry <= end) out.push(expiry);
      cursor = cursor.add(1, "month");
    }
    return out;
  }

  daysToExpiry(day: string, expiry: string): number {
    return daysBetween(day, expiry);
  }
}
