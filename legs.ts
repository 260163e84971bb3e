/**
 * Leg records and the append-only book that owns them.
 *
 * Adjustments never edit a leg's strike or role. They close the old leg and
 * append a new one, so the book doubles as the audit trail. "Open legs" is a
 * filter over the book, never a second collection.
 */

import type { ContractKind } from "./strikes.ts";

// ---- Types -----------------------------------------------------------------
export type Direction = "LONG" | "SHORT";

export type LegRole =
  | "CORE_FUTURE"
  | "CORE_CALL_LONG"
  | "CORE_PUT_SHORT"
  | "OUTER_CALL_SHORT"
  | "OUTER_CALL_LONG"
  | "OUTER_PUT_SHORT"
  | "OUTER_PUT_LONG";

/** What a builder or adjustment wants opened. */
export interface LegSpec {
  instrument: string;
  kind: ContractKind;
  strike: number | null;
  expiry: string;
  direction: Direction;
  /** Lots, not units. */
  quantity: number;
  role: LegRole;
}

export interface Leg extends Readonly<LegSpec> {
  readonly id: number;
  readonly entryPrice: number;
  readonly openedAt: string;
  currentPrice: number;
  open: boolean;
  exitPrice: number | null;
  closedAt: string | null;
  closeReason: string | null;
}

export function directionSign(direction: Direction): 1 | -1 {
  return direction === "LONG" ? 1 : -1;
}

// ---- Leg book --------------------------------------------------------------
export class LegBook {
  private legs: Leg[] = [];
  private nextId = 1;

  open(spec: LegSpec, price: number, at: Date): Leg {
    if (!Number.isInteger(spec.quantity) || spec.quantity <= 0) {
      throw new Error(`Leg quantity must be a positive integer: ${spec.quantity}`);
    }
    const existing = this.openByRole(spec.role);
    if (existing) {
      throw new Error(`Role ${spec.role} already has open leg #${existing.id} (${existing.instrument})`);
    }

    const leg: Leg = {
      ...spec,
      id: this.nextId++,
      entryPrice: price,
      openedAt: at.toISOString(),
      currentPrice: price,
      open: true,
      exitPrice: null,
      closedAt: null,
      closeReason: null,
    };
    this.legs.push(leg);
    return leg;
  }

  close(id: number, exitPrice: number, at: Date, reason: string): Leg {
    const leg = this.require(id);
    if (!leg.open) {
      throw new Error(`Leg #${id} is already closed`);
    }
    leg.open = false;
    leg.currentPrice = exitPrice;
    leg.exitPrice = exitPrice;
    leg.closedAt = at.toISOString();
    leg.closeReason = reason;
    return leg;
  }

  markPrice(id: number, price: number): void {
    const leg = this.require(id);
    if (leg.open) leg.currentPrice = price;
  }

  get(id: number): Leg | undefined {
    return this.legs.find((leg) => leg.id === id);
  }

  openLegs(): Leg[] {
    return this.legs.filter((leg) => leg.open);
  }

  closedLegs(): Leg[] {
    return this.legs.filter((leg) => !leg.open);
  }

  openByRole(role: LegRole): Leg | undefined {
    return this.legs.find((leg) => leg.open && leg.role === role);
  }

  all(): readonly Leg[] {
    return this.legs;
  }

  get size(): number {
    return this.legs.length;
  }

  /** Copies for callers outside the strategy. */
  snapshot(): Leg[] {
    return this.legs.map((leg) => ({ ...leg }));
  }

  private require(id: number): Leg {
    const leg = this.get(id);
    if (!leg) throw new Error(`Unknown leg #${id}`);
    return leg;
  }
}
