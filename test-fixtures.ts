/**
 * In-process stand-ins shared by the test files.
 */

import type { Broker, BrokerPosition, OrderRequest, OrderResult, OrderStatus, Quote } from "./broker.ts";
import type { OptionKind, PriceSource } from "./market-data.ts";
import type { Notifier, StrategyEvent } from "./notifications.ts";

/** Flat prices with per-contract overrides; `undefined` means no quote. */
export class FakePriceSource implements PriceSource {
  spot: number | undefined = 45000;
  future: number | undefined = 45090;
  optionPrice: number | undefined = 100;
  private readonly options = new Map<string, number | undefined>();

  setOption(expiry: string, strike: number, kind: OptionKind, price: number | undefined): void {
    this.options.set(`${expiry}:${strike}:${kind}`, price);
  }

  async getSpot(): Promise<number | undefined> {
    return this.spot;
  }

  async getFuture(): Promise<number | undefined> {
    return this.future;
  }

  async getOptionPrice(expiry: string, strike: number, kind: OptionKind): Promise<number | undefined> {
    const key = `${expiry}:${strike}:${kind}`;
    return this.options.has(key) ? this.options.get(key) : this.optionPrice;
  }
}

/** Accepts every order without a fill price, so callers keep their quotes. */
export class RecordingBroker implements Broker {
  readonly name = "recording";
  readonly orders: OrderRequest[] = [];
  throwOnOrder = false;

  async connect(): Promise<boolean> {
    return true;
  }

  async disconnect(): Promise<void> {}

  isConnected(): boolean {
    return true;
  }

  async placeOrder(request: OrderRequest): Promise<OrderResult> {
    if (this.throwOnOrder) throw new Error("broker offline");
    this.orders.push(request);
    return {
      status: "SUCCESS",
      orderId: `REC${this.orders.length}`,
      price: null,
      message: "accepted",
      timestamp: "2025-01-01T00:00:00.000Z",
    };
  }

  async cancelOrder(): Promise<boolean> {
    return false;
  }

  async getOrderStatus(): Promise<OrderStatus | undefined> {
    return undefined;
  }

  async getPositions(): Promise<BrokerPosition[]> {
    return [];
  }

  async getLtp(): Promise<number | undefined> {
    return undefined;
  }

  async getQuote(): Promise<Quote | undefined> {
    return undefined;
  }
}

export class RecordingNotifier implements Notifier {
  readonly events: StrategyEvent[] = [];

  async notify(event: StrategyEvent): Promise<void> {
    this.events.push(event);
  }
}
