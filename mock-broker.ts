/**
 * In-memory broker for dry runs, backtests and tests.
 * Orders fill instantly at the simulated market price.
 */

import {
  failedOrder,
  type Broker,
  type BrokerPosition,
  type OrderRequest,
  type OrderResult,
  type OrderStatus,
  type Quote,
} from "./broker.ts";
import { Logger } from "./logger.ts";
import { roundTo } from "./metrics.ts";
import { createRng, type Rng } from "./random.ts";

export interface InstrumentPricer {
  priceInstrument(symbol: string): number | undefined;
}

export interface MockBrokerOptions {
  slippagePct: number;
  seed: number;
}

interface MockOrder {
  request: OrderRequest;
  result: OrderResult;
}

interface MockPosition {
  quantity: number;
  averagePrice: number;
}

function stripExchange(symbol: string): string {
  const idx = symbol.indexOf(":");
  return idx >= 0 && !symbol.startsWith("NSE:") ? symbol.slice(idx + 1) : symbol;
}

export class MockBroker implements Broker {
  readonly name = "mock";
  private connected = false;
  private orderCounter = 0;
  private orders = new Map<string, MockOrder>();
  private positions = new Map<string, MockPosition>();
  private rng: Rng;

  constructor(
    private readonly pricer: InstrumentPricer,
    private readonly options: MockBrokerOptions = { slippagePct: 0, seed: 42 },
    private readonly logger: Logger = Logger.silent(),
  ) {
    this.rng = createRng(options.seed);
  }

  async connect(): Promise<boolean> {
    this.connected = true;
    this.logger.info("Mock broker connected");
    return true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async placeOrder(request: OrderRequest): Promise<OrderResult> {
    if (!Number.isInteger(request.quantity) || request.quantity <= 0) {
      return failedOrder(`Invalid quantity: ${request.quantity}`);
    }

    const symbol = stripExchange(request.symbol);
    const base =
      request.orderType === "LIMIT" && request.price !== undefined
        ? request.price
        : this.pricer.priceInstrument(symbol);
    if (base === undefined) {
      return failedOrder(`No price for ${symbol}`);
    }

    const direction = request.side === "BUY" ? 1 : -1;
    const slippage = this.options.slippagePct > 0 ? this.options.slippagePct * this.rng() : 0;
    const fill = roundTo(Math.max(base * (1 + direction * slippage), 0.05));

    this.orderCounter += 1;
    const orderId = `MOCK${String(this.orderCounter).padStart(6, "0")}`;
    const result: OrderResult = {
      status: "SUCCESS",
      orderId,
      price: fill,
      message: "filled",
      timestamp: new Date().toISOString(),
    };
    this.orders.set(orderId, { request: { ...request, symbol }, result });
    this.applyFill(symbol, direction * request.quantity, fill);

    this.logger.debug(`${request.side} ${request.quantity} ${symbol} @ ${fill} (${orderId})`);
    return result;
  }

  async cancelOrder(orderId: string): Promise<boolean> {
    // fills are instant, nothing is ever left to cancel
    this.logger.debug(`Cancel ignored for ${orderId}`);
    return false;
  }

  async getOrderStatus(orderId: string): Promise<OrderStatus | undefined> {
    const order = this.orders.get(orderId);
    if (!order) return undefined;
    return {
      orderId,
      status: order.result.status,
      averagePrice: order.result.price,
      filledQuantity: order.request.quantity,
      message: order.result.message,
    };
  }

  async getPositions(): Promise<BrokerPosition[]> {
    const out: BrokerPosition[] = [];
    for (const [symbol, position] of this.positions) {
      const lastPrice = this.pricer.priceInstrument(symbol) ?? position.averagePrice;
      out.push({
        symbol,
        quantity: position.quantity,
        averagePrice: position.averagePrice,
        lastPrice,
        pnl: roundTo((lastPrice - position.averagePrice) * position.quantity),
      });
    }
    return out;
  }

  async getLtp(symbol: string): Promise<number | undefined> {
    return this.pricer.priceInstrument(stripExchange(symbol));
  }

  async getQuote(symbol: string): Promise<Quote | undefined> {
    const lastPrice = await this.getLtp(symbol);
    if (lastPrice === undefined) return undefined;
    return {
      symbol,
      lastPrice,
      bid: roundTo(lastPrice * 0.999),
      ask: roundTo(lastPrice * 1.001),
      timestamp: new Date().toISOString(),
    };
  }

  getOrderCount(): number {
    return this.orders.size;
  }

  private applyFill(symbol: string, signedQuantity: number, price: number): void {
    const existing = this.positions.get(symbol);
    if (!existing) {
      this.positions.set(symbol, { quantity: signedQuantity, averagePrice: price });
      return;
    }

    const quantity = existing.quantity + signedQuantity;
    if (quantity === 0) {
      this.positions.delete(symbol);
      return;
    }

    const sameDirection = Math.sign(existing.quantity) === Math.sign(signedQuantity);
    const flipped = Math.sign(quantity) !== Math.sign(existing.quantity);
    let averagePrice = existing.averagePrice;
    if (sameDirection) {
      averagePrice =
        (existing.averagePrice * Math.abs(existing.quantity) + price * Math.abs(signedQuantity)) / Math.abs(quantity);
    } else if (flipped) {
      averagePrice = price;
    }
    this.positions.set(symbol, { quantity, averagePrice: roundTo(averagePrice) });
  }
}
