/**
 * Zerodha Kite Connect broker.
 *
 * Needs KITE_API_KEY and a daily KITE_ACCESS_TOKEN (Kite login flow is done
 * outside this bot). Derivatives trade on NFO as regular market orders.
 */

import { KiteConnect } from "kiteconnect";
import type { Product } from "kiteconnect";
import {
  failedOrder,
  type Broker,
  type BrokerPosition,
  type OrderRequest,
  type OrderResult,
  type OrderStatus,
  type Quote,
} from "./broker.ts";
import type { BrokerConfig } from "./config.ts";
import { describeError, type Logger } from "./logger.ts";

function withExchange(symbol: string): string {
  return symbol.includes(":") ? symbol : `NFO:${symbol}`;
}

function withoutExchange(symbol: string): string {
  return symbol.includes(":") ? symbol.slice(symbol.indexOf(":") + 1) : symbol;
}

export class ZerodhaBroker implements Broker {
  readonly name = "zerodha";
  // the package types KiteConnect as a constructor, so name the instance explicitly
  private readonly kc: InstanceType<typeof KiteConnect>;
  private readonly product: Product;
  private connected = false;

  constructor(
    private readonly config: BrokerConfig,
    private readonly logger: Logger,
  ) {
    this.kc = new KiteConnect({ api_key: config.apiKey });
    this.product = config.product;
  }

  async connect(): Promise<boolean> {
    if (!this.config.accessToken) {
      this.logger.error("KITE_ACCESS_TOKEN is not set; complete the Kite login flow first");
      return false;
    }
    try {
      this.kc.setAccessToken(this.config.accessToken);
      const profile = await this.kc.getProfile();
      this.connected = true;
      this.logger.info(`✓ Connected to Kite as ${profile.user_id}`);
      return true;
    } catch (error) {
      this.logger.error("Kite connection failed:", describeError(error));
      return false;
    }
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async placeOrder(request: OrderRequest): Promise<OrderResult> {
    if (!this.connected) return failedOrder("Not connected to Kite");

    try {
      const order =
        request.orderType === "LIMIT" && request.price !== undefined
          ? await this.kc.placeOrder("regular", {
              exchange: "NFO",
              tradingsymbol: withoutExchange(request.symbol),
              transaction_type: request.side,
              quantity: request.quantity,
              price: request.price,
              product: this.product,
              order_type: "LIMIT",
              validity: "DAY",
            })
          : await this.kc.placeOrder("regular", {
              exchange: "NFO",
              tradingsymbol: withoutExchange(request.symbol),
              transaction_type: request.side,
              quantity: request.quantity,
              product: this.product,
              order_type: "MARKET",
              validity: "DAY",
            });

      this.logger.info(`Order placed: ${request.side} ${request.quantity} ${request.symbol} -> ${order.order_id}`);
      const status = await this.getOrderStatus(order.order_id);
      return {
        status: status?.status === "COMPLETE" ? "SUCCESS" : "PENDING",
        orderId: order.order_id,
        price: status?.averagePrice ?? null,
        message: status?.message ?? "placed",
        timestamp: new Date().toISOString(),
      };
    } catch (error) {
      this.logger.error(`Order failed for ${request.symbol}:`, describeError(error));
      return failedOrder(describeError(error));
    }
  }

  async cancelOrder(orderId: string): Promise<boolean> {
    try {
      await this.kc.cancelOrder("regular", orderId);
      return true;
    } catch (error) {
      this.logger.error(`Cancel failed for ${orderId}:`, describeError(error));
      return false;
    }
  }

  async getOrderStatus(orderId: string): Promise<OrderStatus | undefined> {
    try {
      const orders = await this.kc.getOrders();
      const order = orders.find((o) => o.order_id === orderId);
      if (!order) return undefined;
      return {
        orderId,
        status: String(order.status),
        averagePrice: order.average_price > 0 ? order.average_price : null,
        filledQuantity: order.filled_quantity,
        message: order.status_message ?? "",
      };
    } catch (error) {
      this.logger.warn(`Order status unavailable for ${orderId}:`, describeError(error));
      return undefined;
    }
  }

  async getPositions(): Promise<BrokerPosition[]> {
    try {
      const positions = await this.kc.getPositions();
      return positions.net.map((p) => ({
        symbol: p.tradingsymbol,
        quantity: p.quantity,
        averagePrice: p.average_price,
        lastPrice: p.last_price,
        pnl: p.pnl,
      }));
    } catch (error) {
      this.logger.error("Failed to fetch positions:", describeError(error));
      return [];
    }
  }

  async getLtp(symbol: string): Promise<number | undefined> {
    const key = withExchange(symbol);
    try {
      const ltp = await this.kc.getLTP([key]);
      return ltp[key]?.last_price;
    } catch (error) {
      this.logger.warn(`LTP unavailable for ${key}:`, describeError(error));
      return undefined;
    }
  }

  async getQuote(symbol: string): Promise<Quote | undefined> {
    const key = withExchange(symbol);
    try {
      const quotes = await this.kc.getQuote([key]);
      const quote = quotes[key];
      if (!quote) return undefined;
      return {
        symbol,
        lastPrice: quote.last_price,
        bid: null,
        ask: null,
        timestamp: new Date().toISOString(),
      };
    } catch (error) {
      this.logger.warn(`Quote unavailable for ${key}:`, describeError(error));
      return undefined;
    }
  }
}
