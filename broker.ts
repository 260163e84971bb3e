/**
 * Broker abstraction shared by the mock and Zerodha implementations.
 */

// ---- Types -----------------------------------------------------------------
export type OrderSide = "BUY" | "SELL";
export type OrderType = "MARKET" | "LIMIT";
export type OrderState = "SUCCESS" | "PENDING" | "FAILED" | "CANCELLED";

export interface OrderRequest {
  /** NFO trading symbol, with or without an exchange prefix. */
  symbol: string;
  side: OrderSide;
  /** Units (lots times lot size). */
  quantity: number;
  orderType?: OrderType;
  price?: number;
  tag?: string;
}

export interface OrderResult {
  status: OrderState;
  orderId: string | null;
  /** Average fill price when the broker reports one. */
  price: number | null;
  message: string;
  timestamp: string;
}

export interface OrderStatus {
  orderId: string;
  status: string;
  averagePrice: number | null;
  filledQuantity: number;
  message: string;
}

export interface BrokerPosition {
  symbol: string;
  quantity: number;
  averagePrice: number;
  lastPrice: number;
  pnl: number;
}

export interface Quote {
  symbol: string;
  lastPrice: number;
  bid: number | null;
  ask: number | null;
  timestamp: string;
}

export interface Broker {
  readonly name: string;
  connect(): Promise<boolean>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  placeOrder(request: OrderRequest): Promise<OrderResult>;
  cancelOrder(orderId: string): Promise<boolean>;
  getOrderStatus(orderId: string): Promise<OrderStatus | undefined>;
  getPositions(): Promise<BrokerPosition[]>;
  getLtp(symbol: string): Promise<number | undefined>;
  getQuote(symbol: string): Promise<Quote | undefined>;
}

export function failedOrder(message: string): OrderResult {
  return { status: "FAILED", orderId: null, price: null, message, timestamp: new Date().toISOString() };
}
