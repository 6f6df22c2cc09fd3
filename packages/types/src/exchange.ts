import type { MarketRules } from './market.js';
import type { OrderKind, OrderSide } from './order.js';

export type ExchangeOrderState = 'OPEN' | 'PARTIALLY_FILLED' | 'FILLED' | 'CANCELED' | 'REJECTED';

export interface PlaceOrderSpec {
  clientOrderId: string;
  symbol: string;
  side: OrderSide;
  kind: OrderKind;
  price: string;
  amount: string;
}

export interface OrderAck {
  exchangeId: string;
  clientOrderId: string;
  acceptedAt: number;
}

export interface CancelAck {
  exchangeId: string;
  filledAmount?: string;
  canceledAt: number;
}

export interface ExchangeOrderStatus {
  exchangeId: string;
  clientOrderId?: string;
  symbol: string;
  state: ExchangeOrderState;
  filledAmount: string;
  averageFillPrice?: string;
  fees?: string;
  reason?: string;
}

/**
 * Boundary to the exchange client. Every call is fallible; only the fetch
 * operations are safe to retry blindly.
 */
export interface ExchangeConnector {
  readonly name: string;
  placeOrder(spec: PlaceOrderSpec): Promise<OrderAck>;
  cancelOrder(exchangeId: string, symbol: string): Promise<CancelAck>;
  fetchOrderStatus(exchangeId: string, symbol: string): Promise<ExchangeOrderStatus>;
  findOrderByClientId(clientOrderId: string, symbol: string): Promise<ExchangeOrderStatus | null>;
  fetchMarketPrice(symbol: string): Promise<string>;
  fetchMarketRules(symbol: string): Promise<MarketRules>;
}
