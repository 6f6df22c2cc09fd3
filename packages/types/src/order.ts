export type OrderSide = 'BUY' | 'SELL';
export type OrderKind = 'LIMIT' | 'MARKET' | 'STOP' | 'STOP_LIMIT';
export type OrderStatus =
  | 'PENDING'
  | 'PLACED'
  | 'PARTIALLY_FILLED'
  | 'FILLED'
  | 'CANCELED'
  | 'REJECTED';

export const ORDER_STATUSES: readonly OrderStatus[] = [
  'PENDING',
  'PLACED',
  'PARTIALLY_FILLED',
  'FILLED',
  'CANCELED',
  'REJECTED',
];

/**
 * One exchange order. Amounts and prices are decimal strings; timestamps are
 * epoch milliseconds. `dealId` is a lookup key, not an ownership edge.
 */
export interface Order {
  id: string;
  exchangeId?: string;
  clientOrderId?: string;
  symbol: string;
  side: OrderSide;
  kind: OrderKind;
  price: string;
  requestedAmount: string;
  filledAmount: string;
  averageFillPrice?: string;
  fees: string;
  status: OrderStatus;
  dealId?: string;
  createdAt: number;
  lastUpdatedAt: number;
  retryCount: number;
  lastError?: string;
}

export interface CreateOrderParams {
  id?: string;
  symbol: string;
  side: OrderSide;
  kind?: OrderKind;
  price: string;
  amount: string;
  dealId?: string;
  createdAt?: number;
}

export interface OrderStatistics {
  totalOrders: number;
  openOrders: number;
  filledOrders: number;
  canceledOrders: number;
  rejectedOrders: number;
  totalVolume: string;
  averageOrderSize: string;
}
