import type { Deal, Order, Ticker } from '@tiered/types';
import { createServiceLogger } from '@tiered/logger';

export const testLogger = createServiceLogger('storage-test');

export function order(overrides: Partial<Order> = {}): Order {
  return {
    id: 'order-1',
    clientOrderId: 'order-1',
    symbol: 'BTC/USDT',
    side: 'BUY',
    kind: 'LIMIT',
    price: '100',
    requestedAmount: '1',
    filledAmount: '0',
    fees: '0',
    status: 'PENDING',
    createdAt: 1_000,
    lastUpdatedAt: 1_000,
    retryCount: 0,
    ...overrides,
  };
}

export function deal(overrides: Partial<Deal> = {}): Deal {
  return {
    id: 'deal-1',
    symbol: 'BTC/USDT',
    status: 'ACTIVE',
    quoteAmount: '100',
    targetProfitPercent: '1',
    realizedProfit: '0',
    createdAt: 1_000,
    lastUpdatedAt: 1_000,
    ...overrides,
  };
}

export function ticker(symbol: string, timestamp: number, last = '100'): Ticker {
  return {
    symbol,
    timestamp,
    last,
    bid: last,
    ask: last,
    high: last,
    low: last,
    open: last,
    close: last,
    baseVolume: '10',
    change: '0',
    percentage: '0',
  };
}

export function withOrderId(draft: Omit<Order, 'id'> & { id?: string }, id: string): Order {
  return { ...draft, id };
}
