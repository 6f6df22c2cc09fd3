/**
 * Exchange trading constraints for one symbol.
 */
export interface MarketRules {
  symbol: string;
  priceDecimals: number;
  amountDecimals: number;
  minAmount: string;
  minNotional: string;
}

export type OrderbookLevel = [price: string, amount: string];

export interface Observation {
  symbol: string;
  timestamp: number;
}

export interface Ticker extends Observation {
  last: string;
  bid: string;
  ask: string;
  high: string;
  low: string;
  open: string;
  close: string;
  baseVolume: string;
  change: string;
  percentage: string;
}

export interface OrderBookSnapshot extends Observation {
  bids: OrderbookLevel[];
  asks: OrderbookLevel[];
  bestBid: string;
  bestAsk: string;
  spread: string;
}

export interface IndicatorPoint extends Observation {
  name: string;
  timeframe: string;
  value: string;
}

export type ObservationKind = 'tickers' | 'orderBooks' | 'indicators';

export interface ObservationByKind {
  tickers: Ticker;
  orderBooks: OrderBookSnapshot;
  indicators: IndicatorPoint;
}
