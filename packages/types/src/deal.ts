export type DealStatus = 'ACTIVE' | 'WAITING_SELL' | 'COMPLETED' | 'CANCELED' | 'FAILED';

export const DEAL_STATUSES: readonly DealStatus[] = [
  'ACTIVE',
  'WAITING_SELL',
  'COMPLETED',
  'CANCELED',
  'FAILED',
];

/**
 * A buy/sell round trip on one symbol. Order references are plain ids.
 */
export interface Deal {
  id: string;
  symbol: string;
  status: DealStatus;
  buyOrderId?: string;
  sellOrderId?: string;
  quoteAmount: string;
  targetProfitPercent: string;
  realizedProfit: string;
  createdAt: number;
  lastUpdatedAt: number;
  completedAt?: number;
  failureReason?: string;
}

export interface CreateDealParams {
  id?: string;
  symbol: string;
  quoteAmount: string;
  targetProfitPercent: string;
  createdAt?: number;
}

export interface DealStatistics {
  totalDeals: number;
  openDeals: number;
  completedDeals: number;
  canceledDeals: number;
  failedDeals: number;
  totalProfit: string;
}
