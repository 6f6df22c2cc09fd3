import { v4 as uuidv4 } from 'uuid';
import { InvalidTransitionError, InvariantViolationError } from '@tiered/errors';
import type { CreateDealParams, Deal, DealStatus, Order } from '@tiered/types';
import { toDecimal, toPositiveDecimal } from './decimal.js';
import { isOrderTerminal } from './order.js';

const DEAL_TRANSITIONS: Record<DealStatus, readonly DealStatus[]> = {
  ACTIVE: ['WAITING_SELL', 'CANCELED', 'FAILED'],
  WAITING_SELL: ['COMPLETED', 'CANCELED', 'FAILED'],
  COMPLETED: [],
  CANCELED: [],
  FAILED: [],
};

const TERMINAL_STATUSES: ReadonlySet<DealStatus> = new Set(['COMPLETED', 'CANCELED', 'FAILED']);

export function isDealTerminal(deal: Pick<Deal, 'status'>): boolean {
  return TERMINAL_STATUSES.has(deal.status);
}

export function canTransitionDeal(from: DealStatus, to: DealStatus): boolean {
  return DEAL_TRANSITIONS[from].includes(to);
}

function transition(deal: Deal, to: DealStatus, at: number, patch: Partial<Deal> = {}): Deal {
  if (!canTransitionDeal(deal.status, to)) {
    throw new InvalidTransitionError('Deal', deal.id, deal.status, to);
  }
  return { ...deal, ...patch, status: to, lastUpdatedAt: at };
}

export function createDeal(params: CreateDealParams): Deal {
  toPositiveDecimal(params.quoteAmount, 'quoteAmount');
  toDecimal(params.targetProfitPercent, 'targetProfitPercent');

  const createdAt = params.createdAt ?? Date.now();
  return {
    id: params.id ?? uuidv4(),
    symbol: params.symbol,
    status: 'ACTIVE',
    quoteAmount: params.quoteAmount,
    targetProfitPercent: params.targetProfitPercent,
    realizedProfit: '0',
    createdAt,
    lastUpdatedAt: createdAt,
  };
}

function assertLegAttachable(deal: Deal, order: Order, current: Order | undefined, side: Order['side']) {
  if (isDealTerminal(deal)) {
    throw new InvariantViolationError(`Deal ${deal.id} is ${deal.status}; order references are frozen`, {
      dealId: deal.id,
      orderId: order.id,
    });
  }
  if (order.side !== side) {
    throw new InvariantViolationError(`Order ${order.id} is not a ${side} order`, {
      dealId: deal.id,
      orderId: order.id,
      side: order.side,
    });
  }
  if (order.symbol !== deal.symbol) {
    throw new InvariantViolationError(`Order ${order.id} symbol does not match deal`, {
      dealId: deal.id,
      orderSymbol: order.symbol,
      dealSymbol: deal.symbol,
    });
  }
  if (current && current.id !== order.id && !isOrderTerminal(current)) {
    throw new InvariantViolationError(`Deal ${deal.id} already has an open ${side} leg`, {
      dealId: deal.id,
      openOrderId: current.id,
      orderId: order.id,
    });
  }
}

/**
 * Points the deal at a new buy order. `current` is the order the deal
 * references now, looked up by the caller.
 */
export function attachBuyLeg(
  deal: Deal,
  order: Order,
  current: Order | undefined,
  at: number = Date.now()
): Deal {
  assertLegAttachable(deal, order, current, 'BUY');
  if (deal.status !== 'ACTIVE') {
    throw new InvariantViolationError(`Deal ${deal.id} no longer accepts a buy leg`, {
      dealId: deal.id,
      status: deal.status,
    });
  }
  return { ...deal, buyOrderId: order.id, lastUpdatedAt: at };
}

export function attachSellLeg(
  deal: Deal,
  order: Order,
  current: Order | undefined,
  at: number = Date.now()
): Deal {
  assertLegAttachable(deal, order, current, 'SELL');
  return { ...deal, sellOrderId: order.id, lastUpdatedAt: at };
}

export function markWaitingSell(deal: Deal, at: number = Date.now()): Deal {
  return transition(deal, 'WAITING_SELL', at);
}

export function completeDeal(deal: Deal, realizedProfit: string, at: number = Date.now()): Deal {
  toDecimal(realizedProfit, 'realizedProfit');
  return transition(deal, 'COMPLETED', at, { realizedProfit, completedAt: at });
}

export function cancelDeal(deal: Deal, reason?: string, at: number = Date.now()): Deal {
  return transition(deal, 'CANCELED', at, { failureReason: reason, completedAt: at });
}

export function failDeal(deal: Deal, reason: string, at: number = Date.now()): Deal {
  return transition(deal, 'FAILED', at, { failureReason: reason, completedAt: at });
}
