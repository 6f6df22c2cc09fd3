import { v4 as uuidv4 } from 'uuid';
import { InvalidTransitionError, InvariantViolationError } from '@tiered/errors';
import type {
  CreateOrderParams,
  ExchangeOrderStatus,
  Order,
  OrderStatus,
} from '@tiered/types';
import { Decimal, toDecimal, toPositiveDecimal } from './decimal.js';

const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  PENDING: ['PLACED', 'REJECTED'],
  PLACED: ['PARTIALLY_FILLED', 'FILLED', 'CANCELED', 'REJECTED'],
  PARTIALLY_FILLED: ['PLACED', 'PARTIALLY_FILLED', 'FILLED', 'CANCELED'],
  FILLED: [],
  CANCELED: [],
  REJECTED: [],
};

const OPEN_STATUSES: ReadonlySet<OrderStatus> = new Set(['PLACED', 'PARTIALLY_FILLED']);
const TERMINAL_STATUSES: ReadonlySet<OrderStatus> = new Set(['FILLED', 'CANCELED', 'REJECTED']);

export function canTransitionOrder(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

export function isOrderOpen(order: Pick<Order, 'status'>): boolean {
  return OPEN_STATUSES.has(order.status);
}

export function isOrderTerminal(order: Pick<Order, 'status'>): boolean {
  return TERMINAL_STATUSES.has(order.status);
}

function transition(order: Order, to: OrderStatus, at: number, patch: Partial<Order> = {}): Order {
  if (!canTransitionOrder(order.status, to)) {
    throw new InvalidTransitionError('Order', order.id, order.status, to);
  }
  return { ...order, ...patch, status: to, lastUpdatedAt: at };
}

export function createOrder(params: CreateOrderParams): Order {
  toPositiveDecimal(params.price, 'price');
  toPositiveDecimal(params.amount, 'amount');

  const id = params.id ?? uuidv4();
  const createdAt = params.createdAt ?? Date.now();

  return {
    id,
    clientOrderId: id,
    symbol: params.symbol,
    side: params.side,
    kind: params.kind ?? 'LIMIT',
    price: params.price,
    requestedAmount: params.amount,
    filledAmount: '0',
    fees: '0',
    status: 'PENDING',
    dealId: params.dealId,
    createdAt,
    lastUpdatedAt: createdAt,
    retryCount: 0,
  };
}

export function markPlaced(order: Order, exchangeId: string, at: number = Date.now()): Order {
  return transition(order, 'PLACED', at, { exchangeId, lastError: undefined });
}

export function remainingAmount(order: Order): Decimal {
  return new Decimal(order.requestedAmount).minus(order.filledAmount);
}

export function fillPercentage(order: Order): number {
  const requested = new Decimal(order.requestedAmount);
  if (requested.isZero()) return 0;
  return new Decimal(order.filledAmount).div(requested).mul(100).toNumber();
}

/**
 * Records cumulative fill progress. `totalFilled` is the exchange-reported
 * total, never a delta, and may not go backwards.
 */
export function applyFill(
  order: Order,
  totalFilled: string,
  options: { averagePrice?: string; fees?: string; at?: number } = {}
): Order {
  const at = options.at ?? Date.now();
  const requested = new Decimal(order.requestedAmount);
  const previous = new Decimal(order.filledAmount);
  const filled = toDecimal(totalFilled, 'filledAmount');

  if (filled.lessThan(previous)) {
    throw new InvariantViolationError('Filled amount cannot decrease', {
      orderId: order.id,
      filledAmount: order.filledAmount,
      reported: totalFilled,
    });
  }
  if (filled.greaterThan(requested)) {
    throw new InvariantViolationError('Filled amount exceeds requested amount', {
      orderId: order.id,
      requestedAmount: order.requestedAmount,
      reported: totalFilled,
    });
  }
  if (filled.equals(previous)) {
    return order;
  }

  let averageFillPrice = options.averagePrice;
  if (averageFillPrice === undefined) {
    const delta = filled.minus(previous);
    const previousNotional = new Decimal(order.averageFillPrice ?? '0').mul(previous);
    averageFillPrice = previousNotional.plus(delta.mul(order.price)).div(filled).toString();
  }

  const next: OrderStatus = filled.equals(requested) ? 'FILLED' : 'PARTIALLY_FILLED';
  return transition(order, next, at, {
    filledAmount: filled.toString(),
    averageFillPrice,
    fees: options.fees ?? order.fees,
  });
}

export function cancelOrder(order: Order, at: number = Date.now()): Order {
  if (!remainingAmount(order).greaterThan(0)) {
    throw new InvalidTransitionError('Order', order.id, order.status, 'CANCELED');
  }
  return transition(order, 'CANCELED', at);
}

export function rejectOrder(order: Order, reason: string, at: number = Date.now()): Order {
  return transition(order, 'REJECTED', at, { lastError: reason });
}

/**
 * Notes a failed attempt on the order without changing its state.
 */
export function recordOrderError(order: Order, reason: string, at: number = Date.now()): Order {
  return { ...order, lastError: reason, retryCount: order.retryCount + 1, lastUpdatedAt: at };
}

/**
 * Applies an exchange status report through the regular transitions.
 */
export function syncWithExchange(
  order: Order,
  report: ExchangeOrderStatus,
  at: number = Date.now()
): { order: Order; changed: boolean } {
  let next = order;

  if (next.exchangeId === undefined && next.status === 'PENDING') {
    next = markPlaced(next, report.exchangeId, at);
  }

  if (new Decimal(report.filledAmount).greaterThan(next.filledAmount)) {
    next = applyFill(next, report.filledAmount, {
      averagePrice: report.averageFillPrice,
      fees: report.fees,
      at,
    });
  }

  switch (report.state) {
    case 'CANCELED':
      if (isOrderOpen(next)) {
        next = cancelOrder(next, at);
      }
      break;
    case 'REJECTED':
      if (canTransitionOrder(next.status, 'REJECTED')) {
        next = rejectOrder(next, report.reason ?? 'rejected by exchange', at);
      }
      break;
    default:
      break;
  }

  return { order: next, changed: next !== order };
}
