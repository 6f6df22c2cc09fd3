import { z } from 'zod';
import type { Deal, Order } from '@tiered/types';

const optionalText = z
  .string()
  .nullable()
  .transform((value) => value ?? undefined);

const optionalNumber = z.coerce
  .number()
  .int()
  .nullable()
  .transform((value) => value ?? undefined);

const decimalText = z.string().regex(/^-?\d+(\.\d+)?$/, 'Expected a decimal string');

export const orderRowSchema = z
  .object({
    id: z.string(),
    exchange_id: optionalText,
    client_order_id: optionalText,
    deal_id: optionalText,
    symbol: z.string(),
    side: z.enum(['BUY', 'SELL']),
    kind: z.enum(['LIMIT', 'MARKET', 'STOP', 'STOP_LIMIT']),
    price: decimalText,
    requested_amount: decimalText,
    filled_amount: decimalText,
    average_fill_price: decimalText.nullable().transform((value) => value ?? undefined),
    fees: decimalText,
    status: z.enum(['PENDING', 'PLACED', 'PARTIALLY_FILLED', 'FILLED', 'CANCELED', 'REJECTED']),
    retry_count: z.coerce.number().int().nonnegative(),
    last_error: optionalText,
    created_at: z.coerce.number().int(),
    last_updated_at: z.coerce.number().int(),
  })
  .transform(
    (row): Order => ({
      id: row.id,
      exchangeId: row.exchange_id,
      clientOrderId: row.client_order_id,
      symbol: row.symbol,
      side: row.side,
      kind: row.kind,
      price: row.price,
      requestedAmount: row.requested_amount,
      filledAmount: row.filled_amount,
      averageFillPrice: row.average_fill_price,
      fees: row.fees,
      status: row.status,
      dealId: row.deal_id,
      createdAt: row.created_at,
      lastUpdatedAt: row.last_updated_at,
      retryCount: row.retry_count,
      lastError: row.last_error,
    })
  );

export const dealRowSchema = z
  .object({
    id: z.string(),
    symbol: z.string(),
    status: z.enum(['ACTIVE', 'WAITING_SELL', 'COMPLETED', 'CANCELED', 'FAILED']),
    buy_order_id: optionalText,
    sell_order_id: optionalText,
    quote_amount: decimalText,
    target_profit_percent: decimalText,
    realized_profit: decimalText,
    created_at: z.coerce.number().int(),
    last_updated_at: z.coerce.number().int(),
    completed_at: optionalNumber,
    failure_reason: optionalText,
  })
  .transform(
    (row): Deal => ({
      id: row.id,
      symbol: row.symbol,
      status: row.status,
      buyOrderId: row.buy_order_id,
      sellOrderId: row.sell_order_id,
      quoteAmount: row.quote_amount,
      targetProfitPercent: row.target_profit_percent,
      realizedProfit: row.realized_profit,
      createdAt: row.created_at,
      lastUpdatedAt: row.last_updated_at,
      completedAt: row.completed_at,
      failureReason: row.failure_reason,
    })
  );

export function orderParams(order: Order): unknown[] {
  return [
    order.id,
    order.exchangeId ?? null,
    order.clientOrderId ?? null,
    order.dealId ?? null,
    order.symbol,
    order.side,
    order.kind,
    order.price,
    order.requestedAmount,
    order.filledAmount,
    order.averageFillPrice ?? null,
    order.fees,
    order.status,
    order.retryCount,
    order.lastError ?? null,
    order.createdAt,
    order.lastUpdatedAt,
    JSON.stringify(order),
  ];
}

export function dealParams(deal: Deal): unknown[] {
  return [
    deal.id,
    deal.symbol,
    deal.status,
    deal.buyOrderId ?? null,
    deal.sellOrderId ?? null,
    deal.quoteAmount,
    deal.targetProfitPercent,
    deal.realizedProfit,
    deal.createdAt,
    deal.lastUpdatedAt,
    deal.completedAt ?? null,
    deal.failureReason ?? null,
    JSON.stringify(deal),
  ];
}
