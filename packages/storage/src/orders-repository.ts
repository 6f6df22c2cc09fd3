import { Decimal, canTransitionOrder, isOrderOpen } from '@tiered/domain';
import { InvalidTransitionError, InvariantViolationError } from '@tiered/errors';
import type { Order, OrderStatistics, OrderStatus } from '@tiered/types';
import { EntityRepository } from './entity-repository.js';
import type { Draft, Row } from './memory-table.js';

export class OrdersRepository extends EntityRepository<Order> {
  private readonly byExchangeId = new Map<string, string>();

  getByExchangeId(exchangeId: string): Row<Order> | undefined {
    const id = this.byExchangeId.get(exchangeId);
    if (id === undefined) return undefined;

    const order = this.table.get(id);
    if (order === undefined || order.exchangeId !== exchangeId) {
      this.byExchangeId.delete(exchangeId);
      return undefined;
    }
    return order;
  }

  /** Orders still working on the exchange. */
  getOpenOrders(side?: Order['side']): Row<Order>[] {
    return this.scan((order) => isOrderOpen(order) && (side === undefined || order.side === side));
  }

  getOrdersByDeal(dealId: string): Row<Order>[] {
    return this.scan((order) => order.dealId === dealId);
  }

  getOrdersBySymbol(symbol: string): Row<Order>[] {
    return this.scan((order) => order.symbol === symbol);
  }

  getOrdersByStatus(status: OrderStatus): Row<Order>[] {
    return this.scan((order) => order.status === status);
  }

  getStatistics(): OrderStatistics {
    const orders = this.scan();
    let totalVolume = new Decimal(0);
    let requested = new Decimal(0);
    const counts = { open: 0, filled: 0, canceled: 0, rejected: 0 };

    for (const order of orders) {
      requested = requested.plus(order.requestedAmount);
      totalVolume = totalVolume.plus(
        new Decimal(order.filledAmount).mul(order.averageFillPrice ?? order.price)
      );
      if (isOrderOpen(order)) counts.open++;
      if (order.status === 'FILLED') counts.filled++;
      if (order.status === 'CANCELED') counts.canceled++;
      if (order.status === 'REJECTED') counts.rejected++;
    }

    return {
      totalOrders: orders.length,
      openOrders: counts.open,
      filledOrders: counts.filled,
      canceledOrders: counts.canceled,
      rejectedOrders: counts.rejected,
      totalVolume: totalVolume.toString(),
      averageOrderSize: orders.length === 0 ? '0' : requested.div(orders.length).toString(),
    };
  }

  protected validate(draft: Draft<Order>, previous: Row<Order> | undefined): void {
    if (previous !== undefined) {
      if (previous.status !== draft.status && !canTransitionOrder(previous.status, draft.status)) {
        throw new InvalidTransitionError('Order', previous.id, previous.status, draft.status);
      }
      if (new Decimal(draft.filledAmount).lessThan(previous.filledAmount)) {
        throw new InvariantViolationError('Filled amount cannot decrease', {
          orderId: previous.id,
          filledAmount: previous.filledAmount,
          proposed: draft.filledAmount,
        });
      }
    }

    const filled = new Decimal(draft.filledAmount);
    if (filled.greaterThan(draft.requestedAmount)) {
      throw new InvariantViolationError('Filled amount exceeds requested amount', {
        orderId: draft.id,
        requestedAmount: draft.requestedAmount,
        filledAmount: draft.filledAmount,
      });
    }
    if (draft.status === 'FILLED' && !filled.equals(draft.requestedAmount)) {
      throw new InvariantViolationError('A filled order must have its full amount filled', {
        orderId: draft.id,
        requestedAmount: draft.requestedAmount,
        filledAmount: draft.filledAmount,
      });
    }
    const canceling = draft.status === 'CANCELED' && previous?.status !== 'CANCELED';
    if (canceling && filled.greaterThanOrEqualTo(draft.requestedAmount)) {
      throw new InvariantViolationError('A fully filled order cannot be canceled', {
        orderId: draft.id,
        requestedAmount: draft.requestedAmount,
        filledAmount: draft.filledAmount,
      });
    }

    if (draft.exchangeId !== undefined && draft.status !== 'REJECTED') {
      const holder = this.getByExchangeId(draft.exchangeId);
      if (holder !== undefined && holder.id !== draft.id && holder.status !== 'REJECTED') {
        throw new InvariantViolationError(`Exchange id ${draft.exchangeId} already belongs to another order`, {
          exchangeId: draft.exchangeId,
          orderId: draft.id,
          existingOrderId: holder.id,
        });
      }
    }
  }

  protected indexRow(row: Row<Order>, previous: Row<Order> | undefined): void {
    if (previous?.exchangeId !== undefined && previous.exchangeId !== row.exchangeId) {
      this.byExchangeId.delete(previous.exchangeId);
    }
    if (row.exchangeId === undefined) return;
    if (row.status !== 'REJECTED') {
      this.byExchangeId.set(row.exchangeId, row.id);
    } else if (this.byExchangeId.get(row.exchangeId) === row.id) {
      this.byExchangeId.delete(row.exchangeId);
    }
  }

  protected unindexRow(row: Row<Order>): void {
    if (row.exchangeId !== undefined && this.byExchangeId.get(row.exchangeId) === row.id) {
      this.byExchangeId.delete(row.exchangeId);
    }
  }

  protected rebuildIndexes(): void {
    this.byExchangeId.clear();
    for (const order of this.table.snapshot()) {
      this.indexRow(order, undefined);
    }
  }
}
