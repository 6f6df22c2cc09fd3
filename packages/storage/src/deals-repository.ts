import { Decimal, attachBuyLeg, canTransitionDeal, isDealTerminal, isOrderTerminal } from '@tiered/domain';
import { InvalidTransitionError, InvariantViolationError, NotFoundError } from '@tiered/errors';
import type { Logger } from '@tiered/logger';
import type { Deal, DealStatistics, Order } from '@tiered/types';
import type { DurableSyncAdapter } from './durable-sync.js';
import { EntityRepository } from './entity-repository.js';
import type { Draft, MemoryTable, Row } from './memory-table.js';

/** Resolves an order id to its current state, usually `OrdersRepository.get`. */
export type OrderLookup = (orderId: string) => Order | undefined;

export class DealsRepository extends EntityRepository<Deal> {
  constructor(
    table: MemoryTable<Deal>,
    sync: DurableSyncAdapter<Deal> | null,
    logger: Logger,
    private readonly lookupOrder: OrderLookup
  ) {
    super(table, sync, logger);
  }

  getOpenDeals(): Row<Deal>[] {
    return this.scan((deal) => !isDealTerminal(deal));
  }

  getDealsBySymbol(symbol: string): Row<Deal>[] {
    return this.scan((deal) => deal.symbol === symbol);
  }

  getByBuyOrderId(orderId: string): Row<Deal> | undefined {
    return this.scan((deal) => deal.buyOrderId === orderId)[0];
  }

  /**
   * Points the deal at a replacement buy order. Fails when the deal is
   * terminal or its current buy order is still working.
   */
  attachBuyLeg(dealId: string, order: Order, at: number = Date.now()): Row<Deal> {
    const deal = this.require(dealId);
    const current = deal.buyOrderId === undefined ? undefined : this.lookupOrder(deal.buyOrderId);
    return this.upsert(attachBuyLeg(deal, order, current, at));
  }

  getStatistics(): DealStatistics {
    const deals = this.scan();
    let totalProfit = new Decimal(0);
    const counts = { open: 0, completed: 0, canceled: 0, failed: 0 };

    for (const deal of deals) {
      if (!isDealTerminal(deal)) counts.open++;
      if (deal.status === 'COMPLETED') {
        counts.completed++;
        totalProfit = totalProfit.plus(deal.realizedProfit);
      }
      if (deal.status === 'CANCELED') counts.canceled++;
      if (deal.status === 'FAILED') counts.failed++;
    }

    return {
      totalDeals: deals.length,
      openDeals: counts.open,
      completedDeals: counts.completed,
      canceledDeals: counts.canceled,
      failedDeals: counts.failed,
      totalProfit: totalProfit.toString(),
    };
  }

  private require(dealId: string): Row<Deal> {
    const deal = this.get(dealId);
    if (deal === undefined) {
      throw new NotFoundError('Deal', dealId);
    }
    return deal;
  }

  protected validate(draft: Draft<Deal>, previous: Row<Deal> | undefined): void {
    if (previous === undefined) return;

    if (previous.status !== draft.status && !canTransitionDeal(previous.status, draft.status)) {
      throw new InvalidTransitionError('Deal', previous.id, previous.status, draft.status);
    }
    if (
      isDealTerminal(previous) &&
      (previous.buyOrderId !== draft.buyOrderId || previous.sellOrderId !== draft.sellOrderId)
    ) {
      throw new InvariantViolationError(`Deal ${previous.id} is ${previous.status}; order references are frozen`, {
        dealId: previous.id,
      });
    }
    this.checkLegChange(previous, 'BUY', previous.buyOrderId, draft.buyOrderId);
    this.checkLegChange(previous, 'SELL', previous.sellOrderId, draft.sellOrderId);
  }

  /** A leg may only be repointed once the order it replaces is terminal. */
  private checkLegChange(
    deal: Row<Deal>,
    side: Order['side'],
    currentId: string | undefined,
    nextId: string | undefined
  ): void {
    if (currentId === undefined || currentId === nextId) return;

    const current = this.lookupOrder(currentId);
    if (current !== undefined && !isOrderTerminal(current)) {
      throw new InvariantViolationError(`Deal ${deal.id} already has an open ${side} leg`, {
        dealId: deal.id,
        orderId: currentId,
        status: current.status,
      });
    }
  }
}
