import type { StaleOrderMonitorConfig } from '@tiered/config';
import {
  Decimal,
  applyFill,
  cancelOrder,
  createOrder,
  decimalPlaces,
  isOrderOpen,
  markPlaced,
  recordOrderError,
  rejectOrder,
  remainingAmount,
  roundDown,
  syncWithExchange,
} from '@tiered/domain';
import { OrderConstraintError, errorMessage } from '@tiered/errors';
import { createServiceLogger, type Logger } from '@tiered/logger';
import type { DealsRepository, OrdersRepository } from '@tiered/storage';
import type { ExchangeOrderStatus, MarketRules, Order } from '@tiered/types';
import type { GuardedExchange } from '../exchange/guarded-exchange.js';

export type StaleReason = 'age' | 'deviation';

export interface StalenessVerdict {
  stale: boolean;
  reasons: StaleReason[];
  ageMs: number;
  deviationPercent: number;
}

export interface MonitorStatistics {
  checksPerformed: number;
  staleOrdersFound: number;
  cancellations: number;
  recreations: number;
  recreationFailures: number;
  ambiguousOutcomes: number;
  skippedByCooldown: number;
  /** Deals or loose orders whose recreation cooldown has not yet expired. */
  cooldownsTracked: number;
  running: boolean;
  lastCheckAt?: number;
}

export interface StaleOrderMonitorDeps {
  orders: OrdersRepository;
  deals: DealsRepository;
  exchange: GuardedExchange;
  config: StaleOrderMonitorConfig;
  clock?: () => number;
  logger?: Logger;
}

type Counter = Exclude<keyof MonitorStatistics, 'cooldownsTracked' | 'running' | 'lastCheckAt'>;

/**
 * Replaces open buy orders that have aged out or drifted from the market:
 * cancel on the exchange, then place a fresh order near the current price.
 * Every exchange call whose outcome is unclear is verified before acting.
 */
export class StaleOrderMonitor {
  private readonly orders: OrdersRepository;
  private readonly deals: DealsRepository;
  private readonly exchange: GuardedExchange;
  private readonly config: StaleOrderMonitorConfig;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private readonly lastRecreation = new Map<string, number>();
  private readonly counters: Record<Counter, number> = {
    checksPerformed: 0,
    staleOrdersFound: 0,
    cancellations: 0,
    recreations: 0,
    recreationFailures: 0,
    ambiguousOutcomes: 0,
    skippedByCooldown: 0,
  };
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private lastCheckAt: number | undefined;
  private lastSummaryAt: number;
  private staleSinceSummary = 0;

  constructor(deps: StaleOrderMonitorDeps) {
    this.orders = deps.orders;
    this.deals = deps.deals;
    this.exchange = deps.exchange;
    this.config = deps.config;
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger ?? createServiceLogger('stale-order-monitor');
    this.lastSummaryAt = this.clock();
  }

  start(): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.config.checkIntervalMs);
    this.logger.info({ intervalMs: this.config.checkIntervalMs }, 'Stale order monitor started');
  }

  /** Stops the timer and waits for a check that is already running. */
  async stop(): Promise<void> {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('Stale order monitor stopped');
    }
    if (this.inFlight !== null) {
      await Promise.allSettled([this.inFlight]);
    }
  }

  isStale(order: Pick<Order, 'price' | 'createdAt'>, marketPrice: string, now: number = this.clock()): StalenessVerdict {
    const ageMs = now - order.createdAt;
    const price = new Decimal(order.price);
    const deviationPercent = new Decimal(marketPrice).minus(price).abs().div(price).mul(100).toNumber();

    const reasons: StaleReason[] = [];
    if (ageMs > this.config.maxAgeMs) reasons.push('age');
    if (deviationPercent > this.config.maxDeviationPercent) reasons.push('deviation');

    return { stale: reasons.length > 0, reasons, ageMs, deviationPercent };
  }

  /** One pass over open buy orders. Overlapping calls share the running pass. */
  runCheck(): Promise<void> {
    this.inFlight ??= this.check().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  getStatistics(): MonitorStatistics {
    return {
      ...this.counters,
      cooldownsTracked: this.lastRecreation.size,
      running: this.timer !== null,
      lastCheckAt: this.lastCheckAt,
    };
  }

  private async tick(): Promise<void> {
    try {
      await this.runCheck();
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Stale order check failed');
    }
  }

  private async check(): Promise<void> {
    const now = this.clock();
    this.counters.checksPerformed++;
    this.lastCheckAt = now;
    this.pruneCooldowns(now);

    const candidates = this.orders
      .getOpenOrders('BUY')
      .filter((order) => order.exchangeId !== undefined);

    for (const order of candidates) {
      try {
        await this.checkOrder(order);
      } catch (error) {
        this.logger.error({ orderId: order.id, error: errorMessage(error) }, 'Stale order handling failed');
      }
    }

    this.maybeLogSummary(now, candidates.length);
  }

  private pruneCooldowns(now: number): void {
    for (const [key, at] of this.lastRecreation) {
      if (now - at >= this.config.recreateCooldownMs) {
        this.lastRecreation.delete(key);
      }
    }
  }

  private async checkOrder(initial: Order): Promise<void> {
    const order = await this.refresh(initial);
    if (!isOrderOpen(order)) return;

    const marketPrice = await this.exchange.fetchMarketPrice(order.symbol);
    const now = this.clock();
    const verdict = this.isStale(order, marketPrice, now);
    if (!verdict.stale) return;

    this.counters.staleOrdersFound++;
    this.staleSinceSummary++;
    this.logger.warn(
      {
        orderId: order.id,
        dealId: order.dealId,
        symbol: order.symbol,
        price: order.price,
        marketPrice,
        reasons: verdict.reasons,
        ageMs: verdict.ageMs,
        deviationPercent: verdict.deviationPercent,
      },
      'Stale buy order detected'
    );

    const cooldownKey = this.cooldownKey(order);
    const last = this.lastRecreation.get(cooldownKey);
    if (last !== undefined && now - last < this.config.recreateCooldownMs) {
      this.counters.skippedByCooldown++;
      this.logger.info({ orderId: order.id, cooldownKey }, 'Recreation skipped, cooldown active');
      return;
    }

    const canceled = await this.cancel(order);
    if (canceled === null) return;

    await this.recreate(canceled, marketPrice);
  }

  /** Deals share one cooldown across their replacements; loose orders use their own id. */
  private cooldownKey(order: Order): string {
    return order.dealId ?? order.id;
  }

  /** Pulls the exchange view into memory; a failed read keeps the local view. */
  private async refresh(order: Order): Promise<Order> {
    if (order.exchangeId === undefined) return order;

    try {
      const report = await this.exchange.fetchOrderStatus(order.exchangeId, order.symbol);
      const synced = syncWithExchange(order, report, this.clock());
      return synced.changed ? this.orders.upsert(synced.order) : order;
    } catch (error) {
      this.logger.warn({ orderId: order.id, error: errorMessage(error) }, 'Order status refresh failed');
      return order;
    }
  }

  /**
   * Returns the canceled order, or null when the order must be left alone
   * (filled meanwhile, still open, or its state is unknown).
   */
  private async cancel(order: Order): Promise<Order | null> {
    if (order.exchangeId === undefined) return null;

    const outcome = await this.exchange.cancel(order.exchangeId, order.symbol);
    const now = this.clock();

    if (outcome.status === 'ok') {
      let current = order;
      const reportedFill = outcome.value.filledAmount;
      if (reportedFill !== undefined && new Decimal(reportedFill).greaterThan(current.filledAmount)) {
        current = applyFill(current, reportedFill, { at: now });
      }
      if (!isOrderOpen(current)) {
        this.orders.upsert(current);
        return null;
      }
      this.counters.cancellations++;
      const canceled = this.orders.upsert(cancelOrder(current, now));
      this.logger.info({ orderId: order.id, exchangeId: order.exchangeId }, 'Stale order canceled');
      return canceled;
    }

    if (outcome.status === 'unknown') {
      this.counters.ambiguousOutcomes++;
    }
    return this.verifyCancel(order, outcome.reason);
  }

  private async verifyCancel(order: Order, reason: string): Promise<Order | null> {
    if (order.exchangeId === undefined) return null;

    let synced: Order;
    try {
      const report = await this.exchange.fetchOrderStatus(order.exchangeId, order.symbol);
      synced = syncWithExchange(order, report, this.clock()).order;
    } catch (error) {
      this.counters.recreationFailures++;
      this.orders.upsert(recordOrderError(order, `Cancel unverified: ${errorMessage(error)}`, this.clock()));
      this.logger.error({ orderId: order.id, reason, error: errorMessage(error) }, 'Cancel outcome could not be verified');
      return null;
    }

    if (synced.status === 'CANCELED') {
      this.counters.cancellations++;
      this.logger.info({ orderId: order.id, reason }, 'Cancel confirmed by status check');
      return this.orders.upsert(synced);
    }
    if (synced.status === 'FILLED') {
      this.orders.upsert(synced);
      this.logger.info({ orderId: order.id }, 'Order filled before it could be canceled');
      return null;
    }

    this.counters.recreationFailures++;
    this.orders.upsert(recordOrderError(synced, `Cancel failed: ${reason}`, this.clock()));
    this.logger.error({ orderId: order.id, reason, status: synced.status }, 'Cancel failed, order still open');
    return null;
  }

  private async recreate(canceled: Order, marketPrice: string): Promise<void> {
    let spec: { price: string; amount: string };
    try {
      const rules = await this.exchange.fetchMarketRules(canceled.symbol);
      spec = this.replacementSpec(canceled, marketPrice, rules);
    } catch (error) {
      this.counters.recreationFailures++;
      this.orders.upsert(recordOrderError(canceled, `Replacement not placed: ${errorMessage(error)}`, this.clock()));
      this.logger.error({ orderId: canceled.id, error: errorMessage(error) }, 'Replacement order not placed');
      return;
    }

    const replacement = this.orders.upsert(
      createOrder({
        symbol: canceled.symbol,
        side: 'BUY',
        kind: 'LIMIT',
        price: spec.price,
        amount: spec.amount,
        dealId: canceled.dealId,
        createdAt: this.clock(),
      })
    );
    const clientOrderId = replacement.clientOrderId ?? replacement.id;

    const outcome = await this.exchange.place({
      clientOrderId,
      symbol: replacement.symbol,
      side: replacement.side,
      kind: replacement.kind,
      price: replacement.price,
      amount: replacement.requestedAmount,
    });

    switch (outcome.status) {
      case 'ok':
        this.onPlaced(canceled, this.orders.upsert(markPlaced(replacement, outcome.value.exchangeId, this.clock())));
        return;
      case 'rejected':
        this.failReplacement(canceled, replacement, outcome.reason);
        return;
      case 'unknown':
        this.counters.ambiguousOutcomes++;
        await this.resolvePlacement(canceled, replacement, clientOrderId, outcome.reason);
        return;
    }
  }

  /** Price just inside the market, never above it, on the exchange's grid. */
  private replacementSpec(canceled: Order, marketPrice: string, rules: MarketRules): { price: string; amount: string } {
    const market = new Decimal(marketPrice);
    const offset = market.mul(new Decimal(1).minus(new Decimal(this.config.priceOffsetPercent).div(100)));
    const price = roundDown(Decimal.min(offset, market), rules.priceDecimals);
    const amount = roundDown(remainingAmount(canceled), rules.amountDecimals);

    if (!price.greaterThan(0) || !amount.greaterThan(0)) {
      throw new OrderConstraintError('Replacement price or amount rounds to zero', 'INVALID_PRECISION', {
        price: price.toString(),
        amount: amount.toString(),
      });
    }
    if (amount.lessThan(rules.minAmount)) {
      throw new OrderConstraintError(`Amount ${amount.toString()} below minimum ${rules.minAmount}`, 'MIN_AMOUNT', {
        amount: amount.toString(),
        minAmount: rules.minAmount,
      });
    }
    if (amount.mul(price).lessThan(rules.minNotional)) {
      throw new OrderConstraintError(`Notional below minimum ${rules.minNotional}`, 'MIN_NOTIONAL', {
        notional: amount.mul(price).toString(),
        minNotional: rules.minNotional,
      });
    }
    return { price: price.toString(), amount: amount.toString() };
  }

  private async resolvePlacement(
    canceled: Order,
    replacement: Order,
    clientOrderId: string,
    reason: string
  ): Promise<void> {
    let found: ExchangeOrderStatus | null;
    try {
      found = await this.exchange.findOrderByClientId(clientOrderId, replacement.symbol);
    } catch (error) {
      this.counters.recreationFailures++;
      this.orders.upsert(recordOrderError(replacement, `Placement unverified: ${errorMessage(error)}`, this.clock()));
      this.logger.error(
        { orderId: replacement.id, reason, error: errorMessage(error) },
        'Replacement placement could not be verified, left pending'
      );
      return;
    }

    if (found === null) {
      this.failReplacement(canceled, replacement, `Not found after ambiguous placement: ${reason}`);
      return;
    }

    const synced = this.orders.upsert(syncWithExchange(replacement, found, this.clock()).order);
    if (synced.status === 'REJECTED') {
      this.failReplacement(canceled, synced, synced.lastError ?? reason);
      return;
    }
    this.logger.info({ orderId: replacement.id, exchangeId: found.exchangeId }, 'Ambiguous placement found on exchange');
    this.onPlaced(canceled, synced);
  }

  private failReplacement(canceled: Order, replacement: Order, reason: string): void {
    this.counters.recreationFailures++;
    if (replacement.status !== 'REJECTED') {
      this.orders.upsert(rejectOrder(replacement, reason, this.clock()));
    }
    this.orders.upsert(recordOrderError(canceled, `Replacement rejected: ${reason}`, this.clock()));
    this.logger.error({ orderId: canceled.id, replacementId: replacement.id, reason }, 'Replacement order rejected');
  }

  private onPlaced(canceled: Order, placed: Order): void {
    const now = this.clock();
    this.counters.recreations++;
    this.lastRecreation.set(this.cooldownKey(placed), now);

    if (canceled.dealId !== undefined) {
      try {
        const deal = this.deals.attachBuyLeg(canceled.dealId, placed, now);
        this.repriceSellLeg(deal.sellOrderId, placed, deal.targetProfitPercent);
      } catch (error) {
        this.logger.error(
          { dealId: canceled.dealId, orderId: placed.id, error: errorMessage(error) },
          'Deal not updated with replacement order'
        );
      }
    }

    this.logger.info(
      {
        oldOrderId: canceled.id,
        newOrderId: placed.id,
        exchangeId: placed.exchangeId,
        oldPrice: canceled.price,
        newPrice: placed.price,
        amount: placed.requestedAmount,
      },
      'Stale order replaced'
    );
  }

  /** A sell leg not yet sent to the exchange follows the new buy price. */
  private repriceSellLeg(sellOrderId: string | undefined, placed: Order, targetProfitPercent: string): void {
    if (sellOrderId === undefined) return;
    const sell = this.orders.get(sellOrderId);
    if (sell === undefined || sell.status !== 'PENDING') return;

    const price = new Decimal(placed.price).mul(new Decimal(1).plus(new Decimal(targetProfitPercent).div(100)));
    const decimals = Math.max(decimalPlaces(placed.price), decimalPlaces(sell.price));
    this.orders.upsert({
      ...sell,
      price: roundDown(price, decimals).toString(),
      requestedAmount: placed.requestedAmount,
      lastUpdatedAt: this.clock(),
    });
  }

  private maybeLogSummary(now: number, openBuyOrders: number): void {
    if (now - this.lastSummaryAt < this.config.summaryIntervalMs) return;

    if (this.staleSinceSummary === 0) {
      this.logger.info({ openBuyOrders, ...this.counters }, 'No stale orders since last summary');
    }
    this.lastSummaryAt = now;
    this.staleSinceSummary = 0;
  }
}
