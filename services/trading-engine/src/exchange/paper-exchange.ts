import { Decimal } from '@tiered/domain';
import { ExchangeRejectedError } from '@tiered/errors';
import type {
  CancelAck,
  ExchangeConnector,
  ExchangeOrderStatus,
  MarketRules,
  OrderAck,
  PlaceOrderSpec,
} from '@tiered/types';

type Operation = 'placeOrder' | 'cancelOrder' | 'fetchOrderStatus' | 'findOrderByClientId';

export interface Fault {
  error: Error;
  /** Apply the request before failing, as when only the response is lost. */
  afterApply?: boolean;
}

interface PaperOrder {
  spec: PlaceOrderSpec;
  status: ExchangeOrderStatus;
}

const DEFAULT_RULES: Omit<MarketRules, 'symbol'> = {
  priceDecimals: 8,
  amountDecimals: 8,
  minAmount: '0',
  minNotional: '0',
};

/**
 * In-process exchange with a settable market. Orders rest until filled or
 * cancelled by hand; faults can be queued per operation.
 */
export class PaperExchange implements ExchangeConnector {
  readonly name = 'paper';
  private readonly orders = new Map<string, PaperOrder>();
  private readonly prices = new Map<string, string>();
  private readonly rules = new Map<string, MarketRules>();
  private readonly faults = new Map<Operation, Fault[]>();
  private nextId = 1;

  setMarketPrice(symbol: string, price: string): void {
    this.prices.set(symbol, price);
  }

  setMarketRules(rules: MarketRules): void {
    this.rules.set(rules.symbol, rules);
  }

  injectFault(operation: Operation, fault: Fault): void {
    const queue = this.faults.get(operation) ?? [];
    queue.push(fault);
    this.faults.set(operation, queue);
  }

  /** Seeds a resting order, as if placed earlier. */
  seedOrder(exchangeId: string, spec: PlaceOrderSpec, filledAmount = '0'): void {
    this.orders.set(exchangeId, {
      spec,
      status: {
        exchangeId,
        clientOrderId: spec.clientOrderId,
        symbol: spec.symbol,
        state: new Decimal(filledAmount).isZero() ? 'OPEN' : 'PARTIALLY_FILLED',
        filledAmount,
      },
    });
  }

  /** Sets the cumulative fill of a resting order. */
  fill(exchangeId: string, filledAmount: string, averageFillPrice?: string): void {
    const order = this.require(exchangeId);
    const complete = new Decimal(filledAmount).greaterThanOrEqualTo(order.spec.amount);
    order.status = {
      ...order.status,
      filledAmount,
      averageFillPrice: averageFillPrice ?? order.spec.price,
      state: complete ? 'FILLED' : 'PARTIALLY_FILLED',
    };
  }

  openOrders(symbol?: string): ExchangeOrderStatus[] {
    return Array.from(this.orders.values())
      .map((order) => order.status)
      .filter(
        (status) =>
          (status.state === 'OPEN' || status.state === 'PARTIALLY_FILLED') &&
          (symbol === undefined || status.symbol === symbol)
      );
  }

  async placeOrder(spec: PlaceOrderSpec): Promise<OrderAck> {
    return this.guard('placeOrder', () => {
      const rules = this.rulesFor(spec.symbol);
      const amount = new Decimal(spec.amount);
      if (amount.lessThan(rules.minAmount) || amount.mul(spec.price).lessThan(rules.minNotional)) {
        throw new ExchangeRejectedError('Order below market minimums', { symbol: spec.symbol });
      }

      const exchangeId = `paper-${this.nextId++}`;
      this.seedOrder(exchangeId, spec);
      return { exchangeId, clientOrderId: spec.clientOrderId, acceptedAt: Date.now() };
    });
  }

  async cancelOrder(exchangeId: string, _symbol: string): Promise<CancelAck> {
    return this.guard('cancelOrder', () => {
      const order = this.require(exchangeId);
      if (order.status.state !== 'OPEN' && order.status.state !== 'PARTIALLY_FILLED') {
        throw new ExchangeRejectedError(`Order ${exchangeId} is ${order.status.state}`, { exchangeId });
      }
      order.status = { ...order.status, state: 'CANCELED' };
      return { exchangeId, filledAmount: order.status.filledAmount, canceledAt: Date.now() };
    });
  }

  async fetchOrderStatus(exchangeId: string, _symbol: string): Promise<ExchangeOrderStatus> {
    return this.guard('fetchOrderStatus', () => ({ ...this.require(exchangeId).status }));
  }

  async findOrderByClientId(clientOrderId: string, symbol: string): Promise<ExchangeOrderStatus | null> {
    return this.guard('findOrderByClientId', () => {
      for (const order of this.orders.values()) {
        if (order.spec.clientOrderId === clientOrderId && order.spec.symbol === symbol) {
          return { ...order.status };
        }
      }
      return null;
    });
  }

  async fetchMarketPrice(symbol: string): Promise<string> {
    const price = this.prices.get(symbol);
    if (price === undefined) {
      throw new ExchangeRejectedError(`Unknown symbol ${symbol}`, { symbol });
    }
    return price;
  }

  async fetchMarketRules(symbol: string): Promise<MarketRules> {
    return this.rulesFor(symbol);
  }

  private rulesFor(symbol: string): MarketRules {
    return this.rules.get(symbol) ?? { symbol, ...DEFAULT_RULES };
  }

  private require(exchangeId: string): PaperOrder {
    const order = this.orders.get(exchangeId);
    if (order === undefined) {
      throw new ExchangeRejectedError(`Order ${exchangeId} not found`, { exchangeId });
    }
    return order;
  }

  private guard<T>(operation: Operation, apply: () => T): T {
    const fault = this.faults.get(operation)?.shift();
    if (fault === undefined) return apply();

    if (fault.afterApply === true) apply();
    throw fault.error;
  }
}
