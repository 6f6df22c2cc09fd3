import { AmbiguousOutcomeError, ExchangeRejectedError, errorMessage, withTimeout } from '@tiered/errors';
import { createServiceLogger, type Logger } from '@tiered/logger';
import type {
  CancelAck,
  ExchangeConnector,
  ExchangeOrderStatus,
  MarketRules,
  OrderAck,
  PlaceOrderSpec,
} from '@tiered/types';

/**
 * Result of a call that must not be retried blindly. `unknown` means the
 * request may or may not have taken effect.
 */
export type Outcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'rejected'; reason: string }
  | { status: 'unknown'; reason: string; error: AmbiguousOutcomeError };

export interface GuardedExchangeOptions {
  timeoutMs: number;
  statusRetries: number;
  retryDelayMs?: number;
  logger?: Logger;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Timeout-bound access to the exchange. Reads are retried; order placement
 * and cancellation are attempted once and classified.
 */
export class GuardedExchange {
  private readonly logger: Logger;
  private readonly retryDelayMs: number;

  constructor(
    private readonly connector: ExchangeConnector,
    private readonly options: GuardedExchangeOptions
  ) {
    this.logger = options.logger ?? createServiceLogger('exchange', { exchange: connector.name });
    this.retryDelayMs = options.retryDelayMs ?? 250;
  }

  get name(): string {
    return this.connector.name;
  }

  place(spec: PlaceOrderSpec): Promise<Outcome<OrderAck>> {
    return this.once('placeOrder', () => this.connector.placeOrder(spec));
  }

  cancel(exchangeId: string, symbol: string): Promise<Outcome<CancelAck>> {
    return this.once('cancelOrder', () => this.connector.cancelOrder(exchangeId, symbol));
  }

  fetchOrderStatus(exchangeId: string, symbol: string): Promise<ExchangeOrderStatus> {
    return this.read('fetchOrderStatus', () => this.connector.fetchOrderStatus(exchangeId, symbol));
  }

  findOrderByClientId(clientOrderId: string, symbol: string): Promise<ExchangeOrderStatus | null> {
    return this.read('findOrderByClientId', () => this.connector.findOrderByClientId(clientOrderId, symbol));
  }

  fetchMarketPrice(symbol: string): Promise<string> {
    return this.read('fetchMarketPrice', () => this.connector.fetchMarketPrice(symbol));
  }

  fetchMarketRules(symbol: string): Promise<MarketRules> {
    return this.read('fetchMarketRules', () => this.connector.fetchMarketRules(symbol));
  }

  private async once<T>(operation: string, call: () => Promise<T>): Promise<Outcome<T>> {
    try {
      return { status: 'ok', value: await withTimeout(call(), this.options.timeoutMs, operation) };
    } catch (error) {
      if (error instanceof ExchangeRejectedError) {
        return { status: 'rejected', reason: error.message };
      }
      const ambiguous = new AmbiguousOutcomeError(operation, errorMessage(error));
      this.logger.warn({ code: ambiguous.code, ...ambiguous.details }, ambiguous.message);
      return { status: 'unknown', reason: errorMessage(error), error: ambiguous };
    }
  }

  private async read<T>(operation: string, call: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await withTimeout(call(), this.options.timeoutMs, operation);
      } catch (error) {
        if (error instanceof ExchangeRejectedError || attempt >= this.options.statusRetries) {
          throw error;
        }
        this.logger.debug({ operation, attempt, error: errorMessage(error) }, 'Retrying exchange read');
        await sleep(this.retryDelayMs * (attempt + 1));
      }
    }
  }
}
