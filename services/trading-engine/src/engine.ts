import {
  apiConfig,
  dbConfig,
  exchangeConfig,
  monitorConfig,
  shutdownConfig,
  storageConfig,
  type Env,
} from '@tiered/config';
import { connectPostgres } from '@tiered/db';
import { createServiceLogger } from '@tiered/logger';
import { RepositoryFactory, ShutdownCoordinator, type ShutdownStepReport } from '@tiered/storage';
import type { ExchangeConnector } from '@tiered/types';
import { createApp } from './app.js';
import { GuardedExchange } from './exchange/guarded-exchange.js';
import { PaperExchange } from './exchange/paper-exchange.js';
import { StaleOrderMonitor } from './monitor/stale-order-monitor.js';

const logger = createServiceLogger('engine');

export interface Engine {
  app: ReturnType<typeof createApp>;
  factory: RepositoryFactory;
  monitor: StaleOrderMonitor;
  exchange: ExchangeConnector;
  /** Flushes both storage tiers; safe to call more than once. */
  shutdown(): Promise<ShutdownStepReport[]>;
}

function createConnector(mode: Env['EXCHANGE_MODE']): ExchangeConnector {
  switch (mode) {
    case 'paper':
      return new PaperExchange();
  }
}

/**
 * Builds every repository up front so durable rows are loaded before the
 * monitor or the HTTP surface can touch them.
 */
export async function createEngine(env: Env): Promise<Engine> {
  const factory = new RepositoryFactory({
    config: storageConfig(env),
    connectDurable: () => connectPostgres(dbConfig(env)),
  });

  const [orders, deals] = await Promise.all([
    factory.get('orders'),
    factory.get('deals'),
    factory.get('tickers'),
    factory.get('orderBooks'),
    factory.get('indicators'),
  ]);
  await factory.startMaintenance();
  logger.info({ backends: factory.backendSummary() }, 'Repositories ready');

  const access = exchangeConfig(env);
  const exchange = createConnector(access.mode);
  const monitor = new StaleOrderMonitor({
    orders,
    deals,
    exchange: new GuardedExchange(exchange, { timeoutMs: access.timeoutMs, statusRetries: access.statusRetries }),
    config: monitorConfig(env),
  });

  let shuttingDown = false;
  const coordinator = new ShutdownCoordinator({
    factory,
    stopProducers: () => monitor.stop(),
    ...shutdownConfig(env),
  });

  const app = createApp({
    factory,
    monitorStatistics: () => monitor.getStatistics(),
    isShuttingDown: () => shuttingDown,
    rateLimitPerMinute: apiConfig(env).rateLimitPerMinute,
  });

  return {
    app,
    factory,
    monitor,
    exchange,
    shutdown: () => {
      shuttingDown = true;
      return coordinator.shutdown();
    },
  };
}
