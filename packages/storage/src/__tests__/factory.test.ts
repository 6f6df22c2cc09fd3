import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { StorageConfig } from '@tiered/config';
import { RepositoryFactory } from '../factory.js';
import { FakeDurableStore } from './fake-durable-store.js';
import { deal, order, testLogger, ticker } from './fixtures.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'factory-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function config(dumpDir: string = dir): StorageConfig {
  const stream = {
    type: 'memoryWithBatchDump' as const,
    memoryLimitBytes: 1_000_000,
    dumpThresholdBytes: 500_000,
    retentionDays: 7,
    retentionSweepIntervalMs: 60_000,
    dumpDir,
  };
  return {
    orders: { type: 'memoryWithDurableSync', maxInFlight: 4, maxQueued: 100 },
    deals: { type: 'memoryWithDurableSync', maxInFlight: 4, maxQueued: 100 },
    tickers: stream,
    orderBooks: stream,
    indicators: stream,
    legacy: { maxRows: 1000, maxRecords: 1000 },
  };
}

describe('RepositoryFactory', () => {
  it('builds each kind once, even for concurrent first calls', async () => {
    const store = new FakeDurableStore();
    const connect = vi.fn(async () => store);
    const factory = new RepositoryFactory({ config: config(), connectDurable: connect, logger: testLogger });

    const [first, second] = await Promise.all([factory.get('orders'), factory.get('orders')]);
    await factory.get('deals');

    expect(first).toBe(second);
    expect(connect).toHaveBeenCalledTimes(1);
    expect(factory.backendOf('orders')).toBe('memoryWithDurableSync');
  });

  it('loads durable rows before handing out the repository', async () => {
    const store = new FakeDurableStore();
    store.orders.rows.set('order-7', order({ id: 'order-7', status: 'PLACED', exchangeId: 'ex-7' }));
    const factory = new RepositoryFactory({ config: config(), connectDurable: async () => store, logger: testLogger });

    const orders = await factory.get('orders');

    expect(orders.getByExchangeId('ex-7')?.id).toBe('order-7');
  });

  it('falls back to pure memory for atomic kinds when the durable store is down', async () => {
    const factory = new RepositoryFactory({
      config: config(),
      connectDurable: async () => {
        throw new Error('connection refused');
      },
      logger: testLogger,
    });

    const orders = await factory.get('orders');
    const tickers = await factory.get('tickers');

    expect(factory.backendOf('orders')).toBe('pureMemoryLegacy');
    expect(orders.isWriteThrough).toBe(false);
    expect(orders.upsert(order()).id).toBe('order-1');
    expect(factory.backendOf('tickers')).toBe('memoryWithBatchDump');
    expect(tickers.append(ticker('BTC/USDT', 1))).toBe(true);
  });

  it('falls back to a ring buffer when the dump directory is unusable', async () => {
    const blocker = join(dir, 'file');
    await writeFile(blocker, 'x');
    const factory = new RepositoryFactory({ config: config(blocker), logger: testLogger });

    const tickers = await factory.get('tickers');

    expect(tickers.backend).toBe('pureMemoryLegacy');
  });

  it('reports forced syncs per kind without failing fast', async () => {
    const store = new FakeDurableStore();
    const factory = new RepositoryFactory({ config: config(), connectDurable: async () => store, logger: testLogger });
    const orders = await factory.get('orders');
    await factory.get('deals');
    orders.upsert(order());
    store.deals.failWrites = true;

    const report = await factory.forceSyncAll();

    expect(report.orders).toMatchObject({ ok: true, rows: 1 });
    expect(report.deals).toMatchObject({ ok: false, error: 'Full resync of deals failed' });
    expect(store.orders.rows.has('order-1')).toBe(true);
  });

  it('wires deals to the orders repository for leg checks', async () => {
    const store = new FakeDurableStore();
    const factory = new RepositoryFactory({ config: config(), connectDurable: async () => store, logger: testLogger });

    const deals = await factory.get('deals');
    const orders = await factory.get('orders');
    orders.upsert(order({ status: 'PLACED', exchangeId: 'ex-1', dealId: 'deal-1' }));
    deals.upsert(deal({ buyOrderId: 'order-1' }));

    expect(() => deals.upsert(deal({ buyOrderId: 'order-2' }))).toThrow('Deal deal-1 already has an open BUY leg');
  });

  it('skips kinds that were never built', async () => {
    const factory = new RepositoryFactory({ config: config(), logger: testLogger });
    expect(await factory.forceSyncAll()).toEqual({});
    expect(await factory.forceDumpAll()).toEqual({});
  });

  it('dumps every cached stream', async () => {
    const factory = new RepositoryFactory({ config: config(), logger: testLogger });
    const tickers = await factory.get('tickers');
    await factory.get('indicators');
    tickers.append(ticker('BTC/USDT', 1));

    const report = await factory.forceDumpAll();

    expect(report.tickers).toMatchObject({ ok: true, recordCount: 1 });
    expect(report.indicators).toEqual({ ok: true, location: null, recordCount: 0 });
    expect(report.orderBooks).toBeUndefined();
  });

  it('closes the durable store it opened', async () => {
    const store = new FakeDurableStore();
    const factory = new RepositoryFactory({ config: config(), connectDurable: async () => store, logger: testLogger });
    await factory.get('orders');

    await factory.close();

    expect(store.closed).toBe(true);
  });
});
