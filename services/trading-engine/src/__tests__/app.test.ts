import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { StorageConfig } from '@tiered/config';
import { createOrder } from '@tiered/domain';
import { RepositoryFactory } from '@tiered/storage';
import type { Ticker } from '@tiered/types';
import { createApp } from '../app.js';
import type { MonitorStatistics } from '../monitor/stale-order-monitor.js';

const config: StorageConfig = {
  orders: { type: 'pureMemoryLegacy', maxRows: 100 },
  deals: { type: 'pureMemoryLegacy', maxRows: 100 },
  tickers: { type: 'pureMemoryLegacy', maxRecords: 100 },
  orderBooks: { type: 'pureMemoryLegacy', maxRecords: 100 },
  indicators: { type: 'pureMemoryLegacy', maxRecords: 100 },
  legacy: { maxRows: 100, maxRecords: 100 },
};

const monitorStatistics: MonitorStatistics = {
  checksPerformed: 3,
  staleOrdersFound: 1,
  cancellations: 1,
  recreations: 1,
  recreationFailures: 0,
  ambiguousOutcomes: 0,
  skippedByCooldown: 0,
  cooldownsTracked: 1,
  running: true,
};

function ticker(timestamp: number, last: string): Ticker {
  return {
    symbol: 'DOGE/USDT',
    timestamp,
    last,
    bid: last,
    ask: last,
    high: last,
    low: last,
    open: last,
    close: last,
    baseVolume: '1000',
    change: '0',
    percentage: '0',
  };
}

describe('trading engine HTTP surface', () => {
  let factory: RepositoryFactory;
  let shuttingDown: boolean;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    factory = new RepositoryFactory({ config });
    shuttingDown = false;
    app = createApp({
      factory,
      monitorStatistics: () => monitorStatistics,
      isShuttingDown: () => shuttingDown,
    });
  });

  describe('GET /health', () => {
    it('reports the backend of each built repository', async () => {
      await factory.get('orders');

      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('ok');
      expect(response.body.backends).toEqual({ orders: 'pureMemoryLegacy' });
    });

    it('returns 503 while shutting down', async () => {
      shuttingDown = true;

      const response = await request(app).get('/health');

      expect(response.status).toBe(503);
      expect(response.body.status).toBe('shutting_down');
    });
  });

  describe('GET /api/v1/stats', () => {
    it('combines repository and monitor statistics', async () => {
      await factory.get('deals');

      const response = await request(app).get('/api/v1/stats');

      expect(response.status).toBe(200);
      expect(response.body.monitor).toEqual(monitorStatistics);
      expect(response.body.repositories).toHaveLength(1);
      expect(response.body.repositories[0]).toMatchObject({ kind: 'deals', backend: 'pureMemoryLegacy', sync: null });
    });
  });

  describe('POST /api/v1/observations/:kind', () => {
    it('appends a validated batch', async () => {
      const response = await request(app)
        .post('/api/v1/observations/tickers')
        .send({ records: [ticker(1000, '0.10'), ticker(2000, '0.11')] });

      expect(response.status).toBe(202);
      expect(response.body).toEqual({ accepted: 2 });

      const latest = await request(app).get('/api/v1/observations/tickers/doge-usdt/latest');
      expect(latest.status).toBe(200);
      expect(latest.body).toMatchObject({ symbol: 'DOGE/USDT', timestamp: 2000, last: '0.11' });
    });

    it('rejects a record that fails validation', async () => {
      const response = await request(app)
        .post('/api/v1/observations/tickers')
        .send({ records: [{ ...ticker(1000, '0.10'), last: 'ten cents' }] });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('rejects a malformed JSON body', async () => {
      const response = await request(app)
        .post('/api/v1/observations/tickers')
        .set('Content-Type', 'application/json')
        .send('{"records": [');

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('BAD_REQUEST');
    });

    it('rejects an empty batch', async () => {
      const response = await request(app).post('/api/v1/observations/tickers').send({ records: [] });

      expect(response.status).toBe(400);
    });

    it('rejects an unknown kind', async () => {
      const response = await request(app)
        .post('/api/v1/observations/trades')
        .send({ records: [ticker(1000, '0.10')] });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('returns 503 once the stream is closed', async () => {
      await factory.get('tickers');
      await factory.closeStreams();

      const response = await request(app)
        .post('/api/v1/observations/tickers')
        .send({ records: [ticker(1000, '0.10')] });

      expect(response.status).toBe(503);
      expect(response.body.error).toMatchObject({
        code: 'SERVICE_UNAVAILABLE',
        message: 'Service tickers stream is temporarily unavailable',
      });
    });

    it('returns 404 for a symbol with no observations', async () => {
      const response = await request(app).get('/api/v1/observations/indicators/BTC-USDT/latest');

      expect(response.status).toBe(404);
      expect(response.body.error.message).toBe('indicators observation with id BTC/USDT not found');
    });
  });

  describe('admin routes', () => {
    it('deletes an order', async () => {
      const orders = await factory.get('orders');
      orders.upsert(createOrder({ id: 'order-1', symbol: 'DOGE/USDT', side: 'BUY', price: '0.10', amount: '100' }));

      const response = await request(app).delete('/api/v1/admin/orders/order-1');

      expect(response.status).toBe(204);
      expect(orders.get('order-1')).toBeUndefined();
    });

    it('returns 404 when deleting an unknown order', async () => {
      const response = await request(app).delete('/api/v1/admin/orders/missing');

      expect(response.status).toBe(404);
      expect(response.body.error).toMatchObject({ code: 'NOT_FOUND', message: 'Order with id missing not found' });
    });

    it('skips repositories without write-through on sync', async () => {
      await factory.get('orders');

      const response = await request(app).post('/api/v1/admin/sync');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({});
    });

    it('dumps every built stream', async () => {
      await factory.get('tickers');

      const response = await request(app).post('/api/v1/admin/dump');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ tickers: { ok: true, location: null, recordCount: 0 } });
    });
  });
});
