import { describe, it, expect } from 'vitest';
import type { Order } from '@tiered/types';
import type { SqlExecutor, TransactionClient } from '../database.js';
import { buildInsertSql, buildUpsertSql, ordersTable } from '../tables.js';
import { orderRowSchema } from '../rows.js';

interface Statement {
  text: string;
  params?: unknown[];
}

class RecordingExecutor implements SqlExecutor {
  readonly statements: Statement[] = [];
  readonly transactions: Statement[][] = [];
  rows: unknown[] = [];

  async query<T>(text: string, params?: unknown[]): Promise<T[]> {
    this.statements.push({ text, params });
    return this.rows.filter((row): row is T => row !== undefined);
  }

  async withTransaction<T>(fn: (client: TransactionClient) => Promise<T>): Promise<T> {
    const statements: Statement[] = [];
    this.transactions.push(statements);
    return fn({
      query: async (text, params) => {
        statements.push({ text, params });
        return undefined;
      },
    });
  }
}

const order: Order = {
  id: 'order-1',
  exchangeId: 'ex-1',
  clientOrderId: 'order-1',
  symbol: 'BTC/USDT',
  side: 'BUY',
  kind: 'LIMIT',
  price: '100',
  requestedAmount: '2',
  filledAmount: '0.5',
  averageFillPrice: '100',
  fees: '0.01',
  status: 'PARTIALLY_FILLED',
  createdAt: 1_000,
  lastUpdatedAt: 2_000,
  retryCount: 0,
};

describe('sql builders', () => {
  it('numbers placeholders row by row', () => {
    expect(buildInsertSql('t', ['id', 'a'], 2)).toBe('INSERT INTO t (id, a) VALUES ($1, $2), ($3, $4)');
  });

  it('updates every column except the key on conflict', () => {
    const sql = buildUpsertSql('t', ['id', 'a', 'b']);
    expect(sql).toContain('VALUES ($1, $2, $3)');
    expect(sql).toContain('ON CONFLICT (id) DO UPDATE SET a = EXCLUDED.a, b = EXCLUDED.b');
  });
});

describe('orders table', () => {
  it('upserts with nulls for absent optional fields', async () => {
    const db = new RecordingExecutor();
    await ordersTable(db).upsert(order);

    const [statement] = db.statements;
    expect(statement?.params?.slice(0, 4)).toEqual(['order-1', 'ex-1', 'order-1', null]);
    expect(statement?.params?.[14]).toBeNull();
  });

  it('replaces the table inside one transaction', async () => {
    const db = new RecordingExecutor();
    await ordersTable(db).replaceAll([order, { ...order, id: 'order-2' }]);

    expect(db.transactions).toHaveLength(1);
    const statements = db.transactions[0] ?? [];
    expect(statements.map((s) => s.text.split(' (')[0])).toEqual([
      'DELETE FROM orders',
      'INSERT INTO orders',
    ]);
    expect(statements[1]?.params).toHaveLength(36);
  });

  it('issues only the delete when replacing with nothing', async () => {
    const db = new RecordingExecutor();
    await ordersTable(db).replaceAll([]);
    expect(db.transactions[0]).toEqual([{ text: 'DELETE FROM orders', params: undefined }]);
  });

  it('maps loaded rows back to orders', async () => {
    const db = new RecordingExecutor();
    db.rows = [
      {
        id: 'order-1',
        exchange_id: 'ex-1',
        client_order_id: 'order-1',
        deal_id: null,
        symbol: 'BTC/USDT',
        side: 'BUY',
        kind: 'LIMIT',
        price: '100',
        requested_amount: '2',
        filled_amount: '0.5',
        average_fill_price: '100',
        fees: '0.01',
        status: 'PARTIALLY_FILLED',
        retry_count: 0,
        last_error: null,
        created_at: '1000',
        last_updated_at: '2000',
      },
    ];

    const [loaded] = await ordersTable(db).loadAll();
    expect(loaded).toEqual({ ...order, dealId: undefined, lastError: undefined });
  });

  it('rejects rows with an unknown status', () => {
    const result = orderRowSchema.safeParse({ id: 'x', status: 'LOST' });
    expect(result.success).toBe(false);
  });
});
