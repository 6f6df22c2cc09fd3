import type { z } from 'zod';
import type { Deal, Order } from '@tiered/types';
import type { DurableTable } from '@tiered/storage';
import type { SqlExecutor } from './database.js';
import { dealParams, dealRowSchema, orderParams, orderRowSchema } from './rows.js';

const INSERT_CHUNK_SIZE = 500;

interface TableMapping<T extends { id: string }> {
  table: string;
  columns: readonly string[];
  /** Columns read back on load; numerics come back as text. */
  select: string;
  toParams(entity: T): unknown[];
  rowSchema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

function placeholders(rowCount: number, columnCount: number): string {
  const rows: string[] = [];
  for (let row = 0; row < rowCount; row++) {
    const cells: string[] = [];
    for (let column = 0; column < columnCount; column++) {
      cells.push(`$${row * columnCount + column + 1}`);
    }
    rows.push(`(${cells.join(', ')})`);
  }
  return rows.join(', ');
}

export function buildUpsertSql(table: string, columns: readonly string[]): string {
  const updates = columns
    .filter((column) => column !== 'id')
    .map((column) => `${column} = EXCLUDED.${column}`)
    .join(', ');

  return `INSERT INTO ${table} (${columns.join(', ')}) VALUES ${placeholders(1, columns.length)}
    ON CONFLICT (id) DO UPDATE SET ${updates}`;
}

export function buildInsertSql(table: string, columns: readonly string[], rowCount: number): string {
  return `INSERT INTO ${table} (${columns.join(', ')}) VALUES ${placeholders(rowCount, columns.length)}`;
}

export class PgTable<T extends { id: string }> implements DurableTable<T> {
  readonly name: string;
  private readonly upsertSql: string;

  constructor(
    private readonly db: SqlExecutor,
    private readonly mapping: TableMapping<T>
  ) {
    this.name = mapping.table;
    this.upsertSql = buildUpsertSql(mapping.table, mapping.columns);
  }

  async upsert(entity: T): Promise<void> {
    await this.db.query(this.upsertSql, this.mapping.toParams(entity));
  }

  async remove(id: string): Promise<void> {
    await this.db.query(`DELETE FROM ${this.mapping.table} WHERE id = $1`, [id]);
  }

  async replaceAll(entities: readonly T[]): Promise<void> {
    const { table, columns } = this.mapping;

    await this.db.withTransaction(async (client) => {
      await client.query(`DELETE FROM ${table}`);

      for (let start = 0; start < entities.length; start += INSERT_CHUNK_SIZE) {
        const chunk = entities.slice(start, start + INSERT_CHUNK_SIZE);
        const params = chunk.flatMap((entity) => this.mapping.toParams(entity));
        await client.query(buildInsertSql(table, columns, chunk.length), params);
      }
    });
  }

  async loadAll(): Promise<T[]> {
    const rows = await this.db.query<unknown>(
      `SELECT ${this.mapping.select} FROM ${this.mapping.table} ORDER BY created_at ASC`
    );
    return rows.map((row) => this.mapping.rowSchema.parse(row));
  }
}

export function ordersTable(db: SqlExecutor): PgTable<Order> {
  return new PgTable(db, {
    table: 'orders',
    columns: [
      'id',
      'exchange_id',
      'client_order_id',
      'deal_id',
      'symbol',
      'side',
      'kind',
      'price',
      'requested_amount',
      'filled_amount',
      'average_fill_price',
      'fees',
      'status',
      'retry_count',
      'last_error',
      'created_at',
      'last_updated_at',
      'data',
    ],
    select: `id, exchange_id, client_order_id, deal_id, symbol, side, kind,
      price::text AS price, requested_amount::text AS requested_amount,
      filled_amount::text AS filled_amount, average_fill_price::text AS average_fill_price,
      fees::text AS fees, status, retry_count, last_error, created_at, last_updated_at`,
    toParams: orderParams,
    rowSchema: orderRowSchema,
  });
}

export function dealsTable(db: SqlExecutor): PgTable<Deal> {
  return new PgTable(db, {
    table: 'deals',
    columns: [
      'id',
      'symbol',
      'status',
      'buy_order_id',
      'sell_order_id',
      'quote_amount',
      'target_profit_percent',
      'realized_profit',
      'created_at',
      'last_updated_at',
      'completed_at',
      'failure_reason',
      'data',
    ],
    select: `id, symbol, status, buy_order_id, sell_order_id,
      quote_amount::text AS quote_amount, target_profit_percent::text AS target_profit_percent,
      realized_profit::text AS realized_profit, created_at, last_updated_at, completed_at,
      failure_reason`,
    toParams: dealParams,
    rowSchema: dealRowSchema,
  });
}
