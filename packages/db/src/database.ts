import pg from 'pg';
import { createServiceLogger } from '@tiered/logger';

const { Pool } = pg;
type Pool = pg.Pool;
type PoolClient = pg.PoolClient;

const logger = createServiceLogger('db');

/** The subset of a pg client used inside a transaction. */
export interface TransactionClient {
  query(text: string, params?: unknown[]): Promise<unknown>;
}

/** What the durable tables need from a database. */
export interface SqlExecutor {
  query<T>(text: string, params?: unknown[]): Promise<T[]>;
  withTransaction<T>(fn: (client: TransactionClient) => Promise<T>): Promise<T>;
}

export interface DatabaseOptions {
  connectionString: string;
  max?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Thin wrapper over one pg pool. Owned by whoever connected it; there is no
 * process-wide instance.
 */
export class Database implements SqlExecutor {
  private readonly pool: Pool;

  constructor(options: DatabaseOptions) {
    this.pool = new Pool({
      connectionString: options.connectionString,
      max: options.max ?? 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: options.connectionTimeoutMillis ?? 10000,
    });

    this.pool.on('connect', () => logger.debug('New database connection established'));
    this.pool.on('error', (err) => logger.error({ error: err }, 'Database pool error'));
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async query<T>(text: string, params?: unknown[]): Promise<T[]> {
    const result = await this.pool.query(text, params);
    return result.rows;
  }

  async queryOne<T>(text: string, params?: unknown[]): Promise<T | null> {
    const rows = await this.query<T>(text, params);
    return rows[0] ?? null;
  }

  async withTransaction<T>(fn: (client: TransactionClient) => Promise<T>): Promise<T> {
    const client: PoolClient = await this.pool.connect();

    try {
      await client.query('BEGIN');
      const result = await fn({
        query: (text, params) => client.query(text, params),
      });
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('Database pool closed');
  }
}

