import { ServiceUnavailableError, errorMessage } from '@tiered/errors';
import { createServiceLogger } from '@tiered/logger';
import type { DurableStore } from '@tiered/storage';
import { Database, type DatabaseOptions } from './database.js';
import { ensureSchema } from './schema.js';
import { dealsTable, ordersTable } from './tables.js';

const logger = createServiceLogger('db');

export interface ConnectOptions extends Omit<DatabaseOptions, 'connectionString'> {
  connectionString?: string;
}

/**
 * Opens the pool, checks connectivity and applies the schema. Rejects with
 * ServiceUnavailableError when the database cannot be reached.
 */
export async function connectPostgres(options: ConnectOptions): Promise<DurableStore> {
  const { connectionString } = options;
  if (connectionString === undefined) {
    throw new ServiceUnavailableError('postgres');
  }

  const db = new Database({ ...options, connectionString });

  try {
    await db.ping();
    await ensureSchema(db);
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Durable store unreachable');
    await db.close();
    throw new ServiceUnavailableError('postgres');
  }

  logger.info('Durable store connected');

  return {
    orders: ordersTable(db),
    deals: dealsTable(db),
    close: () => db.close(),
  };
}

export { Database } from './database.js';
export type { DatabaseOptions, SqlExecutor, TransactionClient } from './database.js';
export { ensureSchema } from './schema.js';
export { PgTable, ordersTable, dealsTable, buildInsertSql, buildUpsertSql } from './tables.js';
export { orderRowSchema, dealRowSchema, orderParams, dealParams } from './rows.js';
