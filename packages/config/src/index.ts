import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';

const MB = 1024 * 1024;

const atomicBackend = z.enum(['memoryWithDurableSync', 'pureMemoryLegacy']);
const streamBackend = z.enum(['memoryWithBatchDump', 'pureMemoryLegacy']);

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    LOG_FORMAT: z.enum(['json', 'pretty']).default('json'),

    DATABASE_URL: z.string().url().optional(),
    DATABASE_POOL_SIZE: z.coerce.number().int().positive().default(10),
    DATABASE_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

    API_PORT: z.coerce.number().int().positive().default(3000),
    API_HOST: z.string().default('0.0.0.0'),
    API_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(600),

    ORDERS_BACKEND: atomicBackend.default('memoryWithDurableSync'),
    DEALS_BACKEND: atomicBackend.default('memoryWithDurableSync'),
    TICKERS_BACKEND: streamBackend.default('memoryWithBatchDump'),
    ORDER_BOOKS_BACKEND: streamBackend.default('memoryWithBatchDump'),
    INDICATORS_BACKEND: streamBackend.default('memoryWithBatchDump'),

    LEGACY_MAX_ROWS: z.coerce.number().int().positive().default(50_000),
    LEGACY_MAX_RECORDS: z.coerce.number().int().positive().default(100_000),

    SYNC_MAX_IN_FLIGHT: z.coerce.number().int().positive().default(8),
    SYNC_MAX_QUEUED: z.coerce.number().int().positive().default(10_000),

    DUMP_DIR: z.string().min(1).default('data/batches'),
    TICKERS_MEMORY_LIMIT_MB: z.coerce.number().positive().default(64),
    TICKERS_DUMP_THRESHOLD_MB: z.coerce.number().positive().default(48),
    ORDER_BOOKS_MEMORY_LIMIT_MB: z.coerce.number().positive().default(128),
    ORDER_BOOKS_DUMP_THRESHOLD_MB: z.coerce.number().positive().default(96),
    INDICATORS_MEMORY_LIMIT_MB: z.coerce.number().positive().default(32),
    INDICATORS_DUMP_THRESHOLD_MB: z.coerce.number().positive().default(24),
    RETENTION_DAYS: z.coerce.number().int().positive().default(7),
    RETENTION_SWEEP_INTERVAL_MINUTES: z.coerce.number().positive().default(60),

    STALE_MAX_AGE_MINUTES: z.coerce.number().positive().default(15),
    STALE_MAX_DEVIATION_PERCENT: z.coerce.number().positive().default(3),
    STALE_CHECK_INTERVAL_SECONDS: z.coerce.number().positive().default(30),
    STALE_RECREATE_COOLDOWN_MINUTES: z.coerce.number().nonnegative().default(1),
    STALE_PRICE_OFFSET_PERCENT: z.coerce.number().nonnegative().default(0.1),
    STALE_SUMMARY_INTERVAL_MINUTES: z.coerce.number().positive().default(5),

    EXCHANGE_MODE: z.enum(['paper']).default('paper'),
    EXCHANGE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    EXCHANGE_STATUS_RETRIES: z.coerce.number().int().nonnegative().default(2),

    SHUTDOWN_DRAIN_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    SHUTDOWN_STEP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  })
  .superRefine((env, ctx) => {
    const pairs = [
      ['TICKERS_DUMP_THRESHOLD_MB', env.TICKERS_DUMP_THRESHOLD_MB, env.TICKERS_MEMORY_LIMIT_MB],
      ['ORDER_BOOKS_DUMP_THRESHOLD_MB', env.ORDER_BOOKS_DUMP_THRESHOLD_MB, env.ORDER_BOOKS_MEMORY_LIMIT_MB],
      ['INDICATORS_DUMP_THRESHOLD_MB', env.INDICATORS_DUMP_THRESHOLD_MB, env.INDICATORS_MEMORY_LIMIT_MB],
    ] as const;

    for (const [key, threshold, limit] of pairs) {
      if (threshold >= limit) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Dump threshold (${threshold}MB) must be below the memory limit (${limit}MB)`,
        });
      }
    }
  });

export type Env = z.infer<typeof envSchema>;

export type AtomicBackend = z.infer<typeof atomicBackend>;
export type StreamBackend = z.infer<typeof streamBackend>;

export type AtomicBackendConfig =
  | { type: 'memoryWithDurableSync'; maxInFlight: number; maxQueued: number }
  | { type: 'pureMemoryLegacy'; maxRows: number };

export type StreamBackendConfig =
  | {
      type: 'memoryWithBatchDump';
      memoryLimitBytes: number;
      dumpThresholdBytes: number;
      retentionDays: number;
      retentionSweepIntervalMs: number;
      dumpDir: string;
    }
  | { type: 'pureMemoryLegacy'; maxRecords: number };

export interface StorageConfig {
  orders: AtomicBackendConfig;
  deals: AtomicBackendConfig;
  tickers: StreamBackendConfig;
  orderBooks: StreamBackendConfig;
  indicators: StreamBackendConfig;
  /** Capacities used when a configured backend falls back to pure memory. */
  legacy: { maxRows: number; maxRecords: number };
}

export interface StaleOrderMonitorConfig {
  maxAgeMs: number;
  maxDeviationPercent: number;
  checkIntervalMs: number;
  recreateCooldownMs: number;
  /** Positive values place the replacement below the market price. */
  priceOffsetPercent: number;
  summaryIntervalMs: number;
}

export interface ExchangeAccessConfig {
  mode: Env['EXCHANGE_MODE'];
  timeoutMs: number;
  statusRetries: number;
}

export interface ShutdownConfig {
  drainTimeoutMs: number;
  stepTimeoutMs: number;
}

export function parseConfig(env: Record<string, string | undefined>) {
  return envSchema.safeParse(env);
}

/** Applies `.env` from the working directory and the monorepo root. Set variables win. */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  dotenvConfig({ path: resolve(cwd, '.env') });
  dotenvConfig({ path: resolve(cwd, '..', '..', '.env') });
}

// runs on import, so packages that read process.env at load see .env values
loadEnvFiles();

export function loadConfig(): Env {
  const result = parseConfig(process.env);

  if (!result.success) {
    console.error('Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

function atomicBackendConfig(
  type: AtomicBackend,
  env: Env
): AtomicBackendConfig {
  if (type === 'pureMemoryLegacy') {
    return { type, maxRows: env.LEGACY_MAX_ROWS };
  }
  return { type, maxInFlight: env.SYNC_MAX_IN_FLIGHT, maxQueued: env.SYNC_MAX_QUEUED };
}

function streamBackendConfig(
  type: StreamBackend,
  limitMb: number,
  thresholdMb: number,
  env: Env
): StreamBackendConfig {
  if (type === 'pureMemoryLegacy') {
    return { type, maxRecords: env.LEGACY_MAX_RECORDS };
  }
  return {
    type,
    memoryLimitBytes: Math.floor(limitMb * MB),
    dumpThresholdBytes: Math.floor(thresholdMb * MB),
    retentionDays: env.RETENTION_DAYS,
    retentionSweepIntervalMs: env.RETENTION_SWEEP_INTERVAL_MINUTES * 60_000,
    dumpDir: resolve(env.DUMP_DIR),
  };
}

export function storageConfig(env: Env): StorageConfig {
  return {
    orders: atomicBackendConfig(env.ORDERS_BACKEND, env),
    deals: atomicBackendConfig(env.DEALS_BACKEND, env),
    tickers: streamBackendConfig(
      env.TICKERS_BACKEND,
      env.TICKERS_MEMORY_LIMIT_MB,
      env.TICKERS_DUMP_THRESHOLD_MB,
      env
    ),
    orderBooks: streamBackendConfig(
      env.ORDER_BOOKS_BACKEND,
      env.ORDER_BOOKS_MEMORY_LIMIT_MB,
      env.ORDER_BOOKS_DUMP_THRESHOLD_MB,
      env
    ),
    indicators: streamBackendConfig(
      env.INDICATORS_BACKEND,
      env.INDICATORS_MEMORY_LIMIT_MB,
      env.INDICATORS_DUMP_THRESHOLD_MB,
      env
    ),
    legacy: { maxRows: env.LEGACY_MAX_ROWS, maxRecords: env.LEGACY_MAX_RECORDS },
  };
}

export function monitorConfig(env: Env): StaleOrderMonitorConfig {
  return {
    maxAgeMs: env.STALE_MAX_AGE_MINUTES * 60_000,
    maxDeviationPercent: env.STALE_MAX_DEVIATION_PERCENT,
    checkIntervalMs: env.STALE_CHECK_INTERVAL_SECONDS * 1000,
    recreateCooldownMs: env.STALE_RECREATE_COOLDOWN_MINUTES * 60_000,
    priceOffsetPercent: env.STALE_PRICE_OFFSET_PERCENT,
    summaryIntervalMs: env.STALE_SUMMARY_INTERVAL_MINUTES * 60_000,
  };
}

export function exchangeConfig(env: Env): ExchangeAccessConfig {
  return {
    mode: env.EXCHANGE_MODE,
    timeoutMs: env.EXCHANGE_TIMEOUT_MS,
    statusRetries: env.EXCHANGE_STATUS_RETRIES,
  };
}

export function shutdownConfig(env: Env): ShutdownConfig {
  return {
    drainTimeoutMs: env.SHUTDOWN_DRAIN_TIMEOUT_MS,
    stepTimeoutMs: env.SHUTDOWN_STEP_TIMEOUT_MS,
  };
}

export function dbConfig(env: Env) {
  return {
    connectionString: env.DATABASE_URL,
    max: env.DATABASE_POOL_SIZE,
    connectionTimeoutMillis: env.DATABASE_CONNECT_TIMEOUT_MS,
  };
}

export function apiConfig(env: Env) {
  return {
    port: env.API_PORT,
    host: env.API_HOST,
    rateLimitPerMinute: env.API_RATE_LIMIT_PER_MINUTE,
  };
}

export function logConfig(env: Env) {
  return {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
  };
}
