import { z } from 'zod';
import type {
  IndicatorPoint,
  ObservationByKind,
  ObservationKind,
  OrderBookSnapshot,
  Ticker,
} from '@tiered/types';

export type ColumnType = 'string' | 'decimal' | 'timestamp' | 'levels';

export interface ColumnSpec<T> {
  name: keyof T & string;
  type: ColumnType;
}

/**
 * Column layout and validation for one observation kind. Column order is
 * the order written to batch files.
 */
export interface ObservationSchema<T> {
  kind: ObservationKind;
  columns: readonly ColumnSpec<T>[];
  record: z.ZodType<T, z.ZodTypeDef, unknown>;
}

const decimal = z.string().regex(/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/, 'Expected a decimal string');
const timestamp = z.number().int().nonnegative();
const level = z.tuple([decimal, decimal]);

const tickerRecord = z.object({
  symbol: z.string().min(1),
  timestamp,
  last: decimal,
  bid: decimal,
  ask: decimal,
  high: decimal,
  low: decimal,
  open: decimal,
  close: decimal,
  baseVolume: decimal,
  change: decimal,
  percentage: decimal,
});

const orderBookRecord = z.object({
  symbol: z.string().min(1),
  timestamp,
  bids: z.array(level),
  asks: z.array(level),
  bestBid: decimal,
  bestAsk: decimal,
  spread: decimal,
});

const indicatorRecord = z.object({
  symbol: z.string().min(1),
  timestamp,
  name: z.string().min(1),
  timeframe: z.string().min(1),
  value: decimal,
});

export const tickerSchema: ObservationSchema<Ticker> = {
  kind: 'tickers',
  columns: [
    { name: 'symbol', type: 'string' },
    { name: 'timestamp', type: 'timestamp' },
    { name: 'last', type: 'decimal' },
    { name: 'bid', type: 'decimal' },
    { name: 'ask', type: 'decimal' },
    { name: 'high', type: 'decimal' },
    { name: 'low', type: 'decimal' },
    { name: 'open', type: 'decimal' },
    { name: 'close', type: 'decimal' },
    { name: 'baseVolume', type: 'decimal' },
    { name: 'change', type: 'decimal' },
    { name: 'percentage', type: 'decimal' },
  ],
  record: tickerRecord,
};

export const orderBookSchema: ObservationSchema<OrderBookSnapshot> = {
  kind: 'orderBooks',
  columns: [
    { name: 'symbol', type: 'string' },
    { name: 'timestamp', type: 'timestamp' },
    { name: 'bids', type: 'levels' },
    { name: 'asks', type: 'levels' },
    { name: 'bestBid', type: 'decimal' },
    { name: 'bestAsk', type: 'decimal' },
    { name: 'spread', type: 'decimal' },
  ],
  record: orderBookRecord,
};

export const indicatorSchema: ObservationSchema<IndicatorPoint> = {
  kind: 'indicators',
  columns: [
    { name: 'symbol', type: 'string' },
    { name: 'timestamp', type: 'timestamp' },
    { name: 'name', type: 'string' },
    { name: 'timeframe', type: 'string' },
    { name: 'value', type: 'decimal' },
  ],
  record: indicatorRecord,
};

export const observationSchemas: { [K in ObservationKind]: ObservationSchema<ObservationByKind[K]> } = {
  tickers: tickerSchema,
  orderBooks: orderBookSchema,
  indicators: indicatorSchema,
};

const RECORD_OVERHEAD_BYTES = 64;

function estimateValue(value: unknown): number {
  if (typeof value === 'string') return 16 + value.length * 2;
  if (typeof value === 'number') return 8;
  if (Array.isArray(value)) {
    let total = 32;
    for (const item of value) total += estimateValue(item);
    return total;
  }
  return 8;
}

/** Rough in-memory footprint of one record, used for thresholds only. */
export function estimateBytes<T>(schema: ObservationSchema<T>, record: T): number {
  let total = RECORD_OVERHEAD_BYTES;
  for (const column of schema.columns) {
    total += estimateValue(record[column.name]);
  }
  return total;
}

export function toColumns<T>(schema: ObservationSchema<T>, records: readonly T[]): Record<string, unknown[]> {
  const data: Record<string, unknown[]> = {};
  for (const column of schema.columns) {
    data[column.name] = records.map((record) => record[column.name]);
  }
  return data;
}

/** Rebuilds records from column arrays, validating each one. */
export function fromColumns<T>(
  schema: ObservationSchema<T>,
  data: Record<string, unknown[]>,
  rowCount: number
): T[] {
  const records: T[] = [];
  for (let row = 0; row < rowCount; row++) {
    const candidate: Record<string, unknown> = {};
    for (const column of schema.columns) {
      candidate[column.name] = data[column.name]?.[row];
    }
    records.push(schema.record.parse(candidate));
  }
  return records;
}
