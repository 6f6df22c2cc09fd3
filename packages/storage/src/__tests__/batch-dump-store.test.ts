import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readdir, rm, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Ticker } from '@tiered/types';
import { BatchDumpStore, type BatchDumpStoreOptions } from '../batch-dump-store.js';
import { decodeBatch, readBatchFile } from '../batch-file.js';
import { estimateBytes, tickerSchema } from '../observation-schema.js';
import { testLogger, ticker } from './fixtures.js';

const RECORD_BYTES = estimateBytes(tickerSchema, ticker('BTC/USDT', 1));

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'batch-store-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function store(overrides: Partial<BatchDumpStoreOptions<Ticker>> = {}) {
  return new BatchDumpStore<Ticker>({
    schema: tickerSchema,
    dumpDir: dir,
    memoryLimitBytes: RECORD_BYTES * 100,
    dumpThresholdBytes: RECORD_BYTES * 50,
    retentionDays: 7,
    retentionSweepIntervalMs: 60_000,
    logger: testLogger,
    ...overrides,
  });
}

async function batchFiles(): Promise<string[]> {
  return (await readdir(dir)).filter((name) => name.endsWith('.columnar.json.gz'));
}

describe('BatchDumpStore', () => {
  it('returns the most recent records oldest first', () => {
    const tickers = store();
    tickers.appendBatch([ticker('BTC/USDT', 1), ticker('BTC/USDT', 2), ticker('BTC/USDT', 3)]);

    expect(tickers.lastN(2).map((t) => t.timestamp)).toEqual([2, 3]);
    expect(tickers.lastN(0)).toEqual([]);
    expect(tickers.lastN(10)).toHaveLength(3);
  });

  it('filters by symbol and inclusive time bounds', () => {
    const tickers = store();
    tickers.appendBatch([
      ticker('BTC/USDT', 10),
      ticker('ETH/USDT', 15),
      ticker('BTC/USDT', 20),
      ticker('BTC/USDT', 30),
    ]);

    expect(tickers.rangeBySymbolAndTime('BTC/USDT', 10, 20).map((t) => t.timestamp)).toEqual([10, 20]);
    expect(tickers.latest('ETH/USDT')?.timestamp).toBe(15);
    expect(tickers.symbols()).toEqual(['BTC/USDT', 'ETH/USDT']);
  });

  it('dumps the buffer to a readable columnar file and clears it', async () => {
    const tickers = store();
    const records = [ticker('BTC/USDT', 1, '100.5'), ticker('ETH/USDT', 2, '2000')];
    tickers.appendBatch(records);

    const result = await tickers.forceDump();

    expect(result.recordCount).toBe(2);
    expect(tickers.memoryUsage().recordCount).toBe(0);
    expect(result.location).not.toBeNull();

    const file = await readBatchFile(result.location ?? '');
    expect(file.kind).toBe('tickers');
    expect(file.columns.map((column) => column.name)).toEqual(tickerSchema.columns.map((column) => column.name));
    expect(file.data['last']).toEqual(['100.5', '2000']);
    expect(decodeBatch(tickerSchema, file)).toEqual(records);
  });

  it('writes nothing when the buffer is empty', async () => {
    expect(await store().forceDump()).toEqual({ location: null, recordCount: 0 });
    expect(await batchFiles()).toEqual([]);
  });

  it('starts exactly one background dump when the threshold is crossed', async () => {
    const tickers = store();
    const batch = Array.from({ length: 50 }, (_, i) => ticker('BTC/USDT', i));

    expect(tickers.appendBatch(batch)).toBe(true);
    expect(tickers.memoryUsage().recordCount).toBe(0);

    tickers.append(ticker('BTC/USDT', 50));
    tickers.append(ticker('BTC/USDT', 51));
    expect(tickers.memoryUsage().recordCount).toBe(2);

    await tickers.forceDump();
    expect(await batchFiles()).toHaveLength(2);
    expect(tickers.getStats()).toMatchObject({ dumps: 2, dumpedRecords: 52 });
  });

  it('reports memory usage against the limit', () => {
    const tickers = store();
    tickers.appendBatch(Array.from({ length: 10 }, (_, i) => ticker('BTC/USDT', i)));

    expect(tickers.memoryUsage()).toEqual({
      recordCount: 10,
      estimatedBytes: RECORD_BYTES * 10,
      percentOfLimit: 10,
    });
  });

  it('keeps the batch in memory when the write fails', async () => {
    const blocker = join(dir, 'not-a-dir');
    await writeFile(blocker, 'x');
    const tickers = store({ dumpDir: blocker });
    tickers.appendBatch([ticker('BTC/USDT', 1), ticker('BTC/USDT', 2)]);

    await expect(tickers.forceDump()).rejects.toMatchObject({ code: 'BATCH_DUMP_ERROR' });
    expect(tickers.lastN(5).map((t) => t.timestamp)).toEqual([1, 2]);
    expect(tickers.getStats().dumpFailures).toBe(1);
  });

  it('evicts the oldest records above the memory limit while a dump runs', async () => {
    const tickers = store({
      memoryLimitBytes: RECORD_BYTES * 4,
      dumpThresholdBytes: RECORD_BYTES * 3,
    });

    tickers.appendBatch([ticker('BTC/USDT', 1), ticker('BTC/USDT', 2), ticker('BTC/USDT', 3)]);
    tickers.appendBatch([5, 6, 7, 8, 9].map((ts) => ticker('BTC/USDT', ts)));

    expect(tickers.lastN(10).map((t) => t.timestamp)).toEqual([6, 7, 8, 9]);
    expect(tickers.getStats().evicted).toBe(1);
    await tickers.forceDump();
  });

  it('dumps a batch that crosses both the threshold and the limit without evicting', async () => {
    const tickers = store({
      memoryLimitBytes: RECORD_BYTES * 10,
      dumpThresholdBytes: RECORD_BYTES * 8,
    });

    tickers.appendBatch(Array.from({ length: 15 }, (_, i) => ticker('BTC/USDT', i)));
    expect(tickers.memoryUsage().recordCount).toBe(0);

    await tickers.forceDump();
    expect(tickers.getStats()).toMatchObject({ evicted: 0, dumps: 1, dumpedRecords: 15 });
    expect(await batchFiles()).toHaveLength(1);
  });

  it('refuses appends after close but still dumps what it holds', async () => {
    const tickers = store();
    tickers.append(ticker('BTC/USDT', 1));
    tickers.close();

    expect(tickers.append(ticker('BTC/USDT', 2))).toBe(false);
    expect((await tickers.forceDump()).recordCount).toBe(1);
  });

  it('sweeps only expired files of its own kind', async () => {
    const tickers = store({ retentionDays: 7 });
    const now = new Date('2026-03-20T12:00:00Z');
    const old = new Date('2026-03-01T12:00:00Z');

    const oldTicker = join(dir, 'tickers_20260301_120000_000_1.columnar.json.gz');
    const freshTicker = join(dir, 'tickers_20260319_120000_000_2.columnar.json.gz');
    const oldIndicator = join(dir, 'indicators_20260301_120000_000_1.columnar.json.gz');
    for (const file of [oldTicker, freshTicker, oldIndicator]) {
      await writeFile(file, '');
    }
    await utimes(oldTicker, old, old);
    await utimes(oldIndicator, old, old);
    await utimes(freshTicker, now, now);

    expect(await tickers.sweepRetention(now)).toBe(1);
    expect((await batchFiles()).sort()).toEqual([
      'indicators_20260301_120000_000_1.columnar.json.gz',
      'tickers_20260319_120000_000_2.columnar.json.gz',
    ]);
  });

  it('leaves memory untouched when sweeping', async () => {
    const tickers = store();
    tickers.append(ticker('BTC/USDT', 1));
    await tickers.sweepRetention(new Date('2030-01-01T00:00:00Z'));
    expect(tickers.memoryUsage().recordCount).toBe(1);
  });
});
