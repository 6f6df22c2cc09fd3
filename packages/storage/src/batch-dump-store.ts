import { access, mkdir } from 'fs/promises';
import { constants } from 'fs';
import { BatchDumpError, errorMessage } from '@tiered/errors';
import type { Logger } from '@tiered/logger';
import type { Observation } from '@tiered/types';
import { sweepBatchFiles, writeBatchFile } from './batch-file.js';
import { estimateBytes, type ObservationSchema } from './observation-schema.js';
import type { DumpResult, MemoryUsage, StreamRepository, StreamStats } from './stream-store.js';

export interface BatchDumpStoreOptions<T> {
  schema: ObservationSchema<T>;
  dumpDir: string;
  memoryLimitBytes: number;
  dumpThresholdBytes: number;
  retentionDays: number;
  retentionSweepIntervalMs: number;
  logger: Logger;
}

/**
 * Memory buffer that spills to columnar batch files. Crossing the dump
 * threshold starts one background dump; the hard limit evicts oldest records.
 */
export class BatchDumpStore<T extends Observation> implements StreamRepository<T> {
  readonly backend = 'memoryWithBatchDump';
  private buffer: T[] = [];
  private bufferBytes = 0;
  private inFlight: Promise<DumpResult> | null = null;
  private sequence = 0;
  private closed = false;
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly logger: Logger;
  private readonly stats: Omit<StreamStats, 'backend'> = {
    appended: 0,
    rejectedAfterClose: 0,
    evicted: 0,
    dumps: 0,
    dumpedRecords: 0,
    dumpFailures: 0,
    retentionDeleted: 0,
  };

  constructor(private readonly options: BatchDumpStoreOptions<T>) {
    if (options.dumpThresholdBytes >= options.memoryLimitBytes) {
      throw new BatchDumpError('Dump threshold must be below the memory limit', {
        kind: options.schema.kind,
        dumpThresholdBytes: options.dumpThresholdBytes,
        memoryLimitBytes: options.memoryLimitBytes,
      });
    }
    this.logger = options.logger;
  }

  /** Creates the store after making sure the dump directory is writable. */
  static async open<T extends Observation>(options: BatchDumpStoreOptions<T>): Promise<BatchDumpStore<T>> {
    await mkdir(options.dumpDir, { recursive: true });
    await access(options.dumpDir, constants.W_OK);
    return new BatchDumpStore(options);
  }

  append(record: T): boolean {
    return this.appendBatch([record]);
  }

  appendBatch(records: readonly T[]): boolean {
    if (this.closed) {
      this.stats.rejectedAfterClose += records.length;
      return false;
    }

    for (const record of records) {
      this.buffer.push(record);
      this.bufferBytes += estimateBytes(this.options.schema, record);
    }
    this.stats.appended += records.length;

    // the dump takes the buffer synchronously, so only records arriving during a dump can be evicted
    if (this.bufferBytes >= this.options.dumpThresholdBytes && this.inFlight === null) {
      void this.autoDump();
    }
    this.enforceLimit();
    return true;
  }

  lastN(n: number): T[] {
    if (n <= 0) return [];
    return this.buffer.slice(-n);
  }

  rangeBySymbolAndTime(symbol: string, from: number, to: number): T[] {
    return this.buffer.filter(
      (record) => record.symbol === symbol && record.timestamp >= from && record.timestamp <= to
    );
  }

  latest(symbol: string): T | undefined {
    for (let i = this.buffer.length - 1; i >= 0; i--) {
      const record = this.buffer[i];
      if (record !== undefined && record.symbol === symbol) return record;
    }
    return undefined;
  }

  symbols(): string[] {
    return Array.from(new Set(this.buffer.map((record) => record.symbol)));
  }

  /**
   * Writes everything buffered to one batch file and clears the buffer.
   * Waits for a dump already running first.
   */
  async forceDump(): Promise<DumpResult> {
    while (this.inFlight !== null) {
      await Promise.allSettled([this.inFlight]);
    }
    return this.startDump();
  }

  memoryUsage(): MemoryUsage {
    return {
      recordCount: this.buffer.length,
      estimatedBytes: this.bufferBytes,
      percentOfLimit: (this.bufferBytes / this.options.memoryLimitBytes) * 100,
    };
  }

  /** Deletes expired batch files of this kind. In-memory records are untouched. */
  async sweepRetention(now: Date = new Date()): Promise<number> {
    const deleted = await sweepBatchFiles(
      this.options.dumpDir,
      this.options.schema.kind,
      this.options.retentionDays,
      now
    );
    this.stats.retentionDeleted += deleted.length;
    if (deleted.length > 0) {
      this.logger.info({ deleted: deleted.length }, 'Expired batch files removed');
    }
    return deleted.length;
  }

  startMaintenance(): void {
    if (this.sweepTimer !== null) return;
    this.sweepTimer = setInterval(() => {
      this.sweepRetention().catch((error: unknown) => {
        this.stats.lastError = errorMessage(error);
        this.logger.warn({ error: errorMessage(error) }, 'Retention sweep failed');
      });
    }, this.options.retentionSweepIntervalMs);
    this.sweepTimer.unref();
  }

  stopMaintenance(): void {
    if (this.sweepTimer !== null) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /** Rejects further appends. Buffered records stay available for the final dump. */
  close(): void {
    this.closed = true;
    this.stopMaintenance();
  }

  getStats(): StreamStats {
    return { backend: this.backend, ...this.stats };
  }

  private startDump(): Promise<DumpResult> {
    const batch = this.buffer;
    const bytes = this.bufferBytes;
    this.buffer = [];
    this.bufferBytes = 0;

    if (batch.length === 0) {
      return Promise.resolve({ location: null, recordCount: 0 });
    }

    const dump = this.writeBatch(batch, bytes);
    this.inFlight = dump;
    const clear = () => {
      if (this.inFlight === dump) this.inFlight = null;
    };
    void dump.then(clear, clear);
    return dump;
  }

  private async writeBatch(batch: T[], bytes: number): Promise<DumpResult> {
    try {
      const location = await writeBatchFile(this.options.dumpDir, this.options.schema, batch, ++this.sequence);
      this.stats.dumps++;
      this.stats.dumpedRecords += batch.length;
      this.stats.lastDumpLocation = location;
      this.logger.info({ location, records: batch.length }, 'Batch dumped');
      return { location, recordCount: batch.length };
    } catch (error) {
      this.buffer = batch.concat(this.buffer);
      this.bufferBytes += bytes;
      this.stats.dumpFailures++;
      this.stats.lastError = errorMessage(error);
      this.enforceLimit();
      throw new BatchDumpError(`Dump of ${this.options.schema.kind} failed`, {
        kind: this.options.schema.kind,
        records: batch.length,
        cause: errorMessage(error),
      });
    }
  }

  private async autoDump(): Promise<void> {
    try {
      await this.startDump();
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Automatic dump failed, records kept in memory');
    }
  }

  private enforceLimit(): void {
    if (this.bufferBytes <= this.options.memoryLimitBytes) return;

    let count = 0;
    let freed = 0;
    while (count < this.buffer.length && this.bufferBytes - freed > this.options.memoryLimitBytes) {
      const record = this.buffer[count];
      if (record === undefined) break;
      freed += estimateBytes(this.options.schema, record);
      count++;
    }

    this.buffer.splice(0, count);
    this.bufferBytes -= freed;
    this.stats.evicted += count;
    this.logger.warn({ evicted: count, limitBytes: this.options.memoryLimitBytes }, 'Memory limit reached, oldest records evicted');
  }
}
