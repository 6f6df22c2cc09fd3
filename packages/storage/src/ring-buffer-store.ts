import type { Observation } from '@tiered/types';
import { estimateBytes, type ObservationSchema } from './observation-schema.js';
import type { DumpResult, MemoryUsage, StreamRepository, StreamStats } from './stream-store.js';

export interface RingBufferStoreOptions<T> {
  schema: ObservationSchema<T>;
  maxRecords: number;
}

/**
 * Fixed-capacity legacy store: nothing is written to disk and the oldest
 * record is overwritten once full.
 */
export class RingBufferStore<T extends Observation> implements StreamRepository<T> {
  readonly backend = 'pureMemoryLegacy';
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private count = 0;
  private bytes = 0;
  private closed = false;
  private readonly stats = { appended: 0, rejectedAfterClose: 0, evicted: 0 };

  constructor(private readonly options: RingBufferStoreOptions<T>) {
    this.slots = new Array<T | undefined>(options.maxRecords).fill(undefined);
  }

  append(record: T): boolean {
    return this.appendBatch([record]);
  }

  appendBatch(records: readonly T[]): boolean {
    if (this.closed) {
      this.stats.rejectedAfterClose += records.length;
      return false;
    }

    const capacity = this.slots.length;
    for (const record of records) {
      const index = (this.head + this.count) % capacity;
      const overwritten = this.slots[index];
      if (this.count === capacity && overwritten !== undefined) {
        this.bytes -= estimateBytes(this.options.schema, overwritten);
        this.head = (this.head + 1) % capacity;
        this.stats.evicted++;
      } else {
        this.count++;
      }
      this.slots[index] = record;
      this.bytes += estimateBytes(this.options.schema, record);
    }
    this.stats.appended += records.length;
    return true;
  }

  lastN(n: number): T[] {
    const all = this.toArray();
    return n <= 0 ? [] : all.slice(-n);
  }

  rangeBySymbolAndTime(symbol: string, from: number, to: number): T[] {
    return this.toArray().filter(
      (record) => record.symbol === symbol && record.timestamp >= from && record.timestamp <= to
    );
  }

  latest(symbol: string): T | undefined {
    const all = this.toArray();
    for (let i = all.length - 1; i >= 0; i--) {
      const record = all[i];
      if (record !== undefined && record.symbol === symbol) return record;
    }
    return undefined;
  }

  symbols(): string[] {
    return Array.from(new Set(this.toArray().map((record) => record.symbol)));
  }

  async forceDump(): Promise<DumpResult> {
    return { location: null, recordCount: 0 };
  }

  memoryUsage(): MemoryUsage {
    return {
      recordCount: this.count,
      estimatedBytes: this.bytes,
      percentOfLimit: (this.count / this.slots.length) * 100,
    };
  }

  startMaintenance(): void {}

  stopMaintenance(): void {}

  close(): void {
    this.closed = true;
  }

  getStats(): StreamStats {
    return {
      backend: this.backend,
      ...this.stats,
      dumps: 0,
      dumpedRecords: 0,
      dumpFailures: 0,
      retentionDeleted: 0,
    };
  }

  private toArray(): T[] {
    const records: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const record = this.slots[(this.head + i) % this.slots.length];
      if (record !== undefined) records.push(record);
    }
    return records;
  }
}
