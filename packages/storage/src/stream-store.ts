import type { StreamBackend } from '@tiered/config';
import type { Observation } from '@tiered/types';

export interface MemoryUsage {
  recordCount: number;
  estimatedBytes: number;
  percentOfLimit: number;
}

export interface DumpResult {
  /** Path of the written batch file; null when there was nothing to write. */
  location: string | null;
  recordCount: number;
}

export interface StreamStats {
  backend: StreamBackend;
  appended: number;
  rejectedAfterClose: number;
  evicted: number;
  dumps: number;
  dumpedRecords: number;
  dumpFailures: number;
  retentionDeleted: number;
  lastDumpLocation?: string;
  lastError?: string;
}

/**
 * Append-only buffer of time-series observations. Reads only ever see what
 * is still in memory.
 */
export interface StreamRepository<T extends Observation> {
  readonly backend: StreamBackend;
  /** False once the store is closed. */
  append(record: T): boolean;
  appendBatch(records: readonly T[]): boolean;
  /** Most recent `n` records, oldest first. */
  lastN(n: number): T[];
  /** Records of `symbol` with `from <= timestamp <= to`, oldest first. */
  rangeBySymbolAndTime(symbol: string, from: number, to: number): T[];
  latest(symbol: string): T | undefined;
  symbols(): string[];
  forceDump(): Promise<DumpResult>;
  memoryUsage(): MemoryUsage;
  startMaintenance(): void;
  stopMaintenance(): void;
  close(): void;
  getStats(): StreamStats;
}
