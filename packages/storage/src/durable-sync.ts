import { DurableStoreError, errorMessage } from '@tiered/errors';
import type { Logger } from '@tiered/logger';
import type { DurableTable } from './durable.js';
import type { MemoryTable } from './memory-table.js';
import { TaskPool, type TaskPoolStats } from './task-pool.js';

export interface DurableSyncOptions {
  maxInFlight: number;
  maxQueued: number;
  logger: Logger;
}

export interface DurableSyncStats extends TaskPoolStats {
  resyncs: number;
  resyncFailures: number;
  loadedRows: number;
  degraded: boolean;
}

export interface ResyncResult {
  rows: number;
  durationMs: number;
}

/**
 * Mirrors one memory table into its durable table. Memory stays the source
 * of truth: durable failures are counted and logged, never rolled back.
 */
export class DurableSyncAdapter<T extends { id: string }> {
  private readonly pool: TaskPool;
  private readonly logger: Logger;
  private resyncTail: Promise<void> = Promise.resolve();
  private resyncs = 0;
  private resyncFailures = 0;
  private loadedRows = 0;
  private degraded = false;

  constructor(
    private readonly memory: MemoryTable<T>,
    private readonly durable: DurableTable<T>,
    options: DurableSyncOptions
  ) {
    this.logger = options.logger;
    this.pool = new TaskPool({
      maxInFlight: options.maxInFlight,
      maxQueued: options.maxQueued,
      onError: (id, error) => {
        this.logger.warn({ id, table: durable.name, error: errorMessage(error) }, 'Write-through failed');
      },
      onDrop: (id) => {
        this.logger.warn({ id, table: durable.name }, 'Write-through queue full, task dropped');
      },
    });
  }

  /** Starts mirroring memory writes. Call after `load()`. */
  attach(): void {
    this.memory.onUpsert((row) => {
      this.pool.schedule(row.id, () => this.durable.upsert(row));
    });
    this.memory.onDelete((row) => {
      this.pool.schedule(row.id, () => this.durable.remove(row.id));
    });
  }

  /**
   * Fills the memory table from the durable copy. An unreachable store
   * leaves the table empty and marks the adapter degraded.
   */
  async load(): Promise<number> {
    try {
      const rows = await this.durable.loadAll();
      this.memory.hydrate(rows);
      this.loadedRows = rows.length;
      this.logger.info({ table: this.durable.name, rows: rows.length }, 'Loaded durable rows');
      return rows.length;
    } catch (error) {
      this.degraded = true;
      this.memory.hydrate([]);
      this.logger.warn(
        { table: this.durable.name, error: errorMessage(error) },
        'Durable store unreachable at start, running in degraded mode with an empty table'
      );
      return 0;
    }
  }

  /**
   * Overwrites the durable table with the current memory content. Waits for
   * running write-through tasks first and holds new ones until it finishes,
   * so they land after the snapshot. Calls on one adapter run one at a time.
   */
  forceFullResync(): Promise<ResyncResult> {
    const settled = this.pool.pause();
    const run = Promise.all([this.resyncTail, settled]).then(() => this.resync());
    this.resyncTail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  drain(timeoutMs: number): Promise<boolean> {
    return this.pool.drain(timeoutMs);
  }

  getStats(): DurableSyncStats {
    return {
      ...this.pool.getStats(),
      resyncs: this.resyncs,
      resyncFailures: this.resyncFailures,
      loadedRows: this.loadedRows,
      degraded: this.degraded,
    };
  }

  private async resync(): Promise<ResyncResult> {
    const started = Date.now();

    try {
      const rows = this.memory.snapshot();
      await this.durable.replaceAll(rows);
      this.resyncs++;
      this.degraded = false;

      const result = { rows: rows.length, durationMs: Date.now() - started };
      this.logger.info({ table: this.durable.name, ...result }, 'Full resync completed');
      return result;
    } catch (error) {
      this.resyncFailures++;
      this.logger.error({ table: this.durable.name, error: errorMessage(error) }, 'Full resync failed');
      throw new DurableStoreError(`Full resync of ${this.durable.name} failed`, {
        table: this.durable.name,
        cause: errorMessage(error),
      });
    } finally {
      this.pool.resume();
    }
  }
}
