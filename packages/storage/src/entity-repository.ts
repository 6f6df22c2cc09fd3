import { DurableStoreError } from '@tiered/errors';
import type { Logger } from '@tiered/logger';
import type { AtomicBackend } from '@tiered/config';
import type { DurableSyncAdapter, DurableSyncStats, ResyncResult } from './durable-sync.js';
import type { Draft, MemoryTable, MemoryTableStats, Row } from './memory-table.js';

export interface EntityRepositoryStats {
  backend: AtomicBackend;
  table: MemoryTableStats;
  sync: DurableSyncStats | null;
}

/**
 * Memory table plus, for the durable backend, its sync adapter. Subclasses
 * add entity rules by overriding `validate`.
 */
export abstract class EntityRepository<T extends { id: string }> {
  readonly backend: AtomicBackend;

  constructor(
    protected readonly table: MemoryTable<T>,
    protected readonly sync: DurableSyncAdapter<T> | null,
    protected readonly logger: Logger
  ) {
    this.backend = sync === null ? 'pureMemoryLegacy' : 'memoryWithDurableSync';
  }

  /** Loads durable rows, then starts write-through. Legacy tables start empty. */
  async start(): Promise<void> {
    if (this.sync !== null) {
      await this.sync.load();
      this.sync.attach();
    }
    this.rebuildIndexes();
  }

  upsert(draft: Draft<T>): Row<T> {
    const previous = draft.id === undefined ? undefined : this.table.get(draft.id);
    this.validate(draft, previous);
    const row = this.table.upsert(draft);
    this.indexRow(row, previous);
    return row;
  }

  get(id: string): Row<T> | undefined {
    return this.table.get(id);
  }

  scan(predicate?: (row: Row<T>) => boolean): Row<T>[] {
    return this.table.scan(predicate);
  }

  /** Administrative removal; with durable sync the delete follows in the background. */
  delete(id: string): boolean {
    const row = this.table.get(id);
    const removed = this.table.delete(id);
    if (row !== undefined) {
      this.unindexRow(row);
      this.logger.info({ id }, 'Row deleted');
    }
    return removed;
  }

  get size(): number {
    return this.table.size;
  }

  get isWriteThrough(): boolean {
    return this.sync !== null;
  }

  /** Rejects for the legacy backend, which has nothing to resync. */
  async forceFullResync(): Promise<ResyncResult> {
    if (this.sync === null) {
      throw new DurableStoreError(`${this.table.name} has no durable copy`, { table: this.table.name });
    }
    return this.sync.forceFullResync();
  }

  async drain(timeoutMs: number): Promise<boolean> {
    return this.sync === null ? true : this.sync.drain(timeoutMs);
  }

  getRepositoryStats(): EntityRepositoryStats {
    return {
      backend: this.backend,
      table: this.table.getStats(),
      sync: this.sync?.getStats() ?? null,
    };
  }

  protected abstract validate(draft: Draft<T>, previous: Row<T> | undefined): void;

  protected indexRow(_row: Row<T>, _previous: Row<T> | undefined): void {}

  protected unindexRow(_row: Row<T>): void {}

  protected rebuildIndexes(): void {}
}
