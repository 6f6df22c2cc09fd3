import { v4 as uuidv4 } from 'uuid';

export type Row<T extends { id: string }> = Readonly<T>;

/** An entity that may not have been given an id yet. */
export type Draft<T extends { id: string }> = Omit<T, 'id'> & { id?: string };

export type UpsertListener<T extends { id: string }> = (row: Row<T>, previous: Row<T> | undefined) => void;
export type DeleteListener<T extends { id: string }> = (row: Row<T>) => void;

export interface MemoryTableOptions<T extends { id: string }> {
  name: string;
  /** Row ceiling; rows accepted by `isEvictable` are evicted oldest first. */
  maxRows?: number;
  isEvictable?: (row: Row<T>) => boolean;
  /** Builds the stored entity from a draft and its resolved id. */
  withId: (draft: Draft<T>, id: string) => T;
  assignId?: () => string;
}

export interface MemoryTableStats {
  rows: number;
  upserts: number;
  deletes: number;
  evictions: number;
}

/**
 * Synchronous keyed table. Every read hands out frozen copies; the only way
 * to change a row is another upsert.
 */
export class MemoryTable<T extends { id: string }> {
  readonly name: string;
  private readonly rows = new Map<string, Row<T>>();
  private readonly upsertListeners: UpsertListener<T>[] = [];
  private readonly deleteListeners: DeleteListener<T>[] = [];
  private readonly maxRows: number | undefined;
  private readonly isEvictable: (row: Row<T>) => boolean;
  private readonly withId: (draft: Draft<T>, id: string) => T;
  private readonly assignId: () => string;
  private readonly stats = { upserts: 0, deletes: 0, evictions: 0 };

  constructor(options: MemoryTableOptions<T>) {
    this.name = options.name;
    this.maxRows = options.maxRows;
    this.isEvictable = options.isEvictable ?? (() => true);
    this.withId = options.withId;
    this.assignId = options.assignId ?? uuidv4;
  }

  get size(): number {
    return this.rows.size;
  }

  /**
   * Inserts or replaces by id, assigning one when absent. Listeners see the
   * stored value exactly once per call.
   */
  upsert(draft: Draft<T>): Row<T> {
    const id = draft.id ?? this.assignId();
    const row = Object.freeze({ ...this.withId(draft, id) });
    const previous = this.rows.get(id);

    this.rows.set(id, row);
    this.stats.upserts++;
    this.evictOverflow(id);

    for (const listener of this.upsertListeners) {
      listener(row, previous);
    }
    return row;
  }

  get(id: string): Row<T> | undefined {
    return this.rows.get(id);
  }

  has(id: string): boolean {
    return this.rows.has(id);
  }

  scan(predicate: (row: Row<T>) => boolean = () => true): Row<T>[] {
    const matches: Row<T>[] = [];
    for (const row of this.rows.values()) {
      if (predicate(row)) matches.push(row);
    }
    return matches;
  }

  delete(id: string): boolean {
    const row = this.rows.get(id);
    if (row === undefined) return false;

    this.rows.delete(id);
    this.stats.deletes++;
    for (const listener of this.deleteListeners) {
      listener(row);
    }
    return true;
  }

  /** Replaces the whole content without notifying listeners. */
  hydrate(entities: readonly T[]): void {
    this.rows.clear();
    for (const entity of entities) {
      this.rows.set(entity.id, Object.freeze({ ...entity }));
    }
  }

  /** All rows in insertion order. */
  snapshot(): Row<T>[] {
    return Array.from(this.rows.values());
  }

  onUpsert(listener: UpsertListener<T>): void {
    this.upsertListeners.push(listener);
  }

  onDelete(listener: DeleteListener<T>): void {
    this.deleteListeners.push(listener);
  }

  getStats(): MemoryTableStats {
    return { rows: this.rows.size, ...this.stats };
  }

  private evictOverflow(protectedId: string): void {
    if (this.maxRows === undefined || this.rows.size <= this.maxRows) return;

    for (const [id, row] of this.rows) {
      if (this.rows.size <= this.maxRows) break;
      if (id === protectedId || !this.isEvictable(row)) continue;
      this.rows.delete(id);
      this.stats.evictions++;
    }
  }
}
