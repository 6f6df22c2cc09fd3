import type { Deal, Order } from '@tiered/types';

/**
 * One table of the durable tier. Implementations perform real I/O and may
 * reject; callers own retry and failure accounting.
 */
export interface DurableTable<T extends { id: string }> {
  readonly name: string;
  upsert(entity: T): Promise<void>;
  remove(id: string): Promise<void>;
  /** Replaces the whole table in one transaction. */
  replaceAll(entities: readonly T[]): Promise<void>;
  loadAll(): Promise<T[]>;
}

export interface DurableStore {
  readonly orders: DurableTable<Order>;
  readonly deals: DurableTable<Deal>;
  close(): Promise<void>;
}

export type DurableStoreConnector = () => Promise<DurableStore>;
