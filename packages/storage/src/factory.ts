import type { AtomicBackendConfig, StorageConfig, StreamBackendConfig } from '@tiered/config';
import { isOrderTerminal, isDealTerminal } from '@tiered/domain';
import { ServiceUnavailableError, errorMessage } from '@tiered/errors';
import { createServiceLogger, type Logger } from '@tiered/logger';
import type {
  Deal,
  IndicatorPoint,
  ObservationByKind,
  ObservationKind,
  Order,
  OrderBookSnapshot,
  Ticker,
} from '@tiered/types';
import { BatchDumpStore } from './batch-dump-store.js';
import { DealsRepository } from './deals-repository.js';
import { DurableSyncAdapter, type ResyncResult } from './durable-sync.js';
import type { DurableStore, DurableStoreConnector, DurableTable } from './durable.js';
import type { EntityRepository, EntityRepositoryStats } from './entity-repository.js';
import { MemoryTable, type Draft, type Row } from './memory-table.js';
import { observationSchemas } from './observation-schema.js';
import { OrdersRepository } from './orders-repository.js';
import { RingBufferStore } from './ring-buffer-store.js';
import type { DumpResult, MemoryUsage, StreamRepository, StreamStats } from './stream-store.js';

export interface RepositoryMap {
  orders: OrdersRepository;
  deals: DealsRepository;
  tickers: StreamRepository<Ticker>;
  orderBooks: StreamRepository<OrderBookSnapshot>;
  indicators: StreamRepository<IndicatorPoint>;
}

export type RepositoryKind = keyof RepositoryMap;
export type AtomicKind = 'orders' | 'deals';

export const ATOMIC_KINDS = ['orders', 'deals'] as const;
export const STREAM_KINDS = ['tickers', 'orderBooks', 'indicators'] as const;
export const REPOSITORY_KINDS: readonly RepositoryKind[] = [...ATOMIC_KINDS, ...STREAM_KINDS];

export type KindResult<R> = ({ ok: true } & R) | { ok: false; error: string };
export type SyncReport = Partial<Record<AtomicKind, KindResult<ResyncResult>>>;
export type DumpReport = Partial<Record<ObservationKind, KindResult<DumpResult>>>;

export type RepositoryStatistics =
  | (EntityRepositoryStats & { kind: AtomicKind })
  | { kind: ObservationKind; usage: MemoryUsage; stream: StreamStats };

export interface RepositoryFactoryOptions {
  config: StorageConfig;
  /** Absent means no durable store is configured. */
  connectDurable?: DurableStoreConnector;
  logger?: Logger;
}

interface AtomicSpec<T extends { id: string }, R extends EntityRepository<T>> {
  kind: AtomicKind;
  config: AtomicBackendConfig;
  withId: (draft: Draft<T>, id: string) => T;
  isEvictable: (row: Row<T>) => boolean;
  durableTable: (store: DurableStore) => DurableTable<T>;
  create: (table: MemoryTable<T>, sync: DurableSyncAdapter<T> | null, logger: Logger) => R;
}

/**
 * Builds each repository once, on first request, from the configured
 * backend. A backend that cannot be built degrades that kind alone to pure
 * memory.
 */
export class RepositoryFactory {
  private readonly cache: { [K in RepositoryKind]?: Promise<RepositoryMap[K]> } = {};
  private readonly builders: { [K in RepositoryKind]: () => Promise<RepositoryMap[K]> };
  private readonly backends = new Map<RepositoryKind, string>();
  private readonly config: StorageConfig;
  private readonly connectDurable: DurableStoreConnector | undefined;
  private readonly logger: Logger;
  private durable: Promise<DurableStore> | null = null;

  constructor(options: RepositoryFactoryOptions) {
    this.config = options.config;
    this.connectDurable = options.connectDurable;
    this.logger = options.logger ?? createServiceLogger('repository-factory');

    this.builders = {
      orders: () =>
        this.buildAtomic({
          kind: 'orders',
          config: this.config.orders,
          withId: (draft: Draft<Order>, id: string): Order => ({ ...draft, id }),
          isEvictable: isOrderTerminal,
          durableTable: (store) => store.orders,
          create: (table, sync, logger) => new OrdersRepository(table, sync, logger),
        }),
      // deals check leg changes against the orders repository
      deals: async () => {
        const orders = await this.get('orders');
        return this.buildAtomic({
          kind: 'deals',
          config: this.config.deals,
          withId: (draft: Draft<Deal>, id: string): Deal => ({ ...draft, id }),
          isEvictable: isDealTerminal,
          durableTable: (store) => store.deals,
          create: (table, sync, logger) => new DealsRepository(table, sync, logger, (id) => orders.get(id)),
        });
      },
      tickers: () => this.buildStream('tickers'),
      orderBooks: () => this.buildStream('orderBooks'),
      indicators: () => this.buildStream('indicators'),
    };
  }

  /** Cached per kind; concurrent first calls share one construction. */
  get<K extends RepositoryKind>(kind: K): Promise<RepositoryMap[K]> {
    const cache: { [P in K]?: Promise<RepositoryMap[P]> } = this.cache;
    const cached = cache[kind];
    if (cached !== undefined) return cached;

    const created = this.builders[kind]();
    cache[kind] = created;
    return created;
  }

  backendOf(kind: RepositoryKind): string | undefined {
    return this.backends.get(kind);
  }

  backendSummary(): Partial<Record<RepositoryKind, string>> {
    const summary: Partial<Record<RepositoryKind, string>> = {};
    for (const [kind, backend] of this.backends) {
      summary[kind] = backend;
    }
    return summary;
  }

  async forceSyncAll(): Promise<SyncReport> {
    const report: SyncReport = {};

    await Promise.all(
      ATOMIC_KINDS.map(async (kind) => {
        const cached = this.cache[kind];
        if (cached === undefined) return;

        try {
          const repository = await cached;
          if (!repository.isWriteThrough) return;
          report[kind] = { ok: true, ...(await repository.forceFullResync()) };
        } catch (error) {
          report[kind] = { ok: false, error: errorMessage(error) };
          this.logger.error({ kind, error: errorMessage(error) }, 'Forced sync failed');
        }
      })
    );
    return report;
  }

  async forceDumpAll(): Promise<DumpReport> {
    const report: DumpReport = {};

    await Promise.all(
      STREAM_KINDS.map(async (kind) => {
        const cached = this.cache[kind];
        if (cached === undefined) return;

        try {
          const repository = await cached;
          report[kind] = { ok: true, ...(await repository.forceDump()) };
        } catch (error) {
          report[kind] = { ok: false, error: errorMessage(error) };
          this.logger.error({ kind, error: errorMessage(error) }, 'Forced dump failed');
        }
      })
    );
    return report;
  }

  /** Waits for pending write-through tasks; true per kind when fully drained. */
  async drainAll(timeoutMs: number): Promise<Partial<Record<AtomicKind, boolean>>> {
    const drained: Partial<Record<AtomicKind, boolean>> = {};
    await Promise.all(
      ATOMIC_KINDS.map(async (kind) => {
        const cached = this.cache[kind];
        if (cached === undefined) return;
        drained[kind] = await (await cached).drain(timeoutMs);
      })
    );
    return drained;
  }

  async closeStreams(): Promise<void> {
    for (const stream of await this.cachedStreams()) {
      stream.close();
    }
  }

  async startMaintenance(): Promise<void> {
    for (const stream of await this.cachedStreams()) {
      stream.startMaintenance();
    }
  }

  async stopMaintenance(): Promise<void> {
    for (const stream of await this.cachedStreams()) {
      stream.stopMaintenance();
    }
  }

  async statistics(): Promise<RepositoryStatistics[]> {
    const statistics: RepositoryStatistics[] = [];

    for (const kind of ATOMIC_KINDS) {
      const cached = this.cache[kind];
      if (cached !== undefined) {
        statistics.push({ kind, ...(await cached).getRepositoryStats() });
      }
    }
    for (const kind of STREAM_KINDS) {
      const cached = this.cache[kind];
      if (cached !== undefined) {
        const stream = await cached;
        statistics.push({ kind, usage: stream.memoryUsage(), stream: stream.getStats() });
      }
    }
    return statistics;
  }

  /** Closes the durable store connection, if one was opened. */
  async close(): Promise<void> {
    await this.stopMaintenance();
    if (this.durable === null) return;

    try {
      const store = await this.durable;
      await store.close();
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Durable store close failed');
    }
  }

  private async cachedStreams(): Promise<StreamRepository<ObservationByKind[ObservationKind]>[]> {
    const streams: StreamRepository<ObservationByKind[ObservationKind]>[] = [];
    for (const kind of STREAM_KINDS) {
      const cached = this.cache[kind];
      if (cached !== undefined) streams.push(await cached);
    }
    return streams;
  }

  private connect(): Promise<DurableStore> {
    if (this.connectDurable === undefined) {
      return Promise.reject(new ServiceUnavailableError('durable store'));
    }
    this.durable ??= this.connectDurable();
    return this.durable;
  }

  private async buildAtomic<T extends { id: string }, R extends EntityRepository<T>>(
    spec: AtomicSpec<T, R>
  ): Promise<R> {
    const logger = createServiceLogger('storage', { repository: spec.kind });
    const config = spec.config;

    if (config.type === 'memoryWithDurableSync') {
      try {
        const store = await this.connect();
        const table = new MemoryTable<T>({ name: spec.kind, withId: spec.withId });
        const sync = new DurableSyncAdapter(table, spec.durableTable(store), {
          maxInFlight: config.maxInFlight,
          maxQueued: config.maxQueued,
          logger,
        });
        const repository = spec.create(table, sync, logger);
        await repository.start();
        this.backends.set(spec.kind, 'memoryWithDurableSync');
        return repository;
      } catch (error) {
        this.logger.error(
          { kind: spec.kind, error: errorMessage(error) },
          'Durable backend unavailable, falling back to pureMemoryLegacy'
        );
      }
    }

    const maxRows = config.type === 'pureMemoryLegacy' ? config.maxRows : this.config.legacy.maxRows;
    const table = new MemoryTable<T>({
      name: spec.kind,
      withId: spec.withId,
      maxRows,
      isEvictable: spec.isEvictable,
    });
    const repository = spec.create(table, null, logger);
    await repository.start();
    this.backends.set(spec.kind, 'pureMemoryLegacy');
    return repository;
  }

  private async buildStream<K extends ObservationKind>(kind: K): Promise<StreamRepository<ObservationByKind[K]>> {
    const config: StreamBackendConfig = this.config[kind];
    const schema = observationSchemas[kind];
    const logger = createServiceLogger('storage', { repository: kind });

    if (config.type === 'memoryWithBatchDump') {
      try {
        const store = await BatchDumpStore.open<ObservationByKind[K]>({
          schema,
          dumpDir: config.dumpDir,
          memoryLimitBytes: config.memoryLimitBytes,
          dumpThresholdBytes: config.dumpThresholdBytes,
          retentionDays: config.retentionDays,
          retentionSweepIntervalMs: config.retentionSweepIntervalMs,
          logger,
        });
        this.backends.set(kind, 'memoryWithBatchDump');
        return store;
      } catch (error) {
        this.logger.error(
          { kind, error: errorMessage(error) },
          'Batch dump backend unavailable, falling back to pureMemoryLegacy'
        );
      }
    }

    const maxRecords = config.type === 'pureMemoryLegacy' ? config.maxRecords : this.config.legacy.maxRecords;
    this.backends.set(kind, 'pureMemoryLegacy');
    return new RingBufferStore<ObservationByKind[K]>({ schema, maxRecords });
  }
}
