export * from './durable.js';
export * from './memory-table.js';
export * from './task-pool.js';
export * from './durable-sync.js';
export * from './entity-repository.js';
export * from './orders-repository.js';
export * from './deals-repository.js';
export * from './observation-schema.js';
export * from './batch-file.js';
export * from './stream-store.js';
export * from './batch-dump-store.js';
export * from './ring-buffer-store.js';
export * from './factory.js';
export * from './shutdown.js';
