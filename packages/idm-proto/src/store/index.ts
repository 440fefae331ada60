export { InMemoryEntryStore, PROTECTED_ATTRIBUTES, withUuid } from './memory-store.js';
export { PostgresEntryStore } from './entry-store.js';
export type { PostgresEntryStoreConfig } from './entry-store.js';
export { applySchema } from './schema.js';
