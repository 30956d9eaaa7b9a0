/**
 * Storage Module Exports
 * Provides unified access to all storage components
 */

import { join } from 'path';
import { FileKeyValueStore } from './file-store.js';
import { MemoryKeyValueStore, type KeyValueStore, type StoreKind } from './kv-store.js';
import { DatabaseManager, SqliteKeyValueStore } from './sqlite.js';

export { MemoryKeyValueStore, type KeyValueStore, type StoreKind } from './kv-store.js';
export { FileKeyValueStore, type FileStoreConfig } from './file-store.js';
export {
  DatabaseManager,
  SqliteKeyValueStore,
  type DatabaseConfig,
  type MigrationInfo,
} from './sqlite.js';
export {
  ReportCache,
  isFresh,
  DEFAULT_TTL_SECONDS,
  type ReportCacheConfig,
} from './report-cache.js';

/**
 * Build the backend for a store kind. File and SQLite backends live
 * under `cacheDir`.
 */
export function createKeyValueStore(kind: StoreKind, cacheDir: string): KeyValueStore {
  switch (kind) {
    case 'memory':
      return new MemoryKeyValueStore();
    case 'file':
      return new FileKeyValueStore({ directory: cacheDir });
    case 'sqlite':
      return new SqliteKeyValueStore(new DatabaseManager({ path: join(cacheDir, 'cache.db') }));
  }
}
