/**
 * Cache Store
 */

import { join } from 'path';
import type { StorageBackend } from '../config.js';
import { JsonStorage } from './json-store.js';
import { SqliteStorage } from './sqlite-store.js';
import type { Storage } from './types.js';

export type { Storage } from './types.js';
export { JsonStorage, JSON_CACHE_VERSION } from './json-store.js';
export { SqliteStorage, SQLITE_SCHEMA_VERSION } from './sqlite-store.js';

export const SQLITE_FILE_NAME = 'records.db';

export interface OpenStorageOptions {
  /** Cache directory; null disables persistence */
  cacheDir: string | null;
}

/**
 * Open the configured backend
 *
 * @throws StorageOpenError when the SQLite database cannot be opened
 */
export function openStorage(backend: StorageBackend, options: OpenStorageOptions): Storage {
  switch (backend) {
    case 'json':
      return new JsonStorage(options.cacheDir);
    case 'sqlite':
      return new SqliteStorage(options.cacheDir ? join(options.cacheDir, SQLITE_FILE_NAME) : ':memory:');
  }
}
