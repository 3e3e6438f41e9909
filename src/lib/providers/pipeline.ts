/**
 * Discover → Parse → Commit pipeline shared by every provider.
 *
 * Phase 1 checks the cache sequentially, phase 2 parses misses on a bounded
 * async pool, phase 3 commits results in discovery order. All storage access
 * happens in phases 1 and 3 so the store never sees concurrent calls.
 */

import { availableParallelism } from 'os';
import type { Storage } from '../storage/types.js';
import type { UsageRecord } from '../usage/types.js';
import { createLogger } from '../logger.js';
import type { DiscoveredFile, DiscoverOptions, ParseFile } from './types.js';

const log = createLogger('pipeline');

export function defaultConcurrency(): number {
  return Math.max(1, availableParallelism());
}

/**
 * Clamp a requested limit to a positive integer. Zero or absent means the
 * available CPU count.
 */
export function resolveConcurrency(requested?: number): number {
  if (requested === undefined || requested === 0 || !Number.isFinite(requested)) {
    return defaultConcurrency();
  }
  return Math.max(1, Math.floor(requested));
}

/**
 * Map `items` through `fn` with at most `limit` calls in flight.
 * Results keep input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  const workers: Promise<void>[] = [];
  const size = Math.min(Math.max(1, limit), items.length);
  for (let i = 0; i < size; i++) {
    workers.push(worker());
  }
  await Promise.all(workers);
  return results;
}

async function safeParse(name: string, parse: ParseFile, path: string): Promise<UsageRecord[]> {
  try {
    return await parse(path);
  } catch (error) {
    log.warn('Parser failed, file treated as empty', { provider: name, path, error });
    return [];
  }
}

export async function discoverAndParseWith(
  name: string,
  files: DiscoveredFile[],
  storage: Storage,
  parse: ParseFile,
  options: DiscoverOptions = {}
): Promise<void> {
  const { progress } = options;
  const total = files.length;

  // Phase 1: cache lookup
  let completed = 0;
  const misses: DiscoveredFile[] = [];
  for (const file of files) {
    if (storage.isCached(name, file.path, file.mtime, file.size)) {
      completed++;
      progress?.(completed, total);
    } else {
      misses.push(file);
    }
  }

  log.debug('Cache lookup done', { provider: name, total, hits: completed, misses: misses.length });

  // Phase 2: parse misses
  const limit = resolveConcurrency(options.concurrency);
  const parsed = await mapWithConcurrency(misses, limit, (file) => safeParse(name, parse, file.path));

  // Phase 3: commit in discovery order
  for (let i = 0; i < misses.length; i++) {
    const file = misses[i];
    completed++;
    progress?.(completed, total);
    storage.insert(name, file.path, file.mtime, file.size, parsed[i]);
  }

  storage.prune(name, files.map((file) => file.path));
}
