/**
 * Collection Run
 *
 * Runs every provider against one store in registry order, then flushes,
 * drains, deduplicates and filters the merged record set.
 */

import type { Provider } from '../providers/types.js';
import type { Storage } from '../storage/types.js';
import { createLogger } from '../logger.js';
import { dedup } from './dedup.js';
import { filterRecords, type RecordFilters } from './filters.js';
import type { UsageRecord } from './types.js';

const log = createLogger('collect');

export type ProviderProgress = (provider: string, completed: number, total: number) => void;

export interface CollectOptions {
  providers: Provider[];
  storage: Storage;
  filters?: RecordFilters;
  concurrency?: number;
  progress?: ProviderProgress;
}

export interface CollectResult {
  /** Deduplicated, filtered records */
  records: UsageRecord[];

  /** Records drained from the cache before dedup */
  drained: number;

  /** Records removed as duplicates */
  duplicates: number;
}

export async function collectUsage(options: CollectOptions): Promise<CollectResult> {
  const { providers, storage, progress } = options;

  for (const provider of providers) {
    try {
      await provider.discoverAndParse(storage, {
        concurrency: options.concurrency,
        progress: progress ? (completed, total) => progress(provider.name, completed, total) : undefined,
      });
    } catch (error) {
      log.warn('Provider scan failed, skipping', { provider: provider.name, error });
    }
  }

  storage.flush();
  const drained = storage.drainAll();
  const unique = dedup(drained);
  const records = filterRecords(unique, options.filters ?? {});

  log.debug('Collected usage records', {
    drained: drained.length,
    unique: unique.length,
    kept: records.length,
  });

  return {
    records,
    drained: drained.length,
    duplicates: drained.length - unique.length,
  };
}
