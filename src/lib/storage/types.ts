/**
 * Cache Store Contract
 *
 * Persistent map from (provider, file path) to the file's fingerprint and
 * the full record list parsed from it. Every file-level operation is scoped
 * by provider so several providers share one backend without interference.
 *
 * Implementations are only ever driven from one sequential caller; none of
 * them lock.
 */

import type { UsageRecord } from '../usage/types.js';

export interface Storage {
  /** Backend name for diagnostics ("json", "sqlite") */
  readonly backend: string;

  /**
   * True only when an entry exists whose stored fingerprint exactly equals
   * `(mtime, size)`.
   */
  isCached(provider: string, filePath: string, mtime: number, size: number): boolean;

  /**
   * Replace the entry for `(provider, filePath)`. Never merges with a
   * previous record list.
   */
  insert(provider: string, filePath: string, mtime: number, size: number, records: UsageRecord[]): void;

  /**
   * Delete every entry of `provider` whose path is not in `knownPaths`.
   */
  prune(provider: string, knownPaths: Iterable<string>): void;

  /** Persist pending changes. No-op when nothing changed. */
  flush(): void;

  /**
   * Return every cached record of the providers touched since the last
   * drain, and forget them in memory. Persisted entries stay for the next
   * run. Call once per run, after flush(). Order is unspecified.
   */
  drainAll(): UsageRecord[];

  /** Release file handles */
  close(): void;
}
