/**
 * Provider Types
 *
 * A provider knows where one external tool keeps its logs and how to turn
 * one of its files into usage records.
 */

import type { Storage } from '../storage/types.js';
import type { UsageRecord } from '../usage/types.js';

/**
 * Receives (completed, total) pairs; completed is strictly increasing
 */
export type ProgressCallback = (completed: number, total: number) => void;

/**
 * Per-file parser. Resolves to an empty list on any failure.
 */
export type ParseFile = (path: string) => Promise<UsageRecord[]>;

export interface DiscoverOptions {
  progress?: ProgressCallback;

  /** Parallel parse limit; defaults to the available CPU count */
  concurrency?: number;
}

export interface Provider {
  /** Stable lowercase id, also written into every record it produces */
  readonly name: string;

  /** Directories scanned for log files (may not exist) */
  rootDirs(): string[];

  /**
   * Scan roots, reuse cache hits, parse misses, commit into `storage` and
   * prune vanished files.
   */
  discoverAndParse(storage: Storage, options?: DiscoverOptions): Promise<void>;
}

/**
 * A discovered log file with its fingerprint
 */
export interface DiscoveredFile {
  path: string;
  mtime: number;
  size: number;
}
