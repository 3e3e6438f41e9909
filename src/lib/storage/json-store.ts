/**
 * JSON Blob Cache
 *
 * One file per provider at <cacheDir>/<provider>.json, loaded wholesale the
 * first time the provider is touched, mutated in memory and rewritten
 * wholesale on flush when dirty. Writes go through a temp file and rename,
 * so an interrupted flush leaves the previous blob intact.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createUsageRecord, type UsageRecord } from '../usage/types.js';
import { createLogger } from '../logger.js';
import type { Storage } from './types.js';

const log = createLogger('cache:json');

// Bump when the blob layout changes; older blobs are discarded
export const JSON_CACHE_VERSION = 1;

/**
 * Record as written to disk; provider is implied by the blob
 */
interface StoredRecord {
  sessionId: string;
  timestamp: string;
  project: string;
  model: string;
  messageId: string;
  requestId: string;
  inputTokens: number;
  outputTokens: number;
  cacheCreationInputTokens: number;
  cacheReadInputTokens: number;
}

interface CachedFile {
  mtime: number;
  size: number;
  records: UsageRecord[];
}

interface ProviderCache {
  files: Map<string, CachedFile>;
  dirty: boolean;
}

type Json = Record<string, unknown>;

function isJson(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function encodeRecord(record: UsageRecord): StoredRecord {
  return {
    sessionId: record.sessionId,
    timestamp: record.timestamp.toISOString(),
    project: record.project,
    model: record.model,
    messageId: record.messageId,
    requestId: record.requestId,
    inputTokens: record.inputTokens,
    outputTokens: record.outputTokens,
    cacheCreationInputTokens: record.cacheCreationInputTokens,
    cacheReadInputTokens: record.cacheReadInputTokens,
  };
}

function decodeRecord(provider: string, raw: unknown): UsageRecord | null {
  if (!isJson(raw)) return null;

  const { sessionId, timestamp, project, model, messageId, requestId } = raw;
  if (
    typeof sessionId !== 'string' ||
    typeof timestamp !== 'string' ||
    typeof project !== 'string' ||
    typeof model !== 'string' ||
    typeof messageId !== 'string' ||
    typeof requestId !== 'string'
  ) {
    return null;
  }

  const date = new Date(timestamp);
  if (Number.isNaN(date.getTime())) return null;

  const count = (value: unknown): number => (typeof value === 'number' && value >= 0 ? value : 0);

  return createUsageRecord({
    provider,
    sessionId,
    timestamp: date,
    project,
    model,
    messageId,
    requestId,
    inputTokens: count(raw.inputTokens),
    outputTokens: count(raw.outputTokens),
    cacheCreationInputTokens: count(raw.cacheCreationInputTokens),
    cacheReadInputTokens: count(raw.cacheReadInputTokens),
  });
}

/**
 * Decode a blob; null when any part of it is not in the expected shape
 */
function decodeBlob(provider: string, blob: unknown): Map<string, CachedFile> | null {
  if (!isJson(blob) || !isJson(blob.files)) return null;

  const files = new Map<string, CachedFile>();
  for (const [path, entry] of Object.entries(blob.files)) {
    if (!isJson(entry) || typeof entry.mtime !== 'number' || typeof entry.size !== 'number') return null;
    if (!Array.isArray(entry.records)) return null;

    const records: UsageRecord[] = [];
    for (const raw of entry.records) {
      const record = decodeRecord(provider, raw);
      if (!record) return null;
      records.push(record);
    }
    files.set(path, { mtime: entry.mtime, size: entry.size, records });
  }
  return files;
}

export class JsonStorage implements Storage {
  readonly backend = 'json';

  private readonly providers = new Map<string, ProviderCache>();

  /**
   * @param cacheDir - Blob directory; null keeps everything in memory
   */
  constructor(private readonly cacheDir: string | null) {}

  blobPath(provider: string): string | null {
    return this.cacheDir ? join(this.cacheDir, `${provider}.json`) : null;
  }

  private load(provider: string): Map<string, CachedFile> {
    const file = this.blobPath(provider);
    if (!file || !existsSync(file)) return new Map();

    let blob: unknown;
    try {
      blob = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error) {
      log.warn('Unreadable cache blob, rebuilding', { provider, file, error });
      return new Map();
    }

    const version = isJson(blob) ? blob.version : undefined;
    if (version !== JSON_CACHE_VERSION) {
      log.warn(`Cache version mismatch (expected ${JSON_CACHE_VERSION}, got ${String(version)}), rebuilding`, {
        provider,
      });
      return new Map();
    }

    const files = decodeBlob(provider, blob);
    if (!files) {
      log.warn('Malformed cache blob, rebuilding', { provider, file });
      return new Map();
    }

    log.debug('Loaded cache blob', { provider, files: files.size });
    return files;
  }

  private partition(provider: string): ProviderCache {
    let cache = this.providers.get(provider);
    if (!cache) {
      cache = { files: this.load(provider), dirty: false };
      this.providers.set(provider, cache);
    }
    return cache;
  }

  isCached(provider: string, filePath: string, mtime: number, size: number): boolean {
    const entry = this.partition(provider).files.get(filePath);
    return entry !== undefined && entry.mtime === mtime && entry.size === size;
  }

  insert(provider: string, filePath: string, mtime: number, size: number, records: UsageRecord[]): void {
    const cache = this.partition(provider);
    cache.files.set(filePath, { mtime, size, records: [...records] });
    cache.dirty = true;
  }

  prune(provider: string, knownPaths: Iterable<string>): void {
    const cache = this.partition(provider);
    const known = new Set(knownPaths);
    for (const path of [...cache.files.keys()]) {
      if (!known.has(path)) {
        cache.files.delete(path);
        cache.dirty = true;
      }
    }
  }

  flush(): void {
    if (!this.cacheDir) return;

    for (const [provider, cache] of this.providers) {
      if (!cache.dirty) continue;

      const file = join(this.cacheDir, `${provider}.json`);
      const files: Record<string, { mtime: number; size: number; records: StoredRecord[] }> = {};
      for (const [path, entry] of cache.files) {
        files[path] = { mtime: entry.mtime, size: entry.size, records: entry.records.map(encodeRecord) };
      }

      try {
        mkdirSync(this.cacheDir, { recursive: true });
        const tempFile = `${file}.tmp`;
        writeFileSync(tempFile, JSON.stringify({ version: JSON_CACHE_VERSION, files }), 'utf-8');
        renameSync(tempFile, file);
        cache.dirty = false;
      } catch (error) {
        log.warn('Failed to write cache blob', { provider, file, error });
      }
    }
  }

  drainAll(): UsageRecord[] {
    const all: UsageRecord[] = [];
    for (const cache of this.providers.values()) {
      for (const entry of cache.files.values()) {
        for (const record of entry.records) all.push(record);
      }
    }
    this.providers.clear();
    return all;
  }

  close(): void {
    this.providers.clear();
  }
}
