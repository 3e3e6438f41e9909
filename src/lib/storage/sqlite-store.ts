/**
 * SQLite Record Cache
 *
 * Relational cache backend: a `files` row per (provider, path) holding the
 * fingerprint, and a `records` row per usage record. Every write is
 * committed in its own transaction, so flush has nothing to do.
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { existsSync, mkdirSync } from 'fs';
import { createUsageRecord, type UsageRecord } from '../usage/types.js';
import { StorageOpenError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Storage } from './types.js';

const log = createLogger('cache:sqlite');

// Stored in PRAGMA user_version; older databases are rebuilt
export const SQLITE_SCHEMA_VERSION = 1;

interface RecordRow {
  provider: string;
  session_id: string;
  timestamp: string;
  project: string;
  model: string;
  message_id: string;
  request_id: string;
  input_tokens: number;
  output_tokens: number;
  cache_creation_input_tokens: number;
  cache_read_input_tokens: number;
}

function rowToRecord(row: RecordRow): UsageRecord {
  return createUsageRecord({
    provider: row.provider,
    sessionId: row.session_id,
    timestamp: new Date(row.timestamp),
    project: row.project,
    model: row.model,
    messageId: row.message_id,
    requestId: row.request_id,
    inputTokens: row.input_tokens,
    outputTokens: row.output_tokens,
    cacheCreationInputTokens: row.cache_creation_input_tokens,
    cacheReadInputTokens: row.cache_read_input_tokens,
  });
}

function initSchema(db: Database.Database): void {
  const version = db.pragma('user_version', { simple: true });
  if (typeof version !== 'number' || version < SQLITE_SCHEMA_VERSION) {
    db.exec(`
      DROP TABLE IF EXISTS records;
      DROP TABLE IF EXISTS files;
    `);
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS files (
      file_id INTEGER PRIMARY KEY,
      provider TEXT NOT NULL,
      path TEXT NOT NULL,
      mtime_secs INTEGER NOT NULL,
      size INTEGER NOT NULL,
      UNIQUE (provider, path)
    );

    CREATE TABLE IF NOT EXISTS records (
      file_id INTEGER NOT NULL REFERENCES files(file_id),
      session_id TEXT NOT NULL,
      timestamp TEXT NOT NULL,
      project TEXT NOT NULL,
      model TEXT NOT NULL,
      message_id TEXT NOT NULL,
      request_id TEXT NOT NULL,
      input_tokens INTEGER NOT NULL,
      output_tokens INTEGER NOT NULL,
      cache_creation_input_tokens INTEGER NOT NULL,
      cache_read_input_tokens INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_records_file_id
      ON records(file_id);
  `);

  db.pragma(`user_version = ${SQLITE_SCHEMA_VERSION}`);
}

function openDatabase(location: string): Database.Database {
  try {
    if (location !== ':memory:') {
      const dir = dirname(location);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    const db = new Database(location);
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    initSchema(db);
    return db;
  } catch (error) {
    throw new StorageOpenError('sqlite', location, error);
  }
}

function prepareStatements(db: Database.Database) {
  const statements = {
    isCached: db.prepare<[string, string, number, number], { hit: number }>(`
      SELECT 1 AS hit FROM files
      WHERE provider = ? AND path = ? AND mtime_secs = ? AND size = ?
    `),
    deleteRecords: db.prepare<[string, string]>(`
      DELETE FROM records WHERE file_id IN
        (SELECT file_id FROM files WHERE provider = ? AND path = ?)
    `),
    upsertFile: db.prepare<[string, string, number, number], { file_id: number }>(`
      INSERT INTO files (provider, path, mtime_secs, size)
      VALUES (?, ?, ?, ?)
      ON CONFLICT (provider, path) DO UPDATE SET
        mtime_secs = excluded.mtime_secs,
        size = excluded.size
      RETURNING file_id
    `),
    insertRecord: db.prepare<[number, string, string, string, string, string, string, number, number, number, number]>(`
      INSERT INTO records (
        file_id, session_id, timestamp, project, model, message_id, request_id,
        input_tokens, output_tokens, cache_creation_input_tokens, cache_read_input_tokens
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `),
    filePaths: db.prepare<[string], { path: string }>('SELECT path FROM files WHERE provider = ?'),
    deleteFile: db.prepare<[string, string]>('DELETE FROM files WHERE provider = ? AND path = ?'),
  };

  const replaceFile = db.transaction((provider: string, filePath: string, mtime: number, size: number, records: UsageRecord[]) => {
    statements.deleteRecords.run(provider, filePath);
    const file = statements.upsertFile.get(provider, filePath, mtime, size);
    if (!file) {
      throw new Error(`No file row returned for ${filePath}`);
    }
    for (const record of records) {
      statements.insertRecord.run(
        file.file_id,
        record.sessionId,
        record.timestamp.toISOString(),
        record.project,
        record.model,
        record.messageId,
        record.requestId,
        record.inputTokens,
        record.outputTokens,
        record.cacheCreationInputTokens,
        record.cacheReadInputTokens
      );
    }
  });

  const deleteFiles = db.transaction((provider: string, stale: string[]) => {
    for (const path of stale) {
      statements.deleteRecords.run(provider, path);
      statements.deleteFile.run(provider, path);
    }
  });

  return { ...statements, replaceFile, deleteFiles };
}

type Statements = ReturnType<typeof prepareStatements>;

export class SqliteStorage implements Storage {
  readonly backend = 'sqlite';

  private readonly db: Database.Database;

  private readonly statements: Statements;

  // Providers touched since the last drain
  private readonly touched = new Set<string>();

  /**
   * Open or create the database. Pass ":memory:" for a throwaway cache.
   *
   * @throws StorageOpenError when the file cannot be opened or initialized
   */
  constructor(readonly location: string) {
    this.db = openDatabase(location);
    this.statements = prepareStatements(this.db);
  }

  isCached(provider: string, filePath: string, mtime: number, size: number): boolean {
    this.touched.add(provider);
    const row = this.statements.isCached.get(provider, filePath, mtime, size);
    return row !== undefined;
  }

  insert(provider: string, filePath: string, mtime: number, size: number, records: UsageRecord[]): void {
    this.touched.add(provider);

    try {
      this.statements.replaceFile(provider, filePath, mtime, size, records);
    } catch (error) {
      log.warn('Failed to cache file records', { provider, path: filePath, error });
    }
  }

  prune(provider: string, knownPaths: Iterable<string>): void {
    this.touched.add(provider);
    const known = new Set(knownPaths);

    const paths = this.statements.filePaths
      .all(provider)
      .map((row) => row.path)
      .filter((path) => !known.has(path));
    if (paths.length === 0) return;

    try {
      this.statements.deleteFiles(provider, paths);
      log.debug('Pruned vanished files', { provider, count: paths.length });
    } catch (error) {
      log.warn('Failed to prune cache', { provider, error });
    }
  }

  flush(): void {
    // Writes are committed as they happen
  }

  drainAll(): UsageRecord[] {
    const providers = [...this.touched];
    this.touched.clear();
    if (providers.length === 0) return [];

    const placeholders = providers.map(() => '?').join(', ');
    const rows = this.db
      .prepare<string[], RecordRow>(`
        SELECT f.provider, r.session_id, r.timestamp, r.project, r.model,
               r.message_id, r.request_id, r.input_tokens, r.output_tokens,
               r.cache_creation_input_tokens, r.cache_read_input_tokens
        FROM records r
        JOIN files f ON r.file_id = f.file_id
        WHERE f.provider IN (${placeholders})
        ORDER BY r.rowid
      `)
      .all(...providers);

    return rows.map(rowToRecord);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
