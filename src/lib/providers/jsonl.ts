/**
 * Shared helpers for reading tool log files
 */

import { readFile, stat } from 'fs/promises';
import { createLogger } from '../logger.js';

const log = createLogger('parse');

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Field access that tolerates non-object parents */
export function field(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isObject(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function stringField(value: unknown, ...path: string[]): string | undefined {
  const found = field(value, ...path);
  return typeof found === 'string' ? found : undefined;
}

/** Non-negative integer token count; anything else counts as zero */
export function tokenField(value: unknown, ...path: string[]): number {
  const found = field(value, ...path);
  if (typeof found !== 'number' || !Number.isFinite(found) || found < 0) return 0;
  return Math.trunc(found);
}

/** Non-negative integer, or undefined for anything else */
export function countField(value: unknown, ...path: string[]): number | undefined {
  const found = field(value, ...path);
  return typeof found === 'number' && Number.isSafeInteger(found) && found >= 0 ? found : undefined;
}

export function numberField(value: unknown, ...path: string[]): number | undefined {
  const found = field(value, ...path);
  return typeof found === 'number' && Number.isFinite(found) ? found : undefined;
}

/**
 * Parse an RFC 3339 timestamp (or epoch milliseconds); undefined when invalid
 */
export function parseTimestamp(value: unknown): Date | undefined {
  if (typeof value === 'string') {
    if (value.trim() === '') return undefined;
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return new Date(value);
  }
  return undefined;
}

/**
 * Read a JSON-lines file and run `extract` on every parseable line that
 * contains `filter`. Bad lines are skipped; an unreadable file yields [].
 */
export async function parseJsonLines<T>(
  path: string,
  filter: string,
  extract: (entry: JsonObject) => T | undefined
): Promise<T[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    log.warn('Cannot read file', { path, error });
    return [];
  }

  const results: T[] = [];
  for (const line of content.split('\n')) {
    if (!line.trim() || !line.includes(filter)) continue;

    let entry: unknown;
    try {
      entry = JSON.parse(line);
    } catch {
      // Skip invalid JSON lines
      continue;
    }

    if (!isObject(entry)) continue;
    const item = extract(entry);
    if (item !== undefined) results.push(item);
  }
  return results;
}

/**
 * Read a whole JSON document; undefined when unreadable or malformed
 */
export async function readJsonFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    log.warn('Cannot read file', { path, error });
    return undefined;
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    log.debug('Malformed JSON', { path, error });
    return undefined;
  }
}

/**
 * File modification time at whole-second precision, or now when unavailable
 */
export async function fileMtime(path: string): Promise<Date> {
  try {
    const stats = await stat(path);
    return new Date(Math.trunc(stats.mtimeMs / 1000) * 1000);
  } catch (error) {
    log.debug('Cannot stat file, using current time', { path, error });
    return new Date();
  }
}
