import type { UsageRecord } from './types.js';

/**
 * Identity key of a record. JSON array encoding keeps the three parts
 * unambiguous whatever characters they contain.
 */
export function dedupKey(record: UsageRecord): string {
  return JSON.stringify([record.provider, record.messageId, record.requestId]);
}

/**
 * Drop records whose (provider, messageId, requestId) was already seen,
 * keeping the first occurrence in input order.
 *
 * Records with empty ids share one key per provider, so only the first of
 * them survives.
 */
export function dedup(records: Iterable<UsageRecord>): UsageRecord[] {
  const seen = new Set<string>();
  const result: UsageRecord[] = [];
  for (const record of records) {
    const key = dedupKey(record);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(record);
  }
  return result;
}
