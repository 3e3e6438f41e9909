/**
 * Usage Aggregation
 *
 * Groups records into buckets by a caller-supplied key and accumulates
 * token totals, cost and per-model detail.
 */

import { costForRecord, type PricingMap } from '../pricing/index.js';
import {
  accumulate,
  emptyTotals,
  type AggregatedBucket,
  type ModelBucketDetail,
  type TokenTotals,
  type UsageRecord,
} from './types.js';

export type BucketKeyFn = (record: UsageRecord) => string;

export type ReportKind = 'daily' | 'monthly' | 'session' | 'model';

export const REPORT_KINDS: readonly ReportKind[] = ['daily', 'monthly', 'session', 'model'];

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** "2025-09-30" in UTC */
export function dailyKey(record: UsageRecord): string {
  const ts = record.timestamp;
  return `${ts.getUTCFullYear()}-${pad(ts.getUTCMonth() + 1)}-${pad(ts.getUTCDate())}`;
}

/** "2025-09" in UTC */
export function monthlyKey(record: UsageRecord): string {
  const ts = record.timestamp;
  return `${ts.getUTCFullYear()}-${pad(ts.getUTCMonth() + 1)}`;
}

/** "<project> | <sessionId>" */
export function sessionKey(record: UsageRecord): string {
  return `${record.project} | ${record.sessionId}`;
}

export function modelKey(record: UsageRecord): string {
  return record.model;
}

export const BUCKET_KEYS: Record<ReportKind, BucketKeyFn> = {
  daily: dailyKey,
  monthly: monthlyKey,
  session: sessionKey,
  model: modelKey,
};

/**
 * Display name for a model id: "claude-" prefix dropped, then a trailing
 * "-YYYYMMDD" date dropped.
 *
 * "claude-sonnet-4-5-20250929" → "sonnet-4-5"
 */
export function shortModelName(model: string): string {
  const name = model.startsWith('claude-') ? model.slice('claude-'.length) : model;
  if (name.length > 9 && name[name.length - 9] === '-' && /^\d{8}$/.test(name.slice(-8))) {
    return name.slice(0, -9);
  }
  return name;
}

interface BucketState {
  totals: TokenTotals;
  projects: Set<string>;
  tools: Set<string>;
  details: Map<string, ModelBucketDetail>;
}

function compareDetails(a: ModelBucketDetail, b: ModelBucketDetail): number {
  const diff = (b.cost ?? 0) - (a.cost ?? 0);
  if (diff !== 0) return diff;
  return a.model < b.model ? -1 : a.model > b.model ? 1 : 0;
}

/**
 * Aggregate records into buckets keyed by `keyFn`.
 *
 * The returned map iterates keys in lexicographic order. Within a bucket,
 * `details` and `models` are ordered by descending cost (unpriced counts as
 * zero, ties by model id); `projects` and `tools` are sorted.
 */
export function aggregate(
  records: Iterable<UsageRecord>,
  keyFn: BucketKeyFn,
  pricing: PricingMap
): Map<string, AggregatedBucket> {
  const states = new Map<string, BucketState>();

  for (const record of records) {
    const key = keyFn(record);
    const cost = costForRecord(pricing, record);

    let state = states.get(key);
    if (!state) {
      state = { totals: emptyTotals(), projects: new Set(), tools: new Set(), details: new Map() };
      states.set(key, state);
    }

    accumulate(state.totals, record, cost);
    state.projects.add(record.project);
    state.tools.add(record.provider);

    let detail = state.details.get(record.model);
    if (!detail) {
      detail = { model: record.model, ...emptyTotals() };
      state.details.set(record.model, detail);
    }
    accumulate(detail, record, cost);
  }

  const buckets = new Map<string, AggregatedBucket>();
  for (const key of [...states.keys()].sort()) {
    const state = states.get(key);
    if (!state) continue;

    const details = [...state.details.values()].sort(compareDetails);
    buckets.set(key, {
      ...state.totals,
      models: details.map((detail) => shortModelName(detail.model)),
      projects: [...state.projects].sort(),
      tools: [...state.tools].sort(),
      details,
    });
  }
  return buckets;
}

/**
 * Grand total across buckets, for the report's total row
 */
export function totals(buckets: Iterable<AggregatedBucket>): TokenTotals {
  const sum = emptyTotals();
  for (const bucket of buckets) {
    accumulate(sum, bucket, bucket.cost);
  }
  return sum;
}
