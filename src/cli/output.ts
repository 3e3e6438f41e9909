/**
 * Report Rendering
 *
 * Plain-text table and JSON views of aggregated buckets. Colour is applied
 * by the caller so these functions stay width-accurate.
 */

import { totals } from '../lib/usage/aggregate.js';
import type { ReportKind } from '../lib/usage/aggregate.js';
import type { AggregatedBucket, Cost, ModelBucketDetail, TokenTotals } from '../lib/usage/types.js';

export function formatTokens(count: number): string {
  if (count >= 1_000_000) return `${(count / 1_000_000).toFixed(1)}M`;
  if (count >= 1_000) return `${(count / 1_000).toFixed(1)}K`;
  return String(count);
}

export function formatCost(cost: Cost): string {
  return cost === undefined ? 'N/A' : `$${cost.toFixed(2)}`;
}

const KEY_HEADERS: Record<ReportKind, string> = {
  daily: 'Date',
  monthly: 'Month',
  session: 'Session',
  model: 'Model',
};

const VALUE_HEADERS = ['Input', 'Output', 'Cache Write', 'Cache Read', 'Cost', 'Models', 'Tools'];

// Left-aligned columns; the rest are right-aligned numbers
const TEXT_COLUMNS = new Set([0, 6, 7]);

function tokenCells(row: TokenTotals): string[] {
  return [
    formatTokens(row.inputTokens),
    formatTokens(row.outputTokens),
    formatTokens(row.cacheCreationInputTokens),
    formatTokens(row.cacheReadInputTokens),
    formatCost(row.cost),
  ];
}

function bucketRow(label: string, bucket: AggregatedBucket): string[] {
  return [label, ...tokenCells(bucket), bucket.models.join(', '), bucket.tools.join(', ')];
}

function detailRow(detail: ModelBucketDetail): string[] {
  return [`  ${detail.model}`, ...tokenCells(detail), '', ''];
}

export interface TableOptions {
  /** Names the first column; defaults to daily */
  kind?: ReportKind;

  /** Add one row per model under each bucket */
  breakdown?: boolean;
}

export interface RenderedTable {
  header: string;
  separator: string;
  rows: string[];
  total: string;
}

/**
 * Lay out buckets as fixed-width columns with a TOTAL row
 */
export function renderTable(buckets: Map<string, AggregatedBucket>, options: TableOptions = {}): RenderedTable {
  const body: string[][] = [];
  for (const [key, bucket] of buckets) {
    body.push(bucketRow(key, bucket));
    if (options.breakdown) {
      for (const detail of bucket.details) {
        body.push(detailRow(detail));
      }
    }
  }

  const sum = totals(buckets.values());
  const totalRow = ['TOTAL', ...tokenCells(sum), '', ''];

  const headers = [KEY_HEADERS[options.kind ?? 'daily'], ...VALUE_HEADERS];
  const widths = headers.map((header, column) =>
    Math.max(header.length, totalRow[column].length, ...body.map((row) => row[column].length))
  );

  const line = (cells: string[]): string =>
    cells
      .map((cell, column) =>
        TEXT_COLUMNS.has(column) ? cell.padEnd(widths[column]) : cell.padStart(widths[column])
      )
      .join('  ')
      .trimEnd();

  return {
    header: line(headers),
    separator: widths.map((width) => '-'.repeat(width)).join('  '),
    rows: body.map(line),
    total: line(totalRow),
  };
}

export interface JsonDetail {
  model: string;
  input_tokens: number;
  output_tokens: number;
  cache_creation_input_tokens: number;
  cache_read_input_tokens: number;
  cost: number | null;
}

export interface JsonBucket extends Omit<JsonDetail, 'model'> {
  models: string[];
  projects: string[];
  tools: string[];
  details: JsonDetail[];
}

function jsonTotals(row: TokenTotals): Omit<JsonDetail, 'model'> {
  return {
    input_tokens: row.inputTokens,
    output_tokens: row.outputTokens,
    cache_creation_input_tokens: row.cacheCreationInputTokens,
    cache_read_input_tokens: row.cacheReadInputTokens,
    cost: row.cost ?? null,
  };
}

/**
 * JSON view keyed like the table; unknown cost is null
 */
export function bucketsToJson(buckets: Map<string, AggregatedBucket>): Record<string, JsonBucket> {
  const result: Record<string, JsonBucket> = {};
  for (const [key, bucket] of buckets) {
    result[key] = {
      ...jsonTotals(bucket),
      models: bucket.models,
      projects: bucket.projects,
      tools: bucket.tools,
      details: bucket.details.map((detail) => ({ model: detail.model, ...jsonTotals(detail) })),
    };
  }
  return result;
}
