/**
 * Report Commands
 *
 * daily / monthly / session / model tables, or JSON with --json
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { openStorage } from '../../lib/storage/index.js';
import { unpricedModels } from '../../lib/pricing/index.js';
import { aggregate, BUCKET_KEYS, type ReportKind } from '../../lib/usage/aggregate.js';
import { collectUsage } from '../../lib/usage/collect.js';
import type { UsageRecord } from '../../lib/usage/types.js';
import { bucketsToJson, renderTable } from '../output.js';
import { resolveRunContext, type CommonOptions, type RunContext } from '../context.js';

export const NO_RECORDS_MESSAGE = 'No usage records found.';

/**
 * Scan every provider, then print one report. Diagnostics go to stderr,
 * the report itself to stdout.
 */
export async function runReport(kind: ReportKind, options: CommonOptions, context: RunContext): Promise<void> {
  const storage = openStorage(context.backend, { cacheDir: context.cacheDir });

  const spinner: Ora | null = options.quiet || options.json ? null : ora('Scanning sessions...').start();

  let records: UsageRecord[];
  try {
    const result = await collectUsage({
      providers: context.providers,
      storage,
      filters: context.filters,
      concurrency: context.concurrency,
      progress: spinner
        ? (provider, completed, total) => {
            spinner.text = `Scanning ${provider} sessions... ${completed}/${total}`;
          }
        : undefined,
    });
    records = result.records;
  } finally {
    spinner?.stop();
    storage.close();
  }

  if (records.length === 0) {
    console.error(NO_RECORDS_MESSAGE);
    return;
  }

  if (!options.quiet) {
    console.error(chalk.dim(`Found ${records.length} usage records.`));
  }

  const unpriced = unpricedModels(context.pricing, records);
  if (unpriced.length > 0) {
    console.error(chalk.yellow(`No pricing data for: ${unpriced.join(', ')}`));
  }

  const buckets = aggregate(records, BUCKET_KEYS[kind], context.pricing);

  if (options.json) {
    console.log(JSON.stringify(bucketsToJson(buckets), null, 2));
    return;
  }

  const table = renderTable(buckets, { kind, breakdown: options.breakdown });
  console.log(chalk.bold(table.header));
  console.log(chalk.dim(table.separator));
  for (const row of table.rows) {
    console.log(row.startsWith('  ') ? chalk.dim(row) : row);
  }
  console.log(chalk.dim(table.separator));
  console.log(chalk.bold(table.total));
}

export function reportCommand(kind: ReportKind) {
  return async (options: CommonOptions): Promise<void> => {
    try {
      const context = resolveRunContext(options);
      await runReport(kind, options, context);
    } catch (error) {
      console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  };
}
