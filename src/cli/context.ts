/**
 * Shared option handling for report and watch commands
 */

import { InvalidArgumentError } from 'commander';
import { loadConfig, isStorageBackend, STORAGE_BACKENDS, type StorageBackend, type TallyConfig } from '../lib/config.js';
import { getCacheDir } from '../lib/paths.js';
import { setLogLevel } from '../lib/logger.js';
import { loadPricing, type PricingMap } from '../lib/pricing/index.js';
import { isDateArg, type RecordFilters } from '../lib/usage/filters.js';
import { allProviders, type Provider } from '../lib/providers/index.js';

export interface CommonOptions {
  from?: string;
  to?: string;
  project?: string;
  tool?: string;
  backend?: StorageBackend;
  pricing?: string;
  json?: boolean;
  breakdown?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export interface RunContext {
  config: TallyConfig;
  backend: StorageBackend;
  cacheDir: string | null;
  pricing: PricingMap;
  filters: RecordFilters;
  concurrency: number;
  providers: Provider[];
}

export function parseDateOption(value: string): string {
  if (!isDateArg(value)) {
    throw new InvalidArgumentError('Expected a date as YYYY-MM-DD.');
  }
  return value;
}

export function parseBackendOption(value: string): StorageBackend {
  if (!isStorageBackend(value)) {
    throw new InvalidArgumentError(`Expected one of: ${STORAGE_BACKENDS.join(', ')}.`);
  }
  return value;
}

export function parseIntervalOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of milliseconds.');
  }
  return parsed;
}

/**
 * Merge CLI options over the config file and load the pricing table
 *
 * @throws ConfigError, PricingLoadError
 */
export function resolveRunContext(options: CommonOptions): RunContext {
  if (options.verbose) {
    setLogLevel('debug');
  }

  const config = loadConfig();
  const pricingFile = options.pricing || config.pricing.file || undefined;

  return {
    config,
    backend: options.backend ?? config.storage.backend,
    cacheDir: getCacheDir(),
    pricing: loadPricing(pricingFile),
    filters: {
      from: options.from,
      to: options.to,
      project: options.project,
      tool: options.tool,
    },
    concurrency: config.parse.concurrency,
    providers: allProviders(),
  };
}
