/**
 * Model Pricing
 *
 * Cost lookups for usage records against a LiteLLM-format table. The
 * bundled table ships in data/pricing.json; a config or CLI path replaces it.
 */

import { existsSync, readFileSync } from 'fs';
import type { Cost, UsageRecord } from '../usage/types.js';
import { BUNDLED_PRICING_FILE } from '../paths.js';
import { PricingLoadError } from '../errors.js';
import { createLogger } from '../logger.js';
import { parseLiteLLMPricing } from './litellm.js';
import type { ModelPricing, PricingMap } from './types.js';

export type { ModelPricing, PricingMap } from './types.js';
export { parseLiteLLMPricing, normalizePricingKey } from './litellm.js';

const log = createLogger('pricing');

/**
 * Pricing map backed by a plain Map
 */
export class StaticPricing implements PricingMap {
  private readonly models: Map<string, ModelPricing>;

  constructor(models: Map<string, ModelPricing> | Record<string, ModelPricing> = new Map()) {
    this.models = models instanceof Map ? new Map(models) : new Map(Object.entries(models));
  }

  get(model: string): ModelPricing | undefined {
    return this.models.get(model);
  }

  get size(): number {
    return this.models.size;
  }
}

/**
 * USD cost of one record, or undefined when its model has no pricing
 */
export function costForRecord(pricing: PricingMap, record: UsageRecord): Cost {
  const rates = pricing.get(record.model);
  if (!rates) return undefined;

  let cost = record.inputTokens * rates.inputCostPerToken + record.outputTokens * rates.outputCostPerToken;
  if (rates.cacheReadInputTokenCost !== undefined) {
    cost += record.cacheReadInputTokens * rates.cacheReadInputTokenCost;
  }
  if (rates.cacheCreationInputTokenCost !== undefined) {
    cost += record.cacheCreationInputTokens * rates.cacheCreationInputTokenCost;
  }
  return cost;
}

/**
 * Sorted distinct model ids that have no pricing entry
 */
export function unpricedModels(pricing: PricingMap, records: Iterable<UsageRecord>): string[] {
  const models = new Set<string>();
  for (const record of records) {
    models.add(record.model);
  }
  return [...models].filter((model) => pricing.get(model) === undefined).sort();
}

/**
 * Load a LiteLLM-format table from `path`, or the bundled table
 *
 * @throws PricingLoadError when the file is missing, unreadable or has no usable entries
 */
export function loadPricing(path?: string): StaticPricing {
  const file = path || BUNDLED_PRICING_FILE;
  if (!existsSync(file)) {
    throw new PricingLoadError(file, 'file not found');
  }

  let table: unknown;
  try {
    table = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new PricingLoadError(file, error instanceof Error ? error.message : String(error));
  }

  const models = parseLiteLLMPricing(table);
  if (models.size === 0) {
    throw new PricingLoadError(file, 'no model entries with input and output rates');
  }

  log.debug('Loaded pricing table', { file, models: models.size });
  return new StaticPricing(models);
}
