/**
 * LiteLLM Pricing Table
 *
 * Reads the `model_prices_and_context_window.json` layout: an object keyed by
 * model id whose entries carry `input_cost_per_token`,
 * `output_cost_per_token` and optional cache rates. Entries without both
 * base rates (image, embedding and audio models) are ignored.
 */

import type { ModelPricing } from './types.js';

const PROVIDER_PREFIXES = [
  'us.anthropic.',
  'eu.anthropic.',
  'au.anthropic.',
  'apac.anthropic.',
  'global.anthropic.',
  'anthropic.',
  'bedrock/',
  'openai/',
];

function stripProviderPrefix(key: string): string {
  for (const prefix of PROVIDER_PREFIXES) {
    if (key.startsWith(prefix)) {
      return key.slice(prefix.length);
    }
  }
  return key;
}

function stripVersionSuffix(key: string): string {
  if (key.endsWith(':0')) {
    const stripped = key.slice(0, -':0'.length);
    return stripped.endsWith('-v1') ? stripped.slice(0, -'-v1'.length) : stripped;
  }
  if (key.endsWith('-v1')) {
    return key.slice(0, -'-v1'.length);
  }
  return key;
}

/**
 * Alias keys for a table key: vendor prefix removed, then version suffix
 * removed. Only variants that differ from their input are returned.
 *
 * "us.anthropic.claude-sonnet-4-5-20250929-v1:0" →
 *   ["claude-sonnet-4-5-20250929-v1:0", "claude-sonnet-4-5-20250929"]
 */
export function normalizePricingKey(key: string): string[] {
  const variants: string[] = [];

  const withoutPrefix = stripProviderPrefix(key);
  if (withoutPrefix !== key) variants.push(withoutPrefix);

  const withoutSuffix = stripVersionSuffix(withoutPrefix);
  if (withoutSuffix !== withoutPrefix) variants.push(withoutSuffix);

  return variants;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rate(entry: Record<string, unknown>, key: string): number | undefined {
  const value = entry[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Build a model → pricing map from a parsed LiteLLM table.
 *
 * Exact keys always win; aliases never overwrite an existing key.
 */
export function parseLiteLLMPricing(table: unknown): Map<string, ModelPricing> {
  const map = new Map<string, ModelPricing>();
  if (!isRecord(table)) return map;

  const aliases: Array<[string, ModelPricing]> = [];

  for (const [key, entry] of Object.entries(table)) {
    if (!isRecord(entry)) continue;

    const input = rate(entry, 'input_cost_per_token');
    const output = rate(entry, 'output_cost_per_token');
    if (input === undefined || output === undefined) continue;

    const pricing: ModelPricing = {
      inputCostPerToken: input,
      outputCostPerToken: output,
    };
    const cacheRead = rate(entry, 'cache_read_input_token_cost');
    if (cacheRead !== undefined) pricing.cacheReadInputTokenCost = cacheRead;
    const cacheCreation = rate(entry, 'cache_creation_input_token_cost');
    if (cacheCreation !== undefined) pricing.cacheCreationInputTokenCost = cacheCreation;

    map.set(key, pricing);
    for (const alias of normalizePricingKey(key)) {
      aliases.push([alias, pricing]);
    }
  }

  for (const [alias, pricing] of aliases) {
    if (!map.has(alias)) map.set(alias, pricing);
  }

  return map;
}
