/**
 * Factory Droid Settings Parser
 *
 * Each session keeps cumulative token usage in
 * ~/.factory/sessions/<project>/<session>.settings.json, so one file yields
 * at most one record.
 */

import { basename } from 'path';
import { createUsageRecord, type UsageRecord } from '../usage/types.js';
import type { Env } from '../paths.js';
import type { Storage } from '../storage/types.js';
import { computeProviderRoots, discoverFiles } from './discovery.js';
import { fileMtime, isObject, parseTimestamp, readJsonFile, stringField, tokenField } from './jsonl.js';
import { discoverAndParseWith } from './pipeline.js';
import type { DiscoverOptions, Provider } from './types.js';

const PROVIDER = 'droid';
const SETTINGS_SUFFIX = '.settings.json';

export function droidRoots(env: Env = process.env): string[] {
  return computeProviderRoots(
    {
      envVar: 'FACTORY_HOME',
      envSubpaths: ['sessions'],
      fallbacks: [{ base: 'home', subpaths: ['.factory', 'sessions'] }],
    },
    env
  );
}

/**
 * "custom:Claude-Opus-4.5-Thinking-[Anthropic]-7" → "claude-opus-4-5-thinking-7"
 */
export function normalizeDroidModel(raw: string): string {
  let model = raw.startsWith('custom:') ? raw.slice('custom:'.length) : raw;
  model = model.replace(/\[[^\]]*\]/g, '');
  model = model.toLowerCase().replace(/\./g, '-');
  model = model.replace(/-{2,}/g, '-');
  return model.replace(/^-+|-+$/g, '');
}

export async function parseDroidFile(filePath: string): Promise<UsageRecord[]> {
  const settings = await readJsonFile(filePath);
  if (!isObject(settings)) return [];
  const usage = settings.tokenUsage;
  if (!isObject(usage)) return [];

  const input = tokenField(usage, 'inputTokens');
  const output = tokenField(usage, 'outputTokens');
  if (input === 0 && output === 0) return [];

  const rawModel = stringField(settings, 'model');
  const sessionId = basename(filePath, SETTINGS_SUFFIX);
  const timestamp = parseTimestamp(stringField(settings, 'providerLockTimestamp')) ?? (await fileMtime(filePath));

  return [
    createUsageRecord({
      provider: PROVIDER,
      sessionId,
      timestamp,
      project: 'droid',
      model: rawModel ? normalizeDroidModel(rawModel) : 'unknown',
      messageId: `droid:${sessionId}:${timestamp.toISOString()}:${input}:${output}`,
      inputTokens: input,
      outputTokens: output,
      cacheCreationInputTokens: tokenField(usage, 'cacheCreationTokens'),
      cacheReadInputTokens: tokenField(usage, 'cacheReadTokens'),
    }),
  ];
}

export class DroidProvider implements Provider {
  readonly name = PROVIDER;

  constructor(private readonly env: Env = process.env) {}

  rootDirs(): string[] {
    return droidRoots(this.env);
  }

  async discoverAndParse(storage: Storage, options?: DiscoverOptions): Promise<void> {
    const files = await discoverFiles(this.rootDirs(), SETTINGS_SUFFIX);
    await discoverAndParseWith(this.name, files, storage, parseDroidFile, options);
  }
}
