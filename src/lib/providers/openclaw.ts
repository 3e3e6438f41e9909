/**
 * OpenClaw Session Parser
 *
 * Agent transcripts live at ~/.openclaw/agents/<agent>/sessions/<session>.jsonl.
 * Older installs used ~/.clawdbot, ~/.moltbot or ~/.moldbot with the same
 * layout.
 */

import { basename, sep } from 'path';
import { createUsageRecord, type UsageRecord } from '../usage/types.js';
import type { Env } from '../paths.js';
import type { Storage } from '../storage/types.js';
import { computeProviderRoots, discoverFiles } from './discovery.js';
import { isObject, numberField, parseJsonLines, stringField, tokenField } from './jsonl.js';
import { discoverAndParseWith } from './pipeline.js';
import type { DiscoverOptions, Provider } from './types.js';

const PROVIDER = 'openclaw';
const LEGACY_HOMES = ['.openclaw', '.clawdbot', '.moltbot', '.moldbot'];

export function openclawRoots(env: Env = process.env): string[] {
  return computeProviderRoots(
    {
      fallbacks: LEGACY_HOMES.map((dir) => ({ base: 'home' as const, subpaths: [dir, 'agents'] })),
    },
    env
  );
}

/** Directory directly below "agents", or "openclaw" */
export function openclawProject(filePath: string): string {
  const marker = `${sep}agents${sep}`;
  const index = filePath.indexOf(marker);
  if (index === -1) return PROVIDER;

  const after = filePath.slice(index + marker.length);
  const slash = after.indexOf(sep);
  if (slash > 0) return after.slice(0, slash);
  return PROVIDER;
}

export function parseOpenclawFile(filePath: string): Promise<UsageRecord[]> {
  const sessionId = basename(filePath, '.jsonl');
  const project = openclawProject(filePath);
  let currentModel = 'unknown';

  // Every line is read: model_change entries carry the model for later messages
  return parseJsonLines(filePath, '', (entry) => {
    if (entry.type === 'model_change') {
      currentModel = stringField(entry, 'model') ?? currentModel;
      return undefined;
    }

    const message = entry.message;
    if (!isObject(message) || message.role !== 'assistant') return undefined;

    const usage = message.usage;
    if (!isObject(usage)) return undefined;

    const input = tokenField(usage, 'input');
    const output = tokenField(usage, 'output');
    if (input === 0 && output === 0) return undefined;

    const millis = numberField(message, 'timestamp');
    if (millis === undefined || !Number.isInteger(millis)) return undefined;
    const timestamp = new Date(millis);
    if (Number.isNaN(timestamp.getTime())) return undefined;

    return createUsageRecord({
      provider: PROVIDER,
      sessionId,
      timestamp,
      project,
      model: stringField(message, 'model') ?? currentModel,
      messageId: `openclaw:${sessionId}:${timestamp.toISOString()}:${input}:${output}`,
      inputTokens: input,
      outputTokens: output,
      cacheCreationInputTokens: tokenField(usage, 'cacheWrite'),
      cacheReadInputTokens: tokenField(usage, 'cacheRead'),
    });
  });
}

export class OpenclawProvider implements Provider {
  readonly name = PROVIDER;

  constructor(private readonly env: Env = process.env) {}

  rootDirs(): string[] {
    return openclawRoots(this.env);
  }

  async discoverAndParse(storage: Storage, options?: DiscoverOptions): Promise<void> {
    const files = await discoverFiles(this.rootDirs(), '.jsonl');
    await discoverAndParseWith(this.name, files, storage, parseOpenclawFile, options);
  }
}
