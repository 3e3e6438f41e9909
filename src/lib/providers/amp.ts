/**
 * Amp Thread Parser
 *
 * Each thread is one JSON document under ~/.local/share/amp/threads. Token
 * counts come from `usageLedger.events`; cache counts only exist on the
 * assistant message an event points at (`toMessageId`).
 */

import { createUsageRecord, type UsageRecord } from '../usage/types.js';
import type { Env } from '../paths.js';
import type { Storage } from '../storage/types.js';
import { computeProviderRoots, discoverFiles } from './discovery.js';
import { field, isObject, numberField, parseTimestamp, readJsonFile, stringField, tokenField } from './jsonl.js';
import { discoverAndParseWith } from './pipeline.js';
import type { DiscoverOptions, Provider } from './types.js';

const PROVIDER = 'amp';

interface CacheCounts {
  creation: number;
  read: number;
}

export function ampRoots(env: Env = process.env): string[] {
  return computeProviderRoots(
    {
      envVar: 'AMP_DATA_DIR',
      envSubpaths: ['threads'],
      fallbacks: [{ base: 'data', subpaths: ['amp', 'threads'] }],
    },
    env
  );
}

function buildCacheMap(thread: unknown): Map<number, CacheCounts> {
  const map = new Map<number, CacheCounts>();
  const messages = field(thread, 'messages');
  if (!Array.isArray(messages)) return map;

  for (const message of messages) {
    if (!isObject(message) || message.role !== 'assistant') continue;
    const messageId = numberField(message, 'messageId');
    if (messageId === undefined || !isObject(message.usage)) continue;

    map.set(messageId, {
      creation: tokenField(message.usage, 'cacheCreationInputTokens'),
      read: tokenField(message.usage, 'cacheReadInputTokens'),
    });
  }
  return map;
}

export async function parseAmpFile(filePath: string): Promise<UsageRecord[]> {
  const thread = await readJsonFile(filePath);
  const events = field(thread, 'usageLedger', 'events');
  if (!Array.isArray(events)) return [];

  const threadId = stringField(thread, 'id') ?? 'unknown';
  const cacheMap = buildCacheMap(thread);
  const records: UsageRecord[] = [];

  for (const event of events) {
    const timestamp = parseTimestamp(field(event, 'timestamp'));
    if (!timestamp) continue;
    const tokens = field(event, 'tokens');
    if (!isObject(tokens)) continue;

    const target = numberField(event, 'toMessageId');
    const cache = target === undefined ? undefined : cacheMap.get(target);

    records.push(
      createUsageRecord({
        provider: PROVIDER,
        sessionId: threadId,
        timestamp,
        project: 'amp',
        model: stringField(event, 'model') ?? 'unknown',
        messageId: stringField(event, 'id') ?? '',
        inputTokens: tokenField(tokens, 'input'),
        outputTokens: tokenField(tokens, 'output'),
        cacheCreationInputTokens: cache?.creation ?? 0,
        cacheReadInputTokens: cache?.read ?? 0,
      })
    );
  }
  return records;
}

export class AmpProvider implements Provider {
  readonly name = PROVIDER;

  constructor(private readonly env: Env = process.env) {}

  rootDirs(): string[] {
    return ampRoots(this.env);
  }

  async discoverAndParse(storage: Storage, options?: DiscoverOptions): Promise<void> {
    const files = await discoverFiles(this.rootDirs(), '.json');
    await discoverAndParseWith(this.name, files, storage, parseAmpFile, options);
  }
}
