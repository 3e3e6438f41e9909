/**
 * Gemini CLI Session Parser
 *
 * Chat sessions are saved as ~/.gemini/tmp/<project-hash>/chats/session-*.json
 */

import { createUsageRecord, type UsageRecord } from '../usage/types.js';
import type { Env } from '../paths.js';
import type { Storage } from '../storage/types.js';
import { computeProviderRoots, discoverFiles } from './discovery.js';
import { field, fileMtime, isObject, parseTimestamp, readJsonFile, stringField, tokenField } from './jsonl.js';
import { discoverAndParseWith } from './pipeline.js';
import type { DiscoverOptions, Provider } from './types.js';

const PROVIDER = 'gemini';

export function geminiRoots(env: Env = process.env): string[] {
  return computeProviderRoots(
    {
      envVar: 'GEMINI_HOME',
      envSubpaths: ['tmp'],
      fallbacks: [{ base: 'home', subpaths: ['.gemini', 'tmp'] }],
    },
    env
  );
}

export async function parseGeminiFile(filePath: string): Promise<UsageRecord[]> {
  const session = await readJsonFile(filePath);
  const messages = field(session, 'messages');
  if (!isObject(session) || !Array.isArray(messages)) return [];

  const sessionId = stringField(session, 'sessionId') ?? 'unknown';
  const project = stringField(session, 'projectHash') || 'gemini';

  let mtime: Date | undefined;
  const records: UsageRecord[] = [];

  for (const message of messages) {
    if (!isObject(message) || message.type !== 'gemini') continue;
    const tokens = message.tokens;
    const model = stringField(message, 'model');
    if (!isObject(tokens) || !model) continue;

    const input = tokenField(tokens, 'input');
    const output = tokenField(tokens, 'output');
    if (input === 0 && output === 0) continue;

    let timestamp = parseTimestamp(stringField(message, 'timestamp'));
    if (!timestamp) {
      mtime ??= await fileMtime(filePath);
      timestamp = mtime;
    }

    records.push(
      createUsageRecord({
        provider: PROVIDER,
        sessionId,
        timestamp,
        project,
        model,
        messageId: `gemini:${sessionId}:${stringField(message, 'id') ?? 'unknown'}`,
        inputTokens: input,
        outputTokens: output,
        cacheReadInputTokens: tokenField(tokens, 'cached'),
      })
    );
  }
  return records;
}

export class GeminiProvider implements Provider {
  readonly name = PROVIDER;

  constructor(private readonly env: Env = process.env) {}

  rootDirs(): string[] {
    return geminiRoots(this.env);
  }

  async discoverAndParse(storage: Storage, options?: DiscoverOptions): Promise<void> {
    const files = await discoverFiles(this.rootDirs(), '.json');
    await discoverAndParseWith(this.name, files, storage, parseGeminiFile, options);
  }
}
