/**
 * Kimi CLI Wire Log Parser
 *
 * Sessions live at ~/.kimi/sessions/<group>/<session>/wire.jsonl. Token usage
 * arrives in StatusUpdate messages; the model usually comes from
 * ~/.kimi/config.json.
 */

import { readFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { createUsageRecord, type UsageRecord } from '../usage/types.js';
import { resolveHome, type Env } from '../paths.js';
import { createLogger } from '../logger.js';
import type { Storage } from '../storage/types.js';
import { computeProviderRoots, discoverFiles } from './discovery.js';
import { field, isObject, numberField, parseJsonLines, stringField, tokenField, type JsonObject } from './jsonl.js';
import { discoverAndParseWith } from './pipeline.js';
import type { DiscoverOptions, Provider } from './types.js';

const PROVIDER = 'kimi';
const DEFAULT_MODEL = 'kimi-for-coding';

const log = createLogger('kimi');

export function kimiRoots(env: Env = process.env): string[] {
  return computeProviderRoots(
    {
      envVar: 'KIMI_HOME',
      envSubpaths: ['sessions'],
      fallbacks: [{ base: 'home', subpaths: ['.kimi', 'sessions'] }],
    },
    env
  );
}

/**
 * Model configured in config.json, or kimi-for-coding
 */
export async function readKimiConfigModel(env: Env = process.env): Promise<string> {
  const home = resolveHome(env);
  const kimiHome = env.KIMI_HOME || (home ? join(home, '.kimi') : null);
  if (!kimiHome) return DEFAULT_MODEL;

  const path = join(kimiHome, 'config.json');
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    log.debug('No config file', { path, error });
    return DEFAULT_MODEL;
  }

  try {
    return stringField(JSON.parse(content), 'model') ?? DEFAULT_MODEL;
  } catch (error) {
    log.warn('Malformed config file', { path, error });
    return DEFAULT_MODEL;
  }
}

/** Directory holding wire.jsonl */
export function kimiSessionId(filePath: string): string {
  return basename(dirname(filePath)) || 'unknown';
}

/** Directory above the session, unless that is sessions/ itself */
export function kimiProject(filePath: string): string {
  const group = basename(dirname(dirname(filePath)));
  return group && group !== 'sessions' ? group : 'kimi';
}

function extractRecord(entry: JsonObject, sessionId: string, project: string, configModel: string): UsageRecord | undefined {
  if (entry.type === 'metadata') return undefined;

  const message = entry.message;
  if (!isObject(message) || message.type !== 'StatusUpdate') return undefined;

  const usage = field(message, 'payload', 'token_usage');
  if (!isObject(usage)) return undefined;

  const input = tokenField(usage, 'input_other');
  const output = tokenField(usage, 'output');
  if (input === 0 && output === 0) return undefined;

  // Seconds since the epoch, with a fractional part
  const seconds = numberField(entry, 'timestamp');
  if (seconds === undefined) return undefined;
  const timestamp = new Date(Math.trunc(seconds * 1000));
  if (Number.isNaN(timestamp.getTime())) return undefined;

  return createUsageRecord({
    provider: PROVIDER,
    sessionId,
    timestamp,
    project,
    model: stringField(entry, 'model') ?? configModel,
    messageId:
      stringField(message, 'payload', 'message_id') ??
      `kimi:${sessionId}:${timestamp.toISOString()}:${input}:${output}`,
    inputTokens: input,
    outputTokens: output,
    cacheCreationInputTokens: tokenField(usage, 'input_cache_creation'),
    cacheReadInputTokens: tokenField(usage, 'input_cache_read'),
  });
}

export function parseKimiFile(filePath: string, configModel: string = DEFAULT_MODEL): Promise<UsageRecord[]> {
  const sessionId = kimiSessionId(filePath);
  const project = kimiProject(filePath);
  return parseJsonLines(filePath, 'token_usage', (entry) => extractRecord(entry, sessionId, project, configModel));
}

export class KimiProvider implements Provider {
  readonly name = PROVIDER;

  constructor(private readonly env: Env = process.env) {}

  rootDirs(): string[] {
    return kimiRoots(this.env);
  }

  async discoverAndParse(storage: Storage, options?: DiscoverOptions): Promise<void> {
    const configModel = await readKimiConfigModel(this.env);
    const files = await discoverFiles(this.rootDirs(), '.jsonl');
    await discoverAndParseWith(this.name, files, storage, (path) => parseKimiFile(path, configModel), options);
  }
}
