/**
 * Codex CLI Rollout Parser
 *
 * Rollout files live at ~/.codex/sessions/<yyyy>/<mm>/<dd>/rollout-*.jsonl.
 * `turn_context` lines announce the active model; `event_msg` lines of
 * payload type `token_count` carry either a per-turn delta
 * (`last_token_usage`) or running totals (`total_token_usage`).
 */

import { relative, sep, basename } from 'path';
import { createUsageRecord, type UsageRecord } from '../usage/types.js';
import type { Env } from '../paths.js';
import type { Storage } from '../storage/types.js';
import { computeProviderRoots, discoverFiles } from './discovery.js';
import { field, isObject, parseJsonLines, parseTimestamp, stringField, tokenField, type JsonObject } from './jsonl.js';
import { discoverAndParseWith } from './pipeline.js';
import type { DiscoverOptions, Provider } from './types.js';

const PROVIDER = 'codex';
const DEFAULT_MODEL = 'gpt-5';

export function codexRoots(env: Env = process.env): string[] {
  return computeProviderRoots(
    {
      envVar: 'CODEX_HOME',
      envSubpaths: ['sessions'],
      fallbacks: [
        { base: 'home', subpaths: ['.codex', 'sessions'] },
        { base: 'config', subpaths: ['codex', 'sessions'] },
      ],
    },
    env
  );
}

/**
 * Session id: path below the nearest "sessions" directory, without ".jsonl"
 */
export function codexSessionId(filePath: string): string {
  const marker = `${sep}sessions${sep}`;
  const index = filePath.lastIndexOf(marker);
  if (index === -1) return basename(filePath, '.jsonl');

  const rel = relative(filePath.slice(0, index + marker.length), filePath);
  const withoutExt = rel.endsWith('.jsonl') ? rel.slice(0, -'.jsonl'.length) : rel;
  return withoutExt.split(sep).join('/');
}

export function codexProject(sessionId: string): string {
  const first = sessionId.split('/')[0];
  return first ? first : 'codex';
}

function modelFrom(value: unknown): string | undefined {
  return (
    stringField(value, 'info', 'model') ??
    stringField(value, 'info', 'metadata', 'model') ??
    stringField(value, 'model') ??
    stringField(value, 'metadata', 'model')
  );
}

interface TokenCounts {
  input: number;
  output: number;
  cached: number;
}

function readCounts(usage: JsonObject): TokenCounts {
  const cachedKey = usage.cached_input_tokens !== undefined ? 'cached_input_tokens' : 'cache_read_input_tokens';
  return {
    input: tokenField(usage, 'input_tokens'),
    output: tokenField(usage, 'output_tokens'),
    cached: tokenField(usage, cachedKey),
  };
}

/**
 * Parse one rollout file. Running totals are differenced line by line,
 * saturating at zero when a counter goes backwards.
 */
export function parseCodexFile(filePath: string): Promise<UsageRecord[]> {
  const sessionId = codexSessionId(filePath);
  const project = codexProject(sessionId);

  let lastModel: string | undefined;
  const previous: TokenCounts = { input: 0, output: 0, cached: 0 };

  return parseJsonLines(filePath, '"payload"', (entry) => {
    const payload = entry.payload;
    if (!isObject(payload)) return undefined;

    if (entry.type === 'turn_context') {
      lastModel = modelFrom(payload) ?? lastModel;
      return undefined;
    }

    if (payload.type !== 'token_count') return undefined;
    const info = payload.info;
    if (!isObject(info)) return undefined;

    const timestamp = parseTimestamp(entry.timestamp);
    if (!timestamp) return undefined;

    const model =
      stringField(info, 'model') ??
      stringField(info, 'metadata', 'model') ??
      stringField(payload, 'model') ??
      stringField(payload, 'metadata', 'model') ??
      lastModel ??
      DEFAULT_MODEL;

    let counts: TokenCounts;
    const last = field(info, 'last_token_usage');
    const total = field(info, 'total_token_usage');
    if (isObject(last)) {
      counts = readCounts(last);
    } else if (isObject(total)) {
      const current = readCounts(total);
      counts = {
        input: Math.max(0, current.input - previous.input),
        output: Math.max(0, current.output - previous.output),
        cached: Math.max(0, current.cached - previous.cached),
      };
      Object.assign(previous, current);
    } else {
      return undefined;
    }

    if (counts.input === 0 && counts.output === 0 && counts.cached === 0) return undefined;

    return createUsageRecord({
      provider: PROVIDER,
      sessionId,
      timestamp,
      project,
      model,
      messageId: `codex:${sessionId}:${timestamp.toISOString()}:${counts.input}:${counts.output}`,
      inputTokens: counts.input,
      outputTokens: counts.output,
      cacheReadInputTokens: counts.cached,
    });
  });
}

export class CodexProvider implements Provider {
  readonly name = PROVIDER;

  constructor(private readonly env: Env = process.env) {}

  rootDirs(): string[] {
    return codexRoots(this.env);
  }

  async discoverAndParse(storage: Storage, options?: DiscoverOptions): Promise<void> {
    const files = await discoverFiles(this.rootDirs(), '.jsonl');
    await discoverAndParseWith(this.name, files, storage, parseCodexFile, options);
  }
}
