/**
 * Pi Agent Session Parser
 *
 * Sessions live at ~/.pi/agent/sessions/<project-dir>/<timestamp>_<id>.jsonl
 */

import { basename, sep } from 'path';
import { createUsageRecord, type UsageRecord } from '../usage/types.js';
import type { Env } from '../paths.js';
import type { Storage } from '../storage/types.js';
import { computeProviderRoots, discoverFiles } from './discovery.js';
import { countField, isObject, parseJsonLines, parseTimestamp, stringField, tokenField } from './jsonl.js';
import { discoverAndParseWith } from './pipeline.js';
import type { DiscoverOptions, Provider } from './types.js';

const PROVIDER = 'pi';

export function piRoots(env: Env = process.env): string[] {
  return computeProviderRoots(
    {
      envVar: 'PI_AGENT_DIR',
      envSubpaths: ['sessions'],
      fallbacks: [
        { base: 'home', subpaths: ['.pi', 'agent', 'sessions'] },
        { base: 'config', subpaths: ['pi', 'agent', 'sessions'] },
      ],
    },
    env
  );
}

/** "2025-01-01T00-00-00_abc123.jsonl" → "abc123" */
export function piSessionId(filePath: string): string {
  const stem = basename(filePath, '.jsonl');
  const index = stem.indexOf('_');
  if (index !== -1 && index + 1 < stem.length) {
    return stem.slice(index + 1);
  }
  return stem;
}

/** Directory directly below "sessions", or "pi" */
export function piProject(filePath: string): string {
  const marker = `${sep}sessions${sep}`;
  const index = filePath.indexOf(marker);
  if (index === -1) return 'pi';

  const after = filePath.slice(index + marker.length);
  const slash = after.indexOf(sep);
  if (slash > 0) return after.slice(0, slash);
  return 'pi';
}

export function parsePiFile(filePath: string): Promise<UsageRecord[]> {
  const sessionId = piSessionId(filePath);
  const project = piProject(filePath);

  return parseJsonLines(filePath, '"assistant"', (entry) => {
    const timestamp = parseTimestamp(entry.timestamp);
    if (!timestamp) return undefined;

    const message = entry.message;
    if (!isObject(message) || message.role !== 'assistant') return undefined;

    const usage = message.usage;
    if (!isObject(usage)) return undefined;

    const input = countField(usage, 'input');
    const output = countField(usage, 'output');
    if (input === undefined || output === undefined) return undefined;

    return createUsageRecord({
      provider: PROVIDER,
      sessionId,
      timestamp,
      project,
      model: stringField(message, 'model') ?? 'unknown',
      messageId: `pi:${sessionId}:${timestamp.toISOString()}:${input}:${output}`,
      inputTokens: input,
      outputTokens: output,
      cacheCreationInputTokens: tokenField(usage, 'cacheWrite'),
      cacheReadInputTokens: tokenField(usage, 'cacheRead'),
    });
  });
}

export class PiProvider implements Provider {
  readonly name = PROVIDER;

  constructor(private readonly env: Env = process.env) {}

  rootDirs(): string[] {
    return piRoots(this.env);
  }

  async discoverAndParse(storage: Storage, options?: DiscoverOptions): Promise<void> {
    const files = await discoverFiles(this.rootDirs(), '.jsonl');
    await discoverAndParseWith(this.name, files, storage, parsePiFile, options);
  }
}
