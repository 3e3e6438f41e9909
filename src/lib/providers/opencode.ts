/**
 * OpenCode Message Parser
 *
 * storage/message/<session>/<msg>.json holds one message per file;
 * storage/session/<project>/<session>.json maps sessions to a directory.
 */

import { basename, join } from 'path';
import { createUsageRecord, type UsageRecord } from '../usage/types.js';
import type { Env } from '../paths.js';
import type { Storage } from '../storage/types.js';
import { computeProviderRoots, discoverFiles } from './discovery.js';
import { field, isObject, numberField, readJsonFile, stringField, tokenField } from './jsonl.js';
import { discoverAndParseWith } from './pipeline.js';
import type { DiscoverOptions, Provider } from './types.js';

const PROVIDER = 'opencode';

export function opencodeRoots(env: Env = process.env): string[] {
  return computeProviderRoots(
    {
      envVar: 'OPENCODE_DATA_DIR',
      envSubpaths: ['storage'],
      fallbacks: [{ base: 'data', subpaths: ['opencode', 'storage'] }],
    },
    env
  );
}

/**
 * Map session id → project name from every session document under `roots`
 */
export async function loadSessionProjects(roots: string[]): Promise<Map<string, string>> {
  const projects = new Map<string, string>();
  const files = await discoverFiles(roots.map((root) => join(root, 'session')), '.json');

  for (const file of files) {
    const session = await readJsonFile(file.path);
    const id = stringField(session, 'id');
    if (!id) continue;

    const directory = stringField(session, 'directory');
    const fromDirectory = directory ? basename(directory) : '';
    projects.set(id, fromDirectory || stringField(session, 'projectID') || 'opencode');
  }
  return projects;
}

/**
 * Parse one message file; at most one record
 */
export async function parseOpencodeMessage(
  filePath: string,
  sessionProjects: ReadonlyMap<string, string>
): Promise<UsageRecord[]> {
  const message = await readJsonFile(filePath);
  if (!isObject(message)) return [];

  const messageId = stringField(message, 'id');
  const model = stringField(message, 'modelID');
  if (!messageId || stringField(message, 'providerID') === undefined || !model) return [];

  const created = numberField(message, 'time', 'created');
  if (created === undefined) return [];
  const timestamp = new Date(created);
  if (Number.isNaN(timestamp.getTime())) return [];

  const tokens = message.tokens;
  if (!isObject(tokens)) return [];
  const input = tokenField(tokens, 'input');
  const output = tokenField(tokens, 'output');
  if (input === 0 && output === 0) return [];

  const sessionId = stringField(message, 'sessionID') ?? 'unknown';

  return [
    createUsageRecord({
      provider: PROVIDER,
      sessionId,
      timestamp,
      project: sessionProjects.get(sessionId) ?? 'opencode',
      model,
      messageId,
      inputTokens: input,
      outputTokens: output,
      cacheCreationInputTokens: tokenField(field(tokens, 'cache'), 'write'),
      cacheReadInputTokens: tokenField(field(tokens, 'cache'), 'read'),
    }),
  ];
}

export class OpencodeProvider implements Provider {
  readonly name = PROVIDER;

  constructor(private readonly env: Env = process.env) {}

  rootDirs(): string[] {
    return opencodeRoots(this.env);
  }

  async discoverAndParse(storage: Storage, options?: DiscoverOptions): Promise<void> {
    const roots = this.rootDirs();
    const sessionProjects = await loadSessionProjects(roots);
    const files = await discoverFiles(roots.map((root) => join(root, 'message')), '.json');
    await discoverAndParseWith(
      this.name,
      files,
      storage,
      (path) => parseOpencodeMessage(path, sessionProjects),
      options
    );
  }
}
