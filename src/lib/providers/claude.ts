/**
 * Claude Code JSONL Parser
 *
 * Session files are stored at:
 *   ~/.claude/projects/<encoded-project-path>/<session-id>.jsonl
 *
 * Usage lives on `assistant` lines, and on `progress` lines emitted for
 * sub-agents (data.type == "agent_progress") where the message is nested
 * one level deeper.
 */

import { basename, dirname } from 'path';
import { createUsageRecord, type UsageRecord } from '../usage/types.js';
import type { Env } from '../paths.js';
import { computeProviderRoots, discoverFiles } from './discovery.js';
import { field, isObject, parseJsonLines, parseTimestamp, stringField, tokenField, type JsonObject } from './jsonl.js';
import { discoverAndParseWith } from './pipeline.js';
import type { DiscoverOptions, Provider } from './types.js';
import type { Storage } from '../storage/types.js';

const PROVIDER = 'claude';

const PROJECT_MARKERS = ['projects', 'src', 'code', 'repos', 'workspace'];

export function claudeRoots(env: Env = process.env): string[] {
  return computeProviderRoots(
    {
      envVar: 'CLAUDE_CONFIG_DIR',
      envSubpaths: ['projects'],
      fallbacks: [
        { base: 'home', subpaths: ['.claude', 'projects'] },
        { base: 'config', subpaths: ['claude', 'projects'] },
      ],
    },
    env
  );
}

/**
 * Decode a project folder name such as "-home-u-git-foo-bar" into "foo-bar"
 */
export function decodeProjectName(encoded: string): string {
  const parts = encoded.split('-').filter((part) => part.length > 0);

  const gitIndex = parts.indexOf('git');
  if (gitIndex !== -1 && gitIndex + 1 < parts.length) {
    return parts.slice(gitIndex + 1).join('-');
  }

  for (const marker of PROJECT_MARKERS) {
    const index = parts.indexOf(marker);
    if (index !== -1 && index + 1 < parts.length) {
      return parts.slice(index + 1).join('-');
    }
  }

  if (parts.length >= 3 && parts[0] === 'home') {
    return parts.slice(2).join('-');
  }

  return parts.length > 0 ? parts[parts.length - 1] : 'unknown';
}

/**
 * Project name from the folder directly below a "projects" directory
 */
export function projectFromPath(filePath: string): string {
  let dir = dirname(filePath);
  while (dirname(dir) !== dir) {
    const parent = dirname(dir);
    if (basename(parent) === 'projects') {
      return decodeProjectName(basename(dir));
    }
    dir = parent;
  }
  return 'unknown';
}

function extractRecord(entry: JsonObject, sessionId: string, fallbackProject: string): UsageRecord | undefined {
  let message: unknown;
  let timestampValue: unknown;
  let requestId: string | undefined;

  switch (entry.type) {
    case 'assistant':
      message = entry.message;
      timestampValue = entry.timestamp;
      requestId = stringField(entry, 'requestId');
      break;
    case 'progress': {
      if (stringField(entry, 'data', 'type') !== 'agent_progress') return undefined;
      const outer = field(entry, 'data', 'message');
      if (!isObject(outer)) return undefined;
      message = outer.message;
      timestampValue = outer.timestamp ?? entry.timestamp;
      requestId = stringField(outer, 'requestId');
      break;
    }
    default:
      return undefined;
  }

  if (!isObject(message)) return undefined;
  const usage = message.usage;
  if (!isObject(usage)) return undefined;

  const timestamp = parseTimestamp(timestampValue);
  if (!timestamp) return undefined;

  const model = stringField(message, 'model');
  if (!model || model === '<synthetic>') return undefined;

  const cwd = stringField(entry, 'cwd');
  const project = cwd ? basename(cwd) || fallbackProject : fallbackProject;

  return createUsageRecord({
    provider: PROVIDER,
    sessionId,
    timestamp,
    project,
    model,
    messageId: stringField(message, 'id') ?? '',
    requestId: requestId ?? '',
    inputTokens: tokenField(usage, 'input_tokens'),
    outputTokens: tokenField(usage, 'output_tokens'),
    cacheCreationInputTokens: tokenField(usage, 'cache_creation_input_tokens'),
    cacheReadInputTokens: tokenField(usage, 'cache_read_input_tokens'),
  });
}

/**
 * Parse one Claude Code session file
 */
export function parseClaudeFile(filePath: string): Promise<UsageRecord[]> {
  const sessionId = basename(filePath, '.jsonl');
  const project = projectFromPath(filePath);
  return parseJsonLines(filePath, '"type"', (entry) => extractRecord(entry, sessionId, project));
}

export class ClaudeProvider implements Provider {
  readonly name = PROVIDER;

  constructor(private readonly env: Env = process.env) {}

  rootDirs(): string[] {
    return claudeRoots(this.env);
  }

  async discoverAndParse(storage: Storage, options?: DiscoverOptions): Promise<void> {
    const files = await discoverFiles(this.rootDirs(), '.jsonl');
    await discoverAndParseWith(this.name, files, storage, parseClaudeFile, options);
  }
}
