/**
 * Log File Discovery
 *
 * Resolves each provider's root directories and lists candidate files with
 * the fingerprint used by the cache.
 */

import { readdir, lstat } from 'fs/promises';
import type { Dirent } from 'fs';
import { join } from 'path';
import { resolveBaseDir, type BaseDirKind, type Env } from '../paths.js';
import { createLogger } from '../logger.js';
import type { DiscoveredFile } from './types.js';

const log = createLogger('discovery');

export interface RootFallback {
  base: Exclude<BaseDirKind, 'cache'>;
  subpaths: string[];
}

export interface ProviderRootSpec {
  /** Override variable; when set it replaces every fallback */
  envVar?: string;

  /** Segments joined onto the override value, one root each */
  envSubpaths?: string[];

  fallbacks: RootFallback[];
}

/**
 * Compute the directories a provider should scan.
 *
 * Returns an empty list when neither the override nor a home directory is
 * available.
 */
export function computeProviderRoots(spec: ProviderRootSpec, env: Env = process.env): string[] {
  if (spec.envVar) {
    const override = env[spec.envVar];
    if (override) {
      const subpaths = spec.envSubpaths ?? [];
      if (subpaths.length === 0) return [override];
      return subpaths.map((sub) => join(override, sub));
    }
  }

  const roots: string[] = [];
  for (const fallback of spec.fallbacks) {
    const base = resolveBaseDir(fallback.base, env);
    if (!base) return [];
    roots.push(join(base, ...fallback.subpaths));
  }
  return roots;
}

/**
 * Fingerprint a file: mtime truncated to whole seconds, size in bytes.
 * Null when the path is not a regular file or cannot be stat'ed.
 */
export async function fingerprintFile(path: string): Promise<DiscoveredFile | null> {
  try {
    const stats = await lstat(path);
    if (!stats.isFile()) return null;
    return {
      path,
      mtime: Math.trunc(stats.mtimeMs / 1000),
      size: stats.size,
    };
  } catch (error) {
    log.debug('Cannot stat file', { path, error });
    return null;
  }
}

async function walk(dir: string, matches: (name: string) => boolean, out: DiscoveredFile[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    log.debug('Skipping unreadable directory', { dir, error });
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    // Dirent reports symlinks as symlinks, so links are never followed
    if (entry.isDirectory()) {
      await walk(fullPath, matches, out);
    } else if (entry.isFile() && matches(entry.name)) {
      const file = await fingerprintFile(fullPath);
      if (file) out.push(file);
    }
  }
}

/**
 * Recursively list regular files under `roots` whose name ends with
 * `suffix` (".jsonl", ".settings.json"). Missing roots are skipped.
 * Order is roots order, then sorted path order within each root.
 */
export async function discoverFiles(roots: string[], suffix: string): Promise<DiscoveredFile[]> {
  const files: DiscoveredFile[] = [];
  for (const root of roots) {
    await walk(root, (name) => name.endsWith(suffix) && name.length > suffix.length, files);
  }
  return files;
}
