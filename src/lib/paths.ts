import { homedir } from 'os';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

export type Env = Record<string, string | undefined>;

export const APP_NAME = 'tokentally';

/**
 * Base directory kinds used when resolving tool and app locations
 */
export type BaseDirKind =
  /** $XDG_CONFIG_HOME, falls back to ~/.config */
  | 'config'
  /** $XDG_DATA_HOME, falls back to ~/.local/share */
  | 'data'
  /** $XDG_CACHE_HOME, falls back to ~/.cache */
  | 'cache'
  /** The home directory itself (legacy ~/.<tool> layouts) */
  | 'home';

/**
 * Home directory, or null when it cannot be determined
 */
export function resolveHome(env: Env = process.env): string | null {
  if (env.HOME) return env.HOME;
  if (env !== process.env) return null;
  const home = homedir();
  return home || null;
}

export function resolveBaseDir(kind: BaseDirKind, env: Env = process.env): string | null {
  const home = resolveHome(env);

  switch (kind) {
    case 'config':
      if (env.XDG_CONFIG_HOME) return env.XDG_CONFIG_HOME;
      return home ? join(home, '.config') : null;
    case 'data':
      if (env.XDG_DATA_HOME) return env.XDG_DATA_HOME;
      return home ? join(home, '.local', 'share') : null;
    case 'cache':
      if (env.XDG_CACHE_HOME) return env.XDG_CACHE_HOME;
      return home ? join(home, '.cache') : null;
    case 'home':
      return home;
  }
}

// App directories (can be overridden for testing)

export function getCacheDir(env: Env = process.env): string | null {
  if (env.TOKENTALLY_CACHE_DIR) return env.TOKENTALLY_CACHE_DIR;
  const base = resolveBaseDir('cache', env);
  return base ? join(base, APP_NAME) : null;
}

export function getConfigFile(env: Env = process.env): string | null {
  if (env.TOKENTALLY_CONFIG) return env.TOKENTALLY_CONFIG;
  const base = resolveBaseDir('config', env);
  return base ? join(base, APP_NAME, 'config.toml') : null;
}

// Bundled data directory, resolved from this file's location
const currentDir = dirname(fileURLToPath(import.meta.url));

// src/lib/paths.ts and dist/lib/paths.js both sit two levels below the package root
const packageRoot = dirname(dirname(currentDir));

export const DATA_DIR = join(packageRoot, 'data');
export const BUNDLED_PRICING_FILE = join(DATA_DIR, 'pricing.json');
