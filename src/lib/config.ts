import { readFileSync, existsSync } from 'fs';
import { parse } from '@iarna/toml';
import { getConfigFile, type Env } from './paths.js';
import { ConfigError } from './errors.js';

export type StorageBackend = 'json' | 'sqlite';

export const STORAGE_BACKENDS: readonly StorageBackend[] = ['json', 'sqlite'];

export function isStorageBackend(value: string): value is StorageBackend {
  return STORAGE_BACKENDS.some((backend) => backend === value);
}

export interface TallyConfig {
  storage: {
    backend: StorageBackend;
  };
  pricing: {
    file: string;  // LiteLLM-format table; empty = bundled table
  };
  parse: {
    concurrency: number;  // 0 = one per available CPU
  };
  watch: {
    interval_ms: number;
  };
}

const DEFAULT_CONFIG: TallyConfig = {
  storage: {
    backend: 'json',
  },
  pricing: {
    file: '',
  },
  parse: {
    concurrency: 0,
  },
  watch: {
    interval_ms: 2000,
  },
};

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Deep merge utility that recursively merges objects.
 * - Recursively merges nested objects
 * - Arrays in overrides replace defaults (not concatenated)
 * - User values take precedence over defaults
 */
function deepMerge(defaults: PlainObject, overrides: PlainObject): PlainObject {
  const result: PlainObject = { ...defaults };

  for (const key of Object.keys(overrides)) {
    const defaultVal = defaults[key];
    const overrideVal = overrides[key];

    // Skip undefined values in overrides
    if (overrideVal === undefined) continue;

    if (isPlainObject(defaultVal) && isPlainObject(overrideVal)) {
      result[key] = deepMerge(defaultVal, overrideVal);
    } else {
      result[key] = overrideVal;
    }
  }

  return result;
}

/**
 * Check merged values against the config schema
 */
function validateConfig(path: string, merged: PlainObject): TallyConfig {
  const section = (name: string): PlainObject => {
    const value = merged[name];
    if (!isPlainObject(value)) {
      throw new ConfigError(path, `[${name}] must be a table`);
    }
    return value;
  };

  const storage = section('storage');
  const pricing = section('pricing');
  const parseSection = section('parse');
  const watch = section('watch');

  const backend = storage.backend;
  if (typeof backend !== 'string' || !isStorageBackend(backend)) {
    throw new ConfigError(path, `storage.backend must be one of ${STORAGE_BACKENDS.join(', ')}`);
  }

  const file = pricing.file;
  if (typeof file !== 'string') {
    throw new ConfigError(path, 'pricing.file must be a string');
  }

  const concurrency = parseSection.concurrency;
  if (typeof concurrency !== 'number' || !Number.isInteger(concurrency) || concurrency < 0) {
    throw new ConfigError(path, 'parse.concurrency must be a non-negative integer');
  }

  const interval = watch.interval_ms;
  if (typeof interval !== 'number' || !Number.isFinite(interval) || interval < 0) {
    throw new ConfigError(path, 'watch.interval_ms must be a non-negative number');
  }

  return {
    storage: { backend },
    pricing: { file },
    parse: { concurrency },
    watch: { interval_ms: interval },
  };
}

export function parseConfig(content: string, path: string): TallyConfig {
  let parsed: PlainObject;
  try {
    parsed = parse(content);
  } catch (error) {
    throw new ConfigError(path, error instanceof Error ? error.message : String(error));
  }

  const defaults: PlainObject = { ...getDefaultConfig() };
  return validateConfig(path, deepMerge(defaults, parsed));
}

/**
 * Load the config file, falling back to defaults when it does not exist
 */
export function loadConfig(env: Env = process.env): TallyConfig {
  const configFile = getConfigFile(env);
  if (!configFile || !existsSync(configFile)) {
    return getDefaultConfig();
  }

  const content = readFileSync(configFile, 'utf8');
  return parseConfig(content, configFile);
}

export function getDefaultConfig(): TallyConfig {
  return {
    storage: { ...DEFAULT_CONFIG.storage },
    pricing: { ...DEFAULT_CONFIG.pricing },
    parse: { ...DEFAULT_CONFIG.parse },
    watch: { ...DEFAULT_CONFIG.watch },
  };
}
