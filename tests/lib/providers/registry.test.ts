import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { PROVIDER_NAMES, allProviders, allWatchPaths } from '../../../src/lib/providers/index.js';

describe('provider registry', () => {
  it('should register every provider in a fixed order', () => {
    expect(allProviders({ HOME: '/home/u' }).map((provider) => provider.name)).toEqual([...PROVIDER_NAMES]);
  });

  it('should list each watch path once', () => {
    const env = { HOME: '/home/u' };
    const paths = allWatchPaths(allProviders(env));

    expect(new Set(paths).size).toBe(paths.length);
    expect(paths).toContain(join('/home/u', '.claude', 'projects'));
    expect(paths).toContain(join('/home/u', '.local', 'share', 'opencode', 'storage'));
  });

  it('should have nothing to watch without a home directory', () => {
    expect(allWatchPaths(allProviders({}))).toEqual([]);
  });
});
