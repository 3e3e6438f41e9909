import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { InvalidArgumentError } from 'commander';
import {
  parseBackendOption,
  parseDateOption,
  parseIntervalOption,
  resolveRunContext,
} from '../../src/cli/context.js';
import { getLogLevel } from '../../src/lib/logger.js';
import { PricingLoadError } from '../../src/lib/errors.js';

describe('cli context', () => {
  describe('option parsers', () => {
    it('should accept valid dates and reject others', () => {
      expect(parseDateOption('2025-09-30')).toBe('2025-09-30');
      expect(() => parseDateOption('30/09/2025')).toThrow(InvalidArgumentError);
    });

    it('should accept known backends only', () => {
      expect(parseBackendOption('sqlite')).toBe('sqlite');
      expect(() => parseBackendOption('bitcode')).toThrow(InvalidArgumentError);
    });

    it('should accept non-negative integer intervals', () => {
      expect(parseIntervalOption('250')).toBe(250);
      expect(() => parseIntervalOption('-5')).toThrow(InvalidArgumentError);
      expect(() => parseIntervalOption('soon')).toThrow(InvalidArgumentError);
    });
  });

  describe('resolveRunContext', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'tokentally-context-test-'));
      vi.stubEnv('HOME', tempDir);
      vi.stubEnv('TOKENTALLY_CONFIG', join(tempDir, 'config.toml'));
      vi.stubEnv('TOKENTALLY_CACHE_DIR', join(tempDir, 'cache'));
    });

    afterEach(() => {
      vi.unstubAllEnvs();
      rmSync(tempDir, { recursive: true, force: true });
    });

    it('should use config values when no option overrides them', () => {
      writeFileSync(join(tempDir, 'config.toml'), '[storage]\nbackend = "sqlite"\n\n[parse]\nconcurrency = 3\n');

      const context = resolveRunContext({});

      expect(context.backend).toBe('sqlite');
      expect(context.concurrency).toBe(3);
      expect(context.cacheDir).toBe(join(tempDir, 'cache'));
      expect(context.providers).toHaveLength(7);
    });

    it('should let options override the config file', () => {
      writeFileSync(join(tempDir, 'config.toml'), '[storage]\nbackend = "sqlite"\n');

      const context = resolveRunContext({ backend: 'json', from: '2025-09-01', tool: 'codex' });

      expect(context.backend).toBe('json');
      expect(context.filters).toEqual({ from: '2025-09-01', to: undefined, project: undefined, tool: 'codex' });
    });

    it('should load the pricing file named on the command line', () => {
      const file = join(tempDir, 'prices.json');
      writeFileSync(file, JSON.stringify({ 'only-model': { input_cost_per_token: 1, output_cost_per_token: 1 } }));

      const context = resolveRunContext({ pricing: file });

      expect(context.pricing.get('only-model')).toBeDefined();
      expect(context.pricing.get('gpt-5')).toBeUndefined();
    });

    it('should fail when the configured pricing file is missing', () => {
      writeFileSync(join(tempDir, 'config.toml'), `[pricing]\nfile = "${join(tempDir, 'nope.json')}"\n`);

      expect(() => resolveRunContext({})).toThrow(PricingLoadError);
    });

    it('should switch to debug logging with --verbose', () => {
      resolveRunContext({ verbose: true });

      expect(getLogLevel()).toBe('debug');
    });
  });
});
