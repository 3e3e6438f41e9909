import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { getDefaultConfig, isStorageBackend, loadConfig, parseConfig } from '../../src/lib/config.js';
import { ConfigError } from '../../src/lib/errors.js';
import { configFixture } from '../fixtures/index.js';

describe('config', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'tokentally-config-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('should return default configuration', () => {
      const config = getDefaultConfig();

      expect(config.storage.backend).toBe('json');
      expect(config.pricing.file).toBe('');
      expect(config.parse.concurrency).toBe(0);
      expect(config.watch.interval_ms).toBe(2000);
    });

    it('should return a fresh copy each time', () => {
      const config = getDefaultConfig();
      config.storage.backend = 'sqlite';

      expect(getDefaultConfig().storage.backend).toBe('json');
    });
  });

  describe('parseConfig', () => {
    it('should read every section of a full config file', () => {
      const config = parseConfig(configFixture, 'fixture.toml');

      expect(config).toEqual({
        storage: { backend: 'sqlite' },
        pricing: { file: '/tmp/tokentally-test-pricing.json' },
        parse: { concurrency: 4 },
        watch: { interval_ms: 2000 },
      });
    });

    it('should fill missing keys from defaults', () => {
      const config = parseConfig('[watch]\ninterval_ms = 500\n', 'partial.toml');

      expect(config.watch.interval_ms).toBe(500);
      expect(config.storage.backend).toBe('json');
    });

    it('should reject an unknown backend', () => {
      expect(() => parseConfig('[storage]\nbackend = "redis"\n', 'bad.toml')).toThrow(ConfigError);
    });

    it('should reject a negative concurrency', () => {
      expect(() => parseConfig('[parse]\nconcurrency = -1\n', 'bad.toml')).toThrow(/parse.concurrency/);
    });

    it('should reject invalid TOML', () => {
      expect(() => parseConfig('[storage\nbackend =', 'broken.toml')).toThrow(ConfigError);
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when the file does not exist', () => {
      const config = loadConfig({ TOKENTALLY_CONFIG: join(tempDir, 'missing.toml') });

      expect(config).toEqual(getDefaultConfig());
    });

    it('should load the file named by TOKENTALLY_CONFIG', () => {
      const file = join(tempDir, 'config.toml');
      writeFileSync(file, '[storage]\nbackend = "sqlite"\n');

      expect(loadConfig({ TOKENTALLY_CONFIG: file }).storage.backend).toBe('sqlite');
    });

    it('should look under XDG_CONFIG_HOME by default', () => {
      mkdirSync(join(tempDir, 'tokentally'));
      writeFileSync(join(tempDir, 'tokentally', 'config.toml'), '[parse]\nconcurrency = 2\n');

      expect(loadConfig({ XDG_CONFIG_HOME: tempDir, HOME: '/nonexistent' }).parse.concurrency).toBe(2);
    });
  });

  describe('isStorageBackend', () => {
    it('should accept only known backends', () => {
      expect(isStorageBackend('json')).toBe(true);
      expect(isStorageBackend('sqlite')).toBe(true);
      expect(isStorageBackend('bitcode')).toBe(false);
    });
  });
});
