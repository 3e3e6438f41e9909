import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, symlinkSync, mkdirSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { computeProviderRoots, discoverFiles, fingerprintFile } from '../../../src/lib/providers/discovery.js';
import { setMtime, writeFixture } from '../../fixtures/index.js';

describe('discovery', () => {
  describe('computeProviderRoots', () => {
    const spec = {
      envVar: 'TOOL_HOME',
      envSubpaths: ['sessions'],
      fallbacks: [
        { base: 'home' as const, subpaths: ['.tool', 'sessions'] },
        { base: 'config' as const, subpaths: ['tool', 'sessions'] },
      ],
    };

    it('should use the override alone when set', () => {
      expect(computeProviderRoots(spec, { TOOL_HOME: '/opt/tool', HOME: '/home/u' })).toEqual([
        join('/opt/tool', 'sessions'),
      ]);
    });

    it('should use the override as-is without subpaths', () => {
      expect(computeProviderRoots({ envVar: 'TOOL_HOME', fallbacks: [] }, { TOOL_HOME: '/opt/tool' })).toEqual([
        '/opt/tool',
      ]);
    });

    it('should fall back to home and XDG locations in order', () => {
      expect(computeProviderRoots(spec, { HOME: '/home/u', XDG_CONFIG_HOME: '/xdg' })).toEqual([
        join('/home/u', '.tool', 'sessions'),
        join('/xdg', 'tool', 'sessions'),
      ]);
    });

    it('should default XDG bases under the home directory', () => {
      expect(computeProviderRoots(spec, { HOME: '/home/u' })).toEqual([
        join('/home/u', '.tool', 'sessions'),
        join('/home/u', '.config', 'tool', 'sessions'),
      ]);
    });

    it('should return no roots without a home directory', () => {
      expect(computeProviderRoots(spec, {})).toEqual([]);
    });
  });

  describe('files', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'tokentally-discovery-test-'));
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    it('should fingerprint with whole-second mtime and byte size', async () => {
      const path = writeFixture(tempDir, 'a.jsonl', 'hello');
      setMtime(path, 1_700_000_000);

      expect(await fingerprintFile(path)).toEqual({ path, mtime: 1_700_000_000, size: 5 });
    });

    it('should not fingerprint directories or missing paths', async () => {
      expect(await fingerprintFile(tempDir)).toBeNull();
      expect(await fingerprintFile(join(tempDir, 'missing'))).toBeNull();
    });

    it('should list matching files recursively in sorted order', async () => {
      writeFixture(tempDir, 'b/2.jsonl', '{}');
      writeFixture(tempDir, 'a/1.jsonl', '{}');
      writeFixture(tempDir, 'a/notes.txt', '');
      writeFixture(tempDir, 'a/deep/3.jsonl', '{}');

      const files = await discoverFiles([tempDir], '.jsonl');

      expect(files.map((file) => file.path)).toEqual([
        join(tempDir, 'a', '1.jsonl'),
        join(tempDir, 'a', 'deep', '3.jsonl'),
        join(tempDir, 'b', '2.jsonl'),
      ]);
    });

    it('should require a name before the suffix', async () => {
      writeFixture(tempDir, '.settings.json', '{}');
      writeFixture(tempDir, 's1.settings.json', '{}');

      const files = await discoverFiles([tempDir], '.settings.json');

      expect(files.map((file) => file.path)).toEqual([join(tempDir, 's1.settings.json')]);
    });

    it('should skip missing roots', async () => {
      writeFixture(tempDir, 'x.jsonl', '{}');

      const files = await discoverFiles([join(tempDir, 'nope'), tempDir], '.jsonl');

      expect(files).toHaveLength(1);
    });

    it('should not follow symbolic links', async () => {
      const outside = mkdtempSync(join(tmpdir(), 'tokentally-discovery-outside-'));
      try {
        writeFixture(outside, 'linked.jsonl', '{}');
        mkdirSync(join(tempDir, 'root'));
        symlinkSync(outside, join(tempDir, 'root', 'dir-link'));
        symlinkSync(join(outside, 'linked.jsonl'), join(tempDir, 'root', 'file-link.jsonl'));

        expect(await discoverFiles([join(tempDir, 'root')], '.jsonl')).toEqual([]);
      } finally {
        rmSync(outside, { recursive: true, force: true });
      }
    });
  });
});
