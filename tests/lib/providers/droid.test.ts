import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { DroidProvider, normalizeDroidModel, parseDroidFile } from '../../../src/lib/providers/droid.js';
import { JsonStorage } from '../../../src/lib/storage/json-store.js';
import { writeFixture } from '../../fixtures/index.js';

const settings = {
  model: 'custom:Claude-Opus-4.5-Thinking-[Anthropic]-7',
  providerLockTimestamp: '2025-09-30T07:00:00.000Z',
  tokenUsage: {
    inputTokens: 1000,
    outputTokens: 200,
    cacheCreationTokens: 30,
    cacheReadTokens: 40,
  },
};

describe('droid provider', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'tokentally-droid-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('normalizeDroidModel', () => {
    it('should strip the custom prefix and bracketed vendor', () => {
      expect(normalizeDroidModel('custom:Claude-Opus-4.5-Thinking-[Anthropic]-7')).toBe('claude-opus-4-5-thinking-7');
    });

    it('should lowercase plain model names', () => {
      expect(normalizeDroidModel('GPT-5')).toBe('gpt-5');
    });
  });

  it('should produce one record from cumulative session usage', async () => {
    const path = writeFixture(tempDir, 'sessions/proj/abc.settings.json', JSON.stringify(settings));

    const records = await parseDroidFile(path);

    expect(records).toEqual([
      {
        provider: 'droid',
        sessionId: 'abc',
        timestamp: new Date('2025-09-30T07:00:00.000Z'),
        project: 'droid',
        model: 'claude-opus-4-5-thinking-7',
        messageId: 'droid:abc:2025-09-30T07:00:00.000Z:1000:200',
        requestId: '',
        inputTokens: 1000,
        outputTokens: 200,
        cacheCreationInputTokens: 30,
        cacheReadInputTokens: 40,
      },
    ]);
  });

  it('should skip sessions without usage', async () => {
    const path = writeFixture(
      tempDir,
      'sessions/proj/empty.settings.json',
      JSON.stringify({ ...settings, tokenUsage: { inputTokens: 0, outputTokens: 0 } })
    );

    expect(await parseDroidFile(path)).toEqual([]);
  });

  it('should only scan settings files under FACTORY_HOME', async () => {
    writeFixture(tempDir, 'sessions/proj/abc.settings.json', JSON.stringify(settings));
    writeFixture(tempDir, 'sessions/proj/abc.jsonl', '{}\n');
    const storage = new JsonStorage(null);

    await new DroidProvider({ FACTORY_HOME: tempDir }).discoverAndParse(storage);

    expect(storage.drainAll().map((record) => record.sessionId)).toEqual(['abc']);
  });
});
