import { describe, it, expect } from 'vitest';
import {
  aggregate,
  dailyKey,
  modelKey,
  monthlyKey,
  sessionKey,
  shortModelName,
  totals,
} from '../../../src/lib/usage/aggregate.js';
import { StaticPricing, unpricedModels } from '../../../src/lib/pricing/index.js';
import { createMockRecord } from '../../fixtures/index.js';

const pricing = new StaticPricing({
  m1: { inputCostPerToken: 1e-6, outputCostPerToken: 0 },
  m3: { inputCostPerToken: 2e-6, outputCostPerToken: 0 },
});

describe('aggregate', () => {
  describe('bucket keys', () => {
    const record = createMockRecord({
      timestamp: new Date('2025-01-05T23:30:00Z'),
      project: 'web',
      sessionId: 'abc',
      model: 'gpt-5',
    });

    it('should derive UTC day and month keys', () => {
      expect(dailyKey(record)).toBe('2025-01-05');
      expect(monthlyKey(record)).toBe('2025-01');
    });

    it('should join project and session for session keys', () => {
      expect(sessionKey(record)).toBe('web | abc');
    });

    it('should use the full model id for model keys', () => {
      expect(modelKey(record)).toBe('gpt-5');
    });
  });

  describe('shortModelName', () => {
    it('should drop the claude- prefix', () => {
      expect(shortModelName('claude-opus-4-6')).toBe('opus-4-6');
    });

    it('should drop a hyphenated 8-digit date suffix', () => {
      expect(shortModelName('claude-sonnet-4-5-20250929')).toBe('sonnet-4-5');
    });

    it('should keep a date suffix that is not hyphen-preceded', () => {
      expect(shortModelName('model20250929')).toBe('model20250929');
    });

    it('should leave other model ids unchanged', () => {
      expect(shortModelName('gpt-5')).toBe('gpt-5');
      expect(shortModelName('gemini-2.5-pro')).toBe('gemini-2.5-pro');
    });
  });

  it('should sum priced cost and ignore unpriced models when pricing a bucket', () => {
    const records = [
      createMockRecord({ model: 'm1', messageId: 'a', inputTokens: 1_000_000 }),
      createMockRecord({ model: 'm2', messageId: 'b', inputTokens: 500_000 }),
    ];

    const buckets = aggregate(records, dailyKey, pricing);
    const bucket = buckets.get('2025-09-30');

    expect(bucket?.cost).toBeCloseTo(1.0, 10);
    expect(bucket?.inputTokens).toBe(1_500_000);
    expect(unpricedModels(pricing, records)).toEqual(['m2']);
  });

  it('should leave cost undefined when no record in a bucket is priced', () => {
    const buckets = aggregate([createMockRecord({ model: 'm2' })], dailyKey, pricing);

    expect(buckets.get('2025-09-30')?.cost).toBeUndefined();
  });

  it('should iterate bucket keys in lexicographic order', () => {
    const records = [
      createMockRecord({ timestamp: new Date('2025-10-02T00:00:00Z') }),
      createMockRecord({ timestamp: new Date('2025-09-30T00:00:00Z') }),
      createMockRecord({ timestamp: new Date('2025-10-01T00:00:00Z') }),
    ];

    const buckets = aggregate(records, dailyKey, pricing);

    expect([...buckets.keys()]).toEqual(['2025-09-30', '2025-10-01', '2025-10-02']);
  });

  it('should order details by descending cost with unpriced models last', () => {
    const records = [
      createMockRecord({ model: 'unpriced-model', inputTokens: 1 }),
      createMockRecord({ model: 'm1', inputTokens: 1_000_000 }),
      createMockRecord({ model: 'm3', inputTokens: 1_000_000 }),
    ];

    const bucket = aggregate(records, dailyKey, pricing).get('2025-09-30');

    expect(bucket?.details.map((detail) => detail.model)).toEqual(['m3', 'm1', 'unpriced-model']);
    expect(bucket?.models).toEqual(['m3', 'm1', 'unpriced-model']);
  });

  it('should break detail ties by model id', () => {
    const records = [createMockRecord({ model: 'zeta' }), createMockRecord({ model: 'alpha' })];

    const bucket = aggregate(records, dailyKey, pricing).get('2025-09-30');

    expect(bucket?.details.map((detail) => detail.model)).toEqual(['alpha', 'zeta']);
  });

  it('should shorten model names but keep full ids in details', () => {
    const records = [createMockRecord({ model: 'claude-sonnet-4-5-20250929' })];

    const bucket = aggregate(records, dailyKey, pricing).get('2025-09-30');

    expect(bucket?.models).toEqual(['sonnet-4-5']);
    expect(bucket?.details[0].model).toBe('claude-sonnet-4-5-20250929');
  });

  it('should collect sorted distinct projects and tools', () => {
    const records = [
      createMockRecord({ provider: 'codex', project: 'web' }),
      createMockRecord({ provider: 'claude', project: 'api' }),
      createMockRecord({ provider: 'codex', project: 'api' }),
    ];

    const bucket = aggregate(records, dailyKey, pricing).get('2025-09-30');

    expect(bucket?.projects).toEqual(['api', 'web']);
    expect(bucket?.tools).toEqual(['claude', 'codex']);
  });

  it('should produce identical buckets for any input order', () => {
    const records = [
      createMockRecord({ model: 'm1', inputTokens: 10, timestamp: new Date('2025-09-29T10:00:00Z') }),
      createMockRecord({ model: 'm3', inputTokens: 20, project: 'other' }),
      createMockRecord({ model: 'm2', outputTokens: 30, provider: 'pi' }),
    ];

    const forward = aggregate(records, dailyKey, pricing);
    const reversed = aggregate([...records].reverse(), dailyKey, pricing);

    expect([...reversed.entries()]).toEqual([...forward.entries()]);
  });

  it('should add bucket totals for the report total row', () => {
    const records = [
      createMockRecord({ model: 'm1', inputTokens: 1_000_000, timestamp: new Date('2025-09-29T00:00:00Z') }),
      createMockRecord({ model: 'm2', inputTokens: 5, outputTokens: 7 }),
    ];

    const sum = totals(aggregate(records, dailyKey, pricing).values());

    expect(sum.inputTokens).toBe(1_000_005);
    expect(sum.outputTokens).toBe(7);
    expect(sum.cost).toBeCloseTo(1.0, 10);
  });
});
