import { describe, it, expect } from 'vitest';
import { accumulate, createUsageRecord, emptyTotals, mergeCost } from '../../../src/lib/usage/types.js';

describe('usage types', () => {
  describe('createUsageRecord', () => {
    it('should default ids to empty strings and token counts to zero', () => {
      const record = createUsageRecord({
        provider: 'codex',
        sessionId: 's1',
        timestamp: new Date('2025-09-30T00:00:00Z'),
        project: 'demo',
        model: 'gpt-5',
      });

      expect(record.messageId).toBe('');
      expect(record.requestId).toBe('');
      expect(record.inputTokens).toBe(0);
      expect(record.outputTokens).toBe(0);
      expect(record.cacheCreationInputTokens).toBe(0);
      expect(record.cacheReadInputTokens).toBe(0);
    });
  });

  describe('mergeCost', () => {
    it('should keep undefined when both sides are unknown', () => {
      expect(mergeCost(undefined, undefined)).toBeUndefined();
    });

    it('should treat an unknown side as absent rather than zero', () => {
      expect(mergeCost(undefined, 2.5)).toBe(2.5);
      expect(mergeCost(2.5, undefined)).toBe(2.5);
    });

    it('should add two known costs', () => {
      expect(mergeCost(1.25, 2.5)).toBe(3.75);
    });

    it('should keep a known zero distinct from unknown', () => {
      expect(mergeCost(undefined, 0)).toBe(0);
    });
  });

  describe('accumulate', () => {
    it('should add token counts and merge cost in place', () => {
      const totals = emptyTotals();
      accumulate(totals, { inputTokens: 10, outputTokens: 5, cacheCreationInputTokens: 2, cacheReadInputTokens: 1 }, undefined);
      accumulate(totals, { inputTokens: 1, outputTokens: 1, cacheCreationInputTokens: 1, cacheReadInputTokens: 1 }, 0.5);

      expect(totals).toEqual({
        inputTokens: 11,
        outputTokens: 6,
        cacheCreationInputTokens: 3,
        cacheReadInputTokens: 2,
        cost: 0.5,
      });
    });
  });
});
