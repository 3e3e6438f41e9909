import { describe, it, expect } from 'vitest';
import { filterRecords, isDateArg } from '../../../src/lib/usage/filters.js';
import { createMockRecord } from '../../fixtures/index.js';

describe('filters', () => {
  describe('isDateArg', () => {
    it('should accept real calendar dates', () => {
      expect(isDateArg('2025-09-30')).toBe(true);
      expect(isDateArg('2024-02-29')).toBe(true);
    });

    it('should reject malformed or impossible dates', () => {
      expect(isDateArg('2025-9-30')).toBe(false);
      expect(isDateArg('2025-02-30')).toBe(false);
      expect(isDateArg('2025-13-01')).toBe(false);
      expect(isDateArg('yesterday')).toBe(false);
    });
  });

  describe('filterRecords', () => {
    const records = [
      createMockRecord({ messageId: 'a', timestamp: new Date('2025-09-29T23:59:59Z'), project: 'WebApp', provider: 'claude' }),
      createMockRecord({ messageId: 'b', timestamp: new Date('2025-09-30T00:00:00Z'), project: 'api', provider: 'codex' }),
      createMockRecord({ messageId: 'c', timestamp: new Date('2025-10-01T12:00:00Z'), project: 'webapp-v2', provider: 'pi' }),
    ];

    const ids = (list: typeof records): string[] => list.map((record) => record.messageId);

    it('should return everything without filters', () => {
      expect(ids(filterRecords(records, {}))).toEqual(['a', 'b', 'c']);
    });

    it('should include both date bounds', () => {
      expect(ids(filterRecords(records, { from: '2025-09-30', to: '2025-10-01' }))).toEqual(['b', 'c']);
      expect(ids(filterRecords(records, { from: '2025-09-29', to: '2025-09-29' }))).toEqual(['a']);
    });

    it('should match projects by case-insensitive substring', () => {
      expect(ids(filterRecords(records, { project: 'webapp' }))).toEqual(['a', 'c']);
    });

    it('should match tools case-insensitively and exactly', () => {
      expect(ids(filterRecords(records, { tool: 'CODEX' }))).toEqual(['b']);
      expect(ids(filterRecords(records, { tool: 'cod' }))).toEqual([]);
    });
  });
});
