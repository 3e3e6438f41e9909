import { dailyKey } from './aggregate.js';
import type { UsageRecord } from './types.js';

export interface RecordFilters {
  /** First day included, "YYYY-MM-DD" (UTC) */
  from?: string;

  /** Last day included, "YYYY-MM-DD" (UTC) */
  to?: string;

  /** Case-insensitive substring of the project name */
  project?: string;

  /** Case-insensitive provider name */
  tool?: string;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True for a real calendar date written as YYYY-MM-DD
 */
export function isDateArg(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export function filterRecords(records: UsageRecord[], filters: RecordFilters): UsageRecord[] {
  const project = filters.project?.toLowerCase();
  const tool = filters.tool?.toLowerCase();

  return records.filter((record) => {
    if (filters.from || filters.to) {
      const day = dailyKey(record);
      if (filters.from && day < filters.from) return false;
      if (filters.to && day > filters.to) return false;
    }
    if (project && !record.project.toLowerCase().includes(project)) return false;
    if (tool && record.provider.toLowerCase() !== tool) return false;
    return true;
  });
}
