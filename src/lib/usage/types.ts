/**
 * Usage Record Types
 *
 * Canonical shapes shared by every provider, storage backend and report.
 */

/**
 * One normalized usage event (usually one assistant response)
 */
export interface UsageRecord {
  /** Provider that produced the record (e.g., "claude", "codex") */
  provider: string;

  sessionId: string;

  /** Event time in UTC */
  timestamp: Date;

  project: string;

  /** Full model id as written by the tool (e.g., "claude-sonnet-4-5-20250929") */
  model: string;

  /** Message id; may be empty or synthesized for tools without stable ids */
  messageId: string;

  /** Request id; empty for most tools other than Claude Code */
  requestId: string;

  inputTokens: number;
  outputTokens: number;
  cacheCreationInputTokens: number;
  cacheReadInputTokens: number;
}

/**
 * Fields a parser must supply; token counts and ids default when omitted
 */
export type UsageRecordInit = Pick<UsageRecord, 'provider' | 'sessionId' | 'timestamp' | 'project' | 'model'> &
  Partial<Omit<UsageRecord, 'provider' | 'sessionId' | 'timestamp' | 'project' | 'model'>>;

export function createUsageRecord(init: UsageRecordInit): UsageRecord {
  return {
    provider: init.provider,
    sessionId: init.sessionId,
    timestamp: init.timestamp,
    project: init.project,
    model: init.model,
    messageId: init.messageId ?? '',
    requestId: init.requestId ?? '',
    inputTokens: init.inputTokens ?? 0,
    outputTokens: init.outputTokens ?? 0,
    cacheCreationInputTokens: init.cacheCreationInputTokens ?? 0,
    cacheReadInputTokens: init.cacheReadInputTokens ?? 0,
  };
}

/**
 * File identity proxy: modification time (whole seconds) and byte size
 */
export interface Fingerprint {
  mtime: number;
  size: number;
}

/**
 * Accumulated cost. `undefined` means "no contributing record had pricing",
 * which is different from a known cost of zero.
 */
export type Cost = number | undefined;

/**
 * Merge a record or bucket cost into an accumulator.
 *
 * undefined + undefined = undefined, undefined + v = v, a + b = a + b.
 */
export function mergeCost(target: Cost, source: Cost): Cost {
  if (source === undefined) return target;
  if (target === undefined) return source;
  return target + source;
}

export interface TokenTotals {
  inputTokens: number;
  outputTokens: number;
  cacheCreationInputTokens: number;
  cacheReadInputTokens: number;
  cost: Cost;
}

/**
 * Totals for a single model inside a bucket
 */
export interface ModelBucketDetail extends TokenTotals {
  model: string;
}

/**
 * Totals for one bucket key (a day, a month, a session, a model)
 */
export interface AggregatedBucket extends TokenTotals {
  /** Short model names, ordered by descending per-model cost */
  models: string[];

  /** Distinct project names seen in this bucket */
  projects: string[];

  /** Distinct provider names seen in this bucket */
  tools: string[];

  /** Per-model totals, ordered like `models` */
  details: ModelBucketDetail[];
}

export function emptyTotals(): TokenTotals {
  return {
    inputTokens: 0,
    outputTokens: 0,
    cacheCreationInputTokens: 0,
    cacheReadInputTokens: 0,
    cost: undefined,
  };
}

/**
 * Add token counts and cost into `target` in place
 */
export function accumulate(
  target: TokenTotals,
  source: Pick<TokenTotals, 'inputTokens' | 'outputTokens' | 'cacheCreationInputTokens' | 'cacheReadInputTokens'>,
  cost: Cost
): void {
  target.inputTokens += source.inputTokens;
  target.outputTokens += source.outputTokens;
  target.cacheCreationInputTokens += source.cacheCreationInputTokens;
  target.cacheReadInputTokens += source.cacheReadInputTokens;
  target.cost = mergeCost(target.cost, cost);
}
