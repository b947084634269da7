import type { Credit } from "../credit.js";

/** One completed call, as recorded. Immutable once written. */
export interface UsageRecord {
  requestId: string;
  accountId: string;
  provider: string;
  model: string;
  tokens: number;
  cost: Credit;
  /** Surface that served the call, e.g. "/api/chat". */
  endpoint: string;
  latencyMs: number;
  /** Epoch ms */
  timestamp: number;
  fallback: boolean;
}

export interface DailyAggregate {
  /** YYYY-MM-DD (UTC) */
  date: string;
  accountId: string;
  requestCount: number;
  totalTokens: number;
  totalCost: Credit;
  avgLatencyMs: number;
}

export interface ModelUsage {
  provider: string;
  model: string;
  requestCount: number;
  totalTokens: number;
  totalCost: Credit;
}

export interface IUsageRepository {
  /**
   * Append a record and fold it into the daily aggregate, atomically.
   * Idempotent by requestId: returns false (and changes nothing) when the
   * request was already recorded.
   */
  record(usage: UsageRecord): Promise<boolean>;
  /** Aggregates for the last `days` UTC days (including today), newest first. */
  dailyAggregates(accountId: string, days?: number, now?: number): Promise<DailyAggregate[]>;
  /** Totals per provider/model over the same window as dailyAggregates, most tokens first. */
  modelBreakdown(accountId: string, days?: number, now?: number): Promise<ModelUsage[]>;
  /** Most recent records, newest first. */
  recentUsage(accountId: string, limit?: number): Promise<UsageRecord[]>;
}

/** UTC calendar day of an epoch-ms timestamp. */
export function usageDate(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}
