import type { DebitOutcome } from "../account/repository-types.js";
import { logger } from "../config/logger.js";
import { Credit } from "../monetization/credit.js";
import type { AccountingDLQ, AccountingEntry } from "../monetization/metering/dlq.js";
import type { IUsageRepository, UsageRecord } from "../monetization/metering/usage-repository.js";
import type { MetricsCollector } from "../observability/metrics.js";
import { captureError } from "../observability/sentry.js";
import type { QuotaEnforcer } from "./quota-enforcer.js";

export interface BookkeeperOptions {
  /** Retries after the first attempt, per write. */
  maxRetries: number;
  /** Linear backoff step: the nth retry waits n × retryDelayMs. */
  retryDelayMs: number;
  metrics?: MetricsCollector;
  sleep?: (ms: number) => Promise<void>;
}

export interface SettleOutcome {
  /** Null when the debit itself could not be written. */
  debit: DebitOutcome | null;
  /** True when this call appended the usage record. */
  recorded: boolean;
  /** True when the entry went to the dead-letter queue. */
  parked: boolean;
}

export interface ReplayResult {
  replayed: number;
  remaining: number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function toUsageRecord(entry: AccountingEntry): UsageRecord {
  return {
    requestId: entry.requestId,
    accountId: entry.accountId,
    provider: entry.provider,
    model: entry.model,
    tokens: entry.tokens,
    cost: Credit.fromRaw(entry.costRaw),
    endpoint: entry.endpoint,
    latencyMs: entry.latencyMs,
    timestamp: entry.timestamp,
    fallback: entry.fallback,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Writes the two records every completed call owes: the quota debit and the
 * usage record. Both writes are idempotent by request id, so retries and
 * dead-letter replays never double count. A failure never reaches the
 * caller; the entry is parked instead.
 */
export class Bookkeeper {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly quota: QuotaEnforcer,
    private readonly usage: IUsageRepository,
    private readonly dlq: AccountingDLQ,
    private readonly options: BookkeeperOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async settle(entry: AccountingEntry): Promise<SettleOutcome> {
    let debit: DebitOutcome | null = null;
    try {
      debit = await this.withRetry("debit", entry, () =>
        this.quota.debit(entry.accountId, entry.tokens, entry.requestId, entry.timestamp),
      );
      const recorded = await this.withRetry("usage record", entry, () => this.usage.record(toUsageRecord(entry)));
      return { debit, recorded, parked: false };
    } catch (err) {
      this.park(entry, err);
      return { debit, recorded: false, parked: true };
    }
  }

  /** Re-apply parked entries once each; entries that fail again stay parked. */
  async replayDeadLetters(): Promise<ReplayResult> {
    const parked = this.dlq.readAll();
    if (parked.length === 0) return { replayed: 0, remaining: 0 };

    const done = new Set<string>();
    for (const letter of parked) {
      try {
        await this.quota.debit(letter.accountId, letter.tokens, letter.requestId, letter.timestamp);
        await this.usage.record(toUsageRecord(letter));
        done.add(letter.requestId);
      } catch (err) {
        logger.warn("Dead-letter replay failed, entry stays parked", {
          requestId: letter.requestId,
          error: errorMessage(err),
        });
      }
    }

    this.dlq.remove(done);
    const result = { replayed: done.size, remaining: parked.length - done.size };
    logger.info("Accounting dead letters replayed", result);
    return result;
  }

  private async withRetry<T>(step: string, entry: AccountingEntry, fn: () => Promise<T>): Promise<T> {
    const attempts = this.options.maxRetries + 1;
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (err) {
        if (attempt >= attempts) throw err;
        logger.warn(`Accounting ${step} failed, retrying`, {
          requestId: entry.requestId,
          attempt,
          error: errorMessage(err),
        });
        await this.sleep(this.options.retryDelayMs * attempt);
      }
    }
  }

  private park(entry: AccountingEntry, err: unknown): void {
    const message = errorMessage(err);
    logger.error("AccountingFailure: bookkeeping parked in dead-letter queue", {
      requestId: entry.requestId,
      accountId: entry.accountId,
      tokens: entry.tokens,
      error: message,
    });
    captureError(err, { accountId: entry.accountId, requestId: entry.requestId, extra: { tokens: entry.tokens } });
    this.options.metrics?.recordAccountingFailure();

    try {
      this.dlq.append(entry, message, this.options.maxRetries);
    } catch (dlqErr) {
      // Last resort: the full entry goes to the log for manual recovery.
      logger.error("Failed to write accounting dead letter", { entry, error: errorMessage(dlqErr) });
      captureError(dlqErr, { accountId: entry.accountId, requestId: entry.requestId });
    }
  }
}
