/**
 * In-memory sliding-window metrics collector.
 *
 * Tracks counters in 1-minute buckets over a configurable window.
 * Surfaced on GET /health.
 */
export interface MetricsBucket {
  timestamp: number; // minute-aligned unix epoch ms
  gatewayRequests: number;
  accountingFailures: number;
  /** Per-kind rejection counts: { "quota_exceeded": 3 } */
  rejections: Record<string, number>;
  /** Per-provider call counts (live or fallback) */
  providerCalls: Record<string, number>;
  /** Per-provider fallback counts */
  fallbacks: Record<string, number>;
}

export interface MetricsWindow {
  totalRequests: number;
  totalRejections: number;
  rejectionRate: number;
  accountingFailures: number;
  rejectionsByKind: Record<string, number>;
  /** Percent of provider calls served by the fallback responder, per provider. */
  fallbackRates: Record<string, number>;
}

const BUCKET_DURATION_MS = 60_000; // 1 minute
const DEFAULT_WINDOW_MINUTES = 60; // keep 60 minutes of history

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export class MetricsCollector {
  private buckets: MetricsBucket[] = [];

  constructor(
    private readonly windowMinutes = DEFAULT_WINDOW_MINUTES,
    private readonly now: () => number = Date.now,
  ) {}

  private currentBucket(): MetricsBucket {
    const minute = Math.floor(this.now() / BUCKET_DURATION_MS) * BUCKET_DURATION_MS;
    const last = this.buckets[this.buckets.length - 1];
    if (last && last.timestamp === minute) return last;

    const bucket: MetricsBucket = {
      timestamp: minute,
      gatewayRequests: 0,
      accountingFailures: 0,
      rejections: {},
      providerCalls: {},
      fallbacks: {},
    };
    this.buckets.push(bucket);
    this.prune();
    return bucket;
  }

  private prune(): void {
    const cutoff = this.now() - this.windowMinutes * BUCKET_DURATION_MS;
    while (this.buckets.length > 0 && (this.buckets[0]?.timestamp ?? cutoff) < cutoff) {
      this.buckets.shift();
    }
  }

  recordGatewayRequest(): void {
    this.currentBucket().gatewayRequests++;
  }

  recordRejection(kind: string): void {
    increment(this.currentBucket().rejections, kind);
  }

  recordProviderCall(provider: string): void {
    increment(this.currentBucket().providerCalls, provider);
  }

  recordFallback(provider: string): void {
    increment(this.currentBucket().fallbacks, provider);
  }

  recordAccountingFailure(): void {
    this.currentBucket().accountingFailures++;
  }

  /**
   * Get aggregate stats over the last N minutes.
   */
  getWindow(minutes: number): MetricsWindow {
    const cutoff = this.now() - minutes * BUCKET_DURATION_MS;
    const window = this.buckets.filter((b) => b.timestamp >= cutoff);

    let totalRequests = 0;
    let accountingFailures = 0;
    const rejectionsByKind: Record<string, number> = {};
    const calls: Record<string, number> = {};
    const fallbacks: Record<string, number> = {};

    for (const b of window) {
      totalRequests += b.gatewayRequests;
      accountingFailures += b.accountingFailures;
      for (const [kind, count] of Object.entries(b.rejections)) {
        rejectionsByKind[kind] = (rejectionsByKind[kind] ?? 0) + count;
      }
      for (const [provider, count] of Object.entries(b.providerCalls)) {
        calls[provider] = (calls[provider] ?? 0) + count;
      }
      for (const [provider, count] of Object.entries(b.fallbacks)) {
        fallbacks[provider] = (fallbacks[provider] ?? 0) + count;
      }
    }

    const totalRejections = Object.values(rejectionsByKind).reduce((sum, n) => sum + n, 0);
    const fallbackRates: Record<string, number> = {};
    for (const [provider, count] of Object.entries(fallbacks)) {
      const total = calls[provider] ?? 0;
      fallbackRates[provider] = total > 0 ? (count / total) * 100 : 0;
    }

    return {
      totalRequests,
      totalRejections,
      rejectionRate: totalRequests > 0 ? (totalRejections / totalRequests) * 100 : 0,
      accountingFailures,
      rejectionsByKind,
      fallbackRates,
    };
  }

  /** Raw buckets for dashboard display. */
  getBuckets(): readonly MetricsBucket[] {
    this.prune();
    return this.buckets;
  }
}
