/**
 * Tier-aware hourly rate limiting.
 *
 * One fixed-window counter per caller key. The threshold is looked up per
 * request from the caller's plan tier, so a plan change applies to the very
 * next request. Anonymous callers and tiers missing from the plan table get
 * the configured default.
 */

import type { IRateLimitRepository } from "../api/rate-limit-repository.js";
import type { IPlanPolicySource } from "../monetization/plans/plan-tiers.js";
import type { GatewayRejection, RateLimitInfo } from "./types.js";

export const CHAT_SCOPE = "chat";

/** Who is being counted. */
export interface CallerIdentity {
  /** `account:<id>` or `ip:<addr>` */
  key: string;
  /** Plan tier when the caller resolved to an active account. */
  tier: string | null;
}

export type RateLimitVerdict =
  | { admitted: true; info: RateLimitInfo }
  | { admitted: false; info: RateLimitInfo; rejection: GatewayRejection };

export interface TierRateLimiterOptions {
  defaultLimitPerHour: number;
  windowMs: number;
  scope?: string;
}

export function accountCallerKey(accountId: string): string {
  return `account:${accountId}`;
}

export function ipCallerKey(ip: string): string {
  return `ip:${ip}`;
}

export class TierRateLimiter {
  private readonly scope: string;

  constructor(
    private readonly repo: IRateLimitRepository,
    private readonly plans: IPlanPolicySource,
    private readonly options: TierRateLimiterOptions,
  ) {
    this.scope = options.scope ?? CHAT_SCOPE;
  }

  /** Hourly threshold for a tier; default for anonymous or unknown tiers. */
  async limitFor(tier: string | null): Promise<number> {
    if (tier === null) return this.options.defaultLimitPerHour;
    const plan = await this.plans.lookup(tier);
    return plan?.rateLimitPerHour ?? this.options.defaultLimitPerHour;
  }

  /** Count this request and decide whether it may proceed. */
  async check(caller: CallerIdentity, now: number): Promise<RateLimitVerdict> {
    const limit = await this.limitFor(caller.tier);
    const entry = await this.repo.increment(caller.key, this.scope, this.options.windowMs, now);
    const resetAt = entry.windowStart + this.options.windowMs;
    const info: RateLimitInfo = { limit, remaining: Math.max(0, limit - entry.count), resetAt };

    if (entry.count <= limit) return { admitted: true, info };

    return {
      admitted: false,
      info,
      rejection: {
        kind: "rate_limited",
        limit,
        retryAfterSeconds: Math.max(1, Math.ceil((resetAt - now) / 1000)),
        resetAt,
      },
    };
  }
}

/** X-RateLimit-* headers for a window snapshot. */
export function rateLimitHeaders(info: RateLimitInfo): Record<string, string> {
  return {
    "X-RateLimit-Limit": String(info.limit),
    "X-RateLimit-Remaining": String(info.remaining),
    "X-RateLimit-Reset": String(Math.ceil(info.resetAt / 1000)),
  };
}
