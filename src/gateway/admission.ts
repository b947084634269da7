/**
 * Admission pipeline for a chat request.
 *
 * An explicit, ordered list of checks. Each check sees the shared context,
 * may fill in what it learned, and either passes or returns a rejection.
 * The first rejection ends the pipeline.
 *
 *   identify → rate limit → authenticate → quota
 *
 * Rate limiting runs before the auth verdict so that a flood of bad keys is
 * throttled per client IP like any other anonymous traffic.
 */

import type { IAccountRepository } from "../account/account-repository.js";
import type { Account } from "../account/repository-types.js";
import type { QuotaEnforcer } from "./quota-enforcer.js";
import { accountCallerKey, ipCallerKey, type TierRateLimiter } from "./tier-rate-limit.js";
import type { GatewayRejection, RateLimitInfo } from "./types.js";

export interface AdmissionContext {
  /** API key as presented, or null when none was sent. */
  credential: string | null;
  clientIp: string;
  now: number;
  /** Set by `identify`; replaced by the post-rollover snapshot in `quota`. */
  account: Account | null;
  /** Set by `rate-limit`. */
  rateLimit: RateLimitInfo | null;
}

export type CheckResult = { pass: true } | { pass: false; rejection: GatewayRejection };

export interface AdmissionCheck {
  readonly name: string;
  run(ctx: AdmissionContext): Promise<CheckResult>;
}

export type AdmissionResult =
  | { admitted: true; account: Account; rateLimit: RateLimitInfo | null }
  | { admitted: false; rejection: GatewayRejection; rateLimit: RateLimitInfo | null; failedCheck: string };

export interface AdmissionDeps {
  accounts: IAccountRepository;
  rateLimiter: TierRateLimiter;
  quota: QuotaEnforcer;
}

const PASS: CheckResult = { pass: true };

function deny(rejection: GatewayRejection): CheckResult {
  return { pass: false, rejection };
}

/** The standard pipeline, in order. */
export function createAdmissionPipeline(deps: AdmissionDeps): AdmissionCheck[] {
  return [
    {
      name: "identify",
      async run(ctx) {
        ctx.account = ctx.credential ? await deps.accounts.findByApiKey(ctx.credential) : null;
        return PASS;
      },
    },
    {
      name: "rate-limit",
      async run(ctx) {
        const caller =
          ctx.account?.active === true
            ? { key: accountCallerKey(ctx.account.id), tier: ctx.account.tier }
            : { key: ipCallerKey(ctx.clientIp), tier: null };
        const verdict = await deps.rateLimiter.check(caller, ctx.now);
        ctx.rateLimit = verdict.info;
        return verdict.admitted ? PASS : deny(verdict.rejection);
      },
    },
    {
      name: "authenticate",
      async run(ctx) {
        if (!ctx.credential) return deny({ kind: "auth_denied", reason: "missing_api_key" });
        if (!ctx.account) return deny({ kind: "auth_denied", reason: "invalid_api_key" });
        if (!ctx.account.active) return deny({ kind: "auth_denied", reason: "account_inactive" });
        return PASS;
      },
    },
    {
      name: "quota",
      async run(ctx) {
        if (!ctx.account) return deny({ kind: "auth_denied", reason: "invalid_api_key" });
        const verdict = await deps.quota.admit(ctx.account.id, ctx.now);
        if (!verdict.admitted) return deny(verdict.rejection);
        ctx.account = verdict.account;
        return PASS;
      },
    },
  ];
}

/** Run checks in order; stop at the first rejection. */
export async function runAdmission(checks: readonly AdmissionCheck[], ctx: AdmissionContext): Promise<AdmissionResult> {
  for (const check of checks) {
    const result = await check.run(ctx);
    if (!result.pass) {
      return { admitted: false, rejection: result.rejection, rateLimit: ctx.rateLimit, failedCheck: check.name };
    }
  }
  if (!ctx.account) {
    return {
      admitted: false,
      rejection: { kind: "auth_denied", reason: "invalid_api_key" },
      rateLimit: ctx.rateLimit,
      failedCheck: "identify",
    };
  }
  return { admitted: true, account: ctx.account, rateLimit: ctx.rateLimit };
}
