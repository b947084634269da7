import type { IAccountRepository } from "../account/account-repository.js";
import type { Account, DebitOutcome } from "../account/repository-types.js";
import type { GatewayRejection } from "./types.js";

export type QuotaVerdict = { admitted: true; account: Account } | { admitted: false; rejection: GatewayRejection };

export interface QuotaEnforcerOptions {
  billingPeriodMs: number;
  upgradeUrl: string;
}

/** Tokens left this period; never negative. */
export function remainingQuota(account: Pick<Account, "tokensUsed" | "tokensIncluded">): number {
  return Math.max(0, account.tokensIncluded - account.tokensUsed);
}

/** Percent of the period's allowance used, capped at 100. */
export function quotaPercentage(account: Pick<Account, "tokensUsed" | "tokensIncluded">): number {
  if (account.tokensIncluded <= 0) return 100;
  return Math.min(100, (account.tokensUsed / account.tokensIncluded) * 100);
}

/**
 * Token quota per billing period.
 *
 * Admission is check-then-spend: a call is admitted while usage is below the
 * allowance, and its tokens are debited after it completes. Concurrent calls
 * admitted just under the ceiling can therefore overshoot it by at most one
 * call each.
 */
export class QuotaEnforcer {
  constructor(
    private readonly accounts: IAccountRepository,
    private readonly options: QuotaEnforcerOptions,
  ) {}

  /** Roll the billing period over if due, then check the allowance. */
  async admit(accountId: string, now: number): Promise<QuotaVerdict> {
    const account = await this.currentPeriod(accountId, now);
    if (!account) return { admitted: false, rejection: { kind: "auth_denied", reason: "invalid_api_key" } };
    if (!account.active) return { admitted: false, rejection: { kind: "auth_denied", reason: "account_inactive" } };

    if (account.tokensUsed >= account.tokensIncluded) {
      return {
        admitted: false,
        rejection: {
          kind: "quota_exceeded",
          tokensUsed: account.tokensUsed,
          tokensIncluded: account.tokensIncluded,
          upgradeUrl: this.options.upgradeUrl,
        },
      };
    }
    return { admitted: true, account };
  }

  /** The account as of `now`, with the billing period rolled over if due. Null if unknown. */
  async currentPeriod(accountId: string, now: number): Promise<Account | null> {
    return this.accounts.rolloverIfDue(accountId, now, this.options.billingPeriodMs);
  }

  /** Add a completed call's tokens. Idempotent by request id. */
  async debit(accountId: string, tokens: number, requestId: string, now: number): Promise<DebitOutcome> {
    return this.accounts.debit(accountId, tokens, requestId, now);
  }
}
