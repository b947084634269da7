import { randomUUID } from "node:crypto";
import type { IAccountRepository } from "../account/account-repository.js";
import { UnknownPlanError } from "../account/provision.js";
import type { Account, PlanChange } from "../account/repository-types.js";
import { logger } from "../config/logger.js";
import type { IPlanPolicySource } from "../monetization/plans/plan-tiers.js";
import type { MetricsCollector } from "../observability/metrics.js";
import { type AdmissionCheck, runAdmission } from "./admission.js";
import type { Bookkeeper } from "./bookkeeper.js";
import { type RequestedProvider, selectProvider } from "./provider-router.js";
import type { ProviderGateway } from "./providers/provider-gateway.js";
import type { CompletionResult } from "./providers/types.js";
import { type QuotaEnforcer, quotaPercentage, remainingQuota } from "./quota-enforcer.js";
import type { ChatResponse, GatewayRejection, RateLimitInfo } from "./types.js";

export const CHAT_ENDPOINT = "/api/chat";

export interface ChatCall {
  /** API key as presented, or null. */
  credential: string | null;
  clientIp: string;
  prompt: string;
  model: string;
  provider: RequestedProvider;
  /** Usage record tag. Default: /api/chat */
  endpoint?: string;
  /** Idempotency key for the debit and the usage record. Default: a fresh UUID. */
  requestId?: string;
  /** Caller disconnect. Honored until the provider result is in hand. */
  signal?: AbortSignal;
}

export type ChatOutcome =
  | { status: "completed"; requestId: string; body: ChatResponse; rateLimit: RateLimitInfo | null }
  | { status: "rejected"; rejection: GatewayRejection; rateLimit: RateLimitInfo | null }
  | { status: "cancelled"; requestId: string };

export type AuthenticateResult = { ok: true; account: Account } | { ok: false; rejection: GatewayRejection };

export interface GatewayKernelDeps {
  accounts: IAccountRepository;
  plans: IPlanPolicySource;
  admission: readonly AdmissionCheck[];
  quota: QuotaEnforcer;
  providers: ProviderGateway;
  bookkeeper: Bookkeeper;
  metrics?: MetricsCollector;
  clock?: () => number;
}

/**
 * One chat request, end to end:
 * admission → route → provider call → debit + usage record → response.
 */
export class GatewayKernel {
  private readonly clock: () => number;

  constructor(private readonly deps: GatewayKernelDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async chat(call: ChatCall): Promise<ChatOutcome> {
    const requestId = call.requestId ?? randomUUID();
    const now = this.clock();
    this.deps.metrics?.recordGatewayRequest();

    const admission = await runAdmission(this.deps.admission, {
      credential: call.credential,
      clientIp: call.clientIp,
      now,
      account: null,
      rateLimit: null,
    });
    if (!admission.admitted) {
      this.deps.metrics?.recordRejection(admission.rejection.kind);
      logger.info("Chat request rejected", {
        requestId,
        kind: admission.rejection.kind,
        check: admission.failedCheck,
        clientIp: call.clientIp,
      });
      return { status: "rejected", rejection: admission.rejection, rateLimit: admission.rateLimit };
    }

    const account = admission.account;
    const route = selectProvider(call.model, call.provider);
    if (call.signal?.aborted) return this.cancelled(requestId, account.id);

    let result: CompletionResult;
    try {
      result = await this.deps.providers.complete(route, call.prompt, call.signal);
    } catch (err) {
      if (call.signal?.aborted) return this.cancelled(requestId, account.id);
      throw err;
    }
    if (call.signal?.aborted) return this.cancelled(requestId, account.id);

    // From here on the call is owed: bookkeeping completes even if the caller leaves.
    const settled = await this.deps.bookkeeper.settle({
      requestId,
      accountId: account.id,
      provider: result.provider,
      model: result.model,
      tokens: result.tokens,
      costRaw: result.cost.toRaw(),
      endpoint: call.endpoint ?? CHAT_ENDPOINT,
      latencyMs: result.latencyMs,
      timestamp: this.clock(),
      fallback: result.fallback,
    });

    const usage = settled.debit ?? {
      tokensUsed: account.tokensUsed + result.tokens,
      tokensIncluded: account.tokensIncluded,
    };

    logger.debug("Chat request completed", {
      requestId,
      accountId: account.id,
      provider: result.provider,
      model: result.model,
      tokens: result.tokens,
      fallback: result.fallback,
    });

    return {
      status: "completed",
      requestId,
      rateLimit: admission.rateLimit,
      body: {
        response: result.text,
        model_used: result.model,
        provider: result.provider,
        tokens_used: result.tokens,
        cost: result.cost.toDollars(),
        response_time: result.latencyMs / 1000,
        total_tokens_used: usage.tokensUsed,
        remaining_quota: remainingQuota(usage),
        quota_percentage: quotaPercentage(usage),
      },
    };
  }

  /** Resolve a credential for read-only endpoints (usage, quota status). */
  async authenticate(credential: string | null): Promise<AuthenticateResult> {
    if (!credential) return { ok: false, rejection: { kind: "auth_denied", reason: "missing_api_key" } };
    const account = await this.deps.accounts.findByApiKey(credential);
    if (!account) return { ok: false, rejection: { kind: "auth_denied", reason: "invalid_api_key" } };
    if (!account.active) return { ok: false, rejection: { kind: "auth_denied", reason: "account_inactive" } };
    return { ok: true, account };
  }

  /** Resolve a credential for the quota status view, rolling the billing period over if due. */
  async quotaStatus(credential: string | null): Promise<AuthenticateResult> {
    const auth = await this.authenticate(credential);
    if (!auth.ok) return auth;
    const account = await this.deps.quota.currentPeriod(auth.account.id, this.clock());
    if (!account) return { ok: false, rejection: { kind: "auth_denied", reason: "invalid_api_key" } };
    return { ok: true, account };
  }

  /**
   * Plan-change event from billing. `tokensIncluded` defaults to the new
   * tier's allowance. Returns null if the account does not exist.
   */
  async applyPlanChange(accountId: string, change: { tier: string; tokensIncluded?: number }): Promise<Account | null> {
    const plan = await this.deps.plans.lookup(change.tier);
    if (!plan) throw new UnknownPlanError(change.tier);
    const planChange: PlanChange = { tier: change.tier, tokensIncluded: change.tokensIncluded ?? plan.tokensPerPeriod };
    const account = await this.deps.accounts.applyPlanChange(accountId, planChange, this.clock());
    if (account) logger.info("Plan changed", { accountId, ...planChange });
    return account;
  }

  async deactivate(accountId: string): Promise<boolean> {
    const found = await this.deps.accounts.deactivate(accountId, this.clock());
    if (found) logger.info("Account deactivated", { accountId });
    return found;
  }

  private cancelled(requestId: string, accountId: string): ChatOutcome {
    logger.info("Chat request cancelled by caller before completion", { requestId, accountId });
    return { status: "cancelled", requestId };
  }
}
