/**
 * Composition root for the gateway: repositories, enforcers, provider
 * gateway, bookkeeper and kernel, wired from one config.
 */

import { DrizzleAccountRepository, type IAccountRepository } from "../account/account-repository.js";
import { DAY_MS } from "../account/provision.js";
import { DrizzleRateLimitRepository } from "../api/drizzle-rate-limit-repository.js";
import type { IRateLimitRepository } from "../api/rate-limit-repository.js";
import type { Config } from "../config/index.js";
import type { DrizzleDb } from "../db/index.js";
import { AccountingDLQ } from "../monetization/metering/dlq.js";
import { DrizzleUsageRepository } from "../monetization/metering/drizzle-usage-repository.js";
import type { IUsageRepository } from "../monetization/metering/usage-repository.js";
import { DrizzlePlanTierRepository } from "../monetization/plans/drizzle-plan-tier-repository.js";
import { MetricsCollector } from "../observability/metrics.js";
import { createAdmissionPipeline } from "./admission.js";
import { Bookkeeper } from "./bookkeeper.js";
import { GatewayKernel } from "./kernel.js";
import type { ProviderName } from "./provider-router.js";
import { createAnthropicAdapter } from "./providers/anthropic.js";
import { createOpenAIAdapter } from "./providers/openai.js";
import { ProviderGateway } from "./providers/provider-gateway.js";
import type { FetchFn, ProviderAdapter } from "./providers/types.js";
import { QuotaEnforcer } from "./quota-enforcer.js";
import { TierRateLimiter } from "./tier-rate-limit.js";

export type GatewayServicesConfig = Pick<Config, "providers" | "gateway" | "accounting">;

export interface GatewayServicesOverrides {
  fetchFn?: FetchFn;
  metrics?: MetricsCollector;
  clock?: () => number;
  /** Backoff sleep between accounting retries. */
  sleep?: (ms: number) => Promise<void>;
}

export interface GatewayServices {
  accounts: IAccountRepository;
  plans: DrizzlePlanTierRepository;
  usage: IUsageRepository;
  quota: QuotaEnforcer;
  rateLimitRepo: IRateLimitRepository;
  rateLimiter: TierRateLimiter;
  providers: ProviderGateway;
  dlq: AccountingDLQ;
  bookkeeper: Bookkeeper;
  metrics: MetricsCollector;
  kernel: GatewayKernel;
  billingPeriodMs: number;
}

export function createGatewayServices(
  db: DrizzleDb,
  cfg: GatewayServicesConfig,
  overrides: GatewayServicesOverrides = {},
): GatewayServices {
  const metrics = overrides.metrics ?? new MetricsCollector();
  const billingPeriodMs = cfg.gateway.billingPeriodDays * DAY_MS;

  const accounts = new DrizzleAccountRepository(db);
  const plans = new DrizzlePlanTierRepository(db);
  const usage = new DrizzleUsageRepository(db);

  const quota = new QuotaEnforcer(accounts, { billingPeriodMs, upgradeUrl: cfg.gateway.upgradeUrl });
  const rateLimitRepo = new DrizzleRateLimitRepository(db);
  const rateLimiter = new TierRateLimiter(rateLimitRepo, plans, {
    defaultLimitPerHour: cfg.gateway.defaultRateLimitPerHour,
    windowMs: cfg.gateway.rateLimitWindowMs,
  });

  const fetchFn = overrides.fetchFn ?? fetch;
  const adapters: Record<ProviderName, ProviderAdapter> = {
    openai: createOpenAIAdapter(cfg.providers.openai, fetchFn),
    anthropic: createAnthropicAdapter(cfg.providers.anthropic, fetchFn),
  };
  const providers = new ProviderGateway(adapters, {
    timeoutMs: cfg.gateway.upstreamTimeoutMs,
    maxOutputTokens: cfg.gateway.maxOutputTokens,
    metrics,
  });

  const dlq = new AccountingDLQ(cfg.accounting.dlqPath);
  const bookkeeper = new Bookkeeper(quota, usage, dlq, {
    maxRetries: cfg.accounting.maxRetries,
    retryDelayMs: cfg.accounting.retryDelayMs,
    metrics,
    sleep: overrides.sleep,
  });

  const kernel = new GatewayKernel({
    accounts,
    plans,
    admission: createAdmissionPipeline({ accounts, rateLimiter, quota }),
    quota,
    providers,
    bookkeeper,
    metrics,
    clock: overrides.clock,
  });

  return {
    accounts,
    plans,
    usage,
    quota,
    rateLimitRepo,
    rateLimiter,
    providers,
    dlq,
    bookkeeper,
    metrics,
    kernel,
    billingPeriodMs,
  };
}
