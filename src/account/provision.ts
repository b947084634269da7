import { randomUUID } from "node:crypto";
import { logger } from "../config/logger.js";
import type { IPlanPolicySource } from "../monetization/plans/plan-tiers.js";
import type { IAccountRepository } from "./account-repository.js";
import { generateApiKey, hashApiKey } from "./api-key.js";
import type { Account } from "./repository-types.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

export interface ProvisionDeps {
  accounts: IAccountRepository;
  plans: IPlanPolicySource;
  billingPeriodMs: number;
}

export interface ProvisionInput {
  email?: string | null;
  tier?: string;
  /** Use a caller-chosen key instead of generating one (demo seed, tests). */
  apiKey?: string;
  now?: number;
}

export interface ProvisionedAccount {
  account: Account;
  /** Plaintext key. Returned once; only its hash is stored. */
  apiKey: string;
}

export class UnknownPlanError extends Error {
  constructor(public readonly tier: string) {
    super(`Unknown plan tier: ${tier}`);
    this.name = "UnknownPlanError";
  }
}

/**
 * Create an account on the given tier with a fresh billing period.
 * Included tokens come from the tier's plan policy.
 */
export async function provisionAccount(deps: ProvisionDeps, input: ProvisionInput = {}): Promise<ProvisionedAccount> {
  const tier = input.tier ?? "free";
  const plan = await deps.plans.lookup(tier);
  if (!plan) throw new UnknownPlanError(tier);

  const now = input.now ?? Date.now();
  const apiKey = input.apiKey ?? generateApiKey();
  const account = await deps.accounts.create({
    id: randomUUID(),
    apiKeyHash: hashApiKey(apiKey),
    email: input.email ?? null,
    tier,
    tokensIncluded: plan.tokensPerPeriod,
    periodEnd: now + deps.billingPeriodMs,
    createdAt: now,
  });

  logger.info("Account provisioned", { accountId: account.id, tier });
  return { account, apiKey };
}

export const DEMO_EMAIL = "demo@example.com";
export const DEMO_API_KEY = "sk_demo_local_only";

/**
 * Ensure the local demo account exists. Idempotent: returns the existing
 * account when the demo key already resolves.
 */
export async function seedDemoAccount(deps: ProvisionDeps): Promise<Account> {
  const existing = await deps.accounts.findByApiKey(DEMO_API_KEY);
  if (existing) return existing;
  const { account } = await provisionAccount(deps, { email: DEMO_EMAIL, tier: "free", apiKey: DEMO_API_KEY });
  logger.warn("Demo account seeded; do not enable SEED_DEMO_ACCOUNT in production", { accountId: account.id });
  return account;
}
