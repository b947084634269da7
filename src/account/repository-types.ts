// src/account/repository-types.ts
//
// Plain TypeScript interfaces for account domain objects.
// No Drizzle types.

/** Upper bound of the int4 token columns (tokens_included, tokens_per_period). */
export const MAX_TOKEN_ALLOWANCE = 2_147_483_647;

/** Plain domain object for an account, mirrors the `accounts` table. */
export interface Account {
  id: string;
  email: string | null;
  tier: string;
  tokensIncluded: number;
  tokensUsed: number;
  /** Epoch ms */
  periodEnd: number;
  active: boolean;
  createdAt: number;
  updatedAt: number;
}

export interface NewAccount {
  id: string;
  apiKeyHash: string;
  email?: string | null;
  tier: string;
  tokensIncluded: number;
  periodEnd: number;
  createdAt: number;
}

/** Result of a debit attempt. `applied` is false when the request id was already debited. */
export interface DebitOutcome {
  applied: boolean;
  tokensUsed: number;
  tokensIncluded: number;
}

/** Plan-change event payload, applied by the billing integration. */
export interface PlanChange {
  tier: string;
  tokensIncluded: number;
}
