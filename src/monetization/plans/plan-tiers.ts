import { z } from "zod";
import { MAX_TOKEN_ALLOWANCE } from "../../account/repository-types.js";

/** Schema for a plan tier stored in the database */
export const planPolicySchema = z.object({
  id: z.string().min(1),
  tokensPerPeriod: z.number().int().min(0).max(MAX_TOKEN_ALLOWANCE),
  rateLimitPerHour: z.number().int().min(1),
  priceMonthly: z.number().min(0), // USD
});

export type PlanPolicy = z.infer<typeof planPolicySchema>;

/** Default tiers seeded on first run */
export const DEFAULT_PLANS: PlanPolicy[] = [
  { id: "free", tokensPerPeriod: 10_000, rateLimitPerHour: 100, priceMonthly: 0 },
  { id: "starter", tokensPerPeriod: 100_000, rateLimitPerHour: 1_000, priceMonthly: 9.99 },
  { id: "pro", tokensPerPeriod: 1_000_000, rateLimitPerHour: 5_000, priceMonthly: 49.99 },
  { id: "enterprise", tokensPerPeriod: 10_000_000, rateLimitPerHour: 20_000, priceMonthly: 199.99 },
];

/** Where the gateway looks up a tier's policy. Unknown tiers resolve to null. */
export interface IPlanPolicySource {
  lookup(tier: string): Promise<PlanPolicy | null>;
  list(): Promise<PlanPolicy[]>;
}
