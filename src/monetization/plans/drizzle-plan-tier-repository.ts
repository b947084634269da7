import { asc, eq } from "drizzle-orm";
import type { DrizzleDb } from "../../db/index.js";
import { planTiers } from "../../db/schema/index.js";
import type { IPlanPolicySource, PlanPolicy } from "./plan-tiers.js";
import { DEFAULT_PLANS, planPolicySchema } from "./plan-tiers.js";

/** Plan tiers backed by the plan_tiers table. */
export class DrizzlePlanTierRepository implements IPlanPolicySource {
  constructor(private readonly db: DrizzleDb) {}

  /** Seed default tiers (skips existing rows) */
  async seed(tiers: PlanPolicy[] = DEFAULT_PLANS): Promise<void> {
    if (tiers.length === 0) return;
    await this.db
      .insert(planTiers)
      .values(tiers.map((t) => planPolicySchema.parse(t)))
      .onConflictDoNothing({ target: planTiers.id });
  }

  async lookup(tier: string): Promise<PlanPolicy | null> {
    const rows = await this.db.select().from(planTiers).where(eq(planTiers.id, tier));
    return rows[0] ?? null;
  }

  /** All tiers, cheapest allowance first. */
  async list(): Promise<PlanPolicy[]> {
    return this.db.select().from(planTiers).orderBy(asc(planTiers.tokensPerPeriod), asc(planTiers.id));
  }
}
