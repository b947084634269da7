import { doublePrecision, integer, pgTable, text } from "drizzle-orm/pg-core";

/** Data-driven plan policy. New tiers are rows, not code. */
export const planTiers = pgTable("plan_tiers", {
  id: text("id").primaryKey(),
  tokensPerPeriod: integer("tokens_per_period").notNull(),
  rateLimitPerHour: integer("rate_limit_per_hour").notNull(),
  priceMonthly: doublePrecision("price_monthly").notNull().default(0),
});
