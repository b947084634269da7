import { sql } from "drizzle-orm";
import { bigint, boolean, check, index, integer, pgTable, text } from "drizzle-orm/pg-core";

/**
 * One row per paying (or free) caller. Usage fields are only mutated by the
 * quota enforcer; tier/tokensIncluded only by plan changes. Never hard-deleted.
 */
export const accounts = pgTable(
  "accounts",
  {
    id: text("id").primaryKey(),
    /** sha-256 hex of the opaque API key; the key itself is never stored. */
    apiKeyHash: text("api_key_hash").notNull().unique(),
    email: text("email").unique(),
    tier: text("tier").notNull().default("free"),
    tokensIncluded: integer("tokens_included").notNull(),
    tokensUsed: integer("tokens_used").notNull().default(0),
    /** Epoch ms. Usage resets on the first request after this instant. */
    periodEnd: bigint("period_end", { mode: "number" }).notNull(),
    active: boolean("active").notNull().default(true),
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
    updatedAt: bigint("updated_at", { mode: "number" }).notNull(),
  },
  (table) => [
    index("idx_accounts_tier").on(table.tier),
    check("accounts_tokens_used_nonnegative", sql`${table.tokensUsed} >= 0`),
  ],
);
