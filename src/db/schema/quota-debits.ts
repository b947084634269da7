import { bigint, index, integer, pgTable, text } from "drizzle-orm/pg-core";

/** Idempotency ledger: one row per request whose tokens were debited. */
export const quotaDebits = pgTable(
  "quota_debits",
  {
    requestId: text("request_id").primaryKey(),
    accountId: text("account_id").notNull(),
    tokens: integer("tokens").notNull(),
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
  },
  (table) => [index("idx_quota_debits_account").on(table.accountId)],
);
