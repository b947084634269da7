import { bigint, boolean, index, integer, pgTable, text } from "drizzle-orm/pg-core";
import { creditColumn } from "../credit-column.js";

/** Append-only per-call usage log. */
export const usageRecords = pgTable(
  "usage_records",
  {
    id: text("id").primaryKey(),
    requestId: text("request_id").notNull().unique(),
    accountId: text("account_id").notNull(),
    provider: text("provider").notNull(),
    model: text("model").notNull(),
    tokens: integer("tokens").notNull(),
    cost: creditColumn("cost").notNull(),
    endpoint: text("endpoint").notNull(),
    latencyMs: integer("latency_ms").notNull(),
    timestamp: bigint("timestamp", { mode: "number" }).notNull(),
    fallback: boolean("fallback").notNull().default(false),
  },
  (table) => [
    index("idx_usage_records_account_ts").on(table.accountId, table.timestamp),
    index("idx_usage_records_account_model").on(table.accountId, table.provider, table.model),
  ],
);
