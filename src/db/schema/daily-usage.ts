import { doublePrecision, integer, pgTable, primaryKey, text } from "drizzle-orm/pg-core";
import { creditColumn } from "../credit-column.js";

/** Per-account, per-UTC-day rollup of usage_records. */
export const dailyUsage = pgTable(
  "daily_usage",
  {
    /** YYYY-MM-DD (UTC) */
    date: text("date").notNull(),
    accountId: text("account_id").notNull(),
    requestCount: integer("request_count").notNull().default(0),
    totalTokens: integer("total_tokens").notNull().default(0),
    totalCost: creditColumn("total_cost").notNull(),
    avgLatencyMs: doublePrecision("avg_latency_ms").notNull().default(0),
  },
  (table) => [primaryKey({ columns: [table.date, table.accountId] })],
);
