/**
 * MIGRATION CONVENTIONS
 *
 * SAFE operations (backward-compatible, can run while old code serves traffic):
 *   - CREATE TABLE
 *   - ADD COLUMN (with DEFAULT or nullable)
 *   - CREATE INDEX
 *
 * UNSAFE operations (require expand-contract pattern):
 *   - DROP TABLE    → stop reading it first, drop in a later release
 *   - DROP COLUMN   → stop reading it first, drop in a later release
 *   - RENAME COLUMN → add new column, backfill, update code, drop old in next release
 *
 * Every migration MUST be backward-compatible with the PREVIOUS release's code.
 * After changing src/db/schema/, run `npm run db:generate` and review the SQL.
 */
import { defineConfig } from "drizzle-kit";

export default defineConfig({
  schema: [
    "./src/db/schema/accounts.ts",
    "./src/db/schema/plan-tiers.ts",
    "./src/db/schema/quota-debits.ts",
    "./src/db/schema/usage-records.ts",
    "./src/db/schema/daily-usage.ts",
    "./src/db/schema/rate-limit-entries.ts",
  ],
  out: "./drizzle/migrations",
  dialect: "postgresql",
  dbCredentials: { url: process.env.DATABASE_URL || "postgres://localhost:5432/llm_tollgate" },
});
