import { PGlite } from "@electric-sql/pglite";
import { and, eq } from "drizzle-orm";
import { drizzle } from "drizzle-orm/pglite";
import { migrate } from "drizzle-orm/pglite/migrator";
import type { DrizzleDb } from "../db/index.js";
import { MIGRATIONS_FOLDER } from "../db/migrate.js";
import * as schema from "../db/schema/index.js";

/** Fresh in-process Postgres with every migration applied. */
export async function createTestDb(): Promise<{ db: DrizzleDb; pool: PGlite }> {
  const pool = new PGlite();
  const pgliteDb = drizzle(pool, { schema });
  await migrate(pgliteDb, { migrationsFolder: MIGRATIONS_FOLDER });
  const db = pgliteDb as unknown as DrizzleDb;
  return { db, pool };
}

export async function truncateAllTables(pool: PGlite): Promise<void> {
  const result = await pool.query<{ tablename: string }>(`SELECT tablename FROM pg_tables WHERE schemaname = 'public'`);
  const tables = result.rows.map((r) => `"${r.tablename}"`).join(", ");
  if (tables) {
    await pool.query(`TRUNCATE ${tables} RESTART IDENTITY CASCADE`);
  }
}

/** Current rate-limit row for key + scope, or null when none exists. */
export async function readRateLimitEntry(
  db: DrizzleDb,
  key: string,
  scope: string,
): Promise<{ count: number; windowStart: number } | null> {
  const rows = await db
    .select({ count: schema.rateLimitEntries.count, windowStart: schema.rateLimitEntries.windowStart })
    .from(schema.rateLimitEntries)
    .where(and(eq(schema.rateLimitEntries.key, key), eq(schema.rateLimitEntries.scope, scope)));
  return rows[0] ?? null;
}

/** The stored daily aggregate for account + UTC date, or null. */
export async function readDailyAggregate(
  db: DrizzleDb,
  accountId: string,
  date: string,
): Promise<typeof schema.dailyUsage.$inferSelect | null> {
  const rows = await db
    .select()
    .from(schema.dailyUsage)
    .where(and(eq(schema.dailyUsage.accountId, accountId), eq(schema.dailyUsage.date, date)));
  return rows[0] ?? null;
}
