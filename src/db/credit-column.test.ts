import type { PGlite } from "@electric-sql/pglite";
import { eq } from "drizzle-orm";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { Credit } from "../monetization/credit.js";
import { createTestDb } from "../test/db.js";
import type { DrizzleDb } from "./index.js";
import { dailyUsage } from "./schema/index.js";

describe("creditColumn", () => {
  let db: DrizzleDb;
  let pool: PGlite;

  beforeAll(async () => {
    ({ db, pool } = await createTestDb());
  });

  afterAll(async () => {
    await pool.close();
  });

  it("stores raw units and reads back a Credit", async () => {
    await db.insert(dailyUsage).values({
      date: "2026-01-01",
      accountId: "acct-1",
      totalCost: Credit.fromRaw(4_000),
    });

    const raw = await pool.query<{ total_cost: unknown }>(`SELECT total_cost FROM daily_usage`);
    expect(Number(raw.rows[0]?.total_cost)).toBe(4_000);

    const rows = await db.select().from(dailyUsage).where(eq(dailyUsage.accountId, "acct-1"));
    const cost = rows[0]?.totalCost;
    expect(cost).toBeInstanceOf(Credit);
    expect(cost?.toRaw()).toBe(4_000);
  });

  it("round-trips amounts above 32-bit range", async () => {
    const big = Credit.fromDollars(199.99);
    await db.insert(dailyUsage).values({ date: "2026-01-02", accountId: "acct-1", totalCost: big });
    const rows = await db.select().from(dailyUsage).where(eq(dailyUsage.date, "2026-01-02"));
    expect(rows[0]?.totalCost.toRaw()).toBe(199_990_000_000);
  });
});
