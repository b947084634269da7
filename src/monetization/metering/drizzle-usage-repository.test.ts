import type { PGlite } from "@electric-sql/pglite";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import type { DrizzleDb } from "../../db/index.js";
import { createTestDb, readDailyAggregate, truncateAllTables } from "../../test/db.js";
import { Credit } from "../credit.js";
import { DrizzleUsageRepository } from "./drizzle-usage-repository.js";
import type { UsageRecord } from "./usage-repository.js";
import { usageDate } from "./usage-repository.js";

const NOON = Date.parse("2026-03-10T12:00:00Z");
const DAY = 24 * 60 * 60 * 1000;

function usage(overrides: Partial<UsageRecord> = {}): UsageRecord {
  return {
    requestId: "req-1",
    accountId: "acct-1",
    provider: "openai",
    model: "gpt-3.5-turbo",
    tokens: 2,
    cost: Credit.fromRaw(4_000),
    endpoint: "/api/chat",
    latencyMs: 500,
    timestamp: NOON,
    fallback: true,
    ...overrides,
  };
}

describe("usageDate", () => {
  it("formats the UTC calendar day", () => {
    expect(usageDate(Date.parse("2026-03-10T23:59:59Z"))).toBe("2026-03-10");
    expect(usageDate(Date.parse("2026-03-11T00:00:00Z"))).toBe("2026-03-11");
  });
});

describe("DrizzleUsageRepository", () => {
  let db: DrizzleDb;
  let pool: PGlite;
  let repo: DrizzleUsageRepository;

  beforeAll(async () => {
    ({ db, pool } = await createTestDb());
  });

  afterAll(async () => {
    await pool.close();
  });

  beforeEach(async () => {
    await truncateAllTables(pool);
    repo = new DrizzleUsageRepository(db);
  });

  describe("record", () => {
    it("appends the record and opens the day's aggregate", async () => {
      expect(await repo.record(usage())).toBe(true);

      const aggregate = await readDailyAggregate(db, "acct-1", "2026-03-10");
      expect(aggregate?.requestCount).toBe(1);
      expect(aggregate?.totalTokens).toBe(2);
      expect(aggregate?.totalCost.toRaw()).toBe(4_000);
      expect(aggregate?.avgLatencyMs).toBe(500);

      const recent = await repo.recentUsage("acct-1");
      expect(recent).toHaveLength(1);
      expect(recent[0]?.cost.toRaw()).toBe(4_000);
      expect(recent[0]?.fallback).toBe(true);
    });

    it("accumulates totals and a running mean latency", async () => {
      await repo.record(usage({ requestId: "a", tokens: 10, cost: Credit.fromRaw(20_000), latencyMs: 100 }));
      await repo.record(usage({ requestId: "b", tokens: 20, cost: Credit.fromRaw(40_000), latencyMs: 200 }));
      await repo.record(usage({ requestId: "c", tokens: 30, cost: Credit.fromRaw(60_000), latencyMs: 600 }));

      const aggregate = await readDailyAggregate(db, "acct-1", "2026-03-10");
      expect(aggregate?.requestCount).toBe(3);
      expect(aggregate?.totalTokens).toBe(60);
      expect(aggregate?.totalCost.toRaw()).toBe(120_000);
      expect(aggregate?.avgLatencyMs).toBeCloseTo(300, 9);
    });

    it("is idempotent by request id", async () => {
      expect(await repo.record(usage())).toBe(true);
      expect(await repo.record(usage())).toBe(false);

      expect((await readDailyAggregate(db, "acct-1", "2026-03-10"))?.requestCount).toBe(1);
      expect(await repo.recentUsage("acct-1")).toHaveLength(1);
    });

    it("keeps one aggregate per account and day", async () => {
      await repo.record(usage({ requestId: "a" }));
      await repo.record(usage({ requestId: "b", timestamp: NOON + DAY }));
      await repo.record(usage({ requestId: "c", accountId: "acct-2" }));

      expect((await readDailyAggregate(db, "acct-1", "2026-03-10"))?.requestCount).toBe(1);
      expect((await readDailyAggregate(db, "acct-1", "2026-03-11"))?.requestCount).toBe(1);
      expect((await readDailyAggregate(db, "acct-2", "2026-03-10"))?.requestCount).toBe(1);
    });

    it("folds concurrent records into the aggregate", async () => {
      await Promise.all(
        Array.from({ length: 20 }, (_, i) => repo.record(usage({ requestId: `req-${i}`, tokens: 5 }))),
      );
      const aggregate = await readDailyAggregate(db, "acct-1", "2026-03-10");
      expect(aggregate?.requestCount).toBe(20);
      expect(aggregate?.totalTokens).toBe(100);
    });
  });

  describe("queries", () => {
    it("dailyAggregates returns the last N days, newest first", async () => {
      await repo.record(usage({ requestId: "old", timestamp: NOON - 40 * DAY }));
      await repo.record(usage({ requestId: "d1", timestamp: NOON - DAY }));
      await repo.record(usage({ requestId: "d0", timestamp: NOON }));

      const days = await repo.dailyAggregates("acct-1", 30, NOON);
      expect(days.map((d) => d.date)).toEqual(["2026-03-10", "2026-03-09"]);
    });

    it("modelBreakdown groups by provider and model", async () => {
      await repo.record(usage({ requestId: "a", model: "gpt-4", tokens: 100, cost: Credit.fromRaw(3_000_000) }));
      await repo.record(usage({ requestId: "b", model: "gpt-4", tokens: 50, cost: Credit.fromRaw(1_500_000) }));
      await repo.record(
        usage({ requestId: "c", provider: "anthropic", model: "claude-3-haiku-20240307", tokens: 10, cost: Credit.fromRaw(10_000) }),
      );

      const breakdown = await repo.modelBreakdown("acct-1", 30, NOON);
      expect(breakdown.map((b) => ({ ...b, totalCost: b.totalCost.toRaw() }))).toEqual([
        { provider: "openai", model: "gpt-4", requestCount: 2, totalTokens: 150, totalCost: 4_500_000 },
        { provider: "anthropic", model: "claude-3-haiku-20240307", requestCount: 1, totalTokens: 10, totalCost: 10_000 },
      ]);
    });

    it("modelBreakdown covers the same days as dailyAggregates", async () => {
      const windowOpens = Date.parse("2026-02-09T00:00:00Z");
      await repo.record(usage({ requestId: "before", model: "gpt-4", timestamp: windowOpens - 1 }));
      await repo.record(usage({ requestId: "first", timestamp: windowOpens }));
      await repo.record(usage({ requestId: "today", timestamp: NOON }));

      const breakdown = await repo.modelBreakdown("acct-1", 30, NOON);
      expect(breakdown.map((b) => [b.model, b.requestCount])).toEqual([["gpt-3.5-turbo", 2]]);

      const days = await repo.dailyAggregates("acct-1", 30, NOON);
      expect(days.map((d) => d.date)).toEqual(["2026-03-10", "2026-02-09"]);
    });

    it("recentUsage returns 50 records by default", async () => {
      await Promise.all(
        Array.from({ length: 55 }, (_, i) => repo.record(usage({ requestId: `req-${i}`, timestamp: NOON + i }))),
      );
      const recent = await repo.recentUsage("acct-1");
      expect(recent).toHaveLength(50);
      expect(recent[0]?.requestId).toBe("req-54");
    });

    it("recentUsage honors the limit and orders newest first", async () => {
      for (let i = 0; i < 5; i++) {
        await repo.record(usage({ requestId: `req-${i}`, timestamp: NOON + i }));
      }
      const recent = await repo.recentUsage("acct-1", 3);
      expect(recent.map((r) => r.requestId)).toEqual(["req-4", "req-3", "req-2"]);
    });
  });
});
