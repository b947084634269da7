import { randomUUID } from "node:crypto";
import { and, count, desc, eq, gte, sql, sum } from "drizzle-orm";
import type { DrizzleDb } from "../../db/index.js";
import { dailyUsage, usageRecords } from "../../db/schema/index.js";
import { Credit } from "../credit.js";
import type { DailyAggregate, IUsageRepository, ModelUsage, UsageRecord } from "./usage-repository.js";
import { usageDate } from "./usage-repository.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/** UTC midnight opening a window of `days` calendar days that ends today. */
function windowStart(days: number, now: number): number {
  return Date.parse(usageDate(now - (days - 1) * DAY_MS));
}

type UsageRow = typeof usageRecords.$inferSelect;
type DailyRow = typeof dailyUsage.$inferSelect;

function toUsageRecord(row: UsageRow): UsageRecord {
  return {
    requestId: row.requestId,
    accountId: row.accountId,
    provider: row.provider,
    model: row.model,
    tokens: row.tokens,
    cost: row.cost,
    endpoint: row.endpoint,
    latencyMs: row.latencyMs,
    timestamp: row.timestamp,
    fallback: row.fallback,
  };
}

function toDailyAggregate(row: DailyRow): DailyAggregate {
  return {
    date: row.date,
    accountId: row.accountId,
    requestCount: row.requestCount,
    totalTokens: row.totalTokens,
    totalCost: row.totalCost,
    avgLatencyMs: row.avgLatencyMs,
  };
}

export class DrizzleUsageRepository implements IUsageRepository {
  constructor(private readonly db: DrizzleDb) {}

  async record(usage: UsageRecord): Promise<boolean> {
    const latencyMs = Math.round(usage.latencyMs);
    return this.db.transaction(async (tx) => {
      const inserted = await tx
        .insert(usageRecords)
        .values({
          id: randomUUID(),
          requestId: usage.requestId,
          accountId: usage.accountId,
          provider: usage.provider,
          model: usage.model,
          tokens: usage.tokens,
          cost: usage.cost,
          endpoint: usage.endpoint,
          latencyMs,
          timestamp: usage.timestamp,
          fallback: usage.fallback,
        })
        .onConflictDoNothing({ target: usageRecords.requestId })
        .returning({ id: usageRecords.id });

      if (inserted.length === 0) return false;

      // Running mean: every SET expression reads the pre-update row.
      await tx
        .insert(dailyUsage)
        .values({
          date: usageDate(usage.timestamp),
          accountId: usage.accountId,
          requestCount: 1,
          totalTokens: usage.tokens,
          totalCost: usage.cost,
          avgLatencyMs: latencyMs,
        })
        .onConflictDoUpdate({
          target: [dailyUsage.date, dailyUsage.accountId],
          set: {
            requestCount: sql`${dailyUsage.requestCount} + 1`,
            totalTokens: sql`${dailyUsage.totalTokens} + ${usage.tokens}`,
            totalCost: sql`${dailyUsage.totalCost} + ${usage.cost.toRaw()}`,
            avgLatencyMs: sql`(${dailyUsage.avgLatencyMs} * ${dailyUsage.requestCount} + ${latencyMs}::double precision) / (${dailyUsage.requestCount} + 1)`,
          },
        });
      return true;
    });
  }

  async dailyAggregates(accountId: string, days = 30, now = Date.now()): Promise<DailyAggregate[]> {
    const since = usageDate(windowStart(days, now));
    const rows = await this.db
      .select()
      .from(dailyUsage)
      .where(and(eq(dailyUsage.accountId, accountId), gte(dailyUsage.date, since)))
      .orderBy(desc(dailyUsage.date));
    return rows.map(toDailyAggregate);
  }

  async modelBreakdown(accountId: string, days = 30, now = Date.now()): Promise<ModelUsage[]> {
    const tokens = sum(usageRecords.tokens);
    const rows = await this.db
      .select({
        provider: usageRecords.provider,
        model: usageRecords.model,
        requestCount: count(),
        totalTokens: tokens,
        totalCost: sum(usageRecords.cost),
      })
      .from(usageRecords)
      .where(and(eq(usageRecords.accountId, accountId), gte(usageRecords.timestamp, windowStart(days, now))))
      .groupBy(usageRecords.provider, usageRecords.model)
      .orderBy(desc(tokens), usageRecords.provider, usageRecords.model);

    return rows.map((r) => ({
      provider: r.provider,
      model: r.model,
      requestCount: r.requestCount,
      totalTokens: Number(r.totalTokens ?? 0),
      totalCost: Credit.fromRaw(Number(r.totalCost ?? 0)),
    }));
  }

  async recentUsage(accountId: string, limit = 50): Promise<UsageRecord[]> {
    const rows = await this.db
      .select()
      .from(usageRecords)
      .where(eq(usageRecords.accountId, accountId))
      .orderBy(desc(usageRecords.timestamp), desc(usageRecords.requestId))
      .limit(limit);
    return rows.map(toUsageRecord);
  }
}
