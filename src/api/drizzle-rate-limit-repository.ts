import { lt, sql } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { rateLimitEntries } from "../db/schema/index.js";
import type { IRateLimitRepository } from "./rate-limit-repository.js";
import type { RateLimitEntry } from "./repository-types.js";

export class DrizzleRateLimitRepository implements IRateLimitRepository {
  constructor(private readonly db: DrizzleDb) {}

  async increment(key: string, scope: string, windowMs: number, now = Date.now()): Promise<RateLimitEntry> {
    const expiredBefore = now - windowMs;

    // One upsert: reset if the stored window has expired, otherwise bump.
    const rows = await this.db
      .insert(rateLimitEntries)
      .values({ key, scope, count: 1, windowStart: now })
      .onConflictDoUpdate({
        target: [rateLimitEntries.key, rateLimitEntries.scope],
        set: {
          count: sql`CASE WHEN ${rateLimitEntries.windowStart} <= ${expiredBefore} THEN 1 ELSE ${rateLimitEntries.count} + 1 END`,
          windowStart: sql`CASE WHEN ${rateLimitEntries.windowStart} <= ${expiredBefore} THEN ${now} ELSE ${rateLimitEntries.windowStart} END`,
        },
      })
      .returning({ count: rateLimitEntries.count, windowStart: rateLimitEntries.windowStart });

    const row = rows[0];
    if (!row) throw new Error(`Rate limit upsert returned no row for ${key}/${scope}`);
    return { key, scope, count: row.count, windowStart: row.windowStart };
  }

  async purgeStale(windowMs: number, now = Date.now()): Promise<number> {
    const cutoff = now - windowMs;
    const result = await this.db
      .delete(rateLimitEntries)
      .where(lt(rateLimitEntries.windowStart, cutoff))
      .returning({ key: rateLimitEntries.key });
    return result.length;
  }
}
