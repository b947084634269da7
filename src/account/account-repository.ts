import { eq, sql } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { accounts, quotaDebits } from "../db/schema/index.js";
import { hashApiKey } from "./api-key.js";
import type { Account, DebitOutcome, NewAccount, PlanChange } from "./repository-types.js";

export class AccountNotFoundError extends Error {
  constructor(public readonly accountId: string) {
    super(`Account not found: ${accountId}`);
    this.name = "AccountNotFoundError";
  }
}

export interface IAccountRepository {
  /** Resolve an API key to its account. Returns null if unknown. Inactive accounts are returned as-is. */
  findByApiKey(apiKey: string): Promise<Account | null>;
  findById(id: string): Promise<Account | null>;
  create(input: NewAccount): Promise<Account>;
  /**
   * If `now > periodEnd`, reset usage to zero and open a new period ending at
   * `now + periodMs`. Serialized per account. Returns the current row, or null if unknown.
   */
  rolloverIfDue(id: string, now: number, periodMs: number): Promise<Account | null>;
  /**
   * Atomically add `tokens` to usage. Idempotent by `requestId`: a repeated
   * request id leaves usage unchanged and reports `applied: false`.
   * Throws AccountNotFoundError if the account does not exist.
   */
  debit(id: string, tokens: number, requestId: string, now: number): Promise<DebitOutcome>;
  /** Set tier and included tokens. Usage and period are untouched. */
  applyPlanChange(id: string, change: PlanChange, now: number): Promise<Account | null>;
  /** Mark inactive. Returns false if the account does not exist. */
  deactivate(id: string, now: number): Promise<boolean>;
}

type AccountRow = typeof accounts.$inferSelect;

function toAccount(row: AccountRow): Account {
  return {
    id: row.id,
    email: row.email,
    tier: row.tier,
    tokensIncluded: row.tokensIncluded,
    tokensUsed: row.tokensUsed,
    periodEnd: row.periodEnd,
    active: row.active,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class DrizzleAccountRepository implements IAccountRepository {
  constructor(private readonly db: DrizzleDb) {}

  async findByApiKey(apiKey: string): Promise<Account | null> {
    const rows = await this.db
      .select()
      .from(accounts)
      .where(eq(accounts.apiKeyHash, hashApiKey(apiKey)))
      .limit(1);
    const row = rows[0];
    return row ? toAccount(row) : null;
  }

  async findById(id: string): Promise<Account | null> {
    const rows = await this.db.select().from(accounts).where(eq(accounts.id, id)).limit(1);
    const row = rows[0];
    return row ? toAccount(row) : null;
  }

  async create(input: NewAccount): Promise<Account> {
    const rows = await this.db
      .insert(accounts)
      .values({
        id: input.id,
        apiKeyHash: input.apiKeyHash,
        email: input.email ?? null,
        tier: input.tier,
        tokensIncluded: input.tokensIncluded,
        tokensUsed: 0,
        periodEnd: input.periodEnd,
        active: true,
        createdAt: input.createdAt,
        updatedAt: input.createdAt,
      })
      .returning();
    const row = rows[0];
    if (!row) throw new Error(`Insert returned no row for account ${input.id}`);
    return toAccount(row);
  }

  async rolloverIfDue(id: string, now: number, periodMs: number): Promise<Account | null> {
    return this.db.transaction(async (tx) => {
      const rows = await tx.select().from(accounts).where(eq(accounts.id, id)).for("update");
      const row = rows[0];
      if (!row) return null;
      if (now <= row.periodEnd) return toAccount(row);

      const updated = await tx
        .update(accounts)
        .set({ tokensUsed: 0, periodEnd: now + periodMs, updatedAt: now })
        .where(eq(accounts.id, id))
        .returning();
      const next = updated[0];
      return next ? toAccount(next) : null;
    });
  }

  async debit(id: string, tokens: number, requestId: string, now: number): Promise<DebitOutcome> {
    return this.db.transaction(async (tx) => {
      const claimed = await tx
        .insert(quotaDebits)
        .values({ requestId, accountId: id, tokens, createdAt: now })
        .onConflictDoNothing({ target: quotaDebits.requestId })
        .returning({ requestId: quotaDebits.requestId });

      if (claimed.length === 0) {
        const rows = await tx
          .select({ tokensUsed: accounts.tokensUsed, tokensIncluded: accounts.tokensIncluded })
          .from(accounts)
          .where(eq(accounts.id, id));
        const row = rows[0];
        if (!row) throw new AccountNotFoundError(id);
        return { applied: false, ...row };
      }

      // Single-statement increment: concurrent debits serialize on the row lock.
      const rows = await tx
        .update(accounts)
        .set({ tokensUsed: sql`${accounts.tokensUsed} + ${tokens}`, updatedAt: now })
        .where(eq(accounts.id, id))
        .returning({ tokensUsed: accounts.tokensUsed, tokensIncluded: accounts.tokensIncluded });
      const row = rows[0];
      if (!row) throw new AccountNotFoundError(id);
      return { applied: true, ...row };
    });
  }

  async applyPlanChange(id: string, change: PlanChange, now: number): Promise<Account | null> {
    const rows = await this.db
      .update(accounts)
      .set({ tier: change.tier, tokensIncluded: change.tokensIncluded, updatedAt: now })
      .where(eq(accounts.id, id))
      .returning();
    const row = rows[0];
    return row ? toAccount(row) : null;
  }

  async deactivate(id: string, now: number): Promise<boolean> {
    const rows = await this.db
      .update(accounts)
      .set({ active: false, updatedAt: now })
      .where(eq(accounts.id, id))
      .returning({ id: accounts.id });
    return rows.length > 0;
  }
}
