import { appendFileSync, existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { logger } from "../../config/logger.js";

/** A completed call whose debit and usage record still have to be written. */
export const accountingEntrySchema = z.object({
  requestId: z.string().min(1),
  accountId: z.string().min(1),
  provider: z.string(),
  model: z.string(),
  tokens: z.number().int().min(0),
  /** Credit raw units */
  costRaw: z.number().int(),
  endpoint: z.string(),
  latencyMs: z.number().min(0),
  timestamp: z.number().int(),
  fallback: z.boolean(),
});

export type AccountingEntry = z.infer<typeof accountingEntrySchema>;

const dlqLineSchema = accountingEntrySchema.extend({
  dlq_timestamp: z.number(),
  dlq_error: z.string(),
  dlq_retries: z.number().int(),
});

export type DeadLetter = z.infer<typeof dlqLineSchema>;

/**
 * Dead-letter queue for bookkeeping that failed after in-process retries.
 *
 * Entries are JSON lines. Both writes they stand for are idempotent by
 * request id, so replaying an entry more than once is harmless.
 */
export class AccountingDLQ {
  constructor(private readonly dlqPath: string) {
    this.ensureDir();
  }

  private ensureDir(): void {
    const dir = dirname(this.dlqPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  /** Append a failed entry with failure metadata. */
  append(entry: AccountingEntry, error: string, retries: number): void {
    const line: DeadLetter = {
      ...entry,
      dlq_timestamp: Date.now(),
      dlq_error: error,
      dlq_retries: retries,
    };
    appendFileSync(this.dlqPath, `${JSON.stringify(line)}\n`, { encoding: "utf8", flag: "a" });
  }

  /** Read all parked entries. Lines that do not parse are logged and skipped. */
  readAll(): DeadLetter[] {
    if (!existsSync(this.dlqPath)) return [];

    const content = readFileSync(this.dlqPath, "utf8");
    const entries: DeadLetter[] = [];
    for (const [index, line] of content.split("\n").entries()) {
      if (!line.trim()) continue;
      const parsed = parseLine(line);
      if (parsed) {
        entries.push(parsed);
      } else {
        // Typically a torn write from a crash mid-append.
        logger.warn("Skipping malformed accounting DLQ line", { path: this.dlqPath, line: index + 1 });
      }
    }
    return entries;
  }

  /** Drop entries whose request ids are in `requestIds`; keeps everything else. */
  remove(requestIds: ReadonlySet<string>): void {
    if (requestIds.size === 0 || !existsSync(this.dlqPath)) return;
    const kept = this.readAll().filter((e) => !requestIds.has(e.requestId));
    const tmp = `${this.dlqPath}.tmp`;
    writeFileSync(tmp, kept.map((e) => `${JSON.stringify(e)}\n`).join(""), "utf8");
    renameSync(tmp, this.dlqPath);
  }
}

function parseLine(line: string): DeadLetter | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const result = dlqLineSchema.safeParse(raw);
  return result.success ? result.data : null;
}
