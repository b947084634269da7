import { appendFileSync, existsSync, mkdirSync, mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

import { logger } from "../../config/logger.js";
import { type AccountingEntry, AccountingDLQ } from "./dlq.js";

function entry(overrides: Partial<AccountingEntry> = {}): AccountingEntry {
  return {
    requestId: "req-1",
    accountId: "acct-1",
    provider: "openai",
    model: "gpt-3.5-turbo",
    tokens: 2,
    costRaw: 4_000,
    endpoint: "/api/chat",
    latencyMs: 500,
    timestamp: 1_700_000_000_000,
    fallback: true,
    ...overrides,
  };
}

describe("AccountingDLQ", () => {
  let tmpRoot: string;
  let tmpDir: string;
  let dlqPath: string;

  beforeEach(() => {
    vi.clearAllMocks();
    tmpRoot = mkdtempSync(path.join(os.tmpdir(), "accounting-dlq-test-"));
    tmpDir = path.join(tmpRoot, "nested");
    dlqPath = path.join(tmpDir, "accounting-dlq.jsonl");
  });

  afterEach(() => {
    rmSync(tmpRoot, { recursive: true, force: true });
  });

  it("creates the directory when it does not exist", () => {
    expect(existsSync(tmpDir)).toBe(false);
    new AccountingDLQ(dlqPath);
    expect(existsSync(tmpDir)).toBe(true);
  });

  it("does not throw when directory already exists", () => {
    mkdirSync(tmpDir, { recursive: true });
    expect(() => new AccountingDLQ(dlqPath)).not.toThrow();
  });

  it("readAll returns empty array when the file does not exist", () => {
    expect(new AccountingDLQ(dlqPath).readAll()).toEqual([]);
  });

  it("appends entries with failure metadata", () => {
    const dlq = new AccountingDLQ(dlqPath);
    dlq.append(entry(), "connection refused", 3);
    dlq.append(entry({ requestId: "req-2" }), "timeout", 3);

    const all = dlq.readAll();
    expect(all).toHaveLength(2);
    expect(all[0]).toMatchObject({ ...entry(), dlq_error: "connection refused", dlq_retries: 3 });
    expect(typeof all[0]?.dlq_timestamp).toBe("number");
    expect(dlq.readAll()).toHaveLength(2);
  });

  it("skips and logs malformed lines", () => {
    const dlq = new AccountingDLQ(dlqPath);
    dlq.append(entry(), "boom", 1);
    appendFileSync(dlqPath, '{"requestId": "torn"\n');
    appendFileSync(dlqPath, '{"requestId": "req-x"}\n');

    expect(dlq.readAll().map((e) => e.requestId)).toEqual(["req-1"]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it("remove keeps only entries not listed", () => {
    const dlq = new AccountingDLQ(dlqPath);
    dlq.append(entry({ requestId: "a" }), "e", 1);
    dlq.append(entry({ requestId: "b" }), "e", 1);
    dlq.append(entry({ requestId: "c" }), "e", 1);

    dlq.remove(new Set(["a", "c"]));

    expect(dlq.readAll().map((e) => e.requestId)).toEqual(["b"]);
  });

  it("remove is a no-op when nothing is listed", () => {
    const dlq = new AccountingDLQ(dlqPath);
    dlq.append(entry(), "e", 1);
    dlq.remove(new Set());
    expect(dlq.readAll()).toHaveLength(1);
  });
});
