import { beforeEach, describe, expect, it, vi } from "vitest";

// Mock @sentry/node before importing the module
vi.mock("@sentry/node", () => ({
  init: vi.fn(),
  captureException: vi.fn(),
  dedupeIntegration: vi.fn(() => ({ name: "Dedupe" })),
}));

import * as Sentry from "@sentry/node";
import { captureError, initSentry } from "./sentry.js";

describe("sentry", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("does not call Sentry.init when dsn is undefined", () => {
    initSentry(undefined);
    expect(Sentry.init).not.toHaveBeenCalled();
  });

  it("does not call Sentry.init when dsn is empty string", () => {
    initSentry("");
    expect(Sentry.init).not.toHaveBeenCalled();
  });

  it("calls Sentry.init with dsn when provided", () => {
    initSentry("https://abc@sentry.example.com/123");
    expect(Sentry.init).toHaveBeenCalledWith(expect.objectContaining({ dsn: "https://abc@sentry.example.com/123" }));
  });

  it("captureError tags the account and request", () => {
    const err = new Error("test");
    captureError(err, { accountId: "acct-1", requestId: "req-1" });
    expect(Sentry.captureException).toHaveBeenCalledWith(err, {
      tags: { accountId: "acct-1", requestId: "req-1" },
      extra: undefined,
    });
  });

  it("captureError does not throw without context", () => {
    expect(() => captureError(new Error("test"))).not.toThrow();
  });
});
