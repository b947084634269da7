import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { validateRequiredEnvVars } from "./validate-env.js";

const COMPLETE = {
  NODE_ENV: "production",
  DATABASE_URL: "postgres://localhost:5432/test",
  OPENAI_API_KEY: "test-key",
  ANTHROPIC_API_KEY: "test-key",
  INTERNAL_API_SECRET: "test-internal-secret",
};

describe("validateRequiredEnvVars", () => {
  const warnSpy = () => vi.mocked(console.warn);

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("passes silently with a complete environment", () => {
    expect(() => validateRequiredEnvVars(COMPLETE)).not.toThrow();
    expect(warnSpy()).not.toHaveBeenCalled();
  });

  it("throws when DATABASE_URL is missing", () => {
    const { DATABASE_URL: _omit, ...env } = COMPLETE;
    expect(() => validateRequiredEnvVars(env)).toThrow("DATABASE_URL is required but not set");
  });

  it("refuses the demo seed in production", () => {
    expect(() => validateRequiredEnvVars({ ...COMPLETE, SEED_DEMO_ACCOUNT: "true" })).toThrow(
      "SEED_DEMO_ACCOUNT must not be enabled in production",
    );
  });

  it("allows the demo seed in development", () => {
    expect(() =>
      validateRequiredEnvVars({ ...COMPLETE, NODE_ENV: "development", SEED_DEMO_ACCOUNT: "true" }),
    ).not.toThrow();
  });

  it("warns when no provider key is set", () => {
    const { OPENAI_API_KEY: _a, ANTHROPIC_API_KEY: _b, ...env } = COMPLETE;
    validateRequiredEnvVars(env);
    expect(warnSpy()).toHaveBeenCalledWith(
      "[env] WARNING: No provider API keys set. Every chat request will be served by the fallback responder.",
    );
  });

  it("names the single missing provider key", () => {
    const { ANTHROPIC_API_KEY: _omit, ...env } = COMPLETE;
    validateRequiredEnvVars(env);
    expect(warnSpy()).toHaveBeenCalledWith(
      "[env] WARNING: Missing ANTHROPIC_API_KEY. That provider will be served by the fallback responder.",
    );
  });

  it("warns when the internal secret is missing", () => {
    const { INTERNAL_API_SECRET: _omit, ...env } = COMPLETE;
    validateRequiredEnvVars(env);
    expect(warnSpy()).toHaveBeenCalledTimes(1);
  });

  it("is skipped under NODE_ENV=test", () => {
    expect(() => validateRequiredEnvVars({ NODE_ENV: "test" })).not.toThrow();
    expect(warnSpy()).not.toHaveBeenCalled();
  });
});
