/**
 * Provider adapter contract: what the gateway needs from an upstream LLM.
 *
 * A live adapter performs a network call and reports token counts; every
 * adapter can also produce a deterministic fallback result so the gateway
 * always has something to serve.
 */

import type { Credit } from "../../monetization/credit.js";
import type { ProviderName } from "../provider-router.js";

/**
 * A function that performs an HTTP fetch. Accepts the same signature as
 * the global `fetch`. This indirection lets tests inject a stub without
 * mocking globals.
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface CompletionInput {
  model: string;
  prompt: string;
  maxTokens: number;
  signal: AbortSignal;
}

/** What a live upstream call reports back. */
export interface UpstreamCompletion {
  text: string;
  tokensIn: number;
  tokensOut: number;
  latencyMs: number;
}

/** The result the gateway serves, whether it came from upstream or the fallback responder. */
export interface CompletionResult {
  text: string;
  /** Total tokens charged against quota (prompt + completion). */
  tokens: number;
  cost: Credit;
  model: string;
  provider: ProviderName;
  latencyMs: number;
  /** True when the deterministic fallback produced this result. */
  fallback: boolean;
}

export interface ProviderAdapter {
  readonly name: ProviderName;
  readonly defaultModel: string;
  /** Live upstream call. Absent when the provider has no credentials configured. */
  complete?(input: CompletionInput): Promise<UpstreamCompletion>;
  /** Deterministic stand-in result. Never throws, never does I/O. */
  fallback(model: string, prompt: string): CompletionResult;
}
