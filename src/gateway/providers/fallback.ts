import type { ProviderName } from "../provider-router.js";
import { costForTokens } from "./rate-table.js";
import type { CompletionResult } from "./types.js";

interface FallbackProfile {
  /** Tokens per prompt word. */
  tokenMultiplier: number;
  /** Reported latency. Fixed so repeated calls are identical. */
  latencyMs: number;
}

const FALLBACK_PROFILES: Record<ProviderName, FallbackProfile> = {
  openai: { tokenMultiplier: 1.3, latencyMs: 500 },
  anthropic: { tokenMultiplier: 1.2, latencyMs: 700 },
};

const PROMPT_EXCERPT_LENGTH = 50;

export function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

/** floor(words × multiplier), never less than one token. */
export function estimateTokens(prompt: string, multiplier: number): number {
  return Math.max(1, Math.floor(countWords(prompt) * multiplier));
}

/**
 * Deterministic stand-in for an upstream completion. Same inputs, same
 * output; no I/O, no clock, no randomness.
 */
export function fallbackCompletion(provider: ProviderName, model: string, prompt: string): CompletionResult {
  const profile = FALLBACK_PROFILES[provider];
  const tokens = estimateTokens(prompt, profile.tokenMultiplier);
  return {
    text: `[fallback] Simulated response from ${model} to: '${prompt.slice(0, PROMPT_EXCERPT_LENGTH)}...'`,
    tokens,
    cost: costForTokens(provider, model, tokens),
    model,
    provider,
    latencyMs: profile.latencyMs,
    fallback: true,
  };
}
