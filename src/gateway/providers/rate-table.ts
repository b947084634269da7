/**
 * Per-token prices by provider and model.
 *
 * Prices are USD per token (prompt and completion tokens are billed alike).
 * Models missing from a provider's table are billed at that provider's
 * default rate.
 */

import { Credit } from "../../monetization/credit.js";
import type { ProviderName } from "../provider-router.js";

export interface ProviderRates {
  /** USD per token for models not listed below */
  defaultRate: number;
  models: Record<string, number>;
}

export const TOKEN_RATES: Record<ProviderName, ProviderRates> = {
  openai: {
    defaultRate: 0.000002,
    models: {
      "gpt-4": 0.00003,
      "gpt-4-turbo": 0.00001,
      "gpt-3.5-turbo": 0.000002,
    },
  },
  anthropic: {
    defaultRate: 0.000015,
    models: {
      "claude-3-opus-20240229": 0.000075,
      "claude-3-sonnet-20240229": 0.000015,
      "claude-3-haiku-20240307": 0.000001,
    },
  },
};

/** USD per token for a provider/model pair. */
export function tokenRate(provider: ProviderName, model: string): number {
  const rates = TOKEN_RATES[provider];
  return Object.hasOwn(rates.models, model) ? (rates.models[model] ?? rates.defaultRate) : rates.defaultRate;
}

/** Cost of `tokens` tokens on the given model. */
export function costForTokens(provider: ProviderName, model: string, tokens: number): Credit {
  return Credit.fromDollars(tokenRate(provider, model)).multiply(tokens);
}
