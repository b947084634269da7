/**
 * OpenAI adapter: chat completions over the public REST API.
 *
 * Without an API key the adapter is fallback-only (no `complete`).
 */

import { z } from "zod";
import { PROVIDER_DEFAULT_MODELS } from "../provider-router.js";
import { fallbackCompletion } from "./fallback.js";
import type { CompletionInput, FetchFn, ProviderAdapter, UpstreamCompletion } from "./types.js";
import { UpstreamError } from "./upstream-error.js";

export interface OpenAIAdapterConfig {
  apiKey?: string;
  /** Default: https://api.openai.com */
  baseUrl?: string;
}

const DEFAULT_BASE_URL = "https://api.openai.com";

/** OpenAI chat completion response (subset we care about) */
const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
  usage: z.object({
    prompt_tokens: z.number().int().min(0),
    completion_tokens: z.number().int().min(0),
  }),
});

export function createOpenAIAdapter(config: OpenAIAdapterConfig = {}, fetchFn: FetchFn = fetch): ProviderAdapter {
  const baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
  const apiKey = config.apiKey;

  const adapter: ProviderAdapter = {
    name: "openai",
    defaultModel: PROVIDER_DEFAULT_MODELS.openai,
    fallback: (model, prompt) => fallbackCompletion("openai", model, prompt),
  };
  if (!apiKey) return adapter;

  return {
    ...adapter,
    async complete(input: CompletionInput): Promise<UpstreamCompletion> {
      const started = Date.now();
      const res = await fetchFn(`${baseUrl}/v1/chat/completions`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: input.model,
          messages: [{ role: "user", content: input.prompt }],
          max_tokens: input.maxTokens,
        }),
        signal: input.signal,
      });

      if (!res.ok) {
        throw new UpstreamError("openai", res.status, await res.text());
      }

      const data = chatCompletionSchema.parse(await res.json());
      return {
        text: data.choices[0]?.message.content ?? "",
        tokensIn: data.usage.prompt_tokens,
        tokensOut: data.usage.completion_tokens,
        latencyMs: Date.now() - started,
      };
    },
  };
}
