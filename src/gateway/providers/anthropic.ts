/**
 * Anthropic adapter: Messages API.
 *
 * Without an API key the adapter is fallback-only (no `complete`).
 */

import { z } from "zod";
import { PROVIDER_DEFAULT_MODELS } from "../provider-router.js";
import { fallbackCompletion } from "./fallback.js";
import type { CompletionInput, FetchFn, ProviderAdapter, UpstreamCompletion } from "./types.js";
import { UpstreamError } from "./upstream-error.js";

export interface AnthropicAdapterConfig {
  apiKey?: string;
  /** Default: https://api.anthropic.com */
  baseUrl?: string;
}

const DEFAULT_BASE_URL = "https://api.anthropic.com";
const ANTHROPIC_VERSION = "2023-06-01";

const messagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  usage: z.object({
    input_tokens: z.number().int().min(0),
    output_tokens: z.number().int().min(0),
  }),
});

export function createAnthropicAdapter(config: AnthropicAdapterConfig = {}, fetchFn: FetchFn = fetch): ProviderAdapter {
  const baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
  const apiKey = config.apiKey;

  const adapter: ProviderAdapter = {
    name: "anthropic",
    defaultModel: PROVIDER_DEFAULT_MODELS.anthropic,
    fallback: (model, prompt) => fallbackCompletion("anthropic", model, prompt),
  };
  if (!apiKey) return adapter;

  return {
    ...adapter,
    async complete(input: CompletionInput): Promise<UpstreamCompletion> {
      const started = Date.now();
      const res = await fetchFn(`${baseUrl}/v1/messages`, {
        method: "POST",
        headers: {
          "x-api-key": apiKey,
          "anthropic-version": ANTHROPIC_VERSION,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: input.model,
          max_tokens: input.maxTokens,
          messages: [{ role: "user", content: input.prompt }],
        }),
        signal: input.signal,
      });

      if (!res.ok) {
        throw new UpstreamError("anthropic", res.status, await res.text());
      }

      const data = messagesResponseSchema.parse(await res.json());
      const text = data.content
        .filter((block) => block.type === "text")
        .map((block) => block.text ?? "")
        .join("");
      return {
        text,
        tokensIn: data.usage.input_tokens,
        tokensOut: data.usage.output_tokens,
        latencyMs: Date.now() - started,
      };
    },
  };
}
