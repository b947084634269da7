/**
 * Provider routing: turns the caller's (model, provider) preference into the
 * concrete upstream that serves the request. Pure, no I/O.
 */

export const PROVIDER_NAMES = ["openai", "anthropic"] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];
export type RequestedProvider = ProviderName | "auto";

export interface ProviderRoute {
  provider: ProviderName;
  model: string;
}

/** Model served when the caller names a provider but asks for model "auto". */
export const PROVIDER_DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: "gpt-3.5-turbo",
  anthropic: "claude-3-sonnet-20240229",
};

/** Cheapest general-purpose route, used when nothing in the request points elsewhere. */
export const DEFAULT_ROUTE: ProviderRoute = { provider: "openai", model: "gpt-3.5-turbo" };

const MODEL_PREFIXES: ReadonlyArray<{ prefix: string; provider: ProviderName }> = [
  { prefix: "gpt", provider: "openai" },
  { prefix: "claude", provider: "anthropic" },
];

/**
 * Pick the provider and model for a request.
 *
 * - explicit provider: honored; model "auto" becomes that provider's default
 * - provider "auto": a gpt-* model goes to openai, claude-* to anthropic
 * - anything else: DEFAULT_ROUTE
 */
export function selectProvider(requestedModel: string, requestedProvider: RequestedProvider): ProviderRoute {
  if (requestedProvider !== "auto") {
    const model = requestedModel === "auto" ? PROVIDER_DEFAULT_MODELS[requestedProvider] : requestedModel;
    return { provider: requestedProvider, model };
  }

  const match = MODEL_PREFIXES.find((m) => requestedModel.startsWith(m.prefix));
  if (match) return { provider: match.provider, model: requestedModel };

  return { ...DEFAULT_ROUTE };
}
