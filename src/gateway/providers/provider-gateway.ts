import { logger } from "../../config/logger.js";
import type { MetricsCollector } from "../../observability/metrics.js";
import type { ProviderName, ProviderRoute } from "../provider-router.js";
import { costForTokens } from "./rate-table.js";
import type { CompletionResult, ProviderAdapter } from "./types.js";

export interface ProviderGatewayOptions {
  /** Abort a live call after this many ms and serve the fallback. */
  timeoutMs: number;
  maxOutputTokens: number;
  metrics?: MetricsCollector;
}

/**
 * Executes a routed request against the chosen provider.
 *
 * Never throws on upstream trouble: errors, non-2xx answers, malformed
 * bodies and timeouts all degrade to the adapter's fallback. The only
 * rejection is the caller's own abort, which surfaces as the signal's reason.
 */
export class ProviderGateway {
  constructor(
    private readonly adapters: Record<ProviderName, ProviderAdapter>,
    private readonly options: ProviderGatewayOptions,
  ) {}

  /** True if a live upstream is configured for the provider. */
  isLive(provider: ProviderName): boolean {
    return this.adapters[provider].complete !== undefined;
  }

  async complete(route: ProviderRoute, prompt: string, signal?: AbortSignal): Promise<CompletionResult> {
    const adapter = this.adapters[route.provider];
    this.options.metrics?.recordProviderCall(route.provider);

    if (!adapter.complete) {
      logger.debug("Provider not configured, serving fallback", { provider: route.provider, model: route.model });
      this.options.metrics?.recordFallback(route.provider);
      return adapter.fallback(route.model, prompt);
    }

    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    try {
      const upstream = await adapter.complete({
        model: route.model,
        prompt,
        maxTokens: this.options.maxOutputTokens,
        signal: combined,
      });
      const tokens = upstream.tokensIn + upstream.tokensOut;
      return {
        text: upstream.text,
        tokens,
        cost: costForTokens(route.provider, route.model, tokens),
        model: route.model,
        provider: route.provider,
        latencyMs: upstream.latencyMs,
        fallback: false,
      };
    } catch (err) {
      // The caller went away: there is nobody to serve a fallback to.
      if (signal?.aborted) throw signal.reason;

      logger.warn("UpstreamUnavailable: serving fallback response", {
        provider: route.provider,
        model: route.model,
        timedOut: timeout.aborted,
        error: err instanceof Error ? err.message : String(err),
      });
      this.options.metrics?.recordFallback(route.provider);
      return adapter.fallback(route.model, prompt);
    }
  }
}
