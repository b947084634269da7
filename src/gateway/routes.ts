/**
 * Caller-facing API: POST /chat plus the read-only quota, usage and plan
 * endpoints. Mounted at /api.
 */

import type { Context } from "hono";
import { Hono } from "hono";
import { z } from "zod";
import type { ClientIpResolver } from "../api/middleware/get-client-ip.js";
import type { IUsageRepository, UsageRecord } from "../monetization/metering/usage-repository.js";
import type { IPlanPolicySource } from "../monetization/plans/plan-tiers.js";
import { mapInvalidRequest, mapRejection, type MappedError } from "./error-mapping.js";
import type { GatewayKernel } from "./kernel.js";
import { PROVIDER_NAMES } from "./provider-router.js";
import { quotaPercentage, remainingQuota } from "./quota-enforcer.js";
import { rateLimitHeaders } from "./tier-rate-limit.js";

export interface GatewayRouteDeps {
  kernel: GatewayKernel;
  usage: IUsageRepository;
  plans: IPlanPolicySource;
  clientIp: ClientIpResolver;
  clock?: () => number;
}

const chatBodySchema = z.object({
  prompt: z.string().refine((p) => p.trim().length > 0, { message: "prompt must not be empty" }),
  model: z.string().min(1).default("auto"),
  provider: z.enum(["auto", ...PROVIDER_NAMES]).default("auto"),
});

const USAGE_HISTORY_DAYS = 30;
const RECENT_USAGE_LIMIT = 50;

/** API key from the X-API-Key header, else the api_key query parameter. */
export function extractApiKey(c: Context): string | null {
  return c.req.header("x-api-key") || c.req.query("api_key") || null;
}

function sendError(c: Context, mapped: MappedError, extraHeaders: Record<string, string> = {}): Response {
  return c.json(mapped.body, mapped.status, { ...extraHeaders, ...mapped.headers });
}

function serializeUsage(r: UsageRecord) {
  return {
    request_id: r.requestId,
    provider: r.provider,
    model: r.model,
    tokens: r.tokens,
    cost: r.cost.toDollars(),
    endpoint: r.endpoint,
    response_time: r.latencyMs / 1000,
    fallback: r.fallback,
    timestamp: new Date(r.timestamp).toISOString(),
  };
}

export function createGatewayRoutes(deps: GatewayRouteDeps): Hono {
  const routes = new Hono();
  const clock = deps.clock ?? Date.now;

  routes.post("/chat", async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return sendError(c, mapInvalidRequest("Request body must be valid JSON"));
    }
    const parsed = chatBodySchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const message = issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "Invalid request body";
      return sendError(c, mapInvalidRequest(message));
    }

    const outcome = await deps.kernel.chat({
      credential: extractApiKey(c),
      clientIp: deps.clientIp(c),
      prompt: parsed.data.prompt,
      model: parsed.data.model,
      provider: parsed.data.provider,
      signal: c.req.raw.signal,
    });

    switch (outcome.status) {
      case "completed":
        return c.json(outcome.body, 200, {
          "X-Request-Id": outcome.requestId,
          ...(outcome.rateLimit ? rateLimitHeaders(outcome.rateLimit) : {}),
        });
      case "rejected":
        return sendError(c, mapRejection(outcome.rejection), outcome.rateLimit ? rateLimitHeaders(outcome.rateLimit) : {});
      case "cancelled":
        // Client closed request; nobody is listening for a body.
        return new Response(null, { status: 499 });
    }
  });

  routes.get("/quota", async (c) => {
    const auth = await deps.kernel.quotaStatus(extractApiKey(c));
    if (!auth.ok) return sendError(c, mapRejection(auth.rejection));
    const account = auth.account;
    const plan = await deps.plans.lookup(account.tier);

    return c.json({
      tier: account.tier,
      tokens_included: account.tokensIncluded,
      tokens_used: account.tokensUsed,
      remaining_quota: remainingQuota(account),
      quota_percentage: quotaPercentage(account),
      period_end: new Date(account.periodEnd).toISOString(),
      rate_limit_per_hour: plan?.rateLimitPerHour ?? null,
    });
  });

  routes.get("/usage", async (c) => {
    const auth = await deps.kernel.authenticate(extractApiKey(c));
    if (!auth.ok) return sendError(c, mapRejection(auth.rejection));
    const accountId = auth.account.id;
    const now = clock();

    const [daily, models, recent] = await Promise.all([
      deps.usage.dailyAggregates(accountId, USAGE_HISTORY_DAYS, now),
      deps.usage.modelBreakdown(accountId, USAGE_HISTORY_DAYS, now),
      deps.usage.recentUsage(accountId, RECENT_USAGE_LIMIT),
    ]);

    return c.json({
      daily_usage: daily.map((d) => ({
        date: d.date,
        requests: d.requestCount,
        tokens: d.totalTokens,
        cost: d.totalCost.toDollars(),
        avg_response_time: d.avgLatencyMs / 1000,
      })),
      model_breakdown: models.map((m) => ({
        provider: m.provider,
        model: m.model,
        requests: m.requestCount,
        tokens: m.totalTokens,
        cost: m.totalCost.toDollars(),
      })),
      recent_usage: recent.map(serializeUsage),
    });
  });

  routes.get("/plans", async (c) => {
    const plans = await deps.plans.list();
    return c.json({
      plans: plans.map((p) => ({
        tier: p.id,
        tokens_per_period: p.tokensPerPeriod,
        rate_limit_per_hour: p.rateLimitPerHour,
        price_monthly: p.priceMonthly,
      })),
    });
  });

  return routes;
}
