import { timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { Hono } from "hono";
import { z } from "zod";
import { UnknownPlanError } from "../../account/provision.js";
import { MAX_TOKEN_ALLOWANCE } from "../../account/repository-types.js";
import { logger } from "../../config/logger.js";
import type { GatewayKernel } from "../../gateway/kernel.js";

const planChangeSchema = z.object({
  tier: z.string().min(1),
  tokensIncluded: z.number().int().min(0).max(MAX_TOKEN_ALLOWANCE).optional(),
});

/**
 * Static bearer guard. With no secret configured every request is refused.
 */
export function internalSecretAuth(secret: string | undefined): MiddlewareHandler {
  return async (c, next) => {
    if (!secret) {
      logger.warn("INTERNAL_API_SECRET not configured; refusing internal request", { path: c.req.path });
      return c.json({ success: false, error: "Unauthorized" }, 401);
    }
    const bearer = c.req.header("Authorization")?.replace(/^Bearer\s+/i, "");
    if (!bearer) {
      return c.json({ success: false, error: "Unauthorized" }, 401);
    }
    const a = Buffer.from(bearer);
    const b = Buffer.from(secret);
    if (a.length !== b.length || !timingSafeEqual(a, b)) {
      return c.json({ success: false, error: "Unauthorized" }, 401);
    }
    await next();
  };
}

/**
 * Internal routes for the billing integration. Mounted at /internal/accounts.
 */
export function createInternalAccountRoutes(kernel: GatewayKernel, secret: string | undefined): Hono {
  const routes = new Hono();
  routes.use("/*", internalSecretAuth(secret));

  // POST /:id/plan  { tier, tokensIncluded? }
  routes.post("/:id/plan", async (c) => {
    let rawBody: unknown;
    try {
      rawBody = await c.req.json();
    } catch {
      return c.json({ success: false, error: "Invalid JSON body" }, 400);
    }
    const parsed = planChangeSchema.safeParse(rawBody);
    if (!parsed.success) {
      return c.json({ success: false, error: parsed.error.issues[0]?.message ?? "Invalid plan change" }, 400);
    }

    const accountId = c.req.param("id");
    try {
      const account = await kernel.applyPlanChange(accountId, parsed.data);
      if (!account) return c.json({ success: false, error: `Account not found: ${accountId}` }, 404);
      return c.json({ success: true, tier: account.tier, tokensIncluded: account.tokensIncluded });
    } catch (err) {
      if (err instanceof UnknownPlanError) {
        return c.json({ success: false, error: err.message }, 400);
      }
      throw err;
    }
  });

  routes.post("/:id/deactivate", async (c) => {
    const accountId = c.req.param("id");
    const found = await kernel.deactivate(accountId);
    if (!found) return c.json({ success: false, error: `Account not found: ${accountId}` }, 404);
    return c.json({ success: true });
  });

  return routes;
}
