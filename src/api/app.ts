import type { ErrorHandler } from "hono";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { secureHeaders } from "hono/secure-headers";
import { logger } from "../config/logger.js";
import { createGatewayRoutes } from "../gateway/routes.js";
import type { GatewayServices } from "../gateway/services.js";
import { captureError } from "../observability/sentry.js";
import { createClientIpResolver, parseTrustedProxies } from "./middleware/get-client-ip.js";
import { createHealthRoutes } from "./routes/health.js";
import { createInternalAccountRoutes } from "./routes/internal-accounts.js";

// Route layout:
//   /health, /ping                  public
//   /api/chat, /api/quota, /api/usage   API key (X-API-Key or ?api_key=)
//   /api/plans                      public
//   /internal/accounts/*            static bearer (billing integration)

export interface AppOptions {
  version: string;
  environment: string;
  corsOrigins: string[];
  trustedProxyIps?: string;
  internalApiSecret?: string;
  clock?: () => number;
}

export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof HTTPException) return err.getResponse();

  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });
  captureError(err, { route: `${c.req.method} ${c.req.path}` });

  return c.json(
    {
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    },
    500,
  );
};

export function createApp(services: GatewayServices, options: AppOptions): Hono {
  const app = new Hono();

  app.use(
    "/*",
    cors({
      origin: options.corsOrigins,
      allowMethods: ["GET", "POST"],
      allowHeaders: ["Content-Type", "Authorization", "X-API-Key"],
      exposeHeaders: ["X-RateLimit-Limit", "X-RateLimit-Remaining", "X-RateLimit-Reset", "Retry-After", "X-Request-Id"],
    }),
  );
  app.use(
    "/*",
    secureHeaders({
      contentSecurityPolicy: { defaultSrc: ["'none'"], frameAncestors: ["'none'"] },
      strictTransportSecurity: "max-age=31536000; includeSubDomains; preload",
      xFrameOptions: "DENY",
    }),
  );

  app.route(
    "/",
    createHealthRoutes({
      version: options.version,
      environment: options.environment,
      metrics: services.metrics,
      clock: options.clock,
    }),
  );
  app.route(
    "/api",
    createGatewayRoutes({
      kernel: services.kernel,
      usage: services.usage,
      plans: services.plans,
      clientIp: createClientIpResolver(parseTrustedProxies(options.trustedProxyIps)),
      clock: options.clock,
    }),
  );
  app.route("/internal/accounts", createInternalAccountRoutes(services.kernel, options.internalApiSecret));

  app.onError(errorHandler);
  return app;
}
