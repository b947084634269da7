import { serve } from "@hono/node-server";
import pg from "pg";
import { DEMO_API_KEY, seedDemoAccount } from "./account/provision.js";
import { createApp } from "./api/app.js";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createDb } from "./db/index.js";
import { runMigrations } from "./db/migrate.js";
import { createGatewayServices } from "./gateway/services.js";
import { captureError, initSentry } from "./observability/sentry.js";
import { validateRequiredEnvVars } from "./validate-env.js";

const RATE_LIMIT_PURGE_INTERVAL_MS = 10 * 60 * 1000;

export const unhandledRejectionHandler = (reason: unknown) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
  captureError(reason instanceof Error ? reason : new Error(String(reason)), {
    extra: { source: "unhandledRejection" },
  });
};

export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", { error: err.message, stack: err.stack, origin });
  captureError(err, { extra: { source: "uncaughtException", origin } });
  // Process state is undefined after an uncaught exception.
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

async function main(): Promise<void> {
  validateRequiredEnvVars();
  initSentry(config.sentryDsn);

  const pool = new pg.Pool({ connectionString: config.databaseUrl });
  await runMigrations(pool);
  const db = createDb(pool);

  const services = createGatewayServices(db, config);
  await services.plans.seed();

  if (config.seedDemoAccount) {
    await seedDemoAccount({
      accounts: services.accounts,
      plans: services.plans,
      billingPeriodMs: services.billingPeriodMs,
    });
    logger.info(`Demo account ready; call the API with X-API-Key: ${DEMO_API_KEY}`);
  }

  for (const provider of ["openai", "anthropic"] as const) {
    if (!services.providers.isLive(provider)) {
      logger.warn(`No API key for ${provider}; requests routed there get fallback responses`);
    }
  }

  await services.bookkeeper.replayDeadLetters();

  const purgeTimer = setInterval(() => {
    services.rateLimitRepo.purgeStale(config.gateway.rateLimitWindowMs).catch((err: unknown) => {
      logger.warn("Rate limit purge failed", { error: err instanceof Error ? err.message : String(err) });
    });
  }, RATE_LIMIT_PURGE_INTERVAL_MS);
  purgeTimer.unref();

  const app = createApp(services, {
    version: config.version,
    environment: config.nodeEnv,
    corsOrigins: config.corsOrigins,
    trustedProxyIps: config.trustedProxyIps,
    internalApiSecret: config.internalApiSecret,
  });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info(`llm-tollgate listening on http://0.0.0.0:${info.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    clearInterval(purgeTimer);
    server.close(() => {
      pool
        .end()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error("Failed to close database pool", { error: err instanceof Error ? err.message : String(err) });
          process.exit(1);
        });
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.error("Startup failed", {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  captureError(err);
  process.exit(1);
});
