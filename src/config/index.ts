import { z } from "zod";

/** Env flags arrive as strings; only the literal "true" turns one on. */
const envFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

/** Treat empty strings the same as unset variables. */
function optional(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

const providerSchema = (defaultBaseUrl: string) =>
  z.object({
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().default(defaultBaseUrl),
  });

const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3100),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  version: z.string().default("0.1.0"),
  databaseUrl: z.string().min(1).default("postgres://localhost:5432/llm_tollgate"),

  /** Upstream LLM providers. A provider without an API key serves fallback responses only. */
  providers: z.object({
    openai: providerSchema("https://api.openai.com"),
    anthropic: providerSchema("https://api.anthropic.com"),
  }),

  gateway: z.object({
    /** Abort an upstream call after this many ms and serve the fallback instead. */
    upstreamTimeoutMs: z.coerce.number().int().min(1).default(30_000),
    /** Hourly threshold for anonymous callers and tiers missing from the plan table. */
    defaultRateLimitPerHour: z.coerce.number().int().min(1).default(100),
    rateLimitWindowMs: z.coerce.number().int().min(1).default(3_600_000),
    billingPeriodDays: z.coerce.number().int().min(1).default(30),
    maxOutputTokens: z.coerce.number().int().min(1).default(500),
    upgradeUrl: z.string().default("/pricing"),
  }),

  accounting: z.object({
    maxRetries: z.coerce.number().int().min(0).default(3),
    retryDelayMs: z.coerce.number().int().min(0).default(100),
    dlqPath: z.string().min(1).default("./data/accounting-dlq.jsonl"),
  }),

  /** Bearer secret for /internal/* routes. Internal routes reject everything when unset. */
  internalApiSecret: z.string().min(16).optional(),
  /** Comma-separated browser origins allowed by CORS. */
  corsOrigins: z
    .string()
    .default("http://localhost:3000")
    .transform((v) =>
      v
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean),
    ),
  trustedProxyIps: z.string().optional(),
  sentryDsn: z.string().optional(),
  seedDemoAccount: envFlag,
});

export type Config = z.infer<typeof configSchema>;

/** Build the service config from an environment map. */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    port: optional(env.PORT),
    nodeEnv: optional(env.NODE_ENV),
    logLevel: optional(env.LOG_LEVEL),
    version: optional(env.APP_VERSION),
    databaseUrl: optional(env.DATABASE_URL),
    providers: {
      openai: {
        apiKey: optional(env.OPENAI_API_KEY),
        baseUrl: optional(env.OPENAI_BASE_URL),
      },
      anthropic: {
        apiKey: optional(env.ANTHROPIC_API_KEY),
        baseUrl: optional(env.ANTHROPIC_BASE_URL),
      },
    },
    gateway: {
      upstreamTimeoutMs: optional(env.UPSTREAM_TIMEOUT_MS),
      defaultRateLimitPerHour: optional(env.DEFAULT_RATE_LIMIT_PER_HOUR),
      rateLimitWindowMs: optional(env.RATE_LIMIT_WINDOW_MS),
      billingPeriodDays: optional(env.BILLING_PERIOD_DAYS),
      maxOutputTokens: optional(env.MAX_OUTPUT_TOKENS),
      upgradeUrl: optional(env.UPGRADE_URL),
    },
    accounting: {
      maxRetries: optional(env.ACCOUNTING_MAX_RETRIES),
      retryDelayMs: optional(env.ACCOUNTING_RETRY_DELAY_MS),
      dlqPath: optional(env.ACCOUNTING_DLQ_PATH),
    },
    internalApiSecret: optional(env.INTERNAL_API_SECRET),
    corsOrigins: optional(env.CORS_ORIGINS),
    trustedProxyIps: optional(env.TRUSTED_PROXY_IPS),
    sentryDsn: optional(env.SENTRY_DSN),
    seedDemoAccount: optional(env.SEED_DEMO_ACCOUNT),
  });
}

export const config = parseConfig(process.env);
