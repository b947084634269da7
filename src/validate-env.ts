/**
 * Startup environment variable validation.
 *
 * Throws on missing critical vars. Warns on missing recommended vars.
 * Skipped in test environment.
 */
export function validateRequiredEnvVars(env: NodeJS.ProcessEnv = process.env): void {
  if (env.NODE_ENV === "test") return;

  const errors: string[] = [];
  const warnings: string[] = [];

  // --- Critical ---

  if (!env.DATABASE_URL) {
    errors.push("DATABASE_URL is required but not set");
  }

  if (env.NODE_ENV === "production" && env.SEED_DEMO_ACCOUNT === "true") {
    errors.push("SEED_DEMO_ACCOUNT must not be enabled in production");
  }

  // --- Recommended ---

  const providerKeys = ["OPENAI_API_KEY", "ANTHROPIC_API_KEY"];
  const missingKeys = providerKeys.filter((v) => !env[v]);
  if (missingKeys.length === providerKeys.length) {
    warnings.push("No provider API keys set. Every chat request will be served by the fallback responder.");
  } else if (missingKeys.length > 0) {
    warnings.push(`Missing ${missingKeys.join(", ")}. That provider will be served by the fallback responder.`);
  }

  if (!env.INTERNAL_API_SECRET) {
    warnings.push("INTERNAL_API_SECRET is not set. Plan changes and deactivations from billing will be refused.");
  }

  // --- Emit ---

  for (const w of warnings) {
    console.warn(`[env] WARNING: ${w}`);
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }
}
