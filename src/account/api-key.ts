import { createHash, randomBytes } from "node:crypto";

export const API_KEY_PREFIX = "sk_";

/** New opaque API key: `sk_` followed by 48 hex chars. */
export function generateApiKey(): string {
  return `${API_KEY_PREFIX}${randomBytes(24).toString("hex")}`;
}

/** SHA-256 hex digest; the only form in which keys are stored. */
export function hashApiKey(apiKey: string): string {
  return createHash("sha256").update(apiKey).digest("hex");
}
