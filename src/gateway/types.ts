/**
 * Gateway types: request/response shapes and the rejection taxonomy.
 *
 * Callers send one prompt per request to POST /api/chat. The gateway
 * authenticates, rate-limits, quota-checks, routes to an upstream provider,
 * debits quota, records usage, and responds.
 */

/** OpenAI-style error envelope used by every rejection. */
export interface GatewayErrorResponse {
  error: {
    message: string;
    type: string;
    code: string;
  };
}

export type AuthDeniedReason = "missing_api_key" | "invalid_api_key" | "account_inactive";

/** Current fixed-window state for the caller, echoed as X-RateLimit-* headers. */
export interface RateLimitInfo {
  limit: number;
  remaining: number;
  /** Epoch ms at which the window resets. */
  resetAt: number;
}

/** User-visible reasons a request is refused before any provider call. */
export type GatewayRejection =
  | { kind: "auth_denied"; reason: AuthDeniedReason }
  | { kind: "quota_exceeded"; tokensUsed: number; tokensIncluded: number; upgradeUrl: string }
  | { kind: "rate_limited"; limit: number; retryAfterSeconds: number; resetAt: number };

export type RejectionKind = GatewayRejection["kind"];

/** Response body of a completed chat request. */
export interface ChatResponse {
  response: string;
  model_used: string;
  provider: string;
  tokens_used: number;
  /** USD */
  cost: number;
  /** Seconds */
  response_time: number;
  total_tokens_used: number;
  remaining_quota: number;
  quota_percentage: number;
}
