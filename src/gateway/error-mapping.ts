/**
 * Error mapping: translates gateway rejections into HTTP responses.
 *
 * Every refusal uses the same OpenAI-compatible error envelope so clients
 * can branch on `error.type` without parsing messages.
 */

import type { AuthDeniedReason, GatewayErrorResponse, GatewayRejection } from "./types.js";

export interface MappedError {
  status: 400 | 401 | 429;
  body: GatewayErrorResponse & Record<string, unknown>;
  headers: Record<string, string>;
}

const AUTH_MESSAGES: Record<AuthDeniedReason, string> = {
  missing_api_key: "API key required. Send it in the X-API-Key header or the api_key query parameter.",
  invalid_api_key: "Invalid API key.",
  account_inactive: "This account has been deactivated.",
};

/** Map a rejection to status, body and extra headers. */
export function mapRejection(rejection: GatewayRejection): MappedError {
  switch (rejection.kind) {
    case "auth_denied":
      return {
        status: 401,
        body: {
          error: {
            message: AUTH_MESSAGES[rejection.reason],
            type: "authentication_error",
            code: rejection.reason,
          },
        },
        headers: {},
      };

    case "quota_exceeded":
      return {
        status: 429,
        body: {
          error: {
            message: `Token quota exceeded: ${rejection.tokensUsed}/${rejection.tokensIncluded} tokens used this period. Upgrade your plan to continue.`,
            type: "quota_error",
            code: "quota_exceeded",
          },
          quota_exceeded: true,
          upgrade_url: rejection.upgradeUrl,
        },
        headers: {},
      };

    case "rate_limited":
      return {
        status: 429,
        body: {
          error: {
            message: `Rate limit exceeded: ${rejection.limit} requests per hour. Retry after ${rejection.retryAfterSeconds} seconds.`,
            type: "rate_limit_error",
            code: "rate_limit_exceeded",
          },
        },
        headers: { "Retry-After": String(rejection.retryAfterSeconds) },
      };
  }
}

/** Map a malformed request body to a 400. */
export function mapInvalidRequest(message: string): MappedError {
  return {
    status: 400,
    body: {
      error: {
        message,
        type: "invalid_request_error",
        code: "invalid_request",
      },
    },
    headers: {},
  };
}
