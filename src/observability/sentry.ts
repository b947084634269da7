import * as Sentry from "@sentry/node";
import { config } from "../config/index.js";

/**
 * Initialize Sentry SDK. Call once at startup, before the server listens.
 * Without a DSN, Sentry stays disabled and capture calls are no-ops.
 */
export function initSentry(dsn: string | undefined = config.sentryDsn): void {
  if (!dsn) return;

  Sentry.init({
    dsn,
    environment: config.nodeEnv,
    release: config.version,
    tracesSampleRate: config.nodeEnv === "production" ? 0.1 : 1.0,
    integrations: [Sentry.dedupeIntegration()],
    // Strip query params: the API key may travel as ?api_key=
    beforeBreadcrumb(breadcrumb) {
      const url = breadcrumb.data?.url;
      if (breadcrumb.category === "http" && typeof url === "string" && URL.canParse(url)) {
        const parsed = new URL(url);
        parsed.search = "";
        return { ...breadcrumb, data: { ...breadcrumb.data, url: parsed.toString() } };
      }
      return breadcrumb;
    },
  });
}

/**
 * Capture an exception in Sentry with gateway tags.
 */
export function captureError(
  error: unknown,
  context?: {
    accountId?: string;
    requestId?: string;
    route?: string;
    extra?: Record<string, unknown>;
  },
): void {
  Sentry.captureException(error, {
    tags: {
      ...(context?.accountId ? { accountId: context.accountId } : {}),
      ...(context?.requestId ? { requestId: context.requestId } : {}),
      ...(context?.route ? { route: context.route } : {}),
    },
    extra: context?.extra,
  });
}
