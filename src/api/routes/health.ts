import { Hono } from "hono";
import type { MetricsCollector } from "../../observability/metrics.js";

export interface HealthInfo {
  version: string;
  environment: string;
  metrics: MetricsCollector;
  /** Minutes of metrics history reported. Default: 60 */
  windowMinutes?: number;
  clock?: () => number;
}

// Public, unauthenticated; used by load balancers and monitoring.
export function createHealthRoutes(info: HealthInfo): Hono {
  const routes = new Hono();
  const clock = info.clock ?? Date.now;
  const windowMinutes = info.windowMinutes ?? 60;

  routes.get("/health", (c) =>
    c.json({
      status: "ok",
      timestamp: new Date(clock()).toISOString(),
      version: info.version,
      environment: info.environment,
      metrics: info.metrics.getWindow(windowMinutes),
    }),
  );

  routes.get("/ping", (c) => c.text("pong"));

  return routes;
}
