import type { Context } from "hono";

/** Comma-separated proxy addresses → Set. Blank entries are dropped. */
export function parseTrustedProxies(value: string | undefined): Set<string> {
  if (!value) return new Set();
  return new Set(
    value
      .split(",")
      .map((ip) => ip.trim())
      .filter(Boolean),
  );
}

function stripMappedPrefix(ip: string): string {
  return ip.startsWith("::ffff:") ? ip.slice(7) : ip;
}

/**
 * Client address for rate limiting anonymous callers.
 *
 * X-Forwarded-For is honored only when the socket peer is a trusted proxy,
 * and then only its rightmost hop. Otherwise the socket address wins.
 */
export function getClientIp(xff: string | undefined, socketAddr: string | undefined, trusted: Set<string>): string {
  if (xff && socketAddr && trusted.has(stripMappedPrefix(socketAddr))) {
    const hop = xff.split(",").pop()?.trim();
    if (hop) return hop;
  }
  return socketAddr ?? "unknown";
}

/** Socket peer from @hono/node-server's bindings; undefined under app.request(). */
function socketAddress(c: Context): string | undefined {
  const incoming = (c.env as Record<string, unknown> | undefined)?.incoming as
    | { socket?: { remoteAddress?: string } }
    | undefined;
  return incoming?.socket?.remoteAddress;
}

export type ClientIpResolver = (c: Context) => string;

export function createClientIpResolver(trusted: Set<string>): ClientIpResolver {
  return (c) => getClientIp(c.req.header("x-forwarded-for"), socketAddress(c), trusted);
}
