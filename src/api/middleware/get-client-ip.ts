import { IncomingMessage } from "node:http";
import type { Context } from "hono";

/** Build the trusted proxy set from configured addresses. */
export function parseTrustedProxies(ips: readonly string[] | string | undefined): Set<string> {
  if (!ips) return new Set();
  const list = typeof ips === "string" ? ips.split(",") : ips;
  return new Set(list.map((ip) => ip.trim()).filter(Boolean));
}

/** Strip IPv6-mapped-IPv4 prefix (::ffff:) for comparison. */
function normalizeIp(ip: string): string {
  return ip.startsWith("::ffff:") ? ip.slice(7) : ip;
}

/**
 * Determine the real client IP.
 *
 * - If `socketAddr` matches a trusted proxy, use the **last** (rightmost)
 *   value from `X-Forwarded-For` (closest hop to the trusted proxy).
 * - Otherwise, use `socketAddr` directly (XFF is untrusted).
 * - Falls back to `"unknown"` if neither is available.
 */
export function getClientIp(xffHeader: string | undefined, socketAddr: string | undefined, trusted: Set<string>): string {
  const normalizedSocket = socketAddr ? normalizeIp(socketAddr) : undefined;

  if (xffHeader && normalizedSocket && trusted.has(normalizedSocket)) {
    const parts = xffHeader.split(",");
    const last = parts[parts.length - 1]?.trim();
    if (last) return last;
  }

  if (socketAddr) return socketAddr;
  return "unknown";
}

/** Remote address of the socket, when served by @hono/node-server. */
function socketAddress(c: Context): string | undefined {
  const env: unknown = c.env;
  if (typeof env !== "object" || env === null || !("incoming" in env)) return undefined;
  const incoming = env.incoming;
  return incoming instanceof IncomingMessage ? incoming.socket.remoteAddress : undefined;
}

/** Extract the client IP from a Hono Context. */
export function getClientIpFromContext(c: Context, trusted: Set<string>): string {
  return getClientIp(c.req.header("x-forwarded-for"), socketAddress(c), trusted);
}
