import type { HttpBindings } from "@hono/node-server";
import type { Context } from "hono";

/**
 * Parse a comma-separated list of proxy addresses (TRUSTED_PROXY_IPS) into a Set.
 * Returns an empty set if the value is undefined or empty.
 */
export function parseTrustedProxies(value: string | readonly string[] | undefined): Set<string> {
  if (!value) return new Set();
  const list = typeof value === "string" ? value.split(",") : value;
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
export function getClientIp(
  xffHeader: string | undefined,
  socketAddr: string | undefined,
  trusted: ReadonlySet<string>,
): string {
  const normalizedSocket = socketAddr ? normalizeIp(socketAddr) : undefined;

  if (xffHeader && normalizedSocket && trusted.has(normalizedSocket)) {
    const parts = xffHeader.split(",");
    const last = parts[parts.length - 1]?.trim();
    if (last) return last;
  }

  if (socketAddr) return socketAddr;
  return "unknown";
}

/**
 * Extract the client IP from a Hono context served by @hono/node-server.
 * The socket is absent when the app is driven through `app.request()`.
 */
export function getClientIpFromContext<E extends { Bindings: HttpBindings }>(
  c: Context<E>,
  trusted: ReadonlySet<string>,
): string {
  const socketAddr = c.env?.incoming?.socket?.remoteAddress;
  return getClientIp(c.req.header("x-forwarded-for"), socketAddr, trusted);
}
