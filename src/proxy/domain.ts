import { isIP } from "node:net";

const IPV4_RE = /^(\d{1,3}\.){3}\d{1,3}$/;

const LOOPBACK_HOSTS = new Set(["localhost", "127.0.0.1", "::1"]);

/**
 * Decide whether a routing key is a public DNS name that can get an ACME
 * certificate. IP literals, loopback names and anything under `.localhost`
 * are never public; when in doubt the answer is false.
 */
export function isPublicDomain(host: unknown): boolean {
  if (typeof host !== "string") return false;
  const normalized = host.trim().toLowerCase();
  if (!normalized) return false;

  const unbracketed = normalized.replace(/^\[(.*)\]$/, "$1");
  if (IPV4_RE.test(unbracketed) || isIP(unbracketed) !== 0) return false;
  // DNS names never contain ":".
  if (unbracketed.includes(":")) return false;
  if (LOOPBACK_HOSTS.has(normalized) || normalized.endsWith(".localhost")) return false;

  return normalized.includes(".") && !normalized.startsWith(".");
}
