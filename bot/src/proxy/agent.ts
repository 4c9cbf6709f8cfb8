import type { Agent } from "http";
import { HttpsProxyAgent } from "https-proxy-agent";
import { SocksProxyAgent } from "socks-proxy-agent";

export const PROXY_PROTOCOLS = ["socks5", "socks4", "http", "https"] as const;

export function proxyProtocol(proxy: string): string | null {
  const idx = proxy.indexOf("://");
  if (idx <= 0) return null;
  return proxy.slice(0, idx).toLowerCase();
}

export function isSupportedProxy(proxy: string): boolean {
  const protocol = proxyProtocol(proxy);
  return protocol !== null && PROXY_PROTOCOLS.some((p) => p === protocol);
}

/**
 * Normalise a proxies.txt row into a URL. Rows are either full URLs or
 * `host:port[:login:password]` (treated as http).
 */
export function normalizeProxy(row: string): string | null {
  const trimmed = row.trim();
  if (!trimmed || trimmed.startsWith("#") || trimmed.startsWith("type")) return null;
  if (trimmed.includes("://")) return isSupportedProxy(trimmed) ? trimmed : null;

  const parts = trimmed.split(":");
  if (parts.length === 2) return `http://${parts[0]}:${parts[1]}`;
  if (parts.length === 4) return `http://${parts[2]}:${parts[3]}@${parts[0]}:${parts[1]}`;
  return null;
}

export function createProxyAgent(proxy: string): Agent {
  const protocol = proxyProtocol(proxy);
  if (protocol === "socks4" || protocol === "socks5") {
    return new SocksProxyAgent(proxy);
  }
  return new HttpsProxyAgent(proxy);
}
