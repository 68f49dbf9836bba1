/**
 * Endpoint resolver
 *
 * Normalizes the configured server string to a RegistryEndpoint.
 * Parse once, never parse again - downstream code only sees RegistryEndpoint.
 */

import type { KitConfig } from "#/schemas";
import { ConfigError } from "#/errors";
import type { RegistryEndpoint } from "./registry.types";

export interface ServerAddress {
  scheme: "http" | "https";
  /** Bare hostname or IP, IPv6 without brackets */
  host: string;
  port: number;
  /** scheme://host:port, no trailing slash */
  url: string;
}

/**
 * Parse one server address. A missing scheme means http.
 *
 * @example
 * parseServerAddress("nacos.local:8848") → { scheme: "http", host: "nacos.local", port: 8848, url: "http://nacos.local:8848" }
 * parseServerAddress("https://nacos.example.com") → { scheme: "https", host: "nacos.example.com", port: 443, url: "https://nacos.example.com:443" }
 */
export function parseServerAddress(raw: string): ServerAddress {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new ConfigError("Registry server address is empty");
  }

  const withScheme = trimmed.includes("://") ? trimmed : `http://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    throw new ConfigError(`Invalid registry server address: ${raw}`);
  }

  const scheme = parsed.protocol.slice(0, -1);
  if (scheme !== "http" && scheme !== "https") {
    throw new ConfigError(`Unsupported scheme in registry server address: ${raw}`, [
      "Only http:// and https:// are supported",
    ]);
  }
  if (!parsed.hostname) {
    throw new ConfigError(`Registry server address has no host: ${raw}`);
  }

  const port = parsed.port ? Number(parsed.port) : scheme === "https" ? 443 : 80;
  // URL keeps IPv6 literals bracketed; resolvers and sockets want them bare
  const host = parsed.hostname.replace(/^\[(.*)\]$/, "$1");

  return { scheme, host, port, url: `${scheme}://${parsed.hostname}:${port}` };
}

/**
 * Parse a comma-separated server list, skipping blanks.
 */
export function parseServerList(raw: string): ServerAddress[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map(parseServerAddress);
}

/**
 * Resolve the client endpoint from configuration: the first listed server,
 * plus credentials when BOTH username and password are set.
 */
export function resolveEndpoint(config: KitConfig): RegistryEndpoint {
  const [first] = parseServerList(config.serverAddr);
  if (!first) {
    throw new ConfigError("NACOS_SERVER is required");
  }

  const hasCredentials = Boolean(config.username && config.password);

  return {
    baseUrl: first.url,
    username: hasCredentials ? config.username : undefined,
    password: hasCredentials ? config.password : undefined,
    timeoutMs: config.timeoutMs,
    tokenTtlMs: config.tokenTtlMs,
    namespaceId: config.namespaceId,
  };
}
