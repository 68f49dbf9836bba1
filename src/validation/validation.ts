/**
 * Environment validation
 *
 * Checks the agent's environment before it starts and reports every
 * problem at once instead of failing on the first one.
 */

import type { EnvSource } from "#/config";
import { DEFAULT_GROUP, NAME_REGEX } from "#/constants";
import { isRegistryError } from "#/errors";
import { parseServerList } from "#/registry";
import { PortSchema } from "#/schemas";
import { hasAddressFormat, isEthereumAddress } from "./wallet";

export type EnvCheckLevel = "ok" | "warn" | "error";

export interface EnvCheck {
  key: string;
  level: EnvCheckLevel;
  message: string;
}

export interface EnvReport {
  ok: boolean;
  checks: EnvCheck[];
}

const IPV4_REGEX = /^(?:(?:25[0-5]|2[0-4]\d|[01]?\d\d?)\.){3}(?:25[0-5]|2[0-4]\d|[01]?\d\d?)$/;
// Full eight-group form only; "::" shorthand is not accepted
const IPV6_REGEX = /^(?:[0-9a-fA-F]{1,4}:){7}[0-9a-fA-F]{1,4}$/;

const DURATION_KEYS = [
  "NACOS_HTTP_TIMEOUT",
  "NACOS_TOKEN_TTL",
  "HEARTBEAT_INTERVAL",
  "INITIAL_RECONNECT_DELAY",
  "MAX_RECONNECT_DELAY",
] as const;

const EXPORT_KEYS = [
  "NACOS_SERVER",
  "PUBLIC_IP",
  "PORT",
  "SERVICE_NAME",
  "WALLET_ADDRESS",
  "NACOS_USERNAME",
  "NACOS_PASSWORD",
  "NACOS_GROUP",
  "NACOS_CLUSTER",
  "NODE",
] as const;

type Check = (value: string) => Omit<EnvCheck, "key">;

const ok = (message: string) => ({ level: "ok", message }) as const;
const fail = (message: string) => ({ level: "error", message }) as const;

export function isIpAddress(value: string): boolean {
  return IPV4_REGEX.test(value) || IPV6_REGEX.test(value);
}

const checkWallet: Check = (value) => {
  if (!hasAddressFormat(value)) {
    return fail(`invalid wallet address: ${value}`);
  }
  return isEthereumAddress(value) ? ok("valid Ethereum address") : fail(`checksum mismatch: ${value}`);
};

const checkIp: Check = (value) =>
  isIpAddress(value) ? ok(`valid IP address: ${value}`) : fail(`invalid IP address: ${value}`);

const checkName =
  (what: string): Check =>
  (value) =>
    NAME_REGEX.test(value)
      ? ok(`valid ${what}: ${value}`)
      : fail(`${what} may only contain letters, digits, hyphens and underscores: ${value}`);

const checkServers: Check = (value) => {
  try {
    const servers = parseServerList(value);
    if (servers.length === 0) return fail("no server listed");
    return ok(`${servers.length} server(s): ${servers.map((s) => s.url).join(", ")}`);
  } catch (err) {
    if (!isRegistryError(err)) throw err;
    return fail(err.message);
  }
};

const checkPort: Check = (value) => {
  const result = PortSchema.safeParse(value);
  return result.success ? ok(`valid port: ${result.data}`) : fail(`invalid port: ${value} (must be 1-65535)`);
};

function read(env: EnvSource, key: string): string {
  return env[key]?.trim() ?? "";
}

function requiredCheck(env: EnvSource, key: string, check: Check): EnvCheck {
  const value = read(env, key);
  if (!value) return { key, level: "error", message: "not set" };
  return { key, ...check(value) };
}

/**
 * Optional keys fall back to a default when unset; a malformed value is
 * only a warning.
 */
function optionalCheck(env: EnvSource, key: string, check: Check, unsetMessage: string): EnvCheck {
  const value = read(env, key);
  if (!value) return { key, level: "ok", message: unsetMessage };
  const result = check(value);
  return { key, level: result.level === "error" ? "warn" : result.level, message: result.message };
}

function credentialsCheck(env: EnvSource): EnvCheck {
  const username = read(env, "NACOS_USERNAME");
  const password = read(env, "NACOS_PASSWORD");
  const key = "NACOS_USERNAME/NACOS_PASSWORD";

  if (!username && !password) return { key, ...ok("not set, anonymous access") };
  if (username && password) return { key, ...ok("credentials set") };
  return { key, ...fail("username and password must be set together") };
}

function durationCheck(env: EnvSource, key: string): EnvCheck {
  const value = read(env, key);
  if (!value) return { key, ...ok("using default") };

  const seconds = Number(value);
  if (Number.isNaN(seconds)) return { key, ...fail(`not a number: ${value}`) };
  if (seconds <= 0) return { key, ...fail(`must be greater than 0: ${value}`) };
  return { key, ...ok(`${seconds}s`) };
}

export function validateEnvironment(env: EnvSource): EnvReport {
  const node = read(env, "NODE");

  const checks: EnvCheck[] = [
    requiredCheck(env, "WALLET_ADDRESS", checkWallet),
    requiredCheck(env, "PUBLIC_IP", checkIp),
    requiredCheck(env, "SERVICE_NAME", checkName("service name")),
    requiredCheck(env, "NACOS_SERVER", checkServers),
    requiredCheck(env, "PORT", checkPort),
    optionalCheck(env, "NACOS_GROUP", checkName("group name"), `using ${DEFAULT_GROUP}`),
    optionalCheck(env, "NACOS_CLUSTER", checkName("cluster name"), "using the default cluster"),
    { key: "NODE", level: "ok", message: node ? `node id: ${node}` : "defaults to PUBLIC_IP" },
    credentialsCheck(env),
    ...DURATION_KEYS.map((key) => durationCheck(env, key)),
  ];

  return {
    ok: checks.every((c) => c.level !== "error"),
    checks,
  };
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Suggested `export` lines for the keys that are set, passwords masked.
 */
export function renderExports(env: EnvSource): string[] {
  const lines: string[] = [];
  for (const key of EXPORT_KEYS) {
    const value = read(env, key);
    if (!value) continue;
    const shown = key.includes("PASSWORD") ? "*".repeat(value.length) : value;
    lines.push(`export ${key}=${shellQuote(shown)}`);
  }
  return lines;
}
