/**
 * Preflight diagnostics
 *
 * DNS, TCP, HTTP health and local-port checks run before the agent starts,
 * all through the injected NetworkProbe and HttpClient. Checks never throw
 * for an unreachable server; they report it.
 */

import type { HttpClient, Logger, NetworkProbe } from "#/core";
import { silentLogger } from "#/core";
import { HEALTH_PATHS } from "#/constants";
import { describeError, isRegistryError, TransportError } from "#/errors";
import { createRegistryClient, parseServerList, sendRequest, type ServerAddress } from "#/registry";
import type { KitConfig } from "#/schemas";

export type CheckName = "server" | "dns" | "tcp" | "health" | "instance-list" | "local-port";
export type CheckStatus = "pass" | "fail" | "skip";

export interface CheckResult {
  name: CheckName;
  status: CheckStatus;
  message: string;
}

export interface HealthProbe {
  path: string;
  /** HTTP status when the endpoint answered */
  status?: number;
  error?: string;
}

export interface HealthCheckResult extends CheckResult {
  probes: HealthProbe[];
}

export interface PreflightReport {
  ok: boolean;
  server?: ServerAddress;
  checks: CheckResult[];
}

export interface PreflightDeps {
  http: HttpClient;
  network: NetworkProbe;
  logger?: Logger;
}

export interface PreflightOptions {
  /** Service used for the instance-list probe; defaults to SERVICE_NAME, then "test" */
  serviceName?: string;
  /** TCP connect timeout, defaults to 5s */
  tcpTimeoutMs?: number;
}

const DEFAULT_TCP_TIMEOUT_MS = 5_000;

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function checkDns(network: NetworkProbe, host: string): Promise<CheckResult> {
  try {
    const addresses = await network.resolve(host);
    return { name: "dns", status: "pass", message: `${host} -> ${addresses.join(", ")}` };
  } catch (err) {
    return { name: "dns", status: "fail", message: `${host}: ${message(err)}` };
  }
}

export async function checkTcp(
  network: NetworkProbe,
  host: string,
  port: number,
  timeoutMs = DEFAULT_TCP_TIMEOUT_MS
): Promise<CheckResult> {
  try {
    await network.connect(host, port, timeoutMs);
    return { name: "tcp", status: "pass", message: `${host}:${port} accepts connections` };
  } catch (err) {
    return { name: "tcp", status: "fail", message: `${host}:${port}: ${message(err)}` };
  }
}

/**
 * Check the agent's own port is free to bind.
 */
export async function checkLocalPort(network: NetworkProbe, port: number, host = "0.0.0.0"): Promise<CheckResult> {
  try {
    await network.bind(port, host);
    return { name: "local-port", status: "pass", message: `${host}:${port} is available` };
  } catch (err) {
    return { name: "local-port", status: "fail", message: `${host}:${port} is unavailable: ${message(err)}` };
  }
}

/**
 * Try each known health path; passes when any of them answers.
 * Any HTTP status counts as an answer.
 */
export async function probeHealth(
  http: HttpClient,
  baseUrl: string,
  timeoutMs: number
): Promise<HealthCheckResult> {
  const root = baseUrl.replace(/\/+$/, "");
  const probes: HealthProbe[] = [];

  for (const path of HEALTH_PATHS) {
    try {
      const result = await sendRequest(http, { method: "GET", url: `${root}${path}` }, { timeoutMs });
      probes.push({ path, status: result.status });
    } catch (err) {
      if (!(err instanceof TransportError)) throw err;
      probes.push({ path, error: err.message });
    }
  }

  const answered = probes.filter((p) => p.status !== undefined).length;
  return {
    name: "health",
    status: answered > 0 ? "pass" : "fail",
    message: `${answered}/${probes.length} health endpoints answered`,
    probes,
  };
}

function skipped(name: CheckName, reason: string): CheckResult {
  return { name, status: "skip", message: reason };
}

/**
 * Run every check against the first configured server, then the local port.
 * A failed DNS or TCP check skips the checks that depend on it.
 */
export async function runPreflight(
  config: KitConfig,
  deps: PreflightDeps,
  options: PreflightOptions = {}
): Promise<PreflightReport> {
  const logger = deps.logger ?? silentLogger;
  const checks: CheckResult[] = [];
  const record = (check: CheckResult) => {
    checks.push(check);
    const line = `[${check.name}] ${check.status}: ${check.message}`;
    if (check.status === "fail") {
      logger.warn(line);
    } else {
      logger.info(line);
    }
  };

  let server: ServerAddress | undefined;
  try {
    server = parseServerList(config.serverAddr)[0];
  } catch (err) {
    if (!isRegistryError(err)) throw err;
    record({ name: "server", status: "fail", message: describeError(err) });
  }

  if (server) {
    const dns = await checkDns(deps.network, server.host);
    record(dns);

    const tcp =
      dns.status === "pass"
        ? await checkTcp(deps.network, server.host, server.port, options.tcpTimeoutMs)
        : skipped("tcp", "DNS resolution failed");
    record(tcp);

    const reachable = tcp.status === "pass";
    record(reachable ? await probeHealth(deps.http, server.url, config.timeoutMs) : skipped("health", "server unreachable"));
    record(reachable ? await checkInstanceList(config, deps, options) : skipped("instance-list", "server unreachable"));
  } else if (checks.length === 0) {
    record({ name: "server", status: "fail", message: "NACOS_SERVER lists no server" });
  }

  record(await checkLocalPort(deps.network, config.port));

  return {
    ok: checks.every((c) => c.status !== "fail"),
    server,
    checks,
  };
}

async function checkInstanceList(
  config: KitConfig,
  deps: PreflightDeps,
  options: PreflightOptions
): Promise<CheckResult> {
  const serviceName = options.serviceName ?? config.serviceName ?? "test";
  try {
    const client = createRegistryClient(config, { http: deps.http, logger: deps.logger });
    const snapshot = await client.listInstances(serviceName, { groupName: config.groupName });
    return {
      name: "instance-list",
      status: "pass",
      message: `${snapshot.instances.length} instance(s) of ${serviceName}`,
    };
  } catch (err) {
    if (!isRegistryError(err)) throw err;
    return { name: "instance-list", status: "fail", message: describeError(err) };
  }
}
