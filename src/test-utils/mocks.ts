/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import { z } from "zod";
import type { Clock, FileReader, HttpClient, Logger, NetworkProbe, Sleeper } from "#/core";

/**
 * One request seen by a mock HttpClient
 */
export interface RecordedCall {
  method: string;
  url: URL;
  headers: Record<string, string>;
  body?: string;
}

function recordCall(url: string, options?: RequestInit): RecordedCall {
  const headers: Record<string, string> = {};
  new Headers(options?.headers).forEach((value, key) => {
    headers[key] = value;
  });
  return {
    method: options?.method ?? "GET",
    url: new URL(url),
    headers,
    body: typeof options?.body === "string" ? options.body : undefined,
  };
}

type MockRoute = Response | ((call: RecordedCall) => Response | Promise<Response>);

/**
 * Create a mock HttpClient with predefined responses.
 * Routes are keyed by "METHOD /path" (query string ignored).
 * Unknown routes answer 404.
 */
export function createMockHttpClient(
  routes: Map<string, MockRoute> = new Map()
): HttpClient & { routes: Map<string, MockRoute>; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];

  return {
    routes,
    calls,

    async fetch(url: string, options?: RequestInit): Promise<Response> {
      const call = recordCall(url, options);
      calls.push(call);

      const route = routes.get(`${call.method} ${call.url.pathname}`);
      if (!route) {
        return new Response(null, { status: 404, statusText: "Not Found" });
      }

      return typeof route === "function" ? route(call) : route.clone();
    },
  };
}

/**
 * HttpClient whose requests never complete on their own.
 * They reject with the abort reason once the request signal fires.
 */
export function createHangingHttpClient(): HttpClient & { calls: RecordedCall[]; readonly aborted: number } {
  const calls: RecordedCall[] = [];
  let aborted = 0;

  return {
    calls,
    get aborted() {
      return aborted;
    },

    fetch(url: string, options?: RequestInit): Promise<Response> {
      calls.push(recordCall(url, options));
      return new Promise<Response>((_resolve, reject) => {
        const signal = options?.signal;
        if (!signal) return;
        signal.addEventListener(
          "abort",
          () => {
            aborted++;
            reject(signal.reason);
          },
          { once: true }
        );
      });
    },
  };
}

/**
 * HttpClient that rejects like Node's fetch does on socket failures:
 * TypeError("fetch failed") with a coded cause.
 */
export function createFailingHttpClient(code: string, message = `${code} test`): HttpClient {
  return {
    async fetch(): Promise<Response> {
      const cause = Object.assign(new Error(message), { code });
      throw new TypeError("fetch failed", { cause });
    },
  };
}

interface FakeInstance {
  ip: string;
  port: number;
  weight: number;
  healthy: boolean;
  enabled: boolean;
  ephemeral: boolean;
  clusterName: string;
  serviceName: string;
  groupName: string;
  metadata: Record<string, string>;
}

export interface FakeRegistryOptions {
  credentials?: { username: string; password: string };
  /** Seconds, as the server reports it */
  tokenTtl?: number;
}

export interface FakeRegistry extends HttpClient {
  instances: Map<string, FakeInstance>;
  calls: RecordedCall[];
  issuedTokens: string[];
  /** Answer the next N authenticated requests with `rejectStatus`, whatever the token */
  rejectNext: number;
  rejectStatus: 401 | 403;
}

const MetadataParam = z.record(z.string(), z.string());

/**
 * In-process stand-in for the Nacos naming endpoints the client uses.
 */
export function createFakeRegistry(options: FakeRegistryOptions = {}): FakeRegistry {
  const instances = new Map<string, FakeInstance>();
  const calls: RecordedCall[] = [];
  const issuedTokens: string[] = [];

  const registry: FakeRegistry = {
    instances,
    calls,
    issuedTokens,
    rejectNext: 0,
    rejectStatus: 401,

    async fetch(url: string, init?: RequestInit): Promise<Response> {
      const call = recordCall(url, init);
      calls.push(call);

      const params = new URLSearchParams(call.url.search);
      if (call.body) {
        new URLSearchParams(call.body).forEach((value, key) => params.set(key, value));
      }
      const route = `${call.method} ${call.url.pathname}`;

      if (route === "POST /nacos/v1/auth/login") {
        const creds = options.credentials;
        if (!creds || params.get("username") !== creds.username || params.get("password") !== creds.password) {
          return textResponse("unknown user!", 403);
        }
        const token = `token-${issuedTokens.length + 1}`;
        issuedTokens.push(token);
        return jsonResponse({ accessToken: token, tokenTtl: options.tokenTtl ?? 18000, globalAdmin: false });
      }

      if (options.credentials) {
        if (registry.rejectNext > 0) {
          registry.rejectNext--;
          return textResponse("token expired!", registry.rejectStatus);
        }
        const token = params.get("accessToken");
        if (!token || !issuedTokens.includes(token)) {
          return textResponse("token invalid!", 401);
        }
      }

      const serviceName = params.get("serviceName") ?? "";
      const groupName = params.get("groupName") ?? "DEFAULT_GROUP";
      const key = `${groupName}@@${serviceName}#${params.get("ip")}:${params.get("port")}`;

      switch (route) {
        case "POST /nacos/v1/ns/instance": {
          const metadata = params.get("metadata");
          instances.set(key, {
            ip: params.get("ip") ?? "",
            port: Number(params.get("port")),
            weight: Number(params.get("weight") ?? "1"),
            healthy: params.get("healthy") !== "false",
            enabled: params.get("enabled") !== "false",
            ephemeral: params.get("ephemeral") !== "false",
            clusterName: params.get("clusterName") ?? "DEFAULT",
            serviceName: `${groupName}@@${serviceName}`,
            groupName,
            metadata: metadata ? MetadataParam.parse(JSON.parse(metadata)) : {},
          });
          return textResponse("ok");
        }

        case "DELETE /nacos/v1/ns/instance": {
          if (!instances.delete(key)) {
            return textResponse(`instance not found, ip=${params.get("ip")}`, 404);
          }
          return textResponse("ok");
        }

        case "PUT /nacos/v1/ns/instance/beat": {
          if (!instances.has(key)) {
            return jsonResponse({ clientBeatInterval: 5000, code: 20404, lightBeatEnabled: true });
          }
          return jsonResponse({ clientBeatInterval: 5000, code: 10200, lightBeatEnabled: true });
        }

        case "GET /nacos/v1/ns/instance/list": {
          const healthyOnly = params.get("healthyOnly") === "true";
          const hosts = [...instances.values()]
            .filter((i) => i.groupName === groupName && i.serviceName === `${groupName}@@${serviceName}`)
            .filter((i) => !healthyOnly || i.healthy)
            .map(({ groupName: _group, ...host }) => host);
          return jsonResponse({
            name: `${groupName}@@${serviceName}`,
            groupName,
            clusters: params.get("clusters") ?? "",
            cacheMillis: 10000,
            hosts,
          });
        }

        case "GET /nacos/v1/ns/service": {
          const members = [...instances.values()].filter(
            (i) => i.serviceName === `${groupName}@@${serviceName}`
          );
          if (members.length === 0) {
            return textResponse(`service ${serviceName} is not found!`, 404);
          }
          return jsonResponse({
            namespaceId: "public",
            groupName,
            name: serviceName,
            protectThreshold: 0,
            metadata: {},
            clusters: [...new Set(members.map((m) => m.clusterName))].map((name) => ({ name })),
          });
        }

        default:
          return new Response(null, { status: 404, statusText: "Not Found" });
      }
    },
  };

  return registry;
}

/**
 * Create a mock NetworkProbe. Hosts/ports not listed succeed
 * (resolve to 127.0.0.1); listed Errors are thrown.
 */
export function createMockNetworkProbe(failures: {
  dns?: Record<string, Error>;
  tcp?: Record<string, Error>;
  bind?: Record<number, Error>;
} = {}): NetworkProbe & { connects: string[] } {
  const connects: string[] = [];

  return {
    connects,

    async resolve(host: string): Promise<string[]> {
      const error = failures.dns?.[host];
      if (error) throw error;
      return ["127.0.0.1"];
    },

    async connect(host: string, port: number): Promise<void> {
      connects.push(`${host}:${port}`);
      const error = failures.tcp?.[`${host}:${port}`];
      if (error) throw error;
    },

    async bind(port: number): Promise<void> {
      const error = failures.bind?.[port];
      if (error) throw error;
    },
  };
}

/**
 * Manually advanced clock
 */
export function createMockClock(start = 1_700_000_000_000): Clock & { advance(ms: number): void } {
  let current = start;
  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
  };
}

/**
 * Sleeper that returns immediately and records requested delays.
 * `onSleep` runs before returning, e.g. to stop a loop after N iterations.
 */
export function createImmediateSleeper(
  onSleep?: (ms: number, count: number) => void
): Sleeper & { delays: number[] } {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
    onSleep?.(ms, delays.length);
  };
  return Object.assign(sleep, { delays });
}

export interface LogEntry {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  meta?: Record<string, unknown>;
}

/**
 * Logger that keeps every entry in memory
 */
export function createMockLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const log = (level: LogEntry["level"]) => (message: string, meta?: Record<string, unknown>) => {
    entries.push({ level, message, meta });
  };
  return {
    entries,
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}

/**
 * In-memory FileReader
 */
export function createMockFileReader(files: Record<string, string> = {}): FileReader {
  return {
    exists: (path: string) => path in files,
    readFile(path: string): string {
      const content = files[path];
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return content;
    },
  };
}

/**
 * Await a promise that must reject with the given error class.
 * Rethrows anything else so the test fails with the real error.
 */
export async function captureError<E>(
  promise: Promise<unknown>,
  type: abstract new (...args: never[]) => E
): Promise<E> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`Expected promise to reject with ${type.name}`);
}

/**
 * Helper to create a successful JSON response
 */
export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * Helper to create a plain-text response (Nacos answers "ok" to writes)
 */
export function textResponse(text: string, status = 200): Response {
  return new Response(text, {
    status,
    headers: { "Content-Type": "text/plain" },
  });
}
