/**
 * Nacos naming client
 *
 * Calls the Nacos v1 naming HTTP API over the injected HttpClient and turns
 * responses into typed results or one of the four error kinds.
 * No retries beyond the single re-login after a 401/403.
 */

import type { Clock, HttpClient, Logger } from "#/core";
import { silentLogger, systemClock } from "#/core";
import { ConfigError, DecodeError, ProtocolError } from "#/errors";
import { safeParseJson } from "#/friendly-errors";
import {
  BeatResponseSchema,
  InstanceListResponseSchema,
  LoginResponseSchema,
  ServiceDetailResponseSchema,
  type LoginResponse,
} from "#/schemas";
import type { ZodType, ZodTypeDef } from "zod";
import {
  API_PATHS,
  DEFAULT_CLUSTER,
  DEFAULT_GROUP,
  DEFAULT_TIMEOUT_MS,
  NACOS_CODE_RESOURCE_NOT_FOUND,
  USER_AGENT,
} from "#/constants";
import type {
  CallOptions,
  DeregisterInstanceInput,
  DeregisterResult,
  HeartbeatInput,
  HeartbeatResult,
  ListInstancesOptions,
  OperationResult,
  RegisterInstanceInput,
  RegistryClient,
  RegistryEndpoint,
  ServiceDetail,
  ServiceDetailOptions,
  ServiceSnapshot,
} from "./registry.types";
import { TokenManager } from "./auth";
import { parseServerAddress } from "./resolver";
import { sendRequest, type HttpMethod, type HttpResult } from "./transport";

type Params = Record<string, string | number | boolean | undefined>;

interface RequestSpec {
  method: HttpMethod;
  path: string;
  /** Sent in the query string */
  query?: Params;
  /** Sent as an x-www-form-urlencoded body */
  form?: Params;
  signal?: AbortSignal;
}

export interface RegistryClientDeps {
  http: HttpClient;
  clock?: Clock;
  logger?: Logger;
}

// Messages Nacos uses when the instance or its service is already gone
const NOT_FOUND_BODY = /not\s*found|not\s*exist|no\s+ip/i;
const MAX_SERVER_MESSAGE = 200;

function toSearchParams(params: Params = {}): URLSearchParams {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.set(key, String(value));
    }
  }
  return search;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function isAuthRejection(status: number): boolean {
  return status === 401 || status === 403;
}

function serverMessage(result: HttpResult): string {
  const text = result.text.trim() || result.statusText;
  return text.length > MAX_SERVER_MESSAGE ? `${text.slice(0, MAX_SERVER_MESSAGE)}...` : text;
}

/**
 * Throws ConfigError unless port is an integer in [1, 65535].
 * The only input check the client performs; everything else is the server's call.
 */
export function assertPort(port: number): void {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid port: ${port}`, ["Port must be an integer between 1 and 65535"]);
  }
}

/**
 * Nacos stores services as "group@@name"; callers only want the name.
 */
function splitGroupedName(name: string): { groupName?: string; serviceName: string } {
  const index = name.indexOf("@@");
  if (index === -1) return { serviceName: name };
  return { groupName: name.slice(0, index), serviceName: name.slice(index + 2) };
}

export class NacosRegistryClient implements RegistryClient {
  private baseUrl: string;
  private timeoutMs: number;
  private namespaceId?: string;
  private username?: string;
  private password?: string;
  private tokens?: TokenManager;
  private http: HttpClient;
  private logger: Logger;

  constructor(endpoint: RegistryEndpoint, deps: RegistryClientDeps) {
    if (!endpoint.baseUrl) {
      throw new ConfigError("Registry base URL is required");
    }
    this.baseUrl = parseServerAddress(endpoint.baseUrl).url;
    this.timeoutMs = endpoint.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.namespaceId = endpoint.namespaceId;
    this.http = deps.http;
    this.logger = deps.logger ?? silentLogger;

    if (endpoint.username && endpoint.password) {
      this.username = endpoint.username;
      this.password = endpoint.password;
      this.tokens = new TokenManager(() => this.login(), deps.clock ?? systemClock, endpoint.tokenTtlMs);
    }
  }

  /**
   * Exchange the configured credentials for an access token.
   * Never retried, never authenticated itself.
   */
  async login(options: CallOptions = {}): Promise<LoginResponse> {
    if (!this.username || !this.password) {
      throw new ConfigError("Login requires both username and password");
    }

    const result = await this.send(
      {
        method: "POST",
        path: API_PATHS.login,
        form: { username: this.username, password: this.password },
        signal: options.signal,
      },
      undefined
    );
    this.ensureSuccess(result);
    return this.decode(result, LoginResponseSchema, "login response");
  }

  async listInstances(serviceName: string, options: ListInstancesOptions = {}): Promise<ServiceSnapshot> {
    const groupName = options.groupName ?? DEFAULT_GROUP;
    const clusters = options.clusters?.filter((c) => c.length > 0);

    const result = await this.request({
      method: "GET",
      path: API_PATHS.instanceList,
      query: {
        serviceName,
        groupName,
        clusters: clusters && clusters.length > 0 ? clusters.join(",") : undefined,
        healthyOnly: options.healthyOnly,
        namespaceId: options.namespaceId ?? this.namespaceId,
      },
      signal: options.signal,
    });
    this.ensureSuccess(result);

    const data = this.decode(result, InstanceListResponseSchema, "instance list response");
    const grouped = splitGroupedName(data.name);

    return {
      serviceName: grouped.serviceName,
      groupName: data.groupName ?? grouped.groupName ?? groupName,
      clusters: data.clusters,
      cacheMillis: data.cacheMillis,
      instances: data.hosts,
    };
  }

  async getServiceDetail(serviceName: string, options: ServiceDetailOptions = {}): Promise<ServiceDetail> {
    const groupName = options.groupName ?? DEFAULT_GROUP;

    const result = await this.request({
      method: "GET",
      path: API_PATHS.service,
      query: {
        serviceName,
        groupName,
        namespaceId: options.namespaceId ?? this.namespaceId,
      },
      signal: options.signal,
    });
    this.ensureSuccess(result);

    const data = this.decode(result, ServiceDetailResponseSchema, "service detail response");
    const grouped = splitGroupedName(data.name);

    return {
      serviceName: grouped.serviceName,
      groupName: data.groupName ?? grouped.groupName ?? groupName,
      namespaceId: data.namespaceId,
      clusters: data.clusters.map((c) => c.name),
      protectThreshold: data.protectThreshold,
      metadata: data.metadata,
      instanceCount: data.ipCount ?? data.instanceCount,
    };
  }

  async registerInstance(input: RegisterInstanceInput, options: CallOptions = {}): Promise<OperationResult> {
    assertPort(input.port);

    const result = await this.request({
      method: "POST",
      path: API_PATHS.instance,
      form: {
        serviceName: input.serviceName,
        ip: input.ip,
        port: input.port,
        groupName: input.groupName ?? DEFAULT_GROUP,
        clusterName: input.clusterName,
        weight: input.weight,
        ephemeral: input.ephemeral,
        healthy: input.healthy,
        enabled: input.enabled,
        metadata: input.metadata ? JSON.stringify(input.metadata) : undefined,
        namespaceId: input.namespaceId ?? this.namespaceId,
      },
      signal: options.signal,
    });
    this.ensureSuccess(result);

    return { ok: true, message: result.text.trim() };
  }

  async deregisterInstance(input: DeregisterInstanceInput, options: CallOptions = {}): Promise<DeregisterResult> {
    assertPort(input.port);

    const result = await this.request({
      method: "DELETE",
      path: API_PATHS.instance,
      query: {
        serviceName: input.serviceName,
        ip: input.ip,
        port: input.port,
        groupName: input.groupName ?? DEFAULT_GROUP,
        clusterName: input.clusterName,
        ephemeral: input.ephemeral,
        namespaceId: input.namespaceId ?? this.namespaceId,
      },
      signal: options.signal,
    });

    if (isSuccess(result.status)) {
      return { ok: true };
    }

    // Already absent counts as deregistered, but the caller can still see it
    const absent =
      result.status === 404 ||
      (result.status >= 400 && !isAuthRejection(result.status) && NOT_FOUND_BODY.test(result.text));
    if (absent) {
      this.logger.debug("Deregister target already absent", {
        serviceName: input.serviceName,
        ip: input.ip,
        port: input.port,
        status: result.status,
      });
      return { ok: true, subcode: "not_found" };
    }

    throw new ProtocolError(result.status, serverMessage(result));
  }

  async sendHeartbeat(input: HeartbeatInput, options: CallOptions = {}): Promise<HeartbeatResult> {
    assertPort(input.port);

    const beat = {
      serviceName: input.serviceName,
      ip: input.ip,
      port: input.port,
      cluster: input.clusterName ?? DEFAULT_CLUSTER,
      weight: input.weight ?? 1,
      metadata: input.metadata ?? {},
      scheduled: true,
    };

    const result = await this.request({
      method: "PUT",
      path: API_PATHS.beat,
      query: {
        serviceName: input.serviceName,
        ip: input.ip,
        port: input.port,
        groupName: input.groupName ?? DEFAULT_GROUP,
        clusterName: input.clusterName,
        namespaceId: input.namespaceId ?? this.namespaceId,
        beat: JSON.stringify(beat),
      },
      signal: options.signal,
    });
    this.ensureSuccess(result);

    const data = this.decode(result, BeatResponseSchema, "heartbeat response");
    if (data.code === NACOS_CODE_RESOURCE_NOT_FOUND) {
      throw new ProtocolError(
        result.status,
        `instance ${input.ip}:${input.port} of ${input.serviceName} is not registered`,
        "not_found"
      );
    }

    return {
      lightBeatEnabled: data.lightBeatEnabled,
      clientBeatInterval: data.clientBeatInterval,
      code: data.code,
    };
  }

  /**
   * Authenticated request: attaches the cached token and, on 401/403,
   * re-logs in and retries exactly once.
   */
  private async request(spec: RequestSpec): Promise<HttpResult> {
    if (!this.tokens) {
      return this.send(spec, undefined);
    }

    const token = await this.tokens.getToken(spec.signal);
    const first = await this.send(spec, token);
    if (!isAuthRejection(first.status)) {
      return first;
    }

    this.logger.debug("Access token rejected, logging in again", { status: first.status, path: spec.path });
    this.tokens.invalidate(token);
    const fresh = await this.tokens.getToken(spec.signal);
    return this.send(spec, fresh);
  }

  private async send(spec: RequestSpec, token: string | undefined): Promise<HttpResult> {
    const query = toSearchParams(spec.query);
    if (token) {
      query.set("accessToken", token);
    }

    const headers: Record<string, string> = {
      "User-Agent": USER_AGENT,
      Accept: "application/json, text/plain",
    };
    if (token) {
      headers["Authorization"] = `Bearer ${token}`;
    }

    let body: string | undefined;
    if (spec.form) {
      headers["Content-Type"] = "application/x-www-form-urlencoded";
      body = toSearchParams(spec.form).toString();
    }

    const queryString = query.toString();
    const url = `${this.baseUrl}${spec.path}${queryString ? `?${queryString}` : ""}`;

    this.logger.debug(`${spec.method} ${spec.path}`);
    const result = await sendRequest(
      this.http,
      { method: spec.method, url, headers, body },
      { timeoutMs: this.timeoutMs, signal: spec.signal }
    );
    this.logger.debug(`${spec.method} ${spec.path} -> ${result.status}`);
    return result;
  }

  private ensureSuccess(result: HttpResult): void {
    if (!isSuccess(result.status)) {
      throw new ProtocolError(result.status, serverMessage(result));
    }
  }

  private decode<Output, Input>(
    result: HttpResult,
    schema: ZodType<Output, ZodTypeDef, Input>,
    context: string
  ): Output {
    const parsed = safeParseJson(result.text, schema, context);
    if (!parsed.success) {
      throw new DecodeError(parsed.error.message, parsed.error.details);
    }
    return parsed.data;
  }
}
