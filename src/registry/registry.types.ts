/**
 * Registry types and interfaces
 *
 * Typed shapes for the Nacos naming API. The wire format is validated in
 * #/schemas; these are the normalized results callers see.
 */

import type { Instance } from "#/schemas";

/**
 * One registered endpoint. Identified by (serviceName, ip, port)
 * within a group/cluster.
 */
export type ServiceInstance = Instance;

/**
 * Point-in-time result of an instance-list query. Never cached.
 */
export interface ServiceSnapshot {
  serviceName: string;
  groupName: string;
  /** Cluster filter echoed by the server (comma separated, may be empty) */
  clusters: string;
  cacheMillis: number;
  instances: ServiceInstance[];
}

export interface ServiceDetail {
  serviceName: string;
  groupName: string;
  namespaceId?: string;
  clusters: string[];
  protectThreshold: number;
  metadata: Record<string, string>;
  /** Present only when the server reports it */
  instanceCount?: number;
}

export interface HeartbeatResult {
  /** Server's lightweight flag: true means beats may omit the full instance payload */
  lightBeatEnabled: boolean;
  /** Server-suggested beat cadence in ms */
  clientBeatInterval?: number;
  code?: number;
}

export interface OperationResult {
  ok: true;
  /** Raw response text (Nacos answers "ok") */
  message: string;
}

export interface DeregisterResult {
  ok: true;
  /** Set when the instance was already absent */
  subcode?: "not_found";
}

/**
 * Endpoint configuration. Immutable once the client is built.
 */
export interface RegistryEndpoint {
  /** scheme://host[:port], no trailing slash */
  baseUrl: string;
  username?: string;
  password?: string;
  /** Per-request bound, default 8000 */
  timeoutMs?: number;
  /** Overrides the server-reported token TTL */
  tokenTtlMs?: number;
  namespaceId?: string;
}

/** Options every call accepts */
export interface CallOptions {
  signal?: AbortSignal;
}

interface Scoped {
  groupName?: string;
  namespaceId?: string;
}

export interface ListInstancesOptions extends Scoped, CallOptions {
  /** Cluster names to filter on */
  clusters?: string[];
  healthyOnly?: boolean;
}

export interface ServiceDetailOptions extends Scoped, CallOptions {}

export interface InstanceKey extends Scoped {
  serviceName: string;
  ip: string;
  port: number;
  clusterName?: string;
}

export interface RegisterInstanceInput extends InstanceKey {
  weight?: number;
  ephemeral?: boolean;
  healthy?: boolean;
  enabled?: boolean;
  metadata?: Record<string, string>;
}

export interface DeregisterInstanceInput extends InstanceKey {
  ephemeral?: boolean;
}

export interface HeartbeatInput extends InstanceKey {
  weight?: number;
  metadata?: Record<string, string>;
}

/**
 * Registry client interface.
 * The agent and CLI depend on this, not on the concrete class.
 */
export interface RegistryClient {
  listInstances(serviceName: string, options?: ListInstancesOptions): Promise<ServiceSnapshot>;
  getServiceDetail(serviceName: string, options?: ServiceDetailOptions): Promise<ServiceDetail>;
  registerInstance(input: RegisterInstanceInput, options?: CallOptions): Promise<OperationResult>;
  deregisterInstance(input: DeregisterInstanceInput, options?: CallOptions): Promise<DeregisterResult>;
  sendHeartbeat(input: HeartbeatInput, options?: CallOptions): Promise<HeartbeatResult>;
}
