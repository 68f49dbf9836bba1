import type { Logger, Sleeper } from "#/core";
import type { RegistryClient } from "#/registry";

export interface AgentSettings {
  serviceName: string;
  publicIp: string;
  port: number;
  walletAddress: string;
  node: string;
  groupName: string;
  clusterName?: string;
  namespaceId?: string;
  /** Shown in health output only */
  serverAddr: string;
  heartbeatIntervalMs: number;
  initialReconnectDelayMs: number;
  maxReconnectDelayMs: number;
}

export interface AgentDeps {
  client: RegistryClient;
  sleep: Sleeper;
  logger?: Logger;
}

export type AgentStatus = "UP" | "DEGRADED";

export interface AgentHealth {
  service: string;
  status: AgentStatus;
  publicIp: string;
  port: number;
  node: string;
  server: string;
  group: string;
  cluster: string;
}

/**
 * Anything that can report agent health; the health server only needs this.
 */
export interface HealthSource {
  health(): AgentHealth;
}
