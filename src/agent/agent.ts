/**
 * Registration agent
 *
 * Keeps one instance registered: registers with exponential backoff while
 * disconnected, heartbeats on a fixed interval while connected, and
 * deregisters once on stop. All waiting goes through the injected Sleeper
 * so stop() interrupts it immediately.
 */

import type { Logger } from "#/core";
import { silentLogger } from "#/core";
import { HEARTBEAT_FAILURE_THRESHOLD } from "#/constants";
import { ConfigError, describeError, isRegistryError, ProtocolError } from "#/errors";
import type { InstanceKey, RegistryClient } from "#/registry";
import type { KitConfig } from "#/schemas";
import type { AgentDeps, AgentHealth, AgentSettings, HealthSource } from "./agent.types";

/**
 * Derive agent settings from configuration.
 * Throws ConfigError when a key the agent cannot run without is missing.
 */
export function agentSettingsFromConfig(config: KitConfig): AgentSettings {
  const missing: string[] = [];
  if (!config.serviceName) missing.push("SERVICE_NAME is required");
  if (!config.publicIp) missing.push("PUBLIC_IP is required");
  if (!config.walletAddress) missing.push("WALLET_ADDRESS is required");

  const { serviceName, publicIp, walletAddress } = config;
  if (!serviceName || !publicIp || !walletAddress) {
    throw new ConfigError("Agent configuration is incomplete", missing);
  }

  return {
    serviceName,
    publicIp,
    port: config.port,
    walletAddress,
    node: config.node ?? publicIp,
    groupName: config.groupName,
    clusterName: config.clusterName,
    namespaceId: config.namespaceId,
    serverAddr: config.serverAddr,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    initialReconnectDelayMs: config.initialReconnectDelayMs,
    maxReconnectDelayMs: config.maxReconnectDelayMs,
  };
}

export class RegistrationAgent implements HealthSource {
  private settings: AgentSettings;
  private client: RegistryClient;
  private sleep: AgentDeps["sleep"];
  private logger: Logger;

  private connected = false;
  private heartbeatFailures = 0;
  private stopped = false;
  private running?: Promise<void>;
  private stopping?: Promise<void>;
  private controller = new AbortController();

  constructor(settings: AgentSettings, deps: AgentDeps) {
    this.settings = settings;
    this.client = deps.client;
    this.sleep = deps.sleep;
    this.logger = deps.logger ?? silentLogger;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  private get key(): InstanceKey {
    return {
      serviceName: this.settings.serviceName,
      ip: this.settings.publicIp,
      port: this.settings.port,
      groupName: this.settings.groupName,
      clusterName: this.settings.clusterName,
      namespaceId: this.settings.namespaceId,
    };
  }

  private get metadata(): Record<string, string> {
    return { walletAddress: this.settings.walletAddress, node: this.settings.node };
  }

  /**
   * Register once. Resolves false (and logs) on registry failures.
   */
  async registerOnce(): Promise<boolean> {
    try {
      await this.client.registerInstance(
        { ...this.key, metadata: this.metadata, ephemeral: true, enabled: true, healthy: true },
        { signal: this.controller.signal }
      );
    } catch (err) {
      if (!isRegistryError(err)) throw err;
      this.connected = false;
      if (!this.stopped) {
        this.logger.error(`Register failed: ${describeError(err)}`);
      }
      return false;
    }

    this.connected = true;
    this.heartbeatFailures = 0;
    this.logger.info("Registered", {
      service: this.settings.serviceName,
      ip: this.settings.publicIp,
      port: this.settings.port,
      group: this.settings.groupName,
      cluster: this.settings.clusterName ?? "-",
    });
    return true;
  }

  /**
   * Send one heartbeat while connected.
   * HEARTBEAT_FAILURE_THRESHOLD consecutive failures, or a single "not
   * registered" answer, mark the agent disconnected.
   */
  async heartbeatOnce(): Promise<boolean> {
    if (!this.connected) return false;

    try {
      await this.client.sendHeartbeat(
        { ...this.key, metadata: this.metadata },
        { signal: this.controller.signal }
      );
    } catch (err) {
      if (!isRegistryError(err)) throw err;
      if (this.stopped) return false;

      if (err instanceof ProtocolError && err.subcode === "not_found") {
        this.logger.warn("Instance is no longer registered, re-registering");
        this.markDisconnected();
        return false;
      }

      this.heartbeatFailures++;
      this.logger.error(`Heartbeat failed (${this.heartbeatFailures}): ${describeError(err)}`);
      if (this.heartbeatFailures >= HEARTBEAT_FAILURE_THRESHOLD) {
        this.logger.warn("Marked disconnected after repeated heartbeat failures");
        this.markDisconnected();
      }
      return false;
    }

    this.heartbeatFailures = 0;
    this.logger.debug("Heartbeat OK");
    return true;
  }

  /**
   * Delay before reconnect attempt number `attempt` (1-based).
   *
   * @example backoffDelay(1) → 5000, backoffDelay(2) → 10000 (initial 5s, max 300s)
   */
  backoffDelay(attempt: number): number {
    const exponent = Math.max(0, attempt - 1);
    return Math.min(this.settings.initialReconnectDelayMs * 2 ** exponent, this.settings.maxReconnectDelayMs);
  }

  /**
   * Run until stop(). Calling run() again returns the same loop.
   */
  run(): Promise<void> {
    if (!this.running) {
      this.running = this.loop();
    }
    return this.running;
  }

  /**
   * Stop the loop, then deregister once. Deregistration errors are logged.
   * Every call returns the same shutdown.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  health(): AgentHealth {
    return {
      service: this.settings.serviceName,
      status: this.connected ? "UP" : "DEGRADED",
      publicIp: this.settings.publicIp,
      port: this.settings.port,
      node: this.settings.node,
      server: this.settings.serverAddr,
      group: this.settings.groupName,
      cluster: this.settings.clusterName ?? "",
    };
  }

  private async shutdown(): Promise<void> {
    this.stopped = true;
    this.controller.abort();
    // A failed loop is reported to run()'s caller; deregister regardless
    await Promise.allSettled([this.running]);

    try {
      const result = await this.client.deregisterInstance({ ...this.key, ephemeral: true });
      this.logger.info(result.subcode === "not_found" ? "Instance was already deregistered" : "Deregistered");
    } catch (err) {
      this.logger.error(`Deregister failed: ${describeError(err)}`);
    } finally {
      this.connected = false;
    }
  }

  private markDisconnected(): void {
    this.connected = false;
    this.heartbeatFailures = 0;
  }

  private async loop(): Promise<void> {
    const signal = this.controller.signal;
    let attempt = 1;

    while (!this.stopped) {
      if (this.connected) {
        await this.heartbeatOnce();
        await this.sleep(this.settings.heartbeatIntervalMs, signal);
        continue;
      }

      if (await this.registerOnce()) {
        if (attempt > 1) {
          this.logger.info("Connection re-established");
        }
        attempt = 1;
        await this.sleep(this.settings.heartbeatIntervalMs, signal);
        continue;
      }

      if (this.stopped) break;
      const delay = this.backoffDelay(attempt);
      this.logger.warn(`Register attempt #${attempt} failed, retrying in ${delay}ms`);
      attempt++;
      await this.sleep(delay, signal);
    }
  }
}
