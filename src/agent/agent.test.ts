import { describe, test, expect } from "vitest";
import type { HttpClient } from "#/core";
import { ConfigError } from "#/errors";
import { NacosRegistryClient } from "#/registry";
import { KitConfigSchema } from "#/schemas";
import {
  createFailingHttpClient,
  createFakeRegistry,
  createImmediateSleeper,
  createMockLogger,
} from "#/test-utils/mocks";
import { RegistrationAgent, agentSettingsFromConfig } from "./agent";
import type { AgentSettings } from "./agent.types";

const WALLET = "0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed";
const INSTANCE_KEY = "DEFAULT_GROUP@@ollama#10.0.0.5:11434";

const SETTINGS: AgentSettings = {
  serviceName: "ollama",
  publicIp: "10.0.0.5",
  port: 11434,
  walletAddress: WALLET,
  node: "node-1",
  groupName: "DEFAULT_GROUP",
  serverAddr: "http://nacos.test:8848",
  heartbeatIntervalMs: 5000,
  initialReconnectDelayMs: 5000,
  maxReconnectDelayMs: 300000,
};

function clientFor(http: HttpClient): NacosRegistryClient {
  return new NacosRegistryClient({ baseUrl: "http://nacos.test:8848" }, { http });
}

async function runFor(agent: RegistrationAgent): Promise<void> {
  await agent.run();
  await agent.stop();
}

/**
 * Sleeper that stops the attached agent on its `sleeps`-th call
 */
function stoppingSleeper(sleeps: number, onSleep?: (count: number) => void) {
  let agent: RegistrationAgent | undefined;
  const sleep = createImmediateSleeper((_ms, count) => {
    onSleep?.(count);
    if (count === sleeps) {
      void agent?.stop();
    }
  });
  return {
    sleep,
    attach(target: RegistrationAgent) {
      agent = target;
    },
  };
}

describe("RegistrationAgent", () => {
  describe("agentSettingsFromConfig", () => {
    test("fills node and defaults from configuration", () => {
      const config = KitConfigSchema.parse({
        serverAddr: "nacos.test:8848",
        serviceName: "ollama",
        publicIp: "10.0.0.5",
        walletAddress: WALLET,
      });

      expect(agentSettingsFromConfig(config)).toEqual({
        serviceName: "ollama",
        publicIp: "10.0.0.5",
        port: 11434,
        walletAddress: WALLET,
        node: "10.0.0.5",
        groupName: "DEFAULT_GROUP",
        clusterName: undefined,
        namespaceId: undefined,
        serverAddr: "nacos.test:8848",
        heartbeatIntervalMs: 5000,
        initialReconnectDelayMs: 5000,
        maxReconnectDelayMs: 300000,
      });
    });

    test("lists every missing key", () => {
      const config = KitConfigSchema.parse({ serverAddr: "nacos.test:8848", serviceName: "ollama" });

      let error: unknown;
      try {
        agentSettingsFromConfig(config);
      } catch (err) {
        error = err;
      }

      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError ? error.details : []).toEqual([
        "PUBLIC_IP is required",
        "WALLET_ADDRESS is required",
      ]);
    });
  });

  describe("backoffDelay", () => {
    test("doubles from the initial delay up to the maximum", () => {
      const agent = new RegistrationAgent(SETTINGS, {
        client: clientFor(createFakeRegistry()),
        sleep: createImmediateSleeper(),
      });

      expect([1, 2, 3, 4, 5, 6, 7, 20].map((n) => agent.backoffDelay(n))).toEqual([
        5000, 10000, 20000, 40000, 80000, 160000, 300000, 300000,
      ]);
    });
  });

  describe("registerOnce", () => {
    test("registers with wallet and node metadata", async () => {
      const registry = createFakeRegistry();
      const agent = new RegistrationAgent(SETTINGS, {
        client: clientFor(registry),
        sleep: createImmediateSleeper(),
      });

      expect(await agent.registerOnce()).toBe(true);
      expect(agent.isConnected).toBe(true);
      expect(registry.instances.get(INSTANCE_KEY)?.metadata).toEqual({ walletAddress: WALLET, node: "node-1" });
      expect(registry.instances.get(INSTANCE_KEY)?.ephemeral).toBe(true);
    });

    test("resolves false and logs when the registry is unreachable", async () => {
      const logger = createMockLogger();
      const agent = new RegistrationAgent(SETTINGS, {
        client: clientFor(createFailingHttpClient("ECONNREFUSED")),
        sleep: createImmediateSleeper(),
        logger,
      });

      expect(await agent.registerOnce()).toBe(false);
      expect(agent.isConnected).toBe(false);
      expect(logger.entries.filter((e) => e.level === "error")).toHaveLength(1);
    });
  });

  describe("heartbeatOnce", () => {
    test("does nothing while disconnected", async () => {
      const registry = createFakeRegistry();
      const agent = new RegistrationAgent(SETTINGS, {
        client: clientFor(registry),
        sleep: createImmediateSleeper(),
      });

      expect(await agent.heartbeatOnce()).toBe(false);
      expect(registry.calls).toHaveLength(0);
    });

    test("disconnects after three consecutive failures", async () => {
      const registry = createFakeRegistry();
      const failing = createFailingHttpClient("ECONNRESET");
      let down = false;
      const http: HttpClient = {
        fetch: (url, init) => (down ? failing.fetch(url, init) : registry.fetch(url, init)),
      };
      const agent = new RegistrationAgent(SETTINGS, { client: clientFor(http), sleep: createImmediateSleeper() });

      await agent.registerOnce();
      down = true;

      expect(await agent.heartbeatOnce()).toBe(false);
      expect(await agent.heartbeatOnce()).toBe(false);
      expect(agent.isConnected).toBe(true);

      expect(await agent.heartbeatOnce()).toBe(false);
      expect(agent.isConnected).toBe(false);
    });

    test("a successful heartbeat resets the failure count", async () => {
      const registry = createFakeRegistry();
      const failing = createFailingHttpClient("ECONNRESET");
      let down = false;
      const http: HttpClient = {
        fetch: (url, init) => (down ? failing.fetch(url, init) : registry.fetch(url, init)),
      };
      const agent = new RegistrationAgent(SETTINGS, { client: clientFor(http), sleep: createImmediateSleeper() });

      await agent.registerOnce();
      down = true;
      await agent.heartbeatOnce();
      await agent.heartbeatOnce();
      down = false;
      expect(await agent.heartbeatOnce()).toBe(true);
      down = true;
      await agent.heartbeatOnce();
      await agent.heartbeatOnce();

      expect(agent.isConnected).toBe(true);
    });

    test("disconnects at once when the server no longer knows the instance", async () => {
      const registry = createFakeRegistry();
      const logger = createMockLogger();
      const agent = new RegistrationAgent(SETTINGS, { client: clientFor(registry), sleep: createImmediateSleeper(), logger });

      await agent.registerOnce();
      registry.instances.clear();

      expect(await agent.heartbeatOnce()).toBe(false);
      expect(agent.isConnected).toBe(false);
      expect(logger.entries).toContainEqual({
        level: "warn",
        message: "Instance is no longer registered, re-registering",
        meta: undefined,
      });
    });
  });

  describe("run", () => {
    test("registers, heartbeats every interval and deregisters on stop", async () => {
      const registry = createFakeRegistry();
      const sleeper = stoppingSleeper(3);
      const agent = new RegistrationAgent(SETTINGS, { client: clientFor(registry), sleep: sleeper.sleep });
      sleeper.attach(agent);

      await runFor(agent);

      expect(sleeper.sleep.delays).toEqual([5000, 5000, 5000]);
      expect(registry.calls.map((c) => `${c.method} ${c.url.pathname}`)).toEqual([
        "POST /nacos/v1/ns/instance",
        "PUT /nacos/v1/ns/instance/beat",
        "PUT /nacos/v1/ns/instance/beat",
        "DELETE /nacos/v1/ns/instance",
      ]);
      expect(registry.instances.size).toBe(0);
      expect(agent.isConnected).toBe(false);
    });

    test("backs off exponentially while the registry is down", async () => {
      const logger = createMockLogger();
      const sleeper = stoppingSleeper(4);
      const agent = new RegistrationAgent(SETTINGS, {
        client: clientFor(createFailingHttpClient("ECONNREFUSED")),
        sleep: sleeper.sleep,
        logger,
      });
      sleeper.attach(agent);

      await runFor(agent);

      expect(sleeper.sleep.delays).toEqual([5000, 10000, 20000, 40000]);
      expect(logger.entries.filter((e) => e.level === "warn").map((e) => e.message)).toEqual([
        "Register attempt #1 failed, retrying in 5000ms",
        "Register attempt #2 failed, retrying in 10000ms",
        "Register attempt #3 failed, retrying in 20000ms",
        "Register attempt #4 failed, retrying in 40000ms",
      ]);
      expect(logger.entries.at(-1)).toEqual({
        level: "error",
        message: "Deregister failed: [transport/connection] DELETE /nacos/v1/ns/instance failed: ECONNREFUSED test",
        meta: undefined,
      });
    });

    test("re-registers after the server drops the instance", async () => {
      const registry = createFakeRegistry();
      const sleeper = stoppingSleeper(3, (count) => {
        if (count === 1) registry.instances.clear();
      });
      const agent = new RegistrationAgent(SETTINGS, { client: clientFor(registry), sleep: sleeper.sleep });
      sleeper.attach(agent);

      await runFor(agent);

      expect(registry.calls.map((c) => c.method)).toEqual(["POST", "PUT", "POST", "DELETE"]);
    });

    test("run returns the same loop when called twice", async () => {
      const sleeper = stoppingSleeper(1);
      const agent = new RegistrationAgent(SETTINGS, { client: clientFor(createFakeRegistry()), sleep: sleeper.sleep });
      sleeper.attach(agent);

      const first = agent.run();
      expect(agent.run()).toBe(first);
      await runFor(agent);
    });
  });

  describe("stop", () => {
    test("deregisters only once", async () => {
      const registry = createFakeRegistry();
      const logger = createMockLogger();
      const agent = new RegistrationAgent(SETTINGS, { client: clientFor(registry), sleep: createImmediateSleeper(), logger });

      await agent.registerOnce();
      await agent.stop();
      await agent.stop();

      expect(registry.calls.filter((c) => c.method === "DELETE")).toHaveLength(1);
      expect(logger.entries.at(-1)?.message).toBe("Deregistered");
    });

    test("still deregisters after the loop failed", async () => {
      const registry = createFakeRegistry();
      const agent = new RegistrationAgent(SETTINGS, {
        client: clientFor(registry),
        sleep: () => Promise.reject(new Error("sleeper broke")),
      });

      await expect(agent.run()).rejects.toThrow("sleeper broke");
      await agent.stop();

      expect(registry.calls.map((c) => c.method)).toEqual(["POST", "DELETE"]);
      expect(registry.instances.size).toBe(0);
    });

    test("treats an absent instance as already deregistered", async () => {
      const logger = createMockLogger();
      const agent = new RegistrationAgent(SETTINGS, {
        client: clientFor(createFakeRegistry()),
        sleep: createImmediateSleeper(),
        logger,
      });

      await agent.stop();

      expect(logger.entries.at(-1)?.message).toBe("Instance was already deregistered");
    });
  });

  describe("health", () => {
    test("reports DEGRADED until registered, then UP", async () => {
      const agent = new RegistrationAgent(
        { ...SETTINGS, clusterName: "gpu" },
        { client: clientFor(createFakeRegistry()), sleep: createImmediateSleeper() }
      );

      expect(agent.health()).toEqual({
        service: "ollama",
        status: "DEGRADED",
        publicIp: "10.0.0.5",
        port: 11434,
        node: "node-1",
        server: "http://nacos.test:8848",
        group: "DEFAULT_GROUP",
        cluster: "gpu",
      });

      await agent.registerOnce();
      expect(agent.health().status).toBe("UP");
    });

    test("reports an empty cluster when none is configured", () => {
      const agent = new RegistrationAgent(SETTINGS, {
        client: clientFor(createFakeRegistry()),
        sleep: createImmediateSleeper(),
      });

      expect(agent.health().cluster).toBe("");
    });
  });

  test("does not send a registration for an out-of-range port", async () => {
    const registry = createFakeRegistry();
    const logger = createMockLogger();
    const agent = new RegistrationAgent({ ...SETTINGS, port: 0 }, { client: clientFor(registry), sleep: createImmediateSleeper(), logger });

    expect(await agent.registerOnce()).toBe(false);
    expect(registry.calls).toHaveLength(0);
    expect(logger.entries[0]?.message).toBe("Register failed: [config] Invalid port: 0 (Port must be an integer between 1 and 65535)");
  });
});
