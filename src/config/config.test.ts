import { describe, test, expect } from "vitest";
import { collectRawConfig, loadConfig } from "./config";
import { createMockFileReader } from "#/test-utils/mocks";
import { ConfigError } from "#/errors";

function catchConfigError(load: () => unknown): ConfigError {
  try {
    load();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("Expected a ConfigError");
}

describe("loadConfig", () => {
  const noFiles = createMockFileReader();

  test("applies defaults around NACOS_SERVER", () => {
    const config = loadConfig({ env: { NACOS_SERVER: "nacos:8848" }, fs: noFiles });

    expect(config.serverAddr).toBe("nacos:8848");
    expect(config.groupName).toBe("DEFAULT_GROUP");
    expect(config.port).toBe(11434);
    expect(config.logLevel).toBe("info");
    expect(config.timeoutMs).toBe(8000);
    expect(config.heartbeatIntervalMs).toBe(5000);
    expect(config.initialReconnectDelayMs).toBe(5000);
    expect(config.maxReconnectDelayMs).toBe(300000);
    expect(config.tokenTtlMs).toBeUndefined();
  });

  test("maps every environment key", () => {
    const config = loadConfig({
      env: {
        NACOS_SERVER: "https://nacos.example.com",
        NACOS_USERNAME: "nacos",
        NACOS_PASSWORD: "test-secret",
        NACOS_NAMESPACE: "dev",
        SERVICE_NAME: "ollama",
        NACOS_GROUP: "GPU",
        NACOS_CLUSTER: "east",
        PUBLIC_IP: "203.0.113.10",
        PORT: "9000",
        WALLET_ADDRESS: "0x0000000000000000000000000000000000000001",
        NODE: "node-7",
        LOG_LEVEL: "DEBUG",
        LOG_FILE: "/tmp/agent.log",
        NACOS_HTTP_TIMEOUT: "3",
        NACOS_TOKEN_TTL: "600",
        HEARTBEAT_INTERVAL: "10",
        INITIAL_RECONNECT_DELAY: "1",
        MAX_RECONNECT_DELAY: "60",
      },
      fs: noFiles,
    });

    expect(config).toEqual({
      serverAddr: "https://nacos.example.com",
      username: "nacos",
      password: "test-secret",
      namespaceId: "dev",
      serviceName: "ollama",
      groupName: "GPU",
      clusterName: "east",
      publicIp: "203.0.113.10",
      port: 9000,
      walletAddress: "0x0000000000000000000000000000000000000001",
      node: "node-7",
      logLevel: "debug",
      logFile: "/tmp/agent.log",
      timeoutMs: 3000,
      tokenTtlMs: 600000,
      heartbeatIntervalMs: 10000,
      initialReconnectDelayMs: 1000,
      maxReconnectDelayMs: 60000,
    });
  });

  test("node defaults to the public IP", () => {
    const config = loadConfig({
      env: { NACOS_SERVER: "nacos:8848", PUBLIC_IP: "203.0.113.10" },
      fs: noFiles,
    });

    expect(config.node).toBe("203.0.113.10");
  });

  test("blank variables count as unset", () => {
    const config = loadConfig({ env: { NACOS_SERVER: "nacos:8848", PORT: "", NACOS_GROUP: "  " }, fs: noFiles });

    expect(config.port).toBe(11434);
    expect(config.groupName).toBe("DEFAULT_GROUP");
  });

  test("reads .env underneath the process environment", () => {
    const fs = createMockFileReader({ ".env": "NACOS_SERVER=dotenv:8848\nPORT=9000\n" });

    const config = loadConfig({ env: { PORT: "9100" }, fs });

    expect(config.serverAddr).toBe("dotenv:8848");
    expect(config.port).toBe(9100);
  });

  test("skips the dotenv file when disabled", () => {
    const fs = createMockFileReader({ ".env": "NACOS_SERVER=dotenv:8848\n" });

    const err = catchConfigError(() => loadConfig({ env: {}, envFile: false, fs }));

    expect(err.details).toEqual(["NACOS_SERVER: Required"]);
  });

  test("reads a YAML file underneath the environment", () => {
    const fs = createMockFileReader({
      "nacos.yaml": "serverAddr: yaml:8848\ntimeout: 3\nport: 9000\nserviceName: ollama\n",
    });

    const config = loadConfig({ env: { PORT: "9200" }, file: "nacos.yaml", fs });

    expect(config.serverAddr).toBe("yaml:8848");
    expect(config.timeoutMs).toBe(3000);
    expect(config.port).toBe(9200);
    expect(config.serviceName).toBe("ollama");
  });

  test("accepts an empty YAML file", () => {
    const fs = createMockFileReader({ "nacos.yaml": "# nothing yet\n" });

    const config = loadConfig({ env: { NACOS_SERVER: "nacos:8848" }, file: "nacos.yaml", fs });

    expect(config.serverAddr).toBe("nacos:8848");
  });

  test("throws ConfigError for a missing YAML file", () => {
    expect(() => loadConfig({ env: {}, file: "missing.yaml", fs: noFiles })).toThrow(
      "Config file not found: missing.yaml"
    );
  });

  test("throws ConfigError for unknown YAML keys", () => {
    const fs = createMockFileReader({ "nacos.yaml": "serverAdr: nacos:8848\n" });

    const err = catchConfigError(() => loadConfig({ env: {}, file: "nacos.yaml", fs }));

    expect(err.message).toBe("Invalid configuration in nacos.yaml");
    expect(err.details).toEqual(["Unrecognized key(s) in object: 'serverAdr'"]);
  });

  test("labels invalid values with their environment key", () => {
    const err = catchConfigError(() =>
      loadConfig({ env: { NACOS_SERVER: "nacos:8848", PORT: "70000", LOG_LEVEL: "loud" }, fs: noFiles })
    );

    expect(err.message).toBe("Invalid configuration");
    expect(err.details).toHaveLength(2);
    expect(err.details[0]).toBe("PORT: Port must be between 1 and 65535");
    expect(err.details[1]).toMatch(/^LOG_LEVEL: /);
  });
});

describe("collectRawConfig", () => {
  test("stringifies file numbers and prefers the environment", () => {
    const raw = collectRawConfig({ NACOS_GROUP: "GPU" }, { groupName: "CPU", port: 9000 });

    expect(raw).toEqual({ groupName: "GPU", port: "9000" });
  });
});
