import { describe, test, expect } from "vitest";
import { createRegistryClient } from "./factory";
import { NacosRegistryClient } from "./client";
import { createFakeRegistry, createMockHttpClient } from "#/test-utils/mocks";
import { ConfigError } from "#/errors";
import { KitConfigSchema } from "#/schemas";

describe("factory", () => {
  describe("createRegistryClient", () => {
    test("returns a NacosRegistryClient for a valid server", () => {
      const config = KitConfigSchema.parse({ serverAddr: "nacos.local:8848" });

      const client = createRegistryClient(config, { http: createMockHttpClient() });

      expect(client).toBeInstanceOf(NacosRegistryClient);
    });

    test("talks to the first configured server", async () => {
      const registry = createFakeRegistry();
      const config = KitConfigSchema.parse({ serverAddr: "nacos-a:8848,nacos-b:8848" });

      await createRegistryClient(config, { http: registry }).listInstances("test");

      expect(registry.calls[0]?.url.host).toBe("nacos-a:8848");
    });

    test("logs in when credentials are configured", async () => {
      const registry = createFakeRegistry({ credentials: { username: "nacos", password: "test-secret" } });
      const config = KitConfigSchema.parse({
        serverAddr: "nacos.local:8848",
        username: "nacos",
        password: "test-secret",
      });

      await createRegistryClient(config, { http: registry }).listInstances("test");

      expect(registry.issuedTokens).toEqual(["token-1"]);
    });

    test("throws ConfigError for an unusable server address", () => {
      const config = KitConfigSchema.parse({ serverAddr: "ftp://nacos.local" });

      expect(() => createRegistryClient(config, { http: createMockHttpClient() })).toThrow(ConfigError);
    });
  });
});
