import { describe, test, expect } from "vitest";
import {
  BeatResponseSchema,
  InstanceListResponseSchema,
  InstanceSchema,
  KitConfigSchema,
  LogLevelSchema,
  LoginResponseSchema,
  PortSchema,
  ServiceDetailResponseSchema,
} from "./index";

describe("schemas", () => {
  describe("PortSchema", () => {
    test("coerces numeric strings", () => {
      expect(PortSchema.parse("8848")).toBe(8848);
      expect(PortSchema.parse(1)).toBe(1);
      expect(PortSchema.parse(65535)).toBe(65535);
    });

    test("rejects out of range and fractional ports", () => {
      expect(PortSchema.safeParse(0).success).toBe(false);
      expect(PortSchema.safeParse("65536").success).toBe(false);
      expect(PortSchema.safeParse("80.5").success).toBe(false);
      expect(PortSchema.safeParse("http").success).toBe(false);
    });
  });

  describe("InstanceSchema", () => {
    test("requires ip and port", () => {
      expect(InstanceSchema.safeParse({ ip: "10.0.0.1" }).success).toBe(false);
      expect(InstanceSchema.safeParse({ port: 80 }).success).toBe(false);
    });

    test("keeps instanceId when present", () => {
      const instance = InstanceSchema.parse({ instanceId: "10.0.0.1#80#DEFAULT", ip: "10.0.0.1", port: 80 });

      expect(instance.instanceId).toBe("10.0.0.1#80#DEFAULT");
    });
  });

  describe("InstanceListResponseSchema", () => {
    test("defaults clusters and cacheMillis", () => {
      const result = InstanceListResponseSchema.parse({ name: "DEFAULT_GROUP@@test", hosts: [] });

      expect(result.clusters).toBe("");
      expect(result.cacheMillis).toBe(0);
      expect(result.groupName).toBeUndefined();
    });
  });

  describe("ServiceDetailResponseSchema", () => {
    test("defaults threshold, metadata and clusters", () => {
      const result = ServiceDetailResponseSchema.parse({ name: "test" });

      expect(result.protectThreshold).toBe(0);
      expect(result.metadata).toEqual({});
      expect(result.clusters).toEqual([]);
    });
  });

  describe("LoginResponseSchema", () => {
    test("accepts a token and TTL", () => {
      const result = LoginResponseSchema.parse({ accessToken: "token-1", tokenTtl: 18000, globalAdmin: true });

      expect(result.tokenTtl).toBe(18000);
    });

    test("rejects an empty token or non-positive TTL", () => {
      expect(LoginResponseSchema.safeParse({ accessToken: "", tokenTtl: 10 }).success).toBe(false);
      expect(LoginResponseSchema.safeParse({ accessToken: "t", tokenTtl: 0 }).success).toBe(false);
    });
  });

  describe("BeatResponseSchema", () => {
    test("defaults lightBeatEnabled to false", () => {
      expect(BeatResponseSchema.parse({})).toEqual({ lightBeatEnabled: false });
    });
  });

  describe("LogLevelSchema", () => {
    test("normalizes case and the WARNING spelling", () => {
      expect(LogLevelSchema.parse("INFO")).toBe("info");
      expect(LogLevelSchema.parse(" Warning ")).toBe("warn");
      expect(LogLevelSchema.parse("debug")).toBe("debug");
    });

    test("rejects unknown levels", () => {
      expect(LogLevelSchema.safeParse("critical").success).toBe(false);
    });
  });

  describe("KitConfigSchema", () => {
    test("applies defaults", () => {
      const config = KitConfigSchema.parse({ serverAddr: "nacos:8848" });

      expect(config).toEqual({
        serverAddr: "nacos:8848",
        groupName: "DEFAULT_GROUP",
        port: 11434,
        logLevel: "info",
        timeoutMs: 8000,
        heartbeatIntervalMs: 5000,
        initialReconnectDelayMs: 5000,
        maxReconnectDelayMs: 300000,
      });
    });

    test("converts seconds to milliseconds", () => {
      const config = KitConfigSchema.parse({
        serverAddr: "nacos:8848",
        timeoutMs: "2.5",
        tokenTtlMs: 600,
        heartbeatIntervalMs: "10",
      });

      expect(config.timeoutMs).toBe(2500);
      expect(config.tokenTtlMs).toBe(600000);
      expect(config.heartbeatIntervalMs).toBe(10000);
    });

    test("treats blank strings as unset", () => {
      const config = KitConfigSchema.parse({ serverAddr: "nacos:8848", username: "  ", groupName: "" });

      expect(config.username).toBeUndefined();
      expect(config.groupName).toBe("DEFAULT_GROUP");
    });

    test("requires a server", () => {
      const result = KitConfigSchema.safeParse({ serverAddr: " " });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.issues[0]?.message).toBe("NACOS_SERVER is required");
    });

    test("rejects non-positive timeouts", () => {
      expect(KitConfigSchema.safeParse({ serverAddr: "nacos:8848", timeoutMs: "0" }).success).toBe(false);
      expect(KitConfigSchema.safeParse({ serverAddr: "nacos:8848", timeoutMs: "-1" }).success).toBe(false);
    });
  });
});
