import { z } from "zod";
import {
  DEFAULT_AGENT_PORT,
  DEFAULT_GROUP,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_INITIAL_RECONNECT_DELAY_MS,
  DEFAULT_MAX_RECONNECT_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
} from "#/constants";

// Nacos serializes metadata values as strings, but older servers leak numbers/booleans
const MetadataSchema = z
  .record(z.string(), z.union([z.string(), z.number(), z.boolean()]))
  .transform((record) =>
    Object.fromEntries(Object.entries(record).map(([k, v]) => [k, String(v)]))
  );

export const PortSchema = z.coerce
  .number()
  .int("Port must be an integer")
  .min(1, "Port must be between 1 and 65535")
  .max(65535, "Port must be between 1 and 65535");

// One host entry of the instance-list response
export const InstanceSchema = z.object({
  instanceId: z.string().optional(),
  ip: z.string().min(1),
  port: z.number().int(),
  weight: z.number().default(1),
  healthy: z.boolean().default(true),
  enabled: z.boolean().default(true),
  ephemeral: z.boolean().default(true),
  clusterName: z.string().default(""),
  serviceName: z.string().default(""),
  metadata: MetadataSchema.default({}),
});
export type Instance = z.infer<typeof InstanceSchema>;

// GET /nacos/v1/ns/instance/list
export const InstanceListResponseSchema = z.object({
  name: z.string(),
  groupName: z.string().optional(),
  clusters: z.string().default(""),
  cacheMillis: z.number().default(0),
  hosts: z.array(InstanceSchema),
});
export type InstanceListResponse = z.infer<typeof InstanceListResponseSchema>;

const ClusterSchema = z.object({
  name: z.string(),
});

// GET /nacos/v1/ns/service
export const ServiceDetailResponseSchema = z.object({
  namespaceId: z.string().optional(),
  groupName: z.string().optional(),
  name: z.string(),
  protectThreshold: z.number().default(0),
  metadata: MetadataSchema.default({}),
  clusters: z.array(ClusterSchema).default([]),
  // Only some server builds (and the console API) report a count
  ipCount: z.number().int().optional(),
  instanceCount: z.number().int().optional(),
});
export type ServiceDetailResponse = z.infer<typeof ServiceDetailResponseSchema>;

// POST /nacos/v1/auth/login
export const LoginResponseSchema = z.object({
  accessToken: z.string().min(1),
  tokenTtl: z.number().positive(), // seconds
  globalAdmin: z.boolean().optional(),
});
export type LoginResponse = z.infer<typeof LoginResponseSchema>;

// PUT /nacos/v1/ns/instance/beat
export const BeatResponseSchema = z.object({
  clientBeatInterval: z.number().optional(),
  code: z.number().optional(),
  lightBeatEnabled: z.boolean().default(false),
});
export type BeatResponse = z.infer<typeof BeatResponseSchema>;

const OptionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const SecondsAsMs = (fallbackMs: number) =>
  z.coerce
    .number()
    .positive("Must be greater than 0")
    .transform((seconds) => Math.round(seconds * 1000))
    .optional()
    .transform((ms) => ms ?? fallbackMs);

// winston npm levels; accepts "INFO" and "WARNING" spellings too
export const LogLevelSchema = z.preprocess(
  (v) => {
    if (typeof v !== "string") return v;
    const level = v.trim().toLowerCase();
    return level === "warning" ? "warn" : level;
  },
  z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
);
export type LogLevel = z.infer<typeof LogLevelSchema>;

// Configuration (environment keys mapped to camelCase, or a YAML file)
export const KitConfigSchema = z.object({
  serverAddr: z.string().trim().min(1, "NACOS_SERVER is required"),
  username: OptionalString,
  password: OptionalString,
  namespaceId: OptionalString,
  serviceName: OptionalString,
  groupName: OptionalString.transform((v) => v ?? DEFAULT_GROUP),
  clusterName: OptionalString,
  publicIp: OptionalString,
  port: PortSchema.optional().transform((v) => v ?? DEFAULT_AGENT_PORT),
  walletAddress: OptionalString,
  node: OptionalString,
  logLevel: LogLevelSchema.default("info"),
  logFile: OptionalString,
  timeoutMs: SecondsAsMs(DEFAULT_TIMEOUT_MS),
  tokenTtlMs: z.coerce
    .number()
    .positive("Must be greater than 0")
    .transform((seconds) => Math.round(seconds * 1000))
    .optional(),
  heartbeatIntervalMs: SecondsAsMs(DEFAULT_HEARTBEAT_INTERVAL_MS),
  initialReconnectDelayMs: SecondsAsMs(DEFAULT_INITIAL_RECONNECT_DELAY_MS),
  maxReconnectDelayMs: SecondsAsMs(DEFAULT_MAX_RECONNECT_DELAY_MS),
});
export type KitConfigInput = z.input<typeof KitConfigSchema>;
export type KitConfig = z.infer<typeof KitConfigSchema>;

const FileValue = z.union([z.string(), z.number()]).optional();

// YAML config file: same names as the environment keys, in camelCase; durations in seconds
export const ConfigFileSchema = z
  .object({
    serverAddr: FileValue,
    username: FileValue,
    password: FileValue,
    namespaceId: FileValue,
    serviceName: FileValue,
    groupName: FileValue,
    clusterName: FileValue,
    publicIp: FileValue,
    port: FileValue,
    walletAddress: FileValue,
    node: FileValue,
    logLevel: FileValue,
    logFile: FileValue,
    timeout: FileValue,
    tokenTtl: FileValue,
    heartbeatInterval: FileValue,
    initialReconnectDelay: FileValue,
    maxReconnectDelay: FileValue,
  })
  .strict();
export type ConfigFile = z.infer<typeof ConfigFileSchema>;
