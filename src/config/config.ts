/**
 * Configuration loading
 *
 * Environment keys (optionally from a .env file) override a YAML config
 * file. Everything is validated here once; the rest of the kit only sees
 * KitConfig.
 */

import { parse as parseDotenv } from "dotenv";
import type { FileReader } from "#/core";
import { nodeFileReader } from "#/core";
import { ConfigError } from "#/errors";
import { safeParseYaml } from "#/friendly-errors";
import {
  ConfigFileSchema,
  KitConfigSchema,
  type ConfigFile,
  type KitConfig,
  type KitConfigInput,
} from "#/schemas";

export type EnvSource = Record<string, string | undefined>;

interface ConfigKey {
  env: string;
  file: keyof ConfigFile;
  field: keyof KitConfigInput;
}

export const CONFIG_KEYS: readonly ConfigKey[] = [
  { env: "NACOS_SERVER", file: "serverAddr", field: "serverAddr" },
  { env: "NACOS_USERNAME", file: "username", field: "username" },
  { env: "NACOS_PASSWORD", file: "password", field: "password" },
  { env: "NACOS_NAMESPACE", file: "namespaceId", field: "namespaceId" },
  { env: "SERVICE_NAME", file: "serviceName", field: "serviceName" },
  { env: "NACOS_GROUP", file: "groupName", field: "groupName" },
  { env: "NACOS_CLUSTER", file: "clusterName", field: "clusterName" },
  { env: "PUBLIC_IP", file: "publicIp", field: "publicIp" },
  { env: "PORT", file: "port", field: "port" },
  { env: "WALLET_ADDRESS", file: "walletAddress", field: "walletAddress" },
  { env: "NODE", file: "node", field: "node" },
  { env: "LOG_LEVEL", file: "logLevel", field: "logLevel" },
  { env: "LOG_FILE", file: "logFile", field: "logFile" },
  { env: "NACOS_HTTP_TIMEOUT", file: "timeout", field: "timeoutMs" },
  { env: "NACOS_TOKEN_TTL", file: "tokenTtl", field: "tokenTtlMs" },
  { env: "HEARTBEAT_INTERVAL", file: "heartbeatInterval", field: "heartbeatIntervalMs" },
  { env: "INITIAL_RECONNECT_DELAY", file: "initialReconnectDelay", field: "initialReconnectDelayMs" },
  { env: "MAX_RECONNECT_DELAY", file: "maxReconnectDelay", field: "maxReconnectDelayMs" },
];

export interface LoadConfigOptions {
  /** Defaults to process.env */
  env?: EnvSource;
  /** Optional YAML config file */
  file?: string;
  /** dotenv file merged under `env`; false to skip. Defaults to ".env" */
  envFile?: string | false;
  fs?: FileReader;
}

/**
 * Read a dotenv file, or nothing when it does not exist.
 */
export function readEnvFile(fs: FileReader, path: string): EnvSource {
  if (!fs.exists(path)) return {};
  return parseDotenv(fs.readFile(path));
}

function readConfigFile(fs: FileReader, path: string): ConfigFile {
  if (!fs.exists(path)) {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  // An empty (or comments-only) file parses to null
  const result = safeParseYaml(fs.readFile(path), ConfigFileSchema.nullable(), path);
  if (!result.success) {
    throw new ConfigError(result.error.message, result.error.details);
  }
  return result.data ?? {};
}

function labelFor(path: ReadonlyArray<string | number>): string {
  const [field] = path;
  return CONFIG_KEYS.find((key) => key.field === field)?.env ?? path.join(".");
}

/**
 * Collect raw values by schema field. Blank values count as unset so an
 * exported-but-empty variable falls through to the file or the default.
 */
export function collectRawConfig(env: EnvSource, file: ConfigFile = {}): Record<string, string> {
  const raw: Record<string, string> = {};

  for (const key of CONFIG_KEYS) {
    const fromEnv = env[key.env]?.trim();
    const fromFile = file[key.file];
    if (fromEnv) {
      raw[key.field] = fromEnv;
    } else if (fromFile !== undefined && String(fromFile).trim() !== "") {
      raw[key.field] = String(fromFile).trim();
    }
  }

  return raw;
}

/**
 * Load and validate configuration.
 * Throws ConfigError listing every invalid key.
 */
export function loadConfig(options: LoadConfigOptions = {}): KitConfig {
  const fs = options.fs ?? nodeFileReader;
  const envFile = options.envFile ?? ".env";

  const env: EnvSource = {
    ...(envFile ? readEnvFile(fs, envFile) : {}),
    ...(options.env ?? process.env),
  };
  const file = options.file ? readConfigFile(fs, options.file) : {};

  const result = KitConfigSchema.safeParse(collectRawConfig(env, file));
  if (!result.success) {
    throw new ConfigError(
      "Invalid configuration",
      result.error.issues.map((issue) => `${labelFor(issue.path)}: ${issue.message}`)
    );
  }

  const config = result.data;
  return { ...config, node: config.node ?? config.publicIp };
}
