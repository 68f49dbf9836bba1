/**
 * Global constants for the Nacos naming kit
 */

export const DEFAULT_GROUP = "DEFAULT_GROUP";
export const DEFAULT_CLUSTER = "DEFAULT";

// Matches the reference `curl --max-time 8` used against the registry
export const DEFAULT_TIMEOUT_MS = 8_000;

export const DEFAULT_AGENT_PORT = 11434;
export const DEFAULT_HEARTBEAT_INTERVAL_MS = 5_000;
export const DEFAULT_INITIAL_RECONNECT_DELAY_MS = 5_000;
export const DEFAULT_MAX_RECONNECT_DELAY_MS = 300_000;
export const HEARTBEAT_FAILURE_THRESHOLD = 3;

// Refresh the access token when this fraction of its TTL is left
export const TOKEN_REFRESH_WINDOW = 0.1;

export const USER_AGENT = "nacos-naming-kit";

export const API_PATHS = {
  instanceList: "/nacos/v1/ns/instance/list",
  service: "/nacos/v1/ns/service",
  instance: "/nacos/v1/ns/instance",
  beat: "/nacos/v1/ns/instance/beat",
  login: "/nacos/v1/auth/login",
} as const;

// Probed in order; some gateways strip the /nacos prefix
export const HEALTH_PATHS = [
  "/nacos/v1/console/health",
  "/v1/console/health",
  "/nacos/v1/ns/health",
  "/v1/ns/health",
  "/nacos/",
  "/",
] as const;

// Body `code` Nacos returns for a beat against an unknown instance
export const NACOS_CODE_RESOURCE_NOT_FOUND = 20404;

// Names of groups, clusters and services: letters, digits, hyphen, underscore
export const NAME_REGEX = /^[a-zA-Z0-9_-]+$/;
