/**
 * Registry module
 *
 * Typed client for the Nacos naming HTTP API: instance listing,
 * service detail, register/deregister, heartbeats and login.
 */

// Types
export * from "./registry.types";

// Resolver (server address parsing)
export {
  parseServerAddress,
  parseServerList,
  resolveEndpoint,
  type ServerAddress,
} from "./resolver";

// Transport (bounded request, failure classification)
export {
  sendRequest,
  classifyTransportCode,
  findErrorCode,
  type HttpMethod,
  type HttpRequest,
  type HttpResult,
  type SendOptions,
} from "./transport";

// Token cache
export { TokenManager, type LoginFn } from "./auth";

// Factory (client creation)
export { createRegistryClient } from "./factory";

// Client (direct access if needed)
export { NacosRegistryClient, assertPort, type RegistryClientDeps } from "./client";
