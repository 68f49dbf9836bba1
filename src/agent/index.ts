/**
 * Agent module
 *
 * Keeps one instance registered and reports its health.
 */

export * from "./agent.types";

export { RegistrationAgent, agentSettingsFromConfig } from "./agent";

export {
  HealthServer,
  routeHealthRequest,
  startHealthServer,
  type HealthResponse,
  type HealthServerOptions,
} from "./health";
