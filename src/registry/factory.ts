/**
 * Registry client factory
 *
 * Single decision point for building a client from configuration.
 */

import type { KitConfig } from "#/schemas";
import type { RegistryClient } from "./registry.types";
import { NacosRegistryClient, type RegistryClientDeps } from "./client";
import { resolveEndpoint } from "./resolver";

/**
 * Create a registry client for the configured server.
 * Throws ConfigError when the server address is missing or malformed.
 */
export function createRegistryClient(config: KitConfig, deps: RegistryClientDeps): RegistryClient {
  return new NacosRegistryClient(resolveEndpoint(config), deps);
}
