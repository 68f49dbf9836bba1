/**
 * nacos-naming-kit
 *
 * Typed client for the Nacos naming HTTP API, plus the configuration,
 * diagnostics and registration agent built on it.
 * Portable, testable, dependency-injected.
 */

// Core interfaces
export * from '#/core';

// Constants (API paths, defaults)
export * from '#/constants';

// Errors (four failure kinds)
export * from '#/errors';

// Schemas (Zod validation)
export * from '#/schemas';

// Friendly parse errors (JSON/YAML)
export * from '#/friendly-errors';

// Formatters (pure utilities)
export * from '#/formatters';

// Registry (resolution, transport, client)
export * from '#/registry';

// Configuration (environment, .env, YAML)
export * from '#/config';

// Logging (winston)
export * from '#/logger';

// Diagnostics (preflight checks)
export {
  checkDns,
  checkLocalPort,
  checkTcp,
  probeHealth,
  runPreflight,
  type CheckName,
  type CheckResult,
  type CheckStatus,
  type HealthCheckResult,
  type HealthProbe,
  type PreflightDeps,
  type PreflightOptions,
  type PreflightReport,
} from '#/diagnostics';

// Environment validation
export * from '#/validation';

// Registration agent
export * from '#/agent';

// CLI
export { createNodeIo, createProgram, runCli, type CliIo } from '#/commands';
