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
} from "./diagnostics";

// Server list parsing lives with the client; re-exported for preflight callers
export { parseServerList, type ServerAddress } from "#/registry";
