/**
 * Command line interface
 *
 * Thin commander layer over the registry client, diagnostics, environment
 * validation and the registration agent. Every command reads configuration
 * through loadConfig; failures print describeError and exit with 1.
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { RegistrationAgent, agentSettingsFromConfig, startHealthServer, type HealthServer } from "#/agent";
import { loadConfig, readEnvFile, type EnvSource } from "#/config";
import type { Logger } from "#/core";
import { runPreflight, type CheckResult } from "#/diagnostics";
import { ConfigError, describeError } from "#/errors";
import { formatDuration, formatServiceDetail, formatSnapshot, maskSecret } from "#/formatters";
import { createRegistryClient, type InstanceKey, type RegistryClient } from "#/registry";
import { LogLevelSchema, type KitConfig, type LogLevel } from "#/schemas";
import { isEthereumAddress, renderExports, validateEnvironment, type EnvCheck } from "#/validation";
import type { CliIo } from "./io";

const PROGRAM_NAME = "nacos-naming";

type GlobalOptions = {
  config?: string;
  logLevel?: LogLevel;
};

interface ScopeOptions {
  group?: string;
  json?: boolean;
}

interface ListOptions extends ScopeOptions {
  cluster?: string;
  healthyOnly?: boolean;
}

interface InstanceOptions {
  service?: string;
  ip?: string;
  port?: number;
  group?: string;
  cluster?: string;
}

interface RegisterOptions extends InstanceOptions {
  weight?: number;
  meta: Record<string, string>;
}

interface CheckOptions {
  service?: string;
}

interface ValidateOptions {
  exports?: boolean;
}

interface AgentOptions {
  healthPort?: number;
  healthHost: string;
  skipPreflight?: boolean;
}

interface Session {
  config: KitConfig;
  logger: Logger;
  client: RegistryClient;
}

interface RunState {
  exitCode: number;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevel {
  const result = LogLevelSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError("Expected one of error, warn, info, http, verbose, debug, silly.");
  }
  return result.data;
}

function collectMetadata(value: string, previous: Record<string, string>): Record<string, string> {
  const index = value.indexOf("=");
  if (index <= 0) {
    throw new InvalidArgumentError("Expected key=value.");
  }
  return { ...previous, [value.slice(0, index)]: value.slice(index + 1) };
}

function renderCheck(check: CheckResult): string {
  return `[${check.status.toUpperCase()}] ${check.name}: ${check.message}`;
}

function renderEnvCheck(check: EnvCheck): string {
  return `[${check.level.toUpperCase()}] ${check.key}: ${check.message}`;
}

/**
 * Resolve which instance a write command targets: flags first, then configuration.
 */
function instanceKey(options: InstanceOptions, config: KitConfig): InstanceKey {
  const serviceName = options.service ?? config.serviceName;
  const ip = options.ip ?? config.publicIp;

  const missing: string[] = [];
  if (!serviceName) missing.push("SERVICE_NAME or --service is required");
  if (!ip) missing.push("PUBLIC_IP or --ip is required");
  if (!serviceName || !ip) {
    throw new ConfigError("Instance is not fully specified", missing);
  }

  return {
    serviceName,
    ip,
    port: options.port ?? config.port,
    groupName: options.group ?? config.groupName,
    clusterName: options.cluster ?? config.clusterName,
  };
}

function describeInstance(key: InstanceKey): string {
  return `${key.ip}:${key.port}`;
}

function describeService(key: InstanceKey): string {
  return `${key.groupName}/${key.serviceName}`;
}

/**
 * Build the program. Commands record failures in `state.exitCode`.
 */
export function createProgram(io: CliIo, state: RunState): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description("Query and maintain service instances in a Nacos registry")
    .option("-c, --config <file>", "YAML configuration file")
    .option("-l, --log-level <level>", "log level (overrides LOG_LEVEL)", parseLogLevel)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });

  const mergedEnv = (): EnvSource => ({ ...readEnvFile(io.context.fs, ".env"), ...io.env });

  const open = (): Session => {
    const globals = program.opts<GlobalOptions>();
    const config = loadConfig({ env: io.env, file: globals.config, fs: io.context.fs });
    const logger = io.createLogger({
      level: globals.logLevel ?? config.logLevel,
      file: config.logFile,
      service: config.serviceName,
    });
    const client = createRegistryClient(config, { http: io.context.http, clock: io.context.clock, logger });

    logger.debug("Configuration loaded", {
      server: config.serverAddr,
      username: config.username ?? "(anonymous)",
      password: maskSecret(config.password),
      group: config.groupName,
    });
    return { config, logger, client };
  };

  const print = (lines: string[]) => {
    for (const line of lines) io.stdout(line);
  };

  program
    .command("list <service>")
    .description("list instances of a service")
    .option("-g, --group <group>", "group name (default NACOS_GROUP)")
    .option("--cluster <names>", "comma-separated cluster filter")
    .option("--healthy-only", "only healthy instances")
    .option("--json", "print the raw result as JSON")
    .action(async (service: string, options: ListOptions) => {
      const { config, client } = open();
      const snapshot = await client.listInstances(service, {
        groupName: options.group ?? config.groupName,
        clusters: options.cluster?.split(",").map((c) => c.trim()),
        healthyOnly: options.healthyOnly,
      });
      print(options.json ? [JSON.stringify(snapshot, null, 2)] : formatSnapshot(snapshot));
    });

  program
    .command("detail <service>")
    .description("show service metadata and clusters")
    .option("-g, --group <group>", "group name (default NACOS_GROUP)")
    .option("--json", "print the raw result as JSON")
    .action(async (service: string, options: ScopeOptions) => {
      const { config, client } = open();
      const detail = await client.getServiceDetail(service, { groupName: options.group ?? config.groupName });
      print(options.json ? [JSON.stringify(detail, null, 2)] : formatServiceDetail(detail));
    });

  const instanceOptions = (command: Command) =>
    command
      .option("-s, --service <name>", "service name (default SERVICE_NAME)")
      .option("--ip <ip>", "instance IP (default PUBLIC_IP)")
      .option("-p, --port <port>", "instance port (default PORT)", parseInteger)
      .option("-g, --group <group>", "group name (default NACOS_GROUP)")
      .option("--cluster <name>", "cluster name (default NACOS_CLUSTER)");

  instanceOptions(program.command("register"))
    .description("register an instance")
    .option("-w, --weight <weight>", "instance weight", parseNumber)
    .option("-m, --meta <key=value>", "metadata entry, repeatable", collectMetadata, {})
    .action(async (options: RegisterOptions) => {
      const { config, client } = open();
      const key = instanceKey(options, config);
      const metadata: Record<string, string> = {};
      if (config.walletAddress) metadata.walletAddress = config.walletAddress;
      if (config.node) metadata.node = config.node;

      await client.registerInstance({
        ...key,
        weight: options.weight,
        metadata: { ...metadata, ...options.meta },
      });
      io.stdout(`Registered ${describeInstance(key)} in ${describeService(key)}`);
    });

  instanceOptions(program.command("deregister"))
    .description("deregister an instance")
    .action(async (options: InstanceOptions) => {
      const { config, client } = open();
      const key = instanceKey(options, config);
      const result = await client.deregisterInstance(key);
      io.stdout(
        result.subcode === "not_found"
          ? `${describeInstance(key)} was not registered in ${describeService(key)}`
          : `Deregistered ${describeInstance(key)} from ${describeService(key)}`
      );
    });

  instanceOptions(program.command("heartbeat"))
    .description("send one heartbeat for an instance")
    .action(async (options: InstanceOptions) => {
      const { config, client } = open();
      const key = instanceKey(options, config);
      const result = await client.sendHeartbeat(key);
      const next = result.clientBeatInterval ? `, next beat in ${formatDuration(result.clientBeatInterval)}` : "";
      io.stdout(`Heartbeat accepted for ${describeInstance(key)}${next}`);
    });

  program
    .command("check")
    .description("check DNS, TCP, HTTP and local port before starting an agent")
    .option("-s, --service <name>", "service used for the instance-list probe")
    .action(async (options: CheckOptions) => {
      const { config, logger } = open();
      const report = await runPreflight(
        config,
        { http: io.context.http, network: io.context.network, logger },
        { serviceName: options.service }
      );
      print(report.checks.map(renderCheck));
      if (!report.ok) state.exitCode = 1;
    });

  program
    .command("validate-env")
    .description("validate the agent's environment variables")
    .option("--exports", "print suggested export lines")
    .action((options: ValidateOptions) => {
      const env = mergedEnv();
      const report = validateEnvironment(env);
      print(report.checks.map(renderEnvCheck));
      if (options.exports) {
        print(renderExports(env));
      }
      if (!report.ok) state.exitCode = 1;
    });

  program
    .command("agent")
    .description("register this node and keep it alive until SIGINT/SIGTERM")
    .option("--health-port <port>", "serve GET /health on this port", parseInteger)
    .option("--health-host <host>", "health server bind address", "0.0.0.0")
    .option("--skip-preflight", "start without the connectivity checks")
    .action(async (options: AgentOptions) => {
      const globals = program.opts<GlobalOptions>();
      if (!globals.config) {
        const report = validateEnvironment(mergedEnv());
        if (!report.ok) {
          print(report.checks.filter((c) => c.level === "error").map(renderEnvCheck));
          state.exitCode = 1;
          return;
        }
      }

      const { config, logger, client } = open();
      const settings = agentSettingsFromConfig(config);
      if (!isEthereumAddress(settings.walletAddress)) {
        throw new ConfigError(`Invalid wallet address: ${settings.walletAddress}`);
      }

      if (!options.skipPreflight) {
        const report = await runPreflight(config, { http: io.context.http, network: io.context.network, logger });
        if (!report.ok) {
          logger.warn("Preflight found problems, registration will keep retrying");
        }
      }

      const agent = new RegistrationAgent(settings, { client, sleep: io.context.sleep, logger });
      let health: HealthServer | undefined;
      if (options.healthPort !== undefined) {
        health = await startHealthServer(agent, { port: options.healthPort, host: options.healthHost, logger });
      }

      const running = agent.run();
      const release = new AbortController();
      try {
        const reason = await Promise.race([io.waitForShutdown(release.signal), running.then(() => "stopped")]);
        logger.info(`Shutting down (${reason})`);
      } finally {
        release.abort();
        await agent.stop();
        await health?.stop();
      }
      await running;
    });

  return program;
}

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  const state: RunState = { exitCode: 0 };
  const program = createProgram(io, state);

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    io.stderr(describeError(err));
    return 1;
  }

  return state.exitCode;
}
