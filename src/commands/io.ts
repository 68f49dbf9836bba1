import type { EngineContext, Logger } from "#/core";
import { createNodeContext } from "#/core";
import type { EnvSource } from "#/config";
import { createLogger, type LoggerOptions } from "#/logger";

/**
 * Everything the CLI touches outside its own process.
 */
export interface CliIo {
  context: EngineContext;
  env: EnvSource;
  stdout(line: string): void;
  stderr(line: string): void;
  createLogger(options: LoggerOptions): Logger;
  /**
   * Resolves with the name of the first shutdown signal received.
   * Aborting `release` detaches the listeners; the promise then never settles.
   */
  waitForShutdown(release?: AbortSignal): Promise<string>;
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export function waitForSignal(release?: AbortSignal, signals: NodeJS.Signals[] = SHUTDOWN_SIGNALS): Promise<string> {
  return new Promise((resolve) => {
    const detach = () => {
      for (const name of signals) process.off(name, onSignal);
    };
    const onSignal = (signal: NodeJS.Signals) => {
      detach();
      release?.removeEventListener("abort", detach);
      resolve(signal);
    };
    if (release?.aborted) return;
    for (const name of signals) process.once(name, onSignal);
    release?.addEventListener("abort", detach, { once: true });
  });
}

export function createNodeIo(): CliIo {
  return {
    context: createNodeContext(),
    env: process.env,
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
    createLogger,
    waitForShutdown: (release) => waitForSignal(release),
  };
}
