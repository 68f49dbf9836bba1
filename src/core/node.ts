/**
 * Node.js implementations of the core interfaces.
 * Everything else in the engine only sees the interfaces.
 */

import { existsSync, readFileSync } from "fs";
import { lookup } from "dns/promises";
import { createConnection, createServer } from "net";
import type { Clock, EngineContext, FileReader, HttpClient, Logger, NetworkProbe, Sleeper } from "./interfaces";

export const nodeHttpClient: HttpClient = {
  fetch: (url, options) => fetch(url, options),
};

export const systemClock: Clock = {
  now: () => Date.now(),
};

export const nodeSleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const nodeNetworkProbe: NetworkProbe = {
  async resolve(host) {
    const records = await lookup(host, { all: true });
    return [...new Set(records.map((r) => r.address))].sort();
  },

  connect(host, port, timeoutMs) {
    return new Promise<void>((resolve, reject) => {
      const socket = createConnection({ host, port });
      socket.setTimeout(timeoutMs);
      socket.once("connect", () => {
        socket.end();
        resolve();
      });
      socket.once("timeout", () => {
        socket.destroy();
        reject(new Error(`connect ETIMEDOUT ${host}:${port}`));
      });
      socket.once("error", (err) => {
        socket.destroy();
        reject(err);
      });
    });
  },

  bind(port, host) {
    return new Promise<void>((resolve, reject) => {
      const server = createServer();
      server.once("error", reject);
      server.listen(port, host, () => {
        server.close(() => resolve());
      });
    });
  },
};

export const nodeFileReader: FileReader = {
  exists: (path) => existsSync(path),
  readFile: (path) => readFileSync(path, "utf-8"),
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Build an engine context backed by Node.js, with optional overrides.
 */
export function createNodeContext(overrides: Partial<EngineContext> = {}): EngineContext {
  return {
    http: nodeHttpClient,
    clock: systemClock,
    sleep: nodeSleep,
    network: nodeNetworkProbe,
    logger: silentLogger,
    fs: nodeFileReader,
    ...overrides,
  };
}
