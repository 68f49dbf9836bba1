/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

/**
 * Monotonic-enough wall clock, in milliseconds.
 * Only used for token expiry, so Date.now() precision is fine.
 */
export interface Clock {
  now(): number;
}

/**
 * Abortable sleep. Resolves early (without throwing) when the signal aborts.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface NetworkProbe {
  /** Resolve a host name to its addresses. Rejects when not resolvable. */
  resolve(host: string): Promise<string[]>;
  /** Open (and close) a TCP connection. Rejects on refusal or timeout. */
  connect(host: string, port: number, timeoutMs: number): Promise<void>;
  /** Bind (and release) a local port. Rejects when the port is taken. */
  bind(port: number, host: string): Promise<void>;
}

/**
 * Minimal structured logger. The winston logger satisfies this shape.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface FileReader {
  exists(path: string): boolean;
  readFile(path: string): string;
}

export interface EngineContext {
  http: HttpClient;
  clock: Clock;
  sleep: Sleeper;
  network: NetworkProbe;
  logger: Logger;
  fs: FileReader;
}
