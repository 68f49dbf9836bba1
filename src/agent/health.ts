import { createServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger } from "#/core";
import { silentLogger } from "#/core";
import type { HealthSource } from "./agent.types";

export interface HealthResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface HealthServerOptions {
  port: number;
  host?: string;
  logger?: Logger;
}

/**
 * Route one request. GET /health answers 200 while registered and 206
 * while degraded, so a plain status check still sees the agent as alive.
 */
export function routeHealthRequest(source: HealthSource, method: string | undefined, url: string | undefined): HealthResponse {
  const path = (url ?? "/").split("?")[0];

  if (method !== "GET") {
    return { status: 405, headers: { "content-type": "text/plain" }, body: "Method Not Allowed" };
  }

  if (path === "/health") {
    const health = source.health();
    return {
      status: health.status === "UP" ? 200 : 206,
      headers: { "content-type": "application/json" },
      body: JSON.stringify(health),
    };
  }

  if (path === "/") {
    return { status: 200, headers: { "content-type": "text/plain" }, body: "OK" };
  }

  return { status: 404, headers: { "content-type": "text/plain" }, body: "Not Found" };
}

/**
 * HTTP health endpoint for a running agent.
 *
 * @example
 * ```ts
 * const server = await startHealthServer(agent, { port: 8080 });
 * // curl http://localhost:8080/health
 * await server.stop();
 * ```
 */
export class HealthServer {
  private source: HealthSource;
  private port: number;
  private host: string;
  private logger: Logger;
  private server?: Server;

  constructor(source: HealthSource, options: HealthServerOptions) {
    this.source = source;
    this.port = options.port;
    this.host = options.host ?? "0.0.0.0";
    this.logger = options.logger ?? silentLogger;
  }

  /** Bound port; differs from the configured one when that was 0 */
  get address(): AddressInfo | undefined {
    const address = this.server?.address();
    return address && typeof address === "object" ? address : undefined;
  }

  async start(): Promise<void> {
    if (this.server) return;

    const server = createServer((req, res) => this.handleRequest(req, res));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.port, this.host, () => {
        server.off("error", reject);
        resolve();
      });
    });

    this.logger.info(`Health server listening on http://${this.host}:${this.address?.port ?? this.port}/health`);
  }

  async stop(): Promise<void> {
    if (!this.server) return;

    const server = this.server;
    this.server = undefined;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const response = routeHealthRequest(this.source, req.method, req.url);
    res.writeHead(response.status, response.headers);
    res.end(response.body);
  }
}

export async function startHealthServer(source: HealthSource, options: HealthServerOptions): Promise<HealthServer> {
  const server = new HealthServer(source, options);
  await server.start();
  return server;
}
