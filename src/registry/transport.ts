/**
 * HTTP transport
 *
 * One bounded request over the injected HttpClient. Owns the per-request
 * timeout timer and abort wiring; both are released on every exit path.
 * Status codes are NOT interpreted here - callers decide what is an error.
 */

import type { HttpClient } from "#/core";
import { TransportError, type TransportSubcode } from "#/errors";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string;
}

export interface HttpResult {
  status: number;
  statusText: string;
  text: string;
}

export interface SendOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

const DNS_CODES = new Set(["ENOTFOUND", "EAI_AGAIN", "EAI_NODATA", "EAI_NONAME"]);
const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED",
]);
const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);
const TLS_CODES = new Set(["UNABLE_TO_VERIFY_LEAF_SIGNATURE", "CERT_HAS_EXPIRED"]);

/**
 * Find the first string `code` along an error's cause chain.
 * Node's fetch wraps socket errors: TypeError("fetch failed") { cause: { code } }.
 */
export function findErrorCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 5; depth++) {
    if (typeof current !== "object" || current === null) return undefined;
    if ("code" in current && typeof current.code === "string") return current.code;
    current = "cause" in current ? current.cause : undefined;
  }
  return undefined;
}

export function classifyTransportCode(code: string | undefined): TransportSubcode {
  if (!code) return "unknown";
  if (DNS_CODES.has(code)) return "dns";
  if (CONNECTION_CODES.has(code)) return "connection";
  if (TIMEOUT_CODES.has(code)) return "timeout";
  if (TLS_CODES.has(code) || code.startsWith("ERR_TLS") || code.startsWith("ERR_SSL") || code.includes("CERT")) return "tls";
  return "unknown";
}

function innermostMessage(err: unknown): string {
  let message = err instanceof Error ? err.message : String(err);
  let current: unknown = err instanceof Error ? err.cause : undefined;
  while (current instanceof Error) {
    message = current.message;
    current = current.cause;
  }
  return message;
}

/**
 * "GET /nacos/v1/ns/instance/list" - never includes the query string,
 * which may carry an access token.
 */
export function describeRequest(request: HttpRequest): string {
  try {
    return `${request.method} ${new URL(request.url).pathname}`;
  } catch {
    return request.method;
  }
}

export async function sendRequest(
  http: HttpClient,
  request: HttpRequest,
  options: SendOptions
): Promise<HttpResult> {
  const target = describeRequest(request);
  const { signal, timeoutMs } = options;

  if (signal?.aborted) {
    throw new TransportError(`${target} aborted before it was sent`, "aborted", { cause: signal.reason });
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  const onAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const response = await http.fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: controller.signal,
    });
    const text = await response.text();
    return { status: response.status, statusText: response.statusText, text };
  } catch (err) {
    if (timedOut) {
      throw new TransportError(`${target} timed out after ${timeoutMs}ms`, "timeout", { cause: err });
    }
    if (signal?.aborted) {
      throw new TransportError(`${target} aborted`, "aborted", { cause: err });
    }
    const subcode = classifyTransportCode(findErrorCode(err));
    throw new TransportError(`${target} failed: ${innermostMessage(err)}`, subcode, { cause: err });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
    // Releases the connection if the body was left half-read
    controller.abort();
  }
}
