/**
 * Error taxonomy
 *
 * Every failure the engine surfaces is one of four kinds. Callers either
 * `instanceof` the class or switch on `kind`.
 */

export type ErrorKind = "transport" | "protocol" | "decode" | "config";

export type TransportSubcode = "dns" | "connection" | "timeout" | "tls" | "aborted" | "unknown";

export type ProtocolSubcode =
  | "bad_request"
  | "unauthorized"
  | "forbidden"
  | "not_found"
  | "conflict"
  | "server_error"
  | "unknown";

export abstract class RegistryError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * DNS failure, refused/reset connection, timeout, TLS failure or cancellation.
 */
export class TransportError extends RegistryError {
  readonly kind = "transport";
  readonly subcode: TransportSubcode;

  constructor(message: string, subcode: TransportSubcode, options?: { cause?: unknown }) {
    super(message, options);
    this.subcode = subcode;
  }
}

/**
 * Non-2xx HTTP status, or a 2xx body carrying a Nacos failure code.
 */
export class ProtocolError extends RegistryError {
  readonly kind = "protocol";
  readonly status: number;
  readonly subcode: ProtocolSubcode;
  /** Server-provided message (response body, trimmed) */
  readonly serverMessage: string;

  constructor(status: number, serverMessage: string, subcode: ProtocolSubcode = subcodeForStatus(status)) {
    const detail = serverMessage ? `: ${serverMessage}` : "";
    super(`Registry returned ${status} (${subcode})${detail}`);
    this.status = status;
    this.subcode = subcode;
    this.serverMessage = serverMessage;
  }
}

/**
 * Body is not valid JSON or lacks fields the operation needs.
 */
export class DecodeError extends RegistryError {
  readonly kind = "decode";
  readonly details: string[];

  constructor(message: string, details: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.details = details;
  }
}

/**
 * Missing or malformed configuration, or caller input outside its domain.
 */
export class ConfigError extends RegistryError {
  readonly kind = "config";
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.details = details;
  }
}

export function subcodeForStatus(status: number): ProtocolSubcode {
  switch (status) {
    case 400:
      return "bad_request";
    case 401:
      return "unauthorized";
    case 403:
      return "forbidden";
    case 404:
      return "not_found";
    case 409:
      return "conflict";
    default:
      return status >= 500 ? "server_error" : "unknown";
  }
}

export function isRegistryError(err: unknown): err is RegistryError {
  return err instanceof RegistryError;
}

/**
 * One-line rendering for logs and CLI output.
 *
 * @example describeError(new ProtocolError(404, "not found")) → "[protocol/not_found status=404] Registry returned 404 (not_found): not found"
 */
export function describeError(err: unknown): string {
  if (err instanceof ProtocolError) {
    return `[protocol/${err.subcode} status=${err.status}] ${err.message}`;
  }
  if (err instanceof TransportError) {
    return `[transport/${err.subcode}] ${err.message}`;
  }
  if (err instanceof DecodeError || err instanceof ConfigError) {
    const details = err.details.length > 0 ? ` (${err.details.join("; ")})` : "";
    return `[${err.kind}] ${err.message}${details}`;
  }
  return err instanceof Error ? err.message : String(err);
}
