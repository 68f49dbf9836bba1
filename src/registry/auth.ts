/**
 * Access token cache
 *
 * Holds at most one token per client. Refreshes are single-flight: callers
 * arriving while a login is running share its promise instead of logging in
 * again, which is the read-refresh-write lock for the cache.
 */

import type { Clock } from "#/core";
import type { LoginResponse } from "#/schemas";
import { TOKEN_REFRESH_WINDOW } from "#/constants";
import { TransportError } from "#/errors";

export type LoginFn = () => Promise<LoginResponse>;

interface CachedToken {
  value: string;
  expiresAt: number;
}

function whileNotAborted<T>(pending: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(new TransportError("Login aborted while waiting for a token", "aborted", { cause: signal.reason }));
    };
    signal.addEventListener("abort", onAbort, { once: true });
    pending.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

export class TokenManager {
  private login: LoginFn;
  private clock: Clock;
  private ttlOverrideMs?: number;
  private cached?: CachedToken;
  private inflight?: Promise<string>;

  constructor(login: LoginFn, clock: Clock, ttlOverrideMs?: number) {
    this.login = login;
    this.clock = clock;
    this.ttlOverrideMs = ttlOverrideMs;
  }

  /**
   * Return the cached token, logging in when it is missing or expired.
   * An abort on `signal` releases this caller only; the shared login keeps
   * running for everyone else waiting on it.
   */
  async getToken(signal?: AbortSignal): Promise<string> {
    if (this.cached && this.clock.now() < this.cached.expiresAt) {
      return this.cached.value;
    }
    if (signal?.aborted) {
      throw new TransportError("Login aborted before it was sent", "aborted", { cause: signal.reason });
    }

    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = undefined;
      });
    }
    return signal ? whileNotAborted(this.inflight, signal) : this.inflight;
  }

  /**
   * Drop the cached token after the server rejected it.
   * Pass the rejected token so a concurrent refresh is not thrown away.
   */
  invalidate(rejected?: string): void {
    if (rejected === undefined || this.cached?.value === rejected) {
      this.cached = undefined;
    }
  }

  private async refresh(): Promise<string> {
    const response = await this.login();
    const ttlMs = this.ttlOverrideMs ?? response.tokenTtl * 1000 * (1 - TOKEN_REFRESH_WINDOW);
    this.cached = {
      value: response.accessToken,
      expiresAt: this.clock.now() + ttlMs,
    };
    return response.accessToken;
  }
}
