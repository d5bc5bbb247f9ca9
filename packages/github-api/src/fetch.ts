import { AbortedError, type SleepFn, sleep as defaultSleep } from "@founder-finder/utils";

import { GithubApiError, errorMessage } from "./errors";
import logger from "./logger";
import type { RateLimiter } from "./rate-limiter";

export const DEFAULT_MAX_RETRIES = 3;

/** Used when a 429 carries no usable Retry-After header */
const DEFAULT_RETRY_AFTER_SECONDS = 3600;

const ACCEPT = "application/vnd.github.v3+json";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type FetchResult =
  | { ok: true; data: unknown; attempts: number }
  | { ok: false; lastStatus: number | null; attempts: number };

export interface RequestOptions {
  headers?: Record<string, string>;
  params?: Record<string, string | number>;
  maxRetries?: number;
  signal?: AbortSignal;
}

export interface RequestExecutorOptions {
  rateLimiter: RateLimiter;
  /** Validated token; requests go out unauthenticated when null */
  token: string | null;
  userAgent: string;
  fetchFn?: FetchFn;
  sleep?: SleepFn;
}

/**
 * Retry-After in whole seconds, or null when absent or not an integer.
 */
export function parseRetryAfter(value: string | null): number | null {
  if (value === null || !/^\s*\d+\s*$/.test(value)) return null;
  return Number.parseInt(value, 10);
}

export function buildUrl(url: string, params?: Record<string, string | number>): string {
  if (!params) return url;
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}

async function readBody(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 500);
  } catch (e) {
    return `<unreadable body: ${errorMessage(e)}>`;
  }
}

/**
 * Issues GET requests through the shared RateLimiter.
 *
 * - 200: JSON body returned
 * - 429: waits Retry-After (default one hour) and tries again without using
 *   up an attempt; at most `maxRetries` such waits per call
 * - 401/403: throws UNAUTHORIZED/FORBIDDEN immediately
 * - anything else, or a network error: waits 2^attempt seconds and retries
 *
 * Every attempt, retried or not, consumes one rate-limit slot. Running out of
 * attempts is not an error: the result is `{ ok: false }`.
 */
export class RequestExecutor {
  private readonly rateLimiter: RateLimiter;
  private readonly token: string | null;
  private readonly userAgent: string;
  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;

  constructor(options: RequestExecutorOptions) {
    this.rateLimiter = options.rateLimiter;
    this.token = options.token;
    this.userAgent = options.userAgent;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  get authenticated(): boolean {
    return this.token !== null;
  }

  private buildHeaders(extra?: Record<string, string>): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": this.userAgent,
      Accept: ACCEPT,
      ...extra,
    };
    if (this.token) {
      headers.Authorization = `token ${this.token}`;
    }
    return headers;
  }

  private async pause(ms: number, signal: AbortSignal | undefined, url: string): Promise<void> {
    try {
      await this.sleep(ms, signal);
    } catch (e) {
      if (e instanceof AbortedError) {
        throw new GithubApiError("ABORTED", "Request cancelled while waiting", { url });
      }
      throw e;
    }
  }

  async execute(source: string, url: string, options: RequestOptions = {}): Promise<FetchResult> {
    const { signal } = options;
    const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    const target = buildUrl(url, options.params);
    const headers = this.buildHeaders(options.headers);

    let attempt = 0;
    let attempts = 0;
    let rateLimitWaits = 0;
    let lastStatus: number | null = null;

    const backoff = async () => {
      if (attempt < maxRetries - 1) {
        await this.pause(2 ** attempt * 1000, signal, target);
      }
      attempt++;
    };

    logger.debug("Request starting", { source, url: target, authenticated: this.authenticated });

    while (attempt < maxRetries) {
      await this.rateLimiter.acquire(source, signal);
      attempts++;

      let response: Response;
      try {
        response = await this.fetchFn(target, { method: "GET", headers, signal });
      } catch (e) {
        if (signal?.aborted) {
          throw new GithubApiError("ABORTED", "Request cancelled", { url: target });
        }
        logger.warn("Network error, retrying", {
          source,
          url: target,
          errorCode: "NETWORK_ERROR",
          attempt,
          error: errorMessage(e),
        });
        await backoff();
        continue;
      }

      lastStatus = response.status;

      if (response.status === 200) {
        try {
          const data: unknown = await response.json();
          logger.debug("Request successful", { source, url: target, attempts });
          return { ok: true, data, attempts };
        } catch (e) {
          if (signal?.aborted) {
            throw new GithubApiError("ABORTED", "Request cancelled", { url: target });
          }
          logger.warn("Invalid JSON body, retrying", {
            source,
            url: target,
            errorCode: "INVALID_RESPONSE",
            attempt,
            error: errorMessage(e),
          });
          await backoff();
          continue;
        }
      }

      if (response.status === 429) {
        if (rateLimitWaits >= maxRetries) {
          logger.error("Still rate limited after waiting, giving up", {
            source,
            url: target,
            waits: rateLimitWaits,
          });
          return { ok: false, lastStatus, attempts };
        }
        rateLimitWaits++;
        // Free the connection before waiting
        await response.body?.cancel();
        const retryAfter =
          parseRetryAfter(response.headers.get("retry-after")) ?? DEFAULT_RETRY_AFTER_SECONDS;
        logger.warn("Rate limited by server, waiting", {
          source,
          url: target,
          errorCode: "RATE_LIMITED",
          retryAfter,
        });
        await this.pause(retryAfter * 1000, signal, target);
        continue;
      }

      if (response.status === 401 || response.status === 403) {
        const body = await readBody(response);
        const code = response.status === 401 ? "UNAUTHORIZED" : "FORBIDDEN";
        logger.error("Authorization failed", {
          source,
          url: target,
          status: response.status,
          authenticated: this.authenticated,
          body,
        });
        throw new GithubApiError(code, `${source} rejected the credential (${response.status})`, {
          url: target,
          status: response.status,
        });
      }

      const body = await readBody(response);
      logger.warn("API request failed, retrying", {
        source,
        url: target,
        attempt,
        status: response.status,
        body,
      });
      await backoff();
    }

    logger.error("Request failed after max retries", {
      source,
      url: target,
      errorCode: "MAX_RETRIES_EXCEEDED",
      attempts,
      lastStatus,
    });
    return { ok: false, lastStatus, attempts };
  }
}
