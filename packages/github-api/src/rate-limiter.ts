import { AbortedError, type SleepFn, sleep as defaultSleep } from "@founder-finder/utils";

import { GithubApiError } from "./errors";
import logger from "./logger";

/** GitHub resets its quota hourly */
export const WINDOW_MS = 60 * 60 * 1000;

/** 5000 calls/hour authenticated, minus a buffer of 500 */
export const DEFAULT_LIMIT = 4500;

export interface RateLimitWindow {
  source: string;
  callCount: number;
  windowStart: number; // epoch ms
  limit: number;
}

export interface RateLimiterOptions {
  /** Per-source call budget per window */
  limits?: Record<string, number>;
  /** Budget for sources not listed in `limits` */
  defaultLimit?: number;
  windowMs?: number;
  now?: () => number;
  sleep?: SleepFn;
}

function abortedError(source: string): GithubApiError {
  return new GithubApiError("ABORTED", "Rate limit wait cancelled", { source });
}

/**
 * Resolves with `promise`, or rejects as soon as `signal` fires.
 */
function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new AbortedError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AbortedError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Rolling per-source call budget.
 *
 * Every caller passes through a single promise chain, so window checks and
 * counter updates never interleave. A caller that finds the budget spent
 * sleeps until the window ends while holding the chain; callers behind it
 * wait their turn.
 */
export class RateLimiter {
  private readonly windows = new Map<string, RateLimitWindow>();
  private readonly limits: Record<string, number>;
  private readonly defaultLimit: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private gate: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions = {}) {
    this.limits = { ...options.limits };
    this.defaultLimit = options.defaultLimit ?? DEFAULT_LIMIT;
    this.windowMs = options.windowMs ?? WINDOW_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Wait until `source` has budget left, then consume one call.
   *
   * @throws GithubApiError ABORTED if `signal` fires first
   */
  async acquire(source: string, signal?: AbortSignal): Promise<void> {
    let release: () => void = () => undefined;
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.gate;
    this.gate = previous.then(() => turn);

    try {
      await untilAborted(previous, signal);
      await this.take(source, signal);
    } catch (error) {
      if (error instanceof AbortedError) throw abortedError(source);
      throw error;
    } finally {
      release();
    }
  }

  /**
   * Copy of the current window for `source`, if any call was made.
   */
  snapshot(source: string): RateLimitWindow | undefined {
    const window = this.windows.get(source);
    return window ? { ...window } : undefined;
  }

  private window(source: string): RateLimitWindow {
    let window = this.windows.get(source);
    if (!window) {
      window = {
        source,
        callCount: 0,
        windowStart: this.now(),
        limit: this.limits[source] ?? this.defaultLimit,
      };
      this.windows.set(source, window);
    }
    return window;
  }

  private async take(source: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new AbortedError();

    const window = this.window(source);
    const now = this.now();

    if (now - window.windowStart >= this.windowMs) {
      window.callCount = 0;
      window.windowStart = now;
    }

    if (window.callCount >= window.limit) {
      const waitMs = this.windowMs - (now - window.windowStart);
      if (waitMs > 0) {
        logger.info("Rate limit budget spent, waiting for window reset", {
          source,
          limit: window.limit,
          waitSeconds: Math.round(waitMs / 1000),
        });
        await this.sleep(waitMs, signal);
      }
      window.callCount = 0;
      window.windowStart = this.now();
    }

    window.callCount++;
  }
}
