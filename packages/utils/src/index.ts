/**
 * Shared utilities for the founder-finder packages.
 *
 * - createLogger: winston logger per service
 * - sleep: abortable delay used by the rate limiter and retry loops
 * - chunkArray: fixed-size batching for concurrent fetches
 */

export { createLogger, default } from "./logger";
export type { Logger } from "./logger";
export { AbortedError, chunkArray, sleep } from "./async";
export type { SleepFn } from "./async";
