// GitHub profile aggregation exports

export * as wrappers from "./wrappers";
export * as fetching from "./fetch";
export { default as logger } from "./logger";
export { FounderSearchPipeline, createPipeline, sortByFounderPotential } from "./wrappers";
export type { PipelineOptions, RunOptions, SearchRunResult } from "./wrappers";
export { RequestExecutor } from "./fetch";
export type { FetchFn, FetchResult, RequestOptions } from "./fetch";
export { RateLimiter } from "./rate-limiter";
export type { RateLimitWindow, RateLimiterOptions } from "./rate-limiter";
export { checkToken, loadConfig } from "./config";
export type { GithubConfig, TokenCheck } from "./config";
export { buildAggregatedProfile, fetchProfile } from "./profile";
export { dedupeProfiles } from "./dedupe";
export { ErrorCodes, GithubApiError, isAbortError, isAuthorizationError } from "./errors";
export type { ErrorCode } from "./errors";
export type { AggregatedProfile, EarlyAchievementRecord, TopRepository } from "./models";
export { buildSearchQuery } from "./utils";
export type { SearchTerms } from "./utils";
