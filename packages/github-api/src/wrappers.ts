/**
 * GitHub Search Pipeline
 *
 * `FounderSearchPipeline.run()` is the main entry point.
 *
 * Data Flow:
 * 1. Validate the query and credential requirement (no network yet)
 * 2. One /search/users call → candidate detail URLs
 * 3. fetchProfile() per candidate, `concurrency` at a time
 * 4. Remove dropped candidates, dedupe, sort by founder potential
 *
 * All requests of a run share one RateLimiter, so fetching in parallel only
 * overlaps waiting; it never raises the request rate.
 */
import { v4 as uuidv4 } from "uuid";

import type { FounderScoreConfig } from "@founder-finder/founder-scorer";
import { type SleepFn, chunkArray } from "@founder-finder/utils";

import { type GithubConfig, loadConfig } from "./config";
import { dedupeProfiles } from "./dedupe";
import { GithubApiError, errorMessage, isAbortError } from "./errors";
import { type FetchFn, RequestExecutor } from "./fetch";
import logger from "./logger";
import { type AggregatedProfile, parseSearchItems } from "./models";
import { SOURCE, fetchProfile } from "./profile";
import { RateLimiter } from "./rate-limiter";
import { type SearchTerms, buildSearchQuery } from "./utils";

// ============================================================================
// Constants
// ============================================================================

export const MAX_QUERY_LENGTH = 256;

// ============================================================================
// Types
// ============================================================================

export interface PipelineOptions {
  /** Overrides GithubConfig.concurrency */
  concurrency?: number;
  scoreConfig?: FounderScoreConfig;
  fetchFn?: FetchFn;
  sleep?: SleepFn;
  /** Clock shared by the rate limiter and the scorers */
  now?: () => Date;
  /** Shared with other pipelines to pool one quota */
  rateLimiter?: RateLimiter;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Called after each batch with candidates processed so far */
  onProgress?: (processed: number, total: number) => void;
}

export interface SearchRunResult {
  runId: string;
  query: string;
  /** Sorted by founder_potential, highest first */
  profiles: AggregatedProfile[];
  candidatesFound: number;
  /** Candidates whose user detail could not be fetched */
  dropped: number;
  duplicates: number;
}

// ============================================================================
// Sorting
// ============================================================================

/**
 * Highest founder potential first; equal scores keep their input order.
 */
export function sortByFounderPotential(profiles: readonly AggregatedProfile[]): AggregatedProfile[] {
  return [...profiles].sort((a, b) => b.founder_potential - a.founder_potential);
}

function validateQuery(query: string): string {
  const trimmed = query.trim();
  if (!trimmed) {
    throw new GithubApiError("INVALID_QUERY", "Search query is empty");
  }
  if (trimmed.length > MAX_QUERY_LENGTH) {
    throw new GithubApiError("INVALID_QUERY", `Search query exceeds ${MAX_QUERY_LENGTH} characters`, {
      length: trimmed.length,
    });
  }
  return trimmed;
}

// ============================================================================
// Pipeline
// ============================================================================

export class FounderSearchPipeline {
  readonly config: GithubConfig;
  private readonly executor: RequestExecutor;
  private readonly concurrency: number;
  private readonly scoreConfig?: FounderScoreConfig;
  private readonly now: () => Date;

  constructor(config: GithubConfig, options: PipelineOptions = {}) {
    this.config = config;
    this.concurrency = options.concurrency ?? config.concurrency;
    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new GithubApiError("INVALID_CONFIG", "concurrency must be a positive integer", {
        concurrency: this.concurrency,
      });
    }
    this.scoreConfig = options.scoreConfig;
    const now = options.now ?? (() => new Date());
    this.now = now;

    const rateLimiter =
      options.rateLimiter ??
      new RateLimiter({
        limits: { [SOURCE]: config.rateLimit },
        now: () => now().getTime(),
        sleep: options.sleep,
      });

    this.executor = new RequestExecutor({
      rateLimiter,
      token: config.token,
      userAgent: config.userAgent,
      fetchFn: options.fetchFn,
      sleep: options.sleep,
    });
  }

  /**
   * Search, fetch, score and rank.
   *
   * @throws GithubApiError INVALID_QUERY / TOKEN_MISSING before any request
   * @throws GithubApiError SEARCH_FAILED, UNAUTHORIZED or FORBIDDEN when the search call fails
   * @throws GithubApiError ABORTED when `signal` fires; no partial result is returned
   */
  async run(query: string, options: RunOptions = {}): Promise<SearchRunResult> {
    const { signal, onProgress } = options;
    const q = validateQuery(query);

    if (this.config.requireToken && this.config.token === null) {
      throw new GithubApiError("TOKEN_MISSING", "A valid GITHUB_TOKEN is required");
    }

    const runId = uuidv4();
    const log = logger.child({ runId });
    log.info("Search run starting", { query: q, concurrency: this.concurrency });

    const urls = await this.search(q, signal);
    log.info("Candidates found", { query: q, count: urls.length });

    const fetched: AggregatedProfile[] = [];
    let dropped = 0;
    let processed = 0;

    for (const batch of chunkArray(urls, this.concurrency)) {
      const results = await Promise.allSettled(
        batch.map((url) =>
          fetchProfile(url, {
            executor: this.executor,
            scoreConfig: this.scoreConfig,
            now: this.now,
            signal,
          })
        )
      );

      for (const [i, result] of results.entries()) {
        if (result.status === "fulfilled") {
          if (result.value) fetched.push(result.value);
          else dropped++;
          continue;
        }
        if (isAbortError(result.reason) || signal?.aborted) {
          log.warn("Search run cancelled", { query: q });
          throw new GithubApiError("ABORTED", "Search run cancelled", { runId });
        }
        dropped++;
        log.warn("Candidate fetch failed", { url: batch[i], error: errorMessage(result.reason) });
      }

      processed += batch.length;
      onProgress?.(processed, urls.length);
    }

    if (signal?.aborted) {
      throw new GithubApiError("ABORTED", "Search run cancelled", { runId });
    }

    const { profiles: unique, duplicates } = dedupeProfiles(fetched);
    const profiles = sortByFounderPotential(unique);

    log.info("Search run completed", {
      query: q,
      candidatesFound: urls.length,
      profiles: profiles.length,
      dropped,
      duplicates,
    });

    return { runId, query: q, profiles, candidatesFound: urls.length, dropped, duplicates };
  }

  /**
   * Build a query from structured terms and return the ranked profiles.
   */
  async searchProfessionalProfiles(
    terms: SearchTerms,
    options: RunOptions = {}
  ): Promise<AggregatedProfile[]> {
    const { profiles } = await this.run(buildSearchQuery(terms), options);
    return profiles;
  }

  private async search(query: string, signal?: AbortSignal): Promise<string[]> {
    const url = `${this.config.apiBase}/search/users`;
    const result = await this.executor.execute(SOURCE, url, {
      params: { q: query, per_page: this.config.searchPerPage },
      signal,
    });

    if (!result.ok) {
      logger.error("Search call failed", { query, lastStatus: result.lastStatus });
      throw new GithubApiError("SEARCH_FAILED", "Search returned no data", {
        query,
        lastStatus: result.lastStatus,
        attempts: result.attempts,
      });
    }

    const { totalCount, urls } = parseSearchItems(result.data);
    logger.debug("Search response parsed", { query, totalCount, returned: urls.length });
    return urls;
  }
}

/**
 * Pipeline from environment configuration.
 */
export function createPipeline(
  config: GithubConfig = loadConfig(),
  options: PipelineOptions = {}
): FounderSearchPipeline {
  return new FounderSearchPipeline(config, options);
}
