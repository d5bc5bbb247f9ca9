/**
 * Profile assembly
 *
 * Fetches one candidate in three dependent stages and scores the result:
 * 1. user detail       GET {url}              → failure drops the candidate
 * 2. repositories      GET {url}/repos        → failure leaves []
 * 3. public events     GET {url}/events/public → failure leaves []
 *
 * An authorization error ends the chain: at stage 1 the candidate is dropped,
 * at stage 2 the events stage is skipped and the record is built from what
 * was fetched.
 */
import {
  type FounderScoreConfig,
  type RepoSignals,
  type UserSignals,
  analyzeContributions,
  calculateScores,
  defaultConfig,
  estimateAge,
  sortByStars,
} from "@founder-finder/founder-scorer";

import { isAuthorizationError } from "./errors";
import type { RequestExecutor } from "./fetch";
import logger from "./logger";
import {
  type AggregatedProfile,
  type RawEvent,
  type RawRepository,
  type RawUser,
  type TopRepository,
  RawEventSchema,
  RawRepositorySchema,
  RawUserSchema,
  parseList,
} from "./models";

export const SOURCE = "github";

const TOP_REPO_COUNT = 3;

export interface ProfileFetcherDeps {
  executor: RequestExecutor;
  scoreConfig?: FounderScoreConfig;
  now?: () => Date;
  signal?: AbortSignal;
}

// ============================================================================
// Type Conversion
// ============================================================================

export function toUserSignals(user: RawUser): UserSignals {
  return {
    followers: user.followers,
    following: user.following,
    bio: user.bio,
    createdAt: user.created_at,
  };
}

export function toRepoSignals(repo: RawRepository): RepoSignals {
  return {
    name: repo.name,
    stars: repo.stargazers_count,
    forks: repo.forks_count,
    language: repo.language,
    createdAt: repo.created_at,
  };
}

/**
 * Number of repositories per primary language, in first-seen order.
 */
export function extractLanguages(repos: readonly RawRepository[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const repo of repos) {
    if (repo.language) {
      counts.set(repo.language, (counts.get(repo.language) ?? 0) + 1);
    }
  }
  return Object.fromEntries(counts);
}

export function getTopRepos(repos: readonly RawRepository[]): TopRepository[] {
  const ranked = sortByStars(repos.map((repo) => ({ repo, stars: repo.stargazers_count })));
  return ranked.slice(0, TOP_REPO_COUNT).map(({ repo }) => ({
    name: repo.name,
    description: repo.description,
    stars: repo.stargazers_count,
    forks: repo.forks_count,
    language: repo.language,
    created_at: repo.created_at,
  }));
}

/**
 * Score already-fetched data and merge it into one record.
 */
export function buildAggregatedProfile(
  user: RawUser,
  repos: readonly RawRepository[],
  events: readonly RawEvent[],
  now: Date = new Date(),
  config: FounderScoreConfig = defaultConfig
): AggregatedProfile {
  const userSignals = toUserSignals(user);
  const repoSignals = repos.map(toRepoSignals);

  const activity = analyzeContributions(
    events.map((e) => ({ createdAt: e.created_at })),
    now,
    config
  );
  const age = estimateAge(userSignals, repoSignals, now, config);
  const scores = calculateScores(userSignals, repoSignals, activity, config, now);

  return {
    login: user.login,
    name: user.name,
    company: user.company,
    location: user.location,
    bio: user.bio,
    github_url: user.html_url,
    public_repos: user.public_repos,
    followers: user.followers,
    following: user.following,
    account_age: age.accountAge,
    account_age_years: age.accountAgeYears,
    estimated_age: age.estimatedAge,
    early_achievements: age.earlyAchievements.map((a) => ({
      name: a.name,
      stars: a.stars,
      created_after_years: a.createdAfterYears,
    })),
    technical_score: scores.technical,
    innovation_score: scores.innovation,
    collaboration_score: scores.collaboration,
    age_score: scores.age,
    founder_potential: scores.founderPotential,
    languages: extractLanguages(repos),
    top_repos: getTopRepos(repos),
    contribution_frequency: activity.frequency,
    source: SOURCE,
  };
}

// ============================================================================
// Fetching
// ============================================================================

type StageResult<T> = { status: "ok"; value: T } | { status: "unauthorized" };

/**
 * Secondary stage: any failure becomes an empty list.
 */
async function fetchListStage<T>(
  deps: ProfileFetcherDeps,
  url: string,
  parse: (payload: unknown) => T[]
): Promise<StageResult<T[]>> {
  try {
    const result = await deps.executor.execute(SOURCE, url, { signal: deps.signal });
    if (!result.ok) {
      logger.warn("Stage returned no data", { url, lastStatus: result.lastStatus });
      return { status: "ok", value: [] };
    }
    return { status: "ok", value: parse(result.data) };
  } catch (error) {
    if (isAuthorizationError(error)) {
      logger.warn("Stage not authorized, skipping remaining stages", { url, errorCode: error.errorCode });
      return { status: "unauthorized" };
    }
    throw error;
  }
}

/**
 * Fetch and score one candidate.
 *
 * @param candidateUrl - API detail URL from a search result
 * @returns The scored profile, or null when the user detail is unavailable
 * @throws GithubApiError ABORTED when cancelled
 */
export async function fetchProfile(
  candidateUrl: string,
  deps: ProfileFetcherDeps
): Promise<AggregatedProfile | null> {
  const { executor, signal } = deps;

  let userPayload: unknown;
  try {
    const result = await executor.execute(SOURCE, candidateUrl, { signal });
    if (!result.ok) {
      logger.warn("User detail unavailable, dropping candidate", {
        url: candidateUrl,
        lastStatus: result.lastStatus,
      });
      return null;
    }
    userPayload = result.data;
  } catch (error) {
    if (isAuthorizationError(error)) {
      logger.warn("User detail not authorized, dropping candidate", {
        url: candidateUrl,
        errorCode: error.errorCode,
      });
      return null;
    }
    throw error;
  }

  const user = RawUserSchema.safeParse(userPayload);
  if (!user.success) {
    logger.warn("User detail malformed, dropping candidate", { url: candidateUrl });
    return null;
  }

  let repos: RawRepository[] = [];
  let events: RawEvent[] = [];

  const repoStage = await fetchListStage(deps, `${candidateUrl}/repos`, (p) =>
    parseList(RawRepositorySchema, p)
  );
  if (repoStage.status === "ok") {
    repos = repoStage.value;
    const eventStage = await fetchListStage(deps, `${candidateUrl}/events/public`, (p) =>
      parseList(RawEventSchema, p)
    );
    if (eventStage.status === "ok") events = eventStage.value;
  }

  const now = deps.now?.() ?? new Date();
  const profile = buildAggregatedProfile(user.data, repos, events, now, deps.scoreConfig);

  logger.debug("Profile assembled", {
    login: profile.login,
    repos: repos.length,
    events: events.length,
    founderPotential: profile.founder_potential,
  });

  return profile;
}
