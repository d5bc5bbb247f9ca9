/**
 * Age heuristics
 *
 * GitHub exposes no birth date, so age is inferred:
 * - "class of 20YY" in the bio → graduated at `graduationAge`
 * - otherwise the account is assumed to have been opened at `accountOpenedAt`
 *
 * Early achievements are top-starred repositories created within
 * `maxYearsAfterAccount` years of the account.
 */
import { defaultConfig } from "./config";
import { parseTimestamp, roundTo1, yearsBetween } from "./dates";
import logger from "./logger";
import type {
  AgeProfile,
  EarlyAchievement,
  FounderScoreConfig,
  RepoSignals,
  UserSignals,
} from "./types";

const GRADUATION_PATTERN = /class of (20\d{2})/;

const UNKNOWN_AGE: AgeProfile = {
  accountAgeYears: null,
  accountAge: "N/A",
  estimatedAge: null,
  earlyAchievements: [],
};

/** Repositories ordered by stars, most first. Stable for equal counts. */
export function sortByStars<T extends { stars: number }>(repos: readonly T[]): T[] {
  return [...repos].sort((a, b) => b.stars - a.stars);
}

/**
 * Graduation year mentioned in a bio ("Class of 2019"), or null.
 */
export function findGraduationYear(bio: string | null): number | null {
  if (!bio) return null;
  const match = GRADUATION_PATTERN.exec(bio.toLowerCase());
  return match?.[1] ? Number.parseInt(match[1], 10) : null;
}

function findEarlyAchievements(
  repos: readonly RepoSignals[],
  accountCreated: Date,
  config: FounderScoreConfig
): EarlyAchievement[] | null {
  const rules = config.earlyAchievement;
  const achievements: EarlyAchievement[] = [];

  for (const repo of sortByStars(repos).slice(0, rules.topRepos)) {
    const repoCreated = parseTimestamp(repo.createdAt);
    if (!repoCreated) return null;

    const repoAgeYears = yearsBetween(repoCreated, accountCreated);
    if (repoAgeYears <= rules.maxYearsAfterAccount && repo.stars >= rules.minStars) {
      achievements.push({
        name: repo.name,
        stars: repo.stars,
        createdAfterYears: roundTo1(repoAgeYears),
      });
    }
  }

  return achievements;
}

/**
 * Estimate account age, real-world age and early achievements.
 *
 * Never throws: an unusable account or top-repository timestamp yields the
 * "N/A" profile with a null estimated age.
 */
export function estimateAge(
  user: UserSignals,
  repos: readonly RepoSignals[],
  now: Date = new Date(),
  config: FounderScoreConfig = defaultConfig
): AgeProfile {
  const accountCreated = parseTimestamp(user.createdAt);
  if (!accountCreated) {
    logger.warn("Cannot estimate age: invalid account creation date", {
      createdAt: user.createdAt,
    });
    return { ...UNKNOWN_AGE, earlyAchievements: [] };
  }

  const accountAgeYears = yearsBetween(now, accountCreated);

  const earlyAchievements = findEarlyAchievements(repos, accountCreated, config);
  if (!earlyAchievements) {
    logger.warn("Cannot estimate age: invalid repository creation date");
    return { ...UNKNOWN_AGE, earlyAchievements: [] };
  }

  const gradYear = findGraduationYear(user.bio);
  const rawEstimate =
    gradYear !== null
      ? now.getUTCFullYear() - gradYear + config.age.graduationAge
      : Math.max(config.age.accountOpenedAt + accountAgeYears, config.age.accountOpenedAt);

  return {
    accountAgeYears,
    accountAge: `${accountAgeYears.toFixed(1)} years`,
    estimatedAge: Math.round(rawEstimate),
    earlyAchievements,
  };
}
