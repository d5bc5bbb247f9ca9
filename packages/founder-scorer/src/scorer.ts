/**
 * Founder Potential Scorer
 *
 * Scores a GitHub candidate on technical depth, innovation, collaboration and
 * age, then combines the first three into a founder-potential score.
 *
 * - Sub-scores are computed in [0,1] and capped at 1
 * - Reported scores are sub-score × scale (10), clamped to [0, scale]
 * - Founder potential is weighted from the capped [0,1] sub-scores, then scaled
 * - Nothing here throws on sparse data: missing values score low, an unusable
 *   creation date gives the neutral age score
 *
 * The arithmetic keeps the order (count × weight) / divisor so results stay
 * comparable with previously published rankings.
 */
import { isHighlyActive } from "./activity";
import { defaultConfig } from "./config";
import { clamp, parseTimestamp, yearsBetween } from "./dates";
import logger from "./logger";
import type {
  ActivityProfile,
  FounderScoreConfig,
  RepoSignals,
  RepoTotals,
  ScoreSet,
  UnitScores,
  UserSignals,
} from "./types";

// ============================================================================
// Helpers
// ============================================================================

export function summarizeRepos(repos: readonly RepoSignals[]): RepoTotals {
  const languages = new Set<string>();
  let totalStars = 0;
  let totalForks = 0;

  for (const repo of repos) {
    totalStars += repo.stars;
    totalForks += repo.forks;
    if (repo.language) languages.add(repo.language);
  }

  return {
    totalStars,
    totalForks,
    distinctLanguages: languages.size,
    repoCount: repos.length,
  };
}

function toScale(unit: number, config: FounderScoreConfig): number {
  return clamp(unit * config.scale, 0, config.scale);
}

// ============================================================================
// Unit (0-1) Scores
// ============================================================================

/**
 * technical = min(1, 0.3·stars/100 + 0.2·forks/50 + 0.2·languages/5 + 0.3·repos/20)
 * innovation = min(1, 0.4·stars/100 + 0.3·forks/50 + activity bonus)
 * collaboration = min(1, 0.4·followers/500 + 0.2·following/200 + activity bonus)
 *
 * All three are 0 for a candidate with no repositories.
 */
export function computeUnitScores(
  user: UserSignals,
  totals: RepoTotals,
  activity: ActivityProfile,
  config: FounderScoreConfig = defaultConfig
): UnitScores {
  if (totals.repoCount === 0) {
    return { technical: 0, innovation: 0, collaboration: 0 };
  }

  const t = config.technical;
  const inv = config.innovation;
  const col = config.collaboration;
  const active = isHighlyActive(activity.frequency);

  const technical = Math.min(
    1.0,
    (totals.totalStars * t.starsWeight) / t.starsDivisor +
      (totals.totalForks * t.forksWeight) / t.forksDivisor +
      (totals.distinctLanguages * t.languagesWeight) / t.languagesDivisor +
      (totals.repoCount * t.reposWeight) / t.reposDivisor
  );

  const innovation = Math.min(
    1.0,
    (totals.totalStars * inv.starsWeight) / inv.starsDivisor +
      (totals.totalForks * inv.forksWeight) / inv.forksDivisor +
      (active ? inv.activeBonus : inv.inactiveBonus)
  );

  const collaboration = Math.min(
    1.0,
    (user.followers * col.followersWeight) / col.followersDivisor +
      (user.following * col.followingWeight) / col.followingDivisor +
      (active ? col.activeBonus : col.inactiveBonus)
  );

  return { technical, innovation, collaboration };
}

/**
 * Founder potential from the capped unit scores, before scaling.
 */
export function computeFounderPotentialUnit(
  unit: UnitScores,
  config: FounderScoreConfig = defaultConfig
): number {
  const w = config.founderWeights;
  return (
    unit.technical * w.technical +
    unit.innovation * w.innovation +
    unit.collaboration * w.collaboration
  );
}

// ============================================================================
// Age Score
// ============================================================================

/**
 * Scaled age score for an estimated age. Peaks at `peakAge`:
 *   age < 25:  0.7 + (age - 16)·0.03
 *   age ≤ 35:  1.0 - (age - 25)·0.03
 *   otherwise: 0.7 - (age - 35)·0.02
 */
export function ageScoreFromEstimatedAge(
  estimatedAge: number,
  config: FounderScoreConfig = defaultConfig
): number {
  const a = config.age;
  let score: number;

  if (estimatedAge < a.peakAge) {
    score = a.youngBase + (estimatedAge - a.accountOpenedAt) * a.youngSlope;
  } else if (estimatedAge <= a.declineAfter) {
    score = a.peakScore - (estimatedAge - a.peakAge) * a.primeSlope;
  } else {
    score = a.olderBase - (estimatedAge - a.declineAfter) * a.olderSlope;
  }

  return toScale(score, config);
}

/**
 * Age score from the account creation date alone (bio hints are not used
 * here). Falls back to `age.fallbackScore` when the date is unusable.
 */
export function calculateAgeScore(
  createdAt: string | null,
  now: Date = new Date(),
  config: FounderScoreConfig = defaultConfig
): number {
  const created = parseTimestamp(createdAt);
  if (!created) {
    logger.warn("Age score defaulted: invalid account creation date", { createdAt });
    return config.age.fallbackScore;
  }

  const estimatedAge = config.age.accountOpenedAt + yearsBetween(now, created);
  return ageScoreFromEstimatedAge(estimatedAge, config);
}

// ============================================================================
// Main Scoring Functions
// ============================================================================

/**
 * Compute all intermediate values for debugging/analysis.
 */
export function computeDetailedScores(
  user: UserSignals,
  repos: readonly RepoSignals[],
  activity: ActivityProfile,
  config: FounderScoreConfig = defaultConfig,
  now: Date = new Date()
): { totals: RepoTotals; unit: UnitScores; founderPotentialUnit: number; scores: ScoreSet } {
  const totals = summarizeRepos(repos);
  const unit = computeUnitScores(user, totals, activity, config);
  const founderPotentialUnit = computeFounderPotentialUnit(unit, config);

  const scores: ScoreSet = {
    technical: toScale(unit.technical, config),
    innovation: toScale(unit.innovation, config),
    collaboration: toScale(unit.collaboration, config),
    age: calculateAgeScore(user.createdAt, now, config),
    founderPotential: toScale(founderPotentialUnit, config),
  };

  return { totals, unit, founderPotentialUnit, scores };
}

/**
 * Compute the five scores for one candidate.
 *
 * @returns ScoreSet with every value in [0, config.scale]
 */
export function calculateScores(
  user: UserSignals,
  repos: readonly RepoSignals[],
  activity: ActivityProfile,
  config: FounderScoreConfig = defaultConfig,
  now: Date = new Date()
): ScoreSet {
  return computeDetailedScores(user, repos, activity, config, now).scores;
}
