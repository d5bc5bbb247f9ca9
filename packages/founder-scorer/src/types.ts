/**
 * Founder Scorer Types
 *
 * Inputs are plain values with no API-specific shape: the GitHub adapter in
 * @founder-finder/github-api converts raw payloads into these before scoring.
 * A `null` field means the upstream value was missing or unusable.
 */

/**
 * Account-level signals for one candidate.
 */
export interface UserSignals {
  followers: number;
  following: number;
  bio: string | null;
  createdAt: string | null; // ISO date string
}

/**
 * Signals for one public repository.
 */
export interface RepoSignals {
  name: string;
  stars: number;
  forks: number;
  language: string | null;
  createdAt: string | null; // ISO date string
}

/**
 * A public activity event. Only the timestamp matters.
 */
export interface EventSignals {
  createdAt: string | null;
}

export type ActivityFrequency = "low" | "medium" | "high" | "very_high";

export interface ActivityProfile {
  frequency: ActivityFrequency;
  /** Events inside the activity window */
  recentEvents: number;
}

/**
 * A repository that gained traction shortly after the account was opened.
 */
export interface EarlyAchievement {
  name: string;
  stars: number;
  createdAfterYears: number;
}

export interface AgeProfile {
  accountAgeYears: number | null;
  /** "10.0 years", or "N/A" when the creation date is unusable */
  accountAge: string;
  estimatedAge: number | null;
  earlyAchievements: EarlyAchievement[];
}

/**
 * Final scores, each in [0, scale] (0-10 with the default config).
 */
export interface ScoreSet {
  technical: number;
  innovation: number;
  collaboration: number;
  age: number;
  founderPotential: number;
}

/**
 * The 0-1 sub-scores a ScoreSet is derived from.
 */
export interface UnitScores {
  technical: number;
  innovation: number;
  collaboration: number;
}

/**
 * Aggregates over a candidate's repositories.
 */
export interface RepoTotals {
  totalStars: number;
  totalForks: number;
  distinctLanguages: number;
  repoCount: number;
}

export interface TechnicalWeights {
  starsWeight: number;
  starsDivisor: number;
  forksWeight: number;
  forksDivisor: number;
  languagesWeight: number;
  languagesDivisor: number;
  reposWeight: number;
  reposDivisor: number;
}

export interface InnovationWeights {
  starsWeight: number;
  starsDivisor: number;
  forksWeight: number;
  forksDivisor: number;
  activeBonus: number; // frequency high or very_high
  inactiveBonus: number;
}

export interface CollaborationWeights {
  followersWeight: number;
  followersDivisor: number;
  followingWeight: number;
  followingDivisor: number;
  activeBonus: number;
  inactiveBonus: number;
}

export interface FounderWeights {
  technical: number;
  innovation: number;
  collaboration: number;
}

/**
 * Piecewise-linear age curve: rises until peakAge, falls gently until
 * declineAfter, then faster.
 */
export interface AgeCurve {
  accountOpenedAt: number; // assumed age when the account was created
  peakAge: number;
  declineAfter: number;
  youngBase: number;
  youngSlope: number;
  peakScore: number;
  primeSlope: number;
  olderBase: number;
  olderSlope: number;
  fallbackScore: number; // already scaled
  graduationAge: number;
}

export interface ActivityThresholds {
  windowDays: number;
  veryHigh: number;
  high: number;
  medium: number;
}

export interface EarlyAchievementRules {
  topRepos: number;
  maxYearsAfterAccount: number;
  minStars: number;
}

/**
 * Complete configuration for founder scoring.
 */
export interface FounderScoreConfig {
  technical: TechnicalWeights;
  innovation: InnovationWeights;
  collaboration: CollaborationWeights;
  founderWeights: FounderWeights;
  age: AgeCurve;
  activity: ActivityThresholds;
  earlyAchievement: EarlyAchievementRules;
  scale: number;
}

/**
 * Partial overrides, merged one section deep onto the defaults.
 */
export type FounderScoreConfigOverrides = {
  [K in keyof FounderScoreConfig]?: FounderScoreConfig[K] extends object
    ? Partial<FounderScoreConfig[K]>
    : FounderScoreConfig[K];
};
