import { z } from "zod";

import defaultConfigJson from "./config.json";
import type { FounderScoreConfig, FounderScoreConfigOverrides } from "./types";

const weight = z.number().nonnegative();
const divisor = z.number().positive();

const FounderScoreConfigSchema = z.object({
  technical: z.object({
    starsWeight: weight,
    starsDivisor: divisor,
    forksWeight: weight,
    forksDivisor: divisor,
    languagesWeight: weight,
    languagesDivisor: divisor,
    reposWeight: weight,
    reposDivisor: divisor,
  }),
  innovation: z.object({
    starsWeight: weight,
    starsDivisor: divisor,
    forksWeight: weight,
    forksDivisor: divisor,
    activeBonus: weight,
    inactiveBonus: weight,
  }),
  collaboration: z.object({
    followersWeight: weight,
    followersDivisor: divisor,
    followingWeight: weight,
    followingDivisor: divisor,
    activeBonus: weight,
    inactiveBonus: weight,
  }),
  founderWeights: z.object({
    technical: weight,
    innovation: weight,
    collaboration: weight,
  }),
  age: z.object({
    accountOpenedAt: z.number().positive(),
    peakAge: z.number().positive(),
    declineAfter: z.number().positive(),
    youngBase: z.number(),
    youngSlope: z.number(),
    peakScore: z.number(),
    primeSlope: z.number(),
    olderBase: z.number(),
    olderSlope: z.number(),
    fallbackScore: z.number(),
    graduationAge: z.number().int().positive(),
  }),
  activity: z.object({
    windowDays: z.number().int().positive(),
    veryHigh: z.number().int().nonnegative(),
    high: z.number().int().nonnegative(),
    medium: z.number().int().nonnegative(),
  }),
  earlyAchievement: z.object({
    topRepos: z.number().int().positive(),
    maxYearsAfterAccount: z.number().nonnegative(),
    minStars: z.number().int().nonnegative(),
  }),
  scale: z.number().positive(),
}) satisfies z.ZodType<FounderScoreConfig>;

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === "object") deepFreeze(nested);
  }
  return Object.freeze(value);
}

/**
 * Validate a raw config object. Throws a ZodError on a missing or
 * out-of-range field.
 */
export function parseConfig(raw: unknown): FounderScoreConfig {
  return deepFreeze(FounderScoreConfigSchema.parse(raw));
}

/**
 * Default scoring configuration loaded from config.json.
 * Frozen; use createConfig() to derive a variant.
 */
export const defaultConfig: FounderScoreConfig = parseConfig(defaultConfigJson);

/**
 * Create a modified config by merging overrides with defaults.
 * Useful for weight-tuning experiments.
 */
export function createConfig(
  overrides: FounderScoreConfigOverrides,
  base: FounderScoreConfig = defaultConfig
): FounderScoreConfig {
  return parseConfig({
    technical: { ...base.technical, ...overrides.technical },
    innovation: { ...base.innovation, ...overrides.innovation },
    collaboration: { ...base.collaboration, ...overrides.collaboration },
    founderWeights: { ...base.founderWeights, ...overrides.founderWeights },
    age: { ...base.age, ...overrides.age },
    activity: { ...base.activity, ...overrides.activity },
    earlyAchievement: { ...base.earlyAchievement, ...overrides.earlyAchievement },
    scale: overrides.scale ?? base.scale,
  });
}

/**
 * Load config from a JSON string, e.g. a tuned weights file.
 */
export function loadConfigFromJson(jsonString: string): FounderScoreConfig {
  return parseConfig(JSON.parse(jsonString));
}
