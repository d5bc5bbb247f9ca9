import { describe, expect, it } from "vitest";

import { createConfig, defaultConfig, loadConfigFromJson } from "../src/config";
import {
  ageScoreFromEstimatedAge,
  calculateAgeScore,
  calculateScores,
  computeDetailedScores,
  summarizeRepos,
} from "../src/scorer";
import type { ActivityProfile, RepoSignals, UserSignals } from "../src/types";

const NOW = new Date("2026-06-01T00:00:00Z");
const DAY_MS = 24 * 60 * 60 * 1000;

const low: ActivityProfile = { frequency: "low", recentEvents: 3 };
const veryHigh: ActivityProfile = { frequency: "very_high", recentEvents: 150 };

const user = (overrides: Partial<UserSignals> = {}): UserSignals => ({
  followers: 0,
  following: 0,
  bio: null,
  createdAt: new Date(NOW.getTime() - 4 * 365.25 * DAY_MS).toISOString(),
  ...overrides,
});

const LANGUAGES = ["TypeScript", "Go", "Rust", "Python", "C"];

// 20 repos, 300 stars, 100 forks, 5 languages
const richRepos: RepoSignals[] = Array.from({ length: 20 }, (_, i) => ({
  name: `repo-${i}`,
  stars: 15,
  forks: 5,
  language: LANGUAGES[i % LANGUAGES.length] ?? null,
  createdAt: "2022-01-01T00:00:00Z",
}));

const singleRepo: RepoSignals[] = [
  { name: "tool", stars: 10, forks: 5, language: "TypeScript", createdAt: "2022-01-01T00:00:00Z" },
];

describe("summarizeRepos", () => {
  it("counts distinct non-null languages", () => {
    const totals = summarizeRepos([
      ...singleRepo,
      { name: "docs", stars: 1, forks: 0, language: null, createdAt: null },
      { name: "cli", stars: 2, forks: 1, language: "TypeScript", createdAt: null },
    ]);
    expect(totals).toEqual({ totalStars: 13, totalForks: 6, distinctLanguages: 1, repoCount: 3 });
  });
});

describe("calculateScores", () => {
  it("scores zero everywhere but age without repositories", () => {
    const scores = calculateScores(user({ followers: 1000, following: 500 }), [], veryHigh, defaultConfig, NOW);

    expect(scores.technical).toBe(0);
    expect(scores.innovation).toBe(0);
    expect(scores.collaboration).toBe(0);
    expect(scores.founderPotential).toBe(0);
    expect(scores.age).toBeCloseTo(8.2, 10);
  });

  it("caps technical at 10 for a large portfolio", () => {
    const detailed = computeDetailedScores(user(), richRepos, low, defaultConfig, NOW);

    expect(detailed.totals).toEqual({
      totalStars: 300,
      totalForks: 100,
      distinctLanguages: 5,
      repoCount: 20,
    });
    expect(detailed.unit.technical).toBe(1);
    expect(detailed.scores.technical).toBe(10);
    expect(detailed.scores.innovation).toBe(10);
    expect(detailed.scores.collaboration).toBeCloseTo(2, 10);
    expect(detailed.founderPotentialUnit).toBeCloseTo(0.76, 10);
    expect(detailed.scores.founderPotential).toBeCloseTo(7.6, 10);
  });

  it("combines weighted terms for a small profile", () => {
    const scores = calculateScores(user({ followers: 50, following: 20 }), singleRepo, low, defaultConfig, NOW);

    expect(scores.technical).toBeCloseTo(1.05, 10);
    expect(scores.innovation).toBeCloseTo(1.7, 10);
    expect(scores.collaboration).toBeCloseTo(2.6, 10);
    expect(scores.founderPotential).toBeCloseTo(1.71, 10);
  });

  it("adds the activity bonus for highly active candidates", () => {
    const scores = calculateScores(user({ followers: 50, following: 20 }), singleRepo, veryHigh, defaultConfig, NOW);

    expect(scores.innovation).toBeCloseTo(3.7, 10);
    expect(scores.collaboration).toBeCloseTo(4.6, 10);
  });

  it("keeps every score inside [0, 10]", () => {
    const scores = calculateScores(user({ followers: 1e6, following: 1e6 }), richRepos, veryHigh, defaultConfig, NOW);

    for (const value of Object.values(scores)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(10);
    }
    expect(scores.founderPotential).toBeCloseTo(10, 10);
  });
});

describe("age score", () => {
  it("peaks at 25", () => {
    expect(ageScoreFromEstimatedAge(25)).toBe(10);
  });

  it("starts at 7 for 16", () => {
    expect(ageScoreFromEstimatedAge(16)).toBeCloseTo(7, 10);
  });

  it("declines past 35", () => {
    expect(ageScoreFromEstimatedAge(30)).toBeCloseTo(8.5, 10);
    expect(ageScoreFromEstimatedAge(45)).toBeCloseTo(5, 10);
  });

  it("clamps at 0 for very old estimates", () => {
    expect(ageScoreFromEstimatedAge(100)).toBe(0);
  });

  it("derives the estimate from account age", () => {
    const createdAt = new Date(NOW.getTime() - 4 * 365.25 * DAY_MS).toISOString();
    expect(calculateAgeScore(createdAt, NOW)).toBeCloseTo(8.2, 10);
  });

  it("falls back to 5 when the creation date is unusable", () => {
    expect(calculateAgeScore(null, NOW)).toBe(5);
    expect(calculateAgeScore("garbage", NOW)).toBe(5);
  });
});

describe("scoring config", () => {
  it("is frozen", () => {
    expect(Object.isFrozen(defaultConfig)).toBe(true);
    expect(Object.isFrozen(defaultConfig.technical)).toBe(true);
  });

  it("merges overrides onto the defaults", () => {
    const config = createConfig({ scale: 100, technical: { reposDivisor: 40 } });

    expect(config.technical.reposDivisor).toBe(40);
    expect(config.technical.starsDivisor).toBe(100);
    expect(calculateScores(user(), richRepos, low, config, NOW).technical).toBe(100);
  });

  it("rejects a zero divisor", () => {
    expect(() => createConfig({ technical: { reposDivisor: 0 } })).toThrow();
  });

  it("loads a config from JSON", () => {
    const config = loadConfigFromJson(JSON.stringify({ ...defaultConfig, scale: 5 }));
    expect(config.scale).toBe(5);
  });
});
