/**
 * Founder Scorer Package
 *
 * Exports:
 * - analyzeContributions: activity frequency from recent events
 * - estimateAge: account age, estimated age and early achievements
 * - calculateScores: technical / innovation / collaboration / age / founder potential
 * - computeDetailedScores: same, with every intermediate value
 * - defaultConfig / createConfig / loadConfigFromJson: scoring weights
 * - Types: all type definitions
 */

export * from "./types";

export { analyzeContributions, classifyFrequency, isHighlyActive } from "./activity";
export { estimateAge, findGraduationYear, sortByStars } from "./age";
export { createConfig, defaultConfig, loadConfigFromJson, parseConfig } from "./config";
export { parseTimestamp } from "./dates";
export {
  ageScoreFromEstimatedAge,
  calculateAgeScore,
  calculateScores,
  computeDetailedScores,
  computeFounderPotentialUnit,
  computeUnitScores,
  summarizeRepos,
} from "./scorer";
