import { defaultConfig } from "./config";
import { parseTimestamp, wholeDaysBetween } from "./dates";
import logger from "./logger";
import type {
  ActivityFrequency,
  ActivityProfile,
  EventSignals,
  FounderScoreConfig,
} from "./types";

export function classifyFrequency(
  recentEvents: number,
  config: FounderScoreConfig = defaultConfig
): ActivityFrequency {
  const t = config.activity;
  if (recentEvents > t.veryHigh) return "very_high";
  if (recentEvents > t.high) return "high";
  if (recentEvents > t.medium) return "medium";
  return "low";
}

/**
 * Classify how active a candidate is from their recent public events.
 *
 * Counts events created no more than `activity.windowDays` whole days before
 * `now`. Events with a missing or unparseable timestamp are skipped one by one;
 * an empty list classifies as "low".
 */
export function analyzeContributions(
  events: readonly EventSignals[],
  now: Date = new Date(),
  config: FounderScoreConfig = defaultConfig
): ActivityProfile {
  let recentEvents = 0;
  let skipped = 0;

  for (const event of events) {
    const createdAt = parseTimestamp(event.createdAt);
    if (!createdAt) {
      skipped++;
      continue;
    }
    if (wholeDaysBetween(now, createdAt) <= config.activity.windowDays) {
      recentEvents++;
    }
  }

  if (skipped > 0) {
    logger.debug("Skipped events with unusable timestamps", { skipped, total: events.length });
  }

  return { frequency: classifyFrequency(recentEvents, config), recentEvents };
}

export function isHighlyActive(frequency: ActivityFrequency): boolean {
  return frequency === "high" || frequency === "very_high";
}
