import type { AggregatedProfile } from "@founder-finder/github-api";

/**
 * Escape a value for CSV (handles commas, quotes, newlines)
 */
export function escapeCsvValue(value: string): string {
  if (value.includes(",") || value.includes('"') || value.includes("\n") || value.includes("\r")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

const COLUMNS = [
  "login",
  "name",
  "company",
  "location",
  "github_url",
  "estimated_age",
  "technical_score",
  "innovation_score",
  "collaboration_score",
  "age_score",
  "founder_potential",
  "contribution_frequency",
] as const satisfies ReadonlyArray<keyof AggregatedProfile>;

/**
 * Convert ranked profiles to CSV string. Null fields are left empty.
 */
export function toCsv(profiles: readonly AggregatedProfile[]): string {
  const rows = profiles.map((p) =>
    COLUMNS.map((column) => {
      const value = p[column];
      return value === null ? "" : escapeCsvValue(String(value));
    }).join(",")
  );
  return [COLUMNS.join(","), ...rows].join("\n");
}

/**
 * Format: unixtimestamp_query.csv
 */
export function getOutputFilename(query: string, now: Date = new Date()): string {
  const timestamp = Math.floor(now.getTime() / 1000);
  const safeQuery = query.replace(/[^a-zA-Z0-9-_]/g, "_");
  return `${timestamp}_${safeQuery}.csv`;
}
