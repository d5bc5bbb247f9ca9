import type { AggregatedProfile } from "./models";

export interface DedupeResult {
  profiles: AggregatedProfile[];
  duplicates: number;
}

/**
 * Identity key: display name and company. Two distinct people sharing both
 * collapse into one record; profiles with neither share the key "-".
 */
export function dedupeKey(profile: Pick<AggregatedProfile, "name" | "company">): string {
  return `${profile.name ?? ""}-${profile.company ?? ""}`;
}

/**
 * Drop repeated profiles, keeping the first occurrence and input order.
 */
export function dedupeProfiles(profiles: readonly AggregatedProfile[]): DedupeResult {
  const seen = new Set<string>();
  const unique: AggregatedProfile[] = [];

  for (const profile of profiles) {
    const key = dedupeKey(profile);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(profile);
  }

  return { profiles: unique, duplicates: profiles.length - unique.length };
}
