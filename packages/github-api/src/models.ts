/**
 * GitHub payload schemas and the aggregated output record.
 *
 * Field-level `.catch()` fallbacks mean a missing or mistyped field becomes
 * null/0/"" instead of failing the whole record. Only a payload that is not an
 * object at all fails to parse.
 */
import { z } from "zod";

import type { ActivityFrequency } from "@founder-finder/founder-scorer";

const text = z.string().nullable().catch(null);
const count = z.number().int().nonnegative().catch(0);

export const RawUserSchema = z.object({
  login: z.string().catch(""),
  name: text,
  company: text,
  location: text,
  bio: text,
  html_url: text,
  public_repos: count,
  followers: count,
  following: count,
  created_at: text,
});

export const RawRepositorySchema = z.object({
  name: z.string().catch(""),
  description: text,
  stargazers_count: count,
  forks_count: count,
  language: text,
  created_at: text,
});

export const RawEventSchema = z.object({
  created_at: text,
});

const SearchItemSchema = z.object({
  url: z.string().url(),
});

export const SearchResponseSchema = z.object({
  total_count: count,
  items: z.array(z.unknown()).catch([]),
});

export type RawUser = z.infer<typeof RawUserSchema>;
export type RawRepository = z.infer<typeof RawRepositorySchema>;
export type RawEvent = z.infer<typeof RawEventSchema>;

/**
 * Parse a list payload item by item. A non-array payload gives an empty list;
 * items that are not objects are dropped.
 */
export function parseList<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): T[] {
  if (!Array.isArray(payload)) return [];
  const items: T[] = [];
  for (const item of payload) {
    const parsed = schema.safeParse(item);
    if (parsed.success) items.push(parsed.data);
  }
  return items;
}

/**
 * Candidate detail URLs from a /search/users response.
 */
export function parseSearchItems(payload: unknown): { totalCount: number; urls: string[] } {
  const parsed = SearchResponseSchema.safeParse(payload);
  if (!parsed.success) return { totalCount: 0, urls: [] };
  const urls = parseList(SearchItemSchema, parsed.data.items).map((item) => item.url);
  return { totalCount: parsed.data.total_count, urls };
}

// ============================================================================
// Output
// ============================================================================

export interface TopRepository {
  name: string;
  description: string | null;
  stars: number;
  forks: number;
  language: string | null;
  created_at: string | null;
}

export interface EarlyAchievementRecord {
  name: string;
  stars: number;
  created_after_years: number;
}

/**
 * One scored candidate. Unknown values are null, never omitted, so the
 * record serializes with a fixed set of keys.
 */
export interface AggregatedProfile {
  login: string;
  name: string | null;
  company: string | null;
  location: string | null;
  bio: string | null;
  github_url: string | null;
  public_repos: number;
  followers: number;
  following: number;
  account_age: string;
  account_age_years: number | null;
  estimated_age: number | null;
  early_achievements: EarlyAchievementRecord[];
  technical_score: number;
  innovation_score: number;
  collaboration_score: number;
  age_score: number;
  founder_potential: number;
  languages: Record<string, number>;
  top_repos: TopRepository[];
  contribution_frequency: ActivityFrequency;
  source: "github";
}
