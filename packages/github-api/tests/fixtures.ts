import type { AggregatedProfile } from "../src/models";

export function makeProfile(overrides: Partial<AggregatedProfile> = {}): AggregatedProfile {
  return {
    login: "octo",
    name: "Octo Cat",
    company: null,
    location: null,
    bio: null,
    github_url: "https://github.test/octo",
    public_repos: 0,
    followers: 0,
    following: 0,
    account_age: "N/A",
    account_age_years: null,
    estimated_age: null,
    early_achievements: [],
    technical_score: 0,
    innovation_score: 0,
    collaboration_score: 0,
    age_score: 5,
    founder_potential: 0,
    languages: {},
    top_repos: [],
    contribution_frequency: "low",
    source: "github",
    ...overrides,
  };
}
