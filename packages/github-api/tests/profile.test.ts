import { describe, expect, it } from "vitest";

import { RequestExecutor } from "../src/fetch";
import { RawRepositorySchema, RawUserSchema } from "../src/models";
import { buildAggregatedProfile, extractLanguages, fetchProfile, getTopRepos } from "../src/profile";
import { RateLimiter } from "../src/rate-limiter";
import { type Reply, TEST_TOKEN, fakeClock, routeFetch } from "./helpers";

const NOW = new Date("2026-06-01T00:00:00Z");
const URL_USER = "https://api.test/users/jdoe";

const userBody = {
  login: "jdoe",
  name: "Jane Doe",
  company: "Acme",
  location: "Berlin",
  bio: "Building developer tools",
  html_url: "https://github.test/jdoe",
  public_repos: 4,
  followers: 250,
  following: 100,
  created_at: "2016-06-01T00:00:00Z",
};

const repoBodies = [
  {
    name: "engine",
    description: "fast",
    stargazers_count: 250,
    forks_count: 60,
    language: "Rust",
    created_at: "2017-01-01T00:00:00Z",
  },
  {
    name: "site",
    description: null,
    stargazers_count: 10,
    forks_count: 2,
    language: "TypeScript",
    created_at: "2020-01-01T00:00:00Z",
  },
  {
    name: "notes",
    description: null,
    stargazers_count: 0,
    forks_count: 0,
    language: null,
    created_at: "2021-01-01T00:00:00Z",
  },
  {
    name: "cli",
    description: "command line",
    stargazers_count: 40,
    forks_count: 8,
    language: "Rust",
    created_at: "2018-01-01T00:00:00Z",
  },
];

const busyEvents = Array.from({ length: 60 }, () => ({ created_at: "2026-05-01T00:00:00Z" }));

function setup(routes: Record<string, Reply | Reply[]>) {
  const clock = fakeClock(NOW.getTime());
  const { fetchFn, calls } = routeFetch(routes);
  const executor = new RequestExecutor({
    rateLimiter: new RateLimiter({ now: clock.now, sleep: clock.sleep }),
    token: TEST_TOKEN,
    userAgent: "founder-finder-test",
    fetchFn,
    sleep: clock.sleep,
  });
  const requested = () => calls.map((c) => c.url);
  return { executor, requested, now: () => NOW };
}

describe("extractLanguages", () => {
  it("counts repositories per non-null language", () => {
    const repos = repoBodies.map((r) => RawRepositorySchema.parse(r));
    expect(extractLanguages(repos)).toEqual({ Rust: 2, TypeScript: 1 });
  });

  it("counts languages named like Object members from zero", () => {
    const repos = ["constructor", "toString", "constructor"].map((language, i) =>
      RawRepositorySchema.parse({ name: `r${i}`, language })
    );

    expect(extractLanguages(repos)).toEqual({ constructor: 2, toString: 1 });
  });
});

describe("getTopRepos", () => {
  it("projects the three most-starred repositories", () => {
    const repos = repoBodies.map((r) => RawRepositorySchema.parse(r));

    expect(getTopRepos(repos)).toEqual([
      {
        name: "engine",
        description: "fast",
        stars: 250,
        forks: 60,
        language: "Rust",
        created_at: "2017-01-01T00:00:00Z",
      },
      {
        name: "cli",
        description: "command line",
        stars: 40,
        forks: 8,
        language: "Rust",
        created_at: "2018-01-01T00:00:00Z",
      },
      {
        name: "site",
        description: null,
        stars: 10,
        forks: 2,
        language: "TypeScript",
        created_at: "2020-01-01T00:00:00Z",
      },
    ]);
  });
});

describe("buildAggregatedProfile", () => {
  it("merges user data with every score", () => {
    const profile = buildAggregatedProfile(
      RawUserSchema.parse(userBody),
      repoBodies.map((r) => RawRepositorySchema.parse(r)),
      busyEvents,
      NOW
    );

    expect(profile).toMatchObject({
      login: "jdoe",
      name: "Jane Doe",
      company: "Acme",
      github_url: "https://github.test/jdoe",
      account_age: "10.0 years",
      estimated_age: 26,
      early_achievements: [{ name: "engine", stars: 250, created_after_years: 0.6 }],
      technical_score: 10,
      innovation_score: 10,
      contribution_frequency: "high",
      languages: { Rust: 2, TypeScript: 1 },
      source: "github",
    });
    expect(profile.collaboration_score).toBeCloseTo(7, 6);
    expect(profile.founder_potential).toBeCloseTo(9.1, 6);
    expect(profile.age_score).toBeCloseTo(9.7, 2);
    expect(profile.top_repos.map((r) => r.name)).toEqual(["engine", "cli", "site"]);
  });
});

describe("fetchProfile", () => {
  it("fetches user, repositories and events in order", async () => {
    const { executor, requested, now } = setup({
      [URL_USER]: { status: 200, body: userBody },
      [`${URL_USER}/repos`]: { status: 200, body: repoBodies },
      [`${URL_USER}/events/public`]: { status: 200, body: busyEvents },
    });

    const profile = await fetchProfile(URL_USER, { executor, now });

    expect(requested()).toEqual([URL_USER, `${URL_USER}/repos`, `${URL_USER}/events/public`]);
    expect(profile?.login).toBe("jdoe");
    expect(profile?.technical_score).toBe(10);
    expect(profile?.contribution_frequency).toBe("high");
  });

  it("drops the candidate when the user detail fails", async () => {
    const { executor, requested, now } = setup({ [URL_USER]: { status: 500 } });

    const profile = await fetchProfile(URL_USER, { executor, now });

    expect(profile).toBeNull();
    expect(requested()).toEqual([URL_USER, URL_USER, URL_USER]);
  });

  it("drops the candidate when the user detail is forbidden", async () => {
    const { executor, requested, now } = setup({ [URL_USER]: { status: 403 } });

    expect(await fetchProfile(URL_USER, { executor, now })).toBeNull();
    expect(requested()).toEqual([URL_USER]);
  });

  it("drops the candidate when the user detail is not an object", async () => {
    const { executor, now } = setup({ [URL_USER]: { status: 200, body: "jdoe" } });

    expect(await fetchProfile(URL_USER, { executor, now })).toBeNull();
  });

  it("scores with no repositories when that stage fails", async () => {
    const { executor, requested, now } = setup({
      [URL_USER]: { status: 200, body: userBody },
      [`${URL_USER}/repos`]: { status: 502 },
      [`${URL_USER}/events/public`]: { status: 200, body: busyEvents },
    });

    const profile = await fetchProfile(URL_USER, { executor, now });

    expect(requested().filter((u) => u.endsWith("/events/public"))).toHaveLength(1);
    expect(profile).toMatchObject({
      technical_score: 0,
      innovation_score: 0,
      collaboration_score: 0,
      founder_potential: 0,
      top_repos: [],
      languages: {},
      estimated_age: 26,
    });
    expect(profile?.age_score).toBeCloseTo(9.7, 2);
  });

  it("skips events after an authorization error on repositories", async () => {
    const { executor, requested, now } = setup({
      [URL_USER]: { status: 200, body: userBody },
      [`${URL_USER}/repos`]: { status: 401 },
      [`${URL_USER}/events/public`]: { status: 200, body: busyEvents },
    });

    const profile = await fetchProfile(URL_USER, { executor, now });

    expect(requested()).toEqual([URL_USER, `${URL_USER}/repos`]);
    expect(profile?.login).toBe("jdoe");
    expect(profile?.contribution_frequency).toBe("low");
  });

  it("keeps repositories when events fail", async () => {
    const { executor, now } = setup({
      [URL_USER]: { status: 200, body: userBody },
      [`${URL_USER}/repos`]: { status: 200, body: repoBodies },
      [`${URL_USER}/events/public`]: { status: 403 },
    });

    const profile = await fetchProfile(URL_USER, { executor, now });

    expect(profile?.technical_score).toBe(10);
    expect(profile?.contribution_frequency).toBe("low");
  });

  it("propagates cancellation", async () => {
    const { executor, now } = setup({ [URL_USER]: { status: 200, body: userBody } });
    const controller = new AbortController();
    controller.abort();

    await expect(
      fetchProfile(URL_USER, { executor, now, signal: controller.signal })
    ).rejects.toMatchObject({ errorCode: "ABORTED" });
  });
});
