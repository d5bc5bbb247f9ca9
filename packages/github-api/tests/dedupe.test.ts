import { describe, expect, it } from "vitest";

import { dedupeKey, dedupeProfiles } from "../src/dedupe";
import { makeProfile } from "./fixtures";

describe("dedupeProfiles", () => {
  it("keeps the first profile per name and company", () => {
    const first = makeProfile({ login: "jdoe", name: "Jane Doe", company: "Acme", bio: "first" });
    const second = makeProfile({ login: "jane-d", name: "Jane Doe", company: "Acme", bio: "second" });
    const other = makeProfile({ login: "jdoe2", name: "Jane Doe", company: "Globex" });

    const result = dedupeProfiles([first, other, second]);

    expect(result.profiles.map((p) => p.login)).toEqual(["jdoe", "jdoe2"]);
    expect(result.profiles[0]?.bio).toBe("first");
    expect(result.duplicates).toBe(1);
  });

  it("treats missing name and company as empty strings", () => {
    expect(dedupeKey({ name: null, company: null })).toBe("-");
    expect(dedupeKey({ name: "Jane", company: null })).toBe("Jane-");

    const result = dedupeProfiles([
      makeProfile({ login: "a", name: null, company: null }),
      makeProfile({ login: "b", name: null, company: null }),
    ]);
    expect(result.profiles.map((p) => p.login)).toEqual(["a"]);
  });

  it("returns an empty list unchanged", () => {
    expect(dedupeProfiles([])).toEqual({ profiles: [], duplicates: 0 });
  });
});
