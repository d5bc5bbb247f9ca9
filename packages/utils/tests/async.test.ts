import { afterEach, describe, expect, it, vi } from "vitest";

import { AbortedError, chunkArray, sleep } from "../src/async";

describe("chunkArray", () => {
  it("splits into fixed-size chunks with a shorter tail", () => {
    expect(chunkArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it("returns no chunks for an empty array", () => {
    expect(chunkArray([], 3)).toEqual([]);
  });

  it("rejects a chunk size below 1", () => {
    expect(() => chunkArray([1], 0)).toThrow(RangeError);
  });
});

describe("sleep", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after the given delay", async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it("rejects immediately when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(10_000, controller.signal)).rejects.toBeInstanceOf(AbortedError);
  });

  it("rejects when aborted while waiting", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(AbortedError);
  });
});
