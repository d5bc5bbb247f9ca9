import { AbortedError, type SleepFn } from "@founder-finder/utils";

import type { FetchFn } from "../src/fetch";

export type Reply = { status: number; body?: unknown; headers?: Record<string, string> } | Error;

export interface RecordedCall {
  url: string;
  init: RequestInit;
}

function toResponse(reply: Reply): Response {
  if (reply instanceof Error) throw reply;
  const body = reply.body === undefined ? null : JSON.stringify(reply.body);
  return new Response(body, { status: reply.status, headers: reply.headers });
}

/**
 * Fetch stand-in answering from a fixed sequence of replies.
 */
export function queueFetch(replies: Reply[]): { fetchFn: FetchFn; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const queue = [...replies];
  const fetchFn: FetchFn = async (url, init) => {
    calls.push({ url, init });
    const next = queue.shift();
    if (!next) throw new Error(`unexpected request: ${url}`);
    return toResponse(next);
  };
  return { fetchFn, calls };
}

/**
 * Fetch stand-in answering by URL (query string ignored). An array is served
 * one reply per call; a single reply is served every time.
 */
export function routeFetch(routes: Record<string, Reply | Reply[]>): {
  fetchFn: FetchFn;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    calls.push({ url, init });
    const path = url.split("?")[0] ?? url;
    const route = routes[path];
    if (route === undefined) return toResponse({ status: 404, body: { message: "Not Found" } });
    if (!Array.isArray(route)) return toResponse(route);
    const next = route.shift();
    if (!next) throw new Error(`no reply left for ${path}`);
    return toResponse(next);
  };
  return { fetchFn, calls };
}

/**
 * Clock whose sleeps advance time instantly and are recorded.
 */
export function fakeClock(start = Date.parse("2026-06-01T00:00:00Z")) {
  let current = start;
  const sleeps: number[] = [];

  const sleep: SleepFn = async (ms, signal) => {
    if (signal?.aborted) throw new AbortedError();
    sleeps.push(ms);
    current += ms;
  };

  return {
    sleeps,
    sleep,
    now: () => current,
    date: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
}

export const TEST_TOKEN = `ghp_${"a".repeat(40)}`;
