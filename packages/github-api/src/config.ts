/**
 * Environment configuration for the GitHub source.
 *
 * Variables (all optional):
 *   GITHUB_TOKEN              personal access token, "ghp_" + 40 characters
 *   GITHUB_API                API base URL (default https://api.github.com)
 *   GITHUB_REQUESTS_PER_HOUR  documented hard cap with a token (default 5000)
 *   GITHUB_RATE_LIMIT_BUFFER  calls kept in reserve below that cap (default 500)
 *   GITHUB_UNAUTH_REQUESTS_PER_HOUR  hard cap without a token (default 60)
 *   GITHUB_UNAUTH_RATE_LIMIT_BUFFER  reserve below the unauthenticated cap (default 10)
 *   GITHUB_USER_AGENT         User-Agent header
 *   GITHUB_REQUIRE_TOKEN      "true" to refuse unauthenticated runs
 *   GITHUB_SEARCH_PER_PAGE    search results per query, 1-100 (default 30)
 *   FETCH_CONCURRENCY         candidates fetched in parallel (default 5)
 */
import { z } from "zod";

import { GithubApiError } from "./errors";
import logger from "./logger";

const TOKEN_PREFIX = "ghp_";
const TOKEN_LENGTH = 44;

/** Treat empty strings from .env files as unset */
const unset = (value: unknown) => (value === "" ? undefined : value);

const EnvSchema = z
  .object({
    GITHUB_TOKEN: z.preprocess(unset, z.string().optional()),
    GITHUB_API: z.preprocess(unset, z.string().url().default("https://api.github.com")),
    GITHUB_REQUESTS_PER_HOUR: z.preprocess(unset, z.coerce.number().int().positive().default(5000)),
    GITHUB_RATE_LIMIT_BUFFER: z.preprocess(unset, z.coerce.number().int().nonnegative().default(500)),
    GITHUB_UNAUTH_REQUESTS_PER_HOUR: z.preprocess(unset, z.coerce.number().int().positive().default(60)),
    GITHUB_UNAUTH_RATE_LIMIT_BUFFER: z.preprocess(unset, z.coerce.number().int().nonnegative().default(10)),
    GITHUB_USER_AGENT: z.preprocess(unset, z.string().default("founder-finder/0.1")),
    GITHUB_REQUIRE_TOKEN: z.preprocess(unset, z.enum(["true", "false"]).default("false")),
    GITHUB_SEARCH_PER_PAGE: z.preprocess(unset, z.coerce.number().int().min(1).max(100).default(30)),
    FETCH_CONCURRENCY: z.preprocess(unset, z.coerce.number().int().min(1).max(50).default(5)),
  })
  .refine((env) => env.GITHUB_RATE_LIMIT_BUFFER < env.GITHUB_REQUESTS_PER_HOUR, {
    message: "GITHUB_RATE_LIMIT_BUFFER must be lower than GITHUB_REQUESTS_PER_HOUR",
    path: ["GITHUB_RATE_LIMIT_BUFFER"],
  })
  .refine((env) => env.GITHUB_UNAUTH_RATE_LIMIT_BUFFER < env.GITHUB_UNAUTH_REQUESTS_PER_HOUR, {
    message: "GITHUB_UNAUTH_RATE_LIMIT_BUFFER must be lower than GITHUB_UNAUTH_REQUESTS_PER_HOUR",
    path: ["GITHUB_UNAUTH_RATE_LIMIT_BUFFER"],
  });

export interface GithubConfig {
  /** Validated token, or null when absent or malformed */
  token: string | null;
  apiBase: string;
  /** Calls allowed per hour window: hard cap minus buffer, for the credential in use */
  rateLimit: number;
  userAgent: string;
  requireToken: boolean;
  searchPerPage: number;
  concurrency: number;
}

export type TokenCheck = { token: string } | { token: null; problem: string };

/**
 * Check the shape of a personal access token. Surrounding whitespace is
 * trimmed first; the token itself must not contain spaces or comment marks.
 */
export function checkToken(raw: string | undefined): TokenCheck {
  const token = raw?.trim() ?? "";
  if (!token) return { token: null, problem: "No GitHub token found" };
  if (!token.startsWith(TOKEN_PREFIX)) {
    return { token: null, problem: `Token must start with '${TOKEN_PREFIX}'` };
  }
  if (token.length !== TOKEN_LENGTH) {
    return {
      token: null,
      problem: `Expected ${TOKEN_LENGTH} characters (including '${TOKEN_PREFIX}'), got ${token.length}`,
    };
  }
  if (/[\s#]/.test(token)) {
    return { token: null, problem: "Token contains spaces or comments" };
  }
  return { token };
}

/**
 * Build the GitHub configuration from environment variables.
 *
 * A malformed or missing token is logged and dropped; requests then go out
 * unauthenticated under the much smaller unauthenticated budget. Other
 * invalid values throw INVALID_CONFIG.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GithubConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    logger.error("Invalid configuration", { issues });
    throw new GithubApiError("INVALID_CONFIG", issues.join("; "), { issues });
  }

  const vars = parsed.data;
  const check = checkToken(vars.GITHUB_TOKEN);
  if (check.token === null) {
    logger.error("GitHub token unusable", { problem: check.problem });
  } else {
    logger.info("GitHub token format appears valid");
  }

  const rateLimit =
    check.token === null
      ? vars.GITHUB_UNAUTH_REQUESTS_PER_HOUR - vars.GITHUB_UNAUTH_RATE_LIMIT_BUFFER
      : vars.GITHUB_REQUESTS_PER_HOUR - vars.GITHUB_RATE_LIMIT_BUFFER;

  return {
    token: check.token,
    apiBase: vars.GITHUB_API.replace(/\/+$/, ""),
    rateLimit,
    userAgent: vars.GITHUB_USER_AGENT,
    requireToken: vars.GITHUB_REQUIRE_TOKEN === "true",
    searchPerPage: vars.GITHUB_SEARCH_PER_PAGE,
    concurrency: vars.FETCH_CONCURRENCY,
  };
}
