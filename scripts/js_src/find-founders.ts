#!/usr/bin/env tsx
/**
 * Search GitHub and rank candidates by founder potential.
 *
 * Flow:
 * 1. Build a search query from the terms (and optional location)
 * 2. Fetch and score every candidate, respecting the hourly quota
 * 3. Print a ranked table, or JSON with --json
 *
 * Usage:
 *   npm run find-founders -- <terms...> [--location=X] [--json] [--csv] [--concurrency=N]
 *
 * Example:
 *   npm run find-founders -- "machine learning" founder --location="San Francisco"
 *   npm run find-founders -- rust compiler --json > founders.json
 */
import cliProgress from "cli-progress";
import { Table } from "console-table-printer";
import * as fs from "fs";
import * as path from "path";

import {
  type AggregatedProfile,
  GithubApiError,
  buildSearchQuery,
  createPipeline,
  loadConfig,
} from "@founder-finder/github-api";

import { parseArgs } from "./args";
import { getOutputFilename, toCsv } from "./csv";
import { rootDir } from "./env";

const USAGE = `
Search GitHub users and rank them by founder potential.

Usage:
  npm run find-founders -- <terms...> [options]

Options:
  --location=X      Restrict results to a location
  --json            Print the full result as JSON instead of a table
  --csv             Also write a CSV file to scripts/output/
  --concurrency=N   Candidates fetched in parallel (default: FETCH_CONCURRENCY or 5)
  --help, -h        Show this help message

Environment:
  GITHUB_TOKEN      Personal access token (ghp_...); unauthenticated if missing

Example:
  npm run find-founders -- "machine learning" founder --location="San Francisco"
`;

const score = (value: number) => value.toFixed(1);

function printRanking(profiles: AggregatedProfile[]): void {
  const table = new Table({
    columns: [
      { name: "rank", title: "#", alignment: "right" },
      { name: "login", title: "Login", alignment: "left" },
      { name: "name", title: "Name", alignment: "left" },
      { name: "company", title: "Company", alignment: "left" },
      { name: "age", title: "Est. age", alignment: "right" },
      { name: "technical", title: "Tech", alignment: "right" },
      { name: "innovation", title: "Innov", alignment: "right" },
      { name: "collaboration", title: "Collab", alignment: "right" },
      { name: "ageScore", title: "Age", alignment: "right" },
      { name: "founder", title: "Founder", alignment: "right" },
      { name: "activity", title: "Activity", alignment: "left" },
    ],
  });

  table.addRows(
    profiles.map((p, i) => ({
      rank: i + 1,
      login: p.login,
      name: p.name ?? "",
      company: p.company ?? "",
      age: p.estimated_age ?? "N/A",
      technical: score(p.technical_score),
      innovation: score(p.innovation_score),
      collaboration: score(p.collaboration_score),
      ageScore: score(p.age_score),
      founder: score(p.founder_potential),
      activity: p.contribution_frequency,
    }))
  );

  table.printTable();
}

function writeCsv(query: string, profiles: AggregatedProfile[]): string {
  const outputDir = path.join(rootDir, "scripts", "output");
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }
  const outputPath = path.join(outputDir, getOutputFilename(query));
  fs.writeFileSync(outputPath, toCsv(profiles), "utf-8");
  return outputPath;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));

  if (args.help || args.terms.length === 0) {
    console.log(USAGE);
    process.exit(args.help ? 0 : 1);
  }

  const query = buildSearchQuery({ name: args.terms.join(" "), location: args.location });
  const pipeline = createPipeline(loadConfig(), { concurrency: args.concurrency });

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const progressBar = args.json
    ? null
    : new cliProgress.SingleBar(
        {
          format: "Candidates |{bar}| {percentage}% | {value}/{total}",
          hideCursor: true,
        },
        cliProgress.Presets.shades_classic
      );

  if (!args.json) console.log(`\nSearching GitHub for: ${query}\n`);

  let started = false;
  const result = await pipeline
    .run(query, {
      signal: controller.signal,
      onProgress: (processed, total) => {
        if (!progressBar) return;
        if (!started) {
          progressBar.start(total, 0);
          started = true;
        }
        progressBar.update(processed);
      },
    })
    .finally(() => {
      if (started) progressBar?.stop();
    });

  if (args.json) {
    console.log(JSON.stringify(result, null, 2));
  } else if (result.profiles.length === 0) {
    console.log(`No profiles found for "${query}".`);
  } else {
    console.log("");
    printRanking(result.profiles);
    console.log(
      `\n${result.profiles.length} ranked · ${result.dropped} dropped · ${result.duplicates} duplicates · run ${result.runId}`
    );
  }

  if (args.csv && result.profiles.length > 0) {
    const outputPath = writeCsv(query, result.profiles);
    if (!args.json) console.log(`\n✓ CSV saved to: ${outputPath}`);
  }
}

main().catch((err: unknown) => {
  if (err instanceof GithubApiError) {
    console.error(`Error [${err.errorCode}]:`, err.message);
  } else {
    console.error("Error:", err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
});
