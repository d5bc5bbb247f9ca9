export interface FindFoundersArgs {
  terms: string[];
  location?: string;
  json: boolean;
  csv: boolean;
  concurrency?: number;
  help: boolean;
}

/**
 * Parse `find-founders` arguments. Anything that is not a flag is a search
 * term; flags take their value after "=".
 *
 * @throws Error on an unknown flag or a bad --concurrency value
 */
export function parseArgs(argv: readonly string[]): FindFoundersArgs {
  const args: FindFoundersArgs = { terms: [], json: false, csv: false, help: false };

  for (const arg of argv) {
    if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg === "--json") {
      args.json = true;
    } else if (arg === "--csv") {
      args.csv = true;
    } else if (arg.startsWith("--location=")) {
      const location = arg.slice("--location=".length).trim();
      if (location) args.location = location;
    } else if (arg.startsWith("--concurrency=")) {
      const raw = arg.slice("--concurrency=".length);
      const concurrency = Number(raw);
      if (!/^\d+$/.test(raw) || concurrency < 1) {
        throw new Error(`--concurrency must be a positive integer, got "${raw}"`);
      }
      args.concurrency = concurrency;
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (arg.trim()) {
      args.terms.push(arg.trim());
    }
  }

  return args;
}
