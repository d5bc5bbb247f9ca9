/**
 * Load environment variables from root .env file.
 * Import this at the top of any script that needs env vars.
 */

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Root directory (scripts/js_src -> scripts -> root)
export const rootDir = path.resolve(__dirname, "..", "..");
const envPath = path.join(rootDir, ".env");

/**
 * Parse .env content. Later keys win; quotes around a value are removed.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const vars: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    // Skip empty lines and comments
    if (!line.trim() || line.trimStart().startsWith("#")) continue;

    const match = /^([^=]+)=(.*)$/.exec(line);
    if (!match?.[1] || match[2] === undefined) continue;

    const key = match[1].trim();
    let value = match[2].trim();

    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }

    vars[key] = value;
  }

  return vars;
}

if (fs.existsSync(envPath)) {
  const vars = parseEnvFile(fs.readFileSync(envPath, "utf-8"));
  for (const [key, value] of Object.entries(vars)) {
    // Only set if not already defined (don't override explicit env vars)
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}
