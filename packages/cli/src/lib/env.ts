/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the rules search path
 * Priority: CLI option > CALSEL_RULES_PATH env var > default "./cal"
 * Entries are separated by the platform path delimiter
 */
export function resolveRulesPath(cliRulesPath?: string): string[] {
  const raw = cliRulesPath ?? process.env.CALSEL_RULES_PATH ?? "./cal";
  return raw
    .split(path.delimiter)
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry) => path.resolve(expandTilde(entry)));
}

/**
 * Resolve the data directory holding dynamic index files
 * Priority: CLI option > CALSEL_DATA_OUT env var > default "./data"
 */
export function resolveDataDir(cliDataDir?: string): string {
  const dir = cliDataDir ?? process.env.CALSEL_DATA_OUT ?? "./data";
  return path.resolve(expandTilde(dir));
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.CALSEL_CLI_DEBUG === "1";
}
