/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import type { TimePolicy } from "@calsel/sdk";

const POLICIES: readonly TimePolicy[] = ["before", "nearest", "latest"];

function isPolicy(value: string): value is TimePolicy {
  return POLICIES.some((policy) => policy === value);
}

/**
 * Parse a --policy value
 */
export function parsePolicy(value: string): TimePolicy {
  const trimmed = value.trim();
  if (!isPolicy(trimmed)) {
    throw new InvalidArgumentError(`policy must be one of: ${POLICIES.join(", ")}`);
  }
  return trimmed;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Parse a calibration type name (used to build rules.<type> and index.<type>)
 */
export function parseTypeName(value: string): string {
  if (!/^[A-Za-z0-9_][A-Za-z0-9_-]*$/.test(value)) {
    throw new InvalidArgumentError(
      `calibration type must contain only letters, digits, "_" and "-": ${value}`
    );
  }
  return value;
}
