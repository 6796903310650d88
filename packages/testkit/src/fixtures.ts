/**
 * Shared rule files and header builders
 */

import type { HeaderSet, HeaderValue } from "@calsel/sdk";

/**
 * Arc rules: same observation type, detector no wider than the reference
 */
export const ARC_RULES = `# arc selection
OBSTYPE eq 'ARC'
DETECXS <= $Hdr{DETECXS}
ORACTIME
`;

/**
 * Flat rules: same filter, exposure within 10% of the reference
 */
export const FLAT_RULES = `FILTER eq $Hdr{FILTER}
EXPTIME ; abs(EXPTIME - $Hdr{EXPTIME}) <= 0.1 * $Hdr{EXPTIME}
ORACTIME
`;

/**
 * Build a header from defaults and overrides; undefined removes a field
 */
export function header(
  overrides: Record<string, HeaderValue | undefined> = {},
  defaults: Record<string, HeaderValue> = { ORACTIME: 100 }
): HeaderSet {
  const result: Record<string, HeaderValue> = { ...defaults };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      delete result[key];
    } else {
      result[key] = value;
    }
  }
  return result;
}
