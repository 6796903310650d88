/**
 * Choose one calibration among the records that satisfy a rule set
 */

import type {
  HeaderSet,
  IndexRecord,
  RuleSet,
  Selection,
  SelectOptions,
  TimePolicy,
} from "./types.js";
import type { CalibrationIndex } from "./index/calibration-index.js";
import { recordTime } from "./index/calibration-index.js";
import { TIME_FIELD } from "./rules/parser.js";
import { requireField, toNumber } from "./header.js";

export const DEFAULT_POLICY: TimePolicy = "before";

/**
 * Policy in effect: caller option, then rule set, then the default
 */
export function effectivePolicy(ruleSet: RuleSet, opts?: SelectOptions): TimePolicy {
  return opts?.policy ?? ruleSet.policy ?? DEFAULT_POLICY;
}

/**
 * Reference ORACTIME as a number
 * @throws {MissingFieldError} If the reference has no ORACTIME
 * @throws {NotNumericError} If it does not parse
 */
function referenceTime(reference: HeaderSet): number {
  return toNumber(TIME_FIELD, requireField(reference, TIME_FIELD, "reference"));
}

/**
 * Pick the best record under a policy. Later-appended records win ties.
 * Returns undefined when the policy admits none of the candidates.
 */
export function pickBest(
  candidates: readonly IndexRecord[],
  policy: TimePolicy,
  reference: HeaderSet
): IndexRecord | undefined {
  if (candidates.length === 0) return undefined;

  if (policy === "latest") {
    return candidates.reduce((best, record) => (record.seq > best.seq ? record : best));
  }

  const now = referenceTime(reference);
  let best: IndexRecord | undefined;
  let bestScore = Number.POSITIVE_INFINITY;

  for (const record of candidates) {
    const time = recordTime(record);
    let score: number;
    if (policy === "before") {
      if (time > now) continue;
      score = now - time;
    } else {
      score = Math.abs(time - now);
    }

    if (
      best === undefined ||
      score < bestScore ||
      (score === bestScore && record.seq > best.seq)
    ) {
      best = record;
      bestScore = score;
    }
  }

  return best;
}

/**
 * Select the single best calibration for a reference header
 * @param index - Index to search
 * @param ruleSet - Rules for the calibration type
 * @param reference - Header of the frame being reduced
 * @param opts - Policy override
 * @returns A selected record, or an explicit "none" outcome
 * @throws {MissingFieldError} If a time-based policy is used and the reference lacks ORACTIME
 */
export function selectBest(
  index: CalibrationIndex,
  ruleSet: RuleSet,
  reference: HeaderSet,
  opts?: SelectOptions
): Selection {
  const policy = effectivePolicy(ruleSet, opts);
  const { matches, rejections } = index.query(ruleSet, reference);

  if (matches.length === 0) {
    return { status: "none", reason: "no-candidates", policy, matches, rejections };
  }

  const record = pickBest(matches, policy, reference);
  if (!record) {
    return { status: "none", reason: "none-before-reference", policy, matches, rejections };
  }

  return { status: "selected", record, policy, matches, rejections };
}
