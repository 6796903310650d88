/**
 * Predicate evaluation for rules against (reference, candidate) header pairs
 */

import type {
  HeaderSet,
  HeaderValue,
  MatchResult,
  NumericOperator,
  RejectionReason,
  Rule,
  RuleSet,
} from "../types.js";
import { hasField, requireField, toNumber, toText } from "../header.js";
import { evaluateExpression, truthy } from "./expression.js";
import { formatRule } from "./parser.js";
import { ExpressionError, MissingFieldError, NotNumericError } from "../errors.js";

/**
 * Outcome of one rule: a pass/fail verdict, or the error that stopped evaluation
 */
export type RuleOutcome =
  | { ok: true; pass: boolean }
  | { ok: false; error: MissingFieldError | NotNumericError | ExpressionError };

function compareNumbers(op: NumericOperator, a: number, b: number): boolean {
  switch (op) {
    case "==":
      return a === b;
    case "!=":
      return a !== b;
    case "<=":
      return a <= b;
    case ">=":
      return a >= b;
    case "<":
      return a < b;
    case ">":
      return a > b;
  }
}

/**
 * Evaluate a rule, throwing evaluation errors
 * @throws {MissingFieldError} If a field is absent from either header
 * @throws {NotNumericError} If a numeric operator meets a non-numeric value
 * @throws {ExpressionError} If an expression cannot be evaluated
 */
export function testRule(rule: Rule, reference: HeaderSet, candidate: HeaderSet): boolean {
  if (rule.operator === "presence") {
    return hasField(candidate, rule.field);
  }

  const value = requireField(candidate, rule.field, "candidate");

  if (rule.operator === "expr") {
    return truthy(evaluateExpression(rule.rhs.ast, rule.rhs.text, reference, candidate));
  }

  let rhs: HeaderValue;
  let rhsLabel: string;
  if (rule.rhs.kind === "reference") {
    rhs = requireField(reference, rule.rhs.field, "reference");
    rhsLabel = rule.rhs.field;
  } else {
    rhs = rule.rhs.value;
    rhsLabel = rule.field;
  }

  switch (rule.operator) {
    case "eq":
      return toText(value) === toText(rhs);
    case "ne":
      return toText(value) !== toText(rhs);
    default:
      return compareNumbers(rule.operator, toNumber(rule.field, value), toNumber(rhsLabel, rhs));
  }
}

/**
 * Evaluate a rule, capturing evaluation errors as values
 */
export function evaluateRule(rule: Rule, reference: HeaderSet, candidate: HeaderSet): RuleOutcome {
  try {
    return { ok: true, pass: testRule(rule, reference, candidate) };
  } catch (err) {
    if (
      err instanceof MissingFieldError ||
      err instanceof NotNumericError ||
      err instanceof ExpressionError
    ) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * Rejection reason for an evaluation error
 */
export function reasonFor(error: MissingFieldError | NotNumericError | ExpressionError): RejectionReason {
  if (error instanceof MissingFieldError) return "missing-field";
  if (error instanceof NotNumericError) return "not-numeric";
  return "expression";
}

/**
 * Match a candidate against every rule (conjunction).
 * Stops at the first rule that fails or cannot be evaluated.
 */
export function matchRuleSet(
  ruleSet: RuleSet,
  reference: HeaderSet,
  candidate: HeaderSet
): MatchResult {
  for (const rule of ruleSet.rules) {
    const outcome = evaluateRule(rule, reference, candidate);
    if (!outcome.ok) {
      return {
        matched: false,
        rule,
        reason: reasonFor(outcome.error),
        message: outcome.error.message,
      };
    }
    if (!outcome.pass) {
      return { matched: false, rule, reason: "failed", message: `failed ${formatRule(rule)}` };
    }
  }
  return { matched: true };
}

/**
 * Boolean shorthand for matchRuleSet
 */
export function matches(ruleSet: RuleSet, reference: HeaderSet, candidate: HeaderSet): boolean {
  return matchRuleSet(ruleSet, reference, candidate).matched;
}
