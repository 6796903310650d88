/**
 * Rule file parser and serializer
 *
 * One rule per line:
 *   FIELD                      presence only
 *   FIELD eq 'ARC'             text comparison against a literal
 *   FIELD <= $Hdr{FIELD}       numeric comparison against the reference header
 *   FIELD ; abs(FIELD - $Hdr{'FIELD'}) < 3
 *                              free expression, bare names read the candidate
 *
 * Invariants:
 * - "#" starts a comment unless it is inside quotes
 * - Rule order in the file is kept
 * - Any bad line fails the whole file (no rule is silently skipped)
 */

import type { NumericOperator, Rule, RuleSet, TextOperator, TimePolicy } from "../types.js";
import { MalformedRuleError } from "../errors.js";
import { isNumeric } from "../header.js";
import {
  ExpressionSyntaxError,
  FIELD_NAME,
  REFERENCE_TOKEN,
  compileExpression,
  referenceName,
} from "./expression.js";

/**
 * The field every index record carries for time ordering
 */
export const TIME_FIELD = "ORACTIME";

const OPERATOR = /^(?:(<=|>=|==|!=|<|>)|(eq|ne)(?![A-Za-z0-9_]))/;

const NUMERIC_OPERATORS: ReadonlySet<string> = new Set(["==", "!=", "<=", ">=", "<", ">"]);

export interface ParseOptions {
  /** Label for error messages (usually the file path) */
  source?: string;
  policy?: TimePolicy;
}

/**
 * Remove a trailing "#" comment, ignoring "#" inside quotes
 */
function stripComment(line: string): string {
  let quote: string | null = null;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote) {
      if (ch === quote) quote = null;
    } else if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === "#") {
      return line.slice(0, i);
    }
  }
  return line;
}

function isNumericOperator(op: string): op is NumericOperator {
  return NUMERIC_OPERATORS.has(op);
}

/**
 * Parse one non-blank, comment-free line
 */
function parseLine(text: string, lineNo: number, source: string, raw: string): Rule {
  const fail = (reason: string): never => {
    throw new MalformedRuleError(source, lineNo, raw, reason);
  };

  const fieldMatch = text.match(/^\S+/);
  const field = fieldMatch ? fieldMatch[0] : "";
  if (!FIELD_NAME.test(field)) {
    return fail(`Invalid field name "${field}"`);
  }

  const rest = text.slice(field.length).trim();
  if (rest === "") {
    return { field, operator: "presence", line: lineNo };
  }

  if (rest.startsWith(";")) {
    const expression = rest.slice(1).trim();
    if (expression === "") {
      return fail("Empty expression after ';'");
    }
    try {
      const ast = compileExpression(expression);
      return {
        field,
        operator: "expr",
        rhs: { kind: "expression", text: expression, ast },
        line: lineNo,
      };
    } catch (err) {
      if (err instanceof ExpressionSyntaxError) {
        return fail(`Invalid expression (${err.message})`);
      }
      throw err;
    }
  }

  const opMatch = rest.match(OPERATOR);
  if (!opMatch) {
    return fail(`Unknown operator "${rest.split(/\s+/)[0] ?? rest}"`);
  }
  const symbol = opMatch[1] ?? opMatch[2];
  if (symbol === undefined) {
    return fail("Unknown operator");
  }
  const operator: TextOperator | NumericOperator = isNumericOperator(symbol)
    ? symbol
    : symbol === "ne"
      ? "ne"
      : "eq";

  const rhsText = rest.slice(opMatch[0].length).trim();
  if (rhsText === "") {
    return fail(`Missing right-hand side for "${operator}"`);
  }

  if (rhsText.startsWith("$")) {
    const ref = rhsText.match(REFERENCE_TOKEN);
    if (!ref) {
      return fail("Expected $Hdr{FIELD}");
    }
    const refField = referenceName(ref);
    if (!FIELD_NAME.test(refField)) {
      return fail(`Invalid field name "${refField}" in reference`);
    }
    if (rhsText.slice(ref[0].length).trim() !== "") {
      return fail("Unexpected text after reference");
    }
    return { field, operator, rhs: { kind: "reference", field: refField }, line: lineNo };
  }

  let value: string;
  let quoted = false;
  const first = rhsText[0];
  if (first === "'" || first === '"') {
    const end = rhsText.indexOf(first, 1);
    if (end < 0) {
      return fail("Unterminated quoted literal");
    }
    if (rhsText.slice(end + 1).trim() !== "") {
      return fail("Unexpected text after literal");
    }
    value = rhsText.slice(1, end);
    quoted = true;
  } else {
    if (/\s/.test(rhsText)) {
      return fail("Unexpected text after literal");
    }
    value = rhsText;
  }

  if (isNumericOperator(operator) && !isNumeric(value)) {
    return fail(`Operator "${operator}" needs a numeric literal, got "${value}"`);
  }

  return { field, operator, rhs: { kind: "literal", value, quoted }, line: lineNo };
}

/**
 * Parse rule file text into a rule set
 * @param text - Rule file contents (LF or CRLF line endings)
 * @param options - Source label and tie-break policy
 * @throws {MalformedRuleError} On the first line that does not parse
 */
export function parseRules(text: string, options: ParseOptions = {}): RuleSet {
  const source = options.source ?? "<rules>";
  const rules: Rule[] = [];

  // Strip BOM if present
  const cleaned = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const lines = cleaned.split(/\r?\n/);

  lines.forEach((raw, i) => {
    const line = stripComment(raw).trim();
    if (line === "") return;
    rules.push(parseLine(line, i + 1, source, raw));
  });

  const ruleSet: RuleSet = { source, rules };
  if (options.policy) {
    ruleSet.policy = options.policy;
  }
  return ruleSet;
}

function formatLiteral(value: string, quoted: boolean): string {
  if (!quoted) return value;
  return value.includes("'") ? `"${value}"` : `'${value}'`;
}

/**
 * Serialize one rule back to rule-file syntax
 */
export function formatRule(rule: Rule): string {
  switch (rule.operator) {
    case "presence":
      return rule.field;
    case "expr":
      return `${rule.field} ; ${rule.rhs.text}`;
    default: {
      const rhs =
        rule.rhs.kind === "reference"
          ? `$Hdr{${rule.rhs.field}}`
          : formatLiteral(rule.rhs.value, rule.rhs.quoted);
      return `${rule.field} ${rule.operator} ${rhs}`;
    }
  }
}

/**
 * Serialize a rule set, one rule per line. Comments are not kept.
 */
export function formatRules(ruleSet: RuleSet): string {
  return ruleSet.rules.map(formatRule).join("\n") + (ruleSet.rules.length > 0 ? "\n" : "");
}

/**
 * Header fields an index needs for this rule set: every rule field in file
 * order, then ORACTIME if no rule names it
 */
export function indexColumns(ruleSet: RuleSet): string[] {
  const columns: string[] = [];
  for (const rule of ruleSet.rules) {
    if (!columns.includes(rule.field)) {
      columns.push(rule.field);
    }
  }
  if (!columns.includes(TIME_FIELD)) {
    columns.push(TIME_FIELD);
  }
  return columns;
}
