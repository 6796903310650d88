/**
 * Restricted expression language for ";" rules
 *
 * Grammar (lowest to highest precedence):
 *   or       := and ( "||" and )*
 *   and      := equality ( "&&" equality )*
 *   equality := relation ( ( "==" | "!=" | "eq" | "ne" ) relation )*
 *   relation := sum ( ( "<" | "<=" | ">" | ">=" ) sum )*
 *   sum      := product ( ( "+" | "-" ) product )*
 *   product  := unary ( ( "*" | "/" ) unary )*
 *   unary    := ( "!" | "-" | "+" ) unary | primary
 *   primary  := number | string | field | $Hdr{field} | abs( or ) | ( or )
 *
 * Bare identifiers read the candidate header; $Hdr{...} reads the reference header.
 * There are no other functions, assignments or member accesses.
 */

import type { BinaryOperator, ExprNode, HeaderSet, HeaderValue } from "../types.js";
import { parseNumber, requireField, toText } from "../header.js";
import { ExpressionError, NotNumericError } from "../errors.js";

/**
 * Matches "$Hdr{NAME}", "$Hdr{'NAME'}" and "$Hdr{\"NAME\"}" at the start of a string
 */
export const REFERENCE_TOKEN = /^\$Hdr\{\s*(?:'([^']*)'|"([^"]*)"|([^'"}\s]*))\s*\}/;

/**
 * Field names: identifiers, optionally dot-separated
 */
export const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z0-9_]+)*$/;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z0-9_]+)*/;
const NUMBER = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const SYMBOLS = ["&&", "||", "<=", ">=", "==", "!=", "<", ">", "+", "-", "*", "/", "!"] as const;

type SymbolText = (typeof SYMBOLS)[number];

type Token =
  | { type: "number"; value: number; pos: number }
  | { type: "string"; value: string; pos: number }
  | { type: "ident"; value: string; pos: number }
  | { type: "ref"; value: string; pos: number }
  | { type: "op"; value: SymbolText | "eq" | "ne"; pos: number }
  | { type: "lparen"; pos: number }
  | { type: "rparen"; pos: number }
  | { type: "eof"; pos: number };

/**
 * Thrown when expression text does not compile
 */
export class ExpressionSyntaxError extends Error {
  constructor(
    message: string,
    public readonly position: number
  ) {
    super(`${message} at column ${position + 1}`);
    this.name = "ExpressionSyntaxError";
  }
}

/**
 * Extract the field name from a reference token match
 */
export function referenceName(match: RegExpMatchArray): string {
  return match[1] ?? match[2] ?? match[3] ?? "";
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < text.length) {
    const rest = text.slice(pos);
    const ch = rest[0];

    if (ch === undefined) break;

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (ch === "(") {
      tokens.push({ type: "lparen", pos });
      pos++;
      continue;
    }

    if (ch === ")") {
      tokens.push({ type: "rparen", pos });
      pos++;
      continue;
    }

    if (ch === "'" || ch === '"') {
      const end = rest.indexOf(ch, 1);
      if (end < 0) {
        throw new ExpressionSyntaxError("Unterminated string", pos);
      }
      tokens.push({ type: "string", value: rest.slice(1, end), pos });
      pos += end + 1;
      continue;
    }

    if (ch === "$") {
      const ref = rest.match(REFERENCE_TOKEN);
      if (!ref) {
        throw new ExpressionSyntaxError("Expected $Hdr{FIELD}", pos);
      }
      const name = referenceName(ref);
      if (!FIELD_NAME.test(name)) {
        throw new ExpressionSyntaxError(`Invalid field name "${name}" in reference`, pos);
      }
      tokens.push({ type: "ref", value: name, pos });
      pos += ref[0].length;
      continue;
    }

    const num = rest.match(NUMBER);
    if (num) {
      tokens.push({ type: "number", value: Number(num[0]), pos });
      pos += num[0].length;
      continue;
    }

    const ident = rest.match(IDENTIFIER);
    if (ident) {
      const word = ident[0];
      if (word === "eq" || word === "ne") {
        tokens.push({ type: "op", value: word, pos });
      } else {
        tokens.push({ type: "ident", value: word, pos });
      }
      pos += word.length;
      continue;
    }

    const symbol = SYMBOLS.find((s) => rest.startsWith(s));
    if (symbol) {
      tokens.push({ type: "op", value: symbol, pos });
      pos += symbol.length;
      continue;
    }

    throw new ExpressionSyntaxError(`Unexpected character "${ch}"`, pos);
  }

  tokens.push({ type: "eof", pos: text.length });
  return tokens;
}

const BINARY_LEVELS: ReadonlyArray<readonly BinaryOperator[]> = [
  ["||"],
  ["&&"],
  ["==", "!=", "eq", "ne"],
  ["<", "<=", ">", ">="],
  ["+", "-"],
  ["*", "/"],
];

class Parser {
  #tokens: Token[];
  #index = 0;

  constructor(tokens: Token[]) {
    this.#tokens = tokens;
  }

  #peek(): Token {
    const token = this.#tokens[this.#index];
    if (!token) {
      throw new ExpressionSyntaxError("Unexpected end of expression", 0);
    }
    return token;
  }

  #next(): Token {
    const token = this.#peek();
    this.#index++;
    return token;
  }

  parse(): ExprNode {
    const node = this.#binary(0);
    const token = this.#peek();
    if (token.type !== "eof") {
      throw new ExpressionSyntaxError("Unexpected trailing input", token.pos);
    }
    return node;
  }

  #binary(level: number): ExprNode {
    const ops = BINARY_LEVELS[level];
    if (!ops) {
      return this.#unary();
    }

    let left = this.#binary(level + 1);
    for (;;) {
      const token = this.#peek();
      if (token.type !== "op") break;
      const op = ops.find((o) => o === token.value);
      if (!op) break;
      this.#next();
      const right = this.#binary(level + 1);
      left = { kind: "binary", op, left, right };
    }
    return left;
  }

  #unary(): ExprNode {
    const token = this.#peek();
    if (token.type === "op" && (token.value === "!" || token.value === "-" || token.value === "+")) {
      this.#next();
      return { kind: "unary", op: token.value, arg: this.#unary() };
    }
    return this.#primary();
  }

  #primary(): ExprNode {
    const token = this.#next();
    switch (token.type) {
      case "number":
        return { kind: "number", value: token.value };
      case "string":
        return { kind: "string", value: token.value };
      case "ref":
        return { kind: "ref", name: token.value };
      case "ident": {
        if (token.value === "abs") {
          this.#expect("lparen", "Expected ( after abs");
          const arg = this.#binary(0);
          this.#expect("rparen", "Expected ) to close abs(");
          return { kind: "abs", arg };
        }
        if (this.#peek().type === "lparen") {
          throw new ExpressionSyntaxError(`Unknown function "${token.value}"`, token.pos);
        }
        return { kind: "field", name: token.value };
      }
      case "lparen": {
        const inner = this.#binary(0);
        this.#expect("rparen", "Expected )");
        return inner;
      }
      case "eof":
        throw new ExpressionSyntaxError("Unexpected end of expression", token.pos);
      default:
        throw new ExpressionSyntaxError("Unexpected token", token.pos);
    }
  }

  #expect(type: "lparen" | "rparen", message: string): void {
    const token = this.#next();
    if (token.type !== type) {
      throw new ExpressionSyntaxError(message, token.pos);
    }
  }
}

/**
 * Compile expression text into a tree
 * @throws {ExpressionSyntaxError} If the text is not a valid expression
 */
export function compileExpression(text: string): ExprNode {
  if (!text.trim()) {
    throw new ExpressionSyntaxError("Empty expression", 0);
  }
  return new Parser(tokenize(text)).parse();
}

/**
 * Names of reference-header fields an expression reads
 */
export function referencedFields(node: ExprNode, out: Set<string> = new Set()): Set<string> {
  switch (node.kind) {
    case "ref":
      out.add(node.name);
      break;
    case "abs":
    case "unary":
      referencedFields(node.arg, out);
      break;
    case "binary":
      referencedFields(node.left, out);
      referencedFields(node.right, out);
      break;
    default:
      break;
  }
  return out;
}

type Value = HeaderValue | boolean;

/**
 * Truthiness: 0, "", "0" and false are false; everything else is true
 */
export function truthy(value: Value): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  return value !== "" && value !== "0";
}

/**
 * Evaluate a compiled expression
 * @param node - Compiled tree
 * @param text - Source text, used in error messages
 * @param reference - Header of the frame being reduced ($Hdr{...})
 * @param candidate - Header of the indexed calibration (bare names)
 * @throws {MissingFieldError} If a named field is absent
 * @throws {NotNumericError} If arithmetic or a numeric comparison meets text
 * @throws {ExpressionError} On division by zero
 */
export function evaluateExpression(
  node: ExprNode,
  text: string,
  reference: HeaderSet,
  candidate: HeaderSet
): Value {
  const evaluate = (n: ExprNode): Value => {
    switch (n.kind) {
      case "number":
      case "string":
        return n.value;
      case "field":
        return requireField(candidate, n.name, "candidate");
      case "ref":
        return requireField(reference, n.name, "reference");
      case "abs":
        return Math.abs(numberOf(n.arg));
      case "unary":
        if (n.op === "!") return !truthy(evaluate(n.arg));
        return n.op === "-" ? -numberOf(n.arg) : numberOf(n.arg);
      case "binary":
        return binary(n.op, n.left, n.right);
    }
  };

  const numberOf = (n: ExprNode): number => {
    const value = evaluate(n);
    if (typeof value === "boolean") return value ? 1 : 0;
    const parsed = parseNumber(value);
    if (parsed === undefined) {
      const label = n.kind === "field" || n.kind === "ref" ? n.name : text;
      throw new NotNumericError(label, toText(value));
    }
    return parsed;
  };

  const textOf = (n: ExprNode): string => {
    const value = evaluate(n);
    if (typeof value === "boolean") return value ? "1" : "";
    return toText(value);
  };

  const binary = (op: BinaryOperator, left: ExprNode, right: ExprNode): Value => {
    switch (op) {
      case "&&":
        return truthy(evaluate(left)) && truthy(evaluate(right));
      case "||":
        return truthy(evaluate(left)) || truthy(evaluate(right));
      case "eq":
        return textOf(left) === textOf(right);
      case "ne":
        return textOf(left) !== textOf(right);
      case "+":
        return numberOf(left) + numberOf(right);
      case "-":
        return numberOf(left) - numberOf(right);
      case "*":
        return numberOf(left) * numberOf(right);
      case "/": {
        const dividend = numberOf(left);
        const divisor = numberOf(right);
        if (divisor === 0) {
          throw new ExpressionError(text, "division by zero");
        }
        return dividend / divisor;
      }
      case "<":
        return numberOf(left) < numberOf(right);
      case "<=":
        return numberOf(left) <= numberOf(right);
      case ">":
        return numberOf(left) > numberOf(right);
      case ">=":
        return numberOf(left) >= numberOf(right);
      case "==":
        return numberOf(left) === numberOf(right);
      case "!=":
        return numberOf(left) !== numberOf(right);
    }
  };

  return evaluate(node);
}
