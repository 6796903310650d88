/**
 * Header model: lookups, canonical text and numeric coercion
 */

import { z } from "zod";
import type { HeaderSet, HeaderValue } from "./types.js";
import { InvalidHeaderError, MissingFieldError, NotNumericError } from "./errors.js";
import type { HeaderSide } from "./errors.js";

const NUMERIC_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export const HeaderValueSchema = z.union([z.string(), z.number().finite()]);

export const HeaderSetSchema = z.record(z.string().min(1), HeaderValueSchema);

/**
 * Check whether a header carries a field. An empty string value still counts.
 */
export function hasField(header: HeaderSet, field: string): boolean {
  return Object.hasOwn(header, field);
}

/**
 * Look up a field, or undefined when absent
 */
export function getField(header: HeaderSet, field: string): HeaderValue | undefined {
  return hasField(header, field) ? header[field] : undefined;
}

/**
 * Look up a field that must be present
 * @throws {MissingFieldError} If the field is absent
 */
export function requireField(header: HeaderSet, field: string, side: HeaderSide): HeaderValue {
  const value = getField(header, field);
  if (value === undefined) {
    throw new MissingFieldError(field, side);
  }
  return value;
}

/**
 * Canonical textual form of a header value
 */
export function toText(value: HeaderValue): string {
  return typeof value === "number" ? String(value) : value;
}

/**
 * Parse a value as a number, or undefined if it is not numeric.
 * Surrounding whitespace is allowed; trailing junk ("10a") is not.
 */
export function parseNumber(value: HeaderValue): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  const trimmed = value.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) {
    return undefined;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Whether a value parses as a number
 */
export function isNumeric(value: HeaderValue): boolean {
  return parseNumber(value) !== undefined;
}

/**
 * Parse a value as a number for a named field
 * @throws {NotNumericError} If the value does not parse
 */
export function toNumber(field: string, value: HeaderValue): number {
  const parsed = parseNumber(value);
  if (parsed === undefined) {
    throw new NotNumericError(field, toText(value));
  }
  return parsed;
}

/**
 * Validate untrusted input (parsed JSON, etc.) as a header set
 * @param input - Value to validate
 * @param source - Label used in the error message
 * @throws {InvalidHeaderError} If input is not a flat object of string/number values
 */
export function parseHeaderSet(input: unknown, source = "header"): HeaderSet {
  const result = HeaderSetSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    throw new InvalidHeaderError(source, `${issue?.message ?? "invalid value"}${where}`);
  }
  return Object.freeze({ ...result.data });
}

/**
 * Keep only the named fields of a header
 * @throws {MissingFieldError} If a named field is absent
 */
export function pickFields(header: HeaderSet, fields: readonly string[]): HeaderSet {
  const picked: Record<string, HeaderValue> = {};
  for (const field of fields) {
    picked[field] = requireField(header, field, "candidate");
  }
  return Object.freeze(picked);
}
