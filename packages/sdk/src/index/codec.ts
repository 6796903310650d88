/**
 * On-disk index encodings
 *
 * Column text format (compatible with existing pipeline index files):
 *   #ORACTIME OBSTYPE DETECXS
 *   arc_20240101_12 45292.51 ARC 50
 *
 * - First "#" line names the columns; later "#" lines are comments
 * - Bare numeric tokens decode to finite numbers, other bare tokens to strings
 * - Strings that would not survive a bare round trip (whitespace, quotes,
 *   empty, numeric-looking, "-") are written as JSON strings
 * - A bare "-" marks a column the record does not carry
 *
 * JSON Lines format: one {"name": ..., "header": {...}} object per line.
 */

import { z } from "zod";
import type { HeaderValue, IndexRecord } from "../types.js";
import { HeaderSetSchema, getField, parseNumber } from "../header.js";
import { IndexFormatError } from "../errors.js";

const MISSING = "-";
const BARE_NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export const IndexRowSchema = z.object({
  name: z.string().min(1),
  header: HeaderSetSchema,
});

/**
 * Whether a string must be quoted to survive a bare round trip
 */
function needsQuotes(text: string, numericSensitive: boolean): boolean {
  if (text === "" || text === MISSING) return true;
  if (/[\s"'#]/.test(text)) return true;
  return numericSensitive && (BARE_NUMBER.test(text) || parseNumber(text) !== undefined);
}

function encodeValue(value: HeaderValue | undefined): string {
  if (value === undefined) return MISSING;
  if (typeof value === "number") return String(value);
  return needsQuotes(value, true) ? JSON.stringify(value) : value;
}

function encodeName(name: string): string {
  return needsQuotes(name, false) ? JSON.stringify(name) : name;
}

/**
 * Split a row into raw tokens; JSON-quoted tokens may contain whitespace
 */
function splitTokens(line: string, filePath: string, lineNo: number): string[] {
  const tokens: string[] = [];
  let pos = 0;

  while (pos < line.length) {
    const ch = line[pos];
    if (ch === undefined) break;
    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (ch === '"') {
      let end = pos + 1;
      while (end < line.length && line[end] !== '"') {
        end += line[end] === "\\" ? 2 : 1;
      }
      if (end >= line.length) {
        throw new IndexFormatError(filePath, lineNo, "unterminated quoted value");
      }
      tokens.push(line.slice(pos, end + 1));
      pos = end + 1;
      continue;
    }

    let end = pos;
    while (end < line.length && !/\s/.test(line[end] ?? " ")) {
      end++;
    }
    tokens.push(line.slice(pos, end));
    pos = end;
  }

  return tokens;
}

function decodeQuoted(token: string, filePath: string, lineNo: number): string {
  try {
    const parsed: unknown = JSON.parse(token);
    if (typeof parsed === "string") return parsed;
  } catch (err) {
    throw new IndexFormatError(filePath, lineNo, `invalid quoted value ${token}`, { cause: err });
  }
  throw new IndexFormatError(filePath, lineNo, `invalid quoted value ${token}`);
}

function decodeValue(token: string, filePath: string, lineNo: number): HeaderValue | undefined {
  if (token === MISSING) return undefined;
  if (token.startsWith('"')) return decodeQuoted(token, filePath, lineNo);
  if (!BARE_NUMBER.test(token)) return token;
  // Overflowing tokens such as 1e999 stay text
  const value = Number(token);
  return Number.isFinite(value) ? value : token;
}

/**
 * Encode records in the column text format
 * @param records - Records in insertion order
 * @param columns - Column order; defaults to the union of header fields in first-seen order
 */
export function encodeIndexText(records: readonly IndexRecord[], columns?: readonly string[]): string {
  const cols = columns ?? unionColumns(records);
  const lines = [`#${cols.join(" ")}`];
  for (const record of records) {
    const values = cols.map((col) => encodeValue(getField(record.header, col)));
    lines.push([encodeName(record.name), ...values].join(" "));
  }
  return lines.join("\n") + "\n";
}

/**
 * Decode the column text format
 * @param text - File contents
 * @param filePath - Used in error messages
 * @throws {IndexFormatError} On rows without a column line or with the wrong value count
 */
export function decodeIndexText(text: string, filePath = "<index>"): IndexRecord[] {
  const records: IndexRecord[] = [];
  let columns: string[] | null = null;

  text.split(/\r?\n/).forEach((raw, i) => {
    const lineNo = i + 1;
    const line = raw.trim();
    if (line === "") return;

    if (line.startsWith("#")) {
      if (columns === null) {
        columns = line.slice(1).trim().split(/\s+/).filter(Boolean);
      }
      return;
    }

    if (columns === null) {
      throw new IndexFormatError(filePath, lineNo, "row before column header line");
    }

    const tokens = splitTokens(line, filePath, lineNo);
    const [nameToken, ...valueTokens] = tokens;
    if (nameToken === undefined) return;

    if (valueTokens.length !== columns.length) {
      throw new IndexFormatError(
        filePath,
        lineNo,
        `expected ${columns.length} values, found ${valueTokens.length}`
      );
    }

    const name = nameToken.startsWith('"') ? decodeQuoted(nameToken, filePath, lineNo) : nameToken;
    const header: Record<string, HeaderValue> = {};
    columns.forEach((col, c) => {
      const token = valueTokens[c];
      const value = token === undefined ? undefined : decodeValue(token, filePath, lineNo);
      if (value !== undefined) {
        header[col] = value;
      }
    });

    records.push({ seq: records.length, name, header });
  });

  return records;
}

/**
 * Encode records as JSON Lines
 */
export function encodeIndexJsonl(records: readonly IndexRecord[]): string {
  return records
    .map((record) => JSON.stringify({ name: record.name, header: record.header }) + "\n")
    .join("");
}

/**
 * Decode JSON Lines
 * @throws {IndexFormatError} On lines that are not valid index rows
 */
export function decodeIndexJsonl(text: string, filePath = "<index>"): IndexRecord[] {
  const records: IndexRecord[] = [];

  text.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.trim();
    if (line === "") return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      throw new IndexFormatError(filePath, i + 1, "invalid JSON", { cause: err });
    }

    const row = IndexRowSchema.safeParse(parsed);
    if (!row.success) {
      const issue = row.error.issues[0];
      throw new IndexFormatError(
        filePath,
        i + 1,
        `invalid index row: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown"}`
      );
    }

    records.push({ seq: records.length, name: row.data.name, header: row.data.header });
  });

  return records;
}

/**
 * Union of header fields across records, in first-seen order
 */
export function unionColumns(records: readonly IndexRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record.header)) {
      seen.add(key);
    }
  }
  return [...seen];
}
