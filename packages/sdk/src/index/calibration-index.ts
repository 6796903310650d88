/**
 * Append-only catalogue of processed calibration frames
 *
 * Records live in an arena addressed by insertion sequence number. Queries
 * return the arena entries themselves (frozen), never copies, so repeated
 * filtering over a growing index does not duplicate header data.
 *
 * Invariants:
 * - Records are frozen on append and never mutated or removed
 * - seq is strictly increasing in insertion order
 * - Every record carries a numeric ORACTIME
 * - Duplicate names and headers are allowed (distinct frames)
 */

import type { HeaderSet, IndexRecord, QueryResult, RuleSet } from "../types.js";
import { matchRuleSet } from "../rules/evaluator.js";
import { TIME_FIELD, indexColumns } from "../rules/parser.js";
import { getField, parseNumber, pickFields } from "../header.js";
import { InvalidRecordError } from "../errors.js";

/**
 * ORACTIME of a record as a number (guaranteed by append)
 */
export function recordTime(record: IndexRecord): number {
  const value = getField(record.header, TIME_FIELD);
  return value === undefined ? Number.NaN : (parseNumber(value) ?? Number.NaN);
}

/**
 * Keep only the header fields the rule set indexes
 * @throws {MissingFieldError} If the header lacks one of the rule fields or ORACTIME
 */
export function projectHeader(ruleSet: RuleSet, header: HeaderSet): HeaderSet {
  return pickFields(header, indexColumns(ruleSet));
}

/**
 * Check that a record can be appended
 * @throws {InvalidRecordError} If the name is empty or has whitespace, or ORACTIME is missing or not numeric
 */
export function validateRecord(name: string, header: HeaderSet): void {
  if (!name || /\s/.test(name)) {
    throw new InvalidRecordError(name, "name must be non-empty and contain no whitespace");
  }

  const time = getField(header, TIME_FIELD);
  if (time === undefined) {
    throw new InvalidRecordError(name, `missing ${TIME_FIELD}`);
  }
  if (parseNumber(time) === undefined) {
    throw new InvalidRecordError(name, `${TIME_FIELD} is not numeric: "${time}"`);
  }
}

export class CalibrationIndex {
  #arena: IndexRecord[] = [];
  #byName = new Map<string, IndexRecord>();
  #nextSeq = 0;

  /**
   * Rebuild an index from stored records, keeping their order.
   * Sequence numbers are reassigned from zero.
   */
  static from(records: Iterable<{ name: string; header: HeaderSet }>): CalibrationIndex {
    const index = new CalibrationIndex();
    for (const record of records) {
      index.append(record.name, record.header);
    }
    return index;
  }

  /**
   * Add a record
   * @param name - Calibration frame identifier
   * @param header - Indexed header values; must include a numeric ORACTIME
   * @throws {InvalidRecordError} If the name is empty or ORACTIME is missing or not numeric
   */
  append(name: string, header: HeaderSet): IndexRecord {
    validateRecord(name, header);

    const record: IndexRecord = Object.freeze({
      seq: this.#nextSeq++,
      name,
      header: Object.freeze({ ...header }),
    });
    this.#arena.push(record);
    this.#byName.set(name, record);
    return record;
  }

  /**
   * Records that satisfy every rule, in insertion order
   */
  select(ruleSet: RuleSet, reference: HeaderSet): IndexRecord[] {
    return this.#arena.filter((record) => matchRuleSet(ruleSet, reference, record.header).matched);
  }

  /**
   * Like select(), with one rejection entry per non-matching record.
   * A record whose rules cannot be evaluated is rejected; the scan continues.
   */
  query(ruleSet: RuleSet, reference: HeaderSet): QueryResult {
    const result: QueryResult = { matches: [], rejections: [] };
    for (const record of this.#arena) {
      const match = matchRuleSet(ruleSet, reference, record.header);
      if (match.matched) {
        result.matches.push(record);
      } else {
        result.rejections.push({
          record,
          rule: match.rule,
          reason: match.reason,
          message: match.message,
        });
      }
    }
    return result;
  }

  /**
   * Latest record appended under a name
   */
  entry(name: string): IndexRecord | undefined {
    return this.#byName.get(name);
  }

  /**
   * All records in insertion order
   */
  records(): readonly IndexRecord[] {
    return this.#arena;
  }

  /**
   * Union of header fields across records, in first-seen order
   */
  columns(): string[] {
    const seen = new Set<string>();
    for (const record of this.#arena) {
      for (const key of Object.keys(record.header)) {
        seen.add(key);
      }
    }
    return [...seen];
  }

  get size(): number {
    return this.#arena.length;
  }
}
