/**
 * Core types for calibration selection
 */

import type { CalibrationIndex } from "./index/calibration-index.js";
import type { SelectionMetrics } from "./observability/metrics.js";

/**
 * Scalar header value. Numbers keep their numeric type; everything else is text.
 */
export type HeaderValue = string | number;

/**
 * Field name to value mapping for one frame.
 * Field names are case-sensitive and may be dotted (e.g. "HIERARCH.ESO.DET.WIN.STARTX").
 */
export type HeaderSet = Readonly<Record<string, HeaderValue>>;

/**
 * Rule operators as they appear once parsed.
 * "presence" is a bare field line; "expr" is a line using ";".
 */
export type RuleOperator =
  | "presence"
  | "eq"
  | "ne"
  | "=="
  | "!="
  | "<="
  | ">="
  | "<"
  | ">"
  | "expr";

/**
 * Operators that compare operands numerically
 */
export type NumericOperator = "==" | "!=" | "<=" | ">=" | "<" | ">";

/**
 * Operators that compare operands as text
 */
export type TextOperator = "eq" | "ne";

/**
 * Compiled expression tree for "expr" rules
 */
export type ExprNode =
  | { kind: "number"; value: number }
  | { kind: "string"; value: string }
  | { kind: "field"; name: string }
  | { kind: "ref"; name: string }
  | { kind: "abs"; arg: ExprNode }
  | { kind: "unary"; op: "!" | "-" | "+"; arg: ExprNode }
  | { kind: "binary"; op: BinaryOperator; left: ExprNode; right: ExprNode };

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "<"
  | "<="
  | ">"
  | ">="
  | "=="
  | "!="
  | "eq"
  | "ne"
  | "&&"
  | "||";

/**
 * Right-hand side of a rule
 */
export type RuleOperand =
  | { kind: "literal"; value: string; quoted: boolean }
  | { kind: "reference"; field: string }
  | { kind: "expression"; text: string; ast: ExprNode };

/**
 * One parsed rule line
 */
export type Rule =
  | { field: string; operator: "presence"; line: number }
  | {
      field: string;
      operator: TextOperator | NumericOperator;
      rhs: Extract<RuleOperand, { kind: "literal" | "reference" }>;
      line: number;
    }
  | {
      field: string;
      operator: "expr";
      rhs: Extract<RuleOperand, { kind: "expression" }>;
      line: number;
    };

/**
 * How to choose among several matching records
 * - before: latest ORACTIME not after the reference (default)
 * - nearest: smallest absolute ORACTIME difference
 * - latest: most recently appended, time ignored
 */
export type TimePolicy = "before" | "nearest" | "latest";

/**
 * Ordered, conjunctive rules for one calibration type
 */
export interface RuleSet {
  /** Where the rules came from (file path or label), used in diagnostics */
  source: string;
  rules: readonly Rule[];
  /** Tie-break policy requested for this calibration type */
  policy?: TimePolicy;
}

/**
 * One indexed calibration frame
 */
export interface IndexRecord {
  /** Insertion sequence number, unique within an index */
  readonly seq: number;
  /** Calibration frame identifier (usually a file name) */
  readonly name: string;
  readonly header: HeaderSet;
}

/**
 * Why a candidate was not accepted
 */
export type RejectionReason = "failed" | "missing-field" | "not-numeric" | "expression";

export interface Rejection {
  record: IndexRecord;
  rule: Rule;
  reason: RejectionReason;
  message: string;
}

/**
 * Result of matching a rule set against one candidate
 */
export type MatchResult =
  | { matched: true }
  | { matched: false; rule: Rule; reason: RejectionReason; message: string };

/**
 * Result of an index query with diagnostics
 */
export interface QueryResult {
  matches: IndexRecord[];
  rejections: Rejection[];
}

/**
 * Outcome of choosing one calibration.
 * "none" is an expected outcome, not an error.
 */
export type Selection =
  | {
      status: "selected";
      record: IndexRecord;
      policy: TimePolicy;
      matches: IndexRecord[];
      rejections: Rejection[];
    }
  | {
      status: "none";
      reason: "no-candidates" | "none-before-reference";
      policy: TimePolicy;
      matches: IndexRecord[];
      rejections: Rejection[];
    };

export interface SelectOptions {
  /** Overrides the rule set's policy */
  policy?: TimePolicy;
}

/**
 * Persistence for an index. Implementations own the on-disk format.
 */
export interface IndexStorage {
  /** Read all records; a missing store loads as empty */
  load(): Promise<IndexRecord[]>;
  /** Replace the stored records */
  store(records: readonly IndexRecord[]): Promise<void>;
  /** Add one record to the stored set */
  append(record: IndexRecord): Promise<void>;
}

/**
 * Where the index file for a calibration type lives
 * - dynamic: in the data directory, created on first add
 * - static: on the rules search path, read-only
 * - copy: copied from the rules search path into the data directory when absent
 */
export type IndexMode = "dynamic" | "static" | "copy";

/**
 * On-disk index formats
 * - text: "#COL COL ..." header followed by "name value value ..." rows
 * - jsonl: one {"name", "header"} object per line
 */
export type IndexFormat = "text" | "jsonl";

export interface CalibrationTypeOptions {
  policy?: TimePolicy;
  indexMode?: IndexMode;
  format?: IndexFormat;
}

/**
 * Options for opening a calibration store
 */
export interface StoreOptions {
  /** Directories searched in order for rules.<type> and static index files */
  rulesPath: string[];
  /** Directory holding dynamic index files */
  dataDir: string;
  /** Per-type settings; unlisted types use the defaults */
  calibrations?: Record<string, CalibrationTypeOptions>;
  /** Storage factory, mainly for tests */
  storageFactory?: (type: string, filePath: string, format: IndexFormat) => IndexStorage;
}

export interface ResolveOptions {
  /** Called when nothing matches; a non-null result is used as the calibration */
  fallback?: () => string | null;
  /** Return null instead of throwing when nothing matches */
  optional?: boolean;
  policy?: TimePolicy;
}

/**
 * Result of checking a named calibration against a reference header
 */
export type Verification =
  | { suitable: true; record: IndexRecord }
  | { suitable: false; reason: "unknown" }
  | { suitable: false; reason: RejectionReason; rule: Rule; message: string };

/**
 * Calibration store: rule and index lookup per calibration type
 */
export interface CalibrationStore {
  readonly options: Readonly<StoreOptions>;

  /** Load (cached) rules for a calibration type */
  rules(type: string): Promise<RuleSet>;

  /** Load (cached) index snapshot for a calibration type */
  index(type: string): Promise<CalibrationIndex>;

  /** Choose the best calibration for a reference header */
  select(type: string, reference: HeaderSet, opts?: SelectOptions): Promise<Selection>;

  /**
   * Current, override-aware calibration name for a reference header.
   * Returns null only when `optional` is set and nothing matches.
   */
  resolve(type: string, reference: HeaderSet, opts?: ResolveOptions): Promise<string | null>;

  /** Check a named calibration against a reference header */
  verify(type: string, name: string, reference: HeaderSet): Promise<Verification>;

  /** Project a header onto the rule columns and append it to the index */
  add(type: string, name: string, header: HeaderSet): Promise<IndexRecord>;

  /** Column value from the nearest matching record */
  retrieveByColumn(
    type: string,
    column: string,
    reference: HeaderSet
  ): Promise<HeaderValue | undefined>;

  /** Currently chosen calibration name */
  current(type: string): string | undefined;

  /** Set the current calibration name (ignored while an override is pinned) */
  setCurrent(type: string, name: string): void;

  /** Pin a calibration name; resolve() must use it or fail */
  override(type: string, name: string): void;

  /** Drop cached rules and index snapshot for a type */
  reload(type: string): void;

  /** Selection metrics this store recorded for a type */
  metrics(type: string): SelectionMetrics | undefined;
}
