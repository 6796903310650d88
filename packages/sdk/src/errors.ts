/**
 * Error types for calibration selection
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - Evaluation errors (MissingField, NotNumeric, Expression) are candidate-local:
 *   queries catch them and reject the candidate instead of aborting
 */

/**
 * Base class for all calsel errors
 */
export abstract class CalselError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a rule file line cannot be parsed. Fatal to loading the rule set.
 */
export class MalformedRuleError extends CalselError {
  readonly code = "E_RULE_SYNTAX";

  constructor(
    public readonly source: string,
    public readonly line: number,
    public readonly text: string,
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`${source}:${line}: ${reason}: ${text.trim()}`, options);
  }
}

/**
 * Which header a missing field was looked up in
 */
export type HeaderSide = "reference" | "candidate";

/**
 * Thrown when a rule needs a header field that is not there
 */
export class MissingFieldError extends CalselError {
  readonly code = "E_MISSING_FIELD";

  constructor(
    public readonly field: string,
    public readonly side: HeaderSide,
    options?: ErrorOptions
  ) {
    super(`Field "${field}" missing from ${side} header`, options);
  }
}

/**
 * Thrown when a numeric comparison meets a value that does not parse as a number
 */
export class NotNumericError extends CalselError {
  readonly code = "E_NOT_NUMERIC";

  constructor(
    public readonly field: string,
    public readonly value: string,
    options?: ErrorOptions
  ) {
    super(`Value of "${field}" is not numeric: "${value}"`, options);
  }
}

/**
 * Thrown when an expression cannot be evaluated (e.g. division by zero)
 */
export class ExpressionError extends CalselError {
  readonly code = "E_EXPRESSION";

  constructor(
    public readonly expression: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Cannot evaluate "${expression}": ${reason}`, options);
  }
}

/**
 * Thrown when a record cannot enter an index
 */
export class InvalidRecordError extends CalselError {
  readonly code = "E_INVALID_RECORD";

  constructor(name: string, reason: string, options?: ErrorOptions) {
    super(`Invalid index record "${name}": ${reason}`, options);
  }
}

/**
 * Thrown when header input is not a flat map of string/number values
 */
export class InvalidHeaderError extends CalselError {
  readonly code = "E_INVALID_HEADER";

  constructor(source: string, reason: string, options?: ErrorOptions) {
    super(`Invalid header in ${source}: ${reason}`, options);
  }
}

/**
 * Thrown when an index file has the wrong shape
 */
export class IndexFormatError extends CalselError {
  readonly code = "E_INDEX_FORMAT";

  constructor(
    public readonly filePath: string,
    public readonly line: number,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`${filePath}:${line}: ${reason}`, options);
  }
}

/**
 * Thrown when an index file cannot be read
 */
export class IndexReadError extends CalselError {
  readonly code = "E_INDEX_READ";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read index: ${filePath}`, options);
  }
}

/**
 * Thrown when an index file cannot be written
 */
export class IndexWriteError extends CalselError {
  readonly code = "E_INDEX_WRITE";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write index: ${filePath}`, options);
  }
}

/**
 * Thrown when the index lock cannot be taken in time
 */
export class LockTimeoutError extends CalselError {
  readonly code = "E_LOCK_TIMEOUT";

  constructor(
    public readonly lockPath: string,
    timeoutMs: number,
    options?: ErrorOptions
  ) {
    super(
      `Failed to acquire lock after ${timeoutMs}ms. Lock file: ${lockPath}. ` +
        `A stale lock from a crashed process can be removed by hand.`,
      options
    );
  }
}

/**
 * Thrown when no rules file exists for a calibration type
 */
export class RulesNotFoundError extends CalselError {
  readonly code = "E_RULES_NOT_FOUND";

  constructor(
    public readonly type: string,
    searched: readonly string[],
    options?: ErrorOptions
  ) {
    super(`No rules.${type} found in: ${searched.join(", ") || "(empty search path)"}`, options);
  }
}

/**
 * Thrown by accessors that require a calibration when none matches
 */
export class NoSuitableCalibrationError extends CalselError {
  readonly code = "E_NO_CALIBRATION";

  constructor(
    public readonly type: string,
    options?: ErrorOptions
  ) {
    super(`No suitable ${type} calibration was found in the index`, options);
  }
}

/**
 * Thrown when a pinned calibration does not suit the frame being reduced
 */
export class OverrideUnsuitableError extends CalselError {
  readonly code = "E_OVERRIDE_UNSUITABLE";

  constructor(
    public readonly type: string,
    public readonly calibration: string,
    detail: string,
    options?: ErrorOptions
  ) {
    super(`Override ${type} "${calibration}" is not suitable: ${detail}`, options);
  }
}
