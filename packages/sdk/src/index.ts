/**
 * Calibration selection SDK
 *
 * Declarative rules matching a frame's header against an index of processed
 * calibration frames, and the policies that pick one of them
 */

// Re-export types
export type {
  HeaderValue,
  HeaderSet,
  RuleOperator,
  NumericOperator,
  TextOperator,
  ExprNode,
  BinaryOperator,
  RuleOperand,
  Rule,
  TimePolicy,
  RuleSet,
  IndexRecord,
  RejectionReason,
  Rejection,
  MatchResult,
  QueryResult,
  Selection,
  SelectOptions,
  IndexStorage,
  IndexMode,
  IndexFormat,
  CalibrationTypeOptions,
  StoreOptions,
  ResolveOptions,
  Verification,
  CalibrationStore,
} from "./types.js";

// Header model
export {
  HeaderValueSchema,
  HeaderSetSchema,
  hasField,
  getField,
  requireField,
  toText,
  parseNumber,
  isNumeric,
  toNumber,
  parseHeaderSet,
  pickFields,
} from "./header.js";

// Rules
export {
  TIME_FIELD,
  parseRules,
  formatRule,
  formatRules,
  indexColumns,
  type ParseOptions,
} from "./rules/parser.js";
export {
  compileExpression,
  evaluateExpression,
  referencedFields,
  truthy,
  ExpressionSyntaxError,
} from "./rules/expression.js";
export {
  evaluateRule,
  testRule,
  matchRuleSet,
  matches,
  type RuleOutcome,
} from "./rules/evaluator.js";

// Index and selection
export {
  CalibrationIndex,
  projectHeader,
  recordTime,
  validateRecord,
} from "./index/calibration-index.js";
export { DEFAULT_POLICY, effectivePolicy, pickBest, selectBest } from "./selector.js";
export {
  encodeIndexText,
  decodeIndexText,
  encodeIndexJsonl,
  decodeIndexJsonl,
  IndexRowSchema,
} from "./index/codec.js";
export {
  FileIndexStorage,
  MemoryIndexStorage,
  indexFileName,
  encodeIndex,
  decodeIndex,
  type FileIndexStorageOptions,
} from "./index/storage.js";
export { FileLock, type LockOptions } from "./index/lock.js";

// Errors
export {
  CalselError,
  MalformedRuleError,
  MissingFieldError,
  NotNumericError,
  ExpressionError,
  InvalidRecordError,
  InvalidHeaderError,
  IndexFormatError,
  IndexReadError,
  IndexWriteError,
  LockTimeoutError,
  RulesNotFoundError,
  NoSuitableCalibrationError,
  OverrideUnsuitableError,
} from "./errors.js";

// Observability
export { logger, type LogLevel, type LogEntry } from "./observability/logs.js";
export { MetricsCollector, type SelectionMetrics } from "./observability/metrics.js";

// Main factory
export { openCalibrationStore } from "./store.js";
