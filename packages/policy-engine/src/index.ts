/**
 * Admission Gate Policy Engine
 *
 * Evaluates a normalized artifact document against a versioned rule set and
 * produces an auditable report with a PASS/FAIL verdict.
 */

// Fact model
export { FactModel, buildFactModel, formatFactValue } from './facts';

// Rules
export { compileRule, withSeverity } from './rules';
export { compilePredicate, resolvePath, ROOT_SCOPE } from './predicates';
export type { CompiledPredicate, PredicateResult, PredicateScope } from './predicates';
export { renderMessage, lookupFact } from './template';

// Rule sets
export {
  loadRuleSet,
  createRuleSet,
  resolveExceptions,
  parseExpiry,
} from './rule-set';
export type { ExceptionInput, LoadRuleSetOptions, RuleSetInit } from './rule-set';
export { loadRuleSetFromFile, loadExceptionsFromFile, readPolicyFile } from './loader';
export { PolicyDocumentSchema, PredicateSchema, ExceptionListSchema } from './schemas';
export type { PolicyDocument, PolicyDocumentInput } from './schemas';

// Evaluation
export { evaluate, evaluateConcurrently, runGate, runRule, applyExceptions } from './evaluator';
export {
  buildReport,
  countBySeverity,
  assertReportShape,
  serializeReport,
  renderReport,
  exitCodeFor,
} from './report';

// Errors
export {
  GateError,
  MalformedInputError,
  CyclicInputError,
  PolicyLoadError,
  RuleEvaluationError,
  EvaluationCancelledError,
  isGateError,
} from './errors';
export type { GateErrorCode, CancellationReason } from './errors';

// Logging
export { Logger, logger } from './logger';
export type { LogContext, LogLevel } from './logger';

// Constants
export {
  REPORT_SCHEMA_VERSION,
  SEVERITIES,
  DEFAULT_MAX_DEPTH,
  DEFAULT_CONCURRENCY,
  MISSING_VALUE_PLACEHOLDER,
  EXIT_CODES,
} from './constants';

// Types
export type {
  FactScalar,
  FactValue,
  Severity,
  Predicate,
  PredicateOp,
  MatchLocation,
  DeclarativeRuleDefinition,
  CustomRuleDefinition,
  RuleDefinition,
  Rule,
  RuleException,
  RuleSet,
  FindingSource,
  Finding,
  SuppressedFinding,
  SeverityCounts,
  Report,
  EvaluateOptions,
  ConcurrentEvaluateOptions,
  FactModelOptions,
} from './types';

export { GateVerdict } from './types';
