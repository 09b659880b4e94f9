/**
 * Policy Engine Types
 *
 * Data model shared by the fact model builder, rule compiler, rule set loader
 * and evaluator. Everything here is plain data except compiled rules, which
 * carry their predicate as a closure.
 */

import type { FactModel } from './facts';

/**
 * Scalar value stored in the fact model
 */
export type FactScalar = string | number | boolean;

/**
 * Value stored at a single fact path
 */
export type FactValue = FactScalar | FactScalar[];

/**
 * Rule severity. Only `block` findings fail a run.
 */
export type Severity = 'block' | 'warn' | 'info';

/**
 * Canonical verdict of a report
 */
export enum GateVerdict {
  /**
   * PASS - No blocking finding survived exception filtering
   */
  PASS = 'PASS',

  /**
   * FAIL - At least one blocking finding survived exception filtering
   */
  FAIL = 'FAIL',
}

/**
 * Predicate expression tree evaluated against a fact model.
 *
 * Paths are dotted fact paths. Inside an `any` predicate they are relative to
 * the list element being tested; the empty path addresses a scalar element.
 */
export type Predicate =
  | { op: 'equals'; path: string; value: FactValue }
  | { op: 'in'; path: string; values: FactScalar[] }
  | { op: 'contains'; path: string; value: FactScalar; ignoreCase?: boolean }
  | { op: 'matches'; path: string; pattern: string; flags?: string }
  | { op: 'absent'; path: string }
  | { op: 'present'; path: string }
  | { op: 'not'; predicate: Predicate }
  | { op: 'all'; predicates: Predicate[] }
  | { op: 'anyOf'; predicates: Predicate[] }
  | { op: 'any'; path: string; where: Predicate };

export type PredicateOp = Predicate['op'];

/**
 * Location in the fact model where a rule detected a violation
 */
export interface MatchLocation {
  path: string;
}

interface RuleDefinitionBase {
  id: string;
  severity: Severity;
  /** Message template, see template.ts for placeholders */
  message: string;
  description?: string;
}

/**
 * Rule whose predicate is a serializable expression tree
 */
export interface DeclarativeRuleDefinition extends RuleDefinitionBase {
  kind: 'declarative';
  when: Predicate;
}

/**
 * Rule whose predicate is supplied as code by a library caller
 */
export interface CustomRuleDefinition extends RuleDefinitionBase {
  kind: 'custom';
  evaluate(facts: FactModel): MatchLocation[];
}

export type RuleDefinition = DeclarativeRuleDefinition | CustomRuleDefinition;

/**
 * Compiled, frozen rule as held by a rule set
 */
export interface Rule {
  readonly id: string;
  readonly kind: RuleDefinition['kind'];
  readonly severity: Severity;
  readonly message: string;
  readonly description?: string;
  evaluate(facts: FactModel): MatchLocation[];
}

/**
 * Time-bounded override suppressing the findings of one rule
 */
export interface RuleException {
  readonly ruleId: string;
  readonly justification: string;
  readonly expires: Date;
}

/**
 * Ordered, versioned rule collection plus exceptions.
 * Loaded wholesale; never mutated during an evaluation.
 */
export interface RuleSet {
  readonly version: string;
  readonly name?: string;
  /** Where the definitions were read from, for audit trails */
  readonly source?: string;
  readonly rules: readonly Rule[];
  readonly exceptions: ReadonlyMap<string, RuleException>;
}

/**
 * `policy` findings come from a rule predicate; `engine` findings are rule faults
 */
export type FindingSource = 'policy' | 'engine';

export interface Finding {
  ruleId: string;
  severity: Severity;
  message: string;
  path: string;
  source: FindingSource;
}

export interface SuppressedFinding extends Finding {
  exception: {
    justification: string;
    expires: string;
  };
}

export interface SeverityCounts {
  block: number;
  warn: number;
  info: number;
  total: number;
}

/**
 * Evaluation output. Field names and enum values are a stable contract.
 */
export interface Report {
  schemaVersion: 'admission-gate.report.v1';
  ruleSetVersion: string;
  evaluatedAt: string;
  verdict: GateVerdict;
  findings: Finding[];
  suppressed: SuppressedFinding[];
  counts: SeverityCounts;
  suppressedCount: number;
}

export interface EvaluateOptions {
  /** Evaluation time; exceptions are resolved against it */
  now: Date;
}

export interface ConcurrentEvaluateOptions extends EvaluateOptions {
  /** Number of rule workers (default DEFAULT_CONCURRENCY) */
  concurrency?: number;
  /** Caller cancellation */
  signal?: AbortSignal;
  /** Wall-clock deadline; exceeding it is treated like cancellation */
  deadline?: Date;
}

export interface FactModelOptions {
  maxDepth?: number;
}
