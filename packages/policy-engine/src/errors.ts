/**
 * Policy Engine Errors
 *
 * Structural errors (input, policy) abort a run before any rule executes.
 * RuleEvaluationError is recovered by the evaluator and reported as an
 * engine finding. EvaluationCancelledError replaces the report entirely.
 */

export type GateErrorCode =
  | 'MALFORMED_INPUT'
  | 'CYCLIC_INPUT'
  | 'POLICY_LOAD_FAILED'
  | 'RULE_EVALUATION_FAILED'
  | 'CANCELLED';

export abstract class GateError extends Error {
  public abstract readonly code: GateErrorCode;
}

export class MalformedInputError extends GateError {
  public readonly code: GateErrorCode = 'MALFORMED_INPUT';
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Malformed input at '${path || '(root)'}': ${reason}`);
    this.name = 'MalformedInputError';
    this.path = path;
  }
}

export class CyclicInputError extends MalformedInputError {
  public readonly code: GateErrorCode = 'CYCLIC_INPUT';

  constructor(path: string) {
    super(path, 'cycle detected in source document');
    this.name = 'CyclicInputError';
  }
}

export class PolicyLoadError extends GateError {
  public readonly code: GateErrorCode = 'POLICY_LOAD_FAILED';

  constructor(message: string, public readonly details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'PolicyLoadError';
  }
}

export class RuleEvaluationError extends GateError {
  public readonly code: GateErrorCode = 'RULE_EVALUATION_FAILED';
  public readonly ruleId: string;
  public readonly cause: unknown;

  constructor(ruleId: string, cause: unknown) {
    super(`Rule '${ruleId}' failed during evaluation: ${describeCause(cause)}`);
    this.name = 'RuleEvaluationError';
    this.ruleId = ruleId;
    this.cause = cause;
  }
}

export type CancellationReason = 'aborted' | 'deadline';

export class EvaluationCancelledError extends GateError {
  public readonly code: GateErrorCode = 'CANCELLED';

  constructor(public readonly reason: CancellationReason) {
    super(reason === 'deadline' ? 'Evaluation deadline exceeded' : 'Evaluation cancelled by caller');
    this.name = 'EvaluationCancelledError';
  }
}

export function isGateError(error: unknown): error is GateError {
  return error instanceof GateError;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
