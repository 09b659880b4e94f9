/**
 * Evaluator
 *
 * Runs every rule of a rule set against a fact model, turns match locations
 * into findings, filters findings through the exceptions active at `now`,
 * and builds the report.
 *
 * Ordering: findings follow rule set order, then the order in which a rule
 * returned its match locations. The concurrent path writes each rule's
 * findings into the slot for its index and merges slots in rule order, so
 * completion order never leaks into the report.
 *
 * Failure semantics:
 * - a rule that throws yields one `block` finding with source `engine`
 * - cancellation or an exceeded deadline rejects with
 *   EvaluationCancelledError; no partial report is produced
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { DEFAULT_CONCURRENCY } from './constants';
import { EvaluationCancelledError, RuleEvaluationError } from './errors';
import { buildFactModel, FactModel } from './facts';
import { logger } from './logger';
import { buildReport } from './report';
import { resolveExceptions } from './rule-set';
import { renderMessage } from './template';
import {
  ConcurrentEvaluateOptions,
  FactModelOptions,
  Finding,
  Report,
  Rule,
  RuleSet,
  SuppressedFinding,
} from './types';

const log = logger.withComponent('evaluator');

/**
 * Evaluate synchronously, one rule after another.
 */
export function evaluate(facts: FactModel, ruleSet: RuleSet, now: Date): Report {
  assertValidTime(now);
  const started = Date.now();

  const perRule = ruleSet.rules.map((rule) => runRule(rule, facts));
  const report = assemble(ruleSet, now, perRule);

  logCompletion(report, Date.now() - started);
  return report;
}

/**
 * Evaluate with a fixed pool of rule workers. Workers check for cancellation
 * before scheduling each rule and yield to the event loop between rules so
 * an abort signal raised by the caller is observed promptly.
 *
 * @throws EvaluationCancelledError when `signal` aborts or `deadline` passes
 * @throws RangeError when `concurrency` is not a positive integer
 */
export async function evaluateConcurrently(
  facts: FactModel,
  ruleSet: RuleSet,
  options: ConcurrentEvaluateOptions
): Promise<Report> {
  const { now, signal, deadline } = options;
  assertValidTime(now);
  const started = Date.now();
  const rules = ruleSet.rules;
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
  }
  const workerCount = Math.max(1, Math.min(concurrency, rules.length));

  const checkCancelled = (): void => {
    if (signal?.aborted) {
      throw new EvaluationCancelledError('aborted');
    }
    if (deadline && Date.now() >= deadline.getTime()) {
      throw new EvaluationCancelledError('deadline');
    }
  };

  const slots: Finding[][] = new Array<Finding[]>(rules.length);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    for (;;) {
      checkCancelled();
      const index = nextIndex;
      if (index >= rules.length) {
        return;
      }
      nextIndex += 1;
      await yieldToEventLoop();
      checkCancelled();
      slots[index] = runRule(rules[index], facts);
    }
  };

  try {
    checkCancelled();
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    checkCancelled();
  } catch (error) {
    if (error instanceof EvaluationCancelledError) {
      log.warn('Evaluation cancelled', { reason: error.reason, ruleSetVersion: ruleSet.version });
    }
    throw error;
  }

  const report = assemble(ruleSet, now, slots);
  logCompletion(report, Date.now() - started);
  return report;
}

/**
 * Build the fact model from a parsed document and evaluate it. Structural
 * input errors are thrown before any rule runs.
 */
export async function runGate(
  document: unknown,
  ruleSet: RuleSet,
  options: ConcurrentEvaluateOptions & FactModelOptions
): Promise<Report> {
  const facts = buildFactModel(document, { maxDepth: options.maxDepth });
  log.debug('Fact model built', { facts: facts.size, ruleSetVersion: ruleSet.version });
  return evaluateConcurrently(facts, ruleSet, options);
}

/**
 * Run one rule and render its findings. Any fault inside the rule becomes a
 * single engine-detected `block` finding.
 */
export function runRule(rule: Rule, facts: FactModel): Finding[] {
  try {
    const locations = rule.evaluate(facts);
    if (!Array.isArray(locations) || locations.some((location) => typeof location?.path !== 'string')) {
      throw new TypeError('rule must return a list of match locations');
    }
    return locations.map((location) => ({
      ruleId: rule.id,
      severity: rule.severity,
      message: renderMessage(rule.message, facts, location, rule.id),
      path: location.path,
      source: 'policy' as const,
    }));
  } catch (cause) {
    const error = new RuleEvaluationError(rule.id, cause);
    log.error('Rule evaluation failed', error, { ruleId: rule.id });
    return [
      {
        ruleId: rule.id,
        severity: 'block',
        message: `${error.name}: ${error.message}`,
        path: '',
        source: 'engine',
      },
    ];
  }
}

/**
 * Split findings into retained and suppressed using the exceptions active at
 * `now`, preserving rule order.
 */
export function applyExceptions(
  ruleSet: RuleSet,
  now: Date,
  perRule: Finding[][]
): { findings: Finding[]; suppressed: SuppressedFinding[] } {
  const active = resolveExceptions(ruleSet, now);
  const findings: Finding[] = [];
  const suppressed: SuppressedFinding[] = [];

  for (const ruleFindings of perRule) {
    for (const finding of ruleFindings) {
      const exception = ruleSet.exceptions.get(finding.ruleId);
      if (exception && active.get(finding.ruleId) === true) {
        suppressed.push({
          ...finding,
          exception: {
            justification: exception.justification,
            expires: exception.expires.toISOString(),
          },
        });
      } else {
        findings.push(finding);
      }
    }
  }

  return { findings, suppressed };
}

function assemble(ruleSet: RuleSet, now: Date, perRule: Finding[][]): Report {
  const { findings, suppressed } = applyExceptions(ruleSet, now, perRule);
  return buildReport({ ruleSet, now, findings, suppressed });
}

function assertValidTime(now: Date): void {
  if (!(now instanceof Date) || Number.isNaN(now.getTime())) {
    throw new TypeError('Evaluation time must be a valid Date');
  }
}

function logCompletion(report: Report, durationMs: number): void {
  log.timed('Evaluation complete', durationMs, {
    ruleSetVersion: report.ruleSetVersion,
    verdict: report.verdict,
    findings: report.counts.total,
    suppressed: report.suppressedCount,
  });
}
