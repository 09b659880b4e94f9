/**
 * Rule compilation
 *
 * A rule definition is either declarative (predicate tree) or custom (caller
 * code). Both compile to the same frozen Rule shape whose evaluate() returns
 * one MatchLocation per distinct violating path.
 */

import { FactModel } from './facts';
import { compilePredicate, ROOT_SCOPE } from './predicates';
import { MatchLocation, Predicate, Rule, RuleDefinition, Severity } from './types';

export function compileRule(definition: RuleDefinition): Rule {
  const evaluate =
    definition.kind === 'declarative'
      ? declarativeEvaluator(definition.when, definition.id)
      : definition.evaluate.bind(definition);

  const rule: Rule = {
    id: definition.id,
    kind: definition.kind,
    severity: definition.severity,
    message: definition.message,
    description: definition.description,
    evaluate,
  };
  return Object.freeze(rule);
}

/**
 * Copy of a compiled rule with a different severity
 */
export function withSeverity(rule: Rule, severity: Severity): Rule {
  if (rule.severity === severity) {
    return rule;
  }
  return Object.freeze({ ...rule, severity });
}

function declarativeEvaluator(when: Predicate, ruleId: string): (facts: FactModel) => MatchLocation[] {
  const predicate = compilePredicate(when, ruleId);
  return (facts) => {
    const result = predicate.test(facts, ROOT_SCOPE);
    if (!result.holds) {
      return [];
    }
    // A rule that holds always reports at least one location
    if (result.locations.length === 0) {
      return [{ path: '' }];
    }
    return result.locations.map((path) => ({ path }));
  };
}
