/**
 * Predicate compiler
 *
 * Turns a predicate expression tree into a closure that tests a fact model
 * and reports the paths that made it hold. Compilation happens once per rule
 * at load time, so invalid regular expressions surface as PolicyLoadError and
 * evaluation itself never throws for well-formed trees.
 */

import { FactModel } from './facts';
import { PolicyLoadError } from './errors';
import { FactScalar, FactValue, Predicate } from './types';

export interface PredicateResult {
  holds: boolean;
  /** Absolute fact paths, in evaluation order, without duplicates */
  locations: string[];
}

/**
 * Where relative paths are resolved. Inside `any` over a scalar list the
 * element itself is addressed with the empty path.
 */
export interface PredicateScope {
  prefix: string;
  element?: { path: string; value: FactScalar };
}

export interface CompiledPredicate {
  test(facts: FactModel, scope: PredicateScope): PredicateResult;
  references(scope: PredicateScope): string[];
}

export const ROOT_SCOPE: PredicateScope = { prefix: '' };

const ALLOWED_REGEX_FLAGS = /^[imsu]*$/;

const NO_MATCH: PredicateResult = { holds: false, locations: [] };

export function compilePredicate(predicate: Predicate, ruleId: string): CompiledPredicate {
  switch (predicate.op) {
    case 'equals': {
      const expected = predicate.value;
      return leaf(predicate.path, (value) => value !== undefined && valuesEqual(value, expected));
    }

    case 'in': {
      const candidates = predicate.values;
      return leaf(
        predicate.path,
        (value) => value !== undefined && !Array.isArray(value) && candidates.some((c) => c === value)
      );
    }

    case 'contains': {
      const ignoreCase = predicate.ignoreCase === true;
      const needle = normalize(predicate.value, ignoreCase);
      return leaf(predicate.path, (value) => {
        if (typeof value === 'string') {
          const haystack = ignoreCase ? value.toLowerCase() : value;
          return haystack.includes(String(needle));
        }
        if (Array.isArray(value)) {
          return value.some((item) => normalize(item, ignoreCase) === needle);
        }
        return false;
      });
    }

    case 'matches': {
      const regex = compileRegex(predicate.pattern, predicate.flags, ruleId);
      return leaf(predicate.path, (value) => typeof value === 'string' && regex.test(value));
    }

    case 'absent':
      return existence(predicate.path, false);

    case 'present':
      return existence(predicate.path, true);

    case 'not': {
      const child = compilePredicate(predicate.predicate, ruleId);
      return {
        test(facts, scope) {
          const result = child.test(facts, scope);
          return result.holds ? NO_MATCH : { holds: true, locations: child.references(scope) };
        },
        references: (scope) => child.references(scope),
      };
    }

    case 'all': {
      const children = predicate.predicates.map((p) => compilePredicate(p, ruleId));
      return {
        test(facts, scope) {
          const locations: string[] = [];
          for (const child of children) {
            const result = child.test(facts, scope);
            if (!result.holds) {
              return NO_MATCH;
            }
            locations.push(...result.locations);
          }
          return { holds: true, locations: unique(locations) };
        },
        references: (scope) => unique(children.flatMap((c) => c.references(scope))),
      };
    }

    case 'anyOf': {
      const children = predicate.predicates.map((p) => compilePredicate(p, ruleId));
      return {
        test(facts, scope) {
          let holds = false;
          const locations: string[] = [];
          for (const child of children) {
            const result = child.test(facts, scope);
            if (result.holds) {
              holds = true;
              locations.push(...result.locations);
            }
          }
          return holds ? { holds, locations: unique(locations) } : NO_MATCH;
        },
        references: (scope) => unique(children.flatMap((c) => c.references(scope))),
      };
    }

    case 'any': {
      const where = compilePredicate(predicate.where, ruleId);
      const listPath = predicate.path;
      return {
        test(facts, scope) {
          let holds = false;
          const locations: string[] = [];
          for (const elementScope of elementScopes(facts, scope, listPath)) {
            const result = where.test(facts, elementScope);
            if (result.holds) {
              holds = true;
              locations.push(...result.locations);
            }
          }
          return holds ? { holds, locations: unique(locations) } : NO_MATCH;
        },
        references: (scope) => [resolvePath(scope, listPath)],
      };
    }
  }
}

/**
 * Absolute fact path for a path relative to the scope
 */
export function resolvePath(scope: PredicateScope, path: string): string {
  if (path.length === 0) {
    return scope.element ? scope.element.path : scope.prefix;
  }
  if (scope.prefix.length === 0) {
    return path;
  }
  return path.startsWith('[') ? `${scope.prefix}${path}` : `${scope.prefix}.${path}`;
}

function readValue(facts: FactModel, scope: PredicateScope, path: string): FactValue | undefined {
  if (scope.element) {
    return path.length === 0 ? scope.element.value : undefined;
  }
  return facts.get(resolvePath(scope, path));
}

function leaf(path: string, check: (value: FactValue | undefined) => boolean): CompiledPredicate {
  return {
    test(facts, scope) {
      return check(readValue(facts, scope, path))
        ? { holds: true, locations: [resolvePath(scope, path)] }
        : NO_MATCH;
    },
    references: (scope) => [resolvePath(scope, path)],
  };
}

function existence(path: string, expected: boolean): CompiledPredicate {
  return {
    test(facts, scope) {
      const exists = scope.element ? path.length === 0 : facts.hasPrefix(resolvePath(scope, path));
      return exists === expected ? { holds: true, locations: [resolvePath(scope, path)] } : NO_MATCH;
    },
    references: (scope) => [resolvePath(scope, path)],
  };
}

function elementScopes(facts: FactModel, scope: PredicateScope, path: string): PredicateScope[] {
  if (scope.element) {
    return [];
  }
  const listPath = resolvePath(scope, path);
  const value = facts.get(listPath);
  if (Array.isArray(value)) {
    return value.map((item, index) => {
      const elementPath = `${listPath}[${index}]`;
      return { prefix: elementPath, element: { path: elementPath, value: item } };
    });
  }
  return facts.elementIndices(listPath).map((index) => ({ prefix: `${listPath}[${index}]` }));
}

function compileRegex(pattern: string, flags: string | undefined, ruleId: string): RegExp {
  const regexFlags = flags ?? '';
  if (!ALLOWED_REGEX_FLAGS.test(regexFlags)) {
    throw new PolicyLoadError(`Rule '${ruleId}' uses unsupported regex flags`, [
      `flags '${regexFlags}' (allowed: i, m, s, u)`,
    ]);
  }
  try {
    return new RegExp(pattern, regexFlags);
  } catch (error) {
    throw new PolicyLoadError(`Rule '${ruleId}' has an invalid pattern`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

function valuesEqual(actual: FactValue, expected: FactValue): boolean {
  if (Array.isArray(actual) || Array.isArray(expected)) {
    return (
      Array.isArray(actual) &&
      Array.isArray(expected) &&
      actual.length === expected.length &&
      actual.every((item, index) => item === expected[index])
    );
  }
  return actual === expected;
}

function normalize(value: FactScalar, ignoreCase: boolean): FactScalar {
  return ignoreCase && typeof value === 'string' ? value.toLowerCase() : value;
}

function unique(paths: string[]): string[] {
  return [...new Set(paths)];
}
