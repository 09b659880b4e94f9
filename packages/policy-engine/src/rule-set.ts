/**
 * Rule Set loading and exception resolution
 *
 * A rule set is built once from configuration and never mutated. Exceptions
 * carry an expiry that is checked against the evaluation time of every run
 * (resolveExceptions), so a lapsed exception re-activates its rule's
 * findings without a reload.
 */

import { PolicyLoadError } from './errors';
import { logger } from './logger';
import { compileRule, withSeverity } from './rules';
import {
  ExceptionDocument,
  formatZodIssues,
  PolicyDocumentSchema,
  RuleDocument,
  RuleIdSchema,
  SeveritySchema,
} from './schemas';
import {
  CustomRuleDefinition,
  Rule,
  RuleDefinition,
  RuleException,
  RuleSet,
  Severity,
} from './types';

const log = logger.withComponent('rule-set');

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Exception as supplied by callers; expiry is parsed during rule set creation
 */
export interface ExceptionInput {
  ruleId: string;
  justification: string;
  expires: string | Date;
}

export interface RuleSetInit {
  version: string;
  name?: string;
  source?: string;
  rules: RuleDefinition[];
  exceptions?: ExceptionInput[];
  severityOverrides?: Record<string, Severity>;
}

export interface LoadRuleSetOptions {
  /** Exceptions maintained outside the policy document */
  exceptions?: ExceptionInput[];
  /** Per-rule severity remap; wins over overrides in the document */
  severityOverrides?: Record<string, Severity>;
  /** Programmatic rules appended after the document's rules */
  customRules?: CustomRuleDefinition[];
  /** Policy source location recorded on the rule set */
  source?: string;
}

/**
 * Build a rule set from a parsed policy document.
 * @throws PolicyLoadError when the document or its exceptions are invalid
 */
export function loadRuleSet(source: unknown, options: LoadRuleSetOptions = {}): RuleSet {
  const parsed = PolicyDocumentSchema.safeParse(source);
  if (!parsed.success) {
    throw new PolicyLoadError('Policy document is invalid', formatZodIssues(parsed.error));
  }
  const doc = parsed.data;

  return createRuleSet({
    version: doc.version,
    name: doc.name,
    source: options.source,
    rules: [...doc.rules.map(toRuleDefinition), ...(options.customRules ?? [])],
    exceptions: [...(doc.exceptions ?? []).map(toExceptionInput), ...(options.exceptions ?? [])],
    severityOverrides: { ...doc.severityOverrides, ...options.severityOverrides },
  });
}

/**
 * Build a rule set from definitions assembled in code.
 * @throws PolicyLoadError on duplicate rule ids or malformed exceptions
 */
export function createRuleSet(init: RuleSetInit): RuleSet {
  if (!init.version || init.version.trim().length === 0) {
    throw new PolicyLoadError('Rule set version is required');
  }

  const invalid = init.rules.flatMap(describeInvalidDefinition);
  if (invalid.length > 0) {
    throw new PolicyLoadError('Invalid rule definitions', invalid);
  }

  const duplicates = findDuplicates(init.rules.map((rule) => rule.id));
  if (duplicates.length > 0) {
    throw new PolicyLoadError(
      'Duplicate rule ids',
      duplicates.map((id) => `rule id '${id}' is defined more than once`)
    );
  }

  const overrides = init.severityOverrides ?? {};
  const knownIds = new Set(init.rules.map((rule) => rule.id));
  for (const ruleId of Object.keys(overrides)) {
    if (!knownIds.has(ruleId)) {
      log.warn('Ignoring severity override for unknown rule', { ruleId, ruleSetVersion: init.version });
    }
  }

  const rules: Rule[] = init.rules.map((definition) => {
    const compiled = compileRule(definition);
    const override = overrides[definition.id];
    return override ? withSeverity(compiled, override) : compiled;
  });

  const exceptions = buildExceptions(init.exceptions ?? [], knownIds, init.version);

  return Object.freeze({
    version: init.version,
    name: init.name,
    source: init.source,
    rules: Object.freeze(rules),
    exceptions,
  });
}

/**
 * Which exceptions are active at `now`: active iff now < expiry.
 * Computed fresh for every run.
 */
export function resolveExceptions(ruleSet: RuleSet, now: Date): Map<string, boolean> {
  const active = new Map<string, boolean>();
  for (const [ruleId, exception] of ruleSet.exceptions) {
    active.set(ruleId, now.getTime() < exception.expires.getTime());
  }
  return active;
}

/**
 * Parse an exception expiry. Strings must be ISO-8601 dates or timestamps;
 * date-only values expire at midnight UTC and times without an offset are
 * read as UTC, so the result never depends on the host timezone.
 */
export function parseExpiry(value: string | Date | undefined): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value;
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hour = '00', minute = '00', second = '00', fraction = '', offset = 'Z'] = match;
  if (!isCalendarDate(Number(year), Number(month), Number(day))) {
    return undefined;
  }
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) {
    return undefined;
  }
  const zone = offset === 'Z' ? 'Z' : `${offset.slice(0, 3)}:${offset.slice(-2)}`;
  const parsed = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second}${fraction.slice(0, 4)}${zone}`);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

function buildExceptions(
  inputs: ExceptionInput[],
  knownIds: Set<string>,
  version: string
): ReadonlyMap<string, RuleException> {
  const errors: string[] = [];
  const exceptions = new Map<string, RuleException>();

  inputs.forEach((input, index) => {
    const label = `exceptions[${index}] (${input.ruleId || 'unnamed'})`;
    if (!input.ruleId) {
      errors.push(`${label}: rule id is required`);
      return;
    }
    if (typeof input.justification !== 'string' || input.justification.trim().length === 0) {
      errors.push(`${label}: justification is required`);
      return;
    }
    if (input.expires === undefined || input.expires === '') {
      errors.push(`${label}: expiry is required`);
      return;
    }
    const expires = parseExpiry(input.expires);
    if (!expires) {
      errors.push(`${label}: expiry '${String(input.expires)}' is not a valid timestamp`);
      return;
    }
    if (exceptions.has(input.ruleId)) {
      errors.push(`${label}: rule already has an exception`);
      return;
    }
    if (!knownIds.has(input.ruleId)) {
      log.warn('Ignoring exception for unknown rule', { ruleId: input.ruleId, ruleSetVersion: version });
      return;
    }
    exceptions.set(
      input.ruleId,
      Object.freeze({
        ruleId: input.ruleId,
        justification: input.justification.trim(),
        expires,
      })
    );
  });

  if (errors.length > 0) {
    throw new PolicyLoadError('Malformed exceptions', errors);
  }
  return exceptions;
}

/**
 * Definitions built in code skip the document schema; hold them to the same
 * id and severity rules.
 */
function describeInvalidDefinition(definition: RuleDefinition, index: number): string[] {
  const label = `rules[${index}] (${definition.id || 'unnamed'})`;
  const problems: string[] = [];
  if (!RuleIdSchema.safeParse(definition.id).success) {
    problems.push(`${label}: rule id must be a slug`);
  }
  if (!SeveritySchema.safeParse(definition.severity).success) {
    problems.push(`${label}: severity '${String(definition.severity)}' must be one of block, warn, info`);
  }
  if (typeof definition.message !== 'string' || definition.message.length === 0) {
    problems.push(`${label}: message template is required`);
  }
  return problems;
}

function toRuleDefinition(doc: RuleDocument): RuleDefinition {
  return {
    kind: 'declarative',
    id: doc.id,
    severity: doc.severity,
    message: doc.message,
    description: doc.description,
    when: Array.isArray(doc.when) ? { op: 'all', predicates: doc.when } : doc.when,
  };
}

export function toExceptionInput(doc: ExceptionDocument): ExceptionInput {
  return {
    ruleId: doc.rule,
    justification: doc.justification,
    expires: doc.expires,
  };
}

function findDuplicates(ids: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      duplicates.add(id);
    }
    seen.add(id);
  }
  return [...duplicates];
}
