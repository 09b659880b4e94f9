/**
 * Policy Engine Constants
 */

import { Severity } from './types';

export const REPORT_SCHEMA_VERSION = 'admission-gate.report.v1' as const;

/**
 * Severities in reporting order
 */
export const SEVERITIES: readonly Severity[] = ['block', 'warn', 'info'] as const;

/**
 * Maximum nesting depth accepted by the fact model builder
 */
export const DEFAULT_MAX_DEPTH = 32;

/**
 * Rule workers used by evaluateConcurrently
 */
export const DEFAULT_CONCURRENCY = 4;

/**
 * Rendered in place of a template value that is not present in the facts
 */
export const MISSING_VALUE_PLACEHOLDER = '<missing>';

/**
 * CLI exit codes
 */
export const EXIT_CODES = {
  PASS: 0,
  FAIL: 1,
  INTERNAL_ERROR: 2,
} as const;
