/**
 * Report assembly, validation and rendering
 *
 * The report is the only output of an evaluation. Its field names and enum
 * values are validated against report.schema.json on every build so that
 * external diffing and audit tooling can rely on them.
 */

import Ajv, { ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import { EXIT_CODES, REPORT_SCHEMA_VERSION, SEVERITIES } from './constants';
import reportSchema from './report.schema.json';
import {
  Finding,
  GateVerdict,
  Report,
  RuleSet,
  SeverityCounts,
  SuppressedFinding,
} from './types';

const ajv = new Ajv({ allErrors: true, strict: true });
addFormats(ajv);
const validateReport = ajv.compile(reportSchema);

export interface ReportInput {
  ruleSet: RuleSet;
  now: Date;
  findings: Finding[];
  suppressed: SuppressedFinding[];
}

export function buildReport(input: ReportInput): Report {
  const { ruleSet, now, findings, suppressed } = input;
  const counts = countBySeverity(findings);

  const report: Report = {
    schemaVersion: REPORT_SCHEMA_VERSION,
    ruleSetVersion: ruleSet.version,
    evaluatedAt: now.toISOString(),
    verdict: counts.block > 0 ? GateVerdict.FAIL : GateVerdict.PASS,
    findings,
    suppressed,
    counts,
    suppressedCount: suppressed.length,
  };

  assertReportShape(report);
  return report;
}

export function countBySeverity(findings: Finding[]): SeverityCounts {
  const counts: SeverityCounts = { block: 0, warn: 0, info: 0, total: 0 };
  for (const finding of findings) {
    counts[finding.severity] += 1;
    counts.total += 1;
  }
  return counts;
}

/**
 * @throws Error when the report does not match report.schema.json
 */
export function assertReportShape(report: unknown): void {
  const ok = validateReport(report);
  if (!ok && validateReport.errors) {
    const message = validateReport.errors.map(formatAjvError).join('; ');
    throw new Error(`Report schema validation failed: ${message}`);
  }
}

/**
 * Deterministic JSON: identical inputs produce byte-identical output
 */
export function serializeReport(report: Report): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Human-readable report grouped by severity, suppressed findings last
 */
export function renderReport(report: Report): string {
  const lines: string[] = [];
  lines.push(`Verdict: ${report.verdict} (rule set ${report.ruleSetVersion}, evaluated ${report.evaluatedAt})`);

  for (const severity of SEVERITIES) {
    const group = report.findings.filter((finding) => finding.severity === severity);
    if (group.length === 0) {
      continue;
    }
    lines.push('');
    lines.push(`${severity.toUpperCase()} (${group.length})`);
    for (const finding of group) {
      lines.push(`  ${formatFinding(finding)}`);
    }
  }

  if (report.suppressed.length > 0) {
    lines.push('');
    lines.push(`SUPPRESSED (${report.suppressed.length})`);
    for (const finding of report.suppressed) {
      lines.push(
        `  ${formatFinding(finding)} [exception until ${finding.exception.expires}: ${finding.exception.justification}]`
      );
    }
  }

  lines.push('');
  lines.push(
    `Summary: block=${report.counts.block} warn=${report.counts.warn} info=${report.counts.info} suppressed=${report.suppressedCount}`
  );
  return lines.join('\n');
}

/**
 * CLI exit code: 0 pass, 1 fail, 2 internal error (no report)
 */
export function exitCodeFor(outcome: Report | Error): number {
  if (outcome instanceof Error) {
    return EXIT_CODES.INTERNAL_ERROR;
  }
  return outcome.verdict === GateVerdict.PASS ? EXIT_CODES.PASS : EXIT_CODES.FAIL;
}

function formatFinding(finding: Finding): string {
  const origin = finding.source === 'engine' ? ' (engine)' : '';
  const location = finding.path ? ` ${finding.path}` : '';
  return `[${finding.ruleId}]${origin}${location}: ${finding.message}`;
}

function formatAjvError(err: ErrorObject<string, Record<string, unknown>, unknown>): string {
  const instancePath = err.instancePath || '(root)';
  const schemaPath = err.schemaPath || '';
  const message = err.message || 'validation error';
  return `${instancePath} ${message} [${schemaPath}]`.trim();
}
