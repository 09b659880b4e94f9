import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import { PolicyLoadError } from './errors';
import { ExceptionInput, loadRuleSet, LoadRuleSetOptions, toExceptionInput } from './rule-set';
import { ExceptionListSchema, formatZodIssues } from './schemas';
import { RuleSet } from './types';

const SUPPORTED_EXTENSIONS = new Set(['.yml', '.yaml', '.json']);

/**
 * Read a policy document from disk and build a rule set from it.
 * The file path is recorded as the rule set's source.
 */
export function loadRuleSetFromFile(policyPath: string, options: LoadRuleSetOptions = {}): RuleSet {
  const doc = readPolicyFile(policyPath);
  return loadRuleSet(doc, { ...options, source: options.source ?? policyPath });
}

/**
 * Read a standalone exception list: either a bare list or `{ exceptions: [...] }`
 */
export function loadExceptionsFromFile(exceptionsPath: string): ExceptionInput[] {
  const doc = readPolicyFile(exceptionsPath);
  const parsed = ExceptionListSchema.safeParse(doc);
  if (!parsed.success) {
    throw new PolicyLoadError(
      `Exception list is invalid: ${exceptionsPath}`,
      formatZodIssues(parsed.error)
    );
  }
  const list = Array.isArray(parsed.data) ? parsed.data : parsed.data.exceptions;
  return list.map(toExceptionInput);
}

export function readPolicyFile(filePath: string): unknown {
  const extension = path.extname(filePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.has(extension)) {
    throw new PolicyLoadError(`Unsupported policy file type: ${filePath}`);
  }
  if (!fs.existsSync(filePath)) {
    throw new PolicyLoadError(`Policy file missing: ${filePath}`);
  }

  const raw = fs.readFileSync(filePath, 'utf8');
  if (!raw || raw.trim().length === 0) {
    throw new PolicyLoadError(`Policy file is empty: ${filePath}`);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw, { filename: filePath });
  } catch (error) {
    throw new PolicyLoadError(`Policy file could not be parsed: ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  if (!doc || typeof doc !== 'object') {
    throw new PolicyLoadError(`Policy file is not a valid YAML object: ${filePath}`);
  }
  return doc;
}
