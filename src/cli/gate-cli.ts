/**
 * Admission Gate CLI
 *
 * Usage:
 *   admission-gate evaluate --input <facts.json|yml> [--policy <file>] [--exceptions <file>]
 *                           [--format text|json] [--now <iso>] [--concurrency <n>]
 *                           [--deadline-ms <n>] [--max-depth <n>]
 *   admission-gate validate [--policy <file>] [--exceptions <file>]
 *
 * Exit codes: 0 pass, 1 fail, 2 internal error (bad input, bad policy,
 * cancellation, usage).
 */

import * as fs from 'fs';
import yaml from 'js-yaml';
import {
  EXIT_CODES,
  exitCodeFor,
  isGateError,
  loadExceptionsFromFile,
  loadRuleSetFromFile,
  Logger,
  MalformedInputError,
  renderReport,
  runGate,
  RuleSet,
  serializeReport,
} from '../../packages/policy-engine/src';
import { ConfigError, ConfigManager, GateConfig } from '../config/config-manager';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliOptions {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  /** Cancels an in-flight evaluation, e.g. on SIGTERM from the CI runner */
  signal?: AbortSignal;
}

type OutputFormat = 'text' | 'json';

const USAGE = `Usage:
  admission-gate evaluate --input <file> [--policy <file>] [--exceptions <file>] [--format text|json]
                          [--now <iso-timestamp>] [--concurrency <n>] [--deadline-ms <n>] [--max-depth <n>]
  admission-gate validate [--policy <file>] [--exceptions <file>]

Environment:
  ADMISSION_GATE_POLICY_FILE, ADMISSION_GATE_EXCEPTIONS_FILE, ADMISSION_GATE_MAX_DEPTH,
  ADMISSION_GATE_CONCURRENCY, ADMISSION_GATE_DEADLINE_MS`;

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

const log = new Logger('admission-gate').withComponent('cli');

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? defaultIO;
  const command = argv[0];

  if (!command || command === '--help' || command === '-h') {
    io.stderr(USAGE);
    return command ? EXIT_CODES.PASS : EXIT_CODES.INTERNAL_ERROR;
  }

  try {
    const config = new ConfigManager(options.env ?? process.env).getConfig({
      policyFile: parseArg(argv, '--policy'),
      exceptionsFile: parseArg(argv, '--exceptions'),
      concurrency: parseArg(argv, '--concurrency'),
      deadlineMs: parseArg(argv, '--deadline-ms'),
      maxDepth: parseArg(argv, '--max-depth'),
    });

    switch (command) {
      case 'validate': {
        const ruleSet = loadConfiguredRuleSet(config);
        io.stdout(
          `Policy ${ruleSet.name ?? ruleSet.source ?? ''} version ${ruleSet.version}: ` +
            `${ruleSet.rules.length} rules, ${ruleSet.exceptions.size} exceptions`
        );
        return EXIT_CODES.PASS;
      }
      case 'evaluate':
        return await evaluateCommand(argv, config, io, options.signal);
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (error) {
    return reportFailure(error, io);
  }
}

async function evaluateCommand(
  argv: string[],
  config: GateConfig,
  io: CliIO,
  signal: AbortSignal | undefined
): Promise<number> {
  const inputPath = parseArg(argv, '--input');
  if (!inputPath) {
    throw new UsageError('--input <file> is required');
  }
  const format = parseFormat(parseArg(argv, '--format'));
  const now = parseNow(parseArg(argv, '--now'));

  const ruleSet = loadConfiguredRuleSet(config);
  const document = readInputDocument(inputPath);

  const report = await runGate(document, ruleSet, {
    now,
    concurrency: config.concurrency,
    maxDepth: config.maxDepth,
    signal,
    deadline: config.deadlineMs !== undefined ? new Date(Date.now() + config.deadlineMs) : undefined,
  });

  io.stdout(format === 'json' ? serializeReport(report) : renderReport(report));
  return exitCodeFor(report);
}

function loadConfiguredRuleSet(config: GateConfig): RuleSet {
  if (!config.policyFile) {
    throw new UsageError('--policy <file> or ADMISSION_GATE_POLICY_FILE is required');
  }
  const exceptions = config.exceptionsFile ? loadExceptionsFromFile(config.exceptionsFile) : undefined;
  return loadRuleSetFromFile(config.policyFile, { exceptions });
}

/**
 * Input documents are JSON or YAML produced by an upstream parser
 */
export function readInputDocument(inputPath: string): unknown {
  if (!fs.existsSync(inputPath)) {
    throw new MalformedInputError('', `input file missing: ${inputPath}`);
  }
  const raw = fs.readFileSync(inputPath, 'utf8');
  try {
    return yaml.load(raw, { filename: inputPath });
  } catch (error) {
    throw new MalformedInputError('', `input file could not be parsed: ${
      error instanceof Error ? error.message : String(error)
    }`);
  }
}

function reportFailure(error: unknown, io: CliIO): number {
  if (error instanceof UsageError) {
    io.stderr(`${error.message}\n\n${USAGE}`);
  } else if (isGateError(error)) {
    io.stderr(`${error.code}: ${error.message}`);
  } else if (error instanceof ConfigError) {
    io.stderr(`CONFIG_INVALID: ${error.message}`);
  } else {
    log.error('Unexpected failure', error);
    io.stderr(`INTERNAL_ERROR: ${error instanceof Error ? error.message : String(error)}`);
  }
  return exitCodeFor(error instanceof Error ? error : new Error(String(error)));
}

function parseArg(argv: string[], flag: string): string | undefined {
  const idx = argv.indexOf(flag);
  if (idx < 0) return undefined;
  const value = argv[idx + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

function parseFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === 'text') return 'text';
  if (value === 'json') return 'json';
  throw new UsageError(`Unknown format: ${value}`);
}

function parseNow(value: string | undefined): Date {
  if (value === undefined) return new Date();
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new UsageError(`Invalid --now timestamp: ${value}`);
  }
  return parsed;
}
