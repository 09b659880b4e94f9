/**
 * Tests for the admission gate CLI
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CliIO, runCli } from './gate-cli';

const POLICY = path.join(__dirname, '../../policies/container-baseline.yml');
const EXCEPTIONS = path.join(__dirname, '../../policies/exceptions.yml');
const SAMPLE_FACTS = path.join(__dirname, '../../examples/dockerfile-facts.json');

const PASSING_INPUT = [
  'from:',
  '  - base_image: python:3.12-slim',
  'user: app',
  'healthcheck:',
  '  test: curl -f http://localhost/health',
  'labels:',
  '  maintainer: platform-team',
  '',
].join('\n');

function captureIO(): { io: CliIO; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      stdout: (text) => {
        out.push(text);
      },
      stderr: (text) => {
        err.push(text);
      },
    },
    out,
    err,
  };
}

describe('admission-gate CLI', () => {
  let tmpDir: string;
  let stderrSpy: jest.SpyInstance;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'admission-gate-cli-'));
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    stderrSpy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    stderrSpy.mockRestore();
  });

  function writeInput(name: string, content: string): string {
    const filePath = path.join(tmpDir, name);
    fs.writeFileSync(filePath, content, 'utf8');
    return filePath;
  }

  describe('usage', () => {
    it('should fail with usage when no command is given', async () => {
      const { io, err } = captureIO();

      expect(await runCli([], { io, env: {} })).toBe(2);
      expect(err[0].startsWith('Usage:')).toBe(true);
    });

    it('should print usage for --help', async () => {
      const { io, err } = captureIO();

      expect(await runCli(['--help'], { io, env: {} })).toBe(0);
      expect(err[0].startsWith('Usage:')).toBe(true);
    });

    it('should reject unknown commands', async () => {
      const { io, err } = captureIO();

      expect(await runCli(['lint'], { io, env: {} })).toBe(2);
      expect(err[0].split('\n')[0]).toBe('Unknown command: lint');
    });

    it('should require an input file for evaluate', async () => {
      const { io, err } = captureIO();

      expect(await runCli(['evaluate', '--policy', POLICY], { io, env: {} })).toBe(2);
      expect(err[0].split('\n')[0]).toBe('--input <file> is required');
    });

    it('should require a policy', async () => {
      const { io, err } = captureIO();

      expect(await runCli(['validate'], { io, env: {} })).toBe(2);
      expect(err[0].split('\n')[0]).toBe('--policy <file> or ADMISSION_GATE_POLICY_FILE is required');
    });

    it('should reject a flag whose value is another flag', async () => {
      const { io, err } = captureIO();

      const code = await runCli(['validate', '--policy', '--exceptions', EXCEPTIONS], { io, env: {} });

      expect(code).toBe(2);
      expect(err[0].split('\n')[0]).toBe('--policy requires a value');
    });

    it('should reject a trailing flag without a value', async () => {
      const { io, err } = captureIO();

      expect(await runCli(['evaluate', '--policy', POLICY, '--input'], { io, env: {} })).toBe(2);
      expect(err[0].split('\n')[0]).toBe('--input requires a value');
    });

    it('should reject unknown output formats', async () => {
      const { io, err } = captureIO();

      const code = await runCli(['evaluate', '--policy', POLICY, '--input', SAMPLE_FACTS, '--format', 'xml'], {
        io,
        env: {},
      });

      expect(code).toBe(2);
      expect(err[0].split('\n')[0]).toBe('Unknown format: xml');
    });

    it('should reject an invalid --now timestamp', async () => {
      const { io, err } = captureIO();

      const code = await runCli(['evaluate', '--policy', POLICY, '--input', SAMPLE_FACTS, '--now', 'yesterday'], {
        io,
        env: {},
      });

      expect(code).toBe(2);
      expect(err[0].split('\n')[0]).toBe('Invalid --now timestamp: yesterday');
    });
  });

  describe('validate', () => {
    it('should summarize the policy', async () => {
      const { io, out } = captureIO();

      expect(await runCli(['validate', '--policy', POLICY, '--exceptions', EXCEPTIONS], { io, env: {} })).toBe(0);
      expect(out).toEqual(['Policy container-baseline version 2024.06.1: 6 rules, 1 exceptions']);
    });

    it('should read the policy location from the environment', async () => {
      const { io, out } = captureIO();

      expect(await runCli(['validate'], { io, env: { ADMISSION_GATE_POLICY_FILE: POLICY } })).toBe(0);
      expect(out).toEqual(['Policy container-baseline version 2024.06.1: 6 rules, 0 exceptions']);
    });

    it('should report policy load failures', async () => {
      const { io, err } = captureIO();
      const brokenPolicy = writeInput('broken-policy.yml', 'version: "1"\nrules: nope\n');

      expect(await runCli(['validate', '--policy', brokenPolicy], { io, env: {} })).toBe(2);
      expect(err[0].startsWith('POLICY_LOAD_FAILED: Policy document is invalid: rules: ')).toBe(true);
    });
  });

  describe('evaluate', () => {
    it('should fail the gate for the sample facts', async () => {
      const { io, out } = captureIO();

      const code = await runCli(
        [
          'evaluate',
          '--policy',
          POLICY,
          '--exceptions',
          EXCEPTIONS,
          '--input',
          SAMPLE_FACTS,
          '--now',
          '2026-01-01T00:00:00Z',
        ],
        { io, env: {} }
      );

      expect(code).toBe(1);
      const lines = out[0].split('\n');
      expect(lines[0]).toBe('Verdict: FAIL (rule set 2024.06.1, evaluated 2026-01-01T00:00:00.000Z)');
      expect(lines[lines.length - 1]).toBe('Summary: block=2 warn=1 info=0 suppressed=1');
    });

    it('should pass a compliant image and emit JSON', async () => {
      const { io, out } = captureIO();
      const input = writeInput('passing.yml', PASSING_INPUT);

      const code = await runCli(['evaluate', '--input', input, '--format', 'json', '--concurrency', '2'], {
        io,
        env: { ADMISSION_GATE_POLICY_FILE: POLICY },
      });

      expect(code).toBe(0);
      const report: unknown = JSON.parse(out[0]);
      expect(report).toMatchObject({ verdict: 'PASS', findings: [], counts: { total: 0 } });
    });

    it('should keep stdout free of log lines when emitting JSON', async () => {
      const stdoutSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);

      try {
        const code = await runCli(
          ['evaluate', '--policy', POLICY, '--input', SAMPLE_FACTS, '--format', 'json', '--now', '2026-01-01T00:00:00Z'],
          { env: {} }
        );

        expect(code).toBe(1);
        const written = stdoutSpy.mock.calls.map((call: unknown[]) => String(call[0])).join('');
        const report: unknown = JSON.parse(written);
        expect(report).toMatchObject({ verdict: 'FAIL', counts: { block: 2, warn: 2, info: 0 } });
      } finally {
        stdoutSpy.mockRestore();
      }
    });

    it('should report malformed input as an internal error', async () => {
      const { io, err } = captureIO();
      const input = writeInput('mixed.json', JSON.stringify({ tags: ['a', { b: 1 }] }));

      expect(await runCli(['evaluate', '--policy', POLICY, '--input', input], { io, env: {} })).toBe(2);
      expect(err).toEqual(["MALFORMED_INPUT: Malformed input at 'tags': list mixes scalar and structured elements"]);
    });

    it('should report a missing input file', async () => {
      const { io, err } = captureIO();
      const missing = path.join(tmpDir, 'missing.json');

      expect(await runCli(['evaluate', '--policy', POLICY, '--input', missing], { io, env: {} })).toBe(2);
      expect(err).toEqual([`MALFORMED_INPUT: Malformed input at '(root)': input file missing: ${missing}`]);
    });

    it('should apply --max-depth', async () => {
      const { io, err } = captureIO();
      const input = writeInput('deep.json', JSON.stringify({ labels: { team: { name: 'x' } } }));

      expect(
        await runCli(['evaluate', '--policy', POLICY, '--input', input, '--max-depth', '2'], { io, env: {} })
      ).toBe(2);
      expect(err).toEqual(["MALFORMED_INPUT: Malformed input at 'labels.team': nesting exceeds maximum depth of 2"]);
    });

    it('should reject invalid configuration', async () => {
      const { io, err } = captureIO();

      const code = await runCli(['evaluate', '--policy', POLICY, '--input', SAMPLE_FACTS], {
        io,
        env: { ADMISSION_GATE_CONCURRENCY: '0' },
      });

      expect(code).toBe(2);
      expect(err[0].startsWith('CONFIG_INVALID: Invalid configuration: concurrency: ')).toBe(true);
    });

    it('should stop when cancelled', async () => {
      const { io, err } = captureIO();
      const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const controller = new AbortController();
      controller.abort();

      try {
        const code = await runCli(['evaluate', '--policy', POLICY, '--input', SAMPLE_FACTS], {
          io,
          env: {},
          signal: controller.signal,
        });

        expect(code).toBe(2);
        expect(err).toEqual(['CANCELLED: Evaluation cancelled by caller']);
      } finally {
        warnSpy.mockRestore();
      }
    });
  });
});
