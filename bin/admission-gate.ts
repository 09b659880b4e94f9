#!/usr/bin/env node

/**
 * Admission Gate CLI entry point
 *
 * Evaluates an artifact document against a policy and exits with
 * 0 (pass), 1 (fail) or 2 (internal error). SIGINT/SIGTERM cancel the run.
 */

import { runCli } from '../src/cli/gate-cli';

const controller = new AbortController();
const cancel = (): void => controller.abort();
process.once('SIGINT', cancel);
process.once('SIGTERM', cancel);

runCli(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 2;
  })
  .finally(() => {
    process.removeListener('SIGINT', cancel);
    process.removeListener('SIGTERM', cancel);
  });
