/**
 * Admission Gate - Main Entry Point
 * Policy-as-code gate for CI pipelines
 */

// Policy engine
export * from '../packages/policy-engine/src';

// Configuration
export * from './config/config-manager';

// CLI
export { runCli, readInputDocument } from './cli/gate-cli';
export type { CliIO, CliOptions } from './cli/gate-cli';
