/**
 * Configuration Management
 * Reads gate settings from environment variables; CLI flags override them.
 */

import { z } from 'zod';
import { DEFAULT_CONCURRENCY, DEFAULT_MAX_DEPTH } from '../../packages/policy-engine/src';

export interface GateConfig {
  /** Where policy definitions are read from */
  policyFile?: string;
  /** Optional standalone exception list */
  exceptionsFile?: string;
  maxDepth: number;
  concurrency: number;
  /** Wall-clock budget for one evaluation, in milliseconds */
  deadlineMs?: number;
}

export type GateConfigOverrides = {
  [K in keyof GateConfig]?: string;
};

const GateConfigSchema = z.object({
  policyFile: z.string().min(1).optional(),
  exceptionsFile: z.string().min(1).optional(),
  maxDepth: z.coerce.number().int().positive(),
  concurrency: z.coerce.number().int().min(1).max(64),
  deadlineMs: z.coerce.number().int().positive().optional(),
});

export const ENV_KEYS = {
  policyFile: 'ADMISSION_GATE_POLICY_FILE',
  exceptionsFile: 'ADMISSION_GATE_EXCEPTIONS_FILE',
  maxDepth: 'ADMISSION_GATE_MAX_DEPTH',
  concurrency: 'ADMISSION_GATE_CONCURRENCY',
  deadlineMs: 'ADMISSION_GATE_DEADLINE_MS',
} as const;

export class ConfigError extends Error {
  constructor(message: string, public readonly details: string[]) {
    super(`${message}: ${details.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export class ConfigManager {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Resolve configuration from environment variables and optional overrides
   */
  getConfig(overrides: GateConfigOverrides = {}): GateConfig {
    const raw = {
      policyFile: overrides.policyFile ?? this.getEnvVar(ENV_KEYS.policyFile),
      exceptionsFile: overrides.exceptionsFile ?? this.getEnvVar(ENV_KEYS.exceptionsFile),
      maxDepth: overrides.maxDepth ?? this.getEnvVar(ENV_KEYS.maxDepth, String(DEFAULT_MAX_DEPTH)),
      concurrency:
        overrides.concurrency ?? this.getEnvVar(ENV_KEYS.concurrency, String(DEFAULT_CONCURRENCY)),
      deadlineMs: overrides.deadlineMs ?? this.getEnvVar(ENV_KEYS.deadlineMs),
    };

    const parsed = GateConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(
        'Invalid configuration',
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    return parsed.data;
  }

  private getEnvVar(key: string, defaultValue?: string): string | undefined {
    const value = this.env[key];
    return value !== undefined && value.trim() !== '' ? value.trim() : defaultValue;
  }
}

export const configManager = new ConfigManager();
