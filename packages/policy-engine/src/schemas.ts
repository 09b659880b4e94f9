/**
 * Policy Document Schemas
 *
 * Shape of policy documents and exception lists as authored in YAML or JSON.
 * Semantic checks (duplicate ids, expiry parsing, regex compilation) happen
 * in rule-set.ts once the shape is known to be valid.
 */

import { z } from 'zod';
import { Predicate } from './types';

export const SeveritySchema = z.enum(['block', 'warn', 'info']);

export const FactScalarSchema = z.union([z.string(), z.number().finite(), z.boolean()]);

export const FactValueSchema = z.union([FactScalarSchema, z.array(FactScalarSchema)]);

export const RuleIdSchema = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'rule id must be a slug');

const PathSchema = z.string();

export const PredicateSchema: z.ZodType<Predicate> = z.lazy(() =>
  z.discriminatedUnion('op', [
    z.object({ op: z.literal('equals'), path: PathSchema, value: FactValueSchema }).strict(),
    z.object({ op: z.literal('in'), path: PathSchema, values: z.array(FactScalarSchema).min(1) }).strict(),
    z
      .object({
        op: z.literal('contains'),
        path: PathSchema,
        value: FactScalarSchema,
        ignoreCase: z.boolean().optional(),
      })
      .strict(),
    z
      .object({
        op: z.literal('matches'),
        path: PathSchema,
        pattern: z.string().min(1),
        flags: z.string().optional(),
      })
      .strict(),
    z.object({ op: z.literal('absent'), path: PathSchema }).strict(),
    z.object({ op: z.literal('present'), path: PathSchema }).strict(),
    z.object({ op: z.literal('not'), predicate: PredicateSchema }).strict(),
    z.object({ op: z.literal('all'), predicates: z.array(PredicateSchema).min(1) }).strict(),
    z.object({ op: z.literal('anyOf'), predicates: z.array(PredicateSchema).min(1) }).strict(),
    z.object({ op: z.literal('any'), path: PathSchema.min(1), where: PredicateSchema }).strict(),
  ])
);

export const RuleDocumentSchema = z
  .object({
    id: RuleIdSchema,
    severity: SeveritySchema,
    message: z.string().min(1),
    description: z.string().optional(),
    when: z.union([PredicateSchema, z.array(PredicateSchema).min(1)]),
  })
  .strict();

/**
 * YAML parses unquoted timestamps into Date; both forms are accepted here
 * and parsed in rule-set.ts.
 */
export const ExceptionDocumentSchema = z
  .object({
    rule: z.string().min(1),
    justification: z.string().trim().min(1),
    expires: z.union([z.string(), z.date()]),
  })
  .strict();

export const PolicyDocumentSchema = z
  .object({
    version: z.union([z.string().min(1), z.number()]).transform((v) => String(v)),
    name: z.string().optional(),
    rules: z.array(RuleDocumentSchema),
    exceptions: z.array(ExceptionDocumentSchema).optional(),
    severityOverrides: z.record(SeveritySchema).optional(),
  })
  .strict();

export const ExceptionListSchema = z.union([
  z.array(ExceptionDocumentSchema),
  z.object({ exceptions: z.array(ExceptionDocumentSchema) }).strict(),
]);

export type RuleDocument = z.infer<typeof RuleDocumentSchema>;
export type ExceptionDocument = z.infer<typeof ExceptionDocumentSchema>;
export type PolicyDocument = z.infer<typeof PolicyDocumentSchema>;
export type PolicyDocumentInput = z.input<typeof PolicyDocumentSchema>;

/**
 * Flatten zod issues into `path: message` lines
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
