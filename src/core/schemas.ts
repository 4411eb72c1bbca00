// Zod schemas for run inputs and configuration

import { z } from 'zod';
import type { Grading } from '../models/types.js';

/**
 * Grading track enum
 */
export const GradingSchema = z.enum(['homeworks', 'project']);

/**
 * An optional environment variable, trimmed; absent becomes ''
 */
const envValue = z
  .string()
  .optional()
  .transform(value => (value ?? '').trim());

/**
 * Environment variables set by the CI workflow
 */
export const PullRequestEnvSchema = z.object({
  PR_TITLE: envValue,
  PR_HEAD_REF: envValue,
  PR_AUTHOR: envValue,
  BASE_SHA: envValue,
  HEAD_SHA: envValue
});

/**
 * A path relative to the repository root, without traversal
 */
function relativePath(kind: string) {
  return z
    .string()
    .min(1, `${kind} is required`)
    .refine(value => !value.split(/[/\\]/).includes('..'), `${kind} must not contain ".."`)
    .refine(value => !/^([/\\]|[a-zA-Z]:)/.test(value), `${kind} must be relative to the repository root`);
}

/**
 * Optional .acceptance.yaml
 */
export const AcceptanceConfigSchema = z
  .object({
    courseName: z.string().min(1, 'Course name is required').default('FBB Orchestration 2025'),
    acceptsDir: relativePath('Directory').default('accepts_2025'),
    branchSuffix: z.string().min(1, 'Branch suffix is required').default('_accept'),
    titlePrefix: z.string().min(1, 'Title prefix is required').default('acceptance-orch2025-'),
    agreementFile: relativePath('Agreement file').optional()
  })
  .strict();

/**
 * Type exports
 */
export type PullRequestEnv = z.infer<typeof PullRequestEnvSchema>;
export type AcceptanceConfigInput = z.input<typeof AcceptanceConfigSchema>;
export type AcceptanceConfig = z.infer<typeof AcceptanceConfigSchema>;

export function isGrading(value: unknown): value is Grading {
  return GradingSchema.safeParse(value).success;
}
