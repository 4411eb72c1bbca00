// Builds the pull request context from CI environment variables

import { PullRequestEnvSchema } from '../../core/schemas.js';
import { ConfigurationError } from '../../core/errors.js';
import type { PullRequestContext } from '../../models/pull-request.js';

/**
 * Values given on the command line; they take precedence over the environment
 */
export type ContextOverrides = Partial<PullRequestContext>;

/**
 * Read PR_TITLE, PR_HEAD_REF, PR_AUTHOR, BASE_SHA and HEAD_SHA.
 *
 * @throws ConfigurationError when no author is available
 */
export function loadPullRequestContext(
  env: Record<string, string | undefined> = process.env,
  overrides: ContextOverrides = {}
): PullRequestContext {
  const vars = PullRequestEnvSchema.parse(env);
  const pick = (override: string | undefined, fallback: string): string =>
    override !== undefined ? override.trim() : fallback;

  const context: PullRequestContext = {
    title: pick(overrides.title, vars.PR_TITLE),
    branch: pick(overrides.branch, vars.PR_HEAD_REF),
    author: pick(overrides.author, vars.PR_AUTHOR),
    baseSha: pick(overrides.baseSha, vars.BASE_SHA),
    headSha: pick(overrides.headSha, vars.HEAD_SHA)
  };

  if (!context.author) {
    throw new ConfigurationError('PR author is not set (PR_AUTHOR or --author)', 'author');
  }

  return context;
}
