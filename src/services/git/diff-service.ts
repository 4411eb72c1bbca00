/**
 * Git Diff Service
 *
 * Lists the files a pull request touches by running
 * `git diff --name-status <base> <head>` through simple-git.
 */

import { simpleGit, type SimpleGit } from 'simple-git';
import { GitError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { type CheckOutcome, emptyOutcome } from '../../models/check.js';

/**
 * One line of `git diff --name-status`
 */
export interface FileChange {
  /** Status token as git prints it: A, M, D, R100, C75, ... */
  status: string;
  /** Path after the change (destination for renames and copies) */
  path: string;
  /** Source path for renames and copies */
  previousPath?: string;
}

/**
 * Anything that can list changes between two commits
 */
export interface ChangeSource {
  listChanges(baseSha: string, headSha: string): Promise<FileChange[]>;
}

/**
 * Parse tab-separated `--name-status` output, skipping blank lines
 */
export function parseNameStatus(output: string): FileChange[] {
  const changes: FileChange[] = [];

  for (const line of output.split(/\r?\n/)) {
    if (line.trim() === '') {
      continue;
    }
    const fields = line.split('\t');
    const status = fields[0].trim();
    const paths = fields.slice(1);

    if (paths.length >= 2) {
      changes.push({ status, previousPath: paths[0], path: paths[paths.length - 1] });
    } else {
      changes.push({ status, path: paths[0] ?? '' });
    }
  }

  return changes;
}

export class GitDiffService implements ChangeSource {
  private git: SimpleGit;

  constructor(baseDir: string = '.') {
    this.git = simpleGit(baseDir);
  }

  /**
   * @throws GitError when git fails (unknown commit, not a repository, ...)
   */
  async listChanges(baseSha: string, headSha: string): Promise<FileChange[]> {
    getLogger().debug('Running git diff', { baseSha, headSha });
    let output: string;
    try {
      output = await this.git.diff(['--name-status', baseSha, headSha]);
    } catch (error) {
      const message = error instanceof Error ? error.message.trim() : String(error);
      throw new GitError(message, { baseSha, headSha });
    }
    return parseNameStatus(output);
  }
}

/**
 * The PR must add exactly one file, at the expected path
 */
export async function checkChangedFiles(
  source: ChangeSource,
  baseSha: string,
  headSha: string,
  expectedPath: string
): Promise<CheckOutcome> {
  const outcome = emptyOutcome();

  if (!baseSha || !headSha) {
    outcome.errors.push('!!  BASE_SHA and HEAD_SHA must be set to compare commits');
    return outcome;
  }

  let changes: FileChange[];
  try {
    changes = await source.listChanges(baseSha, headSha);
  } catch (error) {
    if (!(error instanceof GitError)) {
      throw error;
    }
    outcome.errors.push(`!!  git diff failed: ${error.message}`);
    return outcome;
  }

  if (changes.length !== 1) {
    outcome.errors.push(
      `!!  The PR must contain exactly one changed file.\n` + `    Changes detected: ${changes.length}`
    );
    return outcome;
  }

  const [{ status, path }] = changes;

  if (status !== 'A') {
    outcome.errors.push(
      `!!  The file must be *added*, not modified or deleted.\n` + `    Received: ${status} ${path}`
    );
  }

  if (path !== expectedPath) {
    outcome.errors.push(
      `!!  Wrong file name.\n` + `    Expected: ${expectedPath}\n` + `    Received: ${path}`
    );
  } else {
    outcome.passed.push(`....Correct file added: ${path}`);
  }

  return outcome;
}
