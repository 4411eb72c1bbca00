// Naming checks for the pull request itself

import { type CheckOutcome, emptyOutcome } from '../../models/check.js';

function mismatch(heading: string, expected: string, received: string): string {
  return `!!  ${heading}\n` + `    Expected: '${expected}'\n` + `    Received: '${received}'\n`;
}

/**
 * The head branch must be exactly `<author><suffix>`
 */
export function checkBranchName(author: string, branch: string, suffix: string): CheckOutcome {
  const outcome = emptyOutcome();
  const expected = `${author}${suffix}`;

  if (branch !== expected) {
    outcome.errors.push(mismatch('Wrong branch name.', expected, branch));
  } else {
    outcome.passed.push(`....Branch name is correct: ${branch}`);
  }
  return outcome;
}

/**
 * The title must be exactly `<prefix><author>`
 */
export function checkPullRequestTitle(author: string, title: string, prefix: string): CheckOutcome {
  const outcome = emptyOutcome();
  const expected = `${prefix}${author}`;

  if (title !== expected) {
    outcome.errors.push(mismatch('Wrong pull request title.', expected, title));
  } else {
    outcome.passed.push(`....Pull request title is correct: ${title}`);
  }
  return outcome;
}
