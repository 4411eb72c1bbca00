// Pull request context model

/**
 * Inputs of one validation run, as provided by the CI job
 */
export interface PullRequestContext {
  /** PR title */
  title: string;
  /** Head branch of the PR */
  branch: string;
  /** GitHub login of the PR author; the reference username */
  author: string;
  /** Commit the PR is compared against */
  baseSha: string;
  /** Tip commit of the PR */
  headSha: string;
}
