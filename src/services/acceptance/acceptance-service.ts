/**
 * Acceptance Service
 *
 * Runs every registration check in a fixed order, prints the report and
 * returns the accumulated errors. Check failures never throw; only broken
 * inputs (configuration, unexpected I/O failures) do.
 */

import { getLogger } from '../../core/logger.js';
import type { AcceptanceReport, CheckOutcome } from '../../models/check.js';
import type { PullRequestContext } from '../../models/pull-request.js';
import { ConfigService } from '../config/config-service.js';
import { checkBranchName, checkPullRequestTitle } from '../checks/pull-request-checks.js';
import { locateRegistrationFile } from '../checks/registration-file.js';
import { type ChangeSource, GitDiffService, checkChangedFiles } from '../git/diff-service.js';
import { Reporter } from '../report/reporter.js';
import { RegistrationValidator } from '../validation/registration-validator.js';

export interface AcceptanceServiceOptions {
  /** Repository checkout the PR is validated in */
  rootDir?: string;
  config?: ConfigService;
  reporter?: Reporter;
  changes?: ChangeSource;
}

export class AcceptanceService {
  private rootDir: string;
  private config: ConfigService;
  private reporter: Reporter;
  private changes: ChangeSource;

  constructor(options: AcceptanceServiceOptions = {}) {
    this.rootDir = options.rootDir || '.';
    this.config = options.config || new ConfigService({ rootDir: this.rootDir });
    this.reporter = options.reporter || new Reporter();
    this.changes = options.changes || new GitDiffService(this.rootDir);
  }

  async run(context: PullRequestContext): Promise<AcceptanceReport> {
    const logger = getLogger();
    const config = await this.config.getConfig();
    const errors: string[] = [];

    const record = (outcome: CheckOutcome): void => {
      this.reporter.passed(outcome.passed);
      errors.push(...outcome.errors);
    };

    this.reporter.header(config.courseName, context.author);

    record(checkBranchName(context.author, context.branch, config.branchSuffix));
    this.reporter.blank();

    record(checkPullRequestTitle(context.author, context.title, config.titlePrefix));
    this.reporter.blank();

    const located = await locateRegistrationFile(this.rootDir, config.acceptsDir, context.author);
    record(located.outcome);
    this.reporter.blank();

    if (located.filePath) {
      const validator = new RegistrationValidator({
        author: context.author,
        referenceAgreement: await this.config.getReferenceAgreement(),
        acceptsDir: config.acceptsDir
      });
      record(await validator.validateFile(located.filePath, located.relativePath));
      this.reporter.blank();
    }

    record(await checkChangedFiles(this.changes, context.baseSha, context.headSha, located.relativePath));

    this.reporter.results(errors);
    logger.debug('Acceptance run finished', { errors: errors.length });

    return {
      valid: errors.length === 0,
      errors,
      exitCode: errors.length === 0 ? 0 : 1
    };
  }
}
