// Validate command - check a registration pull request

import { Command } from 'commander';
import * as path from 'path';
import { Logger, LogLevel, parseLogLevel } from '../../core/logger.js';
import { ConfigurationError } from '../../core/errors.js';
import type { AcceptanceReport } from '../../models/check.js';
import { AcceptanceService } from '../../services/acceptance/acceptance-service.js';
import { ConfigService } from '../../services/config/config-service.js';
import { loadPullRequestContext } from '../../services/context/context-loader.js';
import { Reporter } from '../../services/report/reporter.js';
import { handleError } from '../utils/error-handler.js';

export interface ValidateOptions {
  root: string;
  config?: string;
  author?: string;
  title?: string;
  branch?: string;
  base?: string;
  head?: string;
  verbose?: boolean;
  logLevel?: string;
}

function resolveLogLevel(options: ValidateOptions): LogLevel {
  if (options.verbose) {
    return LogLevel.DEBUG;
  }
  if (options.logLevel === undefined) {
    return LogLevel.WARN;
  }
  const level = parseLogLevel(options.logLevel);
  if (level === undefined) {
    throw new ConfigurationError(`Unknown log level: ${options.logLevel}`, 'logLevel');
  }
  return level;
}

/**
 * Run the validation for parsed CLI options
 */
export async function runValidate(
  options: ValidateOptions,
  env: Record<string, string | undefined> = process.env,
  reporter: Reporter = new Reporter()
): Promise<AcceptanceReport> {
  Logger.configure({ level: resolveLogLevel(options) });

  const rootDir = path.resolve(options.root);
  const context = loadPullRequestContext(env, {
    author: options.author,
    title: options.title,
    branch: options.branch,
    baseSha: options.base,
    headSha: options.head
  });

  const service = new AcceptanceService({
    rootDir,
    config: new ConfigService({ rootDir, configPath: options.config }),
    reporter
  });
  return service.run(context);
}

export const validateCommand = new Command('validate')
  .description('Validate a course registration pull request')
  .option('-r, --root <path>', 'Repository root', process.cwd())
  .option('-c, --config <path>', 'Config file (default: .acceptance.yaml in the root)')
  .option('--author <login>', 'PR author, overrides PR_AUTHOR')
  .option('--title <title>', 'PR title, overrides PR_TITLE')
  .option('--branch <name>', 'PR head branch, overrides PR_HEAD_REF')
  .option('--base <sha>', 'Base commit, overrides BASE_SHA')
  .option('--head <sha>', 'Head commit, overrides HEAD_SHA')
  .option('--log-level <level>', 'Diagnostic log level (debug, info, warn, error, silent)')
  .option('-v, --verbose', 'Shorthand for --log-level debug')
  .action(async (options: ValidateOptions) => {
    try {
      const report = await runValidate(options);
      process.exit(report.exitCode);
    } catch (error) {
      handleError(error);
    }
  });
