/**
 * Configuration Service
 *
 * Loads course settings from an optional .acceptance.yaml in the repository
 * root. Every key has a default, so a repository without the file validates
 * against the built-in course settings.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { type AcceptanceConfig, AcceptanceConfigSchema } from '../../core/schemas.js';
import { REFERENCE_AGREEMENT } from '../../core/agreement.js';
import { ConfigurationError } from '../../core/errors.js';
import { isNotFound } from '../../core/fs-errors.js';
import { getLogger } from '../../core/logger.js';

export const DEFAULT_CONFIG_FILE = '.acceptance.yaml';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Configuration Service
 */
export class ConfigService {
  private rootDir: string;
  private configPath: string;
  private explicitPath: boolean;
  private cachedConfig: AcceptanceConfig | null = null;

  /**
   * @param options.rootDir - repository root, paths in the config resolve against it
   * @param options.configPath - config file; when given explicitly it must exist
   */
  constructor(options: { rootDir?: string; configPath?: string } = {}) {
    this.rootDir = options.rootDir || '.';
    this.explicitPath = options.configPath !== undefined;
    this.configPath = path.resolve(this.rootDir, options.configPath ?? DEFAULT_CONFIG_FILE);
  }

  private async readConfigFile(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error) && !this.explicitPath) {
        getLogger().debug('No config file, using defaults', { path: this.configPath });
        return {};
      }
      throw new ConfigurationError(`Cannot read config file: ${describeError(error)}`, 'config', {
        path: this.configPath
      });
    }

    try {
      const parsed: unknown = yaml.parse(content);
      return parsed ?? {};
    } catch (error) {
      throw new ConfigurationError(`Config file is not valid YAML: ${describeError(error)}`, 'config', {
        path: this.configPath
      });
    }
  }

  /**
   * Load and validate the configuration, with caching
   */
  async getConfig(): Promise<AcceptanceConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    const raw = await this.readConfigFile();
    const result = AcceptanceConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      );
      throw new ConfigurationError(`Invalid config file: ${issues.join('; ')}`, 'config', {
        path: this.configPath
      });
    }

    this.cachedConfig = result.data;
    getLogger().debug('Loaded configuration', { ...result.data });
    return result.data;
  }

  clearCache(): void {
    this.cachedConfig = null;
  }

  /**
   * Agreement text the registration file must reproduce
   */
  async getReferenceAgreement(): Promise<string> {
    const config = await this.getConfig();
    if (!config.agreementFile) {
      return REFERENCE_AGREEMENT;
    }

    const agreementPath = path.resolve(this.rootDir, config.agreementFile);
    try {
      return await fs.readFile(agreementPath, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read agreement file: ${describeError(error)}`, 'agreementFile', {
        path: agreementPath
      });
    }
  }
}
