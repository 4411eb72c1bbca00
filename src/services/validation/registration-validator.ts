// Registration file validator

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { agreementMatches } from '../../core/agreement.js';
import { isGrading } from '../../core/schemas.js';
import { type CheckOutcome, emptyOutcome } from '../../models/check.js';
import type { RegistrationField } from '../../models/types.js';

/**
 * Fields every registration file must declare, in reporting order
 */
export const REQUIRED_FIELDS: RegistrationField[] = [
  'github_username',
  'first_name',
  'last_name',
  'repo',
  'grading',
  'agreement',
  'agree_to_rules'
];

const URL_PREFIXES = ['http://', 'https://'];

/**
 * Spellings YAML 1.1 reads as true that YAML 1.2 leaves as strings
 */
const CONSENT_SPELLINGS = new Set(['yes', 'Yes', 'YES', 'on', 'On', 'ON']);

function isConsent(value: unknown): boolean {
  return value === true || (typeof value === 'string' && CONSENT_SPELLINGS.has(value));
}

export interface RegistrationValidatorOptions {
  /** Reference username the file must declare */
  author: string;
  referenceAgreement: string;
  /** Folder mentioned when telling students where to copy the agreement from */
  acceptsDir: string;
}

type RegistrationData = Record<string, unknown>;

function isRecord(value: unknown): value is RegistrationData {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * `repo: None` or an empty value selects the project track
 */
function isNoRepo(value: unknown): boolean {
  return value === null || value === 'None';
}

function isUrl(value: string): boolean {
  return URL_PREFIXES.some(prefix => value.startsWith(prefix));
}

export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  if (typeof value === 'object') return 'mapping';
  return typeof value;
}

export function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function firstLine(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.split('\n')[0];
}

/**
 * Validates the content of a student's registration YAML file
 */
export class RegistrationValidator {
  constructor(private readonly options: RegistrationValidatorOptions) {}

  /**
   * Read and validate a registration file
   *
   * @param displayPath - path shown in messages
   */
  async validateFile(filePath: string, displayPath: string = filePath): Promise<CheckOutcome> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      const outcome = emptyOutcome();
      outcome.errors.push(`!!  Could not read file '${displayPath}': ${firstLine(error)}`);
      return outcome;
    }
    return this.validateContent(content, displayPath);
  }

  /**
   * Parse YAML text and validate the resulting mapping
   */
  validateContent(content: string, displayPath: string): CheckOutcome {
    const outcome = emptyOutcome();

    let data: unknown;
    try {
      data = yaml.parse(content);
    } catch (error) {
      outcome.errors.push(`!!  Could not parse YAML file '${displayPath}': ${firstLine(error)}`);
      return outcome;
    }

    if (data === null || data === undefined) {
      outcome.errors.push(`!!  File '${displayPath}' is empty or contains only comments`);
      return outcome;
    }

    if (!isRecord(data)) {
      outcome.errors.push(`!!  File '${displayPath}' must contain a YAML mapping of fields`);
      return outcome;
    }

    return this.validateRecord(data);
  }

  /**
   * Validate an already parsed registration record
   */
  validateRecord(data: RegistrationData): CheckOutcome {
    const outcome = emptyOutcome();
    const has = (field: RegistrationField): boolean => Object.prototype.hasOwnProperty.call(data, field);

    for (const field of REQUIRED_FIELDS) {
      if (!has(field)) {
        outcome.errors.push(`!!  Required field is missing: '${field}'`);
      }
    }

    if (has('github_username')) {
      this.checkUsername(data.github_username, outcome);
    }
    if (has('first_name')) {
      this.checkName(data.first_name, 'first_name', 'first name', 'First name', outcome);
    }
    if (has('last_name')) {
      this.checkName(data.last_name, 'last_name', 'last name', 'Last name', outcome);
    }
    if (has('repo')) {
      this.checkRepo(data.repo, outcome);
    }
    if (has('grading')) {
      this.checkGrading(data.grading, outcome);
    }
    if (has('grading') && has('repo')) {
      this.checkTrackConsistency(data.grading, data.repo, outcome);
    }
    if (has('agreement')) {
      this.checkAgreement(data.agreement, outcome);
    }
    if (has('agree_to_rules')) {
      this.checkConsent(data.agree_to_rules, outcome);
    }

    return outcome;
  }

  private checkUsername(value: unknown, outcome: CheckOutcome): void {
    const { author } = this.options;
    if (!isNonEmptyString(value)) {
      outcome.errors.push("!!  Field 'github_username' must be a non-empty string");
    } else if (value !== author) {
      outcome.errors.push(
        `!!  github_username mismatch.\n` +
          `    Declared: '${value}'\n` +
          `    Expected: '${author}' (your GitHub username)`
      );
    } else {
      outcome.passed.push(`....github_username matches the PR author: ${author}`);
    }
  }

  private checkName(value: unknown, field: string, noun: string, label: string, outcome: CheckOutcome): void {
    if (!isNonEmptyString(value)) {
      outcome.errors.push(`!!  Field '${field}' must be a non-empty string with your ${noun}`);
    } else {
      outcome.passed.push(`....${label}: ${value}`);
    }
  }

  private checkRepo(value: unknown, outcome: CheckOutcome): void {
    if (isNoRepo(value)) {
      outcome.passed.push('....Submission track: project (repo=None)');
    } else if (typeof value === 'string' && isUrl(value.trim())) {
      outcome.passed.push(`....Homework repository: ${value.trim()}`);
    } else {
      outcome.errors.push(
        `!!  Field 'repo' must be the string 'None' or a valid URL (starting with http:// or https://).\n` +
          `    Received: '${formatValue(value)}' (type: ${describeType(value)})`
      );
    }
  }

  private checkGrading(value: unknown, outcome: CheckOutcome): void {
    if (!isGrading(value)) {
      outcome.errors.push(
        `!!  Field 'grading' must be 'homeworks' or 'project'.\n` + `    Received: '${formatValue(value)}'`
      );
    } else {
      outcome.passed.push(`....Grading: ${value}`);
    }
  }

  /**
   * The project track takes no repository; the homework track needs one
   */
  private checkTrackConsistency(grading: unknown, repo: unknown, outcome: CheckOutcome): void {
    if (grading === 'project' && !isNoRepo(repo)) {
      outcome.errors.push("!!  With grading: project the repo field must be 'None'.");
    }
    if (grading === 'homeworks' && !(typeof repo === 'string' && isUrl(repo))) {
      outcome.errors.push('!!  With grading: homeworks the repo field must contain the repository URL.');
    }
  }

  private checkAgreement(value: unknown, outcome: CheckOutcome): void {
    if (!isNonEmptyString(value)) {
      outcome.errors.push("!!  Field 'agreement' must contain the agreement text");
    } else if (!agreementMatches(value, this.options.referenceAgreement)) {
      outcome.errors.push(
        '!!  The agreement text does not match the official course text.\n' +
          `    Copy the agreement verbatim from README.md in the ${this.options.acceptsDir}/ folder`
      );
    } else {
      outcome.passed.push('....Agreement text matches the official course text');
    }
  }

  private checkConsent(value: unknown, outcome: CheckOutcome): void {
    if (!isConsent(value)) {
      outcome.errors.push(
        `!!  Field 'agree_to_rules' must be 'yes'.\n` + `    Received: '${formatValue(value)}'`
      );
    } else {
      outcome.passed.push('....Agreement to the rules confirmed (agree_to_rules: yes)');
    }
  }
}
