/**
 * Tests for the registration file validator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'yaml';
import { RegistrationValidator, describeType, formatValue } from './registration-validator.js';
import { REFERENCE_AGREEMENT } from '../../core/agreement.js';

const PATH = 'accepts_2025/alice.yaml';

function validRecord(): Record<string, unknown> {
  return {
    github_username: 'alice',
    first_name: 'Alice',
    last_name: 'Tester',
    repo: 'https://github.com/alice/homeworks',
    grading: 'homeworks',
    agreement: REFERENCE_AGREEMENT,
    agree_to_rules: 'yes'
  };
}

describe('RegistrationValidator', () => {
  const validator = new RegistrationValidator({
    author: 'alice',
    referenceAgreement: REFERENCE_AGREEMENT,
    acceptsDir: 'accepts_2025'
  });

  describe('validateContent', () => {
    it('should accept a complete homework registration', () => {
      const outcome = validator.validateContent(yaml.stringify(validRecord()), PATH);

      expect(outcome.errors).toEqual([]);
      expect(outcome.passed).toEqual([
        '....github_username matches the PR author: alice',
        '....First name: Alice',
        '....Last name: Tester',
        '....Homework repository: https://github.com/alice/homeworks',
        '....Grading: homeworks',
        '....Agreement text matches the official course text',
        '....Agreement to the rules confirmed (agree_to_rules: yes)'
      ]);
    });

    it('should accept a project registration with repo: None', () => {
      const content = yaml.stringify({ ...validRecord(), repo: 'None', grading: 'project' });
      const outcome = validator.validateContent(content, PATH);

      expect(outcome.errors).toEqual([]);
      expect(outcome.passed).toContain('....Submission track: project (repo=None)');
      expect(outcome.passed).toContain('....Grading: project');
    });

    it('should accept an empty repo value on the project track', () => {
      const content = yaml.stringify({ ...validRecord(), repo: null, grading: 'project' });
      expect(validator.validateContent(content, PATH).errors).toEqual([]);
    });

    it('should accept agree_to_rules: true', () => {
      const content = yaml.stringify({ ...validRecord(), agree_to_rules: true });
      expect(validator.validateContent(content, PATH).errors).toEqual([]);
    });

    it.each(['yes', 'Yes', 'YES', 'on', 'On', 'ON'])('should accept agree_to_rules: %s', spelling => {
      const { agree_to_rules: _omitted, ...rest } = validRecord();
      const content = `${yaml.stringify(rest)}agree_to_rules: ${spelling}\n`;
      const outcome = validator.validateContent(content, PATH);

      expect(outcome.errors).toEqual([]);
      expect(outcome.passed).toContain('....Agreement to the rules confirmed (agree_to_rules: yes)');
    });

    it('should keep YAML 1.1 falsy spellings of other fields as strings', () => {
      const content = yaml.stringify({ ...validRecord(), first_name: 'No' });
      const outcome = validator.validateContent(content, PATH);
      expect(outcome.passed).toContain('....First name: No');
    });

    it('should report an empty file', () => {
      const outcome = validator.validateContent('# only a comment\n', PATH);
      expect(outcome.errors).toEqual([`!!  File '${PATH}' is empty or contains only comments`]);
    });

    it('should report a file that is not a mapping', () => {
      const outcome = validator.validateContent('- alice\n- bob\n', PATH);
      expect(outcome.errors).toEqual([`!!  File '${PATH}' must contain a YAML mapping of fields`]);
    });

    it('should report unparseable YAML as an error', () => {
      const outcome = validator.validateContent('github_username: [alice\n', PATH);
      expect(outcome.errors).toHaveLength(1);
      expect(outcome.errors[0]).toMatch(/^!! {2}Could not parse YAML file 'accepts_2025\/alice\.yaml': /);
    });

    it('should report duplicate keys as a parse error', () => {
      const outcome = validator.validateContent('first_name: A\nfirst_name: B\n', PATH);
      expect(outcome.errors).toHaveLength(1);
      expect(outcome.errors[0]).toMatch(/^!! {2}Could not parse YAML file/);
    });
  });

  describe('validateRecord', () => {
    it('should list every missing field in order', () => {
      const outcome = validator.validateRecord({});
      expect(outcome.errors).toEqual([
        "!!  Required field is missing: 'github_username'",
        "!!  Required field is missing: 'first_name'",
        "!!  Required field is missing: 'last_name'",
        "!!  Required field is missing: 'repo'",
        "!!  Required field is missing: 'grading'",
        "!!  Required field is missing: 'agreement'",
        "!!  Required field is missing: 'agree_to_rules'"
      ]);
      expect(outcome.passed).toEqual([]);
    });

    it('should reject a username that differs from the PR author', () => {
      const outcome = validator.validateRecord({ ...validRecord(), github_username: 'mallory' });
      expect(outcome.errors).toEqual([
        "!!  github_username mismatch.\n    Declared: 'mallory'\n    Expected: 'alice' (your GitHub username)"
      ]);
    });

    it('should reject a non-string username', () => {
      const outcome = validator.validateRecord({ ...validRecord(), github_username: 42 });
      expect(outcome.errors).toEqual(["!!  Field 'github_username' must be a non-empty string"]);
    });

    it('should reject blank names', () => {
      const outcome = validator.validateRecord({ ...validRecord(), first_name: '  ', last_name: null });
      expect(outcome.errors).toEqual([
        "!!  Field 'first_name' must be a non-empty string with your first name",
        "!!  Field 'last_name' must be a non-empty string with your last name"
      ]);
    });

    it('should reject a repo that is neither None nor a URL', () => {
      const outcome = validator.validateRecord({ ...validRecord(), repo: 'github.com/alice/hw' });
      expect(outcome.errors).toEqual([
        "!!  Field 'repo' must be the string 'None' or a valid URL (starting with http:// or https://).\n" +
          "    Received: 'github.com/alice/hw' (type: string)",
        '!!  With grading: homeworks the repo field must contain the repository URL.'
      ]);
    });

    it('should report the type of a non-string repo', () => {
      const outcome = validator.validateRecord({ ...validRecord(), repo: 7, grading: 'project' });
      expect(outcome.errors).toEqual([
        "!!  Field 'repo' must be the string 'None' or a valid URL (starting with http:// or https://).\n" +
          "    Received: '7' (type: number)",
        "!!  With grading: project the repo field must be 'None'."
      ]);
    });

    it('should reject an unknown grading value', () => {
      const outcome = validator.validateRecord({ ...validRecord(), grading: 'exam' });
      expect(outcome.errors).toEqual(["!!  Field 'grading' must be 'homeworks' or 'project'.\n    Received: 'exam'"]);
    });

    it('should require a repository URL on the homework track', () => {
      const outcome = validator.validateRecord({ ...validRecord(), repo: 'None' });
      expect(outcome.errors).toEqual(['!!  With grading: homeworks the repo field must contain the repository URL.']);
    });

    it('should reject a repository on the project track', () => {
      const outcome = validator.validateRecord({ ...validRecord(), grading: 'project' });
      expect(outcome.errors).toEqual(["!!  With grading: project the repo field must be 'None'."]);
    });

    it('should not trim the repo when checking the homework track', () => {
      const outcome = validator.validateRecord({ ...validRecord(), repo: '  https://github.com/alice/hw' });
      expect(outcome.passed).toContain('....Homework repository: https://github.com/alice/hw');
      expect(outcome.errors).toEqual(['!!  With grading: homeworks the repo field must contain the repository URL.']);
    });

    it('should accept an agreement with different trailing whitespace', () => {
      const reformatted = REFERENCE_AGREEMENT.split('\n').map(line => `${line}   `).join('\r\n');
      const outcome = validator.validateRecord({ ...validRecord(), agreement: `\n${reformatted}\n\n` });
      expect(outcome.errors).toEqual([]);
    });

    it('should reject a modified agreement', () => {
      const outcome = validator.validateRecord({ ...validRecord(), agreement: 'I agree.' });
      expect(outcome.errors).toEqual([
        '!!  The agreement text does not match the official course text.\n' +
          '    Copy the agreement verbatim from README.md in the accepts_2025/ folder'
      ]);
    });

    it('should reject an empty agreement', () => {
      const outcome = validator.validateRecord({ ...validRecord(), agreement: '' });
      expect(outcome.errors).toEqual(["!!  Field 'agreement' must contain the agreement text"]);
    });

    it('should reject agree_to_rules other than yes', () => {
      const outcome = validator.validateRecord({ ...validRecord(), agree_to_rules: 'no' });
      expect(outcome.errors).toEqual(["!!  Field 'agree_to_rules' must be 'yes'.\n    Received: 'no'"]);
    });

    it('should reject agree_to_rules: off', () => {
      const outcome = validator.validateRecord({ ...validRecord(), agree_to_rules: 'off' });
      expect(outcome.errors).toEqual(["!!  Field 'agree_to_rules' must be 'yes'.\n    Received: 'off'"]);
    });

    it('should reject agree_to_rules: false', () => {
      const outcome = validator.validateRecord({ ...validRecord(), agree_to_rules: false });
      expect(outcome.errors).toEqual(["!!  Field 'agree_to_rules' must be 'yes'.\n    Received: 'false'"]);
    });
  });

  describe('validateFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'acceptance-validator-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should validate a file on disk', async () => {
      const filePath = path.join(dir, 'alice.yaml');
      await fs.writeFile(filePath, yaml.stringify(validRecord()), 'utf-8');

      const outcome = await validator.validateFile(filePath, PATH);
      expect(outcome.errors).toEqual([]);
      expect(outcome.passed).toHaveLength(7);
    });

    it('should report a file that cannot be read', async () => {
      const outcome = await validator.validateFile(path.join(dir, 'missing.yaml'), PATH);
      expect(outcome.errors).toHaveLength(1);
      expect(outcome.errors[0]).toMatch(/^!! {2}Could not read file 'accepts_2025\/alice\.yaml': ENOENT/);
    });
  });
});

describe('describeType', () => {
  it('should name YAML value types', () => {
    expect(describeType('x')).toBe('string');
    expect(describeType(1)).toBe('number');
    expect(describeType(true)).toBe('boolean');
    expect(describeType(null)).toBe('null');
    expect(describeType(['a'])).toBe('list');
    expect(describeType({ a: 1 })).toBe('mapping');
  });
});

describe('formatValue', () => {
  it('should print strings as is and other values as JSON', () => {
    expect(formatValue('https://x')).toBe('https://x');
    expect(formatValue(['a', 'b'])).toBe('["a","b"]');
    expect(formatValue(null)).toBe('null');
  });
});
