// Tests for the console report

import { describe, it, expect } from 'vitest';
import { Reporter, RULE } from './reporter.js';

function capture(): { lines: string[]; reporter: Reporter } {
  const lines: string[] = [];
  return { lines, reporter: new Reporter(line => lines.push(line)) };
}

describe('Reporter', () => {
  it('should print the header', () => {
    const { lines, reporter } = capture();
    reporter.header('Test Course', 'alice');
    expect(lines).toEqual([
      RULE,
      'Course registration validation: Test Course',
      '\tPR author (reference username): alice',
      RULE,
      ''
    ]);
    expect(RULE).toHaveLength(70);
  });

  it('should print a success summary', () => {
    const { lines, reporter } = capture();
    reporter.results([]);
    expect(lines).toEqual([RULE, 'ALL CHECKS PASSED!', '', RULE]);
  });

  it('should print every error followed by a blank line', () => {
    const { lines, reporter } = capture();
    reporter.results(['!!  first', '!!  second']);
    expect(lines).toEqual([RULE, 'ERRORS FOUND (must be fixed):', '', '!!  first', '', '!!  second', '', RULE]);
  });

  it('should print passed checks in order', () => {
    const { lines, reporter } = capture();
    reporter.passed(['....a', '....b']);
    reporter.blank();
    expect(lines).toEqual(['....a', '....b', '']);
  });
});
