// Console report for a validation run

export const RULE = '='.repeat(70);

export type LineWriter = (line: string) => void;

/**
 * Writes the human-readable report; the CI log shows it verbatim
 */
export class Reporter {
  constructor(private readonly write: LineWriter = line => console.log(line)) {}

  header(courseName: string, author: string): void {
    this.write(RULE);
    this.write(`Course registration validation: ${courseName}`);
    this.write(`\tPR author (reference username): ${author}`);
    this.write(RULE);
    this.write('');
  }

  passed(lines: string[]): void {
    for (const line of lines) {
      this.write(line);
    }
  }

  blank(): void {
    this.write('');
  }

  results(errors: string[]): void {
    this.write(RULE);
    if (errors.length > 0) {
      this.write('ERRORS FOUND (must be fixed):');
      this.write('');
      for (const error of errors) {
        this.write(error);
        this.write('');
      }
    } else {
      this.write('ALL CHECKS PASSED!');
      this.write('');
    }
    this.write(RULE);
  }
}
