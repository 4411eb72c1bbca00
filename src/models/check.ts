// Check outcome types

/**
 * Result of one validation step
 */
export interface CheckOutcome {
  /** Lines describing checks that passed, in order */
  passed: string[];
  /** Human-readable error blocks (may span several lines) */
  errors: string[];
}

/**
 * Result of a whole acceptance run
 */
export interface AcceptanceReport {
  valid: boolean;
  errors: string[];
  exitCode: 0 | 1;
}

export function emptyOutcome(): CheckOutcome {
  return { passed: [], errors: [] };
}
