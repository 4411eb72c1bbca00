// Core type definitions for course acceptance

/**
 * How a student is graded
 */
export type Grading = 'homeworks' | 'project';

/**
 * Fields every registration file must declare, in reporting order
 */
export type RegistrationField =
  | 'github_username'
  | 'first_name'
  | 'last_name'
  | 'repo'
  | 'grading'
  | 'agreement'
  | 'agree_to_rules';
