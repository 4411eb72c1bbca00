// Domain-specific error types for the acceptance validator

/**
 * Base error class for all validator errors
 */
export abstract class AcceptanceError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Missing or invalid run inputs: environment, CLI options or config file
 */
export class ConfigurationError extends AcceptanceError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Failures of the git subprocess
 */
export class GitError extends AcceptanceError {
  readonly code = 'GIT_ERROR';
  readonly exitCode = 1;
}
