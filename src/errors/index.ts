/**
 * Error classes raised by logsweep
 */

/**
 * Raised when a task's root directory is missing, is not a directory or cannot be read
 */
export class ScanError extends Error {
  readonly path: string;
  readonly code?: string;

  constructor(message: string, path: string, code?: string) {
    super(message);
    this.name = 'ScanError';
    this.path = path;
    this.code = code;
  }
}

/**
 * Raised when a retention policy reaching the evaluator is malformed
 */
export class PolicyConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PolicyConfigError';
  }
}

/**
 * Raised when a selected file could not be removed
 */
export class DeletionError extends Error {
  readonly path: string;
  readonly code?: string;

  constructor(message: string, path: string, code?: string) {
    super(message);
    this.name = 'DeletionError';
    this.path = path;
    this.code = code;
  }
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(problems.length > 0 ? `${message}:\n  - ${problems.join('\n  - ')}` : message);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

/**
 * Raised when a run cannot begin at all
 */
export class RunStartError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RunStartError';
  }
}

/**
 * Get the system error code (ENOENT, EACCES, ...) carried by an error, if any
 */
export function errorCode(error: unknown): string | undefined {
  // fs errors raised in another realm (a vm context) fail instanceof Error
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
