/**
 * Error taxonomy for the sweeper. Exhaustion is a normal result, not an error.
 */

export type SweepErrorCode =
  | 'ConfigError'
  | 'ProbeTimeout'
  | 'ProbeCrash'
  | 'PersistenceFailure'
  | 'StateMismatch';

export class SweepError extends Error {
  readonly code: SweepErrorCode;

  constructor(code: SweepErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
  }
}

export class ConfigError extends SweepError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('ConfigError', issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.issues = issues;
  }
}

export class ProbeTimeoutError extends SweepError {
  constructor(url: string, timeoutMs: number, options?: { cause?: unknown }) {
    super('ProbeTimeout', `Timed out after ${timeoutMs}ms loading ${url}`, options);
  }
}

export class ProbeCrashError extends SweepError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ProbeCrash', message, options);
  }
}

export class PersistenceFailureError extends SweepError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super('PersistenceFailure', `Could not write ${path}: ${describeError(options?.cause)}`, options);
    this.path = path;
  }
}

export class StateMismatchError extends SweepError {
  constructor(message: string) {
    super('StateMismatch', message);
  }
}

export function isSweepError(error: unknown): error is SweepError {
  return error instanceof SweepError;
}

/**
 * Short, single-line description of anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message.split('\n')[0];
  }
  return String(error);
}
