/**
 * Error taxonomy for the querygate pipeline.
 *
 * Every failure the pipeline can report carries a stable `code` so the
 * caller (CLI, tests, any other presentation layer) can branch on it
 * without matching message text.
 */

export type ErrorCode =
  | 'SchemaUnavailable'
  | 'OracleUnavailable'
  | 'OracleTimeout'
  | 'GenerationEmpty'
  | 'ExecutionTimeout'
  | 'ExecutionError'
  | 'Cancelled'
  | 'ConfigInvalid';

export class QueryGateError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'QueryGateError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The backing store could not be introspected. */
export class SchemaUnavailableError extends QueryGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SchemaUnavailable', message, options);
    this.name = 'SchemaUnavailableError';
  }
}

/** Transport-level failure talking to the text-generation oracle. */
export class OracleUnavailableError extends QueryGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('OracleUnavailable', message, options);
    this.name = 'OracleUnavailableError';
  }
}

export class OracleTimeoutError extends QueryGateError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: { cause?: unknown }) {
    super('OracleTimeout', `Oracle did not answer within ${timeoutMs}ms.`, options);
    this.name = 'OracleTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** No statement could be extracted from any oracle reply. */
export class GenerationEmptyError extends QueryGateError {
  readonly attempts: number;

  constructor(attempts: number) {
    super(
      'GenerationEmpty',
      `No SQL statement found in the model output after ${attempts} attempt${attempts === 1 ? '' : 's'}.`,
    );
    this.name = 'GenerationEmptyError';
    this.attempts = attempts;
  }
}

export class ExecutionTimeoutError extends QueryGateError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('ExecutionTimeout', `Query exceeded the ${timeoutMs}ms statement timeout.`);
    this.name = 'ExecutionTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Engine error raised while running an admitted query.
 * The message is the engine's own, unmodified.
 */
export class QueryExecutionError extends QueryGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ExecutionError', message, options);
    this.name = 'QueryExecutionError';
  }
}

export class PipelineCancelledError extends QueryGateError {
  constructor(stage: string) {
    super('Cancelled', `Cancelled during ${stage}.`);
    this.name = 'PipelineCancelledError';
  }
}

export class ConfigError extends QueryGateError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('ConfigInvalid', `Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function isQueryGateError(error: unknown): error is QueryGateError {
  return error instanceof QueryGateError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
