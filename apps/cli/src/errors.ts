import { isQueryGateError, type OutcomeCode } from '@querygate/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'CONFIG_INVALID'
  | 'SCHEMA_UNAVAILABLE'
  | 'DB_QUERY_FAILED'
  | 'POLICY_BLOCKED'
  | 'ORACLE_FAILED'
  | 'CANCELLED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'DB_QUERY_FAILED', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function policyError(message: string, details?: unknown): CliError {
  return new CliError('policy', 'POLICY_BLOCKED', message, details);
}

/** CLI code for a pipeline error or rejection code */
export function cliCodeFor(code: OutcomeCode): CliErrorCode {
  switch (code) {
    case 'ConfigInvalid':
      return 'CONFIG_INVALID';
    case 'SchemaUnavailable':
      return 'SCHEMA_UNAVAILABLE';
    case 'OracleUnavailable':
    case 'OracleTimeout':
    case 'GenerationEmpty':
      return 'ORACLE_FAILED';
    case 'ExecutionError':
    case 'ExecutionTimeout':
      return 'DB_QUERY_FAILED';
    case 'Cancelled':
      return 'CANCELLED';
    default:
      return 'POLICY_BLOCKED';
  }
}

/** Wrap a pipeline error thrown outside `ask` (schema load, insights, config) */
export function toCliError(error: unknown): unknown {
  if (!isQueryGateError(error)) return error;
  const code = cliCodeFor(error.code);
  return code === 'CONFIG_INVALID'
    ? usageError(error.message, code)
    : runtimeError(error.message, code, { cause: error.cause });
}

export function toExitCode(error: unknown): number {
  if (error instanceof CliError) {
    if (error.kind === 'usage') return EXIT_CODE_USAGE;
    if (error.kind === 'policy') return EXIT_CODE_POLICY;
    return EXIT_CODE_RUNTIME;
  }
  return EXIT_CODE_RUNTIME;
}
