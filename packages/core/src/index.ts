/**
 * @querygate/core — barrel export
 *
 * The question-to-chart pipeline shared by the CLI and any other front end.
 */

// Errors
export {
  QueryGateError,
  SchemaUnavailableError,
  OracleUnavailableError,
  OracleTimeoutError,
  GenerationEmptyError,
  ExecutionTimeoutError,
  QueryExecutionError,
  PipelineCancelledError,
  ConfigError,
  isQueryGateError,
  errorMessage,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Logging
export { createLogger, logger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

// Configuration
export { loadConfig, ENV_VARS, LOG_LEVELS, DEFAULT_DB_PATH } from './config.js';
export type { AppConfig, LogLevel } from './config.js';

// Database types
export type {
  ColumnSpec,
  TableSpec,
  SchemaDescriptor,
  InferredType,
  ResultColumn,
  QueryResult,
  ExecuteLimits,
} from './db/types.js';

// Safe session defaults
export { SAFE_DEFAULTS, DEFAULT_MODEL } from './db/defaults.js';

// Store and schema descriptor
export { SqliteStore } from './db/execute.js';
export type { QueryStore, SqliteConnectionConfig } from './db/execute.js';
export { describeSchema, createSchemaDescriptor, findTable } from './db/schema.js';
export type { SchemaSource } from './db/schema.js';
export { inferColumnType, looksLikeDate } from './db/infer.js';

// Validator
export type {
  ReasonCode,
  DenyCategory,
  ValidationVerdict,
  ValidationPolicy,
} from './policy/types.js';
export { defaultValidationPolicy } from './policy/types.js';
export { validate, validateSql } from './policy/engine.js';
export { screenQuestion } from './policy/intent.js';
export { parseSql } from './policy/parse.js';
export type { ParseOutcome, ParseResult, TableRef } from './policy/parse.js';
export { DENYLIST } from './policy/keywords.js';

// LLM module
export * from './llm/index.js';

// Charts and export
export { select as selectChart } from './chart/select.js';
export type { ChartKind, ChartSpec, SelectOptions } from './chart/select.js';
export { summarizeColumns } from './chart/summary.js';
export type { ColumnSummary } from './chart/summary.js';
export { toCsv, escapeCsvField } from './export/csv.js';

export { SAMPLE_QUESTIONS } from './samples.js';

// Ask orchestration
export { ask } from './ask.js';
export type { AskInput, AskDeps, AskOutcome, AskStatus, OutcomeCode } from './ask.js';
