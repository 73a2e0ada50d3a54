/**
 * Runtime configuration read from the environment.
 *
 * Values are validated with ajv; numeric and boolean strings are coerced
 * and missing keys take their defaults. Callers that want a `.env` file
 * load it (dotenv) before calling loadConfig.
 */

import { Ajv, type ErrorObject, type JSONSchemaType } from 'ajv';
import { DEFAULT_MODEL, SAFE_DEFAULTS } from './db/defaults.js';
import { ConfigError } from './errors.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_DB_PATH = 'data/banking.db';

export interface AppConfig {
  dbPath: string;
  openaiApiKey?: string;
  /** OpenAI-compatible endpoint; unset means api.openai.com */
  llmBaseUrl?: string;
  model: string;
  temperature: number;
  maxTokens: number;
  oracleTimeoutMs: number;
  generationRetries: number;
  maxRows: number;
  statementTimeoutMs: number;
  chartRowThreshold: number;
  logLevel: LogLevel;
  screenIntent: boolean;
}

/** Environment variable for each config key */
export const ENV_VARS: Readonly<Record<keyof AppConfig, string>> = {
  dbPath: 'QUERYGATE_DB_PATH',
  openaiApiKey: 'OPENAI_API_KEY',
  llmBaseUrl: 'QUERYGATE_LLM_BASE_URL',
  model: 'QUERYGATE_MODEL',
  temperature: 'QUERYGATE_TEMPERATURE',
  maxTokens: 'QUERYGATE_MAX_TOKENS',
  oracleTimeoutMs: 'QUERYGATE_ORACLE_TIMEOUT_MS',
  generationRetries: 'QUERYGATE_GENERATION_RETRIES',
  maxRows: 'QUERYGATE_MAX_ROWS',
  statementTimeoutMs: 'QUERYGATE_STATEMENT_TIMEOUT_MS',
  chartRowThreshold: 'QUERYGATE_CHART_ROW_THRESHOLD',
  logLevel: 'QUERYGATE_LOG_LEVEL',
  screenIntent: 'QUERYGATE_SCREEN_INTENT',
};

const configSchema: JSONSchemaType<AppConfig> = {
  type: 'object',
  properties: {
    dbPath: { type: 'string', minLength: 1, default: DEFAULT_DB_PATH },
    openaiApiKey: { type: 'string', nullable: true, minLength: 1 },
    llmBaseUrl: { type: 'string', nullable: true, minLength: 1 },
    model: { type: 'string', minLength: 1, default: DEFAULT_MODEL },
    temperature: { type: 'number', minimum: 0, maximum: 1, default: SAFE_DEFAULTS.temperature },
    maxTokens: { type: 'integer', minimum: 1, default: SAFE_DEFAULTS.maxTokens },
    oracleTimeoutMs: { type: 'integer', minimum: 1, default: SAFE_DEFAULTS.oracleTimeoutMs },
    generationRetries: {
      type: 'integer',
      minimum: 0,
      maximum: SAFE_DEFAULTS.maxGenerationRetries,
      default: SAFE_DEFAULTS.generationRetries,
    },
    maxRows: { type: 'integer', minimum: 1, default: SAFE_DEFAULTS.maxRows },
    statementTimeoutMs: { type: 'integer', minimum: 1, default: SAFE_DEFAULTS.statementTimeoutMs },
    chartRowThreshold: { type: 'integer', minimum: 1, default: SAFE_DEFAULTS.chartRowThreshold },
    logLevel: { type: 'string', enum: LOG_LEVELS, default: 'warn' },
    screenIntent: { type: 'boolean', default: false },
  },
  required: [
    'dbPath',
    'model',
    'temperature',
    'maxTokens',
    'oracleTimeoutMs',
    'generationRetries',
    'maxRows',
    'statementTimeoutMs',
    'chartRowThreshold',
    'logLevel',
    'screenIntent',
  ],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true, useDefaults: true, coerceTypes: true });
const validateConfig = ajv.compile(configSchema);

function isConfigKey(key: string): key is keyof AppConfig {
  return Object.prototype.hasOwnProperty.call(ENV_VARS, key);
}

function describeIssue(error: ErrorObject): string {
  const key = error.instancePath.replace(/^\//, '');
  const source = isConfigKey(key) ? ENV_VARS[key] : key || 'config';
  if (error.keyword === 'enum') {
    return `${source} must be one of ${LOG_LEVELS.join(', ')}`;
  }
  return `${source} ${error.message ?? 'is invalid'}`;
}

/**
 * Build the configuration from environment variables.
 * Blank variables count as unset. Throws ConfigError listing every problem.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, name] of Object.entries(ENV_VARS)) {
    const value = env[name]?.trim();
    if (value) raw[key] = value;
  }

  if (!validateConfig(raw)) {
    throw new ConfigError((validateConfig.errors ?? []).map(describeIssue));
  }
  return raw;
}
