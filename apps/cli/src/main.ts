#!/usr/bin/env -S node --import tsx

/**
 * querygate CLI entrypoint.
 * Ask questions in plain language against a read-only SQLite database.
 */

import { Command, CommanderError } from 'commander';
import dotenv from 'dotenv';
import { existsSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import {
  ask,
  createLogger,
  describeSchema,
  findTable,
  generateInsights,
  loadConfig,
  OpenAIOracle,
  QueryGenerator,
  SAMPLE_QUESTIONS,
  SqliteStore,
  summarizeColumns,
  toCsv,
  validateSql,
  ConfigError,
  isQueryGateError,
  type AppConfig,
  type AskOutcome,
  type Logger,
} from '@querygate/core';
import {
  EXIT_CODE_SUCCESS,
  cliCodeFor,
  policyError,
  runtimeError,
  toCliError,
  toExitCode,
  usageError,
} from './errors.js';
import {
  outputOptionsFromCommand,
  printAnswer,
  printData,
  printError,
  printGeneratedSql,
  printInsights,
  printLine,
  printTableSpec,
  printVerdict,
  printWarning,
  withOutputFlags,
  type OutputOptions,
} from './output.js';

const VERSION = '0.1.0';

// ── Helpers ──────────────────────────────────────────────────────────

interface ConnectionStatus {
  ok: boolean;
  error?: string;
  serverVersion?: string;
}

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      throw usageError(err.message, 'CONFIG_INVALID', { issues: err.issues });
    }
    throw err;
  }
}

function openStore(config: AppConfig): SqliteStore {
  const dbPath = resolve(config.dbPath);
  if (!existsSync(dbPath)) {
    throw runtimeError(
      `Database file not found: ${dbPath}. Set QUERYGATE_DB_PATH to a provisioned SQLite file.`,
      'SCHEMA_UNAVAILABLE',
    );
  }
  return new SqliteStore(dbPath);
}

function createOracle(config: AppConfig, timeoutMs: number): OpenAIOracle {
  if (!config.openaiApiKey) {
    throw usageError('OPENAI_API_KEY is not set. Add it to the environment or a .env file.', 'CONFIG_INVALID');
  }
  return new OpenAIOracle({
    apiKey: config.openaiApiKey,
    model: config.model,
    baseURL: config.llmBaseUrl,
    timeoutMs,
  });
}

function cliLogger(config: AppConfig, output: OutputOptions): Logger {
  return createLogger({ level: output.debug ? 'debug' : config.logLevel });
}

function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw usageError(`${flag} must be a positive integer, got "${value}".`);
  }
  return parsed;
}

async function runCommand(
  command: Command,
  fn: (output: OutputOptions) => Promise<void> | void,
): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    const cliError = toCliError(error);
    printError(cliError, output);
    process.exitCode = toExitCode(cliError);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function failOutcome(outcome: AskOutcome): never {
  const error = outcome.error ?? { code: 'ExecutionError', message: 'Unknown pipeline failure.' };
  if (outcome.status === 'rejected') {
    throw policyError(error.message, { code: error.code, verdict: outcome.verdict, sql: outcome.generatedSql });
  }
  throw runtimeError(error.message, cliCodeFor(error.code), { code: error.code, attempts: outcome.attempts });
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('querygate')
  .description('querygate: ask questions of a SQLite database in plain language, read-only')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and debug logs', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Setup:  doctor, schema
  Query:  ask, validate, samples
`,
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check environment, configuration and database access')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const nodeVersion = process.version;
          const nodeOk = parseInt(nodeVersion.slice(1), 10) >= 20;

          let config: AppConfig | null = null;
          let configIssues: string[] = [];
          try {
            config = loadConfig();
          } catch (err: unknown) {
            if (!(err instanceof ConfigError)) throw err;
            configIssues = err.issues;
          }

          const dbPath = resolve(config?.dbPath ?? process.env.QUERYGATE_DB_PATH ?? 'data/banking.db');
          const connection: ConnectionStatus = existsSync(dbPath)
            ? await new SqliteStore(dbPath).testConnection()
            : { ok: false, error: 'file not found' };

          const payload = {
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            config: { ok: config !== null, issues: configIssues },
            openAiKeySet: Boolean(config?.openaiApiKey),
            model: config?.model ?? null,
            llmBaseUrl: config?.llmBaseUrl ?? null,
            database: { path: dbPath, ...connection },
            limits: config
              ? {
                  maxRows: config.maxRows,
                  statementTimeoutMs: config.statementTimeoutMs,
                  oracleTimeoutMs: config.oracleTimeoutMs,
                  generationRetries: config.generationRetries,
                }
              : null,
          };

          if (output.json) {
            printData(payload);
            return;
          }

          printLine('querygate doctor', output);
          printLine('================', output);
          printLine('', output);
          printLine(`Node.js:    ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
          printLine(`Config:     ${config ? 'valid ✓' : '✗ invalid'}`, output);
          for (const issue of configIssues) {
            printWarning(issue, output);
          }
          printLine(`OpenAI key: ${payload.openAiKeySet ? 'set ✓' : 'not set'}`, output);
          printLine(`LLM model:  ${payload.model ?? '(unknown)'}`, output);
          printLine(`LLM URL:    ${payload.llmBaseUrl ?? 'default (api.openai.com)'}`, output);
          printLine(
            `Database:   ${dbPath} ${connection.ok ? `✓ (SQLite ${connection.serverVersion ?? ''})` : `✗ ${connection.error ?? ''}`}`,
            output,
          );
          if (payload.limits) {
            printLine('', output);
            printLine('Limits:', output);
            printLine(`  Max rows:          ${payload.limits.maxRows}`, output);
            printLine(`  Statement timeout: ${payload.limits.statementTimeoutMs}ms`, output);
            printLine(`  Oracle timeout:    ${payload.limits.oracleTimeoutMs}ms`, output);
            printLine(`  Generation retries: ${payload.limits.generationRetries}`, output);
          }
        });
      }),
  ),
  ['querygate doctor', 'querygate doctor --json'],
);

// ── schema ───────────────────────────────────────────────────────────

interface SchemaOptions {
  table?: string;
}

withExamples(
  withOutputFlags(
    program
      .command('schema')
      .description('Show the tables and columns the model is allowed to query')
      .option('--table <name>', 'Show a single table')
      .action(async function (this: Command, opts: SchemaOptions) {
        await runCommand(this, async (output) => {
          const config = readConfig();
          const schema = await describeSchema(openStore(config));

          let tables = schema.tables;
          if (opts.table !== undefined) {
            const table = findTable(schema, opts.table);
            if (!table) {
              const known = schema.tables.map((t) => t.name).join(', ');
              throw usageError(`Unknown table "${opts.table}". Known tables: ${known}.`);
            }
            tables = [table];
          }

          if (output.json) {
            printData({ tables });
            return;
          }
          for (const table of tables) {
            printTableSpec(table, output);
          }
        });
      }),
  ),
  ['querygate schema', 'querygate schema --table loans', 'querygate schema --json'],
);

// ── samples ──────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('samples')
      .description('List example questions')
      .action(async function (this: Command) {
        await runCommand(this, (output) => {
          if (output.json) {
            printData(SAMPLE_QUESTIONS);
            return;
          }
          SAMPLE_QUESTIONS.forEach((q, i) => printLine(`${i + 1}. ${q}`, output));
        });
      }),
  ),
  ['querygate samples'],
);

// ── validate ─────────────────────────────────────────────────────────

interface ValidateOptions {
  requireParse: boolean;
  blockTable?: string[];
}

withExamples(
  withOutputFlags(
    program
      .command('validate')
      .description('Run the safety validator on a SQL statement without executing it')
      .argument('<sql>', 'SQL text to check')
      .option('--require-parse', 'Reject statements the AST parser cannot read', false)
      .option('--block-table <name...>', 'Tables that may not be referenced')
      .action(async function (this: Command, sql: string, opts: ValidateOptions) {
        await runCommand(this, (output) => {
          const verdict = validateSql(sql, {
            requireParse: opts.requireParse,
            blockedTables: opts.blockTable ?? [],
          });

          printVerdict(verdict, output);
          if (!verdict.admitted) {
            throw policyError(verdict.message, verdict);
          }
          if (output.json) {
            printData(verdict);
          }
        });
      }),
  ),
  [`querygate validate "SELECT COUNT(*) FROM loans"`, `querygate validate "DROP TABLE loans" --json`],
);

// ── ask ──────────────────────────────────────────────────────────────

interface AskOptions {
  execute: boolean;
  csv?: string;
  insights: boolean;
  maxRows?: string;
  timeout?: string;
}

withExamples(
  withOutputFlags(
    program
      .command('ask')
      .description('Ask a question: generate SQL, validate it, run it read-only and pick a chart')
      .argument('<question>', 'Natural language question')
      .option('--no-execute', 'Generate and validate only, do not execute')
      .option('--csv <file>', 'Write the result rows to a CSV file')
      .option('--insights', 'Ask the model for a short analysis of the result', false)
      .option('--max-rows <n>', 'Row cap for this query')
      .option('--timeout <ms>', 'Statement timeout for this query')
      .action(async function (this: Command, question: string, opts: AskOptions) {
        await runCommand(this, async (output) => {
          const config = readConfig();
          const maxRows = parsePositiveInt(opts.maxRows, '--max-rows') ?? config.maxRows;
          const timeoutMs = parsePositiveInt(opts.timeout, '--timeout') ?? config.statementTimeoutMs;

          const store = openStore(config);
          const schema = await describeSchema(store);
          const logger = cliLogger(config, output);
          const oracle = createOracle(config, config.oracleTimeoutMs);
          const generator = new QueryGenerator(oracle, {
            timeoutMs: config.oracleTimeoutMs,
            maxRetries: config.generationRetries,
            logger,
          });

          const controller = new AbortController();
          const onSigint = (): void => controller.abort();
          process.once('SIGINT', onSigint);

          try {
            if (output.verbose) {
              printLine(`Question: "${question}"`, output);
              printLine(`Model: ${oracle.model}`, output);
            }

            const outcome = await ask(
              { question, execute: opts.execute, limits: { maxRows, timeoutMs } },
              {
                schema,
                generator,
                store,
                compose: { temperature: config.temperature, maxTokens: config.maxTokens },
                chartRowThreshold: config.chartRowThreshold,
                screenIntent: config.screenIntent,
                logger,
                signal: controller.signal,
              },
            );

            printGeneratedSql(outcome, output);
            if (outcome.status === 'rejected' || outcome.status === 'error') {
              failOutcome(outcome);
            }

            const result = outcome.result;
            let insights: string | null = null;
            if (opts.insights && result && result.rowCount > 0) {
              try {
                insights = await generateInsights(oracle, question, result, {
                  maxTokens: config.maxTokens,
                  timeoutMs: config.oracleTimeoutMs,
                  signal: controller.signal,
                });
              } catch (err: unknown) {
                if (!isQueryGateError(err) || err.code === 'Cancelled') throw err;
                printWarning(`Insights unavailable: ${err.message}`, output);
              }
            }

            if (opts.csv && result) {
              const csvPath = resolve(opts.csv);
              writeFileSync(csvPath, toCsv(result), 'utf-8');
              printLine(`Wrote ${result.rowCount} rows to ${csvPath}`, output);
            }

            if (output.json) {
              printData({ ...outcome, summary: result ? summarizeColumns(result) : [], insights });
              return;
            }

            if (outcome.verdict) printVerdict(outcome.verdict, output);
            if (!result) {
              printLine('--no-execute: skipping execution.', output);
              return;
            }

            printLine('', output);
            printAnswer(result, outcome.chart, output);
            if (insights) printInsights(insights, output);
          } finally {
            process.off('SIGINT', onSigint);
          }
        });
      }),
  ),
  [
    'querygate ask "Show me total deposits last month"',
    'querygate ask "Average balance by account type" --csv balances.csv',
    'querygate ask "Loan distribution by type" --insights --json',
    'querygate ask "Top customers by transactions" --no-execute',
  ],
);

// ── parse ────────────────────────────────────────────────────────────

const HELP_CODES = new Set(['commander.helpDisplayed', 'commander.help', 'commander.version']);

async function main(): Promise<void> {
  dotenv.config({ path: join(process.cwd(), '.env') });
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    if (error instanceof CommanderError) {
      if (HELP_CODES.has(error.code)) {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = 1;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
