/**
 * Rendering for the querygate CLI.
 *
 * Every command prints through here: a `{ ok, data }` envelope under
 * --json, text otherwise. Text goes to stdout, warnings and errors to
 * stderr.
 */

import type { Command } from 'commander';
import {
  summarizeColumns,
  type AskOutcome,
  type ChartSpec,
  type QueryResult,
  type TableSpec,
  type ValidationVerdict,
} from '@querygate/core';
import { CliError } from './errors.js';
import { formatTable } from './util/table.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function withOutputFlags(command: Command): Command {
  return command
    .option('--json', 'Print a JSON envelope instead of text', false)
    .option('--quiet', 'Print results only', false)
    .option('--verbose', 'Print the question and model before answering', false)
    .option('--debug', 'Debug logs and error details', false);
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const flags = command.optsWithGlobals();
  return {
    json: flags.json === true,
    quiet: flags.quiet === true,
    verbose: flags.verbose === true,
    debug: flags.debug === true,
  };
}

// ── Formatting (pure) ────────────────────────────────────────────────

export function describeChart(chart: ChartSpec): string {
  const axes = chart.xField === null ? '' : ` x=${chart.xField} y=${chart.yFields.join(',')}`;
  return `Chart: ${chart.kind}${axes} (${chart.rationale})`;
}

export function describeRows(result: QueryResult): string {
  const plural = result.rowCount === 1 ? '' : 's';
  const cut = result.truncated ? `, truncated at ${result.rowCount}` : '';
  return `${result.rowCount} row${plural} in ${result.execMs}ms${cut}`;
}

export function describeGeneration(outcome: Pick<AskOutcome, 'model' | 'attempts'>): string {
  const tries = outcome.attempts > 1 ? `, ${outcome.attempts} attempts` : '';
  return `Generated SQL (model: ${outcome.model}${tries}):`;
}

export function formatColumns(table: TableSpec): string {
  return formatTable(
    ['column', 'type', 'nullable', 'pk'],
    table.columns.map((c) => [
      c.name,
      c.declaredType,
      c.nullable === false ? 'no' : 'yes',
      c.isPrimaryKey ? 'yes' : '',
    ]),
  );
}

/** Null when there is nothing worth summarizing */
export function formatSummary(result: QueryResult): string | null {
  const summaries = summarizeColumns(result);
  if (summaries.length === 0 || result.rowCount < 2) return null;
  return formatTable(
    ['column', 'mean', 'median', 'min', 'max', 'sum'],
    summaries.map((s) => [s.column, s.mean, s.median, s.min, s.max, s.sum]),
  );
}

// ── Printing ─────────────────────────────────────────────────────────

export function printLine(message: string, output: OutputOptions): void {
  if (!output.quiet && !output.json) console.log(message);
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet) console.warn(`Warning: ${message}`);
}

export function printData(value: unknown): void {
  console.log(JSON.stringify({ ok: true, data: value }, null, 2));
}

export function printTableSpec(table: TableSpec, output: OutputOptions): void {
  printLine(`${table.name} (${table.rowCount ?? '?'} rows)`, output);
  printLine(formatColumns(table), output);
  printLine('', output);
}

export function printVerdict(verdict: ValidationVerdict, output: OutputOptions): void {
  printLine(verdict.admitted ? 'Policy: ADMITTED' : `Policy: REJECTED (${verdict.reasonCode})`, output);
  for (const warning of verdict.warnings) {
    printWarning(warning, output);
  }
}

export function printGeneratedSql(outcome: AskOutcome, output: OutputOptions): void {
  if (outcome.generatedSql === null) return;
  printLine(describeGeneration(outcome), output);
  printLine(`  ${outcome.generatedSql}`, output);
  printLine('', output);
}

/** Result table, row footer, chart choice and numeric summary */
export function printAnswer(result: QueryResult, chart: ChartSpec | null, output: OutputOptions): void {
  if (output.json) return;
  // results are the one thing --quiet keeps
  console.log(formatTable(result.columns.map((c) => c.name), result.rows));
  printLine('', output);
  printLine(describeRows(result), output);
  if (chart) printLine(describeChart(chart), output);

  const summary = formatSummary(result);
  if (summary !== null) {
    printLine('', output);
    printLine(summary, output);
  }
}

export function printInsights(text: string, output: OutputOptions): void {
  printLine('', output);
  printLine('Insights:', output);
  printLine(text, output);
}

export function printError(error: unknown, output: OutputOptions): void {
  const cliError = error instanceof CliError ? error : null;
  const message = error instanceof Error ? error.message : String(error);

  if (output.json) {
    const payload: Record<string, unknown> = {
      ok: false,
      code: cliError?.code ?? 'INTERNAL_ERROR',
      message,
    };
    if (output.debug) {
      payload.details = cliError ? (cliError.details ?? null) : error instanceof Error ? { stack: error.stack } : null;
    }
    console.log(JSON.stringify(payload, null, 2));
    return;
  }

  console.error(`Error: ${message}`);
  if (!output.debug) return;
  if (cliError && cliError.details !== undefined) {
    console.error('Details:', JSON.stringify(cliError.details, null, 2));
  } else if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
}
