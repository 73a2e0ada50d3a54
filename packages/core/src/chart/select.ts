/**
 * Visualization selector. Picks a chart kind from the shape of a result;
 * the first matching rule wins and anything ambiguous falls back to a
 * plain table.
 */

import { SAFE_DEFAULTS } from '../db/defaults.js';
import type { QueryResult, ResultColumn } from '../db/types.js';

export type ChartKind = 'bar' | 'line' | 'timeSeries' | 'table';

export interface ChartSpec {
  readonly kind: ChartKind;
  readonly xField: string | null;
  readonly yFields: readonly string[];
  readonly rationale: string;
}

export interface SelectOptions {
  /** Results with more rows than this are never charted */
  displayThreshold?: number;
}

function chart(kind: ChartKind, xField: string | null, yFields: string[], rationale: string): ChartSpec {
  return Object.freeze({ kind, xField, yFields: Object.freeze(yFields), rationale });
}

function table(rationale: string): ChartSpec {
  return chart('table', null, [], rationale);
}

function isCategorical(column: ResultColumn): boolean {
  return column.inferredType === 'text' || column.inferredType === 'boolean';
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  return null;
}

/** True when every value in the column is a number and each exceeds the last */
function strictlyIncreasing(rows: QueryResult['rows'], index: number): boolean {
  let previous = Number.NEGATIVE_INFINITY;
  for (const row of rows) {
    const value = toNumber(row[index]);
    if (value === null || value <= previous) return false;
    previous = value;
  }
  return true;
}

export function select(result: QueryResult, opts: SelectOptions = {}): ChartSpec {
  const threshold = opts.displayThreshold ?? SAFE_DEFAULTS.chartRowThreshold;
  const { columns } = result;

  if (result.rowCount === 0) {
    return table('No rows to chart.');
  }
  if (result.rowCount > threshold) {
    return table(`${result.rowCount} rows exceed the chart threshold of ${threshold}.`);
  }

  const numbers = columns.filter((c) => c.inferredType === 'number');
  const datetimes = columns.filter((c) => c.inferredType === 'datetime');
  const categorical = columns.filter(isCategorical);

  if (columns.length === 2 && datetimes.length === 1 && numbers.length === 1) {
    return chart(
      'timeSeries',
      datetimes[0].name,
      [numbers[0].name],
      `${numbers[0].name} over ${datetimes[0].name}.`,
    );
  }

  if (columns.length === 2 && categorical.length === 1 && numbers.length === 1) {
    return chart(
      'bar',
      categorical[0].name,
      [numbers[0].name],
      `${numbers[0].name} by ${categorical[0].name}.`,
    );
  }

  if (datetimes.length === 1 && numbers.length >= 2 && columns.length === numbers.length + 1) {
    return chart(
      'line',
      datetimes[0].name,
      numbers.map((c) => c.name),
      `${numbers.length} series over ${datetimes[0].name}.`,
    );
  }

  // Ordinal axis: a leading numeric column that only ever goes up (year, bucket, rank)
  if (
    result.rowCount >= 2 &&
    numbers.length === columns.length &&
    numbers.length >= 3 &&
    strictlyIncreasing(result.rows, 0)
  ) {
    const [axis, ...series] = columns;
    return chart(
      'line',
      axis.name,
      series.map((c) => c.name),
      `${series.length} series along increasing ${axis.name}.`,
    );
  }

  if (result.rowCount === 1 && columns.length === 1) {
    return table('Single value.');
  }
  return table('No chart fits this column layout.');
}
