import type { QueryResult } from '../db/types.js';

export interface ColumnSummary {
  column: string;
  /** Non-null numeric values seen */
  count: number;
  mean: number | null;
  median: number | null;
  min: number | null;
  max: number | null;
  sum: number | null;
}

function numericValues(rows: QueryResult['rows'], index: number): number[] {
  const values: number[] = [];
  for (const row of rows) {
    const value = row[index];
    if (typeof value === 'number') values.push(value);
    else if (typeof value === 'bigint') values.push(Number(value));
  }
  return values;
}

function median(sorted: number[]): number {
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/** Mean, median, min, max and sum for each number column, nulls ignored. */
export function summarizeColumns(result: QueryResult): ColumnSummary[] {
  const summaries: ColumnSummary[] = [];

  result.columns.forEach((column, index) => {
    if (column.inferredType !== 'number') return;

    const values = numericValues(result.rows, index);
    if (values.length === 0) {
      summaries.push({ column: column.name, count: 0, mean: null, median: null, min: null, max: null, sum: null });
      return;
    }

    const sorted = [...values].sort((a, b) => a - b);
    const sum = values.reduce((acc, v) => acc + v, 0);
    summaries.push({
      column: column.name,
      count: values.length,
      mean: sum / values.length,
      median: median(sorted),
      min: sorted[0],
      max: sorted[sorted.length - 1],
      sum,
    });
  });

  return summaries;
}
