/**
 * Analyst-style commentary on a query result, produced by the oracle.
 * Only the first rows are sent; the model sees a capped sample.
 */

import { SAFE_DEFAULTS } from '../db/defaults.js';
import type { QueryResult } from '../db/types.js';
import { completeBounded } from './bounded.js';
import type { ChatMessage, Oracle } from './types.js';

export const MAX_INSIGHT_ROWS = 50;

export interface InsightOptions {
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (value instanceof Uint8Array) return `<${value.length} bytes>`;
  return String(value);
}

function formatRows(result: QueryResult): string {
  const lines = [result.columns.map((c) => c.name).join(' | ')];
  for (const row of result.rows.slice(0, MAX_INSIGHT_ROWS)) {
    lines.push(row.map(formatCell).join(' | '));
  }
  return lines.join('\n');
}

export function composeInsights(question: string, result: QueryResult): ChatMessage[] {
  const shown = Math.min(result.rowCount, MAX_INSIGHT_ROWS);
  const content = `You are a data analyst. Analyze this query result and provide business insights.

Original question: "${question.trim()}"

Query results (${shown} of ${result.rowCount} rows${result.truncated ? ', result truncated' : ''}):
${formatRows(result)}

Provide a brief analysis with:
1. Summary of findings (2-3 sentences)
2. Key insights or patterns observed
3. Actionable recommendations if applicable

Keep it concise and business-focused, without technical jargon.

Analysis:`;
  return [{ role: 'user', content }];
}

export async function generateInsights(
  oracle: Oracle,
  question: string,
  result: QueryResult,
  opts: InsightOptions = {},
): Promise<string> {
  const text = await completeBounded(
    oracle,
    {
      messages: composeInsights(question, result),
      temperature: opts.temperature ?? 0.3,
      maxTokens: opts.maxTokens ?? SAFE_DEFAULTS.maxTokens,
    },
    opts.timeoutMs ?? SAFE_DEFAULTS.oracleTimeoutMs,
    opts.signal,
    'insights',
  );
  return text.trim();
}
