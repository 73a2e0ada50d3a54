/**
 * Prompt construction for SQL generation.
 *
 * Pure and deterministic: identical inputs give identical requests, so a
 * validator rejection is always attributable to the model's output.
 */

import { SAFE_DEFAULTS } from '../db/defaults.js';
import type { SchemaDescriptor } from '../db/types.js';
import { renderSchema } from './schema.js';
import type { ChatMessage, GenerationRequest, HistoryTurn } from './types.js';

export interface ComposeOptions {
  history?: readonly HistoryTurn[];
  temperature?: number;
  maxTokens?: number;
  dialect?: string;
  /** Limit the schema to the N tables most relevant to the question */
  maxTables?: number;
}

/** Only the most recent turns are replayed to the model */
export const MAX_HISTORY_TURNS = 3;

export const READ_ONLY_REFUSAL = 'ERROR: read-only access';

const REFUSAL_RE = /^\W*error:\s*read-only access\b/i;

/** True when the reply is the refusal the system prompt asks for on write requests */
export function isReadOnlyRefusal(rawText: string): boolean {
  return REFUSAL_RE.test(rawText.trim());
}

function buildSystemPrompt(dialect: string): string {
  return `You are an expert SQL assistant for a ${dialect} analytics database. Convert the user's question into one SQL query.

CONSTRAINTS:
- Produce exactly one read-only statement. It MUST start with SELECT.
- Never use data-modifying or schema-changing keywords (INSERT, UPDATE, DELETE, DROP, CREATE, ALTER, TRUNCATE, REPLACE, GRANT, REVOKE, ATTACH, PRAGMA).
- Do not use WITH / common table expressions; use subqueries instead.
- Prefer aggregate functions (SUM, COUNT, AVG, MIN, MAX) for summary questions.
- Use proper JOIN syntax when querying multiple tables and descriptive column aliases with AS.
- Add ORDER BY for top/bottom questions and a LIMIT for lists.
- Only reference tables and columns present in the schema.
- Return ONLY the SQL. No explanations, no markdown fences.
- If the question asks to modify, delete, or add data, respond exactly with: ${READ_ONLY_REFUSAL}`;
}

function buildUserPrompt(
  question: string,
  schemaContext: string,
  history: readonly HistoryTurn[],
): string {
  const parts = [schemaContext, ''];
  const recent = history.slice(-MAX_HISTORY_TURNS);
  if (recent.length > 0) {
    parts.push('Previous questions in this session:');
    for (const turn of recent) {
      parts.push(`Question: ${turn.question}`, `SQL: ${turn.sql}`);
    }
    parts.push('');
  }
  parts.push(`Question: ${question}`, '', 'SQL:');
  return parts.join('\n');
}

function checkRange(temperature: number, maxTokens: number): void {
  if (!(temperature >= 0 && temperature <= 1)) {
    throw new RangeError(`temperature must be within [0, 1], got ${temperature}`);
  }
  if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
    throw new RangeError(`maxTokens must be a positive integer, got ${maxTokens}`);
  }
}

export function compose(
  question: string,
  schema: SchemaDescriptor,
  opts: ComposeOptions = {},
): GenerationRequest {
  const temperature = opts.temperature ?? SAFE_DEFAULTS.temperature;
  const maxTokens = opts.maxTokens ?? SAFE_DEFAULTS.maxTokens;
  checkRange(temperature, maxTokens);

  const schemaContext = renderSchema(schema, { question, maxTables: opts.maxTables });
  const messages: ChatMessage[] = [
    { role: 'system', content: buildSystemPrompt(opts.dialect ?? 'SQLite') },
    { role: 'user', content: buildUserPrompt(question.trim(), schemaContext, opts.history ?? []) },
  ];

  return { question, schema, temperature, maxTokens, messages, attempt: 1 };
}

/**
 * Build the stricter follow-up request used when the previous reply held
 * no extractable statement.
 */
export function composeRetry(previous: GenerationRequest, rawText: string): GenerationRequest {
  const messages: ChatMessage[] = [
    ...previous.messages,
    { role: 'assistant', content: rawText },
    {
      role: 'user',
      content:
        'Your previous response did not contain a SQL query. ' +
        'Reply with a single SELECT statement and nothing else: no prose, no markdown fences, no comments.',
    },
  ];
  return { ...previous, messages, attempt: previous.attempt + 1 };
}
