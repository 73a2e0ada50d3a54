/**
 * LLM module barrel export.
 */

export type {
  CandidateQuery,
  ChatMessage,
  GenerationRequest,
  HistoryTurn,
  Oracle,
  OracleRequest,
  OracleResponse,
} from './types.js';
export { OpenAIOracle } from './openai.js';
export type { OpenAIOracleOptions } from './openai.js';
export { QueryGenerator } from './generator.js';
export type { GeneratorOptions } from './generator.js';
export { completeBounded } from './bounded.js';
export { extractStatement } from './extract.js';
export { renderSchema } from './schema.js';
export type { SchemaRenderOpts } from './schema.js';
export { compose, composeRetry, MAX_HISTORY_TURNS, READ_ONLY_REFUSAL, isReadOnlyRefusal } from './prompt.js';
export type { ComposeOptions } from './prompt.js';
export { composeInsights, generateInsights, MAX_INSIGHT_ROWS } from './insights.js';
export type { InsightOptions } from './insights.js';
