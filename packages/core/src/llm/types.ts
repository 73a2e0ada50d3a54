/**
 * Generation-side types: the oracle contract, the composed request and
 * the candidate the generator hands to the validator.
 */

import type { SchemaDescriptor } from '../db/types.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface OracleRequest {
  messages: readonly ChatMessage[];
  temperature: number;
  maxTokens: number;
}

export interface OracleResponse {
  text: string;
}

/**
 * External text-generation service. Errors are transport failures;
 * the generator maps them to OracleUnavailable / OracleTimeout.
 */
export interface Oracle {
  readonly model: string;
  complete(req: OracleRequest, signal?: AbortSignal): Promise<OracleResponse>;
}

/** A previous question in the same session, given to the model as context */
export interface HistoryTurn {
  question: string;
  sql: string;
}

export interface GenerationRequest {
  readonly question: string;
  readonly schema: SchemaDescriptor;
  /** 0..1 */
  readonly temperature: number;
  readonly maxTokens: number;
  readonly messages: readonly ChatMessage[];
  /** 1 for the first prompt, incremented for each stricter retry prompt */
  readonly attempt: number;
}

export interface CandidateQuery {
  readonly rawText: string;
  /** null when no statement could be located in rawText */
  readonly extractedSql: string | null;
  /** Oracle calls spent producing this candidate */
  readonly attempts: number;
  /** The model answered with the read-only refusal instead of SQL */
  readonly refused: boolean;
}
