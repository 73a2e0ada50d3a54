/**
 * Query generator: one bounded oracle call per attempt, deterministic
 * extraction, and an explicit capped retry when the reply holds no SQL.
 */

import { SAFE_DEFAULTS } from '../db/defaults.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import { completeBounded } from './bounded.js';
import { extractStatement } from './extract.js';
import { composeRetry, isReadOnlyRefusal } from './prompt.js';
import type { CandidateQuery, GenerationRequest, Oracle } from './types.js';

export interface GeneratorOptions {
  /** Bounded wait for each oracle call */
  timeoutMs?: number;
  /** Extra attempts after an empty extraction, capped at 2 */
  maxRetries?: number;
  logger?: Logger;
}

export class QueryGenerator {
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly oracle: Oracle;
  private readonly log: Logger;

  constructor(oracle: Oracle, opts: GeneratorOptions = {}) {
    this.oracle = oracle;
    this.timeoutMs = opts.timeoutMs ?? SAFE_DEFAULTS.oracleTimeoutMs;
    const retries = opts.maxRetries ?? SAFE_DEFAULTS.generationRetries;
    this.maxRetries = Math.min(Math.max(Math.trunc(retries), 0), SAFE_DEFAULTS.maxGenerationRetries);
    this.log = opts.logger ?? defaultLogger;
  }

  get model(): string {
    return this.oracle.model;
  }

  /**
   * Produce a candidate for the request. Transport errors and timeouts are
   * thrown and never retried; only an empty extraction earns a retry.
   * A read-only refusal ends generation at once.
   */
  async generate(req: GenerationRequest, signal?: AbortSignal): Promise<CandidateQuery> {
    let request = req;
    let rawText = '';
    let attempts = 0;

    while (attempts <= this.maxRetries) {
      rawText = await completeBounded(
        this.oracle,
        { messages: request.messages, temperature: request.temperature, maxTokens: request.maxTokens },
        this.timeoutMs,
        signal,
      );
      attempts += 1;

      const extractedSql = extractStatement(rawText);
      this.log.debug(
        { stage: 'generate', attempt: attempts, extracted: extractedSql !== null },
        'oracle reply received',
      );
      if (extractedSql !== null) {
        return Object.freeze({ rawText, extractedSql, attempts, refused: false });
      }
      if (isReadOnlyRefusal(rawText)) {
        this.log.warn({ stage: 'generate', attempt: attempts }, 'oracle refused a write request');
        return Object.freeze({ rawText, extractedSql: null, attempts, refused: true });
      }
      if (attempts <= this.maxRetries) {
        request = composeRetry(request, rawText);
      }
    }

    this.log.warn({ stage: 'generate', attempts }, 'no statement found in oracle output');
    return Object.freeze({ rawText, extractedSql: null, attempts, refused: false });
  }
}
