/**
 * High-level "ask" orchestration.
 * Ties together prompt composition, generation, validation, execution and
 * chart selection for one question.
 */

import { select, type ChartSpec } from './chart/select.js';
import { SAFE_DEFAULTS } from './db/defaults.js';
import type { QueryStore } from './db/execute.js';
import type { ExecuteLimits, QueryResult, SchemaDescriptor } from './db/types.js';
import { GenerationEmptyError, PipelineCancelledError, isQueryGateError, type ErrorCode } from './errors.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import type { QueryGenerator } from './llm/generator.js';
import { compose, type ComposeOptions } from './llm/prompt.js';
import type { CandidateQuery, HistoryTurn } from './llm/types.js';
import { validate } from './policy/engine.js';
import { screenQuestion } from './policy/intent.js';
import type { ReasonCode, ValidationPolicy, ValidationVerdict } from './policy/types.js';

export interface AskInput {
  question: string;
  /** Earlier turns of the same session, newest last */
  history?: readonly HistoryTurn[];
  /** Stop after validation when false. Default: true */
  execute?: boolean;
  limits?: Partial<ExecuteLimits>;
}

export interface AskDeps {
  schema: SchemaDescriptor;
  generator: QueryGenerator;
  store: QueryStore;
  policy?: Partial<ValidationPolicy>;
  compose?: Omit<ComposeOptions, 'history'>;
  chartRowThreshold?: number;
  /** Reject questions that ask to change data before calling the oracle */
  screenIntent?: boolean;
  logger?: Logger;
  signal?: AbortSignal;
}

export type AskStatus = 'ok' | 'rejected' | 'error' | 'dry-run';

export type OutcomeCode = ErrorCode | Exclude<ReasonCode, 'Admitted'> | 'WriteIntent';

export interface AskOutcome {
  question: string;
  /** The extracted statement; null when none was found or generation failed */
  generatedSql: string | null;
  candidate: CandidateQuery | null;
  verdict: ValidationVerdict | null;
  result: QueryResult | null;
  chart: ChartSpec | null;
  error: { code: OutcomeCode; message: string } | null;
  status: AskStatus;
  model: string;
  attempts: number;
}

/**
 * Answer one question. Pipeline failures never throw: they come back as
 * an outcome with status 'rejected' or 'error'. Programming errors (bad
 * options, RangeError) still propagate.
 */
export async function ask(input: AskInput, deps: AskDeps): Promise<AskOutcome> {
  const log = deps.logger ?? defaultLogger;
  const outcome: AskOutcome = {
    question: input.question,
    generatedSql: null,
    candidate: null,
    verdict: null,
    result: null,
    chart: null,
    error: null,
    status: 'ok',
    model: deps.generator.model,
    attempts: 0,
  };

  // 1. Optional intent screen
  if (deps.screenIntent) {
    const verb = screenQuestion(input.question);
    if (verb !== null) {
      log.warn({ stage: 'screen', verb }, 'question rejected before generation');
      return {
        ...outcome,
        status: 'rejected',
        error: {
          code: 'WriteIntent',
          message: `The question asks to ${verb} data. Only read-only questions can be answered.`,
        },
      };
    }
  }

  try {
    // 2. Compose
    const request = compose(input.question, deps.schema, { ...deps.compose, history: input.history });
    log.debug({ stage: 'compose', messages: request.messages.length }, 'prompt composed');

    // 3. Generate
    const candidate = await deps.generator.generate(request, deps.signal);
    outcome.candidate = candidate;
    outcome.attempts = candidate.attempts;
    outcome.generatedSql = candidate.extractedSql;

    // 4. Validate
    const verdict = validate(candidate, deps.policy);
    outcome.verdict = verdict;

    if (candidate.refused) {
      log.warn({ stage: 'generate', attempts: candidate.attempts }, 'question rejected by the model');
      return {
        ...outcome,
        status: 'rejected',
        error: {
          code: 'WriteIntent',
          message: 'The model declined a request to change data. Only read-only questions can be answered.',
        },
      };
    }

    const sql = candidate.extractedSql;
    if (sql === null) {
      const empty = new GenerationEmptyError(candidate.attempts);
      log.warn({ stage: 'validate', reasonCode: verdict.reasonCode }, empty.message);
      return { ...outcome, status: 'error', error: { code: empty.code, message: empty.message } };
    }

    log.debug({ stage: 'validate', reasonCode: verdict.reasonCode, sql }, 'candidate validated');
    if (!verdict.admitted) {
      log.warn(
        { stage: 'validate', reasonCode: verdict.reasonCode, matchedPattern: verdict.matchedPattern },
        'candidate rejected',
      );
      return {
        ...outcome,
        status: 'rejected',
        error: { code: verdict.reasonCode, message: verdict.message },
      };
    }

    if (input.execute === false) {
      return { ...outcome, status: 'dry-run' };
    }
    if (deps.signal?.aborted) {
      throw new PipelineCancelledError('validation');
    }

    // 5. Execute
    const result = await deps.store.execute(
      sql,
      {
        maxRows: input.limits?.maxRows ?? SAFE_DEFAULTS.maxRows,
        timeoutMs: input.limits?.timeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs,
      },
      deps.signal,
    );
    log.debug(
      { stage: 'execute', rowCount: result.rowCount, truncated: result.truncated, execMs: result.execMs },
      'query executed',
    );

    // 6. Chart
    const chart = select(result, { displayThreshold: deps.chartRowThreshold });
    log.debug({ stage: 'chart', kind: chart.kind }, 'chart selected');

    return { ...outcome, result, chart, status: 'ok' };
  } catch (err: unknown) {
    if (!isQueryGateError(err)) throw err;
    log.error({ err, code: err.code }, 'question failed');
    return { ...outcome, status: 'error', error: { code: err.code, message: err.message } };
  }
}
