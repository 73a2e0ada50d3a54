import {
  OracleTimeoutError,
  OracleUnavailableError,
  PipelineCancelledError,
  errorMessage,
  isQueryGateError,
} from '../errors.js';
import type { Oracle, OracleRequest } from './types.js';

function toOracleError(err: unknown): Error {
  if (isQueryGateError(err)) return err;
  return new OracleUnavailableError(`Oracle request failed: ${errorMessage(err)}`, { cause: err });
}

/**
 * One oracle call with a hard deadline. Rejects with OracleTimeoutError
 * when the deadline passes and with PipelineCancelledError when the
 * caller aborts; a reply that arrives after either is discarded.
 */
export function completeBounded(
  oracle: Oracle,
  req: OracleRequest,
  timeoutMs: number,
  signal?: AbortSignal,
  stage = 'generation',
): Promise<string> {
  if (signal?.aborted) {
    return Promise.reject(new PipelineCancelledError(stage));
  }

  const controller = new AbortController();

  return new Promise<string>((resolve, reject) => {
    const onAbort = (): void => {
      cleanup();
      controller.abort();
      reject(new PipelineCancelledError(stage));
    };
    const timer = setTimeout(() => {
      cleanup();
      controller.abort();
      reject(new OracleTimeoutError(timeoutMs));
    }, timeoutMs);
    const cleanup = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    oracle.complete(req, controller.signal).then(
      (response) => {
        cleanup();
        resolve(response.text);
      },
      (err: unknown) => {
        cleanup();
        reject(toOracleError(err));
      },
    );
  });
}
