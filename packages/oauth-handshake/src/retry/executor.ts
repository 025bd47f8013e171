/**
 * Retry executor with exponential backoff and additive jitter.
 *
 * Outcome rules per attempt:
 * - 2xx: decode the body and return it; a decode failure is final
 * - 4xx: return a client error at once
 * - any other status, or a transport failure: transient, retried while attempts remain
 *
 * @packageDocumentation
 */

import { setTimeout as sleepFor } from 'node:timers/promises';
import { err, ok, type Result } from 'neverthrow';
import {
  createCancelledError,
  createClientError,
  createRetriesExhaustedError,
  createTransportError,
} from '../errors/errors.js';
import type { ExchangeError } from '../errors/types.js';
import type { HttpError, HttpResponse } from '../http/types.js';
import { noopLogger } from '../logging/logger.js';
import type {
  ExchangeSuccess,
  ExecuteOptions,
  RequestBuilder,
  ResponseDecoder,
  RetryExecutor,
  RetryExecutorDeps,
  RetryPolicy,
  StatusClass,
} from './types.js';

/**
 * Classifies a response status.
 *
 * @example
 * ```typescript
 * classifyStatus(201); // 'success'
 * classifyStatus(404); // 'client_error'
 * classifyStatus(302); // 'transient'
 * ```
 */
export const classifyStatus = (status: number): StatusClass => {
  if (status >= 200 && status < 300) return 'success';
  if (status >= 400 && status < 500) return 'client_error';
  return 'transient';
};

/**
 * Longest delay a Node timer accepts; larger values fire after 1 ms.
 */
export const MAX_BACKOFF_MS = 2_147_483_647;

/**
 * Delay before the attempt after `attempt` (0-indexed):
 * `2^attempt * baseDelayMs + random() * baseDelayMs`, capped at {@link MAX_BACKOFF_MS}.
 *
 * Below the cap the result lies in `[2^attempt * base, 2^attempt * base + base)`.
 */
export const computeBackoffMs = (
  attempt: number,
  baseDelayMs: number,
  random: () => number = Math.random
): number => Math.min(MAX_BACKOFF_MS, 2 ** attempt * baseDelayMs + random() * baseDelayMs);

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await sleepFor(ms, undefined, signal !== undefined ? { signal } : {});
};

/**
 * Last transient outcome, kept to build the terminal error.
 */
type TransientOutcome =
  | { readonly kind: 'response'; readonly response: HttpResponse }
  | { readonly kind: 'transport'; readonly error: HttpError };

/**
 * Creates a retry executor.
 *
 * @param policy - Attempt budget, backoff unit and per-attempt timeout
 * @param deps - Transport and optional logger, sleep and random source
 * @returns RetryExecutor instance
 *
 * @example
 * ```typescript
 * const executor = createRetryExecutor(
 *   { maxAttempts: 3, baseDelayMs: 100, timeoutMs: 10_000 },
 *   { transport: createFetchTransport() }
 * );
 *
 * const result = await executor.execute(
 *   () => ({ url: 'https://api.example.com/oauth/request_token', method: 'POST' }),
 *   (response) => ok(response.body)
 * );
 * ```
 */
export const createRetryExecutor = (
  policy: RetryPolicy,
  deps: RetryExecutorDeps
): RetryExecutor => {
  const maxAttempts = Number.isFinite(policy.maxAttempts)
    ? Math.max(1, Math.floor(policy.maxAttempts))
    : 1;
  const { transport, logger = noopLogger, sleep = defaultSleep, random = Math.random } = deps;

  const execute = async <T>(
    build: RequestBuilder,
    decode: ResponseDecoder<T>,
    options: ExecuteOptions = {}
  ): Promise<Result<ExchangeSuccess<T>, ExchangeError>> => {
    const { signal } = options;
    let lastTransient: TransientOutcome | undefined;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      if (signal?.aborted === true) {
        return err(createCancelledError(attempt, signal.reason));
      }

      const request = build(attempt);
      const attemptLogger = logger.child({ attempt: attempt + 1, method: request.method, url: request.url });
      attemptLogger.debug('Sending request');

      const sent = await transport.send(
        request,
        signal !== undefined ? { timeoutMs: policy.timeoutMs, signal } : { timeoutMs: policy.timeoutMs }
      );

      if (sent.isErr()) {
        if (sent.error.type === 'aborted') {
          attemptLogger.info('Request aborted by caller');
          return err(createCancelledError(attempt + 1, sent.error.cause));
        }
        attemptLogger.warn('Transport failure', { reason: sent.error.type });
        lastTransient = { kind: 'transport', error: sent.error };
      } else {
        const response = sent.value;
        const statusClass = classifyStatus(response.status);

        if (statusClass === 'success') {
          const decoded = decode(response);
          if (decoded.isErr()) {
            attemptLogger.error('Malformed response', { status: response.status });
            return err(decoded.error);
          }
          attemptLogger.debug('Request succeeded', { status: response.status });
          return ok({
            value: decoded.value,
            status: response.status,
            headers: response.headers,
            attempts: attempt + 1,
          });
        }

        if (statusClass === 'client_error') {
          attemptLogger.warn('Request rejected', { status: response.status });
          return err(createClientError(response.body, response.status, response.headers));
        }

        attemptLogger.warn('Transient response', { status: response.status });
        lastTransient = { kind: 'response', response };
      }

      if (attempt + 1 < maxAttempts) {
        const delayMs = computeBackoffMs(attempt, policy.baseDelayMs, random);
        attemptLogger.debug('Backing off', { delayMs: Math.round(delayMs) });
        try {
          await sleep(delayMs, signal);
        } catch (error) {
          attemptLogger.info('Backoff cancelled');
          return err(createCancelledError(attempt + 1, error));
        }
      }
    }

    if (lastTransient === undefined || lastTransient.kind === 'transport') {
      const error = lastTransient?.error;
      logger.error('Giving up after transport failure', { attempts: maxAttempts });
      return err(
        createTransportError(
          error?.message ?? 'Transport failure',
          maxAttempts,
          error?.type === 'timeout',
          error?.cause
        )
      );
    }

    const { response } = lastTransient;
    logger.error('Retries exhausted', { attempts: maxAttempts, status: response.status });
    return err(
      createRetriesExhaustedError(response.body, response.status, response.headers, maxAttempts)
    );
  };

  return {
    policy: { ...policy, maxAttempts },
    execute,
  };
};
