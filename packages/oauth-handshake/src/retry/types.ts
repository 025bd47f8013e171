import type { Result } from 'neverthrow';
import type { ExchangeError, MalformedResponseError, ResponseHeaders } from '../errors/types.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../http/types.js';
import type { Logger } from '../logging/logger.js';

/**
 * Attempt budget and timing.
 */
export interface RetryPolicy {
  /** Total attempts, at least 1 */
  readonly maxAttempts: number;
  /** Backoff unit in milliseconds */
  readonly baseDelayMs: number;
  /** Bound on each individual send, in milliseconds */
  readonly timeoutMs: number;
}

/**
 * Collaborators of the executor. `sleep` and `random` are replaceable for tests.
 */
export interface RetryExecutorDeps {
  readonly transport: HttpTransport;
  readonly logger?: Logger | undefined;
  /** Resolves after `ms`; rejects when `signal` aborts first */
  readonly sleep?: ((ms: number, signal?: AbortSignal) => Promise<void>) | undefined;
  /** Uniform random number in [0, 1) */
  readonly random?: (() => number) | undefined;
}

/**
 * Builds the request for a 0-indexed attempt. Called once per attempt; must not
 * mutate shared state.
 */
export type RequestBuilder = (attempt: number) => HttpRequest;

/**
 * Turns a 2xx response into the caller's value.
 */
export type ResponseDecoder<T> = (response: HttpResponse) => Result<T, MalformedResponseError>;

/**
 * Classification of one attempt's response status.
 */
export type StatusClass = 'success' | 'client_error' | 'transient';

/**
 * Decoded value with the final response's status and headers.
 */
export interface ExchangeSuccess<T> {
  readonly value: T;
  readonly status: number;
  readonly headers: ResponseHeaders;
  /** Attempts used, including the successful one */
  readonly attempts: number;
}

/**
 * Options for one `execute` call.
 */
export interface ExecuteOptions {
  /** Cancels the in-flight attempt and any pending backoff */
  readonly signal?: AbortSignal | undefined;
}

/**
 * Executor for request/response exchanges with bounded retries.
 */
export interface RetryExecutor {
  readonly policy: RetryPolicy;
  /**
   * Runs the exchange until success, a non-retryable outcome or the attempt budget runs out.
   *
   * @param build - Request builder, re-invoked for every attempt
   * @param decode - Decoder for the successful body
   * @returns Result with the decoded value, or the terminal error
   */
  readonly execute: <T>(
    build: RequestBuilder,
    decode: ResponseDecoder<T>,
    options?: ExecuteOptions
  ) => Promise<Result<ExchangeSuccess<T>, ExchangeError>>;
}
