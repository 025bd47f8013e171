import type { Result } from 'neverthrow';

/**
 * HTTP methods used by the token endpoints.
 */
export type HttpMethod = 'GET' | 'POST';

/**
 * Description of one request. Built fresh for each attempt and consumed once.
 */
export interface HttpRequest {
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
}

/**
 * Response with the raw text body. Any status is a response, not an error.
 */
export interface HttpResponse {
  readonly status: number;
  readonly statusText: string;
  /** Lowercase header names */
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
}

/**
 * Failure below HTTP: no response was received.
 */
export interface HttpError {
  readonly type: 'network' | 'timeout' | 'aborted';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Per-send options.
 */
export interface SendOptions {
  /** Bound on this single send, in milliseconds */
  readonly timeoutMs?: number;
  /** Caller cancellation */
  readonly signal?: AbortSignal;
}

/**
 * Transport collaborator. Abstraction over fetch for dependency injection and testing.
 */
export interface HttpTransport {
  /**
   * Sends a request.
   * @returns Result with the response (whatever its status) or a transport error
   */
  readonly send: (request: HttpRequest, options?: SendOptions) => Promise<Result<HttpResponse, HttpError>>;
}

/**
 * Options for creating the fetch transport.
 */
export interface FetchTransportOptions {
  /** Default per-send timeout in milliseconds (default: 10000) */
  readonly timeoutMs?: number;
  /** Headers added to every request */
  readonly baseHeaders?: Readonly<Record<string, string>>;
}
