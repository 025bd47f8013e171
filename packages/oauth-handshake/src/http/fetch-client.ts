import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type {
  FetchTransportOptions,
  HttpError,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  SendOptions,
} from './types.js';

/** Default request timeout: 10 seconds */
const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Extracts headers from a fetch Response into a plain object.
 */
const extractHeaders = (headers: Headers): Record<string, string> => {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
};

/**
 * Creates an HTTP transport using the native fetch API.
 *
 * Redirects are not followed; a 3xx comes back as a response like any other status.
 *
 * @param options - Optional transport configuration
 * @returns An HttpTransport instance
 *
 * @example
 * ```typescript
 * const transport = createFetchTransport({ timeoutMs: 5000 });
 * const result = await transport.send({ url: 'https://api.example.com/oauth/request_token', method: 'POST' });
 *
 * if (result.isOk()) {
 *   console.log(result.value.status, result.value.body);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export const createFetchTransport = (options: FetchTransportOptions = {}): HttpTransport => {
  const { timeoutMs: defaultTimeoutMs = DEFAULT_TIMEOUT_MS, baseHeaders = {} } = options;

  const send = async (
    request: HttpRequest,
    sendOptions: SendOptions = {}
  ): Promise<Result<HttpResponse, HttpError>> => {
    const timeoutMs = sendOptions.timeoutMs ?? defaultTimeoutMs;
    const callerSignal = sendOptions.signal;

    if (callerSignal?.aborted === true) {
      return err({ type: 'aborted', message: 'Request was aborted', cause: callerSignal.reason });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = (): void => {
      controller.abort();
    };
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const fetchOptions: RequestInit = {
        method: request.method,
        headers: {
          ...baseHeaders,
          ...request.headers,
        },
        redirect: 'manual',
        signal: controller.signal,
      };

      // Only set body if provided (exactOptionalPropertyTypes compliance)
      if (request.body !== undefined) {
        fetchOptions.body = request.body;
      }

      const response = await fetch(request.url, fetchOptions);
      const body = await response.text();

      return ok({
        status: response.status,
        statusText: response.statusText,
        headers: extractHeaders(response.headers),
        body,
      });
    } catch (error) {
      if (timedOut) {
        return err({
          type: 'timeout',
          message: `Request timed out after ${String(timeoutMs)}ms`,
          cause: error,
        });
      }

      if (callerSignal?.aborted === true) {
        return err({ type: 'aborted', message: 'Request was aborted', cause: error });
      }

      return err({
        type: 'network',
        message: error instanceof Error ? error.message : 'Network error',
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  };

  return { send };
};
