export type {
  RetryPolicy,
  RetryExecutorDeps,
  RequestBuilder,
  ResponseDecoder,
  StatusClass,
  ExchangeSuccess,
  ExecuteOptions,
  RetryExecutor,
} from './types.js';
export { MAX_BACKOFF_MS, classifyStatus, computeBackoffMs, createRetryExecutor } from './executor.js';
