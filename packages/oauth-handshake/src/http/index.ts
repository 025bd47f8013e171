export { createFetchTransport } from './fetch-client.js';
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpError,
  SendOptions,
  HttpTransport,
  FetchTransportOptions,
} from './types.js';
