export {
  type HttpRequest,
  type HttpTransport,
  type TransportOutcome,
  FetchHttpTransport,
  createHttpTransport,
} from './http-transport.js';
export {
  type ApiRequest,
  type RequestExecutorOptions,
  RequestExecutor,
  decodeBody,
} from './executor.js';
