import type { HttpMethod } from '../types/common.js';

/**
 * A fully built HTTP request
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  /**
   * Already-encoded JSON body
   */
  body?: string;
  /**
   * Request timeout in milliseconds
   */
  timeoutMs: number;
}

/**
 * What the transport observed: either an HTTP response (any status) or a
 * failure before one arrived. Classification is left to the executor.
 */
export type TransportOutcome =
  | { kind: 'response'; status: number; body: string }
  | { kind: 'failure'; message: string; timedOut: boolean; cause?: unknown };

/**
 * Interface for HTTP transport layer
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<TransportOutcome>;
}

/** setTimeout fires after 1 ms for anything longer */
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Implementation of HttpTransport using the Fetch API
 */
export class FetchHttpTransport implements HttpTransport {
  constructor(private readonly fetchImpl: typeof fetch = globalThis.fetch) {}

  async send(request: HttpRequest): Promise<TransportOutcome> {
    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      Math.min(request.timeoutMs, MAX_TIMER_DELAY_MS)
    );

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });
      const body = await response.text();
      return { kind: 'response', status: response.status, body };
    } catch (error) {
      if (error instanceof Error) {
        return {
          kind: 'failure',
          message: describeFailure(error),
          timedOut: controller.signal.aborted || error.name === 'AbortError' || error.name === 'TimeoutError',
          cause: error,
        };
      }
      return { kind: 'failure', message: String(error), timedOut: false, cause: error };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Node's fetch reports "fetch failed" and keeps the useful part (ECONNREFUSED,
 * ENOTFOUND, certificate errors) on `cause`
 */
function describeFailure(error: Error): string {
  if (error.cause instanceof Error && error.cause.message) {
    return error.message ? `${error.message}: ${error.cause.message}` : error.cause.message;
  }
  return error.message;
}

/**
 * Creates an HTTP transport instance
 */
export function createHttpTransport(fetchImpl?: typeof fetch): HttpTransport {
  return new FetchHttpTransport(fetchImpl);
}
