import { vi, type Mock } from 'vitest';
import type { HttpTransport, HttpRequest, TransportOutcome } from '../transport/http-transport.js';

export interface MockHttpTransport extends HttpTransport {
  send: Mock<(request: HttpRequest) => Promise<TransportOutcome>>;
}

export function createMockHttpTransport(): MockHttpTransport {
  return {
    send: vi.fn<(request: HttpRequest) => Promise<TransportOutcome>>(),
  };
}

/**
 * Queues a JSON response; `body` is encoded unless it is already a string
 */
export function mockHttpTransportResponse(
  transport: MockHttpTransport,
  status: number,
  body?: unknown
): void {
  const text = body === undefined ? '' : typeof body === 'string' ? body : JSON.stringify(body);
  transport.send.mockResolvedValueOnce({ kind: 'response', status, body: text });
}

export function mockHttpTransportFailure(
  transport: MockHttpTransport,
  message: string,
  timedOut = false
): void {
  transport.send.mockResolvedValueOnce({ kind: 'failure', message, timedOut });
}

/**
 * Request handed to the transport on the given call
 */
export function sentRequest(transport: MockHttpTransport, call = 0): HttpRequest {
  const args = transport.send.mock.calls[call];
  if (!args) {
    throw new Error(`transport.send was not called ${call + 1} time(s)`);
  }
  return args[0];
}
