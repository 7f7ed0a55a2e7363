/**
 * HTTP transport layer.
 *
 * The executor talks to the network only through `HttpTransport.send`, so
 * tests and alternative stacks can swap the transport without touching
 * request building or response handling.
 */

import type { HttpMethod } from '../endpoints/definitions.js';
import { NetworkError } from '../errors/index.js';

/**
 * Outgoing request as handed to a transport.
 */
export interface HttpRequest {
  method: HttpMethod;
  /** Absolute URL including the query string */
  url: string;
  headers: Record<string, string>;
  body?: string | FormData;
  /** Abort the request after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Raw response. Header names are lower-cased.
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface HttpTransport {
  /**
   * Sends one request.
   * @throws NetworkError when no response was received
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Copies fetch headers into a plain record with lower-cased names.
 */
export function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key.toLowerCase()] = value;
  });
  return record;
}

/**
 * Maps a fetch failure onto NetworkError.
 */
export function toNetworkError(error: unknown): NetworkError {
  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new NetworkError('Request timeout', error);
    }
    return new NetworkError(error.message, error);
  }
  return new NetworkError('Unknown network error', error);
}

/**
 * Transport on the global `fetch`.
 */
export class FetchTransport implements HttpTransport {
  private readonly fetchImpl: typeof fetch;

  constructor(fetchImpl: typeof fetch = fetch) {
    this.fetchImpl = fetchImpl;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const init: RequestInit = {
      method: request.method,
      headers: request.headers,
      body: request.body,
    };
    if (request.timeoutMs !== undefined) {
      init.signal = AbortSignal.timeout(request.timeoutMs);
    }

    let response: Response;
    let body: string;
    try {
      response = await this.fetchImpl(request.url, init);
      body = await response.text();
    } catch (error) {
      throw toNetworkError(error);
    }

    return {
      status: response.status,
      headers: headersToRecord(response.headers),
      body,
    };
  }
}
