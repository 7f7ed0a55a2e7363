/**
 * In-process stand-ins for the HTTP and streaming transports.
 */

import type { HttpMethod } from '../endpoints/definitions.js';
import { NetworkError, StreamError } from '../errors/index.js';
import type { StreamConnection, StreamRequest, StreamTransport } from '../streaming/transport.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport/index.js';

/**
 * Mock response configuration. `json` is serialized; `text` is sent as is.
 */
export interface MockResponse {
  status?: number;
  headers?: Record<string, string>;
  json?: unknown;
  text?: string;
}

/**
 * Mock request matcher. A string URL matches by substring.
 */
export interface MockMatcher {
  url?: string | RegExp;
  method?: HttpMethod;
}

type MockOutcome = MockResponse | { error: unknown };

interface MockEntry {
  matcher: MockMatcher;
  outcome: MockOutcome;
  once: boolean;
}

function toResponse(response: MockResponse): HttpResponse {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(response.headers ?? {})) {
    headers[key.toLowerCase()] = value;
  }
  const body = response.text ?? (response.json === undefined ? '' : JSON.stringify(response.json));
  return { status: response.status ?? 200, headers, body };
}

/**
 * Mock HTTP transport for testing.
 *
 * One-shot mocks are matched first, in the order they were added; permanent
 * mocks after them.
 */
export class MockHttpTransport implements HttpTransport {
  private mocks: MockEntry[] = [];
  private calls: HttpRequest[] = [];
  private defaultResponse: MockResponse = { status: 200, json: {} };

  /**
   * Add a mock response used for every matching request.
   */
  mock(matcher: MockMatcher | string, response: MockResponse): this {
    this.mocks.push({ matcher: normalize(matcher), outcome: response, once: false });
    return this;
  }

  /**
   * Add a mock response used for the next matching request only.
   */
  mockOnce(matcher: MockMatcher | string, response: MockResponse): this {
    this.mocks.push({ matcher: normalize(matcher), outcome: response, once: true });
    return this;
  }

  /**
   * Make the next matching request fail with `error`.
   */
  failOnce(matcher: MockMatcher | string, error: unknown): this {
    this.mocks.push({ matcher: normalize(matcher), outcome: { error }, once: true });
    return this;
  }

  setDefaultResponse(response: MockResponse): this {
    this.defaultResponse = response;
    return this;
  }

  getCalls(): HttpRequest[] {
    return this.calls;
  }

  getCallsTo(url: string | RegExp): HttpRequest[] {
    return this.calls.filter((call) => matchesUrl(url, call.url));
  }

  lastCall(): HttpRequest | undefined {
    return this.calls[this.calls.length - 1];
  }

  reset(): this {
    this.mocks = [];
    this.calls = [];
    return this;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.calls.push(request);

    const entry = this.findMock(request);
    if (entry?.once) {
      this.mocks.splice(this.mocks.indexOf(entry), 1);
    }

    const outcome = entry?.outcome ?? this.defaultResponse;
    if ('error' in outcome) {
      throw outcome.error;
    }
    return toResponse(outcome);
  }

  private findMock(request: HttpRequest): MockEntry | undefined {
    const matching = this.mocks.filter(({ matcher }) => {
      if (matcher.url !== undefined && !matchesUrl(matcher.url, request.url)) {
        return false;
      }
      return !matcher.method || matcher.method === request.method;
    });
    return matching.find((entry) => entry.once) ?? matching[0];
  }
}

function normalize(matcher: MockMatcher | string): MockMatcher {
  return typeof matcher === 'string' ? { url: matcher } : matcher;
}

function matchesUrl(pattern: string | RegExp, url: string): boolean {
  return typeof pattern === 'string' ? url.includes(pattern) : pattern.test(url);
}

/**
 * Lines of one server-sent event.
 */
export function sseLines(event: string, data?: string): string[] {
  const lines = [`event: ${event}`];
  if (data !== undefined) {
    lines.push(...data.split('\n').map((line) => `data: ${line}`));
  }
  lines.push('');
  return lines;
}

/**
 * Stream connection fed by the test. Reads wait until a line is pushed,
 * the connection is ended or failed, or it is closed.
 */
export class ScriptedConnection implements StreamConnection {
  private readonly lines: string[];
  private ended = false;
  private failure?: { error: unknown };
  private isClosed = false;
  private waiter?: () => void;

  constructor(lines: string[] = []) {
    this.lines = [...lines];
  }

  get closed(): boolean {
    return this.isClosed;
  }

  push(...lines: string[]): this {
    this.lines.push(...lines);
    this.wake();
    return this;
  }

  /** Ends the stream after the queued lines. */
  end(): this {
    this.ended = true;
    this.wake();
    return this;
  }

  /** Drops the connection after the queued lines. */
  fail(error: unknown): this {
    this.failure = { error };
    this.wake();
    return this;
  }

  async readLine(): Promise<string | undefined> {
    for (;;) {
      if (this.isClosed) {
        throw StreamError.cancelled();
      }
      const line = this.lines.shift();
      if (line !== undefined) {
        return line;
      }
      if (this.failure) {
        throw this.failure.error;
      }
      if (this.ended) {
        return undefined;
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  close(): void {
    this.isClosed = true;
    this.wake();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.();
  }
}

/**
 * Stream transport handing out scripted connections in order.
 */
export class ScriptedStreamTransport implements StreamTransport {
  private readonly outcomes: Array<ScriptedConnection | { error: unknown }> = [];
  private readonly requests: StreamRequest[] = [];

  /**
   * Queues a connection that starts with `lines`.
   */
  connection(lines: string[] = []): ScriptedConnection {
    const connection = new ScriptedConnection(lines);
    this.outcomes.push(connection);
    return connection;
  }

  /**
   * Makes the next connection attempt fail.
   */
  failNext(error: unknown): this {
    this.outcomes.push({ error });
    return this;
  }

  getRequests(): StreamRequest[] {
    return this.requests;
  }

  async connect(request: StreamRequest): Promise<StreamConnection> {
    this.requests.push(request);
    const next = this.outcomes.shift();
    if (!next) {
      throw new NetworkError('No scripted connection left');
    }
    if (next instanceof ScriptedConnection) {
      return next;
    }
    throw next.error;
  }
}
