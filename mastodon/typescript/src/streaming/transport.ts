/**
 * Streaming transport: a long-lived response read line by line.
 */

import { StreamError, StreamErrorKind, parseApiError } from '../errors/index.js';
import { headersToRecord, toNetworkError } from '../transport/index.js';

export interface StreamRequest {
  url: string;
  headers: Record<string, string>;
}

/**
 * One open stream. Owned by a single reader.
 */
export interface StreamConnection {
  /**
   * Next line without its terminator, or `undefined` at end of stream.
   * @throws StreamError (Cancelled) once the connection was closed locally
   */
  readLine(): Promise<string | undefined>;
  /** Releases the connection. Safe to call more than once. */
  close(): void;
}

export interface StreamTransport {
  /**
   * Opens a stream.
   * @throws NetworkError when the server cannot be reached, or the
   * classified API error for a non-2xx status
   */
  connect(request: StreamRequest): Promise<StreamConnection>;
}

/**
 * Splits decoded chunks into lines.
 */
export class LineBuffer {
  private buffer = '';

  /** Appends a chunk and returns the lines it completed. */
  append(chunk: string): string[] {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';
    return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  }

  /** Remaining partial line, cleared. */
  drain(): string | undefined {
    const rest = this.buffer;
    this.buffer = '';
    return rest === '' ? undefined : rest;
  }
}

class FetchStreamConnection implements StreamConnection {
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;
  private readonly controller: AbortController;
  private readonly decoder = new TextDecoder();
  private readonly lines = new LineBuffer();
  private readonly queued: string[] = [];
  private closed = false;
  private ended = false;

  constructor(reader: ReadableStreamDefaultReader<Uint8Array>, controller: AbortController) {
    this.reader = reader;
    this.controller = controller;
  }

  async readLine(): Promise<string | undefined> {
    while (this.queued.length === 0) {
      if (this.closed) {
        throw StreamError.cancelled();
      }
      if (this.ended) {
        return undefined;
      }

      let chunk: ReadableStreamReadResult<Uint8Array>;
      try {
        chunk = await this.reader.read();
      } catch (error) {
        if (this.closed) {
          throw StreamError.cancelled();
        }
        throw new StreamError(StreamErrorKind.Closed, 'Stream connection dropped', error);
      }

      if (chunk.done) {
        this.ended = true;
        const rest = this.lines.drain();
        if (rest !== undefined) {
          this.queued.push(rest);
        }
      } else {
        this.queued.push(...this.lines.append(this.decoder.decode(chunk.value, { stream: true })));
      }
    }
    return this.queued.shift();
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.controller.abort();
  }
}

/**
 * Stream transport on the global `fetch`, reading a server-sent event body.
 */
export class FetchStreamTransport implements StreamTransport {
  private readonly fetchImpl: typeof fetch;

  constructor(fetchImpl: typeof fetch = fetch) {
    this.fetchImpl = fetchImpl;
  }

  async connect(request: StreamRequest): Promise<StreamConnection> {
    const controller = new AbortController();

    let response: Response;
    try {
      response = await this.fetchImpl(request.url, {
        method: 'GET',
        headers: { Accept: 'text/event-stream', ...request.headers },
        signal: controller.signal,
      });
    } catch (error) {
      throw toNetworkError(error);
    }

    if (!response.ok) {
      const body = await response.text();
      throw parseApiError(
        response.status,
        body,
        headersToRecord(response.headers),
        new URL(request.url).pathname
      );
    }
    if (!response.body) {
      throw StreamError.closed();
    }

    return new FetchStreamConnection(response.body.getReader(), controller);
  }
}
