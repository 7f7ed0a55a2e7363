/**
 * Streaming event reader.
 *
 * State machine: `connecting -> open -> (reading <-> idle) -> closed`.
 * `nextEvent()` pulls one classified event per call. Unknown tags become
 * `unrecognized` events; a payload that does not decode fails that one call
 * with `StreamError(Malformed)` and the next call keeps reading.
 *
 * A reader has a single consumer. Independent readers share nothing.
 */

import type { Generation } from '../capabilities/generations.js';
import { resolveActiveFlags } from '../capabilities/matrix.js';
import type { EntityModel } from '../entities/model.js';
import {
  MalformedResponseError,
  StreamError,
  StreamErrorKind,
  isMastodonError,
} from '../errors/index.js';
import {
  Logger,
  MetricNames,
  MetricsCollector,
  ObservabilityOptions,
  resolveObservability,
} from '../observability/index.js';
import { STREAM_EVENTS, StreamEventDefinition } from './definitions.js';
import { FrameParser, RawFrame } from './frames.js';
import type { StreamConnection } from './transport.js';
import type { StreamingEvent } from './types.js';

export type ReaderState = 'connecting' | 'open' | 'reading' | 'idle' | 'closed';

export interface NextEventOptions {
  /** Give up waiting after this many milliseconds with StreamError(Timeout) */
  timeoutMs?: number;
}

export interface EventReaderOptions<G extends Generation>
  extends Omit<ObservabilityOptions, 'tracer'> {
  entities: EntityModel<G>;
  /** Opens the underlying connection */
  connect: () => Promise<StreamConnection>;
  /** Label used in logs and metrics */
  timeline: string;
}

interface Deadline {
  readonly at: number;
  readonly timeoutMs: number;
}

type LineResult =
  | { readonly ok: true; readonly line: string | undefined }
  | { readonly ok: false; readonly error: unknown };

function isStreamEventTag(value: string): value is keyof typeof STREAM_EVENTS {
  return Object.prototype.hasOwnProperty.call(STREAM_EVENTS, value);
}

export class EventReader<G extends Generation> implements AsyncIterable<StreamingEvent<G>> {
  readonly generation: G;
  private readonly entities: EntityModel<G>;
  private readonly activeFlags: ReadonlySet<string>;
  private readonly openConnection: () => Promise<StreamConnection>;
  readonly timeline: string;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly parser = new FrameParser();
  private connection?: StreamConnection;
  private pending?: Promise<LineResult>;
  private cancelWait?: (error: StreamError) => void;
  private currentState: ReaderState = 'connecting';

  constructor(options: EventReaderOptions<G>) {
    this.entities = options.entities;
    this.generation = options.entities.generation;
    this.activeFlags = resolveActiveFlags(this.generation);
    this.openConnection = options.connect;
    this.timeline = options.timeline;
    const { logger, metrics } = resolveObservability(options);
    this.logger = logger.child({ timeline: options.timeline });
    this.metrics = metrics;
  }

  get state(): ReaderState {
    return this.currentState;
  }

  /**
   * Opens the connection. Called once, before the first read. `close()`
   * while the transport is still connecting rejects with
   * StreamError(Cancelled) and closes the connection once it arrives.
   */
  async connect(): Promise<void> {
    if (this.currentState !== 'connecting') {
      return;
    }
    const opening = this.openConnection();
    const cancelled = new Promise<never>((_, reject) => {
      this.cancelWait = reject;
    });

    let connection: StreamConnection;
    try {
      connection = await Promise.race([opening, cancelled]);
    } catch (error) {
      if (this.state === 'closed') {
        void opening.then(
          (late) => late.close(),
          () => undefined
        );
      }
      throw error;
    } finally {
      this.cancelWait = undefined;
    }

    if (this.state === 'closed') {
      connection.close();
      throw StreamError.cancelled();
    }
    this.connection = connection;
    this.currentState = 'open';
    this.logger.info('Stream opened');
  }

  /**
   * Waits for the next event.
   *
   * @throws StreamError Closed at end of stream, Cancelled after `close()`,
   * Timeout when `timeoutMs` elapsed, Malformed for an undecodable frame
   */
  nextEvent(options?: NextEventOptions): Promise<StreamingEvent<G>>;
  async nextEvent(options: NextEventOptions = {}): Promise<unknown> {
    // One budget for the whole call; heartbeats do not extend it.
    const deadline =
      options.timeoutMs === undefined
        ? undefined
        : { at: Date.now() + options.timeoutMs, timeoutMs: options.timeoutMs };

    if (this.currentState === 'connecting') {
      await this.connect();
    }

    for (;;) {
      const connection = this.connection;
      if (this.currentState === 'closed' || !connection) {
        throw StreamError.closed();
      }

      this.currentState = 'reading';
      const line = await this.readLine(connection, deadline);
      if (line === undefined) {
        this.logger.info('Stream ended by server');
        this.release();
        throw StreamError.closed();
      }

      let frame: RawFrame | undefined;
      try {
        frame = this.parser.push(line);
      } catch (error) {
        this.currentState = 'idle';
        throw this.reportMalformed(error);
      }
      if (!frame) {
        continue;
      }

      this.currentState = 'idle';
      try {
        return this.classify(frame);
      } catch (error) {
        throw this.reportMalformed(error);
      }
    }
  }

  /**
   * Releases the connection. A pending `nextEvent()` rejects with
   * StreamError(Cancelled).
   */
  close(): void {
    if (this.currentState === 'closed') {
      return;
    }
    this.release();
    this.cancelWait?.(StreamError.cancelled());
    this.logger.info('Stream closed by client');
  }

  /**
   * Iterates events until the stream closes. Malformed frames are logged
   * and skipped.
   */
  async *[Symbol.asyncIterator](): AsyncIterator<StreamingEvent<G>> {
    for (;;) {
      try {
        yield await this.nextEvent();
      } catch (error) {
        if (error instanceof StreamError) {
          if (error.kind === StreamErrorKind.Malformed) {
            continue;
          }
          if (error.kind === StreamErrorKind.Closed || error.kind === StreamErrorKind.Cancelled) {
            return;
          }
        }
        throw error;
      }
    }
  }

  private release(): void {
    this.currentState = 'closed';
    this.connection?.close();
    this.connection = undefined;
    this.pending = undefined;
    this.parser.reset();
  }

  /**
   * Reads one line, racing the connection against the deadline and
   * `close()`. A timed-out read stays pending and is picked up next call.
   */
  private async readLine(
    connection: StreamConnection,
    deadline: Deadline | undefined
  ): Promise<string | undefined> {
    if (!this.pending) {
      this.pending = connection.readLine().then(
        (line): LineResult => ({ ok: true, line }),
        (error: unknown): LineResult => ({ ok: false, error })
      );
    }
    const pending = this.pending;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const interrupted = new Promise<never>((_, reject) => {
      this.cancelWait = reject;
      if (deadline) {
        timer = setTimeout(
          () => reject(StreamError.timeout(deadline.timeoutMs)),
          Math.max(0, deadline.at - Date.now())
        );
      }
    });

    let result: LineResult;
    try {
      result = await Promise.race([pending, interrupted]);
    } catch (error) {
      if (error instanceof StreamError && error.kind === StreamErrorKind.Timeout) {
        this.currentState = 'idle';
      }
      throw error;
    } finally {
      clearTimeout(timer);
      this.cancelWait = undefined;
    }

    this.pending = undefined;
    if (!result.ok) {
      this.release();
      if (result.error instanceof StreamError) {
        throw result.error;
      }
      throw new StreamError(StreamErrorKind.Closed, 'Stream connection dropped', result.error);
    }
    return result.line;
  }

  private classify(frame: RawFrame): unknown {
    const definition: StreamEventDefinition | undefined = isStreamEventTag(frame.event)
      ? STREAM_EVENTS[frame.event]
      : undefined;

    if (!definition || !this.activeFlags.has(definition.flag)) {
      this.metrics.incrementCounter(MetricNames.STREAM_EVENTS, 1, { event: 'unrecognized' });
      this.logger.debug('Unrecognized stream event', { event: frame.event });
      return { type: 'unrecognized', event: frame.event, payload: frame.data };
    }

    const payload = this.decodePayload(frame, definition);
    this.metrics.incrementCounter(MetricNames.STREAM_EVENTS, 1, { event: frame.event });
    return { type: frame.event, payload };
  }

  private decodePayload(frame: RawFrame, definition: StreamEventDefinition): unknown {
    const spec = definition.payload;
    if (spec.kind === 'none') {
      return undefined;
    }
    if (frame.data === undefined) {
      throw StreamError.malformed(`${frame.event}: missing payload`);
    }
    if (spec.kind === 'text') {
      return frame.data;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(frame.data);
    } catch (error) {
      throw StreamError.malformed(`${frame.event}: payload is not valid JSON`, error);
    }
    return this.entities.decodeAs(spec.codec, raw, frame.event);
  }

  private reportMalformed(error: unknown): unknown {
    const malformed =
      error instanceof MalformedResponseError
        ? StreamError.malformed(error.detail, error)
        : error;

    if (malformed instanceof StreamError && malformed.kind === StreamErrorKind.Malformed) {
      this.logger.warn('Malformed stream frame', { error: malformed.message });
      this.metrics.incrementCounter(MetricNames.STREAM_EVENTS, 1, { event: 'malformed' });
    } else if (isMastodonError(malformed)) {
      this.logger.error('Stream read failed', { error: malformed.message });
    }
    return malformed;
  }
}
