/**
 * Opt-in reconnection around an event reader.
 */

import type { Generation } from '../capabilities/generations.js';
import { DEFAULT_RETRY_CONFIG, RetryConfig } from '../config/index.js';
import { StreamError, StreamErrorKind } from '../errors/index.js';
import {
  Logger,
  MetricNames,
  MetricsCollector,
  ObservabilityOptions,
  resolveObservability,
} from '../observability/index.js';
import { Sleep, computeBackoff, sleep } from '../resilience/retry.js';
import type { EventReader, NextEventOptions } from './reader.js';
import type { ReconnectedEvent, StreamingEvent } from './types.js';

export interface ReconnectOptions<G extends Generation>
  extends Omit<ObservabilityOptions, 'tracer'> {
  /** Opens a fresh, connected reader */
  open: () => Promise<EventReader<G>>;
  /** Reconnection attempts per drop before giving up. Default: `retryConfig.maxRetries` */
  maxAttempts?: number;
  retryConfig?: Readonly<RetryConfig>;
  wait?: Sleep;
}

export type ReconnectingStreamEvent<G extends Generation> = StreamingEvent<G> | ReconnectedEvent;

/**
 * Reader that reconnects after the server closes or drops the stream.
 *
 * After each successful reconnection it yields a `reconnected` event before
 * any further events, since events sent in between were not received.
 */
export class ReconnectingEventReader<G extends Generation>
  implements AsyncIterable<ReconnectingStreamEvent<G>>
{
  private readonly open: () => Promise<EventReader<G>>;
  private readonly maxAttempts: number;
  private readonly retryConfig: Readonly<RetryConfig>;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly wait: Sleep;
  private current?: EventReader<G>;
  private closed = false;
  private cancelWait?: (error: StreamError) => void;

  constructor(options: ReconnectOptions<G>) {
    this.open = options.open;
    this.retryConfig = options.retryConfig ?? DEFAULT_RETRY_CONFIG;
    this.maxAttempts = options.maxAttempts ?? this.retryConfig.maxRetries;
    const { logger, metrics } = resolveObservability(options);
    this.logger = logger;
    this.metrics = metrics;
    this.wait = options.wait ?? sleep;
  }

  /**
   * Next event, or a `reconnected` marker after a reconnection.
   *
   * @throws StreamError (Closed) with the last failure as cause once every
   * reconnection attempt failed; Cancelled after `close()`
   */
  async nextEvent(options?: NextEventOptions): Promise<ReconnectingStreamEvent<G>> {
    if (this.closed) {
      throw StreamError.cancelled();
    }
    if (!this.current) {
      this.current = await this.openReader();
    }

    try {
      return await this.current.nextEvent(options);
    } catch (error) {
      if (error instanceof StreamError && error.kind === StreamErrorKind.Closed && !this.closed) {
        this.current = undefined;
        return this.reconnect(error);
      }
      throw error;
    }
  }

  /**
   * Stops reading. A pending `nextEvent()`, including one still connecting or
   * waiting out a backoff, rejects with StreamError(Cancelled).
   */
  close(): void {
    this.closed = true;
    this.current?.close();
    this.current = undefined;
    this.cancelWait?.(StreamError.cancelled());
  }

  async *[Symbol.asyncIterator](): AsyncIterator<ReconnectingStreamEvent<G>> {
    for (;;) {
      try {
        yield await this.nextEvent();
      } catch (error) {
        if (error instanceof StreamError && error.kind === StreamErrorKind.Malformed) {
          continue;
        }
        if (error instanceof StreamError && error.kind === StreamErrorKind.Cancelled) {
          return;
        }
        throw error;
      }
    }
  }

  private async reconnect(dropped: StreamError): Promise<ReconnectedEvent> {
    let lastError: unknown = dropped;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const delayMs = computeBackoff(attempt, this.retryConfig);
      this.logger.warn('Stream dropped, reconnecting', { attempt, delayMs });
      await this.unlessClosed(this.wait(delayMs));

      try {
        this.current = await this.openReader();
      } catch (error) {
        if (this.closed) {
          throw error;
        }
        lastError = error;
        this.logger.warn('Stream reconnection failed', {
          attempt,
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      this.metrics.incrementCounter(MetricNames.STREAM_RECONNECTS, 1);
      this.logger.info('Stream reconnected', { attempt });
      return { type: 'reconnected', attempt };
    }

    this.logger.error('Stream reconnection gave up', { attempts: this.maxAttempts });
    throw new StreamError(
      StreamErrorKind.Closed,
      `Stream closed; ${this.maxAttempts} reconnection attempts failed`,
      lastError
    );
  }

  /**
   * Opens a reader unless `close()` comes first. A reader that arrives after
   * `close()` is closed straight away.
   */
  private async openReader(): Promise<EventReader<G>> {
    const opening = this.open();
    let reader: EventReader<G>;
    try {
      reader = await this.unlessClosed(opening);
    } catch (error) {
      if (this.closed) {
        void opening.then(
          (late) => late.close(),
          () => undefined
        );
      }
      throw error;
    }
    if (this.closed) {
      reader.close();
      throw StreamError.cancelled();
    }
    return reader;
  }

  private async unlessClosed<T>(work: Promise<T>): Promise<T> {
    if (this.closed) {
      throw StreamError.cancelled();
    }
    const cancelled = new Promise<never>((_, reject) => {
      this.cancelWait = reject;
    });
    try {
      return await Promise.race([work, cancelled]);
    } finally {
      this.cancelWait = undefined;
    }
  }
}
