/**
 * Streaming tests: frame parsing, the event reader and reconnection.
 */

import { EntityModel } from '../entities/model.js';
import { StreamError, StreamErrorKind } from '../errors/index.js';
import { ScriptedConnection, ScriptedStreamTransport, sseLines } from '../mocks/index.js';
import { InMemoryMetricsCollector, MetricNames } from '../observability/index.js';
import { FrameParser } from '../streaming/frames.js';
import { EventReader } from '../streaming/reader.js';
import { ReconnectingEventReader } from '../streaming/reconnect.js';
import { LineBuffer } from '../streaming/transport.js';
import type { StreamConnection } from '../streaming/transport.js';
import { rawStatus } from './fixtures.js';

const REQUEST = { url: 'https://social.example/api/v1/streaming/public', headers: {} };

function errorKindOf(error: unknown): StreamErrorKind | undefined {
  return error instanceof StreamError ? error.kind : undefined;
}

async function failureOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the read to fail');
}

describe('FrameParser', () => {
  let parser: FrameParser;

  beforeEach(() => {
    parser = new FrameParser();
  });

  it('should dispatch a server-sent event on a blank line', () => {
    expect(parser.push('event: delete')).toBeUndefined();
    expect(parser.push('data: 42')).toBeUndefined();
    expect(parser.push('')).toEqual({ event: 'delete', data: '42' });
  });

  it('should join multi-line data and strip carriage returns', () => {
    parser.push('event: update\r');
    parser.push('data: {"a":\r');
    parser.push('data: 1}');

    expect(parser.push('\r')).toEqual({ event: 'update', data: '{"a":\n1}' });
  });

  it('should ignore heartbeats and stray blank lines', () => {
    expect(parser.push(':thump')).toBeUndefined();
    expect(parser.push('')).toBeUndefined();
  });

  it('should default the event name to message', () => {
    parser.push('data:hello');
    expect(parser.push('')).toEqual({ event: 'message', data: 'hello' });
  });

  it('should ignore id and retry fields', () => {
    parser.push('id: 7');
    parser.push('retry: 1000');
    parser.push('event: filters_changed');

    expect(parser.push('')).toEqual({ event: 'filters_changed', data: undefined });
  });

  it('should read a JSON message line', () => {
    expect(parser.push('{"event":"delete","payload":"42"}')).toEqual({
      event: 'delete',
      data: '42',
    });
    expect(parser.push('{"event":"filters_changed","payload":null}')).toEqual({
      event: 'filters_changed',
      data: undefined,
    });
  });

  it('should report a broken message line and keep parsing', () => {
    let error: unknown;
    try {
      parser.push('{"event":');
    } catch (caught) {
      error = caught;
    }
    expect(errorKindOf(error)).toBe(StreamErrorKind.Malformed);

    expect(() => parser.push('{"payload":"1"}')).toThrow(
      'Malformed stream frame: message.event: Required'
    );
    expect(parser.push('{"event":"delete","payload":"1"}')).toEqual({
      event: 'delete',
      data: '1',
    });
  });

  it('should drop a partial frame on reset', () => {
    parser.push('event: update');
    parser.reset();

    expect(parser.push('')).toBeUndefined();
  });
});

describe('LineBuffer', () => {
  it('should split chunks into lines across boundaries', () => {
    const buffer = new LineBuffer();

    expect(buffer.append('event: up')).toEqual([]);
    expect(buffer.append('date\r\ndata: 1\n\n')).toEqual(['event: update', 'data: 1', '']);
    expect(buffer.drain()).toBeUndefined();
  });

  it('should hand out the unterminated tail', () => {
    const buffer = new LineBuffer();
    buffer.append('a\nb');

    expect(buffer.drain()).toBe('b');
    expect(buffer.drain()).toBeUndefined();
  });
});

describe('EventReader', () => {
  const entities = new EntityModel('2.9.1');

  function readerOver(
    connection: ScriptedConnection,
    metrics?: InMemoryMetricsCollector
  ): EventReader<'2.9.1'> {
    return new EventReader({
      entities,
      connect: async () => connection,
      timeline: 'public',
      metrics,
    });
  }

  it('should decode an update into a status', async () => {
    const reader = readerOver(new ScriptedConnection(sseLines('update', JSON.stringify(rawStatus()))));

    const event = await reader.nextEvent();

    expect(event.type).toBe('update');
    if (event.type === 'update') {
      expect(event.payload.id).toBe('100');
      expect(event.payload.replies_count).toBe(0);
    }
  });

  it('should classify payloads that are ids or nothing', async () => {
    const reader = readerOver(
      new ScriptedConnection([...sseLines('delete', '100'), ...sseLines('filters_changed')])
    );

    expect(await reader.nextEvent()).toEqual({ type: 'delete', payload: '100' });
    expect(await reader.nextEvent()).toEqual({ type: 'filters_changed', payload: undefined });
  });

  it('should keep unknown and inactive tags as unrecognized', async () => {
    const reader = readerOver(
      new ScriptedConnection([
        ...sseLines('status.update', '{"id":"1"}'),
        ...sseLines('announcement.delete', '9'),
      ])
    );

    expect(await reader.nextEvent()).toEqual({
      type: 'unrecognized',
      event: 'status.update',
      payload: '{"id":"1"}',
    });
    expect(await reader.nextEvent()).toEqual({
      type: 'unrecognized',
      event: 'announcement.delete',
      payload: '9',
    });
  });

  it('should fail one read per malformed frame and keep reading', async () => {
    const metrics = new InMemoryMetricsCollector();
    const reader = readerOver(
      new ScriptedConnection([
        ...sseLines('update', 'not json'),
        ...sseLines('update', JSON.stringify(rawStatus({ replies_count: undefined }))),
        ...sseLines('update'),
        ...sseLines('delete', '7'),
      ]),
      metrics
    );

    await expect(reader.nextEvent()).rejects.toThrow(
      'Malformed stream frame: update: payload is not valid JSON'
    );
    await expect(reader.nextEvent()).rejects.toThrow(
      'Malformed stream frame: update.replies_count: Required'
    );
    await expect(reader.nextEvent()).rejects.toThrow('Malformed stream frame: update: missing payload');
    expect(await reader.nextEvent()).toEqual({ type: 'delete', payload: '7' });

    expect(reader.state).toBe('idle');
    expect(metrics.getCounter(MetricNames.STREAM_EVENTS, { event: 'malformed' })).toBe(3);
    expect(metrics.getCounter(MetricNames.STREAM_EVENTS, { event: 'delete' })).toBe(1);
  });

  it('should report the end of the stream as closed', async () => {
    const connection = new ScriptedConnection(sseLines('delete', '1')).end();
    const reader = readerOver(connection);

    await reader.nextEvent();
    const error = await failureOf(reader.nextEvent());

    expect(errorKindOf(error)).toBe(StreamErrorKind.Closed);
    expect(reader.state).toBe('closed');
    expect(connection.closed).toBe(true);
    expect(errorKindOf(await failureOf(reader.nextEvent()))).toBe(StreamErrorKind.Closed);
  });

  it('should report a dropped connection as closed', async () => {
    const reader = readerOver(new ScriptedConnection().fail(new Error('connection reset')));

    const error = await failureOf(reader.nextEvent());

    expect(errorKindOf(error)).toBe(StreamErrorKind.Closed);
    expect(error).toHaveProperty('message', 'Stream connection dropped');
  });

  it('should time out without losing the pending line', async () => {
    const connection = new ScriptedConnection();
    const reader = readerOver(connection);

    const error = await failureOf(reader.nextEvent({ timeoutMs: 10 }));
    expect(errorKindOf(error)).toBe(StreamErrorKind.Timeout);
    expect(error).toHaveProperty('message', 'No event within 10ms');
    expect(reader.state).toBe('idle');

    connection.push(...sseLines('delete', '3'));
    expect(await reader.nextEvent()).toEqual({ type: 'delete', payload: '3' });
  });

  it('should time out on a timeline that only sends heartbeats', async () => {
    const connection = new ScriptedConnection();
    const reader = readerOver(connection);
    await reader.connect();
    const heartbeat = setInterval(() => connection.push(':thump'), 10);

    try {
      const error = await failureOf(reader.nextEvent({ timeoutMs: 60 }));
      expect(errorKindOf(error)).toBe(StreamErrorKind.Timeout);
      expect(error).toHaveProperty('message', 'No event within 60ms');
    } finally {
      clearInterval(heartbeat);
    }

    connection.push(...sseLines('delete', '5'));
    expect(await reader.nextEvent()).toEqual({ type: 'delete', payload: '5' });
    reader.close();
  });

  it('should cancel a read that is still connecting', async () => {
    const connection = new ScriptedConnection();
    let deliver: (connection: StreamConnection) => void = () => {};
    const reader = new EventReader({
      entities,
      connect: () =>
        new Promise<StreamConnection>((resolve) => {
          deliver = resolve;
        }),
      timeline: 'public',
    });

    const pending = reader.nextEvent();
    reader.close();

    expect(errorKindOf(await failureOf(pending))).toBe(StreamErrorKind.Cancelled);
    expect(reader.state).toBe('closed');

    deliver(connection);
    await vi.waitFor(() => expect(connection.closed).toBe(true));
  });

  it('should cancel a pending read on close', async () => {
    const connection = new ScriptedConnection();
    const reader = readerOver(connection);
    await reader.connect();

    const pending = reader.nextEvent();
    reader.close();

    expect(errorKindOf(await failureOf(pending))).toBe(StreamErrorKind.Cancelled);
    expect(connection.closed).toBe(true);
    expect(reader.state).toBe('closed');
  });

  it('should move through its states', async () => {
    const reader = readerOver(new ScriptedConnection(sseLines('delete', '1')));
    expect(reader.state).toBe('connecting');

    await reader.connect();
    expect(reader.state).toBe('open');

    await reader.nextEvent();
    expect(reader.state).toBe('idle');
  });

  it('should skip malformed frames when iterated', async () => {
    const reader = readerOver(
      new ScriptedConnection([
        ...sseLines('delete', '1'),
        '{"event":',
        ...sseLines('delete', '2'),
      ]).end()
    );

    const payloads: unknown[] = [];
    for await (const event of reader) {
      payloads.push(event.payload);
    }

    expect(payloads).toEqual(['1', '2']);
  });

  it('should classify announcements once the generation has them', async () => {
    const reader = new EventReader({
      entities: new EntityModel('3.1.0'),
      connect: async () =>
        new ScriptedConnection(
          sseLines(
            'announcement.reaction',
            JSON.stringify({ name: 'bongoCat', count: 2, announcement_id: '8' })
          )
        ),
      timeline: 'user',
    });

    expect(await reader.nextEvent()).toEqual({
      type: 'announcement.reaction',
      payload: { name: 'bongoCat', count: 2, announcement_id: '8' },
    });
  });

  it('should read JSON message lines', async () => {
    const reader = readerOver(new ScriptedConnection(['{"event":"delete","payload":"5"}']));

    expect(await reader.nextEvent()).toEqual({ type: 'delete', payload: '5' });
  });
});

describe('ReconnectingEventReader', () => {
  const entities = new EntityModel('2.9.1');

  function reconnecting(
    streams: ScriptedStreamTransport,
    options: { maxAttempts?: number; metrics?: InMemoryMetricsCollector; delays?: number[] } = {}
  ): ReconnectingEventReader<'2.9.1'> {
    return new ReconnectingEventReader({
      open: async () => {
        const reader = new EventReader({
          entities,
          connect: () => streams.connect(REQUEST),
          timeline: 'public',
        });
        await reader.connect();
        return reader;
      },
      maxAttempts: options.maxAttempts,
      retryConfig: {
        maxRetries: 3,
        initialBackoffMs: 100,
        maxBackoffMs: 1000,
        backoffMultiplier: 2,
        jitterFactor: 0,
      },
      metrics: options.metrics,
      wait: async (ms) => {
        options.delays?.push(ms);
      },
    });
  }

  it('should announce a reconnection before further events', async () => {
    const streams = new ScriptedStreamTransport();
    const metrics = new InMemoryMetricsCollector();
    streams.connection(sseLines('delete', '1')).end();
    streams.connection(sseLines('delete', '2'));
    const reader = reconnecting(streams, { metrics });

    expect(await reader.nextEvent()).toEqual({ type: 'delete', payload: '1' });
    expect(await reader.nextEvent()).toEqual({ type: 'reconnected', attempt: 1 });
    expect(await reader.nextEvent()).toEqual({ type: 'delete', payload: '2' });
    expect(metrics.getCounter(MetricNames.STREAM_RECONNECTS)).toBe(1);
    reader.close();
  });

  it('should back off between failed attempts', async () => {
    const streams = new ScriptedStreamTransport();
    const delays: number[] = [];
    streams.connection().end();
    streams.failNext(new Error('refused'));
    streams.failNext(new Error('refused'));
    streams.connection(sseLines('delete', '4'));
    const reader = reconnecting(streams, { delays });

    expect(await reader.nextEvent()).toEqual({ type: 'reconnected', attempt: 3 });
    expect(await reader.nextEvent()).toEqual({ type: 'delete', payload: '4' });
    expect(delays).toEqual([100, 200, 400]);
    reader.close();
  });

  it('should give up after the last attempt', async () => {
    const streams = new ScriptedStreamTransport();
    const refused = new Error('refused');
    streams.connection().end();
    streams.failNext(refused);
    streams.failNext(refused);
    const reader = reconnecting(streams, { maxAttempts: 2 });

    const error = await failureOf(reader.nextEvent());

    expect(errorKindOf(error)).toBe(StreamErrorKind.Closed);
    expect(error).toHaveProperty('message', 'Stream closed; 2 reconnection attempts failed');
    expect(error).toHaveProperty('cause', refused);
  });

  it('should stop after close', async () => {
    const streams = new ScriptedStreamTransport();
    streams.connection(sseLines('delete', '1'));
    const reader = reconnecting(streams);

    await reader.nextEvent();
    reader.close();

    expect(errorKindOf(await failureOf(reader.nextEvent()))).toBe(StreamErrorKind.Cancelled);
  });

  it('should cancel while the first connection is opening', async () => {
    const connection = new ScriptedConnection(sseLines('delete', '1'));
    let proceed: () => void = () => {};
    const reader = new ReconnectingEventReader({
      open: async () => {
        await new Promise<void>((resolve) => {
          proceed = resolve;
        });
        const inner = new EventReader({ entities, connect: async () => connection, timeline: 'public' });
        await inner.connect();
        return inner;
      },
    });

    const pending = reader.nextEvent();
    reader.close();

    expect(errorKindOf(await failureOf(pending))).toBe(StreamErrorKind.Cancelled);

    proceed();
    await vi.waitFor(() => expect(connection.closed).toBe(true));
  });

  it('should cancel while waiting out a backoff', async () => {
    const streams = new ScriptedStreamTransport();
    streams.connection().end();
    let waiting = false;
    const reader = new ReconnectingEventReader({
      open: async () => {
        const inner = new EventReader({
          entities,
          connect: () => streams.connect(REQUEST),
          timeline: 'public',
        });
        await inner.connect();
        return inner;
      },
      wait: () => {
        waiting = true;
        return new Promise<void>(() => {});
      },
    });

    const pending = reader.nextEvent();
    await vi.waitFor(() => expect(waiting).toBe(true));
    reader.close();

    expect(errorKindOf(await failureOf(pending))).toBe(StreamErrorKind.Cancelled);
    expect(streams.getRequests()).toHaveLength(1);
  });

  it('should end iteration when closed', async () => {
    const streams = new ScriptedStreamTransport();
    streams.connection([...sseLines('delete', '1'), ...sseLines('delete', '2')]);
    const reader = reconnecting(streams);

    const seen: string[] = [];
    for await (const event of reader) {
      seen.push(event.type);
      if (seen.length === 2) {
        reader.close();
      }
    }

    expect(seen).toEqual(['delete', 'delete']);
  });
});
